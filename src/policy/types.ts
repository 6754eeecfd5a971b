/**
 * Decision Policy - Type Definitions
 */

import { ConfidenceLabel, RiskFlag } from '../intelligence';

export type VerdictAction = 'EXECUTE' | 'EXECUTE_REDUCED' | 'SKIP';

/**
 * Which row of the decision table produced the verdict.
 * `multiplier_floor` marks an EXECUTE row degraded to SKIP by the clamp.
 */
export type DecisionRule =
    | 'profit_floor'
    | 'regulatory_risk'
    | 'confirmed_bullish'
    | 'neutral'
    | 'multiplier_floor';

export interface VerdictTrace {
    readonly netProfitRatio: string;
    readonly sentiment: number;
    readonly confidence: number;
    readonly confidenceLabel: ConfidenceLabel;
    readonly riskFlags: readonly RiskFlag[];
    /** Multiplier before clamping */
    readonly rawMultiplier: number;
}

export interface Verdict {
    readonly action: VerdictAction;
    /** Position-size multiplier, 0 for SKIP */
    readonly multiplier: number;
    readonly rule: DecisionRule;
    readonly reason: string;
    readonly trace: VerdictTrace;
    readonly opportunityId: string;
    readonly snapshotId: string;
    readonly decidedAt: number;
}

export interface DecisionPolicyConfig {
    /** Rule 1: net profit ratio below this is skipped */
    minProfitRatio: number;
    /** Rule 2: multiplier = 1 − reductionFactor under regulatory risk */
    reductionFactor: number;
    /** Rule 3: sentiment at or above this counts as bullish */
    bullishThreshold: number;
    /** Rule 3: multiplier = 1 + boostFactor */
    boostFactor: number;
    /** Clamp floor; a smaller raw multiplier degrades to SKIP */
    minMultiplier: number;
    /** Clamp ceiling */
    maxMultiplier: number;
}
