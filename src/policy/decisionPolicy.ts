/**
 * Decision Policy
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PURPOSE: Turn (opportunity, intelligence snapshot) into an execute / resize /
 * skip verdict with a position-size multiplier.
 *
 * DECISION TABLE (first match wins):
 * 1. net profit ratio < minProfitRatio      → SKIP
 * 2. REGULATORY_RISK flag present            → EXECUTE_REDUCED × (1 − reductionFactor)
 * 3. sentiment ≥ bullishThreshold AND
 *    label high_confidence                   → EXECUTE × (1 + boostFactor)
 * 4. otherwise                               → EXECUTE × 1
 *
 * CLAMP:
 * The multiplier is clamped to [minMultiplier, maxMultiplier]. A raw multiplier
 * below the floor would make the trade pointless and degrades to SKIP.
 *
 * The table is total and deterministic; the only non-input value in a verdict
 * is its `decidedAt` timestamp.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from '../utils/logger';
import { Clock } from '../graph';
import { IntelligenceSnapshot } from '../intelligence';
import { Opportunity } from '../scanner';
import { createPolicyConfig } from './config';
import { DecisionPolicyConfig, DecisionRule, Verdict, VerdictAction } from './types';

export const REASONS: Record<DecisionRule, string> = {
    profit_floor: 'below profit floor',
    regulatory_risk: 'regulatory risk overrides profit',
    confirmed_bullish: 'confirmed bullish signal',
    neutral: 'neutral intelligence, profit-driven execution',
    multiplier_floor: 'multiplier below floor',
};

interface TableRow {
    action: VerdictAction;
    rule: DecisionRule;
    rawMultiplier: number;
}

export class DecisionPolicy {
    readonly config: DecisionPolicyConfig;

    constructor(config: Partial<DecisionPolicyConfig> = {}, private readonly now: Clock = Date.now) {
        this.config = createPolicyConfig(config);
    }

    evaluate(opportunity: Opportunity, snapshot: IntelligenceSnapshot): Verdict {
        const row = this.match(opportunity, snapshot);

        let action = row.action;
        let rule = row.rule;
        let multiplier = 0;

        if (action !== 'SKIP') {
            if (row.rawMultiplier < this.config.minMultiplier) {
                action = 'SKIP';
                rule = 'multiplier_floor';
            } else {
                multiplier = Math.min(row.rawMultiplier, this.config.maxMultiplier);
            }
        }

        const verdict: Verdict = Object.freeze({
            action,
            multiplier,
            rule,
            reason: REASONS[rule],
            trace: Object.freeze({
                netProfitRatio: opportunity.netProfitRatio.toFixed(),
                sentiment: snapshot.sentiment,
                confidence: snapshot.confidence,
                confidenceLabel: snapshot.confidenceLabel,
                riskFlags: snapshot.riskFlags,
                rawMultiplier: row.rawMultiplier,
            }),
            opportunityId: opportunity.id,
            snapshotId: snapshot.id,
            decidedAt: this.now(),
        });

        logger.info(
            `[DECISION] ${verdict.action} x${verdict.multiplier} | ${verdict.reason} | ` +
            `net=${verdict.trace.netProfitRatio} sentiment=${snapshot.sentiment.toFixed(3)} ` +
            `${snapshot.confidenceLabel} flags=[${snapshot.riskFlags.join(',')}] | ${opportunity.assetPath.join('→')}`
        );

        return verdict;
    }

    private match(opportunity: Opportunity, snapshot: IntelligenceSnapshot): TableRow {
        const { minProfitRatio, reductionFactor, bullishThreshold, boostFactor } = this.config;

        if (opportunity.netProfitRatio.lt(minProfitRatio)) {
            return { action: 'SKIP', rule: 'profit_floor', rawMultiplier: 0 };
        }

        if (snapshot.riskFlags.includes('REGULATORY_RISK')) {
            return { action: 'EXECUTE_REDUCED', rule: 'regulatory_risk', rawMultiplier: 1 - reductionFactor };
        }

        if (snapshot.sentiment >= bullishThreshold && snapshot.confidenceLabel === 'high_confidence') {
            return { action: 'EXECUTE', rule: 'confirmed_bullish', rawMultiplier: 1 + boostFactor };
        }

        return { action: 'EXECUTE', rule: 'neutral', rawMultiplier: 1 };
    }
}
