/**
 * Cycle Scanner - Type Definitions
 */

import BigNumber from 'bignumber.js';

export type OpportunityKind = 'cyclic' | 'cross_venue';

export interface OpportunityHop {
    readonly poolKey: string;
    readonly venue: string;
    readonly assetIn: string;
    readonly assetOut: string;
    readonly feeBps: number;
    readonly amountIn: BigNumber;
    readonly amountOut: BigNumber;
}

/**
 * A closed walk through the pool graph that returns to its start asset.
 * Created once per scan tick and never mutated.
 */
export interface Opportunity {
    readonly id: string;
    readonly kind: OpportunityKind;
    readonly startAsset: string;
    /** Asset ids visited, first == last */
    readonly assetPath: readonly string[];
    readonly hops: readonly OpportunityHop[];

    /** Probe amount pushed through the walk, start-asset units */
    readonly notionalIn: BigNumber;
    /** Final amount after fees */
    readonly amountOut: BigNumber;
    /** Final amount had every pool charged no fee */
    readonly grossAmountOut: BigNumber;

    readonly grossProfitRatio: BigNumber;
    readonly feeCostRatio: BigNumber;
    readonly settlementCostRatio: BigNumber;
    /** gross − fees − settlement */
    readonly netProfitRatio: BigNumber;

    /** Graph generation the walk was priced on */
    readonly generation: number;
    readonly detectedAt: number;
}

export interface ScanOptions {
    maxHops: number;
    /** Net profit ratio a walk must exceed to be emitted */
    minProfitRatio: number;
    /** Absolute epoch ms after which the scan is abandoned */
    deadline?: number;
}

export interface ScannerConfig {
    /** Asset ids walks start from. Empty = every asset with a pool */
    baseAssets: string[];
    /** Per base asset probe notional, smallest units */
    probeAmounts: Record<string, BigNumber.Value>;
    defaultProbeAmount: BigNumber.Value;
    /** Estimated gas/settlement cost per hop, start-asset units */
    settlementCostPerHop: BigNumber.Value;
    /** Expansions between cooperative yields */
    yieldEvery: number;
}
