/**
 * Pool Graph - Type Definitions
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Assets are nodes, pools are edges. One pair of assets may be joined by several
 * pools (one per venue or fee tier), so the graph is a multigraph.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import { StaleDataError } from '../core/errors';

export interface AssetDefinition {
    symbol: string;
    chain: string;
    address: string;
    decimals: number;
}

/**
 * Registered asset. `id` is `chain:address` with the address lower-cased.
 */
export interface Asset extends Readonly<AssetDefinition> {
    readonly id: string;
}

/**
 * One reserve reading delivered by the pool feed.
 * Reserves are whole numbers in each asset's smallest unit.
 */
export interface PoolReading {
    venue: string;
    poolId: string;
    assetA: string;
    assetB: string;
    reserveA: BigNumber.Value;
    reserveB: BigNumber.Value;
    feeBps: number;
    timestamp: number;
}

export interface PoolState {
    /** `venue:poolId` */
    readonly key: string;
    readonly venue: string;
    readonly poolId: string;
    readonly assetA: string;
    readonly assetB: string;
    readonly reserveA: BigNumber;
    readonly reserveB: BigNumber;
    readonly feeBps: number;
    readonly updatedAt: number;
}

/**
 * One published, immutable version of the whole graph.
 */
export interface GraphGeneration {
    readonly generation: number;
    readonly publishedAt: number;
    readonly pools: ReadonlyMap<string, PoolState>;
    /** asset id → keys of incident pools */
    readonly incidence: ReadonlyMap<string, readonly string[]>;
}

export interface UpdateResult {
    generation: number;
    applied: number;
    ignoredStale: StaleDataError[];
}

export interface QuoteResult {
    poolKey: string;
    amountIn: BigNumber;
    amountOut: BigNumber;
}

export interface PoolGraphConfig {
    /** Pools with no update inside this window are excluded from quoting */
    stalenessWindowMs: number;
}
