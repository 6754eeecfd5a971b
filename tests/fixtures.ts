/**
 * Shared test fixtures: a three-asset graph with one profitable triangle,
 * plus builders for snapshots and opportunities.
 */

import BigNumber from 'bignumber.js';
import { PoolGraph, PoolReading, assetIdOf } from '../src/graph';
import { IntelligenceSnapshot, NEUTRAL_SNAPSHOT } from '../src/intelligence';
import { Opportunity } from '../src/scanner';

export const NOW = 1_700_000_000_000;

export const WLSK = assetIdOf('lisk', '0xA1');
export const ICE = assetIdOf('lisk', '0xA2');
export const SLSK = assetIdOf('lisk', '0xA3');

/**
 * WLSK→ICE→SLSK→WLSK compounds to ~1.08 before fees and price impact.
 */
export function triangleReadings(timestamp: number = NOW): PoolReading[] {
    return [
        { venue: 'velo', poolId: 'p1', assetA: WLSK, assetB: ICE, reserveA: '1000000', reserveB: '800000', feeBps: 30, timestamp },
        { venue: 'velo', poolId: 'p2', assetA: ICE, assetB: SLSK, reserveA: '500000', reserveB: '600000', feeBps: 30, timestamp },
        { venue: 'velo', poolId: 'p3', assetA: SLSK, assetB: WLSK, reserveA: '400000', reserveB: '450000', feeBps: 30, timestamp },
    ];
}

export function createGraph(now: () => number = () => NOW): PoolGraph {
    const graph = new PoolGraph({ stalenessWindowMs: 120_000 }, now);
    graph.registerAsset({ symbol: 'WLSK', chain: 'lisk', address: '0xA1', decimals: 18 });
    graph.registerAsset({ symbol: 'ICE', chain: 'lisk', address: '0xA2', decimals: 18 });
    graph.registerAsset({ symbol: 'SLSK', chain: 'lisk', address: '0xA3', decimals: 18 });
    return graph;
}

export function createTriangleGraph(now: () => number = () => NOW): PoolGraph {
    const graph = createGraph(now);
    graph.update(triangleReadings());
    return graph;
}

export function makeSnapshot(overrides: Partial<IntelligenceSnapshot> = {}): IntelligenceSnapshot {
    return {
        ...NEUTRAL_SNAPSHOT,
        id: 'snap_test',
        sequence: 1,
        generatedAt: NOW,
        isDefault: false,
        ...overrides,
    };
}

export function makeOpportunity(overrides: Partial<Opportunity> = {}): Opportunity {
    return {
        id: 'opp_test',
        kind: 'cyclic',
        startAsset: WLSK,
        assetPath: [WLSK, ICE, SLSK, WLSK],
        hops: [
            { poolKey: 'velo:p1', venue: 'velo', assetIn: WLSK, assetOut: ICE, feeBps: 30, amountIn: new BigNumber(1000), amountOut: new BigNumber(796) },
            { poolKey: 'velo:p2', venue: 'velo', assetIn: ICE, assetOut: SLSK, feeBps: 30, amountIn: new BigNumber(796), amountOut: new BigNumber(950) },
            { poolKey: 'velo:p3', venue: 'velo', assetIn: SLSK, assetOut: WLSK, feeBps: 30, amountIn: new BigNumber(950), amountOut: new BigNumber(1063) },
        ],
        notionalIn: new BigNumber(1000),
        amountOut: new BigNumber(1063),
        grossAmountOut: new BigNumber(1074),
        grossProfitRatio: new BigNumber('0.074'),
        feeCostRatio: new BigNumber('0.011'),
        settlementCostRatio: new BigNumber(0),
        netProfitRatio: new BigNumber('0.063'),
        generation: 1,
        detectedAt: NOW,
        ...overrides,
    };
}

export function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    throw new Error('expected the call to throw');
}
