/**
 * Cycle Scanner
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PURPOSE: Enumerate closed walks over one pool-graph generation and price them
 * with integer constant-product quotes.
 *
 * ALGORITHM:
 * 1. For each base asset, depth-first walk over fresh pools up to `maxHops`.
 *    No pool is used twice and no intermediate asset is revisited; a walk
 *    closes only when it returns to its start asset.
 * 2. Every hop is priced twice: with the pool fee (net path) and without it
 *    (gross path). The difference is the cumulative fee cost.
 * 3. net = gross − fees − settlementCostPerHop·hops / notional
 * 4. Walks with net > minProfitRatio are candidates. Candidates from one start
 *    asset are emitted best net first, fewer hops on ties.
 *
 * Two-hop walks across different venues are cross-venue arbitrage; everything
 * else is cyclic. A walk already emitted from another start asset (same pools,
 * same direction) is not emitted again.
 *
 * The scan yields to the event loop every `yieldEvery` expansions and throws
 * ScanTimeoutError once the deadline passes.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import logger from '../utils/logger';
import { generateOpportunityId } from '../utils/id';
import { ConfigurationError, InsufficientLiquidityError, ScanTimeoutError } from '../core/errors';
import { FixedPoint, constantProductOut, ratio, toBigNumber } from '../utils/math';
import { Clock, GraphSnapshot, PoolGraph, counterpart, orientReserves } from '../graph';
import { createScannerConfig } from './config';
import { Opportunity, OpportunityHop, OpportunityKind, ScanOptions, ScannerConfig } from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// WALK STATE
// ═══════════════════════════════════════════════════════════════════════════════

interface Walk {
    asset: string;
    assetPath: string[];
    hops: OpportunityHop[];
    usedPools: Set<string>;
    netAmount: BigNumber;
    grossAmount: BigNumber;
}

interface ClosedWalk {
    assetPath: string[];
    hops: OpportunityHop[];
    netAmount: BigNumber;
    grossAmount: BigNumber;
}

/**
 * Rotation-independent identity of a directed cycle.
 */
export function cycleKey(hops: readonly OpportunityHop[]): string {
    const steps = hops.map(h => `${h.assetIn}@${h.poolKey}`);
    let start = 0;
    for (let i = 1; i < steps.length; i++) {
        if (steps[i] < steps[start]) start = i;
    }
    return [...steps.slice(start), ...steps.slice(0, start)].join('>');
}

function classify(hops: readonly OpportunityHop[]): OpportunityKind {
    return hops.length === 2 && hops[0].venue !== hops[1].venue ? 'cross_venue' : 'cyclic';
}

/**
 * Higher net ratio first, then fewer hops.
 */
export function compareOpportunities(a: Opportunity, b: Opportunity): number {
    const byNet = b.netProfitRatio.comparedTo(a.netProfitRatio);
    if (byNet !== 0) return byNet;
    return a.hops.length - b.hops.length;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SCANNER
// ═══════════════════════════════════════════════════════════════════════════════

export class CycleScanner {
    private readonly config: ScannerConfig;

    constructor(
        private readonly graph: PoolGraph,
        config: Partial<ScannerConfig> = {},
        private readonly now: Clock = Date.now
    ) {
        this.config = createScannerConfig(config);
    }

    /**
     * Lazily produce the candidate opportunities of one tick. The whole scan
     * reads a single graph generation, captured on the first pull.
     */
    async *scan(options: ScanOptions, snapshot?: GraphSnapshot): AsyncGenerator<Opportunity, void, undefined> {
        if (!Number.isInteger(options.maxHops) || options.maxHops < 2) {
            throw new ConfigurationError('maxHops', `must be an integer >= 2, got ${options.maxHops}`);
        }

        const view = snapshot ?? this.graph.snapshot();
        const startedAt = this.now();
        const emitted = new Set<string>();
        const budgetMs = options.deadline !== undefined ? options.deadline - startedAt : Infinity;
        let expansions = 0;
        let found = 0;

        const checkpoint = async (): Promise<void> => {
            expansions++;
            if (expansions % this.config.yieldEvery === 0) {
                await yieldToEventLoop();
            }
            if (options.deadline !== undefined && this.now() > options.deadline) {
                throw new ScanTimeoutError(budgetMs, found);
            }
        };

        for (const startAsset of this.resolveBaseAssets(view)) {
            const notional = toBigNumber(this.config.probeAmounts[startAsset] ?? this.config.defaultProbeAmount)
                .integerValue(BigNumber.ROUND_DOWN);
            if (notional.lte(0)) continue;

            const closed = await this.walkFrom(view, startAsset, notional, options.maxHops, checkpoint);
            const candidates: Opportunity[] = [];

            for (const walk of closed) {
                const key = cycleKey(walk.hops);
                if (emitted.has(key)) continue;

                const opportunity = this.price(view, startAsset, notional, walk);
                if (opportunity.netProfitRatio.gt(options.minProfitRatio)) {
                    emitted.add(key);
                    candidates.push(opportunity);
                }
            }

            candidates.sort(compareOpportunities);
            found += candidates.length;

            for (const candidate of candidates) {
                yield candidate;
            }
        }

        logger.debug(
            `[SCAN] generation ${view.generation}: ${found} candidates, ${expansions} expansions, ${this.now() - startedAt}ms`
        );
    }

    /**
     * Convenience for callers that want the whole tick at once.
     */
    async collect(options: ScanOptions, snapshot?: GraphSnapshot): Promise<Opportunity[]> {
        const result: Opportunity[] = [];
        for await (const opportunity of this.scan(options, snapshot)) {
            result.push(opportunity);
        }
        return result;
    }

    private resolveBaseAssets(view: GraphSnapshot): string[] {
        if (this.config.baseAssets.length > 0) {
            return this.config.baseAssets;
        }
        const assets = new Set<string>();
        for (const pool of view.pools()) {
            assets.add(pool.assetA);
            assets.add(pool.assetB);
        }
        return [...assets].sort();
    }

    private async walkFrom(
        view: GraphSnapshot,
        startAsset: string,
        notional: BigNumber,
        maxHops: number,
        checkpoint: () => Promise<void>
    ): Promise<ClosedWalk[]> {
        const closed: ClosedWalk[] = [];
        const stack: Walk[] = [{
            asset: startAsset,
            assetPath: [startAsset],
            hops: [],
            usedPools: new Set(),
            netAmount: notional,
            grossAmount: notional,
        }];

        while (stack.length > 0) {
            const walk = stack.pop();
            if (!walk) break;
            await checkpoint();

            for (const pool of view.tradableNeighbors(walk.asset)) {
                if (walk.usedPools.has(pool.key)) continue;

                const next = counterpart(pool, walk.asset);
                if (next === undefined) continue;

                const closes = next === startAsset;
                if (!closes && walk.assetPath.includes(next)) continue;
                if (!closes && walk.hops.length + 1 >= maxHops) continue;

                let netOut: BigNumber;
                try {
                    netOut = view.quote(walk.asset, next, walk.netAmount, pool.key).amountOut;
                } catch (err) {
                    if (err instanceof InsufficientLiquidityError) continue;
                    throw err;
                }

                const [reserveIn, reserveOut] = orientReserves(pool, walk.asset);
                const grossOut = constantProductOut(walk.grossAmount, reserveIn, reserveOut, 0);

                const hop: OpportunityHop = Object.freeze({
                    poolKey: pool.key,
                    venue: pool.venue,
                    assetIn: walk.asset,
                    assetOut: next,
                    feeBps: pool.feeBps,
                    amountIn: walk.netAmount,
                    amountOut: netOut,
                });
                const hops = [...walk.hops, hop];
                const assetPath = [...walk.assetPath, next];

                if (closes) {
                    // A single pool there and back is not a cycle
                    if (hops.length >= 2) {
                        closed.push({ assetPath, hops, netAmount: netOut, grossAmount: grossOut });
                    }
                    continue;
                }

                stack.push({
                    asset: next,
                    assetPath,
                    hops,
                    usedPools: new Set([...walk.usedPools, pool.key]),
                    netAmount: netOut,
                    grossAmount: grossOut,
                });
            }
        }

        return closed;
    }

    private price(view: GraphSnapshot, startAsset: string, notional: BigNumber, walk: ClosedWalk): Opportunity {
        const settlementCost = toBigNumber(this.config.settlementCostPerHop).times(walk.hops.length);

        const grossProfitRatio = ratio(walk.grossAmount, notional).minus(1);
        const feeCostRatio = ratio(walk.grossAmount.minus(walk.netAmount), notional);
        const settlementCostRatio = ratio(settlementCost, notional);
        const netProfitRatio = new FixedPoint(grossProfitRatio).minus(feeCostRatio).minus(settlementCostRatio);

        return Object.freeze({
            id: generateOpportunityId(),
            kind: classify(walk.hops),
            startAsset,
            assetPath: Object.freeze(walk.assetPath),
            hops: Object.freeze(walk.hops),
            notionalIn: notional,
            amountOut: walk.netAmount,
            grossAmountOut: walk.grossAmount,
            grossProfitRatio,
            feeCostRatio,
            settlementCostRatio,
            netProfitRatio,
            generation: view.generation,
            detectedAt: this.now(),
        });
    }
}
