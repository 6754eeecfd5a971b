/**
 * Pool Graph - Reserve State
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PURPOSE: Own the reserve state of every known pool and answer quote and
 * traversal queries for the cycle scanner.
 *
 * CONSISTENCY:
 * - Each accepted batch publishes a new immutable GraphGeneration in one
 *   reference swap (copy-on-write). A scan holding a GraphSnapshot keeps seeing
 *   its own generation while later batches are applied.
 * - A batch is validated in full before anything is copied. Any invalid reading
 *   rejects the whole batch with InvalidBatchError and the generation does not
 *   move.
 * - Readings older than the pool's current state are StaleData: dropped and
 *   logged, the rest of the batch still applies.
 *
 * STALENESS:
 * Pools with no reading inside `stalenessWindowMs` stay in the graph but are
 * excluded from quoting and traversal and reported by `stalePools()`.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import logger from '../utils/logger';
import {
    BatchIssue,
    ConfigurationError,
    InsufficientLiquidityError,
    InvalidBatchError,
    StaleDataError,
} from '../core/errors';
import {
    BPS_DENOMINATOR,
    FixedPoint,
    constantProductOut,
    isNonNegativeInteger,
    ratio,
    toBigNumber,
} from '../utils/math';
import { createGraphConfig } from './config';
import {
    Asset,
    AssetDefinition,
    GraphGeneration,
    PoolGraphConfig,
    PoolReading,
    PoolState,
    QuoteResult,
    UpdateResult,
} from './types';

export type Clock = () => number;

// ═══════════════════════════════════════════════════════════════════════════════
// KEYS
// ═══════════════════════════════════════════════════════════════════════════════

export function assetIdOf(chain: string, address: string): string {
    return `${chain}:${address.toLowerCase()}`;
}

export function poolKeyOf(venue: string, poolId: string): string {
    return `${venue}:${poolId}`;
}

const EMPTY_GENERATION: GraphGeneration = Object.freeze({
    generation: 0,
    publishedAt: 0,
    pools: new Map<string, PoolState>(),
    incidence: new Map<string, readonly string[]>(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// SNAPSHOT — READ VIEW OVER ONE GENERATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Read-only view over one generation, with staleness evaluated at `asOf`.
 */
export class GraphSnapshot {
    constructor(
        private readonly state: GraphGeneration,
        private readonly stalenessWindowMs: number,
        public readonly asOf: number
    ) {}

    get generation(): number {
        return this.state.generation;
    }

    pool(poolKey: string): PoolState | undefined {
        return this.state.pools.get(poolKey);
    }

    pools(): PoolState[] {
        return [...this.state.pools.values()];
    }

    isStale(pool: PoolState): boolean {
        return this.asOf - pool.updatedAt > this.stalenessWindowMs;
    }

    stalePools(): PoolState[] {
        return this.pools().filter(p => this.isStale(p));
    }

    /**
     * Pools incident to an asset, stale ones included.
     */
    neighbors(assetId: string): PoolState[] {
        const keys = this.state.incidence.get(assetId) ?? [];
        const result: PoolState[] = [];
        for (const key of keys) {
            const pool = this.state.pools.get(key);
            if (pool) result.push(pool);
        }
        return result;
    }

    /**
     * Pools incident to an asset that may be quoted right now.
     */
    tradableNeighbors(assetId: string): PoolState[] {
        return this.neighbors(assetId).filter(p => !this.isStale(p));
    }

    /**
     * Constant-product output for one swap. Without `poolKey` the fresh pool
     * with the best output is used.
     */
    quote(assetIn: string, assetOut: string, amountIn: BigNumber.Value, poolKey?: string): QuoteResult {
        const input = toBigNumber(amountIn).integerValue(BigNumber.ROUND_DOWN);

        if (poolKey !== undefined) {
            return this.quoteThrough(poolKey, assetIn, assetOut, input);
        }

        let best: QuoteResult | null = null;
        let lastFailure: InsufficientLiquidityError | null = null;

        for (const pool of this.neighbors(assetIn)) {
            if (counterpart(pool, assetIn) !== assetOut) continue;
            try {
                const result = this.quoteThrough(pool.key, assetIn, assetOut, input);
                if (!best || result.amountOut.gt(best.amountOut)) {
                    best = result;
                }
            } catch (err) {
                if (!(err instanceof InsufficientLiquidityError)) throw err;
                lastFailure = err;
            }
        }

        if (best) return best;
        throw lastFailure ?? new InsufficientLiquidityError('UNKNOWN_POOL', `no pool joins ${assetIn} and ${assetOut}`);
    }

    /**
     * Relative shortfall of the executed rate against the marginal rate
     * (after fee) for a swap of `amountIn`. 0 means no impact.
     */
    priceImpact(assetIn: string, assetOut: string, amountIn: BigNumber.Value, poolKey?: string): BigNumber {
        const quote = this.quote(assetIn, assetOut, amountIn, poolKey);
        const pool = this.state.pools.get(quote.poolKey);
        if (!pool || quote.amountIn.isZero()) {
            return new FixedPoint(0);
        }

        const [reserveIn, reserveOut] = orientReserves(pool, assetIn);
        const marginalOut = quote.amountIn
            .times(reserveOut)
            .times(BPS_DENOMINATOR - pool.feeBps)
            .div(reserveIn.times(BPS_DENOMINATOR));

        return new FixedPoint(1).minus(ratio(quote.amountOut, marginalOut));
    }

    private quoteThrough(poolKey: string, assetIn: string, assetOut: string, amountIn: BigNumber): QuoteResult {
        const pool = this.state.pools.get(poolKey);
        if (!pool) {
            throw new InsufficientLiquidityError('UNKNOWN_POOL', poolKey);
        }
        if (counterpart(pool, assetIn) !== assetOut) {
            throw new InsufficientLiquidityError('ASSET_MISMATCH', `${poolKey} does not join ${assetIn} and ${assetOut}`);
        }
        if (this.isStale(pool)) {
            throw new InsufficientLiquidityError('STALE_POOL', `${poolKey} last updated at ${pool.updatedAt}`);
        }
        if (amountIn.lte(0)) {
            throw new InsufficientLiquidityError('ZERO_INPUT', `${poolKey} quoted with ${amountIn.toFixed()}`);
        }

        const [reserveIn, reserveOut] = orientReserves(pool, assetIn);
        if (reserveIn.isZero() || reserveOut.isZero()) {
            throw new InsufficientLiquidityError('ZERO_RESERVES', poolKey);
        }

        return {
            poolKey,
            amountIn,
            amountOut: constantProductOut(amountIn, reserveIn, reserveOut, pool.feeBps),
        };
    }
}

/**
 * The other endpoint of a pool, or undefined when the pool does not touch `assetId`.
 */
function isReserveValue(value: unknown): value is BigNumber.Value {
    return typeof value === 'string' || typeof value === 'number' || BigNumber.isBigNumber(value);
}

/**
 * Field types of a feed reading. Values are checked by `validateReading`.
 */
export function isPoolReading(value: unknown): value is PoolReading {
    if (typeof value !== 'object' || value === null) return false;
    return (
        'venue' in value && typeof value.venue === 'string' &&
        'poolId' in value && typeof value.poolId === 'string' &&
        'assetA' in value && typeof value.assetA === 'string' &&
        'assetB' in value && typeof value.assetB === 'string' &&
        'reserveA' in value && isReserveValue(value.reserveA) &&
        'reserveB' in value && isReserveValue(value.reserveB) &&
        'feeBps' in value && typeof value.feeBps === 'number' &&
        'timestamp' in value && typeof value.timestamp === 'number'
    );
}

export function counterpart(pool: PoolState, assetId: string): string | undefined {
    if (pool.assetA === assetId) return pool.assetB;
    if (pool.assetB === assetId) return pool.assetA;
    return undefined;
}

/**
 * [reserveIn, reserveOut] for a swap entering the pool with `assetIn`.
 */
export function orientReserves(pool: PoolState, assetIn: string): [BigNumber, BigNumber] {
    return pool.assetA === assetIn
        ? [pool.reserveA, pool.reserveB]
        : [pool.reserveB, pool.reserveA];
}

// ═══════════════════════════════════════════════════════════════════════════════
// POOL GRAPH — OWNER OF THE CURRENT GENERATION
// ═══════════════════════════════════════════════════════════════════════════════

export class PoolGraph {
    private readonly registry = new Map<string, Asset>();
    private current: GraphGeneration = EMPTY_GENERATION;
    private readonly config: PoolGraphConfig;
    private readonly now: Clock;

    constructor(config: Partial<PoolGraphConfig> = {}, now: Clock = Date.now) {
        this.config = createGraphConfig(config);
        this.now = now;
    }

    // ───────────────────────────────────────────────────────────────────────────
    // ASSET REGISTRY
    // ───────────────────────────────────────────────────────────────────────────

    /**
     * Register an asset. Registering the same definition twice is a no-op;
     * a conflicting definition for a known id is a configuration error.
     */
    registerAsset(definition: AssetDefinition): Asset {
        const id = assetIdOf(definition.chain, definition.address);
        const existing = this.registry.get(id);

        if (existing) {
            if (existing.symbol !== definition.symbol || existing.decimals !== definition.decimals) {
                throw new ConfigurationError(
                    'asset',
                    `${id} already registered as ${existing.symbol}/${existing.decimals}`
                );
            }
            return existing;
        }

        if (!Number.isInteger(definition.decimals) || definition.decimals < 0) {
            throw new ConfigurationError('asset', `${id} decimals must be a non-negative integer`);
        }

        const asset: Asset = Object.freeze({
            id,
            symbol: definition.symbol,
            chain: definition.chain,
            address: definition.address.toLowerCase(),
            decimals: definition.decimals,
        });
        this.registry.set(id, asset);
        return asset;
    }

    asset(assetId: string): Asset | undefined {
        return this.registry.get(assetId);
    }

    assets(): Asset[] {
        return [...this.registry.values()];
    }

    // ───────────────────────────────────────────────────────────────────────────
    // UPDATE
    // ───────────────────────────────────────────────────────────────────────────

    /**
     * Apply a batch of readings. All-or-nothing for invalid data; stale readings
     * are dropped individually.
     */
    update(batch: readonly unknown[]): UpdateResult {
        const base = this.current;
        const issues: BatchIssue[] = [];
        const seen = new Set<string>();
        const accepted: PoolState[] = [];
        const ignoredStale: StaleDataError[] = [];

        batch.forEach((reading, index) => {
            if (!isPoolReading(reading)) {
                issues.push({ index, poolKey: 'unknown', problem: 'malformed reading' });
                return;
            }
            const key = poolKeyOf(reading.venue, reading.poolId);
            const problem = this.validateReading(reading, base.pools.get(key));

            if (problem) {
                issues.push({ index, poolKey: key, problem });
                return;
            }
            if (seen.has(key)) {
                issues.push({ index, poolKey: key, problem: 'duplicate pool in batch' });
                return;
            }
            seen.add(key);

            const existing = base.pools.get(key);
            if (existing && reading.timestamp < existing.updatedAt) {
                ignoredStale.push(new StaleDataError(key, reading.timestamp, existing.updatedAt));
                return;
            }

            accepted.push(toPoolState(key, reading, existing));
        });

        if (issues.length > 0) {
            const error = new InvalidBatchError(issues);
            logger.warn(`[GRAPH] [REJECT] batch of ${batch.length} rejected, generation stays ${base.generation}: ${error.message}`);
            throw error;
        }

        for (const stale of ignoredStale) {
            logger.warn(`[GRAPH] ${stale.message}`);
        }

        if (accepted.length === 0) {
            return { generation: base.generation, applied: 0, ignoredStale };
        }

        const pools = new Map(base.pools);
        const incidence = new Map(base.incidence);

        for (const pool of accepted) {
            if (!pools.has(pool.key)) {
                incidence.set(pool.assetA, [...(incidence.get(pool.assetA) ?? []), pool.key]);
                incidence.set(pool.assetB, [...(incidence.get(pool.assetB) ?? []), pool.key]);
            }
            pools.set(pool.key, pool);
        }

        this.current = Object.freeze({
            generation: base.generation + 1,
            publishedAt: this.now(),
            pools,
            incidence,
        });

        logger.debug(`[GRAPH] generation ${this.current.generation} published (${accepted.length} pools updated, ${pools.size} known)`);

        return { generation: this.current.generation, applied: accepted.length, ignoredStale };
    }

    private validateReading(reading: PoolReading, existing: PoolState | undefined): string | null {
        if (!reading.venue || !reading.poolId) {
            return 'missing venue or pool id';
        }
        if (!this.registry.has(reading.assetA)) {
            return `unknown asset ${reading.assetA}`;
        }
        if (!this.registry.has(reading.assetB)) {
            return `unknown asset ${reading.assetB}`;
        }
        if (reading.assetA === reading.assetB) {
            return 'pool joins an asset to itself';
        }
        if (!isNonNegativeInteger(toBigNumber(reading.reserveA)) || !isNonNegativeInteger(toBigNumber(reading.reserveB))) {
            return 'reserves must be non-negative integers';
        }
        if (!Number.isInteger(reading.feeBps) || reading.feeBps < 0 || reading.feeBps >= BPS_DENOMINATOR) {
            return `fee ${reading.feeBps}bps out of range`;
        }
        if (!Number.isFinite(reading.timestamp)) {
            return 'missing timestamp';
        }
        if (existing) {
            const samePair =
                (existing.assetA === reading.assetA && existing.assetB === reading.assetB) ||
                (existing.assetA === reading.assetB && existing.assetB === reading.assetA);
            if (!samePair) {
                return `asset pair differs from registered ${existing.assetA}/${existing.assetB}`;
            }
            if (existing.feeBps !== reading.feeBps) {
                return `fee ${reading.feeBps}bps differs from registered ${existing.feeBps}bps`;
            }
        }
        return null;
    }

    // ───────────────────────────────────────────────────────────────────────────
    // READS
    // ───────────────────────────────────────────────────────────────────────────

    get generation(): number {
        return this.current.generation;
    }

    /**
     * Consistent read view over the current generation.
     */
    snapshot(): GraphSnapshot {
        return new GraphSnapshot(this.current, this.config.stalenessWindowMs, this.now());
    }

    quote(assetIn: string, assetOut: string, amountIn: BigNumber.Value, poolKey?: string): QuoteResult {
        return this.snapshot().quote(assetIn, assetOut, amountIn, poolKey);
    }

    priceImpact(assetIn: string, assetOut: string, amountIn: BigNumber.Value, poolKey?: string): BigNumber {
        return this.snapshot().priceImpact(assetIn, assetOut, amountIn, poolKey);
    }

    neighbors(assetId: string): PoolState[] {
        return this.snapshot().neighbors(assetId);
    }

    pool(poolKey: string): PoolState | undefined {
        return this.current.pools.get(poolKey);
    }

    stalePools(): PoolState[] {
        return this.snapshot().stalePools();
    }

    isStale(poolKey: string): boolean {
        const pool = this.current.pools.get(poolKey);
        return pool !== undefined && this.snapshot().isStale(pool);
    }
}

/**
 * Build the new state for one reading, keeping the registered orientation
 * when the feed reports the pair reversed.
 */
function toPoolState(key: string, reading: PoolReading, existing: PoolState | undefined): PoolState {
    const reversed = existing !== undefined && existing.assetA === reading.assetB;
    const reserveA = toBigNumber(reading.reserveA);
    const reserveB = toBigNumber(reading.reserveB);

    return Object.freeze({
        key,
        venue: reading.venue,
        poolId: reading.poolId,
        assetA: reversed ? reading.assetB : reading.assetA,
        assetB: reversed ? reading.assetA : reading.assetB,
        reserveA: reversed ? reserveB : reserveA,
        reserveB: reversed ? reserveA : reserveB,
        feeBps: reading.feeBps,
        updatedAt: reading.timestamp,
    });
}
