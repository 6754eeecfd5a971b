/**
 * Pool Graph Module
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Assets as nodes, constant-product pools as edges, published as immutable
 * generations. The pool feed writes through `update`; the scanner reads one
 * `snapshot()` per tick.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type {
    Asset,
    AssetDefinition,
    PoolReading,
    PoolState,
    GraphGeneration,
    UpdateResult,
    QuoteResult,
    PoolGraphConfig,
} from './types';

export { DEFAULT_GRAPH_CONFIG, createGraphConfig } from './config';

export {
    PoolGraph,
    GraphSnapshot,
    assetIdOf,
    poolKeyOf,
    counterpart,
    orientReserves,
    isPoolReading,
} from './poolGraph';

export type { Clock } from './poolGraph';
