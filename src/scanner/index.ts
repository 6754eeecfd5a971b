/**
 * Cycle Scanner Module
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Finds triangular / multi-hop cycles and cross-venue round trips over a
 * pool-graph snapshot, priced net of fees and settlement cost.
 *
 * USAGE:
 *   for await (const opp of scanner.scan({ maxHops: 3, minProfitRatio: 0.003 })) {
 *       const verdict = policy.evaluate(opp, aggregator.currentSnapshot());
 *   }
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type {
    Opportunity,
    OpportunityHop,
    OpportunityKind,
    ScanOptions,
    ScannerConfig,
} from './types';

export { DEFAULT_SCANNER_CONFIG, createScannerConfig } from './config';

export { CycleScanner, cycleKey, compareOpportunities } from './cycleScanner';
