/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * SCAN LOOP — RUNTIME ORCHESTRATOR
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Two independent periodic tasks:
 * - scan tick:         graph snapshot → cycle scan → verdict → ledger → executor
 * - intelligence tick: aggregator.refresh()
 *
 * They share nothing but `aggregator.currentSnapshot()`, which never blocks.
 *
 * RULES:
 * 1. All state is instance state
 * 2. A scan tick reads exactly one graph generation
 * 3. A tick over budget is abandoned: nothing from it is recorded
 * 4. Feed data-quality problems are logged and counted, never thrown
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import logger from '../utils/logger';
import { PeriodicTask } from '../utils/scheduler';
import { InvalidBatchError, ScanTimeoutError } from '../core/errors';
import { EngineConfig } from '../config/engineConfig';
import { Clock, PoolGraph, UpdateResult } from '../graph';
import { CycleScanner, Opportunity } from '../scanner';
import { IntelligenceAggregator, IntelligenceSnapshot } from '../intelligence';
import { DecisionPolicy } from '../policy';
import { LedgerEntry, OpportunityLedger } from '../ledger';
import { ExecutionCollaborator, ExecutionOutcome } from '../execution';

export type ScanLoopConfig = Pick<
    EngineConfig,
    'scanIntervalMs' | 'intelligenceIntervalMs' | 'scanTimeBudgetMs' | 'statsEveryTicks' | 'maxHops' | 'minProfitRatio'
>;

export interface ScanLoopDeps {
    graph: PoolGraph;
    scanner: CycleScanner;
    aggregator: IntelligenceAggregator;
    policy: DecisionPolicy;
    ledger: OpportunityLedger;
    executor: ExecutionCollaborator;
    config: ScanLoopConfig;
    now?: Clock;
}

export type IngestResult =
    | { ok: true; result: UpdateResult }
    | { ok: false; error: InvalidBatchError };

export interface ScanTickResult {
    generation: number;
    timedOut: boolean;
    /** Ledger entries written by this tick, empty when timed out */
    entries: LedgerEntry[];
    durationMs: number;
}

export interface ScanLoopStats {
    scanTicks: number;
    intelligenceTicks: number;
    opportunitiesFound: number;
    executed: number;
    reduced: number;
    skipped: number;
    executionFailures: number;
    timeouts: number;
    rejectedBatches: number;
    staleReadings: number;
    lastScanAt: number | null;
    lastScanDurationMs: number | null;
    stalePools: number;
    graphGeneration: number;
    intelligenceSequence: number;
    ledgerSize: number;
    /** start asset → Σ estimated profit reported by the executor */
    estimatedProfitByAsset: Record<string, string>;
}

interface Counters {
    scanTicks: number;
    intelligenceTicks: number;
    opportunitiesFound: number;
    executed: number;
    reduced: number;
    skipped: number;
    executionFailures: number;
    timeouts: number;
    rejectedBatches: number;
    staleReadings: number;
}

const STOP_WAIT_MS = 60_000;
const STOP_POLL_MS = 50;

export class ScanLoop {
    // ═══════════════════════════════════════════════════════════════════════════
    // INSTANCE STATE
    // ═══════════════════════════════════════════════════════════════════════════

    private readonly graph: PoolGraph;
    private readonly scanner: CycleScanner;
    private readonly aggregator: IntelligenceAggregator;
    private readonly policy: DecisionPolicy;
    private readonly ledger: OpportunityLedger;
    private readonly executor: ExecutionCollaborator;
    private readonly config: ScanLoopConfig;
    private readonly now: Clock;

    private readonly scanTask: PeriodicTask;
    private readonly intelligenceTask: PeriodicTask;

    private readonly counters: Counters = {
        scanTicks: 0,
        intelligenceTicks: 0,
        opportunitiesFound: 0,
        executed: 0,
        reduced: 0,
        skipped: 0,
        executionFailures: 0,
        timeouts: 0,
        rejectedBatches: 0,
        staleReadings: 0,
    };
    private readonly profitByAsset = new Map<string, BigNumber>();
    private lastScanAt: number | null = null;
    private lastScanDurationMs: number | null = null;

    constructor(deps: ScanLoopDeps) {
        this.graph = deps.graph;
        this.scanner = deps.scanner;
        this.aggregator = deps.aggregator;
        this.policy = deps.policy;
        this.ledger = deps.ledger;
        this.executor = deps.executor;
        this.config = deps.config;
        this.now = deps.now ?? Date.now;

        this.scanTask = new PeriodicTask('scan', this.config.scanIntervalMs, async () => {
            await this.runScanTick();
        });
        this.intelligenceTask = new PeriodicTask('intelligence', this.config.intelligenceIntervalMs, async () => {
            this.runIntelligenceTick();
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // FEED BOUNDARY
    // ═══════════════════════════════════════════════════════════════════════════

    ingestPoolBatch(batch: readonly unknown[]): IngestResult {
        try {
            const result = this.graph.update(batch);
            this.counters.staleReadings += result.ignoredStale.length;
            return { ok: true, result };
        } catch (err) {
            if (err instanceof InvalidBatchError) {
                this.counters.rejectedBatches++;
                logger.warn(`[LOOP] pool batch of ${batch.length} rejected (${err.issues.length} issues)`);
                return { ok: false, error: err };
            }
            throw err;
        }
    }

    ingestNews(items: readonly unknown[]): number {
        return this.aggregator.ingestNews(items);
    }

    ingestMarkets(readings: readonly unknown[]): number {
        return this.aggregator.ingestMarkets(readings);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // TICKS
    // ═══════════════════════════════════════════════════════════════════════════

    async runScanTick(): Promise<ScanTickResult> {
        const startedAt = this.now();
        const view = this.graph.snapshot();
        this.counters.scanTicks++;

        let opportunities: Opportunity[];
        try {
            opportunities = await this.scanner.collect(
                {
                    maxHops: this.config.maxHops,
                    minProfitRatio: this.config.minProfitRatio,
                    deadline: startedAt + this.config.scanTimeBudgetMs,
                },
                view
            );
        } catch (err) {
            if (!(err instanceof ScanTimeoutError)) throw err;
            this.counters.timeouts++;
            logger.warn(`[LOOP] [TIMEOUT] generation ${view.generation}: ${err.message}`);
            return this.finishTick(view.generation, startedAt, true, []);
        }

        this.counters.opportunitiesFound += opportunities.length;

        const entries: LedgerEntry[] = [];
        for (const opportunity of opportunities) {
            entries.push(await this.handle(opportunity, this.aggregator.currentSnapshot()));
        }

        return this.finishTick(view.generation, startedAt, false, entries);
    }

    runIntelligenceTick(): IntelligenceSnapshot {
        this.counters.intelligenceTicks++;
        return this.aggregator.refresh();
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // LIFECYCLE
    // ═══════════════════════════════════════════════════════════════════════════

    start(): void {
        if (this.scanTask.active) {
            logger.warn('[LOOP] Already running, ignoring start()');
            return;
        }

        this.intelligenceTask.start();
        this.scanTask.start();

        logger.info(
            `[LOOP] started | scan every ${this.config.scanIntervalMs}ms (budget ${this.config.scanTimeBudgetMs}ms)` +
            ` | intelligence every ${this.config.intelligenceIntervalMs}ms | executor=${this.executor.mode}`
        );
    }

    /**
     * Stop both cadences, wait for in-flight ticks, then drain the ledger sink.
     */
    async stop(): Promise<void> {
        this.scanTask.stop();
        this.intelligenceTask.stop();

        const startWait = this.now();
        while ((this.scanTask.running || this.intelligenceTask.running) && this.now() - startWait < STOP_WAIT_MS) {
            await new Promise(resolve => setTimeout(resolve, STOP_POLL_MS));
        }
        if (this.scanTask.running) {
            logger.warn('[LOOP] scan tick still running after stop timeout');
        }

        await this.ledger.flush();
        this.logStats();
        logger.info('[LOOP] stopped');
    }

    get isRunning(): boolean {
        return this.scanTask.active;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // STATS
    // ═══════════════════════════════════════════════════════════════════════════

    stats(): ScanLoopStats {
        const estimatedProfitByAsset: Record<string, string> = {};
        for (const [asset, profit] of this.profitByAsset) {
            estimatedProfitByAsset[asset] = profit.toFixed();
        }

        return {
            ...this.counters,
            lastScanAt: this.lastScanAt,
            lastScanDurationMs: this.lastScanDurationMs,
            stalePools: this.graph.stalePools().length,
            graphGeneration: this.graph.generation,
            intelligenceSequence: this.aggregator.currentSnapshot().sequence,
            ledgerSize: this.ledger.size,
            estimatedProfitByAsset,
        };
    }

    logStats(): void {
        const s = this.stats();
        const profit = Object.entries(s.estimatedProfitByAsset)
            .map(([asset, amount]) => `${asset}=${amount}`)
            .join(', ');

        logger.info('═══════════════════════════════════════════════════════════════════');
        logger.info(`[LOOP] STATS after ${s.scanTicks} scans / ${s.intelligenceTicks} intelligence refreshes`);
        logger.info(`   Opportunities: ${s.opportunitiesFound} | executed=${s.executed} reduced=${s.reduced} skipped=${s.skipped}`);
        logger.info(`   Failures: execution=${s.executionFailures} timeouts=${s.timeouts} rejectedBatches=${s.rejectedBatches} staleReadings=${s.staleReadings}`);
        logger.info(`   Graph: generation ${s.graphGeneration}, ${s.stalePools} stale pools | ledger ${s.ledgerSize} entries`);
        logger.info(`   Estimated profit: ${profit || 'none'}`);
        logger.info('═══════════════════════════════════════════════════════════════════');
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PRIVATE
    // ═══════════════════════════════════════════════════════════════════════════

    private async handle(opportunity: Opportunity, snapshot: IntelligenceSnapshot): Promise<LedgerEntry> {
        const verdict = this.policy.evaluate(opportunity, snapshot);
        const entry = this.ledger.record({ opportunity, snapshot, verdict });

        if (verdict.action === 'SKIP') {
            this.counters.skipped++;
            this.ledger.recordOutcome({
                entryId: entry.id,
                status: 'not_submitted',
                detail: verdict.reason,
                estimatedProfit: null,
            });
            return entry;
        }

        if (verdict.action === 'EXECUTE_REDUCED') this.counters.reduced++;
        else this.counters.executed++;

        let outcome: ExecutionOutcome;
        try {
            outcome = await this.executor.submit(verdict, opportunity);
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            logger.error(`[LOOP] executor failed on ${opportunity.id}: ${reason}`);
            outcome = { status: 'failed', detail: reason, estimatedProfit: null };
        }

        if (outcome.status === 'failed') {
            this.counters.executionFailures++;
        } else if (outcome.estimatedProfit !== null) {
            const running = this.profitByAsset.get(opportunity.startAsset) ?? new BigNumber(0);
            this.profitByAsset.set(opportunity.startAsset, running.plus(outcome.estimatedProfit));
        }

        this.ledger.recordOutcome({ entryId: entry.id, ...outcome });
        return entry;
    }

    private finishTick(generation: number, startedAt: number, timedOut: boolean, entries: LedgerEntry[]): ScanTickResult {
        const durationMs = this.now() - startedAt;
        this.lastScanAt = startedAt;
        this.lastScanDurationMs = durationMs;

        if (this.counters.scanTicks % this.config.statsEveryTicks === 0) {
            this.logStats();
        }

        return { generation, timedOut, entries, durationMs };
    }
}
