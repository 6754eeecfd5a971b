/**
 * Opportunity Ledger
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * PURPOSE: Append-only record of every evaluated opportunity, the snapshot it
 * was judged against, its verdict and, later, its outcome. Used for audit and
 * for replaying policy changes against history. No analysis happens here.
 *
 * ORDERING:
 * Entries are kept ascending by timestamp; equal timestamps keep append order.
 * `recent` and `since` return lazy iterables. Each iteration starts over and
 * sees the entries present when it started.
 *
 * SINK:
 * An optional LedgerSink mirrors appends. Sink writes are serialized; failures
 * are logged and never reach the caller.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from '../utils/logger';
import { generateEntryId } from '../utils/id';
import { Clock } from '../graph';
import { LedgerEntry, LedgerEntryInput, LedgerSink, OutcomeRecord } from './types';

export interface LedgerOptions {
    sink?: LedgerSink;
    now?: Clock;
}

export class OpportunityLedger {
    private entries: LedgerEntry[] = [];
    private readonly byId = new Map<string, LedgerEntry>();
    private readonly outcomes = new Map<string, OutcomeRecord[]>();
    private readonly sink: LedgerSink | undefined;
    private readonly now: Clock;
    private pending: Promise<void> = Promise.resolve();

    constructor(options: LedgerOptions = {}) {
        this.sink = options.sink;
        this.now = options.now ?? Date.now;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // APPEND
    // ═══════════════════════════════════════════════════════════════════════════

    record(input: LedgerEntryInput): LedgerEntry {
        const entry: LedgerEntry = Object.freeze({
            id: generateEntryId(),
            timestamp: input.timestamp ?? input.verdict.decidedAt,
            opportunity: input.opportunity,
            snapshot: input.snapshot,
            verdict: input.verdict,
        });

        const last = this.entries[this.entries.length - 1];
        if (!last || last.timestamp <= entry.timestamp) {
            this.entries.push(entry);
        } else {
            // Late arrival: publish a new array so running iterations keep theirs
            const at = upperBound(this.entries, entry.timestamp);
            this.entries = [...this.entries.slice(0, at), entry, ...this.entries.slice(at)];
        }
        this.byId.set(entry.id, entry);

        const sink = this.sink;
        if (sink) {
            this.enqueue(() => sink.writeEntry(entry), `entry ${entry.id}`);
        }

        return entry;
    }

    recordOutcome(outcome: Omit<OutcomeRecord, 'recordedAt'> & { recordedAt?: number }): OutcomeRecord | null {
        if (!this.byId.has(outcome.entryId)) {
            logger.warn(`[LEDGER] outcome for unknown entry ${outcome.entryId} ignored`);
            return null;
        }

        const record: OutcomeRecord = Object.freeze({
            entryId: outcome.entryId,
            status: outcome.status,
            detail: outcome.detail,
            estimatedProfit: outcome.estimatedProfit,
            recordedAt: outcome.recordedAt ?? this.now(),
        });

        const history = this.outcomes.get(record.entryId) ?? [];
        this.outcomes.set(record.entryId, [...history, record]);

        const sink = this.sink;
        if (sink) {
            this.enqueue(() => sink.writeOutcome(record), `outcome ${record.entryId}`);
        }

        return record;
    }

    /**
     * Wait for every queued sink write.
     */
    async flush(): Promise<void> {
        await this.pending;
    }

    private enqueue(write: () => Promise<void>, label: string): void {
        this.pending = this.pending
            .then(write)
            .catch((err: unknown) => {
                const reason = err instanceof Error ? err.message : String(err);
                logger.warn(`[LEDGER] sink write failed for ${label}: ${reason}`);
            });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // READS
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * The last `n` entries, oldest first.
     */
    recent(n: number): Iterable<LedgerEntry> {
        const ledger = this;
        return {
            *[Symbol.iterator]() {
                const entries = ledger.entries;
                const end = entries.length;
                const start = Math.max(0, end - Math.max(0, Math.floor(n)));
                for (let i = start; i < end; i++) {
                    yield entries[i];
                }
            },
        };
    }

    /**
     * Entries with timestamp >= `timestamp`, oldest first.
     */
    since(timestamp: number): Iterable<LedgerEntry> {
        const ledger = this;
        return {
            *[Symbol.iterator]() {
                const entries = ledger.entries;
                const end = entries.length;
                for (let i = lowerBound(entries, timestamp); i < end; i++) {
                    yield entries[i];
                }
            },
        };
    }

    entry(entryId: string): LedgerEntry | undefined {
        return this.byId.get(entryId);
    }

    /**
     * Latest outcome recorded for an entry.
     */
    outcomeFor(entryId: string): OutcomeRecord | undefined {
        const history = this.outcomes.get(entryId);
        return history ? history[history.length - 1] : undefined;
    }

    get size(): number {
        return this.entries.length;
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// BINARY SEARCH
// ═══════════════════════════════════════════════════════════════════════════════

/** First index with timestamp >= ts */
function lowerBound(entries: readonly LedgerEntry[], ts: number): number {
    let lo = 0;
    let hi = entries.length;
    while (lo < hi) {
        const mid = (lo + hi) >>> 1;
        if (entries[mid].timestamp < ts) lo = mid + 1;
        else hi = mid;
    }
    return lo;
}

/** First index with timestamp > ts */
function upperBound(entries: readonly LedgerEntry[], ts: number): number {
    let lo = 0;
    let hi = entries.length;
    while (lo < hi) {
        const mid = (lo + hi) >>> 1;
        if (entries[mid].timestamp <= ts) lo = mid + 1;
        else hi = mid;
    }
    return lo;
}
