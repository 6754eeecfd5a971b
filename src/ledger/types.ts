/**
 * Opportunity Ledger - Type Definitions
 */

import { IntelligenceSnapshot } from '../intelligence';
import { Verdict } from '../policy/types';
import { Opportunity } from '../scanner';

export interface LedgerEntryInput {
    opportunity: Opportunity;
    snapshot: IntelligenceSnapshot;
    verdict: Verdict;
    /** Defaults to the verdict's decision time */
    timestamp?: number;
}

/**
 * One evaluated opportunity. Append-only, never mutated or deleted.
 */
export interface LedgerEntry {
    readonly id: string;
    readonly timestamp: number;
    readonly opportunity: Opportunity;
    readonly snapshot: IntelligenceSnapshot;
    readonly verdict: Verdict;
}

export type OutcomeStatus = 'simulated' | 'submitted' | 'failed' | 'not_submitted';

/**
 * What happened after the verdict. Stored beside entries so entries stay immutable.
 */
export interface OutcomeRecord {
    readonly entryId: string;
    readonly status: OutcomeStatus;
    readonly detail: string;
    /** Start-asset units, as a decimal string */
    readonly estimatedProfit: string | null;
    readonly recordedAt: number;
}

/**
 * Durable mirror for ledger appends.
 */
export interface LedgerSink {
    writeEntry(entry: LedgerEntry): Promise<void>;
    writeOutcome(outcome: OutcomeRecord): Promise<void>;
}
