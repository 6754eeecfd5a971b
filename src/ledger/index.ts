/**
 * Opportunity Ledger Module
 */

export type {
    LedgerEntry,
    LedgerEntryInput,
    LedgerSink,
    OutcomeRecord,
    OutcomeStatus,
} from './types';

export { OpportunityLedger } from './opportunityLedger';
export type { LedgerOptions } from './opportunityLedger';

export { SupabaseLedgerSink, toLedgerRow, toOutcomeRow } from './supabaseSink';
export type { LedgerRow, OutcomeRow } from './supabaseSink';
