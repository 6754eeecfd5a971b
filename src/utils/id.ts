/**
 * ID Generation Utilities
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Every opportunity, snapshot and ledger entry gets a fresh id. IDs are never
 * derived from content, so two identical cycles found on different ticks stay
 * distinguishable in the ledger.
 *
 * FORMAT: {prefix}_{uuid-v4}
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { v4 as uuidv4 } from 'uuid';

export type IdPrefix = 'opp' | 'snap' | 'entry';

export function generateId(prefix: IdPrefix): string {
    return `${prefix}_${uuidv4()}`;
}

export function generateOpportunityId(): string {
    return generateId('opp');
}

export function generateSnapshotId(): string {
    return generateId('snap');
}

export function generateEntryId(): string {
    return generateId('entry');
}
