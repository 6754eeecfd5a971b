/**
 * Policy Back-Testing
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Replays recorded (opportunity, snapshot) pairs through a candidate policy and
 * reports how its verdicts differ from the ones on record. Pure; the ledger
 * stays untouched.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { LedgerEntry } from '../ledger/types';
import { DecisionPolicy } from './decisionPolicy';
import { Verdict, VerdictAction } from './types';

export interface VerdictChange {
    entryId: string;
    recorded: Verdict;
    replayed: Verdict;
}

export interface BacktestReport {
    evaluated: number;
    recordedActions: Record<VerdictAction, number>;
    replayedActions: Record<VerdictAction, number>;
    /** Entries whose action or multiplier differs under the candidate policy */
    changes: VerdictChange[];
    /** Σ multiplier over recorded / replayed verdicts */
    recordedExposure: number;
    replayedExposure: number;
}

const emptyCounts = (): Record<VerdictAction, number> => ({
    EXECUTE: 0,
    EXECUTE_REDUCED: 0,
    SKIP: 0,
});

export function backtestPolicy(entries: Iterable<LedgerEntry>, policy: DecisionPolicy): BacktestReport {
    const report: BacktestReport = {
        evaluated: 0,
        recordedActions: emptyCounts(),
        replayedActions: emptyCounts(),
        changes: [],
        recordedExposure: 0,
        replayedExposure: 0,
    };

    for (const entry of entries) {
        const replayed = policy.evaluate(entry.opportunity, entry.snapshot);
        const recorded = entry.verdict;

        report.evaluated++;
        report.recordedActions[recorded.action]++;
        report.replayedActions[replayed.action]++;
        report.recordedExposure += recorded.multiplier;
        report.replayedExposure += replayed.multiplier;

        if (recorded.action !== replayed.action || recorded.multiplier !== replayed.multiplier) {
            report.changes.push({ entryId: entry.id, recorded, replayed });
        }
    }

    return report;
}
