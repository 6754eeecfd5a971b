/**
 * Execution Collaborator Contract
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * The decision core never signs or broadcasts. An execution collaborator takes a
 * non-SKIP verdict plus its opportunity and owns on-chain submission.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { Verdict } from '../policy';
import { Opportunity } from '../scanner';
import { OutcomeStatus } from '../ledger';

export interface ExecutionOutcome {
    status: Exclude<OutcomeStatus, 'not_submitted'>;
    detail: string;
    /** Start-asset units, decimal string */
    estimatedProfit: string | null;
}

export interface ExecutionCollaborator {
    readonly mode: 'simulation' | 'live';
    submit(verdict: Verdict, opportunity: Opportunity): Promise<ExecutionOutcome>;
}
