/**
 * Simulation Executor
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Dry-run collaborator used when no signer is configured. Nothing leaves the
 * process; each submission reports the profit it would have captured:
 *
 *   estimatedProfit = notional · multiplier · netProfitRatio   (start-asset units)
 *
 * and accumulates it per start asset.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import logger from '../utils/logger';
import { FixedPoint } from '../utils/math';
import { Verdict } from '../policy';
import { Opportunity } from '../scanner';
import { ExecutionCollaborator, ExecutionOutcome } from './types';

export class SimulationExecutor implements ExecutionCollaborator {
    readonly mode = 'simulation' as const;
    private readonly profitByAsset = new Map<string, BigNumber>();
    private submissions = 0;

    async submit(verdict: Verdict, opportunity: Opportunity): Promise<ExecutionOutcome> {
        if (verdict.action === 'SKIP') {
            return { status: 'failed', detail: 'SKIP verdicts are not executable', estimatedProfit: null };
        }

        const estimated = new FixedPoint(opportunity.notionalIn)
            .times(verdict.multiplier)
            .times(opportunity.netProfitRatio)
            .decimalPlaces(0, BigNumber.ROUND_DOWN);

        const running = this.profitByAsset.get(opportunity.startAsset) ?? new FixedPoint(0);
        this.profitByAsset.set(opportunity.startAsset, running.plus(estimated));
        this.submissions++;

        logger.info(
            `[EXEC] SIMULATED ${verdict.action} x${verdict.multiplier} ${opportunity.assetPath.join('→')} ` +
            `est=${estimated.toFixed()} ${opportunity.startAsset}`
        );

        return {
            status: 'simulated',
            detail: `would execute ${opportunity.hops.length}-hop ${opportunity.kind} at x${verdict.multiplier}`,
            estimatedProfit: estimated.toFixed(),
        };
    }

    simulatedProfit(assetId: string): BigNumber {
        return this.profitByAsset.get(assetId) ?? new FixedPoint(0);
    }

    simulatedProfitByAsset(): Record<string, string> {
        const result: Record<string, string> = {};
        for (const [asset, profit] of this.profitByAsset) {
            result[asset] = profit.toFixed();
        }
        return result;
    }

    get submissionCount(): number {
        return this.submissions;
    }
}
