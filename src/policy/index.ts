/**
 * Decision Policy Module
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * INTEGRATION:
 *   const verdict = policy.evaluate(opportunity, aggregator.currentSnapshot());
 *   if (verdict.action !== 'SKIP') {
 *       size = baseSize * verdict.multiplier;
 *   }
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type {
    Verdict,
    VerdictAction,
    VerdictTrace,
    DecisionRule,
    DecisionPolicyConfig,
} from './types';

export {
    DEFAULT_POLICY_CONFIG,
    CONSERVATIVE_POLICY_CONFIG,
    createPolicyConfig,
    validatePolicyConfig,
} from './config';

export { DecisionPolicy, REASONS } from './decisionPolicy';

export { backtestPolicy } from './backtest';
export type { BacktestReport, VerdictChange } from './backtest';
