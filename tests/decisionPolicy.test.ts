/**
 * Decision Policy Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Test Cases:
 *   1. Profit floor dominates every intelligence signal
 *   2. Regulatory risk dominates bullish sentiment
 *   3. Confirmed bullish needs sentiment AND high confidence
 *   4. Multiplier clamp: ceiling caps, floor degrades to SKIP
 *   5. Verdicts are deterministic and carry their trace
 *   6. Back-testing a candidate policy against recorded entries
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import { ConfigurationError } from '../src/core/errors';
import { NEUTRAL_SNAPSHOT } from '../src/intelligence';
import { OpportunityLedger } from '../src/ledger';
import {
    CONSERVATIVE_POLICY_CONFIG,
    DecisionPolicy,
    backtestPolicy,
    createPolicyConfig,
} from '../src/policy';
import { NOW, makeOpportunity, makeSnapshot } from './fixtures';

const bullish = makeSnapshot({ id: 'snap_bull', sentiment: 0.5, confidence: 0.85, confidenceLabel: 'high_confidence' });
const risky = makeSnapshot({
    id: 'snap_risk',
    sentiment: 0.9,
    confidence: 0.95,
    confidenceLabel: 'high_confidence',
    riskFlags: ['REGULATORY_RISK'],
    regulatoryEvidenceCount: 3,
});

describe('DecisionPolicy', () => {
    const policy = new DecisionPolicy({}, () => NOW);

    // ═══════════════════════════════════════════════════════════════════════════
    // DECISION TABLE
    // ═══════════════════════════════════════════════════════════════════════════

    describe('rule 1: profit floor', () => {
        test('below the floor is SKIP whatever the intelligence says', () => {
            const thin = makeOpportunity({ netProfitRatio: new BigNumber('0.001') });

            for (const snapshot of [bullish, risky, NEUTRAL_SNAPSHOT]) {
                const verdict = policy.evaluate(thin, snapshot);
                expect(verdict.action).toBe('SKIP');
                expect(verdict.multiplier).toBe(0);
                expect(verdict.rule).toBe('profit_floor');
                expect(verdict.reason).toBe('below profit floor');
            }
        });

        test('exactly at the floor is not skipped', () => {
            const edge = makeOpportunity({ netProfitRatio: new BigNumber('0.003') });
            expect(policy.evaluate(edge, NEUTRAL_SNAPSHOT).action).toBe('EXECUTE');
        });
    });

    describe('rule 2: regulatory risk', () => {
        test('risk flag reduces size regardless of sentiment', () => {
            const verdict = policy.evaluate(makeOpportunity(), risky);

            expect(verdict.action).toBe('EXECUTE_REDUCED');
            expect(verdict.multiplier).toBeCloseTo(0.4, 10);
            expect(verdict.rule).toBe('regulatory_risk');
            expect(verdict.reason).toBe('regulatory risk overrides profit');
        });

        test('bearish sentiment with the flag is reduced the same way', () => {
            const verdict = policy.evaluate(makeOpportunity(), { ...risky, sentiment: -0.9, confidenceLabel: 'low_confidence' });
            expect(verdict.action).toBe('EXECUTE_REDUCED');
            expect(verdict.multiplier).toBeCloseTo(0.4, 10);
        });
    });

    describe('rule 3: confirmed bullish', () => {
        test('bullish and high confidence boosts size', () => {
            const verdict = policy.evaluate(makeOpportunity(), bullish);

            expect(verdict.action).toBe('EXECUTE');
            expect(verdict.multiplier).toBe(1.25);
            expect(verdict.rule).toBe('confirmed_bullish');
            expect(verdict.reason).toBe('confirmed bullish signal');
        });

        test('bullish with only medium confidence falls through to neutral', () => {
            const verdict = policy.evaluate(makeOpportunity(), { ...bullish, confidenceLabel: 'medium_confidence' });
            expect(verdict.rule).toBe('neutral');
            expect(verdict.multiplier).toBe(1);
        });

        test('sentiment exactly at the threshold counts as bullish', () => {
            const verdict = policy.evaluate(makeOpportunity(), { ...bullish, sentiment: 0.3 });
            expect(verdict.rule).toBe('confirmed_bullish');
        });
    });

    describe('rule 4: neutral', () => {
        test('the default snapshot executes at full size', () => {
            const verdict = policy.evaluate(makeOpportunity(), NEUTRAL_SNAPSHOT);

            expect(verdict.action).toBe('EXECUTE');
            expect(verdict.multiplier).toBe(1);
            expect(verdict.rule).toBe('neutral');
            expect(verdict.reason).toBe('neutral intelligence, profit-driven execution');
        });
    });

    // ═══════════════════════════════════════════════════════════════════════════
    // CLAMP
    // ═══════════════════════════════════════════════════════════════════════════

    describe('multiplier clamp', () => {
        test('boost is capped at maxMultiplier', () => {
            const generous = new DecisionPolicy({ boostFactor: 1 }, () => NOW);
            const verdict = generous.evaluate(makeOpportunity(), bullish);

            expect(verdict.multiplier).toBe(1.5);
            expect(verdict.trace.rawMultiplier).toBe(2);
        });

        test('a reduction below minMultiplier degrades to SKIP', () => {
            const harsh = new DecisionPolicy({ reductionFactor: 0.9 }, () => NOW);
            const verdict = harsh.evaluate(makeOpportunity(), risky);

            expect(verdict.action).toBe('SKIP');
            expect(verdict.multiplier).toBe(0);
            expect(verdict.rule).toBe('multiplier_floor');
            expect(verdict.reason).toBe('multiplier below floor');
            expect(verdict.trace.rawMultiplier).toBeCloseTo(0.1, 10);
        });
    });

    // ═══════════════════════════════════════════════════════════════════════════
    // VERDICT SHAPE
    // ═══════════════════════════════════════════════════════════════════════════

    describe('verdict', () => {
        test('links the opportunity and snapshot and records the inputs', () => {
            const verdict = policy.evaluate(makeOpportunity(), bullish);

            expect(verdict.opportunityId).toBe('opp_test');
            expect(verdict.snapshotId).toBe('snap_bull');
            expect(verdict.decidedAt).toBe(NOW);
            expect(verdict.trace).toEqual({
                netProfitRatio: '0.063',
                sentiment: 0.5,
                confidence: 0.85,
                confidenceLabel: 'high_confidence',
                riskFlags: [],
                rawMultiplier: 1.25,
            });
            expect(Object.isFrozen(verdict)).toBe(true);
        });

        test('same inputs give the same verdict', () => {
            const opportunity = makeOpportunity();
            expect(policy.evaluate(opportunity, risky)).toEqual(policy.evaluate(opportunity, risky));
        });
    });

    describe('configuration', () => {
        test('conservative preset boosts less', () => {
            const conservative = new DecisionPolicy(CONSERVATIVE_POLICY_CONFIG, () => NOW);
            expect(conservative.evaluate(makeOpportunity(), bullish).multiplier).toBe(1.1);
        });

        test.each([
            [{ reductionFactor: 1 }],
            [{ boostFactor: -0.1 }],
            [{ minMultiplier: 0 }],
            [{ minMultiplier: 1, maxMultiplier: 0.5 }],
            [{ bullishThreshold: 2 }],
            [{ minProfitRatio: Number.NaN }],
        ])('%p is rejected', (overrides) => {
            expect(() => createPolicyConfig(overrides)).toThrow(ConfigurationError);
        });
    });
});

// ═══════════════════════════════════════════════════════════════════════════════
// BACK-TEST
// ═══════════════════════════════════════════════════════════════════════════════

describe('backtestPolicy', () => {
    test('reports verdicts that change under a candidate policy', () => {
        const live = new DecisionPolicy({}, () => NOW);
        const ledger = new OpportunityLedger({ now: () => NOW });

        const cases = [
            { opportunity: makeOpportunity({ id: 'opp_bull' }), snapshot: bullish },
            { opportunity: makeOpportunity({ id: 'opp_flat' }), snapshot: NEUTRAL_SNAPSHOT },
            { opportunity: makeOpportunity({ id: 'opp_thin', netProfitRatio: new BigNumber('0.004') }), snapshot: NEUTRAL_SNAPSHOT },
        ];
        const entries = cases.map(c => ledger.record({ ...c, verdict: live.evaluate(c.opportunity, c.snapshot) }));

        const report = backtestPolicy(ledger.since(0), new DecisionPolicy(CONSERVATIVE_POLICY_CONFIG, () => NOW));

        expect(report.evaluated).toBe(3);
        expect(report.recordedActions).toEqual({ EXECUTE: 3, EXECUTE_REDUCED: 0, SKIP: 0 });
        expect(report.replayedActions).toEqual({ EXECUTE: 2, EXECUTE_REDUCED: 0, SKIP: 1 });
        expect(report.changes.map(c => c.entryId)).toEqual([entries[0].id, entries[2].id]);
        expect(report.changes[1].replayed.rule).toBe('profit_floor');
        expect(report.recordedExposure).toBeCloseTo(3.25, 10);
        expect(report.replayedExposure).toBeCloseTo(2.1, 10);
        expect(ledger.size).toBe(3);
    });
});
