/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * ENGINE CONFIGURATION — SINGLE SOURCE OF TRUTH
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Every tunable is read from the environment (`.env` via dotenv in start.ts)
 * and validated once at startup. An invalid value throws ConfigurationError;
 * start.ts treats that as fatal. Unset values fall back to the defaults below.
 *
 * Usage:
 *   import { loadEngineConfig } from './config/engineConfig';
 *   const config = loadEngineConfig();          // process.env
 *   const config = loadEngineConfig({ ... });   // explicit env, tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import BigNumber from 'bignumber.js';
import { ConfigurationError } from '../core/errors';
import { DEFAULT_GRAPH_CONFIG } from '../graph/config';
import { DEFAULT_INTELLIGENCE_CONFIG, IntelligenceConfig, validateIntelligenceConfig } from '../intelligence';
import { DEFAULT_POLICY_CONFIG, DecisionPolicyConfig, validatePolicyConfig } from '../policy';
import { DEFAULT_SCANNER_CONFIG } from '../scanner';

export interface EngineConfig {
    // Cadence
    scanIntervalMs: number;
    intelligenceIntervalMs: number;
    scanTimeBudgetMs: number;
    statsEveryTicks: number;

    // Cycle search
    maxHops: number;
    minProfitRatio: number;
    baseAssets: string[];
    defaultProbeAmount: string;
    settlementCostPerHop: string;
    stalenessWindowMs: number;

    intelligence: IntelligenceConfig;
    policy: DecisionPolicyConfig;

    // Operator surface
    dashboardPort: number;
    assetsFile: string;
}

type Env = Record<string, string | undefined>;

// ═══════════════════════════════════════════════════════════════════════════════
// PARSERS
// ═══════════════════════════════════════════════════════════════════════════════

interface NumberRule {
    integer?: boolean;
    min?: number;
    max?: number;
}

function readNumber(env: Env, key: string, fallback: number, rule: NumberRule = {}): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }

    const value = Number(raw.trim());
    if (!Number.isFinite(value)) {
        throw new ConfigurationError(key, `not a number: "${raw}"`);
    }
    if (rule.integer && !Number.isInteger(value)) {
        throw new ConfigurationError(key, `must be an integer, got ${value}`);
    }
    if (rule.min !== undefined && value < rule.min) {
        throw new ConfigurationError(key, `must be >= ${rule.min}, got ${value}`);
    }
    if (rule.max !== undefined && value > rule.max) {
        throw new ConfigurationError(key, `must be <= ${rule.max}, got ${value}`);
    }
    return value;
}

function readAmount(env: Env, key: string, fallback: BigNumber.Value): string {
    const raw = env[key];
    const value = new BigNumber(raw === undefined || raw.trim() === '' ? fallback : raw.trim());
    if (!value.isFinite() || value.isNegative()) {
        throw new ConfigurationError(key, `must be a non-negative amount, got "${raw}"`);
    }
    return value.toFixed();
}

function readList(env: Env, key: string, fallback: string[]): string[] {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    return raw.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

// ═══════════════════════════════════════════════════════════════════════════════
// LOADER
// ═══════════════════════════════════════════════════════════════════════════════

export function loadEngineConfig(env: Env = process.env): EngineConfig {
    const intelligence: IntelligenceConfig = {
        windowMs: readNumber(env, 'NEWS_WINDOW_MS', DEFAULT_INTELLIGENCE_CONFIG.windowMs, { min: 1 }),
        confidenceThresholds: {
            low: readNumber(env, 'LOW_CONFIDENCE_THRESHOLD', DEFAULT_INTELLIGENCE_CONFIG.confidenceThresholds.low),
            high: readNumber(env, 'HIGH_CONFIDENCE_THRESHOLD', DEFAULT_INTELLIGENCE_CONFIG.confidenceThresholds.high),
        },
        riskEvidenceThreshold: readNumber(
            env,
            'RISK_EVIDENCE_THRESHOLD',
            DEFAULT_INTELLIGENCE_CONFIG.riskEvidenceThreshold,
            { integer: true, min: 0 }
        ),
        relevantTags: readList(env, 'RELEVANT_TAGS', DEFAULT_INTELLIGENCE_CONFIG.relevantTags),
    };
    validateIntelligenceConfig(intelligence);

    const minProfitRatio = readNumber(env, 'MIN_PROFIT_RATIO', DEFAULT_POLICY_CONFIG.minProfitRatio);

    const policy: DecisionPolicyConfig = {
        minProfitRatio,
        reductionFactor: readNumber(env, 'REDUCTION_FACTOR', DEFAULT_POLICY_CONFIG.reductionFactor),
        bullishThreshold: readNumber(env, 'BULLISH_THRESHOLD', DEFAULT_POLICY_CONFIG.bullishThreshold),
        boostFactor: readNumber(env, 'BOOST_FACTOR', DEFAULT_POLICY_CONFIG.boostFactor),
        minMultiplier: readNumber(env, 'MIN_MULTIPLIER', DEFAULT_POLICY_CONFIG.minMultiplier),
        maxMultiplier: readNumber(env, 'MAX_MULTIPLIER', DEFAULT_POLICY_CONFIG.maxMultiplier),
    };
    validatePolicyConfig(policy);

    return {
        scanIntervalMs: readNumber(env, 'SCAN_INTERVAL_MS', 10_000, { integer: true, min: 1 }),
        intelligenceIntervalMs: readNumber(env, 'INTELLIGENCE_INTERVAL_MS', 60_000, { integer: true, min: 1 }),
        scanTimeBudgetMs: readNumber(env, 'SCAN_TIME_BUDGET_MS', 5_000, { integer: true, min: 1 }),
        statsEveryTicks: readNumber(env, 'STATS_EVERY_TICKS', 10, { integer: true, min: 1 }),

        maxHops: readNumber(env, 'MAX_HOPS', 3, { integer: true, min: 2, max: 6 }),
        minProfitRatio,
        baseAssets: readList(env, 'BASE_ASSETS', DEFAULT_SCANNER_CONFIG.baseAssets),
        defaultProbeAmount: readAmount(env, 'DEFAULT_PROBE_AMOUNT', DEFAULT_SCANNER_CONFIG.defaultProbeAmount),
        settlementCostPerHop: readAmount(env, 'SETTLEMENT_COST_PER_HOP', DEFAULT_SCANNER_CONFIG.settlementCostPerHop),
        stalenessWindowMs: readNumber(env, 'STALENESS_WINDOW_MS', DEFAULT_GRAPH_CONFIG.stalenessWindowMs, { min: 1 }),

        intelligence,
        policy,

        dashboardPort: readNumber(env, 'DASHBOARD_PORT', 3000, { integer: true, min: 0, max: 65535 }),
        assetsFile: env.ASSETS_FILE?.trim() || 'config/assets.json',
    };
}
