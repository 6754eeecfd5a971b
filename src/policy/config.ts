/**
 * Decision Policy - Configuration
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Thresholds are representative defaults. Deployments set them through env
 * (see config/engineConfig.ts); an invalid set is fatal at startup.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { ConfigurationError } from '../core/errors';
import { DecisionPolicyConfig } from './types';

export type { DecisionPolicyConfig } from './types';

export const DEFAULT_POLICY_CONFIG: DecisionPolicyConfig = {
    // 0.3% net after fees and settlement
    minProfitRatio: 0.003,

    // Regulatory risk cuts size to 40%
    reductionFactor: 0.6,

    bullishThreshold: 0.3,

    // Confirmed bullish signal adds 25%
    boostFactor: 0.25,

    minMultiplier: 0.2,
    maxMultiplier: 1.5,
};

/**
 * Conservative preset: smaller boost, harder risk cut, higher floor.
 */
export const CONSERVATIVE_POLICY_CONFIG: DecisionPolicyConfig = {
    ...DEFAULT_POLICY_CONFIG,
    minProfitRatio: 0.005,
    reductionFactor: 0.75,
    bullishThreshold: 0.5,
    boostFactor: 0.1,
    maxMultiplier: 1.1,
};

export function createPolicyConfig(overrides: Partial<DecisionPolicyConfig>): DecisionPolicyConfig {
    const config = {
        ...DEFAULT_POLICY_CONFIG,
        ...overrides,
    };
    validatePolicyConfig(config);
    return config;
}

export function validatePolicyConfig(config: DecisionPolicyConfig): void {
    const finite: (keyof DecisionPolicyConfig)[] = [
        'minProfitRatio',
        'reductionFactor',
        'bullishThreshold',
        'boostFactor',
        'minMultiplier',
        'maxMultiplier',
    ];
    for (const field of finite) {
        if (!Number.isFinite(config[field])) {
            throw new ConfigurationError(field, `must be a finite number, got ${config[field]}`);
        }
    }

    if (config.reductionFactor < 0 || config.reductionFactor >= 1) {
        throw new ConfigurationError('reductionFactor', `must be in [0, 1), got ${config.reductionFactor}`);
    }
    if (config.boostFactor < 0) {
        throw new ConfigurationError('boostFactor', `must be >= 0, got ${config.boostFactor}`);
    }
    if (config.bullishThreshold < -1 || config.bullishThreshold > 1) {
        throw new ConfigurationError('bullishThreshold', `must be in [-1, 1], got ${config.bullishThreshold}`);
    }
    if (config.minMultiplier <= 0) {
        throw new ConfigurationError('minMultiplier', `must be > 0, got ${config.minMultiplier}`);
    }
    if (config.maxMultiplier < config.minMultiplier) {
        throw new ConfigurationError(
            'maxMultiplier',
            `must be >= minMultiplier (${config.minMultiplier}), got ${config.maxMultiplier}`
        );
    }
}
