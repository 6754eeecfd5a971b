/**
 * Market Intelligence - Configuration
 */

import { ConfigurationError } from '../core/errors';
import { IntelligenceConfig } from './types';

export type { IntelligenceConfig } from './types';

export const DEFAULT_INTELLIGENCE_CONFIG: IntelligenceConfig = {
    // One hour of news and market readings
    windowMs: 60 * 60 * 1000,

    // <40% low, 40-70% medium, >70% high
    confidenceThresholds: {
        low: 0.4,
        high: 0.7,
    },

    // Three or more regulatory items in the window raise the flag
    riskEvidenceThreshold: 2,

    relevantTags: [],
};

export function createIntelligenceConfig(overrides: Partial<IntelligenceConfig>): IntelligenceConfig {
    const config = {
        ...DEFAULT_INTELLIGENCE_CONFIG,
        ...overrides,
    };
    validateIntelligenceConfig(config);
    return config;
}

export function validateIntelligenceConfig(config: IntelligenceConfig): void {
    if (!Number.isFinite(config.windowMs) || config.windowMs <= 0) {
        throw new ConfigurationError('windowMs', `must be > 0, got ${config.windowMs}`);
    }
    const { low, high } = config.confidenceThresholds;
    if (!(low >= 0 && low <= high && high <= 1)) {
        throw new ConfigurationError('confidenceThresholds', `need 0 <= low <= high <= 1, got ${low}/${high}`);
    }
    if (!Number.isInteger(config.riskEvidenceThreshold) || config.riskEvidenceThreshold < 0) {
        throw new ConfigurationError('riskEvidenceThreshold', `must be a non-negative integer, got ${config.riskEvidenceThreshold}`);
    }
}
