/**
 * Pool Graph - Configuration
 */

import { ConfigurationError } from '../core/errors';
import { PoolGraphConfig } from './types';

export type { PoolGraphConfig } from './types';

export const DEFAULT_GRAPH_CONFIG: PoolGraphConfig = {
    // Two minutes without a reading marks a pool stale
    stalenessWindowMs: 2 * 60 * 1000,
};

export function createGraphConfig(overrides: Partial<PoolGraphConfig> = {}): PoolGraphConfig {
    const config = {
        ...DEFAULT_GRAPH_CONFIG,
        ...overrides,
    };
    if (!Number.isFinite(config.stalenessWindowMs) || config.stalenessWindowMs <= 0) {
        throw new ConfigurationError('stalenessWindowMs', `must be > 0, got ${config.stalenessWindowMs}`);
    }
    return config;
}
