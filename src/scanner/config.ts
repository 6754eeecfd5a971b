/**
 * Cycle Scanner - Configuration
 */

import { ConfigurationError } from '../core/errors';
import { toBigNumber } from '../utils/math';
import { ScannerConfig } from './types';

export type { ScannerConfig } from './types';

export const DEFAULT_SCANNER_CONFIG: ScannerConfig = {
    baseAssets: [],
    probeAmounts: {},

    // 1e6 smallest units keeps price impact small on most pools
    defaultProbeAmount: '1000000',

    settlementCostPerHop: '0',

    yieldEvery: 64,
};

export function createScannerConfig(overrides: Partial<ScannerConfig> = {}): ScannerConfig {
    const config = {
        ...DEFAULT_SCANNER_CONFIG,
        ...overrides,
    };
    if (!Number.isInteger(config.yieldEvery) || config.yieldEvery <= 0) {
        throw new ConfigurationError('yieldEvery', `must be a positive integer, got ${config.yieldEvery}`);
    }
    const settlement = toBigNumber(config.settlementCostPerHop);
    if (!settlement.isFinite() || settlement.isNegative()) {
        throw new ConfigurationError('settlementCostPerHop', 'must be a non-negative number');
    }
    return config;
}
