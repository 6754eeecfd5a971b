/**
 * Engine error taxonomy.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Data-quality errors (STALE_DATA, INSUFFICIENT_LIQUIDITY, INVALID_BATCH,
 * SCAN_TIMEOUT) are absorbed at the component that detects them and never
 * abort the scan or evaluation loop. CONFIGURATION is the only fatal code.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type EngineErrorCode =
    | 'STALE_DATA'
    | 'INSUFFICIENT_LIQUIDITY'
    | 'INVALID_BATCH'
    | 'SCAN_TIMEOUT'
    | 'CONFIGURATION';

export class EngineError extends Error {
    constructor(
        public readonly code: EngineErrorCode,
        message: string
    ) {
        super(`[${code}] ${message}`);
        this.name = 'EngineError';
    }
}

export class StaleDataError extends EngineError {
    constructor(
        public readonly poolKey: string,
        public readonly readingTimestamp: number,
        public readonly currentTimestamp: number
    ) {
        super('STALE_DATA', `${poolKey} reading at ${readingTimestamp} is older than state at ${currentTimestamp}`);
        this.name = 'StaleDataError';
    }
}

export type LiquidityFailureReason = 'UNKNOWN_POOL' | 'STALE_POOL' | 'ZERO_RESERVES' | 'ASSET_MISMATCH' | 'ZERO_INPUT';

export class InsufficientLiquidityError extends EngineError {
    constructor(
        public readonly reason: LiquidityFailureReason,
        detail: string
    ) {
        super('INSUFFICIENT_LIQUIDITY', `${reason}: ${detail}`);
        this.name = 'InsufficientLiquidityError';
    }
}

export interface BatchIssue {
    index: number;
    poolKey: string;
    problem: string;
}

export class InvalidBatchError extends EngineError {
    constructor(public readonly issues: BatchIssue[]) {
        super(
            'INVALID_BATCH',
            issues.map(i => `#${i.index} ${i.poolKey}: ${i.problem}`).join('; ')
        );
        this.name = 'InvalidBatchError';
    }
}

export class ScanTimeoutError extends EngineError {
    constructor(
        public readonly budgetMs: number,
        public readonly candidatesDiscarded: number
    ) {
        super('SCAN_TIMEOUT', `scan exceeded ${budgetMs}ms budget, discarded ${candidatesDiscarded} candidates`);
        this.name = 'ScanTimeoutError';
    }
}

export class ConfigurationError extends EngineError {
    constructor(
        public readonly field: string,
        detail: string
    ) {
        super('CONFIGURATION', `${field}: ${detail}`);
        this.name = 'ConfigurationError';
    }
}
