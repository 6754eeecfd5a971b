/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * INDEX.TS — LIBRARY SURFACE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * RULES:
 * 1. NO runtime logic at import time
 * 2. NO process handlers here, start.ts owns the process
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export * from './core/errors';
export * from './graph';
export * from './scanner';
export * from './intelligence';
export * from './policy';
export * from './ledger';
export * from './execution';

export { loadEngineConfig } from './config/engineConfig';
export type { EngineConfig } from './config/engineConfig';
export { loadAssetDefinitions, parseAssetDefinitions } from './config/assets';

export { ScanLoop } from './runtime/scanLoop';
export type { ScanLoopConfig, ScanLoopDeps, ScanLoopStats, ScanTickResult, IngestResult } from './runtime/scanLoop';

export { createDashboardApp, startDashboard } from './dashboard/server';
export type { DashboardDeps } from './dashboard/server';
