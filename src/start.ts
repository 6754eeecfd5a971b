import 'dotenv/config';

import { Server } from 'http';
import logger from './utils/logger';
import { ConfigurationError } from './core/errors';
import { getSupabaseClient } from './db/supabase';
import { EngineConfig, loadEngineConfig } from './config/engineConfig';
import { loadAssetDefinitions } from './config/assets';
import { PoolGraph } from './graph';
import { CycleScanner } from './scanner';
import { IntelligenceAggregator, createKeywordScorer } from './intelligence';
import { DecisionPolicy } from './policy';
import { OpportunityLedger, SupabaseLedgerSink } from './ledger';
import { SimulationExecutor } from './execution';
import { ScanLoop } from './runtime/scanLoop';
import { startDashboard } from './dashboard/server';

// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME STATE
// ═══════════════════════════════════════════════════════════════════════════════

let scanLoop: ScanLoop | null = null;
let dashboard: Server | null = null;
let isShuttingDown = false;

// ═══════════════════════════════════════════════════════════════════════════════
// WIRING
// ═══════════════════════════════════════════════════════════════════════════════

function buildEngine(config: EngineConfig): { loop: ScanLoop; ledger: OpportunityLedger; aggregator: IntelligenceAggregator } {
    const graph = new PoolGraph({ stalenessWindowMs: config.stalenessWindowMs });
    for (const definition of loadAssetDefinitions(config.assetsFile)) {
        graph.registerAsset(definition);
    }
    logger.info(`[STARTUP] ${graph.assets().length} assets registered from ${config.assetsFile}`);

    const scanner = new CycleScanner(graph, {
        baseAssets: config.baseAssets,
        defaultProbeAmount: config.defaultProbeAmount,
        settlementCostPerHop: config.settlementCostPerHop,
    });

    const aggregator = new IntelligenceAggregator({
        config: config.intelligence,
        scorer: createKeywordScorer(),
    });

    const policy = new DecisionPolicy(config.policy);

    const supabase = getSupabaseClient();
    const ledger = new OpportunityLedger({
        sink: supabase ? new SupabaseLedgerSink(supabase) : undefined,
    });
    logger.info(`[STARTUP] ledger mirror: ${supabase ? 'supabase' : 'memory only'}`);

    const loop = new ScanLoop({
        graph,
        scanner,
        aggregator,
        policy,
        ledger,
        executor: new SimulationExecutor(),
        config,
    });

    return { loop, ledger, aggregator };
}

// ═══════════════════════════════════════════════════════════════════════════════
// GRACEFUL SHUTDOWN
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * 1. Stop the loop (waits for in-flight ticks, drains the ledger mirror)
 * 2. Close the dashboard
 * 3. Give the logger a moment to flush
 */
async function gracefulShutdown(signal: string): Promise<void> {
    if (isShuttingDown) {
        logger.info(`[SHUTDOWN] Already shutting down, ignoring ${signal}`);
        return;
    }
    isShuttingDown = true;

    logger.info(`[SHUTDOWN] Received ${signal}, shutting down...`);

    try {
        if (scanLoop) {
            await scanLoop.stop();
        }

        const server = dashboard;
        if (server) {
            await new Promise<void>(resolve => server.close(() => resolve()));
        }

        await new Promise(resolve => setTimeout(resolve, 500));
        logger.info('[SHUTDOWN] ✅ Graceful shutdown complete');
        process.exit(0);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.error(`[SHUTDOWN] ❌ Error during shutdown: ${reason}`);
        process.exit(1);
    }
}

function attachProcessHandlers(): void {
    process.on('SIGINT', () => {
        void gracefulShutdown('SIGINT');
    });
    process.on('SIGTERM', () => {
        void gracefulShutdown('SIGTERM');
    });

    process.on('uncaughtException', (error) => {
        logger.error(`🚨 [FATAL] Uncaught Exception: ${error.message}`);
        logger.error(error.stack ?? '');
        void gracefulShutdown('uncaughtException');
    });

    // Log but keep running
    process.on('unhandledRejection', (reason) => {
        logger.error(`Unhandled rejection: ${String(reason)}`);
    });
}

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRYPOINT
// ═══════════════════════════════════════════════════════════════════════════════

function main(): void {
    logger.info('════════════════════════════════════════════════════════════════');
    logger.info('🔧 ARBITRAGE DECISION ENGINE — STARTING');
    logger.info(`   PID: ${process.pid}`);
    logger.info(`   Time: ${new Date().toISOString()}`);
    logger.info('════════════════════════════════════════════════════════════════');

    let config: EngineConfig;
    let engine: ReturnType<typeof buildEngine>;
    try {
        config = loadEngineConfig();
        engine = buildEngine(config);
    } catch (error) {
        if (error instanceof ConfigurationError) {
            logger.error(`[STARTUP] ❌ ${error.message}`);
            process.exit(1);
        }
        throw error;
    }

    attachProcessHandlers();

    scanLoop = engine.loop;
    scanLoop.start();
    dashboard = startDashboard(engine, config.dashboardPort);
}

main();
