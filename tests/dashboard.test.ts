/**
 * Dashboard Tests
 *
 * Runs the express app on an ephemeral local port and talks to it over HTTP.
 */

import http from 'http';
import { AddressInfo } from 'net';
import { createDashboardApp } from '../src/dashboard/server';
import { CycleScanner } from '../src/scanner';
import { IntelligenceAggregator } from '../src/intelligence';
import { DecisionPolicy } from '../src/policy';
import { OpportunityLedger } from '../src/ledger';
import { SimulationExecutor } from '../src/execution';
import { ScanLoop } from '../src/runtime/scanLoop';
import { NOW, WLSK, createTriangleGraph, triangleReadings } from './fixtures';

interface Reply {
    status: number;
    body: unknown;
}

function request(port: number, method: 'GET' | 'POST', path: string, payload?: unknown): Promise<Reply> {
    return new Promise((resolve, reject) => {
        const data = payload === undefined ? undefined : JSON.stringify(payload);
        const req = http.request(
            {
                host: '127.0.0.1',
                port,
                method,
                path,
                headers: data === undefined ? {} : { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(data) },
            },
            (res) => {
                let raw = '';
                res.setEncoding('utf8');
                res.on('data', (chunk: string) => {
                    raw += chunk;
                });
                res.on('end', () => {
                    resolve({ status: res.statusCode ?? 0, body: raw ? JSON.parse(raw) : null });
                });
            }
        );
        req.on('error', reject);
        if (data !== undefined) req.write(data);
        req.end();
    });
}

describe('dashboard', () => {
    let server: http.Server;
    let port: number;
    let loop: ScanLoop;

    beforeEach(async () => {
        const graph = createTriangleGraph();
        const aggregator = new IntelligenceAggregator({ now: () => NOW });
        const ledger = new OpportunityLedger({ now: () => NOW });
        loop = new ScanLoop({
            graph,
            scanner: new CycleScanner(graph, { baseAssets: [WLSK], defaultProbeAmount: 1000 }, () => NOW),
            aggregator,
            policy: new DecisionPolicy({}, () => NOW),
            ledger,
            executor: new SimulationExecutor(),
            config: {
                scanIntervalMs: 1_000,
                intelligenceIntervalMs: 5_000,
                scanTimeBudgetMs: 5_000,
                statsEveryTicks: 100,
                maxHops: 3,
                minProfitRatio: 0.003,
            },
            now: () => NOW,
        });

        const app = createDashboardApp({ loop, ledger, aggregator });
        server = await new Promise<http.Server>(resolve => {
            const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
        });
        const address: AddressInfo | string | null = server.address();
        port = typeof address === 'object' && address !== null ? address.port : 0;
    });

    afterEach(async () => {
        await new Promise<void>(resolve => server.close(() => resolve()));
    });

    test('GET /health', async () => {
        const reply = await request(port, 'GET', '/health');
        expect(reply).toEqual({
            status: 200,
            body: { status: 'ok', running: false, graphGeneration: 1, intelligenceDefault: true },
        });
    });

    test('GET /intelligence serves the neutral default before any refresh', async () => {
        const reply = await request(port, 'GET', '/intelligence');
        expect(reply.status).toBe(200);
        expect(reply.body).toMatchObject({ id: 'snap_neutral', sentiment: 0, isDefault: true, riskFlags: [] });
    });

    test('GET /ledger/recent returns entries with their outcome', async () => {
        await loop.runScanTick();

        const reply = await request(port, 'GET', '/ledger/recent?n=5');

        expect(reply.status).toBe(200);
        expect(reply.body).toMatchObject({
            count: 1,
            entries: [{
                kind: 'cyclic',
                net_profit_ratio: '0.063',
                action: 'EXECUTE',
                outcome: { status: 'simulated', estimated_profit: '63' },
            }],
        });
    });

    test('GET /ledger/since requires ts', async () => {
        expect((await request(port, 'GET', '/ledger/since')).status).toBe(400);

        await loop.runScanTick();
        const reply = await request(port, 'GET', `/ledger/since?ts=${NOW + 1}`);
        expect(reply).toEqual({ status: 200, body: { count: 0, entries: [] } });
    });

    test('GET /stats', async () => {
        await loop.runScanTick();
        const reply = await request(port, 'GET', '/stats');

        expect(reply.status).toBe(200);
        expect(reply.body).toMatchObject({ scanTicks: 1, executed: 1, estimatedProfitByAsset: { [WLSK]: '63' } });
    });

    test('POST /feed/pools applies a batch', async () => {
        const reply = await request(port, 'POST', '/feed/pools', triangleReadings(NOW + 1));
        expect(reply).toEqual({ status: 200, body: { generation: 2, applied: 3, ignoredStale: [] } });
    });

    test('POST /feed/pools rejects an invalid batch with its issues', async () => {
        const bad = { ...triangleReadings(NOW + 1)[0], assetB: 'lisk:0xdead' };
        const reply = await request(port, 'POST', '/feed/pools', [bad]);

        expect(reply).toEqual({
            status: 422,
            body: {
                error: 'INVALID_BATCH',
                issues: [{ index: 0, poolKey: 'velo:p1', problem: 'unknown asset lisk:0xdead' }],
            },
        });
    });

    test('POST /feed/pools answers 422 for a null element and counts the rejection', async () => {
        const reply = await request(port, 'POST', '/feed/pools', [null, triangleReadings(NOW + 1)[0]]);

        expect(reply).toEqual({
            status: 422,
            body: {
                error: 'INVALID_BATCH',
                issues: [{ index: 0, poolKey: 'unknown', problem: 'malformed reading' }],
            },
        });
        expect(loop.stats().rejectedBatches).toBe(1);
    });

    test('POST /feed/news drops mistyped items', async () => {
        const reply = await request(port, 'POST', '/feed/news', [
            { timestamp: NOW, polarity: 0.9, headline: 42, topicTags: [], isRegulatory: false },
        ]);
        expect(reply).toEqual({ status: 200, body: { accepted: 0 } });
    });

    test('POST /feed/news requires an array', async () => {
        expect((await request(port, 'POST', '/feed/news', { headline: 'x' })).status).toBe(400);

        const reply = await request(port, 'POST', '/feed/news', [
            { timestamp: NOW, polarity: 0.5, topicTags: [], isRegulatory: false },
        ]);
        expect(reply).toEqual({ status: 200, body: { accepted: 1 } });
    });

    test('POST /feed/markets', async () => {
        const reply = await request(port, 'POST', '/feed/markets', [
            { marketId: 'm1', yesProbability: 0.8, volume: 10, relevanceTags: ['lisk'], timestamp: NOW },
        ]);
        expect(reply).toEqual({ status: 200, body: { accepted: 1 } });
    });
});
