import express, { Express, Request, Response } from 'express';
import { Server } from 'http';
import logger from '../utils/logger';
import { ScanLoop } from '../runtime/scanLoop';
import { LedgerEntry, OpportunityLedger, toLedgerRow, toOutcomeRow } from '../ledger';
import { IntelligenceAggregator } from '../intelligence';

const DEFAULT_RECENT = 50;
const MAX_RECENT = 1000;

export interface DashboardDeps {
  loop: ScanLoop;
  ledger: OpportunityLedger;
  aggregator: IntelligenceAggregator;
}

function serializeEntry(ledger: OpportunityLedger, entry: LedgerEntry) {
  const outcome = ledger.outcomeFor(entry.id);
  return {
    ...toLedgerRow(entry),
    outcome: outcome ? toOutcomeRow(outcome) : null,
  };
}

function readQueryNumber(req: Request, key: string): number | null {
  const raw = req.query[key];
  if (typeof raw !== 'string' || raw.trim() === '') return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

/**
 * Read-only operator view over the running loop, plus the feed endpoints
 * external collaborators push pool, news and market data through.
 */
export function createDashboardApp({ loop, ledger, aggregator }: DashboardDeps): Express {
  const app = express();
  app.use(express.json({ limit: '5mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.setHeader('Cache-Control', 'no-store');
    res.json({
      status: 'ok',
      running: loop.isRunning,
      graphGeneration: loop.stats().graphGeneration,
      intelligenceDefault: aggregator.currentSnapshot().isDefault,
    });
  });

  app.get('/stats', (_req: Request, res: Response) => {
    res.setHeader('Cache-Control', 'no-store');
    res.json(loop.stats());
  });

  app.get('/intelligence', (_req: Request, res: Response) => {
    res.setHeader('Cache-Control', 'no-store');
    res.json(aggregator.currentSnapshot());
  });

  app.get('/ledger/recent', (req: Request, res: Response) => {
    const requested = readQueryNumber(req, 'n') ?? DEFAULT_RECENT;
    const n = Math.min(Math.max(0, Math.floor(requested)), MAX_RECENT);
    const entries = [...ledger.recent(n)].map(entry => serializeEntry(ledger, entry));
    res.json({ count: entries.length, entries });
  });

  app.get('/ledger/since', (req: Request, res: Response) => {
    const ts = readQueryNumber(req, 'ts');
    if (ts === null) {
      res.status(400).json({ error: 'query parameter ts (epoch ms) is required' });
      return;
    }
    const entries = [...ledger.since(ts)].map(entry => serializeEntry(ledger, entry));
    res.json({ count: entries.length, entries });
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // FEEDS
  // ═══════════════════════════════════════════════════════════════════════════

  app.post('/feed/pools', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!Array.isArray(body)) {
      res.status(400).json({ error: 'expected an array of pool readings' });
      return;
    }
    const outcome = loop.ingestPoolBatch(body);
    if (!outcome.ok) {
      res.status(422).json({ error: outcome.error.code, issues: outcome.error.issues });
      return;
    }
    res.json({
      generation: outcome.result.generation,
      applied: outcome.result.applied,
      ignoredStale: outcome.result.ignoredStale.map(e => e.poolKey),
    });
  });

  app.post('/feed/news', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!Array.isArray(body)) {
      res.status(400).json({ error: 'expected an array of news items' });
      return;
    }
    res.json({ accepted: loop.ingestNews(body) });
  });

  app.post('/feed/markets', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!Array.isArray(body)) {
      res.status(400).json({ error: 'expected an array of market readings' });
      return;
    }
    res.json({ accepted: loop.ingestMarkets(body) });
  });

  return app;
}

export function startDashboard(deps: DashboardDeps, port: number): Server {
  const app = createDashboardApp(deps);
  return app.listen(port, () => {
    logger.info(`[DASHBOARD] listening on http://localhost:${port}`);
  });
}
