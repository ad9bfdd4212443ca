import express from 'express';
import type { Request, Response } from 'express';
import type { Server } from 'http';
import { z } from 'zod';
import { errorMessage, httpStatusFor } from '../lib/errors.js';
import { sendPerformanceReport } from '../pipeline/daily-report.js';
import { triggerSweep } from '../services.js';
import type { AppServices } from '../services.js';
import { tradeStatusSchema } from '../types/trade.js';

const priceBodySchema = z.object({ price: z.coerce.number().positive() });
const daysQuerySchema = z.coerce.number().int().positive().max(3650).default(30);
const statusQuerySchema = tradeStatusSchema.optional();

function sendError(res: Response, err: unknown): void {
  res.status(httpStatusFor(err)).json({ error: errorMessage(err) });
}

function badRequest(res: Response, error: z.ZodError): void {
  res.status(400).json({ error: error.issues[0]?.message ?? 'invalid request' });
}

function tradeId(req: Request): string {
  return String(req.params['id'] ?? '');
}

export function createApp(services: AppServices): express.Express {
  const { ledger, agent, sweep, monitor, calendar, notifier, clock } = services;
  const app = express();
  app.use(express.json());

  // ── Sweep ─────────────────────────────────────────────────────────────────

  // Kick off a sweep in the background; ?force=true ignores market hours
  app.get('/', (req, res) => {
    const trigger = triggerSweep(services, String(req.query['force'] ?? '') === 'true');
    switch (trigger.status) {
      case 'started':
        res.status(202).json({ status: 'started', symbols: sweep.symbolCount });
        break;
      case 'skipped':
        res.json({ status: 'skipped', reason: trigger.reason });
        break;
      case 'already-running':
        res.status(409).json({ status: 'already-running' });
        break;
    }
  });

  // ── Health / status ───────────────────────────────────────────────────────

  app.get('/health', (_req, res) => {
    const persistence = ledger.health();
    res.status(persistence.ok ? 200 : 503).json({
      status: persistence.ok ? 'ok' : 'degraded',
      timestamp: clock().toISOString(),
      persistence,
    });
  });

  app.get('/status', (_req, res) => {
    res.json({
      timestamp: clock().toISOString(),
      market: calendar.getMarketStatus(clock()),
      sweepRunning: sweep.isRunning,
      monitorRunning: monitor.running,
      symbols: sweep.symbolCount,
      trades: {
        total: ledger.list().length,
        setupReady: ledger.list({ status: 'SETUP_READY' }).length,
        monitoring: ledger.active().length,
        exited: ledger.list({ status: 'EXITED' }).length,
      },
      persistence: ledger.health(),
    });
  });

  app.get('/market-status', (_req, res) => {
    res.json(calendar.getMarketStatus(clock()));
  });

  // ── Trades ────────────────────────────────────────────────────────────────

  app.get('/api/trades', (req, res) => {
    const status = statusQuerySchema.safeParse(req.query['status']);
    if (!status.success) return badRequest(res, status.error);
    res.json({ trades: ledger.list({ status: status.data }) });
  });

  app.get('/api/trades/:id', (req, res) => {
    try {
      res.json({ trade: ledger.require(tradeId(req)) });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.post('/api/trades/:id/entry', async (req, res) => {
    const body = priceBodySchema.safeParse(req.body);
    if (!body.success) return badRequest(res, body.error);
    try {
      const trade = await agent.enter(tradeId(req), body.data.price);
      res.json({ ok: true, trade });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.post('/api/trades/:id/close', async (req, res) => {
    const body = priceBodySchema.safeParse(req.body);
    if (!body.success) return badRequest(res, body.error);
    try {
      const trade = await agent.close(tradeId(req), body.data.price);
      res.json({ ok: true, trade });
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── Performance ───────────────────────────────────────────────────────────

  app.get('/api/summary', (req, res) => {
    const days = daysQuerySchema.safeParse(req.query['days']);
    if (!days.success) return badRequest(res, days.error);
    res.json(ledger.summary(days.data, clock()));
  });

  app.get('/api/daily-stats', (_req, res) => {
    res.json({ dailyStats: ledger.getDailyStats() });
  });

  app.get('/daily-report', async (_req, res) => {
    const sent = await sendPerformanceReport(ledger, notifier, clock());
    res.status(sent ? 200 : 502).json({ sent });
  });

  return app;
}

export function startDashboard(services: AppServices, port: number): Server {
  return createApp(services).listen(port, () => {
    console.log(`[Dashboard] Listening on http://localhost:${port}`);
  });
}
