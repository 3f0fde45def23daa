import cors from 'cors';
import express from 'express';
import { z } from 'zod';
import type { DbConn } from './db/db.js';
import { ConfigurationError, describeError, ScanFailedError } from './errors.js';
import { ensureVapid, removeSubscription, saveSubscription } from './notifier.js';
import type { ScanService } from './scanLoop.js';
import { getScanRun, listAuditEvents, listScanRuns } from './scanStore.js';

const SubscriptionSchema = z.object({
  endpoint: z.string().url(),
  keys: z.object({ p256dh: z.string().min(1), auth: z.string().min(1) }),
});

export function createApp(service: ScanService, db: DbConn | null) {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    const latest = service.latest();
    res.json({
      ok: true,
      running: service.isRunning(),
      lastScanId: latest?.scanId ?? null,
      lastScanAt: latest?.metadata.finishedAt ?? null,
    });
  });

  app.get('/api/scan', async (req, res) => {
    if (req.query.cached === '1') {
      const latest = service.latest();
      if (latest) return res.json(latest);
    }
    try {
      res.json(await service.scanOnce());
    } catch (e) {
      if (e instanceof ConfigurationError) return res.status(400).json({ error: e.message, issues: e.issues });
      if (e instanceof ScanFailedError) return res.status(502).json({ error: e.message, state: e.state });
      console.error('[server] scan failed', e);
      res.status(500).json({ error: describeError(e) });
    }
  });

  app.get('/api/scans', async (req, res) => {
    if (!db) return res.status(503).json({ error: 'storage disabled' });
    const limit = Number(req.query.limit ?? 50);
    try {
      res.json({ runs: await listScanRuns(db, Number.isFinite(limit) ? limit : 50) });
    } catch (e) {
      console.error('[server] list scans failed', e);
      res.status(500).json({ error: describeError(e) });
    }
  });

  app.get('/api/scans/:scanId', async (req, res) => {
    if (!db) return res.status(503).json({ error: 'storage disabled' });
    try {
      const run = await getScanRun(db, req.params.scanId);
      if (!run) return res.status(404).json({ error: 'scan not found' });
      res.json({ ...run, events: await listAuditEvents(db, run.scanId) });
    } catch (e) {
      console.error('[server] get scan failed', e);
      res.status(500).json({ error: describeError(e) });
    }
  });

  app.get('/api/vapidPublicKey', async (_req, res) => {
    if (!db) return res.status(503).json({ error: 'storage disabled' });
    try {
      res.json(await ensureVapid(db));
    } catch (e) {
      console.error('[push] vapid setup failed', e);
      res.status(500).json({ error: describeError(e) });
    }
  });

  app.post('/api/subscribe', async (req, res) => {
    if (!db) return res.status(503).json({ error: 'storage disabled' });
    const parsed = SubscriptionSchema.safeParse(req.body);
    if (!parsed.success) return res.status(400).json({ error: 'Invalid subscription' });
    try {
      await saveSubscription(db, parsed.data);
      res.json({ ok: true });
    } catch (e) {
      console.error('[push] subscribe failed', e);
      res.status(500).json({ error: describeError(e) });
    }
  });

  app.post('/api/unsubscribe', async (req, res) => {
    if (!db) return res.status(503).json({ error: 'storage disabled' });
    const endpoint = z.object({ endpoint: z.string().min(1) }).safeParse(req.body);
    if (!endpoint.success) return res.status(400).json({ error: 'endpoint is required' });
    try {
      res.json({ ok: true, removed: await removeSubscription(db, endpoint.data.endpoint) });
    } catch (e) {
      console.error('[push] unsubscribe failed', e);
      res.status(500).json({ error: describeError(e) });
    }
  });

  return app;
}
