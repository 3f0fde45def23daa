import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createSqliteDb, type DbConn } from '../backend/src/db/db.js';
import { canSendEmail, markEmailSent } from '../backend/src/db/emailGuards.js';
import {
  failScanRun,
  finishScanRun,
  getScanRun,
  listAuditEvents,
  listScanRuns,
  pruneScanRuns,
  recordAuditEvent,
  startScanRun,
} from '../backend/src/scanStore.js';
import { makeResult, makeSetup } from './helpers/setups.js';

const STARTED = 1_700_000_000_000;

let db: DbConn;

beforeEach(() => {
  db = createSqliteDb(':memory:');
});

afterEach(async () => {
  await db.close();
});

describe('scan store', () => {
  it('records a running scan with a start event', async () => {
    await startScanRun(db, { scanId: 'scan-1', exchange: 'binance', configHash: 'hash-1', startedAt: STARTED });

    const [run] = await listScanRuns(db);
    expect(run).toMatchObject({ scanId: 'scan-1', status: 'RUNNING', configHash: 'hash-1', startedAt: STARTED, finishedAt: null });
    const events = await listAuditEvents(db, 'scan-1');
    expect(events.map((e) => e.eventType)).toEqual(['scan_started']);
    expect(events[0].data).toEqual({ exchange: 'binance', configHash: 'hash-1' });
  });

  it('finishes a run and keeps the full result', async () => {
    await startScanRun(db, { scanId: 'scan-1', exchange: 'binance', configHash: 'hash-1', startedAt: STARTED });
    const result = makeResult({
      setups: [makeSetup(), makeSetup({ symbol: 'ETHUSDT', direction: 'SHORT', score: 62 })],
    }, { skipped: { count: 1, byReason: { DATA_UNAVAILABLE: 1 }, symbols: [] } });
    await finishScanRun(db, result);

    const run = await getScanRun(db, 'scan-1');
    expect(run).toMatchObject({
      status: 'FINISHED',
      finishedAt: 1_700_000_004_000,
      durationMs: 4_000,
      pairsScanned: 3,
      setupsFound: 2,
      skippedCount: 1,
      cancelled: false,
    });
    expect(run?.result?.setups.map((s) => s.symbol)).toEqual(['BTCUSDT', 'ETHUSDT']);

    const events = await listAuditEvents(db, 'scan-1');
    expect(events.map((e) => [e.eventType, e.symbol])).toEqual([
      ['scan_started', null],
      ['setup_found', 'BTCUSDT'],
      ['setup_found', 'ETHUSDT'],
      ['scan_completed', null],
    ]);
    expect(events[2].data).toEqual({
      direction: 'SHORT',
      score: 62,
      confidence: 0.8,
      entry: 100,
      stopLoss: 97,
      takeProfits: [104.5, 109],
    });
  });

  it('inserts a finished run that was never started', async () => {
    await finishScanRun(db, makeResult({ scanId: 'late', setups: [] }, { cancelled: true }));
    const run = await getScanRun(db, 'late');
    expect(run).toMatchObject({ status: 'FINISHED', startedAt: STARTED, cancelled: true, setupsFound: 0 });
  });

  it('marks a failed run with its error', async () => {
    await startScanRun(db, { scanId: 'scan-2', exchange: 'binance', configHash: 'h', startedAt: STARTED });
    await failScanRun(db, 'scan-2', 'listing unavailable', STARTED + 1_500);

    const run = await getScanRun(db, 'scan-2');
    expect(run).toMatchObject({ status: 'FAILED', durationMs: 1_500, errorMessage: 'listing unavailable', result: null });
    const events = await listAuditEvents(db, 'scan-2');
    expect(events[1]).toMatchObject({ eventType: 'scan_failed', data: { error: 'listing unavailable' } });
  });

  it('returns null for an unknown scan', async () => {
    expect(await getScanRun(db, 'missing')).toBeNull();
    expect(await getScanRun(db, '')).toBeNull();
  });

  it('lists newest first and prunes the oldest runs', async () => {
    for (let i = 0; i < 4; i++) {
      await startScanRun(db, { scanId: `scan-${i}`, exchange: 'binance', configHash: 'h', startedAt: STARTED + i });
    }
    await recordAuditEvent(db, 'scan-0', 'alert_sent', { channel: 'email' }, { symbol: 'BTCUSDT' });

    expect((await listScanRuns(db, 2)).map((r) => r.scanId)).toEqual(['scan-3', 'scan-2']);
    expect(await pruneScanRuns(db, 2)).toBe(2);
    expect((await listScanRuns(db)).map((r) => r.scanId)).toEqual(['scan-3', 'scan-2']);
    expect(await listAuditEvents(db, 'scan-0')).toEqual([]);
  });

  it('rolls back a transaction that throws', async () => {
    await startScanRun(db, { scanId: 'keep', exchange: 'binance', configHash: 'h', startedAt: STARTED });
    await expect(db.transaction(async (tx) => {
      await tx.prepare('DELETE FROM scan_runs').run();
      throw new Error('boom');
    })).rejects.toThrow('boom');
    expect((await listScanRuns(db)).map((r) => r.scanId)).toEqual(['keep']);
  });
});

describe('email guard', () => {
  it('blocks a key until the cooldown has passed', async () => {
    expect(await canSendEmail(db, 'BTCUSDT|LONG', 60, STARTED)).toEqual({ allowed: true, now: STARTED });
    await markEmailSent(db, 'BTCUSDT|LONG', STARTED);
    expect((await canSendEmail(db, 'BTCUSDT|LONG', 60, STARTED + 59 * 60_000)).allowed).toBe(false);
    expect((await canSendEmail(db, 'BTCUSDT|LONG', 60, STARTED + 60 * 60_000)).allowed).toBe(true);
  });
});
