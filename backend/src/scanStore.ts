import { ensureSchema, type DbConn, type Row } from './db/db.js';
import type { ScanResult, TradeSetup } from './types.js';

export type ScanRunStatus = 'RUNNING' | 'FINISHED' | 'FAILED';

export type AuditEventType = 'scan_started' | 'setup_found' | 'scan_completed' | 'scan_failed' | 'alert_sent';

export type ScanRun = {
  scanId: string;
  exchange: string;
  status: ScanRunStatus;
  configHash: string | null;
  startedAt: number;
  finishedAt: number | null;
  durationMs: number | null;
  pairsScanned: number | null;
  setupsFound: number | null;
  skippedCount: number | null;
  cancelled: boolean;
  errorMessage: string | null;
};

export type AuditEvent = {
  id: number;
  scanId: string;
  eventType: AuditEventType;
  symbol: string | null;
  createdAt: number;
  data: Record<string, unknown> | null;
};

const RUN_COLUMNS = `scan_id, exchange, status, config_hash, started_at, finished_at, duration_ms,
  pairs_scanned, setups_found, skipped_count, cancelled, error_message`;

const STATUSES: readonly ScanRunStatus[] = ['RUNNING', 'FINISHED', 'FAILED'];
const EVENT_TYPES: readonly AuditEventType[] = ['scan_started', 'setup_found', 'scan_completed', 'scan_failed', 'alert_sent'];

// postgres returns BIGINT as string
function numOrNull(v: unknown): number | null {
  if (v === null || v === undefined || v === '') return null;
  const n = Number(v);
  return Number.isFinite(n) ? n : null;
}

function strOrNull(v: unknown): string | null {
  return v === null || v === undefined ? null : String(v);
}

function parseJsonField(raw: unknown): unknown {
  if (typeof raw !== 'string' || !raw) return null;
  try {
    return JSON.parse(raw);
  } catch (e) {
    console.warn('[db] stored JSON could not be parsed', String(e));
    return null;
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isScanResult(v: unknown): v is ScanResult {
  return isRecord(v) && typeof v.scanId === 'string' && Array.isArray(v.setups) && isRecord(v.metadata);
}

function normalizeScanRow(row: Row | undefined): ScanRun | null {
  if (!row) return null;
  const status = STATUSES.find((s) => s === row.status) ?? 'FAILED';
  return {
    scanId: String(row.scan_id ?? ''),
    exchange: String(row.exchange ?? ''),
    status,
    configHash: strOrNull(row.config_hash),
    startedAt: numOrNull(row.started_at) ?? 0,
    finishedAt: numOrNull(row.finished_at),
    durationMs: numOrNull(row.duration_ms),
    pairsScanned: numOrNull(row.pairs_scanned),
    setupsFound: numOrNull(row.setups_found),
    skippedCount: numOrNull(row.skipped_count),
    cancelled: Number(row.cancelled ?? 0) === 1,
    errorMessage: strOrNull(row.error_message),
  };
}

function normalizeEventRow(row: Row): AuditEvent | null {
  const eventType = EVENT_TYPES.find((t) => t === row.event_type);
  if (!eventType) return null;
  const data = parseJsonField(row.data_json);
  return {
    id: numOrNull(row.id) ?? 0,
    scanId: String(row.scan_id ?? ''),
    eventType,
    symbol: strOrNull(row.symbol),
    createdAt: numOrNull(row.created_at) ?? 0,
    data: isRecord(data) ? data : null,
  };
}

type EventOptions = { symbol?: string; at?: number };

async function insertAuditEvent(
  d: DbConn,
  scanId: string,
  eventType: AuditEventType,
  data: Record<string, unknown> | null,
  opts: EventOptions = {},
) {
  await d.prepare(`
    INSERT INTO audit_events (scan_id, event_type, symbol, created_at, data_json)
    VALUES (?, ?, ?, ?, ?)
  `).run(scanId, eventType, opts.symbol ?? null, opts.at ?? Date.now(), data ? JSON.stringify(data) : null);
}

export async function recordAuditEvent(
  d: DbConn,
  scanId: string,
  eventType: AuditEventType,
  data: Record<string, unknown> | null = null,
  opts: EventOptions = {},
) {
  await ensureSchema(d);
  await insertAuditEvent(d, scanId, eventType, data, opts);
}

export async function startScanRun(
  d: DbConn,
  run: { scanId: string; exchange: string; configHash: string; startedAt: number },
) {
  await ensureSchema(d);
  await d.transaction(async (tx) => {
    await tx.prepare(`
      INSERT INTO scan_runs (scan_id, exchange, status, config_hash, started_at)
      VALUES (?, ?, 'RUNNING', ?, ?)
    `).run(run.scanId, run.exchange, run.configHash, run.startedAt);
    await insertAuditEvent(tx, run.scanId, 'scan_started', { exchange: run.exchange, configHash: run.configHash }, { at: run.startedAt });
  });
  return run;
}

function setupEvent(s: TradeSetup) {
  return {
    direction: s.direction,
    score: s.score,
    confidence: s.confidence,
    entry: s.entryPlan[0] ?? null,
    stopLoss: s.stopLoss,
    takeProfits: [...s.takeProfits],
  };
}

/** Stores the final result with one `setup_found` event per ranked setup. */
export async function finishScanRun(d: DbConn, result: ScanResult) {
  await ensureSchema(d);
  const { metadata } = result;
  await d.transaction(async (tx) => {
    const res = await tx.prepare(`
      UPDATE scan_runs
      SET status = 'FINISHED',
          config_hash = ?,
          finished_at = ?,
          duration_ms = ?,
          pairs_scanned = ?,
          setups_found = ?,
          skipped_count = ?,
          cancelled = ?,
          result_json = ?
      WHERE scan_id = ?
    `).run(
      metadata.configHash,
      metadata.finishedAt,
      metadata.durationMs,
      result.totalPairsScanned,
      result.totalSetupsFound,
      metadata.skipped.count,
      metadata.cancelled ? 1 : 0,
      JSON.stringify(result),
      result.scanId,
    );
    if (!res.changes) {
      // scan was never registered as RUNNING
      await tx.prepare(`
        INSERT INTO scan_runs (scan_id, exchange, status, config_hash, started_at, finished_at, duration_ms,
          pairs_scanned, setups_found, skipped_count, cancelled, result_json)
        VALUES (?, ?, 'FINISHED', ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        result.scanId,
        result.exchange,
        metadata.configHash,
        result.startedAt,
        metadata.finishedAt,
        metadata.durationMs,
        result.totalPairsScanned,
        result.totalSetupsFound,
        metadata.skipped.count,
        metadata.cancelled ? 1 : 0,
        JSON.stringify(result),
      );
    }
    for (const s of result.setups) {
      await insertAuditEvent(tx, result.scanId, 'setup_found', setupEvent(s), { symbol: s.symbol, at: metadata.finishedAt });
    }
    await insertAuditEvent(tx, result.scanId, 'scan_completed', {
      pairsScanned: result.totalPairsScanned,
      setupsFound: result.totalSetupsFound,
      skipped: metadata.skipped.count,
      cancelled: metadata.cancelled,
      durationMs: metadata.durationMs,
    }, { at: metadata.finishedAt });
  });
}

export async function failScanRun(d: DbConn, scanId: string, errorMessage: string, failedAt = Date.now()) {
  await ensureSchema(d);
  await d.transaction(async (tx) => {
    await tx.prepare(`
      UPDATE scan_runs
      SET status = 'FAILED',
          finished_at = ?,
          duration_ms = ? - started_at,
          error_message = ?
      WHERE scan_id = ?
    `).run(failedAt, failedAt, errorMessage, scanId);
    await insertAuditEvent(tx, scanId, 'scan_failed', { error: errorMessage }, { at: failedAt });
  });
}

export async function listScanRuns(d: DbConn, limit = 50) {
  await ensureSchema(d);
  const rows = await d.prepare(`
    SELECT ${RUN_COLUMNS}
    FROM scan_runs
    ORDER BY started_at DESC
    LIMIT ?
  `).all(Math.max(1, Math.trunc(limit)));
  return rows.map(normalizeScanRow).filter((r): r is ScanRun => r !== null);
}

export async function getScanRun(d: DbConn, scanId: string): Promise<(ScanRun & { result: ScanResult | null }) | null> {
  if (!scanId) return null;
  await ensureSchema(d);
  const row = await d.prepare(`
    SELECT ${RUN_COLUMNS}, result_json
    FROM scan_runs
    WHERE scan_id = ?
    LIMIT 1
  `).get(scanId);
  const run = normalizeScanRow(row);
  if (!run || !row) return null;
  const parsed = parseJsonField(row.result_json);
  return { ...run, result: isScanResult(parsed) ? parsed : null };
}

export async function listAuditEvents(d: DbConn, scanId: string) {
  await ensureSchema(d);
  const rows = await d.prepare(`
    SELECT id, scan_id, event_type, symbol, created_at, data_json
    FROM audit_events
    WHERE scan_id = ?
    ORDER BY id ASC
  `).all(scanId);
  return rows.map(normalizeEventRow).filter((e): e is AuditEvent => e !== null);
}

/** Keeps the newest `keep` runs and drops the audit events of the rest. */
export async function pruneScanRuns(d: DbConn, keep = 2000) {
  await ensureSchema(d);
  return d.transaction(async (tx) => {
    const stale = `SELECT scan_id FROM scan_runs ORDER BY started_at DESC LIMIT -1 OFFSET ?`;
    const rows = await tx.prepare(d.driver === 'postgres' ? stale.replace('LIMIT -1 ', '') : stale).all(Math.max(0, Math.trunc(keep)));
    let removed = 0;
    for (const r of rows) {
      const scanId = String(r.scan_id);
      await tx.prepare('DELETE FROM audit_events WHERE scan_id = ?').run(scanId);
      removed += (await tx.prepare('DELETE FROM scan_runs WHERE scan_id = ?').run(scanId)).changes;
    }
    return removed;
  });
}
