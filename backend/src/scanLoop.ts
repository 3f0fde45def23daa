import type { DbConn } from './db/db.js';
import { emailNotifySetups } from './emailNotifier.js';
import { describeError, ScanFailedError } from './errors.js';
import { pushPayloadFor, pushToAll } from './notifier.js';
import { writeScanResult } from './output.js';
import { failScanRun, finishScanRun, pruneScanRuns, recordAuditEvent, startScanRun } from './scanStore.js';
import type { Scanner } from './scanner.js';
import type { ProgressCallback, ScanConfig, ScanResult } from './types.js';

export type ScanServiceDeps = {
  scanner: Scanner;
  loadConfig: () => ScanConfig;
  db?: DbConn | null;
  outputDir?: string | null;
  notify?: boolean;
  keepRuns?: number;
};

export interface ScanService {
  /** Runs one scan; a call made while a scan is running joins it. */
  scanOnce(onProgress?: ProgressCallback): Promise<ScanResult>;
  startLoop(intervalMs: number, onUpdate?: (result: ScanResult) => void): () => void;
  latest(): ScanResult | null;
  isRunning(): boolean;
}

export function createScanService(deps: ScanServiceDeps): ScanService {
  const db = deps.db ?? null;
  let running: Promise<ScanResult> | null = null;
  let last: ScanResult | null = null;

  async function afterScan(result: ScanResult) {
    if (db) {
      try {
        await finishScanRun(db, result);
        if (deps.keepRuns) await pruneScanRuns(db, deps.keepRuns);
      } catch (e) {
        console.error('[db] failed to store scan result', e);
      }
    }
    if (deps.outputDir) {
      try {
        const file = await writeScanResult(result, deps.outputDir);
        console.log(`[scan] result written to ${file}`);
      } catch (e) {
        console.error('[scan] failed to write result file', e);
      }
    }
    if (!deps.notify || result.setups.length === 0) return;
    try {
      const emailed = await emailNotifySetups(db, result);
      if (db) {
        for (const s of emailed) {
          await recordAuditEvent(db, result.scanId, 'alert_sent', { channel: 'email', direction: s.direction, score: s.score }, { symbol: s.symbol });
        }
      }
    } catch (e) {
      console.error('[email] notify error', e);
    }
    if (db) {
      try {
        const delivered = await pushToAll(db, pushPayloadFor(result));
        if (delivered > 0) await recordAuditEvent(db, result.scanId, 'alert_sent', { channel: 'push', delivered });
      } catch (e) {
        console.error('[push] notify error', e);
      }
    }
  }

  async function run(onProgress?: ProgressCallback) {
    const config = deps.loadConfig();
    try {
      const result = await deps.scanner.scan(config, onProgress, {
        onStart: db ? (info) => startScanRun(db, info).then(() => undefined) : undefined,
      });
      last = result;
      await afterScan(result);
      return result;
    } catch (e) {
      if (db && e instanceof ScanFailedError) {
        try {
          await failScanRun(db, e.scanId, describeError(e.cause));
        } catch (dbErr) {
          console.error('[db] failed to record scan failure', dbErr);
        }
      }
      throw e;
    }
  }

  function scanOnce(onProgress?: ProgressCallback) {
    if (running) return running;
    const p = run(onProgress).finally(() => {
      running = null;
    });
    running = p;
    return p;
  }

  function startLoop(intervalMs: number, onUpdate?: (result: ScanResult) => void) {
    let stopped = false;
    let timer: NodeJS.Timeout | null = null;
    const loop = async () => {
      try {
        const res = await scanOnce();
        onUpdate?.(res);
      } catch (e) {
        console.error('[scan] loop iteration failed:', describeError(e));
      } finally {
        if (!stopped) timer = setTimeout(() => void loop(), intervalMs);
      }
    };
    void loop();
    return () => {
      stopped = true;
      if (timer) clearTimeout(timer);
    };
  }

  return {
    scanOnce,
    startLoop,
    latest: () => last,
    isRunning: () => running !== null,
  };
}
