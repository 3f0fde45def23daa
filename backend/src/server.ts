import 'dotenv/config';
import { createApp } from './app.js';
import { closeDb, ensureSchema, getDb, readBoolEnv, readIntEnv } from './db/db.js';
import { liquidationSourceFromEnv } from './liquidations.js';
import { createBinanceSource } from './binance.js';
import { loadScanConfig } from './config.js';
import { createScanner } from './scanner.js';
import { createScanService } from './scanLoop.js';
import { createMarketCaches } from './ttlCache.js';

const SCAN_INTERVAL_MS = readIntEnv('SCAN_INTERVAL_MS', 5 * 60_000, 10_000);
const config = loadScanConfig();

const db = readBoolEnv('DB_ENABLED', true) ? getDb() : null;
if (db) await ensureSchema(db);

const scanner = createScanner({
  market: createBinanceSource(),
  liquidations: liquidationSourceFromEnv(),
  caches: createMarketCaches(config.cacheTtl),
});

const service = createScanService({
  scanner,
  loadConfig: loadScanConfig,
  db,
  outputDir: process.env.OUTPUT_DIR || null,
  notify: readBoolEnv('NOTIFY_ENABLED', true),
  keepRuns: readIntEnv('KEEP_SCAN_RUNS', 2000, 1),
});

const app = createApp(service, db);
const port = parseInt(process.env.PORT || '8080', 10);
const server = app.listen(port, () => console.log(`[server] listening on http://localhost:${port}`));

const stopLoop = readBoolEnv('SCAN_LOOP_ENABLED', true)
  ? service.startLoop(SCAN_INTERVAL_MS, (r) => console.log(`[scan] ${r.scanId}: ${r.totalSetupsFound} setup(s)`))
  : null;

process.once('SIGTERM', () => {
  console.log('[server] shutting down');
  stopLoop?.();
  server.close(() => {
    closeDb().catch((e) => console.error('[db] close failed', e));
  });
});
