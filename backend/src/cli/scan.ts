#!/usr/bin/env node
import 'dotenv/config';
import { createBinanceSource } from '../binance.js';
import { loadScanConfig } from '../config.js';
import { liquidationSourceFromEnv } from '../liquidations.js';
import { formatSummary, toJson, writeScanResult } from '../output.js';
import { createScanner } from '../scanner.js';
import { parseCliArgs } from './args.js';

async function main() {
  const opts = parseCliArgs(process.argv.slice(2));
  const config = { ...loadScanConfig(), ...opts.overrides };

  const abort = new AbortController();
  process.once('SIGINT', () => {
    console.error('[scan] interrupted, finishing in-flight symbols');
    abort.abort();
  });

  const scanner = createScanner({ market: createBinanceSource(), liquidations: liquidationSourceFromEnv() });
  const result = await scanner.scan(
    config,
    opts.quiet || opts.json ? undefined : (done, total, symbol) => console.error(`[scan] ${done}/${total} ${symbol}`),
    { signal: abort.signal },
  );

  if (opts.outputDir) console.error(`[scan] result written to ${await writeScanResult(result, opts.outputDir)}`);
  if (opts.json) console.log(toJson(result));
  else for (const line of formatSummary(result)) console.log(line);
}

main().catch((err) => {
  console.error('[scan] failed', err);
  process.exit(1);
});
