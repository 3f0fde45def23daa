import fs from 'node:fs/promises';
import path from 'node:path';
import { fmtPrice } from './emailTemplates.js';
import type { ScanResult } from './types.js';

function stamp(ms: number) {
  // YYYYMMDD_HHMMSS in UTC
  const iso = new Date(ms).toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
}

export function resultFileName(result: ScanResult) {
  return `scan_${result.scanId}_${stamp(result.metadata.finishedAt)}.json`;
}

export function toJson(result: ScanResult, pretty = true) {
  return JSON.stringify(result, null, pretty ? 2 : undefined);
}

export async function writeScanResult(result: ScanResult, dir: string) {
  await fs.mkdir(dir, { recursive: true });
  const file = path.join(dir, resultFileName(result));
  await fs.writeFile(file, toJson(result), 'utf8');
  return file;
}

export function formatSummary(result: ScanResult): string[] {
  const { metadata } = result;
  const lines = [
    `Scan ${result.scanId} on ${result.exchange} (${metadata.timeframes.join(', ')})`,
    `Pairs scanned: ${result.totalPairsScanned}/${metadata.pairsSelected}, setups: ${result.totalSetupsFound}, skipped: ${metadata.skipped.count}` +
      (metadata.cancelled ? ' [cancelled]' : ''),
  ];
  result.setups.forEach((s, i) => {
    lines.push(
      `${i + 1}. ${s.symbol} ${s.direction} score ${s.score.toFixed(1)} conf ${(s.confidence * 100).toFixed(0)}% ` +
        `entry ${fmtPrice(s.entryPlan[0])} stop ${fmtPrice(s.stopLoss)} tp ${s.takeProfits.map(fmtPrice).join('/')}`,
    );
  });
  return lines;
}
