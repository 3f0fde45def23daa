import type { ScanConfig } from '../types.js';

export type CliOptions = {
  overrides: Partial<ScanConfig>;
  outputDir: string | null;
  json: boolean;
  quiet: boolean;
};

export function getArgValue(argv: readonly string[], name: string): string | undefined {
  const idx = argv.indexOf(name);
  if (idx === -1) return undefined;
  return argv[idx + 1];
}

const list = (v: string) => v.split(',').map((s) => s.trim()).filter(Boolean);

/** Flags override the env-derived config; unknown flags are ignored. */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const overrides: Partial<ScanConfig> = {};
  const tfs = getArgValue(argv, '--timeframes');
  if (tfs) overrides.timeframes = list(tfs);
  const required = getArgValue(argv, '--required');
  if (required) overrides.requiredTimeframes = list(required);

  const numeric: Array<[string, 'minScore' | 'maxPairs' | 'maxWorkers' | 'topSetupsLimit']> = [
    ['--min-score', 'minScore'],
    ['--max-pairs', 'maxPairs'],
    ['--workers', 'maxWorkers'],
    ['--top', 'topSetupsLimit'],
  ];
  for (const [flag, key] of numeric) {
    const raw = getArgValue(argv, flag);
    if (raw !== undefined) overrides[key] = Number(raw);
  }
  const deadline = getArgValue(argv, '--deadline-ms');
  if (deadline !== undefined) overrides.deadlineMs = Number(deadline) > 0 ? Number(deadline) : null;

  return {
    overrides,
    outputDir: getArgValue(argv, '--output') ?? null,
    json: argv.includes('--json'),
    quiet: argv.includes('--quiet'),
  };
}
