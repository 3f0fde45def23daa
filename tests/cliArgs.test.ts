import fs from 'node:fs/promises';
import { describe, expect, it } from 'vitest';
import { getArgValue, parseCliArgs } from '../backend/src/cli/args.js';

describe('cli args', () => {
  it('reads the value after a flag', () => {
    expect(getArgValue(['--output', 'out'], '--output')).toBe('out');
    expect(getArgValue(['--output'], '--output')).toBeUndefined();
    expect(getArgValue([], '--output')).toBeUndefined();
  });

  it('turns flags into config overrides', () => {
    const opts = parseCliArgs([
      '--timeframes', '1h, 4h', '--required', '4h',
      '--min-score', '65', '--workers', '8', '--top', '3',
      '--deadline-ms', '0', '--output', 'results', '--json',
    ]);
    expect(opts).toEqual({
      overrides: {
        timeframes: ['1h', '4h'],
        requiredTimeframes: ['4h'],
        minScore: 65,
        maxWorkers: 8,
        topSetupsLimit: 3,
        deadlineMs: null,
      },
      outputDir: 'results',
      json: true,
      quiet: false,
    });
  });

  it('leaves the config alone without flags', () => {
    expect(parseCliArgs(['--quiet'])).toEqual({ overrides: {}, outputDir: null, json: false, quiet: true });
  });
});

describe('cli entry point', () => {
  it('starts with a node shebang so the bin link runs', async () => {
    const source = await fs.readFile(new URL('../backend/src/cli/scan.ts', import.meta.url), 'utf8');
    expect(source.split('\n')[0]).toBe('#!/usr/bin/env node');
  });
});
