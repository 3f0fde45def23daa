import type { ScanState } from './types.js';

export type ErrorCode =
  | 'DATA_UNAVAILABLE'
  | 'INSUFFICIENT_DATA'
  | 'CONFIGURATION'
  | 'CACHE_FETCH'
  | 'CANCELLED'
  | 'SCAN_FAILED';

export class ScannerError extends Error {
  constructor(readonly code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Exchange or collaborator fetch failed (network, HTTP status, malformed payload). */
export class DataUnavailableError extends ScannerError {
  constructor(message: string, readonly context: { symbol?: string; timeframe?: string } = {}, options?: { cause?: unknown }) {
    super('DATA_UNAVAILABLE', message, options);
  }
}

export class InsufficientDataError extends ScannerError {
  constructor(readonly indicator: string, readonly required: number, readonly available: number) {
    super('INSUFFICIENT_DATA', `${indicator} needs ${required} candles, got ${available}`);
  }
}

export class ConfigurationError extends ScannerError {
  constructor(readonly issues: string[]) {
    super('CONFIGURATION', `Invalid scan config: ${issues.join('; ')}`);
  }
}

export class CacheFetchError extends ScannerError {
  constructor(readonly key: string, cause: unknown) {
    super('CACHE_FETCH', `fetch for ${key} failed: ${describeError(cause)}`, { cause });
  }
}

export class ScanCancelledError extends ScannerError {
  constructor(readonly symbol: string) {
    super('CANCELLED', `scan cancelled before ${symbol} finished`);
  }
}

export class ScanFailedError extends ScannerError {
  constructor(readonly scanId: string, readonly state: ScanState, cause: unknown) {
    super('SCAN_FAILED', `scan ${scanId} failed during ${state}: ${describeError(cause)}`, { cause });
  }
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

/** Unwraps cache wrappers so callers see the collaborator's own error. */
export function rootCause(e: unknown): unknown {
  let cur = e;
  while (cur instanceof CacheFetchError && cur.cause !== undefined) cur = cur.cause;
  return cur;
}
