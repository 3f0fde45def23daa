import type { DbDriver } from './db.js';

const SQLITE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS scan_runs (
    scan_id TEXT PRIMARY KEY,
    exchange TEXT NOT NULL,
    status TEXT NOT NULL,
    config_hash TEXT,
    started_at INTEGER NOT NULL,
    finished_at INTEGER,
    duration_ms INTEGER,
    pairs_scanned INTEGER,
    setups_found INTEGER,
    skipped_count INTEGER,
    cancelled INTEGER NOT NULL DEFAULT 0,
    result_json TEXT,
    error_message TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_scan_runs_started_at ON scan_runs(started_at);
  CREATE INDEX IF NOT EXISTS idx_scan_runs_status ON scan_runs(status);

  CREATE TABLE IF NOT EXISTS audit_events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    scan_id TEXT NOT NULL,
    event_type TEXT NOT NULL,
    symbol TEXT,
    created_at INTEGER NOT NULL,
    data_json TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_audit_events_scan ON audit_events(scan_id);

  CREATE TABLE IF NOT EXISTS kv (key TEXT PRIMARY KEY, value TEXT NOT NULL);

  CREATE TABLE IF NOT EXISTS push_subscriptions (
    endpoint TEXT PRIMARY KEY,
    keys_p256dh TEXT NOT NULL,
    keys_auth TEXT NOT NULL,
    created_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS email_guard (
    key TEXT PRIMARY KEY,
    last_sent_ms INTEGER NOT NULL
  );
`;

const POSTGRES_SCHEMA = `
  CREATE TABLE IF NOT EXISTS scan_runs (
    scan_id TEXT PRIMARY KEY,
    exchange TEXT NOT NULL,
    status TEXT NOT NULL,
    config_hash TEXT,
    started_at BIGINT NOT NULL,
    finished_at BIGINT,
    duration_ms BIGINT,
    pairs_scanned INTEGER,
    setups_found INTEGER,
    skipped_count INTEGER,
    cancelled INTEGER NOT NULL DEFAULT 0,
    result_json TEXT,
    error_message TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_scan_runs_started_at ON scan_runs(started_at);
  CREATE INDEX IF NOT EXISTS idx_scan_runs_status ON scan_runs(status);

  CREATE TABLE IF NOT EXISTS audit_events (
    id BIGSERIAL PRIMARY KEY,
    scan_id TEXT NOT NULL,
    event_type TEXT NOT NULL,
    symbol TEXT,
    created_at BIGINT NOT NULL,
    data_json TEXT
  );
  CREATE INDEX IF NOT EXISTS idx_audit_events_scan ON audit_events(scan_id);

  CREATE TABLE IF NOT EXISTS kv (key TEXT PRIMARY KEY, value TEXT NOT NULL);

  CREATE TABLE IF NOT EXISTS push_subscriptions (
    endpoint TEXT PRIMARY KEY,
    keys_p256dh TEXT NOT NULL,
    keys_auth TEXT NOT NULL,
    created_at BIGINT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS email_guard (
    key TEXT PRIMARY KEY,
    last_sent_ms BIGINT NOT NULL
  );
`;

export function schemaFor(driver: DbDriver) {
  return driver === 'postgres' ? POSTGRES_SCHEMA : SQLITE_SCHEMA;
}
