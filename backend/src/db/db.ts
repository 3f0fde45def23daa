import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import pg from 'pg';
import { DB_PATH } from '../dbPath.js';
import { schemaFor } from './schema.js';

const { Pool } = pg;

export type DbDriver = 'sqlite' | 'postgres';
export type SqlValue = string | number | bigint | null;
export type Row = Record<string, unknown>;

type RunResult = { changes: number };

export interface DbStmt {
  get(...params: SqlValue[]): Promise<Row | undefined>;
  all(...params: SqlValue[]): Promise<Row[]>;
  run(...params: SqlValue[]): Promise<RunResult>;
}

export interface DbConn {
  driver: DbDriver;
  exec(sql: string): Promise<void>;
  prepare(sql: string): DbStmt;
  /** Runs `fn` inside BEGIN/COMMIT; statements must go through `tx`. */
  transaction<T>(fn: (tx: DbConn) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

let db: DbConn | null = null;
const schemaReady = new WeakSet<DbConn>();

export function resolveDriver(env: Record<string, string | undefined> = process.env): DbDriver {
  const driverEnv = String(env.DB_DRIVER || '').toLowerCase();
  if (driverEnv === 'postgres' || driverEnv === 'pg') return 'postgres';
  if (driverEnv === 'sqlite') return 'sqlite';
  return env.DATABASE_URL ? 'postgres' : 'sqlite';
}

export function getDb(): DbConn {
  if (db) return db;
  if (resolveDriver() === 'postgres') {
    const url = process.env.DATABASE_URL;
    if (!url) throw new Error('DATABASE_URL is required for postgres DB_DRIVER');
    db = createPostgresDb(url);
  } else {
    db = createSqliteDb(DB_PATH);
  }
  return db;
}

/** Creates the tables once per connection. */
export async function ensureSchema(d: DbConn) {
  if (schemaReady.has(d)) return;
  await d.exec(schemaFor(d.driver));
  schemaReady.add(d);
}

export async function closeDb() {
  if (!db) return;
  const current = db;
  db = null;
  await current.close();
}

function isRow(v: unknown): v is Row {
  return typeof v === 'object' && v !== null;
}

export function createSqliteDb(file: string): DbConn {
  if (file !== ':memory:') fs.mkdirSync(path.dirname(file), { recursive: true });
  const sqlite = new Database(file);
  if (file !== ':memory:') sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('synchronous = NORMAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  const conn: DbConn = {
    driver: 'sqlite',
    async exec(sql: string) {
      sqlite.exec(sql);
    },
    prepare(sql: string) {
      const stmt = sqlite.prepare(sql);
      return {
        async get(...params: SqlValue[]) {
          const row: unknown = stmt.get(...params);
          return isRow(row) ? row : undefined;
        },
        async all(...params: SqlValue[]) {
          const rows: unknown[] = stmt.all(...params);
          return rows.filter(isRow);
        },
        async run(...params: SqlValue[]) {
          const res = stmt.run(...params);
          return { changes: res.changes };
        },
      };
    },
    async transaction<T>(fn: (tx: DbConn) => Promise<T>) {
      sqlite.exec('BEGIN');
      try {
        const result = await fn(conn);
        sqlite.exec('COMMIT');
        return result;
      } catch (e) {
        if (sqlite.inTransaction) sqlite.exec('ROLLBACK');
        throw e;
      }
    },
    async close() {
      sqlite.close();
    },
  };
  return conn;
}

type QueryFn = (text: string, values: SqlValue[]) => Promise<{ rows: Row[]; rowCount: number | null }>;

function pgStatements(query: QueryFn, sql: string): DbStmt {
  const text = compileSql(sql);
  return {
    async get(...params: SqlValue[]) {
      const res = await query(text, params);
      return res.rows[0];
    },
    async all(...params: SqlValue[]) {
      const res = await query(text, params);
      return res.rows;
    },
    async run(...params: SqlValue[]) {
      const res = await query(text, params);
      return { changes: res.rowCount || 0 };
    },
  };
}

export function createPostgresDb(url: string): DbConn {
  const sslEnv = String(process.env.PG_SSL || '').toLowerCase();
  const ssl =
    sslEnv === '1' ||
    sslEnv === 'true' ||
    url.includes('sslmode=require') ||
    url.includes('ssl=true')
      ? { rejectUnauthorized: false }
      : undefined;

  const pool = new Pool({
    connectionString: url,
    ssl,
    max: readIntEnv('PG_POOL_MAX', 10, 1, 100),
    idleTimeoutMillis: readIntEnv('PG_IDLE_TIMEOUT_MS', 30_000, 1_000, 300_000),
    connectionTimeoutMillis: readIntEnv('PG_CONNECT_TIMEOUT_MS', 5_000, 500, 120_000),
  });
  pool.on('error', (e) => console.error('[db] idle postgres client error', e));

  return {
    driver: 'postgres',
    async exec(sql: string) {
      await pool.query(sql);
    },
    prepare(sql: string) {
      return pgStatements((text, values) => pool.query(text, values), sql);
    },
    async transaction<T>(fn: (tx: DbConn) => Promise<T>) {
      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        const tx: DbConn = {
          driver: 'postgres',
          async exec(sql: string) {
            await client.query(sql);
          },
          prepare(sql: string) {
            return pgStatements((text, values) => client.query(text, values), sql);
          },
          transaction: (inner) => inner(tx),
          async close() {},
        };
        const result = await fn(tx);
        await client.query('COMMIT');
        return result;
      } catch (e) {
        await client.query('ROLLBACK');
        throw e;
      } finally {
        client.release();
      }
    },
    async close() {
      await pool.end();
    },
  };
}

/** Rewrites `?` placeholders to `$n` and sqlite-only syntax to postgres. */
export function compileSql(sql: string) {
  let text = sql;
  if (/insert\s+or\s+ignore\s+into/i.test(text)) {
    text = text.replace(/insert\s+or\s+ignore\s+into/gi, 'INSERT INTO');
    if (!/on\s+conflict/i.test(text)) text = `${text.replace(/;\s*$/, '')} ON CONFLICT DO NOTHING`;
  }
  let i = 0;
  return text.replace(/\?/g, () => `$${++i}`);
}

export function readBoolEnv(name: string, fallback: boolean) {
  const raw = String(process.env[name] ?? '').trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  return fallback;
}

export function readIntEnv(name: string, fallback: number, min?: number, max?: number) {
  const raw = Number(process.env[name]);
  let out = Number.isFinite(raw) && process.env[name] !== undefined && process.env[name] !== '' ? Math.trunc(raw) : fallback;
  if (typeof min === 'number') out = Math.max(min, out);
  if (typeof max === 'number') out = Math.min(max, out);
  return out;
}
