import path from 'path';
import { fileURLToPath } from 'url';

const BACKEND_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

/** Relative paths are taken from the backend directory; ':memory:' passes through. */
export function resolveDbPath(p: string, base = BACKEND_DIR) {
  if (p === ':memory:') return p;
  return path.isAbsolute(p) ? p : path.resolve(base, p);
}

export const DB_PATH = resolveDbPath(process.env.DB_PATH || 'data/scanner.db');
