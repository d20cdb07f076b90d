import { mkdirSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import Database from 'better-sqlite3';

const DEFAULT_DB_PATH = join(homedir(), '.tradebridge', 'tradebridge.sqlite');
const IN_MEMORY = ':memory:';
const INSTANCES = new Map<string, Database.Database>();

// Shipped beside this module; the build copies it into dist/memory.
const SCHEMA_PATH = join(dirname(fileURLToPath(import.meta.url)), 'schema.sql');

export function resolveDatabasePath(dbPath?: string): string {
  return dbPath || process.env.TRADEBRIDGE_DB_PATH || DEFAULT_DB_PATH;
}

export function openDatabase(dbPath?: string): Database.Database {
  const resolvedPath = resolveDatabasePath(dbPath);

  const existing = INSTANCES.get(resolvedPath);
  if (existing) {
    return existing;
  }

  const onDisk = resolvedPath !== IN_MEMORY;
  if (onDisk) {
    mkdirSync(dirname(resolvedPath), { recursive: true });
  }

  const db = new Database(resolvedPath);
  if (onDisk) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.exec(readFileSync(SCHEMA_PATH, 'utf-8'));

  INSTANCES.set(resolvedPath, db);
  return db;
}

export function closeDatabase(dbPath?: string): void {
  const resolvedPath = resolveDatabasePath(dbPath);
  const db = INSTANCES.get(resolvedPath);
  if (!db) return;
  INSTANCES.delete(resolvedPath);
  db.close();
}
