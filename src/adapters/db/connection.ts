/**
 * Database Connection Management
 *
 * Handles SQLite connection lifecycle: init, get, close.
 * Repositories receive getDb() rather than a connection.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

// ============================================
// Connection State
// ============================================

let db: Database.Database | null = null;

const REQUIRED_TABLES = ['decisions'];

// ============================================
// Connection Lifecycle
// ============================================

export interface InitDbOptions {
  checkIntegrity?: boolean;
}

export function initDb(dbPath: string, schemaPath: string, options?: InitDbOptions): Database.Database {
  if (db) return db;

  // Fail fast rather than run against an empty database
  if (!fs.existsSync(schemaPath)) {
    throw new Error(`Database schema not found: ${schemaPath}`);
  }

  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const conn = new Database(dbPath);
  conn.pragma('journal_mode = WAL');
  conn.pragma('synchronous = NORMAL');
  conn.exec(fs.readFileSync(schemaPath, 'utf-8'));

  const tables = conn
    .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table'")
    .all()
    .map(t => t.name);
  const missing = REQUIRED_TABLES.filter(t => !tables.includes(t));
  if (missing.length > 0) {
    conn.close();
    throw new Error(`Database schema incomplete - missing tables: ${missing.join(', ')}`);
  }

  runMigrations(conn);
  db = conn;

  if (options?.checkIntegrity) {
    const result = runIntegrityCheck(conn, false);
    if (!result.isHealthy) {
      // Keep running; the decision log is an audit trail, not state
      console.warn('[DB] Integrity issues detected on startup:', result.errors);
    }
  }

  return db;
}

export function getDb(): Database.Database {
  if (!db) throw new Error('Database not initialized');
  return db;
}

export function closeDb(): void {
  db?.close();
  db = null;
}

// ============================================
// Migrations
// ============================================

function hasColumn(conn: Database.Database, table: string, column: string): boolean {
  const columns = conn.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
  return columns.some(c => c.name === column);
}

/** Brings a decisions table from an earlier release up to the current schema */
export function runMigrations(conn: Database.Database): void {
  if (!hasColumn(conn, 'decisions', 'importance')) {
    conn.exec(`
      ALTER TABLE decisions ADD COLUMN importance INTEGER NOT NULL DEFAULT 0;
      ALTER TABLE decisions ADD COLUMN importance_level TEXT NOT NULL DEFAULT 'low';
      ALTER TABLE decisions ADD COLUMN follow_up TEXT NOT NULL DEFAULT 'none';
    `);
    console.log('[DB Migration] Added importance columns to decisions');
  }
}

// ============================================
// Database Health
// ============================================

export interface IntegrityCheckResult {
  isHealthy: boolean;
  errors: string[];
}

function runIntegrityCheck(conn: Database.Database, full: boolean): IntegrityCheckResult {
  const pragma = full ? 'integrity_check' : 'quick_check';
  try {
    const rows = conn.prepare<[], Record<string, unknown>>(`PRAGMA ${pragma}`).all();
    const messages = rows.map(row => String(row[pragma] ?? ''));
    if (messages[0] === 'ok') return { isHealthy: true, errors: [] };
    return { isHealthy: false, errors: messages.filter(Boolean) };
  } catch (err) {
    return {
      isHealthy: false,
      errors: [`Failed to run integrity check: ${err instanceof Error ? err.message : String(err)}`],
    };
  }
}

/**
 * Runs SQLite's own consistency check on the open database.
 *
 * @param full - `integrity_check` instead of the faster `quick_check`
 */
export async function checkIntegrity(full = false): Promise<IntegrityCheckResult> {
  if (!db) throw new Error('Database not initialized');
  return runIntegrityCheck(db, full);
}
