/**
 * SQLite Database Adapter
 *
 * Connection lifecycle plus the decision log repository.
 */

export { initDb, getDb, closeDb, checkIntegrity, runMigrations } from './connection';
export type { InitDbOptions, IntegrityCheckResult } from './connection';

export { createDecisionLogRepo } from './decision-log-repo';
