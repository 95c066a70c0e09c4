import Database from 'better-sqlite3';
import { readFileSync } from 'fs';
import { logger } from '../config/logger.js';

export type Store = Database.Database;

const SCHEMA_URL = new URL('../../db/schema.sql', import.meta.url);

/**
 * Open the SQLite store and apply the schema. Uniqueness of device ids,
 * API keys and idempotency keys is enforced here, not in process memory.
 */
export function openDatabase(path: string): Store {
    const db = new Database(path);

    if (path !== ':memory:') {
        db.pragma('journal_mode = WAL');
    }
    db.pragma('foreign_keys = ON');
    db.pragma('busy_timeout = 5000');

    db.exec(readFileSync(SCHEMA_URL, 'utf-8'));

    logger.info({ path }, 'Database ready');

    return db;
}

/**
 * True when the store rejected a write because a UNIQUE or PRIMARY KEY
 * constraint already holds the value, i.e. another writer got there first.
 */
export function isUniqueViolation(err: unknown): boolean {
    return err instanceof Database.SqliteError
        && (err.code === 'SQLITE_CONSTRAINT_UNIQUE' || err.code === 'SQLITE_CONSTRAINT_PRIMARYKEY');
}

export function isReachable(db: Store): boolean {
    try {
        db.prepare('SELECT 1').get();
        return true;
    } catch (err) {
        logger.warn({ error: err }, 'Database health check failed');
        return false;
    }
}

export function countRows(db: Store, table: 'patients' | 'devices' | 'vitals' | 'idempotency_keys'): number {
    const row = db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get();
    return row?.count ?? 0;
}
