import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import type { DatabaseSettings } from './core/services/ConfigService';
import logger from './logger';

export const MEMORY_DB = ':memory:';

/** Per-connection settings; SQLite does not persist these in the file. */
export function applyPragmas(db: Database.Database, settings: Pick<DatabaseSettings, 'busyTimeoutMs'>) {
    db.pragma('foreign_keys = ON');
    db.pragma(`busy_timeout = ${Math.max(0, Math.floor(settings.busyTimeoutMs))}`);
}

export function openDatabase(settings: DatabaseSettings): Database.Database {
    const isMemory = settings.path === MEMORY_DB;
    if (!isMemory) {
        fs.mkdirSync(path.dirname(path.resolve(settings.path)), { recursive: true });
    }

    logger.info('[db] Opening database at:', settings.path);
    const db = new Database(settings.path);
    if (!isMemory) db.pragma('journal_mode = WAL');
    applyPragmas(db, settings);
    return db;
}
