import initSqlJs from 'sql.js';
import type { Database, SqlJsStatic, SqlValue } from 'sql.js';
import * as fs from 'fs';
import * as path from 'path';

export const IN_MEMORY = ':memory:';

let sqlModule: Promise<SqlJsStatic> | null = null;
const open = new Map<string, Database>();

function getSqlModule(): Promise<SqlJsStatic> {
    if (!sqlModule) sqlModule = initSqlJs();
    return sqlModule;
}

/**
 * Opens (or returns the already open) database stored at dbPath.
 * The schema initializer runs on every open; it must use IF NOT EXISTS.
 */
export async function getDatabase(
    dbPath: string,
    initializeSchema: (database: Database) => void
): Promise<Database> {
    const existing = open.get(dbPath);
    if (existing) return existing;

    const SQL = await getSqlModule();
    let db: Database;

    if (dbPath !== IN_MEMORY && fs.existsSync(dbPath)) {
        db = new SQL.Database(fs.readFileSync(dbPath));
    } else {
        db = new SQL.Database();
    }

    initializeSchema(db);
    open.set(dbPath, db);
    return db;
}

export function saveDatabase(dbPath: string): void {
    const db = open.get(dbPath);
    if (!db || dbPath === IN_MEMORY) return;

    // Ensure data directory exists
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    fs.writeFileSync(dbPath, Buffer.from(db.export()));
}

export function closeDatabase(dbPath: string): void {
    const db = open.get(dbPath);
    if (!db) return;

    saveDatabase(dbPath);
    db.close();
    open.delete(dbPath);
}

export function closeAllDatabases(): void {
    for (const dbPath of [...open.keys()]) {
        closeDatabase(dbPath);
    }
}

export function resetDatabase(dbPath: string): void {
    const db = open.get(dbPath);
    if (db) {
        db.close();
        open.delete(dbPath);
    }
    if (dbPath !== IN_MEMORY && fs.existsSync(dbPath)) {
        fs.unlinkSync(dbPath);
    }
}

export type Row = Record<string, SqlValue>;

/**
 * Runs a SELECT and returns rows as column-name keyed objects.
 */
export function queryRows(db: Database, sql: string, params: SqlValue[] = []): Row[] {
    const result = db.exec(sql, params);
    if (result.length === 0) return [];

    const { columns, values } = result[0];
    return values.map(row => {
        const mapped: Row = {};
        columns.forEach((column, idx) => {
            mapped[column] = row[idx];
        });
        return mapped;
    });
}

export function asText(value: SqlValue | undefined): string | null {
    if (value === null || value === undefined) return null;
    return typeof value === 'string' ? value : String(value);
}

export function asNumber(value: SqlValue | undefined): number | null {
    if (typeof value === 'number') return value;
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isNaN(parsed) ? null : parsed;
    }
    return null;
}

/**
 * Runs work inside BEGIN/COMMIT, rolling back if it throws.
 */
export function inTransaction<T>(db: Database, work: () => T): T {
    db.run('BEGIN');
    try {
        const result = work();
        db.run('COMMIT');
        return result;
    } catch (error) {
        db.run('ROLLBACK');
        throw error;
    }
}
