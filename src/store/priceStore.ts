import { v4 as uuidv4 } from 'uuid';
import type { Database, SqlValue } from 'sql.js';
import { getDatabase, saveDatabase, queryRows, asText, asNumber, inTransaction, Row } from '../db/connection.js';
import { PriceReferenceEntry, PriceInput, PriceLogEntry } from '../types/reference.js';
import { normalizeText, normalizeUnit } from '../utils/normalize.js';
import { PriceStoreError } from '../errors.js';

export interface PriceStore {
    path: string;
    db: Database;
}

function initializeSchema(database: Database): void {
    database.run(`
    CREATE TABLE IF NOT EXISTS reference_prices (
      id TEXT PRIMARY KEY,
      activity TEXT NOT NULL,
      activity_norm TEXT NOT NULL,
      unit TEXT,
      unit_norm TEXT NOT NULL DEFAULT '',
      price REAL NOT NULL,
      updated_at TEXT NOT NULL,
      UNIQUE (activity_norm, unit_norm)
    )
  `);

    // One row per real change, written by upsertPrices/removeActivity
    database.run(`
    CREATE TABLE IF NOT EXISTS price_log (
      id TEXT PRIMARY KEY,
      activity_norm TEXT NOT NULL,
      unit_norm TEXT NOT NULL,
      price_old REAL,
      price_new REAL,
      unit_old TEXT,
      unit_new TEXT,
      changed_at TEXT NOT NULL
    )
  `);

    database.run(`CREATE INDEX IF NOT EXISTS idx_price_log_activity ON price_log(activity_norm, unit_norm)`);
}

export async function openPriceStore(dbPath: string): Promise<PriceStore> {
    const db = await getDatabase(dbPath, initializeSchema);
    return { path: dbPath, db };
}

function toEntry(row: Row): PriceReferenceEntry {
    return {
        id: asText(row.id) ?? '',
        activity: asText(row.activity) ?? '',
        activityNorm: asText(row.activity_norm) ?? '',
        unit: asText(row.unit),
        unitNorm: asText(row.unit_norm) ?? '',
        price: asNumber(row.price) ?? 0,
        updatedAt: asText(row.updated_at) ?? '',
    };
}

/**
 * Snapshot of every reference price, ordered by activity.
 */
export function loadReferenceEntries(store: PriceStore): PriceReferenceEntry[] {
    return queryRows(
        store.db,
        `SELECT * FROM reference_prices ORDER BY activity_norm, unit_norm`
    ).map(toEntry);
}

export function findReferencePrice(store: PriceStore, activity: string, unit?: string | null): PriceReferenceEntry | null {
    const rows = queryRows(
        store.db,
        `SELECT * FROM reference_prices WHERE activity_norm = ? AND unit_norm = ? LIMIT 1`,
        [normalizeText(activity) ?? '', normalizeUnit(unit)]
    );
    return rows.length > 0 ? toEntry(rows[0]) : null;
}

interface NormalizedInput {
    activity: string;
    activityNorm: string;
    unit: string | null;
    unitNorm: string;
    price: number;
}

function normalizeInputs(inputs: PriceInput[]): NormalizedInput[] {
    const byKey = new Map<string, NormalizedInput>();

    inputs.forEach((input, idx) => {
        const activity = (input.activity ?? '').trim();
        const activityNorm = normalizeText(activity);
        if (!activity || !activityNorm) return;

        if (!Number.isFinite(input.price) || input.price <= 0) {
            throw new PriceStoreError(`Invalid price for "${activity}" at position ${idx}: ${input.price}`);
        }

        const unit = input.unit ? input.unit.trim() || null : null;
        const unitNorm = normalizeUnit(unit);
        // Later duplicates replace earlier ones
        const key = `${activityNorm}\u0000${unitNorm}`;
        byKey.delete(key);
        byKey.set(key, { activity, activityNorm, unit, unitNorm, price: input.price });
    });

    return [...byKey.values()];
}

/**
 * Inserts or updates prices keyed by (normalized activity, normalized unit).
 * Returns the number of rows whose price or unit actually changed.
 */
export function upsertPrices(
    store: PriceStore,
    inputs: PriceInput[],
    options: { logChanges?: boolean } = {}
): number {
    const logChanges = options.logChanges ?? true;
    const rows = normalizeInputs(inputs);
    if (rows.length === 0) return 0;

    const now = new Date().toISOString();
    let changed = 0;

    inTransaction(store.db, () => {
        for (const row of rows) {
            const previous = queryRows(
                store.db,
                `SELECT price, unit FROM reference_prices WHERE activity_norm = ? AND unit_norm = ?`,
                [row.activityNorm, row.unitNorm]
            )[0];
            const priceOld = previous ? asNumber(previous.price) : null;
            const unitOld = previous ? asText(previous.unit) : null;

            store.db.run(`
        INSERT INTO reference_prices (id, activity, activity_norm, unit, unit_norm, price, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(activity_norm, unit_norm) DO UPDATE SET
          activity = excluded.activity,
          unit = excluded.unit,
          price = excluded.price,
          updated_at = excluded.updated_at
      `, [uuidv4(), row.activity, row.activityNorm, row.unit, row.unitNorm, row.price, now]);

            const isChange = !previous || priceOld !== row.price || (unitOld ?? null) !== row.unit;
            if (!isChange) continue;
            changed++;

            if (logChanges) {
                insertLog(store.db, row.activityNorm, row.unitNorm, priceOld, row.price, unitOld, row.unit, now);
            }
        }
    });

    saveDatabase(store.path);
    return changed;
}

export function removeActivity(
    store: PriceStore,
    activity: string,
    unit?: string | null,
    options: { logDelete?: boolean } = {}
): boolean {
    const existing = findReferencePrice(store, activity, unit);
    if (!existing) return false;

    const now = new Date().toISOString();
    inTransaction(store.db, () => {
        if (options.logDelete ?? true) {
            insertLog(store.db, existing.activityNorm, existing.unitNorm, existing.price, null, existing.unit, null, now);
        }
        store.db.run(`DELETE FROM reference_prices WHERE id = ?`, [existing.id]);
    });

    saveDatabase(store.path);
    return true;
}

function insertLog(
    db: Database,
    activityNorm: string,
    unitNorm: string,
    priceOld: number | null,
    priceNew: number | null,
    unitOld: string | null,
    unitNew: string | null,
    changedAt: string
): void {
    const params: SqlValue[] = [uuidv4(), activityNorm, unitNorm, priceOld, priceNew, unitOld, unitNew, changedAt];
    db.run(`
    INSERT INTO price_log (id, activity_norm, unit_norm, price_old, price_new, unit_old, unit_new, changed_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `, params);
}

export function getPriceLog(store: PriceStore): PriceLogEntry[] {
    return queryRows(store.db, `SELECT * FROM price_log ORDER BY changed_at ASC, rowid ASC`).map(row => ({
        id: asText(row.id) ?? '',
        activityNorm: asText(row.activity_norm) ?? '',
        unitNorm: asText(row.unit_norm) ?? '',
        priceOld: asNumber(row.price_old),
        priceNew: asNumber(row.price_new),
        unitOld: asText(row.unit_old),
        unitNew: asText(row.unit_new),
        changedAt: asText(row.changed_at) ?? '',
    }));
}

export function checkIntegrity(store: PriceStore): { ok: boolean; detail: string } {
    const rows = queryRows(store.db, `PRAGMA integrity_check`);
    if (rows.length === 0) {
        return { ok: false, detail: 'integrity_check returned no rows' };
    }
    const detail = asText(Object.values(rows[0])[0]) ?? '';
    return { ok: detail.toLowerCase() === 'ok', detail };
}
