import { v4 as uuidv4 } from 'uuid';
import type { Database, SqlValue } from 'sql.js';
import { getDatabase, saveDatabase, queryRows, asText, asNumber, inTransaction, Row } from '../db/connection.js';
import { Period } from '../types/certificate.js';
import { ResolverMode } from '../types/reference.js';
import { ReconciliationRecord, CategoryTotals, Deviation } from '../types/output.js';
import { monthNumber } from '../utils/periods.js';
import { LedgerWriteError } from '../errors.js';

export interface Ledger {
    path: string;
    db: Database;
}

function initializeSchema(database: Database): void {
    database.run(`
    CREATE TABLE IF NOT EXISTS flagged_records (
      id TEXT PRIMARY KEY,
      year INTEGER NOT NULL,
      month TEXT NOT NULL,
      month_number INTEGER NOT NULL,
      source_file TEXT NOT NULL,
      contractor TEXT NOT NULL,
      item_code TEXT NOT NULL,
      description TEXT NOT NULL,
      unit TEXT NOT NULL,
      declared_unit_price REAL NOT NULL,
      reference_unit_price REAL NOT NULL,
      declared_quantity REAL NOT NULL,
      adjusted_value REAL NOT NULL,
      deviation TEXT NOT NULL,
      mode TEXT NOT NULL,
      recorded_at TEXT NOT NULL
    )
  `);

    database.run(`
    CREATE TABLE IF NOT EXISTS category_totals (
      id TEXT PRIMARY KEY,
      year INTEGER NOT NULL,
      month TEXT NOT NULL,
      month_number INTEGER NOT NULL,
      source_file TEXT NOT NULL,
      contractor TEXT NOT NULL,
      excavation REAL NOT NULL,
      backfill REAL NOT NULL,
      concrete_mr REAL NOT NULL,
      concrete_stamped REAL NOT NULL,
      mode TEXT NOT NULL,
      recorded_at TEXT NOT NULL
    )
  `);

    database.run(`CREATE INDEX IF NOT EXISTS idx_flagged_records_period ON flagged_records(year, month)`);
    database.run(`CREATE INDEX IF NOT EXISTS idx_category_totals_period ON category_totals(year, month)`);
}

export async function openLedger(dbPath: string): Promise<Ledger> {
    const db = await getDatabase(dbPath, initializeSchema);
    return { path: dbPath, db };
}

/**
 * Replaces everything stored for the period with the given results.
 * Re-running a period therefore supersedes its previous results.
 */
export function replacePeriod(
    ledger: Ledger,
    period: Period,
    records: ReconciliationRecord[],
    totals: CategoryTotals[]
): void {
    const now = new Date().toISOString();
    const periodKey: SqlValue[] = [period.year, period.month];

    inTransaction(ledger.db, () => {
        ledger.db.run(`DELETE FROM flagged_records WHERE year = ? AND month = ?`, periodKey);
        ledger.db.run(`DELETE FROM category_totals WHERE year = ? AND month = ?`, periodKey);

        for (const record of records) {
            ledger.db.run(`
        INSERT INTO flagged_records
        (id, year, month, month_number, source_file, contractor, item_code, description, unit,
         declared_unit_price, reference_unit_price, declared_quantity, adjusted_value, deviation, mode, recorded_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `, [
                uuidv4(),
                period.year,
                period.month,
                period.monthNumber,
                record.sourceFile,
                record.contractor,
                record.itemCode,
                record.description,
                record.unit,
                record.declaredUnitPrice,
                record.referenceUnitPrice,
                record.declaredQuantity,
                record.adjustedValue,
                record.deviation,
                record.mode,
                now,
            ]);
        }

        for (const total of totals) {
            ledger.db.run(`
        INSERT INTO category_totals
        (id, year, month, month_number, source_file, contractor, excavation, backfill, concrete_mr, concrete_stamped, mode, recorded_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `, [
                uuidv4(),
                period.year,
                period.month,
                period.monthNumber,
                total.sourceFile,
                total.contractor,
                total.EXCAVATION,
                total.BACKFILL,
                total.CONCRETE_MR,
                total.CONCRETE_STAMPED,
                total.mode,
                now,
            ]);
        }
    });

    try {
        saveDatabase(ledger.path);
    } catch (error) {
        throw new LedgerWriteError(ledger.path, { cause: error });
    }
}

function periodFilter(period?: Period): { where: string; params: SqlValue[] } {
    return period
        ? { where: 'WHERE year = ? AND month = ?', params: [period.year, period.month] }
        : { where: '', params: [] };
}

function toMode(value: SqlValue): ResolverMode {
    return value === 'keyword' ? 'keyword' : 'exact';
}

function toDeviation(value: SqlValue): Deviation {
    return value === 'underpaid' ? 'underpaid' : 'overpaid';
}

function toRecord(row: Row): ReconciliationRecord {
    return {
        year: asNumber(row.year) ?? 0,
        month: asText(row.month) ?? '',
        sourceFile: asText(row.source_file) ?? '',
        contractor: asText(row.contractor) ?? '',
        itemCode: asText(row.item_code) ?? '',
        description: asText(row.description) ?? '',
        unit: asText(row.unit) ?? '',
        declaredUnitPrice: asNumber(row.declared_unit_price) ?? 0,
        referenceUnitPrice: asNumber(row.reference_unit_price) ?? 0,
        declaredQuantity: asNumber(row.declared_quantity) ?? 0,
        adjustedValue: asNumber(row.adjusted_value) ?? 0,
        deviation: toDeviation(row.deviation),
        mode: toMode(row.mode),
    };
}

function toTotals(row: Row): CategoryTotals {
    return {
        year: asNumber(row.year) ?? 0,
        month: asText(row.month) ?? '',
        sourceFile: asText(row.source_file) ?? '',
        contractor: asText(row.contractor) ?? '',
        EXCAVATION: asNumber(row.excavation) ?? 0,
        BACKFILL: asNumber(row.backfill) ?? 0,
        CONCRETE_MR: asNumber(row.concrete_mr) ?? 0,
        CONCRETE_STAMPED: asNumber(row.concrete_stamped) ?? 0,
        mode: toMode(row.mode),
    };
}

export function getLedgerRecords(ledger: Ledger, period?: Period): ReconciliationRecord[] {
    const { where, params } = periodFilter(period);
    return queryRows(
        ledger.db,
        `SELECT * FROM flagged_records ${where} ORDER BY year, month_number, rowid`,
        params
    ).map(toRecord);
}

export function getLedgerCategoryTotals(ledger: Ledger, period?: Period): CategoryTotals[] {
    const { where, params } = periodFilter(period);
    return queryRows(
        ledger.db,
        `SELECT * FROM category_totals ${where} ORDER BY year, month_number, rowid`,
        params
    ).map(toTotals);
}

export function listLedgerPeriods(ledger: Ledger): Period[] {
    return queryRows(
        ledger.db,
        `SELECT DISTINCT year, month, month_number FROM (
           SELECT year, month, month_number FROM flagged_records
           UNION SELECT year, month, month_number FROM category_totals
         ) ORDER BY year, month_number`
    ).map(row => {
        const month = asText(row.month) ?? '';
        return { year: asNumber(row.year) ?? 0, month, monthNumber: asNumber(row.month_number) ?? monthNumber(month) };
    });
}
