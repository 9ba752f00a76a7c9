import { CATEGORIES } from '../types/certificate.js';
import {
    CategoryAmounts,
    CategoryTotals,
    ContractorCategorySummary,
    ContractorSummary,
    PeriodContractorSummary,
    ReconciliationRecord,
    RegisterRow,
} from '../types/output.js';
import { monthNumber } from '../utils/periods.js';

function byContractor(a: { contractor: string }, b: { contractor: string }): number {
    return a.contractor.localeCompare(b.contractor);
}

/**
 * Flagged items per contractor: count and sum of adjusted values.
 */
export function summarizeByContractor(records: ReconciliationRecord[]): ContractorSummary[] {
    const groups = new Map<string, ContractorSummary>();

    for (const record of records) {
        const summary = groups.get(record.contractor) ?? { contractor: record.contractor, itemCount: 0, adjustedTotal: 0 };
        summary.itemCount++;
        summary.adjustedTotal += record.adjustedValue;
        groups.set(record.contractor, summary);
    }

    return [...groups.values()].sort(byContractor);
}

/**
 * Adds source into target, category by category.
 */
export function mergeCategoryTotals(target: CategoryAmounts, source: CategoryAmounts): void {
    for (const category of CATEGORIES) {
        target[category] += source[category];
    }
}

export function summarizeCategories(totals: CategoryTotals[]): ContractorCategorySummary[] {
    const groups = new Map<string, ContractorCategorySummary>();

    for (const total of totals) {
        const summary = groups.get(total.contractor) ?? {
            contractor: total.contractor,
            EXCAVATION: 0,
            BACKFILL: 0,
            CONCRETE_MR: 0,
            CONCRETE_STAMPED: 0,
        };
        mergeCategoryTotals(summary, total);
        groups.set(total.contractor, summary);
    }

    return [...groups.values()].sort(byContractor);
}

/**
 * Contractor summaries per (year, month), oldest period first.
 */
export function summarizeLedger(records: ReconciliationRecord[]): PeriodContractorSummary[] {
    const groups = new Map<string, PeriodContractorSummary>();

    for (const record of records) {
        const key = `${record.year}|${record.month}|${record.contractor}`;
        const summary = groups.get(key) ?? {
            year: record.year,
            month: record.month,
            contractor: record.contractor,
            itemCount: 0,
            adjustedTotal: 0,
        };
        summary.itemCount++;
        summary.adjustedTotal += record.adjustedValue;
        groups.set(key, summary);
    }

    return [...groups.values()].sort((a, b) =>
        a.year - b.year
        || monthNumber(a.month) - monthNumber(b.month)
        || byContractor(a, b)
    );
}

export function toRegisterRow(record: ReconciliationRecord): RegisterRow {
    const paidValue = record.declaredUnitPrice * record.declaredQuantity;
    return { ...record, paidValue, discount: paidValue - record.adjustedValue };
}
