import { describe, expect, it } from 'vitest';
import {
    summarizeByContractor,
    summarizeCategories,
    summarizeLedger,
    toRegisterRow,
} from '../src/services/aggregate.js';
import { CategoryTotals, ReconciliationRecord } from '../src/types/output.js';

function record(overrides: Partial<ReconciliationRecord>): ReconciliationRecord {
    return {
        year: 2025,
        month: 'julio',
        sourceFile: 'acta_01.xlsx',
        contractor: 'Constructora Andina',
        itemCode: '1.1',
        description: 'Excavación mecánica',
        unit: 'M3',
        declaredUnitPrice: 1500,
        referenceUnitPrice: 1000,
        declaredQuantity: 10,
        adjustedValue: 10000,
        deviation: 'overpaid',
        mode: 'exact',
        ...overrides,
    };
}

function totals(contractor: string, amounts: Partial<CategoryTotals>): CategoryTotals {
    return {
        year: 2025,
        month: 'julio',
        sourceFile: 'acta.xlsx',
        contractor,
        mode: 'exact',
        EXCAVATION: 0,
        BACKFILL: 0,
        CONCRETE_MR: 0,
        CONCRETE_STAMPED: 0,
        ...amounts,
    };
}

describe('summarizeByContractor', () => {
    it('counts items and sums adjusted values per contractor, sorted by name', () => {
        const summaries = summarizeByContractor([
            record({ contractor: 'Obras del Sur', adjustedValue: 2000 }),
            record({ adjustedValue: 10000 }),
            record({ contractor: 'Obras del Sur', adjustedValue: 500 }),
        ]);
        expect(summaries).toEqual([
            { contractor: 'Constructora Andina', itemCount: 1, adjustedTotal: 10000 },
            { contractor: 'Obras del Sur', itemCount: 2, adjustedTotal: 2500 },
        ]);
    });

    it('returns nothing for no records', () => {
        expect(summarizeByContractor([])).toEqual([]);
    });
});

describe('summarizeCategories', () => {
    it('sums category quantities across certificates of the same contractor', () => {
        const summaries = summarizeCategories([
            totals('Obras del Sur', { BACKFILL: 4 }),
            totals('Constructora Andina', { EXCAVATION: 60, CONCRETE_MR: 3 }),
            totals('Obras del Sur', { BACKFILL: 1.5, CONCRETE_STAMPED: 7 }),
        ]);
        expect(summaries).toEqual([
            { contractor: 'Constructora Andina', EXCAVATION: 60, BACKFILL: 0, CONCRETE_MR: 3, CONCRETE_STAMPED: 0 },
            { contractor: 'Obras del Sur', EXCAVATION: 0, BACKFILL: 5.5, CONCRETE_MR: 0, CONCRETE_STAMPED: 7 },
        ]);
    });
});

describe('summarizeLedger', () => {
    it('groups by period and contractor, oldest period first', () => {
        const summaries = summarizeLedger([
            record({ year: 2025, month: 'julio', adjustedValue: 100 }),
            record({ year: 2024, month: 'diciembre', adjustedValue: 50 }),
            record({ year: 2025, month: 'febrero', contractor: 'Obras del Sur', adjustedValue: 30 }),
            record({ year: 2025, month: 'julio', adjustedValue: 200 }),
        ]);
        expect(summaries).toEqual([
            { year: 2024, month: 'diciembre', contractor: 'Constructora Andina', itemCount: 1, adjustedTotal: 50 },
            { year: 2025, month: 'febrero', contractor: 'Obras del Sur', itemCount: 1, adjustedTotal: 30 },
            { year: 2025, month: 'julio', contractor: 'Constructora Andina', itemCount: 2, adjustedTotal: 300 },
        ]);
    });
});

describe('toRegisterRow', () => {
    it('adds the paid value and the discount', () => {
        const row = toRegisterRow(record({}));
        expect(row.paidValue).toBe(15000);
        expect(row.discount).toBe(5000);
    });

    it('gives a negative discount for underpaid items', () => {
        const row = toRegisterRow(record({ declaredUnitPrice: 800, declaredQuantity: 3, adjustedValue: 3000, deviation: 'underpaid' }));
        expect(row.paidValue).toBe(2400);
        expect(row.discount).toBe(-600);
    });
});
