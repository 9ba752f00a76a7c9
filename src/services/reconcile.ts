import { CATEGORIES, Category, LineItem, ParsedCertificate, Period } from '../types/certificate.js';
import { ResolverMode } from '../types/reference.js';
import {
    CategoryAmounts,
    CategoryTotals,
    CellAnnotation,
    CertificateReconciliation,
    Deviation,
    ItemState,
    QuantityTable,
    ReconciliationRecord,
} from '../types/output.js';
import { normalizeText, normalizeUnit } from '../utils/normalize.js';
import { classifyActivity } from '../utils/classify.js';
import { isLaborLine } from './parser.js';
import { Resolver } from './resolver.js';

// Absolute currency units; a difference of exactly 1 is not flagged.
export const PRICE_TOLERANCE = 1;

export type ItemOutcome =
    | { state: 'EXCLUDED'; category: null }
    | { state: 'NO_REFERENCE'; category: Category | null }
    | { state: 'WITHIN_TOLERANCE'; category: Category | null; referencePrice: number; difference: number }
    | {
        state: 'FLAGGED';
        category: Category | null;
        referencePrice: number;
        difference: number;
        adjustedValue: number;
        deviation: Deviation;
    };

export function isFlagged(declaredPrice: number, referencePrice: number): boolean {
    return Math.abs(declaredPrice - referencePrice) > PRICE_TOLERANCE;
}

export function adjustedValue(referencePrice: number, quantity: number): number {
    return referencePrice * quantity;
}

/**
 * Walks one line item through classification, reference lookup and the
 * tolerance check.
 */
export function reconcileLineItem(item: LineItem, resolver: Resolver): ItemOutcome {
    if (isLaborLine(item.itemCode, item.description)) {
        return { state: 'EXCLUDED', category: null };
    }

    const description = normalizeText(item.description) ?? '';
    const category = classifyActivity(description);

    const referencePrice = resolver.lookup(description, item.unit);
    if (referencePrice === null) {
        return { state: 'NO_REFERENCE', category };
    }

    const difference = item.declaredUnitPrice - referencePrice;
    if (!isFlagged(item.declaredUnitPrice, referencePrice)) {
        return { state: 'WITHIN_TOLERANCE', category, referencePrice, difference };
    }

    return {
        state: 'FLAGGED',
        category,
        referencePrice,
        difference,
        adjustedValue: adjustedValue(referencePrice, item.declaredQuantity),
        deviation: difference > 0 ? 'overpaid' : 'underpaid',
    };
}

export function emptyCategoryAmounts(): CategoryAmounts {
    return { EXCAVATION: 0, BACKFILL: 0, CONCRETE_MR: 0, CONCRETE_STAMPED: 0 };
}

function emptyQuantityTable(): QuantityTable {
    return { EXCAVATION: [], BACKFILL: [], CONCRETE_MR: [], CONCRETE_STAMPED: [] };
}

function emptyOutcomes(): Record<ItemState, number> {
    return { EXCLUDED: 0, NO_REFERENCE: 0, WITHIN_TOLERANCE: 0, FLAGGED: 0 };
}

/**
 * Reconciles every line item of a parsed certificate. Pure: the returned
 * annotations are applied to the document by writeCertificateArtifact.
 */
export function reconcileCertificate(
    certificate: ParsedCertificate,
    resolver: Resolver,
    period: Period
): CertificateReconciliation {
    const mode: ResolverMode = resolver.mode;
    const records: ReconciliationRecord[] = [];
    const annotations: CellAnnotation[] = [];
    const amounts = emptyCategoryAmounts();
    const quantities = emptyQuantityTable();
    const outcomes = emptyOutcomes();

    for (const item of certificate.items) {
        const outcome = reconcileLineItem(item, resolver);
        outcomes[outcome.state]++;

        if (outcome.category && item.declaredQuantity !== 0 && !Number.isNaN(item.declaredQuantity)) {
            amounts[outcome.category] += item.declaredQuantity;
            quantities[outcome.category].push(item.declaredQuantity);
        }

        if (outcome.state !== 'FLAGGED') continue;

        records.push({
            year: period.year,
            month: period.month,
            sourceFile: certificate.sourceFile,
            contractor: certificate.contractor,
            itemCode: item.itemCode,
            description: item.description,
            unit: normalizeUnit(item.unit),
            declaredUnitPrice: item.declaredUnitPrice,
            referenceUnitPrice: outcome.referencePrice,
            declaredQuantity: item.declaredQuantity,
            adjustedValue: outcome.adjustedValue,
            deviation: outcome.deviation,
            mode,
        });
        annotations.push({ row: item.row, column: certificate.columns.price, deviation: outcome.deviation });
    }

    const totals: CategoryTotals = {
        year: period.year,
        month: period.month,
        sourceFile: certificate.sourceFile,
        contractor: certificate.contractor,
        mode,
        ...amounts,
    };

    return {
        sourceFile: certificate.sourceFile,
        contractor: certificate.contractor,
        records,
        totals,
        annotations,
        quantities,
        outcomes,
    };
}

export function quantityTableTotals(table: QuantityTable): CategoryAmounts {
    const totals = emptyCategoryAmounts();
    for (const category of CATEGORIES) {
        totals[category] = table[category].reduce((sum, q) => sum + q, 0);
    }
    return totals;
}
