import ExcelJS from 'exceljs';
import type { Workbook, Worksheet } from 'exceljs';
import * as fs from 'fs';
import * as path from 'path';
import { CATEGORIES } from '../types/certificate.js';
import {
    CellAnnotation,
    CertificateReconciliation,
    ContractorCategorySummary,
    ContractorSummary,
    Deviation,
    PeriodContractorSummary,
    QuantityTable,
    ReconciliationRecord,
} from '../types/output.js';
import { CATEGORY_LABELS } from '../utils/classify.js';
import { columnLetter } from '../utils/cells.js';
import { findDataSheet } from './parser.js';
import { quantityTableTotals } from './reconcile.js';
import { toRegisterRow } from './aggregate.js';

export const QUANTITY_SHEET = 'CUADRO_CANTIDADES';

const DEVIATION_COLORS: Record<Deviation, string> = {
    overpaid: 'FFFF0000',
    underpaid: 'FF0000FF',
};

export function verifiedFileName(sourceFile: string): string {
    const ext = path.extname(sourceFile);
    return `${path.basename(sourceFile, ext)}_verificado${ext || '.xlsx'}`;
}

export function applyAnnotations(sheet: Worksheet, annotations: CellAnnotation[]): void {
    for (const annotation of annotations) {
        const cell = sheet.getCell(`${annotation.column}${annotation.row}`);
        // Cells loaded from a file share style objects; give this one its own.
        cell.style = { ...cell.style, font: { ...cell.font, color: { argb: DEVIATION_COLORS[annotation.deviation] } } };
    }
}

/**
 * Replaces the quantity sheet: one column per category, quantities from
 * row 2, then a TOTAL row.
 */
export function writeQuantitySheet(workbook: Workbook, table: QuantityTable): Worksheet {
    const existing = workbook.getWorksheet(QUANTITY_SHEET);
    if (existing) workbook.removeWorksheet(existing.id);

    const sheet = workbook.addWorksheet(QUANTITY_SHEET);
    const totals = quantityTableTotals(table);
    const longest = Math.max(0, ...CATEGORIES.map(category => table[category].length));
    const totalRow = 2 + longest;

    sheet.getCell(`A${totalRow}`).value = 'TOTAL';

    CATEGORIES.forEach((category, idx) => {
        const letter = columnLetter(idx + 2);
        sheet.getCell(`${letter}1`).value = CATEGORY_LABELS[category];

        table[category].forEach((quantity, offset) => {
            sheet.getCell(`${letter}${offset + 2}`).value = quantity;
        });

        sheet.getCell(`${letter}${totalRow}`).value = longest > 0
            ? { formula: `SUM(${letter}2:${letter}${totalRow - 1})`, result: totals[category], date1904: false }
            : 0;
    });

    return sheet;
}

/**
 * Writes the annotated copy of a certificate next to the other outputs.
 */
export async function writeCertificateArtifact(
    workbook: Workbook,
    reconciliation: CertificateReconciliation,
    outputDir: string
): Promise<string> {
    const sheet = findDataSheet(workbook);
    if (sheet) applyAnnotations(sheet, reconciliation.annotations);
    writeQuantitySheet(workbook, reconciliation.quantities);

    await fs.promises.mkdir(outputDir, { recursive: true });
    const outputPath = path.join(outputDir, verifiedFileName(reconciliation.sourceFile));
    await workbook.xlsx.writeFile(outputPath);
    return outputPath;
}

const REGISTER_COLUMNS = [
    { header: 'anio', key: 'year' },
    { header: 'mes', key: 'month' },
    { header: 'archivo', key: 'sourceFile' },
    { header: 'contratista', key: 'contractor' },
    { header: 'item', key: 'itemCode' },
    { header: 'descripcion', key: 'description' },
    { header: 'un', key: 'unit' },
    { header: 'valor_unitario_pagado', key: 'declaredUnitPrice' },
    { header: 'valor_pactado', key: 'referenceUnitPrice' },
    { header: 'cantidad_presenta', key: 'declaredQuantity' },
    { header: 'valor_pagado', key: 'paidValue' },
    { header: 'valor_ajustado', key: 'adjustedValue' },
    { header: 'descuento', key: 'discount' },
    { header: 'desviacion', key: 'deviation' },
    { header: 'modo', key: 'mode' },
];

function addRegisterSheet(workbook: Workbook, records: ReconciliationRecord[]): void {
    const sheet = workbook.addWorksheet('REGISTRO');
    sheet.columns = REGISTER_COLUMNS;
    sheet.addRows(records.map(toRegisterRow));
}

export interface PeriodSummaryInput {
    contractors: ContractorSummary[];
    records: ReconciliationRecord[];
    categories: ContractorCategorySummary[];
}

/**
 * Period summary workbook: RESUMEN, REGISTRO and CANTIDADES sheets.
 */
export async function writePeriodSummary(input: PeriodSummaryInput, outputPath: string): Promise<string> {
    const workbook = new ExcelJS.Workbook();

    const summary = workbook.addWorksheet('RESUMEN');
    summary.columns = [
        { header: 'Contratista', key: 'contractor' },
        { header: 'Items_con_error', key: 'itemCount' },
        { header: 'Suma_valor_ajustado', key: 'adjustedTotal' },
    ];
    summary.addRows(input.contractors);

    addRegisterSheet(workbook, input.records);

    const quantities = workbook.addWorksheet('CANTIDADES');
    quantities.columns = [
        { header: 'Contratista', key: 'contractor' },
        ...CATEGORIES.map(category => ({ header: CATEGORY_LABELS[category], key: category })),
    ];
    quantities.addRows(input.categories);

    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
    await workbook.xlsx.writeFile(outputPath);
    return outputPath;
}

/**
 * Cross-period summary built from the ledger.
 */
export async function writeGlobalSummary(
    summaries: PeriodContractorSummary[],
    records: ReconciliationRecord[],
    outputPath: string
): Promise<string> {
    const workbook = new ExcelJS.Workbook();

    const summary = workbook.addWorksheet('RESUMEN');
    summary.columns = [
        { header: 'Año', key: 'year' },
        { header: 'Mes', key: 'month' },
        { header: 'Contratista', key: 'contractor' },
        { header: 'Items_con_error', key: 'itemCount' },
        { header: 'Suma_valor_ajustado', key: 'adjustedTotal' },
    ];
    summary.addRows(summaries);

    addRegisterSheet(workbook, records);

    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
    await workbook.xlsx.writeFile(outputPath);
    return outputPath;
}
