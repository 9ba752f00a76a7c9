import ExcelJS from 'exceljs';
import type { Workbook, Worksheet } from 'exceljs';
import * as path from 'path';
import { ColumnMap, LineItem, ParsedCertificate, RowSkipCounts } from '../types/certificate.js';
import { normalizeText } from '../utils/normalize.js';
import { cellNumber, cellText, columnLetter } from '../utils/cells.js';
import { CertificateParseError, describeError } from '../errors.js';

export const DATA_SHEET = 'CORTE';
export const HEADER_ROWS: readonly [number, number] = [8, 9];
export const FIRST_DATA_ROW = 10;
export const QUANTITY_COLUMN = 'I';
export const PRICE_HEADER = 'VALOR UNITARIO';
export const UNNAMED_CONTRACTOR = 'SIN NOMBRE';

const FALLBACK_COLUMNS = {
    item: { header: 'ÍTEM', column: 'A' },
    description: { header: 'DESCRIPCIÓN', column: 'B' },
    unit: { header: 'UN', column: 'D' },
} as const;

export function findDataSheet(workbook: Workbook): Worksheet | null {
    return workbook.worksheets.find(ws => ws.name.trim().toUpperCase() === DATA_SHEET) ?? null;
}

/**
 * Header name -> column letter, from the two header rows joined with a space.
 */
export function readHeaderMap(sheet: Worksheet): Map<string, string> {
    const headers = new Map<string, string>();
    const [first, second] = HEADER_ROWS;

    for (let col = 1; col <= sheet.columnCount; col++) {
        const letter = columnLetter(col);
        const top = cellText(sheet, `${letter}${first}`);
        const bottom = cellText(sheet, `${letter}${second}`);
        const name = [top, bottom].filter(Boolean).join(' ').trim().toUpperCase();
        if (name) headers.set(name, letter);
    }
    return headers;
}

export function resolveColumns(headers: Map<string, string>): Omit<ColumnMap, 'price'> & { price: string | null } {
    let price = headers.get(PRICE_HEADER) ?? null;
    if (!price) {
        for (const [name, letter] of headers) {
            if (name.includes(PRICE_HEADER)) {
                price = letter;
                break;
            }
        }
    }

    return {
        item: headers.get(FALLBACK_COLUMNS.item.header) ?? FALLBACK_COLUMNS.item.column,
        description: headers.get(FALLBACK_COLUMNS.description.header) ?? FALLBACK_COLUMNS.description.column,
        unit: headers.get(FALLBACK_COLUMNS.unit.header) ?? FALLBACK_COLUMNS.unit.column,
        price,
        quantity: QUANTITY_COLUMN,
    };
}

/**
 * Labor lines are never price-checked.
 */
export function isLaborLine(itemCode: string, description: string): boolean {
    const text = description.toUpperCase();
    return text.includes('MANO DE OBRA')
        || text.includes('PEA')
        || itemCode.toUpperCase().includes('MR45');
}

export function readContractor(sheet: Worksheet): string {
    return cellText(sheet, 'C6') || cellText(sheet, 'D6') || UNNAMED_CONTRACTOR;
}

function emptySkipCounts(): RowSkipCounts {
    return {
        missingKeyFields: 0,
        excluded: 0,
        emptyDescription: 0,
        missingPrice: 0,
        invalidPrice: 0,
        invalidQuantity: 0,
    };
}

export async function loadWorkbook(filePath: string): Promise<Workbook> {
    const workbook = new ExcelJS.Workbook();
    try {
        await workbook.xlsx.readFile(filePath);
    } catch (error) {
        throw new CertificateParseError(
            path.basename(filePath),
            'unreadable',
            `Could not open ${path.basename(filePath)}: ${describeError(error)}`,
            { cause: error }
        );
    }
    return workbook;
}

/**
 * Reads the line items of one certificate workbook.
 */
export function parseWorkbook(workbook: Workbook, filePath: string): ParsedCertificate<Workbook> {
    const sourceFile = path.basename(filePath);
    const sheet = findDataSheet(workbook);
    if (!sheet) {
        throw new CertificateParseError(sourceFile, 'missing-sheet', `No '${DATA_SHEET}' sheet in ${sourceFile}`);
    }

    const resolved = resolveColumns(readHeaderMap(sheet));
    if (!resolved.price) {
        throw new CertificateParseError(sourceFile, 'missing-columns', `No '${PRICE_HEADER}' column in ${sourceFile}`);
    }
    const columns: ColumnMap = { ...resolved, price: resolved.price };

    const items: LineItem[] = [];
    const skipped = emptySkipCounts();
    let rowsScanned = 0;

    for (let row = FIRST_DATA_ROW; row <= sheet.rowCount; row++) {
        rowsScanned++;
        const itemCode = cellText(sheet, `${columns.item}${row}`);
        const description = cellText(sheet, `${columns.description}${row}`);

        if (!itemCode || !description) {
            skipped.missingKeyFields++;
            continue;
        }

        if (isLaborLine(itemCode, description)) {
            skipped.excluded++;
            continue;
        }

        if (!normalizeText(description)) {
            skipped.emptyDescription++;
            continue;
        }

        if (cellText(sheet, `${columns.price}${row}`) === '') {
            skipped.missingPrice++;
            continue;
        }
        const price = cellNumber(sheet, `${columns.price}${row}`);
        if (price === null) {
            skipped.invalidPrice++;
            continue;
        }

        const quantity = cellNumber(sheet, `${columns.quantity}${row}`);
        if (quantity === null || quantity === 0) {
            skipped.invalidQuantity++;
            continue;
        }

        const unit = cellText(sheet, `${columns.unit}${row}`);
        items.push(Object.freeze({
            row,
            itemCode,
            description,
            unit: unit || null,
            declaredUnitPrice: price,
            declaredQuantity: quantity,
            sourceFile,
        }));
    }

    return {
        filePath,
        sourceFile,
        sheetName: sheet.name,
        contractor: readContractor(sheet),
        columns,
        rowsScanned,
        items,
        skipped,
        document: workbook,
    };
}

export async function parseCertificate(filePath: string): Promise<ParsedCertificate<Workbook>> {
    const workbook = await loadWorkbook(filePath);
    return parseWorkbook(workbook, filePath);
}
