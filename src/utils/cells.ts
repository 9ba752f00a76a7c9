import type { CellValue, Worksheet } from 'exceljs';

export type PlainValue = string | number | boolean | Date | null;

/**
 * Computed value of a cell: formula results instead of formulas, plain text
 * for rich text and hyperlinks, null for blanks and error values.
 */
export function plainValue(value: CellValue): PlainValue {
    if (value === null || value === undefined) return null;
    if (typeof value !== 'object' || value instanceof Date) return value;

    if ('richText' in value) {
        return value.richText.map(run => run.text).join('');
    }
    if ('formula' in value || 'sharedFormula' in value) {
        const result = value.result;
        if (result === undefined || result === null) return null;
        if (typeof result === 'object' && !(result instanceof Date)) return null;
        return result;
    }
    if ('hyperlink' in value) {
        return value.text;
    }
    // CellErrorValue
    return null;
}

export function cellText(sheet: Worksheet, address: string): string {
    const value = plainValue(sheet.getCell(address).value);
    if (value === null) return '';
    if (value instanceof Date) return value.toISOString();
    return String(value).trim();
}

/**
 * Numeric reading of a cell, tolerating currency symbols and thousands
 * separators. Returns null when the cell is empty or not a number.
 */
export function cellNumber(sheet: Worksheet, address: string): number | null {
    const value = plainValue(sheet.getCell(address).value);
    if (value === null || value instanceof Date || typeof value === 'boolean') return null;
    if (typeof value === 'number') return Number.isNaN(value) ? null : value;

    const cleaned = value.replace(/\$/g, '').replace(/,/g, '').trim();
    if (cleaned === '') return null;
    const parsed = Number(cleaned);
    return Number.isNaN(parsed) ? null : parsed;
}

export function columnLetter(index: number): string {
    let letter = '';
    let n = index;
    while (n > 0) {
        const rem = (n - 1) % 26;
        letter = String.fromCharCode(65 + rem) + letter;
        n = Math.floor((n - 1) / 26);
    }
    return letter;
}
