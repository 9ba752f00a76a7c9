import * as fs from 'fs';
import * as path from 'path';
import { Period } from '../types/certificate.js';

export const MONTH_NAMES = [
    'enero', 'febrero', 'marzo', 'abril', 'mayo', 'junio',
    'julio', 'agosto', 'septiembre', 'octubre', 'noviembre', 'diciembre',
] as const;

// Full names come before abbreviations so "marzo" is not read as "mar" + junk.
const MONTH_TOKENS: ReadonlyArray<[string, number]> = [
    ...MONTH_NAMES.map((name, idx): [string, number] => [name, idx + 1]),
    ['setiembre', 9],
    ['ene', 1], ['feb', 2], ['mar', 3], ['abr', 4], ['may', 5], ['jun', 6],
    ['jul', 7], ['ago', 8], ['sep', 9], ['oct', 10], ['nov', 11], ['dic', 12],
];

export function monthNumber(month: string): number {
    const token = month.toLowerCase();
    const found = MONTH_TOKENS.find(([name]) => name === token);
    return found ? found[1] : 0;
}

export function makePeriod(year: number, month: string | number, folder?: string): Period {
    const number = typeof month === 'number' ? month : monthNumber(month);
    if (!Number.isInteger(year) || number < 1 || number > 12) {
        throw new RangeError(`Invalid period: ${year}/${month}`);
    }
    return { year, month: MONTH_NAMES[number - 1], monthNumber: number, folder };
}

/**
 * Reads a period from a folder name such as "julio2025" or "actas_jul2024".
 */
export function parsePeriodFolder(name: string): Period | null {
    const text = name.toLowerCase();
    const yearMatch = text.match(/(\d{4})/);
    const month = MONTH_TOKENS.find(([token]) => text.includes(token));
    if (!yearMatch || !month) return null;

    return makePeriod(parseInt(yearMatch[1], 10), month[1], name);
}

export function comparePeriods(a: Period, b: Period): number {
    return a.year - b.year || a.monthNumber - b.monthNumber;
}

export function periodLabel(period: Period): string {
    return `${period.month} ${period.year}`;
}

export interface PeriodFolderListing {
    periods: Period[];
    unrecognized: string[];
}

export function listPeriodFolders(actasRoot: string): PeriodFolderListing {
    const listing: PeriodFolderListing = { periods: [], unrecognized: [] };
    if (!fs.existsSync(actasRoot)) return listing;

    for (const entry of fs.readdirSync(actasRoot, { withFileTypes: true })) {
        if (!entry.isDirectory()) continue;
        const period = parsePeriodFolder(entry.name);
        if (period) {
            listing.periods.push(period);
        } else {
            listing.unrecognized.push(entry.name);
        }
    }

    listing.periods.sort(comparePeriods);
    listing.unrecognized.sort();
    return listing;
}

export interface ProjectLayout {
    project: string;
    root: string;
    actas: string;
    outputs: string;
    data: string;
    summaries: string;
    /** Cross-period ledger of this project. */
    ledger: string;
}

export const LEDGER_FILE = 'ledger.db';

export function resolveProjectLayout(baseRoot: string, project: string): ProjectLayout {
    const root = path.join(baseRoot, project, 'control_actas');
    const data = path.join(root, 'datos');
    return {
        project,
        root,
        actas: path.join(root, 'actas'),
        outputs: path.join(root, 'salidas'),
        data,
        summaries: path.join(root, 'resumen'),
        ledger: path.join(data, LEDGER_FILE),
    };
}

export function listCertificateFiles(folder: string): string[] {
    if (!fs.existsSync(folder)) return [];
    return fs.readdirSync(folder)
        .filter(name => name.toLowerCase().endsWith('.xlsx') && !name.startsWith('~$'))
        .sort()
        .map(name => path.join(folder, name));
}
