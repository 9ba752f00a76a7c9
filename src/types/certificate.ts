// Certificate Types
export type Category = 'EXCAVATION' | 'BACKFILL' | 'CONCRETE_MR' | 'CONCRETE_STAMPED';

export const CATEGORIES: readonly Category[] = ['EXCAVATION', 'BACKFILL', 'CONCRETE_MR', 'CONCRETE_STAMPED'];

export interface Period {
    year: number;
    month: string;        // canonical month name, e.g. "julio"
    monthNumber: number;  // 1-12
    folder?: string;      // source folder, e.g. "actas_jul2024"
}

export interface LineItem {
    readonly row: number;
    readonly itemCode: string;
    readonly description: string;
    readonly unit: string | null;
    readonly declaredUnitPrice: number;
    readonly declaredQuantity: number;
    readonly sourceFile: string;
}

export interface ColumnMap {
    item: string;
    description: string;
    unit: string;
    price: string;
    quantity: string;
}

export interface RowSkipCounts {
    missingKeyFields: number;
    excluded: number;
    emptyDescription: number;
    missingPrice: number;
    invalidPrice: number;
    invalidQuantity: number;
}

export interface ParsedCertificate<TDocument = unknown> {
    filePath: string;
    sourceFile: string;
    sheetName: string;
    contractor: string;
    columns: ColumnMap;
    rowsScanned: number;
    items: LineItem[];
    skipped: RowSkipCounts;
    document: TDocument;
}
