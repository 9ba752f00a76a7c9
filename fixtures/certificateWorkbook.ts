import ExcelJS from 'exceljs';
import type { Workbook } from 'exceljs';
import * as fs from 'fs';
import * as path from 'path';

export interface CertificateRow {
    item: string;
    description: string;
    unit?: string | null;
    price: number | string | null;
    quantity: number | string | null;
    /** Store the price as a formula with this cached result. */
    priceAsFormula?: boolean;
}

export interface CertificateFixture {
    contractor?: string;
    sheetName?: string;
    rows: CertificateRow[];
    /** Header text for the price column (row 8 / row 9). */
    priceHeader?: [string, string];
}

/**
 * Builds a workbook laid out like a payment certificate: contractor in C6,
 * headers in rows 8-9, data from row 10, quantity in column I.
 */
export function buildCertificateWorkbook(fixture: CertificateFixture): Workbook {
    const workbook = new ExcelJS.Workbook();
    workbook.addWorksheet('PORTADA').getCell('A1').value = 'Acta de pago';
    const sheet = workbook.addWorksheet(fixture.sheetName ?? 'CORTE');

    if (fixture.contractor !== undefined) sheet.getCell('C6').value = fixture.contractor;

    const [priceTop, priceBottom] = fixture.priceHeader ?? ['VALOR', 'UNITARIO'];
    sheet.getCell('A8').value = 'ÍTEM';
    sheet.getCell('B8').value = 'DESCRIPCIÓN';
    sheet.getCell('D8').value = 'UN';
    sheet.getCell('G8').value = priceTop;
    sheet.getCell('G9').value = priceBottom;
    sheet.getCell('I8').value = 'CANTIDAD';
    sheet.getCell('I9').value = 'PRESENTA';

    fixture.rows.forEach((row, idx) => {
        const r = 10 + idx;
        sheet.getCell(`A${r}`).value = row.item;
        sheet.getCell(`B${r}`).value = row.description;
        sheet.getCell(`D${r}`).value = row.unit ?? null;
        if (row.priceAsFormula && typeof row.price === 'number') {
            sheet.getCell(`G${r}`).value = { formula: `${row.price}*1`, result: row.price, date1904: false };
        } else {
            sheet.getCell(`G${r}`).value = row.price;
        }
        sheet.getCell(`I${r}`).value = row.quantity;
    });

    return workbook;
}

export async function writeCertificate(dir: string, file: string, fixture: CertificateFixture): Promise<string> {
    await fs.promises.mkdir(dir, { recursive: true });
    const filePath = path.join(dir, file);
    await buildCertificateWorkbook(fixture).xlsx.writeFile(filePath);
    return filePath;
}
