import ExcelJS from 'exceljs';
import type { Workbook } from 'exceljs';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export { buildCertificateWorkbook, writeCertificate } from '../../fixtures/certificateWorkbook.js';
export type { CertificateFixture, CertificateRow } from '../../fixtures/certificateWorkbook.js';

export function makeTempDir(prefix = 'control-actas-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export async function readWorkbook(filePath: string): Promise<Workbook> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(filePath);
    return workbook;
}
