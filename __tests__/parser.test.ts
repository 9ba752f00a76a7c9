import { describe, expect, it } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import {
    isLaborLine,
    parseCertificate,
    parseWorkbook,
    readHeaderMap,
    resolveColumns,
} from '../src/services/parser.js';
import { CertificateParseError } from '../src/errors.js';
import { buildCertificateWorkbook, makeTempDir, writeCertificate } from './_helpers/certificateWorkbook.js';

function parseFailure(run: () => unknown): CertificateParseError {
    try {
        run();
    } catch (error) {
        if (error instanceof CertificateParseError) return error;
        throw error;
    }
    throw new Error('expected a CertificateParseError');
}

describe('isLaborLine', () => {
    it('excludes labor descriptions and MR45 item codes', () => {
        expect(isLaborLine('3.1', 'Mano de obra no calificada')).toBe(true);
        expect(isLaborLine('3.2', 'Suministro PEA')).toBe(true);
        expect(isLaborLine('MR45-01', 'Concreto')).toBe(true);
        expect(isLaborLine('mr45', 'Concreto')).toBe(true);
    });

    it('matches PEA anywhere in the description', () => {
        expect(isLaborLine('3.3', 'Peaje temporal')).toBe(true);
        expect(isLaborLine('3.4', 'Capeado de muros')).toBe(true);
        expect(isLaborLine('3.5', 'Cuadrilla (PEA)')).toBe(true);
        expect(isLaborLine('3.6', 'Concreto estampado')).toBe(false);
    });
});

describe('header resolution', () => {
    it('joins the two header rows', () => {
        const sheet = buildCertificateWorkbook({ rows: [] }).getWorksheet('CORTE');
        expect(sheet).toBeDefined();
        if (!sheet) return;

        const headers = readHeaderMap(sheet);
        expect(headers.get('VALOR UNITARIO')).toBe('G');
        expect(headers.get('CANTIDAD PRESENTA')).toBe('I');
        expect(resolveColumns(headers)).toEqual({
            item: 'A',
            description: 'B',
            unit: 'D',
            price: 'G',
            quantity: 'I',
        });
    });

    it('falls back to fixed columns for item, description and unit', () => {
        const headers = new Map([['VALOR UNITARIO', 'F']]);
        expect(resolveColumns(headers)).toEqual({
            item: 'A',
            description: 'B',
            unit: 'D',
            price: 'F',
            quantity: 'I',
        });
    });

    it('accepts a price header that contains the expected name', () => {
        const headers = new Map([['VALOR UNITARIO SIN IVA', 'H']]);
        expect(resolveColumns(headers).price).toBe('H');
    });
});

describe('parseWorkbook', () => {
    const workbook = buildCertificateWorkbook({
        contractor: 'Constructora Andina',
        rows: [
            { item: '1.1', description: 'EXCAVACION MECANICA', unit: 'M3', price: 1500, quantity: 10 },
            { item: '1.2', description: 'Mano de obra oficial', unit: 'HR', price: 100, quantity: 1 },
            { item: 'MR45-1', description: 'Concreto', unit: 'M3', price: 100, quantity: 1 },
            { item: '', description: 'Sin item', unit: 'UN', price: 1, quantity: 1 },
            { item: '1.5', description: '***', unit: 'UN', price: 10, quantity: 1 },
            { item: '1.6', description: 'Relleno', unit: 'M3', price: null, quantity: 3 },
            { item: '1.7', description: 'Relleno', unit: 'M3', price: 'n/a', quantity: 3 },
            { item: '1.8', description: 'Relleno', unit: 'M3', price: 10, quantity: 0 },
            { item: '1.9', description: 'Relleno', unit: 'M3', price: 10, quantity: 'abc' },
            { item: '2.0', description: 'Concreto MR 45', unit: 'M3', price: '$1,500', quantity: '2' },
            { item: '2.1', description: 'Base granular', unit: 'M3', price: 900, quantity: 4, priceAsFormula: true },
            { item: '2.2', description: 'Limpieza PEA', unit: 'UN', price: 5, quantity: 1 },
            { item: '2.3', description: 'Señal temporal', unit: null, price: 7, quantity: 1 },
            { item: '2.4', description: 'Peaje temporal', unit: 'UN', price: 5000, quantity: 1 },
        ],
    });
    const parsed = parseWorkbook(workbook, '/tmp/actas/acta_01.xlsx');

    it('reads the certificate header', () => {
        expect(parsed.sourceFile).toBe('acta_01.xlsx');
        expect(parsed.sheetName).toBe('CORTE');
        expect(parsed.contractor).toBe('Constructora Andina');
        expect(parsed.columns.price).toBe('G');
        expect(parsed.document).toBe(workbook);
    });

    it('keeps valid line items with their sheet row', () => {
        expect(parsed.items.map(i => i.itemCode)).toEqual(['1.1', '2.0', '2.1', '2.3']);
        expect(parsed.items[0]).toEqual({
            row: 10,
            itemCode: '1.1',
            description: 'EXCAVACION MECANICA',
            unit: 'M3',
            declaredUnitPrice: 1500,
            declaredQuantity: 10,
            sourceFile: 'acta_01.xlsx',
        });
        expect(Object.isFrozen(parsed.items[0])).toBe(true);
    });

    it('reads currency strings, numeric strings and formula results', () => {
        const [, mr, base, signal] = parsed.items;
        expect(mr.declaredUnitPrice).toBe(1500);
        expect(mr.declaredQuantity).toBe(2);
        expect(mr.row).toBe(19);
        expect(base.declaredUnitPrice).toBe(900);
        expect(signal.unit).toBeNull();
    });

    it('counts skipped rows by reason', () => {
        expect(parsed.rowsScanned).toBe(14);
        expect(parsed.skipped).toEqual({
            missingKeyFields: 1,
            excluded: 4,
            emptyDescription: 1,
            missingPrice: 1,
            invalidPrice: 1,
            invalidQuantity: 2,
        });
    });

    it('finds the data sheet regardless of case and padding', () => {
        const result = parseWorkbook(
            buildCertificateWorkbook({ sheetName: 'Corte ', rows: [] }),
            'acta.xlsx'
        );
        expect(result.sheetName).toBe('Corte ');
        expect(result.items).toEqual([]);
    });

    it('falls back to D6 and then to a placeholder contractor', () => {
        const withD6 = buildCertificateWorkbook({ rows: [] });
        const sheet = withD6.getWorksheet('CORTE');
        if (sheet) sheet.getCell('D6').value = 'Obras del Sur';
        expect(parseWorkbook(withD6, 'a.xlsx').contractor).toBe('Obras del Sur');

        const unnamed = buildCertificateWorkbook({ rows: [] });
        expect(parseWorkbook(unnamed, 'b.xlsx').contractor).toBe('SIN NOMBRE');
    });

    it('rejects a workbook without the data sheet', () => {
        const error = parseFailure(() =>
            parseWorkbook(buildCertificateWorkbook({ sheetName: 'RESUMEN', rows: [] }), '/x/acta_02.xlsx')
        );
        expect(error.reason).toBe('missing-sheet');
        expect(error.code).toBe('missing-sheet');
        expect(error.file).toBe('acta_02.xlsx');
    });

    it('rejects a sheet without the unit price column', () => {
        const error = parseFailure(() =>
            parseWorkbook(
                buildCertificateWorkbook({ priceHeader: ['PRECIO', 'TOTAL'], rows: [] }),
                'acta_03.xlsx'
            )
        );
        expect(error.reason).toBe('missing-columns');
    });
});

describe('parseCertificate', () => {
    it('reads a certificate from disk', async () => {
        const dir = makeTempDir();
        const file = await writeCertificate(dir, 'acta_01.xlsx', {
            contractor: 'Constructora Andina',
            rows: [
                { item: '1.1', description: 'Excavación mecánica', unit: 'M3', price: 1500, quantity: 10 },
                { item: '1.2', description: 'Base granular', unit: 'M3', price: 900, quantity: 4, priceAsFormula: true },
            ],
        });

        const parsed = await parseCertificate(file);
        expect(parsed.filePath).toBe(file);
        expect(parsed.contractor).toBe('Constructora Andina');
        expect(parsed.items.map(i => [i.itemCode, i.declaredUnitPrice, i.declaredQuantity])).toEqual([
            ['1.1', 1500, 10],
            ['1.2', 900, 4],
        ]);
    });

    it('reports an unreadable file', async () => {
        const dir = makeTempDir();
        const file = path.join(dir, 'roto.xlsx');
        fs.writeFileSync(file, 'not a workbook');

        await expect(parseCertificate(file)).rejects.toMatchObject({
            name: 'CertificateParseError',
            reason: 'unreadable',
            file: 'roto.xlsx',
        });
    });
});
