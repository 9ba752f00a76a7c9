import { describe, expect, it } from 'vitest';
import { normalizeText, normalizeUnit } from '../src/utils/normalize.js';

describe('normalizeText', () => {
    it('lower-cases, strips accents and punctuation, collapses spaces', () => {
        expect(normalizeText('  Excavación   MECÁNICA, (zanja) ')).toBe('excavacion mecanica zanja');
    });

    it('keeps digits and drops symbols', () => {
        expect(normalizeText('Concreto MR-45 e=10cm')).toBe('concreto mr 45 e 10cm');
    });

    it('returns null for missing input and empty string for blank input', () => {
        expect(normalizeText(null)).toBeNull();
        expect(normalizeText(undefined)).toBeNull();
        expect(normalizeText('   ')).toBe('');
        expect(normalizeText('¿?')).toBe('');
    });

    it('stringifies numeric cells', () => {
        expect(normalizeText(1.5)).toBe('1 5');
    });

    it('is idempotent', () => {
        const samples = ['Relleno Compactado — Ñandú', 'SUBBASE   granular', 'ÀÉÎÕÜ çñ 123', ''];
        for (const sample of samples) {
            const once = normalizeText(sample);
            expect(normalizeText(once)).toBe(once);
        }
    });
});

describe('normalizeUnit', () => {
    it('maps cubic and square metre glyphs', () => {
        expect(normalizeUnit('m³')).toBe('M3');
        expect(normalizeUnit('M3')).toBe('M3');
        expect(normalizeUnit('m^3')).toBe('M3');
        expect(normalizeUnit('m²')).toBe('M2');
        expect(normalizeUnit(' M 2 ')).toBe('M2');
    });

    it('maps unit synonyms', () => {
        expect(normalizeUnit('UND')).toBe('UN');
        expect(normalizeUnit('unid')).toBe('UN');
        expect(normalizeUnit('Unidad')).toBe('UN');
        expect(normalizeUnit('u')).toBe('UN');
        expect(normalizeUnit('ML')).toBe('M');
        expect(normalizeUnit('m.l')).toBe('M');
    });

    it('passes unknown tokens through and never fails', () => {
        expect(normalizeUnit('GL')).toBe('GL');
        expect(normalizeUnit('kg / m')).toBe('KG/M');
        expect(normalizeUnit(null)).toBe('');
        expect(normalizeUnit(undefined)).toBe('');
        expect(normalizeUnit(3)).toBe('3');
    });
});
