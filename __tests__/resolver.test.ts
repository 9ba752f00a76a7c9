import { describe, expect, it } from 'vitest';
import { ExactModeResolver, KeywordModeResolver, createResolver } from '../src/services/resolver.js';
import { DEFAULT_CRITICAL_ACTIVITIES } from '../src/config.js';

describe('ExactModeResolver', () => {
    const resolver = new ExactModeResolver([
        { activity: 'Excavación mecánica', unit: 'm³', price: 1000 },
        { activity: 'Excavación mecánica', unit: 'M2', price: 800 },
        { activity: 'Sardinel prefabricado', unit: 'ML', price: 52000 },
        { activity: 'Sin unidad', unit: null, price: 10 },
        { activity: 'Precio invalido', unit: 'UN', price: 0 },
    ]);

    it('matches on normalized description and unit', () => {
        expect(resolver.lookup('EXCAVACION MECANICA', 'M3')).toBe(1000);
        expect(resolver.lookup('excavacion mecanica', 'm2')).toBe(800);
        expect(resolver.lookup('Sardinel  prefabricado', 'M.L')).toBe(52000);
    });

    it('requires a unit', () => {
        expect(resolver.lookup('excavacion mecanica')).toBeNull();
        expect(resolver.lookup('excavacion mecanica', '')).toBeNull();
        expect(resolver.lookup('sin unidad', null)).toBeNull();
    });

    it('does no fuzzy matching', () => {
        expect(resolver.lookup('excavacion mecanicas', 'M3')).toBeNull();
        expect(resolver.lookup('excavacion mecanica', 'M')).toBeNull();
    });

    it('skips entries without unit or positive price', () => {
        expect(resolver.size).toBe(3);
        expect(resolver.lookup('precio invalido', 'UN')).toBeNull();
    });

    it('reports the matched key', () => {
        expect(resolver.match('Excavación Mecánica', 'M3')).toEqual({
            mode: 'exact',
            key: 'excavacion mecanica',
            unit: 'M3',
            price: 1000,
        });
    });

    it('keeps the last price for a repeated key', () => {
        const r = new ExactModeResolver([
            { activity: 'Base granular', unit: 'M3', price: 900 },
            { activity: 'BASE GRANULAR', unit: 'm3', price: 1000 },
        ]);
        expect(r.size).toBe(1);
        expect(r.lookup('base granular', 'M3')).toBe(1000);
    });
});

describe('KeywordModeResolver', () => {
    it('prefers the longest contained keyword', () => {
        const resolver = new KeywordModeResolver({ BASE: 500, 'BASE GRANULAR': 1000 });
        expect(resolver.lookup('suministro de base granular tipo invias')).toBe(1000);
        expect(resolver.match('base granular')).toEqual({ mode: 'keyword', key: 'base granular', price: 1000 });
        expect(resolver.lookup('base de concreto')).toBe(500);
    });

    it('scans keywords longest first, keeping table order on ties', () => {
        const resolver = new KeywordModeResolver({ abc: 1, 'xy z': 2, abcd: 3, wxyz: 4 });
        expect(resolver.orderedKeywords()).toEqual(['xy z', 'abcd', 'wxyz', 'abc']);
        expect(resolver.lookup('abcd wxyz')).toBe(3);
    });

    it('ignores the unit and normalizes the description', () => {
        const resolver = new KeywordModeResolver(DEFAULT_CRITICAL_ACTIVITIES);
        expect(resolver.lookup('Estabilización con rajón e=0.40', 'GL')).toBe(4500);
        expect(resolver.lookup('EXCAVACIÓN MECÁNICA en conglomerado')).toBe(1000);
        expect(resolver.lookup('Subbase granular')).toBe(1000);
    });

    it('returns null when no keyword is contained', () => {
        const resolver = new KeywordModeResolver(DEFAULT_CRITICAL_ACTIVITIES);
        expect(resolver.lookup('Demolición de andén')).toBeNull();
        expect(resolver.lookup('')).toBeNull();
    });

    it('matches inside longer words under the substring policy', () => {
        const resolver = new KeywordModeResolver({ BASE: 500 });
        expect(resolver.lookup('subbase seleccionada')).toBe(500);
    });

    it('requires word boundaries under the word policy', () => {
        const resolver = new KeywordModeResolver({ BASE: 500, 'BASE GRANULAR': 1000 }, 'word');
        expect(resolver.lookup('subbase seleccionada')).toBeNull();
        expect(resolver.lookup('subbase granular')).toBeNull();
        expect(resolver.lookup('base granular')).toBe(1000);
        expect(resolver.lookup('capa de base')).toBe(500);
    });

    it('drops keywords that normalize to nothing or carry no positive price', () => {
        const resolver = new KeywordModeResolver({ '***': 100, 'RCD': -5, 'RAJON': 4500 });
        expect(resolver.size).toBe(1);
    });
});

describe('createResolver', () => {
    it('selects the variant by mode', () => {
        expect(createResolver({ mode: 'exact', entries: [] })).toBeInstanceOf(ExactModeResolver);
        const keyword = createResolver({ mode: 'keyword', keywords: { BASE: 1 }, policy: 'word' });
        expect(keyword).toBeInstanceOf(KeywordModeResolver);
        expect(keyword.mode).toBe('keyword');
    });
});
