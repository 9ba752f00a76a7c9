import {
    KeywordMatchPolicy,
    KeywordTable,
    PriceReferenceEntry,
    ReferenceMatch,
    ResolverMode,
} from '../types/reference.js';
import { normalizeText, normalizeUnit } from '../utils/normalize.js';

/**
 * Reference price lookup. Implementations are immutable snapshots taken
 * when they are built; a store edited afterwards is not seen.
 */
export interface Resolver {
    readonly mode: ResolverMode;
    readonly size: number;
    lookup(description: string, unit?: string | null): number | null;
    match(description: string, unit?: string | null): ReferenceMatch | null;
}

function exactKey(description: string, unit: string): string {
    return `${description}\u0000${unit}`;
}

/**
 * Exact match on (normalized description, normalized unit). A line without
 * a unit never matches.
 */
export class ExactModeResolver implements Resolver {
    readonly mode = 'exact' as const;
    private readonly prices: ReadonlyMap<string, number>;

    constructor(entries: Iterable<Pick<PriceReferenceEntry, 'activity' | 'unit' | 'price'>>) {
        const prices = new Map<string, number>();
        for (const entry of entries) {
            const description = normalizeText(entry.activity);
            const unit = normalizeUnit(entry.unit);
            if (!description || !unit || !(entry.price > 0)) continue;
            prices.set(exactKey(description, unit), entry.price);
        }
        this.prices = prices;
    }

    get size(): number {
        return this.prices.size;
    }

    match(description: string, unit?: string | null): ReferenceMatch | null {
        const normalizedUnit = normalizeUnit(unit);
        const normalizedDescription = normalizeText(description);
        if (!normalizedUnit || !normalizedDescription) return null;

        const price = this.prices.get(exactKey(normalizedDescription, normalizedUnit));
        if (price === undefined) return null;

        return { mode: this.mode, key: normalizedDescription, unit: normalizedUnit, price };
    }

    lookup(description: string, unit?: string | null): number | null {
        return this.match(description, unit)?.price ?? null;
    }
}

interface Keyword {
    keyword: string;
    price: number;
    pattern?: RegExp;
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Critical-activity lookup: the longest keyword contained in the description
 * wins. Unit is ignored.
 */
export class KeywordModeResolver implements Resolver {
    readonly mode = 'keyword' as const;
    private readonly keywords: readonly Keyword[];

    constructor(table: KeywordTable, readonly policy: KeywordMatchPolicy = 'substring') {
        const byKeyword = new Map<string, number>();
        for (const [raw, price] of Object.entries(table)) {
            const keyword = normalizeText(raw);
            if (!keyword || !Number.isFinite(price) || price <= 0) continue;
            byKeyword.set(keyword, price);
        }

        // Array.prototype.sort is stable: equal lengths keep table order.
        this.keywords = [...byKeyword.entries()]
            .map(([keyword, price]): Keyword => ({
                keyword,
                price,
                pattern: policy === 'word' ? new RegExp(`(^| )${escapeRegExp(keyword)}( |$)`) : undefined,
            }))
            .sort((a, b) => b.keyword.length - a.keyword.length);
    }

    get size(): number {
        return this.keywords.length;
    }

    /** Keywords in scan order, longest first. */
    orderedKeywords(): string[] {
        return this.keywords.map(k => k.keyword);
    }

    match(description: string, _unit?: string | null): ReferenceMatch | null {
        const normalizedDescription = normalizeText(description);
        if (!normalizedDescription) return null;

        for (const entry of this.keywords) {
            const contained = entry.pattern
                ? entry.pattern.test(normalizedDescription)
                : normalizedDescription.includes(entry.keyword);
            if (contained) {
                return { mode: this.mode, key: entry.keyword, price: entry.price };
            }
        }
        return null;
    }

    lookup(description: string, _unit?: string | null): number | null {
        return this.match(description)?.price ?? null;
    }
}

export type ResolverSource =
    | { mode: 'exact'; entries: Iterable<Pick<PriceReferenceEntry, 'activity' | 'unit' | 'price'>> }
    | { mode: 'keyword'; keywords: KeywordTable; policy?: KeywordMatchPolicy };

export function createResolver(source: ResolverSource): Resolver {
    switch (source.mode) {
        case 'exact':
            return new ExactModeResolver(source.entries);
        case 'keyword':
            return new KeywordModeResolver(source.keywords, source.policy);
    }
}
