// Reference Price Types
export type ResolverMode = 'exact' | 'keyword';

export type KeywordMatchPolicy = 'substring' | 'word';

export interface PriceReferenceEntry {
    id: string;
    activity: string;
    activityNorm: string;
    unit: string | null;
    unitNorm: string;
    price: number;
    updatedAt: string;
}

export interface PriceInput {
    activity: string;
    price: number;
    unit?: string | null;
}

export interface PriceLogEntry {
    id: string;
    activityNorm: string;
    unitNorm: string;
    priceOld: number | null;
    priceNew: number | null;
    unitOld: string | null;
    unitNew: string | null;
    changedAt: string;
}

export type KeywordTable = Record<string, number>;

export interface ReferenceMatch {
    mode: ResolverMode;
    key: string;      // normalized description (exact) or keyword (keyword mode)
    unit?: string;
    price: number;
}
