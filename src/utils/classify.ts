import { Category } from '../types/certificate.js';

export const CATEGORY_LABELS: Record<Category, string> = {
    EXCAVATION: 'Excavaciones',
    BACKFILL: 'Rellenos',
    CONCRETE_MR: 'Concreto MR',
    CONCRETE_STAMPED: 'Concreto estampado',
};

// Checked in order, first match wins.
const CATEGORY_RULES: ReadonlyArray<{ category: Category; test: (text: string) => boolean }> = [
    { category: 'CONCRETE_STAMPED', test: text => text.includes('ESTAMP') },
    { category: 'CONCRETE_MR', test: text => /\bMR\b/.test(text) },
    { category: 'EXCAVATION', test: text => text.includes('EXCAV') },
    { category: 'BACKFILL', test: text => text.includes('RELLEN') },
];

/**
 * Assigns a normalized description to one of the quantity families.
 */
export function classifyActivity(normalizedDescription: string | null): Category | null {
    if (!normalizedDescription) return null;

    const text = normalizedDescription.toUpperCase();
    const rule = CATEGORY_RULES.find(r => r.test(text));
    return rule ? rule.category : null;
}
