const UNIT_SYNONYMS: Record<string, string> = {
    UND: 'UN',
    UNID: 'UN',
    UNIDAD: 'UN',
    U: 'UN',
    ML: 'M',
    'M.L': 'M',
};

/**
 * Canonical form of a free-text description: lower case, no accents,
 * only [a-z0-9 ] with single spaces.
 */
export function normalizeText(value: unknown): string | null {
    if (value === null || value === undefined) return null;

    return String(value)
        .toLowerCase()
        .normalize('NFD')
        .replace(/\p{Mn}/gu, '')
        .replace(/[^a-z0-9 ]/g, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

export function normalizeUnit(value: unknown): string {
    if (value === null || value === undefined) return '';

    const unit = String(value)
        .trim()
        .toUpperCase()
        .replace(/M³|M\^3/g, 'M3')
        .replace(/M²|M\^2/g, 'M2')
        .replace(/\s+/g, '');

    return UNIT_SYNONYMS[unit] ?? unit;
}
