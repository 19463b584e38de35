/**
 * Shared helpers for turning loosely-typed input into record fields.
 */

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
        .replace(/^doi:/i, '')
        .trim() || null;
}

/**
 * Remove JATS/HTML markup from an abstract and collapse whitespace.
 * "<jats:p>Deep <jats:italic>nets</jats:italic></jats:p>" → "Deep nets"
 */
export function stripMarkup(text: string | null | undefined): string | null {
    if (!text) return null;
    const cleaned = text
        .replace(/<[^>]+>/g, ' ')
        .replace(/\s+/g, ' ')
        .trim();
    return cleaned || null;
}

/**
 * A trimmed string, or the first string of an array (Crossref wraps titles
 * and journal names in one-element arrays).
 */
export function firstString(value: unknown): string | null {
    if (typeof value === 'string') return value.trim() || null;
    if (Array.isArray(value)) {
        for (const item of value) {
            if (typeof item === 'string' && item.trim()) return item.trim();
        }
    }
    return null;
}

export function stringList(value: unknown): string[] {
    if (!Array.isArray(value)) return [];
    return value
        .filter((item): item is string => typeof item === 'string')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

/**
 * Finite number from a number or numeric string, null when absent or unusable.
 */
export function toNumber(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

export function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
