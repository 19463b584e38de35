/**
 * Generational suffixes and degrees that never distinguish two people.
 */
const NAME_SUFFIXES: ReadonlySet<string> = new Set([
    'jr', 'sr', 'ii', 'iii', 'iv', 'phd', 'md', 'dr', 'prof',
]);

/**
 * A display name broken into comparable parts.
 */
export interface ParsedName {
    /** The name exactly as it appeared in the input */
    display: string;

    /** Tokens joined by single spaces, e.g. "jose a garcia" */
    normalized: string;

    tokens: string[];

    /** Every token except the last */
    given: string[];

    /** Last token, empty when the name has no tokens at all */
    family: string;
}

/**
 * Strip diacritics: "José Núñez" → "Jose Nunez".
 */
export function foldDiacritics(text: string): string {
    return text.normalize('NFD').replace(/\p{M}+/gu, '');
}

/**
 * Parse an author display name.
 * - Diacritics folded, lowercased
 * - "Family, Given" reordered to "Given Family"
 * - Periods, hyphens and other punctuation split tokens; apostrophes are dropped
 * - Suffixes and titles (Jr, PhD, Dr) removed
 */
export function parseName(display: string): ParsedName {
    let text = foldDiacritics(display).toLowerCase();

    const comma = text.indexOf(',');
    if (comma !== -1) {
        text = `${text.slice(comma + 1)} ${text.slice(0, comma)}`;
    }

    const tokens = text
        .replace(/['’`]/g, '')
        .replace(/[^\p{L}\p{N}\s]/gu, ' ')
        .split(/\s+/)
        .filter((token) => token.length > 0 && !NAME_SUFFIXES.has(token));

    return {
        display,
        normalized: tokens.join(' '),
        tokens,
        given: tokens.slice(0, -1),
        family: tokens[tokens.length - 1] ?? '',
    };
}

/**
 * Normalized comparison key for a display name.
 */
export function normalizeName(display: string): string {
    return parseName(display).normalized;
}

/**
 * Blocking keys: the first letter of the first token, plus the first letter
 * of every token longer than one character. Initials-only names key on every
 * token. Similarity matches need agreeing first initials, so the first key
 * alone keeps "P. Tchaikovsky" and "P. Chaikovsky" in one bucket.
 */
export function blockingKeys(name: ParsedName): string[] {
    const long = name.tokens.filter((token) => token.length > 1);
    const source = long.length > 0 ? [...name.tokens.slice(0, 1), ...long] : name.tokens;
    return [...new Set(source.map((token) => token.charAt(0)))];
}
