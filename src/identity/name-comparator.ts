import stringSimilarity from 'string-similarity';
import { DEFAULT_CONFIG, type IdentityConfig, type MatchRule } from '../types/index.js';
import type { ParsedName } from './name-normalizer.js';

export type IdentityVerdict = 'same' | 'distinct' | 'ambiguous';

/**
 * Outcome of comparing two names.
 */
export interface NameComparison {
    verdict: IdentityVerdict;

    /** Rule that produced a `same` verdict; a `same` without one is recorded as `similarity` */
    rule: MatchRule | null;

    /** Bigram similarity of the normalized forms, in [0, 1] */
    score: number;

    /**
     * True when the match rests on expanding an initial or a missing middle
     * name. Weak links are only kept if they do not bridge two people.
     */
    weak: boolean;
}

/**
 * Decides whether two names denote the same person.
 */
export interface NameComparator {
    compare(a: ParsedName, b: ParsedName): NameComparison;
}

/**
 * Dice coefficient over character bigrams, whitespace ignored.
 */
export function bigramSimilarity(a: string, b: string): number {
    return stringSimilarity.compareTwoStrings(a, b);
}

/**
 * Two given-name tokens are compatible when equal, or when one is an initial
 * of the other ("j" / "john").
 */
export function tokensCompatible(a: string, b: string): boolean {
    if (a === b) return true;
    if (a.length === 1) return b.startsWith(a);
    if (b.length === 1) return a.startsWith(b);
    return false;
}

/**
 * Given-name lists are compatible when the first names are compatible and
 * every middle position present in both is compatible. A middle name present
 * on only one side is allowed.
 */
export function givenNamesCompatible(a: readonly string[], b: readonly string[]): boolean {
    if (a.length === 0 || b.length === 0) return false;

    const shared = Math.min(a.length, b.length);
    for (let i = 0; i < shared; i++) {
        if (!tokensCompatible(a[i] ?? '', b[i] ?? '')) return false;
    }
    return true;
}

function sameTokenMultiset(a: readonly string[], b: readonly string[]): boolean {
    if (a.length !== b.length) return false;
    const sortedA = [...a].sort();
    const sortedB = [...b].sort();
    return sortedA.every((token, i) => token === sortedB[i]);
}

/**
 * Default identity policy:
 *
 * 1. `exact`: normalized forms equal
 * 2. `reordered`: same tokens in another order ("Smith John" / "John Smith")
 * 3. `initials` (weak): same family name, compatible given names
 * 4. `similarity`: family names within `familyThreshold`, same first initial,
 *    full-name similarity ≥ `threshold`
 * 5. `ambiguous`: as 4, with similarity in [`ambiguousFloor`, `threshold`)
 */
export class DefaultNameComparator implements NameComparator {
    constructor(private readonly policy: IdentityConfig = DEFAULT_CONFIG.identity) {}

    compare(a: ParsedName, b: ParsedName): NameComparison {
        if (a.tokens.length === 0 || b.tokens.length === 0) {
            return { verdict: 'distinct', rule: null, score: 0, weak: false };
        }

        if (a.normalized === b.normalized) {
            return { verdict: 'same', rule: 'exact', score: 1, weak: false };
        }

        if (sameTokenMultiset(a.tokens, b.tokens)) {
            return { verdict: 'same', rule: 'reordered', score: 1, weak: false };
        }

        const score = bigramSimilarity(a.normalized, b.normalized);

        if (a.family === b.family && givenNamesCompatible(a.given, b.given)) {
            return { verdict: 'same', rule: 'initials', score, weak: true };
        }

        const familyScore = bigramSimilarity(a.family, b.family);
        const firstInitialsAgree =
            a.given.length > 0 &&
            b.given.length > 0 &&
            a.given[0]?.charAt(0) === b.given[0]?.charAt(0);

        if (familyScore < this.policy.familyThreshold || !firstInitialsAgree) {
            return { verdict: 'distinct', rule: null, score, weak: false };
        }

        if (score >= this.policy.threshold) {
            return { verdict: 'same', rule: 'similarity', score, weak: false };
        }

        if (score >= this.policy.ambiguousFloor) {
            return { verdict: 'ambiguous', rule: null, score, weak: false };
        }

        return { verdict: 'distinct', rule: null, score, weak: false };
    }
}
