import { describe, it, expect } from 'vitest';
import { blockingKeys, foldDiacritics, normalizeName, parseName } from '../identity/name-normalizer.js';
import { DefaultNameComparator, givenNamesCompatible, tokensCompatible, type NameComparator } from '../identity/name-comparator.js';
import { NameIdentityResolver, pickCanonical } from '../identity/name-resolver.js';
import { WarningCollector } from '../utils/warnings.js';
import { DEFAULT_CONFIG } from '../types/index.js';

// ─── Normalization ────────────────────────────────────────

describe('parseName', () => {
    it('reorders "Family, Given" and drops periods', () => {
        const name = parseName('Smith, John A.');
        expect(name.tokens).toEqual(['john', 'a', 'smith']);
        expect(name.normalized).toBe('john a smith');
        expect(name.given).toEqual(['john', 'a']);
        expect(name.family).toBe('smith');
        expect(name.display).toBe('Smith, John A.');
    });

    it('folds diacritics and splits on hyphens', () => {
        expect(parseName('José Núñez-García').tokens).toEqual(['jose', 'nunez', 'garcia']);
    });

    it('drops titles, suffixes and apostrophes', () => {
        expect(parseName("Dr. Mary O'Brien Jr.").tokens).toEqual(['mary', 'obrien']);
    });

    it('handles an empty name', () => {
        const name = parseName('   ');
        expect(name.tokens).toEqual([]);
        expect(name.family).toBe('');
        expect(normalizeName('   ')).toBe('');
    });
});

describe('foldDiacritics', () => {
    it('strips combining marks', () => {
        expect(foldDiacritics('Núñez Ångström')).toBe('Nunez Angstrom');
    });
});

describe('blockingKeys', () => {
    it('keys on the first initial and every longer token', () => {
        expect(blockingKeys(parseName('J. Smith'))).toEqual(['j', 's']);
        expect(blockingKeys(parseName('John Smith'))).toEqual(['j', 's']);
        expect(blockingKeys(parseName('A. B. Kowalczyk'))).toEqual(['a', 'k']);
    });

    it('falls back to initials for initials-only names', () => {
        expect(blockingKeys(parseName('J. K.'))).toEqual(['j', 'k']);
    });
});

// ─── Comparator ───────────────────────────────────────────

describe('DefaultNameComparator', () => {
    const comparator = new DefaultNameComparator();
    const compare = (a: string, b: string) => comparator.compare(parseName(a), parseName(b));

    it('matches identical normalized forms exactly', () => {
        expect(compare('John Smith', 'john  smith')).toEqual({ verdict: 'same', rule: 'exact', score: 1, weak: false });
        expect(compare('Smith, John', 'John Smith').rule).toBe('exact');
    });

    it('matches reordered tokens', () => {
        expect(compare('Smith John', 'John Smith')).toEqual({ verdict: 'same', rule: 'reordered', score: 1, weak: false });
    });

    it('treats an initial as a weak match', () => {
        const result = compare('J. Smith', 'John Smith');
        expect(result.verdict).toBe('same');
        expect(result.rule).toBe('initials');
        expect(result.weak).toBe(true);
    });

    it('keeps different given names apart', () => {
        const result = compare('John Smith', 'Jane Smith');
        expect(result.verdict).toBe('distinct');
        expect(result.score).toBeCloseTo(0.5, 5);
    });

    it('merges close spelling variants by similarity', () => {
        const result = compare('Maria Gonzalez', 'Maria Gonzales');
        expect(result.verdict).toBe('same');
        expect(result.rule).toBe('similarity');
        expect(result.score).toBeCloseTo(22 / 24, 5);
    });

    it('reports scores in the ambiguous band without merging', () => {
        const result = compare('Jonathan Smith', 'Jonathon Smith');
        expect(result.verdict).toBe('ambiguous');
        expect(result.rule).toBeNull();
        expect(result.score).toBeCloseTo(20 / 24, 5);

        expect(compare('John Smith', 'Joan Smith').verdict).toBe('ambiguous');
    });

    it('keeps names with dissimilar family names apart', () => {
        expect(compare('John Smith', 'John Smyth').verdict).toBe('distinct');
    });

    it('never matches an empty name', () => {
        expect(compare('', 'John Smith')).toEqual({ verdict: 'distinct', rule: null, score: 0, weak: false });
    });

    it('honours a stricter policy', () => {
        const strict = new DefaultNameComparator({ ...DEFAULT_CONFIG.identity, threshold: 0.95 });
        expect(strict.compare(parseName('Maria Gonzalez'), parseName('Maria Gonzales')).verdict).toBe('ambiguous');
    });
});

describe('given-name compatibility', () => {
    it('accepts an initial for a full name', () => {
        expect(tokensCompatible('j', 'john')).toBe(true);
        expect(tokensCompatible('john', 'jane')).toBe(false);
    });

    it('allows a middle name on one side only', () => {
        expect(givenNamesCompatible(['john'], ['john', 'a'])).toBe(true);
        expect(givenNamesCompatible(['john', 'a'], ['john', 'b'])).toBe(false);
        expect(givenNamesCompatible([], ['john'])).toBe(false);
    });
});

// ─── Resolver ─────────────────────────────────────────────

describe('NameIdentityResolver', () => {
    it('merges an initial into the full name', () => {
        const resolution = new NameIdentityResolver().resolve(['J. Smith', 'John Smith']);

        expect(resolution.canonicalOf('J. Smith')).toBe('John Smith');
        expect(resolution.canonicalOf('John Smith')).toBe('John Smith');
        expect(resolution.variations.size).toBe(1);
        expect([...(resolution.variations.get('John Smith')?.variants ?? [])].sort()).toEqual(['J. Smith', 'John Smith']);
    });

    it('records the rule behind each merge', () => {
        const resolution = new NameIdentityResolver().resolve(['J. Smith', 'John Smith']);
        const basis = resolution.variations.get('John Smith')?.basis ?? [];
        expect(basis.map((m) => m.rule)).toEqual(['initials']);
    });

    it('is transitive across strong and weak links', () => {
        const resolution = new NameIdentityResolver().resolve(['Maria Gonzalez', 'Maria Gonzales', 'M. Gonzales']);

        expect(resolution.variations.size).toBe(1);
        expect(resolution.canonicalOf('Maria Gonzalez')).toBe('Maria Gonzales');
        expect(resolution.canonicalOf('M. Gonzales')).toBe('Maria Gonzales');
    });

    it('keeps an initial apart when it fits two different people', () => {
        const warnings = new WarningCollector();
        const resolution = new NameIdentityResolver({ warnings }).resolve(['J. Smith', 'John Smith', 'Jane Smith']);

        expect(resolution.variations.size).toBe(3);
        expect(resolution.canonicalOf('J. Smith')).toBe('J. Smith');

        const ambiguous = warnings.list('AmbiguousIdentity');
        expect(ambiguous).toHaveLength(1);
        expect(ambiguous[0]?.subject).toBe('J. Smith');
        expect(ambiguous[0]?.details).toEqual({ candidates: ['John Smith', 'Jane Smith'] });
    });

    it('reports but does not merge ambiguous spellings', () => {
        const warnings = new WarningCollector();
        const resolution = new NameIdentityResolver({ warnings }).resolve(['Jonathan Smith', 'Jonathon Smith']);

        expect(resolution.variations.size).toBe(2);
        expect(resolution.ambiguous).toHaveLength(1);
        expect(resolution.ambiguous[0]?.a).toBe('Jonathan Smith');
        expect(resolution.ambiguous[0]?.b).toBe('Jonathon Smith');
        expect(warnings.count('AmbiguousIdentity')).toBe(1);
    });

    it('does not depend on input order', () => {
        const names = ['Smith, John', 'J. Smith', 'John Smith', 'Maria Gonzales', 'Maria Gonzalez', 'Ada Lovelace'];
        const forward = new NameIdentityResolver().resolve(names);
        const backward = new NameIdentityResolver().resolve([...names].reverse());

        expect([...forward.variations.keys()]).toEqual([...backward.variations.keys()]);
        for (const name of names) {
            expect(forward.canonicalOf(name)).toBe(backward.canonicalOf(name));
        }
    });

    it('gives the same groups with blocking disabled', () => {
        const names = ['J. Smith', 'John Smith', 'Maria Gonzales', 'Maria Gonzalez'];
        const blocked = new NameIdentityResolver().resolve(names);
        const exhaustive = new NameIdentityResolver({
            identity: { ...DEFAULT_CONFIG.identity, blocking: false },
        }).resolve(names);

        expect([...exhaustive.variations.keys()]).toEqual([...blocked.variations.keys()]);
    });

    it('finds the same ambiguous pairs with blocking disabled', () => {
        const names = ['P. Tchaikovsky', 'P. Chaikovsky', 'M. Gonzalez', 'M. Conzalez', 'A. B. Kowalczyk', 'A. B. Cowalczyk'];
        const pairs = (blocking: boolean) =>
            new NameIdentityResolver({ identity: { ...DEFAULT_CONFIG.identity, blocking } })
                .resolve(names)
                .ambiguous.map((pair) => `${pair.a} / ${pair.b}`)
                .sort();

        expect(pairs(true)).toEqual(pairs(false));
        expect(pairs(true)).toHaveLength(3);
    });

    it('links names a custom comparator calls the same without naming a rule', () => {
        const alwaysSame: NameComparator = {
            compare: () => ({ verdict: 'same', rule: null, score: 1, weak: false }),
        };
        const resolution = new NameIdentityResolver({
            comparator: alwaysSame,
            identity: { ...DEFAULT_CONFIG.identity, blocking: false },
        }).resolve(['A One', 'B Two']);

        expect(resolution.variations.size).toBe(1);
        expect(resolution.canonicalOf('B Two')).toBe('A One');
        expect(resolution.variations.get('A One')?.basis).toEqual([
            { a: 'A One', b: 'B Two', rule: 'similarity', score: 1 },
        ]);
    });

    it('sorts variations by canonical name', () => {
        const resolution = new NameIdentityResolver().resolve(['Zoe Young', 'Ada Lovelace', 'Mary Obrien']);
        expect([...resolution.variations.keys()]).toEqual(['Ada Lovelace', 'Mary Obrien', 'Zoe Young']);
    });

    it('maps unknown names to themselves', () => {
        const resolution = new NameIdentityResolver().resolve([]);
        expect(resolution.canonicalOf('Nobody')).toBe('Nobody');
        expect(resolution.variations.size).toBe(0);
    });
});

describe('pickCanonical', () => {
    it('prefers the most complete spelling', () => {
        expect(pickCanonical([parseName('J. Smith'), parseName('John A. Smith'), parseName('John Smith')])).toBe('John A. Smith');
    });

    it('breaks ties by display length, then lexicographically', () => {
        expect(pickCanonical([parseName('John Smith'), parseName('Smith, John')])).toBe('Smith, John');
        expect(pickCanonical([parseName('Maria Gonzalez'), parseName('Maria Gonzales')])).toBe('Maria Gonzales');
    });
});
