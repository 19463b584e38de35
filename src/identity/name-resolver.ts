import { UndirectedGraph } from 'graphology';
import { connectedComponents } from 'graphology-components';
import { DEFAULT_CONFIG, type IdentityConfig, type MatchBasis, type NameVariation } from '../types/index.js';
import { WarningCollector } from '../utils/warnings.js';
import { getLogger } from '../utils/logger.js';
import { DefaultNameComparator, type NameComparator } from './name-comparator.js';
import { blockingKeys, parseName, type ParsedName } from './name-normalizer.js';

/**
 * Result of resolving a run's faculty-name vocabulary.
 */
export interface IdentityResolution {
    /** Canonical name → its identity group, sorted by canonical name */
    readonly variations: ReadonlyMap<string, NameVariation>;

    /** Canonical spelling for a name; names never seen map to themselves */
    canonicalOf(name: string): string;

    /** Pairs that scored in the ambiguous band and were kept apart */
    readonly ambiguous: readonly AmbiguousPair[];
}

export interface AmbiguousPair {
    a: string;
    b: string;
    score: number;
}

export interface NameResolverOptions {
    comparator?: NameComparator;
    identity?: IdentityConfig;
    warnings?: WarningCollector;
}

interface WeakLink {
    a: string;
    b: string;
    basis: MatchBasis;
}

/**
 * Partitions author display names into groups that denote the same person.
 *
 * Pairwise decisions come from a pluggable comparator. Strong matches become
 * edges of an identity graph; initials-only matches are added afterwards,
 * unless they would bridge two names the comparator keeps apart. Groups are
 * the connected components of the final graph, so identity is transitive.
 */
export class NameIdentityResolver {
    private readonly comparator: NameComparator;
    private readonly identity: IdentityConfig;
    private readonly warnings: WarningCollector;

    constructor(options: NameResolverOptions = {}) {
        this.identity = options.identity ?? DEFAULT_CONFIG.identity;
        this.comparator = options.comparator ?? new DefaultNameComparator(this.identity);
        this.warnings = options.warnings ?? new WarningCollector();
    }

    resolve(vocabulary: Iterable<string>): IdentityResolution {
        const parsed = new Map<string, ParsedName>();
        for (const name of vocabulary) {
            if (!parsed.has(name)) parsed.set(name, parseName(name));
        }

        const names = [...parsed.keys()];
        const graph = new UndirectedGraph();
        for (const name of names) graph.addNode(name);

        const basis: MatchBasis[] = [];
        const weakLinks: WeakLink[] = [];
        const ambiguous: AmbiguousPair[] = [];
        let comparisons = 0;

        for (const [i, j] of this.candidatePairs(names, parsed)) {
            const a = names[i];
            const b = names[j];
            const parsedA = a === undefined ? undefined : parsed.get(a);
            const parsedB = b === undefined ? undefined : parsed.get(b);
            if (!a || !b || !parsedA || !parsedB) continue;

            comparisons++;
            const result = this.comparator.compare(parsedA, parsedB);

            if (result.verdict === 'same') {
                const match: MatchBasis = { a, b, rule: result.rule ?? 'similarity', score: result.score };
                if (result.weak) {
                    weakLinks.push({ a, b, basis: match });
                } else {
                    graph.mergeEdge(a, b);
                    basis.push(match);
                }
            } else if (result.verdict === 'ambiguous') {
                ambiguous.push({ a, b, score: result.score });
                this.warnings.add(
                    'AmbiguousIdentity',
                    'Names are similar but below the merge threshold; kept apart',
                    a,
                    { other: b, score: result.score }
                );
            }
        }

        basis.push(...this.acceptWeakLinks(graph, weakLinks, parsed));

        const canonicalByName = new Map<string, string>();
        const groups: NameVariation[] = [];

        for (const component of connectedComponents(graph)) {
            const members = component.flatMap((name) => {
                const p = parsed.get(name);
                return p ? [p] : [];
            });
            const canonical = pickCanonical(members);
            const memberSet = new Set(component);

            for (const name of component) canonicalByName.set(name, canonical);

            groups.push(Object.freeze({
                canonical,
                variants: memberSet,
                basis: Object.freeze(basis.filter((m) => memberSet.has(m.a))),
            }));
        }

        groups.sort((x, y) => compareStrings(x.canonical, y.canonical));
        const variations = new Map(groups.map((g) => [g.canonical, g]));

        const merged = groups.filter((g) => g.variants.size > 1).length;
        getLogger().info(
            { names: names.length, identities: groups.length, mergedGroups: merged, comparisons, ambiguous: ambiguous.length },
            'Faculty names resolved'
        );

        return {
            variations,
            canonicalOf: (name: string) => canonicalByName.get(name) ?? name,
            ambiguous,
        };
    }

    /**
     * Index pairs (i < j) worth comparing. With blocking on, only names that
     * share a blocking key are paired.
     */
    private *candidatePairs(names: string[], parsed: Map<string, ParsedName>): Generator<[number, number]> {
        if (!this.identity.blocking) {
            for (let i = 0; i < names.length; i++) {
                for (let j = i + 1; j < names.length; j++) yield [i, j];
            }
            return;
        }

        const buckets = new Map<string, number[]>();
        names.forEach((name, index) => {
            const p = parsed.get(name);
            if (!p) return;
            for (const key of blockingKeys(p)) {
                const bucket = buckets.get(key);
                if (bucket) bucket.push(index);
                else buckets.set(key, [index]);
            }
        });

        const seen = new Set<string>();
        for (const bucket of buckets.values()) {
            for (let x = 0; x < bucket.length; x++) {
                for (let y = x + 1; y < bucket.length; y++) {
                    const i = bucket[x] ?? 0;
                    const j = bucket[y] ?? 0;
                    const pairKey = `${i}:${j}`;
                    if (seen.has(pairKey)) continue;
                    seen.add(pairKey);
                    yield [i, j];
                }
            }
        }
    }

    /**
     * Add initials-only links to the graph, except around names whose weak
     * neighbours belong to people the comparator tells apart. "J. Smith" next
     * to both "John Smith" and "Jane Smith" stays on its own.
     */
    private acceptWeakLinks(
        graph: UndirectedGraph,
        weakLinks: WeakLink[],
        parsed: Map<string, ParsedName>
    ): MatchBasis[] {
        if (weakLinks.length === 0) return [];

        const groupOf = new Map<string, number>();
        const representatives: ParsedName[] = [];
        connectedComponents(graph).forEach((component, index) => {
            for (const name of component) groupOf.set(name, index);
            representatives.push(pickCanonicalParsed(component.flatMap((n) => {
                const p = parsed.get(n);
                return p ? [p] : [];
            })));
        });

        const neighbours = new Map<string, Set<string>>();
        for (const link of weakLinks) {
            for (const [from, to] of [[link.a, link.b], [link.b, link.a]] as const) {
                const set = neighbours.get(from);
                if (set) set.add(to);
                else neighbours.set(from, new Set([to]));
            }
        }

        const conflicted = new Set<string>();
        for (const [name, adjacent] of neighbours) {
            const groupIds = new Set<number>();
            for (const member of [name, ...adjacent]) {
                const id = groupOf.get(member);
                if (id !== undefined) groupIds.add(id);
            }

            const reps = [...groupIds].flatMap((id) => {
                const rep = representatives[id];
                return rep ? [rep] : [];
            });
            const candidates = reps.filter((r) => r.display !== representatives[groupOf.get(name) ?? -1]?.display);

            if (!this.mutuallyCompatible(reps)) {
                conflicted.add(name);
                this.warnings.add(
                    'AmbiguousIdentity',
                    'Name matches several distinct people by initials; kept apart',
                    name,
                    { candidates: candidates.map((c) => c.display) }
                );
            }
        }

        const accepted: MatchBasis[] = [];
        for (const link of weakLinks) {
            if (conflicted.has(link.a) || conflicted.has(link.b)) continue;
            graph.mergeEdge(link.a, link.b);
            accepted.push(link.basis);
        }
        return accepted;
    }

    private mutuallyCompatible(reps: ParsedName[]): boolean {
        for (let i = 0; i < reps.length; i++) {
            for (let j = i + 1; j < reps.length; j++) {
                const a = reps[i];
                const b = reps[j];
                if (a && b && this.comparator.compare(a, b).verdict !== 'same') return false;
            }
        }
        return true;
    }
}

function compareStrings(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Most complete spelling wins: most tokens, then longest normalized form,
 * then longest display string, then lexicographically smallest display.
 * The result does not depend on input order.
 */
function pickCanonicalParsed(members: ParsedName[]): ParsedName {
    const sorted = [...members].sort((x, y) =>
        y.tokens.length - x.tokens.length ||
        y.normalized.length - x.normalized.length ||
        y.display.length - x.display.length ||
        compareStrings(x.display, y.display)
    );
    const best = sorted[0];
    if (!best) throw new Error('Cannot pick a canonical name from an empty group');
    return best;
}

export function pickCanonical(members: ParsedName[]): string {
    return pickCanonicalParsed(members).display;
}
