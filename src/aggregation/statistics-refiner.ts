import type { IdentityResolution } from '../identity/name-resolver.js';
import { getLogger } from '../utils/logger.js';
import { mergeFacultyStats, mergeGlobalFacultyStats } from './builders.js';
import type { AggregationContext } from './context.js';
import type { RelationshipTracker } from './relationship-tracker.js';

export interface RefinementSummary {
    /** Variant entries folded into an existing canonical entry */
    merged: number;
    /** Variant entries renamed because no canonical entry existed yet */
    renamed: number;
}

type NameMapping = Pick<IdentityResolution, 'canonicalOf'>;

/**
 * Moves every entry stored under a variant spelling onto its canonical key,
 * merging with an existing canonical entry or renaming in place.
 */
function collapseKeys<T extends { name: string }>(
    entries: Map<string, T>,
    mapping: NameMapping,
    merge: (target: T, source: T) => void,
    summary: RefinementSummary
): void {
    for (const name of [...entries.keys()]) {
        const canonical = mapping.canonicalOf(name);
        if (canonical === name) continue;

        const variant = entries.get(name);
        if (!variant) continue;
        entries.delete(name);

        const target = entries.get(canonical);
        if (target) {
            merge(target, variant);
            summary.merged++;
        } else {
            variant.name = canonical;
            entries.set(canonical, variant);
            summary.renamed++;
        }
    }
}

/**
 * Second pass over the folded statistics: applies a resolved name mapping so
 * that each person has exactly one faculty entry per category and one global
 * entry, then recomputes the derived counts.
 *
 * Runs only after the raw pass is sealed. Applying the same mapping again is
 * a no-op, since every key is already canonical.
 */
export class StatisticsRefiner {
    constructor(
        private readonly context: AggregationContext,
        private readonly tracker: RelationshipTracker
    ) {}

    apply(mapping: NameMapping): RefinementSummary {
        const { context } = this;
        context.assertPhase('refine', 'raw', 'refined');

        const summary: RefinementSummary = { merged: 0, renamed: 0 };

        for (const categoryFaculty of context.facultyStats.values()) {
            collapseKeys(categoryFaculty, mapping, mergeFacultyStats, summary);
        }

        for (const category of context.categoryData.values()) {
            const canonical = [...category.faculty].map((name) => mapping.canonicalOf(name));
            category.faculty.clear();
            for (const name of canonical) category.faculty.add(name);
        }

        collapseKeys(context.globalFacultyStats, mapping, mergeGlobalFacultyStats, summary);

        this.tracker.recompute();
        context.transition('refined');

        getLogger().info({ ...summary, faculty: context.globalFacultyStats.size }, 'Faculty statistics refined');
        return summary;
    }
}
