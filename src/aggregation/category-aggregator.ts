import type {
    ArticleDetails,
    CategoryInfo,
    CategoryPath,
    ClassifiedRecord,
    FacultyStats,
    GlobalFacultyStats,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import type { AggregationContext } from './context.js';
import {
    addCitation,
    categoryKey,
    createArticleDetails,
    createCategoryInfo,
    createFacultyStats,
    createGlobalFacultyStats,
    creditCategory,
    departmentsOf,
} from './builders.js';

/**
 * Outcome of one `process()` call.
 */
export interface FoldTally {
    processed: number;
    malformed: number;
    /** Records already present in every category they were tagged with */
    duplicates: number;
}

/**
 * Check a record for the fields aggregation cannot do without.
 * Returns one message per problem; an empty list means the record is usable.
 */
export function validateRecord(record: ClassifiedRecord): string[] {
    const problems: string[] = [];

    if (typeof record.id !== 'string' || record.id.trim().length === 0) {
        problems.push('missing identifier');
    }
    if (!Array.isArray(record.categories) || record.categories.length === 0) {
        problems.push('no category tags');
    } else if (record.categories.some((path) => path.length === 0 || path.some((label) => label.trim().length === 0))) {
        problems.push('empty category path or label');
    }
    if (!Array.isArray(record.authors) || record.authors.every((author) => author.trim().length === 0)) {
        problems.push('no authors');
    }
    if (!Number.isInteger(record.citationCount) || record.citationCount < 0) {
        problems.push(`invalid citation count: ${record.citationCount}`);
    }

    return problems;
}

/**
 * Folds classified records into per-category statistics, per-category
 * faculty statistics, global faculty statistics and article statistics.
 *
 * A record contributes once to each category it is tagged with. Derived
 * faculty/department counts are left to the relationship tracker.
 */
export class CategoryAggregator {
    constructor(private readonly context: AggregationContext) {}

    process(records: Iterable<ClassifiedRecord>): FoldTally {
        this.context.assertPhase('process', 'collecting');

        const tally: FoldTally = { processed: 0, malformed: 0, duplicates: 0 };

        for (const record of records) {
            const problems = validateRecord(record);
            if (problems.length > 0) {
                tally.malformed++;
                this.context.warnings.add('MalformedRecord', `Record skipped: ${problems.join('; ')}`, record.id || null);
                continue;
            }

            if (this.fold(record)) {
                tally.processed++;
            } else {
                tally.duplicates++;
            }
        }

        getLogger().debug({ ...tally, categories: this.context.categoryData.size }, 'Records folded');
        return tally;
    }

    /**
     * Fold one valid record. Returns false when every category already held it.
     */
    private fold(record: ClassifiedRecord): boolean {
        const { context } = this;
        const authors = distinctAuthors(record.authors);
        const details = context.articles.get(record.id) ?? createArticleDetails(record);

        const contributed: CategoryInfo[] = [];
        const alreadyCounted: string[] = [];

        for (const path of this.expandPaths(record.categories)) {
            const category = this.categoryFor(path);

            if (category.articleIds.has(record.id)) {
                alreadyCounted.push(category.key);
                continue;
            }

            creditCategory(category, record.id, record.citationCount, record.title);
            for (const theme of record.themes) category.themes.add(theme);

            const categoryFaculty = this.facultyMapFor(category.key);
            for (const author of authors) {
                const departments = departmentsOf(record, author);
                category.faculty.add(author);
                for (const department of departments) category.departments.add(department);

                const stats = this.facultyEntryFor(categoryFaculty, author, category);
                addCitation(stats, record.id, record.citationCount);
                if (record.title) stats.titles.add(record.title);
                for (const department of departments) stats.departments.add(department);
            }

            details.categories.add(category.key);
            this.articleMapFor(category.key).set(record.id, details);
            contributed.push(category);
        }

        if (alreadyCounted.length > 0) {
            context.warnings.add(
                'DuplicateRecord',
                'Record already counted; contribution skipped',
                record.id,
                { categories: alreadyCounted }
            );
        }

        if (contributed.length === 0) return false;

        for (const author of authors) {
            context.vocabulary.add(author);

            const global = this.globalEntryFor(author);
            addCitation(global, record.id, record.citationCount);
            if (record.title) global.titles.add(record.title);
            for (const department of departmentsOf(record, author)) global.departments.add(department);
            for (const category of contributed) {
                global.categories.add(category.key);
                global.categoryUrls.add(category.url);
            }
        }

        context.articles.set(record.id, details);
        const titleKey = record.title || record.id;
        if (!context.articleCitationMap.has(titleKey)) {
            context.articleCitationMap.set(titleKey, details);
        }

        return true;
    }

    /**
     * Distinct paths a record contributes to, ancestors included when
     * roll-up is on. A path shared by two tags is visited once.
     */
    private expandPaths(paths: readonly CategoryPath[]): CategoryPath[] {
        const expanded = new Map<string, CategoryPath>();
        const rollUp = this.context.settings.aggregation.rollUpAncestors;

        for (const path of paths) {
            const trimmed = path.map((label) => label.trim());
            const start = rollUp ? 1 : trimmed.length;
            for (let depth = start; depth <= trimmed.length; depth++) {
                const prefix = trimmed.slice(0, depth);
                const key = categoryKey(prefix);
                if (!expanded.has(key)) expanded.set(key, prefix);
            }
        }

        return [...expanded.values()];
    }

    private categoryFor(path: CategoryPath): CategoryInfo {
        const key = categoryKey(path);
        let category = this.context.categoryData.get(key);
        if (!category) {
            category = createCategoryInfo(path);
            this.context.categoryData.set(key, category);
        }
        return category;
    }

    private facultyMapFor(key: string): Map<string, FacultyStats> {
        let map = this.context.facultyStats.get(key);
        if (!map) {
            map = new Map();
            this.context.facultyStats.set(key, map);
        }
        return map;
    }

    private facultyEntryFor(map: Map<string, FacultyStats>, author: string, category: CategoryInfo): FacultyStats {
        let stats = map.get(author);
        if (!stats) {
            stats = createFacultyStats(author, category);
            map.set(author, stats);
        }
        return stats;
    }

    private globalEntryFor(author: string): GlobalFacultyStats {
        let stats = this.context.globalFacultyStats.get(author);
        if (!stats) {
            stats = createGlobalFacultyStats(author);
            this.context.globalFacultyStats.set(author, stats);
        }
        return stats;
    }

    private articleMapFor(key: string): Map<string, ArticleDetails> {
        let map = this.context.articleStats.get(key);
        if (!map) {
            map = new Map();
            this.context.articleStats.set(key, map);
        }
        return map;
    }
}

/**
 * Trimmed, non-empty author names with repeats removed, byline order kept.
 */
function distinctAuthors(authors: readonly string[]): string[] {
    return [...new Set(authors.map((author) => author.trim()).filter((author) => author.length > 0))];
}
