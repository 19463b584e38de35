import { createHash } from 'node:crypto';
import type {
    ArticleDetails,
    CategoryInfo,
    CategoryPath,
    ClassifiedRecord,
    FacultyStats,
    GlobalFacultyStats,
} from '../types/index.js';
import { foldDiacritics } from '../identity/name-normalizer.js';

export const CATEGORY_PATH_SEPARATOR = ' > ';

/**
 * Map key for a category path.
 */
export function categoryKey(path: CategoryPath): string {
    return path.join(CATEGORY_PATH_SEPARATOR);
}

/**
 * URL-safe slug: "Computer Science > AI & Robotics" → "computer-science-ai-robotics".
 */
export function slugify(text: string): string {
    return foldDiacritics(text)
        .toLowerCase()
        .replace(/[^a-z0-9-]+/g, '-')
        .replace(/-+/g, '-')
        .replace(/^-|-$/g, '');
}

/**
 * Deterministic 22-character identifier derived from a string.
 */
export function shortId(text: string): string {
    return createHash('sha256').update(text).digest('base64url').slice(0, 22);
}

// ─── Builders ────────────────────────────────────────────

export function createCategoryInfo(path: CategoryPath): CategoryInfo {
    if (path.length === 0) {
        throw new Error('Category path must not be empty');
    }
    if (path.some((label) => label.trim().length === 0)) {
        throw new Error(`Category path has an empty label: ${JSON.stringify(path)}`);
    }

    const key = categoryKey(path);
    const name = path[path.length - 1] ?? key;

    return {
        name,
        key,
        path: [...path],
        level: path.length,
        parent: path.length > 1 ? categoryKey(path.slice(0, -1)) : null,
        articleCount: 0,
        tcList: [],
        tcCount: 0,
        citationAverage: 0,
        articleIds: new Set(),
        titles: new Set(),
        faculty: new Set(),
        departments: new Set(),
        themes: new Set(),
        facultyCount: 0,
        departmentCount: 0,
        url: slugify(key),
    };
}

export function createFacultyStats(name: string, category: CategoryInfo): FacultyStats {
    if (name.trim().length === 0) {
        throw new Error(`Faculty name must not be empty (category "${category.key}")`);
    }

    return {
        name,
        categoryKey: category.key,
        categoryUrl: category.url,
        articleCount: 0,
        totalCitations: 0,
        citationAverage: 0,
        citationsByArticle: new Map(),
        titles: new Set(),
        departments: new Set(),
    };
}

export function createGlobalFacultyStats(name: string): GlobalFacultyStats {
    if (name.trim().length === 0) {
        throw new Error('Faculty name must not be empty');
    }

    return {
        name,
        articleCount: 0,
        totalCitations: 0,
        citationAverage: 0,
        citationsByArticle: new Map(),
        titles: new Set(),
        departments: new Set(),
        categories: new Set(),
        categoryUrls: new Set(),
    };
}

/**
 * Departments listed for an author. Only own keys count, so names such as
 * "constructor" never reach `Object.prototype`.
 */
export function departmentsOf(record: ClassifiedRecord, author: string): readonly string[] {
    return Object.hasOwn(record.affiliations, author) ? record.affiliations[author] ?? [] : [];
}

export function createArticleDetails(record: ClassifiedRecord): ArticleDetails {
    const departments = new Set<string>();
    for (const author of record.authors) {
        for (const department of departmentsOf(record, author)) departments.add(department);
    }

    return {
        id: record.id,
        title: record.title,
        citationCount: record.citationCount,
        year: record.year,
        journal: record.journal,
        abstract: record.abstract,
        authors: [...record.authors],
        departments,
        categories: new Set(),
        themes: new Set(record.themes),
        url: shortId(record.title || record.id),
    };
}

// ─── Citation bookkeeping ────────────────────────────────

type CitationStats = Pick<FacultyStats, 'articleCount' | 'totalCitations' | 'citationAverage' | 'citationsByArticle'>;

/**
 * Re-derive count, total and average from the per-article citation map.
 */
export function recomputeCitationTotals(stats: CitationStats): void {
    let total = 0;
    for (const count of stats.citationsByArticle.values()) total += count;

    stats.articleCount = stats.citationsByArticle.size;
    stats.totalCitations = total;
    stats.citationAverage = stats.articleCount > 0 ? total / stats.articleCount : 0;
}

/**
 * Credit one article to a faculty entry. Crediting the same article twice has no effect.
 */
export function addCitation(stats: CitationStats, articleId: string, citations: number): void {
    if (stats.citationsByArticle.has(articleId)) return;
    stats.citationsByArticle.set(articleId, citations);
    recomputeCitationTotals(stats);
}

/**
 * Union `source` into `target`: citation maps, titles and departments are
 * unioned and the totals re-derived, so an article credited to both is
 * counted once.
 */
export function mergeFacultyStats(target: FacultyStats, source: FacultyStats): void {
    unionCitationStats(target, source);
}

/**
 * Global counterpart of `mergeFacultyStats`; also unions the category sets.
 */
export function mergeGlobalFacultyStats(target: GlobalFacultyStats, source: GlobalFacultyStats): void {
    for (const category of source.categories) target.categories.add(category);
    for (const url of source.categoryUrls) target.categoryUrls.add(url);
    unionCitationStats(target, source);
}

function unionCitationStats(
    target: CitationStats & Pick<FacultyStats, 'titles' | 'departments'>,
    source: CitationStats & Pick<FacultyStats, 'titles' | 'departments'>
): void {
    for (const [articleId, citations] of source.citationsByArticle) {
        if (!target.citationsByArticle.has(articleId)) {
            target.citationsByArticle.set(articleId, citations);
        }
    }
    for (const title of source.titles) target.titles.add(title);
    for (const department of source.departments) target.departments.add(department);

    recomputeCitationTotals(target);
}

/**
 * Add one article's citation count to a category.
 */
export function creditCategory(category: CategoryInfo, articleId: string, citations: number, title: string): void {
    category.articleIds.add(articleId);
    category.articleCount++;
    category.tcList.push(citations);
    category.tcCount += citations;
    category.citationAverage = category.tcCount / category.articleCount;
    if (title) category.titles.add(title);
}
