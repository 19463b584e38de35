import type { CategoryPath } from './record.js';

/**
 * Running statistics for one category path.
 *
 * `facultyCount` and `departmentCount` mirror the sizes of `faculty` and
 * `departments`. Only the relationship tracker writes them.
 */
export interface CategoryInfo {
    /** Leaf label of the path */
    name: string;

    /** Map key: path labels joined with " > " */
    key: string;

    path: CategoryPath;

    /** Depth of the path, 1 for a root category */
    level: number;

    /** Key of the parent path, null at the root */
    parent: string | null;

    articleCount: number;

    /** One citation count per contributing article */
    tcList: number[];

    tcCount: number;
    citationAverage: number;

    articleIds: Set<string>;
    titles: Set<string>;
    faculty: Set<string>;
    departments: Set<string>;
    themes: Set<string>;

    facultyCount: number;
    departmentCount: number;

    /** URL-safe slug of the category name */
    url: string;
}

/**
 * One faculty member's contribution to one category.
 */
export interface FacultyStats {
    name: string;
    categoryKey: string;
    categoryUrl: string;
    articleCount: number;
    totalCitations: number;
    citationAverage: number;

    /** Article id → citation count. Its keys are the contributing article ids. */
    citationsByArticle: Map<string, number>;

    titles: Set<string>;
    departments: Set<string>;
}

/**
 * A faculty member's contribution across every category.
 */
export interface GlobalFacultyStats {
    name: string;
    articleCount: number;
    totalCitations: number;
    citationAverage: number;
    citationsByArticle: Map<string, number>;
    titles: Set<string>;
    departments: Set<string>;
    categories: Set<string>;
    categoryUrls: Set<string>;
}

/**
 * Per-article metadata serialized alongside the category statistics.
 */
export interface ArticleDetails {
    id: string;
    title: string;
    citationCount: number;
    year: number | null;
    journal: string | null;
    abstract: string | null;
    authors: string[];
    departments: Set<string>;
    categories: Set<string>;
    themes: Set<string>;

    /** Short deterministic identifier derived from the title */
    url: string;
}

/** Category key → (faculty display name → stats) */
export type FacultyStatsMap = Map<string, Map<string, FacultyStats>>;

/** Category key → (article id → details) */
export type ArticleStatsMap = Map<string, Map<string, ArticleDetails>>;

/** Article title → details */
export type ArticleCitationMap = Map<string, ArticleDetails>;

/**
 * How a pair of names ended up in the same identity group.
 */
export type MatchRule = 'exact' | 'reordered' | 'initials' | 'similarity';

export interface MatchBasis {
    a: string;
    b: string;
    rule: MatchRule;
    score: number;
}

/**
 * One resolved identity: the canonical spelling and every spelling known to
 * denote the same person.
 */
export interface NameVariation {
    readonly canonical: string;
    readonly variants: ReadonlySet<string>;
    readonly basis: readonly MatchBasis[];
}
