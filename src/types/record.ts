/**
 * ClassifiedRecord: a publication that has already been tagged with
 * taxonomy categories upstream. This is the only input the aggregation
 * engine consumes.
 */
export interface ClassifiedRecord {
    /** Bibliographic identifier (usually a DOI), unique within a batch */
    id: string;

    /** Article title */
    title: string;

    /** Citation count at collection time */
    citationCount: number;

    /** Author display names, in byline order */
    authors: string[];

    /** Category paths, each ordered root → leaf */
    categories: CategoryPath[];

    /** Publication year */
    year: number | null;

    /** Department names keyed by author display name */
    affiliations: Record<string, string[]>;

    journal: string | null;
    abstract: string | null;
    url: string | null;

    /** Free-form themes attached by the classifier */
    themes: string[];
}

/**
 * Ordered taxonomy labels from root to leaf, e.g. ["Computer science", "Machine learning"].
 */
export type CategoryPath = readonly string[];

/**
 * Loosely-typed record as it arrives in an input file, before normalization.
 * Accepts both the project's own shape and the Crossref work shape.
 */
export interface RawRecord {
    id?: unknown;
    DOI?: unknown;
    doi?: unknown;
    title?: unknown;
    citationCount?: unknown;
    'is-referenced-by-count'?: unknown;
    authors?: unknown;
    author?: unknown;
    categories?: unknown;
    year?: unknown;
    published?: unknown;
    affiliations?: unknown;
    journal?: unknown;
    'container-title'?: unknown;
    abstract?: unknown;
    url?: unknown;
    URL?: unknown;
    themes?: unknown;
}
