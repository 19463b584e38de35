/**
 * JSON shapes written to output files and stored in the database.
 * Sets become arrays; maps become arrays or plain objects.
 */

export interface SerializedCategory {
    name: string;
    key: string;
    path: string[];
    level: number;
    parent: string | null;
    url: string;
    article_count: number;
    tc_count: number;
    citation_average: number;
    faculty_count: number;
    department_count: number;
    article_ids: string[];
    themes: string[];
}

export interface SerializedFacultyStats {
    name: string;
    category: string;
    category_url: string;
    article_count: number;
    total_citations: number;
    citation_average: number;
    article_ids: string[];
    /** Article id → citation count */
    citations: Record<string, number>;
    titles: string[];
    departments: string[];
}

export interface SerializedGlobalFacultyStats {
    name: string;
    article_count: number;
    total_citations: number;
    citation_average: number;
    article_ids: string[];
    citations: Record<string, number>;
    titles: string[];
    departments: string[];
    categories: string[];
    category_urls: string[];
    /** Other spellings merged into this name */
    variants: string[];
}

export interface SerializedArticle {
    id: string;
    title: string;
    tc_count: number;
    year: number | null;
    journal: string | null;
    abstract: string | null;
    authors: string[];
    departments: string[];
    categories: string[];
    themes: string[];
    url: string;
}

export interface SerializedCategoryArticles {
    category: string;
    articles: SerializedArticle[];
}

/**
 * Everything a run produces, in serializable form.
 */
export interface SerializedResults {
    category_data: SerializedCategory[];
    faculty_stats: SerializedFacultyStats[];
    article_stats: SerializedCategoryArticles[];
    article_stats_object: SerializedArticle[];
    global_faculty_stats: SerializedGlobalFacultyStats[];
}
