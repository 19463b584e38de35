import type {
    ArticleDetails,
    CategoryInfo,
    FacultyStats,
    GlobalFacultyStats,
    NameVariation,
} from '../types/index.js';
import type {
    SerializedArticle,
    SerializedCategory,
    SerializedFacultyStats,
    SerializedGlobalFacultyStats,
    SerializedResults,
} from '../types/serialized.js';
import type { AggregationSnapshot } from '../aggregation/orchestrator.js';

const round = (value: number) => Math.round(value * 100) / 100;

export function serializeCategory(category: CategoryInfo): SerializedCategory {
    return {
        name: category.name,
        key: category.key,
        path: [...category.path],
        level: category.level,
        parent: category.parent,
        url: category.url,
        article_count: category.articleCount,
        tc_count: category.tcCount,
        citation_average: round(category.citationAverage),
        faculty_count: category.facultyCount,
        department_count: category.departmentCount,
        article_ids: [...category.articleIds],
        themes: [...category.themes],
    };
}

export function serializeFacultyStats(stats: FacultyStats): SerializedFacultyStats {
    return {
        name: stats.name,
        category: stats.categoryKey,
        category_url: stats.categoryUrl,
        article_count: stats.articleCount,
        total_citations: stats.totalCitations,
        citation_average: round(stats.citationAverage),
        article_ids: [...stats.citationsByArticle.keys()],
        citations: Object.fromEntries(stats.citationsByArticle),
        titles: [...stats.titles],
        departments: [...stats.departments],
    };
}

export function serializeGlobalFacultyStats(
    stats: GlobalFacultyStats,
    variation?: NameVariation
): SerializedGlobalFacultyStats {
    return {
        name: stats.name,
        article_count: stats.articleCount,
        total_citations: stats.totalCitations,
        citation_average: round(stats.citationAverage),
        article_ids: [...stats.citationsByArticle.keys()],
        citations: Object.fromEntries(stats.citationsByArticle),
        titles: [...stats.titles],
        departments: [...stats.departments],
        categories: [...stats.categories],
        category_urls: [...stats.categoryUrls],
        variants: variation ? [...variation.variants].filter((v) => v !== stats.name).sort() : [],
    };
}

export function serializeArticle(article: ArticleDetails): SerializedArticle {
    return {
        id: article.id,
        title: article.title,
        tc_count: article.citationCount,
        year: article.year,
        journal: article.journal,
        abstract: article.abstract,
        authors: [...article.authors],
        departments: [...article.departments],
        categories: [...article.categories],
        themes: [...article.themes],
        url: article.url,
    };
}

/**
 * Flatten a refined snapshot into the five output collections.
 */
export function serializeResults(snapshot: AggregationSnapshot): SerializedResults {
    return {
        category_data: [...snapshot.categoryData.values()].map(serializeCategory),
        faculty_stats: [...snapshot.facultyStats.values()].flatMap((byName) =>
            [...byName.values()].map(serializeFacultyStats)
        ),
        article_stats: [...snapshot.articleStats].map(([category, articles]) => ({
            category,
            articles: [...articles.values()].map(serializeArticle),
        })),
        article_stats_object: [...snapshot.articleCitationMap.values()].map(serializeArticle),
        global_faculty_stats: [...snapshot.globalFacultyStats.values()].map((stats) =>
            serializeGlobalFacultyStats(stats, snapshot.nameVariations.get(stats.name))
        ),
    };
}
