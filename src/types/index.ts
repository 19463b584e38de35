/**
 * Barrel export for all shared types.
 */
export type { ClassifiedRecord, CategoryPath, RawRecord } from './record.js';
export type {
    CategoryInfo,
    FacultyStats,
    GlobalFacultyStats,
    ArticleDetails,
    FacultyStatsMap,
    ArticleStatsMap,
    ArticleCitationMap,
    MatchRule,
    MatchBasis,
    NameVariation,
} from './stats.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    ScholarStatsConfig,
    LogLevel,
    IdentityConfig,
    AggregationConfig,
    RunRecord,
} from './config.js';
export type {
    SerializedCategory,
    SerializedFacultyStats,
    SerializedGlobalFacultyStats,
    SerializedArticle,
    SerializedCategoryArticles,
    SerializedResults,
} from './serialized.js';
