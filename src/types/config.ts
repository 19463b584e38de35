/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Name identity resolution policy.
 */
export interface IdentityConfig {
    /** Minimum bigram similarity for a spelling-variant merge */
    threshold: number;

    /** Scores in [ambiguousFloor, threshold) are reported, never merged */
    ambiguousFloor: number;

    /** Minimum family-name similarity before any fuzzy comparison */
    familyThreshold: number;

    /** Only compare names that share a token initial */
    blocking: boolean;
}

/**
 * Category folding options.
 */
export interface AggregationConfig {
    /** Credit every ancestor of a tagged path as well as the path itself */
    rollUpAncestors: boolean;
}

/**
 * Full configuration merged from CLI flags and config file.
 */
export interface ScholarStatsConfig {
    // Input
    input?: string;
    yearFrom?: number;
    yearTo?: number;

    // Output
    out: string;
    db?: string;
    extend: boolean;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    identity: IdentityConfig;
    aggregation: AggregationConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ScholarStatsConfig = {
    out: './scholarstats-out',
    extend: false,
    logLevel: 'info',
    jsonLogs: false,
    identity: {
        threshold: 0.9,
        ambiguousFloor: 0.75,
        familyThreshold: 0.8,
        blocking: true,
    },
    aggregation: {
        rollUpAncestors: true,
    },
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    version: string;
    config_json: string;
    input: string | null;
    stats_json: string;
}
