import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type ScholarStatsConfig } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * CLI flags and config-file contents may set any key, including a subset of
 * the nested sections.
 */
export type ConfigOverrides = Partial<Omit<ScholarStatsConfig, 'identity' | 'aggregation'>> & {
    identity?: Partial<ScholarStatsConfig['identity']>;
    aggregation?: Partial<ScholarStatsConfig['aggregation']>;
};

/**
 * Load configuration from scholarstats.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('scholarstats', {
        searchPlaces: ['scholarstats.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return result.config as ConfigOverrides;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > config file > defaults.
 * Callers leave unset flags out of `cliFlags` rather than passing undefined.
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    searchFrom?: string
): Promise<ScholarStatsConfig> {
    const fileConfig = await loadConfigFile(searchFrom);

    const merged: ScholarStatsConfig = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...cliFlags,
        identity: {
            ...DEFAULT_CONFIG.identity,
            ...fileConfig?.identity,
            ...cliFlags.identity,
        },
        aggregation: {
            ...DEFAULT_CONFIG.aggregation,
            ...fileConfig?.aggregation,
            ...cliFlags.aggregation,
        },
    };

    // A threshold given alone pulls the ambiguous band down with it
    if (cliFlags.identity?.threshold !== undefined && cliFlags.identity.ambiguousFloor === undefined) {
        merged.identity.ambiguousFloor = Math.min(merged.identity.ambiguousFloor, merged.identity.threshold);
    }

    validateConfig(merged);
    return merged;
}

/**
 * Reject settings the resolver cannot work with.
 */
export function validateConfig(config: ScholarStatsConfig): void {
    const { threshold, ambiguousFloor, familyThreshold } = config.identity;

    for (const [name, value] of Object.entries({ threshold, ambiguousFloor, familyThreshold })) {
        if (!Number.isFinite(value) || value < 0 || value > 1) {
            throw new Error(`identity.${name} must be between 0 and 1, got ${value}`);
        }
    }

    if (ambiguousFloor > threshold) {
        throw new Error(`identity.ambiguousFloor (${ambiguousFloor}) must not exceed identity.threshold (${threshold})`);
    }

    if (config.yearFrom !== undefined && config.yearTo !== undefined && config.yearFrom > config.yearTo) {
        throw new Error(`yearFrom (${config.yearFrom}) is after yearTo (${config.yearTo})`);
    }
}
