import {
    DEFAULT_CONFIG,
    type AggregationConfig,
    type ArticleCitationMap,
    type ArticleDetails,
    type ArticleStatsMap,
    type CategoryInfo,
    type FacultyStatsMap,
    type GlobalFacultyStats,
    type IdentityConfig,
} from '../types/index.js';
import { PhaseError } from '../utils/errors.js';
import { WarningCollector } from '../utils/warnings.js';

/**
 * Lifecycle of one aggregation run:
 *
 * - `collecting`: records may be folded in
 * - `raw`: the fold is sealed; counts reflect raw spellings
 * - `refined`: name variants merged; counts reflect distinct people
 */
export type AggregationPhase = 'collecting' | 'raw' | 'refined';

const PHASES: readonly AggregationPhase[] = ['collecting', 'raw', 'refined'];

const NEXT_PHASES: Record<AggregationPhase, readonly AggregationPhase[]> = {
    collecting: ['raw'],
    raw: ['refined'],
    refined: ['refined'],
};

export interface AggregationSettings {
    identity: IdentityConfig;
    aggregation: AggregationConfig;
}

/**
 * All mutable state of one run. Created per run and passed to every
 * component; nothing is cached at module or class level.
 */
export class AggregationContext {
    readonly categoryData = new Map<string, CategoryInfo>();
    readonly facultyStats: FacultyStatsMap = new Map();
    readonly globalFacultyStats = new Map<string, GlobalFacultyStats>();
    readonly articleStats: ArticleStatsMap = new Map();
    readonly articleCitationMap: ArticleCitationMap = new Map();

    /** Article id → details, shared by every category the article is in */
    readonly articles = new Map<string, ArticleDetails>();

    /** Distinct faculty display names in first-seen order */
    readonly vocabulary = new Set<string>();

    readonly settings: AggregationSettings;
    readonly warnings: WarningCollector;

    private currentPhase: AggregationPhase = 'collecting';

    constructor(settings: Partial<AggregationSettings> = {}, warnings: WarningCollector = new WarningCollector()) {
        this.settings = {
            identity: settings.identity ?? DEFAULT_CONFIG.identity,
            aggregation: settings.aggregation ?? DEFAULT_CONFIG.aggregation,
        };
        this.warnings = warnings;
    }

    get phase(): AggregationPhase {
        return this.currentPhase;
    }

    /**
     * Throw a PhaseError unless the context is in one of `allowed`.
     */
    assertPhase(operation: string, ...allowed: AggregationPhase[]): void {
        if (!allowed.includes(this.currentPhase)) {
            throw new PhaseError(operation, this.currentPhase, allowed);
        }
    }

    transition(to: AggregationPhase): void {
        if (!NEXT_PHASES[this.currentPhase].includes(to)) {
            const from = PHASES.filter((phase) => NEXT_PHASES[phase].includes(to));
            throw new PhaseError(`transition to "${to}"`, this.currentPhase, from);
        }
        this.currentPhase = to;
    }
}
