import type {
    ArticleCitationMap,
    ArticleStatsMap,
    CategoryInfo,
    ClassifiedRecord,
    FacultyStatsMap,
    GlobalFacultyStats,
    NameVariation,
} from '../types/index.js';
import { NameIdentityResolver, type IdentityResolution } from '../identity/name-resolver.js';
import type { NameComparator } from '../identity/name-comparator.js';
import type { Diagnostic, WarningCollector } from '../utils/warnings.js';
import { getLogger } from '../utils/logger.js';
import { AggregationContext, type AggregationSettings } from './context.js';
import { CategoryAggregator, type FoldTally } from './category-aggregator.js';
import { RelationshipTracker } from './relationship-tracker.js';
import { StatisticsRefiner, type RefinementSummary } from './statistics-refiner.js';
import { mergeAggregates } from './merge.js';

/**
 * Finished aggregates, ready for serialization.
 */
export interface AggregationSnapshot {
    categoryData: Map<string, CategoryInfo>;
    facultyStats: FacultyStatsMap;
    articleStats: ArticleStatsMap;
    articleCitationMap: ArticleCitationMap;
    globalFacultyStats: Map<string, GlobalFacultyStats>;
    nameVariations: ReadonlyMap<string, NameVariation>;
    warnings: Diagnostic[];
}

export interface RunSummary {
    fold: FoldTally;
    refinement: RefinementSummary;
    categories: number;
    faculty: number;
    articles: number;
}

export interface OrchestratorOptions {
    settings?: Partial<AggregationSettings>;
    comparator?: NameComparator;
    /** Collector shared with the loader, so one run reports all diagnostics together */
    warnings?: WarningCollector;
}

/**
 * Sequences one aggregation run:
 *
 * 1. Fold all records (CategoryAggregator)
 * 2. Seal the raw pass and recompute counts over raw spellings
 * 3. Resolve the faculty-name vocabulary into identities
 * 4. Merge name variants (StatisticsRefiner)
 * 5. Recompute and verify counts over distinct people
 *
 * Identity resolution needs the whole vocabulary, so steps 3–5 cannot start
 * until every record has been folded.
 */
export class AggregationOrchestrator {
    readonly context: AggregationContext;
    private readonly aggregator: CategoryAggregator;
    private readonly tracker: RelationshipTracker;
    private readonly resolver: NameIdentityResolver;
    private readonly refiner: StatisticsRefiner;

    private resolution: IdentityResolution | null = null;
    private fold: FoldTally = { processed: 0, malformed: 0, duplicates: 0 };

    constructor(options: OrchestratorOptions = {}) {
        this.context = new AggregationContext(options.settings, options.warnings);
        this.aggregator = new CategoryAggregator(this.context);
        this.tracker = new RelationshipTracker(this.context);
        this.resolver = new NameIdentityResolver({
            identity: this.context.settings.identity,
            warnings: this.context.warnings,
            ...(options.comparator ? { comparator: options.comparator } : {}),
        });
        this.refiner = new StatisticsRefiner(this.context, this.tracker);
    }

    /**
     * Fold and finalize in one call.
     */
    run(records: Iterable<ClassifiedRecord>): RunSummary {
        this.ingest(records);
        return this.finalize();
    }

    /**
     * Fold a batch of records. May be called repeatedly before `finalize()`.
     */
    ingest(records: Iterable<ClassifiedRecord>): FoldTally {
        const tally = this.aggregator.process(records);
        this.fold = {
            processed: this.fold.processed + tally.processed,
            malformed: this.fold.malformed + tally.malformed,
            duplicates: this.fold.duplicates + tally.duplicates,
        };
        return tally;
    }

    /**
     * Fold in a context built separately from another shard of the batch.
     */
    absorb(partial: AggregationContext): void {
        mergeAggregates(this.context, partial);
    }

    /**
     * Seal the raw pass, resolve identities and refine. Throws
     * InvariantViolationError if counts drift from their sets.
     */
    finalize(): RunSummary {
        const logger = getLogger();

        this.context.transition('raw');
        this.tracker.recompute();
        this.tracker.verify();
        logger.info(
            { categories: this.context.categoryData.size, names: this.context.vocabulary.size },
            'Raw pass sealed'
        );

        this.resolution = this.resolver.resolve(this.context.vocabulary);
        const refinement = this.refiner.apply(this.resolution);
        this.tracker.verify();

        const summary: RunSummary = {
            fold: { ...this.fold },
            refinement,
            categories: this.context.categoryData.size,
            faculty: this.context.globalFacultyStats.size,
            articles: this.context.articles.size,
        };
        logger.info(summary, 'Aggregation complete');
        return summary;
    }

    getCategoryData(): Map<string, CategoryInfo> {
        return this.context.categoryData;
    }

    getFacultyStats(): FacultyStatsMap {
        return this.context.facultyStats;
    }

    getArticleStats(): ArticleStatsMap {
        return this.context.articleStats;
    }

    getArticleStatsObject(): ArticleCitationMap {
        return this.context.articleCitationMap;
    }

    getGlobalFacultyStats(): Map<string, GlobalFacultyStats> {
        return this.context.globalFacultyStats;
    }

    getNameVariations(): ReadonlyMap<string, NameVariation> {
        return this.resolution?.variations ?? new Map();
    }

    getWarnings(): Diagnostic[] {
        return this.context.warnings.list();
    }

    /**
     * Aggregates for serialization. Only available once refined.
     */
    snapshot(): AggregationSnapshot {
        this.context.assertPhase('snapshot', 'refined');
        return {
            categoryData: this.getCategoryData(),
            facultyStats: this.getFacultyStats(),
            articleStats: this.getArticleStats(),
            articleCitationMap: this.getArticleStatsObject(),
            globalFacultyStats: this.getGlobalFacultyStats(),
            nameVariations: this.getNameVariations(),
            warnings: this.getWarnings(),
        };
    }
}
