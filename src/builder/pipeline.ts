import type { ClassifiedRecord, ScholarStatsConfig } from '../types/index.js';
import { StatsDatabase } from '../storage/database.js';
import { loadRecords } from '../sources/record-loader.js';
import { AggregationOrchestrator, type RunSummary } from '../aggregation/orchestrator.js';
import { validateRecord } from '../aggregation/category-aggregator.js';
import { exportResults } from '../exporters/export.js';
import { getLogger } from '../utils/logger.js';
import { WarningCollector, type DiagnosticKind } from '../utils/warnings.js';

export const VERSION = '1.0.0';

export interface PipelineSummary {
    /** Records read from the input file after the year window */
    loaded: number;
    /** Input records whose identifier the store already held */
    known: number;
    /** Input records newly added to the store */
    stored: number;
    aggregation: RunSummary;
    written: string[];
    runId: number | null;
    diagnostics: Partial<Record<DiagnosticKind, number>>;
}

/**
 * Run the full pipeline:
 *
 * 1. Load and normalize input records
 * 2. Drop records the store already holds, then add the stored corpus back
 * 3. Aggregate, resolve identities, refine
 * 4. Export JSON files
 * 5. Persist new records and results, record run metadata
 */
export function runPipeline(config: ScholarStatsConfig): PipelineSummary {
    if (!config.input) {
        throw new Error('No input file given');
    }

    const logger = getLogger();
    const warnings = new WarningCollector();
    const startTime = Date.now();
    const db = config.db ? new StatsDatabase(config.db) : null;

    logger.info({ input: config.input, out: config.out, db: config.db ?? null }, 'Starting pipeline');

    try {
        // ──────────────────────────────────────────────────
        // Step 1: Load
        // ──────────────────────────────────────────────────
        const { records } = loadRecords(config.input, {
            warnings,
            ...(config.yearFrom !== undefined ? { yearFrom: config.yearFrom } : {}),
            ...(config.yearTo !== undefined ? { yearTo: config.yearTo } : {}),
        });

        // ──────────────────────────────────────────────────
        // Step 2: Known-record prefilter
        // ──────────────────────────────────────────────────
        const knownIds = db?.getArticleIds() ?? new Set<string>();
        const fresh = dropKnown(records, knownIds, warnings);
        const corpus = db ? [...db.getRecords(), ...fresh] : fresh;

        // ──────────────────────────────────────────────────
        // Step 3: Aggregate
        // ──────────────────────────────────────────────────
        const orchestrator = new AggregationOrchestrator({ settings: config, warnings });
        const aggregation = orchestrator.run(corpus);
        const snapshot = orchestrator.snapshot();

        // ──────────────────────────────────────────────────
        // Step 4: Export
        // ──────────────────────────────────────────────────
        const written = exportResults(snapshot, config.out, { extend: config.extend });

        // ──────────────────────────────────────────────────
        // Step 5: Persist
        // ──────────────────────────────────────────────────
        let runId: number | null = null;
        let stored = 0;
        if (db) {
            const accepted = fresh.filter((record) => validateRecord(record).length === 0);
            stored = db.saveResults(snapshot, accepted);
            runId = db.insertRun({
                created_at: new Date().toISOString(),
                version: VERSION,
                config_json: JSON.stringify(config),
                input: config.input,
                stats_json: JSON.stringify(aggregation),
            });
        }

        const summary: PipelineSummary = {
            loaded: records.length,
            known: records.length - fresh.length,
            stored,
            aggregation,
            written,
            runId,
            diagnostics: warnings.summary(),
        };

        const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
        logger.info(
            { ...summary.diagnostics, loaded: summary.loaded, known: summary.known, elapsed: `${elapsed}s` },
            'Pipeline complete'
        );
        return summary;
    } finally {
        db?.close();
    }
}

/**
 * Re-aggregate every stored record and rewrite the JSON files, without
 * reading new input.
 */
export function exportStored(config: ScholarStatsConfig): string[] {
    if (!config.db) {
        throw new Error('No database given');
    }

    const db = new StatsDatabase(config.db);
    try {
        const orchestrator = new AggregationOrchestrator({ settings: config });
        orchestrator.run(db.getRecords());
        return exportResults(orchestrator.snapshot(), config.out, { extend: config.extend });
    } finally {
        db.close();
    }
}

// ─── Internal helpers ─────────────────────────────────

/**
 * Records whose identifier is not in `knownIds`. Each dropped record is
 * reported as a KnownRecord diagnostic.
 */
export function dropKnown(
    records: ClassifiedRecord[],
    knownIds: ReadonlySet<string>,
    warnings: WarningCollector
): ClassifiedRecord[] {
    if (knownIds.size === 0) return records;

    return records.filter((record) => {
        if (!knownIds.has(record.id)) return true;
        warnings.add('KnownRecord', 'Record already stored; skipped', record.id);
        return false;
    });
}
