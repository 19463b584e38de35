import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { StatsDatabase } from '../storage/database.js';
import { exportResults, EXPORT_FILES } from '../exporters/export.js';
import { serializeResults } from '../exporters/serialize.js';
import { AggregationOrchestrator, type AggregationSnapshot } from '../aggregation/orchestrator.js';
import { dropKnown, exportStored, runPipeline } from '../builder/pipeline.js';
import { WarningCollector } from '../utils/warnings.js';
import { DEFAULT_CONFIG, type ClassifiedRecord, type ScholarStatsConfig } from '../types/index.js';

// Helper: create a test record
function makeRecord(id: string, authors: string[], citationCount: number, categories: string[][] = [['CS']]): ClassifiedRecord {
    return {
        id,
        title: `Paper ${id}`,
        citationCount,
        authors,
        categories,
        year: 2023,
        affiliations: {},
        journal: null,
        abstract: null,
        url: null,
        themes: [],
    };
}

function aggregate(records: ClassifiedRecord[]): AggregationSnapshot {
    const orchestrator = new AggregationOrchestrator();
    orchestrator.run(records);
    return orchestrator.snapshot();
}

function readJson(file: string): unknown {
    return JSON.parse(fs.readFileSync(file, 'utf-8'));
}

const SMITHS = [makeRecord('a', ['John Smith'], 5), makeRecord('b', ['J. Smith'], 3)];

let tmpDir: string;

beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'scholarstats-test-'));
});

afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
});

// ─── Serialization ────────────────────────────────────────

describe('serializeResults', () => {
    it('flattens sets and maps', () => {
        const results = serializeResults(aggregate(SMITHS));

        expect(results.category_data).toEqual([
            {
                name: 'CS',
                key: 'CS',
                path: ['CS'],
                level: 1,
                parent: null,
                url: 'cs',
                article_count: 2,
                tc_count: 8,
                citation_average: 4,
                faculty_count: 1,
                department_count: 0,
                article_ids: ['a', 'b'],
                themes: [],
            },
        ]);

        expect(results.global_faculty_stats).toHaveLength(1);
        expect(results.global_faculty_stats[0]?.name).toBe('John Smith');
        expect(results.global_faculty_stats[0]?.citations).toEqual({ a: 5, b: 3 });
        expect(results.global_faculty_stats[0]?.variants).toEqual(['J. Smith']);
        expect(results.faculty_stats.map((f) => [f.category, f.name, f.total_citations])).toEqual([['CS', 'John Smith', 8]]);
        expect(results.article_stats).toEqual([
            { category: 'CS', articles: results.article_stats_object },
        ]);
    });

    it('rounds averages to two decimals', () => {
        const results = serializeResults(aggregate([
            makeRecord('a', ['Ada Lovelace'], 1),
            makeRecord('b', ['Ada Lovelace'], 1),
            makeRecord('c', ['Ada Lovelace'], 2),
        ]));
        expect(results.category_data[0]?.citation_average).toBe(1.33);
    });
});

// ─── Exporter ─────────────────────────────────────────────

describe('exportResults', () => {
    it('writes the five result files', () => {
        const outDir = path.join(tmpDir, 'out');
        const written = exportResults(aggregate(SMITHS), outDir);

        expect(written.map((file) => path.basename(file))).toEqual(EXPORT_FILES.map((name) => `${name}.json`));
        for (const file of written) expect(fs.existsSync(file)).toBe(true);
        expect(readJson(path.join(outDir, 'article_stats_object.json'))).toHaveLength(2);
    });

    it('appends to existing files in extend mode', () => {
        exportResults(aggregate(SMITHS), tmpDir);
        exportResults(aggregate([makeRecord('c', ['Ada Lovelace'], 1, [['Math']])]), tmpDir, { extend: true });

        const categories = readJson(path.join(tmpDir, 'category_data.json'));
        expect(Array.isArray(categories) ? categories.map((c: { key: string }) => c.key) : null).toEqual(['CS', 'Math']);
    });

    it('overwrites existing files otherwise', () => {
        exportResults(aggregate(SMITHS), tmpDir);
        exportResults(aggregate([makeRecord('c', ['Ada Lovelace'], 1, [['Math']])]), tmpDir);

        expect(readJson(path.join(tmpDir, 'category_data.json'))).toHaveLength(1);
    });

    it('refuses to extend a file that is not a list', () => {
        fs.writeFileSync(path.join(tmpDir, 'category_data.json'), '{"CS": {}}');
        expect(() => exportResults(aggregate(SMITHS), tmpDir, { extend: true })).toThrow('expected a JSON list');
    });
});

// ─── Storage ──────────────────────────────────────────────

describe('StatsDatabase', () => {
    let db: StatsDatabase;
    let dbPath: string;

    beforeEach(() => {
        dbPath = path.join(tmpDir, 'stats.db');
        db = new StatsDatabase(dbPath);
    });

    afterEach(() => {
        db.close();
    });

    it('migrates to schema v1', () => {
        expect(db.getRawDb().pragma('user_version', { simple: true })).toBe(1);
    });

    it('stores records once per identifier', () => {
        const record = { ...makeRecord('a', ['John Smith'], 5), affiliations: { 'John Smith': ['Computing'] } };

        expect(db.insertRecords([record, makeRecord('b', ['Jane Doe'], 1), record])).toBe(2);
        expect([...db.getArticleIds()].sort()).toEqual(['a', 'b']);
        expect(db.getRecords()[0]).toEqual(record);
    });

    it('saves results and replaces them on the next save', () => {
        expect(db.saveResults(aggregate(SMITHS), [...SMITHS, ...SMITHS])).toBe(2);

        let stats = db.getStats();
        expect(stats.articles).toBe(2);
        expect(stats.categories).toBe(1);
        expect(stats.faculty).toBe(1);
        expect(stats.topFaculty).toEqual([{ name: 'John Smith', article_count: 2, total_citations: 8 }]);
        expect(stats.topCategories).toEqual([{ category_key: 'CS', article_count: 2, tc_count: 8 }]);

        db.saveResults(aggregate([makeRecord('c', ['Ada Lovelace'], 1, [['Math']])]));
        stats = db.getStats();
        expect(stats.articles).toBe(2);
        expect(stats.topCategories.map((row) => row.category_key)).toEqual(['Math']);
        expect(stats.topFaculty.map((row) => row.name)).toEqual(['Ada Lovelace']);
    });

    it('records runs', () => {
        const runId = db.insertRun({
            created_at: '2024-01-01T00:00:00.000Z',
            version: '1.0.0',
            config_json: '{}',
            input: 'records.json',
            stats_json: '{}',
        });

        expect(runId).toBe(1);
        expect(db.getRuns().map((run) => run.input)).toEqual(['records.json']);
        expect(db.getStats().runs).toBe(1);
    });

    it('keeps data across connections', () => {
        db.insertRecords(SMITHS);
        db.close();

        db = new StatsDatabase(dbPath);
        expect(db.getArticleIds().size).toBe(2);
    });
});

// ─── Pipeline ─────────────────────────────────────────────

describe('runPipeline', () => {
    function writeInput(records: unknown[]): ScholarStatsConfig {
        const input = path.join(tmpDir, 'records.json');
        fs.writeFileSync(input, JSON.stringify(records));
        return { ...DEFAULT_CONFIG, input, out: path.join(tmpDir, 'out'), db: path.join(tmpDir, 'stats.db') };
    }

    it('aggregates, exports and stores a batch', () => {
        const config = writeInput(SMITHS);
        const summary = runPipeline(config);

        expect(summary.loaded).toBe(2);
        expect(summary.known).toBe(0);
        expect(summary.stored).toBe(2);
        expect(summary.runId).toBe(1);
        expect(summary.aggregation.faculty).toBe(1);
        expect(summary.written).toHaveLength(5);
    });

    it('skips stored records but keeps them in the statistics', () => {
        const config = writeInput(SMITHS);
        runPipeline(config);

        fs.writeFileSync(config.input ?? '', JSON.stringify([...SMITHS, makeRecord('c', ['John Smith'], 2)]));
        const summary = runPipeline(config);

        expect(summary.known).toBe(2);
        expect(summary.stored).toBe(1);
        expect(summary.runId).toBe(2);
        expect(summary.diagnostics).toEqual({ KnownRecord: 2 });
        expect(summary.aggregation.articles).toBe(3);

        const categories = readJson(path.join(tmpDir, 'out', 'category_data.json'));
        expect(categories).toMatchObject([{ key: 'CS', article_count: 3, tc_count: 10, faculty_count: 1 }]);
    });

    it('counts a record repeated in the input as stored once', () => {
        const config = writeInput([...SMITHS, SMITHS[0]]);
        const summary = runPipeline(config);

        expect(summary.stored).toBe(2);
        expect(summary.diagnostics).toEqual({ DuplicateRecord: 1 });
    });

    it('does not store malformed records', () => {
        const config = writeInput([...SMITHS, { id: 'bad', authors: ['Jane Doe'], categories: [] }]);
        const summary = runPipeline(config);

        expect(summary.stored).toBe(2);
        expect(summary.diagnostics).toEqual({ MalformedRecord: 1 });
    });

    it('runs without a database', () => {
        const config = { ...writeInput(SMITHS), db: undefined };
        const summary = runPipeline(config);

        expect(summary.runId).toBeNull();
        expect(summary.stored).toBe(0);
        expect(fs.existsSync(path.join(tmpDir, 'stats.db'))).toBe(false);
    });

    it('requires an input file', () => {
        expect(() => runPipeline(DEFAULT_CONFIG)).toThrow('No input file given');
    });

    it('re-exports the stored corpus', () => {
        const config = writeInput(SMITHS);
        runPipeline(config);
        fs.rmSync(config.out, { recursive: true, force: true });

        const written = exportStored(config);
        expect(written).toHaveLength(5);
        expect(readJson(path.join(config.out, 'global_faculty_stats.json'))).toMatchObject([
            { name: 'John Smith', total_citations: 8 },
        ]);
    });
});

describe('dropKnown', () => {
    it('reports each known record', () => {
        const warnings = new WarningCollector();
        const fresh = dropKnown(SMITHS, new Set(['a']), warnings);

        expect(fresh.map((r) => r.id)).toEqual(['b']);
        expect(warnings.list()).toEqual([{ kind: 'KnownRecord', message: 'Record already stored; skipped', subject: 'a' }]);
    });
});
