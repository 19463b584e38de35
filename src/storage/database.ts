import Database from 'better-sqlite3';
import type { ClassifiedRecord, RunRecord } from '../types/index.js';
import type { AggregationSnapshot } from '../aggregation/orchestrator.js';
import { normalizeRecord } from '../sources/record-loader.js';
import { serializeCategory, serializeFacultyStats, serializeGlobalFacultyStats } from '../exporters/serialize.js';
import { getLogger } from '../utils/logger.js';
import { WarningCollector } from '../utils/warnings.js';

/**
 * SQLite schema migration v1.
 *
 * `articles` holds every accepted record; the other aggregate tables hold
 * the results of the latest run over that corpus.
 */
const MIGRATION_V1 = `
-- Runs: pipeline session metadata
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  version TEXT NOT NULL,
  config_json TEXT NOT NULL,
  input TEXT,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Articles: classified records, one per identifier
CREATE TABLE IF NOT EXISTS articles (
  article_id TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  year INTEGER,
  citation_count INTEGER NOT NULL DEFAULT 0,
  record_json TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Categories: per-category statistics
CREATE TABLE IF NOT EXISTS categories (
  category_key TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  level INTEGER NOT NULL,
  parent TEXT,
  url TEXT NOT NULL,
  article_count INTEGER NOT NULL,
  tc_count INTEGER NOT NULL,
  citation_average REAL NOT NULL,
  faculty_count INTEGER NOT NULL,
  department_count INTEGER NOT NULL,
  data_json TEXT NOT NULL
);

-- Faculty: per-category faculty statistics
CREATE TABLE IF NOT EXISTS faculty (
  name TEXT NOT NULL,
  category_key TEXT NOT NULL,
  article_count INTEGER NOT NULL,
  total_citations INTEGER NOT NULL,
  citation_average REAL NOT NULL,
  data_json TEXT NOT NULL,
  PRIMARY KEY (name, category_key)
);

-- Global faculty: statistics across all categories
CREATE TABLE IF NOT EXISTS faculty_global (
  name TEXT PRIMARY KEY,
  article_count INTEGER NOT NULL,
  total_citations INTEGER NOT NULL,
  citation_average REAL NOT NULL,
  variants_json TEXT NOT NULL DEFAULT '[]',
  data_json TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_articles_year ON articles(year);
CREATE INDEX IF NOT EXISTS idx_categories_parent ON categories(parent);
CREATE INDEX IF NOT EXISTS idx_faculty_category ON faculty(category_key);
`;

export interface StoreStats {
    articles: number;
    categories: number;
    faculty: number;
    runs: number;
    topCategories: Array<{ category_key: string; article_count: number; tc_count: number }>;
    topFaculty: Array<{ name: string; article_count: number; total_citations: number }>;
}

type CountRow = { count: number };

/**
 * Statistics store wrapper around better-sqlite3.
 * Handles schema migration, WAL mode and result persistence.
 */
export class StatsDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        this.db.pragma('journal_mode = WAL');

        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const version = this.db.pragma('user_version', { simple: true });
        const currentVersion = typeof version === 'number' ? version : 0;

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Database migrated to v1');
        }
    }

    // ─── Articles ─────────────────────────────────────────────

    getArticleIds(): Set<string> {
        const rows = this.db.prepare<[], { article_id: string }>('SELECT article_id FROM articles').all();
        return new Set(rows.map((row) => row.article_id));
    }

    /**
     * Every stored record, in insertion order.
     */
    getRecords(): ClassifiedRecord[] {
        const rows = this.db
            .prepare<[], { record_json: string }>('SELECT record_json FROM articles ORDER BY rowid')
            .all();
        const warnings = new WarningCollector();

        return rows
            .map((row) => normalizeRecord(JSON.parse(row.record_json), warnings))
            .filter((record): record is ClassifiedRecord => record !== null);
    }

    /**
     * Store records, ignoring identifiers already present.
     * Returns how many were new.
     */
    insertRecords(records: ClassifiedRecord[]): number {
        const stmt = this.db.prepare(`
      INSERT OR IGNORE INTO articles (article_id, title, year, citation_count, record_json)
      VALUES (@article_id, @title, @year, @citation_count, @record_json)
    `);

        let inserted = 0;
        const insertAll = this.db.transaction((batch: ClassifiedRecord[]) => {
            for (const record of batch) {
                const result = stmt.run({
                    article_id: record.id,
                    title: record.title,
                    year: record.year,
                    citation_count: record.citationCount,
                    record_json: JSON.stringify(record),
                });
                inserted += result.changes;
            }
        });

        insertAll(records);
        return inserted;
    }

    // ─── Results ──────────────────────────────────────────────

    /**
     * Store new records and replace the aggregate tables with a snapshot,
     * in one transaction. Merged-away spellings from an earlier run do not linger.
     * Returns how many of the new records were stored.
     */
    saveResults(snapshot: AggregationSnapshot, newRecords: ClassifiedRecord[] = []): number {
        const categoryStmt = this.db.prepare(`
      INSERT INTO categories (category_key, name, level, parent, url, article_count, tc_count, citation_average, faculty_count, department_count, data_json)
      VALUES (@key, @name, @level, @parent, @url, @article_count, @tc_count, @citation_average, @faculty_count, @department_count, @data_json)
    `);

        const facultyStmt = this.db.prepare(`
      INSERT INTO faculty (name, category_key, article_count, total_citations, citation_average, data_json)
      VALUES (@name, @category, @article_count, @total_citations, @citation_average, @data_json)
    `);

        const globalStmt = this.db.prepare(`
      INSERT INTO faculty_global (name, article_count, total_citations, citation_average, variants_json, data_json)
      VALUES (@name, @article_count, @total_citations, @citation_average, @variants_json, @data_json)
    `);

        const save = this.db.transaction((): number => {
            const stored = this.insertRecords(newRecords);

            this.db.exec('DELETE FROM faculty; DELETE FROM faculty_global; DELETE FROM categories;');

            for (const category of snapshot.categoryData.values()) {
                const row = serializeCategory(category);
                categoryStmt.run({
                    key: row.key,
                    name: row.name,
                    level: row.level,
                    parent: row.parent,
                    url: row.url,
                    article_count: row.article_count,
                    tc_count: row.tc_count,
                    citation_average: row.citation_average,
                    faculty_count: row.faculty_count,
                    department_count: row.department_count,
                    data_json: JSON.stringify(row),
                });
            }

            for (const byName of snapshot.facultyStats.values()) {
                for (const stats of byName.values()) {
                    const row = serializeFacultyStats(stats);
                    facultyStmt.run({
                        name: row.name,
                        category: row.category,
                        article_count: row.article_count,
                        total_citations: row.total_citations,
                        citation_average: row.citation_average,
                        data_json: JSON.stringify(row),
                    });
                }
            }

            for (const stats of snapshot.globalFacultyStats.values()) {
                const row = serializeGlobalFacultyStats(stats, snapshot.nameVariations.get(stats.name));
                globalStmt.run({
                    name: row.name,
                    article_count: row.article_count,
                    total_citations: row.total_citations,
                    citation_average: row.citation_average,
                    variants_json: JSON.stringify(row.variants),
                    data_json: JSON.stringify(row),
                });
            }

            return stored;
        });

        const stored = save();
        getLogger().debug(
            { stored, categories: snapshot.categoryData.size, faculty: snapshot.globalFacultyStats.size },
            'Results saved'
        );
        return stored;
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare(`
      INSERT INTO runs (created_at, version, config_json, input, stats_json)
      VALUES (@created_at, @version, @config_json, @input, @stats_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    getRuns(): RunRecord[] {
        return this.db.prepare<[], RunRecord>('SELECT * FROM runs ORDER BY run_id').all();
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(limit = 5): StoreStats {
        const count = (table: string): number =>
            this.db.prepare<[], CountRow>(`SELECT COUNT(*) as count FROM ${table}`).get()?.count ?? 0;

        const topCategories = this.db
            .prepare<[number], StoreStats['topCategories'][number]>(
                'SELECT category_key, article_count, tc_count FROM categories ORDER BY article_count DESC, category_key LIMIT ?'
            )
            .all(limit);

        const topFaculty = this.db
            .prepare<[number], StoreStats['topFaculty'][number]>(
                'SELECT name, article_count, total_citations FROM faculty_global ORDER BY total_citations DESC, name LIMIT ?'
            )
            .all(limit);

        return {
            articles: count('articles'),
            categories: count('categories'),
            faculty: count('faculty_global'),
            runs: count('runs'),
            topCategories,
            topFaculty,
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}
