import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { SerializedResults } from '../types/index.js';
import type { AggregationSnapshot } from '../aggregation/orchestrator.js';
import { getLogger } from '../utils/logger.js';
import { serializeResults } from './serialize.js';

// ─── Types ───────────────────────────────────────────────

export type ExportFile = keyof SerializedResults;

/** Output files, each named `<key>.json` */
export const EXPORT_FILES = [
    'category_data',
    'faculty_stats',
    'article_stats',
    'article_stats_object',
    'global_faculty_stats',
] as const satisfies readonly ExportFile[];

export interface ExportOptions {
    /** Append to existing output files instead of overwriting them */
    extend?: boolean;
}

// ─── Main Export Function ────────────────────────────────

/**
 * Write the five result files for a refined snapshot into `outDir`.
 * Returns the paths written.
 */
export function exportResults(
    snapshot: AggregationSnapshot,
    outDir: string,
    options: ExportOptions = {}
): string[] {
    return writeResults(serializeResults(snapshot), outDir, options);
}

export function writeResults(
    results: SerializedResults,
    outDir: string,
    options: ExportOptions = {}
): string[] {
    mkdirSync(outDir, { recursive: true });

    const written: string[] = [];
    for (const file of EXPORT_FILES) {
        const path = join(outDir, `${file}.json`);
        const items: unknown[] = results[file];
        writeJson(path, options.extend ? extendExisting(path, items) : items);
        written.push(path);
    }

    getLogger().info(
        {
            outDir,
            extend: options.extend ?? false,
            categories: results.category_data.length,
            faculty: results.global_faculty_stats.length,
        },
        'Results exported'
    );
    return written;
}

// ─── Helpers ─────────────────────────────────────────────

/**
 * Existing list contents followed by `items`.
 */
function extendExisting(path: string, items: unknown[]): unknown[] {
    if (!existsSync(path)) return items;

    const existing: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    if (!Array.isArray(existing)) {
        throw new Error(`Cannot extend ${path}: expected a JSON list`);
    }
    return [...existing, ...items];
}

function writeJson(path: string, data: unknown): void {
    writeFileSync(path, JSON.stringify(data, null, 2), 'utf-8');
}
