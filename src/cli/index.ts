#!/usr/bin/env node

import { readFileSync } from 'node:fs';
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { runPipeline, exportStored, VERSION } from '../builder/pipeline.js';
import { NameIdentityResolver } from '../identity/name-resolver.js';
import { StatsDatabase } from '../storage/database.js';
import type { LogLevel } from '../types/index.js';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

// ─── Option parsers ───────────────────────────────────────

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) throw new InvalidArgumentError('Not an integer.');
    return parsed;
}

function parseRatio(value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
        throw new InvalidArgumentError('Must be a number between 0 and 1.');
    }
    return parsed;
}

function parseLogLevel(value: string): LogLevel {
    const level = LOG_LEVELS.find((candidate) => candidate === value);
    if (!level) throw new InvalidArgumentError(`Valid levels: ${LOG_LEVELS.join(', ')}`);
    return level;
}

interface CommonOptions {
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface RunOptions extends CommonOptions {
    input: string;
    out?: string;
    db?: string;
    extend?: boolean;
    yearFrom?: number;
    yearTo?: number;
    threshold?: number;
    rollUp?: boolean;
}

/**
 * Config overrides for the flags that were actually given.
 */
function toOverrides(opts: RunOptions | CommonOptions & { out?: string; db?: string; extend?: boolean }): ConfigOverrides {
    const overrides: ConfigOverrides = {};
    if ('input' in opts) {
        overrides.input = opts.input;
        if (opts.yearFrom !== undefined) overrides.yearFrom = opts.yearFrom;
        if (opts.yearTo !== undefined) overrides.yearTo = opts.yearTo;
        if (opts.threshold !== undefined) overrides.identity = { threshold: opts.threshold };
        if (opts.rollUp === false) overrides.aggregation = { rollUpAncestors: false };
    }
    if (opts.out !== undefined) overrides.out = opts.out;
    if (opts.db !== undefined) overrides.db = opts.db;
    if (opts.extend !== undefined) overrides.extend = opts.extend;
    if (opts.logLevel !== undefined) overrides.logLevel = opts.logLevel;
    if (opts.jsonLogs !== undefined) overrides.jsonLogs = opts.jsonLogs;
    return overrides;
}

const program = new Command();

program
    .name('scholarstats')
    .description('Aggregate classified publication records into category and faculty statistics.')
    .version(VERSION);

// ─── RUN command ──────────────────────────────────────────

program
    .command('run')
    .description('Aggregate a JSON file of classified records')
    .requiredOption('-i, --input <path>', 'JSON file of classified records')
    .option('-o, --out <dir>', 'Output directory for JSON files')
    .option('--db <path>', 'SQLite database of stored records and results')
    .option('--extend', 'Append to existing JSON output files')
    .option('--year-from <year>', 'Keep records from this year', parseInteger)
    .option('--year-to <year>', 'Keep records up to this year', parseInteger)
    .option('--threshold <score>', 'Name similarity needed to merge two spellings', parseRatio)
    .option('--no-roll-up', 'Do not credit ancestor categories')
    .option('--log-level <level>', 'Log level: debug | info | warn | error', parseLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: RunOptions) => {
        try {
            const config = await resolveConfig(toOverrides(opts));
            initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

            const summary = runPipeline(config);
            getLogger().info(
                {
                    categories: summary.aggregation.categories,
                    faculty: summary.aggregation.faculty,
                    articles: summary.aggregation.articles,
                    out: config.out,
                },
                'Run complete!'
            );
        } catch (error) {
            getLogger().error({ error }, 'Run failed');
            process.exit(1);
        }
    });

// ─── RESOLVE command ──────────────────────────────────────

program
    .command('resolve')
    .description('Group author names (one per line) into identities')
    .argument('<file>', 'Text file of author names')
    .option('--threshold <score>', 'Name similarity needed to merge two spellings', parseRatio)
    .option('--all', 'Also list names that were not merged')
    .action(async (file: string, opts: { threshold?: number; all?: boolean }) => {
        initLogger({ level: 'warn', jsonLogs: false });

        try {
            const config = await resolveConfig(opts.threshold !== undefined ? { identity: { threshold: opts.threshold } } : {});
            const names = readFileSync(file, 'utf-8')
                .split(/\r?\n/)
                .map((line) => line.trim())
                .filter((line) => line.length > 0);

            const resolution = new NameIdentityResolver({ identity: config.identity }).resolve(names);

            for (const variation of resolution.variations.values()) {
                const others = [...variation.variants].filter((name) => name !== variation.canonical);
                if (others.length === 0 && !opts.all) continue;
                console.log(others.length > 0 ? `${variation.canonical} ← ${others.join(' | ')}` : variation.canonical);
            }

            if (resolution.ambiguous.length > 0) {
                console.log('\nKept apart (ambiguous):');
                for (const pair of resolution.ambiguous) {
                    console.log(`  ${pair.a} / ${pair.b} (${pair.score.toFixed(2)})`);
                }
            }
        } catch (error) {
            console.error('Resolve failed:', error);
            process.exit(1);
        }
    });

// ─── EXPORT command ───────────────────────────────────────

program
    .command('export')
    .description('Rewrite the JSON output files from a database')
    .requiredOption('--db <path>', 'SQLite database path')
    .option('-o, --out <dir>', 'Output directory for JSON files')
    .option('--extend', 'Append to existing JSON output files')
    .option('--log-level <level>', 'Log level: debug | info | warn | error', parseLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: CommonOptions & { db: string; out?: string; extend?: boolean }) => {
        try {
            const config = await resolveConfig(toOverrides(opts));
            initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

            const written = exportStored(config);
            console.log(`Exported ${written.length} files to ${config.out}`);
        } catch (error) {
            getLogger().error({ error }, 'Export failed');
            process.exit(1);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show database statistics')
    .requiredOption('--db <path>', 'SQLite database path')
    .option('-n, --top <n>', 'Rows to list per ranking', parseInteger, 5)
    .action((opts: { db: string; top: number }) => {
        try {
            const db = new StatsDatabase(opts.db);
            const stats = db.getStats(opts.top);
            db.close();

            console.log('\n📊 Statistics Database\n');
            console.log(`  Articles:   ${stats.articles}`);
            console.log(`  Categories: ${stats.categories}`);
            console.log(`  Faculty:    ${stats.faculty}`);
            console.log(`  Runs:       ${stats.runs}`);

            if (stats.topCategories.length > 0) {
                console.log('\n  Largest categories:');
                for (const row of stats.topCategories) {
                    console.log(`    ${row.category_key}: ${row.article_count} articles, ${row.tc_count} citations`);
                }
            }

            if (stats.topFaculty.length > 0) {
                console.log('\n  Most cited faculty:');
                for (const row of stats.topFaculty) {
                    console.log(`    ${row.name}: ${row.total_citations} citations over ${row.article_count} articles`);
                }
            }

            console.log('');
        } catch (error) {
            console.error('Inspect failed:', error);
            process.exit(1);
        }
    });

await program.parseAsync();
