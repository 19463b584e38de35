import { readFileSync } from 'node:fs';
import type { CategoryPath, ClassifiedRecord, RawRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { WarningCollector } from '../utils/warnings.js';
import { firstString, isObject, stringList, stripDoiPrefix, stripMarkup, toNumber } from './utils.js';

export interface LoadOptions {
    yearFrom?: number;
    yearTo?: number;
    warnings?: WarningCollector;
}

export interface LoadResult {
    records: ClassifiedRecord[];
    /** Elements that were not objects, or fell outside the year window */
    skipped: number;
}

/**
 * Category tags as either paths (["CS", "AI"]), single labels ("CS"), or the
 * classifier's level lists ({ top: [...], mid: [...], low: [...] }). Level
 * lists carry no parent links, so each label becomes a root path.
 */
function normalizeCategories(value: unknown): CategoryPath[] {
    if (Array.isArray(value)) {
        return value.flatMap((item): CategoryPath[] => {
            if (typeof item === 'string') return [[item.trim()]];
            if (Array.isArray(item)) return [item.filter((label): label is string => typeof label === 'string').map((l) => l.trim())];
            return [];
        });
    }

    if (isObject(value)) {
        return ['top', 'mid', 'low'].flatMap((level) => stringList(value[level]).map((label) => [label]));
    }

    return [];
}

/**
 * Authors and their departments, from a list of names or from Crossref
 * author objects ({ given, family, affiliation: [{ name }] }).
 */
function normalizeAuthors(raw: RawRecord): { authors: string[]; affiliations: Record<string, string[]> } {
    const byAuthor = new Map<string, string[]>();

    if (isObject(raw.affiliations)) {
        for (const [name, departments] of Object.entries(raw.affiliations)) {
            const list = typeof departments === 'string' ? [departments.trim()] : stringList(departments);
            if (list.length > 0) byAuthor.set(name.trim(), list);
        }
    }

    if (Array.isArray(raw.authors)) {
        return { authors: stringList(raw.authors), affiliations: Object.fromEntries(byAuthor) };
    }

    const authors: string[] = [];
    if (Array.isArray(raw.author)) {
        for (const entry of raw.author) {
            if (!isObject(entry)) continue;

            const name = [firstString(entry['given']), firstString(entry['family'])]
                .filter((part): part is string => part !== null)
                .join(' ') || firstString(entry['name']);
            if (!name) continue;

            authors.push(name);
            const affiliation = entry['affiliation'];
            const departments = Array.isArray(affiliation)
                ? affiliation.flatMap((a: unknown) => (isObject(a) ? stringList([a['name']]) : []))
                : [];
            if (departments.length > 0) {
                byAuthor.set(name, [...new Set([...(byAuthor.get(name) ?? []), ...departments])]);
            }
        }
    }

    // fromEntries defines own keys, so "__proto__" stays a plain entry
    return { authors, affiliations: Object.fromEntries(byAuthor) };
}

function publicationYear(raw: RawRecord): number | null {
    const year = toNumber(raw.year);
    if (year !== null) return year;

    // Crossref: published: { "date-parts": [[2024, 5, 1]] }
    const published = raw.published;
    if (isObject(published)) {
        const parts = published['date-parts'];
        const first: unknown = Array.isArray(parts) ? parts[0] : undefined;
        if (Array.isArray(first)) return toNumber(first[0]);
    }
    return null;
}

/**
 * Convert one input element into a ClassifiedRecord. Required fields are
 * checked later by the aggregator; this only coerces types. Returns null
 * when the element is not an object at all.
 */
export function normalizeRecord(value: unknown, warnings: WarningCollector): ClassifiedRecord | null {
    if (!isObject(value)) {
        warnings.add('MalformedRecord', 'Input element is not an object', null, { type: typeof value });
        return null;
    }

    const raw: RawRecord = value;
    const id = stripDoiPrefix(firstString(raw.id) ?? firstString(raw.DOI) ?? firstString(raw.doi)) ?? '';
    const citations = raw.citationCount ?? raw['is-referenced-by-count'];
    const { authors, affiliations } = normalizeAuthors(raw);

    return {
        id,
        title: firstString(raw.title) ?? '',
        citationCount: citations === undefined || citations === null ? 0 : toNumber(citations) ?? Number.NaN,
        authors,
        categories: normalizeCategories(raw.categories),
        year: publicationYear(raw),
        affiliations,
        journal: firstString(raw.journal) ?? firstString(raw['container-title']),
        abstract: stripMarkup(firstString(raw.abstract)),
        url: firstString(raw.url) ?? firstString(raw.URL),
        themes: stringList(raw.themes),
    };
}

/**
 * Drop records published outside [yearFrom, yearTo]. Records without a year are kept.
 */
export function filterByYear(
    records: ClassifiedRecord[],
    window: { yearFrom?: number; yearTo?: number },
    warnings: WarningCollector
): ClassifiedRecord[] {
    const { yearFrom, yearTo } = window;
    if (yearFrom === undefined && yearTo === undefined) return records;

    return records.filter((record) => {
        if (record.year === null) return true;
        const inRange =
            (yearFrom === undefined || record.year >= yearFrom) &&
            (yearTo === undefined || record.year <= yearTo);
        if (!inRange) {
            warnings.add('OutOfRange', 'Record outside the year window', record.id || null, { year: record.year });
        }
        return inRange;
    });
}

/**
 * Read a JSON array of records from disk and normalize every element.
 */
export function loadRecords(path: string, options: LoadOptions = {}): LoadResult {
    const warnings = options.warnings ?? new WarningCollector();
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));

    if (!Array.isArray(parsed)) {
        throw new Error(`Expected a JSON array of records in ${path}`);
    }

    const normalized = parsed
        .map((item) => normalizeRecord(item, warnings))
        .filter((record): record is ClassifiedRecord => record !== null);
    const records = filterByYear(normalized, options, warnings);

    getLogger().info({ path, loaded: records.length, skipped: parsed.length - records.length }, 'Records loaded');
    return { records, skipped: parsed.length - records.length };
}
