import type { ArticleDetails, CategoryInfo } from '../types/index.js';
import { createCategoryInfo, creditCategory, mergeFacultyStats, mergeGlobalFacultyStats } from './builders.js';
import type { AggregationContext } from './context.js';

function unionInto<T>(target: Set<T>, source: Iterable<T>): void {
    for (const value of source) target.add(value);
}

function mergeCategory(target: CategoryInfo, source: CategoryInfo, articles: Map<string, ArticleDetails> | undefined): void {
    for (const articleId of source.articleIds) {
        if (target.articleIds.has(articleId)) continue;
        const details = articles?.get(articleId);
        creditCategory(target, articleId, details?.citationCount ?? 0, details?.title ?? '');
    }
    unionInto(target.titles, source.titles);
    unionInto(target.faculty, source.faculty);
    unionInto(target.departments, source.departments);
    unionInto(target.themes, source.themes);
}

/**
 * Combine a partial fold (built from another shard of the same batch) into
 * `target`. Sets are unioned and counts re-derived, so an article present in
 * both shards is counted once. Both contexts must still be collecting;
 * entries of `source` are adopted, not copied, so discard it afterwards.
 */
export function mergeAggregates(target: AggregationContext, source: AggregationContext): void {
    target.assertPhase('merge', 'collecting');
    source.assertPhase('merge', 'collecting');

    for (const [key, category] of source.categoryData) {
        let existing = target.categoryData.get(key);
        if (!existing) {
            existing = createCategoryInfo(category.path);
            target.categoryData.set(key, existing);
        }
        mergeCategory(existing, category, source.articleStats.get(key));
    }

    for (const [key, sourceFaculty] of source.facultyStats) {
        let targetFaculty = target.facultyStats.get(key);
        if (!targetFaculty) {
            targetFaculty = new Map();
            target.facultyStats.set(key, targetFaculty);
        }
        for (const [name, stats] of sourceFaculty) {
            const existing = targetFaculty.get(name);
            if (existing) mergeFacultyStats(existing, stats);
            else targetFaculty.set(name, stats);
        }
    }

    for (const [name, stats] of source.globalFacultyStats) {
        const existing = target.globalFacultyStats.get(name);
        if (existing) mergeGlobalFacultyStats(existing, stats);
        else target.globalFacultyStats.set(name, stats);
    }

    for (const [id, details] of source.articles) {
        const existing = target.articles.get(id);
        if (existing) {
            unionInto(existing.categories, details.categories);
            unionInto(existing.departments, details.departments);
            unionInto(existing.themes, details.themes);
        } else {
            target.articles.set(id, details);
        }
    }

    for (const [key, sourceArticles] of source.articleStats) {
        let targetArticles = target.articleStats.get(key);
        if (!targetArticles) {
            targetArticles = new Map();
            target.articleStats.set(key, targetArticles);
        }
        for (const id of sourceArticles.keys()) {
            const details = target.articles.get(id);
            if (details && !targetArticles.has(id)) targetArticles.set(id, details);
        }
    }

    for (const [title, details] of source.articleCitationMap) {
        if (!target.articleCitationMap.has(title)) {
            target.articleCitationMap.set(title, target.articles.get(details.id) ?? details);
        }
    }

    unionInto(target.vocabulary, source.vocabulary);
    target.warnings.absorb(source.warnings);
}
