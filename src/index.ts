/**
 * Library entry point.
 */
export * from './types/index.js';
export { AggregationOrchestrator } from './aggregation/orchestrator.js';
export type { AggregationSnapshot, RunSummary, OrchestratorOptions } from './aggregation/orchestrator.js';
export { AggregationContext } from './aggregation/context.js';
export type { AggregationPhase, AggregationSettings } from './aggregation/context.js';
export { CategoryAggregator, validateRecord } from './aggregation/category-aggregator.js';
export { RelationshipTracker } from './aggregation/relationship-tracker.js';
export { StatisticsRefiner } from './aggregation/statistics-refiner.js';
export { mergeAggregates } from './aggregation/merge.js';
export { NameIdentityResolver, pickCanonical } from './identity/name-resolver.js';
export type { IdentityResolution, AmbiguousPair } from './identity/name-resolver.js';
export { DefaultNameComparator } from './identity/name-comparator.js';
export type { NameComparator, NameComparison, IdentityVerdict } from './identity/name-comparator.js';
export { parseName, normalizeName } from './identity/name-normalizer.js';
export { loadRecords, normalizeRecord } from './sources/record-loader.js';
export { exportResults, writeResults } from './exporters/export.js';
export { serializeResults } from './exporters/serialize.js';
export { StatsDatabase } from './storage/database.js';
export { runPipeline, exportStored } from './builder/pipeline.js';
export type { PipelineSummary } from './builder/pipeline.js';
export { resolveConfig, validateConfig } from './utils/config.js';
export { AggregationError, InvariantViolationError, PhaseError } from './utils/errors.js';
export { WarningCollector } from './utils/warnings.js';
export type { Diagnostic, DiagnosticKind } from './utils/warnings.js';
