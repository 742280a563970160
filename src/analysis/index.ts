export * from "./domain/types";
export * from "./domain/errors";
export type { Result } from "./domain/result";
export * from "./config";
export {
  createAnalysisPipeline,
  createDefaultDeps,
  type AnalysisDeps,
  type AnalysisInput,
  type AnalysisOutcome,
  type AnalysisPipeline,
  type DocumentPaths,
  type TrackDocument,
} from "./application/analyze_report";
export { queriesFor, type NamedQuery } from "./business/query_registry";
export {
  consolidateContext,
  type ConsolidateOptions,
  type ConsolidatedContext,
} from "./business/consolidate_context";
export {
  extractIndicators,
  type ExtractionOptions,
  type ExtractionResult,
} from "./business/extract_indicators";
export { combine, roundHalfUp, scoreTrack } from "./business/score";
export { assessDisclosureQuality } from "./business/disclosure_quality";
export { formatReport } from "./business/format_report";
export { generateSummary, summaryText } from "./business/summarize";
export {
  DEFAULT_RUBRIC_VERSION,
  listRubricVersions,
  loadRubric,
  parseRubric,
} from "./rubric/registry";
export type {
  DocumentIndex,
  DocumentSource,
  Embedder,
  Indexer,
  RetrievedChunk,
  TextGenerator,
} from "./infrastructure/contracts";
