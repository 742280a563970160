import { getBoolean, getNumber, getString } from "../util/env";
import type { ConsolidateOptions } from "./business/consolidate_context";
import type { ExtractionOptions } from "./business/extract_indicators";
import type { SummaryOptions } from "./business/summarize";
import { ConfigurationError } from "./domain/errors";
import type { ChunkOptions } from "./infrastructure/chunker";
import { DEFAULT_RUBRIC_VERSION } from "./rubric/registry";

export interface AnalysisConfig {
  rubricVersion: string;
  chunking: ChunkOptions;
  indexing: { timeoutMs: number };
  retrieval: ConsolidateOptions;
  extraction: ExtractionOptions;
  summary: SummaryOptions & { enabled: boolean };
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  rubricVersion: DEFAULT_RUBRIC_VERSION,
  chunking: { size: 1000, overlap: 200 },
  indexing: { timeoutMs: 120000 },
  retrieval: {
    k: 5,
    budgetChars: 12000,
    concurrency: 3,
    timeoutMs: 30000,
    retries: 1,
    backoffMs: 500,
  },
  extraction: { timeoutMs: 120000, retries: 0, backoffMs: 1000 },
  summary: { enabled: true, timeoutMs: 120000 },
};

/**
 * Static checks on limits; a bad value is fatal before any work starts.
 */
export function validateAnalysisConfig(config: AnalysisConfig): AnalysisConfig {
  const issues: string[] = [];
  const positive: Array<[string, number]> = [
    ["CHUNK_SIZE", config.chunking.size],
    ["RETRIEVAL_TOP_K", config.retrieval.k],
    ["INDEXING_TIMEOUT_MS", config.indexing.timeoutMs],
    ["CONTEXT_BUDGET_CHARS", config.retrieval.budgetChars],
    ["RETRIEVAL_CONCURRENCY", config.retrieval.concurrency],
    ["RETRIEVAL_TIMEOUT_MS", config.retrieval.timeoutMs],
    ["GENERATION_TIMEOUT_MS", config.extraction.timeoutMs],
    ["SUMMARY_TIMEOUT_MS", config.summary.timeoutMs],
  ];
  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value <= 0) {
      issues.push(`${name} must be a positive integer, got ${value}`);
    }
  }
  const nonNegative: Array<[string, number]> = [
    ["CHUNK_OVERLAP", config.chunking.overlap],
    ["RETRIEVAL_RETRIES", config.retrieval.retries],
    ["RETRIEVAL_BACKOFF_MS", config.retrieval.backoffMs],
    ["GENERATION_RETRIES", config.extraction.retries],
    ["GENERATION_BACKOFF_MS", config.extraction.backoffMs],
  ];
  for (const [name, value] of nonNegative) {
    if (!Number.isInteger(value) || value < 0) {
      issues.push(`${name} must be a non-negative integer, got ${value}`);
    }
  }
  if (config.chunking.overlap >= config.chunking.size) {
    issues.push("CHUNK_OVERLAP must be smaller than CHUNK_SIZE");
  }
  // a budget below one chunk evicts every hit
  if (config.retrieval.budgetChars < config.chunking.size) {
    issues.push("CONTEXT_BUDGET_CHARS must be at least CHUNK_SIZE");
  }
  if (issues.length > 0) {
    throw new ConfigurationError("Invalid analysis configuration", issues);
  }
  return config;
}

export function loadAnalysisConfig(): AnalysisConfig {
  const d = DEFAULT_ANALYSIS_CONFIG;
  return validateAnalysisConfig({
    rubricVersion: getString("RUBRIC_VERSION", d.rubricVersion),
    chunking: {
      size: getNumber("CHUNK_SIZE", d.chunking.size),
      overlap: getNumber("CHUNK_OVERLAP", d.chunking.overlap),
    },
    indexing: {
      timeoutMs: getNumber("INDEXING_TIMEOUT_MS", d.indexing.timeoutMs),
    },
    retrieval: {
      k: getNumber("RETRIEVAL_TOP_K", d.retrieval.k),
      budgetChars: getNumber("CONTEXT_BUDGET_CHARS", d.retrieval.budgetChars),
      concurrency: getNumber("RETRIEVAL_CONCURRENCY", d.retrieval.concurrency),
      timeoutMs: getNumber("RETRIEVAL_TIMEOUT_MS", d.retrieval.timeoutMs),
      retries: getNumber("RETRIEVAL_RETRIES", d.retrieval.retries),
      backoffMs: getNumber("RETRIEVAL_BACKOFF_MS", d.retrieval.backoffMs),
    },
    extraction: {
      timeoutMs: getNumber("GENERATION_TIMEOUT_MS", d.extraction.timeoutMs),
      retries: getNumber("GENERATION_RETRIES", d.extraction.retries),
      backoffMs: getNumber("GENERATION_BACKOFF_MS", d.extraction.backoffMs),
    },
    summary: {
      enabled: getBoolean("SUMMARY_ENABLED", d.summary.enabled),
      timeoutMs: getNumber("SUMMARY_TIMEOUT_MS", d.summary.timeoutMs),
    },
  });
}
