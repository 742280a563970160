import { randomUUID } from "node:crypto";
import { createAiClient } from "../../ai/client";
import { withTrace } from "../../ai/telemetry";
import { withRunContext } from "../../util/logger";
import {
  consolidateContext,
  type ConsolidatedContext,
} from "../business/consolidate_context";
import {
  emptyIndicators,
  extractIndicators,
} from "../business/extract_indicators";
import { formatReport } from "../business/format_report";
import { queriesFor } from "../business/query_registry";
import { withTimeout } from "../business/resilience";
import { combine, scoreTrack } from "../business/score";
import { generateSummary, summaryText } from "../business/summarize";
import type { AnalysisConfig } from "../config";
import { TimeoutError, describeError } from "../domain/errors";
import type { Result } from "../domain/result";
import type {
  Degradation,
  ScoreReport,
  Track,
  TrackScore,
} from "../domain/types";
import type {
  DocumentIndex,
  DocumentSource,
  Indexer,
  TextGenerator,
} from "../infrastructure/contracts";
import { createLlmTextGenerator } from "../infrastructure/llm_text_generator";
import { createPdfDocumentSource } from "../infrastructure/pdf_document_source";
import { createEmbeddingIndexer } from "../infrastructure/vector_index";
import { loadRubric } from "../rubric/registry";

export interface AnalysisDeps {
  indexer: Indexer;
  generator: TextGenerator;
  documentSource: DocumentSource;
}

/**
 * Report text for one track, or the outcome of loading it. A failed load
 * still yields a (fully degraded) track score.
 */
export type TrackDocument = string | Result<string>;

export interface AnalysisInput {
  financial?: TrackDocument;
  sustainability?: TrackDocument;
}

export interface DocumentPaths {
  financial?: Buffer | string;
  sustainability?: Buffer | string;
}

export interface AnalysisOutcome {
  report: ScoreReport;
  formatted: string;
  summary: Result<string>;
}

export interface AnalysisPipeline {
  readonly rubricVersion: string;
  runFinancialTrack(document: TrackDocument): Promise<TrackScore>;
  runSustainabilityTrack(document: TrackDocument): Promise<TrackScore>;
  combine(
    financial?: TrackScore | null,
    sustainability?: TrackScore | null
  ): ScoreReport;
  summarize(report: ScoreReport): Promise<Result<string>>;
  renderSummary(report: ScoreReport): Promise<string>;
  formatReport(report: ScoreReport): string;
  loadDocuments(paths: DocumentPaths): Promise<AnalysisInput>;
  analyze(input: AnalysisInput): Promise<AnalysisOutcome>;
}

function toTrackDocument(
  settled: PromiseSettledResult<string | undefined>
): TrackDocument | undefined {
  if (settled.status === "rejected") {
    return { ok: false, error: describeError(settled.reason) };
  }
  if (settled.value === undefined) return undefined;
  return { ok: true, data: settled.value };
}

export function createDefaultDeps(config: AnalysisConfig): AnalysisDeps {
  const client = createAiClient();
  return {
    indexer: createEmbeddingIndexer(client, config.chunking),
    generator: createLlmTextGenerator(client),
    documentSource: createPdfDocumentSource(),
  };
}

/**
 * Wires retrieval, extraction and scoring for one rubric version. The
 * rubric is loaded eagerly, so a bad version fails here rather than mid-run.
 */
export function createAnalysisPipeline(
  config: AnalysisConfig,
  deps: AnalysisDeps = createDefaultDeps(config)
): AnalysisPipeline {
  const rubric = loadRubric(config.rubricVersion);
  const rubricVersion = rubric.version;

  function degradedTrack(track: Track, degradation: Degradation): TrackScore {
    const trackRubric = rubric.tracks[track];
    return scoreTrack({
      track,
      rubricVersion,
      rubric: trackRubric,
      indicators: emptyIndicators(trackRubric),
      degradations: [degradation],
    });
  }

  async function runTrack(
    track: Track,
    document: TrackDocument
  ): Promise<TrackScore> {
    const runId = randomUUID();
    const logger = withRunContext("analysis/pipeline", {
      runId,
      track,
      rubricVersion,
    });
    const trackRubric = rubric.tracks[track];

    let text: string;
    if (typeof document === "string") {
      text = document;
    } else if (document.ok) {
      text = document.data;
    } else {
      logger.error({ error: document.error }, "Report could not be loaded");
      return degradedTrack(track, {
        kind: "no-evidence",
        stage: "loading",
        detail: document.error,
      });
    }

    return withTrace(`${track}-track`, { runId, rubricVersion }, async () => {
      const startedAt = Date.now();
      let index: DocumentIndex;
      try {
        index = await withTimeout(
          `${track} indexing`,
          config.indexing.timeoutMs,
          signal => deps.indexer.buildIndex(text, { signal })
        );
      } catch (err) {
        logger.error({ error: describeError(err) }, "Indexing failed");
        return degradedTrack(track, {
          kind: err instanceof TimeoutError ? "timeout" : "service-error",
          stage: "indexing",
          detail: describeError(err),
        });
      }

      const context: ConsolidatedContext = await consolidateContext(
        index,
        queriesFor(track),
        config.retrieval
      );
      const extraction = await extractIndicators(
        track,
        trackRubric,
        context,
        deps.generator,
        config.extraction
      );
      const score = scoreTrack({
        track,
        rubricVersion,
        rubric: trackRubric,
        indicators: extraction.indicators,
        degradations: [...context.degradations, ...extraction.degradations],
        retrieval: context.stats,
      });

      logger.info(
        {
          raw: score.raw,
          ceiling: score.ceiling,
          normalized: score.normalized,
          incomplete: score.incomplete,
          durationMs: Date.now() - startedAt,
        },
        "Track scored"
      );
      return score;
    });
  }

  async function summarize(report: ScoreReport): Promise<Result<string>> {
    if (!config.summary.enabled) return { ok: false, error: "disabled" };
    return generateSummary(deps.generator, report, config.summary);
  }

  return {
    rubricVersion,
    runFinancialTrack: document => runTrack("financial", document),
    runSustainabilityTrack: document => runTrack("sustainability", document),
    combine,
    summarize,
    async renderSummary(report) {
      return summaryText(await summarize(report));
    },
    formatReport,
    async loadDocuments(paths) {
      // a rejection stays with its own track
      const [financial, sustainability] = await Promise.allSettled([
        paths.financial !== undefined
          ? deps.documentSource.loadText(paths.financial)
          : Promise.resolve(undefined),
        paths.sustainability !== undefined
          ? deps.documentSource.loadText(paths.sustainability)
          : Promise.resolve(undefined),
      ]);
      return {
        financial: toTrackDocument(financial),
        sustainability: toTrackDocument(sustainability),
      };
    },
    async analyze(input) {
      // Tracks share nothing, so they run side by side
      const [financial, sustainability] = await Promise.all([
        input.financial !== undefined
          ? runTrack("financial", input.financial)
          : Promise.resolve(null),
        input.sustainability !== undefined
          ? runTrack("sustainability", input.sustainability)
          : Promise.resolve(null),
      ]);
      const report = combine(financial, sustainability);
      const summary = await summarize(report);
      return { report, formatted: formatReport(report), summary };
    },
  };
}
