import {
  ParseError,
  TimeoutError,
  describeError,
} from "../domain/errors";
import type {
  Degradation,
  Indicator,
  IndicatorAdjustment,
  IndicatorValue,
  Track,
} from "../domain/types";
import type { TextGenerator } from "../infrastructure/contracts";
import {
  buildExtractionInput,
  buildExtractionInstruction,
} from "../prompts/extraction";
import {
  ExtractionPayloadSchema,
  IndicatorEntrySchema,
  type ExtractionPayload,
  type IndicatorEntry,
} from "../prompts/schema";
import { evaluateRule, isNumericRule } from "../rubric/rules";
import type {
  IndicatorDefinition,
  NumericRule,
  TrackRubric,
} from "../rubric/schema";
import { getLogger } from "../../util/logger";
import { withRetry, withTimeout } from "./resilience";

const logger = getLogger("analysis/extract_indicators");

export interface ExtractionOptions {
  timeoutMs: number;
  retries: number;
  backoffMs: number;
}

export interface ExtractionContext {
  text: string;
  noEvidence: boolean;
}

const THOUSANDS_SEPARATOR = /,(?=\d{3}\b)/g;

export interface ExtractionResult {
  indicators: Indicator[];
  degradations: Degradation[];
  /** False when the generator was never called (no evidence). */
  generated: boolean;
}

/**
 * Pulls the JSON object out of a model reply: code fences and any prose
 * around the outermost braces are dropped.
 */
export function parseExtractionResponse(text: string): ExtractionPayload {
  let cleaned = text.trim();
  const fence = cleaned.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fence) cleaned = fence[1].trim();

  const start = cleaned.indexOf("{");
  const end = cleaned.lastIndexOf("}");
  if (start === -1 || end < start) {
    throw new ParseError("Model output contains no JSON object");
  }

  let json: unknown;
  try {
    json = JSON.parse(cleaned.slice(start, end + 1));
  } catch (err) {
    throw new ParseError("Model output is not valid JSON", { cause: err });
  }

  const parsed = ExtractionPayloadSchema.safeParse(json);
  if (!parsed.success) {
    throw new ParseError("Model output is not a JSON object keyed by indicator");
  }
  return parsed.data;
}

function readNumber(
  field: string,
  raw: IndicatorEntry["value"],
  adjustments: IndicatorAdjustment[]
): number | null {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === "number") {
    if (Number.isFinite(raw)) return raw;
    adjustments.push({ kind: "invalid", detail: `${field} is not finite` });
    return null;
  }
  // "18,5" stays ambiguous and is rejected; "1,250" reads as 1250
  const cleaned = raw.replace(/[%\s]/g, "").replace(THOUSANDS_SEPARATOR, "");
  const n = cleaned.includes(",") ? NaN : Number(cleaned);
  if (cleaned !== "" && Number.isFinite(n)) {
    adjustments.push({ kind: "coerced", detail: `${field} "${raw}" read as ${n}` });
    return n;
  }
  adjustments.push({
    kind: "invalid",
    detail: `${field} "${raw}" is not a number`,
  });
  return null;
}

function readNumericScore(
  raw: IndicatorEntry["score"],
  adjustments: IndicatorAdjustment[]
): number | null {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === "number" && Number.isFinite(raw)) return raw;
  if (typeof raw === "string" && raw.trim() !== "") {
    const n = Number(raw.trim());
    if (Number.isFinite(n)) {
      adjustments.push({ kind: "coerced", detail: `score "${raw}" read as ${n}` });
      return n;
    }
  }
  adjustments.push({
    kind: "invalid",
    detail: `score ${JSON.stringify(raw)} is not a number`,
  });
  return null;
}

function scoreNumeric(
  definition: IndicatorDefinition,
  rule: NumericRule,
  entry: IndicatorEntry,
  adjustments: IndicatorAdjustment[]
): { rawValue: number | null; measured: number | null; prior: number | null } {
  const measured = readNumber("value", entry.value, adjustments);
  const prior = readNumber("prior_value", entry.prior_value, adjustments);
  let score = readNumericScore(entry.score, adjustments);

  if (measured !== null) {
    const ruled = evaluateRule(rule, measured, prior);
    if (score !== ruled) {
      adjustments.push({
        kind: "rescored",
        detail: `model scored ${score ?? "null"}, rule gives ${ruled} for value ${measured}`,
      });
    }
    return { rawValue: ruled, measured, prior };
  }

  if (score === null) return { rawValue: null, measured, prior };

  if (!Number.isInteger(score)) {
    const rounded = Math.round(score);
    adjustments.push({
      kind: "coerced",
      detail: `score ${score} rounded to ${rounded}`,
    });
    score = rounded;
  }
  const bounded = Math.min(definition.maxPoints, Math.max(0, score));
  if (score < 0 || score > definition.maxPoints) {
    adjustments.push({
      kind: "clamped",
      detail: `score ${score} clamped to ${bounded}`,
    });
  }
  return { rawValue: bounded, measured, prior };
}

function scorePresence(
  entry: IndicatorEntry,
  adjustments: IndicatorAdjustment[]
): boolean | null {
  const raw = entry.score;
  if (raw === null || raw === undefined) return null;
  if (typeof raw === "boolean") return raw;
  if (raw === 0 || raw === 1) {
    adjustments.push({ kind: "coerced", detail: `score ${raw} read as ${raw === 1}` });
    return raw === 1;
  }
  if (typeof raw === "string") {
    const t = raw.trim().toLowerCase();
    if (t === "true" || t === "yes" || t === "false" || t === "no") {
      const value = t === "true" || t === "yes";
      adjustments.push({ kind: "coerced", detail: `score "${raw}" read as ${value}` });
      return value;
    }
  }
  adjustments.push({
    kind: "invalid",
    detail: `score ${JSON.stringify(raw)} is not a boolean`,
  });
  return null;
}

function buildIndicator(
  definition: IndicatorDefinition,
  category: string,
  fields: {
    rawValue: IndicatorValue;
    evidence: string;
    measuredValue: number | null;
    priorValue: number | null;
    adjustments: IndicatorAdjustment[];
  }
): Indicator {
  const { rawValue } = fields;
  let points = 0;
  if (typeof rawValue === "number") points = rawValue;
  else if (rawValue === true) points = definition.maxPoints;
  return {
    key: definition.key,
    label: definition.label,
    category,
    maxPoints: definition.maxPoints,
    points,
    status: rawValue === null ? "insufficient-evidence" : "scored",
    ...fields,
  };
}

function emptyIndicator(
  definition: IndicatorDefinition,
  category: string,
  adjustments: IndicatorAdjustment[] = []
): Indicator {
  return buildIndicator(definition, category, {
    rawValue: null,
    evidence: "",
    measuredValue: null,
    priorValue: null,
    adjustments,
  });
}

/**
 * Every indicator of the track with insufficient evidence.
 */
export function emptyIndicators(rubric: TrackRubric): Indicator[] {
  return rubric.categories.flatMap(category =>
    category.indicators.map(d => emptyIndicator(d, category.id))
  );
}

function mapEntry(
  definition: IndicatorDefinition,
  category: string,
  raw: unknown
): Indicator {
  if (raw === undefined) {
    return emptyIndicator(definition, category, [
      { kind: "missing", detail: "key absent from model output" },
    ]);
  }
  const parsed = IndicatorEntrySchema.safeParse(raw);
  if (!parsed.success) {
    return emptyIndicator(definition, category, [
      { kind: "invalid", detail: "entry is not an indicator object" },
    ]);
  }

  const entry = parsed.data;
  const adjustments: IndicatorAdjustment[] = [];
  if (entry.score === undefined) {
    adjustments.push({ kind: "missing", detail: "score absent" });
  }
  const evidence = entry.evidence?.trim() ?? "";

  const rule = definition.rule;
  if (isNumericRule(rule)) {
    const { rawValue, measured, prior } = scoreNumeric(
      definition,
      rule,
      entry,
      adjustments
    );
    return buildIndicator(definition, category, {
      rawValue,
      evidence,
      measuredValue: measured,
      priorValue: prior,
      adjustments,
    });
  }
  return buildIndicator(definition, category, {
    rawValue: scorePresence(entry, adjustments),
    evidence,
    measuredValue: null,
    priorValue: null,
    adjustments,
  });
}

/**
 * Maps a parsed payload onto the rubric's fixed indicator set, in rubric
 * order. Keys the rubric does not define are ignored.
 */
export function mapExtraction(
  rubric: TrackRubric,
  payload: ExtractionPayload
): Indicator[] {
  const indicators = rubric.categories.flatMap(category =>
    category.indicators.map(d => mapEntry(d, category.id, payload[d.key]))
  );
  const known = new Set(indicators.map(i => i.key));
  const extra = Object.keys(payload).filter(k => !known.has(k));
  if (extra.length > 0) {
    logger.debug({ extra }, "Ignoring unknown indicator keys");
  }
  return indicators;
}

export async function extractIndicators(
  track: Track,
  rubric: TrackRubric,
  context: ExtractionContext,
  generator: TextGenerator,
  options: ExtractionOptions
): Promise<ExtractionResult> {
  if (context.noEvidence || context.text.trim() === "") {
    logger.warn({ track }, "No context to extract from; skipping generation");
    return {
      indicators: emptyIndicators(rubric),
      // an empty context with hits was already reported by retrieval
      degradations: context.noEvidence
        ? [
            {
              kind: "no-evidence",
              stage: "retrieval",
              detail: "no chunks survived retrieval",
            },
          ]
        : [],
      generated: false,
    };
  }

  const instruction = buildExtractionInstruction(track, rubric);
  const input = buildExtractionInput(context.text);

  let reply: string;
  try {
    reply = await withRetry(
      () =>
        withTimeout(`${track} extraction`, options.timeoutMs, signal =>
          generator.generate(instruction, input, { signal })
        ),
      {
        retries: options.retries,
        backoffMs: options.backoffMs,
        onRetry: (err, attempt) =>
          logger.warn(
            { track, attempt, error: describeError(err) },
            "Retrying extraction"
          ),
      }
    );
  } catch (err) {
    logger.error({ track, error: describeError(err) }, "Extraction call failed");
    return {
      indicators: emptyIndicators(rubric),
      degradations: [
        {
          kind: err instanceof TimeoutError ? "timeout" : "service-error",
          stage: "extraction",
          detail: describeError(err),
        },
      ],
      generated: true,
    };
  }

  let payload: ExtractionPayload;
  try {
    payload = parseExtractionResponse(reply);
  } catch (err) {
    if (!(err instanceof ParseError)) throw err;
    logger.error(
      { track, error: err.message, preview: reply.slice(0, 200) },
      "Unparseable extraction output"
    );
    return {
      indicators: emptyIndicators(rubric),
      degradations: [
        { kind: "parse-error", stage: "extraction", detail: err.message },
      ],
      generated: true,
    };
  }

  const indicators = mapExtraction(rubric, payload);
  const adjusted = indicators.filter(i => i.adjustments.length > 0);
  if (adjusted.length > 0) {
    logger.info(
      {
        track,
        adjustments: adjusted.map(i => ({
          key: i.key,
          kinds: i.adjustments.map(a => a.kind),
        })),
      },
      "Normalized model output"
    );
  }
  return { indicators, degradations: [], generated: true };
}
