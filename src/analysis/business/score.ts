import { ConfigurationError } from "../domain/errors";
import type {
  CategoryScore,
  Degradation,
  Indicator,
  RetrievalStats,
  ScoreReport,
  Track,
  TrackScore,
} from "../domain/types";
import type { TrackRubric } from "../rubric/schema";
import { assessDisclosureQuality } from "./disclosure_quality";

export const NORMALIZED_MAX = 10;

/**
 * Half-up rounding on the decimal representation, so 7.85 -> 7.9 even though
 * 7.85 is stored as 7.8499999...
 */
export function roundHalfUp(value: number, decimals = 1): number {
  const shifted = Math.round(Number(`${value}e${decimals}`));
  const result = Number(`${shifted}e-${decimals}`);
  if (Number.isFinite(result)) return result;
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function normalize(raw: number, ceiling: number): number {
  if (ceiling <= 0) return 0;
  return roundHalfUp(clamp((raw / ceiling) * NORMALIZED_MAX, 0, NORMALIZED_MAX));
}

export interface ScoreTrackInput {
  track: Track;
  rubricVersion: string;
  rubric: TrackRubric;
  indicators: readonly Indicator[];
  degradations?: readonly Degradation[];
  retrieval?: RetrievalStats | null;
}

/**
 * Sums category points and normalizes the track total to 0-10.
 * Null indicators add nothing but keep their share of the ceiling.
 */
export function scoreTrack(input: ScoreTrackInput): TrackScore {
  const { track, rubricVersion, rubric } = input;
  const degradations = [...(input.degradations ?? [])];

  const categories: CategoryScore[] = rubric.categories.map(category => {
    const members = category.indicators.map(definition => {
      const found = input.indicators.find(i => i.key === definition.key);
      if (!found) {
        throw new ConfigurationError(
          `Indicator ${definition.key} missing from ${track} extraction`
        );
      }
      return found;
    });
    return {
      id: category.id,
      label: category.label,
      raw: members.reduce((sum, i) => sum + i.points, 0),
      max: category.ceiling,
      disclosure: category.disclosure ?? null,
      insufficientEvidence: members.filter(i => i.rawValue === null).length,
      indicators: members,
    };
  });

  const raw = categories.reduce((sum, c) => sum + c.raw, 0);
  return {
    track,
    rubricVersion,
    raw,
    ceiling: rubric.ceiling,
    normalized: normalize(raw, rubric.ceiling),
    categories,
    incomplete: degradations.length > 0,
    degradations,
    retrieval: input.retrieval ?? null,
  };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function describeIncomplete(score: TrackScore): string {
  const kinds = [...new Set(score.degradations.map(d => d.kind))];
  return `${score.track} track incomplete (${kinds.join(", ")})`;
}

/**
 * Combines whichever tracks ran into an immutable report. The overall score
 * is the mean of the already-rounded normalized track scores.
 */
export function combine(
  financial?: TrackScore | null,
  sustainability?: TrackScore | null
): ScoreReport {
  const present = [financial, sustainability].filter(
    (t): t is TrackScore => t !== null && t !== undefined
  );
  if (present.length === 0) {
    throw new Error("combine requires at least one track score");
  }
  const versions = new Set(present.map(t => t.rubricVersion));
  if (versions.size > 1) {
    throw new ConfigurationError("Track scores come from different rubrics", [
      ...versions,
    ]);
  }

  const partialReasons: string[] = [];
  if (!financial) partialReasons.push("financial track did not run");
  if (!sustainability) partialReasons.push("sustainability track did not run");
  for (const t of present) {
    if (t.incomplete) partialReasons.push(describeIncomplete(t));
  }

  const mean =
    present.reduce((sum, t) => sum + t.normalized, 0) / present.length;

  const report: ScoreReport = {
    rubricVersion: present[0].rubricVersion,
    financial: financial ? structuredClone(financial) : null,
    sustainability: sustainability ? structuredClone(sustainability) : null,
    overall: roundHalfUp(mean),
    partial: partialReasons.length > 0,
    partialReasons,
    disclosureQuality: sustainability
      ? assessDisclosureQuality(sustainability)
      : null,
  };
  return deepFreeze(report);
}
