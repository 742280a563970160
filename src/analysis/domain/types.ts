/**
 * Domain types for report analysis.
 */
export type Track = "financial" | "sustainability";

export const TRACKS: readonly Track[] = ["financial", "sustainability"];

/** Integer sub-score, boolean disclosure, or null for insufficient evidence. */
export type IndicatorValue = number | boolean | null;

export type IndicatorStatus = "scored" | "insufficient-evidence";

export type AdjustmentKind =
  | "missing"
  | "clamped"
  | "coerced"
  | "invalid"
  | "rescored";

export interface IndicatorAdjustment {
  kind: AdjustmentKind;
  detail: string;
}

export interface Indicator {
  key: string;
  label: string;
  category: string;
  maxPoints: number;
  rawValue: IndicatorValue;
  points: number;
  status: IndicatorStatus;
  evidence: string;
  /** Figure the model reported for the rule's metric, when it gave one. */
  measuredValue: number | null;
  priorValue: number | null;
  adjustments: IndicatorAdjustment[];
}

export type DegradationKind =
  | "no-evidence"
  | "budget-exceeded"
  | "parse-error"
  | "service-error"
  | "timeout";

export interface Degradation {
  kind: DegradationKind;
  stage: "loading" | "indexing" | "retrieval" | "extraction";
  detail: string;
}

export interface RetrievalStats {
  queries: number;
  failedQueries: string[];
  retrievedChunks: number;
  uniqueChunks: number;
  includedChunks: number;
  evictedChunks: number;
  contextChars: number;
}

export type DisclosureAxis = "completeness" | "reliability";

export interface CategoryScore {
  id: string;
  label: string;
  raw: number;
  max: number;
  disclosure: DisclosureAxis | null;
  insufficientEvidence: number;
  indicators: Indicator[];
}

export interface TrackScore {
  track: Track;
  rubricVersion: string;
  raw: number;
  ceiling: number;
  normalized: number;
  categories: CategoryScore[];
  incomplete: boolean;
  degradations: Degradation[];
  retrieval: RetrievalStats | null;
}

export type DisclosureLevel = "Low" | "Medium" | "High";

export type DisclosureRisk = "Low" | "Medium" | "Med-High" | "High";

export interface DisclosureQuality {
  completenessRatio: number;
  reliabilityRatio: number;
  completenessLevel: DisclosureLevel;
  reliabilityLevel: DisclosureLevel;
  risk: DisclosureRisk;
}

export interface ScoreReport {
  readonly rubricVersion: string;
  readonly financial: TrackScore | null;
  readonly sustainability: TrackScore | null;
  readonly overall: number;
  readonly partial: boolean;
  readonly partialReasons: string[];
  readonly disclosureQuality: DisclosureQuality | null;
}
