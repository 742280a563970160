import type {
  DisclosureAxis,
  DisclosureLevel,
  DisclosureQuality,
  DisclosureRisk,
  TrackScore,
} from "../domain/types";

export const DISCLOSURE_LEVELS: readonly DisclosureLevel[] = [
  "Low",
  "Medium",
  "High",
];

/** Rows are reliability, columns completeness. */
export const RISK_MATRIX: Record<
  DisclosureLevel,
  Record<DisclosureLevel, DisclosureRisk>
> = {
  Low: { Low: "High", Medium: "High", High: "Med-High" },
  Medium: { Low: "High", Medium: "Medium", High: "Medium" },
  High: { Low: "Med-High", Medium: "Medium", High: "Low" },
};

export function levelFor(ratio: number): DisclosureLevel {
  if (ratio >= 0.75) return "High";
  if (ratio >= 0.4) return "Medium";
  return "Low";
}

function disclosedRatio(score: TrackScore, axis: DisclosureAxis): number {
  const indicators = score.categories
    .filter(c => c.disclosure === axis)
    .flatMap(c => c.indicators);
  if (indicators.length === 0) return 0;
  const disclosed = indicators.filter(i => i.points > 0).length;
  return disclosed / indicators.length;
}

/**
 * Places a sustainability result on the completeness/reliability matrix.
 * Insufficient evidence counts as not disclosed.
 */
export function assessDisclosureQuality(
  score: TrackScore
): DisclosureQuality {
  const completenessRatio = disclosedRatio(score, "completeness");
  const reliabilityRatio = disclosedRatio(score, "reliability");
  const completenessLevel = levelFor(completenessRatio);
  const reliabilityLevel = levelFor(reliabilityRatio);
  return {
    completenessRatio,
    reliabilityRatio,
    completenessLevel,
    reliabilityLevel,
    risk: RISK_MATRIX[reliabilityLevel][completenessLevel],
  };
}
