import type {
  DisclosureQuality,
  Indicator,
  ScoreReport,
  Track,
  TrackScore,
} from "../domain/types";
import { roundHalfUp } from "./score";

export const TRACK_LABELS: Record<Track, string> = {
  financial: "Financial",
  sustainability: "Sustainability",
};

function oneDecimal(value: number): string {
  return value.toFixed(1);
}

function percent(ratio: number): string {
  return `${roundHalfUp(ratio * 100, 0)}%`;
}

function formatIndicator(indicator: Indicator): string {
  if (indicator.rawValue === null) {
    return `  - ${indicator.label}: insufficient evidence (0 / ${indicator.maxPoints})`;
  }
  return `  - ${indicator.label}: ${indicator.points} / ${indicator.maxPoints}`;
}

export function formatTrack(score: TrackScore): string[] {
  const lines = [`${TRACK_LABELS[score.track]} score`];
  for (const category of score.categories) {
    lines.push(`${category.label}: ${category.raw} / ${category.max}`);
    lines.push(...category.indicators.map(formatIndicator));
  }
  lines.push(`(normalized: ${oneDecimal(score.normalized)} / 10)`);
  if (score.incomplete) {
    const causes = score.degradations.map(
      d => `${d.kind} during ${d.stage} (${d.detail})`
    );
    lines.push(`Track incomplete: ${causes.join("; ")}`);
  }
  return lines;
}

export function formatDisclosureQuality(quality: DisclosureQuality): string[] {
  return [
    "Disclosure quality",
    `Completeness of disclosure: ${quality.completenessLevel} (${percent(quality.completenessRatio)} of key metrics reported)`,
    `Reliability of claims: ${quality.reliabilityLevel} (${percent(quality.reliabilityRatio)} of claim-quality checks passed)`,
    `Disclosure risk: ${quality.risk}`,
  ];
}

/**
 * Renders a report in the plain-text display format, one
 * `<Label>: <raw> / <max>` line per category.
 */
export function formatReport(report: ScoreReport): string {
  const blocks: string[][] = [];
  if (report.financial) blocks.push(formatTrack(report.financial));
  if (report.sustainability) blocks.push(formatTrack(report.sustainability));
  if (report.disclosureQuality) {
    blocks.push(formatDisclosureQuality(report.disclosureQuality));
  }

  const closing: string[] = [];
  if (report.partial) {
    closing.push(`Partial result: ${report.partialReasons.join("; ")}`);
  }
  closing.push(`Overall score: ${oneDecimal(report.overall)} / 10`);
  blocks.push(closing);

  return blocks.map(b => b.join("\n")).join("\n\n");
}
