import type { Track } from "../domain/types";
import { describeRule, isNumericRule } from "../rubric/rules";
import type { IndicatorDefinition, TrackRubric } from "../rubric/schema";

const ROLE: Record<Track, string> = {
  financial: "You are a financial analyst reading a company's annual report.",
  sustainability:
    "You are an ESG analyst specializing in automotive industry sustainability reporting.",
};

function describeIndicator(indicator: IndicatorDefinition): string[] {
  const lines = [
    `${indicator.key}: ${indicator.label} (max ${indicator.maxPoints} points)`,
  ];
  if (indicator.metric) lines.push(`  value: ${indicator.metric}`);
  lines.push(`  ${indicator.guidance}`);
  lines.push(...describeRule(indicator.rule).map(l => `  ${l}`));
  return lines;
}

function responseShape(indicator: IndicatorDefinition): string {
  if (isNumericRule(indicator.rule)) {
    return `  "${indicator.key}": { "score": 0-${indicator.maxPoints} or null, "value": number or null, "prior_value": number or null, "evidence": string }`;
  }
  return `  "${indicator.key}": { "score": true, false or null, "evidence": string }`;
}

/**
 * Builds the single extraction instruction for a track. Every indicator key,
 * its scoring thresholds and the null policy are spelled out.
 */
export function buildExtractionInstruction(
  track: Track,
  rubric: TrackRubric
): string {
  const indicators = rubric.categories.flatMap(c => c.indicators);
  const sections = rubric.categories.flatMap(category => [
    "",
    `## ${category.label} (${category.ceiling} points)`,
    ...category.indicators.flatMap(describeIndicator),
  ]);

  return [
    ROLE[track],
    "",
    "For each indicator below:",
    "1) Determine the underlying facts from the CONTEXT",
    "2) Assign a score using the rules listed under the indicator",
    "3) Provide brief evidence quoting the specific numbers or statements from the CONTEXT",
    "",
    "Where an indicator lists a value, report the figure you used as `value` (a plain number, no units) and, for year-over-year comparisons, the prior-year figure as `prior_value`.",
    "If the required information is not stated or cannot be reliably inferred, set the score to null. Use null, not 0, when evidence is absent.",
    ...sections,
    "",
    "Return ONLY a JSON object with exactly these keys and no other text:",
    "{",
    indicators.map(responseShape).join(",\n"),
    "}",
  ].join("\n");
}

export function buildExtractionInput(context: string): string {
  return ["CONTEXT:", context].join("\n");
}
