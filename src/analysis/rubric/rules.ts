import type { Band, NumericRule, Rule } from "./schema";

export function isNumericRule(rule: Rule): rule is NumericRule {
  return rule.kind === "range" || rule.kind === "greater-than";
}

export function bandMatches(band: Band, value: number): boolean {
  if (band.gt !== undefined && !(value > band.gt)) return false;
  if (band.gte !== undefined && !(value >= band.gte)) return false;
  if (band.lt !== undefined && !(value < band.lt)) return false;
  if (band.lte !== undefined && !(value <= band.lte)) return false;
  return true;
}

/**
 * Scores a measured figure against a numeric rule.
 * `priorValue` only matters for `greater-than` rules with an improvement bonus.
 */
export function evaluateRule(
  rule: NumericRule,
  value: number,
  priorValue: number | null = null
): number {
  switch (rule.kind) {
    case "range": {
      const band = rule.bands.find(b => bandMatches(b, value));
      return band ? band.points : rule.otherwise;
    }
    case "greater-than": {
      if (!(value > rule.threshold)) return rule.otherwise;
      if (rule.improvement && priorValue !== null && value > priorValue) {
        return rule.improvement.points;
      }
      return rule.points;
    }
  }
}

export function maxRulePoints(rule: Rule): number {
  switch (rule.kind) {
    case "range":
      return Math.max(rule.otherwise, ...rule.bands.map(b => b.points));
    case "greater-than":
      return Math.max(
        rule.points,
        rule.otherwise,
        rule.improvement?.points ?? 0
      );
    case "presence-check":
      return rule.points;
  }
}

function formatBound(n: number, unit: string): string {
  return unit === "%" ? `${n}%` : unit ? `${n} ${unit}` : `${n}`;
}

export function describeBand(band: Band, unit: string): string {
  const parts: string[] = [];
  if (band.gt !== undefined) parts.push(`> ${formatBound(band.gt, unit)}`);
  if (band.gte !== undefined) parts.push(`>= ${formatBound(band.gte, unit)}`);
  if (band.lt !== undefined) parts.push(`< ${formatBound(band.lt, unit)}`);
  if (band.lte !== undefined) parts.push(`<= ${formatBound(band.lte, unit)}`);
  return parts.length > 0
    ? parts.map(p => `value ${p}`).join(" and ")
    : "any value";
}

function withDescription(condition: string, description?: string): string {
  return description ? `${condition}: ${description}` : condition;
}

/**
 * Renders a rule as prompt lines, one per scoring outcome.
 */
export function describeRule(rule: Rule): string[] {
  switch (rule.kind) {
    case "range":
      return [
        ...rule.bands.map(
          b =>
            `- ${b.points} (${describeBand(b, rule.unit)})${b.description ? `: ${b.description}` : ""}`
        ),
        withDescription(
          `- ${rule.otherwise} (any other value)`,
          rule.otherwiseDescription
        ),
      ];
    case "greater-than": {
      const above = `value > ${formatBound(rule.threshold, rule.unit)}`;
      const lines: string[] = [];
      if (rule.improvement) {
        lines.push(
          withDescription(
            `- ${rule.improvement.points} (${above} and value > prior_value)`,
            rule.improvement.description
          )
        );
      }
      lines.push(
        withDescription(`- ${rule.points} (${above})`, rule.description)
      );
      lines.push(
        withDescription(
          `- ${rule.otherwise} (value <= ${formatBound(rule.threshold, rule.unit)})`,
          rule.otherwiseDescription
        )
      );
      return lines;
    }
    case "presence-check":
      return [
        `- true (${rule.points} point${rule.points === 1 ? "" : "s"}): ${rule.description}`,
        "- false (0 points): not disclosed",
      ];
  }
}
