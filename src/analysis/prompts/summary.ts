import type { Indicator, ScoreReport, TrackScore } from "../domain/types";

export const SUMMARY_SYSTEM_PROMPT = [
  "You are writing a one-page investor report for an AUTOMOTIVE company.",
  "Use only the scores and evidence provided. Do not recompute or change any score.",
  'Indicators marked "insufficient evidence" were not found in the report; say so rather than guessing.',
  "Use markdown headings (##) and bullet points with \"-\". Bold only short labels at the start of a bullet.",
  "Keep the report under 600 words.",
].join("\n");

function indicatorForPrompt(indicator: Indicator) {
  return {
    indicator: indicator.label,
    score:
      indicator.rawValue === null
        ? "insufficient evidence"
        : `${indicator.points} / ${indicator.maxPoints}`,
    evidence: indicator.evidence || undefined,
  };
}

function trackForPrompt(score: TrackScore | null) {
  if (!score) return "not analyzed";
  return {
    score: `${score.raw} / ${score.ceiling}`,
    normalized: `${score.normalized.toFixed(1)} / 10`,
    incomplete: score.incomplete || undefined,
    categories: score.categories.map(c => ({
      category: c.label,
      score: `${c.raw} / ${c.max}`,
      indicators: c.indicators.map(indicatorForPrompt),
    })),
  };
}

function scoreLabel(score: TrackScore | null): string {
  return score
    ? `Score: ${score.raw}/${score.ceiling}, Normalized: ${score.normalized.toFixed(1)}/10`
    : "not analyzed";
}

export function buildSummaryPrompt(report: ScoreReport): string {
  const payload = {
    rubricVersion: report.rubricVersion,
    overallScore: `${report.overall.toFixed(1)} / 10`,
    partial: report.partial ? report.partialReasons : undefined,
    financial: trackForPrompt(report.financial),
    sustainability: trackForPrompt(report.sustainability),
    disclosureQuality: report.disclosureQuality ?? undefined,
  };

  return [
    "Structured scores and evidence:",
    JSON.stringify(payload, null, 2),
    "",
    "Write the report with exactly these sections:",
    "",
    `## FINANCIAL HEALTH (${scoreLabel(report.financial)})`,
    "3-5 bullets on revenue growth, margins, cash flow and investment, and inventory, quoting figures from the evidence.",
    "",
    `## EMISSIONS TRANSPARENCY (${scoreLabel(report.sustainability)})`,
    "2-3 bullets on Scope 1/2/3 coverage and year-over-year trends.",
    "",
    "## EV-TRANSITION READINESS",
    "2-3 bullets on EV targets, ICE phase-out, battery recycling and supply chain traceability.",
    "",
    "## GREENWASHING RISK",
    "2-3 bullets on claim specificity, supporting evidence and tone, referring to the disclosure quality where given.",
    "",
    "## ENVIRONMENTAL COMPLIANCE",
    "2-3 bullets on water, hazardous waste, fines and supplier audits.",
    "",
    `## OVERALL READINESS (Overall score: ${report.overall.toFixed(1)}/10)`,
    "1-2 sentences of plain text on the company's overall position for the automotive transition.",
  ].join("\n");
}
