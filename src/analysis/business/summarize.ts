import { describeError } from "../domain/errors";
import type { Result } from "../domain/result";
import type { ScoreReport } from "../domain/types";
import type { TextGenerator } from "../infrastructure/contracts";
import { SUMMARY_SYSTEM_PROMPT, buildSummaryPrompt } from "../prompts/summary";
import { getLogger } from "../../util/logger";
import { withTimeout } from "./resilience";

const logger = getLogger("analysis/summarize");

export const SUMMARY_UNAVAILABLE = "Narrative summary unavailable";

export interface SummaryOptions {
  timeoutMs: number;
}

/**
 * Asks the generator for the narrative. Never throws and never retries.
 */
export async function generateSummary(
  generator: TextGenerator,
  report: ScoreReport,
  options: SummaryOptions
): Promise<Result<string>> {
  try {
    const text = await withTimeout("summary", options.timeoutMs, signal =>
      generator.generate(SUMMARY_SYSTEM_PROMPT, buildSummaryPrompt(report), {
        signal,
      })
    );
    const trimmed = text.trim();
    if (!trimmed) return { ok: false, error: "empty summary" };
    return { ok: true, data: trimmed };
  } catch (err) {
    const error = describeError(err);
    logger.warn({ error }, "Summary generation failed");
    return { ok: false, error };
  }
}

export function summaryText(result: Result<string>): string {
  return result.ok ? result.data : `${SUMMARY_UNAVAILABLE} (${result.error}).`;
}
