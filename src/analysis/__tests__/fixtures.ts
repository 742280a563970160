import type { Indicator, Track } from "../domain/types";
import type { TextGenerator } from "../infrastructure/contracts";
import { loadRubric } from "../rubric/registry";

/**
 * Indicators for a track with every value taken from `values` (by key);
 * keys not listed are null.
 */
export function indicatorsFor(
  track: Track,
  values: Record<string, number | boolean | null>,
  version = "automotive-2024"
): Indicator[] {
  const rubric = loadRubric(version).tracks[track];
  return rubric.categories.flatMap(category =>
    category.indicators.map(definition => {
      const rawValue = values[definition.key] ?? null;
      let points = 0;
      if (typeof rawValue === "number") points = rawValue;
      else if (rawValue === true) points = definition.maxPoints;
      return {
        key: definition.key,
        label: definition.label,
        category: category.id,
        maxPoints: definition.maxPoints,
        rawValue,
        points,
        status:
          rawValue === null
            ? ("insufficient-evidence" as const)
            : ("scored" as const),
        evidence: rawValue === null ? "" : `evidence for ${definition.key}`,
        measuredValue: null,
        priorValue: null,
        adjustments: [],
      };
    })
  );
}

export interface ScriptedGenerator extends TextGenerator {
  calls: Array<{ instruction: string; input: string }>;
}

/**
 * Generator that answers from a script, one reply (or error) per call.
 */
export function scriptedGenerator(
  replies: Array<string | Error | ((instruction: string) => string)>
): ScriptedGenerator {
  const calls: Array<{ instruction: string; input: string }> = [];
  return {
    model: "scripted",
    calls,
    async generate(instruction, input) {
      const reply = replies[Math.min(calls.length, replies.length - 1)];
      calls.push({ instruction, input });
      if (reply instanceof Error) throw reply;
      return typeof reply === "function" ? reply(instruction) : reply;
    },
  };
}
