import { ConfigurationError } from "../domain/errors";
import type { Track } from "../domain/types";
import { TRACKS } from "../domain/types";
import { getLogger } from "../../util/logger";
import { maxRulePoints } from "./rules";
import { RubricSchema, type Rubric, type TrackRubric } from "./schema";
import automotive2024 from "./versions/automotive-2024.json";
import automotive2024NetZero from "./versions/automotive-2024-net-zero.json";

const logger = getLogger("analysis/rubric/registry");

export const DEFAULT_RUBRIC_VERSION = "automotive-2024";

const SOURCES: Record<string, unknown> = {
  "automotive-2024": automotive2024,
  "automotive-2024-net-zero": automotive2024NetZero,
};

const cache = new Map<string, Rubric>();

export function listRubricVersions(): string[] {
  return Object.keys(SOURCES);
}

function validateTrack(track: Track, rubric: TrackRubric): string[] {
  const issues: string[] = [];
  let categorySum = 0;
  for (const category of rubric.categories) {
    let memberSum = 0;
    for (const indicator of category.indicators) {
      const where = `${track}.${category.id}.${indicator.key}`;
      const attainable = maxRulePoints(indicator.rule);
      if (attainable !== indicator.maxPoints) {
        issues.push(
          `${where}: maxPoints ${indicator.maxPoints} but rule awards at most ${attainable}`
        );
      }
      memberSum += indicator.maxPoints;
    }
    if (memberSum !== category.ceiling) {
      issues.push(
        `${track}.${category.id}: ceiling ${category.ceiling} but indicators sum to ${memberSum}`
      );
    }
    categorySum += category.ceiling;
  }
  if (categorySum !== rubric.ceiling) {
    issues.push(
      `${track}: ceiling ${rubric.ceiling} but categories sum to ${categorySum}`
    );
  }
  return issues;
}

/**
 * Static consistency checks that zod cannot express.
 * Returns one message per problem; empty means the rubric is usable.
 */
export function validateRubric(rubric: Rubric): string[] {
  const issues: string[] = [];
  const seenKeys = new Set<string>();
  const seenCategories = new Set<string>();
  for (const track of TRACKS) {
    const trackRubric = rubric.tracks[track];
    issues.push(...validateTrack(track, trackRubric));
    for (const category of trackRubric.categories) {
      if (seenCategories.has(category.id)) {
        issues.push(`duplicate category id: ${category.id}`);
      }
      seenCategories.add(category.id);
      for (const indicator of category.indicators) {
        if (seenKeys.has(indicator.key)) {
          issues.push(`duplicate indicator key: ${indicator.key}`);
        }
        seenKeys.add(indicator.key);
      }
    }
  }
  return issues;
}

export function parseRubric(raw: unknown): Rubric {
  const parsed = RubricSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid rubric",
      parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`)
    );
  }
  const issues = validateRubric(parsed.data);
  if (issues.length > 0) {
    throw new ConfigurationError(
      `Invalid rubric ${parsed.data.version}`,
      issues
    );
  }
  return parsed.data;
}

export function loadRubric(version: string = DEFAULT_RUBRIC_VERSION): Rubric {
  const cached = cache.get(version);
  if (cached) return cached;

  const raw = SOURCES[version];
  if (raw === undefined) {
    throw new ConfigurationError(`Unknown rubric version: ${version}`, [
      `known versions: ${listRubricVersions().join(", ")}`,
    ]);
  }
  const rubric = parseRubric(raw);
  if (rubric.version !== version) {
    throw new ConfigurationError(
      `Rubric file for ${version} declares version ${rubric.version}`
    );
  }
  cache.set(version, rubric);
  logger.debug(
    {
      version,
      financialCeiling: rubric.tracks.financial.ceiling,
      sustainabilityCeiling: rubric.tracks.sustainability.ceiling,
    },
    "Rubric loaded"
  );
  return rubric;
}
