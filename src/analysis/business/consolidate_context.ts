import { TimeoutError, describeError } from "../domain/errors";
import type { Degradation, RetrievalStats } from "../domain/types";
import type {
  DocumentIndex,
  RetrievedChunk,
} from "../infrastructure/contracts";
import { getLogger } from "../../util/logger";
import type { NamedQuery } from "./query_registry";
import { settleInBatches, withRetry, withTimeout } from "./resilience";

const logger = getLogger("analysis/consolidate_context");

export const CHUNK_SEPARATOR = "\n\n";

export interface ConsolidateOptions {
  k: number;
  budgetChars: number;
  concurrency: number;
  timeoutMs: number;
  retries: number;
  backoffMs: number;
}

export interface ConsolidatedContext {
  text: string;
  chunks: RetrievedChunk[];
  /** No query returned any hit. */
  noEvidence: boolean;
  failedQueries: string[];
  degradations: Degradation[];
  stats: RetrievalStats;
}

function joinedLength(chunks: readonly RetrievedChunk[]): number {
  if (chunks.length === 0) return 0;
  const textChars = chunks.reduce((sum, c) => sum + c.text.length, 0);
  return textChars + CHUNK_SEPARATOR.length * (chunks.length - 1);
}

/**
 * Drops duplicate chunks, matched by id and then by exact text.
 * First occurrence wins, so earlier queries keep their position.
 */
export function dedupeChunks(chunks: readonly RetrievedChunk[]): RetrievedChunk[] {
  const seenIds = new Set<string>();
  const seenTexts = new Set<string>();
  const unique: RetrievedChunk[] = [];
  for (const chunk of chunks) {
    if (seenIds.has(chunk.id) || seenTexts.has(chunk.text)) continue;
    seenIds.add(chunk.id);
    seenTexts.add(chunk.text);
    unique.push(chunk);
  }
  return unique;
}

/**
 * Evicts whole chunks from the end until the joined text fits the budget.
 */
export function fitToBudget(
  chunks: readonly RetrievedChunk[],
  budgetChars: number
): { kept: RetrievedChunk[]; evicted: number } {
  const kept = [...chunks];
  while (kept.length > 0 && joinedLength(kept) > budgetChars) {
    kept.pop();
  }
  return { kept, evicted: chunks.length - kept.length };
}

/**
 * Runs every query against the index and merges the hits into one bounded
 * context. Queries that still fail after retries are reported, not thrown.
 */
export async function consolidateContext(
  index: DocumentIndex,
  queries: readonly NamedQuery[],
  options: ConsolidateOptions
): Promise<ConsolidatedContext> {
  const settled = await settleInBatches(queries, options.concurrency, query =>
    withRetry(
      () =>
        withTimeout(`search ${query.id}`, options.timeoutMs, signal =>
          index.search(query.text, options.k, { signal })
        ),
      {
        retries: options.retries,
        backoffMs: options.backoffMs,
        onRetry: (err, attempt, delayMs) =>
          logger.warn(
            { query: query.id, attempt, delayMs, error: describeError(err) },
            "Retrying retrieval"
          ),
      }
    )
  );

  const retrieved: RetrievedChunk[] = [];
  const failedQueries: string[] = [];
  const degradations: Degradation[] = [];
  settled.forEach((result, i) => {
    const query = queries[i];
    if (result.status === "fulfilled") {
      retrieved.push(...result.value);
      return;
    }
    failedQueries.push(query.id);
    degradations.push({
      kind: result.reason instanceof TimeoutError ? "timeout" : "service-error",
      stage: "retrieval",
      detail: `${query.id}: ${describeError(result.reason)}`,
    });
  });

  const unique = dedupeChunks(retrieved);
  const { kept, evicted } = fitToBudget(unique, options.budgetChars);
  const text = kept.map(c => c.text).join(CHUNK_SEPARATOR);
  if (unique.length > 0 && kept.length === 0) {
    degradations.push({
      kind: "budget-exceeded",
      stage: "retrieval",
      detail: `${unique.length} retrieved chunks, none fits the ${options.budgetChars}-char budget`,
    });
  }

  const stats: RetrievalStats = {
    queries: queries.length,
    failedQueries,
    retrievedChunks: retrieved.length,
    uniqueChunks: unique.length,
    includedChunks: kept.length,
    evictedChunks: evicted,
    contextChars: text.length,
  };
  logger.debug(stats, "Context consolidated");
  if (failedQueries.length > 0) {
    logger.warn({ failedQueries }, "Some retrieval queries failed");
  }

  return {
    text,
    chunks: kept,
    noEvidence: unique.length === 0,
    failedQueries,
    degradations,
    stats,
  };
}
