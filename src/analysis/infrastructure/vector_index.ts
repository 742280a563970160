import { cosineSimilarity } from "ai";
import { AnalysisError, ServiceError, describeError } from "../domain/errors";
import { getLogger } from "../../util/logger";
import { chunkText, type ChunkOptions, type TextChunk } from "./chunker";
import type {
  DocumentIndex,
  Embedder,
  IndexOptions,
  Indexer,
  RetrievedChunk,
  SearchOptions,
} from "./contracts";

const logger = getLogger("analysis/vector_index");

interface StoredVector {
  chunk: TextChunk;
  embedding: number[];
}

function asServiceError(action: string, err: unknown): AnalysisError {
  if (err instanceof AnalysisError) return err;
  return new ServiceError(`${action} failed: ${describeError(err)}`, {
    cause: err,
  });
}

/**
 * In-memory similarity index. Read-only once built.
 */
export class InMemoryVectorIndex implements DocumentIndex {
  private readonly vectors: readonly StoredVector[];

  constructor(
    private readonly embedder: Embedder,
    vectors: StoredVector[]
  ) {
    this.vectors = Object.freeze([...vectors]);
  }

  get size(): number {
    return this.vectors.length;
  }

  async search(
    query: string,
    k: number,
    options: SearchOptions = {}
  ): Promise<RetrievedChunk[]> {
    if (this.vectors.length === 0 || k <= 0) return [];
    let queryEmbedding: number[];
    try {
      queryEmbedding = await this.embedder.embed(query, options.signal);
    } catch (err) {
      throw asServiceError("Query embedding", err);
    }
    return this.vectors
      .map(v => ({
        id: v.chunk.id,
        text: v.chunk.text,
        score: cosineSimilarity(queryEmbedding, v.embedding),
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }
}

export function createEmbeddingIndexer(
  embedder: Embedder,
  chunkOptions: ChunkOptions
): Indexer {
  return {
    async buildIndex(
      text: string,
      options: IndexOptions = {}
    ): Promise<DocumentIndex> {
      const chunks = chunkText(text, chunkOptions);
      if (chunks.length === 0) {
        logger.warn("Document has no text to index");
        return new InMemoryVectorIndex(embedder, []);
      }
      let embeddings: number[][];
      try {
        embeddings = await embedder.embedMany(
          chunks.map(c => c.text),
          options.signal
        );
      } catch (err) {
        throw asServiceError("Document embedding", err);
      }
      if (embeddings.length !== chunks.length) {
        throw new ServiceError(
          `Embedding count mismatch: ${embeddings.length} for ${chunks.length} chunks`
        );
      }
      logger.debug({ chunks: chunks.length }, "Index built");
      return new InMemoryVectorIndex(
        embedder,
        chunks.map((chunk, i) => ({ chunk, embedding: embeddings[i] }))
      );
    },
  };
}
