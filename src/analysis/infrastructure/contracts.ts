/**
 * A retrieved passage. `score` is the similarity reported by the index.
 */
export interface RetrievedChunk {
  id: string;
  text: string;
  score: number;
}

export interface SearchOptions {
  signal?: AbortSignal;
}

/**
 * Read-only similarity index over one document.
 */
export interface DocumentIndex {
  readonly size: number;
  search(
    query: string,
    k: number,
    options?: SearchOptions
  ): Promise<RetrievedChunk[]>;
}

export interface IndexOptions {
  signal?: AbortSignal;
}

export interface Indexer {
  buildIndex(text: string, options?: IndexOptions): Promise<DocumentIndex>;
}

export interface GenerateOptions {
  signal?: AbortSignal;
}

/**
 * Text-generation capability. Implementations throw ServiceError or
 * TimeoutError on failure.
 */
export interface TextGenerator {
  readonly model: string;
  generate(
    instruction: string,
    input: string,
    options?: GenerateOptions
  ): Promise<string>;
}

export interface Embedder {
  embed(value: string, signal?: AbortSignal): Promise<number[]>;
  embedMany(values: string[], signal?: AbortSignal): Promise<number[][]>;
}

/**
 * Loads plain text from a document (PDF bytes or a path to one).
 */
export interface DocumentSource {
  loadText(input: Buffer | string): Promise<string>;
}
