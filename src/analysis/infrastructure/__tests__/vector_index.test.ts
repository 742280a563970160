import { ServiceError } from "../../domain/errors";
import type { Embedder } from "../contracts";
import { createEmbeddingIndexer } from "../vector_index";

const VOCAB = ["revenue", "emissions", "inventory"];

/**
 * Bag-of-words embedding over a tiny vocabulary, enough to rank chunks.
 */
function keywordEmbedder(): Embedder & { batches: number } {
  const vectorize = (text: string) =>
    VOCAB.map(word => (text.toLowerCase().includes(word) ? 1 : 0.01));
  let batches = 0;
  return {
    get batches() {
      return batches;
    },
    async embed(value: string) {
      return vectorize(value);
    },
    async embedMany(values: string[]) {
      batches++;
      return values.map(vectorize);
    },
  };
}

describe("createEmbeddingIndexer", () => {
  test("ranks chunks by cosine similarity and caps at k", async () => {
    const text = [
      "Revenue grew 12% to 40bn.".padEnd(40, " "),
      "Scope 1 emissions fell 5%.".padEnd(40, " "),
      "Inventory days were 38.".padEnd(40, " "),
    ].join("");
    const indexer = createEmbeddingIndexer(keywordEmbedder(), {
      size: 40,
      overlap: 0,
    });
    const index = await indexer.buildIndex(text);
    expect(index.size).toBe(3);

    const hits = await index.search("emissions data", 2);
    expect(hits).toHaveLength(2);
    expect(hits[0].id).toBe("chunk-1");
    expect(hits[0].text.trim()).toBe("Scope 1 emissions fell 5%.");
    expect(hits[0].score).toBeGreaterThan(hits[1].score);
  });

  test("an empty document builds an empty index without embedding", async () => {
    const embedder = keywordEmbedder();
    const index = await createEmbeddingIndexer(embedder, {
      size: 100,
      overlap: 10,
    }).buildIndex("   ");
    expect(index.size).toBe(0);
    expect(embedder.batches).toBe(0);
    await expect(index.search("revenue", 5)).resolves.toEqual([]);
  });

  test("forwards the caller's abort signal to the batch embedding", async () => {
    const seen: Array<AbortSignal | undefined> = [];
    const embedder: Embedder = {
      async embed() {
        return [1];
      },
      async embedMany(values: string[], signal?: AbortSignal) {
        seen.push(signal);
        return values.map(() => [1]);
      },
    };
    const controller = new AbortController();
    await createEmbeddingIndexer(embedder, { size: 10, overlap: 0 }).buildIndex(
      "some text",
      { signal: controller.signal }
    );
    expect(seen).toEqual([controller.signal]);
  });

  test("embedding failures surface as ServiceError", async () => {
    const embedder: Embedder = {
      async embed() {
        throw new Error("socket hang up");
      },
      async embedMany() {
        throw new Error("401 unauthorized");
      },
    };
    const indexer = createEmbeddingIndexer(embedder, { size: 10, overlap: 0 });
    const built = indexer.buildIndex("some text");
    await expect(built).rejects.toBeInstanceOf(ServiceError);
    await expect(built).rejects.toThrow(
      "Document embedding failed: 401 unauthorized"
    );
  });
});
