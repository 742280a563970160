import { createAiClient } from "../client";
import { loadAiConfig, type AiConfig } from "../config";

const mockGenerateText = jest.fn();
const mockEmbed = jest.fn();
const mockEmbedMany = jest.fn();

jest.mock("ai", () => ({
  generateText: (...args: unknown[]) => mockGenerateText(...args),
  embed: (...args: unknown[]) => mockEmbed(...args),
  embedMany: (...args: unknown[]) => mockEmbedMany(...args),
}));

jest.mock("@ai-sdk/openai", () => ({
  createOpenAI: () =>
    Object.assign((id: string) => ({ provider: "openai", id }), {
      textEmbeddingModel: (id: string) => ({ provider: "openai", id }),
    }),
}));

jest.mock("@ai-sdk/google", () => ({
  createGoogleGenerativeAI: () =>
    Object.assign((id: string) => ({ provider: "google", id }), {
      textEmbeddingModel: (id: string) => ({ provider: "google", id }),
    }),
}));

const originalEnv = process.env;

beforeEach(() => {
  process.env = { ...originalEnv };
  delete process.env.STAGE;
  delete process.env.MODEL_PROVIDER;
  delete process.env.MODEL_NAME;
  delete process.env.EMBEDDING_MODEL;
  process.env.OPENAI_API_KEY = "test-openai-key";
  process.env.GOOGLE_GENERATIVE_AI_API_KEY = "test-google-key";
  mockGenerateText.mockReset();
  mockEmbed.mockReset();
  mockEmbedMany.mockReset();
});

afterEach(() => {
  process.env = originalEnv;
});

describe("loadAiConfig", () => {
  test("defaults to OpenAI gpt-4o-mini", () => {
    const cfg = loadAiConfig();
    expect(cfg.provider).toBe("openai");
    expect(cfg.model).toBe("gpt-4o-mini");
    expect(cfg.embeddingModel).toBe("text-embedding-3-small");
    expect(cfg.apiKey).toBe("test-openai-key");
  });

  test("switches defaults and key with the provider", () => {
    process.env.MODEL_PROVIDER = "google";
    const cfg = loadAiConfig();
    expect(cfg.model).toBe("gemini-2.5-flash");
    expect(cfg.embeddingModel).toBe("text-embedding-004");
    expect(cfg.apiKey).toBe("test-google-key");
  });

  test("honors an explicit model name", () => {
    process.env.MODEL_NAME = "gpt-4o";
    expect(loadAiConfig().model).toBe("gpt-4o");
  });

  test("rejects unknown providers", () => {
    process.env.MODEL_PROVIDER = "mystery";
    expect(() => loadAiConfig()).toThrow("Unsupported AI provider: mystery");
  });
});

describe("createAiClient", () => {
  const cfg: AiConfig = {
    provider: "openai",
    model: "gpt-4o-mini",
    embeddingModel: "text-embedding-3-small",
    apiKey: "test-openai-key",
    stage: "dev",
    production: false,
  };

  test("generates deterministically with SDK retries off", async () => {
    mockGenerateText.mockResolvedValue({ text: "scored" });
    const controller = new AbortController();
    const client = createAiClient(cfg);

    await expect(
      client.generateText({
        system: "sys",
        prompt: "ctx",
        signal: controller.signal,
      })
    ).resolves.toBe("scored");
    expect(mockGenerateText).toHaveBeenCalledWith({
      model: { provider: "openai", id: "gpt-4o-mini" },
      system: "sys",
      prompt: "ctx",
      temperature: 0,
      maxOutputTokens: undefined,
      maxRetries: 0,
      abortSignal: controller.signal,
    });
  });

  test("embeds single values and batches with SDK retries off", async () => {
    mockEmbed.mockResolvedValue({ embedding: [0.1, 0.2] });
    mockEmbedMany.mockResolvedValue({ embeddings: [[1], [2]] });
    const controller = new AbortController();
    const client = createAiClient(cfg);

    await expect(client.embed("query")).resolves.toEqual([0.1, 0.2]);
    await expect(
      client.embedMany(["a", "b"], controller.signal)
    ).resolves.toEqual([[1], [2]]);
    expect(mockEmbedMany).toHaveBeenCalledWith({
      model: { provider: "openai", id: "text-embedding-3-small" },
      values: ["a", "b"],
      maxRetries: 0,
      abortSignal: controller.signal,
    });
  });

  test("skips the provider for an empty batch", async () => {
    await expect(createAiClient(cfg).embedMany([])).resolves.toEqual([]);
    expect(mockEmbedMany).not.toHaveBeenCalled();
  });
});
