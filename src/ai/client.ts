import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAI } from "@ai-sdk/openai";
import {
  embed,
  embedMany,
  generateText,
  type EmbeddingModel,
  type LanguageModel,
} from "ai";
import { loadAiConfig, type AiConfig } from "./config";

export interface GenerateTextParams {
  system: string;
  prompt: string;
  temperature?: number;
  maxOutputTokens?: number;
  signal?: AbortSignal;
}

export interface AiClient {
  readonly model: string;
  generateText(params: GenerateTextParams): Promise<string>;
  embed(value: string, signal?: AbortSignal): Promise<number[]>;
  embedMany(values: string[], signal?: AbortSignal): Promise<number[][]>;
}

interface ProviderModels {
  language: LanguageModel;
  embedding: EmbeddingModel<string>;
}

function resolveModels(cfg: AiConfig): ProviderModels {
  if (cfg.provider === "openai") {
    const provider = createOpenAI({ apiKey: cfg.apiKey });
    return {
      language: provider(cfg.model),
      embedding: provider.textEmbeddingModel(cfg.embeddingModel),
    };
  }
  if (cfg.provider === "google") {
    const provider = createGoogleGenerativeAI({ apiKey: cfg.apiKey });
    return {
      language: provider(cfg.model),
      embedding: provider.textEmbeddingModel(cfg.embeddingModel),
    };
  }
  throw new Error(`Unsupported AI provider: ${String(cfg.provider)}`);
}

/**
 * Thin wrapper over the AI SDK. SDK retries are disabled on every call;
 * callers own the retry and timeout policy through the abort signal.
 */
export function createAiClient(cfg: AiConfig = loadAiConfig()): AiClient {
  const models = resolveModels(cfg);

  return {
    model: cfg.model,
    async generateText({
      system,
      prompt,
      temperature = 0,
      maxOutputTokens,
      signal,
    }: GenerateTextParams): Promise<string> {
      const { text } = await generateText({
        model: models.language,
        system,
        prompt,
        temperature,
        maxOutputTokens,
        maxRetries: 0,
        abortSignal: signal,
      });
      return text;
    },
    async embed(value: string, signal?: AbortSignal): Promise<number[]> {
      const { embedding } = await embed({
        model: models.embedding,
        value,
        maxRetries: 0,
        abortSignal: signal,
      });
      return embedding;
    },
    async embedMany(
      values: string[],
      signal?: AbortSignal
    ): Promise<number[][]> {
      if (values.length === 0) return [];
      const { embeddings } = await embedMany({
        model: models.embedding,
        values,
        maxRetries: 0,
        abortSignal: signal,
      });
      return embeddings;
    },
  };
}
