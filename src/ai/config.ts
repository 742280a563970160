import { getEnvVar, getStage, getString, isProduction } from "../util/env";

export type AiProvider = "openai" | "google";

export interface AiConfig {
  provider: AiProvider; // extend when adding more
  model: string;
  embeddingModel: string;
  apiKey: string | undefined;
  stage: string;
  production: boolean;
}

const DEFAULTS: Record<AiProvider, { model: string; embeddingModel: string }> =
  {
    openai: { model: "gpt-4o-mini", embeddingModel: "text-embedding-3-small" },
    google: { model: "gemini-2.5-flash", embeddingModel: "text-embedding-004" },
  };

const API_KEY_VARS: Record<AiProvider, string> = {
  openai: "OPENAI_API_KEY",
  google: "GOOGLE_GENERATIVE_AI_API_KEY",
};

function parseProvider(raw: string): AiProvider {
  if (raw === "openai" || raw === "google") return raw;
  throw new Error(`Unsupported AI provider: ${raw}`);
}

export function loadAiConfig(): AiConfig {
  const provider = getEnvVar<AiProvider>("MODEL_PROVIDER", {
    defaultValue: "openai",
    parse: parseProvider,
  });
  const defaults = DEFAULTS[provider];
  const model = getString("MODEL_NAME", defaults.model);
  const embeddingModel = getString("EMBEDDING_MODEL", defaults.embeddingModel);
  const apiKey = getEnvVar(API_KEY_VARS[provider]);
  const stage = getStage();
  const production = isProduction();
  return { provider, model, embeddingModel, apiKey, stage, production };
}
