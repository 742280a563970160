import { APICallError } from "ai";
import { createAiClient, type AiClient } from "../../ai/client";
import { AnalysisError, ServiceError, describeError } from "../domain/errors";
import type { GenerateOptions, TextGenerator } from "./contracts";

function toServiceError(err: unknown): AnalysisError {
  if (err instanceof AnalysisError) return err;
  if (APICallError.isInstance(err)) {
    const status = err.statusCode !== undefined ? ` (${err.statusCode})` : "";
    return new ServiceError(`Generation request failed${status}: ${err.message}`, {
      cause: err,
    });
  }
  return new ServiceError(`Generation failed: ${describeError(err)}`, {
    cause: err,
  });
}

/**
 * TextGenerator backed by the AI SDK client. Instruction goes in the system
 * slot, the retrieved context in the prompt.
 */
export function createLlmTextGenerator(
  client: AiClient = createAiClient()
): TextGenerator {
  return {
    model: client.model,
    async generate(
      instruction: string,
      input: string,
      options: GenerateOptions = {}
    ): Promise<string> {
      try {
        return await client.generateText({
          system: instruction,
          prompt: input,
          temperature: 0,
          signal: options.signal,
        });
      } catch (err) {
        throw toServiceError(err);
      }
    },
  };
}
