import { APICallError } from "ai";
import type { AiClient, GenerateTextParams } from "../../../ai/client";
import { ServiceError, TimeoutError } from "../../domain/errors";
import { createLlmTextGenerator } from "../llm_text_generator";

function fakeClient(
  impl: (params: GenerateTextParams) => Promise<string>
): AiClient & { calls: GenerateTextParams[] } {
  const calls: GenerateTextParams[] = [];
  return {
    model: "test-model",
    calls,
    async generateText(params) {
      calls.push(params);
      return impl(params);
    },
    async embed() {
      return [];
    },
    async embedMany() {
      return [];
    },
  };
}

describe("createLlmTextGenerator", () => {
  test("puts the instruction in the system slot at temperature 0", async () => {
    const client = fakeClient(async () => "{}");
    const generator = createLlmTextGenerator(client);
    const controller = new AbortController();

    await expect(
      generator.generate("instruction", "CONTEXT:\nabc", {
        signal: controller.signal,
      })
    ).resolves.toBe("{}");
    expect(generator.model).toBe("test-model");
    expect(client.calls).toEqual([
      {
        system: "instruction",
        prompt: "CONTEXT:\nabc",
        temperature: 0,
        signal: controller.signal,
      },
    ]);
  });

  test("provider errors become ServiceError with the status code", async () => {
    const apiError = new APICallError({
      message: "Too Many Requests",
      url: "https://api.example.test/v1/chat",
      requestBodyValues: {},
      statusCode: 429,
    });
    const generator = createLlmTextGenerator(
      fakeClient(async () => {
        throw apiError;
      })
    );

    let caught: unknown;
    try {
      await generator.generate("i", "p");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ServiceError);
    if (caught instanceof ServiceError) {
      expect(caught.message).toBe(
        "Generation request failed (429): Too Many Requests"
      );
      expect(caught.cause).toBe(apiError);
    }
  });

  test("other failures are wrapped, analysis errors pass through", async () => {
    await expect(
      createLlmTextGenerator(
        fakeClient(async () => {
          throw new Error("fetch failed");
        })
      ).generate("i", "p")
    ).rejects.toThrow("Generation failed: fetch failed");

    const timeout = new TimeoutError("too slow", 10);
    await expect(
      createLlmTextGenerator(
        fakeClient(async () => {
          throw timeout;
        })
      ).generate("i", "p")
    ).rejects.toBe(timeout);
  });
});
