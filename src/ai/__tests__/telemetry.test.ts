import { shutdownTelemetry, withTrace } from "../telemetry";

const mockUpdate = jest.fn();
const mockTrace = jest.fn(() => ({ update: mockUpdate }));
const mockShutdown = jest.fn(async () => undefined);

jest.mock("langfuse", () => ({
  Langfuse: jest.fn(() => ({
    trace: mockTrace,
    shutdownAsync: mockShutdown,
  })),
}));

const originalEnv = process.env;

beforeEach(() => {
  process.env = { ...originalEnv };
  delete process.env.STAGE;
  delete process.env.LANGFUSE_PUBLIC_KEY;
  delete process.env.LANGFUSE_SECRET_KEY;
  mockUpdate.mockClear();
  mockTrace.mockClear();
  mockShutdown.mockClear();
});

afterEach(async () => {
  await shutdownTelemetry();
  process.env = originalEnv;
});

describe("withTrace", () => {
  test("runs the work untraced when keys are absent", async () => {
    await expect(withTrace("financial-track", {}, async () => 42)).resolves.toBe(
      42
    );
    expect(mockTrace).not.toHaveBeenCalled();
  });

  test("records success and failure on the trace", async () => {
    process.env.LANGFUSE_PUBLIC_KEY = "pk-test";
    process.env.LANGFUSE_SECRET_KEY = "sk-test";

    await withTrace("financial-track", { runId: "r1" }, async () => "ok");
    expect(mockTrace).toHaveBeenCalledWith({
      name: "financial-track",
      metadata: { runId: "r1" },
    });
    expect(mockUpdate).toHaveBeenLastCalledWith({ output: "success" });

    await expect(
      withTrace("sustainability-track", {}, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(mockUpdate).toHaveBeenLastCalledWith({ output: "error: boom" });
  });

  test("shutdown flushes the client once", async () => {
    process.env.LANGFUSE_PUBLIC_KEY = "pk-test";
    process.env.LANGFUSE_SECRET_KEY = "sk-test";
    await withTrace("t", {}, async () => undefined);
    await shutdownTelemetry();
    await shutdownTelemetry();
    expect(mockShutdown).toHaveBeenCalledTimes(1);
  });
});
