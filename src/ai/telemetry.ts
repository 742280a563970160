import { Langfuse } from "langfuse";
import { getEnvVar } from "../util/env";

let singleton: Langfuse | null = null;

export function getLangfuse(): Langfuse | null {
  if (singleton) return singleton;
  const publicKey = getEnvVar("LANGFUSE_PUBLIC_KEY");
  const secretKey = getEnvVar("LANGFUSE_SECRET_KEY");
  const baseUrl = getEnvVar("LANGFUSE_HOST");
  if (!publicKey || !secretKey) return null;
  singleton = new Langfuse({ publicKey, secretKey, baseUrl });
  return singleton;
}

/**
 * Wraps an async unit of work in a Langfuse trace when tracing is configured.
 */
export async function withTrace<T>(
  name: string,
  metadata: Record<string, unknown>,
  fn: () => Promise<T>
): Promise<T> {
  const lf = getLangfuse();
  if (!lf) return fn();
  const trace = lf.trace({ name, metadata });
  try {
    const result = await fn();
    trace.update({ output: "success" });
    return result;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    trace.update({ output: `error: ${message}` });
    throw err;
  }
}

export async function shutdownTelemetry(): Promise<void> {
  if (!singleton) return;
  await singleton.shutdownAsync();
  singleton = null;
}
