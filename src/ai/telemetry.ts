import { Langfuse } from "langfuse";
import { getString } from "../util/env";
import { getLogger } from "../util/logger";

let singleton: Langfuse | null = null;

export function getLangfuse(): Langfuse | null {
  if (singleton) return singleton;
  const publicKey = getString("LANGFUSE_PUBLIC_KEY");
  const secretKey = getString("LANGFUSE_SECRET_KEY");
  const baseUrl = getString("LANGFUSE_HOST");
  if (!publicKey || !secretKey) return null;
  singleton = new Langfuse({ publicKey, secretKey, baseUrl });
  return singleton;
}

export interface TraceOptions {
  input?: unknown;
  metadata?: Record<string, unknown>;
}

/**
 * Runs `fn` inside a Langfuse trace when Langfuse is configured,
 * otherwise calls it directly.
 */
export async function withTrace<T>(
  name: string,
  fn: () => Promise<T>,
  options: TraceOptions = {}
): Promise<T> {
  const lf = getLangfuse();
  if (!lf) return fn();
  const trace = lf.trace({
    name,
    input: options.input,
    metadata: options.metadata,
  });
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

/**
 * Flush pending events; call before a short-lived process (Lambda) returns.
 */
export async function flushTelemetry(): Promise<void> {
  const lf = getLangfuse();
  if (!lf) return;
  try {
    await lf.flushAsync();
  } catch (err) {
    getLogger("ai/telemetry").warn({ err }, "Langfuse flush failed");
  }
}
