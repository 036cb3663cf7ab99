import { Langfuse } from "langfuse";
import { flushTelemetry, getLangfuse, withTrace } from "@src/ai/telemetry";

jest.mock("langfuse", () => ({ Langfuse: jest.fn() }));

describe("telemetry without Langfuse keys", () => {
  const originalEnv = process.env;
  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.LANGFUSE_PUBLIC_KEY;
    delete process.env.LANGFUSE_SECRET_KEY;
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  test("getLangfuse returns null", () => {
    expect(getLangfuse()).toBeNull();
    expect(Langfuse).not.toHaveBeenCalled();
  });

  test("withTrace passes results through", async () => {
    await expect(withTrace("unit", async () => 42)).resolves.toBe(42);
  });

  test("withTrace rethrows errors unchanged", async () => {
    const boom = new Error("boom");
    await expect(
      withTrace("unit", async () => {
        throw boom;
      })
    ).rejects.toBe(boom);
  });

  test("flushTelemetry is a no-op", async () => {
    await expect(flushTelemetry()).resolves.toBeUndefined();
  });
});
