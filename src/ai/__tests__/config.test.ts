import { loadAiConfig } from "@src/ai/config";

describe("loadAiConfig", () => {
  const originalEnv = process.env;
  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.MODEL_PROVIDER;
    delete process.env.MODEL_NAME;
    delete process.env.EMBEDDING_MODEL_NAME;
    delete process.env.GEMINI_API_KEY;
    delete process.env.GOOGLE_GENERATIVE_AI_API_KEY;
    delete process.env.OPENAI_API_KEY;
    delete process.env.MODEL_MAX_RETRIES;
  });
  afterAll(() => {
    process.env = originalEnv;
  });

  test("defaults to google gemini models", () => {
    process.env.GEMINI_API_KEY = "test-key";
    const cfg = loadAiConfig();
    expect(cfg.provider).toBe("google");
    expect(cfg.model).toBe("gemini-2.5-flash");
    expect(cfg.embeddingModel).toBe("text-embedding-004");
    expect(cfg.apiKey).toBe("test-key");
    expect(cfg.maxRetries).toBe(2);
  });

  test("openai provider uses its own defaults and key", () => {
    process.env.MODEL_PROVIDER = "OpenAI";
    process.env.OPENAI_API_KEY = "test-openai";
    const cfg = loadAiConfig();
    expect(cfg.provider).toBe("openai");
    expect(cfg.model).toBe("gpt-4o-mini");
    expect(cfg.embeddingModel).toBe("text-embedding-3-small");
    expect(cfg.apiKey).toBe("test-openai");
  });

  test("explicit model names win over defaults", () => {
    process.env.MODEL_NAME = "gemini-2.0-flash";
    process.env.EMBEDDING_MODEL_NAME = "gemini-embedding-001";
    const cfg = loadAiConfig();
    expect(cfg.model).toBe("gemini-2.0-flash");
    expect(cfg.embeddingModel).toBe("gemini-embedding-001");
  });

  test("rejects unknown providers", () => {
    process.env.MODEL_PROVIDER = "acme";
    expect(() => loadAiConfig()).toThrow("Unsupported AI provider: acme");
  });
});
