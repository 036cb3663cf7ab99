import { z } from "zod";
import { getNumber, getStage, getString, isProduction } from "../util/env";

const providerSchema = z.enum(["google", "openai"]);

export type AiProvider = z.infer<typeof providerSchema>;

export interface AiConfig {
  provider: AiProvider; // extend when adding more
  model: string;
  embeddingModel: string;
  apiKey: string | undefined;
  maxRetries: number;
  stage: string;
  production: boolean;
}

const DEFAULT_MODELS: Record<AiProvider, { model: string; embedding: string }> =
  {
    google: { model: "gemini-2.5-flash", embedding: "text-embedding-004" },
    openai: { model: "gpt-4o-mini", embedding: "text-embedding-3-small" },
  };

export function loadAiConfig(): AiConfig {
  const rawProvider = getString("MODEL_PROVIDER", "google");
  const parsed = providerSchema.safeParse(rawProvider.toLowerCase());
  if (!parsed.success) {
    throw new Error(`Unsupported AI provider: ${rawProvider}`);
  }
  const provider = parsed.data;
  const defaults = DEFAULT_MODELS[provider];

  const model = getString("MODEL_NAME", defaults.model);
  const embeddingModel = getString("EMBEDDING_MODEL_NAME", defaults.embedding);
  const apiKey =
    provider === "google"
      ? getString("GEMINI_API_KEY") ?? getString("GOOGLE_GENERATIVE_AI_API_KEY")
      : getString("OPENAI_API_KEY");
  const maxRetries = getNumber("MODEL_MAX_RETRIES", 2);
  const stage = getStage();
  const production = isProduction();
  return {
    provider,
    model,
    embeddingModel,
    apiKey,
    maxRetries,
    stage,
    production,
  };
}
