import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAI } from "@ai-sdk/openai";
import { embedMany, generateObject } from "ai";
import type { EmbeddingModel, LanguageModel } from "ai";
import { z } from "zod";
import { AiConfig, loadAiConfig } from "./config";

export interface GenerateJsonParams<TSchema extends z.ZodTypeAny> {
  system: string;
  prompt: string;
  schema: TSchema;
  temperature?: number;
  maxOutputTokens?: number;
  abortSignal?: AbortSignal;
}

export interface EmbedParams {
  values: string[];
  abortSignal?: AbortSignal;
}

export interface AiClient {
  generateJson<TSchema extends z.ZodTypeAny>(
    params: GenerateJsonParams<TSchema>
  ): Promise<z.infer<TSchema>>;
  embed(params: EmbedParams): Promise<number[][]>;
}

interface ResolvedModels {
  language: LanguageModel;
  embedding: EmbeddingModel<string>;
}

function resolveModels(cfg: AiConfig): ResolvedModels {
  if (cfg.provider === "google") {
    const provider = createGoogleGenerativeAI({ apiKey: cfg.apiKey });
    return {
      language: provider(cfg.model),
      embedding: provider.textEmbeddingModel(cfg.embeddingModel),
    };
  }

  if (cfg.provider === "openai") {
    const provider = createOpenAI({ apiKey: cfg.apiKey });
    return {
      language: provider(cfg.model),
      embedding: provider.textEmbeddingModel(cfg.embeddingModel),
    };
  }

  throw new Error(`Unsupported AI provider: ${String(cfg.provider)}`);
}

export function createAiClient(cfg: AiConfig = loadAiConfig()): AiClient {
  const models = resolveModels(cfg);

  return {
    async generateJson<TSchema extends z.ZodTypeAny>({
      system,
      prompt,
      schema,
      temperature = 0,
      maxOutputTokens,
      abortSignal,
    }: GenerateJsonParams<TSchema>): Promise<z.infer<TSchema>> {
      // The SDK's schema inference recurses too deep on a generic schema
      const sdkSchema: z.ZodTypeAny = schema;
      const { object } = await generateObject({
        model: models.language,
        output: "object",
        system,
        prompt,
        schema: sdkSchema,
        temperature,
        maxOutputTokens,
        maxRetries: cfg.maxRetries,
        abortSignal,
      });
      // Re-validate so callers get the schema's output type, defaults applied
      return schema.parse(object);
    },

    async embed({ values, abortSignal }: EmbedParams): Promise<number[][]> {
      if (values.length === 0) return [];
      const { embeddings } = await embedMany({
        model: models.embedding,
        values,
        maxRetries: cfg.maxRetries,
        abortSignal,
      });
      return embeddings;
    },
  };
}
