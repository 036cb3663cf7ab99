import { z } from "zod";
import { getBoolean, getNumber, getString, requireString } from "../util/env";

const sentimentConfigSchema = z.object({
  newsApiKey: z.string().min(1),
  articlesToFetch: z.number().int().positive(),
  articlesToInference: z.number().int().positive(),
  cacheTtlSeconds: z.number().int().positive(),
  cacheDir: z.string().min(1),
  fetchRetries: z.number().int().positive(),
  fetchRetryWaitMs: z.number().int().min(0),
  classificationTimeoutMs: z.number().int().positive(),
  synthesizeOutlook: z.boolean(),
});

export type SentimentConfig = z.infer<typeof sentimentConfigSchema>;

/**
 * Reads pipeline settings from the environment and validates them.
 */
export function loadSentimentConfig(): SentimentConfig {
  const parsed = sentimentConfigSchema.safeParse({
    newsApiKey: requireString("NEWS_API_KEY"),
    articlesToFetch: getNumber("ARTICLES_TO_FETCH", 50),
    articlesToInference: getNumber("ARTICLES_TO_INFERENCE", 5),
    cacheTtlSeconds: getNumber("CACHE_TTL_SECONDS", 3600),
    cacheDir: getString("NEWS_CACHE_DIR", "data/cache"),
    fetchRetries: getNumber("NEWS_FETCH_RETRIES", 3),
    fetchRetryWaitMs: getNumber("NEWS_FETCH_RETRY_WAIT_MS", 2000),
    classificationTimeoutMs: getNumber("CLASSIFICATION_TIMEOUT_MS", 30_000),
    synthesizeOutlook: getBoolean("SYNTHESIZE_OUTLOOK", true),
  });
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid sentiment configuration: ${issues}`);
  }
  return parsed.data;
}
