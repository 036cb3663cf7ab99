import { AiClient, createAiClient } from "../../ai/client";
import { SentimentConfig, loadSentimentConfig } from "../config";
import { CachedNewsProvider } from "../infrastructure/cached_news_provider";
import { EmbeddingRelevanceFilter } from "../infrastructure/embedding_relevance_filter";
import { LlmSentimentClassifier } from "../infrastructure/llm_classifier";
import { LlmOutlookSynthesizer } from "../infrastructure/llm_synthesizer";
import { NewsApiProvider } from "../infrastructure/newsapi_news_provider";
import { RetryingNewsProvider } from "../infrastructure/retrying_news_provider";
import { SentimentPipeline } from "./analyze_ticker";

/**
 * Wires the production collaborators:
 * NewsAPI behind retry and a file cache, embedding relevance filter,
 * LLM classifier and (optionally) LLM outlook synthesizer.
 */
export function createSentimentPipeline(
  config: SentimentConfig = loadSentimentConfig(),
  ai: AiClient = createAiClient()
): SentimentPipeline {
  const newsProvider = new CachedNewsProvider(
    new RetryingNewsProvider(new NewsApiProvider({ apiKey: config.newsApiKey }), {
      attempts: config.fetchRetries,
      waitMs: config.fetchRetryWaitMs,
    }),
    { cacheDir: config.cacheDir, ttlSeconds: config.cacheTtlSeconds }
  );

  return new SentimentPipeline({
    newsProvider,
    relevanceFilter: new EmbeddingRelevanceFilter(ai),
    classifier: new LlmSentimentClassifier(ai),
    synthesizer: config.synthesizeOutlook
      ? new LlmOutlookSynthesizer(ai)
      : undefined,
    classificationTimeoutMs: config.classificationTimeoutMs,
  });
}
