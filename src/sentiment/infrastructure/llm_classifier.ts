import type { AiClient } from "../../ai/client";
import { ClassificationError } from "../domain/errors";
import type { ArticleSentiment, NewsArticle } from "../domain/types";
import {
  buildClassificationPrompt,
  buildClassificationSystemPrompt,
} from "../prompts/prompts";
import { ArticleSentimentZodSchema } from "../prompts/schema";
import type { SentimentClassifier } from "./contracts";

/**
 * Classifies one article through a structured-generation model.
 * The headline is the article's own title; the model supplies score,
 * category and reason.
 */
export class LlmSentimentClassifier implements SentimentClassifier {
  constructor(private readonly ai: AiClient) {}

  async classify(params: {
    ticker: string;
    article: NewsArticle;
    signal?: AbortSignal;
  }): Promise<ArticleSentiment> {
    const { ticker, article, signal } = params;
    try {
      const result = await this.ai.generateJson({
        system: buildClassificationSystemPrompt(),
        prompt: buildClassificationPrompt({ ticker, article }),
        schema: ArticleSentimentZodSchema,
        temperature: 0,
        maxOutputTokens: 1024,
        abortSignal: signal,
      });
      return {
        headline: article.title,
        score: result.sentiment_score,
        category: result.sentiment_category,
        reason: result.impact_reason.trim(),
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ClassificationError(
        `Sentiment analysis failed for "${article.title}": ${message}`,
        article.title,
        { cause: err }
      );
    }
  }
}
