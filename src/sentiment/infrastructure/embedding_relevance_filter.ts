import { cosineSimilarity } from "ai";
import type { NewsArticle } from "../domain/types";
import { buildRelevanceQuery } from "../prompts/prompts";
import { getLogger } from "../../util/logger";
import type { Embedder, RelevanceFilter } from "./contracts";

function articleText(article: NewsArticle): string {
  return `${article.title}\n${article.content}`;
}

/**
 * Ranks articles by cosine similarity to a ticker-specific query and keeps
 * the best `count`, in their original order. Falls back to the first
 * `count` articles when embedding fails.
 */
export class EmbeddingRelevanceFilter implements RelevanceFilter {
  private readonly logger = getLogger("sentiment/relevance");

  constructor(private readonly embedder: Embedder) {}

  async selectRelevant(params: {
    ticker: string;
    articles: NewsArticle[];
    count: number;
  }): Promise<NewsArticle[]> {
    const { ticker, articles } = params;
    const count = Math.max(0, params.count);
    if (articles.length <= count) return [...articles];

    try {
      const [query, ...documents] = await this.embedder.embed({
        values: [buildRelevanceQuery(ticker), ...articles.map(articleText)],
      });
      if (!query || documents.length !== articles.length) {
        throw new Error(
          `expected ${articles.length + 1} embeddings, got ${documents.length + (query ? 1 : 0)}`
        );
      }

      const ranked = documents
        .map((vector, index) => ({
          index,
          similarity: cosineSimilarity(query, vector),
        }))
        // Stable sort keeps retrieval order among equal similarities
        .sort((a, b) => b.similarity - a.similarity)
        .slice(0, count);

      const keep = new Set(ranked.map(r => r.index));
      this.logger.debug(
        { ticker, considered: articles.length, kept: keep.size },
        "relevance ranking done"
      );
      return articles.filter((_, index) => keep.has(index));
    } catch (err) {
      this.logger.warn(
        { ticker, err },
        "relevance ranking failed; using most recent articles"
      );
      return articles.slice(0, count);
    }
  }
}
