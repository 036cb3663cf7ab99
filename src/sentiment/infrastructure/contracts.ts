import type {
  ArticleSentiment,
  NewsArticle,
  SentimentOutlook,
} from "../domain/types";

/**
 * Recent news for a ticker, newest first. An empty list means nothing was
 * found; provider failures reject with RetrievalError.
 */
export interface NewsProvider {
  fetchArticles(params: {
    ticker: string;
    count: number;
  }): Promise<NewsArticle[]>;
}

/**
 * Narrows a batch of articles to the ones most relevant to the ticker.
 */
export interface RelevanceFilter {
  selectRelevant(params: {
    ticker: string;
    articles: NewsArticle[];
    count: number;
  }): Promise<NewsArticle[]>;
}

/**
 * Scores one article; rejects with ClassificationError for that article only.
 */
export interface SentimentClassifier {
  classify(params: {
    ticker: string;
    article: NewsArticle;
    signal?: AbortSignal;
  }): Promise<ArticleSentiment>;
}

/**
 * Writes a consolidated outlook from the classified articles.
 */
export interface OutlookSynthesizer {
  synthesize(params: {
    ticker: string;
    articles: ArticleSentiment[];
  }): Promise<SentimentOutlook>;
}

/**
 * Text embeddings, one vector per input value.
 */
export interface Embedder {
  embed(params: {
    values: string[];
    abortSignal?: AbortSignal;
  }): Promise<number[][]>;
}
