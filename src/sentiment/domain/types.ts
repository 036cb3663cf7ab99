/**
 * Domain types for the ticker sentiment index.
 */
export const SENTIMENT_CATEGORIES = ["POSITIVE", "NEUTRAL", "NEGATIVE"] as const;

export type SentimentCategory = (typeof SENTIMENT_CATEGORIES)[number];

export const MIN_SCORE = 0;
export const MAX_SCORE = 10;

/**
 * One classified article. Score is on [0, 10], 10 being most bullish.
 * The category comes from the classifier and is not derived from the score.
 */
export interface ArticleSentiment {
  headline: string;
  score: number;
  category: SentimentCategory;
  reason: string;
}

export type SentimentLabel =
  | "Bullish"
  | "Neutral/Mixed (Uncertainty)"
  | "Neutral"
  | "Bearish/Mixed (Uncertainty)"
  | "Bearish";

export type CategoryCounts = Record<SentimentCategory, number>;

export interface SentimentIndex {
  readonly averageScore: number;
  readonly overallLabel: SentimentLabel;
  readonly articleCount: number;
  readonly categoryCounts: Readonly<CategoryCounts>;
  readonly mostPositive: ArticleSentiment;
  readonly mostNegative: ArticleSentiment;
}

/**
 * A record excluded from aggregation, with its position in the input.
 */
export interface DroppedArticle {
  index: number;
  reason: string;
}

export interface NewsArticle {
  title: string;
  content: string;
  author?: string;
  source?: string;
  url?: string;
  publishedAt?: string; // ISO8601
}

export interface SentimentOutlook {
  summary: string;
  finalSentiment: "Bullish" | "Neutral" | "Bearish";
  recommendation: "BUY" | "HOLD" | "SELL";
  majorRisks: string[];
}
