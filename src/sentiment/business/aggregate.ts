/**
 * Sentiment aggregation: turns per-article judgments into one index.
 * Pure and synchronous; the only failure is EmptyInputError.
 */
import { EmptyInputError, ValidationError } from "../domain/errors";
import {
  ArticleSentiment,
  CategoryCounts,
  DroppedArticle,
  MAX_SCORE,
  MIN_SCORE,
  SENTIMENT_CATEGORIES,
  SentimentCategory,
  SentimentIndex,
  SentimentLabel,
} from "../domain/types";

/**
 * Label buckets, highest first. Each bucket includes its lower bound.
 */
const LABEL_THRESHOLDS: ReadonlyArray<{ min: number; label: SentimentLabel }> =
  [
    { min: 8, label: "Bullish" },
    { min: 6, label: "Neutral/Mixed (Uncertainty)" },
    { min: 4, label: "Neutral" },
    { min: 2, label: "Bearish/Mixed (Uncertainty)" },
    { min: 0, label: "Bearish" },
  ];

export interface AggregationResult {
  index: SentimentIndex;
  dropped: DroppedArticle[];
}

/**
 * Maps an average score on [0, 10] to its label.
 */
export function classifySentiment(averageScore: number): SentimentLabel {
  for (const { min, label } of LABEL_THRESHOLDS) {
    if (averageScore >= min) return label;
  }
  return "Bearish";
}

/**
 * Rounds half-up after dropping binary float noise, so 6.335 -> 6.34.
 */
export function roundTo(value: number, precision: number): number {
  const factor = Math.pow(10, precision);
  const scaled = Number((value * factor).toPrecision(15));
  return Math.round(scaled) / factor;
}

function isCategory(value: unknown): value is SentimentCategory {
  return SENTIMENT_CATEGORIES.some(c => c === value);
}

/**
 * Throws ValidationError when the record cannot take part in aggregation.
 */
export function validateArticleSentiment(record: ArticleSentiment): void {
  if (typeof record !== "object" || record === null) {
    throw new ValidationError("record is missing");
  }
  if (typeof record.headline !== "string" || record.headline.trim() === "") {
    throw new ValidationError("headline is empty");
  }
  if (typeof record.score !== "number" || !Number.isFinite(record.score)) {
    throw new ValidationError(`score is not a number: ${String(record.score)}`);
  }
  if (record.score < MIN_SCORE || record.score > MAX_SCORE) {
    throw new ValidationError(
      `score ${record.score} is outside [${MIN_SCORE}, ${MAX_SCORE}]`
    );
  }
  if (!isCategory(record.category)) {
    throw new ValidationError(
      `unknown category: ${String(record.category)}`
    );
  }
  if (typeof record.reason !== "string") {
    throw new ValidationError("reason is missing");
  }
}

function partition(articles: ReadonlyArray<ArticleSentiment>): {
  valid: ArticleSentiment[];
  dropped: DroppedArticle[];
} {
  const valid: ArticleSentiment[] = [];
  const dropped: DroppedArticle[] = [];
  articles.forEach((record, index) => {
    try {
      validateArticleSentiment(record);
      valid.push(record);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      dropped.push({ index, reason: err.message });
    }
  });
  return { valid, dropped };
}

/**
 * Same as `aggregate`, also reporting which records were dropped and why.
 */
export function aggregateWithDiagnostics(
  articles: ReadonlyArray<ArticleSentiment>
): AggregationResult {
  const { valid, dropped } = partition(articles);

  const [first, ...rest] = valid;
  if (!first) {
    throw new EmptyInputError(
      "NO_VALID_ARTICLES",
      articles.length === 0
        ? "No articles to aggregate"
        : `None of the ${articles.length} articles passed validation`
    );
  }

  let total = first.score;
  let mostPositive = first;
  let mostNegative = first;
  const categoryCounts: CategoryCounts = { POSITIVE: 0, NEUTRAL: 0, NEGATIVE: 0 };
  categoryCounts[first.category] += 1;

  // Strict comparisons keep the earliest record on ties
  for (const record of rest) {
    total += record.score;
    categoryCounts[record.category] += 1;
    if (record.score > mostPositive.score) mostPositive = record;
    if (record.score < mostNegative.score) mostNegative = record;
  }

  const averageScore = roundTo(total / valid.length, 2);

  const index: SentimentIndex = Object.freeze({
    averageScore,
    overallLabel: classifySentiment(averageScore),
    articleCount: valid.length,
    categoryCounts: Object.freeze(categoryCounts),
    mostPositive,
    mostNegative,
  });

  return { index, dropped };
}

/**
 * Aggregates classified articles into a sentiment index.
 * Invalid records are skipped; throws EmptyInputError when none are valid.
 */
export function aggregate(
  articles: ReadonlyArray<ArticleSentiment>
): SentimentIndex {
  return aggregateWithDiagnostics(articles).index;
}
