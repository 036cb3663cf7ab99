export type SentimentErrorCode =
  | "INVALID_TICKER"
  | "NEWS_PROVIDER_UNAVAILABLE"
  | "CLASSIFICATION_FAILED"
  | "INVALID_ARTICLE_SENTIMENT"
  | EmptyInputReason;

export type EmptyInputReason =
  | "NO_VALID_ARTICLES"
  | "NO_ARTICLES_FOUND"
  | "ALL_CLASSIFICATIONS_FAILED";

/**
 * Base class for every failure the sentiment pipeline reports.
 * `code` is stable and machine readable.
 */
export abstract class SentimentError extends Error {
  abstract readonly code: SentimentErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidTickerError extends SentimentError {
  readonly code = "INVALID_TICKER";

  constructor(readonly ticker: string) {
    super(`Invalid ticker symbol: "${ticker}"`);
  }
}

/** News provider unreachable or answered with an error. */
export class RetrievalError extends SentimentError {
  readonly code = "NEWS_PROVIDER_UNAVAILABLE";
}

/** One article could not be classified. Never aborts a run on its own. */
export class ClassificationError extends SentimentError {
  readonly code = "CLASSIFICATION_FAILED";

  constructor(
    message: string,
    readonly headline: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** A classified record that breaks the ArticleSentiment invariants. */
export class ValidationError extends SentimentError {
  readonly code = "INVALID_ARTICLE_SENTIMENT";
}

/**
 * No valid classified article reached aggregation.
 * The pipeline refines `reason` with what happened upstream.
 */
export class EmptyInputError extends SentimentError {
  readonly code: EmptyInputReason;

  constructor(
    reason: EmptyInputReason = "NO_VALID_ARTICLES",
    message = "No valid articles to aggregate",
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.code = reason;
  }
}

export function isSentimentError(err: unknown): err is SentimentError {
  return err instanceof SentimentError;
}
