import { SentimentErrorCode, isSentimentError } from "../domain/errors";

export type FailureCode =
  | SentimentErrorCode
  | "INVALID_REQUEST"
  | "INTERNAL_ERROR";

export interface FailureOutcome {
  code: FailureCode;
  httpStatus: number;
  message: string;
}

const HTTP_STATUS: Record<FailureCode, number> = {
  INVALID_REQUEST: 400,
  INVALID_TICKER: 400,
  NO_ARTICLES_FOUND: 404,
  NO_VALID_ARTICLES: 422,
  ALL_CLASSIFICATIONS_FAILED: 422,
  CLASSIFICATION_FAILED: 422,
  INVALID_ARTICLE_SENTIMENT: 422,
  NEWS_PROVIDER_UNAVAILABLE: 502,
  INTERNAL_ERROR: 500,
};

/**
 * Maps any error thrown by a run to a stable code and HTTP status.
 * Unknown errors become INTERNAL_ERROR and keep their message hidden.
 */
export function describeFailure(err: unknown): FailureOutcome {
  if (isSentimentError(err)) {
    return {
      code: err.code,
      httpStatus: HTTP_STATUS[err.code],
      message: err.message,
    };
  }
  return {
    code: "INTERNAL_ERROR",
    httpStatus: HTTP_STATUS.INTERNAL_ERROR,
    message: "Internal error",
  };
}

export function httpStatusFor(code: FailureCode): number {
  return HTTP_STATUS[code];
}
