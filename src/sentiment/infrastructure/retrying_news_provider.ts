import type { NewsArticle } from "../domain/types";
import { getLogger } from "../../util/logger";
import type { NewsProvider } from "./contracts";

export interface RetryOptions {
  attempts: number;
  waitMs: number;
}

const sleep = (ms: number) =>
  new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Retries a provider a fixed number of times with a fixed wait.
 * The last error propagates once attempts are exhausted.
 */
export class RetryingNewsProvider implements NewsProvider {
  private readonly logger = getLogger("sentiment/news-retry");

  constructor(
    private readonly inner: NewsProvider,
    private readonly options: RetryOptions = { attempts: 3, waitMs: 2000 }
  ) {}

  async fetchArticles(params: {
    ticker: string;
    count: number;
  }): Promise<NewsArticle[]> {
    const attempts = Math.max(1, this.options.attempts);
    let lastError: unknown;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await this.inner.fetchArticles(params);
      } catch (err) {
        lastError = err;
        this.logger.warn(
          { ticker: params.ticker, attempt, attempts, err },
          "news fetch failed"
        );
        if (attempt < attempts) await sleep(this.options.waitMs);
      }
    }
    throw lastError;
  }
}
