import { withTrace } from "../../ai/telemetry";
import { getLogger } from "../../util/logger";
import { settle } from "../../util/result";
import { aggregateWithDiagnostics } from "../business/aggregate";
import { normalizeTicker } from "../business/ticker";
import { ClassificationError, EmptyInputError } from "../domain/errors";
import type {
  ArticleSentiment,
  DroppedArticle,
  NewsArticle,
  SentimentIndex,
  SentimentOutlook,
} from "../domain/types";
import type {
  NewsProvider,
  OutlookSynthesizer,
  RelevanceFilter,
  SentimentClassifier,
} from "../infrastructure/contracts";
import { RunStage, RunStats, RunStatsCollector } from "./run_stats";

export interface SentimentPipelineDeps {
  newsProvider: NewsProvider;
  classifier: SentimentClassifier;
  relevanceFilter?: RelevanceFilter;
  synthesizer?: OutlookSynthesizer;
  classificationTimeoutMs?: number;
  now?: () => number;
}

export interface AnalyzeTickerInput {
  ticker: string;
  fetchCount: number;
  inferenceCount: number;
}

export interface SentimentAnalysis {
  ticker: string;
  index: SentimentIndex;
  dropped: DroppedArticle[];
  classificationErrors: string[];
  outlook?: SentimentOutlook;
  stats: RunStats;
}

const DEFAULT_CLASSIFICATION_TIMEOUT_MS = 30_000;

/**
 * News → relevance filter → per-article classification → aggregation →
 * optional outlook. Holds no state between runs, so one instance can serve
 * concurrent callers.
 */
export class SentimentPipeline {
  private readonly logger = getLogger("sentiment/pipeline");

  constructor(private readonly deps: SentimentPipelineDeps) {}

  async run(input: AnalyzeTickerInput): Promise<SentimentAnalysis> {
    const ticker = normalizeTicker(input.ticker);
    return withTrace("ticker-sentiment", () => this.execute(ticker, input), {
      input: {
        ticker,
        fetchCount: input.fetchCount,
        inferenceCount: input.inferenceCount,
      },
    });
  }

  private async execute(
    ticker: string,
    input: AnalyzeTickerInput
  ): Promise<SentimentAnalysis> {
    const stats = new RunStatsCollector(
      {
        ticker,
        fetchCount: input.fetchCount,
        inferenceCount: input.inferenceCount,
      },
      this.deps.now
    );
    const logger = this.logger.child({ runId: stats.runId, ticker });
    let stage: RunStage = "fetch";

    try {
      logger.info("sentiment run started");

      const articles = await stats.time("fetchDurationMs", () =>
        this.deps.newsProvider.fetchArticles({
          ticker,
          count: input.fetchCount,
        })
      );
      stats.update({ articlesReturned: articles.length });
      if (articles.length === 0) logger.warn("no articles found");

      stage = "filter";
      const relevant = await this.selectRelevant(
        ticker,
        articles,
        input.inferenceCount
      );
      stats.update({ relevantArticles: relevant.length });

      stage = "classify";
      const { classified, errors } = await stats.time(
        "classificationDurationMs",
        () => this.classifyAll(ticker, relevant)
      );
      stats.update({
        classificationSuccessCount: classified.length,
        classificationErrorCount: errors.length,
      });
      for (const message of errors) {
        logger.warn({ error: message }, "article classification failed");
      }

      stage = "aggregate";
      const { index, dropped } = this.aggregate(
        ticker,
        articles.length,
        classified
      );
      stats.update({
        droppedInvalidCount: dropped.length,
        sentimentScoreMin: index.mostNegative.score,
        sentimentScoreMax: index.mostPositive.score,
      });
      if (dropped.length > 0) {
        logger.warn({ dropped }, "invalid classifications dropped");
      }

      stage = "synthesize";
      const outlook = await stats.time("synthesisDurationMs", () =>
        this.synthesize(ticker, classified, dropped)
      );

      const finalStats = stats.complete();
      logger.info({ stats: finalStats }, "sentiment run completed");

      return {
        ticker,
        index,
        dropped,
        classificationErrors: errors,
        outlook,
        stats: finalStats,
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      const finalStats = stats.fail(stage, message);
      logger.error({ stats: finalStats, err }, "sentiment run failed");
      throw err;
    }
  }

  private async selectRelevant(
    ticker: string,
    articles: NewsArticle[],
    count: number
  ): Promise<NewsArticle[]> {
    if (articles.length === 0) return [];
    if (!this.deps.relevanceFilter) return articles.slice(0, count);
    return this.deps.relevanceFilter.selectRelevant({ ticker, articles, count });
  }

  /**
   * Classifies every article concurrently; results keep input order.
   */
  private async classifyAll(
    ticker: string,
    articles: NewsArticle[]
  ): Promise<{ classified: ArticleSentiment[]; errors: string[] }> {
    const outcomes = await Promise.all(
      articles.map(article => settle(this.classifyWithTimeout(ticker, article)))
    );
    const classified: ArticleSentiment[] = [];
    const errors: string[] = [];
    for (const outcome of outcomes) {
      if (outcome.ok) {
        classified.push(outcome.data);
      } else {
        const { error } = outcome;
        errors.push(error instanceof Error ? error.message : String(error));
      }
    }
    return { classified, errors };
  }

  private async classifyWithTimeout(
    ticker: string,
    article: NewsArticle
  ): Promise<ArticleSentiment> {
    const timeoutMs =
      this.deps.classificationTimeoutMs ?? DEFAULT_CLASSIFICATION_TIMEOUT_MS;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Reject first: a classifier honoring the signal rejects inside abort()
        reject(
          new ClassificationError(
            `Sentiment analysis timed out after ${timeoutMs}ms for "${article.title}"`,
            article.title
          )
        );
        controller.abort();
      }, timeoutMs);
    });
    try {
      return await Promise.race([
        this.deps.classifier.classify({
          ticker,
          article,
          signal: controller.signal,
        }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Runs the core and re-labels an empty result with what happened upstream.
   */
  private aggregate(
    ticker: string,
    fetchedCount: number,
    classified: ArticleSentiment[]
  ): { index: SentimentIndex; dropped: DroppedArticle[] } {
    try {
      return aggregateWithDiagnostics(classified);
    } catch (err) {
      if (!(err instanceof EmptyInputError)) throw err;
      if (fetchedCount === 0) {
        throw new EmptyInputError(
          "NO_ARTICLES_FOUND",
          `No articles found for ${ticker}`,
          { cause: err }
        );
      }
      throw new EmptyInputError(
        "ALL_CLASSIFICATIONS_FAILED",
        classified.length === 0
          ? "All article classifications failed"
          : `All ${classified.length} classified articles were invalid`,
        { cause: err }
      );
    }
  }

  private async synthesize(
    ticker: string,
    classified: ArticleSentiment[],
    dropped: DroppedArticle[]
  ): Promise<SentimentOutlook | undefined> {
    if (!this.deps.synthesizer) return undefined;
    const droppedIndexes = new Set(dropped.map(d => d.index));
    const valid = classified.filter((_, i) => !droppedIndexes.has(i));
    try {
      return await this.deps.synthesizer.synthesize({ ticker, articles: valid });
    } catch (err) {
      this.logger.warn(
        { ticker, err },
        "outlook synthesis failed; continuing without it"
      );
      return undefined;
    }
  }
}
