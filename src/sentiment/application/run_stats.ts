import crypto from "crypto";

export type RunStage =
  | "fetch"
  | "filter"
  | "classify"
  | "aggregate"
  | "synthesize";

export interface RunStats {
  runId: string;
  ticker: string;
  startedAt: string;
  articlesRequested: number;
  articlesToInference: number;
  articlesReturned: number;
  relevantArticles: number;
  classificationSuccessCount: number;
  classificationErrorCount: number;
  droppedInvalidCount: number;
  sentimentScoreMin?: number;
  sentimentScoreMax?: number;
  fetchDurationMs: number;
  classificationDurationMs: number;
  synthesisDurationMs: number;
  totalRuntimeMs: number;
  status: "IN_PROGRESS" | "OK" | "FAILED";
  errorStage?: RunStage;
  errorMessage?: string;
}

/**
 * Collects diagnostics for a single pipeline run. Kept in memory only.
 */
export class RunStatsCollector {
  private readonly stats: RunStats;
  private readonly startedAtMs: number;

  constructor(
    params: { ticker: string; fetchCount: number; inferenceCount: number },
    private readonly now: () => number = Date.now
  ) {
    this.startedAtMs = now();
    this.stats = {
      runId: `${this.startedAtMs}_${params.ticker}_${crypto.randomUUID().slice(0, 8)}`,
      ticker: params.ticker,
      startedAt: new Date(this.startedAtMs).toISOString(),
      articlesRequested: params.fetchCount,
      articlesToInference: params.inferenceCount,
      articlesReturned: 0,
      relevantArticles: 0,
      classificationSuccessCount: 0,
      classificationErrorCount: 0,
      droppedInvalidCount: 0,
      fetchDurationMs: 0,
      classificationDurationMs: 0,
      synthesisDurationMs: 0,
      totalRuntimeMs: 0,
      status: "IN_PROGRESS",
    };
  }

  get runId(): string {
    return this.stats.runId;
  }

  update(patch: Partial<Omit<RunStats, "runId" | "status">>): void {
    Object.assign(this.stats, patch);
  }

  /**
   * Times `fn` and stores the elapsed milliseconds under `key`.
   */
  async time<T>(
    key: "fetchDurationMs" | "classificationDurationMs" | "synthesisDurationMs",
    fn: () => Promise<T>
  ): Promise<T> {
    const start = this.now();
    try {
      return await fn();
    } finally {
      this.stats[key] = this.now() - start;
    }
  }

  fail(stage: RunStage, message: string): RunStats {
    this.stats.status = "FAILED";
    this.stats.errorStage = stage;
    this.stats.errorMessage = message.replace(/\n/g, " | ");
    return this.finish();
  }

  complete(): RunStats {
    if (this.stats.status === "IN_PROGRESS") this.stats.status = "OK";
    return this.finish();
  }

  private finish(): RunStats {
    this.stats.totalRuntimeMs = this.now() - this.startedAtMs;
    return { ...this.stats };
  }
}
