#!/usr/bin/env node
/* eslint-disable no-console */
// npm run analyze -- AAPL [fetchCount] [inferenceCount] [--json]
import "dotenv/config";
import { flushTelemetry } from "../../ai/telemetry";
import { isSentimentError } from "../domain/errors";
import { assembleReport, formatReportText } from "../business/report";
import type {
  AnalyzeTickerInput,
  SentimentAnalysis,
} from "../application/analyze_ticker";
import { createSentimentPipeline } from "../application/build_pipeline";
import { SentimentConfig, loadSentimentConfig } from "../config";

export interface CliArgs {
  ticker: string;
  fetchCount?: number;
  inferenceCount?: number;
  json: boolean;
}

export interface CliDeps {
  loadConfig: () => Pick<
    SentimentConfig,
    "articlesToFetch" | "articlesToInference"
  >;
  createPipeline: () => {
    run(input: AnalyzeTickerInput): Promise<SentimentAnalysis>;
  };
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const USAGE =
  "Usage: run_sentiment <TICKER> [fetchCount] [inferenceCount] [--json]";

function parsePositiveInt(
  raw: string | undefined,
  name: string
): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return n;
}

export function parseArgs(argv: string[]): CliArgs {
  const json = argv.includes("--json");
  const positional = argv.filter(a => !a.startsWith("--"));
  const [ticker, fetchRaw, inferenceRaw] = positional;
  if (!ticker) throw new Error(USAGE);
  return {
    ticker,
    fetchCount: parsePositiveInt(fetchRaw, "fetchCount"),
    inferenceCount: parsePositiveInt(inferenceRaw, "inferenceCount"),
    json,
  };
}

const defaultDeps: CliDeps = {
  loadConfig: loadSentimentConfig,
  createPipeline: () => createSentimentPipeline(),
  stdout: line => console.log(line),
  stderr: line => console.error(line),
};

/**
 * Runs one analysis and returns the process exit code.
 */
export async function runCli(
  argv: string[],
  deps: CliDeps = defaultDeps
): Promise<number> {
  try {
    const args = parseArgs(argv);
    const config = deps.loadConfig();
    const analysis = await deps.createPipeline().run({
      ticker: args.ticker,
      fetchCount: args.fetchCount ?? config.articlesToFetch,
      inferenceCount: args.inferenceCount ?? config.articlesToInference,
    });
    const report = assembleReport({
      ticker: analysis.ticker,
      index: analysis.index,
      outlook: analysis.outlook,
    });
    deps.stdout(
      args.json ? JSON.stringify(report, null, 2) : formatReportText(report)
    );
    return 0;
  } catch (err) {
    const code = isSentimentError(err) ? err.code : "ERROR";
    const message = err instanceof Error ? err.message : String(err);
    deps.stderr(`Error [${code}]: ${message}`);
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then(async code => {
      await flushTelemetry();
      process.exitCode = code;
    })
    .catch(err => {
      console.error("Unhandled error:", err);
      process.exit(1);
    });
}
