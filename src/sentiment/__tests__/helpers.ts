import type { z } from "zod";
import type { AiClient, GenerateJsonParams } from "@src/ai/client";
import type { SentimentAnalysis } from "@src/sentiment/application/analyze_ticker";
import { RunStatsCollector } from "@src/sentiment/application/run_stats";
import { aggregate } from "@src/sentiment/business/aggregate";
import type { NewsArticle } from "@src/sentiment/domain/types";

export function newsArticle(title: string, content = `${title} body`): NewsArticle {
  return { title, content };
}

export interface FakeAiClient extends AiClient {
  prompts: string[];
  systems: string[];
  embedCalls: string[][];
}

/**
 * In-process AiClient: `respond` plays the model and its answer goes
 * through the real schema, as the production client does.
 */
export function createFakeAiClient(options: {
  respond?: (prompt: string) => unknown | Promise<unknown>;
  embed?: (values: string[]) => number[][] | Promise<number[][]>;
}): FakeAiClient {
  const prompts: string[] = [];
  const systems: string[] = [];
  const embedCalls: string[][] = [];
  return {
    prompts,
    systems,
    embedCalls,
    async generateJson<TSchema extends z.ZodTypeAny>(
      params: GenerateJsonParams<TSchema>
    ): Promise<z.infer<TSchema>> {
      prompts.push(params.prompt);
      systems.push(params.system);
      if (!options.respond) throw new Error("generateJson not expected");
      return params.schema.parse(await options.respond(params.prompt));
    },
    async embed({ values }) {
      embedCalls.push(values);
      if (!options.embed) throw new Error("embed not expected");
      return options.embed(values);
    },
  };
}

/**
 * A finished analysis of two articles, as the pipeline would return it.
 */
export function sampleAnalysis(ticker = "AAPL"): SentimentAnalysis {
  const index = aggregate([
    {
      headline: "Record quarter",
      score: 9,
      category: "POSITIVE",
      reason: "Revenue beat",
    },
    {
      headline: "Supplier strike",
      score: 4,
      category: "NEGATIVE",
      reason: "Output at risk",
    },
  ]);
  const stats = new RunStatsCollector(
    { ticker, fetchCount: 50, inferenceCount: 5 },
    () => 0
  ).complete();
  return {
    ticker,
    index,
    dropped: [],
    classificationErrors: [],
    stats,
  };
}
