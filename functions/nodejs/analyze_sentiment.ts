// Lambda handler for the ticker sentiment index (Node.js)
// This is a thin wrapper that delegates to the sentiment application layer.
//
// Endpoint: POST /analyze  body { ticker, fetchCount?, inferenceCount? }
//           GET  /analyze?ticker=AAPL
// Returns:
//   200 SentimentReport
//   400 INVALID_REQUEST | INVALID_TICKER
//   404 NO_ARTICLES_FOUND
//   422 ALL_CLASSIFICATIONS_FAILED
//   502 NEWS_PROVIDER_UNAVAILABLE
//   500 INTERNAL_ERROR
import type {
  APIGatewayProxyEventV2,
  APIGatewayProxyStructuredResultV2,
  Context,
} from "aws-lambda";
import "dotenv/config";
import { z } from "zod";
import { flushTelemetry } from "../../src/ai/telemetry";
import type {
  AnalyzeTickerInput,
  SentimentAnalysis,
} from "../../src/sentiment/application/analyze_ticker";
import { createSentimentPipeline } from "../../src/sentiment/application/build_pipeline";
import {
  FailureCode,
  describeFailure,
  httpStatusFor,
} from "../../src/sentiment/application/failure";
import { assembleReport } from "../../src/sentiment/business/report";
import { loadSentimentConfig } from "../../src/sentiment/config";
import { withRequestContext } from "../../src/util/logger";

export type AnalyzeSentimentEvent = Pick<
  APIGatewayProxyEventV2,
  "body" | "isBase64Encoded" | "queryStringParameters"
> & {
  requestContext?: { http?: { method?: string } };
};

export interface AnalyzeSentimentDeps {
  getPipeline: () => {
    run(input: AnalyzeTickerInput): Promise<SentimentAnalysis>;
  };
  getDefaults: () => { fetchCount: number; inferenceCount: number };
}

const requestSchema = z.object({
  ticker: z.string().min(1),
  fetchCount: z.number().int().positive().max(100).optional(),
  inferenceCount: z.number().int().positive().max(50).optional(),
});

type AnalyzeRequest = z.infer<typeof requestSchema>;

const JSON_HEADERS = {
  "Content-Type": "application/json",
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Headers": "Content-Type",
  "Access-Control-Allow-Methods": "GET,POST",
};

function respond(
  statusCode: number,
  body: unknown
): APIGatewayProxyStructuredResultV2 {
  return { statusCode, headers: JSON_HEADERS, body: JSON.stringify(body) };
}

function errorResponse(
  code: FailureCode,
  message: string
): APIGatewayProxyStructuredResultV2 {
  return respond(httpStatusFor(code), { error: code, message });
}

function readPayload(event: AnalyzeSentimentEvent): unknown {
  const method = event.requestContext?.http?.method?.toUpperCase() ?? "POST";
  if (method === "GET") {
    return { ticker: event.queryStringParameters?.ticker };
  }
  if (!event.body) return undefined;
  const raw = event.isBase64Encoded
    ? Buffer.from(event.body, "base64").toString("utf-8")
    : event.body;
  return JSON.parse(raw);
}

function parseRequest(
  event: AnalyzeSentimentEvent
): { ok: true; data: AnalyzeRequest } | { ok: false; message: string } {
  let payload: unknown;
  try {
    payload = readPayload(event);
  } catch {
    return { ok: false, message: "Request body must be valid JSON" };
  }
  const parsed = requestSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.join(".") || "body"}: ${i.message}`)
      .join("; ");
    return { ok: false, message: issues };
  }
  return { ok: true, data: parsed.data };
}

// Built once per warm container and shared across invocations
let pipeline: ReturnType<typeof createSentimentPipeline> | undefined;

const defaultDeps: AnalyzeSentimentDeps = {
  getPipeline: () => {
    pipeline ??= createSentimentPipeline();
    return pipeline;
  },
  getDefaults: () => {
    const cfg = loadSentimentConfig();
    return {
      fetchCount: cfg.articlesToFetch,
      inferenceCount: cfg.articlesToInference,
    };
  },
};

export function createAnalyzeSentimentHandler(
  deps: AnalyzeSentimentDeps = defaultDeps
) {
  return async (
    event: AnalyzeSentimentEvent,
    context?: Pick<Context, "awsRequestId" | "functionName" | "functionVersion">
  ): Promise<APIGatewayProxyStructuredResultV2> => {
    const logger = withRequestContext(
      "functions/analyze_sentiment",
      context ?? {}
    );

    const request = parseRequest(event);
    if (!request.ok) {
      logger.info({ reason: request.message }, "rejected analyze request");
      return errorResponse("INVALID_REQUEST", request.message);
    }

    const { ticker, fetchCount, inferenceCount } = request.data;
    logger.info({ ticker }, "received analyze request");

    try {
      const defaults = deps.getDefaults();
      const analysis = await deps.getPipeline().run({
        ticker,
        fetchCount: fetchCount ?? defaults.fetchCount,
        inferenceCount: inferenceCount ?? defaults.inferenceCount,
      });
      return respond(
        200,
        assembleReport({
          ticker: analysis.ticker,
          index: analysis.index,
          outlook: analysis.outlook,
        })
      );
    } catch (err) {
      const failure = describeFailure(err);
      if (failure.code === "INTERNAL_ERROR") {
        logger.error({ err }, "analyze request failed");
      } else {
        logger.warn({ code: failure.code }, "analyze request failed");
      }
      return errorResponse(failure.code, failure.message);
    } finally {
      // Ensure traces are exported in short-lived environments (Lambda)
      await flushTelemetry();
    }
  };
}

/**
 * AWS Lambda entrypoint.
 */
export const handler = createAnalyzeSentimentHandler();
