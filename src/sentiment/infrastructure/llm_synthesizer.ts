import type { AiClient } from "../../ai/client";
import type { ArticleSentiment, SentimentOutlook } from "../domain/types";
import {
  buildSynthesisPrompt,
  buildSynthesisSystemPrompt,
} from "../prompts/prompts";
import { OutlookZodSchema } from "../prompts/schema";
import type { OutlookSynthesizer } from "./contracts";

export class LlmOutlookSynthesizer implements OutlookSynthesizer {
  constructor(private readonly ai: AiClient) {}

  async synthesize(params: {
    ticker: string;
    articles: ArticleSentiment[];
  }): Promise<SentimentOutlook> {
    const result = await this.ai.generateJson({
      system: buildSynthesisSystemPrompt(),
      prompt: buildSynthesisPrompt(params),
      schema: OutlookZodSchema,
      temperature: 0,
    });
    return {
      summary: result.overall_summary,
      finalSentiment: result.final_sentiment,
      recommendation: result.recommendation,
      majorRisks: result.major_risks,
    };
  }
}
