import { z } from "zod";
import { SENTIMENT_CATEGORIES } from "../domain/types";

export const ArticleSentimentZodSchema = z.object({
  sentiment_score: z
    .number()
    .describe(
      "A score from 0 (extremely negative) to 10 (extremely positive) for the stock."
    ),
  sentiment_category: z
    .enum(SENTIMENT_CATEGORIES)
    .describe("One of: POSITIVE, NEUTRAL, NEGATIVE."),
  impact_reason: z
    .string()
    .describe(
      "A short summary (max 20 words) explaining the article and its impact."
    ),
});

export const OutlookZodSchema = z.object({
  overall_summary: z
    .string()
    .describe("A 2-3 sentence summary of the key findings."),
  final_sentiment: z.enum(["Bullish", "Neutral", "Bearish"]),
  recommendation: z.enum(["BUY", "HOLD", "SELL"]),
  major_risks: z
    .array(z.string())
    .describe("Two key risks mentioned in the analysis.")
    .default([]),
});
