import type { ArticleSentiment, NewsArticle } from "../domain/types";

export function buildClassificationSystemPrompt(): string {
  return [
    "You are a senior capital markets analyst.",
    "Score how a single news article affects sentiment towards one stock.",
    "Only output valid JSON that matches the provided schema.",
  ].join("\n");
}

export function buildClassificationPrompt(params: {
  ticker: string;
  article: NewsArticle;
}): string {
  const { ticker, article } = params;
  return [
    `Analyze the following news concerning the company ${ticker}.`,
    "Sentiment score: a number from 0 (extremely negative) to 10 (extremely positive).",
    "Impact reason: at most 20 words explaining the article and why it received that score.",
    "",
    `TITLE: ${article.title}`,
    `CONTENT: ${article.content}`,
  ].join("\n");
}

export function buildSynthesisSystemPrompt(): string {
  return [
    "You are a chief investment strategist.",
    "Consolidate per-article sentiment results into a final, actionable view.",
    "Only output valid JSON that matches the provided schema.",
  ].join("\n");
}

export function buildSynthesisPrompt(params: {
  ticker: string;
  articles: ArticleSentiment[];
}): string {
  const lines = params.articles.map(
    a => `- Score ${a.score}/10 (${a.category}): ${a.reason} (Source: ${a.headline})`
  );
  return [
    `Synthesize the following sentiment results for the stock ${params.ticker}.`,
    "Analysis results from individual articles:",
    ...lines,
    "",
    "Return overall_summary, final_sentiment (Bullish, Neutral, Bearish), recommendation (BUY, HOLD, SELL) and two major_risks.",
  ].join("\n");
}

export function buildRelevanceQuery(ticker: string): string {
  return `Significant positive or negative news impacting ${ticker} stock price and sentiment.`;
}
