/**
 * Presentation of a sentiment index: a serializable report for the API and
 * a text block for the console, carrying the same fields.
 */
import type {
  ArticleSentiment,
  CategoryCounts,
  SentimentIndex,
  SentimentLabel,
  SentimentOutlook,
} from "../domain/types";

export interface ReportArticle {
  headline: string;
  score: number;
  category: ArticleSentiment["category"];
  reason: string;
}

export interface SentimentReport {
  ticker: string;
  averageScore: number;
  overallLabel: SentimentLabel;
  articleCount: number;
  categoryCounts: CategoryCounts;
  mostPositive: ReportArticle;
  mostNegative: ReportArticle;
  outlook?: SentimentOutlook;
}

const RULE = "=".repeat(90);

function toReportArticle(article: ArticleSentiment): ReportArticle {
  return {
    headline: article.headline,
    score: article.score,
    category: article.category,
    reason: article.reason,
  };
}

export function assembleReport(params: {
  ticker: string;
  index: SentimentIndex;
  outlook?: SentimentOutlook;
}): SentimentReport {
  const { ticker, index, outlook } = params;
  const report: SentimentReport = {
    ticker,
    averageScore: index.averageScore,
    overallLabel: index.overallLabel,
    articleCount: index.articleCount,
    categoryCounts: { ...index.categoryCounts },
    mostPositive: toReportArticle(index.mostPositive),
    mostNegative: toReportArticle(index.mostNegative),
  };
  if (outlook) {
    report.outlook = { ...outlook, majorRisks: [...outlook.majorRisks] };
  }
  return report;
}

function formatArticle(title: string, article: ReportArticle): string[] {
  return [
    `${title}:`,
    `  Headline: ${article.headline}`,
    `  Score:    ${article.score.toFixed(2)} / 10.00 (${article.category})`,
    `  Reason:   ${article.reason}`,
  ];
}

export function formatReportText(report: SentimentReport): string {
  const { categoryCounts: counts } = report;
  const lines: string[] = [
    RULE,
    `SENTIMENT INDEX FOR ${report.ticker} (based on ${report.articleCount} articles)`,
    RULE,
    `Overall Average Score: ${report.averageScore.toFixed(2)} / 10.00`,
    `Overall Sentiment:     ${report.overallLabel}`,
    `Categories:            ${counts.POSITIVE} positive, ${counts.NEUTRAL} neutral, ${counts.NEGATIVE} negative`,
    "",
    ...formatArticle("Most Positive News", report.mostPositive),
    "",
    ...formatArticle("Most Negative News", report.mostNegative),
  ];

  if (report.outlook) {
    const { outlook } = report;
    lines.push(
      "",
      "Outlook:",
      `  Summary:        ${outlook.summary}`,
      `  Sentiment:      ${outlook.finalSentiment}`,
      `  Recommendation: ${outlook.recommendation}`
    );
    if (outlook.majorRisks.length > 0) {
      lines.push("  Major Risks:");
      for (const risk of outlook.majorRisks) lines.push(`    - ${risk}`);
    }
  }

  lines.push(RULE);
  return lines.join("\n");
}
