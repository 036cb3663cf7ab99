import { z } from "zod";
import { RetrievalError } from "../domain/errors";
import type { NewsArticle } from "../domain/types";
import { getLogger } from "../../util/logger";
import type { NewsProvider } from "./contracts";

/**
 * NewsAPI "everything" endpoint, newest first, English only.
 * Articles without both a title and content are skipped.
 */

const NEWS_API_URL = "https://newsapi.org/v2/everything";
// NewsAPI rejects page sizes above 100
const MAX_PAGE_SIZE = 100;

const nullableString = z.string().nullish();

const newsApiResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  articles: z
    .array(
      z.object({
        title: nullableString,
        content: nullableString,
        description: nullableString,
        author: nullableString,
        url: nullableString,
        publishedAt: nullableString,
        source: z.object({ name: nullableString }).nullish(),
      })
    )
    .default([]),
});

// Error bodies carry `{ status: "error", code, message }`
const newsApiErrorSchema = z.object({ message: z.string() });

type NewsApiArticle = z.infer<typeof newsApiResponseSchema>["articles"][number];

export interface NewsApiProviderOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
}

function toNewsArticle(raw: NewsApiArticle): NewsArticle | undefined {
  const title = raw.title?.trim();
  const content = raw.content?.trim();
  if (!title || !content) return undefined;
  return {
    title,
    content,
    author: raw.author ?? undefined,
    source: raw.source?.name ?? undefined,
    url: raw.url ?? undefined,
    publishedAt: raw.publishedAt ?? undefined,
  };
}

export class NewsApiProvider implements NewsProvider {
  private readonly logger = getLogger("sentiment/newsapi");
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: NewsApiProviderOptions) {
    this.baseUrl = options.baseUrl ?? NEWS_API_URL;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async fetchArticles(params: {
    ticker: string;
    count: number;
  }): Promise<NewsArticle[]> {
    const url = new URL(this.baseUrl);
    url.searchParams.set("q", `${params.ticker} stock`);
    url.searchParams.set("language", "en");
    url.searchParams.set("sortBy", "publishedAt");
    url.searchParams.set(
      "pageSize",
      String(Math.min(Math.max(1, params.count), MAX_PAGE_SIZE))
    );

    let res: Response;
    try {
      res = await fetch(url, {
        headers: { "X-Api-Key": this.options.apiKey },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new RetrievalError(
        `News provider unreachable: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }

    if (!res.ok) {
      const reason = await readErrorMessage(res);
      throw new RetrievalError(
        `News provider returned HTTP ${res.status}${reason ? `: ${reason}` : ""}`
      );
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new RetrievalError("News provider returned a non-JSON body", {
        cause: err,
      });
    }

    const parsed = newsApiResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RetrievalError("News provider returned an unexpected payload", {
        cause: parsed.error,
      });
    }
    if (parsed.data.status !== "ok") {
      throw new RetrievalError(
        `News provider error: ${parsed.data.message ?? "Unknown error"}`
      );
    }

    const articles = parsed.data.articles
      .map(toNewsArticle)
      .filter((a): a is NewsArticle => a !== undefined);

    this.logger.debug(
      {
        ticker: params.ticker,
        returned: parsed.data.articles.length,
        kept: articles.length,
      },
      "news fetched"
    );
    return articles;
  }
}

async function readErrorMessage(res: Response): Promise<string | undefined> {
  let body: unknown;
  try {
    body = await res.json();
  } catch {
    return undefined;
  }
  const parsed = newsApiErrorSchema.safeParse(body);
  return parsed.success ? parsed.data.message : undefined;
}
