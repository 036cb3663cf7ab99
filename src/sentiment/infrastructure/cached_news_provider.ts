import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { NewsArticle } from "../domain/types";
import { getLogger } from "../../util/logger";
import type { NewsProvider } from "./contracts";

const cachedArticlesSchema = z.array(
  z.object({
    title: z.string(),
    content: z.string(),
    author: z.string().optional(),
    source: z.string().optional(),
    url: z.string().optional(),
    publishedAt: z.string().optional(),
  })
);

export interface CachedNewsProviderOptions {
  cacheDir: string;
  ttlSeconds: number;
  now?: () => number;
}

/**
 * File cache in front of a provider: one JSON file per ticker, valid for
 * `ttlSeconds` after it was written. Empty results are not cached.
 */
export class CachedNewsProvider implements NewsProvider {
  private readonly logger = getLogger("sentiment/news-cache");
  private readonly now: () => number;

  constructor(
    private readonly inner: NewsProvider,
    private readonly options: CachedNewsProviderOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  cacheFileFor(ticker: string): string {
    return path.join(this.options.cacheDir, `${ticker}_news.json`);
  }

  async fetchArticles(params: {
    ticker: string;
    count: number;
  }): Promise<NewsArticle[]> {
    const file = this.cacheFileFor(params.ticker);

    const cached = await this.readFresh(file);
    if (cached) {
      this.logger.debug({ ticker: params.ticker, file }, "news cache hit");
      return cached.slice(0, params.count);
    }

    this.logger.debug({ ticker: params.ticker }, "news cache miss");
    const articles = await this.inner.fetchArticles(params);
    if (articles.length > 0) await this.write(file, articles);
    return articles;
  }

  private async readFresh(file: string): Promise<NewsArticle[] | undefined> {
    try {
      const info = await stat(file);
      const ageMs = this.now() - info.mtimeMs;
      if (ageMs >= this.options.ttlSeconds * 1000) return undefined;
      const parsed = cachedArticlesSchema.safeParse(
        JSON.parse(await readFile(file, "utf-8"))
      );
      if (!parsed.success) {
        this.logger.warn({ file }, "news cache entry malformed; ignoring");
        return undefined;
      }
      return parsed.data;
    } catch (err) {
      if (isMissingFile(err)) return undefined;
      this.logger.warn({ file, err }, "news cache read failed; ignoring");
      return undefined;
    }
  }

  private async write(file: string, articles: NewsArticle[]): Promise<void> {
    try {
      await mkdir(path.dirname(file), { recursive: true });
      await writeFile(file, JSON.stringify(articles, null, 2), "utf-8");
    } catch (err) {
      this.logger.warn({ file, err }, "news cache write failed");
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}
