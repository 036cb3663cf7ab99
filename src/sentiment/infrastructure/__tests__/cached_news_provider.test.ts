import { mkdtemp, rm, readFile, writeFile, access } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { NewsArticle } from "@src/sentiment/domain/types";
import { CachedNewsProvider } from "@src/sentiment/infrastructure/cached_news_provider";
import { newsArticle } from "@src/sentiment/__tests__/helpers";

function fakeInner(articles: NewsArticle[]) {
  return {
    fetchArticles: jest
      .fn<Promise<NewsArticle[]>, [{ ticker: string; count: number }]>()
      .mockResolvedValue(articles),
  };
}

async function exists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch {
    return false;
  }
}

describe("CachedNewsProvider", () => {
  let cacheDir: string;

  beforeEach(async () => {
    cacheDir = await mkdtemp(path.join(os.tmpdir(), "news-cache-"));
  });

  afterEach(async () => {
    await rm(cacheDir, { recursive: true, force: true });
  });

  it("serves a fresh entry without calling the provider", async () => {
    const articles = [newsArticle("A"), newsArticle("B"), newsArticle("C")];
    const inner = fakeInner(articles);
    const provider = new CachedNewsProvider(inner, {
      cacheDir,
      ttlSeconds: 3600,
    });

    await expect(
      provider.fetchArticles({ ticker: "AAPL", count: 3 })
    ).resolves.toEqual(articles);
    await expect(
      provider.fetchArticles({ ticker: "AAPL", count: 2 })
    ).resolves.toEqual([newsArticle("A"), newsArticle("B")]);

    expect(inner.fetchArticles).toHaveBeenCalledTimes(1);
    const written = JSON.parse(
      await readFile(path.join(cacheDir, "AAPL_news.json"), "utf-8")
    );
    expect(written).toEqual(articles);
  });

  it("refetches once the entry has expired", async () => {
    const inner = fakeInner([newsArticle("A")]);
    let offsetMs = 0;
    const provider = new CachedNewsProvider(inner, {
      cacheDir,
      ttlSeconds: 60,
      now: () => Date.now() + offsetMs,
    });

    await provider.fetchArticles({ ticker: "AAPL", count: 5 });
    offsetMs = 61_000;
    await provider.fetchArticles({ ticker: "AAPL", count: 5 });

    expect(inner.fetchArticles).toHaveBeenCalledTimes(2);
  });

  it("keeps one entry per ticker", async () => {
    const inner = fakeInner([newsArticle("A")]);
    const provider = new CachedNewsProvider(inner, {
      cacheDir,
      ttlSeconds: 3600,
    });

    await provider.fetchArticles({ ticker: "AAPL", count: 5 });
    await provider.fetchArticles({ ticker: "MSFT", count: 5 });

    expect(inner.fetchArticles).toHaveBeenCalledTimes(2);
    expect(provider.cacheFileFor("MSFT")).toBe(
      path.join(cacheDir, "MSFT_news.json")
    );
  });

  it("does not cache empty results", async () => {
    const inner = fakeInner([]);
    const provider = new CachedNewsProvider(inner, {
      cacheDir,
      ttlSeconds: 3600,
    });

    await provider.fetchArticles({ ticker: "AAPL", count: 5 });

    expect(await exists(provider.cacheFileFor("AAPL"))).toBe(false);
  });

  it("treats a malformed entry as a miss", async () => {
    const articles = [newsArticle("A")];
    const inner = fakeInner(articles);
    const provider = new CachedNewsProvider(inner, {
      cacheDir,
      ttlSeconds: 3600,
    });
    await writeFile(provider.cacheFileFor("AAPL"), "{not json", "utf-8");

    await expect(
      provider.fetchArticles({ ticker: "AAPL", count: 5 })
    ).resolves.toEqual(articles);
    expect(inner.fetchArticles).toHaveBeenCalledTimes(1);
  });

  it("creates the cache directory on first write", async () => {
    const nested = path.join(cacheDir, "nested", "dir");
    const provider = new CachedNewsProvider(fakeInner([newsArticle("A")]), {
      cacheDir: nested,
      ttlSeconds: 3600,
    });

    await provider.fetchArticles({ ticker: "AAPL", count: 5 });

    expect(await exists(path.join(nested, "AAPL_news.json"))).toBe(true);
  });
});
