import { RunStatsCollector } from "@src/sentiment/application/run_stats";

function clock(start: number) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe("RunStatsCollector", () => {
  const params = { ticker: "AAPL", fetchCount: 50, inferenceCount: 5 };

  it("starts in progress with zeroed counters", () => {
    const { now } = clock(Date.UTC(2026, 0, 2, 3, 4, 5));
    const collector = new RunStatsCollector(params, now);

    const stats = collector.complete();

    expect(collector.runId).toMatch(/^1767323045000_AAPL_[0-9a-f]{8}$/);
    expect(stats).toMatchObject({
      ticker: "AAPL",
      startedAt: "2026-01-02T03:04:05.000Z",
      articlesRequested: 50,
      articlesToInference: 5,
      articlesReturned: 0,
      status: "OK",
      totalRuntimeMs: 0,
    });
  });

  it("times stages and the whole run", async () => {
    const c = clock(1_000);
    const collector = new RunStatsCollector(params, c.now);

    const value = await collector.time("fetchDurationMs", async () => {
      c.advance(250);
      return "done";
    });
    c.advance(50);
    const stats = collector.complete();

    expect(value).toBe("done");
    expect(stats.fetchDurationMs).toBe(250);
    expect(stats.totalRuntimeMs).toBe(300);
  });

  it("records the duration of a failed stage", async () => {
    const c = clock(0);
    const collector = new RunStatsCollector(params, c.now);

    await expect(
      collector.time("classificationDurationMs", async () => {
        c.advance(40);
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(collector.complete().classificationDurationMs).toBe(40);
  });

  it("flattens multi-line failure messages", () => {
    const collector = new RunStatsCollector(params, clock(0).now);
    collector.update({ articlesReturned: 3 });

    const stats = collector.fail("classify", "first line\nsecond line");

    expect(stats.status).toBe("FAILED");
    expect(stats.errorStage).toBe("classify");
    expect(stats.errorMessage).toBe("first line | second line");
    expect(stats.articlesReturned).toBe(3);
  });

  it("returns snapshots that later updates do not change", () => {
    const collector = new RunStatsCollector(params, clock(0).now);
    const first = collector.complete();

    collector.update({ articlesReturned: 9 });

    expect(first.articlesReturned).toBe(0);
  });
});
