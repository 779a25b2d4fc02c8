import { afterEach, describe, expect, it, vi } from "vitest";
import { createRunId, Logger, MetricsRegistry, parseLogLevel } from "../../src/observability";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Logger", () => {
  it("writes one JSON line per entry to stderr", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    new Logger({ component: "crawl", runId: "run_test" }).info("crawl_source_start", { sourceId: "county-bids" });

    expect(spy).toHaveBeenCalledTimes(1);
    const line = JSON.parse(String(spy.mock.calls[0]?.[0]));
    expect(line).toMatchObject({
      level: "info",
      msg: "crawl_source_start",
      component: "crawl",
      runId: "run_test",
      sourceId: "county-bids",
    });
    expect(typeof line.ts).toBe("string");
  });

  it("drops entries below the minimum level, children included", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new Logger({ component: "cli", runId: "run_test", minLevel: "warn" });

    logger.info("hidden");
    logger.child("fetch").debug("hidden too");
    logger.child("fetch").warn("fetch_retry");

    expect(spy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(spy.mock.calls[0]?.[0]))).toMatchObject({ msg: "fetch_retry", component: "fetch" });
  });
});

describe("parseLogLevel", () => {
  it("accepts known levels in any case and falls back otherwise", () => {
    expect(parseLogLevel(" WARN ", "info")).toBe("warn");
    expect(parseLogLevel("verbose", "info")).toBe("info");
    expect(parseLogLevel(undefined, "error")).toBe("error");
  });
});

describe("createRunId", () => {
  it("combines a filesystem-safe timestamp and a random suffix", () => {
    expect(createRunId(new Date("2025-01-01T12:30:45.678Z"), () => 0.5)).toBe("run_2025-01-01T12-30-45-678Z_i00000");
  });
});

describe("MetricsRegistry", () => {
  it("accumulates counters and summarizes timers", () => {
    vi.spyOn(Date, "now").mockReturnValueOnce(1_000).mockReturnValueOnce(1_250);
    const metrics = new MetricsRegistry();

    metrics.incrementCounter("records_new", 2);
    metrics.incrementCounter("records_new");
    const stop = metrics.startTimer("index_fetch_ms");
    const duration = stop();

    expect(duration).toBe(250);
    expect(metrics.getCounters().records_new).toBe(3);
    expect(metrics.getCounters().sources_failed).toBe(0);
    expect(metrics.getTimerSummaries().index_fetch_ms).toEqual({ count: 1, min: 250, max: 250, avg: 250 });
    expect(metrics.getTimerSummaries().detail_fetch_ms).toEqual({ count: 0, min: 0, max: 0, avg: 0 });
  });
});
