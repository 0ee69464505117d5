import { createRunId, Logger, MetricsRegistry } from "../../../src/observability";

describe("Logger", () => {
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
  });

  test("writes one JSON line per event with the run context", () => {
    new Logger({ component: "pipeline", runId: "run_test" }).child("download").info("download_item_ok", { orderId: "A1" });

    expect(logSpy).toHaveBeenCalledTimes(1);
    const payload: unknown = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(payload).toMatchObject({ level: "info", msg: "download_item_ok", component: "download", runId: "run_test", orderId: "A1" });
  });

  test("routes errors to stderr and honours the minimum level", () => {
    const logger = new Logger({ component: "cli", runId: "run_test", minLevel: "warn" });
    logger.info("ignored");
    logger.debug("ignored");
    logger.warn("kept");
    logger.error("failed");

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  test("child loggers inherit the minimum level", () => {
    new Logger({ component: "cli", runId: "run_test", minLevel: "silent" }).child("auth").error("hidden");
    expect(errorSpy).not.toHaveBeenCalled();
  });
});

describe("MetricsRegistry", () => {
  test("counts events and summarizes timers", () => {
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("downloads_ok");
    metrics.incrementCounter("downloads_ok", 2);
    metrics.startTimer("download_ms")();

    expect(metrics.getCounters().downloads_ok).toBe(3);
    expect(metrics.getCounters().downloads_failed).toBe(0);
    expect(metrics.getTimerSummaries().download_ms.count).toBe(1);
    expect(metrics.getTimerSummaries().extract_ms).toEqual({ count: 0, min: 0, max: 0, avg: 0 });
  });

  test("logs its summary through the logger", () => {
    const logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("auth_cache_hits");

    metrics.logSummary(new Logger({ component: "metrics", runId: "run_test" }));

    const payload: unknown = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(payload).toMatchObject({ msg: "metrics_summary", counters: { auth_cache_hits: 1, downloads_ok: 0 } });
    logSpy.mockRestore();
  });
});

describe("createRunId", () => {
  test("embeds the start time and a random suffix", () => {
    const runId = createRunId(new Date("2026-10-18T12:00:00.123Z"));
    expect(runId).toMatch(/^run_20261018T120000Z_[0-9a-f]{6}$/);
    expect(createRunId()).not.toBe(createRunId());
  });
});
