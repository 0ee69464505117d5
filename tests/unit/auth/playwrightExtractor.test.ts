import { chromium } from "playwright-core";
import { PlaywrightSessionExtractor } from "../../../src/auth/playwrightExtractor";
import { Logger, MetricsRegistry } from "../../../src/observability";

jest.mock("playwright-core", () => ({
  ...jest.requireActual<typeof import("playwright-core")>("playwright-core"),
  chromium: { launch: jest.fn() },
}));

describe("PlaywrightSessionExtractor", () => {
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  test("records the extraction time when the browser fails to start", async () => {
    jest.mocked(chromium.launch).mockRejectedValue(new Error("browser missing"));
    const metrics = new MetricsRegistry();
    const extractor = new PlaywrightSessionExtractor({
      loginUrl: "https://portal.test/login",
      authRequestMarker: "/api/",
      requiredHeaders: ["authorization"],
      userAgent: "test-agent",
      headless: true,
      logger: new Logger({ component: "auth", runId: "run_test" }),
      metrics,
    });

    await expect(extractor.extract({ username: "user@test", password: "test-secret" }, 1_000)).rejects.toThrow(
      "browser missing",
    );

    expect(metrics.getTimerSummaries().extract_ms.count).toBe(1);
    const messages = logSpy.mock.calls.map((call) => JSON.parse(String(call[0])).msg);
    expect(messages).toEqual(["extract_browser_launch", "extract_finished"]);
  });
});
