/**
 * Tests for the download manager: dedup, atomic writes and per-item failures.
 */

import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { ReadableStream } from "node:stream/web";
import { Response } from "undici";
import { DownloadManager } from "../../../src/download/downloader";
import { FetchFn } from "../../../src/core/fetch";
import { createSilentLogger, MetricsRegistry } from "../../../src/observability";
import { makeTempDir, orderRecord, recordingFetch, recordingSleep, removeDir } from "../../helpers/fixtures";

const RECORDS = [
  orderRecord("A1", "https://files.example.test/a1.pdf"),
  orderRecord("A2", "https://files.example.test/a2.pdf"),
  orderRecord("A3", "https://files.example.test/a3.pdf"),
];

function contentFor(url: string): string {
  return `file-body:${url}`;
}

describe("DownloadManager", () => {
  let dir: string;

  const createManager = (fetchFn: FetchFn, overrides: { maxAttempts?: number; concurrency?: number } = {}) => {
    const sleep = recordingSleep();
    const metrics = new MetricsRegistry();
    const manager = new DownloadManager({
      downloadDir: dir,
      timeoutMs: 1000,
      maxAttempts: overrides.maxAttempts ?? 3,
      concurrency: overrides.concurrency ?? 1,
      userAgent: "test-agent",
      ignoreHttpsErrors: false,
      logger: createSilentLogger(),
      metrics,
      fetchFn,
      sleepFn: sleep.sleepFn,
    });
    return { manager, delays: sleep.delays, metrics };
  };

  beforeEach(() => {
    dir = path.join(makeTempDir(), "downloads");
  });

  afterEach(() => {
    removeDir(path.dirname(dir));
  });

  test("downloads every record into its target path", async () => {
    const { fetchFn, calls } = recordingFetch((url) => new Response(contentFor(url), { status: 200 }));
    const { manager, metrics } = createManager(fetchFn);

    const summary = await manager.run(RECORDS);

    expect({ downloaded: summary.downloaded, skipped: summary.skipped, failed: summary.failed }).toEqual({
      downloaded: 3,
      skipped: 0,
      failed: 0,
    });
    expect(calls.map((call) => call.url)).toEqual(RECORDS.map((record) => record.downloadUrl));
    expect(fs.readdirSync(dir).sort()).toEqual(["A1.pdf", "A2.pdf", "A3.pdf"]);
    expect(fs.readFileSync(path.join(dir, "A1.pdf"), "utf-8")).toBe(contentFor("https://files.example.test/a1.pdf"));

    const first = summary.outcomes[0];
    const body = contentFor("https://files.example.test/a1.pdf");
    expect(first).toEqual({
      kind: "downloaded",
      orderId: "A1",
      path: path.join(dir, "A1.pdf"),
      bytes: Buffer.byteLength(body),
      sha256: crypto.createHash("sha256").update(body).digest("hex"),
      attempt: 1,
    });
    expect(metrics.getCounters().downloads_ok).toBe(3);
  });

  test("a second run over the same records fetches nothing", async () => {
    const firstFetch = recordingFetch((url) => new Response(contentFor(url), { status: 200 }));
    await createManager(firstFetch.fetchFn).manager.run(RECORDS);

    const secondFetch = recordingFetch((url) => new Response(contentFor(url), { status: 200 }));
    const summary = await createManager(secondFetch.fetchFn).manager.run(RECORDS);

    expect(summary.skipped).toBe(3);
    expect(summary.downloaded).toBe(0);
    expect(secondFetch.calls).toHaveLength(0);
    expect(summary.outcomes.map((outcome) => outcome.kind)).toEqual([
      "skipped_duplicate",
      "skipped_duplicate",
      "skipped_duplicate",
    ]);
  });

  test("never overwrites a file that already exists", async () => {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, "A1.pdf"), "original");
    const { fetchFn, calls } = recordingFetch((url) => new Response(contentFor(url), { status: 200 }));

    const summary = await createManager(fetchFn).manager.run([RECORDS[0]]);

    expect(summary.skipped).toBe(1);
    expect(calls).toHaveLength(0);
    expect(fs.readFileSync(path.join(dir, "A1.pdf"), "utf-8")).toBe("original");
  });

  test("a permanent HTTP error fails only that item", async () => {
    const { fetchFn, calls } = recordingFetch((url) =>
      url.endsWith("a2.pdf") ? new Response("missing", { status: 404 }) : new Response(contentFor(url), { status: 200 }),
    );
    const { manager, delays } = createManager(fetchFn);

    const summary = await manager.run(RECORDS);

    expect(summary.downloaded).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.outcomes[1]).toEqual({ kind: "failed", orderId: "A2", reason: "HTTP 404", attempt: 1 });
    expect(calls).toHaveLength(3);
    expect(delays).toEqual([]);
    expect(fs.readdirSync(dir).sort()).toEqual(["A1.pdf", "A3.pdf"]);
  });

  test("a non-ok response without an error status never lands at the target path", async () => {
    const { fetchFn, calls } = recordingFetch(() => new Response(null, { status: 304 }));
    const { manager, delays } = createManager(fetchFn, { maxAttempts: 3 });

    const summary = await manager.run([RECORDS[0]]);

    expect(summary.outcomes[0]).toEqual({ kind: "failed", orderId: "A1", reason: "HTTP 304", attempt: 1 });
    expect(calls).toHaveLength(1);
    expect(delays).toEqual([]);
    expect(fs.readdirSync(dir)).toEqual([]);

    const retry = recordingFetch((url) => new Response(contentFor(url), { status: 200 }));
    const second = await createManager(retry.fetchFn).manager.run([RECORDS[0]]);
    expect(second.downloaded).toBe(1);
    expect(retry.calls).toHaveLength(1);
  });

  test("retries server errors before failing the item", async () => {
    const { fetchFn, calls } = recordingFetch((url) =>
      url.endsWith("a2.pdf") ? new Response("busy", { status: 503 }) : new Response(contentFor(url), { status: 200 }),
    );
    const { manager, delays } = createManager(fetchFn, { maxAttempts: 2 });

    const summary = await manager.run(RECORDS);

    expect(summary.outcomes[1]).toEqual({ kind: "failed", orderId: "A2", reason: "HTTP 503", attempt: 2 });
    expect(calls.filter((call) => call.url.endsWith("a2.pdf"))).toHaveLength(2);
    expect(delays).toEqual([1000]);
    expect(summary.downloaded).toBe(2);
  });

  test("retries a thrown network error and succeeds", async () => {
    const { fetchFn, calls } = recordingFetch((url, _init, index) => {
      if (index === 0) {
        throw new TypeError("fetch failed");
      }
      return new Response(contentFor(url), { status: 200 });
    });
    const { manager } = createManager(fetchFn);

    const summary = await manager.run([RECORDS[0]]);

    expect(summary.outcomes[0]).toMatchObject({ kind: "downloaded", orderId: "A1", attempt: 2 });
    expect(calls).toHaveLength(2);
  });

  test("a stream that breaks mid-write leaves no file behind", async () => {
    const fetchFn: FetchFn = async () => {
      let sent = false;
      const body = new ReadableStream<Uint8Array>({
        pull(controller) {
          if (!sent) {
            sent = true;
            controller.enqueue(new TextEncoder().encode("partial bytes"));
            return;
          }
          controller.error(new Error("connection reset"));
        },
      });
      return new Response(body, { status: 200 });
    };
    const { manager } = createManager(fetchFn, { maxAttempts: 1 });

    const summary = await manager.run([RECORDS[0]]);

    expect(summary.failed).toBe(1);
    expect(summary.outcomes[0].kind).toBe("failed");
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  test("removes stale partial files left by an interrupted run", async () => {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, "A1.pdf.part"), "half");
    const { fetchFn } = recordingFetch((url) => new Response(contentFor(url), { status: 200 }));

    const summary = await createManager(fetchFn).manager.run([RECORDS[0]]);

    expect(summary.downloaded).toBe(1);
    expect(fs.readdirSync(dir)).toEqual(["A1.pdf"]);
  });

  test("concurrent workers download a shared target once", async () => {
    const duplicate = orderRecord("A1", "https://files.example.test/a1-copy.pdf");
    const { fetchFn, calls } = recordingFetch((url) => new Response(contentFor(url), { status: 200 }));
    const { manager } = createManager(fetchFn, { concurrency: 2 });

    const summary = await manager.run([RECORDS[0], duplicate]);

    expect(summary.downloaded).toBe(1);
    expect(summary.skipped).toBe(1);
    expect(calls).toHaveLength(1);
  });
});
