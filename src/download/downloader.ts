import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { Readable } from "node:stream";
import { errorMessage, isErrnoCode } from "../core/errors";
import { backoffDelayMs, defaultFetch, FetchFn, getFetchDispatcher, requestWithTimeout, sleep } from "../core/fetch";
import { Logger, MetricsRegistry } from "../observability";
import { DownloadOutcome, DownloadSummary, OrderRecord } from "../types";

const PART_SUFFIX = ".part";

export interface DownloadManagerOptions {
  downloadDir: string;
  timeoutMs: number;
  maxAttempts: number;
  concurrency: number;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
  sleepFn?: (ms: number) => Promise<void>;
}

type AttemptResult =
  | { ok: false; statusCode: number }
  | { ok: true; statusCode: number; sha256: string; bytes: number };

function isRetriableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

async function processWithConcurrency<T>(
  items: T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> {
  let index = 0;
  const slots = new Array(Math.max(1, concurrency)).fill(null).map(async () => {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      await worker(items[current], current);
    }
  });
  await Promise.all(slots);
}

/**
 * Fetches the file behind each order into the download directory. A file
 * already at the target path is never fetched again, and bytes only reach
 * the target path through a rename of a completed `.part` file.
 */
export class DownloadManager {
  private readonly options: DownloadManagerOptions;
  private readonly downloadDir: string;
  private readonly fetchFn: FetchFn;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private present = new Set<string>();

  constructor(options: DownloadManagerOptions) {
    this.options = options;
    this.downloadDir = path.resolve(options.downloadDir);
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.sleepFn = options.sleepFn ?? sleep;
  }

  targetPath(record: OrderRecord): string {
    return path.join(this.downloadDir, record.fileName);
  }

  async run(records: readonly OrderRecord[]): Promise<DownloadSummary> {
    const { logger, concurrency } = this.options;
    await fs.promises.mkdir(this.downloadDir, { recursive: true });
    await this.removeStaleParts();
    this.present = new Set(await fs.promises.readdir(this.downloadDir));

    logger.info("download_batch_start", { items: records.length, concurrency, downloadDir: this.downloadDir });
    const outcomes: DownloadOutcome[] = new Array(records.length);
    await processWithConcurrency([...records], concurrency, async (record, index) => {
      outcomes[index] = await this.downloadOne(record);
    });

    const summary: DownloadSummary = {
      downloaded: outcomes.filter((outcome) => outcome.kind === "downloaded").length,
      skipped: outcomes.filter((outcome) => outcome.kind === "skipped_duplicate").length,
      failed: outcomes.filter((outcome) => outcome.kind === "failed").length,
      outcomes,
    };
    logger.info("download_batch_complete", {
      downloaded: summary.downloaded,
      skipped: summary.skipped,
      failed: summary.failed,
    });
    return summary;
  }

  private async downloadOne(record: OrderRecord): Promise<DownloadOutcome> {
    const { logger, metrics, maxAttempts } = this.options;
    const finalPath = this.targetPath(record);

    if (this.present.has(record.fileName) || fs.existsSync(finalPath)) {
      metrics.incrementCounter("downloads_skipped");
      logger.info("download_item_skipped_duplicate", { orderId: record.orderId, path: finalPath });
      return { kind: "skipped_duplicate", orderId: record.orderId, path: finalPath };
    }

    const tempPath = `${finalPath}${PART_SUFFIX}`;
    try {
      // Exclusive creation reserves the target for this worker.
      const handle = await fs.promises.open(tempPath, "wx");
      await handle.close();
    } catch (error) {
      if (isErrnoCode(error, "EEXIST")) {
        metrics.incrementCounter("downloads_skipped");
        logger.info("download_item_in_flight", { orderId: record.orderId, path: finalPath });
        return { kind: "skipped_duplicate", orderId: record.orderId, path: finalPath };
      }
      return this.fail(record, 0, `cannot reserve ${tempPath}: ${errorMessage(error)}`);
    }

    const attempts = Math.max(1, maxAttempts);
    let lastError = "Unknown download failure";
    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      const stopTimer = metrics.startTimer("download_ms");
      logger.info("download_item_attempt_start", { orderId: record.orderId, url: record.downloadUrl, attempt });

      try {
        const result = await this.downloadAttempt(record.downloadUrl, tempPath);
        const durationMs = stopTimer();

        if (!result.ok) {
          lastError = `HTTP ${result.statusCode}`;
          if (!isRetriableStatus(result.statusCode) || attempt >= attempts) {
            await this.discard(tempPath);
            return this.fail(record, attempt, lastError);
          }
          logger.warn("download_item_retry_http", { orderId: record.orderId, attempt, durationMs, statusCode: result.statusCode });
          await this.sleepFn(backoffDelayMs(attempt));
          continue;
        }

        await fs.promises.rename(tempPath, finalPath);
        this.present.add(record.fileName);
        metrics.incrementCounter("downloads_ok");
        logger.info("download_item_ok", { orderId: record.orderId, attempt, durationMs, bytes: result.bytes });
        return {
          kind: "downloaded",
          orderId: record.orderId,
          path: finalPath,
          bytes: result.bytes,
          sha256: result.sha256,
          attempt,
        };
      } catch (error) {
        const durationMs = stopTimer();
        lastError = errorMessage(error);
        logger.warn("download_item_error", { orderId: record.orderId, attempt, durationMs, error: lastError });
        if (attempt >= attempts) {
          break;
        }
        await this.sleepFn(backoffDelayMs(attempt));
      }
    }

    await this.discard(tempPath);
    return this.fail(record, attempts, lastError);
  }

  private async downloadAttempt(url: string, tempPath: string): Promise<AttemptResult> {
    const { timeoutMs, userAgent, ignoreHttpsErrors } = this.options;
    return requestWithTimeout(
      this.fetchFn,
      url,
      {
        method: "GET",
        headers: {
          "user-agent": userAgent,
          accept: "*/*",
        },
        dispatcher: getFetchDispatcher(ignoreHttpsErrors),
        redirect: "follow",
      },
      timeoutMs,
      async (response): Promise<AttemptResult> => {
        if (!response.ok) {
          await response.body?.cancel();
          return { ok: false, statusCode: response.status };
        }
        if (!response.body) {
          throw new Error("Response has no body");
        }

        const hash = crypto.createHash("sha256");
        let bytes = 0;
        const readable = Readable.fromWeb(response.body);
        readable.on("data", (chunk: Buffer) => {
          hash.update(chunk);
          bytes += chunk.length;
        });

        await pipeline(readable, fs.createWriteStream(tempPath, { flags: "w" }));
        return { ok: true, statusCode: response.status, sha256: hash.digest("hex"), bytes };
      },
    );
  }

  private async removeStaleParts(): Promise<void> {
    const entries = await fs.promises.readdir(this.downloadDir);
    for (const entry of entries) {
      if (entry.endsWith(PART_SUFFIX)) {
        await fs.promises.rm(path.join(this.downloadDir, entry), { force: true });
        this.options.logger.warn("download_stale_part_removed", { path: entry });
      }
    }
  }

  private async discard(tempPath: string): Promise<void> {
    await fs.promises.rm(tempPath, { force: true });
  }

  private fail(record: OrderRecord, attempt: number, reason: string): DownloadOutcome {
    this.options.metrics.incrementCounter("downloads_failed");
    this.options.logger.warn("download_item_failed", { orderId: record.orderId, url: record.downloadUrl, attempt, error: reason });
    return { kind: "failed", orderId: record.orderId, reason, attempt };
  }
}
