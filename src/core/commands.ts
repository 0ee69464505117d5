import fs from "node:fs";
import path from "node:path";
import { AuthResolver, ResolvedAuth } from "../auth/resolver";
import { HeaderStore } from "../auth/headerCache";
import { SessionExtractor } from "../auth/sessionExtractor";
import { AppConfig } from "../config";
import { DownloadManager } from "../download";
import { Logger, MetricsRegistry } from "../observability";
import { fetchReportWithReauth, ReportFetcher } from "../report/fetcher";
import { OrderReport, ParsedReport } from "../report/parser";
import { buildReportQuery, ReportWindow } from "../report/query";
import { Sink } from "../sink";
import { OrderStore, StoreStats } from "../store";
import { DownloadSummary, RunSummary } from "../types";
import { errorMessage, isErrnoCode } from "./errors";
import { FetchFn } from "./fetch";
import { writeFileAtomic } from "./files";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: OrderStore;
  sink: Sink;
  logger: Logger;
  metrics: MetricsRegistry;
  headerCache: HeaderStore;
  extractor: SessionExtractor;
  fetchFn?: FetchFn;
  sleepFn?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface RunOptions {
  forceRefresh?: boolean;
  window?: ReportWindow;
}

function currentTime(ctx: CommandContext): Date {
  return ctx.now ? ctx.now() : new Date();
}

export function createAuthResolver(ctx: CommandContext): AuthResolver {
  return new AuthResolver({
    cache: ctx.headerCache,
    extractor: ctx.extractor,
    credentials: ctx.config.credentials,
    manualToken: ctx.config.manualToken,
    userAgent: ctx.config.userAgent,
    requiredHeaders: ctx.config.requiredHeaders,
    extractionTimeoutMs: ctx.config.networkIdleTimeoutMs,
    logger: ctx.logger.child("auth"),
    metrics: ctx.metrics,
    now: ctx.now,
  });
}

export function createReportFetcher(ctx: CommandContext): ReportFetcher {
  return new ReportFetcher({
    reportUrl: ctx.config.reportUrl,
    timeoutMs: ctx.config.requestTimeoutMs,
    maxAttempts: ctx.config.maxFetchAttempts,
    ignoreHttpsErrors: ctx.config.ignoreHttpsErrors,
    logger: ctx.logger.child("report"),
    metrics: ctx.metrics,
    fetchFn: ctx.fetchFn,
    sleepFn: ctx.sleepFn,
  });
}

export function createDownloadManager(ctx: CommandContext): DownloadManager {
  return new DownloadManager({
    downloadDir: ctx.config.outputDirs.downloads,
    timeoutMs: ctx.config.downloadTimeoutMs,
    maxAttempts: ctx.config.maxDownloadAttempts,
    concurrency: ctx.config.downloadConcurrency,
    userAgent: ctx.config.userAgent,
    ignoreHttpsErrors: ctx.config.ignoreHttpsErrors,
    logger: ctx.logger.child("download"),
    metrics: ctx.metrics,
    fetchFn: ctx.fetchFn,
    sleepFn: ctx.sleepFn,
  });
}

export async function runAuth(ctx: CommandContext, forceRefresh = false): Promise<ResolvedAuth> {
  ctx.logger.info("auth_start", { forceRefresh });
  const resolved = await createAuthResolver(ctx).resolve({ forceRefresh });
  ctx.logger.info("auth_complete", {
    source: resolved.source,
    capturedAt: resolved.headers.capturedAt,
    headerNames: Object.keys(resolved.headers.headers),
  });
  return resolved;
}

async function persistDownloads(ctx: CommandContext, summary: DownloadSummary): Promise<void> {
  const at = currentTime(ctx).toISOString();
  for (const outcome of summary.outcomes) {
    await ctx.store.markDownloadOutcome(outcome, at);
  }
  await ctx.sink.publishDownloadOutcomes(summary.outcomes);
}

const REPORT_ARCHIVE = /^report_.*\.csv$/;

async function newestReportArchive(downloadDir: string): Promise<string | undefined> {
  let entries: string[];
  try {
    entries = await fs.promises.readdir(downloadDir);
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      return undefined;
    }
    throw error;
  }

  let newest: { filePath: string; mtimeMs: number } | undefined;
  for (const entry of entries.filter((name) => REPORT_ARCHIVE.test(name))) {
    const filePath = path.join(downloadDir, entry);
    const { mtimeMs } = await fs.promises.stat(filePath);
    if (!newest || mtimeMs > newest.mtimeMs) {
      newest = { filePath, mtimeMs };
    }
  }
  return newest?.filePath;
}

/**
 * Seeds an empty order store from the newest archived report in the download
 * directory. Returns the number of orders imported.
 */
export async function importArchivedReport(ctx: CommandContext): Promise<number> {
  const stats = await ctx.store.getStats();
  if (stats.totalOrders > 0) {
    ctx.logger.debug("archive_import_skipped", { totalOrders: stats.totalOrders });
    return 0;
  }

  const archivePath = await newestReportArchive(path.resolve(ctx.config.outputDirs.downloads));
  if (!archivePath) {
    ctx.logger.info("archive_import_none_found");
    return 0;
  }

  let report: ParsedReport;
  try {
    const csv = await fs.promises.readFile(archivePath, "utf-8");
    report = await new OrderReport(csv, { downloadUrlTemplate: ctx.config.downloadUrlTemplate }).collect();
  } catch (error) {
    ctx.logger.warn("archive_import_failed", { path: archivePath, error: errorMessage(error) });
    return 0;
  }

  await ctx.store.upsertOrders(report.records, currentTime(ctx).toISOString());
  ctx.logger.info("archive_imported", { path: archivePath, rows: report.records.length, droppedRows: report.droppedRows });
  return report.records.length;
}

export async function runPipeline(ctx: CommandContext, options: RunOptions = {}): Promise<RunSummary> {
  const startedAt = currentTime(ctx);
  await ctx.store.startRun(ctx.runId, startedAt.toISOString());
  const forceRefresh = options.forceRefresh ?? ctx.config.forceRefresh;

  try {
    const query = buildReportQuery(startedAt, ctx.config.lookbackDays, options.window);
    ctx.logger.info("pipeline_start", { forceRefresh, beginDate: query.beginDate, endDate: query.endDate });
    await importArchivedReport(ctx);

    const { csv, auth, resolutions } = await fetchReportWithReauth(
      {
        resolver: createAuthResolver(ctx),
        fetcher: createReportFetcher(ctx),
        logger: ctx.logger.child("report"),
        metrics: ctx.metrics,
      },
      query,
      forceRefresh,
    );

    if (csv.length > 0) {
      const archivePath = path.resolve(ctx.config.outputDirs.downloads, `report_${query.beginDate}_${query.endDate}.csv`);
      await writeFileAtomic(archivePath, `${csv}\n`);
      ctx.logger.info("report_archived", { path: archivePath });
    }

    const report = await new OrderReport(csv, { downloadUrlTemplate: ctx.config.downloadUrlTemplate }).collect();
    ctx.logger.info("report_parsed", { rows: report.records.length, droppedRows: report.droppedRows });
    for (const dropped of report.dropped) {
      ctx.logger.warn("report_row_dropped", { row: dropped.row, reason: dropped.reason });
    }
    await ctx.store.upsertOrders(report.records, currentTime(ctx).toISOString());

    const downloads = await createDownloadManager(ctx).run(report.records);
    await persistDownloads(ctx, downloads);

    const summary: RunSummary = {
      authSource: auth.source,
      resolvedFromCache: resolutions.filter((item) => item.source === "cache").length,
      resolvedFromExtraction: resolutions.filter((item) => item.source === "extraction").length,
      resolvedFromManual: resolutions.filter((item) => item.source === "manual").length,
      rows: report.records.length,
      droppedRows: report.droppedRows,
      downloaded: downloads.downloaded,
      skipped: downloads.skipped,
      failed: downloads.failed,
    };

    await ctx.sink.publishRunSummary(summary);
    await ctx.store.finishRun(ctx.runId, "completed", currentTime(ctx).toISOString(), summary);
    ctx.logger.info("pipeline_complete", { ...summary });
    return summary;
  } catch (error) {
    await ctx.store.finishRun(ctx.runId, "failed", currentTime(ctx).toISOString());
    throw error;
  }
}

export async function runDownloadPending(ctx: CommandContext, limit = 500): Promise<DownloadSummary> {
  await importArchivedReport(ctx);
  const pending = await ctx.store.listPendingDownloads(limit);
  ctx.logger.info("download_pending_start", { pending: pending.length });
  const summary = await createDownloadManager(ctx).run(pending);
  await persistDownloads(ctx, summary);
  ctx.logger.info("download_pending_complete", {
    downloaded: summary.downloaded,
    skipped: summary.skipped,
    failed: summary.failed,
  });
  return summary;
}

export async function runStatus(ctx: CommandContext): Promise<StoreStats> {
  ctx.logger.info("status_start");
  const stats = await ctx.store.getStats();
  ctx.logger.info("status_complete", { stats });
  return stats;
}

export async function runClearCache(ctx: CommandContext): Promise<void> {
  await ctx.headerCache.invalidate();
  ctx.logger.info("clear_cache_complete");
}
