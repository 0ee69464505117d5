import { z } from "zod";
import { AuthResolver, ResolvedAuth } from "../auth/resolver";
import { toRequestHeaders } from "../auth/headerSet";
import {
  AuthRejectedError,
  errorMessage,
  NetworkError,
  ReportFormatError,
  ServerError,
} from "../core/errors";
import { backoffDelayMs, defaultFetch, FetchFn, getFetchDispatcher, requestWithTimeout, sleep } from "../core/fetch";
import { Logger, MetricsRegistry } from "../observability";
import { HeaderSet, ReportQuery } from "../types";
import { ORDER_ID_COLUMNS } from "./parser";

const SUCCESS_ENVELOPE = '{"code":0,"msg":"Success","data":null,"success":true}';
const AUTH_REJECTED_MESSAGE = /token invalid|invalid token|not log(ged)? ?in|unauthori[sz]ed|login expired|session expired/i;
const NO_DATA_MESSAGE = /no data to export/i;

const envelopeSchema = z.object({
  code: z.union([z.number(), z.string()]).nullish(),
  msg: z.string().nullish(),
  data: z.string().nullish(),
  success: z.boolean().nullish(),
});

export interface ReportFetcherOptions {
  reportUrl: string;
  timeoutMs: number;
  maxAttempts: number;
  ignoreHttpsErrors: boolean;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
  sleepFn?: (ms: number) => Promise<void>;
}

interface RawReportResponse {
  status: number;
  body: string;
}

/**
 * Turns a 2xx body into CSV text. The export endpoint answers either with
 * CSV directly or with a JSON envelope whose `data` holds the CSV.
 */
export function interpretReportBody(body: string, status = 200): string {
  const trimmed = body.replace(/^\uFEFF/, "").trim();
  if (trimmed.length === 0) {
    return "";
  }

  if (trimmed.startsWith("{")) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      // CSV cannot start with "{", so a broken JSON body is a format problem.
      throw new ReportFormatError("Report API returned malformed JSON");
    }

    const envelope = envelopeSchema.safeParse(parsed);
    if (!envelope.success) {
      throw new ReportFormatError("Report API returned JSON without the expected envelope");
    }

    const { code, msg, data, success } = envelope.data;
    const message = msg ?? "";
    if (success === true && (code === 0 || code === "0")) {
      return (data ?? "").split(SUCCESS_ENVELOPE).join("").trim();
    }
    if (NO_DATA_MESSAGE.test(message)) {
      return "";
    }
    if (AUTH_REJECTED_MESSAGE.test(message) || code === 401 || code === "401") {
      throw new AuthRejectedError(`Report API rejected the auth headers: ${message || "no message"}`);
    }
    throw new ServerError(status, `Report API returned an error: ${message || `code ${String(code)}`}`);
  }

  const csv = trimmed.split(SUCCESS_ENVELOPE).join("").trim();
  const headerLine = csv.split(/\r?\n/, 1)[0].toLowerCase();
  if (!ORDER_ID_COLUMNS.some((column) => headerLine.includes(column))) {
    throw new ReportFormatError("Report API response is neither a JSON envelope nor an order CSV");
  }
  return csv;
}

export class ReportFetcher {
  private readonly options: ReportFetcherOptions;
  private readonly fetchFn: FetchFn;
  private readonly sleepFn: (ms: number) => Promise<void>;

  constructor(options: ReportFetcherOptions) {
    this.options = options;
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.sleepFn = options.sleepFn ?? sleep;
  }

  async fetch(headers: HeaderSet, query: ReportQuery): Promise<string> {
    const { logger, metrics } = this.options;
    const stopTimer = metrics.startTimer("report_fetch_ms");
    const response = await this.requestWithRetry(headers, query);
    const durationMs = stopTimer();

    if (response.status === 401 || response.status === 403) {
      logger.warn("report_fetch_auth_rejected", { statusCode: response.status, durationMs });
      throw new AuthRejectedError(`Report API answered HTTP ${response.status}`);
    }
    if (response.status < 200 || response.status >= 300) {
      logger.error("report_fetch_server_error", { statusCode: response.status, durationMs });
      throw new ServerError(response.status, `Report API answered HTTP ${response.status}`);
    }

    const csv = interpretReportBody(response.body, response.status);
    metrics.incrementCounter("reports_fetched");
    logger.info("report_fetch_ok", { bytes: csv.length, durationMs, ...query });
    return csv;
  }

  private async requestWithRetry(headers: HeaderSet, query: ReportQuery): Promise<RawReportResponse> {
    const { reportUrl, timeoutMs, maxAttempts, ignoreHttpsErrors, logger } = this.options;
    const attempts = Math.max(1, maxAttempts);

    for (let attempt = 1; ; attempt += 1) {
      try {
        return await requestWithTimeout(
          this.fetchFn,
          reportUrl,
          {
            method: "POST",
            headers: toRequestHeaders(headers),
            body: JSON.stringify(query),
            dispatcher: getFetchDispatcher(ignoreHttpsErrors),
          },
          timeoutMs,
          async (response) => ({ status: response.status, body: await response.text() }),
        );
      } catch (error) {
        const message = errorMessage(error);
        if (attempt >= attempts) {
          logger.error("report_fetch_network_failed", { url: reportUrl, attempt, error: message });
          throw new NetworkError(`Report request failed after ${attempt} attempts: ${message}`, { cause: error });
        }
        const delayMs = backoffDelayMs(attempt);
        logger.warn("report_fetch_retry", { url: reportUrl, attempt, delayMs, error: message });
        await this.sleepFn(delayMs);
      }
    }
  }
}

export interface ReauthFetchDeps {
  resolver: AuthResolver;
  fetcher: ReportFetcher;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface ReauthFetchResult {
  csv: string;
  auth: ResolvedAuth;
  resolutions: ResolvedAuth[];
}

/**
 * Fetches the report, re-resolving auth with forced extraction exactly once
 * when the server rejects headers that looked valid locally.
 */
export async function fetchReportWithReauth(
  deps: ReauthFetchDeps,
  query: ReportQuery,
  forceRefresh = false,
): Promise<ReauthFetchResult> {
  const { resolver, fetcher, logger, metrics } = deps;
  const first = await resolver.resolve({ forceRefresh });
  const resolutions = [first];

  try {
    const csv = await fetcher.fetch(first.headers, query);
    return { csv, auth: first, resolutions };
  } catch (error) {
    if (!(error instanceof AuthRejectedError)) {
      throw error;
    }
    metrics.incrementCounter("auth_rejections");
    if (first.source === "manual") {
      logger.error("report_manual_token_rejected", { stage: "fetch" });
      throw new AuthRejectedError(`${error.message}; the configured AUTH_TOKEN is no longer accepted`);
    }
    logger.warn("report_auth_rejected_reresolving", { source: first.source });
  }

  await resolver.invalidate();
  const second = await resolver.resolve({ forceRefresh: true });
  resolutions.push(second);
  try {
    const csv = await fetcher.fetch(second.headers, query);
    return { csv, auth: second, resolutions };
  } catch (error) {
    if (error instanceof AuthRejectedError) {
      // Never leave refused headers in the cache.
      await resolver.invalidate();
      logger.error("report_reauth_rejected", { stage: "fetch", source: second.source });
    }
    throw error;
  }
}
