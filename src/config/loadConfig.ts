import fs from "node:fs";
import path from "node:path";
import { AppConfig, ConfigOverrides } from "./types";

const MANUAL_TOKEN_PLACEHOLDER = "YOUR_AUTH_TOKEN_HERE";

const DEFAULT_CONFIG: AppConfig = {
  credentials: {},
  manualToken: undefined,
  loginUrl: "https://aff.dhgate.com/affiliateCenter/affiliateOrders",
  reportUrl: "https://aff.dhgate.com/api/affiliate/order/exportOrders",
  authRequestMarker: "/api/affiliate/",
  requiredHeaders: ["authorization"],
  userAgent:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
  ignoreHttpsErrors: false,
  headless: true,
  browserChannel: undefined,
  browserExecutablePath: undefined,
  forceRefresh: false,
  headerCachePath: "data/headers_cache.json",
  headerCacheTtlHours: 24,
  requestTimeoutMs: 30_000,
  networkIdleTimeoutMs: 30_000,
  downloadTimeoutMs: 120_000,
  maxFetchAttempts: 3,
  maxDownloadAttempts: 3,
  downloadConcurrency: 1,
  lookbackDays: 7,
  downloadUrlTemplate: undefined,
  logLevel: "info",
  sinkType: "local_jsonl",
  outputDirs: {
    downloads: "downloads",
    manifests: "data/manifests",
  },
  storePath: "data/orders.sqlite",
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed = JSON.parse(raw) as ConfigOverrides;
  return parsed ?? {};
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  const items = value
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

function toLogLevel(value: string | undefined, fallback: AppConfig["logLevel"]): AppConfig["logLevel"] {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return fallback;
}

export function normalizeManualToken(token: string | undefined): string | undefined {
  const trimmed = token?.trim();
  if (!trimmed || trimmed === MANUAL_TOKEN_PLACEHOLDER) {
    return undefined;
  }
  return trimmed;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    credentials: {
      ...DEFAULT_CONFIG.credentials,
      ...(fileConfig.credentials ?? {}),
    },
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
  };

  return {
    ...merged,
    credentials: {
      username: env.PORTAL_USERNAME ?? merged.credentials.username,
      password: env.PORTAL_PASSWORD ?? merged.credentials.password,
    },
    manualToken: normalizeManualToken(env.AUTH_TOKEN ?? merged.manualToken),
    loginUrl: env.LOGIN_URL ?? merged.loginUrl,
    reportUrl: env.REPORT_URL ?? merged.reportUrl,
    authRequestMarker: env.AUTH_REQUEST_MARKER ?? merged.authRequestMarker,
    requiredHeaders: toList(env.REQUIRED_HEADERS, merged.requiredHeaders.map((name) => name.toLowerCase())),
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    headless: toBool(env.HEADLESS, merged.headless),
    browserChannel: env.BROWSER_CHANNEL ?? merged.browserChannel,
    browserExecutablePath: env.BROWSER_EXECUTABLE_PATH ?? merged.browserExecutablePath,
    forceRefresh: toBool(env.FORCE_REFRESH, merged.forceRefresh),
    headerCachePath: env.HEADER_CACHE_PATH ?? merged.headerCachePath,
    headerCacheTtlHours: toInt(env.HEADER_CACHE_TTL_HOURS, merged.headerCacheTtlHours),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    networkIdleTimeoutMs: toInt(env.NETWORK_IDLE_TIMEOUT_MS, merged.networkIdleTimeoutMs),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    maxFetchAttempts: toInt(env.MAX_FETCH_ATTEMPTS, merged.maxFetchAttempts),
    maxDownloadAttempts: toInt(env.MAX_DOWNLOAD_ATTEMPTS, merged.maxDownloadAttempts),
    downloadConcurrency: toInt(env.DOWNLOAD_CONCURRENCY, merged.downloadConcurrency),
    lookbackDays: toInt(env.LOOKBACK_DAYS, merged.lookbackDays),
    downloadUrlTemplate: env.DOWNLOAD_URL_TEMPLATE ?? merged.downloadUrlTemplate,
    logLevel: toLogLevel(env.LOG_LEVEL, merged.logLevel),
    sinkType: env.SINK_TYPE === "none" || env.SINK_TYPE === "local_jsonl" ? env.SINK_TYPE : merged.sinkType,
    storePath: env.STORE_PATH ?? merged.storePath,
    outputDirs: {
      downloads: env.DOWNLOAD_DIR ?? merged.outputDirs.downloads,
      manifests: env.OUTPUT_MANIFESTS_DIR ?? merged.outputDirs.manifests,
    },
  };
}

export { DEFAULT_CONFIG };
