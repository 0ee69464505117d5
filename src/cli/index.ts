import path from "node:path";
import { FileHeaderCache, PlaywrightSessionExtractor } from "../auth";
import { AppConfig, loadConfig } from "../config";
import { CommandContext, runAuth, runClearCache, runDownloadPending, runPipeline, runStatus } from "../core/commands";
import { describeFailure, PipelineError } from "../core/errors";
import { isIsoDate } from "../report/query";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";
import { createStore } from "../store";

export type CommandName = "run" | "auth" | "download" | "status" | "clear-cache";

export interface ParsedCliArgs {
  command: CommandName;
  forceRefresh: boolean;
  headless?: boolean;
  ignoreHttpsErrors: boolean;
  beginDate?: string;
  endDate?: string;
  downloadDir?: string;
  username?: string;
  password?: string;
  maxOrders?: number;
  configPath?: string;
}

const HELP_TEXT = `
Usage:
  affiliate-report-fetcher <command> [options]

Commands:
  run          Resolve auth, fetch the order report, download referenced files
  auth         Resolve auth only and report where the headers came from
  download     Retry downloads for stored orders that have not completed
  status       Print order store statistics
  clear-cache  Remove the cached auth headers

Options:
  --config <path>        Optional path to JSON config file
  --force-refresh        Ignore cached headers and log in again
  --headless             Run the browser headless
  --headed               Run the browser with a visible window
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  --begin-date <date>    Report window start (YYYY-MM-DD)
  --end-date <date>      Report window end (YYYY-MM-DD)
  --download-dir <path>  Directory for downloaded files
  --username <user>      Portal username (overrides PORTAL_USERNAME)
  --password <pass>      Portal password (overrides PORTAL_PASSWORD)
  --max-orders <n>       Limit orders handled by the download command
  -h, --help             Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (!raw) {
    return undefined;
  }

  if (raw === "run" || raw === "auth" || raw === "download" || raw === "status" || raw === "clear-cache") {
    return raw;
  }

  return undefined;
}

function optionValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  return value && !value.startsWith("--") ? value : undefined;
}

function dateOption(argv: string[], flag: string): string | undefined {
  const value = optionValue(argv, flag);
  if (value !== undefined && !isIsoDate(value)) {
    throw new Error(`${flag} expects YYYY-MM-DD, got "${value}"`);
  }
  return value;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const maxOrdersRaw = optionValue(argv, "--max-orders");
  const maxOrdersParsed = maxOrdersRaw ? Number.parseInt(maxOrdersRaw, 10) : undefined;
  let headless: boolean | undefined;
  if (argv.includes("--headless")) {
    headless = true;
  } else if (argv.includes("--headed")) {
    headless = false;
  }

  return {
    command,
    forceRefresh: argv.includes("--force-refresh"),
    headless,
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    beginDate: dateOption(argv, "--begin-date"),
    endDate: dateOption(argv, "--end-date"),
    downloadDir: optionValue(argv, "--download-dir"),
    username: optionValue(argv, "--username"),
    password: optionValue(argv, "--password"),
    maxOrders: Number.isFinite(maxOrdersParsed) ? maxOrdersParsed : undefined,
    configPath: optionValue(argv, "--config"),
  };
}

export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    credentials: {
      username: parsed.username ?? config.credentials.username,
      password: parsed.password ?? config.credentials.password,
    },
    headless: parsed.headless ?? config.headless,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
    forceRefresh: parsed.forceRefresh || config.forceRefresh,
    outputDirs: {
      ...config.outputDirs,
      downloads: parsed.downloadDir ?? config.outputDirs.downloads,
    },
  };
}

function createContext(config: AppConfig, runId: string, logger: Logger, metrics: MetricsRegistry): CommandContext {
  return {
    runId,
    config,
    store: createStore(config),
    sink: createSink(config, runId),
    logger,
    metrics,
    headerCache: new FileHeaderCache({
      filePath: path.resolve(config.headerCachePath),
      ttlMs: config.headerCacheTtlHours * 60 * 60 * 1000,
      requiredHeaders: config.requiredHeaders,
      logger: logger.child("header_cache"),
    }),
    extractor: new PlaywrightSessionExtractor({
      loginUrl: config.loginUrl,
      authRequestMarker: config.authRequestMarker,
      requiredHeaders: config.requiredHeaders,
      userAgent: config.userAgent,
      headless: config.headless,
      channel: config.browserChannel,
      executablePath: config.browserExecutablePath,
      logger: logger.child("extractor"),
      metrics,
    }),
  };
}

export async function runCli(argv: string[]): Promise<number> {
  let parsed: ParsedCliArgs | "help";
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    return 2;
  }
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = applyCliOverrides(loadConfig(parsed.configPath), parsed);
  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });
  const context = createContext(config, runId, logger, metrics);

  logger.info("command_start", {
    command: parsed.command,
    forceRefresh: config.forceRefresh,
    headless: config.headless,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    downloadDir: config.outputDirs.downloads,
  });

  try {
    switch (parsed.command) {
      case "run":
        await runPipeline(
          { ...context, logger: logger.child("pipeline") },
          { forceRefresh: config.forceRefresh, window: { beginDate: parsed.beginDate, endDate: parsed.endDate } },
        );
        break;
      case "auth":
        await runAuth({ ...context, logger: logger.child("auth") }, config.forceRefresh);
        break;
      case "download":
        await runDownloadPending({ ...context, logger: logger.child("download") }, parsed.maxOrders);
        break;
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
      case "clear-cache":
        await runClearCache({ ...context, logger: logger.child("clear_cache") });
        break;
      default:
        console.error(`Unsupported command: ${String(parsed.command)}`);
        return 1;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } catch (error) {
    logger.error("command_failed", {
      command: parsed.command,
      stage: error instanceof PipelineError ? error.stage : undefined,
      code: error instanceof PipelineError ? error.code : undefined,
    });
    console.error(`fatal: ${describeFailure(error)}`);
    return 1;
  } finally {
    await context.store.close();
    metrics.logSummary(logger.child("metrics"));
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
