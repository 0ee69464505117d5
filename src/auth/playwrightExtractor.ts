import { chromium, errors, Page, Request } from "playwright-core";
import { errorMessage, ExtractionTimeoutError, LoginFailedError } from "../core/errors";
import { Logger, MetricsRegistry } from "../observability";
import { HeaderSet } from "../types";
import { manualHeaderSet } from "./headerSet";
import {
  buildCapturedHeaderSet,
  cookieMap,
  findStoredToken,
  isAuthBearingRequest,
  LoginCredentials,
  SessionExtractor,
  STORAGE_SNAPSHOT_SCRIPT,
  storageSnapshotSchema,
} from "./sessionExtractor";

const USERNAME_SELECTOR = 'input[placeholder*="Email" i], input[type="email"], input[name="username"]';
const PASSWORD_SELECTOR = 'input[placeholder*="password" i], input[type="password"]';
const SUBMIT_SELECTORS = [
  'button[type="submit"]',
  'input[type="submit"]',
  ".login-btn",
  ".btn-login",
  'button:has-text("Login")',
  'button:has-text("Sign In")',
];
const LOGIN_ERROR_SELECTOR = ".login-error, .error-msg, .el-message--error, .el-form-item__error";
const LOGIN_FORM_WAIT_MS = 10_000;

export interface PlaywrightExtractorOptions {
  loginUrl: string;
  authRequestMarker: string;
  requiredHeaders: readonly string[];
  userAgent: string;
  headless: boolean;
  channel?: string;
  executablePath?: string;
  logger: Logger;
  metrics: MetricsRegistry;
}

type CaptureOutcome =
  | { kind: "request"; request: Request }
  | { kind: "login_error"; text: string }
  | { kind: "error"; error: unknown };

export class PlaywrightSessionExtractor implements SessionExtractor {
  private readonly options: PlaywrightExtractorOptions;

  constructor(options: PlaywrightExtractorOptions) {
    this.options = options;
  }

  async extract(credentials: LoginCredentials, timeoutMs: number): Promise<HeaderSet> {
    const { logger, metrics } = this.options;
    const stopTimer = metrics.startTimer("extract_ms");
    try {
      return await this.login(credentials, timeoutMs);
    } finally {
      logger.info("extract_finished", { durationMs: stopTimer() });
    }
  }

  private async login(credentials: LoginCredentials, timeoutMs: number): Promise<HeaderSet> {
    const { logger } = this.options;
    logger.info("extract_browser_launch", { headless: this.options.headless, loginUrl: this.options.loginUrl });

    const browser = await chromium.launch({
      headless: this.options.headless,
      channel: this.options.channel,
      executablePath: this.options.executablePath,
      args: ["--no-sandbox", "--disable-dev-shm-usage", "--disable-blink-features=AutomationControlled"],
    });

    try {
      const context = await browser.newContext({
        userAgent: this.options.userAgent,
        viewport: { width: 1280, height: 800 },
      });
      const page = await context.newPage();

      // Watchers are armed before navigation so no matching request is missed.
      const outcome = this.watchForOutcome(page, timeoutMs);

      try {
        await page.goto(this.options.loginUrl, { waitUntil: "domcontentloaded", timeout: timeoutMs });
      } catch (error) {
        throw this.classify(error, timeoutMs, "login page could not be loaded");
      }
      try {
        await this.submitLoginForm(page, credentials);
      } catch (error) {
        throw this.classify(error, timeoutMs, "login form could not be submitted");
      }

      const result = await outcome;
      if (result.kind === "login_error") {
        throw new LoginFailedError(`Login rejected by portal: ${result.text || "error indicator shown"}`);
      }
      if (result.kind === "error") {
        if (result.error instanceof errors.TimeoutError) {
          const token = await this.readStoredToken(page);
          if (token) {
            const cookies = await context.cookies();
            logger.info("extract_token_from_storage", { url: page.url(), cookieCount: cookies.length });
            return { ...manualHeaderSet(token, this.options.userAgent, new Date()), cookies: cookieMap(cookies) };
          }
        }
        throw this.classify(result.error, timeoutMs, "network observation failed");
      }

      const requestHeaders = await result.request.allHeaders();
      const cookies = await context.cookies();
      const headerSet = buildCapturedHeaderSet(requestHeaders, cookies, new Date());
      logger.info("extract_headers_captured", {
        url: result.request.url(),
        headerNames: Object.keys(headerSet.headers),
        cookieCount: cookies.length,
      });
      return headerSet;
    } finally {
      await browser.close();
    }
  }

  private async readStoredToken(page: Page): Promise<string | undefined> {
    const { logger } = this.options;
    let raw: unknown;
    try {
      raw = await page.evaluate<unknown>(STORAGE_SNAPSHOT_SCRIPT);
    } catch (error) {
      logger.warn("extract_storage_unreadable", { error: errorMessage(error) });
      return undefined;
    }

    const snapshot = storageSnapshotSchema.safeParse(raw);
    if (!snapshot.success) {
      logger.warn("extract_storage_unexpected_shape", { error: snapshot.error.issues[0]?.message ?? "invalid" });
      return undefined;
    }
    return findStoredToken(snapshot.data);
  }

  private watchForOutcome(page: Page, timeoutMs: number): Promise<CaptureOutcome> {
    const { authRequestMarker, requiredHeaders } = this.options;

    const authRequest = page
      .waitForRequest((request) => isAuthBearingRequest(request.url(), request.headers(), authRequestMarker, requiredHeaders), {
        timeout: timeoutMs,
      })
      .then((request): CaptureOutcome => ({ kind: "request", request }));

    // An indicator that never appears must not end the race early.
    const loginError = page
      .locator(LOGIN_ERROR_SELECTOR)
      .first()
      .waitFor({ state: "visible", timeout: timeoutMs })
      .then(
        async (): Promise<CaptureOutcome> => ({
          kind: "login_error",
          text: ((await page.locator(LOGIN_ERROR_SELECTOR).first().textContent()) ?? "").trim(),
        }),
        () => new Promise<CaptureOutcome>(() => undefined),
      );

    return Promise.race([authRequest, loginError]).then(
      (value) => value,
      (error: unknown): CaptureOutcome => ({ kind: "error", error }),
    );
  }

  private async submitLoginForm(page: Page, credentials: LoginCredentials): Promise<void> {
    const { logger } = this.options;
    const usernameInput = page.locator(USERNAME_SELECTOR).first();
    try {
      await usernameInput.waitFor({ state: "visible", timeout: LOGIN_FORM_WAIT_MS });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        logger.info("extract_login_form_absent", { url: page.url() });
        return;
      }
      throw error;
    }

    await usernameInput.fill(credentials.username);
    await page.locator(PASSWORD_SELECTOR).first().fill(credentials.password);

    for (const selector of SUBMIT_SELECTORS) {
      const button = page.locator(selector).first();
      if ((await button.count()) > 0 && (await button.isVisible())) {
        await button.click();
        logger.info("extract_login_submitted", { selector });
        return;
      }
    }

    await page.locator(PASSWORD_SELECTOR).first().press("Enter");
    logger.info("extract_login_submitted", { selector: "enter_key" });
  }

  private classify(error: unknown, timeoutMs: number, context: string): Error {
    if (error instanceof ExtractionTimeoutError || error instanceof LoginFailedError) {
      return error;
    }
    if (error instanceof errors.TimeoutError) {
      return new ExtractionTimeoutError(timeoutMs, { cause: error });
    }
    return new LoginFailedError(`${context}: ${errorMessage(error)}`, { cause: error });
  }
}
