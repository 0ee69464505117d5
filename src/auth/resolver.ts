import { Credentials } from "../config";
import { errorMessage, IncompleteHeaderSetError, LoginFailedError } from "../core/errors";
import { Logger, MetricsRegistry } from "../observability";
import { AuthSource, HeaderSet } from "../types";
import { HeaderStore } from "./headerCache";
import { manualHeaderSet, missingHeaders } from "./headerSet";
import { SessionExtractor } from "./sessionExtractor";

export type ResolverState = "ManualOverride" | "CacheHit" | "Extracting" | "Resolved" | "Failed";

export interface ResolvedAuth {
  headers: HeaderSet;
  source: AuthSource;
  transitions: ResolverState[];
}

export interface ResolveOptions {
  forceRefresh?: boolean;
}

export interface AuthResolverDeps {
  cache: HeaderStore;
  extractor: SessionExtractor;
  credentials: Credentials;
  manualToken?: string;
  userAgent: string;
  requiredHeaders: readonly string[];
  extractionTimeoutMs: number;
  logger: Logger;
  metrics: MetricsRegistry;
  now?: () => Date;
}

/**
 * Produces the header set for a run. Order of precedence: a manual token,
 * then a fresh cache entry, then a browser extraction whose result is cached.
 * Extraction failures are terminal; there is no automatic retry.
 */
export class AuthResolver {
  private readonly deps: AuthResolverDeps;
  private readonly now: () => Date;

  constructor(deps: AuthResolverDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
  }

  async resolve(options: ResolveOptions = {}): Promise<ResolvedAuth> {
    const { cache, logger, metrics, manualToken, requiredHeaders } = this.deps;
    const transitions: ResolverState[] = [];
    const enter = (state: ResolverState): void => {
      transitions.push(state);
      logger.debug("auth_state", { state });
    };

    if (manualToken) {
      enter("ManualOverride");
      const headers = manualHeaderSet(manualToken, this.deps.userAgent, this.now());
      const missing = missingHeaders(headers, requiredHeaders);
      if (missing.length > 0) {
        enter("Failed");
        throw new IncompleteHeaderSetError(missing);
      }
      enter("Resolved");
      metrics.incrementCounter("auth_manual");
      logger.info("auth_resolved", { source: "manual" });
      return { headers, source: "manual", transitions };
    }

    if (options.forceRefresh) {
      logger.info("auth_force_refresh");
      await cache.invalidate();
    } else {
      const cached = await cache.load();
      if (cached) {
        enter("CacheHit");
        enter("Resolved");
        metrics.incrementCounter("auth_cache_hits");
        logger.info("auth_resolved", { source: "cache", capturedAt: cached.capturedAt });
        return { headers: cached, source: "cache", transitions };
      }
    }

    enter("Extracting");
    let headers: HeaderSet;
    try {
      headers = await this.extract();
    } catch (error) {
      enter("Failed");
      logger.error("auth_failed", { stage: "auth", error: errorMessage(error) });
      throw error;
    }

    try {
      await cache.save(headers);
    } catch (error) {
      logger.warn("header_cache_save_failed", { error: errorMessage(error) });
    }

    enter("Resolved");
    metrics.incrementCounter("auth_extractions");
    logger.info("auth_resolved", { source: "extraction", capturedAt: headers.capturedAt });
    return { headers, source: "extraction", transitions };
  }

  async invalidate(): Promise<void> {
    await this.deps.cache.invalidate();
  }

  private async extract(): Promise<HeaderSet> {
    const { credentials, extractor, extractionTimeoutMs, requiredHeaders, logger } = this.deps;
    if (!credentials.username || !credentials.password) {
      throw new LoginFailedError("PORTAL_USERNAME and PORTAL_PASSWORD must be set to extract a session");
    }

    logger.info("auth_extract_start", { timeoutMs: extractionTimeoutMs });
    const headers = await extractor.extract(
      { username: credentials.username, password: credentials.password },
      extractionTimeoutMs,
    );

    const missing = missingHeaders(headers, requiredHeaders);
    if (missing.length > 0) {
      throw new IncompleteHeaderSetError(missing);
    }
    return headers;
  }
}
