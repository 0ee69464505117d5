import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { CacheCorruptError, errorMessage, IncompleteHeaderSetError, isErrnoCode } from "../core/errors";
import { writeFileAtomic } from "../core/files";
import { Logger } from "../observability";
import { HeaderSet } from "../types";
import { missingHeaders } from "./headerSet";

const CACHE_VERSION = 1;

const cacheRecordSchema = z.object({
  version: z.literal(CACHE_VERSION),
  capturedAt: z.string().refine((value) => !Number.isNaN(Date.parse(value)), "capturedAt must be an ISO timestamp"),
  headers: z.record(z.string()),
  cookies: z.record(z.string()),
});

type CacheRecord = z.infer<typeof cacheRecordSchema>;

/** Single-slot store for the auth material of one installation. */
export interface HeaderStore {
  load(): Promise<HeaderSet | undefined>;
  save(set: HeaderSet): Promise<void>;
  invalidate(): Promise<void>;
}

export interface FileHeaderCacheOptions {
  filePath: string;
  ttlMs: number;
  requiredHeaders: readonly string[];
  logger: Logger;
  now?: () => Date;
}

export class FileHeaderCache implements HeaderStore {
  private readonly filePath: string;
  private readonly ttlMs: number;
  private readonly requiredHeaders: readonly string[];
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: FileHeaderCacheOptions) {
    this.filePath = path.resolve(options.filePath);
    this.ttlMs = options.ttlMs;
    this.requiredHeaders = options.requiredHeaders;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  async load(): Promise<HeaderSet | undefined> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isErrnoCode(error, "ENOENT")) {
        this.logger.info("header_cache_absent", { path: this.filePath });
      } else {
        this.logger.warn("header_cache_unreadable", { path: this.filePath, error: errorMessage(error) });
      }
      return undefined;
    }

    let record: CacheRecord;
    try {
      record = this.decode(raw);
    } catch (error) {
      this.logger.warn("header_cache_corrupt", { path: this.filePath, error: errorMessage(error) });
      return undefined;
    }

    const ageMs = this.now().getTime() - Date.parse(record.capturedAt);
    if (ageMs > this.ttlMs) {
      this.logger.info("header_cache_expired", { path: this.filePath, capturedAt: record.capturedAt, ageMs });
      return undefined;
    }

    this.logger.info("header_cache_hit", { path: this.filePath, capturedAt: record.capturedAt });
    return {
      headers: record.headers,
      cookies: record.cookies,
      capturedAt: record.capturedAt,
    };
  }

  async save(set: HeaderSet): Promise<void> {
    const missing = missingHeaders(set, this.requiredHeaders);
    if (missing.length > 0) {
      throw new IncompleteHeaderSetError(missing);
    }

    const record: CacheRecord = {
      version: CACHE_VERSION,
      capturedAt: set.capturedAt,
      headers: set.headers,
      cookies: set.cookies,
    };

    await writeFileAtomic(this.filePath, `${JSON.stringify(record, null, 2)}\n`);
    this.logger.info("header_cache_saved", { path: this.filePath, capturedAt: set.capturedAt });
  }

  async invalidate(): Promise<void> {
    await fs.promises.rm(this.filePath, { force: true });
    this.logger.info("header_cache_invalidated", { path: this.filePath });
  }

  private decode(raw: string): CacheRecord {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new CacheCorruptError("header cache is not valid JSON", { cause: error });
    }

    const result = cacheRecordSchema.safeParse(parsed);
    if (!result.success) {
      throw new CacheCorruptError(`header cache has unexpected shape: ${result.error.issues[0]?.message ?? "invalid"}`);
    }

    const missing = missingHeaders(
      { headers: result.data.headers, cookies: result.data.cookies, capturedAt: result.data.capturedAt },
      this.requiredHeaders,
    );
    if (missing.length > 0) {
      throw new CacheCorruptError(`header cache is missing required headers: ${missing.join(", ")}`);
    }

    return result.data;
  }
}
