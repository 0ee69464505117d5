import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { RequestInit, Response } from "undici";
import { HeaderStore } from "../../src/auth/headerCache";
import { LoginCredentials, SessionExtractor } from "../../src/auth/sessionExtractor";
import { AppConfig, DEFAULT_CONFIG } from "../../src/config";
import { FetchFn } from "../../src/core/fetch";
import { Sink } from "../../src/sink";
import { DownloadOutcome, HeaderSet, OrderRecord, RunSummary } from "../../src/types";

export const FIXED_NOW = new Date("2026-10-18T12:00:00.000Z");

export function makeTempDir(prefix = "arf-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function headerSet(authorization: string, capturedAt = FIXED_NOW.toISOString()): HeaderSet {
  return {
    headers: { authorization, "user-agent": "test-agent" },
    cookies: { sid: "test-session" },
    capturedAt,
  };
}

export function orderRecord(orderId: string, downloadUrl: string, fileName = `${orderId}.pdf`): OrderRecord {
  return {
    orderId,
    downloadUrl,
    fileName,
    metadata: {
      saleAmount: "10.00",
      commission: "1.00",
      status: "Approved",
      createTime: "2026-10-01 09:00:00",
      subId: "sub-1",
      countryRegion: "US",
    },
  };
}

export interface RecordedCall {
  url: string;
  init: RequestInit;
}

export interface RecordingFetch {
  fetchFn: FetchFn;
  calls: RecordedCall[];
}

/** Fetch stand-in that records every call and answers from `handler`. */
export function recordingFetch(handler: (url: string, init: RequestInit, callIndex: number) => Promise<Response> | Response): RecordingFetch {
  const calls: RecordedCall[] = [];
  const fetchFn: FetchFn = async (url, init) => {
    calls.push({ url, init });
    return handler(url, init, calls.length - 1);
  };
  return { fetchFn, calls };
}

export function recordingSleep(): { sleepFn: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleepFn: async (ms: number) => {
      delays.push(ms);
    },
  };
}

export class MemoryHeaderStore implements HeaderStore {
  entry: HeaderSet | undefined;
  loads = 0;
  saves = 0;
  invalidations = 0;
  failSave = false;

  constructor(entry?: HeaderSet) {
    this.entry = entry;
  }

  async load(): Promise<HeaderSet | undefined> {
    this.loads += 1;
    return this.entry;
  }

  async save(set: HeaderSet): Promise<void> {
    if (this.failSave) {
      throw new Error("disk full");
    }
    this.saves += 1;
    this.entry = set;
  }

  async invalidate(): Promise<void> {
    this.invalidations += 1;
    this.entry = undefined;
  }
}

export class FakeExtractor implements SessionExtractor {
  readonly calls: LoginCredentials[] = [];
  private readonly produce: () => Promise<HeaderSet>;

  constructor(produce: () => Promise<HeaderSet>) {
    this.produce = produce;
  }

  async extract(credentials: LoginCredentials): Promise<HeaderSet> {
    this.calls.push(credentials);
    return this.produce();
  }
}

export class RecordingSink implements Sink {
  readonly outcomes: DownloadOutcome[] = [];
  readonly summaries: RunSummary[] = [];

  async publishDownloadOutcomes(outcomes: DownloadOutcome[]): Promise<void> {
    this.outcomes.push(...outcomes);
  }

  async publishRunSummary(summary: RunSummary): Promise<void> {
    this.summaries.push(summary);
  }
}

export function testConfig(dir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    credentials: { username: "tester", password: "test-secret" },
    reportUrl: "https://portal.example.test/api/affiliate/order/exportOrders",
    headerCachePath: path.join(dir, "headers_cache.json"),
    outputDirs: {
      downloads: path.join(dir, "downloads"),
      manifests: path.join(dir, "manifests"),
    },
    storePath: ":memory:",
    sinkType: "none",
    ...overrides,
  };
}
