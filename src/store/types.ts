import { DownloadOutcome, OrderMetadata, OrderRecord, RunSummary } from "../types";

export type StoredOutcome = DownloadOutcome["kind"];

export interface StoredOrder {
  orderId: string;
  downloadUrl: string;
  fileName: string;
  metadata: OrderMetadata;
  lastOutcome?: StoredOutcome;
  localPath?: string;
  error?: string;
  attempts: number;
  firstSeenAt: string;
  updatedAt: string;
}

export interface StoreStats {
  totalOrders: number;
  /** Orders never attempted or whose last attempt failed; what `listPendingDownloads` returns. */
  pending: number;
  downloaded: number;
  skipped: number;
  failed: number;
  runs: number;
}

export interface OrderStore {
  startRun(runId: string, startedAt: string): Promise<void>;
  finishRun(runId: string, status: "completed" | "failed", finishedAt: string, summary?: RunSummary): Promise<void>;
  upsertOrders(records: readonly OrderRecord[], seenAt: string): Promise<void>;
  markDownloadOutcome(outcome: DownloadOutcome, at: string): Promise<void>;
  getOrder(orderId: string): Promise<StoredOrder | undefined>;
  listPendingDownloads(limit: number): Promise<OrderRecord[]>;
  getStats(): Promise<StoreStats>;
  close(): Promise<void>;
}
