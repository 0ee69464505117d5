import { DownloadOutcome, OrderRecord, RunSummary } from "../types";
import { OrderStore, StoredOrder, StoreStats } from "./types";

interface RunRow {
  startedAt: string;
  finishedAt?: string;
  status: "running" | "completed" | "failed";
  summary?: RunSummary;
}

function isPending(order: StoredOrder): boolean {
  return order.lastOutcome === undefined || order.lastOutcome === "failed";
}

export class InMemoryOrderStore implements OrderStore {
  private readonly orders = new Map<string, StoredOrder>();
  private readonly runs = new Map<string, RunRow>();

  async startRun(runId: string, startedAt: string): Promise<void> {
    this.runs.set(runId, { startedAt, status: "running" });
  }

  async finishRun(runId: string, status: "completed" | "failed", finishedAt: string, summary?: RunSummary): Promise<void> {
    const run = this.runs.get(runId);
    if (!run) {
      return;
    }
    this.runs.set(runId, { ...run, status, finishedAt, summary });
  }

  async upsertOrders(records: readonly OrderRecord[], seenAt: string): Promise<void> {
    for (const record of records) {
      const existing = this.orders.get(record.orderId);
      this.orders.set(record.orderId, {
        attempts: 0,
        firstSeenAt: seenAt,
        ...existing,
        orderId: record.orderId,
        downloadUrl: record.downloadUrl,
        fileName: record.fileName,
        metadata: { ...record.metadata },
        updatedAt: seenAt,
      });
    }
  }

  async markDownloadOutcome(outcome: DownloadOutcome, at: string): Promise<void> {
    const existing = this.orders.get(outcome.orderId);
    if (!existing) {
      return;
    }
    this.orders.set(outcome.orderId, {
      ...existing,
      lastOutcome: outcome.kind,
      localPath: outcome.kind === "failed" ? existing.localPath : outcome.path,
      error: outcome.kind === "failed" ? outcome.reason : undefined,
      attempts: outcome.kind === "skipped_duplicate" ? existing.attempts : existing.attempts + 1,
      updatedAt: at,
    });
  }

  async getOrder(orderId: string): Promise<StoredOrder | undefined> {
    return this.orders.get(orderId);
  }

  async listPendingDownloads(limit: number): Promise<OrderRecord[]> {
    return [...this.orders.values()]
      .filter(isPending)
      .sort((a, b) => a.updatedAt.localeCompare(b.updatedAt))
      .slice(0, limit)
      .map((order) => ({
        orderId: order.orderId,
        downloadUrl: order.downloadUrl,
        fileName: order.fileName,
        metadata: { ...order.metadata },
      }));
  }

  async getStats(): Promise<StoreStats> {
    const orders = [...this.orders.values()];
    return {
      totalOrders: orders.length,
      pending: orders.filter(isPending).length,
      downloaded: orders.filter((order) => order.lastOutcome === "downloaded").length,
      skipped: orders.filter((order) => order.lastOutcome === "skipped_duplicate").length,
      failed: orders.filter((order) => order.lastOutcome === "failed").length,
      runs: this.runs.size,
    };
  }

  async close(): Promise<void> {
    return;
  }
}
