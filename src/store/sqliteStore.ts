import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { DownloadOutcome, OrderRecord, RunSummary } from "../types";
import { OrderStore, StoredOrder, StoredOutcome, StoreStats } from "./types";

type OrderRow = {
  orderId: string;
  downloadUrl: string;
  fileName: string;
  saleAmount: string;
  commission: string;
  status: string;
  createTime: string;
  subId: string;
  countryRegion: string;
  lastOutcome: StoredOutcome | null;
  localPath: string | null;
  error: string | null;
  attempts: number;
  firstSeenAt: string;
  updatedAt: string;
};

const IN_MEMORY = ":memory:";
const PENDING_CLAUSE = "lastOutcome IS NULL OR lastOutcome = 'failed'";

function toRecord(row: OrderRow): OrderRecord {
  return {
    orderId: row.orderId,
    downloadUrl: row.downloadUrl,
    fileName: row.fileName,
    metadata: {
      saleAmount: row.saleAmount,
      commission: row.commission,
      status: row.status,
      createTime: row.createTime,
      subId: row.subId,
      countryRegion: row.countryRegion,
    },
  };
}

export class SqliteOrderStore implements OrderStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === IN_MEMORY) {
      this.db = new Database(IN_MEMORY);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async startRun(runId: string, startedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO runs (runId, startedAt, finishedAt, status, summary)
        VALUES (@runId, @startedAt, NULL, 'running', NULL)
        ON CONFLICT(runId) DO UPDATE SET
          startedAt = excluded.startedAt,
          finishedAt = NULL,
          status = 'running'
      `,
      )
      .run({ runId, startedAt });
  }

  async finishRun(runId: string, status: "completed" | "failed", finishedAt: string, summary?: RunSummary): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE runs
        SET
          status = @status,
          finishedAt = @finishedAt,
          summary = @summary
        WHERE runId = @runId
      `,
      )
      .run({
        runId,
        status,
        finishedAt,
        summary: summary ? JSON.stringify(summary) : null,
      });
  }

  async upsertOrders(records: readonly OrderRecord[], seenAt: string): Promise<void> {
    const statement = this.db.prepare(`
      INSERT INTO orders (
        orderId, downloadUrl, fileName, saleAmount, commission, status,
        createTime, subId, countryRegion, attempts, firstSeenAt, updatedAt
      )
      VALUES (
        @orderId, @downloadUrl, @fileName, @saleAmount, @commission, @status,
        @createTime, @subId, @countryRegion, 0, @seenAt, @seenAt
      )
      ON CONFLICT(orderId) DO UPDATE SET
        downloadUrl = excluded.downloadUrl,
        fileName = excluded.fileName,
        saleAmount = excluded.saleAmount,
        commission = excluded.commission,
        status = excluded.status,
        createTime = excluded.createTime,
        subId = excluded.subId,
        countryRegion = excluded.countryRegion,
        updatedAt = excluded.updatedAt
    `);

    const upsertMany = this.db.transaction((items: readonly OrderRecord[]) => {
      for (const record of items) {
        statement.run({
          orderId: record.orderId,
          downloadUrl: record.downloadUrl,
          fileName: record.fileName,
          ...record.metadata,
          seenAt,
        });
      }
    });
    upsertMany(records);
  }

  async markDownloadOutcome(outcome: DownloadOutcome, at: string): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE orders
        SET
          lastOutcome = @lastOutcome,
          localPath = COALESCE(@localPath, localPath),
          error = @error,
          attempts = attempts + @attemptDelta,
          updatedAt = @updatedAt
        WHERE orderId = @orderId
      `,
      )
      .run({
        orderId: outcome.orderId,
        lastOutcome: outcome.kind,
        localPath: outcome.kind === "failed" ? null : outcome.path,
        error: outcome.kind === "failed" ? outcome.reason : null,
        attemptDelta: outcome.kind === "skipped_duplicate" ? 0 : 1,
        updatedAt: at,
      });
  }

  async getOrder(orderId: string): Promise<StoredOrder | undefined> {
    const row = this.db.prepare(`SELECT * FROM orders WHERE orderId = ?`).get(orderId) as OrderRow | undefined;
    if (!row) {
      return undefined;
    }
    const record = toRecord(row);
    return {
      ...record,
      metadata: { ...record.metadata },
      lastOutcome: row.lastOutcome ?? undefined,
      localPath: row.localPath ?? undefined,
      error: row.error ?? undefined,
      attempts: row.attempts,
      firstSeenAt: row.firstSeenAt,
      updatedAt: row.updatedAt,
    };
  }

  async listPendingDownloads(limit: number): Promise<OrderRecord[]> {
    const rows = this.db
      .prepare(
        `
        SELECT *
        FROM orders
        WHERE ${PENDING_CLAUSE}
        ORDER BY updatedAt ASC
        LIMIT ?
      `,
      )
      .all(limit) as OrderRow[];

    return rows.map(toRecord);
  }

  async getStats(): Promise<StoreStats> {
    const runs = this.db.prepare(`SELECT COUNT(*) as count FROM runs`).get() as { count: number };
    return {
      totalOrders: this.countWhere("1 = 1"),
      pending: this.countWhere(PENDING_CLAUSE),
      downloaded: this.countWhere("lastOutcome = 'downloaded'"),
      skipped: this.countWhere("lastOutcome = 'skipped_duplicate'"),
      failed: this.countWhere("lastOutcome = 'failed'"),
      runs: runs.count,
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private countWhere(whereClause: string): number {
    const row = this.db.prepare(`SELECT COUNT(*) as count FROM orders WHERE ${whereClause}`).get() as { count: number };
    return row.count;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS orders (
        orderId TEXT PRIMARY KEY,
        downloadUrl TEXT NOT NULL,
        fileName TEXT NOT NULL,
        saleAmount TEXT NOT NULL,
        commission TEXT NOT NULL,
        status TEXT NOT NULL,
        createTime TEXT NOT NULL,
        subId TEXT NOT NULL,
        countryRegion TEXT NOT NULL,
        lastOutcome TEXT NULL,
        localPath TEXT NULL,
        error TEXT NULL,
        attempts INTEGER NOT NULL DEFAULT 0,
        firstSeenAt TEXT NOT NULL,
        updatedAt TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NULL,
        status TEXT NOT NULL,
        summary TEXT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_orders_outcome ON orders(lastOutcome);
      CREATE INDEX IF NOT EXISTS idx_orders_updated_at ON orders(updatedAt);
    `);
  }
}
