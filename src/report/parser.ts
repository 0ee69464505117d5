import crypto from "node:crypto";
import path from "node:path";
import { Readable } from "node:stream";
import csv from "csv-parser";
import { ReportFormatError } from "../core/errors";
import { OrderMetadata, OrderRecord } from "../types";

export const MISSING_FIELD_PLACEHOLDER = "unknown";

export const ORDER_ID_COLUMNS = ["order no.", "order no", "order id", "order number"];

// Columns are located by header name so reordered or extended reports still parse.
const COLUMN_ALIASES: Record<keyof OrderMetadata | "orderId" | "downloadUrl", string[]> = {
  orderId: ORDER_ID_COLUMNS,
  downloadUrl: ["final url", "download url", "file url", "url"],
  saleAmount: ["sale amount(usd)", "sale amount (usd)", "sale amount"],
  commission: ["confirmed commission", "estimated commission", "commission"],
  status: ["status"],
  createTime: ["create time", "created at", "order time"],
  subId: ["customize1 id", "subid", "sub id"],
  countryRegion: ["country/region", "country"],
};

export interface ParseReportOptions {
  /** Used when a row has no URL column value, e.g. `https://host/conv?subid={subId}&tid={orderId}&amount={amount}`. */
  downloadUrlTemplate?: string;
}

export type DropReason = "missing_order_id" | "missing_download_url" | "invalid_download_url";

export type ParsedRow =
  | { kind: "record"; record: OrderRecord }
  | { kind: "dropped"; row: number; reason: DropReason };

export interface ParsedReport {
  records: OrderRecord[];
  droppedRows: number;
  dropped: Array<{ row: number; reason: DropReason }>;
}

export function normalizeHeader(header: string): string {
  return header.replace(/^\uFEFF/, "").replace(/\s+/g, " ").trim().toLowerCase();
}

function pick(row: Record<string, string>, aliases: readonly string[]): string | undefined {
  for (const alias of aliases) {
    const value = row[alias];
    if (value !== undefined && value.trim().length > 0) {
      return value.trim();
    }
  }
  return undefined;
}

function toRow(chunk: unknown): Record<string, string> {
  const row: Record<string, string> = {};
  if (chunk === null || typeof chunk !== "object") {
    return row;
  }
  for (const [key, value] of Object.entries(chunk)) {
    if (typeof value === "string") {
      row[key] = value;
    }
  }
  return row;
}

function fillTemplate(template: string, values: Record<string, string | undefined>): string | undefined {
  let missing = false;
  const filled = template.replace(/\{(\w+)\}/g, (_match, name: string) => {
    const value = values[name];
    if (!value) {
      missing = true;
      return "";
    }
    return encodeURIComponent(value);
  });
  return missing ? undefined : filled;
}

function fileExtension(url: URL): string {
  const ext = path.posix.extname(url.pathname).toLowerCase();
  return /^\.[a-z0-9]{1,8}$/.test(ext) ? ext : ".bin";
}

/**
 * Maps an order id to a file name. Ids that need sanitizing get a short hash
 * of the raw id appended, so distinct ids never share a name.
 */
export function fileNameForOrder(orderId: string, downloadUrl: string): string {
  const sanitized = orderId.replace(/[^A-Za-z0-9._-]/g, "_");
  const stem =
    sanitized === orderId
      ? sanitized
      : `${sanitized}-${crypto.createHash("sha256").update(orderId, "utf-8").digest("hex").slice(0, 8)}`;
  return `${stem}${fileExtension(new URL(downloadUrl))}`;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Lazily parses report CSV into order records. Every call starts a fresh
 * parse of the same text, so iterating twice yields the same sequence.
 */
export async function* parseReportRows(csvText: string, options: ParseReportOptions = {}): AsyncGenerator<ParsedRow> {
  const text = csvText.replace(/^\uFEFF/, "").trim();
  if (text.length === 0) {
    return;
  }

  const stream = Readable.from([Buffer.from(text, "utf-8")]).pipe(
    csv({ mapHeaders: ({ header }) => normalizeHeader(header) }),
  );

  let headers: string[] = [];
  stream.on("headers", (names: string[]) => {
    headers = names.map(normalizeHeader);
  });

  let index = 0;
  for await (const chunk of stream) {
    index += 1;
    if (index === 1 && !ORDER_ID_COLUMNS.some((column) => headers.includes(column))) {
      throw new ReportFormatError(`Report header has no order id column (expected one of: ${ORDER_ID_COLUMNS.join(", ")})`);
    }

    const row = toRow(chunk);

    if (Object.values(row).every((value) => value.trim().length === 0)) {
      continue;
    }

    const orderId = pick(row, COLUMN_ALIASES.orderId);
    if (!orderId) {
      yield { kind: "dropped", row: index, reason: "missing_order_id" };
      continue;
    }

    const metadata: OrderMetadata = {
      saleAmount: pick(row, COLUMN_ALIASES.saleAmount) ?? MISSING_FIELD_PLACEHOLDER,
      commission: pick(row, COLUMN_ALIASES.commission) ?? MISSING_FIELD_PLACEHOLDER,
      status: pick(row, COLUMN_ALIASES.status) ?? MISSING_FIELD_PLACEHOLDER,
      createTime: pick(row, COLUMN_ALIASES.createTime) ?? MISSING_FIELD_PLACEHOLDER,
      subId: pick(row, COLUMN_ALIASES.subId) ?? MISSING_FIELD_PLACEHOLDER,
      countryRegion: pick(row, COLUMN_ALIASES.countryRegion) ?? MISSING_FIELD_PLACEHOLDER,
    };

    const downloadUrl =
      pick(row, COLUMN_ALIASES.downloadUrl) ??
      (options.downloadUrlTemplate
        ? fillTemplate(options.downloadUrlTemplate, {
            orderId,
            subId: pick(row, COLUMN_ALIASES.subId),
            amount: pick(row, COLUMN_ALIASES.saleAmount),
          })
        : undefined);

    if (!downloadUrl) {
      yield { kind: "dropped", row: index, reason: "missing_download_url" };
      continue;
    }
    if (!isHttpUrl(downloadUrl)) {
      yield { kind: "dropped", row: index, reason: "invalid_download_url" };
      continue;
    }

    const record: OrderRecord = Object.freeze({
      orderId,
      downloadUrl,
      fileName: fileNameForOrder(orderId, downloadUrl),
      metadata: Object.freeze(metadata),
    });
    yield { kind: "record", record };
  }
}

export class OrderReport implements AsyncIterable<OrderRecord> {
  private readonly csvText: string;
  private readonly options: ParseReportOptions;

  constructor(csvText: string, options: ParseReportOptions = {}) {
    this.csvText = csvText;
    this.options = options;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<OrderRecord> {
    for await (const row of parseReportRows(this.csvText, this.options)) {
      if (row.kind === "record") {
        yield row.record;
      }
    }
  }

  async collect(): Promise<ParsedReport> {
    const records: OrderRecord[] = [];
    const dropped: ParsedReport["dropped"] = [];
    for await (const row of parseReportRows(this.csvText, this.options)) {
      if (row.kind === "record") {
        records.push(row.record);
      } else {
        dropped.push({ row: row.row, reason: row.reason });
      }
    }
    return { records, droppedRows: dropped.length, dropped };
  }
}
