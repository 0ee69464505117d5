export interface HeaderSet {
  headers: Record<string, string>;
  cookies: Record<string, string>;
  capturedAt: string;
}

export type AuthSource = "manual" | "cache" | "extraction";

export interface OrderMetadata {
  saleAmount: string;
  commission: string;
  status: string;
  createTime: string;
  subId: string;
  countryRegion: string;
}

export interface OrderRecord {
  readonly orderId: string;
  readonly downloadUrl: string;
  readonly fileName: string;
  readonly metadata: Readonly<OrderMetadata>;
}

export interface ReportQuery {
  beginDate: string;
  endDate: string;
  pageNum: number;
  veriStatus: string;
  mediaId: string;
  trackingSourceId: string;
}

export type DownloadOutcome =
  | { kind: "downloaded"; orderId: string; path: string; bytes: number; sha256: string; attempt: number }
  | { kind: "skipped_duplicate"; orderId: string; path: string }
  | { kind: "failed"; orderId: string; reason: string; attempt: number };

export interface DownloadSummary {
  downloaded: number;
  skipped: number;
  failed: number;
  outcomes: DownloadOutcome[];
}

export interface RunSummary {
  authSource: AuthSource;
  resolvedFromCache: number;
  resolvedFromExtraction: number;
  resolvedFromManual: number;
  rows: number;
  droppedRows: number;
  downloaded: number;
  skipped: number;
  failed: number;
}
