import { ReportQuery } from "../types";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export interface ReportWindow {
  beginDate?: string;
  endDate?: string;
}

function formatLocalDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

function shiftDays(date: Date, days: number): Date {
  const shifted = new Date(date.getTime());
  shifted.setDate(shifted.getDate() + days);
  return shifted;
}

export function isIsoDate(value: string): boolean {
  return ISO_DATE.test(value) && !Number.isNaN(Date.parse(value));
}

/** Default window runs from `lookbackDays` ago through tomorrow. */
export function buildReportQuery(now: Date, lookbackDays: number, window: ReportWindow = {}): ReportQuery {
  const beginDate = window.beginDate ?? formatLocalDate(shiftDays(now, -lookbackDays));
  const endDate = window.endDate ?? formatLocalDate(shiftDays(now, 1));

  for (const [label, value] of [
    ["beginDate", beginDate],
    ["endDate", endDate],
  ] as const) {
    if (!isIsoDate(value)) {
      throw new Error(`${label} must be YYYY-MM-DD, got "${value}"`);
    }
  }
  if (beginDate > endDate) {
    throw new Error(`beginDate ${beginDate} is after endDate ${endDate}`);
  }

  return {
    beginDate,
    endDate,
    pageNum: 1,
    veriStatus: "",
    mediaId: "",
    trackingSourceId: "",
  };
}
