import { buildReportQuery, isIsoDate } from "../../../src/report/query";

describe("buildReportQuery", () => {
  test("defaults to the lookback window through tomorrow", () => {
    expect(buildReportQuery(new Date(2026, 9, 18, 12, 0, 0), 7)).toEqual({
      beginDate: "2026-10-11",
      endDate: "2026-10-19",
      pageNum: 1,
      veriStatus: "",
      mediaId: "",
      trackingSourceId: "",
    });
  });

  test("crosses month and year boundaries", () => {
    const query = buildReportQuery(new Date(2026, 0, 3, 8, 0, 0), 7);
    expect([query.beginDate, query.endDate]).toEqual(["2025-12-27", "2026-01-04"]);
  });

  test("uses an explicit window", () => {
    const query = buildReportQuery(new Date(2026, 9, 18), 7, { beginDate: "2026-09-01", endDate: "2026-09-30" });
    expect([query.beginDate, query.endDate]).toEqual(["2026-09-01", "2026-09-30"]);
  });

  test("rejects an inverted or malformed window", () => {
    expect(() => buildReportQuery(new Date(2026, 9, 18), 7, { beginDate: "2026-10-20", endDate: "2026-10-01" })).toThrow(
      "beginDate 2026-10-20 is after endDate 2026-10-01",
    );
    expect(() => buildReportQuery(new Date(2026, 9, 18), 7, { beginDate: "2026-13-40" })).toThrow("beginDate must be YYYY-MM-DD");
  });

  test("isIsoDate checks shape and calendar validity", () => {
    expect(isIsoDate("2026-10-18")).toBe(true);
    expect(isIsoDate("2026-10-18T00:00:00Z")).toBe(false);
    expect(isIsoDate("2026-02-30x")).toBe(false);
  });
});
