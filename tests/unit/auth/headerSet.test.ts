import {
  cookieHeader,
  manualHeaderSet,
  missingHeaders,
  normalizeHeaders,
  toRequestHeaders,
} from "../../../src/auth/headerSet";
import { buildCapturedHeaderSet, isAuthBearingRequest } from "../../../src/auth/sessionExtractor";
import { FIXED_NOW, headerSet } from "../../helpers/fixtures";

describe("header sets", () => {
  test("normalizeHeaders lower-cases names and drops transport headers", () => {
    expect(
      normalizeHeaders({
        Authorization: "Bearer test-token",
        ":authority": "portal.example.test",
        Cookie: "sid=1",
        Host: "portal.example.test",
        "Content-Length": "12",
        "X-Request-Id": "abc",
      }),
    ).toEqual({ authorization: "Bearer test-token", "x-request-id": "abc" });
  });

  test("missingHeaders ignores empty values", () => {
    const set = { headers: { authorization: "  " }, cookies: {}, capturedAt: FIXED_NOW.toISOString() };
    expect(missingHeaders(set, ["authorization"])).toEqual(["authorization"]);
    expect(missingHeaders(headerSet("Bearer test-token"), ["Authorization"])).toEqual([]);
  });

  test("cookieHeader joins cookie pairs", () => {
    expect(cookieHeader({ a: "1", b: "2" })).toBe("a=1; b=2");
    expect(cookieHeader({})).toBeUndefined();
  });

  test("toRequestHeaders carries captured headers and cookies", () => {
    expect(toRequestHeaders(headerSet("Bearer test-token"))).toEqual({
      accept: "application/json, text/csv, */*",
      "content-type": "application/json",
      authorization: "Bearer test-token",
      "user-agent": "test-agent",
      cookie: "sid=test-session",
    });
  });

  test("manualHeaderSet builds a complete set from a token", () => {
    expect(manualHeaderSet("test-token", "test-agent", FIXED_NOW)).toEqual({
      headers: { authorization: "test-token", "user-agent": "test-agent", "content-type": "application/json" },
      cookies: {},
      capturedAt: "2026-10-18T12:00:00.000Z",
    });
  });

  test("isAuthBearingRequest requires the marker and every required header", () => {
    const url = "https://portal.example.test/api/affiliate/order/list";
    expect(isAuthBearingRequest(url, { Authorization: "Bearer t" }, "/api/affiliate/", ["authorization"])).toBe(true);
    expect(isAuthBearingRequest(url, {}, "/api/affiliate/", ["authorization"])).toBe(false);
    expect(
      isAuthBearingRequest("https://portal.example.test/static/app.js", { authorization: "Bearer t" }, "/api/affiliate/", [
        "authorization",
      ]),
    ).toBe(false);
  });

  test("buildCapturedHeaderSet maps cookies by name", () => {
    const set = buildCapturedHeaderSet(
      { authorization: "Bearer t", cookie: "ignored=1" },
      [
        { name: "sid", value: "s1" },
        { name: "lang", value: "en" },
      ],
      FIXED_NOW,
    );
    expect(set).toEqual({
      headers: { authorization: "Bearer t" },
      cookies: { sid: "s1", lang: "en" },
      capturedAt: "2026-10-18T12:00:00.000Z",
    });
  });
});
