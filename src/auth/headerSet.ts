import { HeaderSet } from "../types";

const DROPPED_REQUEST_HEADERS = new Set(["cookie", "content-length", "host", "connection"]);

export function normalizeHeaders(headers: Record<string, string>): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    const key = name.trim().toLowerCase();
    if (key.length === 0 || key.startsWith(":") || DROPPED_REQUEST_HEADERS.has(key)) {
      continue;
    }
    normalized[key] = value;
  }
  return normalized;
}

export function missingHeaders(set: HeaderSet, requiredHeaders: readonly string[]): string[] {
  const present = new Set(
    Object.entries(set.headers)
      .filter(([, value]) => value.trim().length > 0)
      .map(([name]) => name.toLowerCase()),
  );
  return requiredHeaders.filter((name) => !present.has(name.toLowerCase()));
}

export function cookieHeader(cookies: Record<string, string>): string | undefined {
  const pairs = Object.entries(cookies).map(([name, value]) => `${name}=${value}`);
  return pairs.length > 0 ? pairs.join("; ") : undefined;
}

/** Header map sent on the report request; captured cookies travel as one Cookie header. */
export function toRequestHeaders(set: HeaderSet): Record<string, string> {
  const headers: Record<string, string> = {
    accept: "application/json, text/csv, */*",
    "content-type": "application/json",
    ...set.headers,
  };
  const cookie = cookieHeader(set.cookies);
  if (cookie) {
    headers.cookie = cookie;
  }
  return headers;
}

export function manualHeaderSet(token: string, userAgent: string, capturedAt: Date): HeaderSet {
  return {
    headers: {
      authorization: token,
      "user-agent": userAgent,
      "content-type": "application/json",
    },
    cookies: {},
    capturedAt: capturedAt.toISOString(),
  };
}
