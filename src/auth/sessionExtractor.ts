import { z } from "zod";
import { HeaderSet } from "../types";
import { normalizeHeaders } from "./headerSet";

export interface LoginCredentials {
  username: string;
  password: string;
}

/**
 * Drives a login and captures the auth material of the first API request
 * that carries it. Implementations reject with `LoginFailedError` or
 * `ExtractionTimeoutError`.
 */
export interface SessionExtractor {
  extract(credentials: LoginCredentials, timeoutMs: number): Promise<HeaderSet>;
}

export interface CapturedCookie {
  name: string;
  value: string;
}

export function isAuthBearingRequest(
  url: string,
  headers: Record<string, string>,
  marker: string,
  requiredHeaders: readonly string[],
): boolean {
  if (!url.includes(marker)) {
    return false;
  }
  const normalized = normalizeHeaders(headers);
  return requiredHeaders.every((name) => (normalized[name.toLowerCase()] ?? "").trim().length > 0);
}

export function cookieMap(cookies: readonly CapturedCookie[]): Record<string, string> {
  const map: Record<string, string> = {};
  for (const cookie of cookies) {
    map[cookie.name] = cookie.value;
  }
  return map;
}

export function buildCapturedHeaderSet(
  requestHeaders: Record<string, string>,
  cookies: readonly CapturedCookie[],
  capturedAt: Date,
): HeaderSet {
  return {
    headers: normalizeHeaders(requestHeaders),
    cookies: cookieMap(cookies),
    capturedAt: capturedAt.toISOString(),
  };
}

/** What the login page exposes about its session once the portal app has booted. */
export const storageSnapshotSchema = z.object({
  localStorage: z.record(z.string()),
  sessionStorage: z.record(z.string()),
  globals: z.record(z.string()),
  metaTokens: z.array(z.string()),
});

export type StorageSnapshot = z.infer<typeof storageSnapshotSchema>;

export const TOKEN_GLOBALS = ["authToken", "token", "AUTH_TOKEN", "authorization", "accessToken"];

/** Page-side source that collects a `StorageSnapshot`. */
export const STORAGE_SNAPSHOT_SCRIPT = `(() => {
  const read = (storage) => {
    const entries = {};
    for (let i = 0; i < storage.length; i += 1) {
      const key = storage.key(i);
      const value = key === null ? null : storage.getItem(key);
      if (key !== null && value !== null) {
        entries[key] = value;
      }
    }
    return entries;
  };
  const globals = {};
  for (const name of ${JSON.stringify(TOKEN_GLOBALS)}) {
    if (typeof window[name] === "string") {
      globals[name] = window[name];
    }
  }
  const metaTokens = Array.from(document.querySelectorAll('meta[name="token"], meta[name="authorization"]'))
    .map((element) => element.getAttribute("content") || "")
    .filter((content) => content.length > 0);
  return {
    localStorage: read(window.localStorage),
    sessionStorage: read(window.sessionStorage),
    globals,
    metaTokens,
  };
})()`;

const STORAGE_LOOKUPS: ReadonlyArray<["localStorage" | "sessionStorage", string]> = [
  ["localStorage", "Authorization"],
  ["localStorage", "auth_token"],
  ["sessionStorage", "auth_token"],
  ["localStorage", "token"],
  ["sessionStorage", "token"],
  ["localStorage", "authorization"],
  ["sessionStorage", "authorization"],
  ["localStorage", "access_token"],
  ["sessionStorage", "access_token"],
];

/**
 * Picks the auth token from a page's storage, then its globals, then its
 * meta tags. Used when no API request carrying the token was observed.
 */
export function findStoredToken(snapshot: StorageSnapshot): string | undefined {
  const candidates = [
    ...STORAGE_LOOKUPS.map(([area, key]) => snapshot[area][key]),
    ...TOKEN_GLOBALS.map((name) => snapshot.globals[name]),
    ...snapshot.metaTokens,
  ];
  for (const candidate of candidates) {
    const token = candidate?.trim();
    if (token) {
      return token;
    }
  }
  return undefined;
}
