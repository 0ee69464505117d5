export { FileHeaderCache } from "./headerCache";
export type { FileHeaderCacheOptions, HeaderStore } from "./headerCache";
export { cookieHeader, manualHeaderSet, missingHeaders, normalizeHeaders, toRequestHeaders } from "./headerSet";
export { PlaywrightSessionExtractor } from "./playwrightExtractor";
export type { PlaywrightExtractorOptions } from "./playwrightExtractor";
export { AuthResolver } from "./resolver";
export type { AuthResolverDeps, ResolvedAuth, ResolveOptions, ResolverState } from "./resolver";
export { buildCapturedHeaderSet, isAuthBearingRequest } from "./sessionExtractor";
export type { CapturedCookie, LoginCredentials, SessionExtractor } from "./sessionExtractor";
