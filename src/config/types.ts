export interface OutputDirs {
  downloads: string;
  manifests: string;
}

export interface Credentials {
  username?: string;
  password?: string;
}

export interface AppConfig {
  credentials: Credentials;
  manualToken?: string;
  loginUrl: string;
  reportUrl: string;
  authRequestMarker: string;
  requiredHeaders: string[];
  userAgent: string;
  ignoreHttpsErrors: boolean;
  headless: boolean;
  browserChannel?: string;
  browserExecutablePath?: string;
  forceRefresh: boolean;
  headerCachePath: string;
  headerCacheTtlHours: number;
  requestTimeoutMs: number;
  networkIdleTimeoutMs: number;
  downloadTimeoutMs: number;
  maxFetchAttempts: number;
  maxDownloadAttempts: number;
  downloadConcurrency: number;
  lookbackDays: number;
  downloadUrlTemplate?: string;
  logLevel: "debug" | "info" | "warn" | "error";
  sinkType: "local_jsonl" | "none";
  outputDirs: OutputDirs;
  storePath: string;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs" | "credentials">> & {
  outputDirs?: Partial<OutputDirs>;
  credentials?: Partial<Credentials>;
};
