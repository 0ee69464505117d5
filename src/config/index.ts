export { DEFAULT_CONFIG, loadConfig, normalizeManualToken } from "./loadConfig";
export * from "./types";
