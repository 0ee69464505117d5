import crypto from "node:crypto";

/** `run_20261018T120000Z_1a2b3c`: sortable by start time, unique per invocation. */
export function createRunId(now = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
  return `run_${stamp}_${crypto.randomBytes(3).toString("hex")}`;
}
