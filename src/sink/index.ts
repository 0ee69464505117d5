import { AppConfig } from "../config";
import { LocalJsonlSink } from "./localJsonlSink";
import { Sink } from "./types";

class NoopSink implements Sink {
  async publishDownloadOutcomes(): Promise<void> {
    return;
  }

  async publishRunSummary(): Promise<void> {
    return;
  }
}

export function createSink(config: AppConfig, runId: string): Sink {
  switch (config.sinkType) {
    case "local_jsonl":
      return new LocalJsonlSink(config, runId);
    case "none":
      return new NoopSink();
    default:
      throw new Error(`Unsupported sink type: ${String(config.sinkType)}`);
  }
}

export { LocalJsonlSink } from "./localJsonlSink";
export * from "./types";
