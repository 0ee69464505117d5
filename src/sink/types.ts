import { DownloadOutcome, RunSummary } from "../types";

export interface Sink {
  publishDownloadOutcomes(outcomes: DownloadOutcome[]): Promise<void>;
  publishRunSummary(summary: RunSummary): Promise<void>;
}
