import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { DownloadOutcome, RunSummary } from "../types";
import { Sink } from "./types";

export class LocalJsonlSink implements Sink {
  private readonly downloadsPath: string;
  private readonly runsPath: string;
  private readonly runId: string;

  constructor(config: AppConfig, runId: string) {
    const manifestsDir = path.resolve(config.outputDirs.manifests);
    fs.mkdirSync(manifestsDir, { recursive: true });
    this.downloadsPath = path.join(manifestsDir, "downloads.jsonl");
    this.runsPath = path.join(manifestsDir, "runs.jsonl");
    this.runId = runId;
  }

  async publishDownloadOutcomes(outcomes: DownloadOutcome[]): Promise<void> {
    await this.appendLines(
      this.downloadsPath,
      outcomes.map((outcome) => ({
        runId: this.runId,
        ...outcome,
      })),
    );
  }

  async publishRunSummary(summary: RunSummary): Promise<void> {
    await this.appendLines(this.runsPath, [{ runId: this.runId, finishedAt: new Date().toISOString(), ...summary }]);
  }

  private async appendLines(filePath: string, records: unknown[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(filePath, content, "utf-8");
  }
}
