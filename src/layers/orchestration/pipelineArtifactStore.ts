import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { GenerationTrace } from "../../agents/runtime/generationClient.js";

export class PipelineArtifactStore {
  private readonly runDirectory: string;

  constructor(outputDirectory: string, runId: string) {
    this.runDirectory = path.join(outputDirectory, "runs", runId);
  }

  get directoryPath(): string {
    return this.runDirectory;
  }

  async persistStageArtifact(stage: string, artifact: unknown): Promise<string> {
    return this.writeJson(`${stage}.artifact.json`, artifact);
  }

  async persistTraces(traces: GenerationTrace[]): Promise<string> {
    return this.writeJson("generation-traces.json", traces);
  }

  async persistRunSummary(summary: unknown): Promise<string> {
    return this.writeJson("run-summary.json", summary);
  }

  private async writeJson(fileName: string, value: unknown): Promise<string> {
    await mkdir(this.runDirectory, { recursive: true });
    const filePath = path.join(this.runDirectory, fileName);
    await writeFile(filePath, JSON.stringify(value, null, 2), "utf8");
    return filePath;
  }
}
