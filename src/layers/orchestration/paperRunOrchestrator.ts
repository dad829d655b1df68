import type { AgentMode } from "../../config/runtimeConfig.js";
import { loadPaperConfig } from "../../config/paperConfigLoader.js";
import type { Paper, PaperConfig } from "../../domain/models.js";
import { createId } from "../../utils/text.js";
import type { PaperAssembler } from "../assembly/paperAssembler.js";
import type { DeduplicationLedger } from "../ledger/deduplicationLedger.js";
import type { PaperStore } from "../storage/paperStore.js";
import { PipelineArtifactStore } from "./pipelineArtifactStore.js";

export interface PaperRunOrchestratorDependencies {
  assembler: PaperAssembler;
  ledger: DeduplicationLedger;
  paperStore: PaperStore;
  outputDirectory: string;
  loadConfig?: (configPath: string) => Promise<PaperConfig>;
}

export interface PaperRunResult {
  runId: string;
  paper: Paper;
  paperOutputPath: string;
  runDirectory: string;
  stageArtifacts: Record<string, string>;
  tracesPath: string;
  mode: AgentMode;
}

export class PaperRunOrchestrator {
  constructor(private readonly dependencies: PaperRunOrchestratorDependencies) {}

  async run(configPath: string, options: { signal?: AbortSignal } = {}): Promise<PaperRunResult> {
    const startedAt = new Date().toISOString();
    const config = await (this.dependencies.loadConfig ?? loadPaperConfig)(configPath);
    const runId = createId("run", `${config.id}-${Date.now()}`);
    const artifactStore = new PipelineArtifactStore(this.dependencies.outputDirectory, runId);
    const stageArtifacts: Record<string, string> = {};

    this.log(`[${runId}] Assembling "${config.name}" (${config.subject}) from ${configPath}`);
    await this.dependencies.ledger.load();

    const { paper, traces } = await this.dependencies.assembler.assemble(config, { signal: options.signal });

    const paperOutputPath = await this.dependencies.paperStore.persistPaper(paper);
    stageArtifacts.paper = await artifactStore.persistStageArtifact("paper", paper);
    stageArtifacts.fulfillment = await artifactStore.persistStageArtifact("fulfillment", {
      expectedTotal: paper.expectedTotal,
      acceptedTotal: paper.acceptedTotal,
      complete: paper.complete,
      cancelled: paper.cancelled,
      shortfall: paper.fulfillment,
      allocationErrors: paper.allocationErrors,
      cellReports: paper.cellReports
    });

    const tracesPath = await artifactStore.persistTraces(traces);
    await artifactStore.persistRunSummary({
      runId,
      configPath,
      paperId: paper.id,
      stageArtifacts,
      traceCount: traces.length,
      ledgerSize: this.dependencies.ledger.size,
      startedAt,
      completedAt: new Date().toISOString()
    });

    const mode = traces.some((trace) => trace.runtimeMode === "live") ? "live" : "mock";
    this.log(`[${runId}] Completed in ${mode} mode -> ${paperOutputPath}`);

    return {
      runId,
      paper,
      paperOutputPath,
      runDirectory: artifactStore.directoryPath,
      stageArtifacts,
      tracesPath,
      mode
    };
  }

  private log(message: string): void {
    console.log(`[orchestrator] ${message}`);
  }
}
