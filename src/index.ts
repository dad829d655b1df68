#!/usr/bin/env node
import "dotenv/config";

import path from "node:path";

import { GenerationRuntime } from "./agents/runtime/generationRuntime.js";
import { loadRuntimeConfig } from "./config/runtimeConfig.js";
import { LedgerPersistenceError, PaperConfigError } from "./domain/errors.js";
import { PaperAssembler } from "./layers/assembly/paperAssembler.js";
import { GenerationOrchestrator } from "./layers/generation/generationOrchestrator.js";
import { DeduplicationLedger, FileLedgerPersistence } from "./layers/ledger/deduplicationLedger.js";
import { PaperRunOrchestrator } from "./layers/orchestration/paperRunOrchestrator.js";
import { PaperStore } from "./layers/storage/paperStore.js";
import { QuestionValidator } from "./layers/validation/questionValidator.js";
import { DirectoryVisualContextProvider } from "./layers/visual/visualContextProvider.js";

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const resetLedger = args.includes("--reset-ledger");
  const configArgument = args.find((arg) => !arg.startsWith("--"));

  const runtimeConfig = loadRuntimeConfig();
  const configPath = path.resolve(process.cwd(), configArgument ?? "config/paper.example.json");
  const outputDirectory = path.resolve(process.cwd(), runtimeConfig.outputDirectory);

  console.log(
    `[bootstrap] Paper assembler starting in ${runtimeConfig.mode} mode (${runtimeConfig.textModel}) with cell concurrency ${runtimeConfig.cellConcurrency}`
  );

  const ledger = new DeduplicationLedger(
    new FileLedgerPersistence(path.resolve(process.cwd(), runtimeConfig.ledgerPath))
  );
  if (resetLedger) {
    await ledger.clear();
  }

  const orchestrator = new PaperRunOrchestrator({
    assembler: new PaperAssembler({
      orchestrator: new GenerationOrchestrator({
        client: new GenerationRuntime(runtimeConfig),
        validator: new QuestionValidator({
          minExplanationLength: runtimeConfig.minExplanationLength,
          minReferences: runtimeConfig.minReferences,
          minOptionLength: runtimeConfig.minOptionLength,
          trustedSubjects: runtimeConfig.trustedSubjects
        }),
        ledger,
        visualContexts: new DirectoryVisualContextProvider(
          path.resolve(process.cwd(), runtimeConfig.visualContextDirectory)
        ),
        verbose: runtimeConfig.verboseLogs
      }),
      ledger,
      cellConcurrency: runtimeConfig.cellConcurrency,
      retryPolicy: {
        attemptsPerQuestion: runtimeConfig.attemptsPerQuestion,
        minAttemptsPerCell: runtimeConfig.minAttemptsPerCell,
        maxAttemptsPerCell: runtimeConfig.maxAttemptsPerCell
      }
    }),
    ledger,
    paperStore: new PaperStore(outputDirectory),
    outputDirectory
  });

  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      return;
    }
    console.warn("[bootstrap] Interrupt received; finishing in-flight generation calls. Press Ctrl+C again to force quit.");
    controller.abort();
    process.once("SIGINT", () => process.exit(130));
  };
  process.once("SIGINT", onInterrupt);

  try {
    const result = await orchestrator.run(configPath, { signal: controller.signal });
    const { paper } = result;

    console.log(`Assembled paper "${paper.name}" (${paper.subject}):`);
    console.log(`  Questions: ${paper.acceptedTotal}/${paper.expectedTotal}${paper.complete ? "" : " (INCOMPLETE)"}`);
    if (paper.cancelled) {
      console.log("  Run was cancelled before completion.");
    }
    for (const error of paper.allocationErrors) {
      console.log(`  Allocation error [${error.code}] ${error.sectionName ?? "paper"}: ${error.message}`);
    }
    for (const entry of paper.fulfillment) {
      console.log(
        `  Shortfall ${entry.sectionName} / ${entry.subtopic} / ${entry.difficulty}: ${entry.actual}/${entry.target} (${entry.state})`
      );
    }
    for (const issue of paper.integrityIssues) {
      console.log(`  Integrity: ${issue}`);
    }
    console.log(`  Paper: ${result.paperOutputPath}`);
    console.log(`  Run artifacts: ${result.runDirectory}`);
    console.log(`  Generation traces: ${result.tracesPath}`);
    console.log(`  Mode: ${result.mode}`);

    if (!paper.complete) {
      process.exitCode = 2;
    }
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

main().catch((error: unknown) => {
  if (error instanceof PaperConfigError) {
    console.error(`Invalid paper configuration: ${error.message}`);
    for (const issue of error.issues) {
      console.error(`  - ${issue}`);
    }
  } else if (error instanceof LedgerPersistenceError) {
    console.error(`Question ledger unavailable, run aborted: ${error.message}`);
  } else if (error instanceof Error) {
    console.error(`Paper assembly failed: ${error.message}`);
  } else {
    console.error("Paper assembly failed due to an unknown error.");
  }

  process.exitCode = 1;
});
