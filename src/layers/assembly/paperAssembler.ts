import { randomUUID } from "node:crypto";

import type { GenerationTrace } from "../../agents/runtime/generationClient.js";
import { LedgerPersistenceError } from "../../domain/errors.js";
import type {
  Cell,
  FulfillmentEntry,
  GenerationAttemptRecord,
  Paper,
  PaperConfig,
  Question
} from "../../domain/models.js";
import { mapWithConcurrency } from "../../utils/concurrency.js";
import { allocate } from "../allocation/quotaAllocator.js";
import {
  DEFAULT_RETRY_POLICY,
  resolveRetryBudget,
  type CellOutcome,
  type GenerationOrchestrator,
  type RetryPolicy
} from "../generation/generationOrchestrator.js";
import type { DeduplicationLedger } from "../ledger/deduplicationLedger.js";

export interface PaperAssemblerDependencies {
  orchestrator: GenerationOrchestrator;
  ledger: DeduplicationLedger;
  cellConcurrency: number;
  retryPolicy?: RetryPolicy;
  createPaperId?: () => string;
  now?: () => Date;
}

export interface AssembleOptions {
  signal?: AbortSignal;
}

export interface AssemblyResult {
  paper: Paper;
  traces: GenerationTrace[];
}

export class PaperAssembler {
  constructor(private readonly dependencies: PaperAssemblerDependencies) {}

  async assemble(config: PaperConfig, options: AssembleOptions = {}): Promise<AssemblyResult> {
    const allocation = allocate(config);
    for (const error of allocation.errors) {
      console.warn(`[assembler] ${error.sectionName ?? "paper"}: ${error.message}`);
    }

    const policy = this.dependencies.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.log(
      `Filling ${allocation.cells.length} cell(s) for "${config.name}" with ${this.dependencies.cellConcurrency} worker(s).`
    );

    // Aborted by the caller's signal, or by a ledger failure in any cell.
    const halt = new AbortController();
    const forwardAbort = (): void => halt.abort();
    if (options.signal?.aborted) {
      halt.abort();
    }
    options.signal?.addEventListener("abort", forwardAbort, { once: true });

    let outcomes: CellOutcome[];
    try {
      // Workers finish in any order; results come back indexed by cell.
      outcomes = await mapWithConcurrency(allocation.cells, this.dependencies.cellConcurrency, async (cell) => {
        try {
          return await this.dependencies.orchestrator.fill(cell, resolveRetryBudget(cell.targetCount, policy), {
            subject: config.subject,
            signal: halt.signal
          });
        } catch (error) {
          if (error instanceof LedgerPersistenceError) {
            console.warn(`[assembler] ${cell.id}: ${error.message}; stopping all cells.`);
            halt.abort();
          }
          throw error;
        }
      });
    } finally {
      options.signal?.removeEventListener("abort", forwardAbort);
    }

    await this.dependencies.ledger.flush();

    const questions = orderQuestions(outcomes);
    const cellReports = outcomes.map((outcome) => outcome.record);
    const expectedTotal =
      config.declaredTotal ?? config.sections.reduce((sum, section) => sum + Math.max(0, section.questionCount), 0);
    const cancelled = cellReports.some((report) => report.cancelled);
    const acceptedTotal = questions.length;

    const paper: Paper = {
      id: (this.dependencies.createPaperId ?? randomUUID)(),
      configId: config.id,
      name: config.name,
      subject: config.subject,
      createdAt: (this.dependencies.now ?? (() => new Date()))().toISOString(),
      config,
      questions,
      expectedTotal,
      acceptedTotal,
      complete: acceptedTotal >= expectedTotal && allocation.errors.length === 0 && !cancelled,
      cancelled,
      fulfillment: buildFulfillment(outcomes),
      allocationErrors: allocation.errors,
      cellReports,
      integrityIssues: findIntegrityIssues(questions)
    };

    this.log(
      `Assembled ${acceptedTotal}/${expectedTotal} question(s)` +
        (paper.complete ? "." : ` (incomplete${cancelled ? ", cancelled" : ""}).`)
    );

    return {
      paper: freezePaper(paper),
      traces: outcomes.flatMap((outcome) => outcome.traces)
    };
  }

  private log(message: string): void {
    console.log(`[assembler] ${message}`);
  }
}

/** Section, then topic, then tier (cells are allocated in that order), then acceptance order. */
export function orderQuestions(outcomes: readonly CellOutcome[]): Question[] {
  return [...outcomes]
    .sort((left, right) => compareCells(left.cell, right.cell))
    .flatMap((outcome) => outcome.accepted);
}

const TIER_ORDER = { Easy: 0, Medium: 1, Hard: 2 } as const;

function compareCells(left: Cell, right: Cell): number {
  return (
    left.sectionIndex - right.sectionIndex ||
    left.topicIndex - right.topicIndex ||
    TIER_ORDER[left.difficulty] - TIER_ORDER[right.difficulty]
  );
}

export function buildFulfillment(outcomes: readonly CellOutcome[]): FulfillmentEntry[] {
  return outcomes
    .filter((outcome) => outcome.record.state !== "FILLED")
    .map(({ cell, record }) => toFulfillmentEntry(cell, record));
}

function toFulfillmentEntry(cell: Cell, record: GenerationAttemptRecord): FulfillmentEntry {
  return {
    cellId: cell.id,
    sectionName: cell.sectionName,
    mainTopic: cell.topic.mainTopic,
    subtopic: cell.topic.subtopic,
    difficulty: cell.difficulty,
    state: record.state,
    target: cell.targetCount,
    actual: record.acceptedCount,
    attemptsMade: record.attemptsMade,
    lastFailureReason: record.lastFailureReason
  };
}

export function findIntegrityIssues(questions: readonly Question[]): string[] {
  const issues: string[] = [];
  if (questions.length === 0) {
    issues.push("Paper contains no questions.");
  }

  const repeated = (values: string[]): string[] =>
    [...new Set(values.filter((value, index) => values.indexOf(value) !== index))];

  for (const id of repeated(questions.map((question) => question.id))) {
    issues.push(`Duplicate question id ${id}.`);
  }
  for (const fingerprint of repeated(questions.map((question) => question.fingerprint))) {
    issues.push(`Duplicate question fingerprint ${fingerprint.slice(0, 12)}.`);
  }

  return issues;
}

function freezePaper(paper: Paper): Paper {
  for (const question of paper.questions) {
    Object.freeze(question.options);
    Object.freeze(question.references);
    Object.freeze(question);
  }
  for (const entry of paper.fulfillment) {
    Object.freeze(entry);
  }
  for (const report of paper.cellReports) {
    Object.freeze(report);
  }
  Object.freeze(paper.questions);
  Object.freeze(paper.fulfillment);
  Object.freeze(paper.allocationErrors);
  Object.freeze(paper.cellReports);
  Object.freeze(paper.integrityIssues);
  return Object.freeze(paper);
}
