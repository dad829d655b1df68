import { randomUUID } from "node:crypto";

import {
  buildMockResponse,
  buildTextPrompt,
  buildVisionPrompt,
  TEXT_SYSTEM_PROMPT,
  VISION_SYSTEM_PROMPT
} from "../../agents/prompts/mcqPrompts.js";
import type { GenerationClient, GenerationResult, GenerationTrace } from "../../agents/runtime/generationClient.js";
import { GenerationError, MalformedOutputError, formatError } from "../../domain/errors.js";
import type {
  Cell,
  CellState,
  FailureReason,
  GenerationAttemptRecord,
  GenerationMode,
  Question,
  QuestionCandidate,
  RetryBudget,
  TerminalCellState,
  ValidationError,
  VisualContext
} from "../../domain/models.js";
import { truncate } from "../../utils/text.js";
import type { DeduplicationLedger } from "../ledger/deduplicationLedger.js";
import { computeFingerprint } from "../ledger/fingerprint.js";
import { parseOptionKey, type QuestionValidator } from "../validation/questionValidator.js";
import type { VisualContextProvider } from "../visual/visualContextProvider.js";
import { parseCandidates } from "./candidateParser.js";

export interface RetryPolicy {
  attemptsPerQuestion: number;
  minAttemptsPerCell: number;
  /** Fixed budget for every cell; overrides the two settings above. */
  maxAttemptsPerCell?: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attemptsPerQuestion: 3,
  minAttemptsPerCell: 4
};

export function resolveRetryBudget(targetCount: number, policy: RetryPolicy = DEFAULT_RETRY_POLICY): RetryBudget {
  if (policy.maxAttemptsPerCell !== undefined) {
    return { maxAttemptsPerCell: Math.max(1, Math.floor(policy.maxAttemptsPerCell)) };
  }
  return {
    maxAttemptsPerCell: Math.max(
      Math.ceil(targetCount * policy.attemptsPerQuestion),
      Math.floor(policy.minAttemptsPerCell),
      1
    )
  };
}

export interface FillContext {
  subject: string;
  signal?: AbortSignal;
}

export interface CellOutcome {
  cell: Cell;
  accepted: Question[];
  record: GenerationAttemptRecord;
  traces: GenerationTrace[];
}

export type TransitionListener = (cellId: string, from: CellState, to: CellState) => void;

export interface GenerationOrchestratorDependencies {
  client: GenerationClient;
  validator: QuestionValidator;
  ledger: DeduplicationLedger;
  visualContexts: VisualContextProvider;
  verbose?: boolean;
  createQuestionId?: () => string;
  now?: () => Date;
  onTransition?: TransitionListener;
}

type CandidateVerdict =
  | { kind: "accepted"; question: Question }
  | { kind: "duplicate"; fingerprint: string }
  | { kind: "invalid"; errors: ValidationError[] };

/** Mutable bookkeeping for one `fill` call; never shared between cells. */
class CellRun {
  state: CellState = "PENDING";
  attemptsMade = 0;
  duplicateCount = 0;
  invalidCount = 0;
  malformedCount = 0;
  transportFailureCount = 0;
  lastFailureReason?: FailureReason;
  mode: GenerationMode = "text";
  initialMode: GenerationMode = "text";
  fellBackToText = false;
  cancelled = false;
  readonly accepted: Question[] = [];
  readonly traces: GenerationTrace[] = [];

  constructor(
    readonly cell: Cell,
    private readonly onTransition?: TransitionListener
  ) {}

  moveTo(next: CellState): void {
    const previous = this.state;
    this.state = next;
    this.onTransition?.(this.cell.id, previous, next);
  }

  fail(reason: FailureReason): void {
    this.lastFailureReason = reason;
  }

  get needed(): number {
    return this.cell.targetCount - this.accepted.length;
  }
}

/**
 * Fills one cell of the quota grid: calls the generator, decodes its output,
 * and passes each candidate through the ledger and validator until the cell's
 * target is met or its attempt budget runs out.
 *
 * An attempt is one examined candidate, or one generation call that yielded
 * no candidate (transport failure, timeout, malformed output). Vision cells
 * switch to text generation for good after the first failed vision call.
 */
export class GenerationOrchestrator {
  private readonly createQuestionId: () => string;
  private readonly now: () => Date;

  constructor(private readonly dependencies: GenerationOrchestratorDependencies) {
    this.createQuestionId = dependencies.createQuestionId ?? randomUUID;
    this.now = dependencies.now ?? (() => new Date());
  }

  async fill(cell: Cell, budget: RetryBudget, context: FillContext): Promise<CellOutcome> {
    const run = new CellRun(cell, this.dependencies.onTransition);
    // A cell cancelled before it starts is never resolved; it reports the mode its topic asks for.
    const cancelledBeforeStart = context.signal?.aborted === true;
    const visualContext = cancelledBeforeStart ? null : await this.resolveVisualContext(cell, run);
    const wantsVision = cancelledBeforeStart ? Boolean(cell.topic.visualContextId) : visualContext !== null;
    run.mode = wantsVision ? "vision" : "text";
    run.initialMode = run.mode;

    while (run.needed > 0 && run.attemptsMade < budget.maxAttemptsPerCell) {
      if (context.signal?.aborted) {
        run.cancelled = true;
        break;
      }

      run.moveTo("GENERATING");
      const callMode = run.mode;
      let candidates: QuestionCandidate[];

      try {
        const result = await this.generate(callMode, cell, context.subject, run.needed, visualContext);
        run.traces.push(result.trace);
        candidates = parseCandidates(result.text);
      } catch (error) {
        this.recordCallFailure(run, callMode, error, budget);
        continue;
      }

      for (const candidate of candidates) {
        if (run.needed <= 0 || run.attemptsMade >= budget.maxAttemptsPerCell) {
          break;
        }

        run.attemptsMade += 1;
        run.moveTo("VALIDATING");
        const verdict = await this.evaluate(candidate, run, callMode, context.subject, visualContext);
        this.applyVerdict(run, verdict, budget);
      }
    }

    if (!run.cancelled && context.signal?.aborted && run.needed > 0) {
      run.cancelled = true;
    }

    const finalState = this.terminalState(run);
    run.moveTo(finalState);
    const record = this.buildRecord(run, budget, finalState);

    if (finalState !== "FILLED") {
      console.warn(
        `[generation] ${cell.id} ended ${finalState}: ${run.accepted.length}/${cell.targetCount} after ${run.attemptsMade}/${budget.maxAttemptsPerCell} attempt(s)` +
          (run.lastFailureReason ? ` (last failure: ${run.lastFailureReason.kind})` : "")
      );
    } else {
      this.log(`${cell.id} FILLED ${run.accepted.length}/${cell.targetCount} in ${run.attemptsMade} attempt(s).`);
    }

    return { cell, accepted: [...run.accepted], record, traces: [...run.traces] };
  }

  private async resolveVisualContext(cell: Cell, run: CellRun): Promise<VisualContext | null> {
    const contextId = cell.topic.visualContextId;
    if (!contextId) {
      return null;
    }

    let resolved: VisualContext | null;
    try {
      resolved = await this.dependencies.visualContexts.resolve(contextId);
    } catch (error) {
      const message = `Visual context "${contextId}" could not be read: ${formatError(error)}`;
      run.fail({ kind: "visual_context_unavailable", message });
      console.warn(`[visual] ${cell.id}: ${message}; generating text questions.`);
      return null;
    }

    if (!resolved || resolved.images.length === 0) {
      run.fail({
        kind: "visual_context_unavailable",
        message: `Visual context "${contextId}" was not found or has no images.`
      });
      console.warn(`[visual] ${cell.id}: visual context "${contextId}" unavailable; generating text questions.`);
      return null;
    }

    return resolved;
  }

  private generate(
    mode: GenerationMode,
    cell: Cell,
    subject: string,
    count: number,
    visualContext: VisualContext | null
  ): Promise<GenerationResult> {
    const label = `${cell.id} x${count}`;

    if (mode === "vision" && visualContext) {
      return this.dependencies.client.generateVision({
        stage: "vision_generation",
        label,
        systemPrompt: VISION_SYSTEM_PROMPT,
        prompt: buildVisionPrompt({ subject, cell, count, context: visualContext }),
        images: visualContext.images,
        mock: () => buildMockResponse({ subject, cell, count, visual: true })
      });
    }

    return this.dependencies.client.generateText({
      stage: "text_generation",
      label,
      systemPrompt: TEXT_SYSTEM_PROMPT,
      prompt: buildTextPrompt({ subject, cell, count }),
      mock: () => buildMockResponse({ subject, cell, count, visual: false })
    });
  }

  private recordCallFailure(run: CellRun, mode: GenerationMode, error: unknown, budget: RetryBudget): void {
    run.attemptsMade += 1;

    if (error instanceof GenerationError && error.trace) {
      run.traces.push(error.trace);
    }

    if (error instanceof MalformedOutputError) {
      run.malformedCount += 1;
      run.fail({ kind: "malformed_output", message: error.message });
    } else {
      run.transportFailureCount += 1;
      run.fail({ kind: "transport", message: formatError(error) });
    }

    run.moveTo("REJECTED");
    this.log(
      `${run.cell.id} attempt ${run.attemptsMade}/${budget.maxAttemptsPerCell} ${mode} call failed (${run.lastFailureReason?.kind}): ${truncate(formatError(error), 160)}`
    );

    if (mode === "vision") {
      run.mode = "text";
      run.fellBackToText = true;
      console.warn(`[generation] ${run.cell.id} vision generation failed; continuing with text generation.`);
    }
  }

  private async evaluate(
    candidate: QuestionCandidate,
    run: CellRun,
    mode: GenerationMode,
    subject: string,
    visualContext: VisualContext | null
  ): Promise<CandidateVerdict> {
    const fingerprint = computeFingerprint(candidate.questionText, candidate.options);
    if (this.dependencies.ledger.seen(fingerprint)) {
      return { kind: "duplicate", fingerprint };
    }

    const fromVision = mode === "vision" && visualContext !== null;
    const errors = this.dependencies.validator.validate(candidate, { subject, requiresVisualCue: fromVision });
    const correctOption = parseOptionKey(candidate.correctAnswer);
    if (errors.length > 0 || !correctOption || candidate.options.length !== 4) {
      return { kind: "invalid", errors };
    }

    const [optionA, optionB, optionC, optionD] = candidate.options.map((option) => option.trim());
    const question: Question = {
      id: this.createQuestionId(),
      cellId: run.cell.id,
      sectionName: run.cell.sectionName,
      mainTopic: run.cell.topic.mainTopic,
      subtopic: run.cell.topic.subtopic,
      difficulty: run.cell.difficulty,
      text: candidate.questionText.trim(),
      options: [optionA, optionB, optionC, optionD],
      correctOption,
      explanation: candidate.explanation.trim(),
      references: candidate.references.map((reference) => reference.trim()).filter(Boolean),
      generationMode: mode,
      attemptNumber: run.attemptsMade,
      fingerprint,
      createdAt: this.now().toISOString(),
      ...(fromVision && visualContext ? this.visualTags(candidate, visualContext) : {})
    };

    // Check-then-record is atomic inside the ledger; losing here means another cell took it first.
    const claimed = await this.dependencies.ledger.claim(fingerprint, question.id);
    if (!claimed) {
      return { kind: "duplicate", fingerprint };
    }

    return { kind: "accepted", question };
  }

  private visualTags(
    candidate: QuestionCandidate,
    context: VisualContext
  ): Pick<Question, "visualReference" | "visualDescription" | "sourceDocument"> {
    return {
      visualReference: context.imageReference ?? context.id,
      visualDescription: candidate.visualDescription ?? context.description,
      sourceDocument: context.sourceDocument
    };
  }

  private applyVerdict(run: CellRun, verdict: CandidateVerdict, budget: RetryBudget): void {
    const attemptLabel = `${run.cell.id} attempt ${run.attemptsMade}/${budget.maxAttemptsPerCell}`;

    switch (verdict.kind) {
      case "accepted":
        run.accepted.push(verdict.question);
        run.moveTo("ACCEPTED");
        this.log(`${attemptLabel} accepted ${verdict.question.id} (${run.accepted.length}/${run.cell.targetCount}).`);
        return;
      case "duplicate":
        run.duplicateCount += 1;
        run.fail({ kind: "duplicate", message: `Question already issued (fingerprint ${verdict.fingerprint.slice(0, 12)}).` });
        run.moveTo("REJECTED");
        this.log(`${attemptLabel} rejected as duplicate.`);
        return;
      case "invalid":
        run.invalidCount += 1;
        run.fail({
          kind: "validation",
          message: verdict.errors.map((error) => error.message).join(" ") || "Candidate failed validation."
        });
        run.moveTo("REJECTED");
        this.log(`${attemptLabel} rejected: ${verdict.errors.map((error) => error.code).join(", ")}.`);
        return;
    }
  }

  private terminalState(run: CellRun): TerminalCellState {
    if (run.needed <= 0) {
      return "FILLED";
    }
    return run.accepted.length > 0 ? "PARTIAL" : "EXHAUSTED";
  }

  private buildRecord(run: CellRun, budget: RetryBudget, state: TerminalCellState): GenerationAttemptRecord {
    return {
      cellId: run.cell.id,
      targetCount: run.cell.targetCount,
      maxAttempts: budget.maxAttemptsPerCell,
      attemptsMade: run.attemptsMade,
      acceptedCount: run.accepted.length,
      duplicateCount: run.duplicateCount,
      invalidCount: run.invalidCount,
      malformedCount: run.malformedCount,
      transportFailureCount: run.transportFailureCount,
      lastFailureReason: run.lastFailureReason,
      initialMode: run.initialMode,
      finalMode: run.mode,
      fellBackToText: run.fellBackToText,
      state,
      cancelled: run.cancelled
    };
  }

  private log(message: string): void {
    if (this.dependencies.verbose) {
      console.log(`[generation] ${message}`);
    }
  }
}
