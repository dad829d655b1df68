import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { GenerationError, LedgerPersistenceError } from "../domain/errors.js";
import type { Cell, LedgerEntry, RetryBudget, VisualContext } from "../domain/models.js";
import {
  GenerationOrchestrator,
  resolveRetryBudget
} from "../layers/generation/generationOrchestrator.js";
import {
  DeduplicationLedger,
  InMemoryLedgerPersistence,
  type LedgerPersistence
} from "../layers/ledger/deduplicationLedger.js";
import { computeFingerprint } from "../layers/ledger/fingerprint.js";
import { QuestionValidator } from "../layers/validation/questionValidator.js";
import { InMemoryVisualContextProvider } from "../layers/visual/visualContextProvider.js";
import { ScriptedGenerationClient, mcq, reply, type ScriptFunction, type ScriptStep } from "./helpers/scriptedClient.js";

const SUBJECT = "Materials Engineering";
const OPTIONS = ["Ferrite", "Austenite", "Cementite", "Martensite"];

const figure: VisualContext = {
  id: "fig-1",
  text: "Iron-carbon phase diagram with the eutectoid point marked",
  images: [{ data: new Uint8Array([137, 80, 78, 71]), mediaType: "image/png" }],
  imageReference: "fig-1.png",
  description: "Iron-carbon phase diagram",
  sourceDocument: "metallurgy-notes.pdf"
};

function cell(overrides: Partial<Cell> = {}): Cell {
  return {
    id: "0:0:Easy",
    sectionIndex: 0,
    sectionName: "Section A",
    topicIndex: 0,
    topic: { mainTopic: "Phase Diagrams", subtopic: "Iron-carbon system" },
    difficulty: "Easy",
    targetCount: 2,
    ...overrides
  };
}

const visualCell = (targetCount: number): Cell =>
  cell({ targetCount, topic: { mainTopic: "Phase Diagrams", subtopic: "Iron-carbon system", visualContextId: "fig-1" } });

function budget(maxAttemptsPerCell: number): RetryBudget {
  return { maxAttemptsPerCell };
}

function setup(script: ScriptStep[] | ScriptFunction, ledger?: DeduplicationLedger) {
  const client = new ScriptedGenerationClient(script);
  const transitions: string[] = [];
  let sequence = 0;

  const activeLedger = ledger ?? new DeduplicationLedger(new InMemoryLedgerPersistence());
  const orchestrator = new GenerationOrchestrator({
    client,
    validator: new QuestionValidator(),
    ledger: activeLedger,
    visualContexts: new InMemoryVisualContextProvider([figure]),
    createQuestionId: () => {
      sequence += 1;
      return `q-${sequence}`;
    },
    now: () => new Date("2026-03-01T10:00:00.000Z"),
    onTransition: (_cellId, from, to) => transitions.push(`${from}->${to}`)
  });

  return { client, ledger: activeLedger, orchestrator, transitions };
}

class WriteFailingPersistence implements LedgerPersistence {
  async read(): Promise<LedgerEntry[]> {
    return [];
  }

  async write(): Promise<void> {
    throw new Error("read-only file system");
  }
}

describe("resolveRetryBudget", () => {
  it("scales with the target and respects the floor", () => {
    expect(resolveRetryBudget(1)).toEqual({ maxAttemptsPerCell: 4 });
    expect(resolveRetryBudget(5)).toEqual({ maxAttemptsPerCell: 15 });
  });

  it("uses a fixed per-cell maximum when configured", () => {
    expect(resolveRetryBudget(5, { attemptsPerQuestion: 3, minAttemptsPerCell: 4, maxAttemptsPerCell: 2 })).toEqual({
      maxAttemptsPerCell: 2
    });
  });
});

describe("GenerationOrchestrator.fill", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("fills a cell after a malformed reply and a duplicate", async () => {
    const ledger = new DeduplicationLedger(
      new InMemoryLedgerPersistence([
        {
          fingerprint: computeFingerprint("Seen before", OPTIONS),
          questionId: "old-question",
          firstSeenAt: "2026-01-01T00:00:00.000Z"
        }
      ])
    );
    await ledger.load();

    const { client, orchestrator } = setup(
      ["Sorry, I cannot help with that.", reply(mcq("Seen before")), reply(mcq("Question one"), mcq("Question two"))],
      ledger
    );

    const outcome = await orchestrator.fill(cell(), budget(6), { subject: SUBJECT });

    expect(client.calls).toHaveLength(3);
    expect(outcome.record).toMatchObject({
      state: "FILLED",
      attemptsMade: 4,
      acceptedCount: 2,
      malformedCount: 1,
      duplicateCount: 1,
      invalidCount: 0,
      transportFailureCount: 0,
      cancelled: false
    });
    expect(outcome.accepted.map((question) => [question.id, question.text, question.attemptNumber])).toEqual([
      ["q-1", "Question one", 3],
      ["q-2", "Question two", 4]
    ]);
    expect(outcome.accepted[0]).toMatchObject({
      cellId: "0:0:Easy",
      sectionName: "Section A",
      mainTopic: "Phase Diagrams",
      subtopic: "Iron-carbon system",
      difficulty: "Easy",
      options: OPTIONS,
      correctOption: "B",
      generationMode: "text",
      createdAt: "2026-03-01T10:00:00.000Z"
    });
    expect(outcome.accepted[0].visualReference).toBeUndefined();
    expect(outcome.traces).toHaveLength(3);
    expect(ledger.size).toBe(3);
    expect(ledger.seen(outcome.accepted[1].fingerprint)).toBe(true);
  });

  it("walks the cell through its states", async () => {
    const { orchestrator, transitions } = setup([reply(mcq("Question one"))]);

    await orchestrator.fill(cell({ targetCount: 1 }), budget(4), { subject: SUBJECT });

    expect(transitions).toEqual([
      "PENDING->GENERATING",
      "GENERATING->VALIDATING",
      "VALIDATING->ACCEPTED",
      "ACCEPTED->FILLED"
    ]);
  });

  it("never exceeds the attempt budget", async () => {
    let counter = 0;
    const { client, orchestrator } = setup(() => {
      counter += 1;
      return reply(mcq(`Weak question ${counter}`, { explanation: "short" }));
    });

    const outcome = await orchestrator.fill(cell({ targetCount: 1 }), budget(4), { subject: SUBJECT });

    expect(client.calls).toHaveLength(4);
    expect(outcome.record).toMatchObject({ state: "EXHAUSTED", attemptsMade: 4, invalidCount: 4, acceptedCount: 0 });
    expect(outcome.record.lastFailureReason).toEqual({
      kind: "validation",
      message: "Explanation has 5 characters; at least 20 required."
    });
  });

  it("discards candidates beyond the remaining budget unexamined", async () => {
    const weak = [1, 2, 3, 4, 5].map((index) => mcq(`Weak question ${index}`, { explanation: "short" }));
    const { client, orchestrator } = setup([reply(...weak)]);

    const outcome = await orchestrator.fill(cell({ targetCount: 3 }), budget(2), { subject: SUBJECT });

    expect(client.calls).toHaveLength(1);
    expect(outcome.record).toMatchObject({ state: "EXHAUSTED", attemptsMade: 2, invalidCount: 2 });
  });

  it("discards candidates beyond the target without recording them", async () => {
    const { ledger, orchestrator } = setup([reply(mcq("First"), mcq("Second"), mcq("Third"))]);

    const outcome = await orchestrator.fill(cell({ targetCount: 1 }), budget(4), { subject: SUBJECT });

    expect(outcome.accepted.map((question) => question.text)).toEqual(["First"]);
    expect(outcome.record.attemptsMade).toBe(1);
    expect(ledger.size).toBe(1);
  });

  it("ends PARTIAL when transport failures use up the budget", async () => {
    const { orchestrator } = setup([
      reply(mcq("Only one")),
      new GenerationError("request timed out", "text"),
      new Error("socket hang up")
    ]);

    const outcome = await orchestrator.fill(cell({ targetCount: 2 }), budget(3), { subject: SUBJECT });

    expect(outcome.accepted).toHaveLength(1);
    expect(outcome.record).toMatchObject({
      state: "PARTIAL",
      attemptsMade: 3,
      transportFailureCount: 2,
      lastFailureReason: { kind: "transport", message: "socket hang up" }
    });
  });

  it("tags vision questions and rejects ones that ignore the figure", async () => {
    const { client, orchestrator } = setup([
      reply(mcq("Which phase exists at 1000 °C?"), mcq("In the diagram shown, which phase exists at point P?"))
    ]);

    const outcome = await orchestrator.fill(visualCell(1), budget(4), { subject: SUBJECT });

    expect(client.modes).toEqual(["vision"]);
    expect(outcome.record).toMatchObject({ state: "FILLED", attemptsMade: 2, invalidCount: 1, initialMode: "vision" });
    expect(outcome.accepted[0]).toMatchObject({
      text: "In the diagram shown, which phase exists at point P?",
      generationMode: "vision",
      visualReference: "fig-1.png",
      visualDescription: "Iron-carbon phase diagram",
      sourceDocument: "metallurgy-notes.pdf"
    });
  });

  it("falls back to text for the rest of the cell after a vision failure", async () => {
    const { client, orchestrator } = setup([
      new GenerationError("vision model unavailable", "vision"),
      reply(mcq("Text question one")),
      reply(mcq("Text question two"))
    ]);

    const outcome = await orchestrator.fill(visualCell(2), budget(6), { subject: SUBJECT });

    expect(client.modes).toEqual(["vision", "text", "text"]);
    expect(outcome.record).toMatchObject({
      state: "FILLED",
      attemptsMade: 3,
      transportFailureCount: 1,
      initialMode: "vision",
      finalMode: "text",
      fellBackToText: true
    });
    expect(outcome.accepted.map((question) => question.generationMode)).toEqual(["text", "text"]);
    expect(outcome.accepted.every((question) => question.visualReference === undefined)).toBe(true);
  });

  it("treats malformed vision output as a reason to fall back", async () => {
    const { client, orchestrator } = setup(["no json here", reply(mcq("Text question"))]);

    const outcome = await orchestrator.fill(visualCell(1), budget(4), { subject: SUBJECT });

    expect(client.modes).toEqual(["vision", "text"]);
    expect(outcome.record).toMatchObject({ state: "FILLED", malformedCount: 1, fellBackToText: true });
  });

  it("generates text questions when the visual context cannot be resolved", async () => {
    const { client, orchestrator } = setup([reply(mcq("Plain question"))]);
    const missing = cell({
      targetCount: 1,
      topic: { mainTopic: "Phase Diagrams", subtopic: "Iron-carbon system", visualContextId: "missing" }
    });

    const outcome = await orchestrator.fill(missing, budget(4), { subject: SUBJECT });

    expect(client.modes).toEqual(["text"]);
    expect(outcome.record).toMatchObject({ state: "FILLED", initialMode: "text", fellBackToText: false });
    expect(outcome.record.lastFailureReason?.kind).toBe("visual_context_unavailable");
  });

  it("propagates ledger persistence failures", async () => {
    const ledger = new DeduplicationLedger(new WriteFailingPersistence());
    const { orchestrator } = setup([reply(mcq("Question one"))], ledger);

    await expect(orchestrator.fill(cell({ targetCount: 1 }), budget(4), { subject: SUBJECT })).rejects.toBeInstanceOf(
      LedgerPersistenceError
    );
  });

  it("does not start a cell once the run is cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const { client, orchestrator } = setup([reply(mcq("Never requested"))]);

    const outcome = await orchestrator.fill(cell(), budget(6), { subject: SUBJECT, signal: controller.signal });

    expect(client.calls).toHaveLength(0);
    expect(outcome.record).toMatchObject({ state: "EXHAUSTED", attemptsMade: 0, cancelled: true });
  });

  it("reports the configured vision mode for a vision cell cancelled before it starts", async () => {
    const controller = new AbortController();
    controller.abort();
    const { client, orchestrator } = setup([reply(mcq("Never requested"))]);

    const outcome = await orchestrator.fill(visualCell(2), budget(6), { subject: SUBJECT, signal: controller.signal });

    expect(client.calls).toHaveLength(0);
    expect(outcome.record).toMatchObject({
      state: "EXHAUSTED",
      initialMode: "vision",
      finalMode: "vision",
      fellBackToText: false,
      cancelled: true
    });
    expect(outcome.record.lastFailureReason).toBeUndefined();
  });

  it("keeps the results of the in-flight call when cancelled mid-cell", async () => {
    const controller = new AbortController();
    const { client, orchestrator } = setup(() => {
      controller.abort();
      return reply(mcq("Finished before the interrupt"));
    });

    const outcome = await orchestrator.fill(cell({ targetCount: 3 }), budget(9), {
      subject: SUBJECT,
      signal: controller.signal
    });

    expect(client.calls).toHaveLength(1);
    expect(outcome.accepted).toHaveLength(1);
    expect(outcome.record).toMatchObject({ state: "PARTIAL", attemptsMade: 1, cancelled: true });
  });
});
