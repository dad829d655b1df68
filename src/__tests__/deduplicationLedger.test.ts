import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { LedgerPersistenceError } from "../domain/errors.js";
import type { LedgerEntry } from "../domain/models.js";
import {
  DeduplicationLedger,
  FileLedgerPersistence,
  InMemoryLedgerPersistence,
  type LedgerPersistence
} from "../layers/ledger/deduplicationLedger.js";
import { computeFingerprint } from "../layers/ledger/fingerprint.js";

const fixedNow = () => new Date("2026-03-01T10:00:00.000Z");

class FailingPersistence implements LedgerPersistence {
  async read(): Promise<LedgerEntry[]> {
    throw new Error("disk unavailable");
  }

  async write(): Promise<void> {
    throw new Error("disk full");
  }
}

describe("computeFingerprint", () => {
  it("ignores case, spacing and option order", () => {
    const original = computeFingerprint("What is  the yield strength?", ["A", "B", "C", "D"]);
    const variant = computeFingerprint(" what is the Yield Strength? ", ["d", "c", "b", "a"]);
    expect(variant).toBe(original);
  });

  it("changes when the question text changes", () => {
    expect(computeFingerprint("Question one", ["A", "B", "C", "D"])).not.toBe(
      computeFingerprint("Question two", ["A", "B", "C", "D"])
    );
  });
});

describe("DeduplicationLedger", () => {
  let directory: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    directory = await mkdtemp(path.join(os.tmpdir(), "ledger-test-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(directory, { recursive: true, force: true });
  });

  it("starts empty when the ledger file does not exist", async () => {
    const ledger = new DeduplicationLedger(new FileLedgerPersistence(path.join(directory, "ledger.json")));
    await ledger.load();
    expect(ledger.size).toBe(0);
  });

  it("persists claimed fingerprints across instances", async () => {
    const filePath = path.join(directory, "nested", "ledger.json");
    const first = new DeduplicationLedger(new FileLedgerPersistence(filePath), { now: fixedNow });
    await first.load();

    expect(await first.claim("fp-1", "question-1")).toBe(true);

    const stored: unknown = JSON.parse(await readFile(filePath, "utf8"));
    expect(stored).toEqual({
      version: 1,
      entries: [{ fingerprint: "fp-1", questionId: "question-1", firstSeenAt: "2026-03-01T10:00:00.000Z" }]
    });

    const second = new DeduplicationLedger(new FileLedgerPersistence(filePath));
    await second.load();
    expect(second.seen("fp-1")).toBe(true);
    expect(second.get("fp-1")?.questionId).toBe("question-1");
  });

  it("lets only one of several concurrent claims win", async () => {
    const ledger = new DeduplicationLedger(new InMemoryLedgerPersistence());
    const results = await Promise.all([
      ledger.claim("fp-shared", "question-a"),
      ledger.claim("fp-shared", "question-b"),
      ledger.claim("fp-shared", "question-c")
    ]);

    expect(results).toEqual([true, false, false]);
    expect(ledger.get("fp-shared")?.questionId).toBe("question-a");
  });

  it("never overwrites an existing entry on record", async () => {
    const ledger = new DeduplicationLedger(new InMemoryLedgerPersistence(), { now: fixedNow });
    await ledger.record("fp-1", "question-1");
    await ledger.record("fp-1", "question-2");

    expect(ledger.entries()).toEqual([
      { fingerprint: "fp-1", questionId: "question-1", firstSeenAt: "2026-03-01T10:00:00.000Z" }
    ]);
  });

  it("defers writes until flush when flushOnRecord is off", async () => {
    const persistence = new InMemoryLedgerPersistence();
    const ledger = new DeduplicationLedger(persistence, { flushOnRecord: false });

    await ledger.claim("fp-1", "question-1");
    expect(persistence.snapshot).toEqual([]);

    await ledger.flush();
    expect(persistence.snapshot.map((entry) => entry.fingerprint)).toEqual(["fp-1"]);
  });

  it("wraps load failures in LedgerPersistenceError", async () => {
    const ledger = new DeduplicationLedger(new FailingPersistence());
    await expect(ledger.load()).rejects.toBeInstanceOf(LedgerPersistenceError);
  });

  it("rejects a corrupt ledger file", async () => {
    const filePath = path.join(directory, "ledger.json");
    await writeFile(filePath, "{ not json", "utf8");

    const ledger = new DeduplicationLedger(new FileLedgerPersistence(filePath));
    await expect(ledger.load()).rejects.toBeInstanceOf(LedgerPersistenceError);
  });

  it("surfaces flush failures to the claiming caller", async () => {
    const ledger = new DeduplicationLedger(new FailingPersistence());
    await expect(ledger.claim("fp-1", "question-1")).rejects.toThrow("Failed to flush question ledger: disk full");
  });

  it("clears every entry and persists the empty ledger", async () => {
    const persistence = new InMemoryLedgerPersistence([
      { fingerprint: "fp-old", questionId: "question-old", firstSeenAt: "2025-12-01T00:00:00.000Z" }
    ]);
    const ledger = new DeduplicationLedger(persistence);
    await ledger.load();
    expect(ledger.seen("fp-old")).toBe(true);

    await ledger.clear();

    expect(ledger.size).toBe(0);
    expect(persistence.snapshot).toEqual([]);
  });
});
