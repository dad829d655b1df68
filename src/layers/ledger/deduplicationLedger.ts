import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";

import { LedgerPersistenceError, formatError } from "../../domain/errors.js";
import type { LedgerEntry } from "../../domain/models.js";
import { isObject } from "../../utils/json.js";

export interface LedgerPersistence {
  read(): Promise<LedgerEntry[]>;
  write(entries: LedgerEntry[]): Promise<void>;
}

interface LedgerFile {
  version: 1;
  entries: LedgerEntry[];
}

/** JSON-file store. A missing file is an empty ledger; writes go through a temp file and rename. */
export class FileLedgerPersistence implements LedgerPersistence {
  constructor(private readonly filePath: string) {}

  async read(): Promise<LedgerEntry[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isObject(parsed) || !Array.isArray(parsed.entries)) {
      throw new Error(`Ledger file ${this.filePath} has no entries array.`);
    }

    return parsed.entries.filter(isLedgerEntry);
  }

  async write(entries: LedgerEntry[]): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    const payload: LedgerFile = { version: 1, entries };
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tempPath, JSON.stringify(payload, null, 2), "utf8");
    await rename(tempPath, this.filePath);
  }
}

export class InMemoryLedgerPersistence implements LedgerPersistence {
  private stored: LedgerEntry[];

  constructor(initial: LedgerEntry[] = []) {
    this.stored = [...initial];
  }

  async read(): Promise<LedgerEntry[]> {
    return [...this.stored];
  }

  async write(entries: LedgerEntry[]): Promise<void> {
    this.stored = [...entries];
  }

  get snapshot(): LedgerEntry[] {
    return [...this.stored];
  }
}

export interface DeduplicationLedgerOptions {
  /** Persist after every accepted record instead of waiting for an explicit flush. */
  flushOnRecord: boolean;
  now: () => Date;
}

/**
 * Process-wide set of fingerprints of accepted questions.
 *
 * `claim` is the check-then-record section shared by concurrent cells: the
 * test and the insert happen synchronously, before any await, so only one
 * caller can win a given fingerprint. Persistence is serialized through a
 * single write chain.
 */
export class DeduplicationLedger {
  private readonly entriesByFingerprint = new Map<string, LedgerEntry>();
  private readonly options: DeduplicationLedgerOptions;
  private writeChain: Promise<void> = Promise.resolve();
  private dirty = false;

  constructor(
    private readonly persistence: LedgerPersistence,
    options: Partial<DeduplicationLedgerOptions> = {}
  ) {
    this.options = { flushOnRecord: true, now: () => new Date(), ...options };
  }

  get size(): number {
    return this.entriesByFingerprint.size;
  }

  async load(): Promise<void> {
    let entries: LedgerEntry[];
    try {
      entries = await this.persistence.read();
    } catch (error) {
      throw new LedgerPersistenceError(`Failed to load question ledger: ${formatError(error)}`, { cause: error });
    }

    for (const entry of entries) {
      if (!this.entriesByFingerprint.has(entry.fingerprint)) {
        this.entriesByFingerprint.set(entry.fingerprint, entry);
      }
    }
    this.log(`Loaded ${entries.length} fingerprint(s); ${this.size} tracked.`);
  }

  seen(fingerprint: string): boolean {
    return this.entriesByFingerprint.has(fingerprint);
  }

  get(fingerprint: string): LedgerEntry | undefined {
    return this.entriesByFingerprint.get(fingerprint);
  }

  /** Records a fingerprint. An existing entry is never overwritten. */
  async record(fingerprint: string, questionId: string): Promise<void> {
    await this.claim(fingerprint, questionId);
  }

  /** Atomically records `fingerprint` unless present. Resolves false when another caller already holds it. */
  async claim(fingerprint: string, questionId: string): Promise<boolean> {
    if (this.entriesByFingerprint.has(fingerprint)) {
      return false;
    }

    this.entriesByFingerprint.set(fingerprint, {
      fingerprint,
      questionId,
      firstSeenAt: this.options.now().toISOString()
    });
    this.dirty = true;

    if (this.options.flushOnRecord) {
      await this.flush();
    }
    return true;
  }

  async flush(): Promise<void> {
    const run = this.writeChain.then(async () => {
      if (!this.dirty) {
        return;
      }
      this.dirty = false;
      try {
        await this.persistence.write(this.entries());
      } catch (error) {
        this.dirty = true;
        throw new LedgerPersistenceError(`Failed to flush question ledger: ${formatError(error)}`, {
          cause: error
        });
      }
    });

    // Later flushes still run after a failed one; the failure surfaces to this caller.
    this.writeChain = run.catch(() => undefined);
    return run;
  }

  entries(): LedgerEntry[] {
    return [...this.entriesByFingerprint.values()];
  }

  /** Forgets every used question and persists the empty ledger. */
  async clear(): Promise<void> {
    this.entriesByFingerprint.clear();
    this.dirty = true;
    await this.flush();
    this.log("Cleared all tracked fingerprints.");
  }

  private log(message: string): void {
    console.log(`[ledger] ${message}`);
  }
}

function isLedgerEntry(value: unknown): value is LedgerEntry {
  return (
    isObject(value) &&
    typeof value.fingerprint === "string" &&
    typeof value.questionId === "string" &&
    typeof value.firstSeenAt === "string"
  );
}

function isMissingFile(error: unknown): boolean {
  return isObject(error) && error.code === "ENOENT";
}
