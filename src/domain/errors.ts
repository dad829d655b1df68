import type { GenerationTrace } from "../agents/runtime/generationClient.js";
import type { GenerationMode } from "./models.js";

export class GenerationError extends Error {
  readonly trace?: GenerationTrace;

  constructor(
    message: string,
    readonly mode: GenerationMode,
    options?: { cause?: unknown; trace?: GenerationTrace }
  ) {
    super(message, { cause: options?.cause });
    this.name = "GenerationError";
    this.trace = options?.trace;
  }
}

export class MalformedOutputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MalformedOutputError";
  }
}

/** Ledger load/flush failure. Aborts the run: acceptance without durable dedup is not allowed. */
export class LedgerPersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LedgerPersistenceError";
  }
}

export class PaperConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = "PaperConfigError";
  }
}

export function formatError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return "Unknown runtime error.";
}
