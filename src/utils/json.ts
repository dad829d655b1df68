/**
 * Pulls the first JSON document out of model output that may be wrapped in a
 * code fence or surrounded by prose.
 */
export function parseJsonFromModelText(raw: string): unknown {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new Error("Model returned an empty response.");
  }

  const fenced = extractFencedJson(trimmed);
  if (fenced) {
    const parsed = tryParse(fenced);
    if (parsed.ok) {
      return parsed.value;
    }
  }

  const direct = tryParse(trimmed);
  if (direct.ok) {
    return direct.value;
  }

  // Whichever delimiter opens first is the outermost value.
  const arrayFirst = indexOrInfinity(trimmed, "[") < indexOrInfinity(trimmed, "{");
  const delimiters = arrayFirst
    ? ([["[", "]"], ["{", "}"]] as const)
    : ([["{", "}"], ["[", "]"]] as const);

  for (const [start, end] of delimiters) {
    const candidate = extractDelimitedJson(trimmed, start, end);
    if (candidate) {
      const parsed = tryParse(candidate);
      if (parsed.ok) {
        return parsed.value;
      }
    }
  }

  throw new Error("Model response did not contain valid JSON.");
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    try {
      return { ok: true, value: JSON.parse(stripTrailingCommas(text)) };
    } catch {
      return { ok: false };
    }
  }
}

export function stripTrailingCommas(text: string): string {
  return text.replace(/,(\s*[\]}])/g, "$1");
}

function indexOrInfinity(text: string, token: string): number {
  const index = text.indexOf(token);
  return index === -1 ? Number.POSITIVE_INFINITY : index;
}

function extractFencedJson(text: string): string | null {
  const match = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  return match?.[1]?.trim() ?? null;
}

function extractDelimitedJson(text: string, start: string, end: string): string | null {
  const startIndex = text.indexOf(start);
  const endIndex = text.lastIndexOf(end);

  if (startIndex === -1 || endIndex === -1 || endIndex <= startIndex) {
    return null;
  }

  return text.slice(startIndex, endIndex + 1).trim();
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function asString(value: unknown, fallback = ""): string {
  if (typeof value === "string") {
    return value.trim();
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return fallback;
}

export function asStringArray(value: unknown): string[] {
  if (typeof value === "string") {
    return value.trim() ? [value.trim()] : [];
  }
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .map((item) => (typeof item === "string" ? item.trim() : ""))
    .filter((item) => item.length > 0);
}

export function asObjectArray(value: unknown): Record<string, unknown>[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value.filter(isObject);
}
