import { MalformedOutputError, formatError } from "../../domain/errors.js";
import type { QuestionCandidate } from "../../domain/models.js";
import { asObjectArray, asString, asStringArray, isObject, parseJsonFromModelText } from "../../utils/json.js";

const OPTION_LETTERS = ["a", "b", "c", "d"] as const;

/**
 * Decodes raw generator text into structured candidates. Field presence and
 * format are the validator's concern; this only rejects output that has no
 * question objects at all.
 */
export function parseCandidates(raw: string): QuestionCandidate[] {
  let decoded: unknown;
  try {
    decoded = parseJsonFromModelText(raw);
  } catch (error) {
    throw new MalformedOutputError(formatError(error), { cause: error });
  }

  const items = unwrapQuestionList(decoded);
  if (items.length === 0) {
    throw new MalformedOutputError("Response contained no question objects.");
  }

  return items.map(toCandidate);
}

function unwrapQuestionList(decoded: unknown): Record<string, unknown>[] {
  if (Array.isArray(decoded)) {
    return asObjectArray(decoded);
  }
  if (!isObject(decoded)) {
    return [];
  }
  if (Array.isArray(decoded.questions)) {
    return asObjectArray(decoded.questions);
  }
  return [decoded];
}

function toCandidate(value: Record<string, unknown>): QuestionCandidate {
  const visualDescription = firstString(value, ["image_description", "visual_description", "imageDescription"]);

  return {
    questionText: firstString(value, ["question_text", "question_text_en", "questionText", "question", "text"]),
    options: readOptions(value),
    correctAnswer: firstString(value, ["correct_answer", "correctAnswer", "answer", "correct_option"]),
    explanation: firstString(value, ["explanation", "solution"]),
    references: asStringArray(value.references ?? value.reference),
    ...(visualDescription ? { visualDescription } : {})
  };
}

function readOptions(value: Record<string, unknown>): string[] {
  if (Array.isArray(value.options)) {
    return value.options.map((option) => asString(option));
  }

  if (isObject(value.options)) {
    const options = value.options;
    return OPTION_LETTERS.map((letter) => asString(options[letter.toUpperCase()] ?? options[letter]));
  }

  const lettered = OPTION_LETTERS.map((letter) => firstString(value, [`option_${letter}`, `option_${letter}_en`]));
  // Keep the slot count at four so the validator reports which one is missing.
  return lettered;
}

function firstString(value: Record<string, unknown>, keys: readonly string[]): string {
  for (const key of keys) {
    const candidate = asString(value[key]);
    if (candidate) {
      return candidate;
    }
  }
  return "";
}
