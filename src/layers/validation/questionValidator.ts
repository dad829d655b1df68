import { OPTION_KEYS, type OptionKey, type QuestionCandidate, type ValidationError } from "../../domain/models.js";
import { normalizeForComparison } from "../../utils/text.js";

export const DEFAULT_VISUAL_CUE_PHRASES: readonly string[] = [
  "shown",
  "diagram",
  "figure",
  "graph",
  "image",
  "illustrated",
  "depicted",
  "displayed",
  "curve",
  "plot",
  "chart",
  "table",
  "above",
  "below"
];

export interface QuestionValidatorOptions {
  minExplanationLength: number;
  minReferences: number;
  /** Subjects whose questions may omit references. */
  trustedSubjects: string[];
  minOptionLength: number;
  visualCuePhrases: readonly string[];
}

export const DEFAULT_VALIDATOR_OPTIONS: QuestionValidatorOptions = {
  minExplanationLength: 20,
  minReferences: 1,
  trustedSubjects: [],
  minOptionLength: 1,
  visualCuePhrases: DEFAULT_VISUAL_CUE_PHRASES
};

export interface ValidationContext {
  subject: string;
  /** True for candidates derived from a diagram: the question must point at the figure. */
  requiresVisualCue: boolean;
}

export function parseOptionKey(value: string): OptionKey | null {
  const normalized = value.trim().toUpperCase();
  return OPTION_KEYS.find((key) => key === normalized) ?? null;
}

export class QuestionValidator {
  private readonly options: QuestionValidatorOptions;
  private readonly trustedSubjects: Set<string>;

  constructor(options: Partial<QuestionValidatorOptions> = {}) {
    this.options = { ...DEFAULT_VALIDATOR_OPTIONS, ...options };
    this.trustedSubjects = new Set(this.options.trustedSubjects.map(normalizeForComparison));
  }

  /** Returns every failed check; an empty list means the candidate is valid. */
  validate(candidate: QuestionCandidate, context: ValidationContext): ValidationError[] {
    return [
      ...this.checkOptions(candidate.options),
      ...this.checkAnswerKey(candidate.correctAnswer),
      ...this.checkExplanation(candidate.explanation),
      ...this.checkReferences(candidate.references, context.subject),
      ...this.checkVisualCue(candidate.questionText, context.requiresVisualCue),
      ...this.checkQuestionText(candidate.questionText),
      ...this.checkOptionLength(candidate.options)
    ];
  }

  minimumReferencesFor(subject: string): number {
    return this.trustedSubjects.has(normalizeForComparison(subject)) ? 0 : this.options.minReferences;
  }

  private checkOptions(options: string[]): ValidationError[] {
    const errors: ValidationError[] = [];

    if (options.length !== OPTION_KEYS.length) {
      errors.push({
        code: "option_count",
        message: `Expected exactly ${OPTION_KEYS.length} options, got ${options.length}.`
      });
    }

    options.forEach((option, index) => {
      if (!option.trim()) {
        errors.push({ code: "option_empty", message: `Option ${optionLabel(index)} is empty.` });
      }
    });

    const seen = new Map<string, number>();
    options.forEach((option, index) => {
      const normalized = normalizeForComparison(option);
      if (!normalized) {
        return;
      }
      const firstIndex = seen.get(normalized);
      if (firstIndex !== undefined) {
        errors.push({
          code: "option_duplicate",
          message: `Option ${optionLabel(index)} duplicates option ${optionLabel(firstIndex)}.`
        });
        return;
      }
      seen.set(normalized, index);
    });

    return errors;
  }

  private checkAnswerKey(correctAnswer: string): ValidationError[] {
    if (parseOptionKey(correctAnswer)) {
      return [];
    }
    return [
      {
        code: "answer_key",
        message: `Correct answer must be one of ${OPTION_KEYS.join(", ")} (got "${correctAnswer}").`
      }
    ];
  }

  private checkExplanation(explanation: string): ValidationError[] {
    const length = explanation.trim().length;
    if (length === 0) {
      return [{ code: "explanation_empty", message: "Explanation is empty." }];
    }
    if (length < this.options.minExplanationLength) {
      return [
        {
          code: "explanation_short",
          message: `Explanation has ${length} characters; at least ${this.options.minExplanationLength} required.`
        }
      ];
    }
    return [];
  }

  private checkReferences(references: string[], subject: string): ValidationError[] {
    const required = this.minimumReferencesFor(subject);
    const present = references.filter((reference) => reference.trim().length > 0).length;
    if (present >= required) {
      return [];
    }
    return [
      {
        code: "references_missing",
        message: `Found ${present} reference(s); at least ${required} required.`
      }
    ];
  }

  private checkVisualCue(questionText: string, requiresVisualCue: boolean): ValidationError[] {
    if (!requiresVisualCue) {
      return [];
    }

    const normalized = normalizeForComparison(questionText);
    const hasCue = this.options.visualCuePhrases.some((phrase) =>
      normalized.includes(normalizeForComparison(phrase))
    );
    if (hasCue) {
      return [];
    }
    return [
      {
        code: "visual_cue_missing",
        message: "Diagram-based question does not refer to the accompanying figure."
      }
    ];
  }

  private checkQuestionText(questionText: string): ValidationError[] {
    return questionText.trim() ? [] : [{ code: "question_text_empty", message: "Question text is empty." }];
  }

  private checkOptionLength(options: string[]): ValidationError[] {
    if (this.options.minOptionLength <= 1) {
      return [];
    }

    const errors: ValidationError[] = [];
    options.forEach((option, index) => {
      const length = option.trim().length;
      if (length > 0 && length < this.options.minOptionLength) {
        errors.push({
          code: "option_too_short",
          message: `Option ${optionLabel(index)} has ${length} character(s); at least ${this.options.minOptionLength} required.`
        });
      }
    });
    return errors;
  }
}

function optionLabel(index: number): string {
  return OPTION_KEYS[index] ?? `#${index + 1}`;
}
