export type DifficultyTier = "Easy" | "Medium" | "Hard";

export const DIFFICULTY_TIERS: readonly DifficultyTier[] = ["Easy", "Medium", "Hard"];

export type OptionKey = "A" | "B" | "C" | "D";

export const OPTION_KEYS: readonly OptionKey[] = ["A", "B", "C", "D"];

export type GenerationMode = "text" | "vision";

export type TierMap = Partial<Record<DifficultyTier, number>>;

export type DifficultyDistribution =
  | { kind: "fractions"; fractions: TierMap }
  | { kind: "counts"; counts: TierMap };

export interface TopicRef {
  mainTopic: string;
  subtopic: string;
  visualContextId?: string;
}

export interface SectionSpec {
  name: string;
  questionCount: number;
  difficulty: DifficultyDistribution;
  topics: TopicRef[];
}

export interface PaperConfig {
  id: string;
  name: string;
  subject: string;
  declaredTotal?: number;
  sections: SectionSpec[];
}

/** One (section, topic, difficulty) unit of work. Built fresh by every allocation. */
export interface Cell {
  id: string;
  sectionIndex: number;
  sectionName: string;
  topicIndex: number;
  topic: TopicRef;
  difficulty: DifficultyTier;
  targetCount: number;
}

export type AllocationErrorCode =
  | "invalid_question_count"
  | "invalid_fraction"
  | "fractions_not_normalized"
  | "invalid_count"
  | "counts_mismatch"
  | "no_topics"
  | "declared_total_mismatch";

export interface AllocationError {
  /** Null for paper-level problems. */
  sectionName: string | null;
  code: AllocationErrorCode;
  message: string;
}

export interface AllocationResult {
  cells: Cell[];
  errors: AllocationError[];
}

export interface VisualImage {
  data: Uint8Array;
  mediaType: string;
}

export interface VisualContext {
  id: string;
  text: string;
  images: VisualImage[];
  imageReference?: string;
  description?: string;
  sourceDocument?: string;
  pageNumber?: number;
}

/** A decoded, not yet validated, question from generator output. */
export interface QuestionCandidate {
  questionText: string;
  options: string[];
  correctAnswer: string;
  explanation: string;
  references: string[];
  visualDescription?: string;
}

export interface Question {
  id: string;
  cellId: string;
  sectionName: string;
  mainTopic: string;
  subtopic: string;
  difficulty: DifficultyTier;
  text: string;
  options: [string, string, string, string];
  correctOption: OptionKey;
  explanation: string;
  references: string[];
  visualReference?: string;
  visualDescription?: string;
  sourceDocument?: string;
  generationMode: GenerationMode;
  attemptNumber: number;
  fingerprint: string;
  createdAt: string;
}

export interface LedgerEntry {
  fingerprint: string;
  questionId: string;
  firstSeenAt: string;
}

export type ValidationErrorCode =
  | "option_count"
  | "option_empty"
  | "option_duplicate"
  | "answer_key"
  | "explanation_empty"
  | "explanation_short"
  | "references_missing"
  | "visual_cue_missing"
  | "question_text_empty"
  | "option_too_short";

export interface ValidationError {
  code: ValidationErrorCode;
  message: string;
}

export type CellState =
  | "PENDING"
  | "GENERATING"
  | "VALIDATING"
  | "ACCEPTED"
  | "REJECTED"
  | "FILLED"
  | "PARTIAL"
  | "EXHAUSTED";

export type TerminalCellState = Extract<CellState, "FILLED" | "PARTIAL" | "EXHAUSTED">;

export type FailureKind =
  | "transport"
  | "malformed_output"
  | "duplicate"
  | "validation"
  | "visual_context_unavailable";

export interface FailureReason {
  kind: FailureKind;
  message: string;
}

export interface RetryBudget {
  maxAttemptsPerCell: number;
}

export interface GenerationAttemptRecord {
  cellId: string;
  targetCount: number;
  maxAttempts: number;
  attemptsMade: number;
  acceptedCount: number;
  duplicateCount: number;
  invalidCount: number;
  malformedCount: number;
  transportFailureCount: number;
  lastFailureReason?: FailureReason;
  initialMode: GenerationMode;
  finalMode: GenerationMode;
  fellBackToText: boolean;
  state: TerminalCellState;
  cancelled: boolean;
}

export interface FulfillmentEntry {
  cellId: string;
  sectionName: string;
  mainTopic: string;
  subtopic: string;
  difficulty: DifficultyTier;
  state: TerminalCellState;
  target: number;
  actual: number;
  attemptsMade: number;
  lastFailureReason?: FailureReason;
}

export interface Paper {
  id: string;
  configId: string;
  name: string;
  subject: string;
  createdAt: string;
  config: PaperConfig;
  questions: readonly Question[];
  expectedTotal: number;
  acceptedTotal: number;
  complete: boolean;
  cancelled: boolean;
  fulfillment: readonly FulfillmentEntry[];
  allocationErrors: readonly AllocationError[];
  cellReports: readonly GenerationAttemptRecord[];
  integrityIssues: readonly string[];
}
