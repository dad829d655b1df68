import type { AgentMode } from "../../config/runtimeConfig.js";
import type { GenerationMode, VisualImage } from "../../domain/models.js";

export interface GenerationRequest {
  stage: string;
  label: string;
  systemPrompt: string;
  prompt: string;
  /** Canned response used in mock mode. */
  mock: () => string;
}

export interface VisionGenerationRequest extends GenerationRequest {
  images: VisualImage[];
}

export interface GenerationTrace {
  traceId: string;
  stage: string;
  label: string;
  generationMode: GenerationMode;
  runtimeMode: AgentMode;
  model: string;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  attemptCount: number;
  inputTokens: number;
  outputTokens: number;
  succeeded: boolean;
  errorMessage?: string;
}

export interface GenerationResult {
  text: string;
  trace: GenerationTrace;
}

/**
 * The two external capabilities the orchestrator depends on. Both either
 * resolve with raw model text or reject with a GenerationError; any timeout
 * and retry handling happens behind this seam.
 */
export interface GenerationClient {
  generateText(request: GenerationRequest): Promise<GenerationResult>;
  generateVision(request: VisionGenerationRequest): Promise<GenerationResult>;
}
