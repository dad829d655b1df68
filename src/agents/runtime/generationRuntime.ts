import { createGateway, generateText, type LanguageModel, type ModelMessage } from "ai";

import type { AgentMode, RuntimeConfig } from "../../config/runtimeConfig.js";
import { GenerationError, formatError } from "../../domain/errors.js";
import type { GenerationMode } from "../../domain/models.js";
import { delay } from "../../utils/concurrency.js";
import { createId } from "../../utils/text.js";
import type {
  GenerationClient,
  GenerationRequest,
  GenerationResult,
  GenerationTrace,
  VisionGenerationRequest
} from "./generationClient.js";

export type RuntimeSettings = Pick<
  RuntimeConfig,
  | "mode"
  | "gatewayApiKey"
  | "textModel"
  | "visionModel"
  | "maxOutputTokens"
  | "temperature"
  | "retryCount"
  | "requestTimeoutMs"
  | "visionTimeoutMs"
  | "verboseLogs"
>;

interface CallPlan {
  generationMode: GenerationMode;
  modelName: string;
  model: LanguageModel | null;
  timeoutMs: number;
  messages: ModelMessage[];
}

/**
 * Text and vision generation over the AI gateway. Each call is retried
 * `retryCount` times with linear back-off and bounded by its own timeout;
 * the last failure surfaces as a GenerationError.
 */
export class GenerationRuntime implements GenerationClient {
  private readonly textModel: LanguageModel | null = null;
  private readonly visionModel: LanguageModel | null = null;
  private sequence = 0;

  constructor(private readonly config: RuntimeSettings) {
    if (config.mode === "live") {
      const gw = createGateway({
        apiKey: config.gatewayApiKey
      });
      this.textModel = gw(config.textModel);
      this.visionModel = gw(config.visionModel);
    }
  }

  generateText(request: GenerationRequest): Promise<GenerationResult> {
    return this.run(request, {
      generationMode: "text",
      modelName: this.config.textModel,
      model: this.textModel,
      timeoutMs: this.config.requestTimeoutMs,
      messages: [{ role: "user", content: request.prompt }]
    });
  }

  generateVision(request: VisionGenerationRequest): Promise<GenerationResult> {
    return this.run(request, {
      generationMode: "vision",
      modelName: this.config.visionModel,
      model: this.visionModel,
      timeoutMs: this.config.visionTimeoutMs,
      messages: [
        {
          role: "user",
          content: [
            { type: "text", text: request.prompt },
            ...request.images.map((image) => ({
              type: "image" as const,
              image: image.data,
              mediaType: image.mediaType
            }))
          ]
        }
      ]
    });
  }

  private async run(request: GenerationRequest, plan: CallPlan): Promise<GenerationResult> {
    const startedAt = new Date().toISOString();
    const startedAtMs = Date.now();

    if (this.config.mode === "mock" || !plan.model) {
      const text = request.mock();
      const trace = this.buildTrace({
        request,
        plan,
        runtimeMode: "mock",
        model: "mock-runtime",
        startedAt,
        startedAtMs,
        attemptCount: 1,
        inputTokens: 0,
        outputTokens: 0,
        succeeded: true
      });
      return { text, trace };
    }

    const maxAttempts = Math.max(1, this.config.retryCount + 1);
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        const result = await generateText({
          model: plan.model,
          system: request.systemPrompt,
          messages: plan.messages,
          maxOutputTokens: this.config.maxOutputTokens,
          temperature: this.config.temperature,
          maxRetries: 0,
          abortSignal: AbortSignal.timeout(plan.timeoutMs)
        });

        const text = result.text.trim();
        if (!text) {
          throw new Error("Model returned an empty response.");
        }

        const trace = this.buildTrace({
          request,
          plan,
          runtimeMode: "live",
          model: plan.modelName,
          startedAt,
          startedAtMs,
          attemptCount: attempt,
          inputTokens: result.usage?.inputTokens ?? 0,
          outputTokens: result.usage?.outputTokens ?? 0,
          succeeded: true
        });

        if (this.config.verboseLogs) {
          this.logTrace(trace);
        }

        return { text, trace };
      } catch (error) {
        lastError = error;

        if (attempt < maxAttempts) {
          await delay(300 * attempt);
        }
      }
    }

    const trace = this.buildTrace({
      request,
      plan,
      runtimeMode: "live",
      model: plan.modelName,
      startedAt,
      startedAtMs,
      attemptCount: maxAttempts,
      inputTokens: 0,
      outputTokens: 0,
      succeeded: false,
      errorMessage: formatError(lastError)
    });

    if (this.config.verboseLogs) {
      this.logTrace(trace);
    }

    throw new GenerationError(
      `${plan.generationMode} generation failed after ${maxAttempts} attempt(s): ${formatError(lastError)}`,
      plan.generationMode,
      { cause: lastError, trace }
    );
  }

  private buildTrace(input: {
    request: GenerationRequest;
    plan: CallPlan;
    runtimeMode: AgentMode;
    model: string;
    startedAt: string;
    startedAtMs: number;
    attemptCount: number;
    inputTokens: number;
    outputTokens: number;
    succeeded: boolean;
    errorMessage?: string;
  }): GenerationTrace {
    this.sequence += 1;
    return {
      traceId: createId("trace", `${input.request.stage}-${input.request.label}-${this.sequence}`),
      stage: input.request.stage,
      label: input.request.label,
      generationMode: input.plan.generationMode,
      runtimeMode: input.runtimeMode,
      model: input.model,
      startedAt: input.startedAt,
      completedAt: new Date().toISOString(),
      durationMs: Date.now() - input.startedAtMs,
      attemptCount: input.attemptCount,
      inputTokens: input.inputTokens,
      outputTokens: input.outputTokens,
      succeeded: input.succeeded,
      errorMessage: input.errorMessage
    };
  }

  private logTrace(trace: GenerationTrace): void {
    const outcome = trace.succeeded ? "ok" : `failed (${trace.errorMessage ?? "unknown error"})`;
    console.log(
      `[runtime:${trace.generationMode}] ${trace.label} ${outcome} in ${trace.durationMs}ms after ${trace.attemptCount} attempt(s) (${trace.inputTokens}/${trace.outputTokens} tokens)`
    );
  }
}
