export type AgentMode = "live" | "mock";

type Env = Record<string, string | undefined>;

export interface RuntimeConfig {
  mode: AgentMode;
  gatewayApiKey?: string;
  textModel: string;
  visionModel: string;
  maxOutputTokens: number;
  temperature: number;
  retryCount: number;
  requestTimeoutMs: number;
  visionTimeoutMs: number;
  cellConcurrency: number;
  attemptsPerQuestion: number;
  minAttemptsPerCell: number;
  maxAttemptsPerCell?: number;
  minExplanationLength: number;
  minReferences: number;
  minOptionLength: number;
  trustedSubjects: string[];
  ledgerPath: string;
  visualContextDirectory: string;
  outputDirectory: string;
  verboseLogs: boolean;
}

const DEFAULT_MODEL = "anthropic/claude-sonnet-4";

export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const gatewayApiKey = env.AI_GATEWAY_API_KEY?.trim() || undefined;
  const mode = resolveMode(env, gatewayApiKey);

  if (mode === "live" && !gatewayApiKey) {
    throw new Error(
      "AI_GATEWAY_API_KEY is required for live generation mode. Set PAPER_AGENT_MODE=mock to run without API calls."
    );
  }

  const textModel = readString(env, "AI_GATEWAY_MODEL", DEFAULT_MODEL);

  return {
    mode,
    gatewayApiKey,
    textModel,
    visionModel: readString(env, "AI_GATEWAY_VISION_MODEL", textModel),
    maxOutputTokens: readNumber(env, "PAPER_MAX_OUTPUT_TOKENS", 4096, 256),
    temperature: readNumber(env, "PAPER_TEMPERATURE", 0.7, 0),
    retryCount: readNumber(env, "PAPER_RETRY_COUNT", 2, 0),
    requestTimeoutMs: readNumber(env, "PAPER_REQUEST_TIMEOUT_MS", 120000, 1000),
    visionTimeoutMs: readNumber(env, "PAPER_VISION_TIMEOUT_MS", 180000, 1000),
    cellConcurrency: readNumber(env, "PAPER_CELL_CONCURRENCY", 4, 1),
    attemptsPerQuestion: readNumber(env, "PAPER_ATTEMPTS_PER_QUESTION", 3, 1),
    minAttemptsPerCell: readNumber(env, "PAPER_MIN_ATTEMPTS_PER_CELL", 4, 1),
    maxAttemptsPerCell: readOptionalNumber(env, "PAPER_MAX_ATTEMPTS_PER_CELL", 1),
    minExplanationLength: readNumber(env, "PAPER_MIN_EXPLANATION_LENGTH", 20, 0),
    minReferences: readNumber(env, "PAPER_MIN_REFERENCES", 1, 0),
    minOptionLength: readNumber(env, "PAPER_MIN_OPTION_LENGTH", 1, 1),
    trustedSubjects: readList(env, "PAPER_TRUSTED_SUBJECTS"),
    ledgerPath: readString(env, "PAPER_LEDGER_PATH", "output/ledger.json"),
    visualContextDirectory: readString(env, "PAPER_VISUAL_CONTEXT_DIR", "visual-contexts"),
    outputDirectory: readString(env, "PAPER_OUTPUT_DIR", "output"),
    verboseLogs: readBoolean(env, "PAPER_VERBOSE_LOGS", true)
  };
}

function resolveMode(env: Env, apiKey: string | undefined): AgentMode {
  const raw = readString(env, "PAPER_AGENT_MODE", "auto").toLowerCase();

  if (raw === "live") {
    return "live";
  }
  if (raw === "mock") {
    return "mock";
  }
  if (raw !== "auto") {
    throw new Error(`PAPER_AGENT_MODE must be one of live, mock, auto. Received: ${raw}`);
  }

  return apiKey ? "live" : "mock";
}

function readString(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value && value.length > 0 ? value : fallback;
}

function readNumber(env: Env, name: string, fallback: number, min: number): number {
  return readOptionalNumber(env, name, min) ?? fallback;
}

function readOptionalNumber(env: Env, name: string, min: number): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) {
    return undefined;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < min) {
    throw new Error(`${name} must be a number greater than or equal to ${min}. Received: ${raw}`);
  }

  return parsed;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }

  if (["1", "true", "yes", "on"].includes(raw)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(raw)) {
    return false;
  }

  throw new Error(`${name} must be a boolean (true/false). Received: ${raw}`);
}

function readList(env: Env, name: string): string[] {
  const raw = env[name]?.trim();
  if (!raw) {
    return [];
  }

  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
