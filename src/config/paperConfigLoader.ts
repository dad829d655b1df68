import { readFile } from "node:fs/promises";

import { z } from "zod";

import { PaperConfigError } from "../domain/errors.js";
import type { PaperConfig } from "../domain/models.js";

const TierMapSchema = z
  .object({
    Easy: z.number().optional(),
    Medium: z.number().optional(),
    Hard: z.number().optional()
  })
  .strict();

// Quota math (sums, ranges) is the allocator's job; this only checks shape.
const DifficultyDistributionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("fractions"), fractions: TierMapSchema }),
  z.object({ kind: z.literal("counts"), counts: TierMapSchema })
]);

const TopicRefSchema = z.object({
  mainTopic: z.string().trim().min(1),
  subtopic: z.string().trim().min(1),
  visualContextId: z.string().trim().min(1).optional()
});

const SectionSpecSchema = z.object({
  name: z.string().trim().min(1),
  questionCount: z.number(),
  difficulty: DifficultyDistributionSchema,
  topics: z.array(TopicRefSchema).default([])
});

export const PaperConfigSchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  subject: z.string().trim().min(1),
  declaredTotal: z.number().int().positive().optional(),
  sections: z.array(SectionSpecSchema).min(1)
});

export function parsePaperConfig(value: unknown): PaperConfig {
  const parsed = PaperConfigSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new PaperConfigError(`Paper configuration is invalid (${issues.length} issue(s)).`, issues);
  }

  return freezeConfig(parsed.data);
}

export async function loadPaperConfig(filePath: string): Promise<PaperConfig> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown error";
    throw new PaperConfigError(`Could not read paper configuration ${filePath}: ${message}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : "unknown error";
    throw new PaperConfigError(`Paper configuration ${filePath} is not valid JSON: ${message}`);
  }

  return parsePaperConfig(json);
}

/** Deep-freezes a config so nothing mutates it once assembly starts. */
export function freezeConfig(config: PaperConfig): PaperConfig {
  for (const section of config.sections) {
    for (const topic of section.topics) {
      Object.freeze(topic);
    }
    Object.freeze(section.topics);
    if (section.difficulty.kind === "fractions") {
      Object.freeze(section.difficulty.fractions);
    } else {
      Object.freeze(section.difficulty.counts);
    }
    Object.freeze(section.difficulty);
    Object.freeze(section);
  }
  Object.freeze(config.sections);
  return Object.freeze(config);
}
