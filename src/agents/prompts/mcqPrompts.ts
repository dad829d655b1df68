import { randomUUID } from "node:crypto";

import type { Cell, DifficultyTier, VisualContext } from "../../domain/models.js";

const OUTPUT_CONTRACT = [
  "Output schema (a JSON array, nothing else):",
  "[",
  "  {",
  '    "question_text": string,',
  '    "option_a": string,',
  '    "option_b": string,',
  '    "option_c": string,',
  '    "option_d": string,',
  '    "correct_answer": "A|B|C|D",',
  '    "explanation": string,',
  '    "references": string[]',
  "  }",
  "]"
].join("\n");

export const TEXT_SYSTEM_PROMPT = [
  "You are a question writer for high-stakes technical examinations.",
  "Return only JSON.",
  "Every question has exactly four plausible, distinct options and exactly one correct answer.",
  "Explanations teach the concept and say why the correct option is right.",
  "Cite credible references: textbook chapters or academic sources.",
  OUTPUT_CONTRACT
].join("\n");

export const VISION_SYSTEM_PROMPT = [
  "You are a question writer for technical examinations working from diagrams, graphs and formula images.",
  "Return only JSON.",
  "Each question must require the provided image(s) to answer and must say so in its wording (for example 'the diagram shown').",
  "Explanations reference specific elements visible in the image.",
  OUTPUT_CONTRACT.replace('"references": string[]', '"references": string[],\n    "image_description": string')
].join("\n");

const DIFFICULTY_HINTS: Record<DifficultyTier, string> = {
  Easy: "Direct recall of definitions, formulas or facts. Single-step reasoning.",
  Medium: "Application of a concept or formula. One or two reasoning steps, possibly combining related ideas.",
  Hard: "Multi-step reasoning that combines several concepts, analysis or derivation."
};

const VISION_DIFFICULTY_HINTS: Record<DifficultyTier, string> = {
  Easy: "Read a value or identify a labelled element directly from the image.",
  Medium: "Interpret a relationship shown in the image or compare elements of it.",
  Hard: "Predict or derive an outcome through multi-step analysis of the image."
};

const DIAGRAM_TYPE_KEYWORDS: ReadonlyArray<readonly [string, readonly string[]]> = [
  ["phase diagram", ["phase diagram", "equilibrium diagram", "binary diagram"]],
  ["graph", ["graph", "plot", "curve", "chart"]],
  ["circuit", ["circuit", "schematic", "wiring"]],
  ["flowchart", ["flowchart", "flow chart", "process flow"]],
  ["structure", ["crystal structure", "molecular structure", "structure"]],
  ["mechanism", ["reaction mechanism", "mechanism"]],
  ["table", ["data table", "table"]],
  ["formula", ["formula", "equation", "expression"]]
];

export function difficultyHint(tier: DifficultyTier): string {
  return DIFFICULTY_HINTS[tier];
}

/** Best-effort label for the kind of figure a context describes. */
export function inferDiagramType(text: string): string {
  const lowered = text.toLowerCase();
  for (const [diagramType, keywords] of DIAGRAM_TYPE_KEYWORDS) {
    if (keywords.some((keyword) => lowered.includes(keyword))) {
      return diagramType;
    }
  }
  return "diagram";
}

const TEXT_EXAMPLE = JSON.stringify({
  question_text: "Which crystal structure does iron adopt at room temperature?",
  option_a: "Face-centred cubic",
  option_b: "Body-centred cubic",
  option_c: "Hexagonal close-packed",
  option_d: "Simple cubic",
  correct_answer: "B",
  explanation:
    "Below 912 °C pure iron exists as alpha-ferrite, which is body-centred cubic. The FCC gamma phase is only stable at higher temperature.",
  references: ["Callister, Materials Science and Engineering, ch. 3"]
});

export interface PromptInput {
  subject: string;
  cell: Cell;
  count: number;
}

export function buildTextPrompt(input: PromptInput): string {
  const { subject, cell, count } = input;
  return [
    `Generate ${count} multiple-choice question(s).`,
    `Subject: ${subject}`,
    `Section: ${cell.sectionName}`,
    `Main topic: ${cell.topic.mainTopic}`,
    `Sub-topic: ${cell.topic.subtopic}`,
    `Difficulty: ${cell.difficulty} (${DIFFICULTY_HINTS[cell.difficulty]})`,
    "",
    "Requirements:",
    "- Options are labelled A-D; correct_answer is the letter of the single correct option.",
    "- The explanation is at least two full sentences.",
    "- Include at least one reference.",
    "- Do not repeat questions commonly found in past papers verbatim.",
    "",
    "Example of one element:",
    TEXT_EXAMPLE,
    "",
    `Respond with a JSON array of exactly ${count} object(s).`
  ].join("\n");
}

export function buildVisionPrompt(input: PromptInput & { context: VisualContext }): string {
  const { subject, cell, count, context } = input;
  const imageReference =
    context.images.length === 1 ? "the diagram shown" : `the ${context.images.length} images provided`;

  return [
    `Generate ${count} multiple-choice question(s) that require interpreting ${imageReference}.`,
    `Subject: ${subject}`,
    `Section: ${cell.sectionName}`,
    `Main topic: ${cell.topic.mainTopic}`,
    `Sub-topic: ${cell.topic.subtopic}`,
    `Figure type: ${inferDiagramType(context.text)}`,
    `Difficulty: ${cell.difficulty} (${VISION_DIFFICULTY_HINTS[cell.difficulty]})`,
    "",
    "Context accompanying the figure:",
    "```",
    context.text || "(no caption)",
    "```",
    "",
    "Requirements:",
    "- The question wording must point at the figure.",
    "- Options are labelled A-D; correct_answer is the letter of the single correct option.",
    "- image_description summarises what the figure shows for the test setter.",
    "",
    `Respond with a JSON array of exactly ${count} object(s).`
  ].join("\n");
}

/** Placeholder output for mock runs; shaped like a real model response. */
export function buildMockResponse(input: PromptInput & { visual: boolean }): string {
  const { cell, count, visual } = input;
  const nonce = randomUUID().slice(0, 8);

  const questions = Array.from({ length: count }, (_, index) => {
    const label = `${cell.topic.subtopic} (${cell.difficulty}, ${nonce}-${index + 1})`;
    return {
      question_text: visual
        ? `Based on the diagram shown, which statement about ${label} is correct?`
        : `Which statement about ${label} is correct?`,
      option_a: `${cell.topic.subtopic} statement one`,
      option_b: `${cell.topic.subtopic} statement two`,
      option_c: `${cell.topic.subtopic} statement three`,
      option_d: `${cell.topic.subtopic} statement four`,
      correct_answer: "B",
      explanation: `Placeholder explanation for ${cell.topic.mainTopic}: statement two is the accepted result.`,
      references: [`${cell.topic.mainTopic} reference text, chapter 1`],
      ...(visual ? { image_description: `Figure for ${cell.topic.subtopic}` } : {})
    };
  });

  return JSON.stringify(questions, null, 2);
}
