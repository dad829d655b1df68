import { describe, expect, it } from "vitest";

import { MalformedOutputError } from "../domain/errors.js";
import { parseCandidates } from "../layers/generation/candidateParser.js";
import { parseJsonFromModelText, stripTrailingCommas } from "../utils/json.js";

describe("parseJsonFromModelText", () => {
  it("reads a fenced block", () => {
    expect(parseJsonFromModelText('Here you go:\n```json\n[{"a": 1}]\n```')).toEqual([{ a: 1 }]);
  });

  it("takes the outermost value when prose surrounds it", () => {
    expect(parseJsonFromModelText('Result: {"question": "Q", "references": ["R1"]} Done.')).toEqual({
      question: "Q",
      references: ["R1"]
    });
  });

  it("tolerates trailing commas", () => {
    expect(parseJsonFromModelText('[{"a": 1,},]')).toEqual([{ a: 1 }]);
    expect(stripTrailingCommas('{"a": [1, 2, ], }')).toBe('{"a": [1, 2 ] }');
  });

  it("fails on text without JSON", () => {
    expect(() => parseJsonFromModelText("No questions today.")).toThrow("Model response did not contain valid JSON.");
  });
});

describe("parseCandidates", () => {
  it("decodes lettered option fields", () => {
    const raw = JSON.stringify([
      {
        question_text: "Which lattice does copper adopt?",
        option_a: "BCC",
        option_b: "FCC",
        option_c: "HCP",
        option_d: "Simple cubic",
        correct_answer: "B",
        explanation: "Copper is face-centred cubic at all temperatures.",
        references: ["Callister, ch. 3"]
      }
    ]);

    expect(parseCandidates(raw)).toEqual([
      {
        questionText: "Which lattice does copper adopt?",
        options: ["BCC", "FCC", "HCP", "Simple cubic"],
        correctAnswer: "B",
        explanation: "Copper is face-centred cubic at all temperatures.",
        references: ["Callister, ch. 3"]
      }
    ]);
  });

  it("unwraps a questions envelope and reads an options object", () => {
    const raw = JSON.stringify({
      questions: [
        {
          question: "Pick the hardest phase.",
          options: { A: "Ferrite", B: "Pearlite", C: "Martensite", D: "Austenite" },
          answer: "c",
          solution: "Martensite is the hardest of the listed phases.",
          reference: "ASM Handbook",
          image_description: "Hardness chart"
        }
      ]
    });

    expect(parseCandidates(raw)).toEqual([
      {
        questionText: "Pick the hardest phase.",
        options: ["Ferrite", "Pearlite", "Martensite", "Austenite"],
        correctAnswer: "c",
        explanation: "Martensite is the hardest of the listed phases.",
        references: ["ASM Handbook"],
        visualDescription: "Hardness chart"
      }
    ]);
  });

  it("accepts a single object and keeps four option slots when some are missing", () => {
    const [candidate] = parseCandidates('{"question_text": "Q?", "option_a": "One", "option_c": "Three"}');
    expect(candidate.options).toEqual(["One", "", "Three", ""]);
    expect(candidate.references).toEqual([]);
  });

  it("keeps an options array as given", () => {
    const [candidate] = parseCandidates('[{"question_text": "Q?", "options": ["One", "Two", "Three"]}]');
    expect(candidate.options).toEqual(["One", "Two", "Three"]);
  });

  it("rejects output without question objects", () => {
    expect(() => parseCandidates("[]")).toThrow(MalformedOutputError);
    expect(() => parseCandidates('["just", "strings"]')).toThrow("Response contained no question objects.");
    expect(() => parseCandidates("I could not produce questions.")).toThrow(MalformedOutputError);
  });
});
