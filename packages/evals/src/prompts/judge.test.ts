import { describe, it, expect } from "vitest";
import {
  JUDGE_SYSTEM_PROMPT,
  buildJudgeTurns,
  normalizeReferenceAnswer,
  parseJudgeScore,
  renderJudgePrompt,
} from "./judge.js";

describe("parseJudgeScore", () => {
  it("reads a leading integer score", () => {
    expect(parseJudgeScore("4: covers most facts")).toBe(4);
  });

  it("reads a fractional score", () => {
    expect(parseJudgeScore("0.5 is too low, reconsider")).toBe(0.5);
  });

  it("returns undefined when there is no score", () => {
    expect(parseJudgeScore("no number here")).toBeUndefined();
  });

  it("ignores digits outside 0–5 and inside longer numbers", () => {
    expect(parseJudgeScore("Score 7/10 overall")).toBeUndefined();
    expect(parseJudgeScore("Around 90% correct: 3")).toBe(3);
  });

  it("rejects a first score token above 5", () => {
    expect(parseJudgeScore("5.5: great")).toBeUndefined();
    expect(parseJudgeScore("5.9 nearly flawless")).toBeUndefined();
  });

  it("accepts 5 written with a zero fraction", () => {
    expect(parseJudgeScore("5.0: complete")).toBe(5);
  });

  it("takes the first match", () => {
    expect(parseJudgeScore("2: misses 4 of the key facts")).toBe(2);
  });
});

describe("normalizeReferenceAnswer", () => {
  it("joins lists with a comma and space", () => {
    expect(normalizeReferenceAnswer(["fatigue", "nausea"])).toBe(
      "fatigue, nausea",
    );
  });

  it("renders a missing answer as empty", () => {
    expect(normalizeReferenceAnswer(undefined)).toBe("");
    expect(normalizeReferenceAnswer(null)).toBe("");
  });

  it("stringifies scalars", () => {
    expect(normalizeReferenceAnswer("R-CHOP")).toBe("R-CHOP");
    expect(normalizeReferenceAnswer(5)).toBe("5");
  });
});

describe("renderJudgePrompt", () => {
  it("fills the three placeholders", () => {
    const prompt = renderJudgePrompt({
      question: "First-line therapy?",
      referenceAnswer: ["fatigue", "nausea"],
      modelAnswer: "Rest.",
    });

    expect(prompt.startsWith("You are an impartial medical board examiner.\n")).toBe(true);
    expect(prompt.endsWith(
      "Question:\nFirst-line therapy?\n\nReference answer:\nfatigue, nausea\n\nModel answer:\nRest.\n",
    )).toBe(true);
    expect(prompt).toContain("If unsure between two scores, pick the lower one.");
    expect(prompt).toContain('"<score 0-5>: <concise 1–2 sentence justification>"');
  });

  it("does not expand placeholders inside substituted values", () => {
    const prompt = renderJudgePrompt({
      question: "What does {model_answer} mean?",
      referenceAnswer: "",
      modelAnswer: "X",
    });

    expect(prompt).toContain("Question:\nWhat does {model_answer} mean?\n");
  });
});

describe("buildJudgeTurns", () => {
  it("puts the examiner instruction first", () => {
    const turns = buildJudgeTurns({
      question: "q",
      referenceAnswer: "a",
      modelAnswer: "m",
    });

    expect(turns).toHaveLength(2);
    expect(turns[0]).toEqual({ role: "system", content: JUDGE_SYSTEM_PROMPT });
    expect(turns[1]?.role).toBe("user");
  });
});
