import { describe, it, expect } from "vitest";
import { ValidationError } from "@medeval/shared";
import { parseCliArgs, usage } from "./cliArgs.js";

describe("parseCliArgs", () => {
  it("applies defaults", () => {
    expect(parseCliArgs([], {})).toEqual({
      input: "dataset/MAIA.json",
      outdir: "./res",
      responderModel: "gpt-4o",
      judgeModel: "gpt-4o",
      responderProvider: "openai",
      judgeProvider: "openai",
      temperature: 0.1,
      rateLimitS: 1,
      start: 0,
      skipGenerate: false,
      skipJudge: false,
      help: false,
    });
  });

  it("takes model names from the environment", () => {
    const options = parseCliArgs([], {
      RESPONDER_MODEL: "answer_model",
      JUDGE_MODEL: "judge_model",
    });

    expect(options.responderModel).toBe("answer_model");
    expect(options.judgeModel).toBe("judge_model");
  });

  it("parses every flag", () => {
    const options = parseCliArgs(
      [
        "--input", "data/q.json",
        "--outdir", "out",
        "--responder-model", "claude-3-5-haiku-latest",
        "--responder-provider", "anthropic",
        "--judge-model", "gemini-1.5-pro",
        "--judge-provider", "google",
        "--temperature", "0.3",
        "--rate-limit-s", "0.5",
        "--start", "10",
        "--end", "20",
        "--skip-generate",
        "--skip-judge",
      ],
      {},
    );

    expect(options).toEqual({
      input: "data/q.json",
      outdir: "out",
      responderModel: "claude-3-5-haiku-latest",
      judgeModel: "gemini-1.5-pro",
      responderProvider: "anthropic",
      judgeProvider: "google",
      temperature: 0.3,
      rateLimitS: 0.5,
      start: 10,
      end: 20,
      skipGenerate: true,
      skipJudge: true,
      help: false,
    });
  });

  it("ignores a bare -- separator", () => {
    expect(parseCliArgs(["--", "--help"], {}).help).toBe(true);
  });

  it("rejects an unknown flag", () => {
    expect(() => parseCliArgs(["--verbose"], {})).toThrow(
      'Unknown argument "--verbose"',
    );
  });

  it("rejects a flag without a value", () => {
    expect(() => parseCliArgs(["--start"], {})).toThrow(
      "--start requires a value",
    );
  });

  it("rejects a non-integer start", () => {
    expect(() => parseCliArgs(["--start", "1.5"], {})).toThrow(ValidationError);
  });

  it("names the flag of an invalid provider", () => {
    expect(() => parseCliArgs(["--judge-provider", "cohere"], {})).toThrow(
      /^Invalid value for --judge-provider:/,
    );
  });
});

describe("usage", () => {
  it("lists the providers", () => {
    expect(usage()).toContain("openai | anthropic | google");
  });
});
