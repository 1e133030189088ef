import type { ChatTurn } from "@medeval/core";

export const JUDGE_SYSTEM_PROMPT = "You are an expert clinical examiner.";

export const JUDGE_PROMPT_TEMPLATE = `You are an impartial medical board examiner.
Score the model answer against the reference answer on a 0–5 scale.
If unsure between two scores, pick the lower one.

Rubric:
5 = Covers all key clinical facts; any extra content is correct & relevant.
4 = ≥90% key facts correct; at most one minor omission or wording issue.
3 = 70–89% key facts covered; may include a few minor errors; none unsafe.
2 = 40–69% key facts or ≥1 moderate error/omission; some irrelevant content.
1 = <40% key facts or major inaccuracies; mostly irrelevant or confusing.
0 = Blank, nonsense, or clearly unsafe recommendation.

Penalty rules:
• Extra correct & relevant content → no penalty.
• Extra irrelevant or wrong content → lower the score.
• Any unsafe or potentially harmful statement → max score = 1.

Return exactly one line:
"<score 0-5>: <concise 1–2 sentence justification>"

Question:
{question}

Reference answer:
{ref_answer}

Model answer:
{model_answer}
`;

/** First standalone number starting with 0–5, optionally fractional. */
const SCORE_PATTERN = /\b([0-5](?:\.\d+)?)\b/;

const MAX_SCORE = 5;

/**
 * Renders a reference answer for the prompt: lists are joined with ", ",
 * a missing answer becomes the empty string.
 */
export function normalizeReferenceAnswer(answer: unknown): string {
  if (Array.isArray(answer)) {
    return answer.map((part) => String(part)).join(", ");
  }
  if (answer === undefined || answer === null) {
    return "";
  }
  return String(answer);
}

export interface JudgePromptInput {
  question: string;
  referenceAnswer: unknown;
  modelAnswer: string;
}

export function renderJudgePrompt({
  question,
  referenceAnswer,
  modelAnswer,
}: JudgePromptInput): string {
  const values: Record<string, string> = {
    question,
    ref_answer: normalizeReferenceAnswer(referenceAnswer),
    model_answer: modelAnswer,
  };
  // Single pass, so placeholder-like text inside a value is left alone.
  return JUDGE_PROMPT_TEMPLATE.replace(
    /\{(question|ref_answer|model_answer)\}/g,
    (match, key: string) => values[key] ?? match,
  );
}

export function buildJudgeTurns(input: JudgePromptInput): ChatTurn[] {
  return [
    { role: "system", content: JUDGE_SYSTEM_PROMPT },
    { role: "user", content: renderJudgePrompt(input) },
  ];
}

/**
 * Extracts the score from a judge reply. `undefined` when there is no score
 * token, or when the first one is off the scale (e.g. `5.5`).
 */
export function parseJudgeScore(reply: string): number | undefined {
  const match = SCORE_PATTERN.exec(reply);
  if (match?.[1] === undefined) {
    return undefined;
  }
  const score = Number(match[1]);
  return score <= MAX_SCORE ? score : undefined;
}
