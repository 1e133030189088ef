import type { ChatTurn } from "@medeval/core";

export const RESPONDER_SYSTEM_PROMPT =
  "You are an experienced oncologist answering exam-style clinical questions concisely and accurately.";

export function buildResponderTurns(question: string): ChatTurn[] {
  return [
    { role: "system", content: RESPONDER_SYSTEM_PROMPT },
    { role: "user", content: question },
  ];
}
