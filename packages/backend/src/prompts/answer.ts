import type { ConversationTurn } from "@lorebase/shared";

export const INSUFFICIENT_CONTEXT_REPLY =
  "I don't have enough information in the provided documents to answer that.";

export const NO_INFORMATION_ANSWER =
  "No information is available in the knowledge base to answer this question.";

export function buildAnswerSystemPrompt(contextText: string): string {
  return `
You are a helpful assistant answering questions about an organisation's internal documents.
Answer ONLY from the context below. Be professional and concise.

Context:
${contextText.trim().length > 0 ? contextText : "(no context)"}

Rules:
1. Use only facts stated in the context. Do not use outside knowledge.
2. If the context does not contain the answer, reply exactly: "${INSUFFICIENT_CONTEXT_REPLY}"
3. Do not invent document names or citations; sources are attached separately.
4. Earlier conversation turns are only there to resolve follow-up questions.
`.trim();
}

export function renderHistoryLine(turn: ConversationTurn): string {
  const speaker = turn.role === "user" ? "User" : "Assistant";
  return `${speaker}: ${turn.text.replace(/\s+/g, " ").trim()}`;
}
