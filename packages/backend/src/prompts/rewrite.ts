import type { ConversationTurn } from "@lorebase/shared";
import { renderHistoryLine } from "./answer.js";

export const QUERY_REWRITE_SYSTEM_PROMPT = `
Rewrite the user's latest question into a single standalone search query.
Resolve pronouns and references using the conversation. Keep the original language.
Return only the rewritten question, without quotes or explanation.
`.trim();

export function buildRewritePrompt(query: string, history: ConversationTurn[]): string {
  const lines = history.map(renderHistoryLine);
  return [`Conversation:`, ...lines, "", `Latest question: ${query}`].join("\n");
}
