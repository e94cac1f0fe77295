export {
  INSUFFICIENT_CONTEXT_REPLY,
  NO_INFORMATION_ANSWER,
  buildAnswerSystemPrompt,
  renderHistoryLine
} from "./answer.js";
export { QUERY_REWRITE_SYSTEM_PROMPT, buildRewritePrompt } from "./rewrite.js";
