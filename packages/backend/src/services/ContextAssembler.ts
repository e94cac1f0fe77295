import type { Citation, ConversationTurn, RetrievalResult, RetrievedChunk } from "@lorebase/shared";
import { renderHistoryLine } from "../prompts/index.js";
import type { Conversation } from "./Conversation.js";

export interface ContextAssemblerOptions {
  maxContextChars: number;
  /** Share of the budget the conversation history may take. */
  historyShare: number;
  excerptLength: number;
}

export interface AssembledContext {
  contextText: string;
  citations: Citation[];
  includedChunkIds: string[];
  droppedChunkIds: string[];
  /** Turns that fit the history share, oldest first. */
  history: ConversationTurn[];
  usedChars: number;
}

const defaultOptions: ContextAssemblerOptions = {
  maxContextChars: 6000,
  historyShare: 0.25,
  excerptLength: 240
};

const BLOCK_SEPARATOR = "\n\n";

export function sourceMarker(documentName: string): string {
  return `### Source: ${documentName}`;
}

/**
 * Packs retrieved chunks into a bounded prompt context, best score first. When the budget
 * runs out the lowest-scored chunks are the ones left out, and only chunks that made it
 * into the text are cited.
 */
export class ContextAssembler {
  private readonly options: ContextAssemblerOptions;

  constructor(options: Partial<ContextAssemblerOptions> = {}) {
    this.options = {
      ...defaultOptions,
      ...options
    };
  }

  assemble(
    result: RetrievalResult,
    conversation: Conversation | null,
    maxContextChars: number = this.options.maxContextChars
  ): AssembledContext {
    const budget = Math.max(0, Math.floor(maxContextChars));
    const history = this.selectHistory(conversation, Math.floor(budget * this.options.historyShare));
    const historyChars = history.reduce((sum, turn) => sum + renderHistoryLine(turn).length + 1, 0);

    const ranked = dedupeByChunkId(result).sort((a, b) => b.score - a.score);
    const blocks: string[] = [];
    const included: RetrievedChunk[] = [];
    let remaining = budget - historyChars;
    let previousDocumentId: string | null = null;

    for (const item of ranked) {
      const separator = blocks.length > 0 ? BLOCK_SEPARATOR : "";
      const marker =
        item.document.id !== previousDocumentId ? `${sourceMarker(item.document.name)}\n` : "";
      const block = `${marker}${item.chunk.text}`;
      const cost = separator.length + block.length;

      if (cost <= remaining) {
        blocks.push(block);
        included.push(item);
        remaining -= cost;
        previousDocumentId = item.document.id;
        continue;
      }

      // The best chunk alone is over budget: keep as much of it as fits rather than nothing.
      if (included.length === 0 && remaining > marker.length) {
        blocks.push(`${marker}${item.chunk.text.slice(0, remaining - marker.length)}`);
        included.push(item);
        remaining = 0;
      }
      break;
    }

    const includedIds = new Set(included.map((item) => item.chunk.id));
    const contextText = blocks.join(BLOCK_SEPARATOR);

    return {
      contextText,
      citations: included.map((item) => this.toCitation(item)),
      includedChunkIds: included.map((item) => item.chunk.id),
      droppedChunkIds: ranked
        .filter((item) => !includedIds.has(item.chunk.id))
        .map((item) => item.chunk.id),
      history,
      usedChars: historyChars + contextText.length
    };
  }

  private selectHistory(conversation: Conversation | null, budget: number): ConversationTurn[] {
    if (!conversation || budget <= 0) {
      return [];
    }

    const selected: ConversationTurn[] = [];
    let used = 0;
    const turns = conversation.history();
    for (let index = turns.length - 1; index >= 0; index -= 1) {
      const turn = turns[index];
      if (!turn) {
        continue;
      }
      const cost = renderHistoryLine(turn).length + 1;
      if (used + cost > budget) {
        break;
      }
      used += cost;
      selected.push(turn);
    }

    return selected.reverse();
  }

  private toCitation(item: RetrievedChunk): Citation {
    return {
      documentId: item.document.id,
      documentName: item.document.name,
      chunkId: item.chunk.id,
      excerpt: trimSnippet(item.chunk.text, this.options.excerptLength),
      score: item.score
    };
  }
}

function dedupeByChunkId(result: RetrievalResult): RetrievedChunk[] {
  const seen = new Set<string>();
  const unique: RetrievedChunk[] = [];
  for (const item of result) {
    if (seen.has(item.chunk.id)) {
      continue;
    }
    seen.add(item.chunk.id);
    unique.push(item);
  }
  return unique;
}

export function trimSnippet(content: string, maxLength: number): string {
  const normalized = content.replace(/\s+/g, " ").trim();
  if (normalized.length <= maxLength) {
    return normalized;
  }
  return `${normalized.slice(0, maxLength)}...`;
}
