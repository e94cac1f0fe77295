import type { ConversationTurn, TurnRole } from "@lorebase/shared";

export interface ConversationOptions {
  maxTurns: number;
}

export interface AppendTurnInput {
  role: TurnRole;
  text: string;
  citedChunkIds?: string[];
  createdAt?: Date;
}

/**
 * Ordered turn history of one chat session, bounded FIFO. Single writer; not shared
 * across sessions.
 */
export class Conversation {
  private turns: ConversationTurn[] = [];
  private readonly maxTurns: number;
  private clearCount = 0;

  constructor(options: Partial<ConversationOptions> = {}) {
    this.maxTurns = Math.max(1, options.maxTurns ?? 20);
  }

  get size(): number {
    return this.turns.length;
  }

  /** Changes on every `clear()`; a query started before a clear must not write back. */
  get epoch(): number {
    return this.clearCount;
  }

  append(input: AppendTurnInput): ConversationTurn {
    const turn: ConversationTurn = {
      role: input.role,
      text: input.text,
      createdAt: input.createdAt ?? new Date()
    };
    if (input.citedChunkIds && input.citedChunkIds.length > 0) {
      turn.citedChunkIds = [...input.citedChunkIds];
    }

    this.turns.push(turn);
    if (this.turns.length > this.maxTurns) {
      this.turns.splice(0, this.turns.length - this.maxTurns);
    }
    return turn;
  }

  /** Oldest first. `maxTurns` keeps the most recent ones. */
  history(maxTurns?: number): ConversationTurn[] {
    if (maxTurns === undefined) {
      return [...this.turns];
    }
    if (maxTurns <= 0) {
      return [];
    }
    return this.turns.slice(-maxTurns);
  }

  clear(): void {
    this.turns = [];
    this.clearCount += 1;
  }
}
