import { randomUUID } from "node:crypto";
import type { ChatSession } from "@lorebase/shared";
import { ChatSessionNotFoundError } from "../errors.js";
import { Conversation } from "./Conversation.js";

export interface SessionStoreOptions {
  maxTurns: number;
  /** Oldest idle sessions are dropped past this count. */
  maxSessions: number;
}

interface SessionEntry {
  session: ChatSession;
  conversation: Conversation;
}

/** In-memory registry of chat sessions. Conversations end with their session. */
export class SessionStore {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly options: SessionStoreOptions;

  constructor(options: Partial<SessionStoreOptions> = {}) {
    this.options = {
      maxTurns: options.maxTurns ?? 20,
      maxSessions: options.maxSessions ?? 1000
    };
  }

  close(): void {
    this.sessions.clear();
  }

  createSession(input: { title: string; id?: string }): ChatSession {
    const now = new Date();
    const session: ChatSession = {
      id: input.id ?? randomUUID(),
      title: input.title,
      createdAt: now,
      updatedAt: now
    };

    this.sessions.set(session.id, {
      session,
      conversation: new Conversation({ maxTurns: this.options.maxTurns })
    });
    this.evictIdleSessions();
    return session;
  }

  listSessions(limit = 100): ChatSession[] {
    const safeLimit = Math.max(1, limit);
    return [...this.sessions.values()]
      .map((entry) => entry.session)
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
      .slice(0, safeLimit);
  }

  getSessionById(id: string): ChatSession | null {
    return this.sessions.get(id)?.session ?? null;
  }

  getConversation(id: string): Conversation {
    const entry = this.sessions.get(id);
    if (!entry) {
      throw new ChatSessionNotFoundError(id);
    }
    return entry.conversation;
  }

  touch(id: string): void {
    const entry = this.sessions.get(id);
    if (entry) {
      entry.session = { ...entry.session, updatedAt: new Date() };
    }
  }

  deleteSession(id: string): boolean {
    return this.sessions.delete(id);
  }

  private evictIdleSessions(): void {
    const overflow = this.sessions.size - this.options.maxSessions;
    if (overflow <= 0) {
      return;
    }

    const idleFirst = [...this.sessions.values()].sort(
      (a, b) => a.session.updatedAt.getTime() - b.session.updatedAt.getTime()
    );
    for (const entry of idleFirst.slice(0, overflow)) {
      this.sessions.delete(entry.session.id);
    }
  }
}
