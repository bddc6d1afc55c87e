/**
 * In-memory session store. Documents are cloned on the way in and out so
 * callers never share mutable state with the store.
 */

import type { AnalysisSession, ConversationTurn } from "../schemas/session.js";
import { DocumentSessionStore } from "./base.js";

export class MemorySessionStore extends DocumentSessionStore {
  private readonly sessions = new Map<string, AnalysisSession>();
  private readonly turns = new Map<string, ConversationTurn[]>();

  protected async readSession(id: string): Promise<AnalysisSession | null> {
    const session = this.sessions.get(id);
    return session ? structuredClone(session) : null;
  }

  protected async writeSession(session: AnalysisSession): Promise<void> {
    this.sessions.set(session.id, structuredClone(session));
  }

  protected async removeSession(id: string): Promise<boolean> {
    return this.sessions.delete(id);
  }

  protected async readAllSessions(): Promise<AnalysisSession[]> {
    return [...this.sessions.values()].map((s) => structuredClone(s));
  }

  protected async appendTurn(conversationId: string, turn: ConversationTurn): Promise<void> {
    const turns = this.turns.get(conversationId) ?? [];
    turns.push({ ...turn });
    this.turns.set(conversationId, turns);
  }

  protected async readTurns(conversationId: string): Promise<ConversationTurn[]> {
    return (this.turns.get(conversationId) ?? []).map((t) => ({ ...t }));
  }

  protected async removeTurns(conversationId: string): Promise<void> {
    this.turns.delete(conversationId);
  }
}
