/**
 * Document-backed session store
 *
 * Each session is one document. Mutations are read-modify-write under a
 * per-session lock, so concurrent sessions never block each other and
 * writes within one session never interleave. Backends only provide the
 * document primitives.
 */

import { randomUUID } from "crypto";
import { SessionImmutableError, SessionNotFoundError, ValidationError } from "../core/errors.js";
import { logger } from "../core/logger.js";
import type { Evidence } from "../schemas/evidence.js";
import type { FormatterPayload, StageArtifact } from "../schemas/artifacts.js";
import {
  TERMINAL_STATUSES,
  summarizeSession,
  type AnalysisSession,
  type ConversationTurn,
  type SessionFilter,
  type SessionSummary,
} from "../schemas/session.js";
import type { DeleteHook, NewSession, SessionStore, StatusUpdate } from "./types.js";

export abstract class DocumentSessionStore implements SessionStore {
  protected readonly log = logger.child({ component: "session-store" });
  private readonly hooks: DeleteHook[] = [];
  private readonly locks = new Map<string, Promise<unknown>>();

  // ============================================================
  // BACKEND PRIMITIVES
  // ============================================================

  protected abstract readSession(id: string): Promise<AnalysisSession | null>;
  protected abstract writeSession(session: AnalysisSession): Promise<void>;
  protected abstract removeSession(id: string): Promise<boolean>;
  protected abstract readAllSessions(filter: SessionFilter): Promise<AnalysisSession[]>;
  protected abstract appendTurn(conversationId: string, turn: ConversationTurn): Promise<void>;
  protected abstract readTurns(conversationId: string): Promise<ConversationTurn[]>;
  protected abstract removeTurns(conversationId: string): Promise<void>;

  // ============================================================
  // SESSION STORE
  // ============================================================

  async create(input: NewSession): Promise<AnalysisSession> {
    const now = new Date().toISOString();
    const session: AnalysisSession = {
      id: input.id ?? randomUUID(),
      query: input.query,
      domain: input.domain,
      question: input.question,
      createdAt: now,
      updatedAt: now,
      status: "pending",
      workflowState: "created",
      evidence: [],
      artifacts: [],
      report: null,
    };

    await this.withLock(session.id, () => this.writeSession(session));
    this.log.debug("Session created", { sessionId: session.id });
    return session;
  }

  updateStatus(id: string, update: StatusUpdate): Promise<AnalysisSession> {
    return this.mutate(id, (session) => {
      session.status = update.status;
      session.workflowState = update.workflowState;
      if (update.reason !== undefined) {
        session.reason = update.reason;
      }
    });
  }

  async appendEvidence(id: string, evidence: readonly Evidence[]): Promise<void> {
    await this.mutate(id, (session) => {
      session.evidence.push(...evidence.filter((e) => e.sessionId === id));
    });
  }

  async appendArtifact(id: string, artifact: StageArtifact): Promise<void> {
    if (artifact.sessionId !== id) {
      throw new ValidationError(`Artifact ${artifact.id} belongs to session ${artifact.sessionId}`, {
        field: "sessionId",
      });
    }
    await this.mutate(id, (session) => {
      session.artifacts.push(artifact);
    });
  }

  async setReport(id: string, report: FormatterPayload): Promise<void> {
    await this.mutate(id, (session) => {
      session.report = report;
    });
  }

  get(id: string): Promise<AnalysisSession | null> {
    return this.readSession(id);
  }

  async list(filter: SessionFilter = {}): Promise<SessionSummary[]> {
    const sessions = await this.readAllSessions(filter);
    return sessions
      .filter((s) => matchesFilter(s, filter))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .map(summarizeSession);
  }

  async delete(id: string): Promise<boolean> {
    const removed = await this.withLock(id, () => this.removeSession(id));
    if (!removed) return false;

    await this.removeTurns(id);
    for (const hook of this.hooks) {
      await hook(id);
    }

    this.log.info("Session deleted", { sessionId: id });
    return true;
  }

  onDelete(hook: DeleteHook): void {
    this.hooks.push(hook);
  }

  saveTurn(conversationId: string, turn: ConversationTurn): Promise<void> {
    return this.withLock(`turns:${conversationId}`, () => this.appendTurn(conversationId, turn));
  }

  async loadTurns(conversationId: string, limit?: number): Promise<ConversationTurn[]> {
    const turns = await this.readTurns(conversationId);
    return limit === undefined ? turns : turns.slice(Math.max(0, turns.length - limit));
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private mutate(id: string, change: (session: AnalysisSession) => void): Promise<AnalysisSession> {
    return this.withLock(id, async () => {
      const session = await this.readSession(id);
      if (!session) {
        throw new SessionNotFoundError(id);
      }
      if (TERMINAL_STATUSES.includes(session.status)) {
        throw new SessionImmutableError(id, session.status);
      }

      change(session);
      session.updatedAt = new Date().toISOString();
      await this.writeSession(session);
      return session;
    });
  }

  private async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const next = previous.then(fn, fn);
    const settled = next.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(key, settled);

    try {
      return await next;
    } finally {
      if (this.locks.get(key) === settled) {
        this.locks.delete(key);
      }
    }
  }
}

export function matchesFilter(session: AnalysisSession, filter: SessionFilter): boolean {
  if (filter.status !== undefined) {
    const statuses = Array.isArray(filter.status) ? filter.status : [filter.status];
    if (!statuses.includes(session.status)) return false;
  }
  if (filter.domain !== undefined && session.domain.toLowerCase() !== filter.domain.toLowerCase()) {
    return false;
  }
  if (filter.from !== undefined && session.createdAt < filter.from) return false;
  if (filter.to !== undefined && session.createdAt > filter.to) return false;
  return true;
}
