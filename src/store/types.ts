/**
 * Session Store Types
 * Persistence contract for analysis sessions and assistant conversations
 */

import type { Evidence } from "../schemas/evidence.js";
import type { FormatterPayload, StageArtifact } from "../schemas/artifacts.js";
import type {
  AnalysisSession,
  ConversationTurn,
  SessionFilter,
  SessionStatus,
  SessionSummary,
  WorkflowState,
} from "../schemas/session.js";

export interface NewSession {
  /** Generated when omitted */
  id?: string;
  query: string;
  domain: string;
  question?: string;
}

export interface StatusUpdate {
  status: SessionStatus;
  workflowState: WorkflowState;
  reason?: string;
}

export type DeleteHook = (sessionId: string) => Promise<void> | void;

/**
 * Conversation turns are keyed by a conversation id: the session id when
 * the assistant is bound to one, GLOBAL_CONVERSATION otherwise.
 */
export const GLOBAL_CONVERSATION = "global";

export interface SessionStore {
  create(session: NewSession): Promise<AnalysisSession>;

  /**
   * Writes to a complete or failed session throw SessionImmutableError;
   * unknown ids throw SessionNotFoundError
   */
  updateStatus(id: string, update: StatusUpdate): Promise<AnalysisSession>;
  appendEvidence(id: string, evidence: readonly Evidence[]): Promise<void>;
  appendArtifact(id: string, artifact: StageArtifact): Promise<void>;
  setReport(id: string, report: FormatterPayload): Promise<void>;

  get(id: string): Promise<AnalysisSession | null>;

  /** Newest first */
  list(filter?: SessionFilter): Promise<SessionSummary[]>;

  /** Removes the session and its conversation, then runs the delete hooks */
  delete(id: string): Promise<boolean>;
  onDelete(hook: DeleteHook): void;

  saveTurn(conversationId: string, turn: ConversationTurn): Promise<void>;
  /** Oldest first; the most recent `limit` turns when given */
  loadTurns(conversationId: string, limit?: number): Promise<ConversationTurn[]>;
}
