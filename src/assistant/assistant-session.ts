/**
 * Assistant Session
 * Conversational follow-up over completed analyses.
 *
 * ask(question)
 *   ├─ retrieve context (bound session, or every session)
 *   ├─ prompt = recent history + context + question
 *   ├─ fast reasoning profile, transport retries
 *   └─ append user + assistant turns (capped, oldest evicted), persist both
 */

import type { StageProfile } from "../core/config.js";
import { SessionCancelled, ValidationError, errorMessage, isRetryableError } from "../core/errors.js";
import { logger, type ChildLogger } from "../core/logger.js";
import type { ReasoningClient } from "../core/reasoning.js";
import { RetryExhaustedError, retryWithBackoff } from "../core/retry.js";
import { ASSISTANT_SYSTEM_PROMPT, getAssistantPrompt } from "../agents/prompts.js";
import type { ContextRetriever, RetrievalScope, ScoredFragment } from "../retrieval/context-retriever.js";
import type { ConversationTurn } from "../schemas/session.js";
import { GLOBAL_CONVERSATION, type SessionStore } from "../store/types.js";

export interface AssistantSessionOptions {
  client: ReasoningClient;
  retriever: ContextRetriever;
  /** Turns are persisted here when given */
  store?: SessionStore;
  /** Bind retrieval and history to one analysis session */
  sessionId?: string;
  historyCap: number;
  /** Turns of history included in each prompt */
  promptHistoryTurns: number;
  profile: StageProfile;
  k?: number;
  threshold?: number;
  now?: () => Date;
}

export interface AssistantAnswer {
  answer: string;
  context: ScoredFragment[];
  costUsd: number;
}

export class AssistantSession {
  private readonly log: ChildLogger;
  private history: ConversationTurn[] = [];
  private readonly now: () => Date;

  constructor(private readonly options: AssistantSessionOptions) {
    if (options.historyCap < 1) {
      throw new ValidationError("historyCap must be at least 1", { field: "historyCap" });
    }
    this.now = options.now ?? (() => new Date());
    this.log = logger.child({ component: "assistant", sessionId: options.sessionId ?? GLOBAL_CONVERSATION });
  }

  get conversationId(): string {
    return this.options.sessionId ?? GLOBAL_CONVERSATION;
  }

  append(turn: ConversationTurn): void {
    this.history.push(turn);
    if (this.history.length > this.options.historyCap) {
      this.history = this.history.slice(this.history.length - this.options.historyCap);
    }
  }

  /** Oldest first; the last `maxTurns` when given */
  getHistory(maxTurns?: number): ConversationTurn[] {
    if (maxTurns === undefined) return [...this.history];
    if (maxTurns <= 0) return [];
    return this.history.slice(-maxTurns);
  }

  /** Clears the in-memory history; persisted turns are kept */
  clear(): void {
    this.history = [];
  }

  /**
   * Load the most recent persisted turns into memory, replacing the current history
   */
  async restore(): Promise<number> {
    if (!this.options.store) return 0;
    const turns = await this.options.store.loadTurns(this.conversationId, this.options.historyCap);
    this.history = [];
    for (const turn of turns) this.append(turn);
    return this.history.length;
  }

  async ask(question: string, signal?: AbortSignal): Promise<AssistantAnswer> {
    const trimmed = question.trim();
    if (trimmed.length === 0) {
      throw new ValidationError("Question must not be empty", { field: "question" });
    }

    const scope: RetrievalScope = this.options.sessionId
      ? { scope: "session", sessionId: this.options.sessionId }
      : { scope: "all" };
    const context = await this.options.retriever.retrieve(trimmed, scope, this.options.k, this.options.threshold);

    const prompt = getAssistantPrompt({
      question: trimmed,
      history: this.getHistory(this.options.promptHistoryTurns),
      context,
    });

    this.log.info("Answering question", { contextFragments: context.length });

    const response = await this.invoke(prompt, signal);

    const userTurn: ConversationTurn = { role: "user", text: trimmed, timestamp: this.now().toISOString() };
    const assistantTurn: ConversationTurn = {
      role: "assistant",
      text: response.text.trim(),
      timestamp: this.now().toISOString(),
    };
    this.append(userTurn);
    this.append(assistantTurn);

    if (this.options.store) {
      await this.options.store.saveTurn(this.conversationId, userTurn);
      await this.options.store.saveTurn(this.conversationId, assistantTurn);
    }

    return { answer: assistantTurn.text, context, costUsd: response.costUsd };
  }

  private async invoke(prompt: string, signal?: AbortSignal): Promise<{ text: string; costUsd: number }> {
    const { profile, client } = this.options;
    try {
      const { value } = await retryWithBackoff(
        () =>
          client.invoke({
            prompt,
            systemPrompt: ASSISTANT_SYSTEM_PROMPT,
            profile,
            label: "assistant",
            signal,
          }),
        {
          maxRetries: profile.retries,
          backoffMs: profile.backoffMs,
          shouldRetry: (error) => isRetryableError(error),
          onRetry: (error, attempt, delayMs) =>
            this.log.warn(`Assistant call failed (attempt ${attempt}), retrying in ${delayMs}ms`, {
              error: errorMessage(error),
            }),
          signal,
        }
      );
      return value;
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      if (!(cause instanceof SessionCancelled)) {
        this.log.error("Assistant call failed", cause);
      }
      throw cause;
    }
  }
}
