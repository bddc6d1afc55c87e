/**
 * Supabase Session Store
 *
 * Tables (see supabase/schema.sql):
 *   analysis_sessions - one row per session, full document in `data`
 *   chat_turns        - one row per conversation turn
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { MarketIntelError } from "../core/errors.js";
import {
  AnalysisSessionSchema,
  ConversationTurnSchema,
  type AnalysisSession,
  type ConversationTurn,
  type SessionFilter,
} from "../schemas/session.js";
import { DocumentSessionStore } from "./base.js";

const SESSIONS_TABLE = "analysis_sessions";
const TURNS_TABLE = "chat_turns";

const SessionRowSchema = z.object({ data: AnalysisSessionSchema });
const TurnRowSchema = z.object({
  role: ConversationTurnSchema.shape.role,
  text: z.string(),
  created_at: z.string(),
});

let supabaseInstance: SupabaseClient | null = null;

/**
 * Lazy-loaded singleton client
 */
export function getSupabase(url: string, key: string): SupabaseClient {
  if (!supabaseInstance) {
    supabaseInstance = createClient(url, key, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });
  }
  return supabaseInstance;
}

/**
 * Reset client (for testing)
 */
export function resetSupabase(): void {
  supabaseInstance = null;
}

export class SupabaseStoreError extends MarketIntelError {
  constructor(operation: string, message: string) {
    super(`Supabase ${operation} failed: ${message}`, "STORE_ERROR", {
      context: { operation },
      retryable: false,
    });
    this.name = "SupabaseStoreError";
  }
}

export class SupabaseSessionStore extends DocumentSessionStore {
  constructor(private readonly client: SupabaseClient) {
    super();
  }

  protected async readSession(id: string): Promise<AnalysisSession | null> {
    const { data, error } = await this.client
      .from(SESSIONS_TABLE)
      .select("data")
      .eq("id", id)
      .maybeSingle();

    if (error) throw new SupabaseStoreError("get", error.message);
    if (!data) return null;

    return SessionRowSchema.parse(data).data;
  }

  protected async writeSession(session: AnalysisSession): Promise<void> {
    const { error } = await this.client.from(SESSIONS_TABLE).upsert({
      id: session.id,
      query: session.query,
      domain: session.domain,
      status: session.status,
      created_at: session.createdAt,
      updated_at: session.updatedAt,
      data: session,
    });

    if (error) throw new SupabaseStoreError("upsert", error.message);
  }

  protected async removeSession(id: string): Promise<boolean> {
    const { data, error } = await this.client.from(SESSIONS_TABLE).delete().eq("id", id).select("id");

    if (error) throw new SupabaseStoreError("delete", error.message);
    return Array.isArray(data) && data.length > 0;
  }

  /**
   * Filters run server-side; the base class re-applies them as well
   */
  protected async readAllSessions(filter: SessionFilter): Promise<AnalysisSession[]> {
    let query = this.client.from(SESSIONS_TABLE).select("data");

    if (filter.status !== undefined) {
      query = query.in("status", Array.isArray(filter.status) ? filter.status : [filter.status]);
    }
    if (filter.domain !== undefined) query = query.ilike("domain", filter.domain);
    if (filter.from !== undefined) query = query.gte("created_at", filter.from);
    if (filter.to !== undefined) query = query.lte("created_at", filter.to);

    const { data, error } = await query.order("created_at", { ascending: false });

    if (error) throw new SupabaseStoreError("list", error.message);
    return z.array(SessionRowSchema).parse(data ?? []).map((row) => row.data);
  }

  protected async appendTurn(conversationId: string, turn: ConversationTurn): Promise<void> {
    const { error } = await this.client.from(TURNS_TABLE).insert({
      conversation_id: conversationId,
      role: turn.role,
      text: turn.text,
      created_at: turn.timestamp,
    });

    if (error) throw new SupabaseStoreError("save turn", error.message);
  }

  protected async readTurns(conversationId: string): Promise<ConversationTurn[]> {
    const { data, error } = await this.client
      .from(TURNS_TABLE)
      .select("role, text, created_at")
      .eq("conversation_id", conversationId)
      .order("created_at", { ascending: true });

    if (error) throw new SupabaseStoreError("load turns", error.message);

    return z
      .array(TurnRowSchema)
      .parse(data ?? [])
      .map((row) => ({ role: row.role, text: row.text, timestamp: row.created_at }));
  }

  protected async removeTurns(conversationId: string): Promise<void> {
    const { error } = await this.client.from(TURNS_TABLE).delete().eq("conversation_id", conversationId);
    if (error) throw new SupabaseStoreError("delete turns", error.message);
  }
}
