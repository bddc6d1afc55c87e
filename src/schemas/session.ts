/**
 * Session Schemas
 * AnalysisSession plus the records the assistant and retriever keep per session
 */

import { z } from "zod";
import { EvidenceSchema } from "./evidence.js";
import { FormatterPayloadSchema, StageArtifactSchema } from "./artifacts.js";

export const SessionStatusSchema = z.enum(["pending", "running", "partial", "complete", "failed"]);
export type SessionStatus = z.infer<typeof SessionStatusSchema>;

export const WorkflowStateSchema = z.enum([
  "created",
  "collecting",
  "analyzing",
  "strategizing",
  "formatting",
  "complete",
  "failed",
  "partially_complete",
]);
export type WorkflowState = z.infer<typeof WorkflowStateSchema>;

export const TERMINAL_STATUSES: readonly SessionStatus[] = ["complete", "failed"];

export const AnalysisSessionSchema = z.object({
  id: z.string(),
  query: z.string(),
  domain: z.string(),
  question: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
  status: SessionStatusSchema,
  workflowState: WorkflowStateSchema,
  evidence: z.array(EvidenceSchema),
  artifacts: z.array(StageArtifactSchema),
  report: FormatterPayloadSchema.nullable(),
  reason: z.string().optional(),
});
export type AnalysisSession = z.infer<typeof AnalysisSessionSchema>;

/**
 * Listing row - session without its heavy evidence/artifact payloads
 */
export interface SessionSummary {
  id: string;
  query: string;
  domain: string;
  status: SessionStatus;
  createdAt: string;
  artifactCount: number;
  reason?: string;
}

export interface SessionFilter {
  status?: SessionStatus | SessionStatus[];
  domain?: string;
  /** ISO timestamps, inclusive */
  from?: string;
  to?: string;
}

// ============================================
// INPUT VALIDATION
// ============================================

export const AnalysisRequestSchema = z.object({
  query: z
    .string()
    .trim()
    .min(5, "Query must be at least 5 characters long"),
  domain: z
    .string()
    .trim()
    .min(1, "Market domain is required")
    .regex(/^[a-zA-Z0-9\s-]+$/, "Market domain must contain only letters, numbers, spaces, or hyphens"),
  question: z.string().trim().min(1).optional(),
});
export type AnalysisRequest = z.infer<typeof AnalysisRequestSchema>;

// ============================================
// CONVERSATION / RETRIEVAL RECORDS
// ============================================

export const ConversationTurnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  text: z.string(),
  timestamp: z.string(),
});
export type ConversationTurn = z.infer<typeof ConversationTurnSchema>;

export const ContextFragmentSchema = z.object({
  id: z.string(),
  sessionId: z.string(),
  artifactId: z.string(),
  index: z.number().int().min(0),
  text: z.string(),
  embedding: z.array(z.number()),
  createdAt: z.string(),
});
export type ContextFragment = z.infer<typeof ContextFragmentSchema>;

export function summarizeSession(session: AnalysisSession): SessionSummary {
  return {
    id: session.id,
    query: session.query,
    domain: session.domain,
    status: session.status,
    createdAt: session.createdAt,
    artifactCount: session.artifacts.length,
    reason: session.reason,
  };
}
