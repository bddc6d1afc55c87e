/**
 * Evidence Schema
 * One entry per provider per collection run, failed providers included
 */

import { z } from "zod";

export const EvidenceKindSchema = z.enum(["web", "news", "search"]);

export const EvidenceFailureCodeSchema = z.enum([
  "timeout",
  "transient",
  "unrecoverable",
  "suppressed",
  "empty",
  "interrupted",
]);

export const EvidenceDocumentSchema = z.object({
  title: z.string(),
  url: z.string(),
  snippet: z.string(),
  publishedAt: z.string().optional(),
});

export const EvidenceFailureSchema = z.object({
  code: EvidenceFailureCodeSchema,
  message: z.string(),
  attempts: z.number().int().min(0),
});

export const EvidenceSchema = z.object({
  id: z.string(),
  sessionId: z.string(),
  providerId: z.string(),
  kind: EvidenceKindSchema,
  content: z.string(),
  documents: z.array(EvidenceDocumentSchema),
  fetchedAt: z.string(),
  reliability: z.number().min(0).max(1),
  ok: z.boolean(),
  failure: EvidenceFailureSchema.optional(),
});

export type EvidenceKind = z.infer<typeof EvidenceKindSchema>;
export type EvidenceFailureCode = z.infer<typeof EvidenceFailureCodeSchema>;
export type EvidenceDocument = z.infer<typeof EvidenceDocumentSchema>;
export type EvidenceFailure = z.infer<typeof EvidenceFailureSchema>;
export type Evidence = z.infer<typeof EvidenceSchema>;

export function usableEvidence(evidence: readonly Evidence[]): Evidence[] {
  return evidence.filter((e) => e.ok && e.documents.length > 0);
}
