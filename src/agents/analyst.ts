/**
 * Analyst Stage
 * Trends, opportunities and competitive landscape from the Reader digest
 */

import {
  AnalystPayloadSchema,
  CompetitorSchema,
  OpportunitySchema,
  TrendSchema,
  type AnalystPayload,
} from "../schemas/artifacts.js";
import { getAnalystPrompt, ANALYST_SYSTEM_PROMPT } from "./prompts.js";
import { asRecord, salvageItems, salvageString } from "./salvage.js";
import { requireUpstream, type StageStrategy } from "./types.js";

export const analystStrategy: StageStrategy<"analyst"> = {
  stage: "analyst",
  profile: "analyst",
  systemPrompt: ANALYST_SYSTEM_PROMPT,
  schema: AnalystPayloadSchema,

  resolveInput(ctx) {
    const { artifact } = requireUpstream(ctx, "reader");
    return { kind: "artifact", artifactId: artifact.id };
  },

  buildPrompt(ctx) {
    const { payload } = requireUpstream(ctx, "reader");
    return getAnalystPrompt({ query: ctx.query, domain: ctx.domain, reader: payload });
  },

  salvage(candidate): AnalystPayload | null {
    const obj = asRecord(candidate);
    if (!obj) return null;
    return {
      trends: salvageItems(obj.trends, TrendSchema),
      opportunities: salvageItems(obj.opportunities, OpportunitySchema),
      competitors: salvageItems(obj.competitors, CompetitorSchema),
      synthesis: salvageString(obj.synthesis),
    };
  },

  toArtifact(envelope, payload) {
    return { ...envelope, stage: "analyst", payload };
  },
};
