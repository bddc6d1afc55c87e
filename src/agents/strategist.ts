/**
 * Strategist Stage
 * Prioritized recommendations, risks and a phased roadmap
 */

import {
  RecommendationSchema,
  RiskSchema,
  RoadmapSchema,
  StrategistPayloadSchema,
  type StrategistPayload,
} from "../schemas/artifacts.js";
import { getStrategistPrompt, STRATEGIST_SYSTEM_PROMPT } from "./prompts.js";
import { asRecord, salvageItems, salvageStrings } from "./salvage.js";
import { requireUpstream, type StageStrategy } from "./types.js";

const EMPTY_ROADMAP = { shortTerm: [], mediumTerm: [], longTerm: [] };

export const strategistStrategy: StageStrategy<"strategist"> = {
  stage: "strategist",
  profile: "strategist",
  systemPrompt: STRATEGIST_SYSTEM_PROMPT,
  schema: StrategistPayloadSchema,

  resolveInput(ctx) {
    const { artifact } = requireUpstream(ctx, "analyst");
    return { kind: "artifact", artifactId: artifact.id };
  },

  buildPrompt(ctx) {
    const { payload } = requireUpstream(ctx, "analyst");
    return getStrategistPrompt({ query: ctx.query, domain: ctx.domain, analyst: payload });
  },

  salvage(candidate): StrategistPayload | null {
    const obj = asRecord(candidate);
    if (!obj) return null;
    const roadmap = RoadmapSchema.safeParse(obj.roadmap ?? {});
    return {
      recommendations: salvageItems(obj.recommendations, RecommendationSchema),
      risks: salvageItems(obj.risks, RiskSchema),
      successMetrics: salvageStrings(obj.successMetrics),
      roadmap: roadmap.success ? roadmap.data : EMPTY_ROADMAP,
    };
  },

  toArtifact(envelope, payload) {
    return { ...envelope, stage: "strategist", payload };
  },
};
