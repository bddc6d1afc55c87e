/**
 * Formatter Stage
 * Executive report from the Analyst and Strategist output. Dashboard counts
 * are always computed from the upstream payloads, not taken from the model.
 * When the reasoning call fails the report falls back to a templated summary.
 */

import {
  DashboardSummarySchema,
  FormatterPayloadSchema,
  ReportSectionSchema,
  type FormatterPayload,
} from "../schemas/artifacts.js";
import { getFormatterPrompt, FORMATTER_SYSTEM_PROMPT } from "./prompts.js";
import { buildDashboard, templatedReport } from "./report.js";
import { asRecord, salvageItems, salvageString } from "./salvage.js";
import { optionalUpstream, requireUpstream, type StageStrategy } from "./types.js";

const EMPTY_DASHBOARD = {
  totalTrends: 0,
  totalOpportunities: 0,
  totalRecommendations: 0,
  highPriorityItems: 0,
};

// The model is not asked for dashboard numbers
const FormatterOutputSchema = FormatterPayloadSchema.extend({
  dashboard: DashboardSummarySchema.default(EMPTY_DASHBOARD),
});

export const formatterStrategy: StageStrategy<"formatter"> = {
  stage: "formatter",
  profile: "formatter",
  systemPrompt: FORMATTER_SYSTEM_PROMPT,
  schema: FormatterOutputSchema,

  resolveInput(ctx) {
    const { artifact } = requireUpstream(ctx, "strategist");
    return { kind: "artifact", artifactId: artifact.id };
  },

  buildPrompt(ctx) {
    const { payload } = requireUpstream(ctx, "strategist");
    return getFormatterPrompt({
      query: ctx.query,
      domain: ctx.domain,
      analyst: optionalUpstream(ctx, "analyst"),
      strategist: payload,
    });
  },

  salvage(candidate): FormatterPayload | null {
    const obj = asRecord(candidate);
    if (!obj) return null;
    return {
      title: salvageString(obj.title),
      executiveSummary: salvageString(obj.executiveSummary),
      sections: salvageItems(obj.sections, ReportSectionSchema),
      dashboard: EMPTY_DASHBOARD,
      templated: false,
    };
  },

  finalize(payload, ctx) {
    return {
      ...payload,
      dashboard: buildDashboard(optionalUpstream(ctx, "analyst"), optionalUpstream(ctx, "strategist")),
    };
  },

  fallback(ctx) {
    return templatedReport({
      query: ctx.query,
      domain: ctx.domain,
      analyst: optionalUpstream(ctx, "analyst"),
      strategist: optionalUpstream(ctx, "strategist"),
    });
  },

  toArtifact(envelope, payload) {
    return { ...envelope, stage: "formatter", payload };
  },
};
