/**
 * Stage Artifact Schemas
 * Payload contracts for Reader, Analyst, Strategist and Formatter output.
 * The Formatter payload is the stable contract handed to exporters.
 */

import { z } from "zod";

export const STAGE_ORDER = ["reader", "analyst", "strategist", "formatter"] as const;

export const StageNameSchema = z.enum(STAGE_ORDER);
export type StageName = z.infer<typeof StageNameSchema>;

export const ArtifactStatusSchema = z.enum(["succeeded", "degraded", "failed"]);
export type ArtifactStatus = z.infer<typeof ArtifactStatusSchema>;

// Models answer "High" as often as "high"
const lowercased = <U extends string, T extends Readonly<[U, ...U[]]>>(values: T) =>
  z.preprocess((v) => (typeof v === "string" ? v.trim().toLowerCase() : v), z.enum(values));

const LevelSchema = lowercased(["high", "medium", "low"]);
const TimeframeSchema = lowercased(["short-term", "medium-term", "long-term"]);
const DifficultySchema = lowercased(["easy", "medium", "hard"]);

// Stored payloads use the *Shape schemas, which keep a degraded artifact's
// best-effort payload loadable. Stage output is checked against the stricter
// *PayloadSchema versions, which add the mandatory non-empty collections.

// ============================================
// READER
// ============================================

export const ReaderPayloadShape = z.object({
  keyThemes: z.array(z.string().min(1)),
  marketSignals: z.array(z.string()).default([]),
  dataQualityScore: z.coerce.number().min(1).max(10),
  contentSummary: z.string(),
  focusAreas: z.array(z.string()).default([]),
});

export const ReaderPayloadSchema = ReaderPayloadShape.extend({
  keyThemes: z.array(z.string().min(1)).min(1),
  contentSummary: z.string().min(1),
});

// ============================================
// ANALYST
// ============================================

export const TrendSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  impact: LevelSchema,
  timeframe: TimeframeSchema,
  confidence: z.coerce.number().min(0).max(1),
  evidence: z.array(z.string()).default([]),
  drivers: z.array(z.string()).default([]),
});

export const OpportunitySchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  targetSegment: z.string().default(""),
  revenuePotential: LevelSchema,
  difficulty: DifficultySchema,
  riskLevel: LevelSchema,
  timeToMarket: z.string().default(""),
  requirements: z.array(z.string()).default([]),
});

export const CompetitorSchema = z.object({
  name: z.string().min(1),
  marketShare: z.string().optional(),
  strengths: z.array(z.string()).default([]),
  recentDevelopments: z.string().optional(),
});

export const AnalystPayloadShape = z.object({
  trends: z.array(TrendSchema),
  opportunities: z.array(OpportunitySchema),
  competitors: z.array(CompetitorSchema).default([]),
  synthesis: z.string().default(""),
});

export const AnalystPayloadSchema = AnalystPayloadShape.extend({
  trends: z.array(TrendSchema).min(1),
  opportunities: z.array(OpportunitySchema).min(1),
});

// ============================================
// STRATEGIST
// ============================================

export const RecommendationSchema = z.object({
  title: z.string().min(1),
  description: z.string(),
  objective: z.string().default(""),
  priority: LevelSchema,
  timeline: TimeframeSchema,
  successIndicators: z.array(z.string()).default([]),
  steps: z.array(z.string()).default([]),
});

export const RiskSchema = z.object({
  risk: z.string().min(1),
  likelihood: LevelSchema,
  mitigation: z.string().default(""),
});

export const RoadmapSchema = z.object({
  shortTerm: z.array(z.string()).default([]),
  mediumTerm: z.array(z.string()).default([]),
  longTerm: z.array(z.string()).default([]),
});

export const StrategistPayloadShape = z.object({
  recommendations: z.array(RecommendationSchema),
  risks: z.array(RiskSchema).default([]),
  successMetrics: z.array(z.string()).default([]),
  roadmap: RoadmapSchema.default({}),
});

export const StrategistPayloadSchema = StrategistPayloadShape.extend({
  recommendations: z.array(RecommendationSchema).min(1),
});

// ============================================
// FORMATTER
// ============================================

export const ReportSectionSchema = z.object({
  heading: z.string().min(1),
  body: z.string(),
});

export const DashboardSummarySchema = z.object({
  totalTrends: z.number().int().min(0),
  totalOpportunities: z.number().int().min(0),
  totalRecommendations: z.number().int().min(0),
  highPriorityItems: z.number().int().min(0),
});

export const FormatterPayloadShape = z.object({
  title: z.string(),
  executiveSummary: z.string(),
  sections: z.array(ReportSectionSchema),
  dashboard: DashboardSummarySchema,
  templated: z.boolean().default(false),
});

export const FormatterPayloadSchema = FormatterPayloadShape.extend({
  title: z.string().min(1),
  executiveSummary: z.string().min(1),
  sections: z.array(ReportSectionSchema).min(1),
});

export type ReaderPayload = z.infer<typeof ReaderPayloadShape>;
export type Trend = z.infer<typeof TrendSchema>;
export type Opportunity = z.infer<typeof OpportunitySchema>;
export type Competitor = z.infer<typeof CompetitorSchema>;
export type AnalystPayload = z.infer<typeof AnalystPayloadShape>;
export type Recommendation = z.infer<typeof RecommendationSchema>;
export type Risk = z.infer<typeof RiskSchema>;
export type Roadmap = z.infer<typeof RoadmapSchema>;
export type StrategistPayload = z.infer<typeof StrategistPayloadShape>;
export type ReportSection = z.infer<typeof ReportSectionSchema>;
export type DashboardSummary = z.infer<typeof DashboardSummarySchema>;
export type FormatterPayload = z.infer<typeof FormatterPayloadShape>;

export interface StagePayloads {
  reader: ReaderPayload;
  analyst: AnalystPayload;
  strategist: StrategistPayload;
  formatter: FormatterPayload;
}

// ============================================
// ARTIFACT ENVELOPE
// ============================================

export const ArtifactInputSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("evidence"), evidenceIds: z.array(z.string()) }),
  z.object({ kind: z.literal("artifact"), artifactId: z.string() }),
]);
export type ArtifactInput = z.infer<typeof ArtifactInputSchema>;

const envelope = {
  id: z.string(),
  sessionId: z.string(),
  input: ArtifactInputSchema,
  status: ArtifactStatusSchema,
  attempts: z.number().int().min(0),
  defects: z.array(z.string()),
  reason: z.string().optional(),
  createdAt: z.string(),
};

export const StageArtifactSchema = z.discriminatedUnion("stage", [
  z.object({ ...envelope, stage: z.literal("reader"), payload: ReaderPayloadShape.nullable() }),
  z.object({ ...envelope, stage: z.literal("analyst"), payload: AnalystPayloadShape.nullable() }),
  z.object({ ...envelope, stage: z.literal("strategist"), payload: StrategistPayloadShape.nullable() }),
  z.object({ ...envelope, stage: z.literal("formatter"), payload: FormatterPayloadShape.nullable() }),
]);

export interface ArtifactEnvelope {
  id: string;
  sessionId: string;
  input: ArtifactInput;
  status: ArtifactStatus;
  attempts: number;
  defects: string[];
  reason?: string;
  createdAt: string;
}

export interface StageArtifactOf<S extends StageName> extends ArtifactEnvelope {
  stage: S;
  /** null when the stage failed */
  payload: StagePayloads[S] | null;
}

export type StageArtifact = { [S in StageName]: StageArtifactOf<S> }[StageName];

/**
 * Latest artifact for a stage, narrowed to that stage's payload
 */
export function findArtifact<S extends StageName>(
  artifacts: readonly StageArtifact[],
  stage: S
): StageArtifactOf<S> | undefined {
  let found: StageArtifactOf<S> | undefined;
  for (const artifact of artifacts) {
    if (isStageArtifact(artifact, stage)) {
      found = artifact;
    }
  }
  return found;
}

export function isStageArtifact<S extends StageName>(
  artifact: StageArtifactOf<StageName>,
  stage: S
): artifact is StageArtifactOf<S> {
  return artifact.stage === stage;
}
