/**
 * Stage strategies
 *
 * Every stage is one StageStrategy<S>, tagged by its stage name. The
 * executor owns the lifecycle; a strategy only knows its inputs, prompt,
 * output contract and how to recover from bad output.
 */

import type { z } from "zod";
import type { ProfileName } from "../core/config.js";
import { ValidationError } from "../core/errors.js";
import type { Evidence } from "../schemas/evidence.js";
import {
  findArtifact,
  type ArtifactEnvelope,
  type ArtifactInput,
  type StageArtifact,
  type StageArtifactOf,
  type StageName,
  type StagePayloads,
} from "../schemas/artifacts.js";

/**
 * Everything a stage may read
 */
export interface StageContext {
  sessionId: string;
  query: string;
  domain: string;
  /** Optional focus question supplied with the analysis request */
  question?: string;
  evidence: readonly Evidence[];
  artifacts: readonly StageArtifact[];
}

export interface StageStrategy<S extends StageName> {
  readonly stage: S;
  readonly profile: ProfileName;
  readonly systemPrompt: string;
  /** Output contract checked after every invocation */
  readonly schema: z.ZodType<StagePayloads[S], z.ZodTypeDef, unknown>;

  /**
   * Upstream reference for the artifact. Throws ValidationError when the
   * upstream input is missing or unusable, before anything is invoked.
   */
  resolveInput(ctx: StageContext): ArtifactInput;

  buildPrompt(ctx: StageContext): string;

  /** Best-effort payload from schema-invalid output; null if nothing is usable */
  salvage(candidate: unknown): StagePayloads[S] | null;

  /** Post-processing applied to every accepted payload */
  finalize?(payload: StagePayloads[S], ctx: StageContext): StagePayloads[S];

  /** Payload used when the reasoning call cannot produce one */
  fallback?(ctx: StageContext): StagePayloads[S];

  toArtifact(envelope: ArtifactEnvelope, payload: StagePayloads[S] | null): StageArtifact;
}

export type StageStrategies = { [S in StageName]: StageStrategy<S> };

/**
 * Latest non-failed upstream artifact with a payload, or ValidationError
 */
export function requireUpstream<S extends StageName>(
  ctx: StageContext,
  stage: S
): { artifact: StageArtifactOf<S>; payload: StagePayloads[S] } {
  const artifact = findArtifact(ctx.artifacts, stage);
  const payload = artifact?.payload;

  if (!artifact || artifact.status === "failed" || payload === null || payload === undefined) {
    throw new ValidationError(`Missing usable ${stage} artifact`, {
      field: stage,
      context: { sessionId: ctx.sessionId, status: artifact?.status },
    });
  }

  return { artifact, payload };
}

/**
 * Payload of an upstream artifact when one is usable, else undefined
 */
export function optionalUpstream<S extends StageName>(
  ctx: StageContext,
  stage: S
): StagePayloads[S] | undefined {
  const artifact = findArtifact(ctx.artifacts, stage);
  if (!artifact || artifact.status === "failed") return undefined;
  return artifact.payload ?? undefined;
}
