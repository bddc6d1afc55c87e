/**
 * Stage Executor
 * Uniform lifecycle around one reasoning stage.
 *
 * EXECUTION FLOW:
 * ===============
 * execute(stage, ctx)
 *   ├─ resolveInput()            - rejects empty/failed upstream, no call made
 *   ├─ SCHEMA LOOP (schemaRetries + 1 invocations):
 *   │   ├─ TRANSPORT RETRY (profile.retries, exponential backoff)
 *   │   │   └─ ReasoningClient.invoke()
 *   │   ├─ extract JSON, check against the stage schema
 *   │   ├─ valid → artifact "succeeded"
 *   │   └─ invalid → re-invoke with the defects appended
 *   ├─ still invalid → salvage → artifact "degraded" (defects recorded)
 *   └─ transport exhausted / nothing salvageable
 *         ├─ stage has a fallback → artifact "degraded" from fallback
 *         └─ otherwise → artifact "failed"
 */

import { randomUUID } from "crypto";
import type { Config } from "../core/config.js";
import { SessionCancelled, StageSchemaViolation, errorMessage, isRetryableError } from "../core/errors.js";
import { logger, type ChildLogger } from "../core/logger.js";
import type { ReasoningClient } from "../core/reasoning.js";
import { RetryExhaustedError, retryWithBackoff } from "../core/retry.js";
import type {
  ArtifactEnvelope,
  ArtifactInput,
  ArtifactStatus,
  StageArtifact,
  StageName,
  StagePayloads,
} from "../schemas/artifacts.js";
import { analystStrategy } from "./analyst.js";
import { formatterStrategy } from "./formatter.js";
import { extractJson } from "./json.js";
import { getCorrectivePrompt } from "./prompts.js";
import { readerStrategy } from "./reader.js";
import { formatIssues } from "./salvage.js";
import { strategistStrategy } from "./strategist.js";
import type { StageContext, StageStrategies, StageStrategy } from "./types.js";

export interface StageExecutorOptions {
  profiles: Config["profiles"];
  /** Corrective re-invocations after a schema violation */
  schemaRetries: number;
  /** Whether stages with a fallback may use it */
  allowFallback: boolean;
}

export interface StageExecution {
  artifact: StageArtifact;
  /** Reasoning calls made, transport retries included */
  invocations: number;
  costUsd: number;
}

export function createStageStrategies(): StageStrategies {
  return {
    reader: readerStrategy,
    analyst: analystStrategy,
    strategist: strategistStrategy,
    formatter: formatterStrategy,
  };
}

type InvokeOutcome =
  | { ok: true; text: string }
  | { ok: false; error: unknown };

export class StageExecutor {
  private readonly log = logger.child({ component: "stage-executor" });

  constructor(
    private readonly client: ReasoningClient,
    private readonly options: StageExecutorOptions,
    private readonly strategies: StageStrategies = createStageStrategies()
  ) {}

  /**
   * Run one stage. Throws ValidationError when upstream input is unusable
   * and SessionCancelled when the signal fires; every other outcome is an
   * artifact.
   */
  async execute<S extends StageName>(
    stage: S,
    ctx: StageContext,
    signal?: AbortSignal
  ): Promise<StageExecution> {
    const strategy: StageStrategy<S> = this.strategies[stage];
    return this.run(strategy, ctx, signal);
  }

  /**
   * Failed artifact for a stage that was interrupted before producing one.
   * Throws ValidationError when the stage never had usable input.
   */
  abandon<S extends StageName>(stage: S, ctx: StageContext, reason: string): StageArtifact {
    const strategy: StageStrategy<S> = this.strategies[stage];
    const envelope: ArtifactEnvelope = {
      id: randomUUID(),
      sessionId: ctx.sessionId,
      input: strategy.resolveInput(ctx),
      status: "failed",
      attempts: 0,
      defects: [reason],
      reason,
      createdAt: new Date().toISOString(),
    };
    return strategy.toArtifact(envelope, null);
  }

  private async run<S extends StageName>(
    strategy: StageStrategy<S>,
    ctx: StageContext,
    signal?: AbortSignal
  ): Promise<StageExecution> {
    const log = this.log.child({ sessionId: ctx.sessionId, stage: strategy.stage });
    const input = strategy.resolveInput(ctx);
    const basePrompt = strategy.buildPrompt(ctx);
    const startTime = Date.now();

    const tally = { invocations: 0, costUsd: 0 };
    const maxAttempts = this.options.schemaRetries + 1;
    let prompt = basePrompt;
    let candidate: unknown = undefined;
    let defects: string[] = [];

    log.info("Stage started", { inputKind: input.kind });

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const outcome = await this.invoke(strategy, prompt, tally, log, signal);

      if (!outcome.ok) {
        const reason = `Reasoning call failed: ${errorMessage(outcome.error)}`;
        log.error("Stage transport failure", outcome.error, { attempts: tally.invocations });
        return this.finish(
          strategy,
          ctx,
          input,
          tally,
          // an earlier schema-invalid answer is still better than nothing
          this.recover(
            strategy,
            ctx,
            candidate === undefined ? null : strategy.salvage(candidate),
            [...defects, reason],
            reason
          ),
          log,
          startTime
        );
      }

      const parsed = extractJson(outcome.text);
      if (parsed.ok) {
        const result = strategy.schema.safeParse(parsed.value);
        if (result.success) {
          const payload = strategy.finalize ? strategy.finalize(result.data, ctx) : result.data;
          return this.finish(
            strategy,
            ctx,
            input,
            tally,
            { status: "succeeded", payload, defects: [] },
            log,
            startTime
          );
        }
        candidate = parsed.value;
        defects = formatIssues(result.error.issues);
      } else {
        candidate = undefined;
        defects = [parsed.error];
      }

      const violation = new StageSchemaViolation(strategy.stage, defects, candidate);
      log.warn(`Schema violation (attempt ${attempt}/${maxAttempts})`, { defects: violation.defects });
      prompt = getCorrectivePrompt(basePrompt, defects);
    }

    const salvaged = candidate === undefined ? null : strategy.salvage(candidate);
    const reason = `Output failed schema validation after ${maxAttempts} attempt(s)`;
    return this.finish(
      strategy,
      ctx,
      input,
      tally,
      this.recover(strategy, ctx, salvaged, defects, reason),
      log,
      startTime
    );
  }

  /**
   * One logical invocation: the reasoning call under transport retries
   */
  private async invoke<S extends StageName>(
    strategy: StageStrategy<S>,
    prompt: string,
    tally: { invocations: number; costUsd: number },
    log: ChildLogger,
    signal?: AbortSignal
  ): Promise<InvokeOutcome> {
    const profile = this.options.profiles[strategy.profile];

    try {
      const { value, attempts } = await retryWithBackoff(
        () =>
          this.client.invoke({
            prompt,
            systemPrompt: strategy.systemPrompt,
            profile,
            label: strategy.stage,
            signal,
          }),
        {
          maxRetries: profile.retries,
          backoffMs: profile.backoffMs,
          shouldRetry: (error) => isRetryableError(error),
          onRetry: (error, attempt, delayMs) =>
            log.warn(`Reasoning call failed (attempt ${attempt}), retrying in ${delayMs}ms`, {
              error: errorMessage(error),
            }),
          signal,
        }
      );
      tally.invocations += attempts;
      tally.costUsd += value.costUsd;
      return { ok: true, text: value.text };
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      tally.invocations += error instanceof RetryExhaustedError ? error.attempts : 0;

      if (cause instanceof SessionCancelled || signal?.aborted) {
        throw cause;
      }
      return { ok: false, error: cause };
    }
  }

  /**
   * Degraded artifact from a salvaged payload or the stage fallback, else failed
   */
  private recover<S extends StageName>(
    strategy: StageStrategy<S>,
    ctx: StageContext,
    salvaged: StagePayloads[S] | null,
    defects: string[],
    reason: string
  ): Resolution<S> {
    if (salvaged !== null) {
      const payload = strategy.finalize ? strategy.finalize(salvaged, ctx) : salvaged;
      return { status: "degraded", payload, defects, reason };
    }

    if (strategy.fallback && this.options.allowFallback) {
      return {
        status: "degraded",
        payload: strategy.fallback(ctx),
        defects,
        reason: `${reason}; templated fallback used`,
      };
    }

    return { status: "failed", payload: null, defects, reason };
  }

  private finish<S extends StageName>(
    strategy: StageStrategy<S>,
    ctx: StageContext,
    input: ArtifactInput,
    tally: { invocations: number; costUsd: number },
    resolution: Resolution<S>,
    log: ChildLogger,
    startTime: number
  ): StageExecution {
    const envelope: ArtifactEnvelope = {
      id: randomUUID(),
      sessionId: ctx.sessionId,
      input,
      status: resolution.status,
      attempts: tally.invocations,
      defects: resolution.defects,
      reason: resolution.reason,
      createdAt: new Date().toISOString(),
    };

    log.info("Stage finished", {
      status: resolution.status,
      invocations: tally.invocations,
      costUsd: tally.costUsd,
    });
    log.metric("stage_duration_ms", Date.now() - startTime, { status: resolution.status });

    return {
      artifact: strategy.toArtifact(envelope, resolution.payload),
      invocations: tally.invocations,
      costUsd: tally.costUsd,
    };
  }
}

interface Resolution<S extends StageName> {
  status: ArtifactStatus;
  payload: StagePayloads[S] | null;
  defects: string[];
  reason?: string;
}
