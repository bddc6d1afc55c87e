/**
 * Reasoning Client
 * The single seam through which stages and the assistant reach a model.
 *
 * The Claude implementation wraps the Agent SDK's query() stream:
 *   invoke(request)
 *     ├─ build SDK options from the stage profile (model, turns, no tools)
 *     ├─ stream messages, keep the final result text
 *     ├─ bounded by profile.timeoutMs via an AbortController
 *     └─ map failures onto StageTransportError / RateLimited
 * Retries live in the callers (StageExecutor, AssistantSession).
 */

import { query, type Options } from "@anthropic-ai/claude-agent-sdk";
import type { StageProfile, ModelTier } from "./config.js";
import { RateLimited, StageTransportError, TimeoutError, isMarketIntelError } from "./errors.js";
import { withTimeout } from "./retry.js";
import { logger } from "./logger.js";

export interface ReasoningRequest {
  prompt: string;
  systemPrompt?: string;
  profile: StageProfile;
  /** Used for log context only */
  label?: string;
  signal?: AbortSignal;
}

export interface ReasoningResponse {
  text: string;
  costUsd: number;
  durationMs: number;
}

/**
 * invoke(prompt, context) -> text; throws StageTransportError or RateLimited
 */
export interface ReasoningClient {
  invoke(request: ReasoningRequest): Promise<ReasoningResponse>;
}

const MODEL_IDS: Record<ModelTier, string> = {
  haiku: "claude-3-5-haiku-20241022",
  sonnet: "claude-sonnet-4-20250514",
};

export interface ClaudeReasoningOptions {
  cwd?: string;
}

export class ClaudeReasoningClient implements ReasoningClient {
  private readonly log = logger.child({ component: "reasoning" });

  constructor(private readonly options: ClaudeReasoningOptions = {}) {}

  async invoke(request: ReasoningRequest): Promise<ReasoningResponse> {
    const startTime = Date.now();

    try {
      return await withTimeout(
        `reasoning:${request.label ?? "call"}`,
        request.profile.timeoutMs,
        (signal) => this.invokeOnce(request, signal, startTime),
        request.signal
      );
    } catch (error) {
      throw this.classify(error, request.label);
    }
  }

  private async invokeOnce(
    request: ReasoningRequest,
    signal: AbortSignal,
    startTime: number
  ): Promise<ReasoningResponse> {
    const abortController = new AbortController();
    signal.addEventListener("abort", () => abortController.abort(signal.reason), { once: true });

    const options: Options = {
      model: MODEL_IDS[request.profile.model],
      systemPrompt: request.systemPrompt,
      maxTurns: request.profile.maxTurns,
      allowedTools: [],
      abortController,
      cwd: this.options.cwd ?? process.cwd(),
    };

    this.log.debug("Invoking model", { label: request.label, model: options.model });

    let text = "";
    let costUsd = 0;
    let durationMs = 0;

    for await (const message of query({ prompt: request.prompt, options })) {
      if (message.type !== "result") continue;

      if (message.subtype === "success") {
        text = message.result;
        costUsd = message.total_cost_usd;
        durationMs = message.duration_ms;
      } else {
        throw new StageTransportError(`Reasoning call ended with ${message.subtype}`, {
          stage: request.label,
          retryable: false,
        });
      }
    }

    if (!text) {
      throw new StageTransportError("Reasoning call returned no result", { stage: request.label });
    }

    return {
      text,
      costUsd,
      durationMs: durationMs || Date.now() - startTime,
    };
  }

  private classify(error: unknown, label?: string): Error {
    if (error instanceof StageTransportError || error instanceof RateLimited) {
      return error;
    }
    if (error instanceof TimeoutError) {
      return new StageTransportError(error.message, { stage: label, cause: error });
    }
    if (isMarketIntelError(error)) {
      // SessionCancelled and friends pass through untouched
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const lower = message.toLowerCase();
    if (lower.includes("rate limit") || lower.includes("429")) {
      return new RateLimited(message);
    }
    return new StageTransportError(message, {
      stage: label,
      cause: error,
      retryable: !lower.includes("401") && !lower.includes("invalid api key"),
    });
  }
}

export function createClaudeReasoningClient(options?: ClaudeReasoningOptions): ReasoningClient {
  return new ClaudeReasoningClient(options);
}
