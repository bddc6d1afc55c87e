import { loadConfig, type Config } from "../src/core/config.js";
import { StageTransportError } from "../src/core/errors.js";
import type { ReasoningClient, ReasoningRequest, ReasoningResponse } from "../src/core/reasoning.js";
import type { EvidenceKind } from "../src/schemas/evidence.js";
import type { EvidenceProvider, ProviderResult } from "../src/tools/providers/types.js";

/**
 * Memory store, no backoff; everything else at its defaults
 */
export function testConfig(env: Record<string, string> = {}): Config {
  const config = loadConfig({ SESSION_STORE: "memory", ...env });
  const noBackoff = <T extends { backoffMs: number }>(value: T): T => ({ ...value, backoffMs: 0 });
  return {
    ...config,
    providers: noBackoff(config.providers),
    profiles: {
      reader: noBackoff(config.profiles.reader),
      analyst: noBackoff(config.profiles.analyst),
      strategist: noBackoff(config.profiles.strategist),
      formatter: noBackoff(config.profiles.formatter),
      assistant: noBackoff(config.profiles.assistant),
    },
  };
}

// ============================================================
// REASONING
// ============================================================

export type Scripted = string | Error | ((request: ReasoningRequest) => Promise<string>);

/**
 * Answers by request label. The n-th call for a label gets the n-th scripted
 * response; the last one repeats.
 */
export class ScriptedReasoningClient implements ReasoningClient {
  readonly calls: ReasoningRequest[] = [];

  constructor(private readonly scripts: Partial<Record<string, Scripted[]>>) {}

  callsFor(label: string): ReasoningRequest[] {
    return this.calls.filter((c) => c.label === label);
  }

  async invoke(request: ReasoningRequest): Promise<ReasoningResponse> {
    this.calls.push(request);
    const label = request.label ?? "call";
    const queue = this.scripts[label] ?? [];
    const next = queue[Math.min(this.callsFor(label).length, queue.length) - 1];

    if (next === undefined) {
      throw new StageTransportError(`No scripted response for ${label}`, { retryable: false });
    }
    if (next instanceof Error) throw next;

    const text = typeof next === "string" ? next : await next(request);
    return { text, costUsd: 0.01, durationMs: 1 };
  }
}

/** Resolves only when the request is aborted, then rejects with the abort reason */
export function untilAborted(request: ReasoningRequest): Promise<string> {
  return new Promise((_, reject) => {
    request.signal?.addEventListener("abort", () => reject(request.signal?.reason), { once: true });
  });
}

// ============================================================
// PROVIDERS
// ============================================================

export type ProviderBehavior = (call: number, signal: AbortSignal) => Promise<ProviderResult>;

export class FakeProvider implements EvidenceProvider {
  calls = 0;

  constructor(
    readonly id: string,
    private readonly behavior: ProviderBehavior,
    readonly kind: EvidenceKind = "web"
  ) {}

  fetch(_query: string, _domain: string, signal: AbortSignal): Promise<ProviderResult> {
    this.calls++;
    return this.behavior(this.calls, signal);
  }
}

export function documents(...titles: string[]): ProviderResult {
  return {
    documents: titles.map((title, i) => ({
      title,
      url: `https://example.com/${i}`,
      snippet: `${title} snippet`,
    })),
    reliability: 0.8,
  };
}

export const succeeds =
  (...titles: string[]): ProviderBehavior =>
  async () =>
    documents(...titles);

export const hangs: ProviderBehavior = (_call, signal) =>
  new Promise((_, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });

// ============================================================
// STAGE OUTPUT
// ============================================================

export const readerOutput = {
  keyThemes: ["Home battery adoption", "Falling cell prices"],
  marketSignals: ["Utility rebates expanding"],
  dataQualityScore: 7,
  contentSummary: "Residential storage demand is rising as cell prices fall.",
  focusAreas: ["installers"],
};

export const analystOutput = {
  trends: [
    {
      name: "Falling cell prices",
      description: "Pack prices keep dropping year over year.",
      impact: "High",
      timeframe: "short-term",
      confidence: 0.8,
    },
  ],
  opportunities: [
    {
      name: "Solar plus storage bundles",
      description: "Installers bundle batteries with rooftop solar.",
      revenuePotential: "high",
      difficulty: "medium",
      riskLevel: "low",
    },
  ],
  competitors: [{ name: "Acme Storage", strengths: ["distribution"] }],
  synthesis: "Cost declines open the residential segment.",
};

export const strategistOutput = {
  recommendations: [
    {
      title: "Launch an installer bundle",
      description: "Partner with regional installers.",
      priority: "high",
      timeline: "short-term",
    },
    {
      title: "Build a financing offer",
      description: "Monthly payment plans for homeowners.",
      priority: "medium",
      timeline: "medium-term",
    },
  ],
  risks: [{ risk: "Cell supply shocks", likelihood: "medium", mitigation: "Dual sourcing" }],
  successMetrics: ["Attach rate"],
  roadmap: { shortTerm: ["Pilot with two installers"] },
};

export const formatterOutput = {
  title: "Home Battery Storage Outlook",
  executiveSummary: "Residential storage is entering a growth phase.",
  sections: [{ heading: "Market Trends", body: "Cell prices keep falling." }],
};

export function json(value: unknown): string {
  return JSON.stringify(value);
}

/** Scripts where every stage answers correctly on the first call */
export function happyScripts(): Record<string, Scripted[]> {
  return {
    reader: [json(readerOutput)],
    analyst: [json(analystOutput)],
    strategist: [json(strategistOutput)],
    formatter: [json(formatterOutput)],
  };
}
