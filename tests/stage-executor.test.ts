import { describe, it, expect } from "vitest";
import { StageExecutor, createStageStrategies } from "../src/agents/stage-executor.js";
import type { StageContext } from "../src/agents/types.js";
import { SessionCancelled, StageTransportError, ValidationError } from "../src/core/errors.js";
import {
  AnalystPayloadSchema,
  ReaderPayloadSchema,
  StrategistPayloadSchema,
  type StageArtifact,
  type StageName,
  type StagePayloads,
} from "../src/schemas/artifacts.js";
import type { Evidence } from "../src/schemas/evidence.js";
import {
  ScriptedReasoningClient,
  analystOutput,
  formatterOutput,
  json,
  readerOutput,
  strategistOutput,
  testConfig,
  untilAborted,
  type Scripted,
} from "./helpers.js";

const config = testConfig();
const strategies = createStageStrategies();

function executor(scripts: Partial<Record<string, Scripted[]>>, allowFallback = true) {
  const client = new ScriptedReasoningClient(scripts);
  const stageExecutor = new StageExecutor(client, {
    profiles: config.profiles,
    schemaRetries: 1,
    allowFallback,
  });
  return { client, stageExecutor };
}

function artifact<S extends StageName>(stage: S, payload: StagePayloads[S]): StageArtifact {
  return strategies[stage].toArtifact(
    {
      id: `${stage}-1`,
      sessionId: "s1",
      input: { kind: "evidence", evidenceIds: ["e1"] },
      status: "succeeded",
      attempts: 1,
      defects: [],
      createdAt: "2026-01-01T00:00:00.000Z",
    },
    payload
  );
}

const evidence: Evidence = {
  id: "e1",
  sessionId: "s1",
  providerId: "web",
  kind: "web",
  content: "Storage demand up - Installs doubled",
  documents: [{ title: "Storage demand up", url: "https://example.com/1", snippet: "Installs doubled" }],
  fetchedAt: "2026-01-01T00:00:00.000Z",
  reliability: 0.9,
  ok: true,
};

function context(artifacts: StageArtifact[] = [], entries: Evidence[] = [evidence]): StageContext {
  return { sessionId: "s1", query: "home battery storage", domain: "energy", evidence: entries, artifacts };
}

const readerArtifact = artifact("reader", ReaderPayloadSchema.parse(readerOutput));
const analystArtifact = artifact("analyst", AnalystPayloadSchema.parse(analystOutput));
const strategistArtifact = artifact("strategist", StrategistPayloadSchema.parse(strategistOutput));

describe("StageExecutor", () => {
  it("produces a succeeded artifact referencing the usable evidence", async () => {
    const { stageExecutor } = executor({ reader: [json(readerOutput)] });

    const { artifact: result, invocations } = await stageExecutor.execute("reader", context());

    expect(result.stage).toBe("reader");
    expect(result.status).toBe("succeeded");
    expect(result.input).toEqual({ kind: "evidence", evidenceIds: ["e1"] });
    expect(result.defects).toEqual([]);
    expect(invocations).toBe(1);
  });

  it("accepts JSON wrapped in a fenced block", async () => {
    const { stageExecutor } = executor({
      reader: ["Here is the digest:\n```json\n" + json(readerOutput) + "\n```"],
    });

    const { artifact: result } = await stageExecutor.execute("reader", context());

    expect(result.status).toBe("succeeded");
  });

  it("rejects missing upstream input before making any call", async () => {
    const { client, stageExecutor } = executor({ analyst: [json(analystOutput)] });

    await expect(stageExecutor.execute("analyst", context())).rejects.toBeInstanceOf(ValidationError);
    expect(client.calls).toHaveLength(0);
  });

  it("rejects a reader run without usable evidence", async () => {
    const { client, stageExecutor } = executor({ reader: [json(readerOutput)] });

    await expect(stageExecutor.execute("reader", context([], []))).rejects.toThrow(
      "Reader requires at least one usable evidence entry"
    );
    expect(client.calls).toHaveLength(0);
  });

  it("degrades after the corrective retry still misses a required field", async () => {
    const { client, stageExecutor } = executor({
      analyst: [json({ trends: analystOutput.trends })],
    });

    const { artifact: result, invocations } = await stageExecutor.execute("analyst", context([readerArtifact]));

    expect(result.status).toBe("degraded");
    expect(result.defects).toEqual(["opportunities: Required"]);
    expect(result.reason).toBe("Output failed schema validation after 2 attempt(s)");
    expect(invocations).toBe(2);

    if (result.stage !== "analyst") throw new Error("expected an analyst artifact");
    expect(result.payload?.trends).toHaveLength(1);
    expect(result.payload?.trends[0]?.impact).toBe("high");
    expect(result.payload?.opportunities).toEqual([]);

    expect(client.callsFor("analyst")[1]?.prompt).toContain("- opportunities: Required");
  });

  it("succeeds when the corrective retry fixes the output", async () => {
    const { stageExecutor } = executor({
      analyst: [json({ trends: analystOutput.trends }), json(analystOutput)],
    });

    const { artifact: result, invocations } = await stageExecutor.execute("analyst", context([readerArtifact]));

    expect(result.status).toBe("succeeded");
    expect(result.defects).toEqual([]);
    expect(invocations).toBe(2);
  });

  it("fails when no attempt returns JSON", async () => {
    const { stageExecutor } = executor({ reader: ["I could not find anything useful."] });

    const { artifact: result } = await stageExecutor.execute("reader", context());

    expect(result.status).toBe("failed");
    expect(result.payload).toBeNull();
    expect(result.defects).toEqual(["Response did not contain a valid JSON object"]);
  });

  it("retries transport failures per invocation, then fails the stage", async () => {
    const { client, stageExecutor } = executor({
      strategist: [new StageTransportError("upstream overloaded")],
    });

    const { artifact: result, invocations } = await stageExecutor.execute(
      "strategist",
      context([readerArtifact, analystArtifact])
    );

    // profile retries default to 2
    expect(client.callsFor("strategist")).toHaveLength(3);
    expect(invocations).toBe(3);
    expect(result.status).toBe("failed");
    expect(result.reason).toBe("Reasoning call failed: upstream overloaded");
    expect(result.payload).toBeNull();
  });

  it("does not retry a non-retryable transport failure", async () => {
    const { client, stageExecutor } = executor({
      strategist: [new StageTransportError("invalid api key", { retryable: false })],
    });

    await stageExecutor.execute("strategist", context([readerArtifact, analystArtifact]));

    expect(client.callsFor("strategist")).toHaveLength(1);
  });

  it("computes the formatter dashboard from upstream payloads", async () => {
    const { stageExecutor } = executor({ formatter: [json(formatterOutput)] });

    const { artifact: result } = await stageExecutor.execute(
      "formatter",
      context([readerArtifact, analystArtifact, strategistArtifact])
    );

    if (result.stage !== "formatter") throw new Error("expected a formatter artifact");
    expect(result.status).toBe("succeeded");
    expect(result.payload?.dashboard).toEqual({
      totalTrends: 1,
      totalOpportunities: 1,
      totalRecommendations: 2,
      highPriorityItems: 1,
    });
    expect(result.payload?.templated).toBe(false);
  });

  it("falls back to a templated report when the formatter call fails", async () => {
    const { stageExecutor } = executor({ formatter: [new StageTransportError("timeout", { retryable: false })] });

    const { artifact: result } = await stageExecutor.execute(
      "formatter",
      context([readerArtifact, analystArtifact, strategistArtifact])
    );

    if (result.stage !== "formatter") throw new Error("expected a formatter artifact");
    expect(result.status).toBe("degraded");
    expect(result.reason).toBe("Reasoning call failed: timeout; templated fallback used");
    expect(result.payload?.templated).toBe(true);
    expect(result.payload?.title).toBe("Market Intelligence Report: energy");
    expect(result.payload?.executiveSummary).toBe(
      "This market intelligence report analyzes **home battery storage** in the energy sector. " +
        "The analysis identified 1 key market trends, 1 strategic opportunities, and 2 actionable recommendations."
    );
    expect(result.payload?.sections.map((s) => s.heading)).toEqual([
      "Market Trends Analysis",
      "Strategic Opportunities",
      "Competitive Landscape",
      "Strategic Recommendations",
      "Risk Assessment",
      "Strategic Roadmap",
    ]);
  });

  it("fails the formatter when the fallback is disabled", async () => {
    const { stageExecutor } = executor(
      { formatter: [new StageTransportError("timeout", { retryable: false })] },
      false
    );

    const { artifact: result } = await stageExecutor.execute(
      "formatter",
      context([readerArtifact, analystArtifact, strategistArtifact])
    );

    expect(result.status).toBe("failed");
  });

  it("rethrows cancellation from an in-flight call", async () => {
    const { stageExecutor } = executor({ reader: [untilAborted] });
    const controller = new AbortController();

    const pending = stageExecutor.execute("reader", context(), controller.signal);
    controller.abort(new SessionCancelled("s1"));

    await expect(pending).rejects.toBeInstanceOf(SessionCancelled);
  });
});
