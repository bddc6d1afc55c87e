import { describe, it, expect } from "vitest";
import type { Config } from "../src/core/config.js";
import {
  SessionNotFoundError,
  StageTransportError,
  UnrecoverableProviderError,
  ValidationError,
} from "../src/core/errors.js";
import { createEngine } from "../src/engine.js";
import type { ProgressEvent } from "../src/pipeline/progress.js";
import type { AnalysisSession } from "../src/schemas/session.js";
import { MemorySessionStore } from "../src/store/memory.js";
import type { EvidenceProvider } from "../src/tools/providers/types.js";
import {
  FakeProvider,
  ScriptedReasoningClient,
  analystOutput,
  happyScripts,
  hangs,
  json,
  succeeds,
  testConfig,
  untilAborted,
  type Scripted,
} from "./helpers.js";

const request = { query: "home battery storage", domain: "energy" };

function setup(
  scripts: Partial<Record<string, Scripted[]>> = happyScripts(),
  options: { config?: Config; providers?: EvidenceProvider[] } = {}
) {
  const store = new MemorySessionStore();
  const client = new ScriptedReasoningClient(scripts);
  const engine = createEngine(options.config ?? testConfig(), {
    client,
    store,
    providers: options.providers ?? [
      new FakeProvider("web", succeeds("Installs doubled")),
      new FakeProvider("news", succeeds("Rebates expand"), "news"),
    ],
  });
  return { store, client, engine, orchestrator: engine.orchestrator };
}

/** A failed session must carry a failed artifact or failed evidence */
function recordsFailure(session: AnalysisSession): boolean {
  return session.artifacts.some((a) => a.status === "failed") || session.evidence.some((e) => !e.ok);
}

async function collect(events: AsyncIterable<ProgressEvent>): Promise<ProgressEvent[]> {
  const seen: ProgressEvent[] = [];
  for await (const event of events) seen.push(event);
  return seen;
}

describe("WorkflowOrchestrator", () => {
  it("runs every stage in order and completes the session", async () => {
    const { client, engine, orchestrator } = setup();

    const session = await orchestrator.run(request);

    expect(session.status).toBe("complete");
    expect(session.workflowState).toBe("complete");
    expect(session.reason).toBeUndefined();
    expect(session.evidence).toHaveLength(2);
    expect(session.artifacts.map((a) => [a.stage, a.status])).toEqual([
      ["reader", "succeeded"],
      ["analyst", "succeeded"],
      ["strategist", "succeeded"],
      ["formatter", "succeeded"],
    ]);
    expect(session.report?.title).toBe("Home Battery Storage Outlook");
    expect(client.calls.map((c) => c.label)).toEqual(["reader", "analyst", "strategist", "formatter"]);

    const context = await engine.retriever.retrieve("home battery adoption", {
      scope: "session",
      sessionId: session.id,
    });
    expect(context.length).toBeGreaterThan(0);
  });

  it("chains each artifact to its upstream artifact", async () => {
    const { orchestrator } = setup();

    const session = await orchestrator.run(request);
    const [reader, analyst, strategist, formatter] = session.artifacts;

    expect(reader?.input).toEqual({ kind: "evidence", evidenceIds: session.evidence.map((e) => e.id) });
    expect(analyst?.input).toEqual({ kind: "artifact", artifactId: reader?.id });
    expect(strategist?.input).toEqual({ kind: "artifact", artifactId: analyst?.id });
    expect(formatter?.input).toEqual({ kind: "artifact", artifactId: strategist?.id });
  });

  it("rejects an invalid request before creating a session", async () => {
    const { store, orchestrator } = setup();

    await expect(orchestrator.run({ query: "ev", domain: "energy" })).rejects.toThrow(
      "Query must be at least 5 characters long"
    );
    await expect(orchestrator.run({ query: "home battery storage", domain: "energy!" })).rejects.toBeInstanceOf(
      ValidationError
    );
    expect(await store.list()).toEqual([]);
  });

  it("fails without invoking any stage when no provider yields evidence", async () => {
    const revoked = new FakeProvider("revoked", async () => {
      throw new UnrecoverableProviderError("Invalid API key", "revoked", "credentials");
    });
    const { client, orchestrator } = setup(happyScripts(), { providers: [revoked] });

    const session = await orchestrator.run(request);

    expect(session.status).toBe("failed");
    expect(session.reason).toBe("No evidence available from any provider (revoked: unrecoverable)");
    expect(session.evidence.map((e) => e.failure?.code)).toEqual(["unrecoverable"]);
    expect(session.artifacts).toEqual([]);
    expect(client.calls).toHaveLength(0);

    const status = orchestrator.status(session.id);
    expect(status?.state).toBe("failed");
    expect(status?.failedIn).toBe("collecting");
    expect(status?.progress).toBe(10);
  });

  it("fails the session when the reader fails", async () => {
    const { orchestrator } = setup({ ...happyScripts(), reader: [new StageTransportError("model unavailable")] });

    const session = await orchestrator.run(request);

    expect(session.status).toBe("failed");
    expect(session.reason).toBe("reader stage failed: Reasoning call failed: model unavailable");
    expect(session.artifacts.map((a) => a.status)).toEqual(["failed"]);
  });

  it("continues past a degraded analyst and notes it on the completed session", async () => {
    const { orchestrator } = setup({ ...happyScripts(), analyst: [json({ trends: analystOutput.trends })] });

    const session = await orchestrator.run(request);

    expect(session.status).toBe("complete");
    expect(session.reason).toBe("Degraded upstream stages: analyst");
    expect(session.artifacts.map((a) => a.status)).toEqual(["succeeded", "degraded", "succeeded", "succeeded"]);
    expect(session.artifacts[1]?.defects).toEqual(["opportunities: Required"]);
  });

  it("fails on a degraded stage whose degradation is disabled", async () => {
    const base = testConfig();
    const config: Config = {
      ...base,
      stages: { ...base.stages, allowDegraded: { ...base.stages.allowDegraded, analyst: false } },
    };
    const { client, orchestrator } = setup(
      { ...happyScripts(), analyst: [json({ trends: analystOutput.trends })] },
      { config }
    );

    const session = await orchestrator.run(request);

    expect(session.status).toBe("failed");
    expect(session.reason).toBe(
      "analyst stage failed: Degradation disabled: Output failed schema validation after 2 attempt(s)"
    );
    expect(session.artifacts.map((a) => [a.stage, a.status])).toEqual([
      ["reader", "succeeded"],
      ["analyst", "failed"],
    ]);
    expect(session.artifacts[1]?.payload).toBeNull();
    expect(session.artifacts[1]?.defects).toEqual(["opportunities: Required"]);
    expect(recordsFailure(session)).toBe(true);
    expect(client.callsFor("strategist")).toHaveLength(0);
  });

  it("ends partially complete with a templated report when the formatter call fails", async () => {
    const { orchestrator } = setup({
      ...happyScripts(),
      formatter: [new StageTransportError("formatter down", { retryable: false })],
    });

    const session = await orchestrator.run(request);

    expect(session.status).toBe("partial");
    expect(session.workflowState).toBe("partially_complete");
    expect(session.reason).toBe("Reasoning call failed: formatter down; templated fallback used");
    expect(session.report?.templated).toBe(true);
    expect(session.report?.title).toBe("Market Intelligence Report: energy");
  });

  it("emits progress events that replay from the start on every iteration", async () => {
    const { orchestrator } = setup();

    const handle = await orchestrator.start(request);
    const live = collect(orchestrator.events(handle.sessionId));
    await handle.completion;

    const first = await live;
    const replay = await collect(orchestrator.events(handle.sessionId));

    expect(replay).toEqual(first);
    expect(first.map((e) => e.type)).toEqual([
      "stage-entered",
      "stage-entered",
      "stage-completed",
      "stage-entered",
      "stage-completed",
      "stage-entered",
      "stage-completed",
      "stage-entered",
      "stage-completed",
      "workflow-completed",
    ]);
    expect(
      first.flatMap((e) => (e.type === "stage-entered" ? [[e.state, e.stage ?? "-"]] : []))
    ).toEqual([
      ["collecting", "-"],
      ["collecting", "reader"],
      ["analyzing", "analyst"],
      ["strategizing", "strategist"],
      ["formatting", "formatter"],
    ]);
    const last = first[first.length - 1];
    expect(last?.type === "workflow-completed" ? last.status : undefined).toBe("complete");
  });

  it("cancels a running session and keeps the artifacts produced so far", async () => {
    const { orchestrator } = setup({ ...happyScripts(), analyst: [untilAborted] });

    const handle = await orchestrator.start(request);
    const events: ProgressEvent[] = [];
    for await (const event of orchestrator.events(handle.sessionId)) {
      events.push(event);
      if (event.type === "stage-entered" && event.stage === "analyst") {
        expect(orchestrator.cancel(handle.sessionId, "Stop requested")).toBe(true);
      }
    }
    const session = await handle.completion;

    expect(session.status).toBe("failed");
    expect(session.reason).toBe("Cancelled: Stop requested");
    expect(session.artifacts.map((a) => [a.stage, a.status])).toEqual([
      ["reader", "succeeded"],
      ["analyst", "failed"],
    ]);
    expect(session.artifacts[1]?.reason).toBe("Cancelled: Stop requested");
    expect(session.artifacts[1]?.input).toEqual({ kind: "artifact", artifactId: session.artifacts[0]?.id });
    expect(recordsFailure(session)).toBe(true);
    expect(events.map((e) => e.type).slice(-2)).toEqual(["stage-failed", "workflow-completed"]);

    expect(orchestrator.status(handle.sessionId)?.progress).toBe(35);
    expect(orchestrator.cancel(handle.sessionId)).toBe(false);
  });

  it("reports status with progress and step labels", async () => {
    const { orchestrator } = setup();

    const session = await orchestrator.run(request);
    const status = orchestrator.status(session.id);

    expect(status?.state).toBe("complete");
    expect(status?.step).toBe("Completed");
    expect(status?.progress).toBe(100);
    expect(status?.finishedAt).toBeDefined();
    expect(orchestrator.status("unknown")).toBeNull();
  });

  it("completes from the remaining providers after an unrecoverable failure", async () => {
    const revoked = new FakeProvider("revoked", async () => {
      throw new UnrecoverableProviderError("Quota exhausted", "revoked", "quota");
    });
    const { orchestrator } = setup(happyScripts(), {
      providers: [revoked, new FakeProvider("web", succeeds("Installs doubled"))],
    });

    const session = await orchestrator.run(request);

    expect(session.status).toBe("complete");
    expect(revoked.calls).toBe(1);
    expect(session.evidence.map((e) => [e.providerId, e.ok])).toEqual([
      ["revoked", false],
      ["web", true],
    ]);
    expect(session.evidence[0]?.failure?.code).toBe("unrecoverable");
  });

  it("records an interrupted collection as failed evidence", async () => {
    const slow = new FakeProvider("slow", hangs, "search");
    const { client, orchestrator } = setup(happyScripts(), { providers: [slow] });

    const handle = await orchestrator.start(request);
    for await (const event of orchestrator.events(handle.sessionId)) {
      if (event.type === "stage-entered" && event.state === "collecting" && event.stage === undefined) {
        orchestrator.cancel(handle.sessionId, "Stop requested");
      }
    }
    const session = await handle.completion;

    expect(session.status).toBe("failed");
    expect(session.artifacts).toEqual([]);
    expect(session.evidence.map((e) => [e.providerId, e.ok, e.failure?.code, e.failure?.message])).toEqual([
      ["slow", false, "interrupted", "Cancelled: Stop requested"],
    ]);
    expect(recordsFailure(session)).toBe(true);
    expect(client.calls).toHaveLength(0);
  });

  it("completes when one of three providers times out on every attempt", async () => {
    const slow = new FakeProvider("slow", hangs, "search");
    const { orchestrator } = setup(happyScripts(), {
      config: testConfig({ PROVIDER_TIMEOUT_MS: "50" }),
      providers: [
        new FakeProvider("web", succeeds("Installs doubled")),
        new FakeProvider("news", succeeds("Rebates expand"), "news"),
        slow,
      ],
    });

    const session = await orchestrator.run(request);

    expect(session.status).toBe("complete");
    expect(session.evidence.map((e) => [e.providerId, e.ok])).toEqual([
      ["web", true],
      ["news", true],
      ["slow", false],
    ]);
    expect(session.evidence[2]?.failure?.code).toBe("timeout");
    // default provider retries are 2
    expect(slow.calls).toBe(3);
    expect(session.artifacts.every((a) => a.status === "succeeded")).toBe(true);
  });

  it("evicts the oldest finished runs beyond the retention limit", async () => {
    const base = testConfig();
    const { orchestrator } = setup(happyScripts(), {
      config: { ...base, stages: { ...base.stages, retainedRuns: 1 } },
    });

    const first = await orchestrator.run(request);
    const second = await orchestrator.run(request);

    expect(orchestrator.status(first.id)).toBeNull();
    expect(() => orchestrator.events(first.id)).toThrow(SessionNotFoundError);
    expect(orchestrator.status(second.id)?.state).toBe("complete");
  });

  it("resolves with the produced session when it is deleted mid-run", async () => {
    const { store, orchestrator } = setup({ ...happyScripts(), analyst: [untilAborted] });

    const handle = await orchestrator.start(request);
    for await (const event of orchestrator.events(handle.sessionId)) {
      if (event.type === "stage-entered" && event.stage === "analyst") {
        await store.delete(handle.sessionId);
      }
    }
    const session = await handle.completion;

    expect(session.status).toBe("failed");
    expect(session.reason).toBe("Cancelled: Session deleted");
    expect(session.artifacts.map((a) => [a.stage, a.status])).toEqual([
      ["reader", "succeeded"],
      ["analyst", "failed"],
    ]);
    expect(await store.get(handle.sessionId)).toBeNull();
    expect(orchestrator.status(handle.sessionId)).toBeNull();
  });
});
