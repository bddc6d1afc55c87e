import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { FileSessionStore } from "../src/store/file.js";
import { MemorySessionStore } from "../src/store/memory.js";
import type { SessionStore } from "../src/store/types.js";
import { SessionImmutableError, SessionNotFoundError, ValidationError } from "../src/core/errors.js";
import type { StageArtifact } from "../src/schemas/artifacts.js";
import type { Evidence } from "../src/schemas/evidence.js";

function evidenceFor(sessionId: string, id: string): Evidence {
  return {
    id,
    sessionId,
    providerId: "web",
    kind: "web",
    content: "",
    documents: [],
    fetchedAt: "2026-01-01T00:00:00.000Z",
    reliability: 0,
    ok: false,
    failure: { code: "timeout", message: "provider:web timed out", attempts: 2 },
  };
}

function failedReader(sessionId: string): StageArtifact {
  return {
    id: "a1",
    sessionId,
    stage: "reader",
    input: { kind: "evidence", evidenceIds: ["e1"] },
    status: "failed",
    attempts: 3,
    defects: ["Reasoning call failed: overloaded"],
    reason: "Reasoning call failed: overloaded",
    createdAt: "2026-01-01T00:00:00.000Z",
    payload: null,
  };
}

let tempDir = "";

const backends: Array<[string, () => SessionStore]> = [
  ["MemorySessionStore", () => new MemorySessionStore()],
  ["FileSessionStore", () => new FileSessionStore(tempDir)],
];

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "market-intel-store-"));
});

afterEach(async () => {
  vi.useRealTimers();
  await fs.rm(tempDir, { recursive: true, force: true });
});

describe.each(backends)("%s", (_name, createStore) => {
  it("creates pending sessions and records evidence and artifacts", async () => {
    const store = createStore();
    const session = await store.create({ query: "home battery storage", domain: "energy" });

    expect(session.status).toBe("pending");
    expect(session.workflowState).toBe("created");

    await store.appendEvidence(session.id, [evidenceFor(session.id, "e1"), evidenceFor("other", "e2")]);
    await store.appendArtifact(session.id, failedReader(session.id));

    const loaded = await store.get(session.id);
    expect(loaded?.evidence.map((e) => e.id)).toEqual(["e1"]);
    expect(loaded?.artifacts).toHaveLength(1);
    expect(loaded?.artifacts[0]?.payload).toBeNull();
  });

  it("rejects an artifact from another session", async () => {
    const store = createStore();
    const session = await store.create({ query: "home battery storage", domain: "energy" });

    await expect(store.appendArtifact(session.id, failedReader("someone-else"))).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it("refuses writes once a session is complete or failed", async () => {
    const store = createStore();
    const session = await store.create({ query: "home battery storage", domain: "energy" });

    await store.updateStatus(session.id, { status: "failed", workflowState: "failed", reason: "No evidence" });

    await expect(
      store.updateStatus(session.id, { status: "running", workflowState: "analyzing" })
    ).rejects.toBeInstanceOf(SessionImmutableError);
    await expect(store.appendEvidence(session.id, [])).rejects.toBeInstanceOf(SessionImmutableError);

    const loaded = await store.get(session.id);
    expect(loaded?.reason).toBe("No evidence");
  });

  it("still accepts writes to a partial session", async () => {
    const store = createStore();
    const session = await store.create({ query: "home battery storage", domain: "energy" });

    await store.updateStatus(session.id, { status: "partial", workflowState: "partially_complete" });
    const updated = await store.updateStatus(session.id, {
      status: "partial",
      workflowState: "partially_complete",
      reason: "Report degraded",
    });

    expect(updated.reason).toBe("Report degraded");
  });

  it("throws SessionNotFoundError for unknown sessions", async () => {
    const store = createStore();

    await expect(
      store.updateStatus("missing", { status: "running", workflowState: "collecting" })
    ).rejects.toBeInstanceOf(SessionNotFoundError);
    expect(await store.get("missing")).toBeNull();
  });

  it("lists sessions newest first with filters", async () => {
    vi.useFakeTimers({ toFake: ["Date"] });
    const store = createStore();

    vi.setSystemTime(new Date("2026-03-01T00:00:00.000Z"));
    const first = await store.create({ query: "home battery storage", domain: "energy" });
    vi.setSystemTime(new Date("2026-03-02T00:00:00.000Z"));
    const second = await store.create({ query: "fleet telematics", domain: "Automotive" });
    vi.setSystemTime(new Date("2026-03-03T00:00:00.000Z"));
    const third = await store.create({ query: "heat pumps", domain: "energy" });
    await store.updateStatus(third.id, { status: "complete", workflowState: "complete" });

    expect((await store.list()).map((s) => s.id)).toEqual([third.id, second.id, first.id]);
    expect((await store.list({ domain: "ENERGY" })).map((s) => s.id)).toEqual([third.id, first.id]);
    expect((await store.list({ status: "complete" })).map((s) => s.id)).toEqual([third.id]);
    expect((await store.list({ status: ["pending"] })).map((s) => s.id)).toEqual([second.id, first.id]);
    expect(
      (await store.list({ from: "2026-03-02T00:00:00.000Z", to: "2026-03-02T23:59:59.999Z" })).map((s) => s.id)
    ).toEqual([second.id]);
  });

  it("cascades deletion to conversation turns and delete hooks", async () => {
    const store = createStore();
    const session = await store.create({ query: "home battery storage", domain: "energy" });
    const deleted: string[] = [];
    store.onDelete((id) => {
      deleted.push(id);
    });

    await store.saveTurn(session.id, { role: "user", text: "Hi", timestamp: "2026-01-01T00:00:00.000Z" });

    expect(await store.delete(session.id)).toBe(true);
    expect(await store.get(session.id)).toBeNull();
    expect(await store.loadTurns(session.id)).toEqual([]);
    expect(deleted).toEqual([session.id]);

    expect(await store.delete(session.id)).toBe(false);
    expect(deleted).toEqual([session.id]);
  });

  it("loads the most recent turns oldest first", async () => {
    const store = createStore();
    for (const [i, text] of ["one", "two", "three"].entries()) {
      await store.saveTurn("global", {
        role: i % 2 === 0 ? "user" : "assistant",
        text,
        timestamp: `2026-01-01T00:00:0${i}.000Z`,
      });
    }

    expect((await store.loadTurns("global")).map((t) => t.text)).toEqual(["one", "two", "three"]);
    expect((await store.loadTurns("global", 2)).map((t) => t.text)).toEqual(["two", "three"]);
  });

  it("keeps writes within one session ordered under concurrency", async () => {
    const store = createStore();
    const session = await store.create({ query: "home battery storage", domain: "energy" });

    await Promise.all(
      ["e1", "e2", "e3", "e4"].map((id) => store.appendEvidence(session.id, [evidenceFor(session.id, id)]))
    );

    const loaded = await store.get(session.id);
    expect(loaded?.evidence.map((e) => e.id)).toEqual(["e1", "e2", "e3", "e4"]);
  });
});

describe("FileSessionStore", () => {
  it("persists sessions across instances", async () => {
    const session = await new FileSessionStore(tempDir).create({ query: "home battery storage", domain: "energy" });

    const reopened = await new FileSessionStore(tempDir).get(session.id);

    expect(reopened?.query).toBe("home battery storage");
  });

  it("skips unreadable session files when listing", async () => {
    const store = new FileSessionStore(tempDir);
    const session = await store.create({ query: "home battery storage", domain: "energy" });
    await fs.writeFile(path.join(tempDir, "sessions", "broken.json"), "{ not json", "utf-8");

    expect((await store.list()).map((s) => s.id)).toEqual([session.id]);
  });
});
