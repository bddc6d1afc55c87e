import { describe, it, expect } from "vitest";
import { AssistantSession, type AssistantSessionOptions } from "../src/assistant/assistant-session.js";
import { ASSISTANT_SYSTEM_PROMPT } from "../src/agents/prompts.js";
import { StageTransportError, ValidationError } from "../src/core/errors.js";
import { ContextRetriever } from "../src/retrieval/context-retriever.js";
import { HashingEmbedder } from "../src/retrieval/embedder.js";
import type { ConversationTurn } from "../src/schemas/session.js";
import { MemorySessionStore } from "../src/store/memory.js";
import { GLOBAL_CONVERSATION } from "../src/store/types.js";
import { ScriptedReasoningClient, testConfig, type Scripted } from "./helpers.js";

const config = testConfig();

function turn(text: string, role: ConversationTurn["role"] = "user"): ConversationTurn {
  return { role, text, timestamp: "2026-01-01T00:00:00.000Z" };
}

function setup(answers: Scripted[] = ["An answer."], options: Partial<AssistantSessionOptions> = {}) {
  const client = new ScriptedReasoningClient({ assistant: answers });
  const retriever = new ContextRetriever({
    embedder: new HashingEmbedder(256),
    chunkSize: 1000,
    chunkOverlap: 200,
    k: 5,
    threshold: 0,
    embedTimeoutMs: 1000,
  });
  const store = new MemorySessionStore();
  const assistant = new AssistantSession({
    client,
    retriever,
    store,
    historyCap: 20,
    promptHistoryTurns: 10,
    profile: config.profiles.assistant,
    ...options,
  });
  return { client, retriever, store, assistant };
}

describe("AssistantSession", () => {
  it("caps history and evicts the oldest turns first", () => {
    const { assistant } = setup([], { historyCap: 3 });

    for (const text of ["one", "two", "three", "four", "five"]) {
      assistant.append(turn(text));
    }

    expect(assistant.getHistory().map((t) => t.text)).toEqual(["three", "four", "five"]);
    expect(assistant.getHistory(2).map((t) => t.text)).toEqual(["four", "five"]);
    expect(assistant.getHistory(0)).toEqual([]);
  });

  it("clears the in-memory history", () => {
    const { assistant } = setup();
    assistant.append(turn("one"));

    assistant.clear();

    expect(assistant.getHistory()).toEqual([]);
  });

  it("answers from general knowledge when no context exists", async () => {
    const { client, store, assistant } = setup(["  Storage margins are thin.  "]);

    const result = await assistant.ask("How profitable is storage?");

    expect(result.answer).toBe("Storage margins are thin.");
    expect(result.context).toEqual([]);

    const [call] = client.calls;
    expect(call?.systemPrompt).toBe(ASSISTANT_SYSTEM_PROMPT);
    expect(call?.profile.model).toBe("haiku");
    expect(call?.prompt).toContain("No prior analysis context is available; answer from general knowledge.");
    expect(call?.prompt).toContain("No previous conversation.");
    expect(call?.prompt).toContain("## Question\nHow profitable is storage?");

    expect(assistant.getHistory().map((t) => [t.role, t.text])).toEqual([
      ["user", "How profitable is storage?"],
      ["assistant", "Storage margins are thin."],
    ]);
    expect((await store.loadTurns(GLOBAL_CONVERSATION)).map((t) => t.text)).toEqual([
      "How profitable is storage?",
      "Storage margins are thin.",
    ]);
  });

  it("includes earlier turns in the next prompt", async () => {
    const { client, assistant } = setup(["First answer.", "Second answer."]);

    await assistant.ask("First question?");
    await assistant.ask("Second question?");

    expect(client.calls[1]?.prompt).toContain("User: First question?\nAssistant: First answer.");
  });

  it("limits prompt history to the configured number of turns", async () => {
    const { client, assistant } = setup(["Answer."], { promptHistoryTurns: 1 });
    assistant.append(turn("older question"));
    assistant.append(turn("older answer", "assistant"));

    await assistant.ask("Next?");

    expect(client.calls[0]?.prompt).toContain("## Conversation So Far\nAssistant: older answer\n");
    expect(client.calls[0]?.prompt).not.toContain("older question");
  });

  it("retrieves context from the bound session only", async () => {
    const { client, retriever, store, assistant } = setup(["Rebates help."], { sessionId: "s1" });
    await retriever.indexDocuments("s1", [{ artifactId: "a", text: "heat pump rebates expand" }]);
    await retriever.indexDocuments("s2", [{ artifactId: "a", text: "heat pump rebates shrink" }]);

    const result = await assistant.ask("heat pump rebates");

    expect(result.context.map((f) => f.sessionId)).toEqual(["s1"]);
    expect(client.calls[0]?.prompt).toContain("[1] heat pump rebates expand");
    expect(await store.loadTurns("s1")).toHaveLength(2);
  });

  it("rejects an empty question without calling the model", async () => {
    const { client, assistant } = setup();

    await expect(assistant.ask("   ")).rejects.toBeInstanceOf(ValidationError);
    expect(client.calls).toHaveLength(0);
  });

  it("keeps history unchanged when the call fails", async () => {
    const { client, assistant } = setup([new StageTransportError("overloaded")]);

    await expect(assistant.ask("Anything?")).rejects.toThrow("overloaded");

    // assistant profile allows one retry
    expect(client.calls).toHaveLength(2);
    expect(assistant.getHistory()).toEqual([]);
  });

  it("restores the most recent persisted turns", async () => {
    const { store, assistant } = setup([], { historyCap: 2 });
    for (const text of ["one", "two", "three"]) {
      await store.saveTurn(GLOBAL_CONVERSATION, turn(text));
    }

    expect(await assistant.restore()).toBe(2);
    expect(assistant.getHistory().map((t) => t.text)).toEqual(["two", "three"]);
  });
});
