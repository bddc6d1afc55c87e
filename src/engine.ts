/**
 * Engine assembly
 * Wires config into the store, providers, executor, retriever and orchestrator.
 */

import type { Config } from "./core/config.js";
import { createClaudeReasoningClient, type ReasoningClient } from "./core/reasoning.js";
import { StageExecutor } from "./agents/stage-executor.js";
import { AssistantSession } from "./assistant/assistant-session.js";
import { WorkflowOrchestrator } from "./pipeline/workflow-orchestrator.js";
import { createContextRetriever, type ContextRetriever, type Embedder } from "./retrieval/index.js";
import { createSessionStore, type SessionStore } from "./store/index.js";
import { DataSourceAggregator } from "./tools/aggregator.js";
import { createProviders, type EvidenceProvider } from "./tools/providers/index.js";

export interface EngineOverrides {
  client?: ReasoningClient;
  providers?: EvidenceProvider[];
  store?: SessionStore;
  embedder?: Embedder;
}

export interface Engine {
  config: Config;
  client: ReasoningClient;
  store: SessionStore;
  retriever: ContextRetriever;
  aggregator: DataSourceAggregator;
  executor: StageExecutor;
  orchestrator: WorkflowOrchestrator;
  /** Assistant bound to one session, or spanning all of them */
  assistant(sessionId?: string): AssistantSession;
}

export function createEngine(config: Config, overrides: EngineOverrides = {}): Engine {
  const client = overrides.client ?? createClaudeReasoningClient();
  const store = overrides.store ?? createSessionStore(config);
  const retriever = createContextRetriever(config, overrides.embedder);

  // fragments go with their session
  store.onDelete(async (sessionId) => {
    await retriever.deleteSession(sessionId);
  });

  const aggregator = new DataSourceAggregator(overrides.providers ?? createProviders(config), {
    timeoutMs: config.providers.timeoutMs,
    timeouts: config.providers.timeouts,
    maxRetries: config.providers.maxRetries,
    backoffMs: config.providers.backoffMs,
  });

  const executor = new StageExecutor(client, {
    profiles: config.profiles,
    schemaRetries: config.stages.schemaRetries,
    allowFallback: config.stages.formatterTemplateFallback,
  });

  const orchestrator = new WorkflowOrchestrator({
    aggregator,
    executor,
    store,
    retriever,
    allowDegraded: config.stages.allowDegraded,
    retainedRuns: config.stages.retainedRuns,
  });

  return {
    config,
    client,
    store,
    retriever,
    aggregator,
    executor,
    orchestrator,
    assistant: (sessionId) =>
      new AssistantSession({
        client,
        retriever,
        store,
        sessionId,
        historyCap: config.assistant.historyCap,
        promptHistoryTurns: config.assistant.promptHistoryTurns,
        profile: config.profiles.assistant,
        k: config.retrieval.k,
        threshold: config.retrieval.threshold,
      }),
  };
}
