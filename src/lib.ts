/**
 * Library entry point
 */

export * from "./core/errors.js";
export { loadConfig, getConfig, resetConfig, type Config, type StageProfile, type ProfileName } from "./core/config.js";
export { logger, ChildLogger, type LogLevel, type LogFormat, type LogEntry, type LogHandler } from "./core/logger.js";
export { retryWithBackoff, withTimeout, RetryExhaustedError } from "./core/retry.js";
export {
  ClaudeReasoningClient,
  createClaudeReasoningClient,
  type ReasoningClient,
  type ReasoningRequest,
  type ReasoningResponse,
} from "./core/reasoning.js";

export * from "./schemas/index.js";
export * from "./agents/index.js";
export * from "./store/index.js";
export * from "./retrieval/index.js";

export { DataSourceAggregator, type AggregatorOptions, type CollectOptions, type CollectionResult } from "./tools/aggregator.js";
export { createProviders, CachedProvider, FirecrawlProvider, NewsDataProvider, TavilyProvider } from "./tools/providers/index.js";
export type { EvidenceProvider, ProviderResult } from "./tools/providers/index.js";

export { WorkflowOrchestrator, type WorkflowOrchestratorOptions, type WorkflowHandle } from "./pipeline/workflow-orchestrator.js";
export { ProgressLog, type ProgressEvent, type WorkflowStatus } from "./pipeline/progress.js";
export { AssistantSession, type AssistantSessionOptions, type AssistantAnswer } from "./assistant/assistant-session.js";
export { createEngine, type Engine, type EngineOverrides } from "./engine.js";
