/**
 * Agent Exports
 * Stage strategies, the executor and the prompts they share
 */

// Executor
export {
  StageExecutor,
  createStageStrategies,
  type StageExecutorOptions,
  type StageExecution,
} from "./stage-executor.js";

// Strategies
export { readerStrategy } from "./reader.js";
export { analystStrategy } from "./analyst.js";
export { strategistStrategy } from "./strategist.js";
export { formatterStrategy } from "./formatter.js";
export {
  requireUpstream,
  optionalUpstream,
  type StageContext,
  type StageStrategy,
  type StageStrategies,
} from "./types.js";

// Report rendering
export { buildDashboard, templatedReport, renderReportMarkdown, type TemplateInput } from "./report.js";

// Output handling
export { extractJson, type JsonExtraction } from "./json.js";

// Prompts
export {
  getReaderPrompt,
  getAnalystPrompt,
  getStrategistPrompt,
  getFormatterPrompt,
  getCorrectivePrompt,
  getAssistantPrompt,
} from "./prompts.js";
