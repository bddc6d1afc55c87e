#!/usr/bin/env node
/**
 * Market Intel CLI - Entry Point
 *
 * EXECUTION FLOW:
 * ===============
 * 1. Load environment variables from .env (dotenv/config)
 * 2. Parse CLI arguments (parseArgs)
 * 3. Validate configuration (getConfig)
 * 4. Branch based on command:
 *    - "analyze" → WorkflowOrchestrator.start() - full staged analysis
 *    - "ask"     → AssistantSession.ask() - follow-up over stored analyses
 *    - "history" / "show" / "delete" → SessionStore
 * 5. Display results to console
 *
 * USAGE:
 *   npm run analyze -- "electric vehicle charging" --domain automotive
 *   npm run ask -- "Which opportunity is most urgent?" --session <id>
 */

import "dotenv/config";

import { logger } from "./core/logger.js";
import { getConfig, type Config } from "./core/config.js";
import { errorMessage, isMarketIntelError } from "./core/errors.js";
import { renderReportMarkdown } from "./agents/report.js";
import { createEngine, type Engine } from "./engine.js";
import type { ProgressEvent } from "./pipeline/progress.js";
import { SessionStatusSchema, type AnalysisSession, type SessionFilter } from "./schemas/session.js";

type Command = "analyze" | "ask" | "history" | "show" | "delete" | "help";

const COMMANDS: readonly Command[] = ["analyze", "ask", "history", "show", "delete", "help"];

interface ParsedArgs {
  command: Command;
  positional: string;
  options: {
    domain?: string;
    question?: string;
    session?: string;
    status?: string;
    verbose: boolean;
  };
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

/**
 * Parse command line arguments
 */
function parseArgs(argv: string[] = process.argv.slice(2)): ParsedArgs {
  const result: ParsedArgs = {
    command: "help",
    positional: "",
    options: { verbose: false },
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";

    if (i === 0 && isCommand(arg)) {
      result.command = arg;
    } else if (arg === "--domain" || arg === "-d") {
      result.options.domain = argv[++i];
    } else if (arg === "--question" || arg === "-q") {
      result.options.question = argv[++i];
    } else if (arg === "--session" || arg === "-s") {
      result.options.session = argv[++i];
    } else if (arg === "--status") {
      result.options.status = argv[++i];
    } else if (arg === "--verbose" || arg === "-v") {
      result.options.verbose = true;
    } else if (!arg.startsWith("-") && !result.positional) {
      result.positional = arg;
    }
  }

  return result;
}

function printHelp(): void {
  console.log(`
Market Intel - staged market intelligence analysis

USAGE:
  npm run dev -- <command> [options]

COMMANDS:
  analyze <query>      Run the full analysis (requires --domain)
  ask <question>       Ask a follow-up question about stored analyses
  history              List stored analysis sessions, newest first
  show <id>            Print a session's report and stage outcomes
  delete <id>          Delete a session and its indexed context
  help                 Show this help message

OPTIONS:
  -d, --domain <name>     Market domain (analyze; filter for history)
  -q, --question <text>   Focus question for the analysis
  -s, --session <id>      Scope "ask" to one session
      --status <status>   Filter history: pending, running, partial, complete, failed
  -v, --verbose           Enable debug logging

EXAMPLES:
  npm run analyze -- "home battery storage" --domain energy
  npm run ask -- "What are the biggest risks?" --session 3f2c...
  npm run dev -- history --status complete
`);
}

// ============================================================
// COMMANDS
// ============================================================

function describeEvent(event: ProgressEvent): string {
  switch (event.type) {
    case "stage-entered":
      return event.stage ? `→ ${event.stage} (${event.state})` : `→ ${event.state}`;
    case "stage-completed":
      return `✓ ${event.stage}`;
    case "stage-degraded":
      return `~ ${event.stage} degraded: ${event.defects.slice(0, 3).join("; ")}`;
    case "stage-failed":
      return `✗ ${event.stage ?? event.state}: ${event.reason}`;
    case "workflow-completed":
      return `= ${event.status}${event.reason ? ` (${event.reason})` : ""}`;
  }
}

async function analyze(engine: Engine, args: ParsedArgs): Promise<number> {
  const handle = await engine.orchestrator.start({
    query: args.positional,
    domain: args.options.domain ?? "",
    question: args.options.question,
  });

  console.log(`\nSession: ${handle.sessionId}\n`);

  const progress = (async () => {
    for await (const event of engine.orchestrator.events(handle.sessionId)) {
      logger.info(describeEvent(event), { sessionId: event.sessionId });
    }
  })();

  const onInterrupt = (): void => {
    engine.orchestrator.cancel(handle.sessionId, "Interrupted");
  };
  process.once("SIGINT", onInterrupt);

  try {
    const [session] = await Promise.all([handle.completion, progress]);
    displaySession(session);
    return session.status === "failed" ? 1 : 0;
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

async function ask(engine: Engine, args: ParsedArgs): Promise<number> {
  const sessionId = args.options.session;

  // fragments are only persisted by the file store; others rebuild the index
  if (sessionId) {
    const session = await engine.store.get(sessionId);
    if (!session) {
      console.error(`Session not found: ${sessionId}`);
      return 1;
    }
    await engine.retriever.index(session.id, session.artifacts, session);
  } else if (engine.config.store.kind !== "file") {
    for (const summary of await engine.store.list({ status: ["complete", "partial"] })) {
      const session = await engine.store.get(summary.id);
      if (session) await engine.retriever.index(session.id, session.artifacts, session);
    }
  }

  const assistant = engine.assistant(sessionId);
  await assistant.restore();
  const { answer, context } = await assistant.ask(args.positional);

  console.log(`\n${answer}\n`);
  console.log(`(${context.length} context fragment${context.length === 1 ? "" : "s"} used)`);
  return 0;
}

async function history(engine: Engine, args: ParsedArgs): Promise<number> {
  const filter: SessionFilter = { domain: args.options.domain };
  if (args.options.status) {
    const status = SessionStatusSchema.safeParse(args.options.status);
    if (!status.success) {
      console.error(`Unknown status: ${args.options.status}`);
      return 1;
    }
    filter.status = status.data;
  }

  const sessions = await engine.store.list(filter);
  if (sessions.length === 0) {
    console.log("No sessions found.");
    return 0;
  }

  for (const s of sessions) {
    console.log(`${s.createdAt}  ${s.status.padEnd(8)}  ${s.id}`);
    console.log(`    ${s.domain}: ${s.query.slice(0, 70)}`);
    if (s.reason) console.log(`    ${s.reason}`);
  }
  return 0;
}

async function show(engine: Engine, id: string): Promise<number> {
  const session = await engine.store.get(id);
  if (!session) {
    console.error(`Session not found: ${id}`);
    return 1;
  }
  displaySession(session);
  if (session.report) {
    console.log("\n" + renderReportMarkdown(session.report));
  }
  return 0;
}

async function remove(engine: Engine, id: string): Promise<number> {
  const deleted = await engine.store.delete(id);
  console.log(deleted ? `Deleted ${id}` : `Session not found: ${id}`);
  return deleted ? 0 : 1;
}

function displaySession(session: AnalysisSession): void {
  console.log("\n" + "=".repeat(60));
  console.log("ANALYSIS SESSION");
  console.log("=".repeat(60));

  console.log(`\nSession: ${session.id}`);
  console.log(`Query:   ${session.query}`);
  console.log(`Domain:  ${session.domain}`);
  console.log(`Status:  ${session.status} (${session.workflowState})`);
  if (session.reason) console.log(`Reason:  ${session.reason}`);

  console.log("\n--- Evidence ---");
  for (const e of session.evidence) {
    console.log(
      e.ok
        ? `  ${e.providerId.padEnd(10)} ok      ${e.documents.length} documents`
        : `  ${e.providerId.padEnd(10)} failed  ${e.failure?.code ?? "unknown"}: ${e.failure?.message ?? ""}`
    );
  }

  console.log("\n--- Stages ---");
  for (const a of session.artifacts) {
    console.log(`  ${a.stage.padEnd(10)} ${a.status.padEnd(9)} attempts: ${a.attempts}`);
    for (const defect of a.defects.slice(0, 5)) {
      console.log(`      - ${defect}`);
    }
  }

  if (session.report) {
    const d = session.report.dashboard;
    console.log("\n--- Dashboard ---");
    console.log(`Trends:           ${d.totalTrends}`);
    console.log(`Opportunities:    ${d.totalOpportunities}`);
    console.log(`Recommendations:  ${d.totalRecommendations}`);
    console.log(`High priority:    ${d.highPriorityItems}`);
  }

  console.log("\n" + "=".repeat(60));
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

async function main(): Promise<number> {
  const args = parseArgs();

  if (args.command === "help") {
    printHelp();
    return 0;
  }

  let config: Config;
  try {
    config = getConfig();
  } catch (error) {
    console.error("Configuration error:", errorMessage(error));
    console.error("\nSee .env.example for the supported variables.");
    return 1;
  }

  logger.setFormat(config.defaults.logFormat);
  logger.setLevel(args.options.verbose ? "debug" : config.defaults.logLevel);

  const needsArgument = args.command !== "history";
  if (needsArgument && !args.positional) {
    printHelp();
    return 1;
  }

  const engine = createEngine(config);

  try {
    switch (args.command) {
      case "analyze":
        return await analyze(engine, args);
      case "ask":
        return await ask(engine, args);
      case "history":
        return await history(engine, args);
      case "show":
        return await show(engine, args.positional);
      case "delete":
        return await remove(engine, args.positional);
      default:
        printHelp();
        return 0;
    }
  } catch (error) {
    console.error(`\n${args.command} failed:`, errorMessage(error));
    if (args.options.verbose && error instanceof Error && error.stack) {
      console.error(error.stack);
    } else if (isMarketIntelError(error) && error.code === "VALIDATION_ERROR") {
      console.error("Run with 'help' for usage.");
    }
    return 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
