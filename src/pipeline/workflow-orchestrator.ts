/**
 * Workflow Orchestrator
 * Drives one analysis session through the stage state machine.
 *
 * STATES:
 * =======
 * created
 *   └─ collecting    - providers in parallel, then the Reader
 *       └─ analyzing     - Analyst over the reader artifact
 *           └─ strategizing  - Strategist over the analyst artifact
 *               └─ formatting    - Formatter assembles the report
 *                   ├─ complete            (succeeded)
 *                   ├─ partially_complete  (degraded, payload usable)
 *                   └─ failed
 *
 * Any state may move to failed: no evidence, a failed stage, a degraded
 * stage whose degradation is disabled, or cancellation. A failed session
 * always carries failed evidence or a failed artifact: an interrupted stage
 * is recorded as a failed artifact, an interrupted collection as failed
 * evidence entries. The orchestrator is the only writer of session status;
 * every artifact produced before a failure is kept on the session.
 */

import type { Config, ProviderId } from "../core/config.js";
import {
  NoEvidenceAvailable,
  SessionCancelled,
  SessionNotFoundError,
  ValidationError,
  errorMessage,
} from "../core/errors.js";
import { logger, type ChildLogger } from "../core/logger.js";
import { throwIfAborted } from "../core/retry.js";
import type { StageExecutor } from "../agents/stage-executor.js";
import type { StageContext } from "../agents/types.js";
import { findArtifact, type StageArtifact, type StageName } from "../schemas/artifacts.js";
import type { Evidence } from "../schemas/evidence.js";
import {
  AnalysisRequestSchema,
  type AnalysisRequest,
  type AnalysisSession,
  type SessionStatus,
  type WorkflowState,
} from "../schemas/session.js";
import type { SessionStore } from "../store/types.js";
import type { ContextRetriever } from "../retrieval/context-retriever.js";
import type { DataSourceAggregator } from "../tools/aggregator.js";
import { ProgressLog, progressFor, stepLabel, type ProgressEvent, type WorkflowStatus } from "./progress.js";

export interface WorkflowOrchestratorOptions {
  aggregator: DataSourceAggregator;
  executor: StageExecutor;
  store: SessionStore;
  /** Completed sessions are indexed here for the assistant */
  retriever?: ContextRetriever;
  allowDegraded: Config["stages"]["allowDegraded"];
  enabledProviders?: readonly ProviderId[];
  /** Finished runs kept for status() and events(); oldest evicted first */
  retainedRuns?: number;
}

export interface WorkflowHandle {
  sessionId: string;
  /** Resolves with the final session; never rejects */
  completion: Promise<AnalysisSession>;
}

interface Outcome {
  state: Extract<WorkflowState, "complete" | "partially_complete" | "failed">;
  reason?: string;
}

/** Per-session runtime bookkeeping, kept for status() and events() */
interface Run {
  controller: AbortController;
  log: ProgressLog;
  state: WorkflowState;
  failedIn?: WorkflowState;
  startedAt: number;
  finishedAt?: number;
}

/** What a run has produced so far */
interface Produced {
  /** null until collection finishes */
  evidence: Evidence[] | null;
  artifacts: StageArtifact[];
  /** Stage entered but not yet recorded */
  activeStage?: StageName;
}

const STAGE_PLAN: ReadonlyArray<{ stage: StageName; state: WorkflowState }> = [
  { stage: "reader", state: "collecting" },
  { stage: "analyst", state: "analyzing" },
  { stage: "strategist", state: "strategizing" },
  { stage: "formatter", state: "formatting" },
];

const SESSION_STATUS: Record<Outcome["state"], SessionStatus> = {
  complete: "complete",
  partially_complete: "partial",
  failed: "failed",
};

const DEFAULT_RETAINED_RUNS = 100;

export class WorkflowOrchestrator {
  private readonly log = logger.child({ component: "orchestrator" });
  private readonly runs = new Map<string, Run>();
  /** Finished run ids, oldest first */
  private readonly finished = new Set<string>();
  private readonly retainedRuns: number;

  constructor(private readonly options: WorkflowOrchestratorOptions) {
    this.retainedRuns = options.retainedRuns ?? DEFAULT_RETAINED_RUNS;
    options.store.onDelete((sessionId) => {
      const run = this.runs.get(sessionId);
      if (run && run.finishedAt === undefined) {
        run.controller.abort(new SessionCancelled(sessionId, "Session deleted"));
      }
      this.runs.delete(sessionId);
      this.finished.delete(sessionId);
    });
  }

  /**
   * Validate the request, create the session and start it in the background.
   * Throws ValidationError before any session exists.
   */
  async start(request: AnalysisRequest): Promise<WorkflowHandle> {
    const parsed = AnalysisRequestSchema.safeParse(request);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(issue?.message ?? "Invalid analysis request", {
        field: issue?.path.join("."),
      });
    }

    const session = await this.options.store.create(parsed.data);
    const run: Run = {
      controller: new AbortController(),
      log: new ProgressLog(session.id),
      state: "created",
      startedAt: Date.now(),
    };
    this.runs.set(session.id, run);

    return { sessionId: session.id, completion: this.execute(session, run) };
  }

  /**
   * Start and wait for the final session
   */
  async run(request: AnalysisRequest): Promise<AnalysisSession> {
    const handle = await this.start(request);
    return handle.completion;
  }

  /**
   * Request cancellation. Returns false when the session is not running here.
   */
  cancel(sessionId: string, reason = "Cancelled by user"): boolean {
    const run = this.runs.get(sessionId);
    if (!run || run.finishedAt !== undefined) return false;

    this.log.warn("Cancelling session", { sessionId, reason });
    run.controller.abort(new SessionCancelled(sessionId, reason));
    return true;
  }

  /**
   * Progress events of a session started by this orchestrator. Each
   * iteration replays from the first event and ends after workflow-completed.
   */
  events(sessionId: string): AsyncIterable<ProgressEvent> {
    const run = this.runs.get(sessionId);
    if (!run) throw new SessionNotFoundError(sessionId);
    return run.log;
  }

  status(sessionId: string): WorkflowStatus | null {
    const run = this.runs.get(sessionId);
    if (!run) return null;

    const end = run.finishedAt ?? Date.now();
    return {
      sessionId,
      state: run.state,
      step: stepLabel(run.state),
      progress: progressFor(run.state, run.failedIn),
      failedIn: run.failedIn,
      startedAt: new Date(run.startedAt).toISOString(),
      finishedAt: run.finishedAt !== undefined ? new Date(run.finishedAt).toISOString() : undefined,
      durationMs: end - run.startedAt,
    };
  }

  // ============================================================
  // STATE MACHINE
  // ============================================================

  private async execute(session: AnalysisSession, run: Run): Promise<AnalysisSession> {
    const log = this.log.child({ sessionId: session.id });
    const produced: Produced = { evidence: null, artifacts: [] };
    let outcome: Outcome;

    log.info("Workflow started", { query: session.query, domain: session.domain });

    try {
      outcome = await this.advance(session, run, produced, log);
    } catch (error) {
      const reason = this.failureReason(error);
      outcome = { state: "failed", reason };
      const stage = produced.activeStage;
      await this.recordInterruption(session, produced, error, reason, log);
      run.log.emit({ type: "stage-failed", state: run.state, stage, reason });
      if (error instanceof SessionCancelled) {
        log.warn("Workflow cancelled", { state: run.state, stage, reason: error.message });
      } else {
        log.error("Workflow failed", error, { state: run.state, stage });
      }
    }

    return this.finish(session, run, produced, outcome, log);
  }

  private async advance(
    session: AnalysisSession,
    run: Run,
    produced: Produced,
    log: ChildLogger
  ): Promise<Outcome> {
    const signal = run.controller.signal;

    await this.enter(session.id, run, "collecting");
    produced.evidence = await this.collect(session, signal, log);

    let degradedUpstream: StageName[] = [];

    for (const { stage, state } of STAGE_PLAN) {
      produced.activeStage = stage;
      await this.enter(session.id, run, state, stage);

      const execution = await this.options.executor.execute(stage, this.context(session, produced), signal);
      const artifact =
        execution.artifact.status === "degraded" && !this.options.allowDegraded[stage]
          ? rejectDegraded(execution.artifact)
          : execution.artifact;
      produced.artifacts.push(artifact);
      await this.options.store.appendArtifact(session.id, artifact);
      produced.activeStage = undefined;

      if (artifact.status === "failed") {
        const reason = `${stage} stage failed: ${artifact.reason ?? "no usable output"}`;
        run.log.emit({ type: "stage-failed", state, stage, reason });
        return { state: "failed", reason };
      }

      if (artifact.status === "degraded") {
        run.log.emit({
          type: "stage-degraded",
          state,
          stage,
          artifactId: artifact.id,
          defects: artifact.defects,
        });
        log.warn("Stage degraded", { stage, defects: artifact.defects });
        degradedUpstream = [...degradedUpstream, stage];
      } else {
        run.log.emit({ type: "stage-completed", state, stage, artifactId: artifact.id });
      }

      if (artifact.stage === "formatter") {
        if (artifact.payload !== null) {
          await this.options.store.setReport(session.id, artifact.payload);
        }
        return artifact.status === "succeeded"
          ? {
              state: "complete",
              reason:
                degradedUpstream.length > 0
                  ? `Degraded upstream stages: ${degradedUpstream.join(", ")}`
                  : undefined,
            }
          : { state: "partially_complete", reason: artifact.reason ?? "Report degraded" };
      }
    }

    return { state: "failed", reason: "Workflow ended without a report" };
  }

  private context(session: AnalysisSession, produced: Produced): StageContext {
    return {
      sessionId: session.id,
      query: session.query,
      domain: session.domain,
      question: session.question,
      evidence: produced.evidence ?? [],
      artifacts: produced.artifacts,
    };
  }

  /**
   * Gather evidence and persist every entry, failed ones included
   */
  private async collect(session: AnalysisSession, signal: AbortSignal, log: ChildLogger): Promise<Evidence[]> {
    try {
      const result = await this.options.aggregator.collect(session.id, session.query, session.domain, {
        enabled: this.options.enabledProviders,
        signal,
      });
      if (result.unrecoverable.length > 0) {
        log.warn("Providers failed unrecoverably", { providers: result.unrecoverable });
      }
      await this.options.store.appendEvidence(session.id, result.evidence);
      return result.evidence;
    } catch (error) {
      if (error instanceof NoEvidenceAvailable) {
        await this.options.store.appendEvidence(session.id, error.evidence);
      }
      throw error;
    }
  }

  /**
   * Record the step that was in flight when the run stopped as failed
   */
  private async recordInterruption(
    session: AnalysisSession,
    produced: Produced,
    error: unknown,
    reason: string,
    log: ChildLogger
  ): Promise<void> {
    // the aggregator already reported every provider as failed
    if (error instanceof NoEvidenceAvailable) return;

    try {
      if (produced.evidence === null) {
        produced.evidence = this.options.aggregator.interrupted(session.id, reason, this.options.enabledProviders);
        await this.options.store.appendEvidence(session.id, produced.evidence);
      } else if (produced.activeStage) {
        const artifact = this.options.executor.abandon(produced.activeStage, this.context(session, produced), reason);
        produced.artifacts.push(artifact);
        produced.activeStage = undefined;
        await this.options.store.appendArtifact(session.id, artifact);
      }
    } catch (recordError) {
      log.error("Recording the interrupted step failed", recordError);
    }
  }

  private async enter(sessionId: string, run: Run, state: WorkflowState, stage?: StageName): Promise<void> {
    throwIfAborted(run.controller.signal);
    if (run.state !== state) {
      run.state = state;
      await this.options.store.updateStatus(sessionId, { status: "running", workflowState: state });
    }
    run.log.emit({ type: "stage-entered", state, stage });
  }

  private async finish(
    session: AnalysisSession,
    run: Run,
    produced: Produced,
    outcome: Outcome,
    log: ChildLogger
  ): Promise<AnalysisSession> {
    if (outcome.state === "failed") {
      run.failedIn = run.state;
    }
    run.state = outcome.state;
    run.finishedAt = Date.now();

    const status = SESSION_STATUS[outcome.state];

    try {
      const final = await this.persist(session, produced, outcome, status, log);
      log.info("Workflow finished", { status, reason: outcome.reason });
      log.metric("workflow_duration_ms", run.finishedAt - run.startedAt, { status });
      return final;
    } finally {
      run.log.emit({ type: "workflow-completed", state: outcome.state, status, reason: outcome.reason });
      run.log.close();
      this.retire(session.id);
    }
  }

  /**
   * Write the outcome and index the artifacts. A session deleted mid-run
   * resolves with what the run produced.
   */
  private async persist(
    session: AnalysisSession,
    produced: Produced,
    outcome: Outcome,
    status: SessionStatus,
    log: ChildLogger
  ): Promise<AnalysisSession> {
    let final: AnalysisSession;
    try {
      final = await this.options.store.updateStatus(session.id, {
        status,
        workflowState: outcome.state,
        reason: outcome.reason,
      });
    } catch (error) {
      log.error("Persisting the session outcome failed", error);
      return {
        ...session,
        status,
        workflowState: outcome.state,
        reason: outcome.reason,
        evidence: produced.evidence ?? [],
        artifacts: [...produced.artifacts],
        report: findArtifact(produced.artifacts, "formatter")?.payload ?? null,
        updatedAt: new Date().toISOString(),
      };
    }

    if (this.options.retriever && produced.artifacts.some((a) => a.status !== "failed")) {
      await this.index(final, produced.artifacts, log);
    }
    return final;
  }

  private async index(session: AnalysisSession, artifacts: readonly StageArtifact[], log: ChildLogger): Promise<void> {
    if (!this.options.retriever) return;
    try {
      await this.options.retriever.index(session.id, artifacts, { query: session.query, domain: session.domain });
    } catch (error) {
      // the session outcome stands; the assistant just lacks this context
      log.error("Indexing session failed", error);
    }
  }

  /**
   * Keep at most `retainedRuns` finished runs
   */
  private retire(sessionId: string): void {
    if (!this.runs.has(sessionId)) return;
    this.finished.add(sessionId);
    for (const oldest of this.finished) {
      if (this.finished.size <= this.retainedRuns) break;
      this.finished.delete(oldest);
      this.runs.delete(oldest);
    }
  }

  private failureReason(error: unknown): string {
    if (error instanceof SessionCancelled) return `Cancelled: ${error.message}`;
    if (error instanceof NoEvidenceAvailable) return error.message;
    if (error instanceof ValidationError) return `Stage input rejected: ${error.message}`;
    return errorMessage(error);
  }
}

function rejectDegraded(artifact: StageArtifact): StageArtifact {
  return {
    ...artifact,
    status: "failed",
    payload: null,
    reason: `Degradation disabled: ${artifact.reason ?? "output degraded"}`,
  };
}
