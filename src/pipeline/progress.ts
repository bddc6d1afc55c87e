/**
 * Progress Events
 *
 * Each session gets an append-only event log. Emitting never waits on
 * observers; every iteration of the log replays from the first event and
 * then follows live events until the workflow closes the log.
 */

import type { StageName } from "../schemas/artifacts.js";
import type { SessionStatus, WorkflowState } from "../schemas/session.js";

interface EventBase {
  sessionId: string;
  at: string;
}

export type ProgressEvent =
  | (EventBase & { type: "stage-entered"; state: WorkflowState; stage?: StageName })
  | (EventBase & { type: "stage-completed"; state: WorkflowState; stage: StageName; artifactId: string })
  | (EventBase & {
      type: "stage-degraded";
      state: WorkflowState;
      stage: StageName;
      artifactId: string;
      defects: string[];
    })
  | (EventBase & { type: "stage-failed"; state: WorkflowState; stage?: StageName; reason: string })
  | (EventBase & {
      type: "workflow-completed";
      state: WorkflowState;
      status: SessionStatus;
      reason?: string;
    });

/** Distributes Omit over the event union so each variant keeps its fields */
export type ProgressEventInput = ProgressEvent extends infer E
  ? E extends ProgressEvent
    ? Omit<E, "sessionId" | "at">
    : never
  : never;

export class ProgressLog implements AsyncIterable<ProgressEvent> {
  private readonly events: ProgressEvent[] = [];
  private waiters: Array<() => void> = [];
  private closed = false;

  constructor(readonly sessionId: string) {}

  emit(event: ProgressEventInput): ProgressEvent {
    const full: ProgressEvent = { ...event, sessionId: this.sessionId, at: new Date().toISOString() };
    this.events.push(full);
    this.wake();
    return full;
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  [Symbol.asyncIterator](): AsyncIterator<ProgressEvent> {
    return this.follow();
  }

  private async *follow(): AsyncGenerator<ProgressEvent> {
    let cursor = 0;
    while (true) {
      const next = this.events[cursor];
      if (next !== undefined) {
        cursor++;
        yield next;
        continue;
      }
      if (this.closed) return;
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve();
  }
}

// ============================================================
// STATUS SNAPSHOT
// ============================================================

const PROGRESS: Record<WorkflowState, number> = {
  created: 0,
  collecting: 10,
  analyzing: 35,
  strategizing: 65,
  formatting: 85,
  complete: 100,
  partially_complete: 100,
  failed: 100,
};

const STEP_LABELS: Record<WorkflowState, string> = {
  created: "Queued",
  collecting: "Data Collection",
  analyzing: "Data Analysis",
  strategizing: "Strategic Planning",
  formatting: "Report Generation",
  complete: "Completed",
  partially_complete: "Completed with degradation",
  failed: "Failed",
};

export interface WorkflowStatus {
  sessionId: string;
  state: WorkflowState;
  step: string;
  /** 0-100; a failed run keeps the progress of the state it failed in */
  progress: number;
  failedIn?: WorkflowState;
  startedAt: string;
  finishedAt?: string;
  durationMs: number;
}

export function progressFor(state: WorkflowState, failedIn?: WorkflowState): number {
  if (state === "failed" && failedIn !== undefined) {
    return PROGRESS[failedIn];
  }
  return PROGRESS[state];
}

export function stepLabel(state: WorkflowState): string {
  return STEP_LABELS[state];
}
