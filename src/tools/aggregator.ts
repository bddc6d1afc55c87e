/**
 * Data Source Aggregator
 * Fan-out/fan-in evidence collection across independent providers.
 *
 * COLLECTION FLOW:
 * ================
 * collect(sessionId, query, domain)
 *   ├─ suppressed providers → failed entry ("suppressed"), not called
 *   ├─ every other provider, concurrently:
 *   │   ├─ RETRY LOOP (maxRetries + 1 attempts, exponential backoff)
 *   │   │   └─ provider.fetch() bounded by its own timeout
 *   │   ├─ unrecoverable error → no retry, reported for suppression
 *   │   └─ nothing usable → failed entry with a reason code
 *   └─ zero usable entries → NoEvidenceAvailable
 *
 * Failed providers are always part of the result; nothing is dropped.
 */

import { randomUUID } from "crypto";
import { logger, type ChildLogger } from "../core/logger.js";
import {
  NoEvidenceAvailable,
  SessionCancelled,
  TimeoutError,
  UnrecoverableProviderError,
  errorMessage,
} from "../core/errors.js";
import { RetryExhaustedError, retryWithBackoff, throwIfAborted, withTimeout } from "../core/retry.js";
import type { Evidence, EvidenceDocument, EvidenceFailureCode } from "../schemas/evidence.js";
import type { EvidenceProvider } from "./providers/types.js";

export interface AggregatorOptions {
  /** Default per-provider timeout */
  timeoutMs: number;
  /** Per-provider timeout overrides, keyed by provider id */
  timeouts?: Partial<Record<string, number>>;
  maxRetries: number;
  backoffMs: number;
}

export interface CollectOptions {
  /** Restrict to these provider ids; defaults to every registered provider */
  enabled?: readonly string[];
  /** Providers disabled for this session after an unrecoverable failure */
  suppressed?: ReadonlySet<string>;
  signal?: AbortSignal;
}

export interface CollectionResult {
  /** One entry per provider considered, failed ones included */
  evidence: Evidence[];
  usable: Evidence[];
  /** Providers that failed unrecoverably and should be suppressed */
  unrecoverable: string[];
}

interface ProviderOutcome {
  evidence: Evidence;
  unrecoverable: boolean;
}

export class DataSourceAggregator {
  private readonly log = logger.child({ component: "aggregator" });

  constructor(
    private readonly providers: readonly EvidenceProvider[],
    private readonly options: AggregatorOptions
  ) {}

  /**
   * Collect evidence from every enabled provider.
   * Throws NoEvidenceAvailable when no provider produced usable evidence.
   */
  async collect(
    sessionId: string,
    query: string,
    domain: string,
    options: CollectOptions = {}
  ): Promise<CollectionResult> {
    const log = this.log.child({ sessionId });
    const selected = this.select(options.enabled);
    const startTime = Date.now();

    log.info("Collecting evidence", {
      providers: selected.map((p) => p.id),
      suppressed: [...(options.suppressed ?? [])],
    });

    const outcomes = await Promise.all(
      selected.map((provider) => {
        if (options.suppressed?.has(provider.id)) {
          return Promise.resolve<ProviderOutcome>({
            evidence: failedEntry(sessionId, provider, "suppressed", "Provider suppressed for this session", 0),
            unrecoverable: false,
          });
        }
        return this.fetchOne(sessionId, provider, query, domain, log, options.signal);
      })
    );

    throwIfAborted(options.signal);

    const evidence = outcomes.map((o) => o.evidence);
    const usable = evidence.filter((e) => e.ok);
    const unrecoverable = outcomes.filter((o) => o.unrecoverable).map((o) => o.evidence.providerId);

    log.metric("evidence_collection_ms", Date.now() - startTime, {
      usable: usable.length,
      failed: evidence.length - usable.length,
    });

    if (usable.length === 0) {
      const error = new NoEvidenceAvailable(
        evidence.flatMap((e) => (e.failure ? [{ providerId: e.providerId, failure: e.failure }] : [])),
        evidence
      );
      log.error("No usable evidence", error);
      throw error;
    }

    return { evidence, usable, unrecoverable };
  }

  /**
   * Failed entries for a collection that stopped before any provider reported
   */
  interrupted(sessionId: string, message: string, enabled?: readonly string[]): Evidence[] {
    return this.select(enabled).map((provider) => failedEntry(sessionId, provider, "interrupted", message, 0));
  }

  private select(enabled?: readonly string[]): EvidenceProvider[] {
    if (!enabled) return [...this.providers];
    const wanted = new Set(enabled);
    return this.providers.filter((p) => wanted.has(p.id));
  }

  private async fetchOne(
    sessionId: string,
    provider: EvidenceProvider,
    query: string,
    domain: string,
    parentLog: ChildLogger,
    signal?: AbortSignal
  ): Promise<ProviderOutcome> {
    const log = parentLog.child({ provider: provider.id });
    const timeoutMs = this.options.timeouts?.[provider.id] ?? this.options.timeoutMs;

    try {
      const { value, attempts } = await retryWithBackoff(
        () =>
          withTimeout(
            `provider:${provider.id}`,
            timeoutMs,
            (callSignal) => provider.fetch(query, domain, callSignal),
            signal
          ),
        {
          maxRetries: this.options.maxRetries,
          backoffMs: this.options.backoffMs,
          shouldRetry: (error) =>
            !(error instanceof UnrecoverableProviderError) && !(error instanceof SessionCancelled),
          onRetry: (error, attempt, delayMs) =>
            log.warn(`Provider fetch failed (attempt ${attempt}), retrying in ${delayMs}ms`, {
              error: errorMessage(error),
            }),
          signal,
        }
      );

      if (value.documents.length === 0) {
        log.warn("Provider returned no documents", { attempts });
        return {
          evidence: failedEntry(sessionId, provider, "empty", "Provider returned no documents", attempts),
          unrecoverable: false,
        };
      }

      log.info("Provider fetch succeeded", { documents: value.documents.length, attempts });
      return {
        evidence: {
          id: randomUUID(),
          sessionId,
          providerId: provider.id,
          kind: provider.kind,
          content: renderContent(value.documents),
          documents: value.documents,
          fetchedAt: new Date().toISOString(),
          reliability: clamp01(value.reliability),
          ok: true,
        },
        unrecoverable: false,
      };
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      const attempts = error instanceof RetryExhaustedError ? error.attempts : 0;

      if (cause instanceof SessionCancelled || signal?.aborted) {
        throw cause;
      }

      const code = failureCode(cause);
      log.warn("Provider failed", { code, attempts, error: errorMessage(cause) });

      return {
        evidence: failedEntry(sessionId, provider, code, errorMessage(cause), attempts),
        unrecoverable: code === "unrecoverable",
      };
    }
  }
}

function failureCode(error: unknown): EvidenceFailureCode {
  if (error instanceof TimeoutError) return "timeout";
  if (error instanceof UnrecoverableProviderError) return "unrecoverable";
  return "transient";
}

function failedEntry(
  sessionId: string,
  provider: EvidenceProvider,
  code: EvidenceFailureCode,
  message: string,
  attempts: number
): Evidence {
  return {
    id: randomUUID(),
    sessionId,
    providerId: provider.id,
    kind: provider.kind,
    content: "",
    documents: [],
    fetchedAt: new Date().toISOString(),
    reliability: 0,
    ok: false,
    failure: { code, message, attempts },
  };
}

function renderContent(documents: EvidenceDocument[]): string {
  return documents.map((d) => `${d.title} - ${d.snippet}`).join("\n\n");
}

function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
