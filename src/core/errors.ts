/**
 * Custom Error Types
 * Coded errors for the collection, stage and session layers. Retry decisions
 * are made from `retryable`, never from message matching alone.
 */

import type { Evidence, EvidenceFailure } from "../schemas/evidence.js";

/**
 * Base error class for all market-intel errors
 */
export class MarketIntelError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: unknown;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = "MarketIntelError";
    this.code = code;
    this.context = options?.context;
    this.retryable = options?.retryable ?? false;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      retryable: this.retryable,
      stack: this.stack,
    };
  }
}

export class ConfigError extends MarketIntelError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", { context, retryable: false });
    this.name = "ConfigError";
  }
}

/**
 * Validation errors (user input, stage input)
 */
export class ValidationError extends MarketIntelError {
  public readonly field?: string;

  constructor(
    message: string,
    options?: {
      field?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, "VALIDATION_ERROR", { context: options?.context, retryable: false });
    this.name = "ValidationError";
    this.field = options?.field;
  }
}

/**
 * A network-facing call exceeded its time budget
 */
export class TimeoutError extends MarketIntelError {
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, "TIMEOUT", {
      context: { operation, timeoutMs },
      retryable: true,
    });
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

// ============================================================
// PROVIDER ERRORS
// ============================================================

/**
 * Network/5xx failure from an evidence provider - retried
 */
export class TransientProviderError extends MarketIntelError {
  public readonly providerId: string;
  public readonly statusCode?: number;

  constructor(
    message: string,
    providerId: string,
    options?: { cause?: unknown; statusCode?: number }
  ) {
    super(message, "PROVIDER_TRANSIENT", {
      cause: options?.cause,
      context: { providerId, statusCode: options?.statusCode },
      retryable: true,
    });
    this.name = "TransientProviderError";
    this.providerId = providerId;
    this.statusCode = options?.statusCode;
  }
}

export type UnrecoverableReason = "credentials" | "quota" | "rejected";

/**
 * Invalid credentials, exhausted quota or a request the provider will never
 * accept - not retried, tagged `unrecoverable` on its Evidence entry
 */
export class UnrecoverableProviderError extends MarketIntelError {
  public readonly providerId: string;
  public readonly reason: UnrecoverableReason;

  constructor(
    message: string,
    providerId: string,
    reason: UnrecoverableReason,
    options?: { cause?: unknown; statusCode?: number }
  ) {
    super(message, "PROVIDER_UNRECOVERABLE", {
      cause: options?.cause,
      context: { providerId, reason, statusCode: options?.statusCode },
      retryable: false,
    });
    this.name = "UnrecoverableProviderError";
    this.providerId = providerId;
    this.reason = reason;
  }
}

/**
 * Every enabled provider failed; fatal to the collecting phase
 */
export class NoEvidenceAvailable extends MarketIntelError {
  public readonly failures: EvidenceFailureEntry[];
  /** The failed entries themselves, one per provider */
  public readonly evidence: Evidence[];

  constructor(failures: EvidenceFailureEntry[], evidence: Evidence[] = []) {
    const summary = failures.map((f) => `${f.providerId}: ${f.failure.code}`).join(", ");
    super(
      failures.length > 0
        ? `No evidence available from any provider (${summary})`
        : "No evidence providers enabled",
      "NO_EVIDENCE",
      { context: { failures: failures.length }, retryable: false }
    );
    this.name = "NoEvidenceAvailable";
    this.failures = failures;
    this.evidence = evidence;
  }
}

export interface EvidenceFailureEntry {
  providerId: string;
  failure: EvidenceFailure;
}

// ============================================================
// STAGE ERRORS
// ============================================================

/**
 * Stage output did not match its schema
 */
export class StageSchemaViolation extends MarketIntelError {
  public readonly stage: string;
  public readonly defects: string[];
  public readonly candidate: unknown;

  constructor(stage: string, defects: string[], candidate: unknown) {
    super(`${stage} output failed schema validation: ${defects.join("; ")}`, "STAGE_SCHEMA", {
      context: { stage, defects },
      retryable: false,
    });
    this.name = "StageSchemaViolation";
    this.stage = stage;
    this.defects = defects;
    this.candidate = candidate;
  }
}

/**
 * The underlying reasoning call itself failed
 */
export class StageTransportError extends MarketIntelError {
  public readonly stage?: string;

  constructor(message: string, options?: { stage?: string; cause?: unknown; retryable?: boolean }) {
    super(message, "STAGE_TRANSPORT", {
      cause: options?.cause,
      context: { stage: options?.stage },
      retryable: options?.retryable ?? true,
    });
    this.name = "StageTransportError";
    this.stage = options?.stage;
  }
}

export class RateLimited extends MarketIntelError {
  public readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number) {
    super(message, "RATE_LIMITED", { context: { retryAfterMs }, retryable: true });
    this.name = "RateLimited";
    this.retryAfterMs = retryAfterMs;
  }
}

// ============================================================
// SESSION ERRORS
// ============================================================

export class SessionCancelled extends MarketIntelError {
  public readonly sessionId: string;

  constructor(sessionId: string, reason = "Cancelled by user") {
    super(reason, "SESSION_CANCELLED", { context: { sessionId }, retryable: false });
    this.name = "SessionCancelled";
    this.sessionId = sessionId;
  }
}

export class SessionNotFoundError extends MarketIntelError {
  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, "SESSION_NOT_FOUND", { context: { sessionId } });
    this.name = "SessionNotFoundError";
  }
}

/**
 * Writes to a complete or failed session are rejected
 */
export class SessionImmutableError extends MarketIntelError {
  constructor(sessionId: string, status: string) {
    super(`Session ${sessionId} is ${status} and can no longer be modified`, "SESSION_IMMUTABLE", {
      context: { sessionId, status },
    });
    this.name = "SessionImmutableError";
  }
}

export function isMarketIntelError(error: unknown): error is MarketIntelError {
  return error instanceof MarketIntelError;
}

export function isRetryableError(error: unknown): boolean {
  if (isMarketIntelError(error)) {
    return error.retryable;
  }

  if (error instanceof Error) {
    if (error.name === "AbortError") return false;
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("fetch failed") ||
      message.includes("rate limit") ||
      message.includes("overloaded")
    );
  }

  return false;
}

export function wrapError(error: unknown, defaultMessage = "Unknown error"): MarketIntelError {
  if (isMarketIntelError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new MarketIntelError(error.message || defaultMessage, "UNKNOWN_ERROR", {
      cause: error,
    });
  }

  return new MarketIntelError(typeof error === "string" ? error : defaultMessage, "UNKNOWN_ERROR");
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
