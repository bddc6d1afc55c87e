/**
 * Provider HTTP helper
 * JSON request with zod validation and status-code classification
 */

import type { z } from "zod";
import {
  TransientProviderError,
  UnrecoverableProviderError,
  isMarketIntelError,
} from "../../core/errors.js";
import { logger } from "../../core/logger.js";

export interface JsonRequest {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: unknown;
  signal: AbortSignal;
}

/**
 * Map a non-2xx status onto the provider error taxonomy
 */
export function classifyStatus(
  providerId: string,
  status: number,
  body: string
): TransientProviderError | UnrecoverableProviderError {
  const detail = body.slice(0, 200);
  const lower = body.toLowerCase();

  if (status === 401 || status === 403) {
    return new UnrecoverableProviderError(
      `${providerId} rejected credentials (${status})`,
      providerId,
      "credentials",
      { statusCode: status }
    );
  }

  if (status === 402 || (status === 429 && (lower.includes("quota") || lower.includes("credits")))) {
    return new UnrecoverableProviderError(
      `${providerId} quota exhausted (${status})`,
      providerId,
      "quota",
      { statusCode: status }
    );
  }

  if (status === 429 || status === 408 || status >= 500) {
    return new TransientProviderError(`${providerId} error ${status}: ${detail}`, providerId, {
      statusCode: status,
    });
  }

  return new UnrecoverableProviderError(
    `${providerId} rejected request (${status}): ${detail}`,
    providerId,
    "rejected",
    { statusCode: status }
  );
}

export async function requestJson<T>(
  providerId: string,
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  request: JsonRequest
): Promise<T> {
  logger.debug("Provider request", { provider: providerId, url: redact(url) });

  let response: Response;
  try {
    response = await fetch(url, {
      method: request.method ?? "GET",
      headers: {
        Accept: "application/json",
        ...(request.body !== undefined ? { "Content-Type": "application/json" } : {}),
        ...request.headers,
      },
      body: request.body !== undefined ? JSON.stringify(request.body) : undefined,
      signal: request.signal,
    });
  } catch (error) {
    // Aborts carry the timeout/cancellation reason; let it through as-is
    if (request.signal.aborted) throw request.signal.reason ?? error;
    throw new TransientProviderError(
      `Failed to reach ${providerId}: ${error instanceof Error ? error.message : String(error)}`,
      providerId,
      { cause: error }
    );
  }

  if (!response.ok) {
    const text = await response.text().catch(() => "");
    throw classifyStatus(providerId, response.status, text);
  }

  try {
    const data: unknown = await response.json();
    return schema.parse(data);
  } catch (error) {
    if (isMarketIntelError(error)) throw error;
    throw new TransientProviderError(`${providerId} returned an unexpected payload`, providerId, {
      cause: error,
    });
  }
}

function redact(url: string): string {
  return url.replace(/(apikey|api_key|key)=[^&]+/gi, "$1=***");
}
