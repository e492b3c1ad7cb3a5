import { TransportFailureError } from "../errors/factory";
import { decodeEnvelope } from "./envelope";
import type { DecodedEnvelope } from "./envelope";
import type { ResultSchema } from "./schemas";

export interface RawApiResponse {
  status: number;
  body: string;
  /** Raw `Retry-After` header value, if any. */
  retryAfter?: string | null;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status <= 299;
}

/**
 * Parse a `Retry-After` header (delta-seconds or HTTP-date) into milliseconds.
 */
export function parseRetryAfter(
  value: string | null | undefined,
  now: number = Date.now(),
): number | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return undefined;
  }
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000;
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

/**
 * Classify a response and decode it.
 *
 * The HTTP status is checked first: any status outside 2xx is a transport
 * failure, whatever the body holds. Only 2xx bodies are decoded as
 * envelopes, where `success: false` becomes a business failure.
 */
export function decodeApiResponse<T>(
  response: RawApiResponse,
  resultSchema: ResultSchema<T>,
): DecodedEnvelope<T> {
  if (!isSuccessStatus(response.status)) {
    const retryAfterMs = parseRetryAfter(response.retryAfter);
    throw new TransportFailureError(response.status, {
      body: response.body,
      ...(retryAfterMs !== undefined && { retryAfterMs }),
    });
  }
  return decodeEnvelope(response.body, resultSchema);
}
