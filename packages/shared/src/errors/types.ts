import type { ErrorCode, ErrorKind } from "./codes";

export type RetryHintSeverity = "recoverable" | "terminal" | "retry";

export interface RetryHint {
  severity: RetryHintSeverity;
  suggestedAction: string;
  retryAfterMs?: number;
}

/** One entry of an API envelope's `errors` array. */
export interface ApiErrorEntry {
  code: number;
  message: string;
}

export interface CloudApiErrorPayload {
  name: string;
  code: ErrorCode;
  kind: ErrorKind;
  message: string;
  hint: RetryHint;
  status?: number;
  errors?: ApiErrorEntry[];
  param?: string;
  details?: Record<string, unknown>;
}

export interface CloudApiErrorOptions {
  hint?: RetryHint;
  details?: Record<string, unknown>;
  cause?: unknown;
}
