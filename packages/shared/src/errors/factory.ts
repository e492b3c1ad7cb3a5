import type { z } from "zod";
import { DEFAULT_ERROR_MESSAGES, getErrorKind, transportCodeForStatus } from "./codes";
import type { ErrorCode, ErrorKind } from "./codes";
import { RETRY_HINTS } from "./hints";
import type { ApiErrorEntry, CloudApiErrorOptions, RetryHint } from "./types";

const BODY_EXCERPT_LIMIT = 512;

export class CloudApiError extends Error {
  readonly code: ErrorCode;
  readonly kind: ErrorKind;
  readonly hint: RetryHint;
  readonly details?: Record<string, unknown>;
  override cause?: unknown;

  constructor(code: ErrorCode, message: string, options?: CloudApiErrorOptions) {
    super(message);
    this.name = "CloudApiError";
    this.code = code;
    this.kind = getErrorKind(code);
    this.hint = options?.hint ?? RETRY_HINTS[code];

    if (options?.details) {
      this.details = options.details;
    }

    if (options && "cause" in options) {
      this.cause = options.cause;
    }
  }
}

export interface TransportFailureOptions {
  body?: string;
  retryAfterMs?: number;
  cause?: unknown;
}

/** Non-2xx HTTP status. The body is kept only as an excerpt for diagnostics. */
export class TransportFailureError extends CloudApiError {
  readonly status: number;
  readonly retryAfterMs?: number;

  constructor(status: number, options: TransportFailureOptions = {}) {
    const code = transportCodeForStatus(status);
    const baseHint = RETRY_HINTS[code];
    const hint: RetryHint =
      options.retryAfterMs !== undefined
        ? { ...baseHint, retryAfterMs: options.retryAfterMs }
        : baseHint;
    const details: Record<string, unknown> = { status };
    if (options.body !== undefined && options.body.length > 0) {
      details["body"] = excerpt(options.body);
    }

    super(code, `${DEFAULT_ERROR_MESSAGES[code]} (HTTP ${status})`, {
      hint,
      details,
      ...("cause" in options && { cause: options.cause }),
    });
    this.name = "TransportFailureError";
    this.status = status;
    if (options.retryAfterMs !== undefined) {
      this.retryAfterMs = options.retryAfterMs;
    }
  }
}

/** 2xx response whose envelope reported `success: false`. */
export class ApiBusinessFailureError extends CloudApiError {
  readonly errors: readonly ApiErrorEntry[];

  constructor(errors: readonly ApiErrorEntry[], options?: CloudApiErrorOptions) {
    const summary = errors
      .map((entry) => `[${entry.code}] ${entry.message}`)
      .join("; ");
    super(
      "API_REQUEST_FAILED",
      summary.length > 0
        ? `${DEFAULT_ERROR_MESSAGES.API_REQUEST_FAILED}: ${summary}`
        : DEFAULT_ERROR_MESSAGES.API_REQUEST_FAILED,
      options,
    );
    this.name = "ApiBusinessFailureError";
    this.errors = [...errors];
  }

  /** True if any error entry carries the given API error code. */
  hasErrorCode(code: number): boolean {
    return this.errors.some((entry) => entry.code === code);
  }
}

export type DecodeErrorCode = Extract<ErrorCode, `DECODE_${string}`>;

export interface DecodeFailureOptions {
  issues?: z.ZodIssue[];
  body?: string;
  cause?: unknown;
}

export class DecodeFailureError extends CloudApiError {
  readonly issues: readonly z.ZodIssue[];

  constructor(code: DecodeErrorCode, options: DecodeFailureOptions = {}) {
    const details: Record<string, unknown> = {};
    if (options.issues) {
      details["issues"] = options.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      }));
    }
    if (options.body !== undefined) {
      details["body"] = excerpt(options.body);
    }

    super(code, DEFAULT_ERROR_MESSAGES[code], {
      details,
      ...("cause" in options && { cause: options.cause }),
    });
    this.name = "DecodeFailureError";
    this.issues = options.issues ?? [];
  }
}

export type ArgumentErrorCode = Extract<ErrorCode, `ARGUMENT_${string}`>;

/** Raised before any request is made. */
export class ArgumentValidationError extends CloudApiError {
  readonly param: string;

  constructor(
    param: string,
    code: ArgumentErrorCode = "ARGUMENT_REQUIRED",
    message?: string,
    options?: CloudApiErrorOptions,
  ) {
    super(code, message ?? `${DEFAULT_ERROR_MESSAGES[code]}: ${param}`, {
      ...options,
      details: { ...(options?.details ?? {}), param },
    });
    this.name = "ArgumentValidationError";
    this.param = param;
  }
}

/** Create a CloudApiError with explicit message and options. */
export function createCloudApiError(
  code: ErrorCode,
  message: string,
  options?: CloudApiErrorOptions,
): CloudApiError {
  return new CloudApiError(code, message, options);
}

/** Create a CloudApiError using the default message for the code. */
export function fromCode(
  code: ErrorCode,
  options?: CloudApiErrorOptions,
): CloudApiError {
  return new CloudApiError(code, DEFAULT_ERROR_MESSAGES[code], options);
}

/** Create an argument error carrying zod issues as field details. */
export function createArgumentError(
  param: string,
  issues: z.ZodIssue[],
): ArgumentValidationError {
  const fields = issues.map((issue) => ({
    path: [param, ...issue.path].join("."),
    message: issue.message,
  }));
  const first = fields[0];
  return new ArgumentValidationError(
    param,
    "ARGUMENT_INVALID",
    first ? `Invalid ${first.path}: ${first.message}` : undefined,
    { details: { fields } },
  );
}

/** Throws unless the value is a non-blank string. */
export function assertNonBlank(
  value: string | null | undefined,
  param: string,
): asserts value is string {
  if (value === null || value === undefined || value.trim().length === 0) {
    throw new ArgumentValidationError(param);
  }
}

/** Throws if the value is null or undefined. */
export function assertPresent<T>(
  value: T | null | undefined,
  param: string,
): asserts value is T {
  if (value === null || value === undefined) {
    throw new ArgumentValidationError(param);
  }
}

function excerpt(body: string): string {
  return body.length > BODY_EXCERPT_LIMIT
    ? `${body.slice(0, BODY_EXCERPT_LIMIT)}…`
    : body;
}
