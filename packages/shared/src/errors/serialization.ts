import type { ErrorCode } from "./codes";
import { DEFAULT_ERROR_MESSAGES } from "./codes";
import {
  ApiBusinessFailureError,
  ArgumentValidationError,
  CloudApiError,
  TransportFailureError,
} from "./factory";
import type { CloudApiErrorPayload } from "./types";

/** Returns true if the value is a CloudApiError instance. */
export function isCloudApiError(value: unknown): value is CloudApiError {
  return value instanceof CloudApiError;
}

/**
 * Serialize a CloudApiError into a plain JSON payload, suitable for logs.
 */
export function serializeCloudApiError(
  error: CloudApiError,
): CloudApiErrorPayload {
  const payload: CloudApiErrorPayload = {
    name: error.name,
    code: error.code,
    kind: error.kind,
    message: error.message,
    hint: error.hint,
  };
  if (error instanceof TransportFailureError) {
    payload.status = error.status;
  }
  if (error instanceof ApiBusinessFailureError) {
    payload.errors = [...error.errors];
  }
  if (error instanceof ArgumentValidationError) {
    payload.param = error.param;
  }
  if (error.details !== undefined) {
    payload.details = error.details;
  }
  return payload;
}

/**
 * Normalize unknown errors into a CloudApiError.
 */
export function toCloudApiError(
  error: unknown,
  fallbackCode: ErrorCode = "NETWORK_ERROR",
): CloudApiError {
  if (error instanceof CloudApiError) {
    return error;
  }
  if (error instanceof Error) {
    return new CloudApiError(fallbackCode, error.message, { cause: error });
  }
  return new CloudApiError(fallbackCode, DEFAULT_ERROR_MESSAGES[fallbackCode], {
    cause: error,
  });
}

/** True when the error's hint says a plain retry may succeed. */
export function isRetryable(error: unknown): boolean {
  return error instanceof CloudApiError && error.hint.severity === "retry";
}
