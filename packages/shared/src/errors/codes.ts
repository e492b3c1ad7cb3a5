/**
 * Canonical error codes for cloudkit.
 * Each entry defines the error kind and its default message.
 */
export const ErrorCodes = {
  // Transport (non-2xx HTTP status)
  TRANSPORT_BAD_REQUEST: {
    kind: "transport",
    message: "The API rejected the request",
  },
  TRANSPORT_UNAUTHORIZED: {
    kind: "transport",
    message: "API token missing or invalid",
  },
  TRANSPORT_FORBIDDEN: {
    kind: "transport",
    message: "API token lacks permission for this resource",
  },
  TRANSPORT_NOT_FOUND: { kind: "transport", message: "Resource not found" },
  TRANSPORT_CONFLICT: {
    kind: "transport",
    message: "Request conflicts with the current resource state",
  },
  TRANSPORT_RATE_LIMITED: {
    kind: "transport",
    message: "API rate limit exceeded",
  },
  TRANSPORT_SERVER_ERROR: { kind: "transport", message: "API server error" },
  TRANSPORT_FAILED: {
    kind: "transport",
    message: "API returned a non-success status",
  },

  // Business failure (2xx with success=false)
  API_REQUEST_FAILED: {
    kind: "api",
    message: "The API reported the request as failed",
  },

  // Decoding
  DECODE_INVALID_JSON: {
    kind: "decode",
    message: "Response body is not valid JSON",
  },
  DECODE_INVALID_ENVELOPE: {
    kind: "decode",
    message: "Response body is not a valid API envelope",
  },
  DECODE_INVALID_RESULT: {
    kind: "decode",
    message: "Response result does not match the expected shape",
  },

  // Arguments
  ARGUMENT_REQUIRED: { kind: "argument", message: "Argument is required" },
  ARGUMENT_INVALID: { kind: "argument", message: "Argument is invalid" },

  // Configuration
  CONFIG_INVALID: { kind: "config", message: "Client configuration invalid" },

  // Network
  NETWORK_ERROR: { kind: "network", message: "Network request failed" },
  REQUEST_TIMEOUT: { kind: "network", message: "Request timed out" },
} as const;

export type ErrorCode = keyof typeof ErrorCodes;

export type ErrorKind = (typeof ErrorCodes)[ErrorCode]["kind"];

export const ERROR_CODE_LIST = Object.keys(ErrorCodes) as ErrorCode[];

export const DEFAULT_ERROR_MESSAGES: Record<ErrorCode, string> =
  ERROR_CODE_LIST.reduce(
    (acc, code) => {
      acc[code] = ErrorCodes[code].message;
      return acc;
    },
    {} as Record<ErrorCode, string>,
  );

/** Returns the error kind for the given error code. */
export function getErrorKind(code: ErrorCode): ErrorKind {
  return ErrorCodes[code].kind;
}

/** Maps a non-2xx HTTP status onto its transport error code. */
export function transportCodeForStatus(status: number): ErrorCode {
  switch (status) {
    case 400:
      return "TRANSPORT_BAD_REQUEST";
    case 401:
      return "TRANSPORT_UNAUTHORIZED";
    case 403:
      return "TRANSPORT_FORBIDDEN";
    case 404:
      return "TRANSPORT_NOT_FOUND";
    case 409:
      return "TRANSPORT_CONFLICT";
    case 429:
      return "TRANSPORT_RATE_LIMITED";
    default:
      return status >= 500 && status <= 599
        ? "TRANSPORT_SERVER_ERROR"
        : "TRANSPORT_FAILED";
  }
}
