import type { ErrorCode } from "./codes";
import { DEFAULT_ERROR_MESSAGES, ERROR_CODE_LIST, getErrorKind } from "./codes";
import type { RetryHint } from "./types";

const RETRY_HINT_OVERRIDES: Partial<Record<ErrorCode, RetryHint>> = {
  TRANSPORT_UNAUTHORIZED: {
    severity: "terminal",
    suggestedAction: "Check that the API token is set and has not been revoked.",
  },
  TRANSPORT_FORBIDDEN: {
    severity: "terminal",
    suggestedAction: "Grant the API token the permission this endpoint needs.",
  },
  TRANSPORT_NOT_FOUND: {
    severity: "terminal",
    suggestedAction: "Verify the identifiers in the request path.",
  },
  TRANSPORT_CONFLICT: {
    severity: "recoverable",
    suggestedAction: "Refresh the resource state and resubmit the change.",
  },
  TRANSPORT_RATE_LIMITED: {
    severity: "retry",
    suggestedAction: "Wait before retrying the request.",
    retryAfterMs: 1000,
  },
  TRANSPORT_SERVER_ERROR: {
    severity: "retry",
    suggestedAction: "Retry the request with backoff.",
  },
  API_REQUEST_FAILED: {
    severity: "recoverable",
    suggestedAction: "Inspect the API error entries and correct the request.",
  },
  DECODE_INVALID_RESULT: {
    severity: "terminal",
    suggestedAction:
      "The response shape changed; update the client or report the payload.",
  },
  CONFIG_INVALID: {
    severity: "terminal",
    suggestedAction: "Fix the client configuration before creating a client.",
  },
  REQUEST_TIMEOUT: {
    severity: "retry",
    suggestedAction: "Retry the request or raise the client timeout.",
  },
};

function defaultHintForCode(code: ErrorCode): RetryHint {
  const kind = getErrorKind(code);

  if (kind === "network") {
    return {
      severity: "retry",
      suggestedAction: "Check connectivity to the API and retry.",
    };
  }

  if (kind === "argument") {
    return {
      severity: "recoverable",
      suggestedAction: "Correct the argument and call again.",
    };
  }

  if (kind === "decode") {
    return {
      severity: "terminal",
      suggestedAction: "Inspect the raw response body; it is not an API envelope.",
    };
  }

  return {
    severity: "recoverable",
    suggestedAction: `Resolve the issue described by: ${DEFAULT_ERROR_MESSAGES[code]}.`,
  };
}

export const RETRY_HINTS: Record<ErrorCode, RetryHint> = ERROR_CODE_LIST.reduce(
  (acc, code) => {
    acc[code] = RETRY_HINT_OVERRIDES[code] ?? defaultHintForCode(code);
    return acc;
  },
  {} as Record<ErrorCode, RetryHint>,
);
