export {
  DEFAULT_ERROR_MESSAGES,
  ERROR_CODE_LIST,
  ErrorCodes,
  type ErrorCode,
  type ErrorKind,
  getErrorKind,
  transportCodeForStatus,
} from "./codes";
export {
  ApiBusinessFailureError,
  ArgumentValidationError,
  type ArgumentErrorCode,
  assertNonBlank,
  assertPresent,
  CloudApiError,
  createArgumentError,
  createCloudApiError,
  DecodeFailureError,
  type DecodeErrorCode,
  type DecodeFailureOptions,
  fromCode,
  TransportFailureError,
  type TransportFailureOptions,
} from "./factory";
export { RETRY_HINTS } from "./hints";
export {
  isCloudApiError,
  isRetryable,
  serializeCloudApiError,
  toCloudApiError,
} from "./serialization";
export type {
  ApiErrorEntry,
  CloudApiErrorOptions,
  CloudApiErrorPayload,
  RetryHint,
  RetryHintSeverity,
} from "./types";
