/**
 * API core: envelope decoding, error classification, query building,
 * pagination and open enums. Shared by every resource client.
 */

export {
  // Envelope
  ApiErrorEntrySchema,
  EnvelopeSchema,
  ResultInfoSchema,
  type DecodedEnvelope,
  type ResultInfo,
  type WireEnvelope,
  decodeEnvelope,
  isEnvelope,
  parseEnvelope,
} from "./envelope";

export {
  // Classification
  type RawApiResponse,
  decodeApiResponse,
  isSuccessStatus,
  parseRetryAfter,
} from "./classifier";

export {
  // Path and query
  type HeaderValue,
  type QueryEntry,
  type QueryFilterShape,
  type QueryNaming,
  type QueryOptions,
  type QueryScalar,
  type QueryValue,
  buildPath,
  buildQueryString,
  compactHeaders,
  toQueryEntries,
  toWireName,
} from "./query";

export {
  // Pagination
  type CursorInfo,
  type CursorPaginatedResult,
  type CursorState,
  type CursorStrategyOptions,
  type FetchedPage,
  type PageFetcher,
  type PageInfo,
  type PagePaginatedResult,
  type PageState,
  type PageStrategyOptions,
  type PaginateOptions,
  type PaginationStrategy,
  collectAll,
  cursorStrategy,
  pageStrategy,
  paginate,
  toCursorInfo,
  toPageInfo,
} from "./pagination";

export {
  // Open enums
  type OpenEnum,
  type OpenEnumInput,
  type OpenEnumOf,
  type OpenEnumStatics,
  OpenEnumValue,
  defineOpenEnum,
} from "./open-enum";

export {
  // Untyped JSON
  type JsonPrimitive,
  type JsonValue,
  JsonDocument,
  JsonDocumentSchema,
  JsonValueSchema,
} from "./json-document";

export {
  // Shared schemas
  type ResultSchema,
  OptionalTimestampSchema,
  TimestampSchema,
  listResult,
  normalizeTimestamp,
  voidResult,
} from "./schemas";
