export {
  type CursorEnvelopeOptions,
  cursorEnvelope,
  failureEnvelope,
  type PageEnvelopeOptions,
  pageEnvelope,
  successEnvelope,
  type WireEnvelopeFixture,
} from "./envelopes";
export {
  createMockFetch,
  type MockFetch,
  type MockFetchFn,
  type MockReply,
  type RecordedRequest,
} from "./fetch";
export {
  assertLogContains,
  captureTestLogs,
  createTestLogger,
  getTestLogSummary,
  type TestLogEntry,
  type TestLogFn,
  type TestLogger,
  type TestLogLevel,
} from "./logging";
