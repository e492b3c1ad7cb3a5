export type TestLogLevel = "trace" | "debug" | "info" | "warn" | "error";

export interface TestLogEntry {
  level: TestLogLevel;
  message: string;
  timestamp: string;
  meta?: Record<string, unknown>;
}

/** Accepts pino's `(obj, msg)` and `(msg)` call shapes. */
export interface TestLogFn {
  (obj: object, msg?: string): void;
  (msg: string): void;
}

export interface TestLogger {
  trace: TestLogFn;
  debug: TestLogFn;
  info: TestLogFn;
  warn: TestLogFn;
  error: TestLogFn;
  entries: TestLogEntry[];
}

const LOG_LEVELS: TestLogLevel[] = ["trace", "debug", "info", "warn", "error"];

function toMeta(obj: object): Record<string, unknown> {
  const meta: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    meta[key] = value;
  }
  return meta;
}

export function createTestLogger(): TestLogger {
  const entries: TestLogEntry[] = [];
  const logFn =
    (level: TestLogLevel): TestLogFn =>
    (objOrMsg: object | string, msg?: string) => {
      // Build entry conditionally (for exactOptionalPropertyTypes)
      const entry: TestLogEntry = {
        level,
        message: typeof objOrMsg === "string" ? objOrMsg : (msg ?? ""),
        timestamp: new Date().toISOString(),
      };
      if (typeof objOrMsg !== "string") entry.meta = toMeta(objOrMsg);
      entries.push(entry);
    };

  return {
    entries,
    trace: logFn("trace"),
    debug: logFn("debug"),
    info: logFn("info"),
    warn: logFn("warn"),
    error: logFn("error"),
  };
}

export function captureTestLogs(): {
  logger: TestLogger;
  logs: TestLogEntry[];
} {
  const logger = createTestLogger();
  return { logger, logs: logger.entries };
}

export function assertLogContains(
  logs: TestLogEntry[],
  matcher: { level?: TestLogLevel; message?: string },
): void {
  const hit = logs.some((entry) => {
    if (matcher.level && entry.level !== matcher.level) {
      return false;
    }
    if (matcher.message && !entry.message.includes(matcher.message)) {
      return false;
    }
    return true;
  });

  if (!hit) {
    throw new Error(
      `Expected logs to contain entry with level=${matcher.level ?? "*"} and message~=${
        matcher.message ?? "*"
      }`,
    );
  }
}

export function getTestLogSummary(
  logs: TestLogEntry[],
): Record<TestLogLevel, number> {
  return LOG_LEVELS.reduce(
    (acc, level) => {
      acc[level] = logs.filter((entry) => entry.level === level).length;
      return acc;
    },
    {} as Record<TestLogLevel, number>,
  );
}
