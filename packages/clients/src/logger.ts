import pino from "pino";

export type { Logger } from "pino";

/** The subset of pino's logger the clients call. */
export interface ClientLogFn {
  (obj: object, msg?: string): void;
  (msg: string): void;
}

export interface ClientLogger {
  debug: ClientLogFn;
  info: ClientLogFn;
  warn: ClientLogFn;
  error: ClientLogFn;
}

/**
 * Base logger. Its level is fixed; the configured `logLevel` is validated by
 * `loadClientConfig` and applied per child through `createChildLogger`.
 */
export const logger = pino({
  name: "cloudkit",
  level: "info",
  redact: ["authorization", "headers.authorization", "apiToken"],
});

export function createChildLogger(
  bindings: Record<string, unknown>,
  level?: string,
): pino.Logger {
  const child = logger.child(bindings);
  if (level !== undefined) {
    child.level = level;
  }
  return child;
}
