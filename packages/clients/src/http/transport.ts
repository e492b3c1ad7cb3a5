import type { DecodedEnvelope, ResultSchema } from "@cloudkit/shared/api";
import { decodeApiResponse } from "@cloudkit/shared/api";
import {
  CloudApiError,
  isCloudApiError,
  serializeCloudApiError,
} from "@cloudkit/shared/errors";
import type { ClientConfig } from "../config";
import type { ClientLogger } from "../logger";
import { createChildLogger } from "../logger";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

/** The part of `fetch` the transport uses. */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface ApiRequest {
  method: HttpMethod;
  /** Path relative to the base URL, already encoded, query included. */
  path: string;
  body?: unknown;
  headers?: Record<string, string>;
  signal?: AbortSignal | undefined;
}

export interface ApiTransport {
  readonly config: ClientConfig;
  send<T>(
    request: ApiRequest,
    resultSchema: ResultSchema<T>,
  ): Promise<DecodedEnvelope<T>>;
}

export interface ApiTransportOptions {
  config: ClientConfig;
  fetch?: FetchLike;
  logger?: ClientLogger;
}

/** Omit null object properties from request bodies. The root value is kept. */
function dropNullProperties(key: string, value: unknown): unknown {
  return key !== "" && value === null ? undefined : value;
}

interface RawExchange {
  status: number;
  body: string;
  retryAfter: string | null;
}

/**
 * Create the HTTP transport shared by all resource clients.
 *
 * Every call is a single fetch: no retries. The URL is the base URL and the
 * request path joined as strings, so percent-encoded path segments reach the
 * server as encoded.
 */
export function createApiTransport(options: ApiTransportOptions): ApiTransport {
  const { config } = options;
  const fetchImpl: FetchLike = options.fetch ?? ((url, init) => fetch(url, init));
  const log: ClientLogger =
    options.logger ?? createChildLogger({ component: "transport" }, config.logLevel);

  const exchange = async (request: ApiRequest): Promise<RawExchange> => {
    const callerSignal = request.signal;
    callerSignal?.throwIfAborted();

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, config.timeoutMs);
    const forwardAbort = () => controller.abort(callerSignal?.reason);
    callerSignal?.addEventListener("abort", forwardAbort, { once: true });

    const headers: Record<string, string> = {
      authorization: `Bearer ${config.apiToken}`,
      accept: "application/json",
      "user-agent": config.userAgent,
      ...request.headers,
    };

    // Build fetch options conditionally (for exactOptionalPropertyTypes)
    const init: RequestInit = {
      method: request.method,
      headers,
      signal: controller.signal,
    };
    if (request.body !== undefined) {
      headers["content-type"] = "application/json";
      init.body = JSON.stringify(request.body, dropNullProperties);
    }

    try {
      const response = await fetchImpl(`${config.baseUrl}${request.path}`, init);
      return {
        status: response.status,
        body: await response.text(),
        retryAfter: response.headers.get("retry-after"),
      };
    } catch (error) {
      if (callerSignal?.aborted) {
        throw callerSignal.reason;
      }
      if (timedOut) {
        throw new CloudApiError(
          "REQUEST_TIMEOUT",
          `${request.method} ${request.path} timed out after ${config.timeoutMs}ms`,
          { details: { timeoutMs: config.timeoutMs }, cause: error },
        );
      }
      throw new CloudApiError(
        "NETWORK_ERROR",
        `${request.method} ${request.path} failed: ${
          error instanceof Error ? error.message : String(error)
        }`,
        { cause: error },
      );
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener("abort", forwardAbort);
    }
  };

  return {
    config,
    send: async (request, resultSchema) => {
      const startedAt = Date.now();
      try {
        const raw = await exchange(request);
        const decoded = decodeApiResponse(raw, resultSchema);
        log.debug(
          {
            method: request.method,
            path: request.path,
            status: raw.status,
            durationMs: Date.now() - startedAt,
          },
          "Cloud API request completed",
        );
        return decoded;
      } catch (error) {
        if (isCloudApiError(error)) {
          log.warn(
            {
              method: request.method,
              path: request.path,
              durationMs: Date.now() - startedAt,
              error: serializeCloudApiError(error),
            },
            "Cloud API request failed",
          );
        }
        throw error;
      }
    },
  };
}
