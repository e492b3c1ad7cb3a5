/**
 * In-process stand-in for `fetch`.
 *
 * Records every request and answers from a queue of canned responses, so
 * client tests never touch the network.
 */

export interface RecordedRequest {
  method: string;
  url: string;
  /** Header names are lower-cased. */
  headers: Record<string, string>;
  rawBody: string | undefined;
  /** The body parsed as JSON, or the raw text when it is not JSON. */
  body: unknown;
}

export type MockReply =
  | {
      status?: number;
      body?: unknown;
      headers?: Record<string, string>;
    }
  | { hang: true };

export type MockFetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface MockFetch {
  fetch: MockFetchFn;
  requests: RecordedRequest[];
  /** Queue a reply. A non-string body is sent as JSON. */
  reply: (reply: MockReply) => MockFetch;
  /** Queue a 200 JSON reply. */
  replyJson: (body: unknown, status?: number) => MockFetch;
  /** Queue a rejection, as for a network failure. */
  fail: (error: unknown) => MockFetch;
  readonly pending: number;
}

type QueuedReply = { kind: "reply"; reply: MockReply } | { kind: "fail"; error: unknown };

function readHeaders(init: RequestInit | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  new Headers(init?.headers).forEach((value, key) => {
    result[key] = value;
  });
  return result;
}

function parseBody(raw: string | undefined): unknown {
  if (raw === undefined) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error("aborted");
}

export function createMockFetch(): MockFetch {
  const requests: RecordedRequest[] = [];
  const queue: QueuedReply[] = [];

  const fetch: MockFetchFn = async (url, init) => {
    const rawBody = typeof init?.body === "string" ? init.body : undefined;
    requests.push({
      method: (init?.method ?? "GET").toUpperCase(),
      url,
      headers: readHeaders(init),
      rawBody,
      body: parseBody(rawBody),
    });

    const signal = init?.signal ?? undefined;
    if (signal?.aborted) {
      throw abortReason(signal);
    }

    const next = queue.shift();
    if (!next) {
      throw new Error(`Unexpected request: ${init?.method ?? "GET"} ${url}`);
    }
    if (next.kind === "fail") {
      throw next.error;
    }

    const { reply } = next;
    if ("hang" in reply) {
      return new Promise<Response>((_resolve, reject) => {
        signal?.addEventListener("abort", () => reject(abortReason(signal)), {
          once: true,
        });
      });
    }

    const body =
      reply.body === undefined || typeof reply.body === "string"
        ? reply.body
        : JSON.stringify(reply.body);
    return new Response(body ?? null, {
      status: reply.status ?? 200,
      headers: reply.headers ?? { "content-type": "application/json" },
    });
  };

  const mock: MockFetch = {
    fetch,
    requests,
    reply: (reply) => {
      queue.push({ kind: "reply", reply });
      return mock;
    },
    replyJson: (body, status = 200) => mock.reply({ status, body }),
    fail: (error) => {
      queue.push({ kind: "fail", error });
      return mock;
    },
    get pending() {
      return queue.length;
    },
  };
  return mock;
}
