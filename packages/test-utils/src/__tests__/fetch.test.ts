import { describe, expect, test } from "vitest";
import { cursorEnvelope, failureEnvelope, pageEnvelope } from "../envelopes";
import { createMockFetch } from "../fetch";
import { captureTestLogs, getTestLogSummary } from "../logging";

describe("createMockFetch", () => {
  test("records requests and replays queued replies in order", async () => {
    const mock = createMockFetch()
      .replyJson({ first: true })
      .reply({ status: 404, body: "missing" });

    const first = await mock.fetch("https://api.example.test/a", {
      method: "post",
      headers: { "X-Trace": "t1" },
      body: JSON.stringify({ name: "demo" }),
    });
    const second = await mock.fetch("https://api.example.test/b");

    expect(await first.json()).toEqual({ first: true });
    expect(second.status).toBe(404);
    expect(await second.text()).toBe("missing");
    expect(mock.requests[0]).toEqual({
      method: "POST",
      url: "https://api.example.test/a",
      headers: { "x-trace": "t1" },
      rawBody: '{"name":"demo"}',
      body: { name: "demo" },
    });
    expect(mock.requests[1]?.method).toBe("GET");
    expect(mock.pending).toBe(0);
  });

  test("rejects unexpected requests", async () => {
    await expect(createMockFetch().fetch("https://api.example.test/x")).rejects.toThrow(
      "Unexpected request: GET https://api.example.test/x",
    );
  });

  test("hanging replies reject when aborted", async () => {
    const mock = createMockFetch().reply({ hang: true });
    const controller = new AbortController();
    const pending = mock.fetch("https://api.example.test/slow", {
      signal: controller.signal,
    });
    controller.abort(new Error("stop"));
    await expect(pending).rejects.toThrow("stop");
  });
});

describe("envelope fixtures", () => {
  test("pageEnvelope fills result_info", () => {
    expect(pageEnvelope(["a"], { page: 2, perPage: 1, totalPages: 3 })).toEqual({
      success: true,
      errors: [],
      messages: [],
      result: ["a"],
      result_info: { page: 2, per_page: 1, count: 1, total_count: 3, total_pages: 3 },
    });
  });

  test("cursorEnvelope can use cursor_result_info", () => {
    expect(
      cursorEnvelope([], 0, { cursor: null, infoKey: "cursor_result_info" })
        .cursor_result_info,
    ).toEqual({ count: 0, per_page: 20, cursor: null });
  });

  test("failureEnvelope defaults to one error", () => {
    expect(failureEnvelope().errors).toEqual([
      { code: 1000, message: "Request failed" },
    ]);
  });
});

describe("test logger", () => {
  test("captures pino-style calls", () => {
    const { logger, logs } = captureTestLogs();
    logger.warn({ status: 500 }, "request failed");
    logger.info("plain");

    expect(logs[0]?.message).toBe("request failed");
    expect(logs[0]?.meta).toEqual({ status: 500 });
    expect(logs[1]?.meta).toBeUndefined();
    expect(getTestLogSummary(logs)).toEqual({
      trace: 0,
      debug: 0,
      info: 1,
      warn: 1,
      error: 0,
    });
  });
});
