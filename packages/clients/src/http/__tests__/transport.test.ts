import {
  ApiBusinessFailureError,
  CloudApiError,
  TransportFailureError,
} from "@cloudkit/shared/errors";
import { voidResult } from "@cloudkit/shared/api";
import {
  assertLogContains,
  createMockFetch,
  createTestLogger,
  failureEnvelope,
  successEnvelope,
} from "@cloudkit/test-utils";
import { describe, expect, test } from "vitest";
import { z } from "zod";
import { rejectionOf } from "../../__tests__/harness";
import { loadClientConfig } from "../../config";
import type { ClientConfigInput } from "../../config";
import { createApiTransport } from "../transport";

const ZoneSchema = z.object({ id: z.string() }).passthrough();

function setup(config: ClientConfigInput = {}) {
  const http = createMockFetch();
  const logs = createTestLogger();
  const transport = createApiTransport({
    config: loadClientConfig({ apiToken: "test-secret", ...config }, {}),
    fetch: http.fetch,
    logger: logs,
  });
  return { http, logs, transport };
}

describe("createApiTransport", () => {
  describe("requests", () => {
    test("joins the base URL and path and sends the standard headers", async () => {
      const { http, transport } = setup({ userAgent: "cloudkit-tests" });
      http.replyJson(successEnvelope({ id: "z1" }));

      const decoded = await transport.send(
        { method: "GET", path: "zones/z1" },
        ZoneSchema,
      );

      expect(decoded.result).toEqual({ id: "z1" });
      expect(http.requests).toHaveLength(1);
      const [request] = http.requests;
      expect(request?.method).toBe("GET");
      expect(request?.url).toBe("https://api.cloudflare.com/client/v4/zones/z1");
      expect(request?.headers["authorization"]).toBe("Bearer test-secret");
      expect(request?.headers["accept"]).toBe("application/json");
      expect(request?.headers["user-agent"]).toBe("cloudkit-tests");
      expect(request?.headers["content-type"]).toBeUndefined();
      expect(request?.rawBody).toBeUndefined();
    });

    test("keeps percent-encoded path segments intact", async () => {
      const { http, transport } = setup();
      http.replyJson(successEnvelope({ id: "a/b" }));

      await transport.send(
        { method: "GET", path: "zones/a%2Fb%20c" },
        ZoneSchema,
      );

      expect(http.requests[0]?.url).toBe(
        "https://api.cloudflare.com/client/v4/zones/a%2Fb%20c",
      );
    });

    test("serializes JSON bodies without null properties", async () => {
      const { http, transport } = setup();
      http.replyJson(successEnvelope({ id: "r1" }));

      await transport.send(
        {
          method: "POST",
          path: "zones/z1/dns_records",
          body: { name: "www", comment: null, tags: ["a", null] },
        },
        ZoneSchema,
      );

      const [request] = http.requests;
      expect(request?.headers["content-type"]).toBe("application/json");
      expect(request?.rawBody).toBe('{"name":"www","tags":["a",null]}');
    });

    test("sends a literal null body", async () => {
      const { http, transport } = setup();
      http.replyJson(successEnvelope(null));

      await transport.send(
        { method: "POST", path: "zones/z1/dns_records/scan/trigger", body: null },
        voidResult,
      );

      expect(http.requests[0]?.rawBody).toBe("null");
    });

    test("merges request headers after the defaults", async () => {
      const { http, transport } = setup();
      http.replyJson(successEnvelope({ id: "b" }));

      await transport.send(
        {
          method: "GET",
          path: "accounts/acc-1/r2/buckets/b",
          headers: { "cf-r2-jurisdiction": "eu" },
        },
        ZoneSchema,
      );

      expect(http.requests[0]?.headers["cf-r2-jurisdiction"]).toBe("eu");
    });
  });

  describe("classification", () => {
    test("a 404 with a failing envelope is a transport failure", async () => {
      const { http, transport } = setup();
      http.reply({
        status: 404,
        body: failureEnvelope([{ code: 7003, message: "Could not route" }]),
      });

      const error = await rejectionOf(
        transport.send({ method: "GET", path: "zones/missing" }, ZoneSchema),
      );

      expect(error).toBeInstanceOf(TransportFailureError);
      expect(error).not.toBeInstanceOf(ApiBusinessFailureError);
      if (error instanceof TransportFailureError) {
        expect(error.status).toBe(404);
        expect(error.code).toBe("TRANSPORT_NOT_FOUND");
      }
    });

    test("a 200 with success false is a business failure with every error", async () => {
      const { http, transport } = setup();
      http.replyJson(
        failureEnvelope([
          { code: 81057, message: "Record already exists." },
          { code: 1004, message: "DNS Validation Error" },
        ]),
      );

      const error = await rejectionOf(
        transport.send({ method: "POST", path: "zones/z1/dns_records", body: {} }, ZoneSchema),
      );

      expect(error).toBeInstanceOf(ApiBusinessFailureError);
      if (error instanceof ApiBusinessFailureError) {
        expect(error.errors.map((entry) => entry.code)).toEqual([81057, 1004]);
      }
    });

    test("carries Retry-After on a 429", async () => {
      const { http, transport } = setup();
      http.reply({
        status: 429,
        body: "slow down",
        headers: { "content-type": "text/plain", "retry-after": "3" },
      });

      const error = await rejectionOf(
        transport.send({ method: "GET", path: "zones" }, ZoneSchema),
      );

      expect(error).toBeInstanceOf(TransportFailureError);
      if (error instanceof TransportFailureError) {
        expect(error.code).toBe("TRANSPORT_RATE_LIMITED");
        expect(error.retryAfterMs).toBe(3000);
        expect(error.hint.severity).toBe("retry");
      }
    });
  });

  describe("failures before a response", () => {
    test("wraps a fetch rejection as a network error", async () => {
      const { http, transport } = setup();
      http.fail(new Error("socket hang up"));

      const error = await rejectionOf(
        transport.send({ method: "GET", path: "zones" }, ZoneSchema),
      );

      expect(error).toBeInstanceOf(CloudApiError);
      if (error instanceof CloudApiError) {
        expect(error.code).toBe("NETWORK_ERROR");
        expect(error.message).toBe("GET zones failed: socket hang up");
      }
    });

    test("times out a request that never answers", async () => {
      const { http, transport } = setup({ timeoutMs: 20 });
      http.reply({ hang: true });

      const error = await rejectionOf(
        transport.send({ method: "GET", path: "zones" }, ZoneSchema),
      );

      expect(error).toBeInstanceOf(CloudApiError);
      if (error instanceof CloudApiError) {
        expect(error.code).toBe("REQUEST_TIMEOUT");
        expect(error.message).toBe("GET zones timed out after 20ms");
      }
    });

    test("rethrows the caller's abort reason", async () => {
      const { http, transport } = setup();
      http.reply({ hang: true });
      const controller = new AbortController();
      const reason = new Error("caller gave up");

      const pending = transport.send(
        { method: "GET", path: "zones", signal: controller.signal },
        ZoneSchema,
      );
      controller.abort(reason);

      expect(await rejectionOf(pending)).toBe(reason);
    });

    test("sends nothing when the signal is already aborted", async () => {
      const { http, transport } = setup();
      const controller = new AbortController();
      const reason = new Error("cancelled");
      controller.abort(reason);

      const error = await rejectionOf(
        transport.send(
          { method: "GET", path: "zones", signal: controller.signal },
          ZoneSchema,
        ),
      );

      expect(error).toBe(reason);
      expect(http.requests).toHaveLength(0);
    });
  });

  describe("logging", () => {
    test("logs completed requests at debug", async () => {
      const { http, logs, transport } = setup();
      http.replyJson(successEnvelope({ id: "z1" }));

      await transport.send({ method: "GET", path: "zones/z1" }, ZoneSchema);

      expect(logs.entries).toHaveLength(1);
      const [entry] = logs.entries;
      expect(entry?.level).toBe("debug");
      expect(entry?.message).toBe("Cloud API request completed");
      expect(entry?.meta?.["method"]).toBe("GET");
      expect(entry?.meta?.["path"]).toBe("zones/z1");
      expect(entry?.meta?.["status"]).toBe(200);
    });

    test("logs failures at warn with the error code and no token", async () => {
      const { http, logs, transport } = setup();
      http.reply({ status: 403, body: failureEnvelope() });

      await rejectionOf(transport.send({ method: "GET", path: "zones" }, ZoneSchema));

      assertLogContains(logs.entries, { level: "warn", message: "request failed" });
      const [entry] = logs.entries;
      expect(entry?.level).toBe("warn");
      expect(entry?.message).toBe("Cloud API request failed");
      const logged = entry?.meta?.["error"];
      expect(logged).toMatchObject({ code: "TRANSPORT_FORBIDDEN", status: 403 });
      expect(JSON.stringify(entry?.meta)).not.toContain("test-secret");
    });
  });
});
