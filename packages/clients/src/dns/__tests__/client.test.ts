import { collectAll } from "@cloudkit/shared/api";
import { ArgumentValidationError } from "@cloudkit/shared/errors";
import { pageEnvelope, successEnvelope } from "@cloudkit/test-utils";
import { describe, expect, test } from "vitest";
import { BASE_URL, createClientHarness, rejectionOf } from "../../__tests__/harness";
import type { DnsRecord } from "../index";
import { DnsRecordType, toScanAcceptItem } from "../index";

function wireRecord(overrides: Record<string, unknown> = {}) {
  return {
    id: "rec-1",
    name: "www.example.com",
    type: "A",
    content: "192.0.2.1",
    proxied: false,
    proxiable: true,
    ttl: 1,
    created_on: "2025-01-01T00:00:00Z",
    modified_on: "2025-01-02T00:00:00Z",
    ...overrides,
  };
}

describe("DNS client", () => {
  test("decodes a record with an open enum type and dates", async () => {
    const { client, http } = createClientHarness();
    http.replyJson(successEnvelope(wireRecord({ type: "BRAND_NEW" })));

    const record = await client.dns.getRecord("zone 1", "rec/1");

    expect(http.requests[0]?.url).toBe(
      `${BASE_URL}zones/zone%201/dns_records/rec%2F1`,
    );
    expect(record.type.value).toBe("BRAND_NEW");
    expect(DnsRecordType.isKnown(record.type)).toBe(false);
    expect(record.created_on.toISOString()).toBe("2025-01-01T00:00:00.000Z");
  });

  test("rejects a blank zone id before any request", async () => {
    const { client, http } = createClientHarness();

    const error = await rejectionOf(
      Promise.resolve().then(() => client.dns.getRecord("  ", "rec-1")),
    );

    expect(error).toBeInstanceOf(ArgumentValidationError);
    if (error instanceof ArgumentValidationError) {
      expect(error.param).toBe("zoneId");
    }
    expect(http.requests).toHaveLength(0);
  });

  describe("listRecords", () => {
    test("puts filters before pagination", async () => {
      const { client, http } = createClientHarness();
      http.replyJson(pageEnvelope([wireRecord()], { page: 2, perPage: 10, totalPages: 4 }));

      const page = await client.dns.listRecords("z1", {
        type: DnsRecordType.A,
        name: "www.example.com",
        content: "   ",
        proxied: false,
        page: 2,
        perPage: 10,
      });

      expect(http.requests[0]?.url).toBe(
        `${BASE_URL}zones/z1/dns_records?type=A&name=www.example.com&proxied=false&page=2&per_page=10`,
      );
      expect(page.items).toHaveLength(1);
      expect(page.pageInfo?.totalPages).toBe(4);
    });

    test("sends no query string without filters", async () => {
      const { client, http } = createClientHarness();
      http.replyJson(pageEnvelope([], { page: 1, totalPages: 0 }));

      const page = await client.dns.listRecords("z1");

      expect(http.requests[0]?.url).toBe(`${BASE_URL}zones/z1/dns_records`);
      expect(page.items).toEqual([]);
    });

    test("listAllRecords follows total_pages", async () => {
      const { client, http } = createClientHarness();
      http
        .replyJson(pageEnvelope([wireRecord({ id: "a" })], { page: 1, perPage: 1, totalPages: 2 }))
        .replyJson(pageEnvelope([wireRecord({ id: "b" })], { page: 2, perPage: 1, totalPages: 2 }));

      const records = await collectAll(
        client.dns.listAllRecords("z1", { type: DnsRecordType.CNAME, perPage: 1 }),
      );

      expect(records.map((record) => record.id)).toEqual(["a", "b"]);
      expect(http.requests.map((request) => request.url)).toEqual([
        `${BASE_URL}zones/z1/dns_records?type=CNAME&page=1&per_page=1`,
        `${BASE_URL}zones/z1/dns_records?type=CNAME&page=2&per_page=1`,
      ]);
    });

    test("findRecordByName returns null when nothing matches", async () => {
      const { client, http } = createClientHarness();
      http.replyJson(pageEnvelope([], { page: 1, totalPages: 0 }));

      const found = await client.dns.findRecordByName("z1", "api.example.com", DnsRecordType.TXT);

      expect(found).toBeNull();
      expect(http.requests[0]?.url).toBe(
        `${BASE_URL}zones/z1/dns_records?name=api.example.com&type=TXT`,
      );
    });
  });

  describe("writes", () => {
    test("createRecord validates and defaults ttl", async () => {
      const { client, http } = createClientHarness();
      http.replyJson(successEnvelope(wireRecord()));

      await client.dns.createRecord("z1", {
        type: "a",
        name: "www.example.com",
        content: "192.0.2.1",
        proxied: true,
      });

      expect(http.requests[0]?.method).toBe("POST");
      expect(http.requests[0]?.body).toEqual({
        type: "A",
        name: "www.example.com",
        content: "192.0.2.1",
        ttl: 1,
        proxied: true,
      });
    });

    test("createRecord rejects an invalid body without a request", async () => {
      const { client, http } = createClientHarness();

      const error = await rejectionOf(
        Promise.resolve().then(() =>
          client.dns.createRecord("z1", { type: "A", name: "", content: "x" }),
        ),
      );

      expect(error).toBeInstanceOf(ArgumentValidationError);
      expect(http.requests).toHaveLength(0);
    });

    test("patchRecord sends only the given fields", async () => {
      const { client, http } = createClientHarness();
      http.replyJson(successEnvelope(wireRecord({ comment: "edge" })));

      const record = await client.dns.patchRecord("z1", "rec-1", { comment: "edge" });

      expect(http.requests[0]?.method).toBe("PATCH");
      expect(http.requests[0]?.rawBody).toBe('{"comment":"edge"}');
      expect(record.comment).toBe("edge");
    });

    test("deleteRecord resolves to undefined", async () => {
      const { client, http } = createClientHarness();
      http.replyJson(successEnvelope({ id: "rec-1" }));

      await expect(client.dns.deleteRecord("z1", "rec-1")).resolves.toBeUndefined();
      expect(http.requests[0]?.method).toBe("DELETE");
    });
  });

  describe("batchRecords", () => {
    test("posts every operation group and fills missing result groups", async () => {
      const { client, http } = createClientHarness();
      http.replyJson(
        successEnvelope({
          deletes: [wireRecord({ id: "rec-2" })],
          patches: [wireRecord({ proxied: true })],
          posts: null,
        }),
      );

      const result = await client.dns.batchRecords("z1", {
        deletes: [{ id: "rec-2" }],
        patches: [{ id: "rec-1", proxied: true }],
        posts: [{ type: DnsRecordType.AAAA, name: "v6.example.com", content: "2001:db8::1" }],
      });

      expect(http.requests[0]?.method).toBe("POST");
      expect(http.requests[0]?.url).toBe(`${BASE_URL}zones/z1/dns_records/batch`);
      expect(http.requests[0]?.body).toEqual({
        deletes: [{ id: "rec-2" }],
        patches: [{ id: "rec-1", proxied: true }],
        posts: [{ type: "AAAA", name: "v6.example.com", content: "2001:db8::1", ttl: 1 }],
      });
      expect(result.deletes.map((record) => record.id)).toEqual(["rec-2"]);
      expect(result.patches[0]?.proxied).toBe(true);
      expect(result.puts).toEqual([]);
      expect(result.posts).toEqual([]);
    });

    test("a put without an id is rejected before sending", async () => {
      const { client, http } = createClientHarness();

      const error = await rejectionOf(
        Promise.resolve().then(() =>
          client.dns.batchRecords("z1", {
            puts: [{ id: "", type: "A", name: "www.example.com", content: "192.0.2.1" }],
          }),
        ),
      );

      expect(error).toBeInstanceOf(ArgumentValidationError);
      if (error instanceof ArgumentValidationError) {
        expect(error.message).toBe(
          "Invalid input.puts.0.id: String must contain at least 1 character(s)",
        );
      }
      expect(http.requests).toHaveLength(0);
    });
  });

  describe("scan review", () => {
    test("triggerScan posts a null body", async () => {
      const { client, http } = createClientHarness();
      http.replyJson(successEnvelope(null));

      await client.dns.triggerScan("z1");

      expect(http.requests[0]?.url).toBe(`${BASE_URL}zones/z1/dns_records/scan/trigger`);
      expect(http.requests[0]?.rawBody).toBe("null");
    });

    test("getScanReview treats a null result as empty", async () => {
      const { client, http } = createClientHarness();
      http.replyJson(successEnvelope(null));

      expect(await client.dns.getScanReview("z1")).toEqual([]);
    });

    test("submits accepted records and rejected ids", async () => {
      const { client, http } = createClientHarness();
      http
        .replyJson(successEnvelope([wireRecord({ settings: { ipv4_only: null, ipv6_only: null } })]))
        .replyJson(successEnvelope({ accepts: 1, rejects: 1 }));

      const [record] = await client.dns.getScanReview("z1");
      const accepts = record ? [toScanAcceptItem(record)] : [];
      const result = await client.dns.submitScanReview("z1", {
        accepts,
        rejects: ["rec-9"],
      });

      expect(result).toEqual({ accepts: 1, rejects: 1 });
      expect(http.requests[1]?.body).toEqual({
        accepts: [
          {
            id: "rec-1",
            type: "A",
            name: "www.example.com",
            content: "192.0.2.1",
            ttl: 1,
            proxied: false,
          },
        ],
        rejects: ["rec-9"],
      });
    });
  });
});

describe("toScanAcceptItem", () => {
  const base: DnsRecord = {
    id: "rec-1",
    name: "mx.example.com",
    type: DnsRecordType.MX,
    content: "mail.example.com",
    ttl: 300,
    created_on: new Date("2025-01-01T00:00:00Z"),
    modified_on: null,
  };

  test("keeps settings that carry a flag", () => {
    const item = toScanAcceptItem({
      ...base,
      priority: 10,
      settings: { ipv4_only: true, ipv6_only: null },
    });

    expect(item).toEqual({
      id: "rec-1",
      type: DnsRecordType.MX,
      name: "mx.example.com",
      content: "mail.example.com",
      ttl: 300,
      priority: 10,
      settings: { ipv4_only: true, ipv6_only: null },
    });
  });

  test("drops settings with no flags", () => {
    const item = toScanAcceptItem({ ...base, settings: {} });

    expect(item.settings).toBeUndefined();
  });
});
