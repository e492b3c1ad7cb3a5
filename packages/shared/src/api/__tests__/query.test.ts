import { describe, expect, test } from "vitest";
import { ArgumentValidationError } from "../../errors/factory";
import { defineOpenEnum } from "../open-enum";
import {
  buildPath,
  buildQueryString,
  compactHeaders,
  toQueryEntries,
  toWireName,
} from "../query";

const Direction = defineOpenEnum("Direction", { Asc: "asc", Desc: "desc" });

interface AuditFilters {
  actorEmail?: string[];
  actorEmailNot?: string[];
  since?: Date;
  rawStatusCode?: number[];
  direction?: ReturnType<typeof Direction.from>;
  hideUserLogs?: boolean;
  zoneName?: string | null;
}

describe("buildPath", () => {
  test("substitutes and encodes each placeholder", () => {
    expect(
      buildPath("zones/{zoneId}/workers/routes/{routeId}", {
        zoneId: "zone-1",
        routeId: "route-2",
      }),
    ).toBe("zones/zone-1/workers/routes/route-2");
  });

  test("encodes reserved characters in identifiers", () => {
    const path = buildPath("accounts/{accountId}/r2/buckets/{bucketName}", {
      accountId: "acc",
      bucketName: "a/b+c&d%e#f g=h",
    });

    expect(path).toBe("accounts/acc/r2/buckets/a%2Fb%2Bc%26d%25e%23f%20g%3Dh");
    expect(path.endsWith("a/b+c&d%e#f g=h")).toBe(false);
  });

  test("names the missing parameter", () => {
    expect(() => buildPath("zones/{zoneId}", {})).toThrow(
      ArgumentValidationError,
    );
    expect(() => buildPath("zones/{zoneId}", { zoneId: "   " })).toThrow(
      "Argument is required: zoneId",
    );
  });

  test("rejects dot segments that would rewrite the path", () => {
    for (const bucketName of [".", ".."]) {
      let caught: unknown;
      try {
        buildPath("accounts/{accountId}/r2/buckets/{bucketName}", {
          accountId: "acc",
          bucketName,
        });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ArgumentValidationError);
      if (caught instanceof ArgumentValidationError) {
        expect(caught.code).toBe("ARGUMENT_INVALID");
        expect(caught.param).toBe("bucketName");
        expect(caught.message).toBe("bucketName cannot be a relative path segment");
      }
    }
  });

  test("dots inside a value are kept", () => {
    expect(buildPath("zones/{zoneId}/dns_records/{recordId}", {
      zoneId: "z1",
      recordId: "...",
    })).toBe("zones/z1/dns_records/...");
  });
});

describe("toWireName", () => {
  test("snake and dot conventions", () => {
    expect(toWireName("actorIpAddress", "snake")).toBe("actor_ip_address");
    expect(toWireName("actorEmail", "dot")).toBe("actor.email");
    expect(toWireName("perPage", "snake")).toBe("per_page");
    expect(toWireName("actorIPAddress", "snake")).toBe("actor_ip_address");
    expect(toWireName("id", "dot")).toBe("id");
  });
});

describe("toQueryEntries", () => {
  test("a filter object with only absent fields yields no entries", () => {
    const filters: AuditFilters = { zoneName: null };
    expect(toQueryEntries(filters)).toEqual([]);
    expect(buildQueryString(toQueryEntries(filters))).toBe("");
    expect(buildQueryString(toQueryEntries<AuditFilters>(undefined))).toBe("");
  });

  test("arrays repeat the key in order and Not fields map to .not", () => {
    const filters: AuditFilters = {
      actorEmail: ["b@example.com", "a@example.com"],
      actorEmailNot: ["c@example.com"],
      rawStatusCode: [200, 404],
    };

    expect(toQueryEntries(filters)).toEqual([
      ["actor_email", "b@example.com"],
      ["actor_email", "a@example.com"],
      ["actor_email.not", "c@example.com"],
      ["raw_status_code", "200"],
      ["raw_status_code", "404"],
    ]);
  });

  test("formats dates, booleans and open enums canonically", () => {
    const filters: AuditFilters = {
      since: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
      hideUserLogs: false,
      direction: Direction.from("DESC"),
    };

    expect(toQueryEntries(filters)).toEqual([
      ["since", "2024-01-02T03:04:05.000Z"],
      ["hide_user_logs", "false"],
      ["direction", "desc"],
    ]);
  });

  test("dot naming and aliases", () => {
    const filters = { actorEmail: "ops@example.com", zoneName: "example.com", id: "x" };

    expect(
      toQueryEntries(filters, { naming: "dot", aliases: { id: "audit_id" } }),
    ).toEqual([
      ["actor.email", "ops@example.com"],
      ["zone.name", "example.com"],
      ["audit_id", "x"],
    ]);
  });

  test("blank strings and empty enums are omitted", () => {
    expect(
      toQueryEntries({ name: "  ", direction: Direction.from(null) }),
    ).toEqual([]);
  });

  test("rejects non-finite numbers", () => {
    expect(() => toQueryEntries({ limit: Number.NaN })).toThrow(
      "Filter limit must be a finite number",
    );
  });
});

describe("buildQueryString", () => {
  test("encodes keys and values", () => {
    expect(
      buildQueryString([
        ["name", "a&b=c"],
        ["actor.email", "x+y@example.com"],
      ]),
    ).toBe("?name=a%26b%3Dc&actor.email=x%2By%40example.com");
  });

  test("appends pagination after domain filters", () => {
    expect(
      buildQueryString([["type", "A"]], [["page", "2"], ["per_page", "50"]]),
    ).toBe("?type=A&page=2&per_page=50");
  });

  test("pagination alone never produces ?&", () => {
    expect(buildQueryString([], [["cursor", "abc=="]])).toBe(
      "?cursor=abc%3D%3D",
    );
  });
});

describe("compactHeaders", () => {
  test("drops absent and empty headers", () => {
    expect(
      compactHeaders({
        "cf-r2-jurisdiction": undefined,
        "cf-r2-storage-class": "InfrequentAccess",
        "x-empty": "",
        "x-null": null,
        "x-direction": Direction.Asc,
        "x-empty-enum": Direction.empty,
      }),
    ).toEqual({
      "cf-r2-storage-class": "InfrequentAccess",
      "x-direction": "asc",
    });
  });
});
