import { describe, expect, test } from "vitest";
import { z } from "zod";
import { defineOpenEnum, OpenEnumValue } from "../open-enum";

const MemberStatus = defineOpenEnum("MemberStatus", {
  Accepted: "accepted",
  Pending: "pending",
  Rejected: "rejected",
});

describe("defineOpenEnum", () => {
  test("exposes named constants with their literals", () => {
    expect(MemberStatus.Accepted.value).toBe("accepted");
    expect(MemberStatus.Pending.toString()).toBe("pending");
    expect(MemberStatus.values().map((status) => status.value)).toEqual([
      "accepted",
      "pending",
      "rejected",
    ]);
  });

  test("rejects empty literals and reserved names", () => {
    expect(() => defineOpenEnum("Broken", { Blank: "" })).toThrow(
      "Broken.Blank must have a non-empty literal value",
    );
    expect(() => defineOpenEnum("Broken", { from: "x" })).toThrow(
      "Broken.from shadows a built-in member",
    );
    expect(() => defineOpenEnum("Broken", { A: "x", B: "X" })).toThrow(
      'Broken defines "X" more than once',
    );
  });
});

describe("OpenEnumValue equality", () => {
  test("differently cased values equal the named constant", () => {
    const upper = MemberStatus.from("ACCEPTED");
    const lower = MemberStatus.from("accepted");

    expect(upper.equals(MemberStatus.Accepted)).toBe(true);
    expect(lower.equals(upper)).toBe(true);
    expect(upper.key).toBe(MemberStatus.Accepted.key);
    expect(MemberStatus.Accepted.equals("Accepted")).toBe(true);
  });

  test("known values canonicalize to the constant's literal", () => {
    const parsed = MemberStatus.from("PENDING");
    expect(parsed).toBe(MemberStatus.Pending);
    expect(JSON.stringify({ status: parsed })).toBe('{"status":"pending"}');
  });

  test("directly constructed values keep their case but compare equal", () => {
    const direct = new OpenEnumValue("MemberStatus", "REJECTED");
    expect(direct.value).toBe("REJECTED");
    expect(direct.equals(MemberStatus.Rejected)).toBe(true);
  });

  test("keys group equal values into one map entry", () => {
    const counts = new Map<string, number>();
    for (const raw of ["Accepted", "ACCEPTED", "accepted", "pending"]) {
      const key = MemberStatus.from(raw).key;
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    expect([...counts.entries()]).toEqual([
      ["accepted", 3],
      ["pending", 1],
    ]);
  });
});

describe("unknown and empty values", () => {
  test("unknown values are preserved verbatim", () => {
    const future = MemberStatus.from("Suspended_Pending_Review");
    expect(future.value).toBe("Suspended_Pending_Review");
    expect(MemberStatus.isKnown(future)).toBe(false);
    expect(future.equals(MemberStatus.Pending)).toBe(false);
    expect(JSON.stringify(future)).toBe('"Suspended_Pending_Review"');
  });

  test("null decodes to the empty instance", () => {
    const empty = MemberStatus.from(null);
    expect(empty).toBe(MemberStatus.empty);
    expect(empty.value).toBe("");
    expect(empty.isEmpty).toBe(true);
    for (const constant of MemberStatus.values()) {
      expect(empty.equals(constant)).toBe(false);
    }
    expect(empty.equals(null)).toBe(true);
  });

  test("isKnown matches case-insensitively", () => {
    expect(MemberStatus.isKnown("Rejected")).toBe(true);
    expect(MemberStatus.isKnown(undefined)).toBe(false);
  });
});

describe("schema", () => {
  const RowSchema = z.object({ status: MemberStatus.schema });

  test("decodes known, unknown, null and missing values", () => {
    expect(RowSchema.parse({ status: "Accepted" }).status).toBe(
      MemberStatus.Accepted,
    );
    expect(RowSchema.parse({ status: "frozen" }).status.value).toBe("frozen");
    expect(RowSchema.parse({ status: null }).status).toBe(MemberStatus.empty);
    expect(RowSchema.parse({}).status).toBe(MemberStatus.empty);
  });

  test("rejects non-string values", () => {
    expect(RowSchema.safeParse({ status: 3 }).success).toBe(false);
  });

  test("decode after serialize returns an equal value", () => {
    const samples = [
      ...MemberStatus.values(),
      MemberStatus.from("Brand-New"),
      MemberStatus.empty,
    ];
    for (const sample of samples) {
      const wire: unknown = JSON.parse(JSON.stringify({ status: sample }));
      const decoded = RowSchema.parse(wire).status;
      expect(decoded.equals(sample)).toBe(true);
      expect(decoded.value).toBe(sample.value);
    }
  });
});
