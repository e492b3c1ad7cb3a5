import { z } from "zod";

/** A zod schema that decodes some wire value into `T`. */
export type ResultSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

// ============================================================================
// Timestamps
// ============================================================================

const SPACE_SEPARATED = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2}(?:\.\d+)?)(.*)$/;
const SHORT_OFFSET = /\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?[+-]\d{2}$/;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const HAS_ZONE = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Normalize the timestamp spellings the API emits into ISO-8601.
 *
 * Besides plain ISO strings, some endpoints send `2025-12-07 05:59:36.458083+00`
 * (space separator, hour-only offset). Timestamps without a zone are UTC.
 */
export function normalizeTimestamp(raw: string): string {
  let value = raw.trim();
  const spaced = SPACE_SEPARATED.exec(value);
  if (spaced) {
    value = `${spaced[1]}T${spaced[2]}${spaced[3] ?? ""}`;
  }
  if (SHORT_OFFSET.test(value) && !HAS_ZONE.test(value)) {
    value = `${value}:00`;
  }
  if (!HAS_ZONE.test(value) && !DATE_ONLY.test(value)) {
    value = `${value}Z`;
  }
  return value;
}

export const TimestampSchema = z.string().transform((raw, ctx) => {
  const date = new Date(normalizeTimestamp(raw));
  if (Number.isNaN(date.getTime())) {
    ctx.addIssue({
      code: z.ZodIssueCode.invalid_date,
      message: `Unparseable timestamp: ${raw}`,
    });
    return z.NEVER;
  }
  return date;
});

/** Absent, null and empty timestamps decode to `null`. */
export const OptionalTimestampSchema = z
  .union([TimestampSchema, z.literal(""), z.null(), z.undefined()])
  .transform((value) => (value instanceof Date ? value : null));

// ============================================================================
// Result shapes
// ============================================================================

/** A list result; an absent or null `result` decodes to an empty list. */
export function listResult<T>(item: ResultSchema<T>): ResultSchema<T[]> {
  return z
    .array(item)
    .nullish()
    .transform((items) => items ?? []);
}

/** For operations with no payload; any `result`, including none, decodes to `undefined`. */
export const voidResult: ResultSchema<void> = z.unknown().transform(() => undefined);
