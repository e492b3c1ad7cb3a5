/**
 * API response envelope.
 *
 * Every endpoint wraps its payload the same way:
 *
 * ```json
 * { "success": true, "errors": [], "messages": [], "result": { ... } }
 * ```
 *
 * List endpoints add pagination metadata under `result_info`, or under
 * `cursor_result_info` on newer API generations.
 */

import { z } from "zod";
import { ApiBusinessFailureError, DecodeFailureError } from "../errors/factory";
import type { ApiErrorEntry } from "../errors/types";
import type { ResultSchema } from "./schemas";

// ============================================================================
// Wire Schemas
// ============================================================================

export const ApiErrorEntrySchema: z.ZodType<ApiErrorEntry, z.ZodTypeDef, unknown> =
  z.object({
    code: z.number().int(),
    message: z.string(),
  });

export const ResultInfoSchema = z
  .object({
    page: z.number().int().nullish(),
    per_page: z.number().int().nullish(),
    count: z.number().int().nullish(),
    total_count: z.number().int().nullish(),
    total_pages: z.number().int().nullish(),
    cursor: z.string().nullish(),
  })
  .passthrough();

export type ResultInfo = z.infer<typeof ResultInfoSchema>;

export const EnvelopeSchema = z
  .object({
    success: z.boolean(),
    errors: z
      .array(ApiErrorEntrySchema)
      .nullish()
      .transform((errors) => errors ?? []),
    messages: z
      .array(z.unknown())
      .nullish()
      .transform((messages) => messages ?? []),
    result: z.unknown().optional(),
    result_info: ResultInfoSchema.nullish(),
    cursor_result_info: ResultInfoSchema.nullish(),
  })
  .passthrough();

export type WireEnvelope = z.infer<typeof EnvelopeSchema>;

// ============================================================================
// Decoded Envelope
// ============================================================================

export interface DecodedEnvelope<T> {
  result: T;
  messages: unknown[];
  resultInfo: ResultInfo | null;
  cursorResultInfo: ResultInfo | null;
}

// ============================================================================
// Type Guards
// ============================================================================

/** Check whether a parsed JSON value has the envelope shape. */
export function isEnvelope(value: unknown): value is WireEnvelope {
  return EnvelopeSchema.safeParse(value).success;
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Decode an already-parsed JSON value.
 *
 * @throws DecodeFailureError when the value is not an envelope or the
 *   result does not match `resultSchema`
 * @throws ApiBusinessFailureError when the envelope reports `success: false`
 */
export function parseEnvelope<T>(
  json: unknown,
  resultSchema: ResultSchema<T>,
): DecodedEnvelope<T> {
  const envelope = EnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new DecodeFailureError("DECODE_INVALID_ENVELOPE", {
      issues: envelope.error.issues,
    });
  }

  const { success, errors, messages, result } = envelope.data;
  if (!success) {
    throw new ApiBusinessFailureError(errors);
  }

  const parsed = resultSchema.safeParse(result);
  if (!parsed.success) {
    throw new DecodeFailureError("DECODE_INVALID_RESULT", {
      issues: parsed.error.issues,
    });
  }

  return {
    result: parsed.data,
    messages,
    resultInfo: envelope.data.result_info ?? null,
    cursorResultInfo: envelope.data.cursor_result_info ?? null,
  };
}

/** Decode a raw response body. See {@link parseEnvelope}. */
export function decodeEnvelope<T>(
  body: string,
  resultSchema: ResultSchema<T>,
): DecodedEnvelope<T> {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new DecodeFailureError("DECODE_INVALID_JSON", { body, cause: error });
  }
  return parseEnvelope(json, resultSchema);
}
