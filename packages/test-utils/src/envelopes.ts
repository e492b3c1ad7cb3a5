/**
 * Builders for API response envelopes, for use as mock fetch bodies.
 */

import type { ApiErrorEntry } from "@cloudkit/shared/errors";

export interface WireEnvelopeFixture {
  success: boolean;
  errors: ApiErrorEntry[];
  messages: unknown[];
  result: unknown;
  result_info?: Record<string, unknown>;
  cursor_result_info?: Record<string, unknown>;
}

/** Wrap a result in a successful envelope. */
export function successEnvelope(
  result: unknown,
  messages: unknown[] = [],
): WireEnvelopeFixture {
  return { success: true, errors: [], messages, result };
}

/** A failing envelope carrying the given errors in order. */
export function failureEnvelope(
  errors: ApiErrorEntry[] = [{ code: 1000, message: "Request failed" }],
): WireEnvelopeFixture {
  return { success: false, errors, messages: [], result: null };
}

export interface PageEnvelopeOptions {
  page: number;
  perPage?: number;
  totalPages: number;
  /** Defaults to `totalPages * perPage`. */
  totalCount?: number;
}

/** One page of a page-paginated list. */
export function pageEnvelope<T>(
  items: T[],
  options: PageEnvelopeOptions,
): WireEnvelopeFixture {
  const perPage = options.perPage ?? 20;
  return {
    ...successEnvelope(items),
    result_info: {
      page: options.page,
      per_page: perPage,
      count: items.length,
      total_count: options.totalCount ?? options.totalPages * perPage,
      total_pages: options.totalPages,
    },
  };
}

export interface CursorEnvelopeOptions {
  cursor: string | null;
  perPage?: number;
  /** Which metadata key carries the cursor. Defaults to `result_info`. */
  infoKey?: "result_info" | "cursor_result_info";
}

/** One page of a cursor-paginated list. `result` may wrap the items. */
export function cursorEnvelope(
  result: unknown,
  count: number,
  options: CursorEnvelopeOptions,
): WireEnvelopeFixture {
  const info = {
    count,
    per_page: options.perPage ?? 20,
    cursor: options.cursor,
  };
  const envelope = successEnvelope(result);
  if (options.infoKey === "cursor_result_info") {
    envelope.cursor_result_info = info;
  } else {
    envelope.result_info = info;
  }
  return envelope;
}
