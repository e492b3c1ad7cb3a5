/**
 * Pagination engine.
 *
 * The API pages lists in one of two ways: by page number
 * (`page` / `per_page`, with `total_pages` in `result_info`) or by opaque
 * cursor. Both are modelled as a {@link PaginationStrategy} and driven by
 * the same lazy {@link paginate} generator, which requests a page only once
 * every item of the previous page has been consumed.
 */

import type { ResultInfo } from "./envelope";
import type { QueryEntry } from "./query";

// ============================================================================
// Page Metadata
// ============================================================================

export interface PageInfo {
  page: number;
  perPage: number;
  count: number;
  totalCount: number;
  totalPages: number;
}

export interface CursorInfo {
  /** Cursor for the next page; `null` on the last page. */
  cursor: string | null;
  count: number;
  perPage: number;
}

export interface PagePaginatedResult<T> {
  items: T[];
  pageInfo: PageInfo | null;
}

export interface CursorPaginatedResult<T> {
  items: T[];
  cursorInfo: CursorInfo | null;
}

/** Map `result_info` onto page metadata. */
export function toPageInfo(info: ResultInfo | null | undefined): PageInfo | null {
  if (!info) {
    return null;
  }
  const perPage = info.per_page ?? 0;
  const totalCount = info.total_count ?? 0;
  const totalPages =
    info.total_pages ?? (perPage > 0 ? Math.ceil(totalCount / perPage) : 0);
  return {
    page: info.page ?? 1,
    perPage,
    count: info.count ?? 0,
    totalCount,
    totalPages,
  };
}

/**
 * Map cursor metadata, preferring `cursor_result_info` over `result_info`
 * when the envelope carries both.
 */
export function toCursorInfo(envelope: {
  resultInfo: ResultInfo | null;
  cursorResultInfo: ResultInfo | null;
}): CursorInfo | null {
  const info = envelope.cursorResultInfo ?? envelope.resultInfo;
  if (!info) {
    return null;
  }
  return {
    cursor: info.cursor ?? null,
    count: info.count ?? 0,
    perPage: info.per_page ?? 0,
  };
}

// ============================================================================
// Strategies
// ============================================================================

export interface FetchedPage<T, I> {
  items: T[];
  info: I | null;
}

/**
 * One way of walking a paginated list.
 *
 * `params` produces the pagination query entries for the current state;
 * `advance` returns the next state, or `null` when the last page was seen.
 */
export interface PaginationStrategy<S, I> {
  initialState(): S;
  params(state: S): QueryEntry[];
  advance(state: S, page: FetchedPage<unknown, I>): S | null;
}

export interface PageState {
  page: number;
}

export interface CursorState {
  cursor: string | null;
}

export interface PageStrategyOptions {
  perPage?: number | undefined;
  /** Page to start from. Defaults to 1. */
  startPage?: number | undefined;
  pageParam?: string;
  perPageParam?: string;
}

export interface CursorStrategyOptions {
  perPage?: number | undefined;
  /** Cursor to resume from. Omitted from the first request when absent. */
  startCursor?: string | null | undefined;
  cursorParam?: string;
  perPageParam?: string;
}

export function pageStrategy(
  options: PageStrategyOptions = {},
): PaginationStrategy<PageState, PageInfo> {
  const pageParam = options.pageParam ?? "page";
  const perPageParam = options.perPageParam ?? "per_page";
  return {
    initialState: () => ({ page: options.startPage ?? 1 }),
    params: (state) => {
      const entries: QueryEntry[] = [[pageParam, String(state.page)]];
      if (options.perPage !== undefined) {
        entries.push([perPageParam, String(options.perPage)]);
      }
      return entries;
    },
    advance: (state, page) => {
      if (!page.info || page.items.length === 0) {
        return null;
      }
      if (state.page >= page.info.totalPages) {
        return null;
      }
      return { page: state.page + 1 };
    },
  };
}

export function cursorStrategy(
  options: CursorStrategyOptions = {},
): PaginationStrategy<CursorState, CursorInfo> {
  const cursorParam = options.cursorParam ?? "cursor";
  const perPageParam = options.perPageParam ?? "per_page";
  return {
    initialState: () => ({ cursor: options.startCursor ?? null }),
    params: (state) => {
      const entries: QueryEntry[] = [];
      if (options.perPage !== undefined) {
        entries.push([perPageParam, String(options.perPage)]);
      }
      if (state.cursor) {
        entries.push([cursorParam, state.cursor]);
      }
      return entries;
    },
    advance: (_state, page) => {
      const cursor = page.info?.cursor;
      return cursor ? { cursor } : null;
    },
  };
}

// ============================================================================
// Iteration
// ============================================================================

export type PageFetcher<T, I> = (
  params: QueryEntry[],
  signal?: AbortSignal,
) => Promise<FetchedPage<T, I>>;

export interface PaginateOptions {
  signal?: AbortSignal | undefined;
}

/**
 * Lazily yield every item across all pages.
 *
 * Errors from `fetchPage` propagate out of the pending `next()` call. Once
 * the consumer stops pulling, or the signal aborts, no further page is
 * requested.
 */
export async function* paginate<T, S, I>(
  strategy: PaginationStrategy<S, I>,
  fetchPage: PageFetcher<T, I>,
  options: PaginateOptions = {},
): AsyncGenerator<T, void, undefined> {
  let state: S | null = strategy.initialState();
  while (state !== null) {
    options.signal?.throwIfAborted();
    const page: FetchedPage<T, I> = await fetchPage(
      strategy.params(state),
      options.signal,
    );
    for (const item of page.items) {
      yield item;
    }
    state = strategy.advance(state, page);
  }
}

/** Drain an async sequence into an array. */
export async function collectAll<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
