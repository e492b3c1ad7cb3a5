import type {
  CursorPaginatedResult,
  OpenEnumStatics,
  DecodedEnvelope,
  PagePaginatedResult,
  QueryEntry,
  ResultSchema,
} from "@cloudkit/shared/api";
import {
  OpenEnumValue,
  buildQueryString,
  cursorStrategy,
  pageStrategy,
  paginate,
  toCursorInfo,
  toPageInfo,
} from "@cloudkit/shared/api";
import { createArgumentError } from "@cloudkit/shared/errors";
import { z } from "zod";
import type { ApiTransport, HttpMethod } from "./transport";

export interface CallOptions {
  signal?: AbortSignal | undefined;
}

/** A list endpoint: where it lives, its domain filters and its item shape. */
export interface ListRequest<T> {
  /** Encoded path without a query string. */
  path: string;
  query?: QueryEntry[];
  headers?: Record<string, string>;
  /** Decodes `result` into the page's items. */
  schema: ResultSchema<T[]>;
}

export type ListDirection = "asc" | "desc";

export interface PageParams {
  page?: number | undefined;
  perPage?: number | undefined;
}

export interface CursorParams {
  cursor?: string | null | undefined;
  perPage?: number | undefined;
}

export interface CursorNaming {
  cursorParam?: string;
  perPageParam?: string;
}

export interface ApiResource {
  request<T>(
    method: HttpMethod,
    path: string,
    schema: ResultSchema<T>,
    options?: CallOptions & { body?: unknown; headers?: Record<string, string> },
  ): Promise<T>;
  get<T>(path: string, schema: ResultSchema<T>, options?: CallOptions): Promise<T>;
  post<T>(
    path: string,
    body: unknown,
    schema: ResultSchema<T>,
    options?: CallOptions,
  ): Promise<T>;
  put<T>(
    path: string,
    body: unknown,
    schema: ResultSchema<T>,
    options?: CallOptions,
  ): Promise<T>;
  patch<T>(
    path: string,
    body: unknown,
    schema: ResultSchema<T>,
    options?: CallOptions,
  ): Promise<T>;
  del<T>(path: string, schema: ResultSchema<T>, options?: CallOptions): Promise<T>;
  getPage<T>(
    list: ListRequest<T>,
    params?: PageParams,
    options?: CallOptions,
  ): Promise<PagePaginatedResult<T>>;
  getCursorPage<T>(
    list: ListRequest<T>,
    params?: CursorParams & CursorNaming,
    options?: CallOptions,
  ): Promise<CursorPaginatedResult<T>>;
  paginatePages<T>(
    list: ListRequest<T>,
    params?: Pick<PageParams, "perPage">,
    options?: CallOptions,
  ): AsyncGenerator<T, void, undefined>;
  paginateCursor<T>(
    list: ListRequest<T>,
    params?: Pick<CursorParams, "perPage"> & CursorNaming,
    options?: CallOptions,
  ): AsyncGenerator<T, void, undefined>;
}

/**
 * Validate a caller-supplied request object before any network call.
 *
 * @throws ArgumentValidationError naming `param`
 */
export function parseInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  param: string,
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw createArgumentError(param, parsed.error.issues);
  }
  return parsed.data;
}

/** Request-body field accepting an enum constant or any raw literal. */
export function openEnumInput<N extends string>(
  openEnum: OpenEnumStatics<N>,
): z.ZodType<OpenEnumValue<N>, z.ZodTypeDef, OpenEnumValue<N> | string> {
  return z
    .union([
      z.custom<OpenEnumValue<N>>((value) => value instanceof OpenEnumValue),
      z.string().min(1),
    ])
    .transform((value) => openEnum.from(value));
}

function pageEntries(params: PageParams): QueryEntry[] {
  const entries: QueryEntry[] = [];
  if (params.page !== undefined) entries.push(["page", String(params.page)]);
  if (params.perPage !== undefined) entries.push(["per_page", String(params.perPage)]);
  return entries;
}

function cursorEntries(params: CursorParams & CursorNaming): QueryEntry[] {
  const entries: QueryEntry[] = [];
  if (params.perPage !== undefined) {
    entries.push([params.perPageParam ?? "per_page", String(params.perPage)]);
  }
  if (params.cursor) {
    entries.push([params.cursorParam ?? "cursor", params.cursor]);
  }
  return entries;
}

/** Request helpers over a transport, shared by every resource client. */
export function createApiResource(transport: ApiTransport): ApiResource {
  const request: ApiResource["request"] = async (method, path, schema, options = {}) => {
    const envelope = await transport.send(
      {
        method,
        path,
        body: options.body,
        ...(options.headers && { headers: options.headers }),
        signal: options.signal,
      },
      schema,
    );
    return envelope.result;
  };

  const fetchList = <T>(
    list: ListRequest<T>,
    pagination: QueryEntry[],
    signal: AbortSignal | undefined,
  ): Promise<DecodedEnvelope<T[]>> =>
    transport.send(
      {
        method: "GET",
        path: `${list.path}${buildQueryString(list.query ?? [], pagination)}`,
        ...(list.headers && { headers: list.headers }),
        signal,
      },
      list.schema,
    );

  return {
    request,
    get: (path, schema, options) => request("GET", path, schema, options),
    post: (path, body, schema, options) =>
      request("POST", path, schema, { ...options, body }),
    put: (path, body, schema, options) =>
      request("PUT", path, schema, { ...options, body }),
    patch: (path, body, schema, options) =>
      request("PATCH", path, schema, { ...options, body }),
    del: (path, schema, options) => request("DELETE", path, schema, options),

    getPage: async (list, params = {}, options = {}) => {
      const envelope = await fetchList(list, pageEntries(params), options.signal);
      return { items: envelope.result, pageInfo: toPageInfo(envelope.resultInfo) };
    },

    getCursorPage: async (list, params = {}, options = {}) => {
      const envelope = await fetchList(list, cursorEntries(params), options.signal);
      return { items: envelope.result, cursorInfo: toCursorInfo(envelope) };
    },

    paginatePages: (list, params = {}, options = {}) =>
      paginate(
        pageStrategy({ perPage: params.perPage }),
        async (pagination, signal) => {
          const envelope = await fetchList(list, pagination, signal);
          return { items: envelope.result, info: toPageInfo(envelope.resultInfo) };
        },
        { signal: options.signal },
      ),

    paginateCursor: (list, params = {}, options = {}) =>
      paginate(
        cursorStrategy({
          perPage: params.perPage,
          ...(params.cursorParam !== undefined ? { cursorParam: params.cursorParam } : {}),
          ...(params.perPageParam !== undefined
            ? { perPageParam: params.perPageParam }
            : {}),
        }),
        async (pagination, signal) => {
          const envelope = await fetchList(list, pagination, signal);
          return { items: envelope.result, info: toCursorInfo(envelope) };
        },
        { signal: options.signal },
      ),
  };
}
