import type { CursorPaginatedResult } from "@cloudkit/shared/api";
import {
  JsonDocumentSchema,
  OptionalTimestampSchema,
  TimestampSchema,
  buildPath,
  listResult,
  toQueryEntries,
} from "@cloudkit/shared/api";
import { z } from "zod";
import type {
  ApiResource,
  CallOptions,
  CursorNaming,
  CursorParams,
  ListDirection,
  ListRequest,
} from "../http/resource";

// ============================================================================
// Schemas
// ============================================================================

const AuditLogSchema = z
  .object({
    id: z.string(),
    account: z
      .object({ id: z.string(), name: z.string().nullish() })
      .passthrough(),
    action: z
      .object({
        description: z.string().nullish(),
        result: z.string(),
        time: TimestampSchema,
        type: z.string(),
      })
      .passthrough(),
    actor: z
      .object({
        id: z.string().nullish(),
        context: z.string().nullish(),
        email: z.string().nullish(),
        ip_address: z.string().nullish(),
        token_id: z.string().nullish(),
        token_name: z.string().nullish(),
        type: z.string().nullish(),
      })
      .passthrough(),
    raw: z
      .object({
        cf_ray_id: z.string().nullish(),
        method: z.string().nullish(),
        status_code: z.number().int().nullish(),
        uri: z.string().nullish(),
        user_agent: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
    resource: z
      .object({
        id: z.string().nullish(),
        product: z.string().nullish(),
        /** Free-form; its shape depends on the product. */
        request: JsonDocumentSchema.nullish(),
        response: JsonDocumentSchema.nullish(),
        scope: z.string().nullish(),
        type: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
    zone: z
      .object({ id: z.string().nullish(), name: z.string().nullish() })
      .passthrough()
      .nullish(),
  })
  .passthrough();

const UserAuditLogSchema = z
  .object({
    id: z.string(),
    action: z
      .object({ type: z.string(), result: z.boolean().nullish() })
      .passthrough(),
    actor: z
      .object({
        id: z.string().nullish(),
        email: z.string().nullish(),
        ip: z.string().nullish(),
        type: z.string().nullish(),
      })
      .passthrough(),
    owner: z.object({ id: z.string().nullish() }).passthrough().nullish(),
    resource: z
      .object({ id: z.string().nullish(), type: z.string().nullish() })
      .passthrough()
      .nullish(),
    when: OptionalTimestampSchema,
    interface: z.string().nullish(),
    metadata: JsonDocumentSchema.nullish(),
    newValue: JsonDocumentSchema.nullish(),
    oldValue: JsonDocumentSchema.nullish(),
  })
  .passthrough();

// ============================================================================
// Types
// ============================================================================

export type AuditLog = z.infer<typeof AuditLogSchema>;
export type UserAuditLog = z.infer<typeof UserAuditLogSchema>;

type Repeatable<V> = V | readonly V[] | undefined;

/** Each field matches any of its values; its `...Not` twin excludes them. */
type IncludeExclude<K extends string, V> = {
  [P in K]?: Repeatable<V>;
} & {
  [P in K as `${P}Not`]?: Repeatable<V>;
};

export type AccountAuditLogFilters = CursorParams & {
  direction?: ListDirection | undefined;
  before?: Date | undefined;
  since?: Date | undefined;
} & IncludeExclude<
    | "id"
    | "actorEmail"
    | "actorId"
    | "actorIpAddress"
    | "actorTokenId"
    | "actorTokenName"
    | "actorContext"
    | "actorType"
    | "actionType"
    | "actionResult"
    | "resourceId"
    | "resourceProduct"
    | "resourceType"
    | "resourceScope"
    | "zoneId"
    | "zoneName"
    | "rawCfRayId"
    | "rawMethod"
    | "rawUri"
    | "accountName",
    string
  > &
  IncludeExclude<"rawStatusCode", number>;

export interface UserAuditLogFilters extends CursorParams {
  direction?: ListDirection | undefined;
  before?: Date | undefined;
  since?: Date | undefined;
  id?: string | undefined;
  actorEmail?: string | undefined;
  actorIp?: string | undefined;
  actionType?: string | undefined;
  zoneName?: string | undefined;
}

export interface AuditLogsClient {
  listAccountAuditLogs: (
    accountId: string,
    filters?: AccountAuditLogFilters,
    options?: CallOptions,
  ) => Promise<CursorPaginatedResult<AuditLog>>;
  listAllAccountAuditLogs: (
    accountId: string,
    filters?: Omit<AccountAuditLogFilters, "cursor">,
    options?: CallOptions,
  ) => AsyncGenerator<AuditLog, void, undefined>;
  listUserAuditLogs: (
    filters?: UserAuditLogFilters,
    options?: CallOptions,
  ) => Promise<CursorPaginatedResult<UserAuditLog>>;
  listAllUserAuditLogs: (
    filters?: Omit<UserAuditLogFilters, "cursor">,
    options?: CallOptions,
  ) => AsyncGenerator<UserAuditLog, void, undefined>;
}

export interface AuditLogsClientOptions {
  resource: ApiResource;
}

// ============================================================================
// Client
// ============================================================================

/** The account endpoint calls its page size `limit`. */
const ACCOUNT_NAMING: CursorNaming = { perPageParam: "limit" };

function accountList(
  accountId: string,
  filters: Omit<AccountAuditLogFilters, "cursor" | "perPage">,
): ListRequest<AuditLog> {
  return {
    path: buildPath("accounts/{accountId}/logs/audit", { accountId }),
    query: toQueryEntries(filters, { naming: "snake" }),
    schema: listResult(AuditLogSchema),
  };
}

function userList(
  filters: Omit<UserAuditLogFilters, "cursor" | "perPage">,
): ListRequest<UserAuditLog> {
  return {
    path: "user/audit_logs",
    query: toQueryEntries(filters, { naming: "dot" }),
    schema: listResult(UserAuditLogSchema),
  };
}

export function createAuditLogsClient(
  options: AuditLogsClientOptions,
): AuditLogsClient {
  const { resource } = options;

  return {
    listAccountAuditLogs: (accountId, filters = {}, callOptions) => {
      const { cursor, perPage, ...domain } = filters;
      return resource.getCursorPage(
        accountList(accountId, domain),
        { cursor, perPage, ...ACCOUNT_NAMING },
        callOptions,
      );
    },

    listAllAccountAuditLogs: (accountId, filters = {}, callOptions) => {
      const { perPage, ...domain } = filters;
      return resource.paginateCursor(
        accountList(accountId, domain),
        { perPage, ...ACCOUNT_NAMING },
        callOptions,
      );
    },

    listUserAuditLogs: (filters = {}, callOptions) => {
      const { cursor, perPage, ...domain } = filters;
      return resource.getCursorPage(
        userList(domain),
        { cursor, perPage },
        callOptions,
      );
    },

    listAllUserAuditLogs: (filters = {}, callOptions) => {
      const { perPage, ...domain } = filters;
      return resource.paginateCursor(userList(domain), { perPage }, callOptions);
    },
  };
}
