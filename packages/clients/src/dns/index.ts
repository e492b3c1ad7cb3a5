import type { OpenEnumOf, PagePaginatedResult } from "@cloudkit/shared/api";
import {
  OptionalTimestampSchema,
  TimestampSchema,
  buildPath,
  defineOpenEnum,
  listResult,
  toQueryEntries,
  voidResult,
} from "@cloudkit/shared/api";
import { z } from "zod";
import type {
  ApiResource,
  CallOptions,
  ListDirection,
  ListRequest,
  PageParams,
} from "../http/resource";
import { openEnumInput, parseInput } from "../http/resource";

// ============================================================================
// Enums
// ============================================================================

export const DnsRecordType = defineOpenEnum("DnsRecordType", {
  A: "A",
  AAAA: "AAAA",
  CNAME: "CNAME",
  MX: "MX",
  TXT: "TXT",
  NS: "NS",
  SOA: "SOA",
  PTR: "PTR",
  SRV: "SRV",
  HTTPS: "HTTPS",
  SVCB: "SVCB",
  URI: "URI",
  NAPTR: "NAPTR",
  CAA: "CAA",
  DS: "DS",
  DNSKEY: "DNSKEY",
  TLSA: "TLSA",
  SSHFP: "SSHFP",
  CERT: "CERT",
  SMIMEA: "SMIMEA",
});
export type DnsRecordTypeValue = OpenEnumOf<typeof DnsRecordType>;

// ============================================================================
// Schemas
// ============================================================================

const DnsRecordSettingsSchema = z
  .object({
    ipv4_only: z.boolean().nullish(),
    ipv6_only: z.boolean().nullish(),
  })
  .passthrough();

const DnsRecordSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    type: DnsRecordType.schema,
    content: z.string(),
    proxied: z.boolean().nullish(),
    proxiable: z.boolean().nullish(),
    ttl: z.number().int(),
    created_on: TimestampSchema,
    modified_on: OptionalTimestampSchema,
    comment: z.string().nullish(),
    tags: z.array(z.string()).nullish(),
    priority: z.number().int().nullish(),
    meta: z
      .object({
        auto_added: z.boolean().nullish(),
        source: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
    settings: DnsRecordSettingsSchema.nullish(),
  })
  .passthrough();

const DnsRecordInputSchema = z.object({
  type: openEnumInput(DnsRecordType),
  name: z.string().trim().min(1),
  content: z.string().min(1),
  /** 1 means automatic. */
  ttl: z.number().int().min(1).default(1),
  proxied: z.boolean().optional(),
  comment: z.string().optional(),
  tags: z.array(z.string()).optional(),
  priority: z.number().int().min(0).optional(),
  settings: DnsRecordSettingsSchema.optional(),
});

const PatchDnsRecordInputSchema = DnsRecordInputSchema.partial();

const DnsScanAcceptItemSchema = z.object({
  id: z.string().min(1),
  type: openEnumInput(DnsRecordType),
  name: z.string().min(1),
  content: z.string(),
  ttl: z.number().int().min(1).default(1),
  proxied: z.boolean().nullish(),
  comment: z.string().nullish(),
  tags: z.array(z.string()).nullish(),
  priority: z.number().int().nullish(),
  settings: DnsRecordSettingsSchema.nullish(),
});

const DnsScanReviewInputSchema = z.object({
  accepts: z.array(DnsScanAcceptItemSchema).default([]),
  rejects: z.array(z.string().min(1)).default([]),
});

const DnsScanReviewResultSchema = z
  .object({
    accepts: z.number().int(),
    rejects: z.number().int(),
  })
  .passthrough();

const RecordIdSchema = z.object({ id: z.string().trim().min(1) });

/** Deletes run first, then patches, puts and posts, in one transaction. */
const DnsBatchInputSchema = z.object({
  deletes: z.array(RecordIdSchema).optional(),
  patches: z.array(PatchDnsRecordInputSchema.merge(RecordIdSchema)).optional(),
  puts: z.array(DnsRecordInputSchema.merge(RecordIdSchema)).optional(),
  posts: z.array(DnsRecordInputSchema).optional(),
});

const batchRecords = z
  .array(DnsRecordSchema)
  .nullish()
  .transform((records) => records ?? []);

const DnsBatchResultSchema = z
  .object({
    deletes: batchRecords,
    patches: batchRecords,
    puts: batchRecords,
    posts: batchRecords,
  })
  .passthrough();

// ============================================================================
// Types
// ============================================================================

export type DnsRecord = z.infer<typeof DnsRecordSchema>;
export type DnsRecordInput = z.input<typeof DnsRecordInputSchema>;
export type PatchDnsRecordInput = z.input<typeof PatchDnsRecordInputSchema>;
export type DnsScanAcceptItem = z.input<typeof DnsScanAcceptItemSchema>;
export type DnsScanReviewInput = z.input<typeof DnsScanReviewInputSchema>;
export type DnsScanReviewResult = z.infer<typeof DnsScanReviewResultSchema>;
export type DnsBatchInput = z.input<typeof DnsBatchInputSchema>;
export type DnsBatchResult = z.infer<typeof DnsBatchResultSchema>;

export interface ListDnsRecordsFilters extends PageParams {
  type?: DnsRecordTypeValue | undefined;
  name?: string | undefined;
  content?: string | undefined;
  proxied?: boolean | undefined;
  order?: string | undefined;
  direction?: ListDirection | undefined;
}

export interface DnsClient {
  getRecord: (
    zoneId: string,
    recordId: string,
    options?: CallOptions,
  ) => Promise<DnsRecord>;
  listRecords: (
    zoneId: string,
    filters?: ListDnsRecordsFilters,
    options?: CallOptions,
  ) => Promise<PagePaginatedResult<DnsRecord>>;
  listAllRecords: (
    zoneId: string,
    filters?: Omit<ListDnsRecordsFilters, "page">,
    options?: CallOptions,
  ) => AsyncGenerator<DnsRecord, void, undefined>;
  findRecordByName: (
    zoneId: string,
    name: string,
    type?: DnsRecordTypeValue,
    options?: CallOptions,
  ) => Promise<DnsRecord | null>;
  createRecord: (
    zoneId: string,
    input: DnsRecordInput,
    options?: CallOptions,
  ) => Promise<DnsRecord>;
  updateRecord: (
    zoneId: string,
    recordId: string,
    input: DnsRecordInput,
    options?: CallOptions,
  ) => Promise<DnsRecord>;
  patchRecord: (
    zoneId: string,
    recordId: string,
    input: PatchDnsRecordInput,
    options?: CallOptions,
  ) => Promise<DnsRecord>;
  deleteRecord: (
    zoneId: string,
    recordId: string,
    options?: CallOptions,
  ) => Promise<void>;
  triggerScan: (zoneId: string, options?: CallOptions) => Promise<void>;
  getScanReview: (zoneId: string, options?: CallOptions) => Promise<DnsRecord[]>;
  submitScanReview: (
    zoneId: string,
    input: DnsScanReviewInput,
    options?: CallOptions,
  ) => Promise<DnsScanReviewResult>;
  batchRecords: (
    zoneId: string,
    input: DnsBatchInput,
    options?: CallOptions,
  ) => Promise<DnsBatchResult>;
}

export interface DnsClientOptions {
  resource: ApiResource;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Turn a record from a scan review into an accept item. Settings are left
 * out when neither flag is set, since the API rejects an empty settings
 * object.
 */
export function toScanAcceptItem(record: DnsRecord): DnsScanAcceptItem {
  const settings = record.settings;
  const hasSettings =
    settings != null &&
    (settings.ipv4_only != null || settings.ipv6_only != null);

  // Build item conditionally (for exactOptionalPropertyTypes)
  const item: DnsScanAcceptItem = {
    id: record.id,
    type: record.type,
    name: record.name,
    content: record.content,
    ttl: record.ttl,
  };
  if (record.proxied != null) item.proxied = record.proxied;
  if (record.comment != null) item.comment = record.comment;
  if (record.tags != null) item.tags = record.tags;
  if (record.priority != null) item.priority = record.priority;
  if (hasSettings) item.settings = settings;
  return item;
}

function recordsList(
  zoneId: string,
  filters: Omit<ListDnsRecordsFilters, "page" | "perPage">,
): ListRequest<DnsRecord> {
  return {
    path: buildPath("zones/{zoneId}/dns_records", { zoneId }),
    query: toQueryEntries(filters),
    schema: listResult(DnsRecordSchema),
  };
}

function recordPath(zoneId: string, recordId: string): string {
  return buildPath("zones/{zoneId}/dns_records/{recordId}", {
    zoneId,
    recordId,
  });
}

// ============================================================================
// Client
// ============================================================================

export function createDnsClient(options: DnsClientOptions): DnsClient {
  const { resource } = options;

  const listRecords: DnsClient["listRecords"] = (
    zoneId,
    filters = {},
    callOptions,
  ) => {
    const { page, perPage, ...domain } = filters;
    return resource.getPage(
      recordsList(zoneId, domain),
      { page, perPage },
      callOptions,
    );
  };

  return {
    getRecord: (zoneId, recordId, callOptions) =>
      resource.get(recordPath(zoneId, recordId), DnsRecordSchema, callOptions),

    listRecords,

    listAllRecords: (zoneId, filters = {}, callOptions) => {
      const { perPage, ...domain } = filters;
      return resource.paginatePages(
        recordsList(zoneId, domain),
        { perPage },
        callOptions,
      );
    },

    findRecordByName: async (zoneId, name, type, callOptions) => {
      const filters: ListDnsRecordsFilters = { name, type };
      const { items } = await listRecords(zoneId, filters, callOptions);
      return items[0] ?? null;
    },

    createRecord: (zoneId, input, callOptions) =>
      resource.post(
        buildPath("zones/{zoneId}/dns_records", { zoneId }),
        parseInput(DnsRecordInputSchema, input, "input"),
        DnsRecordSchema,
        callOptions,
      ),

    updateRecord: (zoneId, recordId, input, callOptions) =>
      resource.put(
        recordPath(zoneId, recordId),
        parseInput(DnsRecordInputSchema, input, "input"),
        DnsRecordSchema,
        callOptions,
      ),

    patchRecord: (zoneId, recordId, input, callOptions) =>
      resource.patch(
        recordPath(zoneId, recordId),
        parseInput(PatchDnsRecordInputSchema, input, "input"),
        DnsRecordSchema,
        callOptions,
      ),

    deleteRecord: (zoneId, recordId, callOptions) =>
      resource.del(recordPath(zoneId, recordId), voidResult, callOptions),

    triggerScan: (zoneId, callOptions) =>
      resource.post(
        buildPath("zones/{zoneId}/dns_records/scan/trigger", { zoneId }),
        null,
        voidResult,
        callOptions,
      ),

    getScanReview: (zoneId, callOptions) =>
      resource.get(
        buildPath("zones/{zoneId}/dns_records/scan/review", { zoneId }),
        listResult(DnsRecordSchema),
        callOptions,
      ),

    submitScanReview: (zoneId, input, callOptions) =>
      resource.post(
        buildPath("zones/{zoneId}/dns_records/scan/review", { zoneId }),
        parseInput(DnsScanReviewInputSchema, input, "input"),
        DnsScanReviewResultSchema,
        callOptions,
      ),

    batchRecords: (zoneId, input, callOptions) =>
      resource.post(
        buildPath("zones/{zoneId}/dns_records/batch", { zoneId }),
        parseInput(DnsBatchInputSchema, input, "input"),
        DnsBatchResultSchema,
        callOptions,
      ),
  };
}
