import type { CursorPaginatedResult, OpenEnumOf } from "@cloudkit/shared/api";
import {
  OptionalTimestampSchema,
  buildPath,
  compactHeaders,
  defineOpenEnum,
  listResult,
  toQueryEntries,
  voidResult,
} from "@cloudkit/shared/api";
import { createCloudApiError } from "@cloudkit/shared/errors";
import { z } from "zod";
import type { HttpMethod } from "../http/transport";
import type {
  ApiResource,
  CallOptions,
  CursorParams,
  ListDirection,
  ListRequest,
} from "../http/resource";
import { openEnumInput, parseInput } from "../http/resource";

// ============================================================================
// Enums
// ============================================================================

export const R2Jurisdiction = defineOpenEnum("R2Jurisdiction", {
  Default: "default",
  EuropeanUnion: "eu",
  FedRamp: "fedramp",
});
export type R2JurisdictionValue = OpenEnumOf<typeof R2Jurisdiction>;

export const R2LocationHint = defineOpenEnum("R2LocationHint", {
  WestNorthAmerica: "wnam",
  EastNorthAmerica: "enam",
  WestEurope: "weur",
  EastEurope: "eeur",
  AsiaPacific: "apac",
  Oceania: "oc",
});
export type R2LocationHintValue = OpenEnumOf<typeof R2LocationHint>;

export const R2StorageClass = defineOpenEnum("R2StorageClass", {
  Standard: "Standard",
  InfrequentAccess: "InfrequentAccess",
});
export type R2StorageClassValue = OpenEnumOf<typeof R2StorageClass>;

const JURISDICTION_HEADER = "cf-r2-jurisdiction";
const STORAGE_CLASS_HEADER = "cf-r2-storage-class";

// ============================================================================
// Buckets
// ============================================================================

const R2BucketSchema = z
  .object({
    name: z.string(),
    creation_date: OptionalTimestampSchema,
    location: z.string().nullish(),
    jurisdiction: R2Jurisdiction.schema,
    storage_class: R2StorageClass.schema,
  })
  .passthrough();

const BucketListSchema = z
  .object({ buckets: listResult(R2BucketSchema) })
  .passthrough()
  .nullish()
  .transform((result) => result?.buckets ?? []);

const CreateBucketInputSchema = z.object({
  name: z.string().trim().min(1),
  locationHint: openEnumInput(R2LocationHint).optional(),
  storageClass: openEnumInput(R2StorageClass).optional(),
});

// ============================================================================
// CORS
// ============================================================================

const CorsRuleSchema = z
  .object({
    id: z.string().optional(),
    allowed: z
      .object({
        methods: z.array(z.string().min(1)).min(1),
        origins: z.array(z.string().min(1)).min(1),
        headers: z.array(z.string()).optional(),
      })
      .passthrough(),
    exposeHeaders: z.array(z.string()).optional(),
    maxAgeSeconds: z.number().int().nonnegative().optional(),
  })
  .passthrough();

const CorsPolicySchema = z
  .object({
    rules: z.array(CorsRuleSchema).nullish().transform((rules) => rules ?? []),
  })
  .passthrough();

// ============================================================================
// Lifecycle
// ============================================================================

const LifecycleConditionSchema = z
  .object({
    type: z.string().min(1),
    maxAge: z.number().int().nonnegative().optional(),
    date: z.string().optional(),
  })
  .passthrough();

const LifecycleRuleSchema = z
  .object({
    id: z.string().min(1),
    enabled: z.boolean(),
    /** The API rejects a rule without `conditions`; a null becomes `{}`. */
    conditions: z
      .object({ prefix: z.string().optional() })
      .passthrough()
      .nullish()
      .transform((conditions) => conditions ?? {}),
    deleteObjectsTransition: z
      .object({ condition: LifecycleConditionSchema })
      .passthrough()
      .optional(),
    abortMultipartUploadsTransition: z
      .object({ condition: LifecycleConditionSchema })
      .passthrough()
      .optional(),
    storageClassTransitions: z
      .array(
        z
          .object({
            condition: LifecycleConditionSchema,
            storageClass: openEnumInput(R2StorageClass),
          })
          .passthrough(),
      )
      .optional(),
  })
  .passthrough();

const LifecyclePolicySchema = z
  .object({
    rules: z.array(LifecycleRuleSchema).nullish().transform((rules) => rules ?? []),
  })
  .passthrough();

// ============================================================================
// Lock
// ============================================================================

const LockRuleSchema = z
  .object({
    id: z.string().min(1),
    enabled: z.boolean().default(true),
    prefix: z.string().optional(),
    condition: z
      .object({
        /** `Age`, `Date` or `Indefinite`. */
        type: z.string().min(1),
        maxAgeSeconds: z.number().int().positive().optional(),
        date: z.string().optional(),
      })
      .passthrough(),
  })
  .passthrough();

const LockPolicySchema = z
  .object({
    rules: z.array(LockRuleSchema).nullish().transform((rules) => rules ?? []),
  })
  .passthrough();

// ============================================================================
// Sippy
// ============================================================================

const SippySourceInputSchema = z.discriminatedUnion("provider", [
  z.object({
    provider: z.literal("aws"),
    bucket: z.string().min(1),
    region: z.string().min(1),
    accessKeyId: z.string().min(1),
    secretAccessKey: z.string().min(1),
  }),
  z.object({
    provider: z.literal("gcs"),
    bucket: z.string().min(1),
    clientEmail: z.string().min(1),
    privateKey: z.string().min(1),
  }),
]);

const EnableSippyInputSchema = z.object({
  source: SippySourceInputSchema,
  destination: z
    .object({
      accessKeyId: z.string().min(1),
      secretAccessKey: z.string().min(1),
      provider: z.literal("r2").default("r2"),
    })
    .optional(),
});

const SippyConfigSchema = z
  .object({
    enabled: z.boolean(),
    source: z
      .object({
        provider: z.string().nullish(),
        bucket: z.string().nullish(),
        bucketUrl: z.string().nullish(),
        region: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
    destination: z
      .object({
        provider: z.string().nullish(),
        bucket: z.string().nullish(),
        account: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

// ============================================================================
// Domains
// ============================================================================

const DomainStatusSchema = z
  .object({ ownership: z.string().nullish(), ssl: z.string().nullish() })
  .passthrough();

/** Listed domains carry the full status object. */
const CustomDomainSchema = z
  .object({
    domain: z.string(),
    enabled: z.boolean().nullish(),
    status: DomainStatusSchema.nullish(),
    minTLS: z.string().nullish(),
    zoneId: z.string().nullish(),
    zoneName: z.string().nullish(),
  })
  .passthrough();

const CustomDomainListSchema = z
  .object({ domains: listResult(CustomDomainSchema) })
  .passthrough()
  .nullish()
  .transform((result) => result?.domains ?? []);

/**
 * Single-domain responses report `status` as a string or as
 * `{ ownership, ssl }`; both collapse to the ownership state.
 */
const CustomDomainStatusSchema = z
  .object({
    domain: z.string(),
    edgeHostname: z.string().nullish(),
    status: z
      .union([z.string(), DomainStatusSchema])
      .nullish()
      .transform((status) => {
        if (typeof status === "string") {
          return status;
        }
        return status?.ownership ?? "pending_validation";
      }),
  })
  .passthrough();

const AttachCustomDomainInputSchema = z.object({
  domain: z.string().trim().min(1),
  zoneId: z.string().trim().min(1),
  enabled: z.boolean().default(true),
  minTLS: z.string().min(1).optional(),
});

const UpdateCustomDomainInputSchema = z.object({
  enabled: z.boolean().optional(),
  minTLS: z.string().min(1).optional(),
});

const ManagedDomainSchema = z
  .object({
    bucketId: z.string().nullish(),
    domain: z.string().nullish(),
    enabled: z.boolean(),
  })
  .passthrough();

// ============================================================================
// Types
// ============================================================================

export type R2Bucket = z.infer<typeof R2BucketSchema>;
export type CreateBucketInput = z.input<typeof CreateBucketInputSchema>;
export type BucketCorsPolicy = z.infer<typeof CorsPolicySchema>;
export type BucketCorsPolicyInput = z.input<typeof CorsPolicySchema>;
export type BucketLifecyclePolicy = z.infer<typeof LifecyclePolicySchema>;
export type BucketLifecyclePolicyInput = z.input<typeof LifecyclePolicySchema>;
export type BucketLockPolicy = z.infer<typeof LockPolicySchema>;
export type BucketLockPolicyInput = z.input<typeof LockPolicySchema>;
export type EnableSippyInput = z.input<typeof EnableSippyInputSchema>;
export type SippyConfig = z.infer<typeof SippyConfigSchema>;
export type R2CustomDomain = z.infer<typeof CustomDomainSchema>;
export type R2CustomDomainStatus = z.infer<typeof CustomDomainStatusSchema>;
export type AttachCustomDomainInput = z.input<typeof AttachCustomDomainInputSchema>;
export type UpdateCustomDomainInput = z.input<typeof UpdateCustomDomainInputSchema>;
export type R2ManagedDomain = z.infer<typeof ManagedDomainSchema>;

export interface R2CallOptions extends CallOptions {
  /** Sent as `cf-r2-jurisdiction`; omitted entirely when absent. */
  jurisdiction?: R2JurisdictionValue | undefined;
}

export interface ListBucketsFilters extends CursorParams {
  nameContains?: string | undefined;
  startAfter?: string | undefined;
  order?: string | undefined;
  direction?: ListDirection | undefined;
}

export interface R2Client {
  createBucket: (
    input: CreateBucketInput,
    options?: R2CallOptions,
  ) => Promise<R2Bucket>;
  getBucket: (name: string, options?: R2CallOptions) => Promise<R2Bucket>;
  listBuckets: (
    filters?: ListBucketsFilters,
    options?: R2CallOptions,
  ) => Promise<CursorPaginatedResult<R2Bucket>>;
  listAllBuckets: (
    filters?: Omit<ListBucketsFilters, "cursor">,
    options?: R2CallOptions,
  ) => AsyncGenerator<R2Bucket, void, undefined>;
  deleteBucket: (name: string, options?: R2CallOptions) => Promise<void>;
  updateStorageClass: (
    name: string,
    storageClass: R2StorageClassValue,
    options?: R2CallOptions,
  ) => Promise<R2Bucket>;
  getCors: (name: string, options?: R2CallOptions) => Promise<BucketCorsPolicy>;
  setCors: (
    name: string,
    policy: BucketCorsPolicyInput,
    options?: R2CallOptions,
  ) => Promise<void>;
  deleteCors: (name: string, options?: R2CallOptions) => Promise<void>;
  getLifecycle: (
    name: string,
    options?: R2CallOptions,
  ) => Promise<BucketLifecyclePolicy>;
  setLifecycle: (
    name: string,
    policy: BucketLifecyclePolicyInput,
    options?: R2CallOptions,
  ) => Promise<void>;
  /** There is no DELETE endpoint; this replaces the policy with no rules. */
  deleteLifecycle: (name: string, options?: R2CallOptions) => Promise<void>;
  getLock: (name: string, options?: R2CallOptions) => Promise<BucketLockPolicy>;
  setLock: (
    name: string,
    policy: BucketLockPolicyInput,
    options?: R2CallOptions,
  ) => Promise<void>;
  deleteLock: (name: string, options?: R2CallOptions) => Promise<void>;
  getSippy: (name: string, options?: R2CallOptions) => Promise<SippyConfig>;
  enableSippy: (
    name: string,
    input: EnableSippyInput,
    options?: R2CallOptions,
  ) => Promise<SippyConfig>;
  disableSippy: (name: string, options?: R2CallOptions) => Promise<void>;
  listCustomDomains: (
    name: string,
    options?: R2CallOptions,
  ) => Promise<R2CustomDomain[]>;
  attachCustomDomain: (
    name: string,
    input: AttachCustomDomainInput,
    options?: R2CallOptions,
  ) => Promise<R2CustomDomainStatus>;
  getCustomDomain: (
    name: string,
    domain: string,
    options?: R2CallOptions,
  ) => Promise<R2CustomDomainStatus>;
  updateCustomDomain: (
    name: string,
    domain: string,
    input: UpdateCustomDomainInput,
    options?: R2CallOptions,
  ) => Promise<R2CustomDomainStatus>;
  detachCustomDomain: (
    name: string,
    domain: string,
    options?: R2CallOptions,
  ) => Promise<void>;
  /** The bucket's `r2.dev` public URL. */
  getManagedDomain: (name: string, options?: R2CallOptions) => Promise<R2ManagedDomain>;
  setManagedDomain: (
    name: string,
    enabled: boolean,
    options?: R2CallOptions,
  ) => Promise<R2ManagedDomain>;
}

export interface R2ClientOptions {
  resource: ApiResource;
  accountId?: string | undefined;
}

// ============================================================================
// Client
// ============================================================================

export function createR2Client(options: R2ClientOptions): R2Client {
  const { resource } = options;

  const requireAccountId = (): string => {
    const accountId = options.accountId;
    if (accountId === undefined || accountId.trim().length === 0) {
      throw createCloudApiError(
        "CONFIG_INVALID",
        "accountId is required for R2 bucket operations",
        { details: { fields: [{ path: "accountId", message: "Required" }] } },
      );
    }
    return accountId;
  };

  const bucketsPath = () =>
    buildPath("accounts/{accountId}/r2/buckets", {
      accountId: requireAccountId(),
    });

  const bucketPath = (name: string, suffix = "") =>
    `${buildPath("accounts/{accountId}/r2/buckets/{name}", {
      accountId: requireAccountId(),
      name,
    })}${suffix}`;

  const customDomainPath = (name: string, domain: string) =>
    buildPath("accounts/{accountId}/r2/buckets/{name}/domains/custom/{domain}", {
      accountId: requireAccountId(),
      name,
      domain,
    });

  const jurisdictionHeaders = (callOptions: R2CallOptions = {}) =>
    compactHeaders({ [JURISDICTION_HEADER]: callOptions.jurisdiction });

  const send = <T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    callOptions: R2CallOptions = {},
    body?: unknown,
  ): Promise<T> =>
    resource.request(method, path, schema, {
      signal: callOptions.signal,
      headers: jurisdictionHeaders(callOptions),
      body,
    });

  const bucketsList = (
    filters: Omit<ListBucketsFilters, "cursor" | "perPage">,
    callOptions: R2CallOptions | undefined,
  ): ListRequest<R2Bucket> => ({
    path: bucketsPath(),
    query: toQueryEntries(filters),
    headers: jurisdictionHeaders(callOptions),
    schema: BucketListSchema,
  });

  const setLifecycle: R2Client["setLifecycle"] = (name, policy, callOptions) =>
    send(
      "PUT",
      bucketPath(name, "/lifecycle"),
      voidResult,
      callOptions,
      parseInput(LifecyclePolicySchema, policy, "policy"),
    );

  const setLock: R2Client["setLock"] = (name, policy, callOptions) =>
    send(
      "PUT",
      bucketPath(name, "/lock"),
      voidResult,
      callOptions,
      parseInput(LockPolicySchema, policy, "policy"),
    );

  return {
    createBucket: (input, callOptions) =>
      send(
        "POST",
        bucketsPath(),
        R2BucketSchema,
        callOptions,
        parseInput(CreateBucketInputSchema, input, "input"),
      ),

    getBucket: (name, callOptions) =>
      send("GET", bucketPath(name), R2BucketSchema, callOptions),

    listBuckets: (filters = {}, callOptions) => {
      const { cursor, perPage, ...domain } = filters;
      return resource.getCursorPage(
        bucketsList(domain, callOptions),
        { cursor, perPage },
        callOptions,
      );
    },

    listAllBuckets: (filters = {}, callOptions) => {
      const { perPage, ...domain } = filters;
      return resource.paginateCursor(
        bucketsList(domain, callOptions),
        { perPage },
        callOptions,
      );
    },

    deleteBucket: (name, callOptions) =>
      send("DELETE", bucketPath(name), voidResult, callOptions),

    updateStorageClass: (name, storageClass, callOptions = {}) =>
      resource.request("PATCH", bucketPath(name), R2BucketSchema, {
        signal: callOptions.signal,
        headers: compactHeaders({
          [STORAGE_CLASS_HEADER]: storageClass,
          [JURISDICTION_HEADER]: callOptions.jurisdiction,
        }),
        body: {},
      }),

    getCors: (name, callOptions) =>
      send("GET", bucketPath(name, "/cors"), CorsPolicySchema, callOptions),

    setCors: (name, policy, callOptions) =>
      send(
        "PUT",
        bucketPath(name, "/cors"),
        voidResult,
        callOptions,
        parseInput(CorsPolicySchema, policy, "policy"),
      ),

    deleteCors: (name, callOptions) =>
      send("DELETE", bucketPath(name, "/cors"), voidResult, callOptions),

    getLifecycle: (name, callOptions) =>
      send("GET", bucketPath(name, "/lifecycle"), LifecyclePolicySchema, callOptions),

    setLifecycle,

    deleteLifecycle: (name, callOptions) =>
      setLifecycle(name, { rules: [] }, callOptions),

    getLock: (name, callOptions) =>
      send("GET", bucketPath(name, "/lock"), LockPolicySchema, callOptions),

    setLock,

    deleteLock: (name, callOptions) => setLock(name, { rules: [] }, callOptions),

    getSippy: (name, callOptions) =>
      send("GET", bucketPath(name, "/sippy"), SippyConfigSchema, callOptions),

    enableSippy: (name, input, callOptions) =>
      send(
        "PUT",
        bucketPath(name, "/sippy"),
        SippyConfigSchema,
        callOptions,
        parseInput(EnableSippyInputSchema, input, "input"),
      ),

    disableSippy: (name, callOptions) =>
      send("DELETE", bucketPath(name, "/sippy"), voidResult, callOptions),

    listCustomDomains: (name, callOptions) =>
      send(
        "GET",
        bucketPath(name, "/domains/custom"),
        CustomDomainListSchema,
        callOptions,
      ),

    attachCustomDomain: (name, input, callOptions) =>
      send(
        "POST",
        bucketPath(name, "/domains/custom"),
        CustomDomainStatusSchema,
        callOptions,
        parseInput(AttachCustomDomainInputSchema, input, "input"),
      ),

    getCustomDomain: (name, domain, callOptions) =>
      send("GET", customDomainPath(name, domain), CustomDomainStatusSchema, callOptions),

    updateCustomDomain: (name, domain, input, callOptions) =>
      send(
        "PUT",
        customDomainPath(name, domain),
        CustomDomainStatusSchema,
        callOptions,
        parseInput(UpdateCustomDomainInputSchema, input, "input"),
      ),

    detachCustomDomain: (name, domain, callOptions) =>
      send("DELETE", customDomainPath(name, domain), voidResult, callOptions),

    getManagedDomain: (name, callOptions) =>
      send("GET", bucketPath(name, "/domains/managed"), ManagedDomainSchema, callOptions),

    setManagedDomain: (name, enabled, callOptions) =>
      send(
        "PUT",
        bucketPath(name, "/domains/managed"),
        ManagedDomainSchema,
        callOptions,
        { enabled },
      ),
  };
}
