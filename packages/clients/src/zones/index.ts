import type { JsonValue, OpenEnumOf } from "@cloudkit/shared/api";
import {
  JsonDocumentSchema,
  JsonValueSchema,
  OptionalTimestampSchema,
  buildPath,
  defineOpenEnum,
} from "@cloudkit/shared/api";
import { z } from "zod";
import type { ApiResource, CallOptions } from "../http/resource";
import { parseInput } from "../http/resource";

export const ZoneSettingId = defineOpenEnum("ZoneSettingId", {
  AdvancedDdos: "advanced_ddos",
  AlwaysUseHttps: "always_use_https",
  AutomaticHttpsRewrites: "automatic_https_rewrites",
  BrowserCheck: "browser_check",
  ChallengeTtl: "challenge_ttl",
  EmailObfuscation: "email_obfuscation",
  MinTlsVersion: "min_tls_version",
  OpportunisticEncryption: "opportunistic_encryption",
  SecurityLevel: "security_level",
  Ssl: "ssl",
  Tls13: "tls_1_3",
  Waf: "waf",
  AlwaysOnline: "always_online",
  Brotli: "brotli",
  BrowserCacheTtl: "browser_cache_ttl",
  CacheLevel: "cache_level",
  DevelopmentMode: "development_mode",
  EarlyHints: "early_hints",
  Http2: "http2",
  Http3: "http3",
  Polish: "polish",
  ZeroRtt: "0rtt",
  Ipv6: "ipv6",
  Websockets: "websockets",
  PseudoIpv4: "pseudo_ipv4",
});
export type ZoneSettingIdValue = OpenEnumOf<typeof ZoneSettingId>;

const ZoneSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    status: z.string().nullish(),
    paused: z.boolean().nullish(),
    type: z.string().nullish(),
    name_servers: z.array(z.string()).nullish(),
    account: z
      .object({ id: z.string(), name: z.string().nullish() })
      .passthrough()
      .nullish(),
    created_on: OptionalTimestampSchema,
    modified_on: OptionalTimestampSchema,
  })
  .passthrough();

const ZoneSettingSchema = z
  .object({
    id: ZoneSettingId.schema,
    /** A string, number or object depending on the setting. */
    value: JsonDocumentSchema,
    editable: z.boolean().nullish(),
    modified_on: OptionalTimestampSchema,
  })
  .passthrough();

const UpdateZoneSettingInputSchema = z.object({ value: JsonValueSchema });

const PurgeCacheInputSchema = z
  .object({
    purge_everything: z.boolean().optional(),
    files: z.array(z.string().min(1)).optional(),
    prefixes: z.array(z.string().min(1)).optional(),
    hosts: z.array(z.string().min(1)).optional(),
  })
  .refine(
    (input) =>
      input.purge_everything === true ||
      [input.files, input.prefixes, input.hosts].some(
        (targets) => targets !== undefined && targets.length > 0,
      ),
    { message: "Nothing to purge" },
  );

const PurgeCacheResultSchema = z.object({ id: z.string() }).passthrough();

export type Zone = z.infer<typeof ZoneSchema>;
export type ZoneSetting = z.infer<typeof ZoneSettingSchema>;
export type PurgeCacheInput = z.input<typeof PurgeCacheInputSchema>;
export type PurgeCacheResult = z.infer<typeof PurgeCacheResultSchema>;

export interface ZonesClient {
  getZone: (zoneId: string, options?: CallOptions) => Promise<Zone>;
  getSetting: (
    zoneId: string,
    settingId: ZoneSettingIdValue,
    options?: CallOptions,
  ) => Promise<ZoneSetting>;
  updateSetting: (
    zoneId: string,
    settingId: ZoneSettingIdValue,
    value: JsonValue,
    options?: CallOptions,
  ) => Promise<ZoneSetting>;
  purgeCache: (
    zoneId: string,
    input: PurgeCacheInput,
    options?: CallOptions,
  ) => Promise<PurgeCacheResult>;
}

export interface ZonesClientOptions {
  resource: ApiResource;
}

const settingPath = (zoneId: string, settingId: ZoneSettingIdValue) =>
  buildPath("zones/{zoneId}/settings/{settingId}", {
    zoneId,
    settingId: settingId.value,
  });

export function createZonesClient(options: ZonesClientOptions): ZonesClient {
  const { resource } = options;

  return {
    getZone: (zoneId, callOptions) =>
      resource.get(buildPath("zones/{zoneId}", { zoneId }), ZoneSchema, callOptions),

    getSetting: (zoneId, settingId, callOptions) =>
      resource.get(settingPath(zoneId, settingId), ZoneSettingSchema, callOptions),

    updateSetting: (zoneId, settingId, value, callOptions) =>
      resource.patch(
        settingPath(zoneId, settingId),
        parseInput(UpdateZoneSettingInputSchema, { value }, "value"),
        ZoneSettingSchema,
        callOptions,
      ),

    purgeCache: (zoneId, input, callOptions) =>
      resource.post(
        buildPath("zones/{zoneId}/purge_cache", { zoneId }),
        parseInput(PurgeCacheInputSchema, input, "input"),
        PurgeCacheResultSchema,
        callOptions,
      ),
  };
}
