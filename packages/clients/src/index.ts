import type { ClientConfigInput } from "./config";
import { loadClientConfig } from "./config";
import type { AuditLogsClient } from "./audit-logs";
import { createAuditLogsClient } from "./audit-logs";
import type { DnsClient } from "./dns";
import { createDnsClient } from "./dns";
import type { ApiResource } from "./http/resource";
import { createApiResource } from "./http/resource";
import type { ApiTransport, FetchLike } from "./http/transport";
import { createApiTransport } from "./http/transport";
import type { ClientLogger } from "./logger";
import type { R2Client } from "./r2";
import { createR2Client } from "./r2";
import type { SubscriptionsClient } from "./subscriptions";
import { createSubscriptionsClient } from "./subscriptions";
import type { UserClient } from "./user";
import { createUserClient } from "./user";
import type { WorkersClient } from "./workers";
import { createWorkersClient } from "./workers";
import type { ZonesClient } from "./zones";
import { createZonesClient } from "./zones";

export * from "./audit-logs";
export * from "./config";
export * from "./dns";
export * from "./http/resource";
export * from "./http/transport";
export * from "./logger";
export * from "./r2";
export * from "./subscriptions";
export * from "./user";
export * from "./workers";
export * from "./zones";

export interface CloudApiClient {
  readonly transport: ApiTransport;
  readonly resource: ApiResource;
  readonly auditLogs: AuditLogsClient;
  readonly dns: DnsClient;
  readonly r2: R2Client;
  readonly subscriptions: SubscriptionsClient;
  readonly user: UserClient;
  readonly workers: WorkersClient;
  readonly zones: ZonesClient;
}

export interface CloudApiClientOptions {
  fetch?: FetchLike;
  logger?: ClientLogger;
  /** Environment consulted for `CLOUDKIT_*` settings. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

/**
 * Create a client for every supported resource over one shared transport.
 *
 * @throws CloudApiError CONFIG_INVALID when the configuration is invalid
 */
export function createCloudApiClient(
  configInput: ClientConfigInput = {},
  options: CloudApiClientOptions = {},
): CloudApiClient {
  const config = loadClientConfig(configInput, options.env);

  // Build transport options conditionally (for exactOptionalPropertyTypes)
  const transport = createApiTransport({
    config,
    ...(options.fetch && { fetch: options.fetch }),
    ...(options.logger && { logger: options.logger }),
  });
  const resource = createApiResource(transport);

  return {
    transport,
    resource,
    auditLogs: createAuditLogsClient({ resource }),
    dns: createDnsClient({ resource }),
    r2: createR2Client({ resource, accountId: config.accountId }),
    subscriptions: createSubscriptionsClient({ resource }),
    user: createUserClient({ resource }),
    workers: createWorkersClient({ resource }),
    zones: createZonesClient({ resource }),
  };
}
