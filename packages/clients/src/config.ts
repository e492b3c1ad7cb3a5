import { createCloudApiError } from "@cloudkit/shared/errors";
import { z } from "zod";

export const DEFAULT_BASE_URL = "https://api.cloudflare.com/client/v4/";
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_USER_AGENT = "cloudkit";

// ============================================================================
// Schema
// ============================================================================

const LogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export const ClientConfigSchema = z.object({
  apiToken: z.string().trim().min(1, "apiToken is required"),
  baseUrl: z
    .string()
    .url()
    .default(DEFAULT_BASE_URL)
    .transform((url) => (url.endsWith("/") ? url : `${url}/`)),
  accountId: z.string().trim().min(1).optional(),
  timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  logLevel: LogLevelSchema.default("info"),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type ClientConfigInput = Partial<z.input<typeof ClientConfigSchema>>;

// ============================================================================
// Loading
// ============================================================================

const ENV_KEYS = {
  apiToken: "CLOUDKIT_API_TOKEN",
  baseUrl: "CLOUDKIT_BASE_URL",
  accountId: "CLOUDKIT_ACCOUNT_ID",
  timeoutMs: "CLOUDKIT_TIMEOUT_MS",
  userAgent: "CLOUDKIT_USER_AGENT",
  logLevel: "CLOUDKIT_LOG_LEVEL",
} as const satisfies Record<keyof ClientConfig, string>;

function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [field, name] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value.trim().length > 0) {
      values[field] = value.trim();
    }
  }
  return values;
}

function definedOnly(input: ClientConfigInput): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [field, value] of Object.entries(input)) {
    if (value !== undefined) {
      values[field] = value;
    }
  }
  return values;
}

/**
 * Resolve client configuration.
 *
 * Precedence: explicit input, then `CLOUDKIT_*` environment variables,
 * then defaults.
 *
 * @throws CloudApiError CONFIG_INVALID when the merged values fail validation
 */
export function loadClientConfig(
  input: ClientConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): ClientConfig {
  const parsed = ClientConfigSchema.safeParse({
    ...fromEnv(env),
    ...definedOnly(input),
  });
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    const summary = fields
      .map((field) => `${field.path}: ${field.message}`)
      .join("; ");
    throw createCloudApiError(
      "CONFIG_INVALID",
      `Invalid client configuration: ${summary}`,
      { details: { fields } },
    );
  }
  return parsed.data;
}
