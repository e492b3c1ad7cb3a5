import { ArgumentValidationError, assertNonBlank } from "../errors/factory";
import { OpenEnumValue } from "./open-enum";

// ============================================================================
// Types
// ============================================================================

/** How camelCase filter fields become query parameter names. */
export type QueryNaming = "snake" | "dot";

export type QueryScalar = string | number | boolean | Date | OpenEnumValue;

export type QueryValue = QueryScalar | readonly QueryScalar[] | null | undefined;

/** Constrains a filter type to fields the builder knows how to format. */
export type QueryFilterShape<F> = { [K in keyof F]: QueryValue };

export type QueryEntry = readonly [name: string, value: string];

export interface QueryOptions {
  naming?: QueryNaming;
  /** Explicit wire names, keyed by filter field. Takes precedence over `naming`. */
  aliases?: Readonly<Record<string, string>>;
}

const NOT_SUFFIX = /^(.*[a-z0-9])Not$/;

// ============================================================================
// Path
// ============================================================================

/**
 * Substitute `{name}` placeholders, percent-encoding each value on its own.
 *
 * @example buildPath("zones/{zoneId}/workers/routes/{routeId}", { zoneId, routeId })
 */
export function buildPath(
  template: string,
  params: Readonly<Record<string, string | null | undefined>>,
): string {
  return template.replace(/\{(\w+)\}/g, (_match, name: string) => {
    const value = params[name];
    assertNonBlank(value, name);
    if (value === "." || value === "..") {
      throw new ArgumentValidationError(
        name,
        "ARGUMENT_INVALID",
        `${name} cannot be a relative path segment`,
      );
    }
    return encodeURIComponent(value);
  });
}

// ============================================================================
// Query
// ============================================================================

/** Convert a camelCase field name into a wire name. */
export function toWireName(field: string, naming: QueryNaming): string {
  const separator = naming === "dot" ? "." : "_";
  return field
    .replace(/([a-z0-9])([A-Z])/g, `$1${separator}$2`)
    .replace(/([A-Z])([A-Z][a-z])/g, `$1${separator}$2`)
    .toLowerCase();
}

function resolveName(field: string, options: QueryOptions): string {
  const aliases = options.aliases ?? {};
  const naming = options.naming ?? "snake";
  const alias = aliases[field];
  if (alias !== undefined) {
    return alias;
  }
  const negated = NOT_SUFFIX.exec(field);
  if (negated?.[1]) {
    const base = negated[1];
    return `${aliases[base] ?? toWireName(base, naming)}.not`;
  }
  return toWireName(field, naming);
}

function formatScalar(field: string, value: unknown): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === "string") {
    return value.trim().length > 0 ? value : undefined;
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new ArgumentValidationError(
        field,
        "ARGUMENT_INVALID",
        `Filter ${field} must be a finite number`,
      );
    }
    return String(value);
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new ArgumentValidationError(
        field,
        "ARGUMENT_INVALID",
        `Filter ${field} is an invalid date`,
      );
    }
    return value.toISOString();
  }
  if (value instanceof OpenEnumValue) {
    return value.isEmpty ? undefined : value.value;
  }
  throw new ArgumentValidationError(
    field,
    "ARGUMENT_INVALID",
    `Filter ${field} has an unsupported value type`,
  );
}

/**
 * Turn a filter object into ordered query entries.
 *
 * Fields that are `undefined`, `null`, blank strings or empty enum values
 * are omitted. Arrays repeat the parameter once per element. A field ending
 * in `Not` maps to the `<name>.not` exclusion form.
 */
export function toQueryEntries<F extends QueryFilterShape<F>>(
  filters: F | null | undefined,
  options: QueryOptions = {},
): QueryEntry[] {
  if (filters === null || filters === undefined) {
    return [];
  }

  const fields: [string, unknown][] = Object.entries(filters);
  const entries: QueryEntry[] = [];
  for (const [field, raw] of fields) {
    const name = resolveName(field, options);
    const values: readonly unknown[] = Array.isArray(raw) ? raw : [raw];
    for (const value of values) {
      const formatted = formatScalar(field, value);
      if (formatted !== undefined) {
        entries.push([name, formatted]);
      }
    }
  }
  return entries;
}

/**
 * Join entry groups into `?a=1&b=2`, or `""` when there are none.
 * Groups are emitted in order, so pass domain filters before pagination.
 */
export function buildQueryString(
  ...groups: readonly (readonly QueryEntry[])[]
): string {
  const pairs = groups
    .flat()
    .map(
      ([name, value]) =>
        `${encodeURIComponent(name)}=${encodeURIComponent(value)}`,
    );
  return pairs.length > 0 ? `?${pairs.join("&")}` : "";
}

// ============================================================================
// Headers
// ============================================================================

export type HeaderValue = string | OpenEnumValue | null | undefined;

/** Drop absent headers; an optional header is never sent empty. */
export function compactHeaders(
  headers: Readonly<Record<string, HeaderValue>>,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    const formatted = value instanceof OpenEnumValue ? value.value : value;
    if (formatted !== null && formatted !== undefined && formatted.length > 0) {
      result[name] = formatted;
    }
  }
  return result;
}
