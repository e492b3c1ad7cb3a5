import { z } from "zod";
import { DecodeFailureError } from "../errors/factory";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ]),
);

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Free-form JSON payload with typed accessors.
 *
 * Used for fields whose shape the API does not fix, such as the request and
 * response bodies recorded on an audit log entry. Accessors return
 * `undefined` rather than throwing when the path or type does not match.
 */
export class JsonDocument {
  readonly root: JsonValue;

  constructor(root: JsonValue) {
    this.root = root;
  }

  get isObject(): boolean {
    return isJsonObject(this.root);
  }

  /** Look up a property by name, or a nested one by a list of names. */
  getProperty(path: string | readonly string[]): JsonDocument | undefined {
    const segments = typeof path === "string" ? [path] : path;
    let current: JsonValue = this.root;
    for (const segment of segments) {
      if (!isJsonObject(current) || !Object.hasOwn(current, segment)) {
        return undefined;
      }
      const next: JsonValue | undefined = current[segment];
      if (next === undefined) {
        return undefined;
      }
      current = next;
    }
    return new JsonDocument(current);
  }

  getString(path: string | readonly string[]): string | undefined {
    const value = this.getProperty(path)?.root;
    return typeof value === "string" ? value : undefined;
  }

  getNumber(path: string | readonly string[]): number | undefined {
    const value = this.getProperty(path)?.root;
    return typeof value === "number" ? value : undefined;
  }

  /** Like getNumber, but only for integral values. */
  getInt(path: string | readonly string[]): number | undefined {
    const value = this.getNumber(path);
    return value !== undefined && Number.isInteger(value) ? value : undefined;
  }

  getBoolean(path: string | readonly string[]): boolean | undefined {
    const value = this.getProperty(path)?.root;
    return typeof value === "boolean" ? value : undefined;
  }

  getArray(path: string | readonly string[]): JsonDocument[] | undefined {
    const value = this.getProperty(path)?.root;
    return Array.isArray(value)
      ? value.map((item) => new JsonDocument(item))
      : undefined;
  }

  /** Re-validate the payload against a typed schema. */
  parseAs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    const parsed = schema.safeParse(this.root);
    if (!parsed.success) {
      throw new DecodeFailureError("DECODE_INVALID_RESULT", {
        issues: parsed.error.issues,
      });
    }
    return parsed.data;
  }

  toJSON(): JsonValue {
    return this.root;
  }
}

export const JsonDocumentSchema = JsonValueSchema.transform(
  (value) => new JsonDocument(value),
);
