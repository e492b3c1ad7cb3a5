import { z } from "zod";

/**
 * A string-backed enum that tolerates values the server introduces after
 * this client was built.
 *
 * Known values compare equal to their named constant regardless of case and
 * serialize as the constant's canonical literal. Unknown values keep the
 * exact string they arrived with. The `N` parameter brands each enum so that
 * values of two different enums never type-check against each other.
 */
export class OpenEnumValue<N extends string = string> {
  readonly enumName: N;
  readonly value: string;
  /** Case-normalized form used for equality and as a map key. */
  readonly key: string;

  constructor(enumName: N, value: string | null | undefined) {
    this.enumName = enumName;
    this.value = value ?? "";
    this.key = this.value.toLowerCase();
  }

  get isEmpty(): boolean {
    return this.value.length === 0;
  }

  equals(other: OpenEnumValue<N> | string | null | undefined): boolean {
    if (other instanceof OpenEnumValue) {
      return other.key === this.key;
    }
    return (other ?? "").toLowerCase() === this.key;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

export type OpenEnumInput<N extends string> =
  | OpenEnumValue<N>
  | string
  | null
  | undefined;

export interface OpenEnumStatics<N extends string> {
  readonly enumName: N;
  /** The value a `null` decodes to; its literal is the empty string. */
  readonly empty: OpenEnumValue<N>;
  /** Zod schema decoding a nullable wire string into this enum. */
  readonly schema: z.ZodType<OpenEnumValue<N>, z.ZodTypeDef, unknown>;
  from(value: OpenEnumInput<N>): OpenEnumValue<N>;
  values(): OpenEnumValue<N>[];
  isKnown(value: OpenEnumInput<N>): boolean;
}

const RESERVED_NAMES: ReadonlySet<string> = new Set([
  "enumName",
  "empty",
  "schema",
  "from",
  "values",
  "isKnown",
]);

export type OpenEnum<N extends string, K extends string> = {
  readonly [P in K]: OpenEnumValue<N>;
} & OpenEnumStatics<N>;

export type OpenEnumOf<E> = E extends OpenEnumStatics<infer N>
  ? OpenEnumValue<N>
  : never;

/**
 * Define an open enum from a map of constant names to canonical literals.
 *
 * ```ts
 * const R2Jurisdiction = defineOpenEnum("R2Jurisdiction", {
 *   Default: "default",
 *   EuropeanUnion: "eu",
 * });
 * R2Jurisdiction.from("EU").equals(R2Jurisdiction.EuropeanUnion); // true
 * ```
 */
export function defineOpenEnum<
  const N extends string,
  const C extends Record<string, string>,
>(enumName: N, constants: C): OpenEnum<N, Extract<keyof C, string>> {
  type Key = Extract<keyof C, string>;

  const names = Object.keys(constants) as Key[];
  const byKey = new Map<string, OpenEnumValue<N>>();
  const named = names.reduce(
    (acc, name) => {
      if (RESERVED_NAMES.has(name)) {
        throw new Error(`${enumName}.${name} shadows a built-in member`);
      }
      const literal: string | undefined = constants[name];
      if (literal === undefined || literal.length === 0) {
        throw new Error(
          `${enumName}.${name} must have a non-empty literal value`,
        );
      }
      const instance = new OpenEnumValue(enumName, literal);
      if (byKey.has(instance.key)) {
        throw new Error(`${enumName} defines "${literal}" more than once`);
      }
      byKey.set(instance.key, instance);
      acc[name] = instance;
      return acc;
    },
    {} as Record<Key, OpenEnumValue<N>>,
  );

  const empty = new OpenEnumValue(enumName, "");

  const from = (value: OpenEnumInput<N>): OpenEnumValue<N> => {
    if (value === null || value === undefined) {
      return empty;
    }
    const raw = value instanceof OpenEnumValue ? value.value : value;
    if (raw.length === 0) {
      return empty;
    }
    return byKey.get(raw.toLowerCase()) ?? new OpenEnumValue(enumName, raw);
  };

  const schema = z
    .string()
    .nullish()
    .transform((value) => from(value));

  return {
    ...named,
    enumName,
    empty,
    schema,
    from,
    values: () => [...byKey.values()],
    isKnown: (value) => {
      const raw = value instanceof OpenEnumValue ? value.value : value;
      return raw !== null && raw !== undefined && byKey.has(raw.toLowerCase());
    },
  };
}
