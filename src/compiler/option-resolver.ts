/**
 * Filters declaration options down to the keys the
 * compiler understands and turns every remaining value into a JSON literal.
 */

import {
  OPTION_KEYS,
  type FieldOptions,
  type JsonLiteral,
  type OptionKey,
} from "../types/schema.ts";
import {
  DecimalValueNotAllowedError,
  UnresolvedOptionValueError,
} from "./errors.ts";

export type KnownOptions = Partial<Record<OptionKey, unknown>>;

/** Options of a decimal field that must be plain numbers */
const DECIMAL_NUMERIC_OPTIONS = ["example", "minimum", "maximum"] as const;

/** True for object literals (`{}` or `Object.create(null)`) */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * True for arbitrary-precision numbers: bigints and decimal objects such as
 * decimal.js, big.js or bignumber.js instances.
 */
export function isArbitraryPrecision(value: unknown): boolean {
  if (typeof value === "bigint") return true;
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  if (isPlainObject(value) || value instanceof Date) return false;
  return typeof Reflect.get(value, "toFixed") === "function";
}

/** Keep only recognized option keys; unknown keys are dropped silently */
export function pickKnownOptions(
  raw: Readonly<Record<string, unknown>>,
): KnownOptions {
  const known: KnownOptions = {};
  for (const key of OPTION_KEYS) {
    if (Object.hasOwn(raw, key)) known[key] = raw[key];
  }
  return known;
}

/** Reject decimal objects where a decimal field needs plain numbers */
export function assertPlainDecimalValues(options: KnownOptions, path?: string): void {
  for (const key of DECIMAL_NUMERIC_OPTIONS) {
    const value = options[key];
    if (isArbitraryPrecision(value)) {
      throw new DecimalValueNotAllowedError(key, value, path);
    }
  }
}

/** Resolve every known option to a literal */
export function resolveOptions(options: KnownOptions, path?: string): FieldOptions {
  const resolved: FieldOptions = {};
  for (const key of OPTION_KEYS) {
    if (!Object.hasOwn(options, key)) continue;
    resolved[key] = resolveLiteral(options[key], key, path);
  }
  return resolved;
}

/**
 * Resolve a single option value. Strings, finite numbers, booleans, null,
 * valid dates and arrays/plain objects of those are literals; functions,
 * symbols, bigints, undefined and class instances are not.
 */
export function resolveLiteral(
  value: unknown,
  option: string,
  path?: string,
): JsonLiteral {
  if (value === null) return null;

  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      if (Number.isFinite(value)) return value;
      break;
    case "object":
      if (value instanceof Date) {
        if (!Number.isNaN(value.getTime())) return value.toISOString();
        break;
      }
      if (Array.isArray(value)) {
        const items: readonly unknown[] = value;
        return items.map((item) => resolveLiteral(item, option, path));
      }
      if (isPlainObject(value)) {
        const out: { [key: string]: JsonLiteral } = {};
        for (const [key, entry] of Object.entries(value)) {
          out[key] = resolveLiteral(entry, option, path);
        }
        return out;
      }
      break;
    default:
      break;
  }

  throw new UnresolvedOptionValueError(option, value, path);
}
