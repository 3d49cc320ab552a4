/**
 * Converts a validation descriptor into a Zod schema and validates raw input
 * with it. Zod is the validation engine; this module only translates rules.
 */

import { z } from "zod/v4";
import type {
  ValidationConstraints,
  ValidationDescriptor,
  ValidationItems,
  ValidationRule,
} from "../types/schema.ts";

/** Field errors keyed by dotted input path; top-level issues use "_root" */
export type FieldErrorMap = Record<string, string[]>;

export type ValidationResult =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; errors: FieldErrorMap };

/** Build a Zod object schema for a descriptor; unknown keys are stripped */
export function buildValidator(descriptor: ValidationDescriptor): z.ZodObject {
  return z.object(buildShape(descriptor));
}

/** Validate raw input against a descriptor, building a one-off validator */
export function validateParams(
  descriptor: ValidationDescriptor,
  input: unknown,
): ValidationResult {
  return validateWith(buildValidator(descriptor), input);
}

/** Validate raw input with a validator built ahead of time */
export function validateWith(validator: z.ZodObject, input: unknown): ValidationResult {
  const result = validator.safeParse(input);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, errors: toFieldErrors(result.error) };
}

/** Build a shape record from a list of rules */
function buildShape(descriptor: ValidationDescriptor): Record<string, z.ZodType> {
  return Object.fromEntries(descriptor.map((rule) => [rule.name, ruleToZod(rule)]));
}

/** Convert a single rule, including presence, nullability and default */
function ruleToZod(rule: ValidationRule): z.ZodType {
  let schema = baseTypeToZod(rule);
  if (rule.constraints.nullable) schema = schema.nullable();

  if (rule.constraints.default !== undefined) {
    return schema.default(rule.constraints.default);
  }
  return rule.required ? schema : schema.optional();
}

function baseTypeToZod(rule: ValidationRule): z.ZodType {
  const c = rule.constraints;

  switch (rule.type) {
    case "string":
      if (c.included && c.included.length > 0) {
        return z.enum(c.included);
      }
      return stringWithConstraints(c);

    case "integer":
      return numberWithBounds(c).int();

    case "number":
    case "decimal":
      return numberWithBounds(c);

    case "boolean":
      return z.boolean();

    case "date":
      return z.iso.date();

    case "datetime":
      return z.iso.datetime({ offset: true, local: true });

    case "map":
      return rule.fields ? z.object(buildShape(rule.fields)) : z.record(z.string(), z.unknown());

    case "array":
      return z.array(itemsToZod(rule.items));
  }
}

function itemsToZod(items: ValidationItems | undefined): z.ZodType {
  if (!items) return z.unknown();

  switch (items.type) {
    case "string":
      return z.string();
    case "integer":
      return z.number().int();
    case "map":
      return items.fields ? z.object(buildShape(items.fields)) : z.record(z.string(), z.unknown());
  }
}

function stringWithConstraints(c: ValidationConstraints): z.ZodString {
  let s = z.string();
  if (c.minLength !== undefined) s = s.min(c.minLength);
  if (c.maxLength !== undefined) s = s.max(c.maxLength);
  if (c.pattern !== undefined) s = s.regex(new RegExp(c.pattern));
  return s;
}

function numberWithBounds(c: ValidationConstraints): z.ZodNumber {
  let n = z.number();
  if (c.minimum !== undefined) n = n.min(c.minimum);
  if (c.maximum !== undefined) n = n.max(c.maximum);
  return n;
}

function toFieldErrors(error: z.ZodError): FieldErrorMap {
  const errors: FieldErrorMap = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.map(String).join(".") : "_root";
    (errors[key] ??= []).push(issue.message);
  }
  return errors;
}
