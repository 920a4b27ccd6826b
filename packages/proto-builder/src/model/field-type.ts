/**
 * Field type helpers: map key whitelist, custom-typed kinds and inference
 */
import { BuilderError } from "../errors.js";
import type { FieldType } from "../types.js";
import { FieldValue } from "./field-value.js";

/**
 * Scalar types allowed as a map key: no floating point, bytes, message or
 * enum keys.
 */
export const MAP_KEY_TYPES: readonly FieldType[] = [
  "int32",
  "int64",
  "uint32",
  "uint64",
  "sint32",
  "sint64",
  "fixed32",
  "fixed64",
  "sfixed32",
  "sfixed64",
  "bool",
  "string",
];

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

export function isMapKeyType(fieldType: FieldType): boolean {
  return MAP_KEY_TYPES.includes(fieldType);
}

/** message and enum fields render the caller's type name instead. */
export function requiresCustomTypeName(fieldType: FieldType): boolean {
  return fieldType === "message" || fieldType === "enum";
}

/**
 * Guess the field type of a runtime value. Integers that fit 32 bits infer
 * int32, larger ones int64; pick a type explicitly when that matters.
 */
export function inferFieldType(value: unknown): FieldType {
  switch (typeof value) {
    case "number":
      if (!Number.isInteger(value)) return "double";
      return value >= INT32_MIN && value <= INT32_MAX ? "int32" : "int64";
    case "bigint":
      return "int64";
    case "boolean":
      return "bool";
    case "string":
      return "string";
  }
  if (value instanceof Uint8Array) {
    return "bytes";
  }
  if (Array.isArray(value) && value.every((v) => v instanceof FieldValue)) {
    return "message";
  }
  throw new BuilderError("unable to express a field type for value");
}
