/**
 * Typed scalar values for options, and named values for message-typed options
 */
import { BuilderError, assertArgument } from "../errors.js";
import type {
  FieldType,
  FloatingFieldType,
  Int32FieldType,
  Int64FieldType,
  StringLikeFieldType,
} from "../types.js";

export type ScalarValue =
  | { type: Int32FieldType; value: number }
  | { type: Int64FieldType; value: number | bigint }
  | { type: FloatingFieldType; value: number }
  | { type: "bool"; value: boolean }
  | { type: StringLikeFieldType; value: string };

export type ScalarInput = number | bigint | boolean | string;

const UINT32_MAX = 2n ** 32n - 1n;
const INT32_MIN = -(2n ** 31n);
const INT32_MAX = 2n ** 31n - 1n;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;

function invalidType(valueType: FieldType, kind: string): BuilderError {
  return new BuilderError(`'${valueType}' invalid type for ${kind} value`);
}

function checkRange(
  valueType: FieldType,
  value: bigint,
  min: bigint,
  max: bigint,
): void {
  assertArgument(
    value >= min && value <= max,
    `'${valueType}' value ${value} out of range`,
  );
}

function numberValue(valueType: FieldType, value: number): ScalarValue {
  switch (valueType) {
    case "int32":
    case "sint32":
    case "sfixed32":
      assertArgument(
        Number.isInteger(value),
        `'${valueType}' value must be an integer`,
      );
      checkRange(valueType, BigInt(value), INT32_MIN, INT32_MAX);
      return { type: valueType, value };
    case "uint32":
    case "fixed32":
      assertArgument(
        Number.isInteger(value),
        `'${valueType}' value must be an integer`,
      );
      checkRange(valueType, BigInt(value), 0n, UINT32_MAX);
      return { type: valueType, value };
    case "int64":
    case "sint64":
    case "sfixed64":
    case "uint64":
    case "fixed64":
      assertArgument(
        Number.isSafeInteger(value),
        `'${valueType}' value must be a safe integer, use a bigint beyond that`,
      );
      return int64Value(valueType, value);
    case "float":
    case "double":
      return { type: valueType, value };
    default:
      throw invalidType(valueType, "a number");
  }
}

function int64Value(
  valueType: Int64FieldType,
  value: number | bigint,
): ScalarValue {
  const asBigInt = BigInt(value);
  if (valueType === "uint64" || valueType === "fixed64") {
    checkRange(valueType, asBigInt, 0n, UINT64_MAX);
  } else {
    checkRange(valueType, asBigInt, INT64_MIN, INT64_MAX);
  }
  return { type: valueType, value };
}

/**
 * Pair a field type with a runtime value, rejecting mismatches
 */
export function toScalarValue(
  valueType: FieldType,
  value: ScalarInput,
): ScalarValue {
  switch (typeof value) {
    case "number":
      return numberValue(valueType, value);
    case "bigint":
      switch (valueType) {
        case "int64":
        case "sint64":
        case "sfixed64":
        case "uint64":
        case "fixed64":
          return int64Value(valueType, value);
        default:
          throw invalidType(valueType, "a bigint");
      }
    case "boolean":
      if (valueType !== "bool") throw invalidType(valueType, "a bool");
      return { type: valueType, value };
    case "string":
      switch (valueType) {
        case "string":
        case "bytes":
        case "enum":
          return { type: valueType, value };
        default:
          throw invalidType(valueType, "a string");
      }
  }
  throw new BuilderError(`unsupported value for '${valueType}'`);
}

const NAMED_ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

/**
 * Double-quote text as a proto string literal. Control characters become
 * three-digit octal escapes.
 */
export function quoteString(text: string): string {
  const escaped = text.replace(/[\\"\x00-\x1f\x7f]/g, (char) => {
    const named = NAMED_ESCAPES[char];
    if (named !== undefined) return named;
    return `\\${char.charCodeAt(0).toString(8).padStart(3, "0")}`;
  });
  return `"${escaped}"`;
}

function formatFloating(value: number): string {
  if (Number.isNaN(value)) return "nan";
  if (value === Infinity) return "inf";
  if (value === -Infinity) return "-inf";
  return String(value);
}

export function formatScalarValue(scalar: ScalarValue): string {
  switch (scalar.type) {
    case "string":
    case "bytes":
      return quoteString(scalar.value);
    case "float":
    case "double":
      return formatFloating(scalar.value);
    default:
      return String(scalar.value);
  }
}

/**
 * A named value inside a message-typed option value
 */
export class FieldValue {
  static of(
    fieldName: string,
    valueType: FieldType,
    value: ScalarInput,
  ): FieldValue {
    assertArgument(fieldName.length > 0, "field name may not be empty");
    return new FieldValue(fieldName, toScalarValue(valueType, value));
  }

  private constructor(
    readonly fieldName: string,
    readonly value: ScalarValue,
  ) {}

  get valueType(): FieldType {
    return this.value.type;
  }

  formattedValue(): string {
    return formatScalarValue(this.value);
  }
}
