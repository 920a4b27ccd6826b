/**
 * Tests for typed scalar values and field type inference
 */
import { describe, it, expect } from "vitest";
import { inferFieldType, isMapKeyType } from "../model/field-type.js";
import { FieldValue } from "../model/field-value.js";
import { FIELD_TYPES } from "../types.js";

describe("FieldValue", () => {
  it("quotes strings and escapes backslashes", () => {
    const value = FieldValue.of("path", "string", "C:\\dir");

    expect(value.formattedValue()).toBe(String.raw`"C:\\dir"`);
    expect(value.valueType).toBe("string");
  });

  it("escapes control characters", () => {
    const value = FieldValue.of("raw", "bytes", "a\tb\r\x01\x7f");

    expect(value.formattedValue()).toBe(String.raw`"a\tb\r\001\177"`);
  });

  it("renders enum literals and booleans bare", () => {
    expect(FieldValue.of("state", "enum", "ACTIVE").formattedValue()).toBe(
      "ACTIVE",
    );
    expect(FieldValue.of("on", "bool", false).formattedValue()).toBe("false");
  });

  it("renders infinities", () => {
    expect(FieldValue.of("x", "double", Infinity).formattedValue()).toBe("inf");
    expect(FieldValue.of("x", "double", -Infinity).formattedValue()).toBe(
      "-inf",
    );
  });

  it("requires a field name", () => {
    expect(() => FieldValue.of("", "int32", 1)).toThrow(
      "field name may not be empty",
    );
  });

  it("rejects fractional integers", () => {
    expect(() => FieldValue.of("x", "int32", 1.5)).toThrow(
      "'int32' value must be an integer",
    );
  });

  it("rejects bigint for 32-bit types", () => {
    expect(() => FieldValue.of("x", "int32", 1n)).toThrow(
      "'int32' invalid type for a bigint value",
    );
  });

  it("checks 64-bit ranges", () => {
    expect(() => FieldValue.of("x", "uint64", 2n ** 64n)).toThrow(
      "'uint64' value 18446744073709551616 out of range",
    );
    expect(() => FieldValue.of("x", "int64", 2 ** 53)).toThrow(
      "'int64' value must be a safe integer, use a bigint beyond that",
    );
  });
});

describe("inferFieldType", () => {
  it("infers numeric types", () => {
    expect(inferFieldType(1.5)).toBe("double");
    expect(inferFieldType(42)).toBe("int32");
    expect(inferFieldType(2 ** 40)).toBe("int64");
    expect(inferFieldType(10n)).toBe("int64");
  });

  it("infers the other scalar types", () => {
    expect(inferFieldType(true)).toBe("bool");
    expect(inferFieldType("text")).toBe("string");
    expect(inferFieldType(new Uint8Array([1, 2]))).toBe("bytes");
  });

  it("infers message values from field values", () => {
    expect(inferFieldType([FieldValue.of("a", "int32", 1)])).toBe("message");
  });

  it("infers members of the field type list", () => {
    expect(FIELD_TYPES).toHaveLength(17);
    expect(new Set(FIELD_TYPES).size).toBe(17);
    for (const value of [1.5, 7, 2n ** 40n, true, "x", new Uint8Array()]) {
      expect(FIELD_TYPES).toContain(inferFieldType(value));
    }
  });

  it("rejects values with no field type", () => {
    expect(() => inferFieldType({})).toThrow(
      "unable to express a field type for value",
    );
  });
});

describe("isMapKeyType", () => {
  it("allows integral, bool and string keys only", () => {
    expect(isMapKeyType("sfixed64")).toBe(true);
    expect(isMapKeyType("string")).toBe(true);
    expect(isMapKeyType("double")).toBe(false);
    expect(isMapKeyType("bytes")).toBe(false);
    expect(isMapKeyType("enum")).toBe(false);
  });
});
