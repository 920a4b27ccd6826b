/**
 * Tests for enums and enum values
 */
import { describe, it, expect } from "vitest";
import { EnumFieldSpec } from "../model/enum-field-spec.js";
import { EnumSpec } from "../model/enum-spec.js";
import { OptionSpec } from "../model/option-spec.js";
import { ReservationSpec } from "../model/reservation-spec.js";
import { render, validate } from "./render.js";

describe("EnumSpec", () => {
  it("renders an empty enum on one line", () => {
    expect(render(EnumSpec.builder("Empty").build())).toBe("enum Empty {}\n");
  });

  it("renders options, reservations and values as separate sections", () => {
    const color = EnumSpec.builder("Color")
      .addEnumOptions(OptionSpec.enumOption("allow_alias").setValue("bool", true))
      .addReservations(ReservationSpec.builder(2), ReservationSpec.builder("OLD"))
      .addEnumFields(
        EnumFieldSpec.builder("UNKNOWN", 0),
        EnumFieldSpec.builder("RED", 1).addFieldOptions(
          OptionSpec.enumValueOption("deprecated").setValue("bool", true),
        ),
      );

    expect(render(color.build())).toBe(
      [
        "enum Color {",
        "  option allow_alias = true;",
        "",
        "  reserved 2;",
        '  reserved "OLD";',
        "",
        "  UNKNOWN = 0;",
        "  RED = 1 [deprecated = true];",
        "}",
        "",
      ].join("\n"),
    );
  });

  it("renders the enum comment", () => {
    const status = EnumSpec.builder("Status")
      .setEnumComment("Lifecycle", "of an order")
      .addEnumFields(EnumFieldSpec.builder("STATUS_UNSPECIFIED", 0));

    expect(render(status.build())).toBe(
      "// Lifecycle\n// of an order\nenum Status {\n  STATUS_UNSPECIFIED = 0;\n}\n",
    );
  });

  it("rejects values using a reserved number", () => {
    const status = EnumSpec.builder("Status")
      .addReservations(ReservationSpec.builder(1))
      .addEnumFields(EnumFieldSpec.builder("A", 1))
      .build();

    expect(() => validate(status)).toThrow(
      "UsageError: field number 1 is reserved and cannot be used",
    );
  });

  it("rejects duplicate value names", () => {
    const status = EnumSpec.builder("Status")
      .addEnumFields(EnumFieldSpec.builder("A", 0))
      .addEnumFields(EnumFieldSpec.builder("A", 1))
      .build();

    expect(() => validate(status)).toThrow(
      "UsageError: field name 'A' (number=1) not unique, used by field number 0",
    );
  });

  it("accepts enum options only", () => {
    expect(() =>
      EnumSpec.builder("Status").addEnumOptions(
        OptionSpec.messageOption("x").setValue("bool", true),
      ),
    ).toThrow("option must be enum type");
  });
});

describe("EnumFieldSpec", () => {
  it("renders a comment and custom options", () => {
    const value = EnumFieldSpec.builder("A", 1)
      .setFieldComment("c")
      .addFieldOptions(
        OptionSpec.enumValueOption("my_opt").setValue("string", "x"),
      );

    expect(render(value.build())).toBe('// c\nA = 1 [(my_opt) = "x"];\n');
  });

  it("allows zero but not negative numbers", () => {
    expect(() => EnumFieldSpec.builder("ZERO", 0)).not.toThrow();
    expect(() => EnumFieldSpec.builder("X", -1)).toThrow(
      "field number may not be negative",
    );
  });

  it("accepts enum value options only", () => {
    expect(() =>
      EnumFieldSpec.builder("A", 1).addFieldOptions(
        OptionSpec.fieldOption("deprecated").setValue("bool", true),
      ),
    ).toThrow("option must be enum value type");
  });
});
