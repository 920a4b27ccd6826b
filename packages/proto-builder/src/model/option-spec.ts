/**
 * Options attached to files, messages, fields, enums, enum values, services,
 * oneofs and methods.
 *
 * Field and enum value options render inline inside a `[...]` list after
 * the declaration; every other category renders as an `option ...;`
 * statement.
 */
import { BuilderError, assertArgument } from "../errors.js";
import type { Buildable, Emittable, FieldType, OptionType } from "../types.js";
import type { ProtoWriter } from "../writer/proto-writer.js";
import {
  FieldValue,
  formatScalarValue,
  toScalarValue,
  type ScalarInput,
  type ScalarValue,
} from "./field-value.js";

type OptionValue =
  | { kind: "scalar"; scalar: ScalarValue }
  | { kind: "message"; fields: readonly FieldValue[] };

const INLINE_OPTION_TYPES: ReadonlySet<OptionType> = new Set([
  "field",
  "enum_value",
]);

// Names declared by google/protobuf/descriptor.proto render without parentheses.
const WELL_KNOWN_OPTIONS: Record<OptionType, ReadonlySet<string>> = {
  file: new Set([
    "java_package",
    "java_outer_classname",
    "java_multiple_files",
    "java_generate_equals_and_hash",
    "java_string_check_utf8",
    "optimize_for",
    "go_package",
    "cc_generic_services",
    "java_generic_services",
    "py_generic_services",
    "php_generic_services",
    "deprecated",
    "cc_enable_arenas",
    "objc_class_prefix",
    "csharp_namespace",
    "swift_prefix",
    "php_class_prefix",
    "php_namespace",
  ]),
  message: new Set([
    "message_set_wire_format",
    "no_standard_descriptor_accessor",
    "deprecated",
  ]),
  field: new Set(["ctype", "packed", "jstype", "lazy", "deprecated", "weak"]),
  enum: new Set(["allow_alias", "deprecated"]),
  enum_value: new Set(["deprecated"]),
  service: new Set(["deprecated"]),
  oneof: new Set(),
  method: new Set(["deprecated", "idempotency_level"]),
};

export function formatOptionName(
  optionType: OptionType,
  optionName: string,
): string {
  if (WELL_KNOWN_OPTIONS[optionType].has(optionName)) return optionName;
  return optionName.startsWith("(") ? optionName : `(${optionName})`;
}

export class OptionSpec implements Buildable<OptionSpec>, Emittable {
  static fileOption(optionName: string): OptionSpecBuilder {
    return OptionSpec.builder("file", optionName);
  }

  static messageOption(optionName: string): OptionSpecBuilder {
    return OptionSpec.builder("message", optionName);
  }

  static fieldOption(optionName: string): OptionSpecBuilder {
    return OptionSpec.builder("field", optionName);
  }

  static enumOption(optionName: string): OptionSpecBuilder {
    return OptionSpec.builder("enum", optionName);
  }

  static enumValueOption(optionName: string): OptionSpecBuilder {
    return OptionSpec.builder("enum_value", optionName);
  }

  static serviceOption(optionName: string): OptionSpecBuilder {
    return OptionSpec.builder("service", optionName);
  }

  static oneofOption(optionName: string): OptionSpecBuilder {
    return OptionSpec.builder("oneof", optionName);
  }

  static methodOption(optionName: string): OptionSpecBuilder {
    return OptionSpec.builder("method", optionName);
  }

  static builder(optionType: OptionType, optionName: string): OptionSpecBuilder {
    assertArgument(optionName.length > 0, "option name may not be empty");
    return new OptionSpecBuilder(optionType, optionName);
  }

  /**
   * Write ` [a = 1, b = 2]` after a field declaration; nothing when empty.
   * Each separator is a soft break, so long lists wrap.
   */
  static emitFieldOptions(
    options: readonly OptionSpec[],
    writer: ProtoWriter,
  ): ProtoWriter {
    if (options.length === 0) return writer;

    writer.emit(" [");
    options.forEach((option, index) => {
      if (index > 0) {
        writer.emit(",").wrappingSpace();
      }
      option.emit(writer);
    });
    return writer.emit("]");
  }

  /** @internal use {@link OptionSpec.builder} */
  constructor(
    readonly optionType: OptionType,
    readonly optionName: string,
    private readonly comment: readonly string[],
    private readonly value: OptionValue,
  ) {}

  get isInline(): boolean {
    return INLINE_OPTION_TYPES.has(this.optionType);
  }

  emit(writer: ProtoWriter): void {
    if (!this.isInline && this.comment.length > 0) {
      writer.emitComment(this.comment);
    }
    const name = formatOptionName(this.optionType, this.optionName);
    const { value } = this;

    if (value.kind === "scalar") {
      const formatted = formatScalarValue(value.scalar);
      writer.emit(
        this.isInline
          ? `${name} = ${formatted}`
          : `option ${name} = ${formatted};\n`,
      );
      return;
    }

    if (!this.isInline) {
      writer.emit(`option ${name} = {\n`).indent();
      for (const field of value.fields) {
        writer.emit(`${field.fieldName}: ${field.formattedValue()}\n`);
      }
      writer.unindent().emit("};\n");
      return;
    }

    writer.emit(`${name} = { `);
    for (const field of value.fields) {
      writer.emit(`${field.fieldName}: ${field.formattedValue()} `);
    }
    writer.emit("}");
  }

  build(): OptionSpec {
    return this;
  }
}

export class OptionSpecBuilder implements Buildable<OptionSpec> {
  private comment: readonly string[] = [];
  private value: OptionValue | undefined;

  constructor(
    private readonly optionType: OptionType,
    private readonly optionName: string,
  ) {}

  setOptionComment(...lines: string[]): this {
    assertArgument(
      !INLINE_OPTION_TYPES.has(this.optionType),
      "comments aren't available for field options",
    );
    this.comment = lines;
    return this;
  }

  /**
   * @example
   * OptionSpec.fieldOption("deprecated").setValue("bool", true)
   * OptionSpec.fileOption("my_file_option").setValue(
   *   "message",
   *   FieldValue.of("name", "string", "value"),
   * )
   */
  setValue(valueType: "message", ...fieldValues: FieldValue[]): this;
  setValue(valueType: Exclude<FieldType, "message">, value: ScalarInput): this;
  setValue(valueType: FieldType, ...values: (ScalarInput | FieldValue)[]): this {
    if (valueType === "message") {
      const fields: FieldValue[] = [];
      for (const value of values) {
        if (!(value instanceof FieldValue)) {
          throw new BuilderError(
            `'message' invalid type for a ${typeof value} value`,
          );
        }
        fields.push(value);
      }
      this.value = { kind: "message", fields };
      return this;
    }

    const [value, ...rest] = values;
    if (value === undefined || value instanceof FieldValue) {
      throw new BuilderError(`'${valueType}' invalid type for a message value`);
    }
    assertArgument(rest.length === 0, `'${valueType}' takes a single value`);
    this.value = { kind: "scalar", scalar: toScalarValue(valueType, value) };
    return this;
  }

  build(): OptionSpec {
    assertArgument(
      this.value !== undefined,
      `option '${this.optionName}' has no value`,
    );
    return new OptionSpec(
      this.optionType,
      this.optionName,
      this.comment,
      this.value,
    );
  }
}

