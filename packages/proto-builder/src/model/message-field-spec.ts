/**
 * Plain message field: `[repeated|optional] type name = number [options];`
 */
import { assertArgument } from "../errors.js";
import type { UseableField } from "../monitors/useable.js";
import type { Buildable, Emittable, FieldType } from "../types.js";
import { buildAll } from "../utils/buildables.js";
import type { ProtoWriter } from "../writer/proto-writer.js";
import { requiresCustomTypeName } from "./field-type.js";
import { OptionSpec } from "./option-spec.js";

export function assertFieldNumber(fieldNumber: number): void {
  assertArgument(
    Number.isInteger(fieldNumber) && fieldNumber > 0,
    "field number must be positive",
  );
}

export function fieldOptionCheck(option: OptionSpec): void {
  assertArgument(option.optionType === "field", "option must be field type");
}

interface MessageFieldParts {
  fieldType: FieldType;
  name: string;
  number: number;
  comment: readonly string[];
  repeated: boolean;
  optional: boolean;
  typeName: string;
  options: readonly OptionSpec[];
}

export class MessageFieldSpec
  implements Buildable<MessageFieldSpec>, Emittable, UseableField
{
  readonly kind = "field";

  static builder(
    fieldType: FieldType,
    fieldName: string,
    fieldNumber: number,
  ): MessageFieldSpecBuilder {
    assertArgument(fieldName.length > 0, "field name may not be empty");
    assertFieldNumber(fieldNumber);
    return new MessageFieldSpecBuilder(fieldType, fieldName, fieldNumber);
  }

  static repeated(
    fieldType: FieldType,
    fieldName: string,
    fieldNumber: number,
  ): MessageFieldSpecBuilder {
    return MessageFieldSpec.builder(fieldType, fieldName, fieldNumber).setRepeated(
      true,
    );
  }

  static optional(
    fieldType: FieldType,
    fieldName: string,
    fieldNumber: number,
  ): MessageFieldSpecBuilder {
    return MessageFieldSpec.builder(fieldType, fieldName, fieldNumber).setOptional(
      true,
    );
  }

  /** A field typed by a message declared elsewhere. */
  static message(
    typeName: string,
    fieldName: string,
    fieldNumber: number,
  ): MessageFieldSpecBuilder {
    return MessageFieldSpec.builder(
      "message",
      fieldName,
      fieldNumber,
    ).setCustomTypeName(typeName);
  }

  /** A field typed by an enum declared elsewhere. */
  static enumeration(
    typeName: string,
    fieldName: string,
    fieldNumber: number,
  ): MessageFieldSpecBuilder {
    return MessageFieldSpec.builder(
      "enum",
      fieldName,
      fieldNumber,
    ).setCustomTypeName(typeName);
  }

  /** @internal use {@link MessageFieldSpec.builder} */
  constructor(private readonly parts: MessageFieldParts) {}

  get fieldType(): FieldType {
    return this.parts.fieldType;
  }

  get isRepeated(): boolean {
    return this.parts.repeated;
  }

  get isOptional(): boolean {
    return this.parts.optional;
  }

  fieldName(): string {
    return this.parts.name;
  }

  fieldNumber(): number {
    return this.parts.number;
  }

  emit(writer: ProtoWriter): void {
    const { comment, repeated, optional, typeName, name, number, options } =
      this.parts;
    if (comment.length > 0) {
      writer.emitComment(comment);
    }
    const label = repeated ? "repeated " : optional ? "optional " : "";
    writer.emit(`${label}${typeName} ${name} = ${number}`);
    OptionSpec.emitFieldOptions(options, writer).emit(";\n");
  }

  build(): MessageFieldSpec {
    return this;
  }
}

export class MessageFieldSpecBuilder implements Buildable<MessageFieldSpec> {
  private comment: readonly string[] = [];
  private repeated = false;
  private optional = false;
  private customTypeName: string | undefined;
  private options: readonly OptionSpec[] = [];

  constructor(
    private readonly fieldType: FieldType,
    private readonly fieldName: string,
    private readonly fieldNumber: number,
  ) {}

  setFieldComment(...lines: string[]): this {
    this.comment = lines;
    return this;
  }

  setRepeated(repeated: boolean): this {
    assertArgument(!this.optional, "optional fields cannot be repeated");
    this.repeated = repeated;
    return this;
  }

  setOptional(optional: boolean): this {
    assertArgument(
      !this.repeated,
      "repeated fields cannot be explicitly optional",
    );
    this.optional = optional;
    return this;
  }

  setCustomTypeName(customTypeName: string): this {
    assertArgument(
      requiresCustomTypeName(this.fieldType),
      "custom type names only supported for message and enum types",
    );
    assertArgument(
      customTypeName.length > 0,
      "custom type name may not be empty",
    );
    this.customTypeName = customTypeName;
    return this;
  }

  addFieldOptions(...options: Buildable<OptionSpec>[]): this {
    this.options = [...this.options, ...buildAll(options, fieldOptionCheck)];
    return this;
  }

  build(): MessageFieldSpec {
    return new MessageFieldSpec({
      fieldType: this.fieldType,
      name: this.fieldName,
      number: this.fieldNumber,
      comment: this.comment,
      repeated: this.repeated,
      optional: this.optional,
      typeName: resolveTypeName(
        this.fieldName,
        this.fieldType,
        this.customTypeName,
      ),
      options: this.options,
    });
  }
}

/**
 * The type written in the declaration: the custom name for message and enum
 * fields, the scalar keyword otherwise.
 */
export function resolveTypeName(
  fieldName: string,
  fieldType: FieldType,
  customTypeName: string | undefined,
): string {
  if (!requiresCustomTypeName(fieldType)) return fieldType;
  assertArgument(
    customTypeName !== undefined,
    `'${fieldName}' type is ${fieldType} and needs a custom type name associated with it`,
  );
  return customTypeName;
}
