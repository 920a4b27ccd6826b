/**
 * Map field: `map<key, value> name = number [options];`
 */
import { assertArgument } from "../errors.js";
import type { UseableField } from "../monitors/useable.js";
import type { Buildable, Emittable, FieldType } from "../types.js";
import { buildAll } from "../utils/buildables.js";
import type { ProtoWriter } from "../writer/proto-writer.js";
import {
  MAP_KEY_TYPES,
  isMapKeyType,
  requiresCustomTypeName,
} from "./field-type.js";
import {
  assertFieldNumber,
  fieldOptionCheck,
  resolveTypeName,
} from "./message-field-spec.js";
import { OptionSpec } from "./option-spec.js";

export class MapFieldSpec
  implements Buildable<MapFieldSpec>, Emittable, UseableField
{
  readonly kind = "map";

  static builder(
    keyType: FieldType,
    valueType: FieldType,
    fieldName: string,
    fieldNumber: number,
  ): MapFieldSpecBuilder {
    assertArgument(
      isMapKeyType(keyType),
      `key type must be of an acceptable type (${MAP_KEY_TYPES.join(", ")})`,
    );
    assertArgument(fieldName.length > 0, "field name may not be empty");
    assertFieldNumber(fieldNumber);
    return new MapFieldSpecBuilder(keyType, valueType, fieldName, fieldNumber);
  }

  /** @internal use {@link MapFieldSpec.builder} */
  constructor(
    readonly keyType: FieldType,
    private readonly valueTypeName: string,
    private readonly name: string,
    private readonly number: number,
    private readonly comment: readonly string[],
    private readonly options: readonly OptionSpec[],
  ) {}

  fieldName(): string {
    return this.name;
  }

  fieldNumber(): number {
    return this.number;
  }

  emit(writer: ProtoWriter): void {
    if (this.comment.length > 0) {
      writer.emitComment(this.comment);
    }
    writer.emit(
      `map<${this.keyType}, ${this.valueTypeName}> ${this.name} = ${this.number}`,
    );
    OptionSpec.emitFieldOptions(this.options, writer).emit(";\n");
  }

  build(): MapFieldSpec {
    return this;
  }
}

export class MapFieldSpecBuilder implements Buildable<MapFieldSpec> {
  private comment: readonly string[] = [];
  private customTypeName: string | undefined;
  private options: readonly OptionSpec[] = [];

  constructor(
    private readonly keyType: FieldType,
    private readonly valueType: FieldType,
    private readonly fieldName: string,
    private readonly fieldNumber: number,
  ) {}

  setFieldComment(...lines: string[]): this {
    this.comment = lines;
    return this;
  }

  setCustomTypeName(customTypeName: string): this {
    assertArgument(
      requiresCustomTypeName(this.valueType),
      "custom type names only supported for message and enum value types",
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

  build(): MapFieldSpec {
    return new MapFieldSpec(
      this.keyType,
      resolveTypeName(this.fieldName, this.valueType, this.customTypeName),
      this.fieldName,
      this.fieldNumber,
      this.comment,
      this.options,
    );
  }
}
