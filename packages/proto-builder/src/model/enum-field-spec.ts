/**
 * Enum value: `NAME = number [options];`
 */
import { assertArgument } from "../errors.js";
import type { UseableField } from "../monitors/useable.js";
import type { Buildable, Emittable } from "../types.js";
import { buildAll } from "../utils/buildables.js";
import type { ProtoWriter } from "../writer/proto-writer.js";
import { OptionSpec } from "./option-spec.js";

export class EnumFieldSpec
  implements Buildable<EnumFieldSpec>, Emittable, UseableField
{
  static builder(fieldName: string, fieldNumber: number): EnumFieldSpecBuilder {
    assertArgument(fieldName.length > 0, "enum field name may not be empty");
    assertArgument(
      Number.isInteger(fieldNumber) && fieldNumber >= 0,
      "field number may not be negative",
    );
    return new EnumFieldSpecBuilder(fieldName, fieldNumber);
  }

  /** @internal use {@link EnumFieldSpec.builder} */
  constructor(
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
    writer.emit(`${this.name} = ${this.number}`);
    OptionSpec.emitFieldOptions(this.options, writer).emit(";\n");
  }

  build(): EnumFieldSpec {
    return this;
  }
}

export class EnumFieldSpecBuilder implements Buildable<EnumFieldSpec> {
  private comment: readonly string[] = [];
  private options: readonly OptionSpec[] = [];

  constructor(
    private readonly fieldName: string,
    private readonly fieldNumber: number,
  ) {}

  setFieldComment(...lines: string[]): this {
    this.comment = lines;
    return this;
  }

  addFieldOptions(...options: Buildable<OptionSpec>[]): this {
    const built = buildAll(options, (option) =>
      assertArgument(
        option.optionType === "enum_value",
        "option must be enum value type",
      ),
    );
    this.options = [...this.options, ...built];
    return this;
  }

  build(): EnumFieldSpec {
    return new EnumFieldSpec(
      this.fieldName,
      this.fieldNumber,
      this.comment,
      this.options,
    );
  }
}
