/**
 * `oneof name { ... }` group. Its members are plain fields checked against
 * the enclosing message's fields.
 */
import { BuilderError, assertArgument } from "../errors.js";
import type { UseableFields } from "../monitors/useable.js";
import type { Buildable, Emittable } from "../types.js";
import { buildAll } from "../utils/buildables.js";
import type { ProtoWriter } from "../writer/proto-writer.js";
import type { MessageField } from "./message-field.js";
import type { MessageFieldSpec } from "./message-field-spec.js";
import type { OptionSpec } from "./option-spec.js";

export class OneofFieldSpec
  implements Buildable<OneofFieldSpec>, Emittable, UseableFields
{
  readonly kind = "oneof";

  static builder(fieldName: string): OneofFieldSpecBuilder {
    assertArgument(fieldName.length > 0, "field name may not be empty");
    return new OneofFieldSpecBuilder(fieldName);
  }

  /** @internal use {@link OneofFieldSpec.builder} */
  constructor(
    private readonly name: string,
    private readonly comment: readonly string[],
    private readonly members: readonly MessageFieldSpec[],
    private readonly options: readonly OptionSpec[],
  ) {}

  fieldName(): string {
    return this.name;
  }

  fields(): readonly MessageFieldSpec[] {
    return this.members;
  }

  emit(writer: ProtoWriter): void {
    if (this.comment.length > 0) {
      writer.emitComment(this.comment);
    }
    writer.emit(`oneof ${this.name} {`);
    if (this.options.length > 0) {
      writer.emit("\n").indent();
      for (const option of this.options) {
        option.emit(writer);
      }
      writer.unindent();
    }
    if (this.members.length > 0) {
      writer.emit("\n").indent();
      for (const member of this.members) {
        member.emit(writer);
      }
      writer.unindent();
    }
    writer.emit("}\n");
  }

  build(): OneofFieldSpec {
    return this;
  }
}

function toOneofMember(field: MessageField): MessageFieldSpec {
  switch (field.kind) {
    case "map":
      throw new BuilderError(
        `map field '${field.fieldName()}' not allowed in oneof`,
      );
    case "oneof":
      throw new BuilderError(
        `immediate inner oneof field '${field.fieldName()}' disallowed`,
      );
    case "field":
      assertArgument(
        !field.isRepeated,
        `repeated field '${field.fieldName()}' not allowed in oneof`,
      );
      return field;
  }
}

export class OneofFieldSpecBuilder implements Buildable<OneofFieldSpec> {
  private comment: readonly string[] = [];
  private members: readonly MessageFieldSpec[] = [];
  private options: readonly OptionSpec[] = [];

  constructor(private readonly fieldName: string) {}

  setFieldComment(...lines: string[]): this {
    this.comment = lines;
    return this;
  }

  addMessageFields(...fields: Buildable<MessageField>[]): this {
    this.members = [...this.members, ...buildAll(fields).map(toOneofMember)];
    return this;
  }

  addOneofOptions(...options: Buildable<OptionSpec>[]): this {
    const built = buildAll(options, (option) =>
      assertArgument(option.optionType === "oneof", "option must be oneof type"),
    );
    this.options = [...this.options, ...built];
    return this;
  }

  build(): OneofFieldSpec {
    return new OneofFieldSpec(
      this.fieldName,
      this.comment,
      this.members,
      this.options,
    );
  }
}
