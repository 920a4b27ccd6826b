/**
 * `extend google.protobuf.<Category>Options { ... }` block declaring custom
 * options. Pulls in descriptor.proto wherever it is declared.
 */
import { BuilderError, withUsageBoundary } from "../errors.js";
import type { Importable, UseableName } from "../monitors/useable.js";
import { UsedFieldMonitor } from "../monitors/used-field-monitor.js";
import {
  OPTION_CLASS_NAMES,
  type Buildable,
  type Emittable,
  type OptionType,
} from "../types.js";
import { buildAll } from "../utils/buildables.js";
import type { ProtoWriter } from "../writer/proto-writer.js";
import { DESCRIPTOR_PROTO, ImportSpec } from "./import-spec.js";
import type { MessageField } from "./message-field.js";
import type { MessageFieldSpec } from "./message-field-spec.js";

function toExtensionField(field: MessageField): MessageFieldSpec {
  if (field.kind !== "field") {
    throw new BuilderError("complex fields not allowed (eg: oneofs or maps)");
  }
  return field;
}

export class ExtensionSpec
  implements Buildable<ExtensionSpec>, Emittable, Importable, UseableName
{
  /**
   * @example
   * ExtensionSpec.builder("message").addExtensionFields(
   *   MessageFieldSpec.builder("string", "my_option", 50000),
   * )
   */
  static builder(optionType: OptionType): ExtensionSpecBuilder {
    return new ExtensionSpecBuilder(OPTION_CLASS_NAMES[optionType]);
  }

  private readonly usedFields = new UsedFieldMonitor();
  private readonly implicitImports = [ImportSpec.of(DESCRIPTOR_PROTO)];

  /** @internal use {@link ExtensionSpec.builder} */
  constructor(
    private readonly extendedName: string,
    private readonly comment: readonly string[],
    private readonly fields: readonly MessageFieldSpec[],
  ) {}

  typeName(): string {
    return this.extendedName;
  }

  imports(): readonly ImportSpec[] {
    return this.implicitImports;
  }

  emit(writer: ProtoWriter): void {
    this.usedFields.reset();
    if (this.comment.length > 0) {
      writer.emitComment(this.comment);
    }
    writer.emit(`extend ${this.extendedName} {`);
    if (this.fields.length > 0) {
      writer.emit("\n").indent();
      for (const field of this.fields) {
        withUsageBoundary(() => this.usedFields.addField(field));
        field.emit(writer);
      }
      writer.unindent();
    }
    writer.emit("}\n");
  }

  build(): ExtensionSpec {
    return this;
  }
}

export class ExtensionSpecBuilder implements Buildable<ExtensionSpec> {
  private comment: readonly string[] = [];
  private fields: readonly MessageFieldSpec[] = [];

  constructor(private readonly extendedName: string) {}

  setExtensionComment(...lines: string[]): this {
    this.comment = lines;
    return this;
  }

  addExtensionFields(...fields: Buildable<MessageField>[]): this {
    this.fields = [...this.fields, ...buildAll(fields).map(toExtensionField)];
    return this;
  }

  build(): ExtensionSpec {
    return new ExtensionSpec(this.extendedName, this.comment, this.fields);
  }
}
