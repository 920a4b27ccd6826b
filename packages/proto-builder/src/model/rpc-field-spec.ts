/**
 * Service method: `rpc Name (Request) returns (Response);`
 */
import { assertArgument } from "../errors.js";
import type { UseableField } from "../monitors/useable.js";
import type { Buildable, Emittable } from "../types.js";
import { buildAll } from "../utils/buildables.js";
import type { ProtoWriter } from "../writer/proto-writer.js";
import type { OptionSpec } from "./option-spec.js";

interface RpcMessage {
  messageName: string;
  streaming: boolean;
}

function formatRpcMessage({ messageName, streaming }: RpcMessage): string {
  return streaming ? `stream ${messageName}` : messageName;
}

export class RpcFieldSpec
  implements Buildable<RpcFieldSpec>, Emittable, UseableField
{
  static builder(fieldName: string): RpcFieldSpecBuilder {
    assertArgument(fieldName.length > 0, "field name may not be empty");
    return new RpcFieldSpecBuilder(fieldName);
  }

  /** @internal use {@link RpcFieldSpec.builder} */
  constructor(
    private readonly name: string,
    private readonly comment: readonly string[],
    private readonly request: RpcMessage,
    private readonly response: RpcMessage,
    private readonly options: readonly OptionSpec[],
  ) {}

  fieldName(): string {
    return this.name;
  }

  // Methods are identified by name only.
  fieldNumber(): undefined {
    return undefined;
  }

  emit(writer: ProtoWriter): void {
    if (this.comment.length > 0) {
      writer.emitComment(this.comment);
    }
    writer.emit(
      `rpc ${this.name} (${formatRpcMessage(this.request)}) returns (${formatRpcMessage(this.response)})`,
    );
    if (this.options.length === 0) {
      writer.emit(";\n");
      return;
    }
    writer.emit(" {\n").indent();
    for (const option of this.options) {
      option.emit(writer);
    }
    writer.unindent().emit("}\n");
  }

  build(): RpcFieldSpec {
    return this;
  }
}

export class RpcFieldSpecBuilder implements Buildable<RpcFieldSpec> {
  private comment: readonly string[] = [];
  private request: RpcMessage | undefined;
  private response: RpcMessage | undefined;
  private options: readonly OptionSpec[] = [];

  constructor(private readonly fieldName: string) {}

  setFieldComment(...lines: string[]): this {
    this.comment = lines;
    return this;
  }

  setRequestMessageName(messageName: string, streaming = false): this {
    assertArgument(messageName.length > 0, "request message may not be empty");
    this.request = { messageName, streaming };
    return this;
  }

  setResponseMessageName(messageName: string, streaming = false): this {
    assertArgument(messageName.length > 0, "response message may not be empty");
    this.response = { messageName, streaming };
    return this;
  }

  addFieldOptions(...options: Buildable<OptionSpec>[]): this {
    const built = buildAll(options, (option) =>
      assertArgument(option.optionType === "method", "option must be method type"),
    );
    this.options = [...this.options, ...built];
    return this;
  }

  build(): RpcFieldSpec {
    assertArgument(this.request !== undefined, "request message must be set");
    assertArgument(this.response !== undefined, "response message must be set");
    return new RpcFieldSpec(
      this.fieldName,
      this.comment,
      this.request,
      this.response,
      this.options,
    );
  }
}
