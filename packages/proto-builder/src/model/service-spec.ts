/**
 * `service Name { ... }`; method names are unique within the service
 */
import { assertArgument, withUsageBoundary } from "../errors.js";
import type { UseableName } from "../monitors/useable.js";
import { UsedFieldMonitor } from "../monitors/used-field-monitor.js";
import type { Buildable, Emittable } from "../types.js";
import { buildAll } from "../utils/buildables.js";
import type { ProtoWriter } from "../writer/proto-writer.js";
import type { OptionSpec } from "./option-spec.js";
import type { RpcFieldSpec } from "./rpc-field-spec.js";

export class ServiceSpec
  implements Buildable<ServiceSpec>, Emittable, UseableName
{
  static builder(serviceName: string): ServiceSpecBuilder {
    assertArgument(serviceName.length > 0, "service name may not be empty");
    return new ServiceSpecBuilder(serviceName);
  }

  private readonly usedFields = new UsedFieldMonitor();

  /** @internal use {@link ServiceSpec.builder} */
  constructor(
    private readonly name: string,
    private readonly comment: readonly string[],
    private readonly rpcFields: readonly RpcFieldSpec[],
    private readonly options: readonly OptionSpec[],
  ) {}

  typeName(): string {
    return this.name;
  }

  emit(writer: ProtoWriter): void {
    this.usedFields.reset();
    if (this.comment.length > 0) {
      writer.emitComment(this.comment);
    }
    writer.emit(`service ${this.name} {`);

    if (this.options.length > 0) {
      writer.emit("\n").indent();
      for (const option of this.options) {
        option.emit(writer);
      }
      writer.unindent();
    }

    if (this.rpcFields.length > 0) {
      writer.emit("\n").indent();
      for (const rpc of this.rpcFields) {
        withUsageBoundary(() => this.usedFields.addField(rpc));
        rpc.emit(writer);
      }
      writer.unindent();
    }

    writer.emit("}\n");
  }

  build(): ServiceSpec {
    return this;
  }
}

export class ServiceSpecBuilder implements Buildable<ServiceSpec> {
  private comment: readonly string[] = [];
  private rpcFields: readonly RpcFieldSpec[] = [];
  private options: readonly OptionSpec[] = [];

  constructor(private readonly serviceName: string) {}

  setServiceComment(...lines: string[]): this {
    this.comment = lines;
    return this;
  }

  addRpcFields(...rpcFields: Buildable<RpcFieldSpec>[]): this {
    this.rpcFields = [...this.rpcFields, ...buildAll(rpcFields)];
    return this;
  }

  addServiceOptions(...options: Buildable<OptionSpec>[]): this {
    const built = buildAll(options, (option) =>
      assertArgument(
        option.optionType === "service",
        "option must be service type",
      ),
    );
    this.options = [...this.options, ...built];
    return this;
  }

  build(): ServiceSpec {
    return new ServiceSpec(
      this.serviceName,
      this.comment,
      this.rpcFields,
      this.options,
    );
  }
}
