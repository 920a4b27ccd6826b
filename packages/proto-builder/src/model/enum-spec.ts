/**
 * `enum Name { ... }` with its own field scope
 */
import { assertArgument, withUsageBoundary } from "../errors.js";
import type { UseableName } from "../monitors/useable.js";
import { UsedFieldMonitor } from "../monitors/used-field-monitor.js";
import type { Buildable, Emittable } from "../types.js";
import { buildAll } from "../utils/buildables.js";
import type { ProtoWriter } from "../writer/proto-writer.js";
import type { EnumFieldSpec } from "./enum-field-spec.js";
import type { OptionSpec } from "./option-spec.js";
import type { ReservationSpec } from "./reservation-spec.js";

export class EnumSpec implements Buildable<EnumSpec>, Emittable, UseableName {
  static builder(enumName: string): EnumSpecBuilder {
    assertArgument(enumName.length > 0, "enum name may not be empty");
    return new EnumSpecBuilder(enumName);
  }

  private readonly usedFields = new UsedFieldMonitor();

  /** @internal use {@link EnumSpec.builder} */
  constructor(
    private readonly name: string,
    private readonly comment: readonly string[],
    private readonly fields: readonly EnumFieldSpec[],
    private readonly reservations: readonly ReservationSpec[],
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
    writer.emit(`enum ${this.name} {`);

    if (this.options.length > 0) {
      writer.emit("\n").indent();
      for (const option of this.options) {
        option.emit(writer);
      }
      writer.unindent();
    }

    if (this.reservations.length > 0) {
      writer.emit("\n").indent();
      for (const reservation of this.reservations) {
        withUsageBoundary(() => this.usedFields.addReservation(reservation));
        reservation.emit(writer);
      }
      writer.unindent();
    }

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

  build(): EnumSpec {
    return this;
  }
}

export class EnumSpecBuilder implements Buildable<EnumSpec> {
  private comment: readonly string[] = [];
  private fields: readonly EnumFieldSpec[] = [];
  private reservations: readonly ReservationSpec[] = [];
  private options: readonly OptionSpec[] = [];

  constructor(private readonly enumName: string) {}

  setEnumComment(...lines: string[]): this {
    this.comment = lines;
    return this;
  }

  addEnumFields(...fields: Buildable<EnumFieldSpec>[]): this {
    this.fields = [...this.fields, ...buildAll(fields)];
    return this;
  }

  addReservations(...reservations: Buildable<ReservationSpec>[]): this {
    this.reservations = [...this.reservations, ...buildAll(reservations)];
    return this;
  }

  addEnumOptions(...options: Buildable<OptionSpec>[]): this {
    const built = buildAll(options, (option) =>
      assertArgument(option.optionType === "enum", "option must be enum type"),
    );
    this.options = [...this.options, ...built];
    return this;
  }

  build(): EnumSpec {
    return new EnumSpec(
      this.enumName,
      this.comment,
      this.fields,
      this.reservations,
      this.options,
    );
  }
}
