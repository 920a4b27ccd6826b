/**
 * `reserved` statement: field numbers and ranges, or field names
 */
import { BuilderError, assertArgument } from "../errors.js";
import type { UseableReservations } from "../monitors/useable.js";
import type { Buildable, Emittable } from "../types.js";
import type { ProtoWriter } from "../writer/proto-writer.js";
import type { FieldRange } from "./field-range.js";
import { quoteString } from "./field-value.js";

export class ReservationSpec
  implements Buildable<ReservationSpec>, Emittable, UseableReservations
{
  /**
   * Reserve field numbers or field names; duplicates collapse.
   *
   * @example
   * ReservationSpec.builder(1, 2).addRanges(FieldRange.of(10, 20))
   * ReservationSpec.builder("foo", "bar")
   */
  static builder(...fieldNumbers: number[]): ReservationSpecBuilder;
  static builder(...fieldNames: string[]): ReservationSpecBuilder;
  static builder(...entries: (number | string)[]): ReservationSpecBuilder {
    const numbers: number[] = [];
    const names: string[] = [];
    for (const entry of new Set(entries)) {
      if (typeof entry === "number") {
        numbers.push(entry);
      } else {
        names.push(entry);
      }
    }
    if (numbers.length > 0 && names.length > 0) {
      throw new BuilderError(
        "a reservation holds either field numbers or field names",
      );
    }
    assertArgument(
      numbers.every((n) => Number.isInteger(n) && n > 0),
      "reserved field numbers must be positive integers",
    );
    return new ReservationSpecBuilder(numbers, names);
  }

  /** @internal use {@link ReservationSpec.builder} */
  constructor(
    private readonly numbers: readonly number[],
    private readonly ranges: readonly FieldRange[],
    private readonly names: readonly string[],
    private readonly comment: readonly string[],
  ) {}

  emit(writer: ProtoWriter): void {
    if (this.comment.length > 0) {
      writer.emitComment(this.comment);
    }
    const entries = [
      ...this.names.map(quoteString),
      ...this.numbers.map(String),
      ...this.ranges.map((range) => range.toString()),
    ];
    writer.emit(`reserved ${entries.join(", ")};\n`);
  }

  reservedNumbers(): readonly number[] {
    return this.numbers;
  }

  reservedRanges(): readonly FieldRange[] {
    return this.ranges;
  }

  reservedNames(): readonly string[] {
    return this.names;
  }

  build(): ReservationSpec {
    return this;
  }
}

export class ReservationSpecBuilder implements Buildable<ReservationSpec> {
  private comment: readonly string[] = [];
  private ranges: readonly FieldRange[] = [];

  constructor(
    private readonly numbers: readonly number[],
    private readonly names: readonly string[],
  ) {}

  setReservationComment(...lines: string[]): this {
    this.comment = lines;
    return this;
  }

  addRanges(...ranges: FieldRange[]): this {
    assertArgument(
      this.names.length === 0,
      "ranges are only allowed when reserving field numbers",
    );
    this.ranges = [...this.ranges, ...ranges];
    return this;
  }

  build(): ReservationSpec {
    assertArgument(
      this.numbers.length + this.ranges.length + this.names.length > 0,
      "a reservation needs at least one field number, range or name",
    );
    return new ReservationSpec(
      this.numbers,
      this.ranges,
      this.names,
      this.comment,
    );
  }
}
