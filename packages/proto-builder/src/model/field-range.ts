/**
 * Inclusive range of field numbers for reservations
 */
import { assertArgument } from "../errors.js";

/** Largest field number protobuf accepts; `max` in a reserved range. */
export const FIELD_NUMBER_MAX = 536_870_911;

export class FieldRange {
  static of(lo: number, hi: number): FieldRange {
    assertArgument(
      Number.isInteger(lo) && lo > 0,
      "low number must be a positive integer",
    );
    assertArgument(
      Number.isInteger(hi) && hi > 0,
      "high number must be a positive integer",
    );
    assertArgument(hi > lo, "high value must be higher than low value");
    assertArgument(
      hi <= FIELD_NUMBER_MAX,
      `high number cannot exceed ${FIELD_NUMBER_MAX}`,
    );
    return new FieldRange(lo, hi);
  }

  /** `lo to max` */
  static toMax(lo: number): FieldRange {
    return FieldRange.of(lo, FIELD_NUMBER_MAX);
  }

  private constructor(
    readonly lo: number,
    readonly hi: number,
  ) {}

  contains(fieldNumber: number): boolean {
    return fieldNumber >= this.lo && fieldNumber <= this.hi;
  }

  toString(): string {
    const hi = this.hi === FIELD_NUMBER_MAX ? "max" : String(this.hi);
    return `${this.lo} to ${hi}`;
  }
}
