/**
 * Tracks field names and numbers used within one scope (message, enum,
 * service or extension), including names and numbers excluded by
 * reservations.
 */
import { UsageError } from "../errors.js";
import type {
  ReservedRange,
  UseableField,
  UseableFields,
  UseableReservations,
} from "./useable.js";

interface NameEntry {
  number: number | undefined;
  reserved: boolean;
}

type NumberEntry = { name: string; reserved: false } | { reserved: true };

export class UsedFieldMonitor {
  private readonly names = new Map<string, NameEntry>();
  private readonly numbers = new Map<number, NumberEntry>();
  private readonly ranges: ReservedRange[] = [];

  /**
   * Record the numbers and ranges, then every name, of a reservation.
   * Numbers and ranges are checked against earlier registrations only, so
   * a reservation may overlap itself.
   */
  addReservation(reservation: UseableReservations): void {
    const numbers = reservation.reservedNumbers();
    const ranges = reservation.reservedRanges();

    for (const fieldNumber of numbers) {
      this.ensureNumberUnused(fieldNumber);
    }
    for (const range of ranges) {
      this.ensureRangeUnused(range);
    }
    for (const fieldNumber of numbers) {
      this.numbers.set(fieldNumber, { reserved: true });
    }
    this.ranges.push(...ranges);

    for (const fieldName of reservation.reservedNames()) {
      this.ensureUnused({
        fieldName: () => fieldName,
        fieldNumber: () => undefined,
      });
      this.names.set(fieldName, { number: undefined, reserved: true });
    }
  }

  addField(field: UseableField): void {
    this.ensureUnused(field);
    const fieldName = field.fieldName();
    const fieldNumber = field.fieldNumber();
    this.names.set(fieldName, { number: fieldNumber, reserved: false });
    if (fieldNumber !== undefined) {
      this.numbers.set(fieldNumber, { name: fieldName, reserved: false });
    }
  }

  /**
   * Record a group's own name, then each of its members, in this scope
   */
  addFields(group: UseableFields): void {
    const groupName = group.fieldName();
    this.addField({
      fieldName: () => groupName,
      fieldNumber: () => undefined,
    });
    for (const field of group.fields()) {
      this.addField(field);
    }
  }

  reset(): void {
    this.names.clear();
    this.numbers.clear();
    this.ranges.length = 0;
  }

  /**
   * Throws UsageError when the field's name or number is already taken
   */
  ensureUnused(field: UseableField): void {
    const fieldName = field.fieldName();
    const fieldNumber = field.fieldNumber();

    const usedName = this.names.get(fieldName);
    if (usedName) {
      if (usedName.reserved) {
        throw new UsageError(
          `field name '${fieldName}' is reserved and cannot be used`,
        );
      }
      if (usedName.number === undefined) {
        throw new UsageError(`field name '${fieldName}' is not unique`);
      }
      const candidate =
        fieldNumber === undefined
          ? `'${fieldName}'`
          : `'${fieldName}' (number=${fieldNumber})`;
      throw new UsageError(
        `field name ${candidate} not unique, used by field number ${usedName.number}`,
      );
    }

    if (fieldNumber !== undefined) {
      this.ensureNumberUnused(fieldNumber);
    }
  }

  private ensureNumberUnused(fieldNumber: number): void {
    const inRange = this.ranges.some(
      (range) => fieldNumber >= range.lo && fieldNumber <= range.hi,
    );
    const usedNumber = this.numbers.get(fieldNumber);
    if (!usedNumber && !inRange) return;

    if (inRange || !usedNumber || usedNumber.reserved) {
      throw new UsageError(
        `field number ${fieldNumber} is reserved and cannot be used`,
      );
    }
    throw new UsageError(
      `field number ${fieldNumber} already used by field named '${usedNumber.name}'`,
    );
  }

  private ensureRangeUnused(range: ReservedRange): void {
    const taken = [...this.numbers.keys()]
      .filter((n) => n >= range.lo && n <= range.hi)
      .sort((a, b) => a - b);
    if (taken.length > 0) {
      this.ensureNumberUnused(taken[0]);
    }
    for (const other of this.ranges) {
      if (other.lo <= range.hi && range.lo <= other.hi) {
        this.ensureNumberUnused(Math.max(other.lo, range.lo));
      }
    }
  }
}
