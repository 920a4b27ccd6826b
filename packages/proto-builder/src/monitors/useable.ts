/**
 * Capabilities a model node may offer to the usage monitors and the file
 * node. Traversal checks them structurally, so a node opts in simply by
 * implementing the methods.
 */
import type { ImportSpec } from "../model/import-spec.js";

/** A type declaration that must be unique by name in its enclosing scope. */
export interface UseableName {
  typeName(): string;
}

/**
 * A single field identity. Numberless fields (rpc methods) return undefined
 * from fieldNumber() and are only checked by name.
 */
export interface UseableField {
  fieldName(): string;
  fieldNumber(): number | undefined;
}

/** A named group of fields registered into its parent scope (oneof). */
export interface UseableFields {
  fieldName(): string;
  fields(): readonly UseableField[];
}

/** Inclusive bounds of a reserved number range. */
export interface ReservedRange {
  readonly lo: number;
  readonly hi: number;
}

/** A block of reserved field numbers, number ranges and names. */
export interface UseableReservations {
  reservedNumbers(): readonly number[];
  reservedRanges(): readonly ReservedRange[];
  reservedNames(): readonly string[];
}

/** A top-level declaration that needs imports in the enclosing file. */
export interface Importable {
  imports(): readonly ImportSpec[];
}

function hasMethod<K extends string>(
  value: object,
  key: K,
): value is Record<K, (...args: never[]) => unknown> {
  return key in value && typeof Reflect.get(value, key) === "function";
}

export function isUseableName(value: object): value is UseableName {
  return hasMethod(value, "typeName");
}

export function isUseableField(value: object): value is UseableField {
  return hasMethod(value, "fieldName") && hasMethod(value, "fieldNumber");
}

export function isUseableFields(value: object): value is UseableFields {
  return hasMethod(value, "fieldName") && hasMethod(value, "fields");
}

export function isImportable(value: object): value is Importable {
  return hasMethod(value, "imports");
}
