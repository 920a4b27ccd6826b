/**
 * Type definitions for proto3-builder
 */
import type { ProtoWriter } from "./writer/proto-writer.js";

const SCALAR_INT32_TYPES = [
  "int32",
  "uint32",
  "sint32",
  "fixed32",
  "sfixed32",
] as const;

const SCALAR_INT64_TYPES = [
  "int64",
  "uint64",
  "sint64",
  "fixed64",
  "sfixed64",
] as const;

export type Int32FieldType = (typeof SCALAR_INT32_TYPES)[number];
export type Int64FieldType = (typeof SCALAR_INT64_TYPES)[number];
export type FloatingFieldType = "float" | "double";
export type StringLikeFieldType = "string" | "bytes" | "enum";

/**
 * All field types a proto3 field may declare. "message" and "enum" render
 * as the custom type name supplied with the field.
 */
export type FieldType =
  | Int32FieldType
  | Int64FieldType
  | FloatingFieldType
  | "bool"
  | "string"
  | "bytes"
  | "message"
  | "enum";

export const FIELD_TYPES: readonly FieldType[] = [
  "double",
  "float",
  ...SCALAR_INT32_TYPES,
  ...SCALAR_INT64_TYPES,
  "bool",
  "string",
  "bytes",
  "message",
  "enum",
];

/**
 * Owner categories an option may attach to. Each maps to the descriptor
 * options message an extension for that category extends.
 */
export type OptionType =
  | "file"
  | "message"
  | "field"
  | "enum"
  | "enum_value"
  | "service"
  | "oneof"
  | "method";

export const OPTION_CLASS_NAMES: Record<OptionType, string> = {
  file: "google.protobuf.FileOptions",
  message: "google.protobuf.MessageOptions",
  field: "google.protobuf.FieldOptions",
  enum: "google.protobuf.EnumOptions",
  enum_value: "google.protobuf.EnumValueOptions",
  service: "google.protobuf.ServiceOptions",
  oneof: "google.protobuf.OneofOptions",
  method: "google.protobuf.MethodOptions",
};

export type ImportModifier = "none" | "weak" | "public";

/**
 * Append-only destination for rendered text
 */
export interface TextSink {
  append(text: string): void;
}

/**
 * Anything that can produce an immutable model node: the node's builder,
 * or the node itself (whose build() returns itself).
 */
export interface Buildable<T> {
  build(): T;
}

/**
 * A model node that renders itself through the writer
 */
export interface Emittable {
  emit(writer: ProtoWriter): void;
}
