/**
 * proto3-builder
 *
 * Assemble an immutable model of a proto3 source file and render it as
 * deterministic `.proto` text.
 */

export { ProtoFile, ProtoFileBuilder, type FileElement } from "./model/proto-file.js";
export {
  MessageSpec,
  MessageSpecBuilder,
  type MessageElement,
} from "./model/message-spec.js";
export type { MessageField } from "./model/message-field.js";
export {
  MessageFieldSpec,
  MessageFieldSpecBuilder,
} from "./model/message-field-spec.js";
export { MapFieldSpec, MapFieldSpecBuilder } from "./model/map-field-spec.js";
export {
  OneofFieldSpec,
  OneofFieldSpecBuilder,
} from "./model/oneof-field-spec.js";
export { EnumSpec, EnumSpecBuilder } from "./model/enum-spec.js";
export { EnumFieldSpec, EnumFieldSpecBuilder } from "./model/enum-field-spec.js";
export { ServiceSpec, ServiceSpecBuilder } from "./model/service-spec.js";
export { RpcFieldSpec, RpcFieldSpecBuilder } from "./model/rpc-field-spec.js";
export {
  ExtensionSpec,
  ExtensionSpecBuilder,
} from "./model/extension-spec.js";
export {
  OptionSpec,
  OptionSpecBuilder,
  formatOptionName,
} from "./model/option-spec.js";
export {
  ReservationSpec,
  ReservationSpecBuilder,
} from "./model/reservation-spec.js";
export { FieldRange, FIELD_NUMBER_MAX } from "./model/field-range.js";
export { ImportSpec, DESCRIPTOR_PROTO } from "./model/import-spec.js";
export {
  FieldValue,
  type ScalarInput,
  type ScalarValue,
} from "./model/field-value.js";
export {
  MAP_KEY_TYPES,
  inferFieldType,
  isMapKeyType,
} from "./model/field-type.js";

export { UsedFieldMonitor } from "./monitors/used-field-monitor.js";
export { UsedNameMonitor } from "./monitors/used-name-monitor.js";
export type {
  Importable,
  ReservedRange,
  UseableField,
  UseableFields,
  UseableName,
  UseableReservations,
} from "./monitors/useable.js";

export { ProtoWriter } from "./writer/proto-writer.js";
export { LineWrapper } from "./writer/line-wrapper.js";
export { StringSink, NullSink, streamSink } from "./writer/sink.js";

export {
  DEFAULT_RENDER_OPTIONS,
  resolveRenderOptions,
  type RenderOptions,
  type ResolvedRenderOptions,
} from "./config.js";
export { BuilderError, UsageError, ProtoRenderError } from "./errors.js";
export {
  DEFAULT_LOG_PREFIX,
  createLogger,
  type Logger,
  type LoggerOptions,
} from "./utils/logger.js";

export type {
  Buildable,
  Emittable,
  FieldType,
  ImportModifier,
  OptionType,
  TextSink,
} from "./types.js";
export { FIELD_TYPES, OPTION_CLASS_NAMES } from "./types.js";
