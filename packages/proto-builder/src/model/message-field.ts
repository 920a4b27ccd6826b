import type { MapFieldSpec } from "./map-field-spec.js";
import type { MessageFieldSpec } from "./message-field-spec.js";
import type { OneofFieldSpec } from "./oneof-field-spec.js";

/**
 * Anything a message body may declare as a field, told apart by `kind`
 */
export type MessageField = MessageFieldSpec | MapFieldSpec | OneofFieldSpec;
