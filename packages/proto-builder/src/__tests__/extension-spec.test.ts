/**
 * Tests for custom option extension blocks
 */
import { describe, it, expect } from "vitest";
import { ExtensionSpec } from "../model/extension-spec.js";
import { DESCRIPTOR_PROTO } from "../model/import-spec.js";
import { MapFieldSpec } from "../model/map-field-spec.js";
import { MessageFieldSpec } from "../model/message-field-spec.js";
import { OneofFieldSpec } from "../model/oneof-field-spec.js";
import { render, validate } from "./render.js";

describe("ExtensionSpec", () => {
  it("extends the options message of the category", () => {
    const extension = ExtensionSpec.builder("message").addExtensionFields(
      MessageFieldSpec.builder("string", "my_option", 50000),
    );

    expect(render(extension.build())).toBe(
      "extend google.protobuf.MessageOptions {\n  string my_option = 50000;\n}\n",
    );
  });

  it("renders an empty block and its comment", () => {
    const extension = ExtensionSpec.builder("field").setExtensionComment(
      "field rules",
    );

    expect(render(extension.build())).toBe(
      "// field rules\nextend google.protobuf.FieldOptions {}\n",
    );
  });

  it("requires the descriptor import", () => {
    const [descriptor] = ExtensionSpec.builder("enum_value").build().imports();

    expect(descriptor?.path).toBe(DESCRIPTOR_PROTO);
    expect(descriptor?.modifier).toBe("none");
  });

  it("names the block after the extended message", () => {
    expect(ExtensionSpec.builder("method").build().typeName()).toBe(
      "google.protobuf.MethodOptions",
    );
  });

  it("rejects maps and oneofs", () => {
    expect(() =>
      ExtensionSpec.builder("file").addExtensionFields(
        MapFieldSpec.builder("string", "string", "labels", 50001),
      ),
    ).toThrow("complex fields not allowed (eg: oneofs or maps)");
    expect(() =>
      ExtensionSpec.builder("file").addExtensionFields(
        OneofFieldSpec.builder("choice"),
      ),
    ).toThrow("complex fields not allowed (eg: oneofs or maps)");
  });

  it("rejects duplicate field numbers", () => {
    const extension = ExtensionSpec.builder("message")
      .addExtensionFields(
        MessageFieldSpec.builder("string", "a", 50000),
        MessageFieldSpec.builder("bool", "b", 50000),
      )
      .build();

    expect(() => validate(extension)).toThrow(
      "UsageError: field number 50000 already used by field named 'a'",
    );
  });
});
