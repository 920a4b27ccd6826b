/**
 * Tests for message rendering and message scope checks
 */
import { describe, it, expect } from "vitest";
import { ProtoRenderError, UsageError } from "../errors.js";
import { EnumSpec } from "../model/enum-spec.js";
import { FieldRange } from "../model/field-range.js";
import { MapFieldSpec } from "../model/map-field-spec.js";
import { MessageFieldSpec } from "../model/message-field-spec.js";
import { MessageSpec } from "../model/message-spec.js";
import { OneofFieldSpec } from "../model/oneof-field-spec.js";
import { OptionSpec } from "../model/option-spec.js";
import { ReservationSpec } from "../model/reservation-spec.js";
import { render, validate } from "./render.js";

describe("MessageSpec", () => {
  describe("rendering", () => {
    it("renders an empty message on one line", () => {
      expect(render(MessageSpec.builder("TestMessage").build())).toBe(
        "message TestMessage {}\n",
      );
    });

    it("renders the message comment", () => {
      const message = MessageSpec.builder("A").setMessageComment("this is a test");

      expect(render(message.build())).toBe("// this is a test\nmessage A {}\n");
    });

    it("keeps fields added together on consecutive lines", () => {
      const message = MessageSpec.builder("A")
        .setMessageComment("comment")
        .addMessageFields(
          MessageFieldSpec.builder("bool", "a", 1),
          MessageFieldSpec.builder("string", "b", 2)
            .setFieldComment("comment")
            .setRepeated(true),
          MessageFieldSpec.builder("message", "c", 3).setCustomTypeName("Foo"),
        );

      expect(render(message.build())).toBe(
        [
          "// comment",
          "message A {",
          "  bool a = 1;",
          "  // comment",
          "  repeated string b = 2;",
          "  Foo c = 3;",
          "}",
          "",
        ].join("\n"),
      );
    });

    it("separates blocks added by separate calls with a blank line", () => {
      const message = MessageSpec.builder("A")
        .setMessageComment("comment")
        .addMessageFields(MessageFieldSpec.builder("bool", "a", 1))
        .addMessageFields(
          MessageFieldSpec.repeated("string", "b", 2).setFieldComment("comment"),
        )
        .addMessageFields(MessageFieldSpec.message("Foo", "c", 3));

      expect(render(message.build())).toBe(
        [
          "// comment",
          "message A {",
          "  bool a = 1;",
          "",
          "  // comment",
          "  repeated string b = 2;",
          "",
          "  Foo c = 3;",
          "}",
          "",
        ].join("\n"),
      );
    });

    it("renders nested messages at increasing depth", () => {
      const message = MessageSpec.builder("A").addMessages(
        MessageSpec.builder("B").addMessages(
          MessageSpec.builder("C"),
          MessageSpec.builder("D").addMessages(
            MessageSpec.builder("E"),
            MessageSpec.builder("F"),
          ),
        ),
        MessageSpec.builder("G"),
      );

      expect(render(message.build())).toBe(
        [
          "message A {",
          "  message B {",
          "    message C {}",
          "    message D {",
          "      message E {}",
          "      message F {}",
          "    }",
          "  }",
          "  message G {}",
          "}",
          "",
        ].join("\n"),
      );
    });

    it("renders reservations before the body", () => {
      const message = MessageSpec.builder("A")
        .setMessageComment("comment")
        .addReservations(
          ReservationSpec.builder(1, 2).addRanges(FieldRange.of(3, 5)),
          ReservationSpec.builder("foo", "bar").setReservationComment("comment"),
        );

      expect(render(message.build())).toBe(
        [
          "// comment",
          "message A {",
          "  reserved 1, 2, 3 to 5;",
          "  // comment",
          '  reserved "foo", "bar";',
          "}",
          "",
        ].join("\n"),
      );
    });

    it("renders a oneof with its members", () => {
      const message = MessageSpec.builder("A")
        .setMessageComment("comment")
        .addMessageFields(
          MessageFieldSpec.builder("string", "foo", 1),
          OneofFieldSpec.builder("B").addMessageFields(
            MessageFieldSpec.builder("bool", "bar", 2),
            MessageFieldSpec.builder("sfixed32", "baz", 3).setFieldComment(
              "comment",
            ),
          ),
        );

      expect(render(message.build())).toBe(
        [
          "// comment",
          "message A {",
          "  string foo = 1;",
          "  oneof B {",
          "    bool bar = 2;",
          "    // comment",
          "    sfixed32 baz = 3;",
          "  }",
          "}",
          "",
        ].join("\n"),
      );
    });

    it("renders map fields", () => {
      const message = MessageSpec.builder("A")
        .setMessageComment("comment")
        .addMessageFields(
          MessageFieldSpec.builder("string", "foo", 1),
          MapFieldSpec.builder("string", "string", "bar", 2).setFieldComment(
            "comment",
          ),
        );

      expect(render(message.build())).toBe(
        [
          "// comment",
          "message A {",
          "  string foo = 1;",
          "  // comment",
          "  map<string, string> bar = 2;",
          "}",
          "",
        ].join("\n"),
      );
    });

    it("hoists options above the body", () => {
      const message = MessageSpec.builder("A")
        .setMessageComment("comment")
        .addMessageOptions(
          OptionSpec.messageOption("b")
            .setOptionComment("comment")
            .setValue("string", "hello"),
          OptionSpec.messageOption("c")
            .setOptionComment("comment")
            .setValue("enum", "Test"),
        );

      expect(render(message.build())).toBe(
        [
          "// comment",
          "message A {",
          "  // comment",
          '  option (b) = "hello";',
          "  // comment",
          "  option (c) = Test;",
          "}",
          "",
        ].join("\n"),
      );
    });

    it("renders the same text every time", () => {
      const message = MessageSpec.builder("A")
        .addMessageFields(
          MessageFieldSpec.builder("int32", "a", 1),
          OneofFieldSpec.builder("choice").addMessageFields(
            MessageFieldSpec.builder("string", "b", 2),
          ),
        )
        .addEnums(EnumSpec.builder("Kind"))
        .build();

      expect(render(message)).toBe(render(message));
    });
  });

  describe("scope checks", () => {
    it("enforces reservations", () => {
      const message = MessageSpec.builder("A")
        .addReservations(ReservationSpec.builder(1, 2))
        .addMessageFields(MessageFieldSpec.builder("bool", "a", 1))
        .build();

      expect(() => validate(message)).toThrow(ProtoRenderError);
      expect(() => validate(message)).toThrow(
        "UsageError: field number 1 is reserved and cannot be used",
      );
    });

    it("applies reservations declared after the fields", () => {
      const message = MessageSpec.builder("A")
        .addMessageFields(MessageFieldSpec.builder("bool", "legacy", 4))
        .addReservations(ReservationSpec.builder("legacy"))
        .build();

      expect(() => validate(message)).toThrow(
        "UsageError: field name 'legacy' is reserved and cannot be used",
      );
    });

    it("checks oneof members against sibling fields", () => {
      const message = MessageSpec.builder("A")
        .addMessageFields(
          MessageFieldSpec.builder("string", "foo", 1),
          OneofFieldSpec.builder("B").addMessageFields(
            MessageFieldSpec.builder("bool", "bar", 1),
          ),
        )
        .build();

      expect(() => validate(message)).toThrow(
        "UsageError: field number 1 already used by field named 'foo'",
      );
    });

    it("rejects a oneof member named like the oneof", () => {
      const message = MessageSpec.builder("A")
        .addMessageFields(
          OneofFieldSpec.builder("value").addMessageFields(
            MessageFieldSpec.builder("string", "value", 1),
          ),
        )
        .build();

      expect(() => validate(message)).toThrow(
        "UsageError: field name 'value' is not unique",
      );
    });

    it("rejects a oneof named like a sibling field", () => {
      const message = MessageSpec.builder("A")
        .addMessageFields(
          MessageFieldSpec.builder("string", "kind", 1),
          OneofFieldSpec.builder("kind").addMessageFields(
            MessageFieldSpec.builder("string", "other", 2),
          ),
        )
        .build();

      expect(() => validate(message)).toThrow(
        "UsageError: field name 'kind' not unique, used by field number 1",
      );
    });

    it("rejects nested types sharing a name", () => {
      const message = MessageSpec.builder("A")
        .addMessages(MessageSpec.builder("B"))
        .addEnums(EnumSpec.builder("B"))
        .build();

      expect(() => validate(message)).toThrow("'B' name already used in 'A'");
    });

    it("checks nested names against the immediate parent only", () => {
      const message = MessageSpec.builder("A")
        .addMessages(MessageSpec.builder("B").addMessages(MessageSpec.builder("C")))
        .addMessages(MessageSpec.builder("C"))
        .build();

      expect(() => validate(message)).not.toThrow();
    });

    it("fails the same way on every render", () => {
      const message = MessageSpec.builder("A")
        .addMessageFields(
          MessageFieldSpec.builder("int32", "a", 1),
          MessageFieldSpec.builder("int32", "a", 2),
        )
        .build();

      const failures = [1, 2].map(() => {
        try {
          validate(message);
          return undefined;
        } catch (error) {
          return error;
        }
      });

      expect(failures[0]).toBeInstanceOf(ProtoRenderError);
      expect(failures[1]).toBeInstanceOf(ProtoRenderError);
      expect(String(failures[0])).toBe(String(failures[1]));
    });

    it("keeps the usage error as the cause", () => {
      const message = MessageSpec.builder("A")
        .addMessageFields(
          MessageFieldSpec.builder("int32", "a", 1),
          MessageFieldSpec.builder("int32", "b", 1),
        )
        .build();

      try {
        validate(message);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ProtoRenderError);
        if (error instanceof ProtoRenderError) {
          expect(error.cause).toBeInstanceOf(UsageError);
        }
      }
    });
  });

  describe("builder checks", () => {
    it("accepts message options only", () => {
      expect(() =>
        MessageSpec.builder("A").addMessageOptions(
          OptionSpec.enumOption("b").setValue("bool", true),
        ),
      ).toThrow("option must be message type");
    });
  });
});
