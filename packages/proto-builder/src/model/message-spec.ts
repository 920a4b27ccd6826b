/**
 * `message Name { ... }`
 *
 * A message owns two scopes: its fields (including oneof members) and the
 * names of the messages and enums nested directly inside it. Each add* call
 * of body elements becomes one block; blocks are separated by a blank line.
 */
import { assertArgument, withUsageBoundary } from "../errors.js";
import {
  isUseableField,
  isUseableFields,
  isUseableName,
  type UseableName,
} from "../monitors/useable.js";
import { UsedFieldMonitor } from "../monitors/used-field-monitor.js";
import { UsedNameMonitor } from "../monitors/used-name-monitor.js";
import type { Buildable, Emittable } from "../types.js";
import { buildAll } from "../utils/buildables.js";
import type { ProtoWriter } from "../writer/proto-writer.js";
import type { EnumSpec } from "./enum-spec.js";
import type { MessageField } from "./message-field.js";
import type { OptionSpec } from "./option-spec.js";
import type { ReservationSpec } from "./reservation-spec.js";

export type MessageElement = MessageSpec | EnumSpec | MessageField;

interface MessageParts {
  name: string;
  comment: readonly string[];
  blocks: readonly (readonly MessageElement[])[];
  reservations: readonly ReservationSpec[];
  options: readonly OptionSpec[];
}

export class MessageSpec
  implements Buildable<MessageSpec>, Emittable, UseableName
{
  static builder(messageName: string): MessageSpecBuilder {
    assertArgument(messageName.length > 0, "message name may not be empty");
    return new MessageSpecBuilder(messageName);
  }

  private readonly usedFields = new UsedFieldMonitor();
  private readonly usedNames: UsedNameMonitor;

  /** @internal use {@link MessageSpec.builder} */
  constructor(private readonly parts: MessageParts) {
    this.usedNames = new UsedNameMonitor(parts.name);
  }

  typeName(): string {
    return this.parts.name;
  }

  emit(writer: ProtoWriter): void {
    const { name, comment, blocks, reservations, options } = this.parts;
    this.usedFields.reset();
    this.usedNames.reset();

    if (comment.length > 0) {
      writer.emitComment(comment);
    }
    writer.emit(`message ${name} {`);

    if (options.length > 0) {
      writer.emit("\n").indent();
      for (const option of options) {
        option.emit(writer);
      }
      writer.unindent();
    }

    if (reservations.length > 0) {
      writer.emit("\n").indent();
      for (const reservation of reservations) {
        withUsageBoundary(() => this.usedFields.addReservation(reservation));
        reservation.emit(writer);
      }
      writer.unindent();
    }

    for (const block of blocks) {
      writer.emit("\n");
      for (const element of block) {
        withUsageBoundary(() => this.register(element));
        writer.indent();
        element.emit(writer);
        writer.unindent();
      }
    }

    writer.emit("}\n");
  }

  build(): MessageSpec {
    return this;
  }

  private register(element: MessageElement): void {
    if (isUseableName(element)) {
      this.usedNames.add(element);
    }
    if (isUseableField(element)) {
      this.usedFields.addField(element);
    }
    if (isUseableFields(element)) {
      this.usedFields.addFields(element);
    }
  }
}

export class MessageSpecBuilder implements Buildable<MessageSpec> {
  private comment: readonly string[] = [];
  private blocks: readonly (readonly MessageElement[])[] = [];
  private reservations: readonly ReservationSpec[] = [];
  private options: readonly OptionSpec[] = [];

  constructor(private readonly messageName: string) {}

  setMessageComment(...lines: string[]): this {
    this.comment = lines;
    return this;
  }

  addMessages(...messages: Buildable<MessageSpec>[]): this {
    return this.addBlock(buildAll(messages));
  }

  addEnums(...enums: Buildable<EnumSpec>[]): this {
    return this.addBlock(buildAll(enums));
  }

  addMessageFields(...fields: Buildable<MessageField>[]): this {
    return this.addBlock(buildAll(fields));
  }

  addReservations(...reservations: Buildable<ReservationSpec>[]): this {
    this.reservations = [...this.reservations, ...buildAll(reservations)];
    return this;
  }

  addMessageOptions(...options: Buildable<OptionSpec>[]): this {
    const built = buildAll(options, (option) =>
      assertArgument(
        option.optionType === "message",
        "option must be message type",
      ),
    );
    this.options = [...this.options, ...built];
    return this;
  }

  build(): MessageSpec {
    return new MessageSpec({
      name: this.messageName,
      comment: this.comment,
      blocks: this.blocks,
      reservations: this.reservations,
      options: this.options,
    });
  }

  private addBlock(elements: readonly MessageElement[]): this {
    this.blocks = [...this.blocks, elements];
    return this;
  }
}
