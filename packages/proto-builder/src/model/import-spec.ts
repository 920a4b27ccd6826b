/**
 * Import statement of a proto file
 */
import { assertArgument } from "../errors.js";
import type { Buildable, Emittable, ImportModifier } from "../types.js";
import type { ProtoWriter } from "../writer/proto-writer.js";

const MODIFIER_TEXT: Record<ImportModifier, string> = {
  none: " ",
  weak: " weak ",
  public: " public ",
};

export const DESCRIPTOR_PROTO = "google/protobuf/descriptor.proto";

export class ImportSpec implements Buildable<ImportSpec>, Emittable {
  /**
   * @example
   * ImportSpec.of("google/protobuf/timestamp.proto")
   * ImportSpec.of("public", "shared/common.proto")
   */
  static of(path: string): ImportSpec;
  static of(modifier: ImportModifier, path: string): ImportSpec;
  static of(first: string, second?: string): ImportSpec {
    if (second === undefined) {
      return new ImportSpec("none", first);
    }
    assertArgument(
      first === "none" || first === "weak" || first === "public",
      `unknown import modifier '${first}'`,
    );
    return new ImportSpec(first, second);
  }

  private constructor(
    readonly modifier: ImportModifier,
    readonly path: string,
  ) {
    assertArgument(
      path.endsWith(".proto"),
      "path must be a file ending with .proto",
    );
  }

  emit(writer: ProtoWriter): void {
    writer.emit(`import${MODIFIER_TEXT[this.modifier]}"${this.path}";`).emit("\n");
  }

  build(): ImportSpec {
    return this;
  }

  equals(other: ImportSpec): boolean {
    return this.modifier === other.modifier && this.path === other.path;
  }
}
