/**
 * A whole `.proto` file and the render entry points
 */
import type { RenderOptions } from "../config.js";
import {
  ProtoRenderError,
  assertArgument,
  withUsageBoundary,
} from "../errors.js";
import { isImportable, isUseableName } from "../monitors/useable.js";
import { UsedNameMonitor } from "../monitors/used-name-monitor.js";
import type { Buildable, Emittable, TextSink } from "../types.js";
import { buildAll } from "../utils/buildables.js";
import type { Logger } from "../utils/logger.js";
import { ProtoWriter } from "../writer/proto-writer.js";
import { StringSink } from "../writer/sink.js";
import type { EnumSpec } from "./enum-spec.js";
import type { ExtensionSpec } from "./extension-spec.js";
import type { ImportSpec } from "./import-spec.js";
import type { MessageSpec } from "./message-spec.js";
import type { OptionSpec } from "./option-spec.js";
import type { ServiceSpec } from "./service-spec.js";

const SILENT_LOGGER: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export type FileElement = MessageSpec | EnumSpec | ExtensionSpec | ServiceSpec;

interface ProtoFileParts {
  packageName: string | undefined;
  comment: readonly string[];
  imports: readonly ImportSpec[];
  blocks: readonly (readonly FileElement[])[];
  options: readonly OptionSpec[];
}

/**
 * Explicit imports first, then implicit ones; the first import of a path
 * wins. The result is ordered by path.
 */
function collectImports(
  explicit: readonly ImportSpec[],
  elements: readonly FileElement[],
): ImportSpec[] {
  const implicit = elements.flatMap((element) =>
    isImportable(element) ? element.imports() : [],
  );
  const byPath = new Map<string, ImportSpec>();
  for (const spec of [...explicit, ...implicit]) {
    if (!byPath.has(spec.path)) {
      byPath.set(spec.path, spec);
    }
  }
  return [...byPath.values()].sort((a, b) =>
    a.path < b.path ? -1 : a.path > b.path ? 1 : 0,
  );
}

export class ProtoFile implements Emittable {
  /**
   * @example
   * const file = ProtoFile.builder()
   *   .setPackageName("acme.orders")
   *   .addMessages(MessageSpec.builder("Order"))
   *   .build();
   * console.log(file.toString());
   */
  static builder(): ProtoFileBuilder {
    return new ProtoFileBuilder();
  }

  private readonly usedNames = new UsedNameMonitor();

  /** @internal use {@link ProtoFile.builder} */
  constructor(private readonly parts: ProtoFileParts) {}

  get packageName(): string | undefined {
    return this.parts.packageName;
  }

  /**
   * Render into the sink. A name or number conflict throws ProtoRenderError;
   * whatever was written before the conflict stays in the sink.
   */
  writeTo(sink: TextSink, options: RenderOptions = {}): void {
    const writer = new ProtoWriter(sink, options);
    const { logger } = writer.options;

    try {
      this.emit(writer);
      writer.close();
    } catch (error) {
      if (error instanceof ProtoRenderError) {
        logger.error(`❌ Failed to render proto file: ${error.message}`);
      }
      throw error;
    }

    const declarations = this.parts.blocks.reduce(
      (count, block) => count + block.length,
      0,
    );
    logger.debug(
      `✅ Rendered ${this.packageName ?? "(no package)"}: ${declarations} declarations`,
    );
  }

  toString(options: RenderOptions = {}): string {
    const sink = new StringSink();
    this.writeTo(sink, options);
    return sink.toString();
  }

  /**
   * Files are equal when they render the same text. Rendering happens
   * without logging; a file that fails to render throws ProtoRenderError.
   */
  equals(other: ProtoFile): boolean {
    if (this === other) return true;
    const options = { logger: SILENT_LOGGER };
    return this.toString(options) === other.toString(options);
  }

  emit(writer: ProtoWriter): void {
    const { packageName, comment, imports, blocks, options } = this.parts;
    this.usedNames.reset();

    if (comment.length > 0) {
      writer.emitComment(comment);
    }
    writer.emit('syntax = "proto3";').emit("\n");

    if (packageName !== undefined) {
      writer.emit("\n").emit(`package ${packageName};`).emit("\n");
    }

    const sortedImports = collectImports(imports, blocks.flat());
    if (sortedImports.length > 0) {
      writer.emit("\n");
      for (const spec of sortedImports) {
        spec.emit(writer);
      }
    }

    if (options.length > 0) {
      writer.emit("\n");
      for (const option of options) {
        option.emit(writer);
      }
    }

    for (const block of blocks) {
      writer.emit("\n");
      for (const element of block) {
        if (isUseableName(element)) {
          withUsageBoundary(() => this.usedNames.add(element));
        }
        element.emit(writer);
      }
    }

    writer.emit("\n");
  }
}

export class ProtoFileBuilder {
  private packageName: string | undefined;
  private comment: readonly string[] = [];
  private imports: readonly ImportSpec[] = [];
  private blocks: readonly (readonly FileElement[])[] = [];
  private options: readonly OptionSpec[] = [];

  setFileComment(...lines: string[]): this {
    this.comment = lines;
    return this;
  }

  setPackageName(packageName: string): this {
    assertArgument(packageName.length > 0, "package name may not be empty");
    this.packageName = packageName;
    return this;
  }

  addImports(...imports: Buildable<ImportSpec>[]): this {
    this.imports = [...this.imports, ...buildAll(imports)];
    return this;
  }

  addMessages(...messages: Buildable<MessageSpec>[]): this {
    return this.addBlock(buildAll(messages));
  }

  addEnums(...enums: Buildable<EnumSpec>[]): this {
    return this.addBlock(buildAll(enums));
  }

  addExtensions(...extensions: Buildable<ExtensionSpec>[]): this {
    return this.addBlock(buildAll(extensions));
  }

  addServices(...services: Buildable<ServiceSpec>[]): this {
    return this.addBlock(buildAll(services));
  }

  addFileOptions(...options: Buildable<OptionSpec>[]): this {
    const built = buildAll(options, (option) =>
      assertArgument(option.optionType === "file", "option must be file type"),
    );
    this.options = [...this.options, ...built];
    return this;
  }

  build(): ProtoFile {
    return new ProtoFile({
      packageName: this.packageName,
      comment: this.comment,
      imports: this.imports,
      blocks: this.blocks,
      options: this.options,
    });
  }

  private addBlock(elements: readonly FileElement[]): this {
    this.blocks = [...this.blocks, elements];
    return this;
  }
}
