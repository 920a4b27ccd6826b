/**
 * Indentation- and comment-aware text emitter shared by every model node
 */
import {
  resolveRenderOptions,
  type RenderOptions,
  type ResolvedRenderOptions,
} from "../config.js";
import { assertArgument } from "../errors.js";
import type { TextSink } from "../types.js";
import { LineWrapper } from "./line-wrapper.js";
import { NullSink } from "./sink.js";

export class ProtoWriter {
  /**
   * A writer that validates and discards its output
   */
  static discard(options: RenderOptions = {}): ProtoWriter {
    return new ProtoWriter(new NullSink(), options);
  }

  readonly options: ResolvedRenderOptions;
  private readonly out: LineWrapper;

  // Measured in indent units, not levels.
  private indentLevel = 0;
  private trailingNewline = false;
  private commentMode = false;

  constructor(sink: TextSink, options: RenderOptions = {}) {
    this.options = resolveRenderOptions(options);
    this.out = new LineWrapper(
      sink,
      this.options.indent,
      this.options.lineWidth,
    );
  }

  indent(): this {
    this.indentLevel += this.options.indentSize;
    return this;
  }

  unindent(): this {
    assertArgument(
      this.indentLevel - this.options.indentSize >= 0,
      `cannot unindent ${this.options.indentSize} from ${this.indentLevel}`,
    );
    this.indentLevel -= this.options.indentSize;
    return this;
  }

  /**
   * Write each line as a `//` comment, re-applying the prefix on every line
   */
  emitComment(lines: readonly string[]): this {
    for (const line of lines) {
      this.trailingNewline = true;
      this.commentMode = true;
      try {
        this.emit(line);
        this.emit("\n");
      } finally {
        this.commentMode = false;
      }
    }
    return this;
  }

  emit(text: string): this {
    const lines = text.split("\n");

    lines.forEach((line, index) => {
      if (index > 0) {
        // A blank comment line still gets its marker.
        if (this.commentMode && this.trailingNewline) {
          this.emitIndentation();
          this.out.append("//");
        }
        this.out.append("\n");
        this.trailingNewline = true;
      }

      if (line.length === 0) return;

      if (this.trailingNewline) {
        this.emitIndentation();
        if (this.commentMode) {
          this.out.append("// ");
        }
      }

      this.out.append(line);
      this.trailingNewline = false;
    });

    return this;
  }

  /**
   * Soft break point; wrapped text continues two levels deeper
   */
  wrappingSpace(): this {
    this.out.wrappingSpace(this.indentLevel + 2 * this.options.indentSize);
    return this;
  }

  close(): void {
    this.out.close();
  }

  private emitIndentation(): void {
    if (this.indentLevel > 0) {
      this.out.append(this.options.indent.repeat(this.indentLevel));
    }
  }
}
