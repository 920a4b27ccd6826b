/**
 * Column-aware sink wrapper that turns soft break points into either a space
 * or a newline, depending on whether the following text still fits the line.
 */
import { BuilderError } from "../errors.js";
import type { TextSink } from "../types.js";

type PendingBreak = { indentLevel: number };

export class LineWrapper {
  private readonly buffer: string[] = [];
  private bufferLength = 0;
  private column = 0;
  private pending: PendingBreak | null = null;
  private closed = false;

  constructor(
    private readonly out: TextSink,
    private readonly indent: string,
    private readonly columnLimit: number,
  ) {}

  /**
   * Append literal text. Newlines in the text are written as they are.
   */
  append(text: string): void {
    if (this.closed) {
      throw new BuilderError("cannot append to a closed line wrapper");
    }

    if (this.pending) {
      const nextNewline = text.indexOf("\n");

      // Still fits: hold it until we know how the break resolves.
      if (nextNewline === -1 && this.column + text.length <= this.columnLimit) {
        this.buffer.push(text);
        this.bufferLength += text.length;
        this.column += text.length;
        return;
      }

      const wrap =
        nextNewline === -1 || this.column + nextNewline > this.columnLimit;
      this.flush(wrap);
    }

    this.out.append(text);
    const lastNewline = text.lastIndexOf("\n");
    this.column =
      lastNewline !== -1
        ? text.length - lastNewline - 1
        : this.column + text.length;
  }

  /**
   * Mark a soft break. Continuation lines are indented by `indentLevel` units.
   */
  wrappingSpace(indentLevel: number): void {
    if (this.closed) {
      throw new BuilderError("cannot append to a closed line wrapper");
    }
    if (this.pending) this.flush(false);
    // The space is deferred, but it already occupies a column.
    this.column++;
    this.pending = { indentLevel };
  }

  close(): void {
    if (this.pending) this.flush(false);
    this.closed = true;
  }

  private flush(wrap: boolean): void {
    const indentLevel = this.pending?.indentLevel ?? 0;

    if (wrap) {
      this.out.append("\n");
      this.out.append(this.indent.repeat(indentLevel));
      this.column = indentLevel * this.indent.length + this.bufferLength;
    } else {
      this.out.append(" ");
    }

    if (this.buffer.length > 0) {
      this.out.append(this.buffer.join(""));
    }
    this.buffer.length = 0;
    this.bufferLength = 0;
    this.pending = null;
  }
}
