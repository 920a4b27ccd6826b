/**
 * Text sinks the writer appends to
 */
import type { Writable } from "node:stream";
import type { TextSink } from "../types.js";

/**
 * Accumulates rendered text in memory
 */
export class StringSink implements TextSink {
  private readonly chunks: string[] = [];

  append(text: string): void {
    this.chunks.push(text);
  }

  toString(): string {
    return this.chunks.join("");
  }
}

/**
 * Drops everything; used for validation-only renders
 */
export class NullSink implements TextSink {
  append(_text: string): void {}
}

/**
 * Adapt a Node writable stream (a file stream, process.stdout, ...) to a sink.
 * The stream's lifetime stays with the caller.
 */
export function streamSink(stream: Writable): TextSink {
  return {
    append: (text) => {
      stream.write(text);
    },
  };
}
