/**
 * Render configuration
 */
import { assertArgument } from "./errors.js";
import { createLogger, type Logger } from "./utils/logger.js";

export interface RenderOptions {
  // Indentation unit written once per indent step unit (default: " ")
  indent?: string;
  // Units per indentation level (default: 2)
  indentSize?: number;
  // Soft column limit for wrapped runs such as inline field options (default: 80)
  lineWidth?: number;
  // Log render summaries (default: false)
  debug?: boolean;
  // Custom logger; built from `debug` when omitted
  logger?: Logger;
}

export interface ResolvedRenderOptions {
  indent: string;
  indentSize: number;
  lineWidth: number;
  debug: boolean;
  logger: Logger;
}

export const DEFAULT_RENDER_OPTIONS = {
  indent: " ",
  indentSize: 2,
  lineWidth: 80,
  debug: false,
} as const;

/**
 * Merge caller options with the defaults and validate them
 */
export function resolveRenderOptions(
  options: RenderOptions = {},
): ResolvedRenderOptions {
  const indent = options.indent ?? DEFAULT_RENDER_OPTIONS.indent;
  const indentSize = options.indentSize ?? DEFAULT_RENDER_OPTIONS.indentSize;
  const lineWidth = options.lineWidth ?? DEFAULT_RENDER_OPTIONS.lineWidth;
  const debug = options.debug ?? DEFAULT_RENDER_OPTIONS.debug;

  assertArgument(
    indent.length > 0 && indent.trim() === "",
    "indent must be a non-empty whitespace string",
  );
  assertArgument(
    Number.isInteger(indentSize) && indentSize > 0,
    `indentSize must be a positive integer, got ${indentSize}`,
  );
  assertArgument(
    Number.isInteger(lineWidth) && lineWidth > 0,
    `lineWidth must be a positive integer, got ${lineWidth}`,
  );

  return {
    indent,
    indentSize,
    lineWidth,
    debug,
    logger: options.logger ?? createLogger({ debug }),
  };
}
