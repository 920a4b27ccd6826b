/**
 * Error types shared by the builders, the usage monitors and the writer
 *
 * - BuilderError: the builder API was misused (wrong option category,
 *   disallowed field kind, bad numbers). Raised at the offending call.
 * - UsageError: a name or number conflict found while rendering a scope.
 * - ProtoRenderError: what a render call surfaces when a UsageError aborts it.
 */

export class BuilderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BuilderError";
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export class ProtoRenderError extends Error {
  constructor(cause: UsageError) {
    super(`${cause.name}: ${cause.message}`, { cause });
    this.name = "ProtoRenderError";
  }
}

/**
 * Throw a BuilderError unless the condition holds
 */
export function assertArgument(
  condition: boolean,
  message: string,
): asserts condition {
  if (!condition) {
    throw new BuilderError(message);
  }
}

/**
 * Run a monitor registration, converting a UsageError into the
 * ProtoRenderError every enclosing render call propagates unchanged.
 */
export function withUsageBoundary<T>(register: () => T): T {
  try {
    return register();
  } catch (error) {
    if (error instanceof UsageError) {
      throw new ProtoRenderError(error);
    }
    throw error;
  }
}
