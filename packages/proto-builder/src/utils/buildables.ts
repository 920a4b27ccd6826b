import type { Buildable } from "../types.js";

/**
 * Build every item, running the optional check on each result before it is
 * accepted.
 */
export function buildAll<T>(
  buildables: readonly Buildable<T>[],
  check?: (built: T) => void,
): T[] {
  return buildables.map((buildable) => {
    const built = buildable.build();
    check?.(built);
    return built;
  });
}
