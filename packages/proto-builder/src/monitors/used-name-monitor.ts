/**
 * Tracks type names declared directly in one file or one message
 */
import { UsageError } from "../errors.js";
import type { UseableName } from "./useable.js";

export class UsedNameMonitor {
  private readonly names = new Set<string>();

  /**
   * @param scope - name of the enclosing message, quoted in error messages
   */
  constructor(private readonly scope?: string) {}

  add(name: UseableName): void {
    this.ensureUnused(name);
    this.names.add(name.typeName());
  }

  reset(): void {
    this.names.clear();
  }

  ensureUnused(name: UseableName): void {
    const candidate = name.typeName();
    if (!this.names.has(candidate)) return;

    throw new UsageError(
      this.scope === undefined
        ? `'${candidate}' name already used`
        : `'${candidate}' name already used in '${this.scope}'`,
    );
  }
}
