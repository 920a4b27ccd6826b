/**
 * Tests for type name tracking within a file or message
 */
import { describe, it, expect } from "vitest";
import { UsageError } from "../errors.js";
import type { UseableName } from "../monitors/useable.js";
import { UsedNameMonitor } from "../monitors/used-name-monitor.js";

function named(name: string): UseableName {
  return { typeName: () => name };
}

describe("UsedNameMonitor", () => {
  it("accepts distinct names", () => {
    const monitor = new UsedNameMonitor();
    monitor.add(named("A"));

    expect(() => monitor.add(named("B"))).not.toThrow();
  });

  it("rejects a repeated name at file level", () => {
    const monitor = new UsedNameMonitor();
    monitor.add(named("B"));

    expect(() => monitor.add(named("B"))).toThrow(UsageError);
    expect(() => monitor.add(named("B"))).toThrow("'B' name already used");
  });

  it("names the enclosing message", () => {
    const monitor = new UsedNameMonitor("A");
    monitor.add(named("B"));

    expect(() => monitor.ensureUnused(named("B"))).toThrow(
      "'B' name already used in 'A'",
    );
  });

  it("forgets names on reset", () => {
    const monitor = new UsedNameMonitor();
    monitor.add(named("B"));
    monitor.reset();

    expect(() => monitor.add(named("B"))).not.toThrow();
  });
});
