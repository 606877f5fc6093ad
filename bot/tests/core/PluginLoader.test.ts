import { describe, it, expect } from "vitest";
import { resolveLoadOrder } from "../../src/core/PluginLoader";

type Deps = { dependencies: string[]; optionalDependencies: string[] };

function manifests(entries: Record<string, Partial<Deps>>): Map<string, Deps> {
  return new Map(Object.entries(entries).map(([name, deps]) => [name, { dependencies: deps.dependencies ?? [], optionalDependencies: deps.optionalDependencies ?? [] }]));
}

describe("resolveLoadOrder", () => {
  it("loads dependencies before their dependents", () => {
    const order = resolveLoadOrder(
      manifests({
        structure: { dependencies: ["lib", "roster"], optionalDependencies: ["verification"] },
        verification: { dependencies: ["lib", "roster"], optionalDependencies: ["auth"] },
        auth: { dependencies: ["lib", "roster"] },
        roster: { dependencies: ["lib"] },
        lib: {},
      }),
    );

    expect(order).toEqual(["lib", "roster", "auth", "verification", "structure"]);
  });

  it("ignores optional dependencies that are not present", () => {
    const order = resolveLoadOrder(
      manifests({
        verification: { optionalDependencies: ["auth"] },
        lib: {},
      }),
    );

    expect(order).toEqual(["lib", "verification"]);
  });

  it("throws on a cycle", () => {
    expect(() =>
      resolveLoadOrder(
        manifests({
          a: { dependencies: ["b"] },
          b: { dependencies: ["a"] },
          c: {},
        }),
      ),
    ).toThrow("Circular dependency detected involving: a, b");
  });
});
