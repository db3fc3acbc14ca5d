import { describe, test, expect } from "vitest";

import { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from "../../src/config.js";

describe("resolveEngineConfig", () => {
  test("an empty patch yields the defaults", () => {
    expect(resolveEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(DEFAULT_ENGINE_CONFIG).toMatchObject({ debounceMs: 150, maxWorkers: 2, maxRestarts: 2, cache: { maxWeight: 512 } });
  });

  test("applies valid fields and keeps the base for the rest", () => {
    const config = resolveEngineConfig({ debounceMs: 20, formatter: { printWidth: 60 }, compile: { inputs: { lang: "en" } } });
    expect(config.debounceMs).toBe(20);
    expect(config.formatter).toEqual({ mode: "builtin", printWidth: 60 });
    expect(config.compile).toEqual({ inputs: { lang: "en" }, fontRevision: "default" });
    expect(config.maxWorkers).toBe(2);
  });

  test("invalid values fall back field by field", () => {
    const base = resolveEngineConfig({ maxWorkers: 4 });
    const config = resolveEngineConfig(
      {
        maxWorkers: 0,
        debounceMs: Number.NaN,
        backgroundBudgetMs: 12.7,
        cache: { maxWeight: -1 },
      },
      base,
    );
    expect(config.maxWorkers).toBe(4);
    expect(config.debounceMs).toBe(150);
    expect(config.backgroundBudgetMs).toBe(12);
    expect(config.cache.maxWeight).toBe(512);
  });
});
