export type FormatterMode = "builtin" | "disable";

/** The part of the configuration a compile reads; it is hashed into every snapshot fingerprint. */
export interface CompileConfig {
  readonly inputs: Readonly<Record<string, string>>;
  readonly fontRevision: string;
}

export interface EngineConfig {
  /** Quiet period before diagnostics recompute after an edit. */
  readonly debounceMs: number;
  readonly maxWorkers: number;
  /** Automatic re-runs of a superseded interactive request. */
  readonly maxRestarts: number;
  /** Background tasks running longer than this give up their worker slot. */
  readonly backgroundBudgetMs: number;
  readonly cache: {
    readonly maxWeight: number;
  };
  readonly compile: CompileConfig;
  readonly formatter: {
    readonly mode: FormatterMode;
    readonly printWidth: number;
  };
}

export interface EngineConfigPatch {
  readonly debounceMs?: number;
  readonly maxWorkers?: number;
  readonly maxRestarts?: number;
  readonly backgroundBudgetMs?: number;
  readonly cache?: Partial<EngineConfig["cache"]>;
  readonly compile?: Partial<CompileConfig>;
  readonly formatter?: Partial<EngineConfig["formatter"]>;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  debounceMs: 150,
  maxWorkers: 2,
  maxRestarts: 2,
  backgroundBudgetMs: 500,
  cache: {
    maxWeight: 512,
  },
  compile: {
    inputs: {},
    fontRevision: "default",
  },
  formatter: {
    mode: "builtin",
    printWidth: 80,
  },
};

/**
 * Apply a partial configuration on top of `base`, field by field. Values of
 * the wrong type or out of range keep the base value.
 */
export function resolveEngineConfig(patch: EngineConfigPatch = {}, base: EngineConfig = DEFAULT_ENGINE_CONFIG): EngineConfig {
  return {
    debounceMs: normalizeInteger(patch.debounceMs, base.debounceMs, 0),
    maxWorkers: normalizeInteger(patch.maxWorkers, base.maxWorkers, 1),
    maxRestarts: normalizeInteger(patch.maxRestarts, base.maxRestarts, 0),
    backgroundBudgetMs: normalizeInteger(patch.backgroundBudgetMs, base.backgroundBudgetMs, 0),
    cache: {
      maxWeight: normalizeInteger(patch.cache?.maxWeight, base.cache.maxWeight, 1),
    },
    compile: {
      inputs: normalizeInputs(patch.compile?.inputs, base.compile.inputs),
      fontRevision: normalizeString(patch.compile?.fontRevision, base.compile.fontRevision),
    },
    formatter: {
      mode: normalizeFormatterMode(patch.formatter?.mode, base.formatter.mode),
      printWidth: normalizeInteger(patch.formatter?.printWidth, base.formatter.printWidth, 1),
    },
  };
}

function normalizeInteger(value: unknown, fallback: number, min: number): number {
  if (typeof value !== "number" || !Number.isFinite(value)) return fallback;
  const rounded = Math.floor(value);
  return rounded >= min ? rounded : fallback;
}

function normalizeString(value: unknown, fallback: string): string {
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

function normalizeFormatterMode(value: unknown, fallback: FormatterMode): FormatterMode {
  return value === "builtin" || value === "disable" ? value : fallback;
}

function normalizeInputs(value: unknown, fallback: Readonly<Record<string, string>>): Readonly<Record<string, string>> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return fallback;
  const inputs: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string") inputs[key] = entry;
    else if (typeof entry === "number" || typeof entry === "boolean") inputs[key] = String(entry);
  }
  return inputs;
}
