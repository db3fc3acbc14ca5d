/**
 * Server settings: the `quill` configuration section, as the client sends it.
 *
 * Every field is optional and checked on its own; a value of the wrong type is
 * dropped here, and out-of-range numbers are dropped by `resolveEngineConfig`,
 * so a bad setting only ever falls back to its default.
 */
import type { EngineConfigPatch, FormatterMode } from "@quill-ls/workspace";

export const SETTINGS_SECTION = "quill";

export interface ServerSettings {
  readonly engine: EngineConfigPatch;
  /** Debug channels to enable; null leaves `QUILL_DEBUG` in charge. */
  readonly debugChannels: readonly string[] | null;
}

export const DEFAULT_SERVER_SETTINGS: ServerSettings = { engine: {}, debugChannels: null };

export function normalizeSettings(raw: unknown): ServerSettings {
  if (!isRecord(raw)) return DEFAULT_SERVER_SETTINGS;
  const diagnostics = section(raw, "diagnostics");
  const scheduler = section(raw, "scheduler");
  const cache = section(raw, "cache");
  const compile = section(raw, "compile");
  const formatter = section(raw, "formatter");
  const debug = section(raw, "debug");

  return {
    engine: {
      debounceMs: numberOf(diagnostics["debounceMs"]),
      maxWorkers: numberOf(scheduler["maxWorkers"]),
      maxRestarts: numberOf(scheduler["maxRestarts"]),
      backgroundBudgetMs: numberOf(scheduler["backgroundBudgetMs"]),
      cache: { maxWeight: numberOf(cache["maxWeight"]) },
      compile: {
        inputs: inputsOf(compile["inputs"]),
        fontRevision: stringOf(compile["fontRevision"]),
      },
      formatter: {
        mode: formatterModeOf(formatter["mode"]),
        printWidth: numberOf(formatter["printWidth"]),
      },
    },
    debugChannels: channelsOf(debug["channels"]),
  };
}

/** The `quill` section of a pushed `didChangeConfiguration` payload. */
export function settingsSectionOf(settings: unknown): unknown {
  return isRecord(settings) ? settings[SETTINGS_SECTION] : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

function numberOf(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function stringOf(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function formatterModeOf(value: unknown): FormatterMode | undefined {
  return value === "builtin" || value === "disable" ? value : undefined;
}

function inputsOf(value: unknown): Record<string, string> | undefined {
  if (!isRecord(value)) return undefined;
  const inputs: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === "string") inputs[key] = entry;
    else if (typeof entry === "number" || typeof entry === "boolean") inputs[key] = String(entry);
  }
  return inputs;
}

function channelsOf(value: unknown): string[] | null {
  if (typeof value === "string") return value.split(",");
  if (!Array.isArray(value)) return null;
  return value.filter((entry): entry is string => typeof entry === "string");
}
