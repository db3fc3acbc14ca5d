import { createHash } from "node:crypto";

/**
 * Deterministic, stable JSON-like serialization for hashing.
 * - Sorts object keys and Map entries; Set members are sorted by serialization.
 * - Treats `undefined` / functions as nullish literals to keep hashing total.
 * - Not resilient to cycles (inputs are expected to be DAG-friendly).
 */
export function stableSerialize(value: unknown): string {
  return serialize(value);
}

export function stableHash(value: unknown): string {
  return createHash("sha256").update(stableSerialize(value)).digest("hex");
}

/** Hash of raw text content; cheaper than `stableHash` because it skips serialization. */
export function contentHash(text: string): string {
  return createHash("sha256").update(text).digest("hex").slice(0, 32);
}

function serialize(value: unknown): string {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "number":
      return Number.isFinite(value) ? String(value) : `"${String(value)}"`;
    case "boolean":
      return value ? "true" : "false";
    case "undefined":
      return "null";
    case "function":
      return '"<fn>"';
    case "object":
      if (value === null) return "null";
      if (value instanceof Map) return serializeMap(value);
      if (value instanceof Set) return serializeSet(value);
      if (Array.isArray(value)) return serializeArray(value);
      return serializeObject(value);
    default:
      return JSON.stringify(String(value));
  }
}

function serializeArray(arr: readonly unknown[]): string {
  return `[${arr.map((entry) => serialize(entry)).join(",")}]`;
}

function serializeMap(map: ReadonlyMap<unknown, unknown>): string {
  const parts = Array.from(map.entries())
    .map(([k, v]) => [serialize(k), serialize(v)] as const)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `[${k},${v}]`);
  return `{"__map__":[${parts.join(",")}]}`;
}

function serializeSet(set: ReadonlySet<unknown>): string {
  const sorted = Array.from(set.values())
    .map((v) => serialize(v))
    .sort();
  return `{"__set__":[${sorted.join(",")}]}`;
}

function serializeObject(obj: object): string {
  const entries = Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${serialize(v)}`).join(",")}}`;
}
