import { z } from "zod";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

export const ArgvSchema = z.record(JsonValueSchema);

// Secrets and runtime handles never reach the journal.
const OMIT_KEYS = new Set(["_", "$0", "runtime", "token"]);

function normalizeValue(value: unknown): JsonValue | undefined {
  if (value === undefined || typeof value === "function") return undefined;
  if (value === null) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (Array.isArray(value)) {
    return value
      .map((item) => normalizeValue(item))
      .filter((item): item is JsonValue => item !== undefined);
  }
  if (typeof value === "object") {
    return normalizeArgv(Object.fromEntries(Object.entries(value)));
  }
  return undefined;
}

/** Strips argv down to a sorted, JSON-safe record for the journal. */
export function normalizeArgv(argv: Record<string, unknown>): Record<string, JsonValue> {
  const normalized: Record<string, JsonValue> = {};
  const keys = Object.keys(argv).sort();
  for (const key of keys) {
    if (OMIT_KEYS.has(key)) continue;
    const value = normalizeValue(argv[key]);
    if (value === undefined) continue;
    normalized[key] = value;
  }
  return normalized;
}
