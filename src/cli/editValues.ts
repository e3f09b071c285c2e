import type { DesiredValue } from "@/domain/entities";

/** Flag value that clears an optional field. */
export const UNSET_KEYWORD = "none";

export function textOrUnset(value: string): string | null {
  return value.trim().toLowerCase() === UNSET_KEYWORD ? null : value;
}

export function amountOrUnset(value: string | number, flag: string): number | null {
  if (typeof value === "number") return value;
  const trimmed = value.trim();
  if (trimmed.toLowerCase() === UNSET_KEYWORD) return null;
  const parsed = Number(trimmed);
  if (!trimmed || !Number.isFinite(parsed)) {
    throw new Error(`${flag} must be a number or "${UNSET_KEYWORD}".`);
  }
  return parsed;
}

/** Drops flags that were not given; throws when nothing is left to change. */
export function collectEditValues(
  entries: Record<string, DesiredValue | undefined>,
): Record<string, DesiredValue> {
  const values: Record<string, DesiredValue> = {};
  for (const [field, value] of Object.entries(entries)) {
    if (value !== undefined) values[field] = value;
  }
  if (Object.keys(values).length === 0) {
    throw new Error("Provide at least one field to change.");
  }
  return values;
}
