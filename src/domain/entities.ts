export const ENTITY_KINDS = ["transaction", "category", "tag", "recurring"] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

export type EntityRef = {
  kind: EntityKind;
  id: string;
};

/**
 * A field value as the engine sees it. `null` means the field has no value
 * (unset), which is distinct from an empty string or an empty set.
 */
export type FieldValue = string | number | boolean | string[] | null;

export type FieldValues = Record<string, FieldValue>;

export type SetOperation = {
  op: "add" | "remove";
  values: string[];
};

/** What a caller may ask a field to become. Set operations only apply to set-valued fields. */
export type DesiredValue = FieldValue | SetOperation;

export type FieldChange = {
  field: string;
  oldValue: FieldValue;
  newValue: FieldValue;
};

export function isEntityKind(value: string): value is EntityKind {
  return ENTITY_KINDS.some((kind) => kind === value);
}

export function parseEntityKind(value: string): EntityKind {
  const normalized = value.trim().toLowerCase();
  if (!isEntityKind(normalized)) {
    throw new Error(`Unknown entity kind: ${value}. Expected one of: ${ENTITY_KINDS.join(", ")}`);
  }
  return normalized;
}

export function entityRef(kind: EntityKind, id: string): EntityRef {
  const trimmed = id.trim();
  if (!trimmed) {
    throw new Error("Entity id must not be empty.");
  }
  return { kind, id: trimmed };
}

export function formatEntityRef(ref: EntityRef): string {
  return `${ref.kind}:${ref.id}`;
}

export function isSetOperation(value: unknown): value is SetOperation {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  if (!("op" in value) || !("values" in value)) return false;
  const { op, values } = value;
  return (
    (op === "add" || op === "remove") &&
    Array.isArray(values) &&
    values.every((item) => typeof item === "string")
  );
}

export function normalizeSet(values: readonly string[]): string[] {
  const cleaned = values.map((value) => value.trim()).filter((value) => value.length > 0);
  return Array.from(new Set(cleaned)).sort();
}

export function fieldValuesEqual(a: FieldValue, b: FieldValue): boolean {
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    const left = normalizeSet(a);
    const right = normalizeSet(b);
    return left.length === right.length && left.every((value, index) => value === right[index]);
  }
  return a === b;
}

export function formatFieldValue(value: FieldValue | undefined): string {
  if (value === undefined || value === null) return "(unset)";
  if (Array.isArray(value)) return value.length ? value.join(",") : "(empty)";
  if (value === "") return '""';
  return String(value);
}
