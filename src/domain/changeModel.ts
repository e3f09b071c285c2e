import { z } from "zod";

import {
  type DesiredValue,
  type EntityKind,
  type FieldValue,
  isSetOperation,
  normalizeSet,
} from "./entities";

type FieldRule = {
  schema: z.ZodType<FieldValue>;
  describe: string;
  set?: boolean;
  references?: EntityKind;
};

export type ValidationContext = {
  /** When present for a kind, reference fields must name one of these ids. */
  knownIds?: Partial<Record<EntityKind, ReadonlySet<string>>>;
};

export type ValidationResult =
  | { accepted: true; value: DesiredValue }
  | { accepted: false; reason: string };

export const TRANSACTION_TYPES = ["REGULAR", "INTERNAL_TRANSFER", "INCOME"] as const;

const idValue = z.string().trim().min(1, "must be a non-empty id");
const nonEmptyName = z.string().trim().min(1, "must not be empty").max(100);
const optionalText = z.string().nullable();
const optionalAmount = z.number().finite().nullable();

const FIELD_CATALOG: Record<EntityKind, Record<string, FieldRule>> = {
  transaction: {
    reviewed: { schema: z.boolean(), describe: "boolean" },
    categoryId: {
      schema: idValue.nullable(),
      describe: "category id or unset",
      references: "category",
    },
    notes: {
      // The service stores an empty note as no note.
      schema: z
        .string()
        .max(2000)
        .nullable()
        .transform((text) => (text === "" ? null : text)),
      describe: "text or unset",
    },
    tagIds: {
      schema: z.array(idValue).transform((values) => normalizeSet(values)),
      describe: "set of tag ids",
      set: true,
      references: "tag",
    },
    recurringId: {
      schema: idValue.nullable(),
      describe: "recurring id or unset",
      references: "recurring",
    },
    type: { schema: z.enum(TRANSACTION_TYPES), describe: TRANSACTION_TYPES.join(" | ") },
  },
  category: {
    name: { schema: nonEmptyName, describe: "non-empty name" },
    emoji: { schema: optionalText, describe: "emoji or unset" },
    colorName: { schema: optionalText, describe: "color name or unset" },
    excluded: { schema: z.boolean(), describe: "boolean" },
  },
  tag: {
    name: { schema: nonEmptyName, describe: "non-empty name" },
    colorName: { schema: optionalText, describe: "color name or unset" },
  },
  recurring: {
    nameContains: { schema: optionalText, describe: "match text or unset" },
    minAmount: { schema: optionalAmount, describe: "amount or unset" },
    maxAmount: { schema: optionalAmount, describe: "amount or unset" },
  },
};

export function mutableFields(kind: EntityKind): string[] {
  return Object.keys(FIELD_CATALOG[kind]);
}

export function isMutableField(kind: EntityKind, field: string): boolean {
  return Object.hasOwn(FIELD_CATALOG[kind], field);
}

export function isSetField(kind: EntityKind, field: string): boolean {
  return isMutableField(kind, field) && FIELD_CATALOG[kind][field]?.set === true;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join("; ");
}

function findUnknownReference(
  rule: FieldRule,
  value: FieldValue,
  context: ValidationContext,
): string | undefined {
  if (!rule.references) return undefined;
  const known = context.knownIds?.[rule.references];
  if (!known) return undefined;
  const ids = Array.isArray(value) ? value : typeof value === "string" ? [value] : [];
  return ids.find((id) => !known.has(id));
}

/**
 * Checks one candidate value against the field catalog. Local and side-effect free;
 * the accepted value is normalized (trimmed ids, deduplicated sorted sets).
 */
export function validate(
  kind: EntityKind,
  field: string,
  candidate: unknown,
  context: ValidationContext = {},
): ValidationResult {
  const rule = isMutableField(kind, field) ? FIELD_CATALOG[kind][field] : undefined;
  if (!rule) {
    return { accepted: false, reason: `${field} is not a mutable ${kind} field` };
  }

  if (isSetOperation(candidate)) {
    if (!rule.set) {
      return { accepted: false, reason: `${field} does not support add/remove` };
    }
    const parsed = z.array(idValue).safeParse(candidate.values);
    if (!parsed.success) {
      return { accepted: false, reason: `${field}: ${formatIssues(parsed.error)}` };
    }
    const values = normalizeSet(parsed.data);
    if (values.length === 0) {
      return { accepted: false, reason: `${field}: ${candidate.op} needs at least one value` };
    }
    if (candidate.op === "add") {
      const unknown = findUnknownReference(rule, values, context);
      if (unknown !== undefined) {
        return { accepted: false, reason: `${field}: unknown ${rule.references} id ${unknown}` };
      }
    }
    return { accepted: true, value: { op: candidate.op, values } };
  }

  const parsed = rule.schema.safeParse(candidate);
  if (!parsed.success) {
    return {
      accepted: false,
      reason: `${field} must be ${rule.describe} (${formatIssues(parsed.error)})`,
    };
  }

  const unknown = findUnknownReference(rule, parsed.data, context);
  if (unknown !== undefined) {
    return { accepted: false, reason: `${field}: unknown ${rule.references} id ${unknown}` };
  }

  return { accepted: true, value: parsed.data };
}

/** Resolves an accepted desired value against the captured current value. */
export function resolveDesiredValue(desired: DesiredValue, current: FieldValue): FieldValue {
  if (!isSetOperation(desired)) return desired;
  const base = Array.isArray(current) ? current : [];
  if (desired.op === "add") {
    return normalizeSet([...base, ...desired.values]);
  }
  const removed = new Set(desired.values);
  return normalizeSet(base.filter((value) => !removed.has(value)));
}
