import { formatError } from "@/util/errors";
import type { EntityRef, FieldValue, FieldValues } from "./entities";
import { normalizeSet } from "./entities";
import { EntityNotFoundError, ReadFailedError } from "./errors";
import type { EntityGateway } from "./gateway";

function normalizeCaptured(value: FieldValue | undefined): FieldValue {
  if (value === undefined) return null;
  return Array.isArray(value) ? normalizeSet(value) : value;
}

/**
 * Snapshots exactly `fields` of `ref` ahead of a write. Fields the remote
 * service leaves out are captured as unset.
 */
export async function capturePreconditions(
  gateway: EntityGateway,
  ref: EntityRef,
  fields: readonly string[],
): Promise<FieldValues> {
  let raw: Partial<FieldValues>;
  try {
    raw = await gateway.readFields(ref, fields);
  } catch (err) {
    if (err instanceof EntityNotFoundError || err instanceof ReadFailedError) throw err;
    throw new ReadFailedError(ref, formatError(err), { cause: err });
  }

  const snapshot: FieldValues = {};
  for (const field of fields) {
    snapshot[field] = normalizeCaptured(raw[field]);
  }
  return snapshot;
}
