import { formatError } from "@/util/errors";
import { type ValidationContext, isMutableField, resolveDesiredValue, validate } from "./changeModel";
import {
  type DesiredValue,
  type EntityKind,
  type EntityRef,
  type FieldChange,
  type FieldValues,
  fieldValuesEqual,
} from "./entities";
import { EntityNotFoundError, WriteFailedError } from "./errors";
import type { EntityGateway, WriteAck } from "./gateway";
import { capturePreconditions } from "./preconditions";

export type MutationRequest = {
  kind: EntityKind;
  ids: string[];
  values: Record<string, DesiredValue>;
};

export type OutcomeStatus = "applied" | "noop" | "failed" | "dry-run";

export type OutcomeErrorCode = "validation-rejected" | "not-found" | "read-failed" | "write-failed";

export type OutcomeError = {
  code: OutcomeErrorCode;
  message: string;
  field?: string;
};

export type PerIdOutcome = {
  ref: EntityRef;
  status: OutcomeStatus;
  /** Fields written (or, for a dry run, that would be written). */
  changes: FieldChange[];
  /** Requested fields that already held the desired value. */
  noopFields: string[];
  /** Fields the remote service refused while accepting the rest of the write. */
  rejectedFields?: Record<string, string>;
  error?: OutcomeError;
  /** Set when the write went through but recording it in the journal failed. */
  journalError?: string;
};

export type PlanOptions = {
  dryRun?: boolean;
  validation?: ValidationContext;
  /** Called right after each id's write is acknowledged, before the next id starts. */
  onApplied?: (outcome: PerIdOutcome) => void;
};

type ValidatedRequest =
  | { ok: true; values: Record<string, DesiredValue> }
  | { ok: false; error: OutcomeError };

export class MutationPlanner {
  constructor(private readonly gateway: EntityGateway) {}

  /**
   * Applies `request` id by id, in order. One id's failure never stops the
   * batch; each id gets exactly one outcome.
   */
  async planAndApply(request: MutationRequest, options: PlanOptions = {}): Promise<PerIdOutcome[]> {
    const fields = Object.keys(request.values);
    if (fields.length === 0) {
      throw new Error("Mutation request names no fields to change.");
    }

    const validated = this.validateRequest(request, options.validation);
    const outcomes: PerIdOutcome[] = [];

    for (const id of request.ids) {
      const ref: EntityRef = { kind: request.kind, id: id.trim() };
      if (!ref.id) {
        outcomes.push(failed(ref, { code: "validation-rejected", message: "Entity id is empty." }));
        continue;
      }
      if (!validated.ok) {
        outcomes.push(failed(ref, validated.error));
        continue;
      }
      const outcome = await this.applyOne(ref, validated.values, options);
      if (outcome.status === "applied") options.onApplied?.(outcome);
      outcomes.push(outcome);
    }

    return outcomes;
  }

  private validateRequest(
    request: MutationRequest,
    context: ValidationContext | undefined,
  ): ValidatedRequest {
    const values: Record<string, DesiredValue> = {};
    for (const [field, candidate] of Object.entries(request.values)) {
      const result = validate(request.kind, field, candidate, context);
      if (!result.accepted) {
        return { ok: false, error: { code: "validation-rejected", message: result.reason, field } };
      }
      values[field] = result.value;
    }
    return { ok: true, values };
  }

  private async applyOne(
    ref: EntityRef,
    desired: Record<string, DesiredValue>,
    options: PlanOptions,
  ): Promise<PerIdOutcome> {
    const fields = Object.keys(desired);

    let current: FieldValues;
    try {
      current = await capturePreconditions(this.gateway, ref, fields);
    } catch (err) {
      if (err instanceof EntityNotFoundError) {
        return failed(ref, { code: "not-found", message: err.message });
      }
      return failed(ref, { code: "read-failed", message: formatError(err) });
    }

    const target: FieldValues = {};
    for (const field of fields) {
      target[field] = resolveDesiredValue(desired[field] ?? null, current[field] ?? null);
    }
    return this.writeDiff(ref, target, current, options);
  }

  /**
   * Writes previously captured values back to one entity. The caller supplies the
   * snapshot it already read, so the diff and the write use the same state. Values
   * are only checked against the field catalog: they were read from the service,
   * so they may sit outside what an edit would accept.
   */
  async restore(ref: EntityRef, values: FieldValues, snapshot: FieldValues): Promise<PerIdOutcome> {
    const unknown = Object.keys(values).find((field) => !isMutableField(ref.kind, field));
    if (unknown !== undefined) {
      return failed(ref, {
        code: "validation-rejected",
        message: `${unknown} is not a mutable ${ref.kind} field.`,
        field: unknown,
      });
    }
    return this.writeDiff(ref, values, snapshot, {});
  }

  private async writeDiff(
    ref: EntityRef,
    target: FieldValues,
    current: FieldValues,
    options: PlanOptions,
  ): Promise<PerIdOutcome> {
    const writeSet: FieldValues = {};
    const changes: FieldChange[] = [];
    const noopFields: string[] = [];

    for (const [field, value] of Object.entries(target)) {
      const oldValue = current[field] ?? null;
      const newValue = value ?? null;
      if (fieldValuesEqual(oldValue, newValue)) {
        noopFields.push(field);
        continue;
      }
      writeSet[field] = newValue;
      changes.push({ field, oldValue, newValue });
    }

    if (changes.length === 0) {
      return { ref, status: "noop", changes: [], noopFields };
    }

    if (options.dryRun) {
      return { ref, status: "dry-run", changes, noopFields };
    }

    let ack: WriteAck | undefined;
    try {
      ack = await this.gateway.writeFields(ref, writeSet);
    } catch (err) {
      const message = err instanceof WriteFailedError ? err.message : formatError(err);
      return { ...failed(ref, { code: "write-failed", message }), noopFields };
    }

    const rejected = Object.entries(ack?.rejected ?? {}).filter(([field]) => field in writeSet);
    if (rejected.length === 0) {
      return { ref, status: "applied", changes, noopFields };
    }

    if (rejected.length === changes.length) {
      const message = rejected.map(([field, detail]) => `${field}: ${detail}`).join("; ");
      return { ...failed(ref, { code: "write-failed", message }), noopFields };
    }

    const rejectedFields = Object.fromEntries(rejected);
    return {
      ref,
      status: "applied",
      changes: changes.filter((change) => !(change.field in rejectedFields)),
      noopFields,
      rejectedFields,
    };
  }
}

function failed(ref: EntityRef, error: OutcomeError): PerIdOutcome {
  return { ref, status: "failed", changes: [], noopFields: [], error };
}
