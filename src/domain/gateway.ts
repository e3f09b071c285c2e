import type { EntityRef, FieldValues } from "./entities";

/**
 * Per-field result of a write, for transports that can tell which fields the
 * remote service accepted. Absent or empty means every field was accepted.
 */
export type WriteAck = {
  rejected?: Record<string, string>;
};

/**
 * The remote capabilities the engine consumes. Implementations throw
 * `EntityNotFoundError` / `ReadFailedError` from reads and `WriteFailedError`
 * from writes; they own any transport retries.
 */
export interface EntityGateway {
  readFields(ref: EntityRef, fields: readonly string[]): Promise<Partial<FieldValues>>;
  writeFields(ref: EntityRef, values: FieldValues): Promise<WriteAck | undefined>;
  /** Service-side undo, used only for kinds configured with the native-undo capability. */
  nativeUndo?(ref: EntityRef, values: FieldValues): Promise<void>;
}
