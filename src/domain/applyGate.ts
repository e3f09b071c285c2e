export type ApplyGateInput = {
  isWrite: boolean;
  dryRun: boolean;
  /** An explicit yes was already given (for example `--yes`). */
  confirmed: boolean;
  /** Whether the caller can prompt the user. */
  interactive: boolean;
};

export type ApplyDecision =
  | { action: "execute" }
  | { action: "dry-run" }
  | { action: "require-confirmation"; canPrompt: boolean };

export function decideApply(input: ApplyGateInput): ApplyDecision {
  if (!input.isWrite) return { action: "execute" };
  if (input.dryRun) return { action: "dry-run" };
  if (input.confirmed) return { action: "execute" };
  return { action: "require-confirmation", canPrompt: input.interactive };
}

/** What the engine accepts once any confirmation has been settled by the caller. */
export type ResolvedDecision = Exclude<ApplyDecision, { action: "require-confirmation" }>;
