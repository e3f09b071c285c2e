import { ZodError } from "zod";

/** One-line message for stderr and per-field details. */
export function formatError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues
      .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
  }
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}
