import { z } from "zod";

export type CopilotErrorInfo = {
  status?: number;
  code?: string;
  detail?: string;
};

export class CopilotApiError extends Error {
  public readonly info: CopilotErrorInfo;

  constructor(message: string, info: CopilotErrorInfo = {}) {
    super(message);
    this.name = "CopilotApiError";
    this.info = info;
  }
}

export class UnauthorizedError extends CopilotApiError {
  constructor(info: CopilotErrorInfo = {}) {
    super(formatCopilotErrorDetails(info) || "Copilot unauthorized", info);
    this.name = "UnauthorizedError";
  }
}

export class NotFoundError extends CopilotApiError {
  constructor(info: CopilotErrorInfo = {}) {
    super(formatCopilotErrorDetails(info) || "Copilot not found", info);
    this.name = "NotFoundError";
  }
}

export class RateLimitedError extends CopilotApiError {
  constructor(info: CopilotErrorInfo = {}) {
    super(formatCopilotErrorDetails(info) || "Copilot rate limited", info);
    this.name = "RateLimitedError";
  }
}

export class NetworkError extends CopilotApiError {
  constructor(info: CopilotErrorInfo = {}) {
    super(formatCopilotErrorDetails(info) || "Copilot network error", info);
    this.name = "NetworkError";
  }
}

/** A 200 response whose body carried GraphQL `errors`. */
export class GraphqlError extends CopilotApiError {
  constructor(info: CopilotErrorInfo = {}) {
    super(formatCopilotErrorDetails(info) || "Copilot GraphQL error", info);
    this.name = "GraphqlError";
  }
}

export function formatCopilotErrorDetails(info: CopilotErrorInfo): string {
  const parts: string[] = [];
  if (info.status) parts.push(String(info.status));
  if (info.code) parts.push(info.code);
  if (info.detail) parts.push(info.detail);
  return parts.join(" ").trim();
}

const GraphqlErrorEntrySchema = z.object({
  message: z.string().optional(),
  extensions: z.object({ code: z.string().optional() }).passthrough().optional(),
});

export const GraphqlErrorsSchema = z.array(GraphqlErrorEntrySchema);

const ErrorBodySchema = z
  .object({
    errors: GraphqlErrorsSchema.optional(),
    message: z.string().optional(),
    error: z.string().optional(),
  })
  .passthrough();

export type GraphqlErrorEntry = z.infer<typeof GraphqlErrorEntrySchema>;

/** Maps GraphQL `errors` from a 200 response to the matching error class. */
export function mapGraphqlErrors(errors: readonly GraphqlErrorEntry[]): CopilotApiError {
  const code = errors.find((entry) => entry.extensions?.code)?.extensions?.code;
  const detail = errors
    .map((entry) => entry.message)
    .filter((message): message is string => Boolean(message))
    .join("; ");
  const info: CopilotErrorInfo = { code, detail: detail || undefined };
  if (code === "UNAUTHENTICATED" || code === "FORBIDDEN") return new UnauthorizedError(info);
  if (code === "NOT_FOUND") return new NotFoundError(info);
  if (code === "RATE_LIMITED") return new RateLimitedError(info);
  return new GraphqlError(info);
}

function statusError(info: CopilotErrorInfo): CopilotApiError {
  if (info.status === 401 || info.status === 403) return new UnauthorizedError(info);
  if (info.status === 404) return new NotFoundError(info);
  if (info.status === 429) return new RateLimitedError(info);
  return new CopilotApiError(formatCopilotErrorDetails(info) || "Copilot API error", info);
}

async function readErrorDetail(response: Response): Promise<string | undefined> {
  let text: string;
  try {
    text = await response.clone().text();
  } catch {
    return undefined;
  }
  if (!text.trim()) return undefined;
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      const messages = parsed.data.errors?.map((entry) => entry.message).filter(Boolean);
      if (messages?.length) return messages.join("; ");
      return parsed.data.message ?? parsed.data.error ?? text.slice(0, 200);
    }
  } catch {
    // Not JSON; fall through to the raw text.
  }
  return text.slice(0, 200);
}

export async function mapCopilotError(err: unknown): Promise<CopilotApiError> {
  if (err instanceof CopilotApiError) return err;

  if (err instanceof Response) {
    return statusError({ status: err.status, detail: await readErrorDetail(err) });
  }

  // fetch rejects with a TypeError on connection failures and a DOMException on abort/timeout.
  if (err instanceof TypeError || (err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError"))) {
    return new NetworkError({ detail: err.message });
  }

  if (err instanceof Error) {
    return new CopilotApiError(err.message, {});
  }

  return new CopilotApiError(String(err), {});
}
