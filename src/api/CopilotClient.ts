import { randomUUID } from "node:crypto";

import { z } from "zod";

import {
  CopilotApiError,
  GraphqlErrorsSchema,
  NetworkError,
  RateLimitedError,
  mapCopilotError,
  mapGraphqlErrors,
} from "./errors";
import {
  type BudgetMonth,
  type Category,
  type EditCategoryInput,
  type EditRecurringInput,
  type EditTagInput,
  type EditTransactionInput,
  type Recurring,
  type Tag,
  type Transaction,
  type TransactionsPage,
  BudgetsDataSchema,
  CategoriesDataSchema,
  EditCategoryDataSchema,
  EditRecurringDataSchema,
  EditTagDataSchema,
  EditTransactionDataSchema,
  RecurringsDataSchema,
  TagsDataSchema,
  TransactionsPageSchema,
  UserDataSchema,
} from "./models";
import { type OperationName, loadOperation } from "./operations";

export const DEFAULT_BASE_URL = "https://app.copilot.money";

type RetryConfig = {
  retries: number;
  baseMs: number;
  maxDelayMs: number;
};

export type RequestTraceEvent = {
  requestId: string;
  name: OperationName;
  phase: "start" | "success" | "error";
  startTime?: string;
  durationMs?: number;
  meta?: Record<string, unknown>;
  summary?: Record<string, unknown>;
  status?: number;
  error?: unknown;
};

export type CopilotClientOptions = {
  baseUrl?: string;
  fetch?: typeof fetch;
  timeoutMs?: number;
  retry?: Partial<RetryConfig>;
  sleep?: (ms: number) => Promise<void>;
  trace?: (event: RequestTraceEvent) => void;
};

export interface CopilotApi {
  verifyToken(): Promise<void>;
  listTransactionsPage(first: number, after?: string | null): Promise<TransactionsPage>;
  listCategories(): Promise<Category[]>;
  listTags(): Promise<Tag[]>;
  listRecurrings(): Promise<Recurring[]>;
  listBudgetMonths(): Promise<BudgetMonth[]>;
  editTransaction(
    itemId: string,
    accountId: string,
    id: string,
    input: EditTransactionInput,
  ): Promise<Transaction>;
  editCategory(id: string, input: EditCategoryInput): Promise<Category>;
  editTag(id: string, input: EditTagInput): Promise<Tag>;
  editRecurring(id: string, input: EditRecurringInput): Promise<Recurring>;
}

const EnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: GraphqlErrorsSchema.optional(),
});

export class CopilotClient implements CopilotApi {
  private readonly endpoint: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly retryConfig: RetryConfig;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly trace?: (event: RequestTraceEvent) => void;

  constructor(
    private readonly token: string,
    options: CopilotClientOptions = {},
  ) {
    const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.endpoint = `${baseUrl}/api/graphql`;
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retryConfig = {
      retries: options.retry?.retries ?? 2,
      baseMs: options.retry?.baseMs ?? 200,
      maxDelayMs: options.retry?.maxDelayMs ?? 2000,
    };
    this.sleep =
      options.sleep ?? ((ms: number) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.trace = options.trace;
  }

  async verifyToken(): Promise<void> {
    await this.query("User", {}, UserDataSchema);
  }

  async listTransactionsPage(first: number, after: string | null = null): Promise<TransactionsPage> {
    const data = await this.query(
      "Transactions",
      { first, after, filter: null, sort: null },
      TransactionsPageSchema,
      (result) => ({ count: result.transactions.edges.length }),
    );
    return {
      transactions: data.transactions.edges.map((edge) => edge.node),
      pageInfo: data.transactions.pageInfo,
    };
  }

  async listCategories(): Promise<Category[]> {
    const data = await this.query(
      "Categories",
      { spend: false, budget: false, rollovers: false },
      CategoriesDataSchema,
      (result) => ({ count: result.categories.length }),
    );
    return data.categories;
  }

  async listTags(): Promise<Tag[]> {
    const data = await this.query("Tags", {}, TagsDataSchema, (result) => ({
      count: result.tags.length,
    }));
    return data.tags;
  }

  async listRecurrings(): Promise<Recurring[]> {
    const data = await this.query("Recurrings", { filter: null }, RecurringsDataSchema, (result) => ({
      count: result.recurrings.length,
    }));
    return data.recurrings;
  }

  async listBudgetMonths(): Promise<BudgetMonth[]> {
    const data = await this.query("Budgets", {}, BudgetsDataSchema);
    return data.categoriesTotal.budget?.histories ?? [];
  }

  async editTransaction(
    itemId: string,
    accountId: string,
    id: string,
    input: EditTransactionInput,
  ): Promise<Transaction> {
    const data = await this.mutate(
      "EditTransaction",
      { itemId, accountId, id, input },
      EditTransactionDataSchema,
      { id, fields: Object.keys(input) },
    );
    return data.editTransaction.transaction;
  }

  async editCategory(id: string, input: EditCategoryInput): Promise<Category> {
    const data = await this.mutate("EditCategory", { id, input }, EditCategoryDataSchema, {
      id,
      fields: Object.keys(input),
    });
    return data.editCategory.category;
  }

  async editTag(id: string, input: EditTagInput): Promise<Tag> {
    const data = await this.mutate("EditTag", { id, input }, EditTagDataSchema, {
      id,
      fields: Object.keys(input),
    });
    return data.editTag;
  }

  async editRecurring(id: string, input: EditRecurringInput): Promise<Recurring> {
    const data = await this.mutate("EditRecurring", { id, input }, EditRecurringDataSchema, {
      id,
      fields: Object.keys(input.rule ?? {}),
    });
    return data.editRecurring.recurring;
  }

  /** Read-only operations retry rate limits and network failures with backoff. */
  private async query<S extends z.ZodTypeAny>(
    operation: OperationName,
    variables: Record<string, unknown>,
    schema: S,
    summarize?: (result: z.output<S>) => Record<string, unknown>,
  ): Promise<z.output<S>> {
    const meta: Record<string, unknown> = {};
    return this.traced(
      operation,
      async () => {
        let attempt = 0;
        const { retries, baseMs, maxDelayMs } = this.retryConfig;
        while (true) {
          try {
            return await this.post(operation, variables, schema);
          } catch (err) {
            if (
              !(err instanceof RateLimitedError || err instanceof NetworkError) ||
              attempt >= retries
            ) {
              throw err;
            }
            const delay = Math.min(baseMs * 2 ** attempt, maxDelayMs);
            attempt += 1;
            meta.retryCount = attempt;
            await this.sleep(delay);
          }
        }
      },
      meta,
      summarize,
    );
  }

  /** Writes are sent once; a failure is reported, never retried. */
  private async mutate<S extends z.ZodTypeAny>(
    operation: OperationName,
    variables: Record<string, unknown>,
    schema: S,
    meta: Record<string, unknown>,
  ): Promise<z.output<S>> {
    return this.traced(operation, () => this.post(operation, variables, schema), meta);
  }

  private async post<S extends z.ZodTypeAny>(
    operation: OperationName,
    variables: Record<string, unknown>,
    schema: S,
  ): Promise<z.output<S>> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          accept: "application/json",
          authorization: `Bearer ${this.token}`,
        },
        body: JSON.stringify({ operationName: operation, query: loadOperation(operation), variables }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw await mapCopilotError(err);
    }

    if (!response.ok) {
      throw await mapCopilotError(response);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new CopilotApiError(`${operation} returned a non-JSON body`, { status: response.status });
    }

    const envelope = EnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new CopilotApiError(`Unexpected ${operation} response shape`, { status: response.status });
    }
    if (envelope.data.errors?.length) {
      throw mapGraphqlErrors(envelope.data.errors);
    }

    const parsed = schema.safeParse(envelope.data.data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new CopilotApiError(`Unexpected ${operation} response shape: ${issues}`, {
        status: response.status,
      });
    }
    return parsed.data;
  }

  private async traced<T>(
    name: OperationName,
    fn: () => Promise<T>,
    meta?: Record<string, unknown>,
    summarize?: (result: T) => Record<string, unknown> | undefined,
  ): Promise<T> {
    const start = Date.now();
    const requestId = randomUUID();
    const startTime = new Date().toISOString();
    this.trace?.({ requestId, name, phase: "start", startTime, meta });
    try {
      const result = await fn();
      this.trace?.({
        requestId,
        name,
        phase: "success",
        startTime,
        durationMs: Date.now() - start,
        meta,
        summary: summarize?.(result),
      });
      return result;
    } catch (err) {
      this.trace?.({
        requestId,
        name,
        phase: "error",
        startTime,
        durationMs: Date.now() - start,
        meta,
        status: err instanceof CopilotApiError ? err.info.status : undefined,
        error: err,
      });
      throw err;
    }
  }
}
