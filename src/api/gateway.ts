import type { ValidationContext } from "@/domain/changeModel";
import {
  type EntityKind,
  type EntityRef,
  type FieldValue,
  type FieldValues,
  fieldValuesEqual,
  formatFieldValue,
  normalizeSet,
} from "@/domain/entities";
import { EntityNotFoundError, ReadFailedError, WriteFailedError } from "@/domain/errors";
import type { EntityGateway, WriteAck } from "@/domain/gateway";
import type { CopilotApi } from "./CopilotClient";
import { NotFoundError } from "./errors";
import type {
  Category,
  EditCategoryInput,
  EditRecurringInput,
  EditTagInput,
  EditTransactionInput,
  Recurring,
  Tag,
  Transaction,
} from "./models";

export const TRANSACTION_PAGE_SIZE = 200;
export const TRANSACTION_MAX_PAGES = 50;

type TransactionLocator = { itemId: string; accountId: string };

export function transactionFields(transaction: Transaction): FieldValues {
  return {
    reviewed: transaction.isReviewed ?? false,
    categoryId: transaction.categoryId || null,
    // An empty note and no note are the same thing remotely.
    notes: transaction.userNotes || null,
    tagIds: normalizeSet((transaction.tags ?? []).map((tag) => tag.id)),
    recurringId: transaction.recurringId || null,
    type: transaction.type ?? null,
  };
}

export function categoryFields(category: Category): FieldValues {
  return {
    name: category.name ?? null,
    emoji: category.emoji ?? null,
    colorName: category.colorName ?? null,
    excluded: category.isExcluded ?? false,
  };
}

export function tagFields(tag: Tag): FieldValues {
  return {
    name: tag.name ?? null,
    colorName: tag.colorName ?? null,
  };
}

export function recurringFields(recurring: Recurring): FieldValues {
  return {
    nameContains: recurring.rule?.nameContains ?? null,
    minAmount: recurring.rule?.minAmount ?? null,
    maxAmount: recurring.rule?.maxAmount ?? null,
  };
}

class FieldShapeError extends Error {
  constructor(field: string, expected: string, value: FieldValue) {
    super(`${field} must be ${expected}, got ${formatFieldValue(value)}`);
    this.name = "FieldShapeError";
  }
}

function asBoolean(field: string, value: FieldValue): boolean {
  if (typeof value !== "boolean") throw new FieldShapeError(field, "a boolean", value);
  return value;
}

function asString(field: string, value: FieldValue): string {
  if (typeof value !== "string") throw new FieldShapeError(field, "a string", value);
  return value;
}

function asNullableString(field: string, value: FieldValue): string | null {
  return value === null ? null : asString(field, value);
}

function asNullableNumber(field: string, value: FieldValue): number | null {
  if (value === null) return null;
  if (typeof value !== "number") throw new FieldShapeError(field, "a number", value);
  return value;
}

function asStringArray(field: string, value: FieldValue): string[] {
  if (!Array.isArray(value)) throw new FieldShapeError(field, "a list of ids", value);
  return value;
}

export function buildTransactionInput(values: FieldValues): EditTransactionInput {
  const input: EditTransactionInput = {};
  for (const [field, value] of Object.entries(values)) {
    switch (field) {
      case "reviewed":
        input.isReviewed = asBoolean(field, value);
        break;
      case "categoryId":
        input.categoryId = asNullableString(field, value);
        break;
      case "notes":
        input.userNotes = asNullableString(field, value) ?? "";
        break;
      case "tagIds":
        input.tagIds = asStringArray(field, value);
        break;
      case "recurringId":
        input.recurringId = asNullableString(field, value);
        break;
      case "type":
        input.type = asNullableString(field, value);
        break;
      default:
        throw new Error(`${field} is not a transaction field`);
    }
  }
  return input;
}

export function buildCategoryInput(values: FieldValues): EditCategoryInput {
  const input: EditCategoryInput = {};
  for (const [field, value] of Object.entries(values)) {
    switch (field) {
      case "name":
        input.name = asNullableString(field, value);
        break;
      case "emoji":
        input.emoji = asNullableString(field, value);
        break;
      case "colorName":
        input.colorName = asNullableString(field, value);
        break;
      case "excluded":
        input.isExcluded = asBoolean(field, value);
        break;
      default:
        throw new Error(`${field} is not a category field`);
    }
  }
  return input;
}

export function buildTagInput(values: FieldValues): EditTagInput {
  const input: EditTagInput = {};
  for (const [field, value] of Object.entries(values)) {
    switch (field) {
      case "name":
        input.name = asNullableString(field, value);
        break;
      case "colorName":
        input.colorName = asNullableString(field, value);
        break;
      default:
        throw new Error(`${field} is not a tag field`);
    }
  }
  return input;
}

export function buildRecurringInput(values: FieldValues): EditRecurringInput {
  const rule: NonNullable<EditRecurringInput["rule"]> = {};
  for (const [field, value] of Object.entries(values)) {
    switch (field) {
      case "nameContains":
        rule.nameContains = asNullableString(field, value);
        break;
      case "minAmount":
        rule.minAmount = asNullableNumber(field, value);
        break;
      case "maxAmount":
        rule.maxAmount = asNullableNumber(field, value);
        break;
      default:
        throw new Error(`${field} is not a recurring field`);
    }
  }
  return { rule };
}

/** Fields whose value after the write is not what was asked for. */
export function diffAcknowledged(requested: FieldValues, returned: FieldValues): WriteAck | undefined {
  const rejected: Record<string, string> = {};
  for (const [field, value] of Object.entries(requested)) {
    if (!Object.hasOwn(returned, field)) continue;
    const actual = returned[field] ?? null;
    if (!fieldValuesEqual(actual, value)) {
      rejected[field] = `service kept ${formatFieldValue(actual)}`;
    }
  }
  return Object.keys(rejected).length ? { rejected } : undefined;
}

function pick(values: FieldValues, fields: readonly string[]): FieldValues {
  const picked: FieldValues = {};
  for (const field of fields) {
    if (Object.hasOwn(values, field)) picked[field] = values[field] ?? null;
  }
  return picked;
}

/** Pages through transactions, newest first, until `id` turns up. */
export async function findTransaction(client: CopilotApi, id: string): Promise<Transaction | undefined> {
  let after: string | null = null;
  for (let page = 0; page < TRANSACTION_MAX_PAGES; page += 1) {
    const result = await client.listTransactionsPage(TRANSACTION_PAGE_SIZE, after);
    const match = result.transactions.find((transaction) => transaction.id === id);
    if (match) return match;
    if (!result.pageInfo.hasNextPage || !result.pageInfo.endCursor) return undefined;
    after = result.pageInfo.endCursor;
  }
  return undefined;
}

export class CopilotEntityGateway implements EntityGateway {
  private readonly locators = new Map<string, TransactionLocator>();

  constructor(private readonly client: CopilotApi) {}

  async readFields(ref: EntityRef, fields: readonly string[]): Promise<FieldValues> {
    try {
      return pick(await this.readAll(ref), fields);
    } catch (err) {
      if (err instanceof EntityNotFoundError) throw err;
      if (err instanceof NotFoundError) throw new EntityNotFoundError(ref, err.message);
      throw new ReadFailedError(ref, err instanceof Error ? err.message : String(err), { cause: err });
    }
  }

  async writeFields(ref: EntityRef, values: FieldValues): Promise<WriteAck | undefined> {
    try {
      const returned = await this.writeAll(ref, values);
      return diffAcknowledged(values, returned);
    } catch (err) {
      if (err instanceof WriteFailedError) throw err;
      throw new WriteFailedError(ref, err instanceof Error ? err.message : String(err), { cause: err });
    }
  }

  async findTransaction(id: string): Promise<Transaction | undefined> {
    const match = await findTransaction(this.client, id);
    if (match?.itemId && match.accountId) {
      this.locators.set(id, { itemId: match.itemId, accountId: match.accountId });
    }
    return match;
  }

  private async readAll(ref: EntityRef): Promise<FieldValues> {
    switch (ref.kind) {
      case "transaction": {
        const transaction = await this.findTransaction(ref.id);
        if (!transaction) throw new EntityNotFoundError(ref);
        return transactionFields(transaction);
      }
      case "category": {
        const category = (await this.client.listCategories()).find((item) => item.id === ref.id);
        if (!category) throw new EntityNotFoundError(ref);
        return categoryFields(category);
      }
      case "tag": {
        const tag = (await this.client.listTags()).find((item) => item.id === ref.id);
        if (!tag) throw new EntityNotFoundError(ref);
        return tagFields(tag);
      }
      case "recurring": {
        const recurring = (await this.client.listRecurrings()).find((item) => item.id === ref.id);
        if (!recurring) throw new EntityNotFoundError(ref);
        return recurringFields(recurring);
      }
    }
  }

  private async writeAll(ref: EntityRef, values: FieldValues): Promise<FieldValues> {
    switch (ref.kind) {
      case "transaction": {
        const locator = await this.locate(ref);
        const updated = await this.client.editTransaction(
          locator.itemId,
          locator.accountId,
          ref.id,
          buildTransactionInput(values),
        );
        return transactionFields(updated);
      }
      case "category":
        return categoryFields(await this.client.editCategory(ref.id, buildCategoryInput(values)));
      case "tag":
        return tagFields(await this.client.editTag(ref.id, buildTagInput(values)));
      case "recurring":
        return recurringFields(await this.client.editRecurring(ref.id, buildRecurringInput(values)));
    }
  }

  private async locate(ref: EntityRef): Promise<TransactionLocator> {
    const known = this.locators.get(ref.id);
    if (known) return known;
    const transaction = await this.findTransaction(ref.id);
    if (!transaction) throw new WriteFailedError(ref, "transaction not found");
    const located = this.locators.get(ref.id);
    if (!located) throw new WriteFailedError(ref, "transaction is missing itemId or accountId");
    return located;
  }
}

/** Known ids for the reference fields a mutation touches. */
export async function loadValidationContext(
  client: CopilotApi,
  kinds: readonly EntityKind[],
): Promise<ValidationContext> {
  const knownIds: NonNullable<ValidationContext["knownIds"]> = {};
  for (const kind of new Set(kinds)) {
    if (kind === "category") {
      knownIds.category = new Set((await client.listCategories()).map((item) => item.id));
    } else if (kind === "tag") {
      knownIds.tag = new Set((await client.listTags()).map((item) => item.id));
    } else if (kind === "recurring") {
      knownIds.recurring = new Set((await client.listRecurrings()).map((item) => item.id));
    }
  }
  return { knownIds };
}
