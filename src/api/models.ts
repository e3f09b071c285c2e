import { z } from "zod";

const amount = z.union([z.number(), z.string()]).nullish();

export const TagRefSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
});

export const TransactionSchema = z.object({
  id: z.string(),
  itemId: z.string().nullish(),
  accountId: z.string().nullish(),
  name: z.string().nullish(),
  date: z.string().nullish(),
  amount,
  type: z.string().nullish(),
  isReviewed: z.boolean().nullish(),
  categoryId: z.string().nullish(),
  recurringId: z.string().nullish(),
  userNotes: z.string().nullish(),
  tags: z.array(TagRefSchema).nullish(),
});

export const PageInfoSchema = z.object({
  endCursor: z.string().nullish(),
  hasNextPage: z.boolean(),
});

export const TransactionsPageSchema = z.object({
  transactions: z.object({
    edges: z.array(z.object({ cursor: z.string().nullish(), node: TransactionSchema })),
    pageInfo: PageInfoSchema,
  }),
});

export const CategorySchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  emoji: z.string().nullish(),
  colorName: z.string().nullish(),
  isExcluded: z.boolean().nullish(),
});

export const TagSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  colorName: z.string().nullish(),
});

export const RecurringRuleSchema = z.object({
  nameContains: z.string().nullish(),
  minAmount: z.number().nullish(),
  maxAmount: z.number().nullish(),
});

export const RecurringSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  frequency: z.string().nullish(),
  categoryId: z.string().nullish(),
  state: z.string().nullish(),
  rule: RecurringRuleSchema.nullish(),
});

export const BudgetMonthSchema = z.object({
  month: z.string(),
  amount,
});

export const CategoriesDataSchema = z.object({ categories: z.array(CategorySchema) });
export const TagsDataSchema = z.object({ tags: z.array(TagSchema) });
export const RecurringsDataSchema = z.object({ recurrings: z.array(RecurringSchema) });
export const BudgetsDataSchema = z.object({
  categoriesTotal: z.object({
    budget: z.object({ histories: z.array(BudgetMonthSchema) }).nullish(),
  }),
});
export const UserDataSchema = z.object({ user: z.object({ id: z.string() }).nullish() });

export const EditTransactionDataSchema = z.object({
  editTransaction: z.object({ transaction: TransactionSchema }),
});
export const EditCategoryDataSchema = z.object({
  editCategory: z.object({ category: CategorySchema }),
});
export const EditTagDataSchema = z.object({ editTag: TagSchema });
export const EditRecurringDataSchema = z.object({
  editRecurring: z.object({ recurring: RecurringSchema }),
});

export type Transaction = z.infer<typeof TransactionSchema>;
export type PageInfo = z.infer<typeof PageInfoSchema>;
export type TransactionsPage = { transactions: Transaction[]; pageInfo: PageInfo };
export type Category = z.infer<typeof CategorySchema>;
export type Tag = z.infer<typeof TagSchema>;
export type Recurring = z.infer<typeof RecurringSchema>;
export type RecurringRule = z.infer<typeof RecurringRuleSchema>;
export type BudgetMonth = z.infer<typeof BudgetMonthSchema>;

export type EditTransactionInput = {
  isReviewed?: boolean;
  categoryId?: string | null;
  userNotes?: string;
  tagIds?: string[];
  recurringId?: string | null;
  type?: string | null;
};

export type EditCategoryInput = {
  name?: string | null;
  emoji?: string | null;
  colorName?: string | null;
  isExcluded?: boolean;
};

export type EditTagInput = {
  name?: string | null;
  colorName?: string | null;
};

export type EditRecurringInput = {
  rule?: {
    nameContains?: string | null;
    minAmount?: number | null;
    maxAmount?: number | null;
  };
};
