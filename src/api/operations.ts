import { readFileSync } from "node:fs";

export const OPERATION_NAMES = [
  "User",
  "Transactions",
  "Categories",
  "Tags",
  "Recurrings",
  "Budgets",
  "EditTransaction",
  "EditCategory",
  "EditTag",
  "EditRecurring",
] as const;

export type OperationName = (typeof OPERATION_NAMES)[number];

const documents = new Map<OperationName, string>();

/** GraphQL documents live beside this module as `graphql/<Operation>.graphql`. */
export function loadOperation(name: OperationName): string {
  const cached = documents.get(name);
  if (cached) return cached;
  const document = readFileSync(new URL(`./graphql/${name}.graphql`, import.meta.url), "utf8");
  documents.set(name, document);
  return document;
}
