import { expect, test } from "vitest";

import {
  isSetField,
  mutableFields,
  resolveDesiredValue,
  validate,
} from "@/domain/changeModel";

test("validate accepts a well-typed value", () => {
  expect(validate("transaction", "reviewed", true)).toEqual({ accepted: true, value: true });
  expect(validate("recurring", "minAmount", null)).toEqual({ accepted: true, value: null });
});

test("validate treats an empty note as no note", () => {
  expect(validate("transaction", "notes", "")).toEqual({ accepted: true, value: null });
  expect(validate("transaction", "notes", "lunch")).toEqual({ accepted: true, value: "lunch" });
});

test("validate rejects fields outside the catalog", () => {
  expect(validate("transaction", "amount", 12)).toEqual({
    accepted: false,
    reason: "amount is not a mutable transaction field",
  });
  expect(validate("tag", "excluded", true)).toEqual({
    accepted: false,
    reason: "excluded is not a mutable tag field",
  });
});

test("validate rejects values of the wrong shape", () => {
  const result = validate("transaction", "type", "BOGUS");
  expect(result.accepted).toBe(false);
  if (!result.accepted) {
    expect(result.reason.startsWith("type must be REGULAR | INTERNAL_TRANSFER | INCOME (")).toBe(true);
  }
  expect(validate("category", "name", "   ").accepted).toBe(false);
  expect(validate("transaction", "reviewed", "yes").accepted).toBe(false);
});

test("validate normalizes id sets", () => {
  expect(validate("transaction", "tagIds", [" b", "a", "a"])).toEqual({
    accepted: true,
    value: ["a", "b"],
  });
});

test("validate allows unsetting optional references", () => {
  expect(validate("transaction", "categoryId", null)).toEqual({ accepted: true, value: null });
});

test("set operations are limited to set-valued fields", () => {
  expect(validate("transaction", "notes", { op: "add", values: ["x"] })).toEqual({
    accepted: false,
    reason: "notes does not support add/remove",
  });
  expect(validate("transaction", "tagIds", { op: "remove", values: [] })).toEqual({
    accepted: false,
    reason: "tagIds: remove needs at least one value",
  });
  expect(validate("transaction", "tagIds", { op: "add", values: ["b", "a"] })).toEqual({
    accepted: true,
    value: { op: "add", values: ["a", "b"] },
  });
});

test("references are checked against known ids when provided", () => {
  const context = {
    knownIds: { category: new Set(["c1"]), tag: new Set(["t-a"]) },
  };

  expect(validate("transaction", "categoryId", "c2", context)).toEqual({
    accepted: false,
    reason: "categoryId: unknown category id c2",
  });
  expect(validate("transaction", "categoryId", "c1", context)).toEqual({
    accepted: true,
    value: "c1",
  });
  expect(validate("transaction", "tagIds", { op: "add", values: ["t-z"] }, context)).toEqual({
    accepted: false,
    reason: "tagIds: unknown tag id t-z",
  });
  // Removing an id that no longer exists is allowed.
  expect(validate("transaction", "tagIds", { op: "remove", values: ["t-z"] }, context).accepted).toBe(
    true,
  );
  // Kinds without a known list are not checked.
  expect(validate("transaction", "recurringId", "r9", context).accepted).toBe(true);
});

test("resolveDesiredValue applies set operations to the current value", () => {
  expect(resolveDesiredValue({ op: "add", values: ["b"] }, ["c", "a"])).toEqual(["a", "b", "c"]);
  expect(resolveDesiredValue({ op: "remove", values: ["a"] }, ["a", "b"])).toEqual(["b"]);
  expect(resolveDesiredValue({ op: "add", values: ["a"] }, null)).toEqual(["a"]);
  expect(resolveDesiredValue("x", "y")).toBe("x");
});

test("catalog helpers describe each kind", () => {
  expect(mutableFields("tag")).toEqual(["name", "colorName"]);
  expect(isSetField("transaction", "tagIds")).toBe(true);
  expect(isSetField("transaction", "notes")).toBe(false);
  expect(isSetField("transaction", "toString")).toBe(false);
});
