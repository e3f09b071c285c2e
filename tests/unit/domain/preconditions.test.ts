import { expect, test } from "vitest";

import { entityRef } from "@/domain/entities";
import { EntityNotFoundError, ReadFailedError } from "@/domain/errors";
import type { EntityGateway } from "@/domain/gateway";
import { capturePreconditions } from "@/domain/preconditions";
import { MemoryGateway } from "../../helpers/memoryGateway";

const t1 = entityRef("transaction", "t1");

test("capturePreconditions snapshots exactly the requested fields", async () => {
  const gateway = new MemoryGateway().seed(t1, {
    reviewed: true,
    notes: "lunch",
    tagIds: ["b", "a"],
  });

  const snapshot = await capturePreconditions(gateway, t1, ["notes", "tagIds", "categoryId"]);

  expect(snapshot).toEqual({ notes: "lunch", tagIds: ["a", "b"], categoryId: null });
  expect(gateway.reads).toBe(1);
});

test("capturePreconditions passes not-found errors through", async () => {
  const gateway = new MemoryGateway();

  await expect(capturePreconditions(gateway, t1, ["notes"])).rejects.toBeInstanceOf(
    EntityNotFoundError,
  );
});

test("capturePreconditions wraps unexpected read errors", async () => {
  const gateway: EntityGateway = {
    readFields: async () => {
      throw new Error("socket hang up");
    },
    writeFields: async () => undefined,
  };

  const error = await capturePreconditions(gateway, t1, ["notes"]).catch((err: unknown) => err);
  expect(error).toBeInstanceOf(ReadFailedError);
  expect(error).toHaveProperty("message", "Reading transaction:t1 failed: socket hang up");
});
