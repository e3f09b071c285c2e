import { access, writeFile } from "node:fs/promises";
import path from "node:path";

import { expect, test } from "vitest";

import { tempJournalPath } from "../helpers/journal";
import { cleanupTempDirs, createTempDir } from "../helpers/testCleanup";

test("cleanupTempDirs: removes every temp dir created so far, contents included", async () => {
  const dir = await createTempDir("copilot-cleanup-test-");
  await writeFile(path.join(dir, "note.txt"), "x");
  const journalDir = path.dirname(await tempJournalPath());

  const result = await cleanupTempDirs();

  expect(result.dirs).toEqual([dir, journalDir]);
  await expect(access(dir)).rejects.toThrow();
  await expect(access(journalDir)).rejects.toThrow();
  expect((await cleanupTempDirs()).removed).toBe(0);
});
