import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { expect, test } from "vitest";

import { ConfigStore, maskSecret } from "@/config/ConfigStore";
import { createTempDir } from "../helpers/testCleanup";

async function tempConfigPath(): Promise<string> {
  const tmp = await createTempDir("copilot-config-test-");
  return path.join(tmp, "config.json");
}

test("ConfigStore: load returns empty when file does not exist", async () => {
  const store = new ConfigStore(await tempConfigPath());

  expect(await store.load()).toEqual({});
});

test("ConfigStore: save merges and persists values", async () => {
  const filePath = await tempConfigPath();
  const store = new ConfigStore(filePath);

  await store.save({ token: "test-secret" });
  const next = await store.save({ baseUrl: "https://copilot.test", journalPath: "/tmp/journal.sqlite" });

  expect(next).toEqual({
    token: "test-secret",
    baseUrl: "https://copilot.test",
    journalPath: "/tmp/journal.sqlite",
  });
  expect(JSON.parse(await readFile(filePath, "utf8"))).toEqual(next);
  expect(await store.load()).toEqual(next);
});

test("ConfigStore: clear removes selected keys or everything", async () => {
  const store = new ConfigStore(await tempConfigPath());
  await store.save({ token: "test-secret", baseUrl: "https://copilot.test" });

  expect(await store.clear(["token"])).toEqual({ baseUrl: "https://copilot.test" });
  expect(await store.clear()).toEqual({});
  expect(await store.load()).toEqual({});
});

test("ConfigStore: save rejects invalid values without writing", async () => {
  const filePath = await tempConfigPath();
  const store = new ConfigStore(filePath);
  await store.save({ baseUrl: "https://copilot.test" });

  await expect(store.save({ baseUrl: "not a url" })).rejects.toThrow(
    "Invalid config value: baseUrl: Invalid url",
  );
  expect(await store.load()).toEqual({ baseUrl: "https://copilot.test" });
});

test("ConfigStore: load fails on a corrupt file", async () => {
  const filePath = await tempConfigPath();
  await writeFile(filePath, "{ not json", "utf8");

  await expect(new ConfigStore(filePath).load()).rejects.toThrow(`Invalid config at ${filePath}`);

  await writeFile(filePath, JSON.stringify({ tokens: ["old"] }), "utf8");
  await expect(new ConfigStore(filePath).load()).rejects.toThrow(`Invalid config at ${filePath}`);
});

test("ConfigStore: redact masks the token", () => {
  const store = new ConfigStore("ignore.json");

  expect(store.redact({ token: "test-secret-token", baseUrl: "https://copilot.test" })).toEqual({
    token: "test…oken",
    baseUrl: "https://copilot.test",
  });
  expect(maskSecret("short")).toBe("s…");
});
