import path from "node:path";

import { expect, test } from "vitest";

import { createAppContext, resolveJournalPath } from "@/app/createAppContext";
import { MissingTokenError } from "@/app/errors";
import { ConfigStore } from "@/config/ConfigStore";
import type { Config } from "@/config/schema";
import { createSilentLogger } from "@/logging";
import { tempJournalPath } from "../helpers/journal";
import { createTempDir } from "../helpers/testCleanup";

const logger = createSilentLogger();

async function createStore(values: Config): Promise<ConfigStore> {
  const tmp = await createTempDir("copilot-context-test-");
  const store = new ConfigStore(path.join(tmp, "config.json"));
  await store.save(values);
  return store;
}

test("createAppContext: token precedence is flag, env, config", async () => {
  const configStore = await createStore({ token: "config-token" });

  const fromFlag = await createAppContext({
    argv: { token: "flag-token" },
    env: { COPILOT_TOKEN: "env-token" },
    configStore,
    logger,
  });
  expect(fromFlag.token).toBe("flag-token");

  const fromEnv = await createAppContext({ env: { COPILOT_TOKEN: "env-token" }, configStore, logger });
  expect(fromEnv.token).toBe("env-token");

  const fromConfig = await createAppContext({ env: { COPILOT_TOKEN: "  " }, configStore, logger });
  expect(fromConfig.token).toBe("config-token");
  expect(fromConfig.copilot).toBeDefined();
  expect(fromConfig.gateway).toBeDefined();
});

test("createAppContext: base url precedence falls back to the default", async () => {
  const configStore = await createStore({ token: "test-secret", baseUrl: "https://config.test" });

  const fromFlag = await createAppContext({
    argv: { "base-url": "https://flag.test" },
    env: { COPILOT_BASE_URL: "https://env.test" },
    configStore,
    logger,
  });
  expect(fromFlag.baseUrl).toBe("https://flag.test");

  const fromEnv = await createAppContext({ env: { COPILOT_BASE_URL: "https://env.test" }, configStore, logger });
  expect(fromEnv.baseUrl).toBe("https://env.test");

  const fromConfig = await createAppContext({ env: {}, configStore, logger });
  expect(fromConfig.baseUrl).toBe("https://config.test");

  const fallback = await createAppContext({ env: {}, configStore: await createStore({}), requireToken: false, logger });
  expect(fallback.baseUrl).toBe("https://app.copilot.money");
});

test("createAppContext: missing token fails unless auth is optional", async () => {
  const configStore = await createStore({});

  await expect(createAppContext({ env: {}, configStore, logger })).rejects.toBeInstanceOf(MissingTokenError);

  const ctx = await createAppContext({ env: {}, configStore, requireToken: false, logger });
  expect(ctx.token).toBeUndefined();
  expect(ctx.copilot).toBeUndefined();
  expect(ctx.gateway).toBeUndefined();
  expect(ctx.journal).toBeUndefined();
});

test("createAppContext: opens the journal when asked", async () => {
  const configStore = await createStore({});
  const journalPath = await tempJournalPath();

  const ctx = await createAppContext({
    env: {},
    configStore,
    requireToken: false,
    openJournal: true,
    journalPath,
    logger,
  });

  expect(ctx.journal?.list({})).toEqual([]);
  ctx.db?.close();
});

test("resolveJournalPath: override, env, then config", () => {
  const config: Config = { journalPath: "/config/journal.sqlite" };

  expect(resolveJournalPath(config, { COPILOT_JOURNAL_PATH: "/env/journal.sqlite" }, "/flag/journal.sqlite")).toBe(
    "/flag/journal.sqlite",
  );
  expect(resolveJournalPath(config, { COPILOT_JOURNAL_PATH: "/env/journal.sqlite" })).toBe("/env/journal.sqlite");
  expect(resolveJournalPath(config, {})).toBe("/config/journal.sqlite");
});
