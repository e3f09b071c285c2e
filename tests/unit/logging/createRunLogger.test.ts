import fs from "node:fs";
import path from "node:path";

import { expect, test } from "vitest";

import { createRunLogger } from "@/logging/createRunLogger";
import { createTempDir } from "../../helpers/testCleanup";

test("createRunLogger: writes JSON lines with the run id and redacts tokens", async () => {
  const dir = await createTempDir("copilot-runlog-test-");
  const logPath = path.join(dir, "run.log");

  const run = createRunLogger({
    argv: ["tx", "review", "t1", "--token", "test-secret"],
    env: { COPILOT_LOG_FILE: logPath, COPILOT_LOG_LEVEL: "info" },
  });
  run.logger.info({ event: "context", token: "test-secret", config: { token: "test-secret" } });
  run.logger.debug({ event: "hidden" });
  run.close();

  expect(run.logPath).toBe(logPath);
  const records = fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line));
  expect(records).toHaveLength(2);
  expect(records[0]).toMatchObject({
    level: "info",
    app: "copilot",
    runId: run.runId,
    event: "run_start",
    argv: ["tx", "review", "t1", "--token", "[REDACTED]"],
    prunedLogs: 0,
  });
  expect(records[1]).toMatchObject({
    event: "context",
    token: "[REDACTED]",
    config: { token: "[REDACTED]" },
  });
});

test("createRunLogger: disabled under tests", () => {
  const run = createRunLogger({ env: { NODE_ENV: "test" } });

  expect(run.logPath).toBe("");
  expect(run.logger.level).toBe("silent");
});
