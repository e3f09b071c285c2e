import fs from "node:fs";
import path from "node:path";

import { expect, test } from "vitest";

import { cleanupRotatedLogs, resolveLogPath, resolveLogSettings, rotateIfNeeded } from "@/logging/file";
import { createTempDir } from "../../helpers/testCleanup";

const DAY_MS = 24 * 60 * 60 * 1000;

test("resolveLogPath: absolute file wins, bare names go in the log dir", () => {
  expect(resolveLogPath({ COPILOT_LOG_DIR: "/var/tmp/copilot-logs" })).toBe("/var/tmp/copilot-logs/copilot.log");
  expect(resolveLogPath({ COPILOT_LOG_DIR: "/d", COPILOT_LOG_FILE: "/elsewhere/run.log" })).toBe("/elsewhere/run.log");
  expect(resolveLogPath({ COPILOT_LOG_DIR: "/d", COPILOT_LOG_FILE: " run.log " })).toBe("/d/run.log");
});

test("resolveLogSettings: bad numbers fall back to defaults", () => {
  expect(
    resolveLogSettings({
      COPILOT_LOG_DIR: "/d",
      COPILOT_LOG_MAX_BYTES: "lots",
      COPILOT_LOG_RETENTION_DAYS: "-3",
      COPILOT_LOG_MAX_FILES: "5",
      COPILOT_LOG_LEVEL: "info",
    }),
  ).toEqual({
    disabled: false,
    logPath: "/d/copilot.log",
    level: "info",
    maxBytes: 25_000_000,
    retentionDays: 14,
    maxFiles: 5,
  });
});

test("resolveLogSettings: disabled by flag or under tests", () => {
  expect(resolveLogSettings({ COPILOT_LOG_DIR: "/d", COPILOT_LOG_DISABLE: " Yes " }).disabled).toBe(true);
  expect(resolveLogSettings({ COPILOT_LOG_DIR: "/d", NODE_ENV: "test" }).disabled).toBe(true);
  expect(resolveLogSettings({ COPILOT_LOG_DIR: "/d", COPILOT_LOG_DISABLE: "0" }).disabled).toBe(false);
});

test("rotateIfNeeded: moves an oversized log aside under a timestamped name", async () => {
  const dir = await createTempDir("copilot-log-test-");
  const logPath = path.join(dir, "copilot.log");
  fs.writeFileSync(logPath, "0123456789");

  expect(rotateIfNeeded(logPath, 100)).toBeUndefined();

  const rotated = rotateIfNeeded(logPath, 5, new Date("2026-01-01T12:00:00.000Z"));

  expect(rotated).toBe(path.join(dir, "copilot.2026-01-01T12-00-00.000Z.log"));
  expect(fs.existsSync(logPath)).toBe(false);
  expect(fs.readFileSync(path.join(dir, "copilot.2026-01-01T12-00-00.000Z.log"), "utf8")).toBe("0123456789");
});

test("cleanupRotatedLogs: prunes expired and surplus rotations, nothing else", async () => {
  const dir = await createTempDir("copilot-log-test-");
  const logPath = path.join(dir, "copilot.log");
  const now = Date.now();
  const files = {
    expired: "copilot.2026-01-01T12-00-00.000Z.log",
    older: "copilot.2026-01-20T12-00-00.000Z.log",
    newer: "copilot.2026-01-21T12-00-00.000Z.log",
    active: "copilot.log",
    unrelated: "copilot.notes.log",
    journal: "journal.sqlite",
  };
  const ageDays: Array<[string, number]> = [
    [files.expired, 20],
    [files.older, 2],
    [files.newer, 1],
    [files.active, 0],
    [files.unrelated, 30],
    [files.journal, 30],
  ];
  for (const [name, days] of ageDays) {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, "x");
    const mtime = new Date(now - days * DAY_MS);
    fs.utimesSync(filePath, mtime, mtime);
  }

  expect(cleanupRotatedLogs(logPath, { retentionDays: 14, maxFiles: 30 }, now)).toEqual({
    deleted: [path.join(dir, files.expired)],
    failed: [],
  });
  expect(cleanupRotatedLogs(logPath, { retentionDays: 14, maxFiles: 1 }, now)).toEqual({
    deleted: [path.join(dir, files.older)],
    failed: [],
  });
  expect(fs.readdirSync(dir).sort()).toEqual(
    [files.active, files.unrelated, files.newer, files.journal].sort(),
  );
});
