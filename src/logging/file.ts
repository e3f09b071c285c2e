import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { z } from "zod";

import { APP_DIR_NAME } from "@/config/paths";

const LOG_FILE_NAME = "copilot.log";
const DAY_MS = 24 * 60 * 60 * 1000;

// Rotated files carry the rotation time: copilot.2026-01-01T12-00-00.000Z.log
const ROTATION_STAMP = /^\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}(?:\.\d+)?Z$/;

const trimmed = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const positiveInt = (fallback: number) =>
  z.preprocess(
    (value) => (typeof value === "string" && value.trim() ? Number.parseInt(value, 10) : undefined),
    z.number().int().positive().catch(fallback),
  );

const LogEnvSchema = z.object({
  COPILOT_LOG_DIR: trimmed,
  COPILOT_LOG_FILE: trimmed,
  COPILOT_LOG_LEVEL: trimmed,
  COPILOT_LOG_DISABLE: trimmed,
  COPILOT_LOG_MAX_BYTES: positiveInt(25_000_000),
  COPILOT_LOG_RETENTION_DAYS: positiveInt(14),
  COPILOT_LOG_MAX_FILES: positiveInt(30),
  LOCALAPPDATA: trimmed,
  XDG_STATE_HOME: trimmed,
  NODE_ENV: trimmed,
});

export type LogSettings = {
  disabled: boolean;
  logPath: string;
  level: string;
  maxBytes: number;
  retentionDays: number;
  maxFiles: number;
};

function expandHome(value: string): string {
  if (value.startsWith("~/")) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
}

export function resolveLogDir(env: NodeJS.ProcessEnv = process.env): string {
  const parsed = LogEnvSchema.parse(env);
  if (parsed.COPILOT_LOG_DIR) return expandHome(parsed.COPILOT_LOG_DIR);

  if (process.platform === "darwin") {
    return path.join(os.homedir(), "Library", "Logs", APP_DIR_NAME);
  }

  if (process.platform === "win32") {
    const base = parsed.LOCALAPPDATA ?? path.join(os.homedir(), "AppData", "Local");
    return path.join(base, APP_DIR_NAME, "Logs");
  }

  const base = parsed.XDG_STATE_HOME ?? path.join(os.homedir(), ".local", "state");
  return path.join(base, APP_DIR_NAME);
}

/** `COPILOT_LOG_FILE` wins when absolute; a bare name is placed in the log dir. */
export function resolveLogPath(env: NodeJS.ProcessEnv = process.env): string {
  const rawFile = LogEnvSchema.parse(env).COPILOT_LOG_FILE;
  if (rawFile) {
    const expanded = expandHome(rawFile);
    if (path.isAbsolute(expanded)) return expanded;
  }
  return path.join(resolveLogDir(env), rawFile ?? LOG_FILE_NAME);
}

export function resolveLogSettings(env: NodeJS.ProcessEnv = process.env): LogSettings {
  const parsed = LogEnvSchema.parse(env);
  const disable = parsed.COPILOT_LOG_DISABLE?.toLowerCase();
  return {
    disabled: ["1", "true", "yes", "on"].includes(disable ?? "") || parsed.NODE_ENV === "test",
    logPath: resolveLogPath(env),
    level: parsed.COPILOT_LOG_LEVEL ?? "debug",
    maxBytes: parsed.COPILOT_LOG_MAX_BYTES,
    retentionDays: parsed.COPILOT_LOG_RETENTION_DAYS,
    maxFiles: parsed.COPILOT_LOG_MAX_FILES,
  };
}

function rotationName(logPath: string, at: Date): string {
  const parsed = path.parse(logPath);
  const stamp = at.toISOString().replace(/:/g, "-");
  return path.join(parsed.dir, `${parsed.name}.${stamp}${parsed.ext}`);
}

/** Moves the log aside once it grows past `maxBytes`; returns the rotated path. */
export function rotateIfNeeded(logPath: string, maxBytes: number, now = new Date()): string | undefined {
  if (!fs.existsSync(logPath)) return undefined;
  if (fs.statSync(logPath).size <= maxBytes) return undefined;

  const rotated = rotationName(logPath, now);
  fs.renameSync(logPath, rotated);
  return rotated;
}

export type CleanupResult = {
  deleted: string[];
  failed: Array<{ path: string; error: string }>;
};

/**
 * Deletes rotated copies of `logPath` older than the retention window, and the
 * oldest ones beyond `maxFiles`. Only names `rotateIfNeeded` produces are
 * touched, so other files sharing the directory (the journal among them) stay.
 */
export function cleanupRotatedLogs(
  logPath: string,
  limits: { retentionDays: number; maxFiles: number },
  now = Date.now(),
): CleanupResult {
  const parsed = path.parse(logPath);
  if (!fs.existsSync(parsed.dir)) return { deleted: [], failed: [] };

  const prefix = `${parsed.name}.`;
  const rotated = fs
    .readdirSync(parsed.dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.startsWith(prefix) && entry.name.endsWith(parsed.ext))
    .filter((entry) => ROTATION_STAMP.test(entry.name.slice(prefix.length, entry.name.length - parsed.ext.length)))
    .map((entry) => {
      const fullPath = path.join(parsed.dir, entry.name);
      return { fullPath, mtimeMs: fs.statSync(fullPath).mtimeMs };
    })
    .sort((a, b) => b.mtimeMs - a.mtimeMs);

  const expired = new Set<string>();
  const retentionMs = limits.retentionDays * DAY_MS;
  for (const entry of rotated) {
    if (now - entry.mtimeMs > retentionMs) expired.add(entry.fullPath);
  }
  for (const entry of rotated.slice(limits.maxFiles)) {
    expired.add(entry.fullPath);
  }

  const result: CleanupResult = { deleted: [], failed: [] };
  for (const filePath of expired) {
    try {
      fs.unlinkSync(filePath);
      result.deleted.push(filePath);
    } catch (err) {
      result.failed.push({ path: filePath, error: err instanceof Error ? err.message : String(err) });
    }
  }
  return result;
}
