import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import pino from "pino";

import { cleanupRotatedLogs, resolveLogSettings, rotateIfNeeded } from "./file";
import { sanitizeArgvForLogs } from "./sanitize";

export type RunLogger = {
  logger: pino.Logger;
  runId: string;
  logPath: string;
  close: () => void;
};

type RunLoggerOptions = {
  argv?: string[];
  env?: NodeJS.ProcessEnv;
  /** Where setup problems are reported; the run continues without a log. */
  stderr?: NodeJS.WritableStream;
};

// Bearer tokens reach log records through config objects and request headers.
const REDACT_PATHS = ["token", "*.token", "headers.authorization", "authorization"];

function createNullLogger(): pino.Logger {
  return pino({ level: "silent" });
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createRunLogger(options: RunLoggerOptions = {}): RunLogger {
  const env = options.env ?? process.env;
  const stderr = options.stderr ?? process.stderr;
  const runId = randomUUID();
  const settings = resolveLogSettings(env);

  if (settings.disabled) {
    return { logger: createNullLogger(), runId, logPath: "", close: () => {} };
  }

  const { logPath } = settings;
  let destination: ReturnType<typeof pino.destination>;
  let rotated: string | undefined;
  let cleanup: ReturnType<typeof cleanupRotatedLogs>;
  try {
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    rotated = rotateIfNeeded(logPath, settings.maxBytes);
    cleanup = cleanupRotatedLogs(logPath, settings);
    destination = pino.destination({ dest: logPath, sync: true });
  } catch (err) {
    stderr.write(`copilot: run log disabled: ${describe(err)}\n`);
    return { logger: createNullLogger(), runId, logPath: "", close: () => {} };
  }

  const logger = pino(
    {
      level: settings.level,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
      redact: {
        paths: REDACT_PATHS,
        censor: "[REDACTED]",
      },
      base: {
        app: "copilot",
      },
    },
    destination,
  ).child({ runId });

  logger.info({
    event: "run_start",
    argv: sanitizeArgvForLogs(options.argv ?? []),
    rotatedLog: rotated,
    prunedLogs: cleanup.deleted.length,
  });
  for (const failure of cleanup.failed) {
    logger.warn({ event: "log.prune", status: "failed", ...failure });
  }

  const close = () => {
    try {
      destination.flushSync();
      destination.end();
    } catch (err) {
      stderr.write(`copilot: could not flush run log: ${describe(err)}\n`);
    }
  };

  return { logger, runId, logPath, close };
}

export function createSilentLogger(): pino.Logger {
  return createNullLogger();
}
