export { resolveLogPath, resolveLogSettings } from "./file";
export type { LogSettings } from "./file";
export { createRunLogger, createSilentLogger } from "./createRunLogger";
export { sanitizeArgvForLogs, sanitizeStringForLogs } from "./sanitize";
export type { RunLogger } from "./createRunLogger";
