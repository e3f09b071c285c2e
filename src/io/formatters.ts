export function formatDate(value: string | Date | null | undefined): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  return value.toISOString().slice(0, 10);
}

/** Amounts arrive as numbers or decimal strings; show two decimals when numeric. */
export function formatAmount(value: number | string | null | undefined): string {
  if (value === null || value === undefined) return "";
  const numeric = typeof value === "number" ? value : Number(value);
  if (!Number.isFinite(numeric)) return String(value);
  return numeric.toFixed(2);
}

export function formatTimestamp(value: string): string {
  return value.replace("T", " ").replace(/\.\d+Z$/, "Z");
}

const ANSI_PATTERN =
  // Escape sequences are made of control characters.
  // eslint-disable-next-line no-control-regex
  /[\u001b\u009b][[\]()#;?]*(?:\d{1,4}(?:;\d{0,4})*)?[0-9A-ORZcf-nqry=><]/g;

export function stripAnsi(value: string): string {
  return value.replace(ANSI_PATTERN, "");
}

const ANSI_COLORS = {
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
} as const;

export type TextColor = keyof typeof ANSI_COLORS;

/** Wraps `value` in an ANSI color; the table writer strips it under --no-color. */
export function colorize(value: string, color: TextColor | undefined): string {
  if (!color || !value) return value;
  return `${ANSI_COLORS[color]}${value}\x1b[0m`;
}

const STATUS_COLORS: Record<string, TextColor> = {
  applied: "green",
  restored: "green",
  "not-eligible": "yellow",
  undone: "yellow",
  superseded: "yellow",
  conflict: "red",
  failed: "red",
};

export function colorizeStatus(status: string): string {
  return colorize(status, STATUS_COLORS[status]);
}
