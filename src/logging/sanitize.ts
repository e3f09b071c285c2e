const REDACTED = "[REDACTED]";

// Copilot bearer tokens are JWTs: three base64url segments separated by dots.
const JWT_RE = /\beyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g;

const BEARER_RE = /(Bearer\s+)[^\s"']+/gi;

const TOKEN_FLAG_RE = /^(--token=).+$/;

function redactTokenShapes(value: string): string {
  return value.replace(JWT_RE, REDACTED).replace(BEARER_RE, `$1${REDACTED}`);
}

export function sanitizeArgvForLogs(argv: string[]): string[] {
  return argv.map((arg, index) => {
    const value = String(arg);
    if (index > 0 && argv[index - 1] === "--token") return REDACTED;
    return redactTokenShapes(value.replace(TOKEN_FLAG_RE, `$1${REDACTED}`));
  });
}

export function sanitizeStringForLogs(value: string): string {
  return redactTokenShapes(value);
}
