import { chmod, mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { getConfigFilePath } from "./paths";
import { type Config, CONFIG_KEYS, ConfigSchema } from "./schema";

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function maskSecret(value: string): string {
  if (value.length <= 8) return `${value.slice(0, 1)}…`;
  return `${value.slice(0, 4)}…${value.slice(-4)}`;
}

export class ConfigStore {
  constructor(private readonly filePath: string = getConfigFilePath()) {}

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<Config> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return {};
      throw err;
    }
    if (!text.trim()) return {};

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new Error(`Invalid config at ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    const parsed = ConfigSchema.safeParse(json);
    if (!parsed.success) {
      // If config becomes corrupt, fail loudly rather than silently ignoring.
      const msg = parsed.error.issues.map((i) => i.message).join("; ");
      throw new Error(`Invalid config at ${this.filePath}: ${msg}`);
    }
    return parsed.data;
  }

  /**
   * Merge-and-save update. Keys set to `undefined` are dropped.
   */
  async save(update: Partial<Config>): Promise<Config> {
    const merged: Config = { ...(await this.load()), ...update };
    const next: Config = {};
    for (const key of CONFIG_KEYS) {
      const value = merged[key];
      if (value !== undefined) next[key] = value;
    }
    const checked = ConfigSchema.safeParse(next);
    if (!checked.success) {
      const msg = checked.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ");
      throw new Error(`Invalid config value: ${msg}`);
    }

    // Ensure directory exists (supports tests with custom file paths).
    const dir = path.dirname(this.filePath);
    await mkdir(dir, { recursive: true });

    await writeFile(this.filePath, `${JSON.stringify(next, null, 2)}\n`, "utf8");
    await this.lockDownPermissions(dir, this.filePath);
    return next;
  }

  async clear(keys: ReadonlyArray<keyof Config> | "all" = "all"): Promise<Config> {
    const targets = keys === "all" ? CONFIG_KEYS : keys;
    const update: Partial<Config> = {};
    for (const key of targets) update[key] = undefined;
    return this.save(update);
  }

  /**
   * For display in terminals/logs.
   */
  redact(config: Config): Config {
    const next: Config = { ...config };
    if (config.token) next.token = maskSecret(config.token);
    return next;
  }

  private async lockDownPermissions(dir: string, filePath: string): Promise<void> {
    if (process.platform === "win32") return;
    try {
      await chmod(dir, 0o700);
    } catch {
      // Best effort; ignore permission failures.
    }
    try {
      await chmod(filePath, 0o600);
    } catch {
      // Best effort; ignore permission failures.
    }
  }
}
