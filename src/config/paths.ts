import os from "node:os";
import path from "node:path";

export const APP_DIR_NAME = "copilot-money-cli";

/**
 * Resolves the directory for local state:
 * - config.json (token, base url)
 * - journal.sqlite (mutation journal)
 */
export function getConfigDir(): string {
  const override = process.env.COPILOT_CONFIG_DIR;
  if (override) return override;

  const platform = process.platform;
  const home = os.homedir();

  // macOS
  if (platform === "darwin") {
    return path.join(home, "Library", "Application Support", APP_DIR_NAME);
  }

  // Windows
  if (platform === "win32") {
    const appData = process.env.APPDATA;
    return path.join(appData ?? path.join(home, "AppData", "Roaming"), APP_DIR_NAME);
  }

  // Linux/others (XDG)
  const xdg = process.env.XDG_CONFIG_HOME;
  return path.join(xdg ?? path.join(home, ".config"), APP_DIR_NAME);
}

export function getConfigFilePath(): string {
  return path.join(getConfigDir(), "config.json");
}

export function getJournalPath(): string {
  return process.env.COPILOT_JOURNAL_PATH || path.join(getConfigDir(), "journal.sqlite");
}
