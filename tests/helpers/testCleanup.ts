import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

const tempDirs: string[] = [];

/** Creates a temp directory that `cleanupTempDirs` removes after the file's tests. */
export async function createTempDir(prefix: string): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export async function cleanupTempDirs(): Promise<{ removed: number; dirs: string[] }> {
  const dirs = tempDirs.splice(0);
  for (const dir of dirs) {
    await rm(dir, { recursive: true, force: true });
  }
  return { removed: dirs.length, dirs };
}
