import { afterAll } from "vitest";

import { cleanupTempDirs } from "./helpers/testCleanup";

afterAll(async () => {
  await cleanupTempDirs();
});
