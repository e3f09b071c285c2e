import { z } from "zod";

export const ConfigSchema = z
  .object({
    token: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    journalPath: z.string().min(1).optional(),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

export const CONFIG_KEYS = ["token", "baseUrl", "journalPath"] as const satisfies ReadonlyArray<
  keyof Config
>;
