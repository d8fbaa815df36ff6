import { z } from "zod";

export const configSchema = z.object({
  stacksmith: z.object({
    stackFile: z.string().min(1).default("stack.json"),
    stateBackend: z.enum(["file", "sqlite", "memory"]).default("file"),
    statePath: z.string().min(1).default(".stacksmith/state.json"),
    providerDbPath: z.string().min(1).default(".stacksmith/provider.db"),
  }),
  apply: z.object({
    parallelism: z.number().int().min(1).max(32).default(4),
    maxAttempts: z.number().int().min(1).max(10).default(3),
    baseDelayMs: z.number().int().min(0).default(1000),
    maxDelayMs: z.number().int().min(0).default(30000),
    failFast: z.boolean().default(false),
  }),
  logging: z.object({
    level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  }),
});

export type Config = z.infer<typeof configSchema>;

export function parseConfig(raw: unknown): Config {
  return configSchema.parse(raw);
}
