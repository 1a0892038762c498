// src/config/env.ts
// Purpose: Single parse of process.env; invalid configuration fails at start-up.

import path from "path";
import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  LOG_LEVEL: z.enum(["INFO", "WARN", "ERROR", "SILENT"]).default("INFO"),
  CORS_ORIGIN: z.string().default("http://localhost:3000"),

  LEDGER_DRIVER: z.enum(["file", "memory"]).default("file"),
  LEDGER_PATH: z
    .string()
    .default(path.join(process.cwd(), "data", "complaints_master.json")),

  OBJECT_STORE_DIR: z
    .string()
    .default(path.join(process.cwd(), "data", "complaint-images")),
  OBJECT_URL_BASE: z.string().url().default("http://localhost:3001"),
  OBJECT_URL_SECRET: z.string().min(8).default("change-me-object-secret"),

  ADMIN_TOKEN: z.string().min(1).default("change-me-admin-token"),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export class ConfigError extends Error {
  constructor(public readonly details: Record<string, string[] | undefined>) {
    super(
      `Invalid environment configuration: ${Object.keys(details).join(", ")}`,
    );
    this.name = "ConfigError";
  }
}

export function loadConfig(
  source: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.flatten().fieldErrors);
  }
  return parsed.data;
}

let cached: AppConfig | undefined;

export function getConfig(): AppConfig {
  cached ??= loadConfig();
  return cached;
}
