import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "./logger";

export const envSchema = z.object({
  SUPABASE_URL: z.string({ required_error: "SUPABASE_URL is not set" }).url("SUPABASE_URL must be a URL"),
  SUPABASE_ANON_KEY: z.string({ required_error: "SUPABASE_ANON_KEY is not set" }).min(1, "SUPABASE_ANON_KEY is empty"),
  PROCESS_TABLE: z.string().min(1).default("processes"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface AppConfig {
  supabaseUrl: string;
  supabaseAnonKey: string;
  processTable: string;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  return {
    supabaseUrl: parsed.data.SUPABASE_URL,
    supabaseAnonKey: parsed.data.SUPABASE_ANON_KEY,
    processTable: parsed.data.PROCESS_TABLE,
    logLevel: parsed.data.LOG_LEVEL,
  };
}

let cached: AppConfig | null = null;

/** Read `.env` once, then validate the environment. */
export function getConfig(): AppConfig {
  if (!cached) {
    loadDotenv();
    cached = loadConfig();
  }
  return cached;
}
