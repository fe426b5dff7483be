import { join, resolve } from "node:path";
import { z } from "zod";

export type Language = "en" | "ru";
export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface RuntimeConfig {
  language: Language;
  dataDir: string;
  highscoreFile: string;
  logFile: string;
  logLevel: LogLevel;
  color: boolean;
}

const DATA_DIR_NAME = ".snake-arcade";

const EnvSchema = z.object({
  SNAKE_LANGUAGE: z.enum(["en", "ru"]).catch("en"),
  SNAKE_DATA_DIR: z.string().trim().min(1).optional().catch(undefined),
  SNAKE_LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).catch("info"),
  NO_COLOR: z.string().optional().catch(undefined)
});

/**
 * Reads runtime settings from the environment. Invalid values fall back to
 * their defaults instead of failing startup.
 */
export function loadRuntimeConfig(
  env: Record<string, string | undefined> = process.env,
  options: { cwd?: string; colorCapable?: boolean } = {}
): RuntimeConfig {
  const parsed = EnvSchema.parse(env);
  const dataDir = resolve(options.cwd ?? process.cwd(), parsed.SNAKE_DATA_DIR ?? DATA_DIR_NAME);
  return {
    language: parsed.SNAKE_LANGUAGE,
    dataDir,
    highscoreFile: join(dataDir, "highscores.json"),
    logFile: join(dataDir, "snake-arcade.log"),
    logLevel: parsed.SNAKE_LOG_LEVEL,
    color: !parsed.NO_COLOR && (options.colorCapable ?? Boolean(process.stdout.isTTY))
  };
}
