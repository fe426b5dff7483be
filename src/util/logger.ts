import pino, { type Logger } from "pino";
import type { RuntimeConfig } from "../config/runtime-config";

export type { Logger };

export const silentLogger: Logger = pino({ level: "silent" });

/**
 * The terminal belongs to the game screen, so log lines go to a file.
 */
export function createLogger(config: Pick<RuntimeConfig, "logLevel" | "logFile">): Logger {
  if (config.logLevel === "silent") {
    return silentLogger;
  }
  return pino(
    {
      level: config.logLevel,
      base: { app: "snake-arcade" },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.destination({ dest: config.logFile, mkdir: true, sync: false })
  );
}
