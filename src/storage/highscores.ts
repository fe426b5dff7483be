import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type { HighscoreTable, PlayMode } from "../types";
import { silentLogger, type Logger } from "../util/logger";

const HIGHSCORE_VERSION = 1;

const ScoreSchema = z.number().int().nonnegative();

const HighscoreDataSchema = z.object({
  classic: ScoreSchema,
  time_attack: ScoreSchema,
  survival: ScoreSchema
});

const HighscoreEnvelopeSchema = z.object({
  version: z.literal(HIGHSCORE_VERSION),
  data: HighscoreDataSchema
});

export interface HighscoreStore {
  load(): HighscoreTable;
  save(table: HighscoreTable): void;
}

export function defaultHighscores(): HighscoreTable {
  return { classic: 0, time_attack: 0, survival: 0 };
}

/** Wraps the flat, unversioned `{ classic, time_attack, survival }` layout in an envelope. */
export function migrateHighscores(input: unknown): unknown {
  if (!input || typeof input !== "object" || Array.isArray(input)) {
    return input;
  }
  if ("version" in input) {
    return input;
  }
  return {
    version: HIGHSCORE_VERSION,
    data: input
  };
}

export function loadHighscores(filePath: string, logger: Logger = silentLogger): HighscoreTable {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      logger.debug({ filePath }, "no highscore file yet");
    } else {
      logger.warn({ err: error, filePath }, "failed to read highscores, using defaults");
    }
    return defaultHighscores();
  }

  try {
    const result = HighscoreEnvelopeSchema.safeParse(migrateHighscores(JSON.parse(raw)));
    if (!result.success) {
      logger.warn({ filePath, issues: result.error.issues }, "highscore file is malformed, using defaults");
      return defaultHighscores();
    }
    return { ...result.data.data };
  } catch (error) {
    logger.warn({ err: error, filePath }, "highscore file is not valid JSON, using defaults");
    return defaultHighscores();
  }
}

/** Writes the whole table. Returns false when the write failed. */
export function saveHighscores(filePath: string, table: HighscoreTable, logger: Logger = silentLogger): boolean {
  const envelope = {
    version: HIGHSCORE_VERSION,
    data: table
  };
  try {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, `${JSON.stringify(envelope, null, 2)}\n`, "utf8");
    return true;
  } catch (error) {
    logger.warn({ err: error, filePath }, "failed to save highscores");
    return false;
  }
}

/** Raises the stored best for `mode` when `score` strictly beats it. */
export function recordHighscore(table: HighscoreTable, mode: PlayMode, score: number): boolean {
  if (score <= table[mode]) {
    return false;
  }
  table[mode] = score;
  return true;
}

export function createFileHighscoreStore(filePath: string, logger: Logger = silentLogger): HighscoreStore {
  return {
    load: () => loadHighscores(filePath, logger),
    save: (table) => {
      saveHighscores(filePath, table, logger);
    }
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
