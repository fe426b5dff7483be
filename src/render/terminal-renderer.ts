import { GAME_CONFIG, MODE_RULES, PLAY_MODES } from "../config/game-config";
import { t } from "../i18n";
import type { Cell, FrameModel, GameConfig, GameOverSummary, HighscoreTable, PowerupKind, SessionSnapshot } from "../types";
import { cellKey } from "../world/grid-space";

export interface RenderOptions {
  color: boolean;
  config?: GameConfig;
}

export interface TerminalOutput {
  write(chunk: string): unknown;
}

type Glyph = "head" | "body" | "shieldedHead" | "ghostHead" | "ghostBody" | "food" | "obstacle" | "particle" | PowerupKind;

const GLYPHS: Record<Glyph, { text: string; ansi: string }> = {
  head: { text: "@@", ansi: "\x1b[1;92m" },
  body: { text: "[]", ansi: "\x1b[32m" },
  shieldedHead: { text: "%%", ansi: "\x1b[1;96m" },
  ghostHead: { text: "@@", ansi: "\x1b[2;97m" },
  ghostBody: { text: "::", ansi: "\x1b[2;37m" },
  food: { text: "()", ansi: "\x1b[91m" },
  obstacle: { text: "##", ansi: "\x1b[90m" },
  particle: { text: "**", ansi: "\x1b[2;93m" },
  speed_boost: { text: ">>", ansi: "\x1b[1;93m" },
  shield: { text: "{}", ansi: "\x1b[1;96m" },
  multiplier: { text: "x2", ansi: "\x1b[1;95m" },
  ghost: { text: "~~", ansi: "\x1b[1;97m" }
};

const EMPTY = "  ";
const RESET = "\x1b[0m";
const HUD_GAP = "   ";

function paint(glyph: Glyph, color: boolean): string {
  const { text, ansi } = GLYPHS[glyph];
  return color ? `${ansi}${text}${RESET}` : text;
}

function seconds(ticks: number, fps: number): number {
  return Math.ceil(ticks / fps);
}

function modeName(mode: string): string {
  return t(`mode_${mode}`);
}

function renderMenu(highscores: HighscoreTable): string[] {
  return [
    t("title"),
    "",
    t("menuClassic"),
    t("menuTimeAttack", { seconds: MODE_RULES.timeAttackSeconds }),
    t("menuSurvival"),
    t("menuQuit"),
    "",
    t("highscores"),
    ...PLAY_MODES.map((mode) => t("highscoreLine", { mode: modeName(mode), score: highscores[mode] }))
  ];
}

function renderHud(session: SessionSnapshot, config: GameConfig): string[] {
  const status = [t("modeLabel", { mode: modeName(session.mode) }), t("score", { score: session.score.score })];
  if (session.timeRemainingTicks !== null) {
    status.push(t("timeLeft", { seconds: seconds(session.timeRemainingTicks, config.fps) }));
  }
  const timers = session.activePowerups.map((powerup) =>
    t("powerupTimer", {
      name: t(`powerup_${powerup.kind}`),
      seconds: seconds(powerup.remainingTicks, config.fps)
    })
  );
  return [status.join(HUD_GAP), timers.join(HUD_GAP)];
}

/** Later layers win: particles only show on otherwise empty cells. */
function buildLayers(session: SessionSnapshot, config: GameConfig): Map<string, Glyph> {
  const layers = new Map<string, Glyph>();
  const place = (cell: Cell, glyph: Glyph): void => {
    layers.set(cellKey(cell), glyph);
  };

  for (const particle of session.particles) {
    const cell = { x: Math.floor(particle.x), y: Math.floor(particle.y) };
    if (cell.x >= 0 && cell.y >= 0 && cell.x < config.gridWidth && cell.y < config.gridHeight) {
      place(cell, "particle");
    }
  }
  place(session.food, "food");
  session.pickups.forEach((pickup) => place(pickup.position, pickup.kind));
  session.obstacles.forEach((obstacle) => place(obstacle.position, "obstacle"));
  const active = new Set(session.activePowerups.map((powerup) => powerup.kind));
  const ghost = active.has("ghost");
  session.snake.body.slice(1).forEach((cell) => place(cell, ghost ? "ghostBody" : "body"));
  const head = session.snake.body[0];
  if (head) {
    place(head, active.has("shield") ? "shieldedHead" : ghost ? "ghostHead" : "head");
  }
  return layers;
}

function renderBoard(session: SessionSnapshot, config: GameConfig, color: boolean): string[] {
  const layers = buildLayers(session, config);
  const border = `+${"-".repeat(config.gridWidth * 2)}+`;
  const rows: string[] = [border];
  for (let y = 0; y < config.gridHeight; y += 1) {
    let row = "|";
    for (let x = 0; x < config.gridWidth; x += 1) {
      const glyph = layers.get(cellKey({ x, y }));
      row += glyph ? paint(glyph, color) : EMPTY;
    }
    rows.push(`${row}|`);
  }
  rows.push(border);
  return rows;
}

function renderGameOver(summary: GameOverSummary): string[] {
  const lines = [
    t("gameOver"),
    t(`reason_${summary.reason}`),
    `${t("modeLabel", { mode: modeName(summary.mode) })}${HUD_GAP}${t("score", { score: summary.score })}`
  ];
  if (summary.newBest) {
    lines.push(t("newHighscore"));
  }
  lines.push("", t("restart"), t("backToMenu"));
  return lines;
}

/** Builds the text lines of one frame without touching the terminal. */
export function renderFrame(frame: FrameModel, options: RenderOptions): string[] {
  const config = options.config ?? GAME_CONFIG;
  if (frame.mode === "menu") {
    return renderMenu(frame.highscores);
  }
  if (frame.mode === "gameover") {
    return frame.gameOver ? renderGameOver(frame.gameOver) : [t("gameOver")];
  }
  if (!frame.session) {
    return [];
  }
  return [
    ...renderHud(frame.session, config),
    ...renderBoard(frame.session, config, options.color),
    t("controls")
  ];
}

/**
 * Draws frames in place: the cursor goes home, every line clears its tail
 * and the rest of the screen is wiped below the last line.
 */
export class TerminalRenderer {
  private readonly output: TerminalOutput;
  private readonly options: RenderOptions;
  private active = false;

  constructor(output: TerminalOutput, options: RenderOptions) {
    this.output = output;
    this.options = options;
  }

  start(): void {
    if (this.active) {
      return;
    }
    this.active = true;
    this.output.write("\x1b[?25l\x1b[2J");
  }

  render(frame: FrameModel): void {
    if (!this.active) {
      return;
    }
    const lines = renderFrame(frame, this.options);
    this.output.write(`\x1b[H${lines.map((line) => `${line}\x1b[K`).join("\n")}\x1b[J`);
  }

  dispose(): void {
    if (!this.active) {
      return;
    }
    this.active = false;
    this.output.write(`${RESET}\x1b[?25h\n`);
  }
}
