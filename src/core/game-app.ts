import { GameSession, type SessionEvents } from "../game/game-session";
import { recordHighscore, type HighscoreStore } from "../storage/highscores";
import type { FrameModel, GameOverReason, GameOverSummary, HighscoreTable, InputAction, PlayMode } from "../types";
import { silentLogger, type Logger } from "../util/logger";
import type { RandomFn } from "../util/random";
import { GameStateMachine, isPlayMode } from "./state";

export interface GameAppOptions {
  highscores: HighscoreStore;
  logger?: Logger;
  random?: RandomFn;
  events?: SessionEvents;
}

/**
 * Routes logical input to the active screen, owns the running session and
 * keeps the best-score table in step with finished runs.
 */
export class GameApp {
  readonly stateMachine = new GameStateMachine();

  private session: GameSession | null = null;
  private lastGameOver: GameOverSummary | null = null;
  private readonly highscores: HighscoreTable;
  private readonly store: HighscoreStore;
  private readonly logger: Logger;
  private readonly random: RandomFn;
  private readonly events: SessionEvents;
  private quit = false;

  constructor(options: GameAppOptions) {
    this.store = options.highscores;
    this.logger = options.logger ?? silentLogger;
    this.random = options.random ?? Math.random;
    this.events = options.events ?? {};
    this.highscores = this.store.load();
    this.stateMachine.onChange((next, previous) => {
      this.logger.debug({ from: previous, to: next }, "mode changed");
    });
  }

  get quitRequested(): boolean {
    return this.quit;
  }

  get currentSession(): GameSession | null {
    return this.session;
  }

  handle(action: InputAction): void {
    if (action.type === "quit" && action.immediate) {
      this.quit = true;
      return;
    }

    const mode = this.stateMachine.current;
    if (mode === "menu") {
      if (action.type === "select") {
        this.startGame(action.mode);
      } else if (action.type === "quit") {
        this.quit = true;
      }
      return;
    }

    if (mode === "gameover") {
      const lastMode = this.stateMachine.lastMode;
      if (action.type === "confirm") {
        this.goToMenu();
      } else if (action.type === "restart" && lastMode) {
        this.startGame(lastMode);
      } else if (action.type === "quit") {
        this.quit = true;
      }
      return;
    }

    if (action.type === "direction") {
      this.session?.snake.setDirection(action.direction);
    } else if (action.type === "menu") {
      this.logger.info({ mode, score: this.session?.scoring.score ?? 0 }, "run abandoned");
      this.goToMenu();
    }
  }

  /** Advances the running session by one tick; a no-op on the menu and game-over screens. */
  update(): void {
    const mode = this.stateMachine.current;
    if (!isPlayMode(mode) || !this.session) {
      return;
    }
    const result = this.session.update();
    if (result.gameOver) {
      this.finishGame(mode, result.reason);
    }
  }

  getFrame(): FrameModel {
    return {
      mode: this.stateMachine.current,
      session: this.session ? this.session.getSnapshot() : null,
      highscores: { ...this.highscores },
      gameOver: this.lastGameOver ? { ...this.lastGameOver } : null
    };
  }

  private startGame(mode: PlayMode): void {
    this.session = new GameSession({
      mode,
      random: this.random,
      events: this.sessionEvents()
    });
    this.lastGameOver = null;
    this.stateMachine.set(mode);
    this.logger.info({ mode }, "run started");
  }

  private goToMenu(): void {
    this.session = null;
    this.stateMachine.set("menu");
  }

  private finishGame(mode: PlayMode, reason: GameOverReason): void {
    const score = this.session?.scoring.score ?? 0;
    const newBest = recordHighscore(this.highscores, mode, score);
    if (newBest) {
      this.store.save({ ...this.highscores });
    }
    this.lastGameOver = { mode, score, reason, newBest };
    this.stateMachine.set("gameover");
    this.logger.info({ mode, score, reason, newBest }, "run over");
  }

  private sessionEvents(): SessionEvents {
    const forward = this.events;
    return {
      ...forward,
      onPickup: (kind) => {
        this.logger.debug({ kind }, "pickup collected");
        forward.onPickup?.(kind);
      },
      onShieldSaved: (collision) => {
        this.logger.debug({ collision }, "shield absorbed collision");
        forward.onShieldSaved?.(collision);
      },
      onCollision: (collision) => {
        this.logger.debug({ collision }, "collision");
        forward.onCollision?.(collision);
      },
      onPowerupSpawned: (pickup) => {
        this.logger.debug({ kind: pickup.kind, position: pickup.position }, "power-up spawned");
        forward.onPowerupSpawned?.(pickup);
      },
      onObstacleSpawned: (obstacle) => {
        this.logger.debug({ position: obstacle.position }, "obstacle spawned");
        forward.onObstacleSpawned?.(obstacle);
      }
    };
  }
}
