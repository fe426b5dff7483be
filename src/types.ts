export type PlayMode = "classic" | "time_attack" | "survival";
export type GameMode = "menu" | PlayMode | "gameover";
export type Direction = "up" | "down" | "left" | "right";
export type PowerupKind = "speed_boost" | "shield" | "multiplier" | "ghost";
export type CollisionKind = "wall" | "self" | "obstacle";
export type GameOverReason = CollisionKind | "time_up";
export type ParticleKind = "food" | "shield" | PowerupKind;

export interface Cell {
  x: number;
  y: number;
}

export interface GameConfig {
  gridWidth: number;
  gridHeight: number;
  fps: number;
  baseSpeed: number;
  speedMultiplier: number;
  startLength: number;
}

export interface ActivePowerupState {
  kind: PowerupKind;
  remainingTicks: number;
}

export interface PickupState {
  id: number;
  position: Cell;
  kind: PowerupKind;
  durationTicks: number;
}

export interface ObstacleState {
  id: number;
  position: Cell;
}

export interface ParticleState {
  x: number;
  y: number;
  vx: number;
  vy: number;
  life: number;
  kind: ParticleKind;
}

export interface ScoreState {
  score: number;
  foodEaten: number;
}

export type HighscoreTable = Record<PlayMode, number>;

export type InputAction =
  | { type: "direction"; direction: Direction }
  | { type: "select"; mode: PlayMode }
  | { type: "confirm" }
  | { type: "restart" }
  | { type: "menu" }
  | { type: "quit"; immediate: boolean };

export interface SnakeSnapshot {
  body: Cell[];
  direction: Direction;
  growPending: number;
}

export interface SessionSnapshot {
  mode: PlayMode;
  snake: SnakeSnapshot;
  food: Cell;
  obstacles: ObstacleState[];
  pickups: PickupState[];
  activePowerups: ActivePowerupState[];
  particles: ParticleState[];
  score: ScoreState;
  timeRemainingTicks: number | null;
  elapsedTicks: number;
  ticksPerMove: number;
}

export interface GameOverSummary {
  mode: PlayMode;
  score: number;
  reason: GameOverReason;
  newBest: boolean;
}

export interface FrameModel {
  mode: GameMode;
  session: SessionSnapshot | null;
  highscores: HighscoreTable;
  gameOver: GameOverSummary | null;
}
