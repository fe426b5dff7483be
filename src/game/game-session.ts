import { GAME_CONFIG, PARTICLE_RULES } from "../config/game-config";
import type {
  CollisionKind,
  GameConfig,
  GameOverReason,
  ObstacleState,
  PickupState,
  PlayMode,
  PowerupKind,
  SessionSnapshot
} from "../types";
import type { RandomFn } from "../util/random";
import { checkFoodCollision, checkObstacleCollision, checkPickupCollisions } from "./collision-system";
import { MODE_POLICIES, effectiveSpeed, ticksPerMove, type ModePolicy } from "./mode-policy";
import { ParticleSystem } from "./particle-system";
import { ScoringSystem } from "./scoring-system";
import { SnakeController } from "./snake-controller";
import { DEFAULT_SPAWN_CONFIG, SpawnSystem } from "./spawn-system";

export interface SessionEvents {
  onPickup?: (kind: "food" | PowerupKind) => void;
  onShieldSaved?: (collision: CollisionKind) => void;
  onCollision?: (kind: CollisionKind) => void;
  onPowerupSpawned?: (pickup: PickupState) => void;
  onObstacleSpawned?: (obstacle: ObstacleState) => void;
}

export interface SessionOptions {
  mode: PlayMode;
  random?: RandomFn;
  events?: SessionEvents;
  config?: GameConfig;
}

export type SessionTickResult = { gameOver: false; moved: boolean } | { gameOver: true; moved: boolean; reason: GameOverReason };

/**
 * One run of one play mode. Everything the simulation touches lives here and
 * is mutated in place by `update()`, one fixed-rate tick per call.
 */
export class GameSession {
  readonly mode: PlayMode;
  readonly policy: ModePolicy;
  readonly snake: SnakeController;
  readonly spawn: SpawnSystem;
  readonly scoring: ScoringSystem;
  readonly particles: ParticleSystem;

  private moveCounter = 0;
  private elapsedTicks = 0;
  private timeRemainingTicks: number | null;
  private readonly config: GameConfig;
  private readonly events: SessionEvents;

  constructor(options: SessionOptions) {
    const random = options.random ?? Math.random;
    this.mode = options.mode;
    this.policy = MODE_POLICIES[options.mode];
    this.config = options.config ?? GAME_CONFIG;
    this.events = options.events ?? {};
    this.timeRemainingTicks = this.policy.timeLimitTicks;
    this.scoring = new ScoringSystem();
    this.particles = new ParticleSystem(random);
    this.spawn = new SpawnSystem(random, {
      ...DEFAULT_SPAWN_CONFIG,
      width: this.config.gridWidth,
      height: this.config.gridHeight
    });
    this.snake = new SnakeController({
      width: this.config.gridWidth,
      height: this.config.gridHeight
    });
    this.reset();
  }

  reset(): void {
    this.moveCounter = 0;
    this.elapsedTicks = 0;
    this.timeRemainingTicks = this.policy.timeLimitTicks;
    this.scoring.reset();
    this.particles.clear();
    this.snake.reset(this.config.startLength);
    this.spawn.reset(this.snake.body);
  }

  currentSpeed(): number {
    return effectiveSpeed(
      this.policy,
      { snakeLength: this.snake.length, speedBoost: this.snake.powerups.has("speed_boost") },
      this.config
    );
  }

  currentCadence(): number {
    return ticksPerMove(this.currentSpeed(), this.config.fps);
  }

  update(): SessionTickResult {
    this.elapsedTicks += 1;
    this.particles.update();
    this.snake.powerups.tick();

    const cadence = this.currentCadence();
    this.moveCounter += 1;
    let moved = false;

    if (this.moveCounter >= cadence) {
      this.moveCounter = 0;
      const ghost = this.snake.powerups.has("ghost");
      const result = this.snake.move(ghost);
      if (!result.ok && !this.absorbWithShield(result.collision)) {
        return { gameOver: true, moved, reason: result.collision };
      }
      moved = result.ok;

      if (moved) {
        if (this.policy.spawnsObstacles && !ghost) {
          const obstacle = checkObstacleCollision(this.snake.head, this.spawn.obstacles);
          if (obstacle) {
            if (!this.absorbWithShield("obstacle")) {
              return { gameOver: true, moved, reason: "obstacle" };
            }
            this.spawn.removeObstacleAt(obstacle.position);
          }
        }
        this.collectFood();
        this.collectPickups();
      }
    }

    const pickup = this.spawn.updatePowerupTimer(this.snake.body);
    if (pickup) {
      this.events.onPowerupSpawned?.(pickup);
    }

    if (this.policy.spawnsObstacles) {
      const obstacle = this.spawn.updateObstacles(this.snake.body);
      if (obstacle) {
        this.events.onObstacleSpawned?.(obstacle);
      }
    }

    if (this.timeRemainingTicks !== null) {
      this.timeRemainingTicks = Math.max(0, this.timeRemainingTicks - 1);
      if (this.timeRemainingTicks === 0) {
        return { gameOver: true, moved, reason: "time_up" };
      }
    }

    return { gameOver: false, moved };
  }

  getSnapshot(): SessionSnapshot {
    return {
      mode: this.mode,
      snake: this.snake.snapshot(),
      food: { ...this.spawn.food },
      obstacles: this.spawn.obstacles.map((obstacle) => ({
        ...obstacle,
        position: { ...obstacle.position }
      })),
      pickups: this.spawn.pickups.map((pickup) => ({
        ...pickup,
        position: { ...pickup.position }
      })),
      activePowerups: this.snake.powerups.entries(),
      particles: this.particles.snapshot(),
      score: this.scoring.state,
      timeRemainingTicks: this.timeRemainingTicks,
      elapsedTicks: this.elapsedTicks,
      ticksPerMove: this.currentCadence()
    };
  }

  /** Spends the shield on an otherwise fatal collision. */
  private absorbWithShield(collision: CollisionKind): boolean {
    this.events.onCollision?.(collision);
    if (!this.snake.powerups.consume("shield")) {
      return false;
    }
    this.particles.burst(this.snake.head, "shield", PARTICLE_RULES.shieldBurst);
    this.events.onShieldSaved?.(collision);
    return true;
  }

  private collectFood(): void {
    const food = this.spawn.food;
    if (!checkFoodCollision(this.snake.head, food)) {
      return;
    }
    this.snake.grow(1);
    this.scoring.onFoodCollected(this.snake.powerups.has("multiplier"));
    this.particles.burst(food, "food", PARTICLE_RULES.foodBurst);
    this.events.onPickup?.("food");
    this.spawn.respawnFood(this.snake.body);
  }

  private collectPickups(): void {
    for (const pickup of checkPickupCollisions(this.snake.head, this.spawn.pickups)) {
      this.snake.powerups.activate(pickup.kind, pickup.durationTicks);
      this.particles.burst(pickup.position, pickup.kind, PARTICLE_RULES.pickupBurst);
      this.spawn.consumePickup(pickup.id);
      this.events.onPickup?.(pickup.kind);
    }
  }
}
