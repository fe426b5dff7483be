import { describe, expect, it } from "vitest";
import type { HighscoreStore } from "../storage/highscores";
import type { HighscoreTable } from "../types";
import { GameApp } from "./game-app";

function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (1664525 * state + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

class MemoryHighscoreStore implements HighscoreStore {
  saves: HighscoreTable[] = [];
  private stored: HighscoreTable;

  constructor(initial: Partial<HighscoreTable> = {}) {
    this.stored = { classic: 0, time_attack: 0, survival: 0, ...initial };
  }

  load(): HighscoreTable {
    return { ...this.stored };
  }

  save(table: HighscoreTable): void {
    this.stored = { ...table };
    this.saves.push({ ...table });
  }
}

// Eat the food on (39,15), then run into the right wall: a 10-point classic run.
function playShortClassicRun(app: GameApp): void {
  app.handle({ type: "select", mode: "classic" });
  const session = app.currentSession;
  if (!session) {
    throw new Error("expected a running session");
  }
  session.snake.reset(3, { x: 38, y: 15 }, "right");
  session.spawn.food = { x: 39, y: 15 };
  for (let tick = 0; tick < 100 && app.stateMachine.current === "classic"; tick += 1) {
    app.update();
  }
}

describe("game-app", () => {
  it("starts a fresh session from the menu", () => {
    const app = new GameApp({ highscores: new MemoryHighscoreStore(), random: seededRandom(1) });
    expect(app.getFrame()).toMatchObject({ mode: "menu", session: null, gameOver: null });

    app.handle({ type: "select", mode: "survival" });
    const frame = app.getFrame();
    expect(frame.mode).toBe("survival");
    expect(frame.session?.snake.body).toHaveLength(3);
    expect(frame.session?.score.score).toBe(0);
  });

  it("records a new best on game over and persists it", () => {
    const store = new MemoryHighscoreStore({ classic: 5 });
    const app = new GameApp({ highscores: store, random: seededRandom(2) });
    playShortClassicRun(app);

    const frame = app.getFrame();
    expect(frame.mode).toBe("gameover");
    expect(frame.gameOver).toEqual({ mode: "classic", score: 10, reason: "wall", newBest: true });
    expect(frame.highscores.classic).toBe(10);
    expect(store.saves).toEqual([{ classic: 10, time_attack: 0, survival: 0 }]);
  });

  it("forwards session events to the caller", () => {
    const collisions: string[] = [];
    const pickups: string[] = [];
    const app = new GameApp({
      highscores: new MemoryHighscoreStore(),
      random: seededRandom(7),
      events: {
        onCollision: (kind) => collisions.push(kind),
        onPickup: (kind) => pickups.push(kind)
      }
    });
    playShortClassicRun(app);

    expect(pickups).toEqual(["food"]);
    expect(collisions).toEqual(["wall"]);
  });

  it("leaves the table alone when the score only ties the best", () => {
    const store = new MemoryHighscoreStore({ classic: 10 });
    const app = new GameApp({ highscores: store, random: seededRandom(3) });
    playShortClassicRun(app);

    expect(app.getFrame().gameOver).toEqual({ mode: "classic", score: 10, reason: "wall", newBest: false });
    expect(store.saves).toEqual([]);
  });

  it("restarts the same mode or returns to the menu from game over", () => {
    const app = new GameApp({ highscores: new MemoryHighscoreStore(), random: seededRandom(4) });
    playShortClassicRun(app);

    app.handle({ type: "select", mode: "survival" });
    expect(app.stateMachine.current).toBe("gameover");

    app.handle({ type: "restart" });
    expect(app.stateMachine.current).toBe("classic");
    expect(app.getFrame().session?.score.score).toBe(0);
    expect(app.getFrame().gameOver).toBeNull();

    playShortClassicRun(app);
    app.handle({ type: "confirm" });
    expect(app.getFrame()).toMatchObject({ mode: "menu", session: null });
  });

  it("steers the snake and abandons the run on escape without recording", () => {
    const store = new MemoryHighscoreStore();
    const app = new GameApp({ highscores: store, random: seededRandom(5) });
    app.handle({ type: "select", mode: "time_attack" });

    app.handle({ type: "direction", direction: "up" });
    expect(app.currentSession?.snake.direction).toBe("up");
    app.handle({ type: "direction", direction: "left" });
    expect(app.currentSession?.snake.direction).toBe("up");

    app.handle({ type: "menu" });
    expect(app.stateMachine.current).toBe("menu");
    expect(store.saves).toEqual([]);
  });

  it("quits from the menu, and anywhere on ctrl+c", () => {
    const menuApp = new GameApp({ highscores: new MemoryHighscoreStore() });
    menuApp.handle({ type: "quit", immediate: false });
    expect(menuApp.quitRequested).toBe(true);

    const playingApp = new GameApp({ highscores: new MemoryHighscoreStore(), random: seededRandom(6) });
    playingApp.handle({ type: "select", mode: "classic" });
    playingApp.handle({ type: "quit", immediate: false });
    expect(playingApp.quitRequested).toBe(false);
    playingApp.handle({ type: "quit", immediate: true });
    expect(playingApp.quitRequested).toBe(true);
  });

  it("does not simulate on the menu", () => {
    const app = new GameApp({ highscores: new MemoryHighscoreStore() });
    app.update();
    expect(app.getFrame()).toMatchObject({ mode: "menu", session: null });
  });
});
