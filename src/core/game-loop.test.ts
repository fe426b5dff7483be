import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { GameLoop } from "./game-loop";

describe("game-loop", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs one update and one render per step", () => {
    const calls: string[] = [];
    const loop = new GameLoop(
      {
        update: () => calls.push("update"),
        render: () => calls.push("render"),
        onError: () => calls.push("error")
      },
      10
    );
    loop.start();
    vi.advanceTimersByTime(30);
    expect(calls).toEqual(["update", "render", "update", "render", "update", "render"]);
    expect(loop.frameCount).toBe(3);

    loop.stop();
    vi.advanceTimersByTime(50);
    expect(loop.frameCount).toBe(3);
    expect(loop.running).toBe(false);
  });

  it("skips the render when update stops the loop", () => {
    const render = vi.fn();
    const loop: GameLoop = new GameLoop(
      {
        update: () => loop.stop(),
        render,
        onError: vi.fn()
      },
      10
    );
    loop.start();
    vi.advanceTimersByTime(40);
    expect(render).not.toHaveBeenCalled();
  });

  it("stops and reports when a frame throws", () => {
    const onError = vi.fn();
    const failure = new Error("boom");
    const update = vi.fn(() => {
      throw failure;
    });
    const loop = new GameLoop({ update, render: vi.fn(), onError }, 10);
    loop.start();
    vi.advanceTimersByTime(50);
    expect(update).toHaveBeenCalledTimes(1);
    expect(onError).toHaveBeenCalledWith(failure);
    expect(loop.running).toBe(false);
  });
});
