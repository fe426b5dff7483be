import { PassThrough } from "node:stream";
import { describe, expect, it } from "vitest";
import { InputManager, mapKeypress } from "./input-manager";

describe("input-manager", () => {
  it("maps arrows and WASD to directions", () => {
    expect(mapKeypress(undefined, { name: "up" })).toEqual({ type: "direction", direction: "up" });
    expect(mapKeypress("a", { name: "a" })).toEqual({ type: "direction", direction: "left" });
    expect(mapKeypress("D", { name: "d", shift: true })).toEqual({ type: "direction", direction: "right" });
  });

  it("maps menu keys to logical actions", () => {
    expect(mapKeypress("2", { name: "2" })).toEqual({ type: "select", mode: "time_attack" });
    expect(mapKeypress(" ", { name: "space" })).toEqual({ type: "confirm" });
    expect(mapKeypress("\u001b", { name: "escape" })).toEqual({ type: "menu" });
    expect(mapKeypress("q", { name: "q" })).toEqual({ type: "quit", immediate: false });
    expect(mapKeypress("3", undefined)).toEqual({ type: "select", mode: "survival" });
  });

  it("treats ctrl+c as an immediate quit and ignores other chords", () => {
    expect(mapKeypress("\u0003", { name: "c", ctrl: true })).toEqual({ type: "quit", immediate: true });
    expect(mapKeypress("\u0017", { name: "w", ctrl: true })).toBeNull();
    expect(mapKeypress("x", { name: "x" })).toBeNull();
  });

  it("queues keypresses until drained", () => {
    const stream = new PassThrough();
    const manager = new InputManager(stream);
    manager.start();
    stream.emit("keypress", undefined, { name: "left" });
    stream.emit("keypress", "r", { name: "r" });
    stream.emit("keypress", "z", { name: "z" });

    expect(manager.drain()).toEqual([{ type: "direction", direction: "left" }, { type: "restart" }]);
    expect(manager.drain()).toEqual([]);

    manager.dispose();
    stream.emit("keypress", undefined, { name: "up" });
    expect(manager.drain()).toEqual([]);
  });
});
