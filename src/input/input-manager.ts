import { emitKeypressEvents } from "node:readline";
import type { InputAction } from "../types";

export interface Keypress {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export type KeypressStream = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

const KEY_ACTIONS: Record<string, InputAction> = {
  up: { type: "direction", direction: "up" },
  w: { type: "direction", direction: "up" },
  down: { type: "direction", direction: "down" },
  s: { type: "direction", direction: "down" },
  left: { type: "direction", direction: "left" },
  a: { type: "direction", direction: "left" },
  right: { type: "direction", direction: "right" },
  d: { type: "direction", direction: "right" },
  "1": { type: "select", mode: "classic" },
  "2": { type: "select", mode: "time_attack" },
  "3": { type: "select", mode: "survival" },
  space: { type: "confirm" },
  return: { type: "confirm" },
  enter: { type: "confirm" },
  r: { type: "restart" },
  escape: { type: "menu" },
  q: { type: "quit", immediate: false }
};

export function mapKeypress(str: string | undefined, key: Keypress | undefined): InputAction | null {
  if (key?.ctrl && key.name === "c") {
    return { type: "quit", immediate: true };
  }
  if (key?.ctrl || key?.meta) {
    return null;
  }
  const name = key?.name ?? str;
  if (!name) {
    return null;
  }
  return KEY_ACTIONS[name.toLowerCase()] ?? null;
}

/**
 * Collects keypresses from a raw-mode stream into a queue that the game loop
 * drains once per frame.
 */
export class InputManager {
  private readonly queue: InputAction[] = [];
  private readonly input: KeypressStream;
  private started = false;

  constructor(input: KeypressStream) {
    this.input = input;
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    emitKeypressEvents(this.input);
    if (this.input.isTTY) {
      this.input.setRawMode?.(true);
    }
    this.input.on("keypress", this.onKeypress);
    this.input.resume();
  }

  drain(): InputAction[] {
    return this.queue.splice(0, this.queue.length);
  }

  dispose(): void {
    if (!this.started) {
      return;
    }
    this.started = false;
    this.input.removeListener("keypress", this.onKeypress);
    if (this.input.isTTY) {
      this.input.setRawMode?.(false);
    }
    this.input.pause();
  }

  private onKeypress = (str: string | undefined, key: Keypress | undefined): void => {
    const action = mapKeypress(str, key);
    if (action) {
      this.queue.push(action);
    }
  };
}
