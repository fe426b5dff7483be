import type { GameMode, PlayMode } from "../types";

type Listener = (nextState: GameMode, prevState: GameMode) => void;

export class InvalidTransitionError extends Error {
  readonly from: GameMode;
  readonly to: GameMode;

  constructor(from: GameMode, to: GameMode) {
    super(`illegal mode transition ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}

export function isPlayMode(mode: GameMode): mode is PlayMode {
  return mode === "classic" || mode === "time_attack" || mode === "survival";
}

export class GameStateMachine {
  private state: GameMode = "menu";
  private lastPlayMode: PlayMode | null = null;
  private readonly listeners = new Set<Listener>();

  get current(): GameMode {
    return this.state;
  }

  /** The play mode most recently entered; restart from game over goes back to it. */
  get lastMode(): PlayMode | null {
    return this.lastPlayMode;
  }

  canTransition(nextState: GameMode): boolean {
    const from = this.state;
    if (from === "menu") {
      return isPlayMode(nextState);
    }
    if (isPlayMode(from)) {
      return nextState === "gameover" || nextState === "menu";
    }
    return nextState === "menu" || nextState === this.lastPlayMode;
  }

  set(nextState: GameMode): void {
    if (!this.canTransition(nextState)) {
      throw new InvalidTransitionError(this.state, nextState);
    }
    const previous = this.state;
    this.state = nextState;
    if (isPlayMode(nextState)) {
      this.lastPlayMode = nextState;
    }
    this.listeners.forEach((listener) => listener(nextState, previous));
  }

  onChange(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }
}
