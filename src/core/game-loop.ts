export interface LoopCallbacks {
  update: () => void;
  render: () => void;
  onError: (error: unknown) => void;
}

/**
 * Fixed-rate loop: every interval runs one update followed by one render.
 * An exception from either stops the loop and goes to `onError`.
 */
export class GameLoop {
  private readonly stepMs: number;
  private readonly callbacks: LoopCallbacks;
  private timer: ReturnType<typeof setInterval> | null = null;
  private frames = 0;

  constructor(callbacks: LoopCallbacks, stepMs = 1000 / 60) {
    this.callbacks = callbacks;
    this.stepMs = stepMs;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  get frameCount(): number {
    return this.frames;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(this.frame, this.stepMs);
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
  }

  private frame = (): void => {
    try {
      this.callbacks.update();
      if (!this.running) {
        return;
      }
      this.callbacks.render();
      this.frames += 1;
    } catch (error) {
      this.stop();
      this.callbacks.onError(error);
    }
  };
}
