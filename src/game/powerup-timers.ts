import { POWERUP_KINDS } from "../config/game-config";
import type { ActivePowerupState, PowerupKind } from "../types";

/**
 * One countdown slot per power-up kind. A slot at 0 is inactive.
 */
export class PowerupTimers {
  private readonly slots: Record<PowerupKind, number> = {
    speed_boost: 0,
    shield: 0,
    multiplier: 0,
    ghost: 0
  };

  has(kind: PowerupKind): boolean {
    return this.slots[kind] > 0;
  }

  remaining(kind: PowerupKind): number {
    return this.slots[kind];
  }

  activate(kind: PowerupKind, durationTicks: number): void {
    this.slots[kind] = Math.max(0, durationTicks);
  }

  /** Clears an active slot. Returns false when there was nothing to consume. */
  consume(kind: PowerupKind): boolean {
    if (!this.has(kind)) {
      return false;
    }
    this.slots[kind] = 0;
    return true;
  }

  /** Counts every active slot down by one tick and returns the kinds that expired. */
  tick(): PowerupKind[] {
    const expired: PowerupKind[] = [];
    for (const kind of POWERUP_KINDS) {
      if (this.slots[kind] <= 0) {
        continue;
      }
      this.slots[kind] -= 1;
      if (this.slots[kind] <= 0) {
        this.slots[kind] = 0;
        expired.push(kind);
      }
    }
    return expired;
  }

  clear(): void {
    for (const kind of POWERUP_KINDS) {
      this.slots[kind] = 0;
    }
  }

  entries(): ActivePowerupState[] {
    return POWERUP_KINDS.filter((kind) => this.has(kind)).map((kind) => ({
      kind,
      remainingTicks: this.slots[kind]
    }));
  }
}
