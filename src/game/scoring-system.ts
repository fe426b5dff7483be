import { POWERUP_EFFECTS, SCORE_RULES } from "../config/game-config";
import type { ScoreState } from "../types";

export class ScoringSystem {
  private scoreState: ScoreState = {
    score: 0,
    foodEaten: 0
  };

  get state(): ScoreState {
    return { ...this.scoreState };
  }

  get score(): number {
    return this.scoreState.score;
  }

  reset(): void {
    this.scoreState = {
      score: 0,
      foodEaten: 0
    };
  }

  onFoodCollected(multiplierActive: boolean): number {
    const gain = SCORE_RULES.foodBaseScore * (multiplierActive ? POWERUP_EFFECTS.scoreMultiplier : 1);
    this.scoreState.score += gain;
    this.scoreState.foodEaten += 1;
    return gain;
  }
}
