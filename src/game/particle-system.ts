import { PARTICLE_RULES } from "../config/game-config";
import type { Cell, ParticleKind, ParticleState } from "../types";
import { randInRange, type RandomFn } from "../util/random";

/**
 * Cosmetic bursts in cell units. Only the renderer reads these; the
 * simulation never does.
 */
export class ParticleSystem {
  private readonly random: RandomFn;
  readonly particles: ParticleState[] = [];

  constructor(random: RandomFn = Math.random) {
    this.random = random;
  }

  burst(cell: Cell, kind: ParticleKind, count: number): void {
    for (let i = 0; i < count; i += 1) {
      this.particles.push({
        x: cell.x + 0.5,
        y: cell.y + 0.5,
        vx: randInRange(this.random, -PARTICLE_RULES.maxSpeed, PARTICLE_RULES.maxSpeed),
        vy: randInRange(this.random, -PARTICLE_RULES.maxSpeed, PARTICLE_RULES.maxSpeed),
        life: PARTICLE_RULES.life,
        kind
      });
    }
  }

  update(): void {
    let write = 0;
    for (const particle of this.particles) {
      if (particle.life <= 0) {
        continue;
      }
      particle.x += particle.vx;
      particle.y += particle.vy;
      particle.life -= 1;
      this.particles[write] = particle;
      write += 1;
    }
    this.particles.length = write;
  }

  clear(): void {
    this.particles.length = 0;
  }

  snapshot(): ParticleState[] {
    return this.particles.map((particle) => ({ ...particle }));
  }
}
