import type { Rng } from "../rng";
import type { GameConfig, Particle, ParticleView, Rgb } from "../types";

type ParticleConfig = Pick<
  GameConfig,
  "particleLife" | "particleDecay" | "particleFriction" | "particleSize" | "particleSpeed" | "particleLifeRange"
>;

/** Moves `x` toward zero by `amount` without crossing it. */
export function decreaseAbs(x: number, amount: number) {
  if (x > 0) return Math.max(0, x - amount);
  if (x < 0) return Math.min(0, x + amount);
  return 0;
}

export function spawnBurst(
  particles: Particle[],
  x: number,
  y: number,
  color: Rgb,
  count: number,
  rng: Rng,
  cfg: ParticleConfig
) {
  for (let i = 0; i < count; i++) {
    particles.push({
      x,
      y,
      size: rng.int(cfg.particleSize[0], cfg.particleSize[1]),
      vx: rng.float(-cfg.particleSpeed, cfg.particleSpeed),
      vy: rng.float(-cfg.particleSpeed, cfg.particleSpeed),
      color,
      life: rng.float(cfg.particleLifeRange[0], cfg.particleLifeRange[1]),
    });
  }
}

export function tickParticles(particles: Particle[], dt: number, cfg: ParticleConfig) {
  const friction = cfg.particleFriction * dt;
  for (const p of particles) {
    p.x += p.vx * dt;
    p.y += p.vy * dt;
    p.life -= cfg.particleDecay * dt;
    p.vx = decreaseAbs(p.vx, friction);
    p.vy = decreaseAbs(p.vy, friction);
  }
}

export const isVisible = (p: Particle) => p.life > 0;
export const isDead = (p: Particle) => p.life < 0;

export const particleAlpha = (p: Particle, cfg: Pick<GameConfig, "particleLife">) =>
  Math.max(0, Math.min(1, p.life / cfg.particleLife));

/** Drops dead particles in place and returns how many went. */
export function pruneParticles(particles: Particle[]) {
  let removed = 0;
  for (let i = particles.length - 1; i >= 0; i--) {
    if (isDead(particles[i])) {
      particles.splice(i, 1);
      removed++;
    }
  }
  return removed;
}

export const particleViews = (particles: Particle[], cfg: Pick<GameConfig, "particleLife">): ParticleView[] =>
  particles.filter(isVisible).map((p) => ({
    x: p.x,
    y: p.y,
    size: p.size,
    color: p.color,
    alpha: particleAlpha(p, cfg),
  }));
