import { OUTLINE_RGB, rgbToCss } from "./theme";
import type { ParticleView } from "./types";

export type ParticleCanvas = Pick<
  CanvasRenderingContext2D,
  "clearRect" | "fillRect" | "strokeRect" | "fillStyle" | "strokeStyle" | "lineWidth"
>;

export function drawParticles(ctx: ParticleCanvas, particles: ParticleView[], width: number, height: number) {
  ctx.clearRect(0, 0, width, height);
  ctx.lineWidth = 1;
  for (const p of particles) {
    const x = Math.trunc(p.x);
    const y = Math.trunc(p.y);
    ctx.fillStyle = rgbToCss(p.color, p.alpha);
    ctx.fillRect(x, y, p.size, p.size);
    ctx.strokeStyle = rgbToCss(OUTLINE_RGB, p.alpha);
    ctx.strokeRect(x, y, p.size, p.size);
  }
}
