import test from "node:test";
import assert from "node:assert/strict";
import { DEFAULT_CONFIG } from "../src/app-constants.js";
import {
  decreaseAbs,
  isVisible,
  particleAlpha,
  particleViews,
  pruneParticles,
  spawnBurst,
  tickParticles,
} from "../src/engine/particles.js";
import { createRng, fromUnit } from "../src/rng.js";
import type { Particle } from "../src/types.js";

const RED = { r: 200, g: 10, b: 10 };

const particle = (over: Partial<Particle> = {}): Particle => ({
  x: 0,
  y: 0,
  size: 5,
  vx: 0,
  vy: 0,
  color: RED,
  life: 200,
  ...over,
});

test("spawnBurst draws size, velocity and life from the random source", () => {
  const xs = [0, 0.5, 0.25, 0.5];
  let i = 0;
  const particles: Particle[] = [];
  spawnBurst(particles, 40, 60, RED, 1, fromUnit(() => xs[i++]), DEFAULT_CONFIG);

  assert.deepEqual(particles, [{ x: 40, y: 60, size: 5, vx: 0, vy: -25, color: RED, life: 200 }]);
});

test("spawnBurst keeps every particle inside the configured ranges", () => {
  const particles: Particle[] = [];
  spawnBurst(particles, 10, 20, RED, 20, createRng(7), DEFAULT_CONFIG);

  assert.equal(particles.length, 20);
  for (const p of particles) {
    assert.ok(Number.isInteger(p.size) && p.size >= 5 && p.size < 10);
    assert.ok(p.vx >= -50 && p.vx < 50);
    assert.ok(p.vy >= -50 && p.vy < 50);
    assert.ok(p.life >= 150 && p.life < 250);
    assert.equal(p.x, 10);
    assert.equal(p.y, 20);
  }
});

test("decreaseAbs moves toward zero and clamps there", () => {
  assert.equal(decreaseAbs(5, 2), 3);
  assert.equal(decreaseAbs(1, 2), 0);
  assert.equal(decreaseAbs(-5, 2), -3);
  assert.equal(decreaseAbs(-1, 2), 0);
  assert.equal(decreaseAbs(0, 3), 0);
});

test("tickParticles integrates position, life and friction", () => {
  const particles = [particle({ x: 10, y: 10, vx: 30, vy: -30 })];
  tickParticles(particles, 0.5, DEFAULT_CONFIG);

  assert.deepEqual(particles[0], particle({ x: 25, y: -5, vx: 20, vy: -20, life: 100 }));
});

test("velocity under friction falls to zero without changing sign", () => {
  const particles = [particle({ vx: 12, vy: -12 })];
  const seen: number[] = [];
  for (let i = 0; i < 4; i++) {
    tickParticles(particles, 0.25, DEFAULT_CONFIG);
    seen.push(particles[0].vx);
    assert.ok(particles[0].vy <= 0);
    assert.equal(Math.abs(particles[0].vy), particles[0].vx);
  }
  assert.deepEqual(seen, [7, 2, 0, 0]);
});

test("a particle disappears after life / decay seconds and is then pruned", () => {
  const particles = [particle({ life: 200 })];
  for (let i = 0; i < 4; i++) tickParticles(particles, 0.25, DEFAULT_CONFIG);

  assert.equal(particles[0].life, 0);
  assert.equal(isVisible(particles[0]), false);
  assert.equal(pruneParticles(particles), 0);

  tickParticles(particles, 0.25, DEFAULT_CONFIG);
  assert.equal(pruneParticles(particles), 1);
  assert.equal(particles.length, 0);
});

test("alpha follows remaining life and is clamped", () => {
  assert.equal(particleAlpha(particle({ life: 100 }), DEFAULT_CONFIG), 0.5);
  assert.equal(particleAlpha(particle({ life: 250 }), DEFAULT_CONFIG), 1);
  assert.equal(particleAlpha(particle({ life: -5 }), DEFAULT_CONFIG), 0);
});

test("prune removes only dead particles and views show only live ones", () => {
  const particles = [10, -1, 0, -0.5, 3].map((life) => particle({ life }));

  assert.equal(pruneParticles(particles), 2);
  assert.deepEqual(particles.map((p) => p.life), [10, 0, 3]);

  const views = particleViews(particles, DEFAULT_CONFIG);
  assert.deepEqual(views.map((v) => v.alpha), [0.05, 0.015]);
});
