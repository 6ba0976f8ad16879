import test from "node:test";
import assert from "node:assert/strict";
import { createSession, playTurn, resetSession, runFrame } from "../src/engine/session.js";
import type { SessionSnapshot } from "../src/engine/session.js";
import { boardFromValues, boardValues, countEmpty } from "../src/engine/sim.js";
import { tileColor } from "../src/theme.js";
import type { Particle } from "../src/types.js";

const FULL_STUCK = [
  [2, 4, 2, 4],
  [4, 2, 4, 2],
  [2, 4, 2, 4],
  [4, 2, 4, 2],
];

const particle = (life: number): Particle => ({
  x: 0,
  y: 0,
  size: 5,
  vx: 0,
  vy: 0,
  color: { r: 1, g: 2, b: 3 },
  life,
});

test("reset seeds two or three tiles and clears score, state and particles", () => {
  for (let seed = 1; seed <= 25; seed++) {
    const s = createSession({ seed });
    const occupied = s.board.flat().filter((t) => t.value !== 0);
    assert.ok(occupied.length >= 2 && occupied.length <= 3, `seed ${seed}`);
    assert.ok(occupied.every((t) => t.value === 2 || t.value === 4));
    assert.equal(s.score, 0);
    assert.equal(s.state, "playing");
    assert.deepEqual(s.particles, []);
  }

  const s = createSession({ seed: 9 });
  s.score = 40;
  s.state = "over";
  s.particles.push(particle(100));
  resetSession(s);
  assert.equal(s.score, 0);
  assert.equal(s.state, "playing");
  assert.equal(s.particles.length, 0);
});

test("a merging turn scores, bursts particles at the merged cells and spawns one tile", () => {
  const s = createSession({ seed: 3 });
  s.board = boardFromValues([
    [2, 2, 4, 4],
    [0, 0, 0, 0],
    [0, 0, 0, 0],
    [0, 0, 0, 0],
  ]);

  const turn = playTurn(s, "left");

  assert.equal(turn.moved, true);
  assert.equal(turn.scoreDelta, 12);
  assert.equal(s.score, 12);
  assert.equal(s.moves, 1);
  assert.equal(s.merges, 2);
  assert.deepEqual(boardValues(s.board)[0].slice(0, 2), [4, 8]);
  assert.equal(s.state, "playing");

  assert.ok(turn.spawned);
  const [r, c] = turn.spawned;
  assert.ok(s.board[r][c].value === 2 || s.board[r][c].value === 4);
  assert.equal(16 - countEmpty(s.board), 3);
  assert.ok(s.board.flat().every((t) => !t.merged));

  assert.equal(s.particles.length, 40);
  assert.equal(s.particles[0].x, 53.75);
  assert.equal(s.particles[0].y, 53.75);
  assert.deepEqual(s.particles[0].color, tileColor(2));
  assert.equal(s.particles[20].x, 151.25);
  assert.deepEqual(s.particles[20].color, tileColor(4));
});

test("merge bursts use the colour of the tiles that merged", () => {
  const s = createSession({ seed: 6 });
  s.board = boardFromValues([
    [2, 2, 0, 0],
    [0, 0, 0, 0],
    [0, 0, 0, 0],
    [0, 0, 0, 0],
  ]);

  playTurn(s, "left");

  assert.equal(s.particles.length, 20);
  assert.deepEqual(s.particles[0].color, { r: 63, g: 63, b: 235 });
  for (const p of s.particles) assert.deepEqual(p.color, tileColor(2));
});

test("a turn that moves nothing spawns nothing", () => {
  const s = createSession({ seed: 5 });
  s.board = boardFromValues([
    [2, 0, 0, 0],
    [4, 0, 0, 0],
    [0, 0, 0, 0],
    [0, 0, 0, 0],
  ]);

  const turn = playTurn(s, "left");

  assert.equal(turn.moved, false);
  assert.equal(turn.spawned, null);
  assert.equal(s.state, "playing");
  assert.equal(s.moves, 0);
  assert.deepEqual(boardValues(s.board)[0], [2, 0, 0, 0]);
  assert.equal(countEmpty(s.board), 14);
});

test("a direction that cannot move a full board ends the game", () => {
  const s = createSession({ seed: 5 });
  s.board = boardFromValues(FULL_STUCK);

  const turn = playTurn(s, "up");
  assert.equal(turn.moved, false);
  assert.equal(turn.state, "over");
  assert.equal(s.state, "over");

  const after = playTurn(s, "left");
  assert.equal(after.moved, false);
  assert.equal(after.state, "over");
  assert.deepEqual(boardValues(s.board), FULL_STUCK);
});

test("a full board that can merge keeps playing and refills the freed cell", () => {
  const s = createSession({ seed: 11 });
  s.board = boardFromValues([
    [2, 2, 4, 8],
    [4, 8, 16, 32],
    [8, 16, 32, 64],
    [16, 32, 64, 128],
  ]);

  const turn = playTurn(s, "left");

  assert.equal(turn.moved, true);
  assert.deepEqual(turn.spawned, [0, 3]);
  assert.deepEqual(boardValues(s.board)[0].slice(0, 3), [4, 4, 8]);
  assert.equal(countEmpty(s.board), 0);
  assert.equal(s.state, "playing");
});

test("runFrame ticks, renders live particles, then prunes the dead ones", () => {
  const s = createSession({ seed: 2 });
  s.particles = [particle(30), particle(100)];
  const board = boardValues(s.board);

  const seen: SessionSnapshot[] = [];
  const turn = runFrame(s, { dt: 0.25 }, (snap) => seen.push(snap));

  assert.equal(turn, null);
  assert.equal(seen.length, 1);
  const [snap] = seen;
  assert.deepEqual(snap.particles.map((p) => p.alpha), [0.25]);
  assert.deepEqual(snap.board, board);
  assert.deepEqual(s.particles.map((p) => p.life), [50]);
});

test("runFrame resets before playing the frame's direction", () => {
  const s = createSession({ seed: 4 });
  s.board = boardFromValues(FULL_STUCK);
  s.state = "over";
  s.score = 100;

  const turn = runFrame(s, { reset: true, dir: "left", dt: 0.016 });
  assert.notEqual(turn, null);
  assert.equal(s.state, "playing");
  assert.equal(s.score, turn?.scoreDelta);

  s.state = "over";
  const ignored = runFrame(s, { dir: "left", dt: 0.016 });
  assert.equal(ignored, null);
});
