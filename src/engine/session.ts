import { cellCenter, resolveConfig } from "../app-constants";
import { createRng } from "../rng";
import type { Rng } from "../rng";
import { tileColor } from "../theme";
import type { Board, Cell, Dir, GameConfig, MergeEvent, Particle, ParticleView, PlayState } from "../types";
import { particleViews, pruneParticles, spawnBurst, tickParticles } from "./particles";
import { boardValues, clearMergeFlags, createEmptyBoard, hasEmptyCell, seedBoard, slide, spawnTile } from "./sim";

export type GameSession = {
  config: GameConfig;
  rng: Rng;
  board: Board;
  score: number;
  state: PlayState;
  particles: Particle[];
  moves: number;
  merges: number;
};

export type TurnResult = {
  moved: boolean;
  scoreDelta: number;
  merges: MergeEvent[];
  spawned: Cell | null;
  state: PlayState;
};

export type FrameInput = {
  dir?: Dir | null;
  reset?: boolean;
  dt: number;
};

export type SessionSnapshot = {
  board: number[][];
  score: number;
  state: PlayState;
  moves: number;
  merges: number;
  particles: ParticleView[];
};

export function createSession(
  options: { config?: Partial<GameConfig>; rng?: Rng; seed?: number } = {}
): GameSession {
  const config = resolveConfig(options.config);
  const session: GameSession = {
    config,
    rng: options.rng ?? createRng(options.seed),
    board: createEmptyBoard(config.size),
    score: 0,
    state: "playing",
    particles: [],
    moves: 0,
    merges: 0,
  };
  resetSession(session);
  return session;
}

export function resetSession(s: GameSession) {
  s.board = seedBoard(s.config.size, s.rng, s.config.startTiles);
  s.score = 0;
  s.moves = 0;
  s.merges = 0;
  s.state = "playing";
  s.particles = [];
}

export function playTurn(s: GameSession, dir: Dir): TurnResult {
  if (s.state !== "playing") {
    return { moved: false, scoreDelta: 0, merges: [], spawned: null, state: s.state };
  }

  const { moved, scoreDelta, merges } = slide(s.board, dir);
  if (!moved) {
    // a real move always frees a cell, so a full board is only caught here
    if (!hasEmptyCell(s.board)) s.state = "over";
    return { moved, scoreDelta, merges, spawned: null, state: s.state };
  }

  clearMergeFlags(s.board);
  s.score += scoreDelta;
  s.moves += 1;
  s.merges += merges.length;
  for (const m of merges) {
    const { x, y } = cellCenter(s.config, m.row, m.col);
    // bursts take the colour of the tiles that merged, not the doubled result
    spawnBurst(s.particles, x, y, tileColor(m.value / 2), s.config.burstCount, s.rng, s.config);
  }

  let spawned: Cell | null = null;
  if (hasEmptyCell(s.board)) spawned = spawnTile(s.board, s.rng);
  else s.state = "over";

  return { moved, scoreDelta, merges, spawned, state: s.state };
}

export function tickSession(s: GameSession, dt: number) {
  tickParticles(s.particles, dt, s.config);
}

export const snapshotSession = (s: GameSession): SessionSnapshot => ({
  board: boardValues(s.board),
  score: s.score,
  state: s.state,
  moves: s.moves,
  merges: s.merges,
  particles: particleViews(s.particles, s.config),
});

/** reset → turn → tick → render → prune. */
export function runFrame(
  s: GameSession,
  input: FrameInput,
  render?: (snapshot: SessionSnapshot) => void
): TurnResult | null {
  if (input.reset) resetSession(s);
  const turn = s.state === "playing" && input.dir ? playTurn(s, input.dir) : null;
  tickSession(s, input.dt);
  render?.(snapshotSession(s));
  pruneParticles(s.particles);
  return turn;
}
