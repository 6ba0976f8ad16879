import type { GameConfig } from "./types";

export const MAX_TILE = 2048;
export const MAX_FRAME_DT = 0.1;
export const MERGE_PULSE_MS = 110;

export const DEFAULT_CONFIG: GameConfig = {
  size: 4,
  startTiles: [2, 3],
  burstCount: 20,
  particleLife: 200,
  particleDecay: 200,
  particleFriction: 20,
  particleSize: [5, 10],
  particleSpeed: 50,
  particleLifeRange: [150, 250],
  boardPx: 400,
  cellPad: 10,
};

const isPositive = (n: number) => Number.isFinite(n) && n > 0;

export function resolveConfig(partial: Partial<GameConfig> = {}): GameConfig {
  const cfg: GameConfig = { ...DEFAULT_CONFIG, ...partial };
  if (!Number.isInteger(cfg.size) || cfg.size < 2 || cfg.size > 8) {
    throw new RangeError(`size must be an integer in 2..8, got ${cfg.size}`);
  }
  const [lo, hi] = cfg.startTiles;
  if (!Number.isInteger(lo) || !Number.isInteger(hi) || lo < 1 || hi < lo || hi > cfg.size * cfg.size) {
    throw new RangeError(`startTiles must be a range within 1..${cfg.size * cfg.size}, got [${lo}, ${hi}]`);
  }
  if (!Number.isInteger(cfg.burstCount) || cfg.burstCount < 0) {
    throw new RangeError(`burstCount must be a non-negative integer, got ${cfg.burstCount}`);
  }
  for (const key of ["particleLife", "particleDecay", "particleFriction", "particleSpeed", "boardPx"] as const) {
    if (!isPositive(cfg[key])) throw new RangeError(`${key} must be positive, got ${cfg[key]}`);
  }
  for (const key of ["particleSize", "particleLifeRange"] as const) {
    const [min, max] = cfg[key];
    if (!isPositive(min) || !isPositive(max) || max <= min) {
      throw new RangeError(`${key} must be a range with 0 < min < max, got [${min}, ${max}]`);
    }
  }
  if (!Number.isInteger(cfg.particleSize[0]) || !Number.isInteger(cfg.particleSize[1])) {
    throw new RangeError(`particleSize bounds must be integers, got [${cfg.particleSize.join(", ")}]`);
  }
  if (cfg.cellPad < 0 || cfg.cellPad * (cfg.size + 1) >= cfg.boardPx) {
    throw new RangeError(`cellPad ${cfg.cellPad} leaves no room for cells`);
  }
  return cfg;
}

const parseIntParam = (params: URLSearchParams, name: string) => {
  const raw = params.get(name);
  if (raw === null || raw.trim() === "") return undefined;
  const n = Number(raw);
  return Number.isInteger(n) ? n : undefined;
};

/** Reads `size`, `burst` and `seed` from a query string such as `?size=5&seed=7`. */
export function configFromSearch(search: string): { config: Partial<GameConfig>; seed?: number } {
  const params = new URLSearchParams(search);
  const config: Partial<GameConfig> = {};
  const size = parseIntParam(params, "size");
  if (size !== undefined) config.size = size;
  const burst = parseIntParam(params, "burst");
  if (burst !== undefined) config.burstCount = burst;
  const seed = parseIntParam(params, "seed");
  return seed === undefined ? { config } : { config, seed };
}

export const cellSizePx = (cfg: GameConfig) =>
  (cfg.boardPx - cfg.cellPad * (cfg.size + 1)) / cfg.size;

export const cellOrigin = (cfg: GameConfig, row: number, col: number) => {
  const cell = cellSizePx(cfg);
  return {
    x: cfg.cellPad * (col + 1) + col * cell,
    y: cfg.cellPad * (row + 1) + row * cell,
  };
};

export const cellCenter = (cfg: GameConfig, row: number, col: number) => {
  const { x, y } = cellOrigin(cfg, row, col);
  const half = cellSizePx(cfg) / 2;
  return { x: x + half, y: y + half };
};
