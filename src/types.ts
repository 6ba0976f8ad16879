export const DIRS = ["left", "right", "up", "down"] as const;
export type Dir = (typeof DIRS)[number];

export type Tile = {
  value: number;
  /** Set when this tile is the product of a merge in the current slide. */
  merged: boolean;
};

export type Board = Tile[][];

export type Cell = [row: number, col: number];

export type MergeEvent = { row: number; col: number; value: number };

export type SlideResult = {
  moved: boolean;
  scoreDelta: number;
  merges: MergeEvent[];
};

// "victory" is reserved; nothing transitions into it.
export type PlayState = "playing" | "over" | "victory";

export type Rgb = { r: number; g: number; b: number };

export type Particle = {
  x: number;
  y: number;
  size: number;
  vx: number;
  vy: number;
  color: Rgb;
  life: number;
};

export type ParticleView = {
  x: number;
  y: number;
  size: number;
  color: Rgb;
  alpha: number;
};

export type GameConfig = {
  size: number;
  startTiles: [min: number, max: number];
  burstCount: number;
  particleLife: number;
  particleDecay: number;
  particleFriction: number;
  particleSize: [min: number, max: number];
  particleSpeed: number;
  particleLifeRange: [min: number, max: number];
  boardPx: number;
  cellPad: number;
};
