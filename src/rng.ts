export interface Rng {
  /** Uniform float in `[min, max)`. */
  float(min: number, max: number): number;
  /** Uniform integer in `[min, max)`. */
  int(min: number, max: number): number;
}

export function fromUnit(next: () => number): Rng {
  return {
    float: (min, max) => min + next() * (max - min),
    int: (min, max) => min + Math.floor(next() * (max - min)),
  };
}

export function createRng(seed?: number): Rng {
  if (seed === undefined || !Number.isFinite(seed)) return fromUnit(Math.random);
  let state = (seed >>> 0) || 0x6d2b79f5;
  return fromUnit(() => {
    state = (state + 0x6d2b79f5) >>> 0;
    let z = state;
    z = Math.imul(z ^ (z >>> 15), z | 1);
    z ^= z + Math.imul(z ^ (z >>> 7), z | 61);
    return ((z ^ (z >>> 14)) >>> 0) / 4294967296;
  });
}
