import type { Rng } from "../rng";
import type { Board, Cell, Dir, MergeEvent, SlideResult, Tile } from "../types";

const emptyTile = (): Tile => ({ value: 0, merged: false });

export const createEmptyBoard = (size: number): Board =>
  Array.from({ length: size }, () => Array.from({ length: size }, emptyTile));

export const copyBoard = (board: Board): Board =>
  board.map((row) => row.map((tile) => ({ ...tile })));

export const boardFromValues = (values: number[][]): Board =>
  values.map((row) => row.map((value) => ({ value, merged: false })));

export const boardValues = (board: Board): number[][] =>
  board.map((row) => row.map((tile) => tile.value));

export const sameValue = (a: Tile, b: Tile) => a.value === b.value;

export const getEmptyCells = (board: Board): Cell[] => {
  const out: Cell[] = [];
  for (let r = 0; r < board.length; r++) {
    for (let c = 0; c < board[r].length; c++) {
      if (board[r][c].value === 0) out.push([r, c]);
    }
  }
  return out;
};

export const countEmpty = (board: Board) => getEmptyCells(board).length;
export const hasEmptyCell = (board: Board) => board.some((row) => row.some((t) => t.value === 0));
export const maxTile = (board: Board) => Math.max(0, ...board.flat().map((t) => t.value));
export const boardSum = (board: Board) => board.flat().reduce((sum, t) => sum + t.value, 0);

export function clearMergeFlags(board: Board) {
  for (const row of board) for (const tile of row) tile.merged = false;
}

/** Cells of line `i`, ordered from the edge `dir` pushes toward. */
function lineCells(size: number, dir: Dir, i: number): Cell[] {
  return Array.from({ length: size }, (_, k): Cell => {
    switch (dir) {
      case "left":
        return [i, k];
      case "right":
        return [i, size - 1 - k];
      case "up":
        return [k, i];
      case "down":
        return [size - 1 - k, i];
    }
  });
}

/**
 * Slides every tile toward `dir` in place. Sources are visited nearest the
 * edge first, so a tile merges at most once and `[2,2,2]` only combines
 * the pair closest to the edge.
 */
export function slide(board: Board, dir: Dir): SlideResult {
  const size = board.length;
  let moved = false;
  let scoreDelta = 0;
  const merges: MergeEvent[] = [];

  clearMergeFlags(board);

  for (let i = 0; i < size; i++) {
    const cells = lineCells(size, dir, i);
    const at = (k: number) => {
      const [r, c] = cells[k];
      return board[r][c];
    };

    for (let k = 1; k < size; k++) {
      const src = at(k);
      if (src.value === 0) continue;

      let t = k;
      let merged = false;
      while (t > 0) {
        const next = at(t - 1);
        if (next.value !== 0) {
          if (sameValue(next, src) && !next.merged && !src.merged) {
            next.value *= 2;
            next.merged = true;
            scoreDelta += next.value;
            const [row, col] = cells[t - 1];
            merges.push({ row, col, value: next.value });
            src.value = 0;
            merged = true;
          }
          break;
        }
        t--;
      }

      if (merged) {
        moved = true;
      } else if (t !== k) {
        const dest = at(t);
        dest.value = src.value;
        dest.merged = src.merged;
        src.value = 0;
        src.merged = false;
        moved = true;
      }
    }
  }

  return { moved, scoreDelta, merges };
}

export function move(board: Board, dir: Dir) {
  const next = copyBoard(board);
  const { moved, scoreDelta, merges } = slide(next, dir);
  const mergedPositions = merges.map(({ row, col }): Cell => [row, col]);
  return { board: next, moved, scoreDelta, mergedPositions };
}

export const randomTileValue = (rng: Rng) => 2 ** (rng.int(0, 2) + 1);

/** Places a 2 or a 4 on a random empty cell. The board must have one. */
export function spawnTile(board: Board, rng: Rng): Cell {
  const empty = getEmptyCells(board);
  if (!empty.length) throw new Error("spawnTile: board has no empty cell");
  const [r, c] = empty[rng.int(0, empty.length)];
  board[r][c] = { value: randomTileValue(rng), merged: false };
  return [r, c];
}

export function seedBoard(size: number, rng: Rng, startTiles: [number, number] = [2, 3]): Board {
  const board = createEmptyBoard(size);
  const count = rng.int(startTiles[0], startTiles[1] + 1);
  for (let i = 0; i < count; i++) spawnTile(board, rng);
  return board;
}
