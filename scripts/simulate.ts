import { createSession, runFrame } from "../src/engine/session";
import { maxTile } from "../src/engine/sim";
import { createRng } from "../src/rng";
import { DIRS } from "../src/types";
import type { PlayState } from "../src/types";

type GameResult = {
  seed: number;
  score: number;
  moves: number;
  merges: number;
  maxTile: number;
  state: PlayState;
};

const FRAME_DT = 1 / 60;

function playGame(seed: number, maxFrames: number): GameResult {
  const session = createSession({ seed });
  const pick = createRng(seed * 9719 + 17);

  let frames = 0;
  while (frames < maxFrames && session.state === "playing") {
    const dir = DIRS[pick.int(0, DIRS.length)];
    runFrame(session, { dir, dt: FRAME_DT });
    frames++;
  }

  return {
    seed,
    score: session.score,
    moves: session.moves,
    merges: session.merges,
    maxTile: maxTile(session.board),
    state: session.state,
  };
}

const mean = (xs: number[]) => (xs.length ? xs.reduce((a, x) => a + x, 0) / xs.length : 0);

function main() {
  const games = Number(process.argv[2] ?? 20);
  const firstSeed = Number(process.argv[3] ?? 1);
  const maxFrames = Number(process.argv[4] ?? 20_000);
  console.log(`Random-play simulation (${games} games, seeds ${firstSeed}..${firstSeed + games - 1}, maxFrames ${maxFrames})`);

  const results: GameResult[] = [];
  for (let i = 0; i < games; i++) {
    const r = playGame(firstSeed + i, maxFrames);
    results.push(r);
    console.log(`seed ${r.seed}: score=${r.score}, moves=${r.moves}, merges=${r.merges}, maxTile=${r.maxTile}, state=${r.state}`);
  }

  const tiles: Record<number, number> = {};
  for (const r of results) tiles[r.maxTile] = (tiles[r.maxTile] ?? 0) + 1;
  const tileDist = Object.entries(tiles)
    .sort((a, b) => Number(a[0]) - Number(b[0]))
    .map(([tile, count]) => `${tile}:${((count / results.length) * 100).toFixed(1)}%`)
    .join(", ");

  console.log(`\nscore mean=${mean(results.map((r) => r.score)).toFixed(1)}, moves mean=${mean(results.map((r) => r.moves)).toFixed(1)}`);
  console.log(`maxTile: ${tileDist}`);
  console.log(`game over: ${results.filter((r) => r.state === "over").length}/${results.length}`);
}

main();
