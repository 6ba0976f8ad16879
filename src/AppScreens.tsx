import type { RefObject } from "react";
import { BoardView, Controls, GameOverBanner, StatBadge } from "./screens";
import { BOARD_BG } from "./theme";
import type { GameConfig, PlayState } from "./types";

type AppScreensProps = {
  config: GameConfig;
  board: number[][];
  mergedSet: Set<string>;
  score: number;
  moves: number;
  merges: number;
  maxTile: number;
  state: PlayState;
  canvasRef: RefObject<HTMLCanvasElement>;
  onReset: () => void;
};

export function AppScreens(props: AppScreensProps) {
  return (
    <div className="min-h-screen" style={{ backgroundColor: BOARD_BG }}>
      <GameScreen {...props} />
    </div>
  );
}

function GameScreen(props: AppScreensProps) {
  return (
    <div className="mx-auto max-w-3xl p-6 space-y-4">
      <div className="text-center text-3xl font-extrabold text-amber-100">{props.score}</div>
      <BoardView board={props.board} mergedCells={props.mergedSet} config={props.config}>
        <canvas
          ref={props.canvasRef}
          width={props.config.boardPx}
          height={props.config.boardPx}
          className="absolute inset-0 pointer-events-none"
        />
        <GameOverBanner show={props.state === "over"} />
      </BoardView>
      <div className="flex flex-wrap justify-center gap-2">
        <StatBadge label="Moves" value={props.moves} />
        <StatBadge label="Merges" value={props.merges} />
        <StatBadge label="Best Tile" value={props.maxTile} />
        <button type="button" onClick={props.onReset} className="px-3 py-2 rounded-xl bg-stone-200 text-stone-900">New game</button>
      </div>
      <Controls />
    </div>
  );
}
