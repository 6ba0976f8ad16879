import { AnimatePresence, motion } from "framer-motion";
import type { ReactNode } from "react";
import { cellSizePx } from "./app-constants";
import { BEIGE, rgbToCss, tileColor } from "./theme";
import type { GameConfig } from "./types";

export function StatBadge({
  label,
  value,
}: {
  label: string;
  value: ReactNode;
}) {
  return (
    <div className="rounded-xl bg-stone-800 px-3 py-2 text-sm font-medium shadow">
      <span className="text-stone-400 mr-2">{label}</span>
      <span className="text-amber-100">{value}</span>
    </div>
  );
}

export function BoardView({
  board,
  mergedCells,
  config,
  children,
}: {
  board: number[][];
  mergedCells: Set<string>;
  config: GameConfig;
  children?: ReactNode;
}) {
  const cell = cellSizePx(config);
  return (
    <div
      className="relative mx-auto rounded-3xl"
      style={{ width: config.boardPx, height: config.boardPx, boxShadow: `0 0 0 2px ${BEIGE}` }}
    >
      <div
        className="grid"
        style={{
          padding: config.cellPad,
          gap: config.cellPad,
          gridTemplateColumns: `repeat(${config.size}, ${cell}px)`,
          gridAutoRows: `${cell}px`,
        }}
      >
        {board.map((row, r) =>
          row.map((v, c) => {
            const key = `${r}-${c}`;
            const active = mergedCells.has(key);
            return (
              <motion.div
                key={key}
                animate={{ scale: active ? 1.06 : 1 }}
                transition={{ type: "spring", stiffness: 420, damping: 24 }}
                className="rounded-xl border-2 font-extrabold flex items-center justify-center"
                style={{ borderColor: BEIGE, backgroundColor: v ? rgbToCss(tileColor(v)) : "transparent", color: BEIGE }}
              >
                {v !== 0 && <span className="text-2xl select-none">{v}</span>}
              </motion.div>
            );
          })
        )}
      </div>
      {children}
    </div>
  );
}

export function GameOverBanner({ show }: { show: boolean }) {
  return (
    <AnimatePresence>
      {show && (
        <motion.div
          initial={{ opacity: 0 }}
          animate={{ opacity: 1 }}
          exit={{ opacity: 0 }}
          className="absolute inset-0 rounded-3xl flex items-center justify-center"
          style={{ backgroundColor: "rgba(64, 64, 128, 0.77)" }}
        >
          <span className="text-5xl font-extrabold" style={{ color: BEIGE }}>Game Over</span>
        </motion.div>
      )}
    </AnimatePresence>
  );
}

export function Controls() {
  return (
    <div className="rounded-2xl bg-stone-800 p-4 shadow text-stone-300">
      <h3 className="font-semibold mb-2 text-amber-100">Controls</h3>
      <ul className="text-sm space-y-1 list-disc pl-5">
        <li>Arrow keys or WASD slide the tiles (on release).</li>
        <li>R starts a new board at any time.</li>
      </ul>
    </div>
  );
}
