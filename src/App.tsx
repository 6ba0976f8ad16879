import { useCallback, useEffect, useRef, useState } from "react";
import { MERGE_PULSE_MS } from "./app-constants";
import { AppScreens } from "./AppScreens";
import { createSession, runFrame } from "./engine/session";
import type { GameSession } from "./engine/session";
import { boardValues, maxTile } from "./engine/sim";
import { useAnimationFrame } from "./hooks";
import { claimsKey, emptyInput, intentFromKey, queueIntent } from "./input";
import { drawParticles } from "./render";
import type { GameConfig, PlayState } from "./types";

type Hud = {
  board: number[][];
  score: number;
  moves: number;
  merges: number;
  maxTile: number;
  state: PlayState;
};

const hudOf = (s: GameSession): Hud => ({
  board: boardValues(s.board),
  score: s.score,
  moves: s.moves,
  merges: s.merges,
  maxTile: maxTile(s.board),
  state: s.state,
});

export default function MergeBurst({ config, seed }: { config?: Partial<GameConfig>; seed?: number }) {
  const [session] = useState(() => createSession({ config, seed }));
  const [hud, setHud] = useState<Hud>(() => hudOf(session));
  const [mergedSet, setMergedSet] = useState<Set<string>>(new Set());
  const canvasRef = useRef<HTMLCanvasElement>(null);
  const pending = useRef(emptyInput());
  const pulseTimer = useRef<number | null>(null);

  useEffect(() => {
    const onKey = (phase: "down" | "up") => (e: KeyboardEvent) => {
      if (claimsKey(e.key, e)) e.preventDefault();
      const intent = intentFromKey(e.key, phase, e);
      if (intent) pending.current = queueIntent(pending.current, intent);
    };
    const onDown = onKey("down");
    const onUp = onKey("up");
    window.addEventListener("keydown", onDown);
    window.addEventListener("keyup", onUp);
    return () => {
      window.removeEventListener("keydown", onDown);
      window.removeEventListener("keyup", onUp);
    };
  }, []);

  useEffect(
    () => () => {
      if (pulseTimer.current !== null) window.clearTimeout(pulseTimer.current);
    },
    []
  );

  const frame = useCallback(
    (dt: number) => {
      const input = pending.current;
      pending.current = emptyInput();
      const ctx = canvasRef.current?.getContext("2d") ?? null;
      const turn = runFrame(session, { ...input, dt }, (snap) => {
        if (ctx) drawParticles(ctx, snap.particles, session.config.boardPx, session.config.boardPx);
      });

      if (input.reset || turn) setHud(hudOf(session));
      if (turn?.merges.length) {
        setMergedSet(new Set(turn.merges.map(({ row, col }) => `${row}-${col}`)));
        if (pulseTimer.current !== null) window.clearTimeout(pulseTimer.current);
        pulseTimer.current = window.setTimeout(() => setMergedSet(new Set()), MERGE_PULSE_MS);
      }
    },
    [session]
  );

  useAnimationFrame(frame);

  return (
    <AppScreens
      config={session.config}
      board={hud.board}
      mergedSet={mergedSet}
      score={hud.score}
      moves={hud.moves}
      merges={hud.merges}
      maxTile={hud.maxTile}
      state={hud.state}
      canvasRef={canvasRef}
      onReset={() => {
        pending.current = queueIntent(pending.current, { type: "reset" });
      }}
    />
  );
}
