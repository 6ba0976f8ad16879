import { useEffect, useRef } from "react";
import { MAX_FRAME_DT } from "./app-constants";

/** Calls `callback` once per animation frame with the elapsed seconds. */
export function useAnimationFrame(callback: (dt: number) => void, active = true) {
  const saved = useRef(callback);

  useEffect(() => {
    saved.current = callback;
  }, [callback]);

  useEffect(() => {
    if (!active) return;
    let handle = 0;
    let last: number | null = null;

    const step = (t: number) => {
      const dt = last === null ? 0 : Math.min(MAX_FRAME_DT, (t - last) / 1000);
      last = t;
      saved.current(dt);
      handle = requestAnimationFrame(step);
    };

    handle = requestAnimationFrame(step);
    return () => cancelAnimationFrame(handle);
  }, [active]);
}
