import type { Dir } from "./types";

export type Intent = { type: "move"; dir: Dir } | { type: "reset" };

export type PendingInput = { dir: Dir | null; reset: boolean };

export const KEY_DIRS: Record<string, Dir> = {
  ArrowLeft: "left",
  ArrowRight: "right",
  ArrowUp: "up",
  ArrowDown: "down",
  a: "left",
  d: "right",
  w: "up",
  s: "down",
};

export type KeyMods = Partial<Pick<KeyboardEvent, "repeat" | "ctrlKey" | "metaKey" | "altKey">>;

const dirOf = (key: string): Dir | undefined => KEY_DIRS[key] ?? KEY_DIRS[key.toLowerCase()];

// browser shortcuts (Ctrl+R, Cmd+W, Alt+arrows) are left alone
const hasModifier = (mods: KeyMods) => Boolean(mods.ctrlKey || mods.metaKey || mods.altKey);

/** Directions fire on release, reset on the first press of `r`. */
export function intentFromKey(key: string, phase: "down" | "up", mods: KeyMods = {}): Intent | null {
  if (hasModifier(mods)) return null;
  if (phase === "down") return (key === "r" || key === "R") && !mods.repeat ? { type: "reset" } : null;
  const dir = dirOf(key);
  return dir ? { type: "move", dir } : null;
}

/** Whether the page should swallow this key's default action (scrolling, find-as-you-type). */
export const claimsKey = (key: string, mods: KeyMods = {}) =>
  !hasModifier(mods) && (dirOf(key) !== undefined || key === "r" || key === "R");

export const emptyInput = (): PendingInput => ({ dir: null, reset: false });

// one direction per frame: later releases in the same frame are dropped
export function queueIntent(pending: PendingInput, intent: Intent): PendingInput {
  if (intent.type === "reset") return { ...pending, reset: true };
  return pending.dir ? pending : { ...pending, dir: intent.dir };
}
