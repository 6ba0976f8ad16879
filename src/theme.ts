import { MAX_TILE } from "./app-constants";
import type { Rgb } from "./types";

const BASE: Rgb = { r: 0x44, g: 0x44, b: 0xff };
const SHADES = Math.log2(MAX_TILE) + 2;

export const BOARD_BG = "#181818";
export const BEIGE = "#d3b083";
export const OUTLINE_RGB: Rgb = { r: 255, g: 255, b: 255 };

export function rgbToHsv({ r, g, b }: Rgb) {
  const rn = r / 255;
  const gn = g / 255;
  const bn = b / 255;
  const max = Math.max(rn, gn, bn);
  const min = Math.min(rn, gn, bn);
  const d = max - min;
  let h = 0;
  if (d > 0) {
    if (max === rn) h = 60 * (((gn - bn) / d) % 6);
    else if (max === gn) h = 60 * ((bn - rn) / d + 2);
    else h = 60 * ((rn - gn) / d + 4);
  }
  if (h < 0) h += 360;
  return { h, s: max === 0 ? 0 : d / max, v: max };
}

export function hsvToRgb(h: number, s: number, v: number): Rgb {
  const c = v * s;
  const x = c * (1 - Math.abs(((h / 60) % 2) - 1));
  const m = v - c;
  let rgb: [number, number, number];
  if (h < 60) rgb = [c, x, 0];
  else if (h < 120) rgb = [x, c, 0];
  else if (h < 180) rgb = [0, c, x];
  else if (h < 240) rgb = [0, x, c];
  else if (h < 300) rgb = [x, 0, c];
  else rgb = [c, 0, x];
  return {
    r: Math.round((rgb[0] + m) * 255),
    g: Math.round((rgb[1] + m) * 255),
    b: Math.round((rgb[2] + m) * 255),
  };
}

/** Darkens the base blue one step per doubling. */
export function tileColor(value: number): Rgb {
  const { h, s, v } = rgbToHsv(BASE);
  const shade = 1 - (v / SHADES) * Math.log2(value);
  return hsvToRgb(h, s, Math.max(0, shade));
}

export const rgbToCss = ({ r, g, b }: Rgb, alpha = 1) =>
  alpha >= 1 ? `rgb(${r}, ${g}, ${b})` : `rgba(${r}, ${g}, ${b}, ${alpha})`;
