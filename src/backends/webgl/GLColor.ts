/**
 * CSS color string → straight (non-premultiplied) RGBA in [0, 1].
 */

export type RGBA = readonly [number, number, number, number];

const OPAQUE_BLACK: RGBA = [0, 0, 0, 1];

const NAMED_COLORS: Readonly<Record<string, string>> = {
  black: "#000000",
  white: "#ffffff",
  red: "#ff0000",
  green: "#008000",
  blue: "#0000ff",
  yellow: "#ffff00",
  orange: "#ffa500",
  purple: "#800080",
  gray: "#808080",
  grey: "#808080",
  lightgray: "#d3d3d3",
  lightgrey: "#d3d3d3",
  lightblue: "#add8e6",
  cyan: "#00ffff",
  magenta: "#ff00ff",
  brown: "#a52a2a",
  pink: "#ffc0cb",
  transparent: "#00000000",
};

/** Distinct strings kept before the cache starts over. */
export const MAX_CACHED_COLORS = 256;

// Parsed once per distinct string
const colorCache = new Map<string, RGBA>();

/**
 * Parse a CSS color. Supports #RGB, #RRGGBB, #RRGGBBAA, rgb(), rgba() and
 * a small set of named colors. rgba() alpha above 1 is read as 0-255.
 * Anything else parses to opaque black.
 */
export function parseCssColor(color: string): RGBA {
  const cached = colorCache.get(color);
  if (cached) return cached;

  const normalized = color.trim().toLowerCase();
  const named = NAMED_COLORS[normalized];
  const result =
    (named !== undefined ? parseHex(named) : null) ??
    parseHex(normalized) ??
    parseRgbFunction(normalized) ??
    OPAQUE_BLACK;
  if (colorCache.size >= MAX_CACHED_COLORS) colorCache.clear();
  colorCache.set(color, result);
  return result;
}

function parseHex(value: string): RGBA | null {
  if (!value.startsWith("#")) return null;
  const h = value.slice(1);
  if (!/^[0-9a-f]+$/.test(h)) return null;
  if (h.length === 3) {
    return [
      parseInt(h[0] + h[0], 16) / 255,
      parseInt(h[1] + h[1], 16) / 255,
      parseInt(h[2] + h[2], 16) / 255,
      1,
    ];
  }
  if (h.length === 6 || h.length === 8) {
    return [
      parseInt(h.slice(0, 2), 16) / 255,
      parseInt(h.slice(2, 4), 16) / 255,
      parseInt(h.slice(4, 6), 16) / 255,
      h.length === 8 ? parseInt(h.slice(6, 8), 16) / 255 : 1,
    ];
  }
  return null;
}

function parseRgbFunction(value: string): RGBA | null {
  const match = /^rgba?\(([^)]*)\)$/.exec(value);
  if (!match) return null;
  const parts = match[1].split(",").map((part) => Number.parseFloat(part.trim()));
  if (parts.length < 3 || parts.length > 4 || parts.some((n) => !Number.isFinite(n))) return null;

  const channel = (n: number): number => clamp01(n / 255);
  let alpha = parts.length === 4 ? parts[3] : 1;
  if (alpha > 1) alpha /= 255;
  return [channel(parts[0]), channel(parts[1]), channel(parts[2]), clamp01(alpha)];
}

function clamp01(n: number): number {
  return Math.min(1, Math.max(0, n));
}

/**
 * Clear the color cache (for testing).
 */
export function clearColorCache(): void {
  colorCache.clear();
}

export function colorCacheSize(): number {
  return colorCache.size;
}
