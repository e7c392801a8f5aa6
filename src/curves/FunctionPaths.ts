/**
 * Samples an explicit function y = f(x) into math-space polylines, split at
 * vertical asymptotes and wherever the function is undefined.
 */

import type { Point2D, ScalarFunction } from "../types";

export interface FunctionPathOptions {
  leftBound: number;
  rightBound: number;
  /** Number of intervals; N + 1 samples are taken. */
  samples: number;
  /** Known vertical asymptotes. Detected with findAsymptotes() when omitted. */
  asymptotes?: readonly number[];
  /** Isolated x values where the function is undefined. */
  pointDiscontinuities?: readonly number[];
}

/** Growth of |f| across a bisected sign flip that marks a pole rather than a root. */
const POLE_GROWTH = 1e6;
const MAX_BISECTIONS = 200;

/**
 * Evaluate a user function, treating a throw as "undefined here".
 */
export function safeEvaluate(fn: ScalarFunction, x: number): number {
  try {
    return fn(x);
  } catch {
    return NaN;
  }
}

function onAny(x: number, values: readonly number[]): boolean {
  for (const v of values) {
    if (Math.abs(x - v) <= 1e-12 * Math.max(1, Math.abs(v))) return true;
  }
  return false;
}

function sampleX(left: number, right: number, i: number, n: number): number {
  return i === n ? right : left + ((right - left) * i) / n;
}

/**
 * Locate vertical asymptotes in (left, right) by looking for sign flips
 * between finite samples and bisecting each one. A flip whose magnitude
 * blows up under bisection is a pole; one that shrinks is a root.
 */
export function findAsymptotes(
  fn: ScalarFunction,
  left: number,
  right: number,
  samples: number,
): number[] {
  const n = Math.max(1, Math.floor(samples));
  if (!Number.isFinite(left) || !Number.isFinite(right) || right <= left) return [];

  const found: number[] = [];
  let prevX = NaN;
  let prevY = NaN;

  for (let i = 0; i <= n; i++) {
    const x = sampleX(left, right, i, n);
    const y = safeEvaluate(fn, x);
    if (!Number.isFinite(y)) continue;

    if (Number.isFinite(prevY) && prevY * y < 0) {
      const pole = bisectPole(fn, prevX, prevY, x, y);
      if (pole !== null) found.push(pole);
    }
    prevX = x;
    prevY = y;
  }
  return found;
}

function bisectPole(
  fn: ScalarFunction,
  a0: number,
  fa0: number,
  b0: number,
  fb0: number,
): number | null {
  let a = a0;
  let b = b0;
  let fa = fa0;
  let fb = fb0;
  const startMagnitude = Math.max(1, Math.abs(fa0), Math.abs(fb0));

  for (let iter = 0; iter < MAX_BISECTIONS; iter++) {
    const m = (a + b) / 2;
    if (m <= a || m >= b) break;
    const fm = safeEvaluate(fn, m);
    if (!Number.isFinite(fm)) return m;
    if (fm === 0) return null;
    if (Math.sign(fm) === Math.sign(fa)) {
      a = m;
      fa = fm;
    } else {
      b = m;
      fb = fm;
    }
  }

  const endMagnitude = Math.min(Math.abs(fa), Math.abs(fb));
  return endMagnitude > startMagnitude * POLE_GROWTH ? (a + b) / 2 : null;
}

/**
 * Sample `fn` over [leftBound, rightBound] and split the result into
 * continuous runs.
 *
 * Samples lying on an asymptote or discontinuity are skipped. When an
 * asymptote falls strictly between two samples the current run is closed
 * just left of it and a new run opens just right of it. Runs with fewer
 * than two points are dropped.
 */
export function buildFunctionPaths(fn: ScalarFunction, options: FunctionPathOptions): Point2D[][] {
  const { leftBound: left, rightBound: right } = options;
  if (!Number.isFinite(left) || !Number.isFinite(right) || right <= left) return [];

  const n = Math.max(1, Math.floor(options.samples));
  const step = (right - left) / n;
  const delta = Math.min(1e-3, step / 10);
  const asymptotes = (options.asymptotes ?? findAsymptotes(fn, left, right, n))
    .filter((a) => Number.isFinite(a) && a >= left && a <= right)
    .sort((p, q) => p - q);
  const discontinuities = options.pointDiscontinuities ?? [];

  const paths: Point2D[][] = [];
  let current: Point2D[] = [];
  const endPath = () => {
    if (current.length >= 2) paths.push(current);
    current = [];
  };
  const pushIfFinite = (x: number) => {
    const y = safeEvaluate(fn, x);
    if (Number.isFinite(y)) current.push([x, y]);
  };

  let asymptoteIndex = 0;
  let prevX: number | null = null;

  for (let i = 0; i <= n; i++) {
    const x = sampleX(left, right, i, n);

    if (prevX !== null) {
      while (asymptoteIndex < asymptotes.length && asymptotes[asymptoteIndex] <= prevX) {
        asymptoteIndex++;
      }
      while (asymptoteIndex < asymptotes.length && asymptotes[asymptoteIndex] < x) {
        const a = asymptotes[asymptoteIndex];
        if (!onAny(prevX, [a]) && !onAny(x, [a])) {
          if (a - delta > prevX) pushIfFinite(a - delta);
          endPath();
          if (a + delta < x) pushIfFinite(a + delta);
        }
        asymptoteIndex++;
      }
    }
    prevX = x;

    if (onAny(x, asymptotes)) {
      endPath();
      continue;
    }
    if (onAny(x, discontinuities)) continue;

    const y = safeEvaluate(fn, x);
    if (!Number.isFinite(y)) {
      endPath();
      continue;
    }
    current.push([x, y]);
  }
  endPath();
  return paths;
}
