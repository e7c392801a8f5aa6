import type { ScalarFunction } from "../types";
import { safeEvaluate } from "./FunctionPaths";

export interface CurveStepOptions {
  /** Screen pixels per math unit. */
  pixelsPerUnit: number;
  /** Height of the drawing surface, px. */
  screenHeight: number;
  /** Target screen distance between samples, px. */
  pixelStep: number;
  minSamples: number;
  maxSamples: number;
  /** Cap used once the curve is tall or wavy on screen. */
  maxSamplesDetailed: number;
}

/** Interior evaluations used to estimate amplitude and waviness. */
const SHAPE_SAMPLES = 10;
/** Screen-height fraction above which a curve counts as tall. */
const TALL_RATIO = 0.1;

export interface CurveShape {
  /** Screen-space height of the sampled values over the screen height. */
  amplitudeRatio: number;
  /** Times the sampled values switch between rising and falling. */
  directionChanges: number;
}

/**
 * Estimate how tall and how wavy a curve is over [left, right] from a few
 * interior samples.
 */
export function estimateCurveShape(
  fn: ScalarFunction,
  left: number,
  right: number,
  pixelsPerUnit: number,
  screenHeight: number,
): CurveShape {
  const values: number[] = [];
  for (let i = 1; i <= SHAPE_SAMPLES; i++) {
    const y = safeEvaluate(fn, left + ((right - left) * i) / (SHAPE_SAMPLES + 1));
    if (Number.isFinite(y)) values.push(y);
  }
  if (values.length < 2 || screenHeight <= 0) return { amplitudeRatio: 0, directionChanges: 0 };

  const amplitude = (Math.max(...values) - Math.min(...values)) * pixelsPerUnit;
  let directionChanges = 0;
  let lastSign = 0;
  for (let i = 1; i < values.length; i++) {
    const sign = Math.sign(values[i] - values[i - 1]);
    if (sign === 0) continue;
    if (lastSign !== 0 && sign !== lastSign) directionChanges++;
    lastSign = sign;
  }
  return { amplitudeRatio: amplitude / screenHeight, directionChanges };
}

/**
 * Number of sample intervals for [left, right] so that consecutive samples
 * land roughly `pixelStep` apart on screen. Tall or oscillating curves get
 * a finer step and a higher cap.
 */
export function computeCurveSampleCount(
  fn: ScalarFunction,
  left: number,
  right: number,
  options: CurveStepOptions,
): number {
  const range = right - left;
  if (!Number.isFinite(range) || range <= 0) return options.minSamples;
  if (!Number.isFinite(options.pixelsPerUnit) || options.pixelsPerUnit <= 0) return options.minSamples;

  const shape = estimateCurveShape(fn, left, right, options.pixelsPerUnit, options.screenHeight);
  const amplitudeFactor = 1 + shape.amplitudeRatio * 4;
  const frequencyFactor = 1 + shape.directionChanges * 0.5;
  const detailed = shape.amplitudeRatio > TALL_RATIO || shape.directionChanges > 1;
  const cap = detailed ? options.maxSamplesDetailed : options.maxSamples;

  const baseStep = options.pixelStep / options.pixelsPerUnit;
  const step = Math.min(
    range / options.minSamples,
    Math.max(range / cap, baseStep / (amplitudeFactor * frequencyFactor)),
  );
  return Math.max(1, Math.ceil(range / step - 1e-9));
}
