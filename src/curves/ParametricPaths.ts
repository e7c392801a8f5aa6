import type { Point2D, ScalarFunction } from "../types";
import { safeEvaluate } from "./FunctionPaths";

export interface ParametricPathOptions {
  tMin: number;
  tMax: number;
  maxPoints: number;
}

/**
 * Sample (x(t), y(t)) uniformly over [tMin, tMax] into one math-space
 * polyline. Points where either coordinate is undefined are dropped.
 */
export function buildParametricPath(
  x: ScalarFunction,
  y: ScalarFunction,
  options: ParametricPathOptions,
): Point2D[] {
  const { tMin, tMax } = options;
  if (!Number.isFinite(tMin) || !Number.isFinite(tMax) || tMax <= tMin) return [];

  const count = Math.max(2, Math.floor(options.maxPoints));
  const path: Point2D[] = [];
  for (let i = 0; i < count; i++) {
    const t = i === count - 1 ? tMax : tMin + ((tMax - tMin) * i) / (count - 1);
    const px = safeEvaluate(x, t);
    const py = safeEvaluate(y, t);
    if (Number.isFinite(px) && Number.isFinite(py)) path.push([px, py]);
  }
  return path.length >= 2 ? path : [];
}
