import type { MapState } from "../types";

/** Absolute per-field tolerance when comparing map states. */
export const MAP_STATE_EPSILON = 1e-6;

export function mapStatesEqual(a: MapState, b: MapState, epsilon = MAP_STATE_EPSILON): boolean {
  return (
    Math.abs(a.scale - b.scale) <= epsilon &&
    Math.abs(a.offsetX - b.offsetX) <= epsilon &&
    Math.abs(a.offsetY - b.offsetY) <= epsilon &&
    Math.abs(a.originX - b.originX) <= epsilon &&
    Math.abs(a.originY - b.originY) <= epsilon
  );
}

export function copyMapState(state: MapState): MapState {
  return {
    scale: state.scale,
    offsetX: state.offsetX,
    offsetY: state.offsetY,
    originX: state.originX,
    originY: state.originY,
  };
}

export interface UniformTransform {
  /** Uniform scale ratio new/base. */
  ratio: number;
  translateX: number;
  translateY: number;
}

/**
 * Transform taking screen coordinates recorded under `base` to where they
 * land under `next`. Exact for math-space geometry because projection is
 * affine with the same scale on both axes (y flip included in both).
 */
export function computeUniformTransform(base: MapState, next: MapState): UniformTransform {
  const ratio = next.scale / base.scale;
  return {
    ratio,
    translateX: next.originX + next.offsetX - ratio * (base.originX + base.offsetX),
    translateY: next.originY + next.offsetY - ratio * (base.originY + base.offsetY),
  };
}

export function formatTransformMatrix(t: UniformTransform): string {
  return `matrix(${t.ratio} 0 0 ${t.ratio} ${t.translateX} ${t.translateY})`;
}

/**
 * Rounded state for signatures of view-derived geometry.
 */
export function quantizeMapState(state: MapState, step = 1e-3): string {
  const q = (v: number) => Math.round(v / step) * step;
  return [state.scale, state.offsetX, state.offsetY, state.originX, state.originY]
    .map((v) => q(v).toFixed(3))
    .join(",");
}
