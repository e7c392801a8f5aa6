/**
 * CPU-side helpers for streaming vertices to the line engine.
 */

import type { Point2D } from "../../types";

/** Smallest capacity reached by doubling `current` that holds `needed` bytes. */
export function growCapacity(current: number, needed: number): number {
  let capacity = Math.max(1, current);
  while (capacity < needed) capacity *= 2;
  return capacity;
}

/**
 * Flatten points into an interleaved x,y Float32Array.
 */
export function packVertices(points: readonly Point2D[]): Float32Array {
  const data = new Float32Array(points.length * 2);
  for (let i = 0; i < points.length; i++) {
    data[i * 2] = points[i][0];
    data[i * 2 + 1] = points[i][1];
  }
  return data;
}
