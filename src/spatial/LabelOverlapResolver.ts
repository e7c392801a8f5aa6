import type { ScreenBounds } from "../types";

const DEFAULT_MAX_STEPS = 10;
const DEFAULT_PADDING = 2;

export function inflateRect(rect: ScreenBounds, padding: number): ScreenBounds {
  if (!(padding > 0)) return rect;
  return {
    minX: rect.minX - padding,
    maxX: rect.maxX + padding,
    minY: rect.minY - padding,
    maxY: rect.maxY + padding,
  };
}

export function shiftRectY(rect: ScreenBounds, dy: number): ScreenBounds {
  return { minX: rect.minX, maxX: rect.maxX, minY: rect.minY + dy, maxY: rect.maxY + dy };
}

/** Rectangles that only touch along an edge do not intersect. */
export function rectsIntersect(a: ScreenBounds, b: ScreenBounds): boolean {
  return !(a.maxX <= b.minX || a.minX >= b.maxX || a.maxY <= b.minY || a.minY >= b.maxY);
}

export function countOverlaps(placed: readonly ScreenBounds[], rect: ScreenBounds): number {
  let count = 0;
  for (const other of placed) {
    if (rectsIntersect(rect, other)) count++;
  }
  return count;
}

/**
 * Smallest vertical shift that keeps `rect` clear of every placed rectangle.
 * Candidates alternate +step, -step, +2*step and so on. When every
 * candidate still overlaps, the one with the fewest overlaps wins.
 */
export function pickNonOverlappingDy(
  placed: readonly ScreenBounds[],
  rect: ScreenBounds,
  step: number,
  maxSteps: number,
  padding: number,
): number {
  const padded = inflateRect(rect, padding);
  let bestCount = countOverlaps(placed, padded);
  if (bestCount === 0) return 0;

  const stride = step > 0 ? step : 1;
  let bestDy = 0;
  for (let i = 1; i <= maxSteps; i++) {
    for (const dy of [i * stride, -i * stride]) {
      const count = countOverlaps(placed, shiftRectY(padded, dy));
      if (count === 0) return dy;
      if (count < bestCount) {
        bestCount = count;
        bestDy = dy;
      }
    }
  }
  return bestDy;
}

/**
 * Places anchored labels one group at a time, nudging each vertically off
 * the labels placed before it. A group keeps the shift it was first given
 * until reset().
 */
export class LabelOverlapResolver {
  private readonly maxSteps: number;
  private readonly padding: number;
  private placed: ScreenBounds[] = [];
  private offsets = new Map<string, number>();

  constructor(maxSteps = DEFAULT_MAX_STEPS, padding = DEFAULT_PADDING) {
    this.maxSteps = maxSteps;
    this.padding = padding;
  }

  getOrPlaceDy(group: string, rect: ScreenBounds, step: number): number {
    const known = this.offsets.get(group);
    if (known !== undefined) return known;

    const dy = pickNonOverlappingDy(this.placed, rect, step, this.maxSteps, this.padding);
    this.offsets.set(group, dy);
    this.placed.push(shiftRectY(inflateRect(rect, this.padding), dy));
    return dy;
  }

  get placedCount(): number {
    return this.placed.length;
  }

  reset(): void {
    this.placed = [];
    this.offsets.clear();
  }
}
