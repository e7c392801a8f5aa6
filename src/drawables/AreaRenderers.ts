/**
 * Filled regions bounded by curves, segments and closed shapes.
 *
 * Each builder returns the region as two math-space boundaries: `forward`
 * traced first, then `reverse` back to the start. A region whose reverse
 * is its forward boundary backwards is a single closed loop and is filled
 * as a polygon.
 */

import type {
  AreaBoundary,
  ClosedShape,
  ClosedShapeAreaDrawable,
  ColoredAreaDrawable,
  FunctionSegmentAreaDrawable,
  FunctionsAreaDrawable,
  MathPoint,
  MathSegment,
  Point2D,
  ScalarFunction,
  SegmentsAreaDrawable,
} from "../types";
import type { RendererPrimitives } from "../rendering/RendererPrimitives";
import type { CoordinateMapper } from "../mapping/CoordinateMapper";
import type { RendererStyle } from "../settings/RendererStyle";
import { safeEvaluate } from "../curves/FunctionPaths";
import { GEOMETRY_EPSILON, isFinitePoint, positiveModulo } from "./DrawableGeometry";

const TWO_PI = Math.PI * 2;

export interface AreaBoundaries {
  forward: MathPoint[];
  reverse: MathPoint[];
}

// ─── Boundaries ─────────────────────────────────────────────

function boundaryEvaluator(boundary: AreaBoundary): ScalarFunction {
  if (boundary === null) return () => 0;
  if (typeof boundary === "number") return () => boundary;
  if (typeof boundary === "function") return boundary;
  return boundary.evaluate;
}

function boundaryRange(boundary: AreaBoundary): [number, number] {
  if (boundary === null || typeof boundary !== "object") return [-Infinity, Infinity];
  return [boundary.leftBound ?? -Infinity, boundary.rightBound ?? Infinity];
}

function sampleCount(samples: number): number {
  return Number.isFinite(samples) ? Math.max(2, Math.floor(samples)) : 2;
}

/**
 * Region between `upper` and `lower` over the x range both are defined on,
 * clipped to [visibleLeft, visibleRight]. Where either side is undefined
 * the longest run of samples with both sides finite is kept.
 */
export function buildFunctionsArea(
  area: FunctionsAreaDrawable,
  visibleLeft: number,
  visibleRight: number,
  defaultSamples: number,
): AreaBoundaries | null {
  const [upperLeft, upperRight] = boundaryRange(area.upper);
  const [lowerLeft, lowerRight] = boundaryRange(area.lower);
  const left = Math.max(area.leftBound ?? -Infinity, upperLeft, lowerLeft, visibleLeft);
  const right = Math.min(area.rightBound ?? Infinity, upperRight, lowerRight, visibleRight);
  if (!Number.isFinite(left) || !Number.isFinite(right) || left >= right) return null;

  const upper = boundaryEvaluator(area.upper);
  const lower = boundaryEvaluator(area.lower);
  const n = sampleCount(area.samples ?? defaultSamples);

  let best: [MathPoint[], MathPoint[]] = [[], []];
  let run: [MathPoint[], MathPoint[]] = [[], []];
  for (let i = 0; i < n; i++) {
    const x = left + (i * (right - left)) / (n - 1);
    const yUpper = safeEvaluate(upper, x);
    const yLower = safeEvaluate(lower, x);
    if (Number.isFinite(yUpper) && Number.isFinite(yLower)) {
      run[0].push({ x, y: yUpper });
      run[1].push({ x, y: yLower });
      if (run[0].length > best[0].length) best = run;
    } else {
      run = [[], []];
    }
  }
  if (best[0].length < 2) return null;
  return { forward: best[0], reverse: [...best[1]].reverse() };
}

/** y on the segment's line at `x`; a vertical segment reports its first endpoint. */
function segmentYAt(segment: MathSegment, x: number): number {
  const { p1, p2 } = segment;
  const dx = p2.x - p1.x;
  if (Math.abs(dx) < GEOMETRY_EPSILON) return p1.y;
  return p1.y + ((x - p1.x) * (p2.y - p1.y)) / dx;
}

function isFiniteSegment(segment: MathSegment): boolean {
  return isFinitePoint(segment.p1) && isFinitePoint(segment.p2);
}

/**
 * Area between one segment and the x-axis, or between two segments over
 * the x range they share.
 */
export function buildSegmentsArea(area: SegmentsAreaDrawable): AreaBoundaries | null {
  const first = area.segment1;
  if (!isFiniteSegment(first)) return null;

  const second = area.segment2;
  if (!second) {
    return {
      forward: [first.p1, first.p2],
      reverse: [{ x: first.p2.x, y: 0 }, { x: first.p1.x, y: 0 }],
    };
  }
  if (!isFiniteSegment(second)) return null;

  const left = Math.max(Math.min(first.p1.x, first.p2.x), Math.min(second.p1.x, second.p2.x));
  const right = Math.min(Math.max(first.p1.x, first.p2.x), Math.max(second.p1.x, second.p2.x));
  if (left >= right) return null;

  return {
    forward: [
      { x: left, y: segmentYAt(first, left) },
      { x: right, y: segmentYAt(first, right) },
    ],
    reverse: [
      { x: right, y: segmentYAt(second, right) },
      { x: left, y: segmentYAt(second, left) },
    ],
  };
}

/**
 * Area between a curve and a segment over the segment's x range. The curve
 * is traced left to right and the segment closes the region back.
 */
export function buildFunctionSegmentArea(
  area: FunctionSegmentAreaDrawable,
  defaultSamples: number,
): AreaBoundaries | null {
  const { segment } = area;
  if (!isFiniteSegment(segment)) return null;

  const [start, end] = segment.p1.x <= segment.p2.x ? [segment.p1, segment.p2] : [segment.p2, segment.p1];
  const [curveLeft, curveRight] = boundaryRange(area.curve);
  const left = Math.max(start.x, curveLeft);
  const right = Math.min(end.x, curveRight);
  if (left >= right) return null;

  const curve = boundaryEvaluator(area.curve);
  const n = sampleCount(area.samples ?? defaultSamples);
  const forward: MathPoint[] = [];
  for (let i = 0; i < n; i++) {
    const x = left + (i * (right - left)) / (n - 1);
    const y = safeEvaluate(curve, x);
    if (Number.isFinite(y)) forward.push({ x, y });
  }
  if (forward.length < 2) return null;
  return { forward, reverse: [end, start] };
}

// ─── Closed shapes ──────────────────────────────────────────

/**
 * `count` angles from `start` to `end`, sweeping clockwise (decreasing) or
 * counter-clockwise. Equal angles sweep a full turn. The last angle is
 * exactly `end`.
 */
export function arcAngleSequence(start: number, end: number, count: number, clockwise: boolean): number[] {
  const n = sampleCount(count);
  let span = clockwise ? positiveModulo(start - end, TWO_PI) : positiveModulo(end - start, TWO_PI);
  if (span < GEOMETRY_EPSILON) span = TWO_PI;
  const step = span / (n - 1);
  const direction = clockwise ? -1 : 1;

  const angles: number[] = [];
  for (let i = 0; i < n - 1; i++) angles.push(start + direction * i * step);
  angles.push(end);
  return angles;
}

export interface EllipseFrame {
  center: MathPoint;
  radiusX: number;
  radiusY: number;
  rotationRad: number;
}

function ellipsePoint(frame: EllipseFrame, t: number): MathPoint {
  const cos = Math.cos(frame.rotationRad);
  const sin = Math.sin(frame.rotationRad);
  const lx = frame.radiusX * Math.cos(t);
  const ly = frame.radiusY * Math.sin(t);
  return { x: frame.center.x + lx * cos - ly * sin, y: frame.center.y + lx * sin + ly * cos };
}

/** Parametric angle of a point, in the ellipse's own frame. */
function ellipseAngle(frame: EllipseFrame, p: MathPoint): number {
  const cos = Math.cos(-frame.rotationRad);
  const sin = Math.sin(-frame.rotationRad);
  const dx = p.x - frame.center.x;
  const dy = p.y - frame.center.y;
  const lx = dx * cos - dy * sin;
  const ly = dx * sin + dy * cos;
  return positiveModulo(Math.atan2(ly / frame.radiusY, lx / frame.radiusX), TWO_PI);
}

/**
 * Where the chord's line crosses the ellipse, ordered along the chord from
 * p1. Null unless it crosses twice within the chord.
 */
export function chordIntersections(frame: EllipseFrame, chord: MathSegment): [MathPoint, MathPoint] | null {
  const cos = Math.cos(-frame.rotationRad);
  const sin = Math.sin(-frame.rotationRad);
  const toUnit = (p: MathPoint): MathPoint => {
    const dx = p.x - frame.center.x;
    const dy = p.y - frame.center.y;
    return { x: (dx * cos - dy * sin) / frame.radiusX, y: (dx * sin + dy * cos) / frame.radiusY };
  };

  const f = toUnit(chord.p1);
  const g = toUnit(chord.p2);
  const d = { x: g.x - f.x, y: g.y - f.y };
  const a = d.x * d.x + d.y * d.y;
  if (a < GEOMETRY_EPSILON) return null;
  const b = 2 * (f.x * d.x + f.y * d.y);
  const c = f.x * f.x + f.y * f.y - 1;

  const discriminant = b * b - 4 * a * c;
  if (discriminant < -GEOMETRY_EPSILON) return null;
  const root = Math.sqrt(Math.max(0, discriminant));
  const ts = [(-b - root) / (2 * a), (-b + root) / (2 * a)]
    .filter((t) => t >= -GEOMETRY_EPSILON && t <= 1 + GEOMETRY_EPSILON)
    .map((t) => Math.min(1, Math.max(0, t)));
  if (ts.length < 2 || Math.abs(ts[1] - ts[0]) < GEOMETRY_EPSILON) return null;

  const at = (t: number): MathPoint => ({
    x: chord.p1.x + t * (chord.p2.x - chord.p1.x),
    y: chord.p1.y + t * (chord.p2.y - chord.p1.y),
  });
  return [at(ts[0]), at(ts[1])];
}

function isValidFrame(frame: EllipseFrame): boolean {
  return (
    isFinitePoint(frame.center) &&
    Number.isFinite(frame.radiusX) &&
    Number.isFinite(frame.radiusY) &&
    Number.isFinite(frame.rotationRad) &&
    frame.radiusX > 0 &&
    frame.radiusY > 0
  );
}

function fullLoop(frame: EllipseFrame, samples: number): AreaBoundaries | null {
  if (!isValidFrame(frame)) return null;
  const n = sampleCount(samples);
  const forward: MathPoint[] = [];
  for (let i = 0; i < n; i++) forward.push(ellipsePoint(frame, (i * TWO_PI) / n));
  return { forward, reverse: [...forward].reverse() };
}

function segmentLoop(
  frame: EllipseFrame,
  chord: MathSegment,
  clockwise: boolean,
  samples: number,
): AreaBoundaries | null {
  if (!isValidFrame(frame) || !isFiniteSegment(chord)) return null;
  const hits = chordIntersections(frame, chord);
  if (!hits) return null;

  const [start, end] = hits;
  const angles = arcAngleSequence(ellipseAngle(frame, start), ellipseAngle(frame, end), samples, clockwise);
  const forward = angles.map((t) => ellipsePoint(frame, t));
  forward[0] = start;
  forward[forward.length - 1] = end;
  return { forward, reverse: [end, start] };
}

function degreesToRadians(degrees: number | undefined): number {
  return ((degrees ?? 0) * Math.PI) / 180;
}

/**
 * Outline of a polygon, circle, ellipse, or the part of a circle or
 * ellipse cut off by a chord. Full loops use `shapeSamples` points and
 * chord-cut arcs `arcSamples`.
 */
export function buildClosedShapeArea(
  shape: ClosedShape,
  shapeSamples: number,
  arcSamples: number,
): AreaBoundaries | null {
  let result: AreaBoundaries | null = null;
  switch (shape.type) {
    case "polygon":
      result = shape.vertices.every(isFinitePoint)
        ? { forward: [...shape.vertices], reverse: [...shape.vertices].reverse() }
        : null;
      break;
    case "circle":
      result = fullLoop(
        { center: shape.center, radiusX: shape.radius, radiusY: shape.radius, rotationRad: 0 },
        shapeSamples,
      );
      break;
    case "ellipse":
      result = fullLoop(
        {
          center: shape.center,
          radiusX: shape.radiusX,
          radiusY: shape.radiusY,
          rotationRad: degreesToRadians(shape.rotationDegrees),
        },
        shapeSamples,
      );
      break;
    case "circleSegment":
      result = segmentLoop(
        { center: shape.center, radiusX: shape.radius, radiusY: shape.radius, rotationRad: 0 },
        shape.chord,
        shape.clockwise ?? false,
        arcSamples,
      );
      break;
    case "ellipseSegment":
      result = segmentLoop(
        {
          center: shape.center,
          radiusX: shape.radiusX,
          radiusY: shape.radiusY,
          rotationRad: degreesToRadians(shape.rotationDegrees),
        },
        shape.chord,
        shape.clockwise ?? false,
        arcSamples,
      );
      break;
  }
  if (!result || result.forward.length < 3 || result.reverse.length < 2) return null;
  return result;
}

// ─── Filling ────────────────────────────────────────────────

function isReversedCopy(forward: readonly Point2D[], reverse: readonly Point2D[]): boolean {
  if (forward.length !== reverse.length) return false;
  const last = forward.length - 1;
  return forward.every(([x, y], i) => x === reverse[last - i][0] && y === reverse[last - i][1]);
}

function clampOpacity(opacity: number | undefined, fallback: number): number {
  const value = opacity ?? fallback;
  return Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : fallback;
}

/**
 * Project and fill an area. Non-finite boundary points are dropped; a
 * single loop goes out as a polygon, anything else as a joined area.
 */
export function fillArea(
  primitives: RendererPrimitives,
  boundaries: AreaBoundaries,
  color: string | undefined,
  opacity: number | undefined,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  const project = (points: readonly MathPoint[]): Point2D[] =>
    points.filter(isFinitePoint).map((p) => mapper.mathToScreen(p.x, p.y));

  const forward = project(boundaries.forward);
  const reverse = project(boundaries.reverse);
  const fill = { color: color ?? style.areaFillColor, opacity: clampOpacity(opacity, style.areaOpacity) };

  if (isReversedCopy(forward, reverse)) {
    if (forward.length >= 3) primitives.fillPolygon(forward, fill);
    return;
  }
  if (forward.length + reverse.length < 3) return;
  primitives.fillJoinedArea(forward, reverse, fill);
}

// ─── Renderers ──────────────────────────────────────────────

/** Region between two caller-supplied boundaries. */
export function renderColoredArea(
  primitives: RendererPrimitives,
  area: ColoredAreaDrawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  fillArea(primitives, { forward: [...area.forward], reverse: [...area.reverse] }, area.color, area.opacity, mapper, style);
}

export function renderFunctionsArea(
  primitives: RendererPrimitives,
  area: FunctionsAreaDrawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  const boundaries = buildFunctionsArea(
    area,
    mapper.getVisibleLeftBound(),
    mapper.getVisibleRightBound(),
    style.areaSamples,
  );
  if (boundaries) fillArea(primitives, boundaries, area.color, area.opacity, mapper, style);
}

export function renderSegmentsArea(
  primitives: RendererPrimitives,
  area: SegmentsAreaDrawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  const boundaries = buildSegmentsArea(area);
  if (boundaries) fillArea(primitives, boundaries, area.color, area.opacity, mapper, style);
}

export function renderFunctionSegmentArea(
  primitives: RendererPrimitives,
  area: FunctionSegmentAreaDrawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  const boundaries = buildFunctionSegmentArea(area, style.areaSamples);
  if (boundaries) fillArea(primitives, boundaries, area.color, area.opacity, mapper, style);
}

export function renderClosedShapeArea(
  primitives: RendererPrimitives,
  area: ClosedShapeAreaDrawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  const boundaries = buildClosedShapeArea(
    area.shape,
    area.resolution ?? style.areaShapeSamples,
    area.resolution ?? style.areaArcSamples,
  );
  if (boundaries) fillArea(primitives, boundaries, area.color, area.opacity, mapper, style);
}
