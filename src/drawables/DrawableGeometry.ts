/**
 * Geometry shared by the drawable renderers and plan reprojection.
 *
 * Everything here works from math-space inputs and a MapState, so a cached
 * command can be re-derived for a new view exactly as the renderer first
 * produced it.
 */

import type { MapState, MathPoint, Point2D } from "../types";
import { projectWithState } from "../mapping/CoordinateMapper";

const TWO_PI = Math.PI * 2;

/** Spans and lengths below this are treated as zero. */
export const GEOMETRY_EPSILON = 1e-9;

export function positiveModulo(value: number, modulus: number): number {
  const r = value % modulus;
  return r < 0 ? r + modulus : r;
}

export function isFinitePoint(p: MathPoint): boolean {
  return Number.isFinite(p.x) && Number.isFinite(p.y);
}

export function projectPoint(state: MapState, p: MathPoint): Point2D {
  return projectWithState(state, p.x, p.y);
}

// ─── Vector arrowhead ───────────────────────────────────────

/**
 * Triangle `[tip, left, right]` for an arrow of edge length `tipSize`.
 * The head never overshoots the shaft.
 */
export function computeArrowhead(
  state: MapState,
  origin: MathPoint,
  tip: MathPoint,
  tipSize: number,
): Point2D[] | null {
  if (!(tipSize > 0)) return null;
  const [ox, oy] = projectPoint(state, origin);
  const [tx, ty] = projectPoint(state, tip);
  const dx = tx - ox;
  const dy = ty - oy;
  const len = Math.hypot(dx, dy);
  if (!Number.isFinite(len) || len < GEOMETRY_EPSILON) return null;

  const ux = dx / len;
  const uy = dy / len;
  const half = tipSize / 2;
  const height = Math.min(Math.sqrt(tipSize * tipSize - half * half), len);
  const bx = tx - ux * height;
  const by = ty - uy * height;

  return [
    [tx, ty],
    [bx - uy * half, by + ux * half],
    [bx + uy * half, by - ux * half],
  ];
}

// ─── Angle arc ──────────────────────────────────────────────

export interface AngleArcGeometry {
  center: Point2D;
  /** Requested radius clamped to the shorter screen arm. */
  radius: number;
  startAngle: number;
  endAngle: number;
  midAngle: number;
  sweepClockwise: boolean;
  /** Displayed span, [0, 2π). */
  spanRad: number;
}

/**
 * Screen arc marking the angle at `vertex` from arm1 to arm2.
 * Screen angles grow clockwise (y down), so a clockwise sweep adds.
 */
export function computeAngleArc(
  state: MapState,
  vertex: MathPoint,
  arm1: MathPoint,
  arm2: MathPoint,
  arcRadius: number,
  sweepClockwise: boolean,
): AngleArcGeometry | null {
  const [vx, vy] = projectPoint(state, vertex);
  const [x1, y1] = projectPoint(state, arm1);
  const [x2, y2] = projectPoint(state, arm2);
  const len1 = Math.hypot(x1 - vx, y1 - vy);
  const len2 = Math.hypot(x2 - vx, y2 - vy);
  if (!Number.isFinite(len1) || !Number.isFinite(len2)) return null;
  if (len1 < GEOMETRY_EPSILON || len2 < GEOMETRY_EPSILON) return null;

  const radius = Math.min(arcRadius, len1, len2);
  if (!(radius > 0)) return null;

  const a1 = Math.atan2(y1 - vy, x1 - vx);
  const a2 = Math.atan2(y2 - vy, x2 - vx);

  let spanRad: number;
  let endAngle: number;
  let midAngle: number;
  if (sweepClockwise) {
    spanRad = positiveModulo(a2 - a1, TWO_PI);
    endAngle = a1 + spanRad;
    midAngle = a1 + spanRad / 2;
  } else {
    spanRad = positiveModulo(a1 - a2, TWO_PI);
    endAngle = a1 - spanRad;
    midAngle = a1 - spanRad / 2;
  }

  return {
    center: [vx, vy],
    radius,
    startAngle: a1,
    endAngle,
    midAngle,
    sweepClockwise,
    spanRad,
  };
}

export interface AngleLabelGeometry {
  text: string;
  position: Point2D;
  fontSize: number;
}

/**
 * Degree label on the bisector of an angle arc. The font shrinks with the
 * arc when the arms are too short for the full radius.
 */
export function computeAngleLabel(
  arc: AngleArcGeometry,
  arcRadius: number,
  textRadiusFactor: number,
  baseFontSize: number,
): AngleLabelGeometry {
  const degrees = (arc.spanRad * 180) / Math.PI;
  const distance = arc.radius * textRadiusFactor;
  const fontSize = arcRadius > 0 ? baseFontSize * (arc.radius / arcRadius) : baseFontSize;
  return {
    text: `${degrees.toFixed(1)}°`,
    position: [
      arc.center[0] + Math.cos(arc.midAngle) * distance,
      arc.center[1] + Math.sin(arc.midAngle) * distance,
    ],
    fontSize,
  };
}

// ─── Circle arc ─────────────────────────────────────────────

export interface CircleArcGeometry {
  center: Point2D;
  radius: number;
  startAngle: number;
  endAngle: number;
  sweepClockwise: boolean;
}

/**
 * Arc of a circle from point1 to point2: the minor arc, or its complement
 * when `useMajorArc` is set. The minor arc travels in whichever math
 * direction is shorter.
 */
export function computeCircleArc(
  state: MapState,
  center: MathPoint,
  radius: number,
  point1: MathPoint,
  point2: MathPoint,
  useMajorArc: boolean,
  radiusScale: number,
): CircleArcGeometry | null {
  if (!isFinitePoint(center) || !isFinitePoint(point1) || !isFinitePoint(point2)) return null;

  const screenRadius = radius * state.scale * radiusScale;
  if (!Number.isFinite(screenRadius) || !(screenRadius > 0)) return null;

  const theta1 = Math.atan2(point1.y - center.y, point1.x - center.x);
  const theta2 = Math.atan2(point2.y - center.y, point2.x - center.x);
  const ccw = positiveModulo(theta2 - theta1, TWO_PI);
  const cw = positiveModulo(theta1 - theta2, TWO_PI);
  const minor = Math.min(ccw, cw);
  if (minor < GEOMETRY_EPSILON) return null;

  const minorIsCcw = ccw <= cw;
  const mathCcw = useMajorArc ? !minorIsCcw : minorIsCcw;
  const span = useMajorArc ? Math.max(ccw, cw) : minor;

  const c = projectPoint(state, center);
  const p1 = projectPoint(state, point1);
  const startAngle = Math.atan2(p1[1] - c[1], p1[0] - c[0]);

  // Math counter-clockwise is screen counter-clockwise: decreasing screen angle.
  return mathCcw
    ? { center: c, radius: screenRadius, startAngle, endAngle: startAngle - span, sweepClockwise: false }
    : { center: c, radius: screenRadius, startAngle, endAngle: startAngle + span, sweepClockwise: true };
}

// ─── Labels ─────────────────────────────────────────────────

const FONT_QUANTUM = 0.25;

/**
 * Zoom-dependent label size. Labels never grow past their base size and
 * disappear (0) once they shrink to `vanishSize` or below.
 */
export function computeLabelFontSize(
  baseFontSize: number,
  scale: number,
  referenceScale: number,
  vanishSize: number,
): number {
  const factor = referenceScale > 0 && Number.isFinite(referenceScale)
    ? Math.min(1, scale / referenceScale)
    : 1;
  const size = Math.round((baseFontSize * factor) / FONT_QUANTUM) * FONT_QUANTUM;
  if (!Number.isFinite(size) || size <= vanishSize) return 0;
  return size;
}

/**
 * Screen position of one line of a (possibly rotated) multi-line label.
 * Lines stack downward along the label's own rotated axis.
 */
export function computeLabelLinePosition(
  state: MapState,
  anchor: MathPoint,
  lineIndex: number,
  fontSize: number,
  lineHeightFactor: number,
  rotationDegrees: number,
): Point2D {
  const [ax, ay] = projectPoint(state, anchor);
  const step = lineIndex * fontSize * lineHeightFactor;
  if (step === 0) return [ax, ay];
  const screenRotation = (-rotationDegrees * Math.PI) / 180;
  return [ax - Math.sin(screenRotation) * step, ay + Math.cos(screenRotation) * step];
}

export function computeAnchoredTextPosition(
  state: MapState,
  anchor: MathPoint,
  offsetX: number,
  offsetY: number,
  minY?: number,
): Point2D {
  const [ax, ay] = projectPoint(state, anchor);
  const y = ay + offsetY;
  return [ax + offsetX, minY === undefined ? y : Math.max(y, minY)];
}

/** Horizontal offset placing a curve name just left of its first point. */
export function curveLabelOffsetX(name: string, fontSize: number): number {
  return -((1 + name.length) * fontSize) / 2;
}
