/**
 * Core type definitions for the plotline renderer.
 */

// --- Geometry ---

export type Point2D = readonly [number, number];

export interface ScreenBounds {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

/** Snapshot of the pan/zoom/origin transform owned by a CoordinateMapper. */
export interface MapState {
  scale: number;
  offsetX: number;
  offsetY: number;
  originX: number;
  originY: number;
}

export interface MathPoint {
  x: number;
  y: number;
}

// --- Primitive styles ---

export type LineJoin = "miter" | "round" | "bevel";
export type LineCap = "butt" | "round" | "square";

export interface StrokeStyle {
  readonly color: string;
  readonly width: number;
  readonly lineJoin?: LineJoin;
  readonly lineCap?: LineCap;
}

export interface FillStyle {
  readonly color: string;
  readonly opacity?: number; // 0-1, omitted = opaque
}

export interface FontStyle {
  readonly family: string;
  readonly size: number; // px
  readonly weight?: string;
}

export type HorizontalAlign = "left" | "center" | "right";
export type VerticalAlign = "alphabetic" | "top" | "middle" | "bottom" | "hanging";

export interface TextAlignment {
  readonly horizontal: HorizontalAlign;
  readonly vertical: VerticalAlign;
}

// --- Drawables ---

interface DrawableBase {
  /** Unique per canvas. Also the plan cache key. */
  name: string;
  color?: string;
}

export interface PointDrawable extends DrawableBase {
  kind: "point";
  x: number;
  y: number;
  label?: string; // defaults to name; "" hides the label
}

export interface SegmentDrawable extends DrawableBase {
  kind: "segment";
  p1: MathPoint;
  p2: MathPoint;
}

export interface CircleDrawable extends DrawableBase {
  kind: "circle";
  center: MathPoint;
  radius: number;
}

export interface EllipseDrawable extends DrawableBase {
  kind: "ellipse";
  center: MathPoint;
  radiusX: number;
  radiusY: number;
  rotationDegrees: number;
}

export interface VectorDrawable extends DrawableBase {
  kind: "vector";
  origin: MathPoint;
  tip: MathPoint;
}

export interface AngleDrawable extends DrawableBase {
  kind: "angle";
  vertex: MathPoint;
  arm1: MathPoint;
  arm2: MathPoint;
  /** Screen sweep direction from arm1; selects the reflex angle when it disagrees with the arms. */
  sweepClockwise: boolean;
}

export interface CircleArcDrawable extends DrawableBase {
  kind: "circleArc";
  center: MathPoint;
  radius: number;
  point1: MathPoint;
  point2: MathPoint;
  useMajorArc: boolean;
}

export interface LabelDrawable extends DrawableBase {
  kind: "label";
  position: MathPoint;
  text: string;
  fontSize?: number;
  rotationDegrees?: number;
  /** Scale at which the label renders at full size. */
  referenceScale?: number;
}

export type ScalarFunction = (x: number) => number;

export interface FunctionDrawable extends DrawableBase {
  kind: "function";
  evaluate: ScalarFunction;
  /** Source expression; used for change detection when present. */
  expression?: string;
  leftBound: number;
  rightBound: number;
  samples?: number;
  asymptotes?: readonly number[];
  pointDiscontinuities?: readonly number[];
}

export interface ParametricDrawable extends DrawableBase {
  kind: "parametric";
  x: ScalarFunction;
  y: ScalarFunction;
  expression?: string;
  tMin: number;
  tMax: number;
  maxPoints?: number;
}

export interface PolygonDrawable extends DrawableBase {
  kind: "polygon";
  vertices: readonly MathPoint[];
}

export interface ColoredAreaDrawable extends DrawableBase {
  kind: "coloredArea";
  forward: readonly MathPoint[];
  reverse: readonly MathPoint[];
  opacity?: number;
}

export interface CartesianGridDrawable extends DrawableBase {
  kind: "cartesianGrid";
  width: number;
  height: number;
  /** Math-space tick spacing; derived from zoom when omitted. */
  tickSpacing?: number;
}

export interface PolarGridDrawable extends DrawableBase {
  kind: "polarGrid";
  width: number;
  height: number;
  /** Math-space distance between circles; derived from zoom when omitted. */
  radialSpacing?: number;
  /** Radial lines around the origin. */
  angularDivisions?: number;
}

/** Axis-aligned bar; `color` strokes its outline. */
export interface BarDrawable extends DrawableBase {
  kind: "bar";
  xLeft: number;
  xRight: number;
  yBottom: number;
  yTop: number;
  fillColor?: string;
  fillOpacity?: number;
  labelAbove?: string;
  labelBelow?: string;
}

export interface MathSegment {
  p1: MathPoint;
  p2: MathPoint;
}

export interface BoundedCurve {
  evaluate: ScalarFunction;
  leftBound?: number;
  rightBound?: number;
}

/**
 * One side of a function-bounded area: a curve, a constant height, or
 * null for the x-axis.
 */
export type AreaBoundary = ScalarFunction | BoundedCurve | number | null;

export interface FunctionsAreaDrawable extends DrawableBase {
  kind: "functionsArea";
  upper: AreaBoundary;
  lower: AreaBoundary;
  expression?: string;
  leftBound?: number;
  rightBound?: number;
  samples?: number;
  opacity?: number;
}

/** Area under one segment, or between two over their shared x range. */
export interface SegmentsAreaDrawable extends DrawableBase {
  kind: "segmentsArea";
  segment1: MathSegment;
  segment2?: MathSegment;
  opacity?: number;
}

/** Area between a curve and a segment over the segment's x range. */
export interface FunctionSegmentAreaDrawable extends DrawableBase {
  kind: "functionSegmentArea";
  curve: AreaBoundary;
  segment: MathSegment;
  expression?: string;
  samples?: number;
  opacity?: number;
}

export type ClosedShape =
  | { type: "polygon"; vertices: readonly MathPoint[] }
  | { type: "circle"; center: MathPoint; radius: number }
  | { type: "ellipse"; center: MathPoint; radiusX: number; radiusY: number; rotationDegrees?: number }
  | { type: "circleSegment"; center: MathPoint; radius: number; chord: MathSegment; clockwise?: boolean }
  | {
      type: "ellipseSegment";
      center: MathPoint;
      radiusX: number;
      radiusY: number;
      rotationDegrees?: number;
      chord: MathSegment;
      clockwise?: boolean;
    };

export interface ClosedShapeAreaDrawable extends DrawableBase {
  kind: "closedShapeArea";
  shape: ClosedShape;
  /** Samples along curved edges. */
  resolution?: number;
  opacity?: number;
}

export type Drawable =
  | PointDrawable
  | SegmentDrawable
  | CircleDrawable
  | EllipseDrawable
  | VectorDrawable
  | AngleDrawable
  | CircleArcDrawable
  | LabelDrawable
  | FunctionDrawable
  | ParametricDrawable
  | PolygonDrawable
  | ColoredAreaDrawable
  | CartesianGridDrawable
  | PolarGridDrawable
  | BarDrawable
  | FunctionsAreaDrawable
  | SegmentsAreaDrawable
  | FunctionSegmentAreaDrawable
  | ClosedShapeAreaDrawable;

export type DrawableKind = Drawable["kind"];

export type DrawableOfKind<K extends DrawableKind> = Extract<Drawable, { kind: K }>;

// --- Backends ---

export type BackendType = "canvas2d" | "svg" | "webgl";
