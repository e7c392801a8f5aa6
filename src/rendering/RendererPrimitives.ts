/**
 * The primitive vocabulary every backend implements.
 *
 * Shared drawable renderers only ever talk to this interface, so one
 * renderer function serves Canvas 2D, SVG and WebGL alike. All
 * coordinates are screen pixels.
 */

import type {
  Point2D,
  MathPoint,
  StrokeStyle,
  FillStyle,
  FontStyle,
  TextAlignment,
} from "../types";

// ─── Command metadata ───────────────────────────────────────
// Math-space anchors recorded alongside screen-space commands so a cached
// plan can be re-derived for a new view without re-running the renderer.

export interface VectorArrowMetadata {
  kind: "vectorArrow";
  origin: MathPoint;
  tip: MathPoint;
  tipSize: number;
}

export interface AngleArcMetadata {
  kind: "angleArc";
  vertex: MathPoint;
  arm1: MathPoint;
  arm2: MathPoint;
  arcRadius: number;
  sweepClockwise: boolean;
}

export interface AngleLabelMetadata {
  kind: "angleLabel";
  vertex: MathPoint;
  arm1: MathPoint;
  arm2: MathPoint;
  arcRadius: number;
  sweepClockwise: boolean;
  textRadiusFactor: number;
  baseFontSize: number;
}

export interface CircleArcMetadata {
  kind: "circleArc";
  center: MathPoint;
  radius: number;
  point1: MathPoint;
  point2: MathPoint;
  useMajorArc: boolean;
  radiusScale: number;
}

/** Text pinned to a math point at a fixed screen offset (point and curve names). */
export interface AnchoredTextMetadata {
  kind: "anchoredText";
  anchor: MathPoint;
  offsetX: number;
  offsetY: number;
  /** Lower bound for the screen y after offsetting. */
  minY?: number;
}

/** One line of a free-standing label whose font follows the zoom level. */
export interface LabelMetadata {
  kind: "label";
  anchor: MathPoint;
  lineIndex: number;
  baseFontSize: number;
  referenceScale: number;
  rotationDegrees: number;
  vanishSize: number;
  lineHeightFactor: number;
}

export type CommandMetadata =
  | VectorArrowMetadata
  | AngleArcMetadata
  | AngleLabelMetadata
  | CircleArcMetadata
  | AnchoredTextMetadata
  | LabelMetadata;

// ─── Call options ───────────────────────────────────────────

export interface PrimitiveOptions {
  /** Geometry is sized in screen pixels and must not scale with zoom. */
  screenSpace?: boolean;
  metadata?: CommandMetadata;
}

export interface LineOptions {
  includeWidth?: boolean;
}

export interface ArcOptions extends PrimitiveOptions {
  cssClass?: string;
}

export interface TextOptions extends PrimitiveOptions {
  styleOverrides?: Readonly<Record<string, string>>;
}

/** What a backend sees of a plan when a batch opens. */
export interface BatchTarget {
  readonly planKey: string;
}

// ─── Interface ──────────────────────────────────────────────

export interface RendererPrimitives {
  // --- Strokes ---
  strokeLine(start: Point2D, end: Point2D, stroke: StrokeStyle, options?: LineOptions): void;
  strokePolyline(points: readonly Point2D[], stroke: StrokeStyle): void;
  strokeCircle(center: Point2D, radius: number, stroke: StrokeStyle): void;
  strokeEllipse(
    center: Point2D,
    radiusX: number,
    radiusY: number,
    rotationRad: number,
    stroke: StrokeStyle,
  ): void;

  /**
   * Stroke a circular arc. Angles are screen radians (y down), so a
   * clockwise sweep runs in the direction of increasing angle.
   */
  strokeArc(
    center: Point2D,
    radius: number,
    startAngleRad: number,
    endAngleRad: number,
    sweepClockwise: boolean,
    stroke: StrokeStyle,
    options?: ArcOptions,
  ): void;

  // --- Fills ---
  fillCircle(
    center: Point2D,
    radius: number,
    fill: FillStyle,
    stroke?: StrokeStyle,
    options?: PrimitiveOptions,
  ): void;
  fillPolygon(
    points: readonly Point2D[],
    fill: FillStyle,
    stroke?: StrokeStyle,
    options?: PrimitiveOptions,
  ): void;

  /**
   * Fill the region bounded by `forward` followed by `reverse`.
   */
  fillJoinedArea(forward: readonly Point2D[], reverse: readonly Point2D[], fill: FillStyle): void;

  // --- Text ---
  drawText(
    text: string,
    position: Point2D,
    font: FontStyle,
    color: string,
    alignment: TextAlignment,
    options?: TextOptions,
  ): void;

  // --- Surface ---
  clearSurface(): void;
  resizeSurface(width: number, height: number): void;

  // --- Grouping hooks ---
  /** Bracket the primitives of one drawable so backends can share state changes. */
  beginShape(): void;
  endShape(): void;
  /** Bracket one full draw pass. */
  beginFrame(): void;
  endFrame(): void;
  /** Bracket the replay of one cached plan. */
  beginBatch(target: BatchTarget): void;
  endBatch(target: BatchTarget): void;
}

/**
 * Run `draw` between beginShape() and endShape(), closing the shape even if
 * drawing throws.
 */
export function withShape(primitives: RendererPrimitives, draw: () => void): void {
  primitives.beginShape();
  try {
    draw();
  } finally {
    primitives.endShape();
  }
}
