/**
 * RendererPrimitives over a GLLineEngine.
 *
 * Only lines, line strips and points reach the GPU. Curves are sampled
 * into closed strips, fills become outlines, and text is dropped.
 */

import type {
  Point2D,
  StrokeStyle,
  FillStyle,
  FontStyle,
  TextAlignment,
} from "../types";
import type {
  RendererPrimitives,
  LineOptions,
  ArcOptions,
  PrimitiveOptions,
  TextOptions,
} from "../rendering/RendererPrimitives";
import type { RenderTelemetry } from "../plan/RenderTelemetry";
import type { GLLineEngine, GLDrawMode } from "./webgl/GLLineEngine";
import { parseCssColor } from "./webgl/GLColor";
import { packVertices } from "./webgl/GLBuffers";

export const CIRCLE_SEGMENTS = 64;
export const ARC_SEGMENTS = 32;
export const MIN_CURVE_SEGMENTS = 16;

const TWO_PI = Math.PI * 2;

// ─── Sampling ───────────────────────────────────────────────

/** Closed strip around a (rotated) ellipse; the first point is repeated at the end. */
export function sampleEllipse(
  center: Point2D,
  radiusX: number,
  radiusY: number,
  rotationRad: number,
  segments: number,
): Point2D[] {
  const cos = Math.cos(rotationRad);
  const sin = Math.sin(rotationRad);
  const points: Point2D[] = [];
  for (let i = 0; i < segments; i++) {
    const theta = (TWO_PI * i) / segments;
    const x = radiusX * Math.cos(theta);
    const y = radiusY * Math.sin(theta);
    points.push([center[0] + x * cos - y * sin, center[1] + x * sin + y * cos]);
  }
  points.push(points[0]);
  return points;
}

/**
 * Open strip along an arc in screen angles. A clockwise sweep runs toward
 * increasing angle; the sweep is wrapped to the requested direction.
 */
export function sampleArc(
  center: Point2D,
  radius: number,
  startAngle: number,
  endAngle: number,
  sweepClockwise: boolean,
  segments: number,
): Point2D[] {
  let total = endAngle - startAngle;
  if (sweepClockwise && total < 0) total += TWO_PI;
  else if (!sweepClockwise && total > 0) total -= TWO_PI;
  const step = total / segments;
  const points: Point2D[] = [];
  for (let i = 0; i <= segments; i++) {
    const theta = startAngle + step * i;
    points.push([center[0] + radius * Math.cos(theta), center[1] + radius * Math.sin(theta)]);
  }
  return points;
}

function closeOutline(points: readonly Point2D[]): Point2D[] {
  const outline = [...points];
  const first = outline[0];
  const last = outline[outline.length - 1];
  if (first[0] !== last[0] || first[1] !== last[1]) outline.push(first);
  return outline;
}

// ─── WebGLPrimitives ────────────────────────────────────────

export class WebGLPrimitives implements RendererPrimitives {
  private engine: GLLineEngine;
  private telemetry: RenderTelemetry | null;
  private minSegments: number;
  private batchDepth = 0;

  constructor(engine: GLLineEngine, minCurveSegments = MIN_CURVE_SEGMENTS, telemetry: RenderTelemetry | null = null) {
    this.engine = engine;
    this.minSegments = Math.max(MIN_CURVE_SEGMENTS, Math.floor(minCurveSegments));
    this.telemetry = telemetry;
  }

  setMinCurveSegments(segments: number): void {
    this.minSegments = Math.max(MIN_CURVE_SEGMENTS, Math.floor(segments));
  }

  private segments(base: number): number {
    return Math.max(base, this.minSegments);
  }

  // ── Strokes ──────────────────────────────────────────────

  strokeLine(start: Point2D, end: Point2D, stroke: StrokeStyle, _options?: LineOptions): void {
    this.draw("lines", [start, end], stroke.color, 1);
  }

  strokePolyline(points: readonly Point2D[], stroke: StrokeStyle): void {
    if (points.length < 2) return;
    this.draw("lineStrip", points, stroke.color, 1);
  }

  strokeCircle(center: Point2D, radius: number, stroke: StrokeStyle): void {
    if (!(radius > 0)) return;
    this.draw("lineStrip", sampleEllipse(center, radius, radius, 0, this.segments(CIRCLE_SEGMENTS)), stroke.color, 1);
  }

  strokeEllipse(
    center: Point2D,
    radiusX: number,
    radiusY: number,
    rotationRad: number,
    stroke: StrokeStyle,
  ): void {
    if (!(radiusX > 0) || !(radiusY > 0)) return;
    const samples = sampleEllipse(center, radiusX, radiusY, rotationRad, this.segments(CIRCLE_SEGMENTS));
    this.draw("lineStrip", samples, stroke.color, 1);
  }

  strokeArc(
    center: Point2D,
    radius: number,
    startAngleRad: number,
    endAngleRad: number,
    sweepClockwise: boolean,
    stroke: StrokeStyle,
    _options?: ArcOptions,
  ): void {
    if (!(radius > 0)) return;
    const samples = sampleArc(center, radius, startAngleRad, endAngleRad, sweepClockwise, this.segments(ARC_SEGMENTS));
    this.draw("lineStrip", samples, stroke.color, 1);
  }

  // ── Fills ────────────────────────────────────────────────

  /** Drawn as a single point sized to the diameter. */
  fillCircle(
    center: Point2D,
    radius: number,
    fill: FillStyle,
    stroke?: StrokeStyle,
    _options?: PrimitiveOptions,
  ): void {
    if (!(radius > 0)) return;
    this.draw("points", [center], fill.color, radius * 2);
    if (stroke) this.strokeCircle(center, radius, stroke);
  }

  fillPolygon(
    points: readonly Point2D[],
    fill: FillStyle,
    stroke?: StrokeStyle,
    _options?: PrimitiveOptions,
  ): void {
    if (points.length < 2) return;
    this.draw("lineStrip", closeOutline(points), stroke ? stroke.color : fill.color, 1);
  }

  fillJoinedArea(forward: readonly Point2D[], reverse: readonly Point2D[], fill: FillStyle): void {
    if (forward.length < 2 || reverse.length === 0) return;
    this.draw("lineStrip", closeOutline([...forward, ...reverse]), fill.color, 1);
  }

  // ── Text ─────────────────────────────────────────────────

  drawText(
    _text: string,
    _position: Point2D,
    _font: FontStyle,
    _color: string,
    _alignment: TextAlignment,
    _options?: TextOptions,
  ): void {
    this.telemetry?.recordAdapterEvent("webgl_text_skipped");
  }

  // ── Surface ──────────────────────────────────────────────

  clearSurface(): void {
    this.engine.clear();
  }

  resizeSurface(width: number, height: number): void {
    this.engine.resize(width, height);
  }

  // ── Grouping ─────────────────────────────────────────────

  beginShape(): void {}
  endShape(): void {}

  beginFrame(): void {
    this.telemetry?.recordAdapterEvent("frame_begin");
  }

  endFrame(): void {
    this.telemetry?.recordAdapterEvent("frame_end");
  }

  beginBatch(): void {
    this.batchDepth++;
    this.telemetry?.trackBatchDepth(this.batchDepth);
  }

  endBatch(): void {
    this.batchDepth = Math.max(0, this.batchDepth - 1);
  }

  // ── Internal ─────────────────────────────────────────────

  private draw(mode: GLDrawMode, points: readonly Point2D[], color: string, pointSize: number): void {
    this.engine.draw(mode, packVertices(points), parseCssColor(color), pointSize);
    this.telemetry?.recordAdapterEvent("webgl_draw_calls");
  }
}
