/**
 * RendererPrimitives over a CanvasRenderingContext2D.
 *
 * Draws immediately. With a compositing layer active, drawing goes to an
 * offscreen canvas that is flushed onto the main canvas with drawImage.
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
  BatchTarget,
} from "../rendering/RendererPrimitives";
import type { RenderTelemetry } from "../plan/RenderTelemetry";

// ─── Internal Types ─────────────────────────────────────────

type Ctx2D = CanvasRenderingContext2D | OffscreenCanvasRenderingContext2D;

interface Canvas2DLayer {
  readonly canvas: HTMLCanvasElement | OffscreenCanvas;
  readonly ctx: Ctx2D;
}

const TWO_PI = Math.PI * 2;

function createLayer(width: number, height: number): Canvas2DLayer {
  if (typeof OffscreenCanvas !== "undefined") {
    const canvas = new OffscreenCanvas(width, height);
    const ctx = canvas.getContext("2d");
    if (!ctx) throw new Error("Failed to create offscreen 2D context");
    return { canvas, ctx };
  }
  const canvas = document.createElement("canvas");
  canvas.width = width;
  canvas.height = height;
  const ctx = canvas.getContext("2d");
  if (!ctx) throw new Error("Failed to create offscreen 2D context");
  return { canvas, ctx };
}

export function cssFont(font: FontStyle): string {
  return `${font.weight ? `${font.weight} ` : ""}${font.size}px ${font.family}`;
}

// ─── Canvas2DPrimitives ─────────────────────────────────────

export class Canvas2DPrimitives implements RendererPrimitives {
  private ctx: Ctx2D;
  private contextStack: Ctx2D[] = [];
  private layer: Canvas2DLayer | null = null;
  private telemetry: RenderTelemetry | null;
  private batchDepth = 0;

  constructor(ctx: Ctx2D, telemetry: RenderTelemetry | null = null) {
    this.ctx = ctx;
    this.telemetry = telemetry;
  }

  /** The context currently drawn into (main or layer). */
  private get activeCtx(): Ctx2D {
    const top = this.contextStack[this.contextStack.length - 1];
    return top ?? this.ctx;
  }

  get width(): number {
    return this.ctx.canvas.width;
  }

  get height(): number {
    return this.ctx.canvas.height;
  }

  get layerActive(): boolean {
    return this.contextStack.length > 0;
  }

  // ── Compositing layer ────────────────────────────────────

  /** Redirect drawing to a cleared offscreen layer the size of the main canvas. */
  beginLayer(): void {
    const { width, height } = this;
    if (!this.layer || this.layer.canvas.width !== width || this.layer.canvas.height !== height) {
      this.layer = createLayer(width, height);
      this.telemetry?.recordAdapterEvent("layer_created");
    } else {
      this.layer.ctx.clearRect(0, 0, width, height);
    }
    this.contextStack.push(this.layer.ctx);
  }

  /** Composite the layer onto the main canvas and clear it. */
  flushLayer(): void {
    if (!this.layer || !this.layerActive) return;
    this.ctx.drawImage(this.layer.canvas, 0, 0);
    this.layer.ctx.clearRect(0, 0, this.layer.canvas.width, this.layer.canvas.height);
    this.telemetry?.recordAdapterEvent("layer_flush");
  }

  endLayer(): void {
    if (!this.layerActive) return;
    this.flushLayer();
    this.contextStack.pop();
  }

  // ── Strokes ──────────────────────────────────────────────

  strokeLine(start: Point2D, end: Point2D, stroke: StrokeStyle, options?: LineOptions): void {
    const ctx = this.activeCtx;
    this.applyStroke(ctx, stroke);
    if (options?.includeWidth === false) ctx.lineWidth = 1;
    ctx.beginPath();
    ctx.moveTo(start[0], start[1]);
    ctx.lineTo(end[0], end[1]);
    ctx.stroke();
  }

  strokePolyline(points: readonly Point2D[], stroke: StrokeStyle): void {
    if (points.length < 2) return;
    const ctx = this.activeCtx;
    this.applyStroke(ctx, stroke);
    ctx.beginPath();
    tracePath(ctx, points);
    ctx.stroke();
  }

  strokeCircle(center: Point2D, radius: number, stroke: StrokeStyle): void {
    if (!(radius > 0)) return;
    const ctx = this.activeCtx;
    this.applyStroke(ctx, stroke);
    ctx.beginPath();
    ctx.arc(center[0], center[1], radius, 0, TWO_PI);
    ctx.stroke();
  }

  strokeEllipse(
    center: Point2D,
    radiusX: number,
    radiusY: number,
    rotationRad: number,
    stroke: StrokeStyle,
  ): void {
    if (!(radiusX > 0) || !(radiusY > 0)) return;
    const ctx = this.activeCtx;
    this.applyStroke(ctx, stroke);
    ctx.beginPath();
    ctx.ellipse(center[0], center[1], radiusX, radiusY, rotationRad, 0, TWO_PI);
    ctx.stroke();
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
    const ctx = this.activeCtx;
    this.applyStroke(ctx, stroke);
    ctx.beginPath();
    ctx.arc(center[0], center[1], radius, startAngleRad, endAngleRad, !sweepClockwise);
    ctx.stroke();
  }

  // ── Fills ────────────────────────────────────────────────

  fillCircle(
    center: Point2D,
    radius: number,
    fill: FillStyle,
    stroke?: StrokeStyle,
    _options?: PrimitiveOptions,
  ): void {
    if (!(radius > 0)) return;
    const ctx = this.activeCtx;
    ctx.beginPath();
    ctx.arc(center[0], center[1], radius, 0, TWO_PI);
    this.fillAndStroke(ctx, fill, stroke);
  }

  fillPolygon(
    points: readonly Point2D[],
    fill: FillStyle,
    stroke?: StrokeStyle,
    _options?: PrimitiveOptions,
  ): void {
    if (points.length < 3) return;
    const ctx = this.activeCtx;
    ctx.beginPath();
    tracePath(ctx, points);
    ctx.closePath();
    this.fillAndStroke(ctx, fill, stroke);
  }

  fillJoinedArea(forward: readonly Point2D[], reverse: readonly Point2D[], fill: FillStyle): void {
    if (forward.length + reverse.length < 3) return;
    const ctx = this.activeCtx;
    ctx.beginPath();
    tracePath(ctx, [...forward, ...reverse]);
    ctx.closePath();
    this.fillAndStroke(ctx, fill, undefined);
  }

  // ── Text ─────────────────────────────────────────────────

  drawText(
    text: string,
    position: Point2D,
    font: FontStyle,
    color: string,
    alignment: TextAlignment,
    options?: TextOptions,
  ): void {
    if (text === "" || !(font.size > 0)) return;
    const ctx = this.activeCtx;
    ctx.font = cssFont(font);
    ctx.fillStyle = color;
    ctx.textAlign = alignment.horizontal;
    ctx.textBaseline = alignment.vertical;

    const meta = options?.metadata;
    const rotation = meta?.kind === "label" ? meta.rotationDegrees : 0;
    if (rotation === 0) {
      ctx.fillText(text, position[0], position[1]);
      return;
    }
    ctx.save();
    ctx.translate(position[0], position[1]);
    ctx.rotate((-rotation * Math.PI) / 180);
    ctx.fillText(text, 0, 0);
    ctx.restore();
  }

  // ── Surface ──────────────────────────────────────────────

  clearSurface(): void {
    this.ctx.clearRect(0, 0, this.width, this.height);
  }

  resizeSurface(width: number, height: number): void {
    this.ctx.canvas.width = width;
    this.ctx.canvas.height = height;
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

  beginBatch(_target: BatchTarget): void {
    this.activeCtx.save();
    this.batchDepth++;
    this.telemetry?.trackBatchDepth(this.batchDepth);
  }

  endBatch(_target: BatchTarget): void {
    this.activeCtx.restore();
    this.batchDepth = Math.max(0, this.batchDepth - 1);
  }

  /** Drop the compositing layer (teardown). */
  dispose(): void {
    this.contextStack = [];
    this.layer = null;
  }

  // ── Internal ─────────────────────────────────────────────

  private applyStroke(ctx: Ctx2D, stroke: StrokeStyle): void {
    ctx.strokeStyle = stroke.color;
    ctx.lineWidth = stroke.width;
    ctx.lineJoin = stroke.lineJoin ?? "miter";
    ctx.lineCap = stroke.lineCap ?? "butt";
  }

  private fillAndStroke(ctx: Ctx2D, fill: FillStyle, stroke: StrokeStyle | undefined): void {
    ctx.fillStyle = fill.color;
    const opacity = fill.opacity ?? 1;
    if (opacity !== 1) ctx.globalAlpha = opacity;
    ctx.fill();
    if (opacity !== 1) ctx.globalAlpha = 1;
    if (stroke) {
      this.applyStroke(ctx, stroke);
      ctx.stroke();
    }
  }
}

function tracePath(ctx: Ctx2D, points: readonly Point2D[]): void {
  ctx.moveTo(points[0][0], points[0][1]);
  for (let i = 1; i < points.length; i++) {
    ctx.lineTo(points[i][0], points[i][1]);
  }
}
