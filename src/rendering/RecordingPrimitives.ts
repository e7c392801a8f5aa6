import type {
  Point2D,
  ScreenBounds,
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
} from "./RendererPrimitives";
import { BoundsAccumulator } from "../plan/PlanCommand";
import type { PlanCommand, PlanOp, UsageCounts } from "../plan/PlanCommand";

/**
 * RendererPrimitives implementation that draws nothing. Every call is
 * captured as a PlanCommand so the plan can be replayed later against a
 * real backend.
 *
 * Point arrays are copied on record; callers may reuse their buffers.
 */
export class RecordingPrimitives implements RendererPrimitives {
  readonly commands: PlanCommand[] = [];
  readonly usageCounts: UsageCounts = {};
  private screenSpaceUsed = false;
  private bounds = new BoundsAccumulator();

  /** True once any command was recorded with fixed screen-pixel geometry. */
  get usesScreenSpace(): boolean {
    return this.screenSpaceUsed;
  }

  getBounds(): ScreenBounds | null {
    return this.bounds.result();
  }

  // --- Strokes ---

  strokeLine(start: Point2D, end: Point2D, stroke: StrokeStyle, options?: LineOptions): void {
    this.record({
      op: "strokeLine",
      start: copyPoint(start),
      end: copyPoint(end),
      stroke,
      includeWidth: options?.includeWidth ?? true,
    });
  }

  strokePolyline(points: readonly Point2D[], stroke: StrokeStyle): void {
    this.record({ op: "strokePolyline", points: copyPoints(points), stroke });
  }

  strokeCircle(center: Point2D, radius: number, stroke: StrokeStyle): void {
    this.record({ op: "strokeCircle", center: copyPoint(center), radius, stroke });
  }

  strokeEllipse(
    center: Point2D,
    radiusX: number,
    radiusY: number,
    rotationRad: number,
    stroke: StrokeStyle,
  ): void {
    this.record({
      op: "strokeEllipse",
      center: copyPoint(center),
      radiusX,
      radiusY,
      rotationRad,
      stroke,
    });
  }

  strokeArc(
    center: Point2D,
    radius: number,
    startAngleRad: number,
    endAngleRad: number,
    sweepClockwise: boolean,
    stroke: StrokeStyle,
    options?: ArcOptions,
  ): void {
    this.record({
      op: "strokeArc",
      center: copyPoint(center),
      radius,
      startAngle: startAngleRad,
      endAngle: endAngleRad,
      sweepClockwise,
      stroke,
      cssClass: options?.cssClass,
      screenSpace: options?.screenSpace ?? false,
      metadata: options?.metadata,
    });
  }

  // --- Fills ---

  fillCircle(
    center: Point2D,
    radius: number,
    fill: FillStyle,
    stroke?: StrokeStyle,
    options?: PrimitiveOptions,
  ): void {
    this.record({
      op: "fillCircle",
      center: copyPoint(center),
      radius,
      fill,
      stroke,
      screenSpace: options?.screenSpace ?? false,
      metadata: options?.metadata,
    });
  }

  fillPolygon(
    points: readonly Point2D[],
    fill: FillStyle,
    stroke?: StrokeStyle,
    options?: PrimitiveOptions,
  ): void {
    this.record({
      op: "fillPolygon",
      points: copyPoints(points),
      fill,
      stroke,
      screenSpace: options?.screenSpace ?? false,
      metadata: options?.metadata,
    });
  }

  fillJoinedArea(forward: readonly Point2D[], reverse: readonly Point2D[], fill: FillStyle): void {
    this.record({
      op: "fillJoinedArea",
      forward: copyPoints(forward),
      reverse: copyPoints(reverse),
      fill,
    });
  }

  // --- Text ---

  drawText(
    text: string,
    position: Point2D,
    font: FontStyle,
    color: string,
    alignment: TextAlignment,
    options?: TextOptions,
  ): void {
    this.record({
      op: "drawText",
      text,
      position: copyPoint(position),
      font,
      color,
      alignment,
      styleOverrides: options?.styleOverrides,
      screenSpace: options?.screenSpace ?? false,
      metadata: options?.metadata,
    });
  }

  // --- Surface / grouping (no-ops while recording) ---

  clearSurface(): void {}
  resizeSurface(_width: number, _height: number): void {}
  beginShape(): void {}
  endShape(): void {}
  beginFrame(): void {}
  endFrame(): void {}
  beginBatch(_target: BatchTarget): void {}
  endBatch(_target: BatchTarget): void {}

  // --- Internal ---

  private record(command: PlanCommand): void {
    this.commands.push(command);
    this.countOp(command.op);
    this.bounds.addCommand(command);
    if ("screenSpace" in command && command.screenSpace) {
      this.screenSpaceUsed = true;
    }
  }

  private countOp(op: PlanOp): void {
    this.usageCounts[op] = (this.usageCounts[op] ?? 0) + 1;
  }
}

function copyPoint(p: Point2D): Point2D {
  return [p[0], p[1]];
}

function copyPoints(points: readonly Point2D[]): Point2D[] {
  return points.map(copyPoint);
}
