/**
 * Recorded primitive calls. A plan is an ordered list of these, replayed
 * against any RendererPrimitives implementation.
 */

import type {
  Point2D,
  ScreenBounds,
  StrokeStyle,
  FillStyle,
  FontStyle,
  TextAlignment,
} from "../types";
import type { CommandMetadata, RendererPrimitives } from "../rendering/RendererPrimitives";

export interface StrokeLineCommand {
  op: "strokeLine";
  start: Point2D;
  end: Point2D;
  stroke: StrokeStyle;
  includeWidth: boolean;
}

export interface StrokePolylineCommand {
  op: "strokePolyline";
  points: Point2D[];
  stroke: StrokeStyle;
}

export interface StrokeCircleCommand {
  op: "strokeCircle";
  center: Point2D;
  radius: number;
  stroke: StrokeStyle;
}

export interface StrokeEllipseCommand {
  op: "strokeEllipse";
  center: Point2D;
  radiusX: number;
  radiusY: number;
  rotationRad: number;
  stroke: StrokeStyle;
}

export interface StrokeArcCommand {
  op: "strokeArc";
  center: Point2D;
  radius: number;
  startAngle: number;
  endAngle: number;
  sweepClockwise: boolean;
  stroke: StrokeStyle;
  cssClass?: string;
  screenSpace: boolean;
  metadata?: CommandMetadata;
}

export interface FillCircleCommand {
  op: "fillCircle";
  center: Point2D;
  radius: number;
  fill: FillStyle;
  stroke?: StrokeStyle;
  screenSpace: boolean;
  metadata?: CommandMetadata;
}

export interface FillPolygonCommand {
  op: "fillPolygon";
  points: Point2D[];
  fill: FillStyle;
  stroke?: StrokeStyle;
  screenSpace: boolean;
  metadata?: CommandMetadata;
}

export interface FillJoinedAreaCommand {
  op: "fillJoinedArea";
  forward: Point2D[];
  reverse: Point2D[];
  fill: FillStyle;
}

export interface DrawTextCommand {
  op: "drawText";
  text: string;
  position: Point2D;
  font: FontStyle;
  color: string;
  alignment: TextAlignment;
  styleOverrides?: Readonly<Record<string, string>>;
  screenSpace: boolean;
  metadata?: CommandMetadata;
}

export type PlanCommand =
  | StrokeLineCommand
  | StrokePolylineCommand
  | StrokeCircleCommand
  | StrokeEllipseCommand
  | StrokeArcCommand
  | FillCircleCommand
  | FillPolygonCommand
  | FillJoinedAreaCommand
  | DrawTextCommand;

export type PlanOp = PlanCommand["op"];

export type UsageCounts = Partial<Record<PlanOp, number>>;

/**
 * Issue one recorded command against a primitives implementation.
 */
export function replayCommand(primitives: RendererPrimitives, command: PlanCommand): void {
  switch (command.op) {
    case "strokeLine":
      primitives.strokeLine(command.start, command.end, command.stroke, {
        includeWidth: command.includeWidth,
      });
      break;
    case "strokePolyline":
      primitives.strokePolyline(command.points, command.stroke);
      break;
    case "strokeCircle":
      primitives.strokeCircle(command.center, command.radius, command.stroke);
      break;
    case "strokeEllipse":
      primitives.strokeEllipse(
        command.center, command.radiusX, command.radiusY, command.rotationRad, command.stroke,
      );
      break;
    case "strokeArc":
      primitives.strokeArc(
        command.center,
        command.radius,
        command.startAngle,
        command.endAngle,
        command.sweepClockwise,
        command.stroke,
        { cssClass: command.cssClass, screenSpace: command.screenSpace, metadata: command.metadata },
      );
      break;
    case "fillCircle":
      primitives.fillCircle(command.center, command.radius, command.fill, command.stroke, {
        screenSpace: command.screenSpace,
        metadata: command.metadata,
      });
      break;
    case "fillPolygon":
      primitives.fillPolygon(command.points, command.fill, command.stroke, {
        screenSpace: command.screenSpace,
        metadata: command.metadata,
      });
      break;
    case "fillJoinedArea":
      primitives.fillJoinedArea(command.forward, command.reverse, command.fill);
      break;
    case "drawText":
      primitives.drawText(
        command.text, command.position, command.font, command.color, command.alignment,
        {
          styleOverrides: command.styleOverrides,
          screenSpace: command.screenSpace,
          metadata: command.metadata,
        },
      );
      break;
  }
}

// ─── Bounds ─────────────────────────────────────────────────

const AVERAGE_GLYPH_WIDTH = 0.6; // em

export class BoundsAccumulator {
  private minX = Infinity;
  private maxX = -Infinity;
  private minY = Infinity;
  private maxY = -Infinity;

  addPoint(x: number, y: number): void {
    if (!Number.isFinite(x) || !Number.isFinite(y)) return;
    if (x < this.minX) this.minX = x;
    if (x > this.maxX) this.maxX = x;
    if (y < this.minY) this.minY = y;
    if (y > this.maxY) this.maxY = y;
  }

  addBox(cx: number, cy: number, halfWidth: number, halfHeight: number): void {
    if (!Number.isFinite(halfWidth) || !Number.isFinite(halfHeight)) return;
    this.addPoint(cx - halfWidth, cy - halfHeight);
    this.addPoint(cx + halfWidth, cy + halfHeight);
  }

  addPoints(points: readonly Point2D[]): void {
    for (const [x, y] of points) this.addPoint(x, y);
  }

  addCommand(command: PlanCommand): void {
    switch (command.op) {
      case "strokeLine":
        this.addPoint(command.start[0], command.start[1]);
        this.addPoint(command.end[0], command.end[1]);
        break;
      case "strokePolyline":
      case "fillPolygon":
        this.addPoints(command.points);
        break;
      case "fillJoinedArea":
        this.addPoints(command.forward);
        this.addPoints(command.reverse);
        break;
      case "strokeCircle":
      case "fillCircle":
      case "strokeArc":
        this.addBox(command.center[0], command.center[1], command.radius, command.radius);
        break;
      case "strokeEllipse": {
        const cos = Math.cos(command.rotationRad);
        const sin = Math.sin(command.rotationRad);
        const rx = command.radiusX;
        const ry = command.radiusY;
        this.addBox(
          command.center[0],
          command.center[1],
          Math.hypot(rx * cos, ry * sin),
          Math.hypot(rx * sin, ry * cos),
        );
        break;
      }
      case "drawText": {
        const size = command.font.size;
        const width = command.text.length * size * AVERAGE_GLYPH_WIDTH;
        this.addBox(command.position[0], command.position[1], width, size);
        break;
      }
    }
  }

  result(): ScreenBounds | null {
    if (this.minX > this.maxX || this.minY > this.maxY) return null;
    return { minX: this.minX, maxX: this.maxX, minY: this.minY, maxY: this.maxY };
  }
}

export function computeCommandBounds(commands: readonly PlanCommand[]): ScreenBounds | null {
  const acc = new BoundsAccumulator();
  for (const command of commands) acc.addCommand(command);
  return acc.result();
}
