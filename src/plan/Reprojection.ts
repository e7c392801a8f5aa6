/**
 * Moves recorded plan commands from one view to another without running
 * the drawable renderer again.
 *
 * Plain geometry is carried through screen → math (old view) → screen
 * (new view), which for this projection is a uniform scale plus a
 * translation. Commands carrying metadata are re-derived from their
 * math-space anchors so screen-sized parts (arrowheads, angle arcs,
 * labels) keep their pixel size.
 */

import type { MapState, Point2D } from "../types";
import type { PlanCommand, DrawTextCommand, StrokeArcCommand, FillPolygonCommand } from "./PlanCommand";
import { computeUniformTransform } from "./MapState";
import type { UniformTransform } from "./MapState";
import {
  computeAngleArc,
  computeAngleLabel,
  computeAnchoredTextPosition,
  computeArrowhead,
  computeCircleArc,
  computeLabelFontSize,
  computeLabelLinePosition,
} from "../drawables/DrawableGeometry";

export function reprojectCommands(
  commands: PlanCommand[],
  from: MapState,
  to: MapState,
): void {
  const t = computeUniformTransform(from, to);
  for (const command of commands) {
    reprojectCommand(command, t, to);
  }
}

function movePoint(p: Point2D, t: UniformTransform): Point2D {
  return [p[0] * t.ratio + t.translateX, p[1] * t.ratio + t.translateY];
}

function movePoints(points: readonly Point2D[], t: UniformTransform): Point2D[] {
  return points.map((p) => movePoint(p, t));
}

function reprojectCommand(command: PlanCommand, t: UniformTransform, to: MapState): void {
  switch (command.op) {
    case "strokeLine":
      command.start = movePoint(command.start, t);
      command.end = movePoint(command.end, t);
      break;
    case "strokePolyline":
      command.points = movePoints(command.points, t);
      break;
    case "strokeCircle":
      command.center = movePoint(command.center, t);
      command.radius *= t.ratio;
      break;
    case "strokeEllipse":
      command.center = movePoint(command.center, t);
      command.radiusX *= t.ratio;
      command.radiusY *= t.ratio;
      break;
    case "fillCircle":
      command.center = movePoint(command.center, t);
      if (!command.screenSpace) command.radius *= t.ratio;
      break;
    case "fillJoinedArea":
      command.forward = movePoints(command.forward, t);
      command.reverse = movePoints(command.reverse, t);
      break;
    case "fillPolygon":
      reprojectPolygon(command, t, to);
      break;
    case "strokeArc":
      reprojectArc(command, t, to);
      break;
    case "drawText":
      reprojectText(command, t, to);
      break;
  }
}

function reprojectPolygon(command: FillPolygonCommand, t: UniformTransform, to: MapState): void {
  const meta = command.metadata;
  if (meta?.kind === "vectorArrow") {
    command.points = computeArrowhead(to, meta.origin, meta.tip, meta.tipSize) ?? [];
    return;
  }
  command.points = movePoints(command.points, t);
}

function reprojectArc(command: StrokeArcCommand, t: UniformTransform, to: MapState): void {
  const meta = command.metadata;
  if (meta?.kind === "angleArc") {
    const arc = computeAngleArc(to, meta.vertex, meta.arm1, meta.arm2, meta.arcRadius, meta.sweepClockwise);
    if (arc) {
      command.center = arc.center;
      command.radius = arc.radius;
      command.startAngle = arc.startAngle;
      command.endAngle = arc.endAngle;
    } else {
      command.radius = 0;
    }
    return;
  }
  if (meta?.kind === "circleArc") {
    const arc = computeCircleArc(
      to, meta.center, meta.radius, meta.point1, meta.point2, meta.useMajorArc, meta.radiusScale,
    );
    if (arc) {
      command.center = arc.center;
      command.radius = arc.radius;
      command.startAngle = arc.startAngle;
      command.endAngle = arc.endAngle;
      command.sweepClockwise = arc.sweepClockwise;
    } else {
      command.radius = 0;
    }
    return;
  }
  command.center = movePoint(command.center, t);
  if (!command.screenSpace) command.radius *= t.ratio;
}

function reprojectText(command: DrawTextCommand, t: UniformTransform, to: MapState): void {
  const meta = command.metadata;
  if (meta?.kind === "angleLabel") {
    const arc = computeAngleArc(to, meta.vertex, meta.arm1, meta.arm2, meta.arcRadius, meta.sweepClockwise);
    if (!arc) {
      command.font = { ...command.font, size: 0 };
      return;
    }
    const label = computeAngleLabel(arc, meta.arcRadius, meta.textRadiusFactor, meta.baseFontSize);
    command.text = label.text;
    command.position = label.position;
    command.font = { ...command.font, size: label.fontSize };
  } else if (meta?.kind === "anchoredText") {
    command.position = computeAnchoredTextPosition(to, meta.anchor, meta.offsetX, meta.offsetY, meta.minY);
  } else if (meta?.kind === "label") {
    const size = computeLabelFontSize(meta.baseFontSize, to.scale, meta.referenceScale, meta.vanishSize);
    command.font = { ...command.font, size };
    command.position = computeLabelLinePosition(
      to, meta.anchor, meta.lineIndex, size, meta.lineHeightFactor, meta.rotationDegrees,
    );
  } else {
    command.position = movePoint(command.position, t);
  }
}
