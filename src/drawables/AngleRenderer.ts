import type { AngleDrawable } from "../types";
import type { RendererPrimitives } from "../rendering/RendererPrimitives";
import type { CoordinateMapper } from "../mapping/CoordinateMapper";
import type { RendererStyle } from "../settings/RendererStyle";
import { computeAngleArc, computeAngleLabel } from "./DrawableGeometry";

/**
 * Arc at the vertex from arm1 towards arm2 plus a degree label on its
 * bisector. The radius shrinks to the shorter arm, and the label font
 * shrinks with it.
 */
export function renderAngle(
  primitives: RendererPrimitives,
  angle: AngleDrawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  const arcRadius = style.angleArcRadius;
  const arc = computeAngleArc(
    mapper.getMapState(),
    angle.vertex,
    angle.arm1,
    angle.arm2,
    arcRadius,
    angle.sweepClockwise,
  );
  if (!arc) return;

  const color = angle.color ?? style.angleColor;
  const vertex = { x: angle.vertex.x, y: angle.vertex.y };
  const arm1 = { x: angle.arm1.x, y: angle.arm1.y };
  const arm2 = { x: angle.arm2.x, y: angle.arm2.y };

  primitives.strokeArc(
    arc.center,
    arc.radius,
    arc.startAngle,
    arc.endAngle,
    arc.sweepClockwise,
    { color, width: style.angleStrokeWidth },
    {
      cssClass: "angle-arc",
      screenSpace: true,
      metadata: {
        kind: "angleArc",
        vertex,
        arm1,
        arm2,
        arcRadius,
        sweepClockwise: angle.sweepClockwise,
      },
    },
  );

  const label = computeAngleLabel(arc, arcRadius, style.angleTextArcRadiusFactor, style.angleLabelFontSize);
  primitives.drawText(
    label.text,
    label.position,
    { family: style.fontFamily, size: label.fontSize },
    color,
    { horizontal: "center", vertical: "middle" },
    {
      screenSpace: true,
      metadata: {
        kind: "angleLabel",
        vertex,
        arm1,
        arm2,
        arcRadius,
        sweepClockwise: angle.sweepClockwise,
        textRadiusFactor: style.angleTextArcRadiusFactor,
        baseFontSize: style.angleLabelFontSize,
      },
    },
  );
}
