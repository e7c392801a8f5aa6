import type { CircleArcDrawable } from "../types";
import type { RendererPrimitives } from "../rendering/RendererPrimitives";
import type { CoordinateMapper } from "../mapping/CoordinateMapper";
import type { RendererStyle } from "../settings/RendererStyle";
import { computeCircleArc } from "./DrawableGeometry";

export function renderCircleArc(
  primitives: RendererPrimitives,
  arcDrawable: CircleArcDrawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  const radiusScale = style.circleArcRadiusScale;
  const arc = computeCircleArc(
    mapper.getMapState(),
    arcDrawable.center,
    arcDrawable.radius,
    arcDrawable.point1,
    arcDrawable.point2,
    arcDrawable.useMajorArc,
    radiusScale,
  );
  if (!arc) return;

  primitives.strokeArc(
    arc.center,
    arc.radius,
    arc.startAngle,
    arc.endAngle,
    arc.sweepClockwise,
    { color: arcDrawable.color ?? style.circleArcColor, width: style.circleArcStrokeWidth },
    {
      cssClass: "circle-arc",
      screenSpace: true,
      metadata: {
        kind: "circleArc",
        center: { x: arcDrawable.center.x, y: arcDrawable.center.y },
        radius: arcDrawable.radius,
        point1: { x: arcDrawable.point1.x, y: arcDrawable.point1.y },
        point2: { x: arcDrawable.point2.x, y: arcDrawable.point2.y },
        useMajorArc: arcDrawable.useMajorArc,
        radiusScale,
      },
    },
  );
}
