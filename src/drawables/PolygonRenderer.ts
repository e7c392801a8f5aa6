import type { PolygonDrawable } from "../types";
import type { RendererPrimitives } from "../rendering/RendererPrimitives";
import type { CoordinateMapper } from "../mapping/CoordinateMapper";
import type { RendererStyle } from "../settings/RendererStyle";
import { isFinitePoint } from "./DrawableGeometry";

/**
 * Closed outline through the vertices. Any non-finite vertex hides the
 * whole polygon rather than drawing a misleading shape.
 */
export function renderPolygon(
  primitives: RendererPrimitives,
  polygon: PolygonDrawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  const { vertices } = polygon;
  if (vertices.length < 2 || !vertices.every(isFinitePoint)) return;

  const points = vertices.map((v) => mapper.mathToScreen(v.x, v.y));
  points.push(points[0]);
  primitives.strokePolyline(points, {
    color: polygon.color ?? style.polygonColor,
    width: style.polygonStrokeWidth,
    lineJoin: "round",
  });
}
