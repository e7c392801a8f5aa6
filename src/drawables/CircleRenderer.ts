import type { CircleDrawable, EllipseDrawable } from "../types";
import type { RendererPrimitives } from "../rendering/RendererPrimitives";
import type { CoordinateMapper } from "../mapping/CoordinateMapper";
import type { RendererStyle } from "../settings/RendererStyle";
import { isFinitePoint } from "./DrawableGeometry";

export function renderCircle(
  primitives: RendererPrimitives,
  circle: CircleDrawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  if (!isFinitePoint(circle.center)) return;
  const radius = mapper.scaleValue(circle.radius);
  if (!Number.isFinite(radius) || !(radius > 0)) return;

  primitives.strokeCircle(
    mapper.mathToScreen(circle.center.x, circle.center.y),
    radius,
    { color: circle.color ?? style.circleColor, width: style.circleStrokeWidth },
  );
}

/**
 * Rotation is given in math degrees (counter-clockwise); the y flip makes
 * it clockwise on screen.
 */
export function renderEllipse(
  primitives: RendererPrimitives,
  ellipse: EllipseDrawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  if (!isFinitePoint(ellipse.center)) return;
  const rx = mapper.scaleValue(ellipse.radiusX);
  const ry = mapper.scaleValue(ellipse.radiusY);
  if (!Number.isFinite(rx) || !Number.isFinite(ry) || !(rx > 0) || !(ry > 0)) return;

  const degrees = Number.isFinite(ellipse.rotationDegrees) ? ellipse.rotationDegrees : 0;
  primitives.strokeEllipse(
    mapper.mathToScreen(ellipse.center.x, ellipse.center.y),
    rx,
    ry,
    (-degrees * Math.PI) / 180,
    { color: ellipse.color ?? style.ellipseColor, width: style.ellipseStrokeWidth },
  );
}
