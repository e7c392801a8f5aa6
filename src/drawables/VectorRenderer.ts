import type { VectorDrawable } from "../types";
import type { RendererPrimitives } from "../rendering/RendererPrimitives";
import type { CoordinateMapper } from "../mapping/CoordinateMapper";
import type { RendererStyle } from "../settings/RendererStyle";
import { computeArrowhead, isFinitePoint } from "./DrawableGeometry";

/**
 * Shaft from origin to tip plus a filled arrowhead. The head keeps its
 * screen size at every zoom level.
 */
export function renderVector(
  primitives: RendererPrimitives,
  vector: VectorDrawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  if (!isFinitePoint(vector.origin) || !isFinitePoint(vector.tip)) return;

  const color = vector.color ?? style.vectorColor;
  primitives.strokeLine(
    mapper.mathToScreen(vector.origin.x, vector.origin.y),
    mapper.mathToScreen(vector.tip.x, vector.tip.y),
    { color, width: style.vectorStrokeWidth },
  );

  const head = computeArrowhead(mapper.getMapState(), vector.origin, vector.tip, style.vectorTipSize);
  if (!head) return;

  primitives.fillPolygon(head, { color }, undefined, {
    screenSpace: true,
    metadata: {
      kind: "vectorArrow",
      origin: { x: vector.origin.x, y: vector.origin.y },
      tip: { x: vector.tip.x, y: vector.tip.y },
      tipSize: style.vectorTipSize,
    },
  });
}
