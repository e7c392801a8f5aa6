import type { PointDrawable } from "../types";
import type { RendererPrimitives } from "../rendering/RendererPrimitives";
import type { CoordinateMapper } from "../mapping/CoordinateMapper";
import type { RendererStyle } from "../settings/RendererStyle";

/**
 * Filled dot of fixed screen radius, with its label up and to the right.
 * An empty `label` hides the text; otherwise it defaults to the name.
 */
export function renderPoint(
  primitives: RendererPrimitives,
  point: PointDrawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) return;

  const center = mapper.mathToScreen(point.x, point.y);
  const radius = style.pointRadius;
  const color = point.color ?? style.pointColor;

  if (radius > 0) {
    primitives.fillCircle(center, radius, { color }, undefined, { screenSpace: true });
  }

  const label = point.label ?? point.name;
  if (label === "") return;

  const offset = Math.max(radius, 0);
  primitives.drawText(
    label,
    [center[0] + offset, center[1] - offset],
    { family: style.fontFamily, size: style.pointLabelFontSize },
    color,
    { horizontal: "left", vertical: "alphabetic" },
    {
      screenSpace: true,
      metadata: {
        kind: "anchoredText",
        anchor: { x: point.x, y: point.y },
        offsetX: offset,
        offsetY: -offset,
      },
    },
  );
}
