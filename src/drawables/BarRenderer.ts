import type { BarDrawable, FillStyle, FontStyle, MathPoint, StrokeStyle } from "../types";
import type { RendererPrimitives } from "../rendering/RendererPrimitives";
import type { CoordinateMapper } from "../mapping/CoordinateMapper";
import type { RendererStyle } from "../settings/RendererStyle";

/**
 * Filled rectangle between two x and two y values, with optional text
 * centered above and below it. The outline is only drawn when the bar has
 * a `color`.
 */
export function renderBar(
  primitives: RendererPrimitives,
  bar: BarDrawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  const { xLeft, xRight, yBottom, yTop } = bar;
  if (![xLeft, xRight, yBottom, yTop].every(Number.isFinite)) return;
  if (xLeft === xRight || yBottom === yTop) return;

  const corners = [
    mapper.mathToScreen(xLeft, yBottom),
    mapper.mathToScreen(xRight, yBottom),
    mapper.mathToScreen(xRight, yTop),
    mapper.mathToScreen(xLeft, yTop),
  ];
  const fill: FillStyle = {
    color: bar.fillColor ?? style.barFillColor,
    opacity: clampOpacity(bar.fillOpacity),
  };
  const stroke: StrokeStyle | undefined = bar.color
    ? { color: bar.color, width: style.barStrokeWidth }
    : undefined;
  primitives.fillPolygon(corners, fill, stroke);

  const font: FontStyle = { family: style.fontFamily, size: style.barLabelFontSize };
  const midX = (xLeft + xRight) / 2;
  const padding = style.barLabelPadding;

  if (bar.labelAbove) {
    drawBarLabel(primitives, bar.labelAbove, { x: midX, y: Math.max(yBottom, yTop) }, -padding, "bottom", font, mapper, style);
  }
  if (bar.labelBelow) {
    drawBarLabel(primitives, bar.labelBelow, { x: midX, y: Math.min(yBottom, yTop) }, padding, "top", font, mapper, style);
  }
}

function drawBarLabel(
  primitives: RendererPrimitives,
  text: string,
  anchor: MathPoint,
  offsetY: number,
  vertical: "top" | "bottom",
  font: FontStyle,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  const [sx, sy] = mapper.mathToScreen(anchor.x, anchor.y);
  primitives.drawText(
    text,
    [sx, sy + offsetY],
    font,
    style.barLabelColor,
    { horizontal: "center", vertical },
    { screenSpace: true, metadata: { kind: "anchoredText", anchor, offsetX: 0, offsetY } },
  );
}

function clampOpacity(opacity: number | undefined): number | undefined {
  if (opacity === undefined || !Number.isFinite(opacity)) return undefined;
  return Math.min(1, Math.max(0, opacity));
}
