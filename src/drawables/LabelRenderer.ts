import type { LabelDrawable } from "../types";
import type { RendererPrimitives } from "../rendering/RendererPrimitives";
import type { CoordinateMapper } from "../mapping/CoordinateMapper";
import type { RendererStyle } from "../settings/RendererStyle";
import {
  computeLabelFontSize,
  computeLabelLinePosition,
  isFinitePoint,
} from "./DrawableGeometry";

/**
 * Free-standing multi-line text anchored at a math point.
 *
 * The font follows the zoom level below `referenceScale` and vanishes when
 * it gets too small to read. Vanished lines are still recorded (size 0) so
 * a cached plan can bring them back on zoom-in; backends skip them.
 */
export function renderLabel(
  primitives: RendererPrimitives,
  label: LabelDrawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  if (!isFinitePoint(label.position) || label.text === "") return;

  const baseFontSize = label.fontSize ?? style.labelFontSize;
  const referenceScale = label.referenceScale ?? 1;
  const rotation = label.rotationDegrees ?? 0;
  const rotationDegrees = Number.isFinite(rotation) ? rotation : 0;
  const fontSize = computeLabelFontSize(
    baseFontSize,
    mapper.scale,
    referenceScale,
    style.labelVanishFontSize,
  );
  const state = mapper.getMapState();
  const anchor = { x: label.position.x, y: label.position.y };
  const color = label.color ?? style.labelTextColor;

  label.text.split("\n").forEach((line, lineIndex) => {
    primitives.drawText(
      line,
      computeLabelLinePosition(
        state, anchor, lineIndex, fontSize, style.labelLineHeightFactor, rotationDegrees,
      ),
      { family: style.fontFamily, size: fontSize },
      color,
      { horizontal: "left", vertical: "alphabetic" },
      {
        screenSpace: true,
        metadata: {
          kind: "label",
          anchor,
          lineIndex,
          baseFontSize,
          referenceScale,
          rotationDegrees,
          vanishSize: style.labelVanishFontSize,
          lineHeightFactor: style.labelLineHeightFactor,
        },
      },
    );
  });
}
