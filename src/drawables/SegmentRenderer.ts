import type { SegmentDrawable } from "../types";
import type { RendererPrimitives } from "../rendering/RendererPrimitives";
import type { CoordinateMapper } from "../mapping/CoordinateMapper";
import type { RendererStyle } from "../settings/RendererStyle";
import { isFinitePoint } from "./DrawableGeometry";

export function renderSegment(
  primitives: RendererPrimitives,
  segment: SegmentDrawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  if (!isFinitePoint(segment.p1) || !isFinitePoint(segment.p2)) return;
  primitives.strokeLine(
    mapper.mathToScreen(segment.p1.x, segment.p1.y),
    mapper.mathToScreen(segment.p2.x, segment.p2.y),
    { color: segment.color ?? style.segmentColor, width: style.segmentStrokeWidth },
  );
}
