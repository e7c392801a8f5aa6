import type { Drawable, DrawableKind, DrawableOfKind } from "../types";
import type { RendererPrimitives } from "../rendering/RendererPrimitives";
import type { CoordinateMapper } from "../mapping/CoordinateMapper";
import type { RendererStyle } from "../settings/RendererStyle";
import { renderPoint } from "./PointRenderer";
import { renderSegment } from "./SegmentRenderer";
import { renderCircle, renderEllipse } from "./CircleRenderer";
import { renderVector } from "./VectorRenderer";
import { renderAngle } from "./AngleRenderer";
import { renderCircleArc } from "./CircleArcRenderer";
import { renderLabel } from "./LabelRenderer";
import { renderFunction, renderParametric } from "./FunctionRenderer";
import { renderPolygon } from "./PolygonRenderer";
import { renderCartesianGrid } from "./CartesianGridRenderer";
import { renderPolarGrid } from "./PolarGridRenderer";
import { renderBar } from "./BarRenderer";
import {
  renderClosedShapeArea,
  renderColoredArea,
  renderFunctionSegmentArea,
  renderFunctionsArea,
  renderSegmentsArea,
} from "./AreaRenderers";

type DrawableByKind = { [K in DrawableKind]: DrawableOfKind<K> };

/**
 * Draws one drawable through the primitive interface. Renderers are pure:
 * the same drawable, view and style always issue the same calls.
 */
export type DrawableRenderer<K extends DrawableKind> = (
  primitives: RendererPrimitives,
  drawable: DrawableByKind[K],
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
) => void;

export const DRAWABLE_RENDERERS: { readonly [K in DrawableKind]: DrawableRenderer<K> } = {
  point: renderPoint,
  segment: renderSegment,
  circle: renderCircle,
  ellipse: renderEllipse,
  vector: renderVector,
  angle: renderAngle,
  circleArc: renderCircleArc,
  label: renderLabel,
  function: renderFunction,
  parametric: renderParametric,
  polygon: renderPolygon,
  coloredArea: renderColoredArea,
  cartesianGrid: renderCartesianGrid,
  polarGrid: renderPolarGrid,
  bar: renderBar,
  functionsArea: renderFunctionsArea,
  segmentsArea: renderSegmentsArea,
  functionSegmentArea: renderFunctionSegmentArea,
  closedShapeArea: renderClosedShapeArea,
};

function renderOfKind<K extends DrawableKind>(
  kind: K,
  primitives: RendererPrimitives,
  drawable: DrawableByKind[K],
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  DRAWABLE_RENDERERS[kind](primitives, drawable, mapper, style);
}

export function renderDrawable(
  primitives: RendererPrimitives,
  drawable: Drawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  renderOfKind(drawable.kind, primitives, drawable, mapper, style);
}
