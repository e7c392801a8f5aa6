import type { FunctionDrawable, ParametricDrawable, Point2D, ScalarFunction } from "../types";
import type { RendererPrimitives } from "../rendering/RendererPrimitives";
import type { CoordinateMapper } from "../mapping/CoordinateMapper";
import type { RendererStyle } from "../settings/RendererStyle";
import { buildFunctionPaths } from "../curves/FunctionPaths";
import { buildParametricPath } from "../curves/ParametricPaths";
import { computeCurveSampleCount } from "../curves/CurveStep";
import { curveLabelOffsetX } from "./DrawableGeometry";

/**
 * Sampling window for a function: its own bounds clipped to the visible
 * x range. Null when nothing of the function is on screen.
 */
export function visibleSampleRange(
  leftBound: number,
  rightBound: number,
  mapper: CoordinateMapper,
): [number, number] | null {
  const left = Math.max(leftBound, mapper.getVisibleLeftBound());
  const right = Math.min(rightBound, mapper.getVisibleRightBound());
  if (!Number.isFinite(left) || !Number.isFinite(right) || right <= left) return null;
  return [left, right];
}

/** Interval count for sampling `evaluate` over [left, right] at the current zoom. */
export function adaptiveSampleCount(
  evaluate: ScalarFunction,
  left: number,
  right: number,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): number {
  return computeCurveSampleCount(evaluate, left, right, {
    pixelsPerUnit: mapper.scale,
    screenHeight: mapper.height,
    pixelStep: style.functionPixelStep,
    minSamples: style.functionMinSamples,
    maxSamples: style.functionMaxSamples,
    maxSamplesDetailed: style.functionMaxSamplesDetailed,
  });
}

/**
 * Plot y = f(x) over the visible part of the drawable's bounds. The sample
 * count follows the zoom unless the drawable fixes one, so the plan is
 * rebuilt whenever the view changes.
 */
export function renderFunction(
  primitives: RendererPrimitives,
  fn: FunctionDrawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  const range = visibleSampleRange(fn.leftBound, fn.rightBound, mapper);
  if (!range) return;
  const [left, right] = range;
  const paths = buildFunctionPaths(fn.evaluate, {
    leftBound: left,
    rightBound: right,
    samples: fn.samples ?? adaptiveSampleCount(fn.evaluate, left, right, mapper, style),
    asymptotes: fn.asymptotes,
    pointDiscontinuities: fn.pointDiscontinuities,
  });
  drawCurve(primitives, fn.name, fn.color ?? style.functionColor, paths, mapper, style);
}

export function renderParametric(
  primitives: RendererPrimitives,
  curve: ParametricDrawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  const path = buildParametricPath(curve.x, curve.y, {
    tMin: curve.tMin,
    tMax: curve.tMax,
    maxPoints: curve.maxPoints ?? style.parametricMaxPoints,
  });
  drawCurve(
    primitives,
    curve.name,
    curve.color ?? style.functionColor,
    path.length > 0 ? [path] : [],
    mapper,
    style,
  );
}

function drawCurve(
  primitives: RendererPrimitives,
  name: string,
  color: string,
  mathPaths: readonly Point2D[][],
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  const stroke = { color, width: style.functionStrokeWidth };
  for (const path of mathPaths) {
    primitives.strokePolyline(path.map(([x, y]) => mapper.mathToScreen(x, y)), stroke);
  }

  if (mathPaths.length === 0 || name === "") return;

  // Name sits just left of where the curve starts, kept below the top edge.
  const [mx, my] = mathPaths[0][0];
  const [sx, sy] = mapper.mathToScreen(mx, my);
  const fontSize = style.functionLabelFontSize;
  const offsetX = curveLabelOffsetX(name, fontSize);
  primitives.drawText(
    name,
    [sx + offsetX, Math.max(sy, fontSize)],
    { family: style.fontFamily, size: fontSize },
    color,
    { horizontal: "left", vertical: "alphabetic" },
    {
      screenSpace: true,
      metadata: { kind: "anchoredText", anchor: { x: mx, y: my }, offsetX, offsetY: 0, minY: fontSize },
    },
  );
}
