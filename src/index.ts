export * from "./types";

export { CoordinateMapper, MIN_SCALE, projectWithState, unprojectWithState } from "./mapping/CoordinateMapper";
export type { VisibleBounds, CoordinateMapperState } from "./mapping/CoordinateMapper";

export { DEFAULT_STYLE, mergeStyle, withStyle } from "./settings/RendererStyle";
export type { RendererStyle } from "./settings/RendererStyle";
export { DEFAULT_RENDERER_SETTINGS, mergeRendererSettings } from "./settings/RendererSettings";
export type { RendererSettings } from "./settings/RendererSettings";

export { withShape } from "./rendering/RendererPrimitives";
export type * from "./rendering/RendererPrimitives";
export { RecordingPrimitives } from "./rendering/RecordingPrimitives";

export { renderDrawable, DRAWABLE_RENDERERS } from "./drawables/DrawableRenderers";
export type { DrawableRenderer } from "./drawables/DrawableRenderers";
export { buildFunctionPaths, findAsymptotes } from "./curves/FunctionPaths";
export { buildParametricPath } from "./curves/ParametricPaths";
export { computeCurveSampleCount } from "./curves/CurveStep";
export type { CurveStepOptions } from "./curves/CurveStep";
export {
  buildFunctionsArea,
  buildSegmentsArea,
  buildFunctionSegmentArea,
  buildClosedShapeArea,
} from "./drawables/AreaRenderers";
export type { AreaBoundaries } from "./drawables/AreaRenderers";
export { computeRadialSpacing } from "./drawables/PolarGridRenderer";

export { RenderPlan } from "./plan/RenderPlan";
export { PlanCache } from "./plan/PlanCache";
export type { PlanCacheEntry, PlanContext } from "./plan/PlanCache";
export { buildPlanForDrawable } from "./plan/PlanBuilder";
export { computeSignature, isViewDependent } from "./plan/Signature";
export { MAP_STATE_EPSILON, mapStatesEqual, computeUniformTransform } from "./plan/MapState";
export { RenderTelemetry } from "./plan/RenderTelemetry";
export type { RenderTelemetrySnapshot } from "./plan/RenderTelemetry";
export type { PlanCommand, PlanOp, UsageCounts } from "./plan/PlanCommand";

export { SpatialIndex } from "./spatial/SpatialIndex";
export { LabelOverlapResolver, pickNonOverlappingDy } from "./spatial/LabelOverlapResolver";

export { PlanRenderer } from "./backends/PlanRenderer";
export type { RenderPassResult } from "./backends/PlanRenderer";
export { Canvas2DRenderer } from "./backends/Canvas2DRenderer";
export { SvgRenderer } from "./backends/SvgRenderer";
export { WebGLRenderer } from "./backends/WebGLRenderer";
export type { GLLineEngine, GLDrawMode } from "./backends/webgl/GLLineEngine";
export { createRenderer, backendChain } from "./backends/RendererFactory";
export type { CreateRendererOptions } from "./backends/RendererFactory";
