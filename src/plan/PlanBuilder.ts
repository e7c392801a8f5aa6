import type { Drawable } from "../types";
import type { CoordinateMapper } from "../mapping/CoordinateMapper";
import type { RendererStyle } from "../settings/RendererStyle";
import { RecordingPrimitives } from "../rendering/RecordingPrimitives";
import { withShape } from "../rendering/RendererPrimitives";
import { renderDrawable } from "../drawables/DrawableRenderers";
import { RenderPlan } from "./RenderPlan";

export interface BuildPlanOptions {
  /** Backend can reposition math-space plans with a transform. */
  backendSupportsTransform: boolean;
}

/**
 * Record a drawable's primitive calls into a fresh plan for the mapper's
 * current view. Plans holding any screen-sized geometry cannot follow the
 * view by transform alone, so they never get one.
 */
export function buildPlanForDrawable(
  drawable: Drawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
  options: BuildPlanOptions,
): RenderPlan {
  const recorder = new RecordingPrimitives();
  withShape(recorder, () => renderDrawable(recorder, drawable, mapper, style));

  const mapState = mapper.getMapState();
  const plan = new RenderPlan({
    planKey: drawable.name,
    commands: recorder.commands,
    usageCounts: recorder.usageCounts,
    usesScreenSpace: recorder.usesScreenSpace,
    supportsTransform: options.backendSupportsTransform && !recorder.usesScreenSpace,
    mapState,
    bounds: recorder.getBounds(),
  });
  plan.updateMapState(mapState);
  return plan;
}
