import type { BackendType } from "../types";
import type { RendererStyle } from "../settings/RendererStyle";
import type { RendererSettings } from "../settings/RendererSettings";
import type { PlanContext } from "../plan/PlanCache";
import { PlanRenderer } from "./PlanRenderer";
import type { SurfaceSize } from "./PlanRenderer";
import { WebGLPrimitives } from "./WebGLPrimitives";
import { WebGLLineEngine } from "./webgl/GLLineEngine";
import type { GLLineEngine } from "./webgl/GLLineEngine";

/**
 * Batched backend. Clears and replays every visible plan per pass as GL
 * line, strip and point draws. Text is not drawn.
 */
export class WebGLRenderer extends PlanRenderer {
  override readonly backendType: BackendType = "webgl";

  private engine: GLLineEngine;
  private primitives: WebGLPrimitives;

  /**
   * @param engine Replaces the WebGL2 engine created on `canvas`; tests pass a recording engine.
   */
  constructor(
    canvas: HTMLCanvasElement,
    style: Readonly<RendererStyle>,
    settings: Partial<RendererSettings> | null = null,
    engine: GLLineEngine | null = null,
  ) {
    super(style, settings);
    this.engine = engine ?? new WebGLLineEngine(canvas);
    this.primitives = new WebGLPrimitives(this.engine, this.settings.minCurveSegments, this.telemetry);
  }

  override updateSettings(partial: Partial<RendererSettings>): void {
    super.updateSettings(partial);
    this.primitives.setMinCurveSegments(this.settings.minCurveSegments);
  }

  // ─── PlanRenderer hooks ─────────────────────────────────

  protected override get supportsTransform(): boolean {
    return false;
  }

  protected override surfaceSize(): SurfaceSize {
    return { width: this.engine.width, height: this.engine.height };
  }

  protected override beginPass(): void {
    this.primitives.beginFrame();
    this.primitives.clearSurface();
  }

  protected override endPass(_order: readonly string[]): void {
    this.primitives.endFrame();
  }

  protected override applyPlan(context: PlanContext): boolean {
    context.plan.apply(this.primitives);
    return true;
  }

  protected override hidePlan(_context: PlanContext): void {
    // Nothing retained; off-screen plans are not replayed.
  }

  protected override releasePlan(): void {
    // No per-plan GPU resources.
  }

  protected override resizeSurface(width: number, height: number): void {
    this.primitives.resizeSurface(width, height);
  }

  protected override destroySurface(): void {
    this.engine.destroy();
  }
}
