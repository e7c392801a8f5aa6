import type { BackendType } from "../types";
import type { RendererStyle } from "../settings/RendererStyle";
import type { RendererSettings } from "../settings/RendererSettings";
import type { PlanContext } from "../plan/PlanCache";
import { PlanRenderer } from "./PlanRenderer";
import type { SurfaceSize } from "./PlanRenderer";
import { Canvas2DPrimitives } from "./Canvas2DPrimitives";

/**
 * Immediate-mode backend: every pass clears the canvas and replays every
 * visible plan. Nothing is retained on the surface between passes.
 *
 * With `useLayerCompositing` the pass draws into an offscreen layer that is
 * composited onto the canvas every `offscreenFlushInterval` plans and once
 * more at the end of the pass.
 */
export class Canvas2DRenderer extends PlanRenderer {
  override readonly backendType: BackendType = "canvas2d";

  readonly canvas: HTMLCanvasElement;
  private primitives: Canvas2DPrimitives;
  private plansSinceFlush = 0;

  constructor(
    canvas: HTMLCanvasElement,
    style: Readonly<RendererStyle>,
    settings: Partial<RendererSettings> | null = null,
  ) {
    super(style, settings);
    const ctx = canvas.getContext("2d");
    if (!ctx) throw new Error("Failed to get 2D rendering context");
    this.canvas = canvas;
    this.primitives = new Canvas2DPrimitives(ctx, this.telemetry);
  }

  // ─── PlanRenderer hooks ─────────────────────────────────

  protected override get supportsTransform(): boolean {
    return false;
  }

  protected override surfaceSize(): SurfaceSize {
    return { width: this.canvas.width, height: this.canvas.height };
  }

  protected override beginPass(): void {
    this.primitives.beginFrame();
    this.primitives.clearSurface();
    this.plansSinceFlush = 0;
    if (this.settings.useLayerCompositing) {
      this.primitives.beginLayer();
    }
  }

  protected override endPass(_order: readonly string[]): void {
    this.primitives.endLayer();
    this.primitives.endFrame();
  }

  protected override applyPlan(context: PlanContext): boolean {
    context.plan.apply(this.primitives);
    if (this.primitives.layerActive) {
      const interval = this.settings.offscreenFlushInterval;
      this.plansSinceFlush++;
      if (interval > 0 && this.plansSinceFlush >= interval) {
        this.primitives.flushLayer();
        this.plansSinceFlush = 0;
      }
    }
    return true;
  }

  protected override hidePlan(_context: PlanContext): void {
    // Off-screen plans are simply not replayed.
  }

  protected override releasePlan(): void {
    // No per-plan surface resources.
  }

  protected override resizeSurface(width: number, height: number): void {
    this.primitives.resizeSurface(width, height);
  }

  protected override destroySurface(): void {
    this.primitives.clearSurface();
    this.primitives.dispose();
  }
}
