import type { BackendType, Drawable } from "../types";
import type { CoordinateMapper } from "../mapping/CoordinateMapper";
import type { RendererStyle } from "../settings/RendererStyle";
import type { RendererSettings } from "../settings/RendererSettings";
import { mergeRendererSettings } from "../settings/RendererSettings";
import { PlanCache } from "../plan/PlanCache";
import type { PlanContext } from "../plan/PlanCache";
import type { RenderPlan } from "../plan/RenderPlan";
import { buildPlanForDrawable } from "../plan/PlanBuilder";
import { computeSignature } from "../plan/Signature";
import { RenderTelemetry } from "../plan/RenderTelemetry";
import { SpatialIndex } from "../spatial/SpatialIndex";
import { LabelOverlapResolver } from "../spatial/LabelOverlapResolver";
import type { PlanBoundsEntry } from "../spatial/SpatialIndex";

export interface RenderPassResult {
  /** The pass did not run (drawing disabled or already inside a pass). */
  skipped: boolean;
  /** Plans replayed onto the surface. */
  applied: number;
  /** Plans found off-screen. */
  culled: number;
  /** Cache entries dropped because their drawable was absent. */
  pruned: number;
}

export interface SurfaceSize {
  width: number;
  height: number;
}

const SKIPPED_PASS: Readonly<RenderPassResult> = Object.freeze({
  skipped: true,
  applied: 0,
  culled: 0,
  pruned: 0,
});

/**
 * Shared draw pass for every backend.
 *
 * One pass resolves a plan per drawable, culls plans outside the surface,
 * hands visible plans to the backend, then prunes plans whose drawable was
 * absent. Backends only fill in the hooks.
 */
export abstract class PlanRenderer {
  abstract readonly backendType: BackendType;

  /** When false, render() returns a skipped result without touching the surface. */
  drawEnabled = true;

  readonly telemetry = new RenderTelemetry();

  protected style: Readonly<RendererStyle>;
  protected settings: RendererSettings;
  protected readonly cache: PlanCache;

  private spatialIndex = new SpatialIndex();
  private inPass = false;
  private destroyed = false;

  constructor(style: Readonly<RendererStyle>, settings: Partial<RendererSettings> | null = null) {
    this.style = style;
    this.settings = mergeRendererSettings(settings);
    this.cache = new PlanCache(
      (drawable, mapper) =>
        buildPlanForDrawable(drawable, mapper, this.style, {
          backendSupportsTransform: this.supportsTransform,
        }),
      (planKey, plan) => this.releasePlan(planKey, plan),
      this.telemetry,
    );
  }

  // ─── Backend hooks ──────────────────────────────────────

  /** Backend can reposition math-space plans with a transform instead of reprojecting. */
  protected abstract get supportsTransform(): boolean;

  protected abstract surfaceSize(): SurfaceSize;

  protected abstract beginPass(): void;

  /** Called with the keys of every resolved plan, in drawable order. */
  protected abstract endPass(order: readonly string[]): void;

  /**
   * Put a visible plan on the surface. Returns true if the plan's commands
   * were replayed this pass.
   */
  protected abstract applyPlan(context: PlanContext): boolean;

  protected abstract hidePlan(context: PlanContext): void;

  /** Free backend resources held for a plan. Called exactly once per plan. */
  protected abstract releasePlan(planKey: string, plan: RenderPlan): void;

  protected abstract resizeSurface(width: number, height: number): void;

  protected abstract destroySurface(): void;

  // ─── Draw pass ──────────────────────────────────────────

  render(drawables: readonly Drawable[], mapper: CoordinateMapper): RenderPassResult {
    if (!this.drawEnabled || this.inPass || this.destroyed) {
      this.telemetry.recordSkippedPass();
      return { ...SKIPPED_PASS };
    }

    this.inPass = true;
    try {
      return this.runPass(drawables, mapper);
    } finally {
      this.inPass = false;
    }
  }

  private runPass(drawables: readonly Drawable[], mapper: CoordinateMapper): RenderPassResult {
    this.telemetry.recordPass();
    const mapState = mapper.getMapState();
    const visibleBounds = mapper.getVisibleBounds();
    const { width, height } = this.surfaceSize();
    const margin = this.settings.cullMargin;
    const order: string[] = [];
    const visible: PlanBoundsEntry[] = [];
    const labels = this.settings.resolveLabelOverlaps ? new LabelOverlapResolver() : null;
    let applied = 0;
    let culled = 0;

    this.beginPass();
    try {
      for (const drawable of drawables) {
        let context: PlanContext;
        try {
          const signature = computeSignature(drawable, mapState, visibleBounds);
          context = this.cache.resolve(drawable, mapper, mapState, signature);
        } catch (err) {
          console.warn(`Failed to build render plan for "${drawable.name}"`, err);
          continue;
        }
        order.push(context.planKey);

        if (!context.plan.isVisible(width, height, margin)) {
          this.hidePlan(context);
          this.telemetry.recordPlanCull();
          culled++;
          continue;
        }

        this.placeLabels(context, labels);
        if (this.applyPlan(context)) {
          this.telemetry.recordPlanApply();
          applied++;
        } else {
          this.telemetry.recordPlanSkip();
        }
        const bounds = context.plan.bounds;
        if (bounds) visible.push({ planKey: context.planKey, bounds });
      }
    } finally {
      this.endPass(order);
    }

    const pruned = this.cache.prune();
    this.spatialIndex.buildFromPlans(visible);
    return { skipped: false, applied, culled, pruned: pruned.length };
  }

  /** Shift a plan's anchored labels off those placed earlier in the pass. */
  private placeLabels(context: PlanContext, labels: LabelOverlapResolver | null): void {
    const plan = context.plan;
    if (!labels) {
      plan.setLabelOffset(0);
    } else {
      const rect = plan.anchoredLabelBounds();
      if (rect) plan.setLabelOffset(labels.getOrPlaceDy(context.planKey, rect, this.settings.labelOverlapStep));
    }
    context.needsApply = plan.needsApply;
  }

  // ─── Queries ────────────────────────────────────────────

  /** Keys of plans drawn in the last pass whose bounds meet the rectangle. */
  queryVisiblePlanKeys(rect: { minX: number; minY: number; maxX: number; maxY: number }): string[] {
    return this.spatialIndex.queryRect(rect.minX, rect.minY, rect.maxX, rect.maxY);
  }

  /** Keys of plans drawn in the last pass near a screen point, topmost first. */
  hitTest(x: number, y: number, radius = 0): string[] {
    return this.spatialIndex.queryPoint(x, y, radius);
  }

  getPlan(planKey: string): RenderPlan | null {
    return this.cache.get(planKey)?.plan ?? null;
  }

  get planCount(): number {
    return this.cache.size;
  }

  // ─── Configuration ──────────────────────────────────────

  getStyle(): Readonly<RendererStyle> {
    return this.style;
  }

  /** Swap the style. Every cached plan is released and rebuilt on the next pass. */
  setStyle(style: Readonly<RendererStyle>): void {
    if (style === this.style) return;
    this.style = style;
    this.cache.clear();
    this.spatialIndex.clear();
  }

  getSettings(): Readonly<RendererSettings> {
    return this.settings;
  }

  updateSettings(partial: Partial<RendererSettings>): void {
    this.settings = mergeRendererSettings({ ...this.settings, ...partial });
  }

  /** Drop one cached plan so the next pass rebuilds it. */
  invalidatePlan(planKey: string): void {
    this.cache.invalidate(planKey);
    this.spatialIndex.remove(planKey);
  }

  resize(width: number, height: number): void {
    this.resizeSurface(width, height);
  }

  /** Release every plan and the surface. The renderer draws nothing afterwards. */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.cache.clear();
    this.spatialIndex.clear();
    this.destroySurface();
  }
}
