import type { BackendType } from "../types";
import type { RendererStyle } from "../settings/RendererStyle";
import type { RendererSettings } from "../settings/RendererSettings";
import type { PlanContext } from "../plan/PlanCache";
import { PlanRenderer } from "./PlanRenderer";
import type { SurfaceSize } from "./PlanRenderer";
import { SvgPrimitives, SVG_NS } from "./SvgPrimitives";

/**
 * Retained backend. Each plan keeps its own <g> group between passes and is
 * only re-applied when the plan changed. Plans without screen-sized geometry
 * follow the view through a group transform.
 */
export class SvgRenderer extends PlanRenderer {
  override readonly backendType: BackendType = "svg";

  readonly svg: SVGSVGElement;
  private primitives: SvgPrimitives;
  private width: number;
  private height: number;
  /** Position of the next plan within the current pass. */
  private passIndex = 0;

  constructor(
    svg: SVGSVGElement,
    style: Readonly<RendererStyle>,
    settings: Partial<RendererSettings> | null = null,
  ) {
    super(style, settings);
    this.svg = svg;
    this.primitives = new SvgPrimitives(svg, this.telemetry);
    this.primitives.setGroupTransformsEnabled(this.settings.useGroupTransforms);
    this.width = readLength(svg, "width", 300);
    this.height = readLength(svg, "height", 150);
    this.primitives.resizeSurface(this.width, this.height);
  }

  /** Create an <svg> sized to `container` and append it. */
  static inContainer(
    container: HTMLElement,
    style: Readonly<RendererStyle>,
    settings: Partial<RendererSettings> | null = null,
  ): SvgRenderer {
    const svg = document.createElementNS(SVG_NS, "svg");
    svg.setAttribute("width", String(container.clientWidth || 300));
    svg.setAttribute("height", String(container.clientHeight || 150));
    container.appendChild(svg);
    return new SvgRenderer(svg, style, settings);
  }

  get surface(): SvgPrimitives {
    return this.primitives;
  }

  override updateSettings(partial: Partial<RendererSettings>): void {
    const before = this.settings.useGroupTransforms;
    super.updateSettings(partial);
    // Cached plans were built for the other transform mode.
    if (this.settings.useGroupTransforms !== before) {
      this.primitives.setGroupTransformsEnabled(this.settings.useGroupTransforms);
      this.cache.clear();
    }
  }

  // ─── PlanRenderer hooks ─────────────────────────────────

  protected override get supportsTransform(): boolean {
    return this.settings.useGroupTransforms;
  }

  protected override surfaceSize(): SurfaceSize {
    return { width: this.width, height: this.height };
  }

  protected override beginPass(): void {
    this.passIndex = 0;
    this.primitives.beginFrame();
  }

  protected override endPass(order: readonly string[]): void {
    this.primitives.reorderGroups(order);
    this.primitives.endFrame();
  }

  protected override applyPlan(context: PlanContext): boolean {
    const { plan, planKey } = context;
    const position = this.passIndex++;
    const isNew = !this.primitives.hasGroup(planKey);
    let replayed = false;

    if (isNew || plan.needsApply) {
      const retained = this.primitives.totalElements - this.primitives.groupElementCount(planKey);
      if (retained + plan.commandCount > this.settings.maxRetainedElements) {
        console.warn(
          `SVG element budget of ${this.settings.maxRetainedElements} exceeded, skipping "${planKey}" this frame`,
        );
        this.telemetry.recordAdapterEvent("svg_budget_skip");
        this.primitives.dropGroup(planKey);
        plan.markDirty();
        return false;
      }
      this.primitives.reserveUsageCounts(planKey, context.usageCounts);
      plan.apply(this.primitives);
      replayed = true;
      if (isNew && position === 0) this.primitives.pushGroupToBack(planKey);
    }

    this.primitives.setGroupVisible(planKey, true);
    this.primitives.setGroupTransform(
      planKey,
      plan.supportsTransform && this.settings.useGroupTransforms ? plan.transform : null,
    );
    return replayed;
  }

  protected override hidePlan(context: PlanContext): void {
    this.passIndex++;
    this.primitives.setGroupVisible(context.planKey, false);
  }

  protected override releasePlan(planKey: string): void {
    this.primitives.dropGroup(planKey);
  }

  protected override resizeSurface(width: number, height: number): void {
    this.width = width;
    this.height = height;
    this.primitives.resizeSurface(width, height);
  }

  protected override destroySurface(): void {
    this.primitives.clearSurface();
    this.svg.remove();
  }
}

function readLength(svg: SVGSVGElement, name: string, fallback: number): number {
  const value = Number.parseFloat(svg.getAttribute(name) ?? "");
  return Number.isFinite(value) && value > 0 ? value : fallback;
}
