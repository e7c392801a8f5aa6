import type { Drawable, MapState } from "../types";
import type { CoordinateMapper } from "../mapping/CoordinateMapper";
import type { RenderPlan } from "./RenderPlan";
import type { UsageCounts } from "./PlanCommand";
import type { RenderTelemetry } from "./RenderTelemetry";

export interface PlanCacheEntry {
  plan: RenderPlan;
  signature: string;
  /** Incremented each time this key's plan is replaced. */
  generation: number;
}

/** What a backend needs to know about one resolved plan this pass. */
export interface PlanContext {
  plan: RenderPlan;
  planKey: string;
  usageCounts: Readonly<UsageCounts>;
  supportsTransform: boolean;
  needsApply: boolean;
  generation: number;
  /** The plan was built (or replaced) by this resolve. */
  rebuilt: boolean;
}

export type PlanFactory = (drawable: Drawable, mapper: CoordinateMapper) => RenderPlan;

/** Frees whatever a backend holds for a plan (an SVG group, for instance). */
export type PlanReleaseHook = (planKey: string, plan: RenderPlan) => void;

/**
 * Per-renderer plan cache keyed by drawable name.
 *
 * Every key resolved during a pass is remembered; prune() then releases
 * and drops every entry the pass did not touch. Each plan is released
 * exactly once: on replacement, on prune, or on clear().
 */
export class PlanCache {
  private entries = new Map<string, PlanCacheEntry>();
  private frameSeen = new Set<string>();
  private build: PlanFactory;
  private release: PlanReleaseHook;
  private telemetry: RenderTelemetry | null;

  constructor(build: PlanFactory, release: PlanReleaseHook, telemetry: RenderTelemetry | null = null) {
    this.build = build;
    this.release = release;
    this.telemetry = telemetry;
  }

  get size(): number {
    return this.entries.size;
  }

  has(planKey: string): boolean {
    return this.entries.has(planKey);
  }

  get(planKey: string): PlanCacheEntry | undefined {
    return this.entries.get(planKey);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Return the plan for a drawable, reusing the cached one when the
   * signature is unchanged. A reused plan is moved to `mapState`; a changed
   * signature builds a replacement and releases the old plan.
   *
   * If the build throws, any previous entry for the key is released and
   * removed before the error propagates.
   */
  resolve(
    drawable: Drawable,
    mapper: CoordinateMapper,
    mapState: MapState,
    signature: string,
  ): PlanContext {
    const planKey = drawable.name;
    const existing = this.entries.get(planKey);

    if (existing && existing.signature === signature) {
      existing.plan.updateMapState(mapState);
      this.frameSeen.add(planKey);
      this.telemetry?.recordPlanReuse();
      return toContext(existing, false);
    }

    if (!existing) this.telemetry?.recordCacheMiss();

    let plan: RenderPlan;
    try {
      plan = this.build(drawable, mapper);
    } catch (err) {
      if (existing) this.drop(planKey, existing);
      this.telemetry?.recordBuildFailure();
      throw err;
    }

    if (existing) this.releasePlan(planKey, existing.plan);
    const entry: PlanCacheEntry = {
      plan,
      signature,
      generation: (existing?.generation ?? 0) + 1,
    };
    this.entries.set(planKey, entry);
    this.frameSeen.add(planKey);
    this.telemetry?.recordPlanBuild();
    return toContext(entry, true);
  }

  /** Keys resolved since the last prune(). */
  seenKeys(): ReadonlySet<string> {
    return this.frameSeen;
  }

  /**
   * Release and remove every entry not resolved since the last prune.
   * Returns the removed keys.
   */
  prune(): string[] {
    const pruned: string[] = [];
    for (const planKey of this.entries.keys()) {
      if (!this.frameSeen.has(planKey)) pruned.push(planKey);
    }
    for (const planKey of pruned) {
      const entry = this.entries.get(planKey);
      if (entry) this.drop(planKey, entry);
    }
    this.frameSeen.clear();
    return pruned;
  }

  /** Forget one key, releasing its plan. */
  invalidate(planKey: string): void {
    const entry = this.entries.get(planKey);
    if (entry) this.drop(planKey, entry);
    this.frameSeen.delete(planKey);
  }

  /** Release everything. Used at teardown and when the style changes. */
  clear(): void {
    for (const [planKey, entry] of [...this.entries]) {
      this.drop(planKey, entry);
    }
    this.frameSeen.clear();
  }

  private drop(planKey: string, entry: PlanCacheEntry): void {
    this.entries.delete(planKey);
    this.releasePlan(planKey, entry.plan);
  }

  private releasePlan(planKey: string, plan: RenderPlan): void {
    this.telemetry?.recordPlanRelease();
    this.release(planKey, plan);
  }
}

function toContext(entry: PlanCacheEntry, rebuilt: boolean): PlanContext {
  return {
    plan: entry.plan,
    planKey: entry.plan.planKey,
    usageCounts: entry.plan.usageCounts,
    supportsTransform: entry.plan.supportsTransform,
    needsApply: entry.plan.needsApply,
    generation: entry.generation,
    rebuilt,
  };
}
