export interface RenderTelemetrySnapshot {
  passes: number;
  skippedPasses: number;
  planBuilds: number;
  planReuses: number;
  planApplies: number;
  /** Visible plans that were already up to date on the surface. */
  planSkips: number;
  /** Plans culled as off-screen. */
  planCulls: number;
  /** Resolves that found no entry for the drawable. */
  cacheMisses: number;
  planReleases: number;
  buildFailures: number;
  maxBatchDepth: number;
  adapterEvents: Record<string, number>;
}

/**
 * Per-renderer counters. Cheap enough to stay on in production; read with
 * snapshot(), zero with reset().
 */
export class RenderTelemetry {
  private counters: Omit<RenderTelemetrySnapshot, "adapterEvents"> = emptyCounters();
  private adapterEvents = new Map<string, number>();

  recordPass(): void { this.counters.passes++; }
  recordSkippedPass(): void { this.counters.skippedPasses++; }
  recordPlanBuild(): void { this.counters.planBuilds++; }
  recordPlanReuse(): void { this.counters.planReuses++; }
  recordPlanApply(): void { this.counters.planApplies++; }
  recordPlanSkip(): void { this.counters.planSkips++; }
  recordPlanCull(): void { this.counters.planCulls++; }
  recordCacheMiss(): void { this.counters.cacheMisses++; }
  recordPlanRelease(): void { this.counters.planReleases++; }
  recordBuildFailure(): void { this.counters.buildFailures++; }

  trackBatchDepth(depth: number): void {
    if (depth > this.counters.maxBatchDepth) this.counters.maxBatchDepth = depth;
  }

  recordAdapterEvent(name: string, amount = 1): void {
    this.adapterEvents.set(name, (this.adapterEvents.get(name) ?? 0) + amount);
  }

  snapshot(): RenderTelemetrySnapshot {
    return {
      ...this.counters,
      adapterEvents: Object.fromEntries(this.adapterEvents),
    };
  }

  reset(): void {
    this.counters = emptyCounters();
    this.adapterEvents.clear();
  }
}

function emptyCounters(): Omit<RenderTelemetrySnapshot, "adapterEvents"> {
  return {
    passes: 0,
    skippedPasses: 0,
    planBuilds: 0,
    planReuses: 0,
    planApplies: 0,
    planSkips: 0,
    planCulls: 0,
    cacheMisses: 0,
    planReleases: 0,
    buildFailures: 0,
    maxBatchDepth: 0,
  };
}
