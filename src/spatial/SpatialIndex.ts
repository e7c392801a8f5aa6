import RBush from "rbush";
import type { ScreenBounds } from "../types";

export interface PlanBoundsEntry {
  planKey: string;
  bounds: ScreenBounds;
}

interface PlanItem {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
  /** Draw order within the pass; later items paint on top. */
  order: number;
  planKey: string;
}

/**
 * R-tree over plan screen bounds.
 * Used for viewport queries and pointer hit testing after a draw pass.
 */
export class SpatialIndex {
  private tree = new RBush<PlanItem>();
  private items = new Map<string, PlanItem>();

  /**
   * Build the index from plan bounds in draw order.
   * Replaces any existing index.
   */
  buildFromPlans(entries: readonly PlanBoundsEntry[]): void {
    this.tree.clear();
    this.items.clear();

    const items: PlanItem[] = [];
    for (let i = 0; i < entries.length; i++) {
      const item = toItem(entries[i], i);
      items.push(item);
      this.items.set(item.planKey, item);
    }

    this.tree.load(items);
  }

  /**
   * Insert or replace a single plan.
   */
  upsert(entry: PlanBoundsEntry, order: number): void {
    this.remove(entry.planKey);
    const item = toItem(entry, order);
    this.tree.insert(item);
    this.items.set(item.planKey, item);
  }

  remove(planKey: string): void {
    const item = this.items.get(planKey);
    if (item) {
      this.tree.remove(item);
      this.items.delete(planKey);
    }
  }

  /**
   * Plan keys whose bounds intersect the rectangle, in draw order.
   */
  queryRect(minX: number, minY: number, maxX: number, maxY: number): string[] {
    return this.tree
      .search({ minX, minY, maxX, maxY })
      .sort((a, b) => a.order - b.order)
      .map((r) => r.planKey);
  }

  /**
   * Plan keys whose bounds come within `radius` of a point, topmost first.
   * This is a bbox-level test only.
   */
  queryPoint(x: number, y: number, radius: number): string[] {
    return this.queryRect(x - radius, y - radius, x + radius, y + radius).reverse();
  }

  get size(): number {
    return this.items.size;
  }

  clear(): void {
    this.tree.clear();
    this.items.clear();
  }
}

function toItem(entry: PlanBoundsEntry, order: number): PlanItem {
  return {
    minX: entry.bounds.minX,
    minY: entry.bounds.minY,
    maxX: entry.bounds.maxX,
    maxY: entry.bounds.maxY,
    order,
    planKey: entry.planKey,
  };
}
