import type { MapState, ScreenBounds } from "../types";
import type { RendererPrimitives, BatchTarget } from "../rendering/RendererPrimitives";
import type { DrawTextCommand, PlanCommand, UsageCounts } from "./PlanCommand";
import { replayCommand, computeCommandBounds } from "./PlanCommand";
import {
  computeUniformTransform,
  copyMapState,
  formatTransformMatrix,
  mapStatesEqual,
} from "./MapState";
import type { UniformTransform } from "./MapState";
import { reprojectCommands } from "./Reprojection";

export interface RenderPlanInit {
  planKey: string;
  commands: PlanCommand[];
  usageCounts: UsageCounts;
  usesScreenSpace: boolean;
  supportsTransform: boolean;
  /** View the commands were recorded under. */
  mapState: MapState;
  bounds: ScreenBounds | null;
}

/**
 * Cached, replayable drawing of one drawable.
 *
 * Plans follow the view in one of two ways. Transform-capable plans keep
 * their commands as recorded and expose a `matrix(...)` transform that maps
 * the recorded view onto the current one. All other plans rewrite their
 * commands in place whenever the view moves beyond MAP_STATE_EPSILON, which
 * bumps `revision` and flags the plan for re-apply.
 */
export class RenderPlan implements BatchTarget {
  readonly planKey: string;
  readonly commands: PlanCommand[];
  readonly usageCounts: Readonly<UsageCounts>;
  readonly usesScreenSpace: boolean;
  readonly supportsTransform: boolean;

  needsApply = true;
  /** Incremented on every reprojection. */
  revision = 0;
  /** Number of updateMapState() calls received. */
  updateCount = 0;
  /** Group transform for transform-capable plans, null otherwise. */
  transform: string | null = null;

  private readonly baseMapState: MapState;
  private readonly baseBounds: ScreenBounds | null;
  private displayMapState: MapState;
  private currentMapState: MapState;
  private screenBounds: ScreenBounds | null;
  private labelShift = 0;

  constructor(init: RenderPlanInit) {
    this.planKey = init.planKey;
    this.commands = init.commands;
    this.usageCounts = { ...init.usageCounts };
    this.usesScreenSpace = init.usesScreenSpace;
    this.supportsTransform = init.supportsTransform;
    this.baseMapState = copyMapState(init.mapState);
    this.displayMapState = copyMapState(init.mapState);
    this.currentMapState = copyMapState(init.mapState);
    this.baseBounds = init.bounds ? { ...init.bounds } : null;
    this.screenBounds = init.bounds ? { ...init.bounds } : null;
  }

  get bounds(): ScreenBounds | null {
    return this.screenBounds;
  }

  /** Latest view handed to updateMapState(). */
  get mapState(): MapState {
    return this.currentMapState;
  }

  /** View the commands are currently expressed in. */
  get displayState(): MapState {
    return this.displayMapState;
  }

  get baseState(): MapState {
    return this.baseMapState;
  }

  get commandCount(): number {
    return this.commands.length;
  }

  // ─── View updates ───────────────────────────────────────

  updateMapState(state: MapState): void {
    this.updateCount++;
    const next = copyMapState(state);
    this.currentMapState = next;

    if (this.supportsTransform) {
      const t = computeUniformTransform(this.baseMapState, next);
      this.transform = formatTransformMatrix(t);
      this.screenBounds = transformBounds(this.baseBounds, t);
      this.displayMapState = next;
      return;
    }

    if (mapStatesEqual(this.displayMapState, next)) return;

    reprojectCommands(this.commands, this.displayMapState, next);
    if (this.labelShift !== 0) shiftAnchoredLabels(this.commands, this.labelShift);
    this.displayMapState = next;
    this.screenBounds = computeCommandBounds(this.commands);
    this.needsApply = true;
    this.revision++;
  }

  // ─── Visibility ─────────────────────────────────────────

  /**
   * Whether any part of the plan can land on a `width` x `height` surface.
   * Plans without bounds are always considered visible.
   */
  isVisible(width: number, height: number, margin = 1): boolean {
    const b = this.screenBounds;
    if (!b) return true;
    if (b.maxX < -margin || b.maxY < -margin) return false;
    if (b.minX > width + margin || b.minY > height + margin) return false;
    return true;
  }

  // ─── Anchored labels ────────────────────────────────────

  /** Vertical shift currently applied to the plan's anchored labels, px. */
  get labelOffsetY(): number {
    return this.labelShift;
  }

  /** Screen bounds of the anchored labels as the renderer placed them. */
  anchoredLabelBounds(): ScreenBounds | null {
    const bounds = computeCommandBounds(this.commands.filter(isAnchoredText));
    if (!bounds) return null;
    return {
      minX: bounds.minX,
      maxX: bounds.maxX,
      minY: bounds.minY - this.labelShift,
      maxY: bounds.maxY - this.labelShift,
    };
  }

  /**
   * Move anchored labels `dy` px below where the renderer placed them. The
   * shift survives reprojection. Transform-capable plans hold no anchored
   * labels and ignore it.
   */
  setLabelOffset(dy: number): void {
    if (this.supportsTransform || !Number.isFinite(dy) || dy === this.labelShift) return;
    if (!this.commands.some(isAnchoredText)) return;
    shiftAnchoredLabels(this.commands, dy - this.labelShift);
    this.labelShift = dy;
    this.screenBounds = computeCommandBounds(this.commands);
    this.needsApply = true;
  }

  // ─── Replay ─────────────────────────────────────────────

  apply(primitives: RendererPrimitives): void {
    if (this.commands.length === 0) {
      this.needsApply = false;
      return;
    }
    primitives.beginBatch(this);
    try {
      for (const command of this.commands) {
        replayCommand(primitives, command);
      }
    } finally {
      primitives.endBatch(this);
    }
    this.needsApply = false;
  }

  markDirty(): void {
    this.needsApply = true;
  }
}

function isAnchoredText(command: PlanCommand): command is DrawTextCommand {
  return command.op === "drawText" && command.metadata?.kind === "anchoredText";
}

function shiftAnchoredLabels(commands: readonly PlanCommand[], dy: number): void {
  for (const command of commands) {
    if (isAnchoredText(command)) {
      command.position = [command.position[0], command.position[1] + dy];
    }
  }
}

function transformBounds(bounds: ScreenBounds | null, t: UniformTransform): ScreenBounds | null {
  if (!bounds) return null;
  return {
    minX: bounds.minX * t.ratio + t.translateX,
    maxX: bounds.maxX * t.ratio + t.translateX,
    minY: bounds.minY * t.ratio + t.translateY,
    maxY: bounds.maxY * t.ratio + t.translateY,
  };
}
