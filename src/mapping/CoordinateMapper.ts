import type { MapState, Point2D } from "../types";

export const MIN_SCALE = 0.01;

export interface VisibleBounds {
  left: number;
  right: number;
  top: number;
  bottom: number;
}

export interface CoordinateMapperState {
  scale: number;
  offsetX: number;
  offsetY: number;
  originX: number;
  originY: number;
  canvasWidth: number;
  canvasHeight: number;
}

/**
 * Converts between math-space coordinates (y up) and screen pixels (y down).
 *
 *   sx = originX + x * scale + offsetX
 *   sy = originY - y * scale + offsetY
 *
 * The origin defaults to the canvas center; pan accumulates in the offset.
 */
export class CoordinateMapper {
  scale = 1;
  offsetX = 0;
  offsetY = 0;
  originX: number;
  originY: number;

  private canvasWidth: number;
  private canvasHeight: number;

  constructor(canvasWidth: number, canvasHeight: number) {
    this.canvasWidth = canvasWidth;
    this.canvasHeight = canvasHeight;
    this.originX = canvasWidth / 2;
    this.originY = canvasHeight / 2;
  }

  get width(): number {
    return this.canvasWidth;
  }

  get height(): number {
    return this.canvasHeight;
  }

  // ── Point conversion ─────────────────────────────────────

  mathToScreen(x: number, y: number): Point2D {
    return [
      this.originX + x * this.scale + this.offsetX,
      this.originY - y * this.scale + this.offsetY,
    ];
  }

  screenToMath(sx: number, sy: number): Point2D {
    return [
      (sx - this.offsetX - this.originX) / this.scale,
      (this.originY + this.offsetY - sy) / this.scale,
    ];
  }

  // ── Length conversion (no offset) ────────────────────────

  scaleValue(value: number): number {
    return value * this.scale;
  }

  unscaleValue(value: number): number {
    return value / this.scale;
  }

  // ── View changes ─────────────────────────────────────────

  /**
   * Pan by a screen-space delta.
   */
  applyPan(dx: number, dy: number): void {
    this.offsetX += dx;
    this.offsetY += dy;
  }

  /**
   * Zoom by a factor around a screen-space pivot.
   * The math point under the pivot stays at the same screen position.
   */
  applyZoom(factor: number, pivotX: number, pivotY: number): void {
    if (!Number.isFinite(factor) || factor <= 0) return;

    const [mathX, mathY] = this.screenToMath(pivotX, pivotY);
    this.scale = Math.max(MIN_SCALE, this.scale * factor);

    // Re-solve the offset so mathToScreen(mathX, mathY) lands on the pivot
    this.offsetX = pivotX - this.originX - mathX * this.scale;
    this.offsetY = pivotY - this.originY + mathY * this.scale;
  }

  reset(): void {
    this.scale = 1;
    this.offsetX = 0;
    this.offsetY = 0;
    this.originX = this.canvasWidth / 2;
    this.originY = this.canvasHeight / 2;
  }

  /**
   * Resize the canvas. The origin follows the new center.
   */
  updateCanvasSize(width: number, height: number): void {
    this.canvasWidth = width;
    this.canvasHeight = height;
    this.originX = width / 2;
    this.originY = height / 2;
  }

  // ── Visible region ───────────────────────────────────────

  getVisibleLeftBound(): number {
    return this.screenToMath(0, 0)[0];
  }

  getVisibleRightBound(): number {
    return this.screenToMath(this.canvasWidth, 0)[0];
  }

  getVisibleTopBound(): number {
    return this.screenToMath(0, 0)[1];
  }

  getVisibleBottomBound(): number {
    return this.screenToMath(0, this.canvasHeight)[1];
  }

  getVisibleBounds(): VisibleBounds {
    return {
      left: this.getVisibleLeftBound(),
      right: this.getVisibleRightBound(),
      top: this.getVisibleTopBound(),
      bottom: this.getVisibleBottomBound(),
    };
  }

  getVisibleWidth(): number {
    return this.canvasWidth / this.scale;
  }

  getVisibleHeight(): number {
    return this.canvasHeight / this.scale;
  }

  isPointVisible(x: number, y: number): boolean {
    const [sx, sy] = this.mathToScreen(x, y);
    return sx >= 0 && sx <= this.canvasWidth && sy >= 0 && sy <= this.canvasHeight;
  }

  // ── State ────────────────────────────────────────────────

  getMapState(): MapState {
    return {
      scale: this.scale,
      offsetX: this.offsetX,
      offsetY: this.offsetY,
      originX: this.originX,
      originY: this.originY,
    };
  }

  getState(): CoordinateMapperState {
    return {
      ...this.getMapState(),
      canvasWidth: this.canvasWidth,
      canvasHeight: this.canvasHeight,
    };
  }

  setState(state: Partial<CoordinateMapperState>): void {
    if (state.canvasWidth !== undefined) this.canvasWidth = state.canvasWidth;
    if (state.canvasHeight !== undefined) this.canvasHeight = state.canvasHeight;
    if (state.scale !== undefined) this.scale = Math.max(MIN_SCALE, state.scale);
    if (state.offsetX !== undefined) this.offsetX = state.offsetX;
    if (state.offsetY !== undefined) this.offsetY = state.offsetY;
    if (state.originX !== undefined) {
      this.originX = state.originX;
    } else if (state.canvasWidth !== undefined) {
      this.originX = this.canvasWidth / 2;
    }
    if (state.originY !== undefined) {
      this.originY = state.originY;
    } else if (state.canvasHeight !== undefined) {
      this.originY = this.canvasHeight / 2;
    }
  }

  /**
   * Build a mapper pinned to an existing map state.
   */
  static fromMapState(state: MapState, width: number, height: number): CoordinateMapper {
    const mapper = new CoordinateMapper(width, height);
    mapper.setState(state);
    return mapper;
  }
}

/**
 * Project a math point through a bare MapState (no mapper instance).
 */
export function projectWithState(state: MapState, x: number, y: number): Point2D {
  return [
    state.originX + x * state.scale + state.offsetX,
    state.originY - y * state.scale + state.offsetY,
  ];
}

/**
 * Inverse of projectWithState().
 */
export function unprojectWithState(state: MapState, sx: number, sy: number): Point2D {
  return [
    (sx - state.offsetX - state.originX) / state.scale,
    (state.originY + state.offsetY - sy) / state.scale,
  ];
}
