import type {
  CartesianGridDrawable,
  FontStyle,
  StrokeStyle,
  TextAlignment,
} from "../types";
import type { RendererPrimitives } from "../rendering/RendererPrimitives";
import type { CoordinateMapper } from "../mapping/CoordinateMapper";
import type { RendererStyle } from "../settings/RendererStyle";

const NICE_MULTIPLIERS = [1, 2.5, 5, 10];
const MINOR_GRID_WIDTH = 0.5;
const LABEL_GAP = 2;
/** Above this many lines per axis the grid collapses to bare axes. */
const MAX_LINES_PER_AXIS = 1000;

// ─── Tick math ──────────────────────────────────────────────

/**
 * Smallest 1, 2.5, 5 or 10 multiple of a power of ten that is at least
 * `ideal`.
 */
export function snapTickSpacing(ideal: number): number {
  if (!Number.isFinite(ideal) || ideal <= 0) return 1;
  const magnitude = Math.pow(10, Math.floor(Math.log10(ideal)));
  for (const m of NICE_MULTIPLIERS) {
    const spacing = magnitude * m;
    if (spacing >= ideal) return spacing;
  }
  return magnitude * 10;
}

/**
 * Math-space distance between major grid lines. An explicit spacing wins;
 * otherwise aim for the style's target pixel gap without exceeding the
 * maximum tick count across the viewport.
 */
export function computeTickSpacing(
  grid: CartesianGridDrawable,
  scale: number,
  style: Readonly<RendererStyle>,
): number {
  if (grid.tickSpacing !== undefined && Number.isFinite(grid.tickSpacing) && grid.tickSpacing > 0) {
    return grid.tickSpacing;
  }
  const safeScale = Number.isFinite(scale) && scale > 0 ? scale : 1;
  const fromPixels = style.cartesianDefaultTickSpacing / safeScale;
  const fromCount = grid.width / safeScale / Math.max(1, style.cartesianMaxTicks);
  return snapTickSpacing(Math.max(fromPixels, Number.isFinite(fromCount) ? fromCount : 0));
}

/** Decimal places needed to tell adjacent ticks apart. */
export function tickPrecision(spacing: number): number {
  if (!Number.isFinite(spacing) || spacing <= 0 || spacing >= 1) return 0;
  return Math.max(0, Math.ceil(-Math.log10(spacing)));
}

export function formatTickValue(value: number, precision: number): string {
  if (value === 0) return "0";
  if (!Number.isFinite(value)) return String(value);
  const magnitude = Math.abs(value);
  if (magnitude >= 1e6 || precision > 4 || magnitude < 0.001) {
    return value.toExponential(1);
  }
  if (precision <= 0) return String(Math.round(value));
  const fixed = value.toFixed(precision);
  return fixed.includes(".") ? fixed.replace(/0+$/, "").replace(/\.$/, "") : fixed;
}

// ─── Renderer ───────────────────────────────────────────────

interface GridPaint {
  axis: StrokeStyle;
  major: StrokeStyle;
  minor: StrokeStyle;
  tick: StrokeStyle;
  font: FontStyle;
  labelColor: string;
  tickSize: number;
}

const LABEL_ALIGNMENT: TextAlignment = { horizontal: "left", vertical: "alphabetic" };

/**
 * Axes through the math origin, major and minor grid lines, tick marks and
 * tick labels across a `width` x `height` viewport. All geometry is derived
 * from the current view.
 */
export function renderCartesianGrid(
  primitives: RendererPrimitives,
  grid: CartesianGridDrawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  const { width, height } = grid;
  if (!Number.isFinite(width) || !Number.isFinite(height) || width <= 0 || height <= 0) return;

  const [ox, oy] = mapper.mathToScreen(0, 0);
  if (!Number.isFinite(ox) || !Number.isFinite(oy)) return;

  const spacing = computeTickSpacing(grid, mapper.scale, style);
  const pixelSpacing = mapper.scaleValue(spacing);
  const axisColor = grid.color ?? style.cartesianAxisColor;
  const tickSize = Math.max(0, style.cartesianTickSize);
  const paint: GridPaint = {
    axis: { color: axisColor, width: 1 },
    major: { color: style.cartesianGridColor, width: 1 },
    minor: { color: style.cartesianGridColor, width: MINOR_GRID_WIDTH },
    tick: { color: axisColor, width: 1 },
    font: { family: style.fontFamily, size: style.cartesianTickFontSize },
    labelColor: style.cartesianLabelColor,
    tickSize,
  };

  primitives.strokeLine([0, oy], [width, oy], paint.axis);
  primitives.strokeLine([ox, 0], [ox, height], paint.axis);

  if (!Number.isFinite(pixelSpacing) || pixelSpacing <= 0) return;
  if (Math.max(width, height) / pixelSpacing > MAX_LINES_PER_AXIS) return;

  const precision = tickPrecision(spacing);

  // Vertical lines and x-axis ticks
  forEachStep(ox, width, pixelSpacing, (x, isMajor) => {
    if (isMajor) {
      primitives.strokeLine([x, 0], [x, height], paint.major);
      primitives.strokeLine([x, oy - tickSize], [x, oy + tickSize], paint.tick);
      const label = Math.abs(x - ox) < 1e-6
        ? "O"
        : formatTickValue((x - ox) / mapper.scale, precision);
      primitives.drawText(
        label,
        [x + LABEL_GAP, oy + tickSize + paint.font.size],
        paint.font,
        paint.labelColor,
        LABEL_ALIGNMENT,
        { screenSpace: true },
      );
    } else {
      primitives.strokeLine([x, 0], [x, height], paint.minor);
      drawMidTick(primitives, [x, oy - tickSize / 2], [x, oy + tickSize / 2], paint);
    }
  });

  // Horizontal lines and y-axis ticks (origin already labelled)
  forEachStep(oy, height, pixelSpacing, (y, isMajor) => {
    if (isMajor) {
      primitives.strokeLine([0, y], [width, y], paint.major);
      primitives.strokeLine([ox - tickSize, y], [ox + tickSize, y], paint.tick);
      if (Math.abs(y - oy) >= 1e-6) {
        primitives.drawText(
          formatTickValue((oy - y) / mapper.scale, precision),
          [ox + tickSize + LABEL_GAP, y - tickSize],
          paint.font,
          paint.labelColor,
          LABEL_ALIGNMENT,
          { screenSpace: true },
        );
      }
    } else {
      primitives.strokeLine([0, y], [width, y], paint.minor);
      drawMidTick(primitives, [ox - tickSize / 2, y], [ox + tickSize / 2, y], paint);
    }
  });
}

/**
 * Visit every major (n * step) and minor ((n + 0.5) * step) position from
 * `origin` that falls inside [0, extent].
 */
function forEachStep(
  origin: number,
  extent: number,
  step: number,
  visit: (position: number, isMajor: boolean) => void,
): void {
  const first = Math.ceil(-origin / step) - 1;
  const last = Math.floor((extent - origin) / step);
  for (let n = first; n <= last; n++) {
    const major = origin + n * step;
    if (major >= 0 && major <= extent) visit(major, true);
    const minor = major + step / 2;
    if (minor >= 0 && minor <= extent) visit(minor, false);
  }
}

function drawMidTick(
  primitives: RendererPrimitives,
  start: readonly [number, number],
  end: readonly [number, number],
  paint: GridPaint,
): void {
  if (paint.tickSize <= 0) return;
  primitives.strokeLine(start, end, paint.tick);
}
