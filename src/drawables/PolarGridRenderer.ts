import type { FontStyle, PolarGridDrawable, StrokeStyle, TextAlignment } from "../types";
import type { RendererPrimitives } from "../rendering/RendererPrimitives";
import type { CoordinateMapper } from "../mapping/CoordinateMapper";
import type { RendererStyle } from "../settings/RendererStyle";
import { formatTickValue, tickPrecision } from "./CartesianGridRenderer";

const NICE_MULTIPLIERS = [1, 2, 5, 10];
/** Circles are spaced at half the even split of the visible radius. */
const SPACING_BIAS = 0.5;
/** Circles and rays reach this far past the farthest corner. */
const RADIUS_MARGIN = 1.1;
const MAX_CIRCLES = 1000;

// Angle label insets from the surface edge, px
const EDGE_PADDING = 15;
const LEFT_PADDING = 10;
const RIGHT_PADDING = 25;
const MIN_LABEL_RADIUS = 30;
const LABEL_GAP = 2;

const LABEL_ALIGNMENT: TextAlignment = { horizontal: "left", vertical: "alphabetic" };

/**
 * Math-space distance between concentric circles. An explicit spacing wins;
 * otherwise the visible radius is split into roughly `polarMaxCircles`
 * steps and snapped to 1, 2 or 5 times a power of ten.
 */
export function computeRadialSpacing(
  grid: PolarGridDrawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): number {
  const explicit = grid.radialSpacing;
  if (explicit !== undefined && Number.isFinite(explicit) && explicit > 0) return explicit;

  const { left, right, top, bottom } = mapper.getVisibleBounds();
  const visibleRadius = Math.max(
    Math.hypot(left, top),
    Math.hypot(right, top),
    Math.hypot(left, bottom),
    Math.hypot(right, bottom),
  );
  const ideal = (visibleRadius / Math.max(1, style.polarMaxCircles)) * SPACING_BIAS;
  if (!Number.isFinite(ideal) || ideal <= 0) return 1;

  const magnitude = Math.pow(10, Math.floor(Math.log10(ideal)));
  for (const m of NICE_MULTIPLIERS) {
    if (magnitude * m >= ideal) return magnitude * m;
  }
  return magnitude * 10;
}

/**
 * Distance from the origin along `angleRad` at which an angle label stays
 * inside a `width` x `height` surface.
 */
export function angleLabelRadius(
  ox: number,
  oy: number,
  width: number,
  height: number,
  angleRad: number,
): number {
  const cos = Math.cos(angleRad);
  const sin = Math.sin(angleRad);
  let radius: number;

  if (Math.abs(cos) < 1e-10) {
    radius = sin > 0 ? oy - EDGE_PADDING : height - oy - EDGE_PADDING;
  } else if (Math.abs(sin) < 1e-10) {
    radius = cos > 0 ? width - ox - RIGHT_PADDING : ox - LEFT_PADDING;
  } else {
    const toSide = cos > 0 ? (width - ox - RIGHT_PADDING) / cos : (LEFT_PADDING - ox) / cos;
    const toTopOrBottom = sin > 0 ? (oy - EDGE_PADDING) / sin : (oy - height + EDGE_PADDING) / sin;
    radius = toSide > 0 && toTopOrBottom > 0
      ? Math.min(toSide, toTopOrBottom)
      : Math.max(toSide, toTopOrBottom);
  }
  return Math.max(radius, MIN_LABEL_RADIUS);
}

/**
 * Axes, concentric circles and radial lines around the math origin, with
 * angle labels near the surface edge and radius labels along +x.
 */
export function renderPolarGrid(
  primitives: RendererPrimitives,
  grid: PolarGridDrawable,
  mapper: CoordinateMapper,
  style: Readonly<RendererStyle>,
): void {
  const { width, height } = grid;
  if (!Number.isFinite(width) || !Number.isFinite(height) || width <= 0 || height <= 0) return;

  const [ox, oy] = mapper.mathToScreen(0, 0);
  if (!Number.isFinite(ox) || !Number.isFinite(oy)) return;

  const spacing = computeRadialSpacing(grid, mapper, style);
  const pixelSpacing = mapper.scaleValue(spacing);
  const maxRadius =
    Math.max(
      Math.hypot(ox, oy),
      Math.hypot(width - ox, oy),
      Math.hypot(ox, height - oy),
      Math.hypot(width - ox, height - oy),
    ) * RADIUS_MARGIN;

  const divisions = Math.floor(grid.angularDivisions ?? style.polarAngularDivisions);
  const angleStep = 360 / (Number.isFinite(divisions) && divisions > 0 ? divisions : 12);
  const font: FontStyle = { family: style.fontFamily, size: style.polarLabelFontSize };
  const axis: StrokeStyle = { color: grid.color ?? style.polarAxisColor, width: 1 };
  const circle: StrokeStyle = { color: style.polarCircleColor, width: 1 };
  const radial: StrokeStyle = { color: style.polarRadialColor, width: 1 };
  const label = (text: string, x: number, y: number) =>
    primitives.drawText(text, [x, y], font, style.polarLabelColor, LABEL_ALIGNMENT, { screenSpace: true });

  primitives.strokeLine([0, oy], [width, oy], axis);
  primitives.strokeLine([ox, 0], [ox, height], axis);

  const circleCount = Number.isFinite(pixelSpacing) && pixelSpacing > 0
    ? Math.min(MAX_CIRCLES, Math.floor(maxRadius / pixelSpacing))
    : 0;
  for (let n = 1; n <= circleCount; n++) {
    primitives.strokeCircle([ox, oy], n * pixelSpacing, circle);
  }

  const rays = Math.floor(360 / angleStep);
  for (let i = 0; i < rays; i++) {
    const angle = (i * angleStep * Math.PI) / 180;
    primitives.strokeLine(
      [ox, oy],
      [ox + maxRadius * Math.cos(angle), oy - maxRadius * Math.sin(angle)],
      radial,
    );
  }

  for (let i = 0; i < rays; i++) {
    const degrees = i * angleStep;
    const angle = (degrees * Math.PI) / 180;
    const r = angleLabelRadius(ox, oy, width, height, angle);
    label(`${Math.trunc(degrees)}°`, ox + r * Math.cos(angle), oy - r * Math.sin(angle));
  }

  const precision = tickPrecision(spacing);
  for (let n = 1; n <= circleCount; n++) {
    const r = n * pixelSpacing;
    label(formatTickValue(n * spacing, precision), ox + r + LABEL_GAP, oy + font.size);
  }

  label("O", ox + LABEL_GAP, oy + font.size);
}
