/**
 * Retained RendererPrimitives over an <svg> element.
 *
 * Each plan owns one <g> group. Inside a group, elements are pooled per
 * primitive op: a replay walks the pools with a cursor and rewrites the
 * attributes of existing elements, creating new ones only when a pool runs
 * short. Elements past the cursor are removed when the batch closes.
 */

import type {
  Point2D,
  StrokeStyle,
  FillStyle,
  FontStyle,
  TextAlignment,
  HorizontalAlign,
  VerticalAlign,
} from "../types";
import type {
  RendererPrimitives,
  BatchTarget,
  LineOptions,
  ArcOptions,
  PrimitiveOptions,
  TextOptions,
} from "../rendering/RendererPrimitives";
import type { PlanOp, UsageCounts } from "../plan/PlanCommand";
import type { RenderTelemetry } from "../plan/RenderTelemetry";

export const SVG_NS = "http://www.w3.org/2000/svg";

/** Group used for primitives issued outside a plan batch. */
const IMMEDIATE_GROUP_KEY = "__immediate__";

const TWO_PI = Math.PI * 2;

const OP_TAGS: Record<PlanOp, string> = {
  strokeLine: "line",
  strokePolyline: "polyline",
  strokeCircle: "circle",
  strokeEllipse: "ellipse",
  strokeArc: "path",
  fillCircle: "circle",
  fillPolygon: "polygon",
  fillJoinedArea: "polygon",
  drawText: "text",
};

const TEXT_ANCHORS: Record<HorizontalAlign, string> = {
  left: "start",
  center: "middle",
  right: "end",
};

const BASELINES: Record<VerticalAlign, string> = {
  alphabetic: "alphabetic",
  top: "text-before-edge",
  middle: "middle",
  bottom: "text-after-edge",
  hanging: "hanging",
};

interface OutputMode {
  digits: number;
  nonScalingStroke: boolean;
}

interface PlanGroup {
  readonly planKey: string;
  readonly element: SVGGElement;
  readonly pools: Map<PlanOp, SVGElement[]>;
  readonly cursors: Map<PlanOp, number>;
}

// ─── Formatting ─────────────────────────────────────────────

/** Decimal places written at the base scale, and while group transforms magnify coordinates. */
const BASE_DIGITS = 2;
const TRANSFORMED_DIGITS = 4;

/** Rounded to `digits` places, no trailing zeros, never "-0". */
export function formatNumber(value: number, digits = BASE_DIGITS): string {
  const factor = Math.pow(10, digits);
  const rounded = Math.round(value * factor) / factor;
  return String(rounded === 0 ? 0 : rounded);
}

export function formatPoints(points: readonly Point2D[], digits = BASE_DIGITS): string {
  return points.map((p) => `${formatNumber(p[0], digits)},${formatNumber(p[1], digits)}`).join(" ");
}

/**
 * Path data for a circular arc in screen angles. Sweeps of a full turn are
 * split in two, since a single SVG arc cannot end where it starts.
 */
export function describeArc(
  center: Point2D,
  radius: number,
  startAngle: number,
  endAngle: number,
  sweepClockwise: boolean,
  digits = BASE_DIGITS,
): string {
  const [cx, cy] = center;
  const r = formatNumber(radius, digits);
  const sweepFlag = sweepClockwise ? 1 : 0;
  const span = Math.abs(endAngle - startAngle);
  const at = (angle: number): string =>
    `${formatNumber(cx + radius * Math.cos(angle), digits)} ${formatNumber(cy + radius * Math.sin(angle), digits)}`;

  if (span >= TWO_PI - 1e-9) {
    const mid = startAngle + (sweepClockwise ? Math.PI : -Math.PI);
    return `M ${at(startAngle)} A ${r} ${r} 0 1 ${sweepFlag} ${at(mid)} A ${r} ${r} 0 1 ${sweepFlag} ${at(startAngle)}`;
  }
  const largeArc = span > Math.PI ? 1 : 0;
  return `M ${at(startAngle)} A ${r} ${r} 0 ${largeArc} ${sweepFlag} ${at(endAngle)}`;
}

// ─── SvgPrimitives ──────────────────────────────────────────

export class SvgPrimitives implements RendererPrimitives {
  readonly svg: SVGSVGElement;
  private groups = new Map<string, PlanGroup>();
  private active: PlanGroup | null = null;
  private telemetry: RenderTelemetry | null;
  private batchDepth = 0;
  private output: OutputMode = { digits: BASE_DIGITS, nonScalingStroke: false };

  constructor(svg: SVGSVGElement, telemetry: RenderTelemetry | null = null) {
    this.svg = svg;
    this.telemetry = telemetry;
  }

  /**
   * Match element output to group transforms. While groups may be scaled,
   * coordinates keep more decimals and strokes keep their pixel width.
   * Applies to elements written from now on.
   */
  setGroupTransformsEnabled(enabled: boolean): void {
    this.output = enabled
      ? { digits: TRANSFORMED_DIGITS, nonScalingStroke: true }
      : { digits: BASE_DIGITS, nonScalingStroke: false };
  }

  get groupTransformsEnabled(): boolean {
    return this.output.nonScalingStroke;
  }

  // ── Groups ───────────────────────────────────────────────

  hasGroup(planKey: string): boolean {
    return this.groups.has(planKey);
  }

  getGroupElement(planKey: string): SVGGElement | null {
    return this.groups.get(planKey)?.element ?? null;
  }

  /** Child elements currently held by one group. */
  groupElementCount(planKey: string): number {
    const group = this.groups.get(planKey);
    return group ? group.element.childElementCount : 0;
  }

  /** Child elements held across every group. */
  get totalElements(): number {
    let total = 0;
    for (const group of this.groups.values()) {
      total += group.element.childElementCount;
    }
    return total;
  }

  get groupCount(): number {
    return this.groups.size;
  }

  /** Top up the group's pools so a replay with these counts creates nothing. */
  reserveUsageCounts(planKey: string, counts: Readonly<UsageCounts>): void {
    const group = this.ensureGroup(planKey);
    let created = 0;
    for (const [op, count] of Object.entries(counts)) {
      if (!isPlanOp(op) || count === undefined) continue;
      const pool = poolFor(group, op);
      while (pool.length < count) {
        const el = createSvgElement(OP_TAGS[op]);
        group.element.appendChild(el);
        pool.push(el);
        created++;
      }
    }
    if (created > 0) this.telemetry?.recordAdapterEvent("svg_elements_created", created);
  }

  /** Remove a group and its elements. */
  dropGroup(planKey: string): void {
    const group = this.groups.get(planKey);
    if (!group) return;
    group.element.remove();
    this.groups.delete(planKey);
    if (this.active === group) this.active = null;
    this.telemetry?.recordAdapterEvent("svg_group_dropped");
  }

  /** Empty a group but keep it in place. */
  clearGroup(planKey: string): void {
    const group = this.groups.get(planKey);
    if (!group) return;
    group.element.replaceChildren();
    group.pools.clear();
    group.cursors.clear();
  }

  setGroupVisible(planKey: string, visible: boolean): void {
    const group = this.groups.get(planKey);
    if (!group) return;
    if (visible) {
      group.element.removeAttribute("display");
    } else {
      group.element.setAttribute("display", "none");
    }
  }

  setGroupTransform(planKey: string, transform: string | null): void {
    const group = this.groups.get(planKey);
    if (!group) return;
    if (transform === null) {
      group.element.removeAttribute("transform");
    } else if (group.element.getAttribute("transform") !== transform) {
      group.element.setAttribute("transform", transform);
    }
  }

  /** Move a group underneath every other group. */
  pushGroupToBack(planKey: string): void {
    const group = this.groups.get(planKey);
    if (!group || this.svg.firstChild === group.element) return;
    this.svg.insertBefore(group.element, this.svg.firstChild);
  }

  /**
   * Put groups in the given paint order (first = bottom). Keys without a
   * group are ignored. Does nothing when the order already matches.
   */
  reorderGroups(order: readonly string[]): void {
    const wanted: SVGGElement[] = [];
    for (const planKey of order) {
      const group = this.groups.get(planKey);
      if (group) wanted.push(group.element);
    }
    const wantedSet = new Set<Element>(wanted);
    const current = Array.from(this.svg.children).filter((child) => wantedSet.has(child));
    if (current.length === wanted.length && current.every((el, i) => el === wanted[i])) return;

    for (const el of wanted) this.svg.appendChild(el);
    this.telemetry?.recordAdapterEvent("svg_reorder");
  }

  // ── Batching ─────────────────────────────────────────────

  beginBatch(target: BatchTarget): void {
    const group = this.ensureGroup(target.planKey);
    group.cursors.clear();
    this.active = group;
    this.batchDepth++;
    this.telemetry?.trackBatchDepth(this.batchDepth);
  }

  endBatch(target: BatchTarget): void {
    const group = this.groups.get(target.planKey);
    if (group) trimPools(group);
    this.active = null;
    this.batchDepth = Math.max(0, this.batchDepth - 1);
  }

  beginShape(): void {}
  endShape(): void {}

  beginFrame(): void {
    this.telemetry?.recordAdapterEvent("frame_begin");
  }

  endFrame(): void {
    this.telemetry?.recordAdapterEvent("frame_end");
  }

  // ── Strokes ──────────────────────────────────────────────

  strokeLine(start: Point2D, end: Point2D, stroke: StrokeStyle, options?: LineOptions): void {
    const el = this.take("strokeLine");
    const { digits } = this.output;
    el.setAttribute("x1", formatNumber(start[0], digits));
    el.setAttribute("y1", formatNumber(start[1], digits));
    el.setAttribute("x2", formatNumber(end[0], digits));
    el.setAttribute("y2", formatNumber(end[1], digits));
    applyStroke(el, stroke, this.output);
    if (options?.includeWidth === false) el.setAttribute("stroke-width", "1");
  }

  strokePolyline(points: readonly Point2D[], stroke: StrokeStyle): void {
    if (points.length < 2) return;
    const el = this.take("strokePolyline");
    el.setAttribute("points", formatPoints(points, this.output.digits));
    el.setAttribute("fill", "none");
    applyStroke(el, stroke, this.output);
  }

  strokeCircle(center: Point2D, radius: number, stroke: StrokeStyle): void {
    if (!(radius > 0)) return;
    const el = this.take("strokeCircle");
    setCircle(el, center, radius, this.output.digits);
    el.setAttribute("fill", "none");
    applyStroke(el, stroke, this.output);
  }

  strokeEllipse(
    center: Point2D,
    radiusX: number,
    radiusY: number,
    rotationRad: number,
    stroke: StrokeStyle,
  ): void {
    if (!(radiusX > 0) || !(radiusY > 0)) return;
    const el = this.take("strokeEllipse");
    const { digits } = this.output;
    const cx = formatNumber(center[0], digits);
    const cy = formatNumber(center[1], digits);
    el.setAttribute("cx", cx);
    el.setAttribute("cy", cy);
    el.setAttribute("rx", formatNumber(radiusX, digits));
    el.setAttribute("ry", formatNumber(radiusY, digits));
    if (rotationRad === 0) {
      el.removeAttribute("transform");
    } else {
      el.setAttribute("transform", `rotate(${formatNumber((rotationRad * 180) / Math.PI)} ${cx} ${cy})`);
    }
    el.setAttribute("fill", "none");
    applyStroke(el, stroke, this.output);
  }

  strokeArc(
    center: Point2D,
    radius: number,
    startAngleRad: number,
    endAngleRad: number,
    sweepClockwise: boolean,
    stroke: StrokeStyle,
    options?: ArcOptions,
  ): void {
    if (!(radius > 0)) return;
    const el = this.take("strokeArc");
    el.setAttribute(
      "d",
      describeArc(center, radius, startAngleRad, endAngleRad, sweepClockwise, this.output.digits),
    );
    el.setAttribute("fill", "none");
    applyStroke(el, stroke, this.output);
    setOptional(el, "class", options?.cssClass);
  }

  // ── Fills ────────────────────────────────────────────────

  fillCircle(
    center: Point2D,
    radius: number,
    fill: FillStyle,
    stroke?: StrokeStyle,
    _options?: PrimitiveOptions,
  ): void {
    if (!(radius > 0)) return;
    const el = this.take("fillCircle");
    setCircle(el, center, radius, this.output.digits);
    applyFill(el, fill, stroke, this.output);
  }

  fillPolygon(
    points: readonly Point2D[],
    fill: FillStyle,
    stroke?: StrokeStyle,
    _options?: PrimitiveOptions,
  ): void {
    if (points.length < 3) return;
    const el = this.take("fillPolygon");
    el.setAttribute("points", formatPoints(points, this.output.digits));
    applyFill(el, fill, stroke, this.output);
  }

  fillJoinedArea(forward: readonly Point2D[], reverse: readonly Point2D[], fill: FillStyle): void {
    if (forward.length + reverse.length < 3) return;
    const el = this.take("fillJoinedArea");
    el.setAttribute("points", formatPoints([...forward, ...reverse], this.output.digits));
    applyFill(el, fill, undefined, this.output);
  }

  // ── Text ─────────────────────────────────────────────────

  drawText(
    text: string,
    position: Point2D,
    font: FontStyle,
    color: string,
    alignment: TextAlignment,
    options?: TextOptions,
  ): void {
    if (text === "" || !(font.size > 0)) return;
    const el = this.take("drawText");
    const x = formatNumber(position[0], this.output.digits);
    const y = formatNumber(position[1], this.output.digits);
    el.textContent = text;
    el.setAttribute("x", x);
    el.setAttribute("y", y);
    el.setAttribute("fill", color);
    el.setAttribute("font-family", font.family);
    el.setAttribute("font-size", formatNumber(font.size));
    setOptional(el, "font-weight", font.weight);
    el.setAttribute("text-anchor", TEXT_ANCHORS[alignment.horizontal]);
    el.setAttribute("dominant-baseline", BASELINES[alignment.vertical]);

    const meta = options?.metadata;
    const rotation = meta?.kind === "label" ? meta.rotationDegrees : 0;
    setOptional(el, "transform", rotation === 0 ? undefined : `rotate(${formatNumber(-rotation)} ${x} ${y})`);

    const overrides = options?.styleOverrides;
    const css = overrides
      ? Object.entries(overrides).map(([key, value]) => `${key}: ${value}`).join("; ")
      : "";
    setOptional(el, "style", css === "" ? undefined : css);
  }

  // ── Surface ──────────────────────────────────────────────

  /** Remove every group. */
  clearSurface(): void {
    for (const group of this.groups.values()) group.element.remove();
    this.groups.clear();
    this.active = null;
  }

  resizeSurface(width: number, height: number): void {
    this.svg.setAttribute("width", String(width));
    this.svg.setAttribute("height", String(height));
    this.svg.setAttribute("viewBox", `0 0 ${width} ${height}`);
  }

  // ── Internal ─────────────────────────────────────────────

  private ensureGroup(planKey: string): PlanGroup {
    const existing = this.groups.get(planKey);
    if (existing) return existing;
    const element = document.createElementNS(SVG_NS, "g");
    element.setAttribute("data-plan-key", planKey);
    this.svg.appendChild(element);
    const group: PlanGroup = { planKey, element, pools: new Map(), cursors: new Map() };
    this.groups.set(planKey, group);
    this.telemetry?.recordAdapterEvent("svg_group_created");
    return group;
  }

  /** Next pooled element for `op` in the active group, created on demand. */
  private take(op: PlanOp): SVGElement {
    const group = this.active ?? this.ensureGroup(IMMEDIATE_GROUP_KEY);
    const pool = poolFor(group, op);
    const index = group.cursors.get(op) ?? 0;
    group.cursors.set(op, index + 1);
    const pooled = pool[index];
    if (pooled) return pooled;

    const el = createSvgElement(OP_TAGS[op]);
    group.element.appendChild(el);
    pool.push(el);
    this.telemetry?.recordAdapterEvent("svg_elements_created");
    return el;
  }
}

// ─── Helpers ────────────────────────────────────────────────

function createSvgElement(tag: string): SVGElement {
  return document.createElementNS(SVG_NS, tag);
}

function isPlanOp(op: string): op is PlanOp {
  return Object.prototype.hasOwnProperty.call(OP_TAGS, op);
}

function poolFor(group: PlanGroup, op: PlanOp): SVGElement[] {
  let pool = group.pools.get(op);
  if (!pool) {
    pool = [];
    group.pools.set(op, pool);
  }
  return pool;
}

/** Remove pooled elements the last replay did not reach. */
function trimPools(group: PlanGroup): void {
  for (const [op, pool] of group.pools) {
    const used = group.cursors.get(op) ?? 0;
    for (const el of pool.splice(used)) el.remove();
  }
}

function setOptional(el: Element, name: string, value: string | undefined): void {
  if (value === undefined) {
    el.removeAttribute(name);
  } else {
    el.setAttribute(name, value);
  }
}

function setCircle(el: Element, center: Point2D, radius: number, digits: number): void {
  el.setAttribute("cx", formatNumber(center[0], digits));
  el.setAttribute("cy", formatNumber(center[1], digits));
  el.setAttribute("r", formatNumber(radius, digits));
}

function applyStroke(el: Element, stroke: StrokeStyle, output: OutputMode): void {
  el.setAttribute("stroke", stroke.color);
  el.setAttribute("stroke-width", formatNumber(stroke.width));
  setOptional(el, "stroke-linejoin", stroke.lineJoin);
  setOptional(el, "stroke-linecap", stroke.lineCap);
  setOptional(el, "vector-effect", output.nonScalingStroke ? "non-scaling-stroke" : undefined);
}

function applyFill(
  el: Element,
  fill: FillStyle,
  stroke: StrokeStyle | undefined,
  output: OutputMode,
): void {
  el.setAttribute("fill", fill.color);
  const opacity = fill.opacity;
  setOptional(el, "fill-opacity", opacity === undefined || opacity === 1 ? undefined : formatNumber(opacity));
  if (stroke) {
    applyStroke(el, stroke, output);
  } else {
    el.setAttribute("stroke", "none");
    el.removeAttribute("stroke-width");
    el.removeAttribute("stroke-linejoin");
    el.removeAttribute("stroke-linecap");
    el.removeAttribute("vector-effect");
  }
}
