import {
  positiveModulo,
  computeArrowhead,
  computeAngleArc,
  computeAngleLabel,
  computeCircleArc,
  computeLabelFontSize,
  computeLabelLinePosition,
  computeAnchoredTextPosition,
  curveLabelOffsetX,
} from "./DrawableGeometry";
import type { MapState } from "../types";

const state: MapState = { scale: 40, offsetX: 0, offsetY: 0, originX: 400, originY: 300 };
const origin = { x: 0, y: 0 };

describe("positiveModulo", () => {
  it("wraps negatives into [0, modulus)", () => {
    expect(positiveModulo(-1, 4)).toBe(3);
    expect(positiveModulo(5, 4)).toBe(1);
    expect(positiveModulo(0, 4)).toBe(0);
  });
});

describe("computeArrowhead", () => {
  it("points along the shaft", () => {
    const head = computeArrowhead(state, origin, { x: 1, y: 0 }, 8);
    expect(head).not.toBeNull();
    if (!head) return;
    const h = Math.sqrt(48);
    expect(head[0]).toEqual([440, 300]);
    expect(head[1][0]).toBeCloseTo(440 - h, 9);
    expect(head[1][1]).toBeCloseTo(304, 9);
    expect(head[2][0]).toBeCloseTo(440 - h, 9);
    expect(head[2][1]).toBeCloseTo(296, 9);
  });

  it("never overshoots a shaft shorter than the head", () => {
    const head = computeArrowhead(state, origin, { x: 0.05, y: 0 }, 8);
    if (!head) throw new Error("expected a head");
    expect(head[1][0]).toBeCloseTo(400, 9);
  });

  it("returns null for zero length or size", () => {
    expect(computeArrowhead(state, origin, origin, 8)).toBeNull();
    expect(computeArrowhead(state, origin, { x: 1, y: 0 }, 0)).toBeNull();
  });
});

describe("computeAngleArc", () => {
  it("clamps the radius to the shorter arm", () => {
    const arc = computeAngleArc(state, origin, { x: 0.25, y: 0 }, { x: 0, y: 1 }, 15, false);
    expect(arc?.radius).toBe(10);
  });

  it("measures spans in the sweep direction", () => {
    const ccw = computeAngleArc(state, origin, { x: 1, y: 0 }, { x: -1, y: 1 }, 15, false);
    const cw = computeAngleArc(state, origin, { x: 1, y: 0 }, { x: -1, y: 1 }, 15, true);
    expect(ccw?.spanRad).toBeCloseTo((3 * Math.PI) / 4, 12);
    expect(cw?.spanRad).toBeCloseTo((5 * Math.PI) / 4, 12);
  });

  it("labels the span in degrees on the bisector", () => {
    const arc = computeAngleArc(state, origin, { x: 1, y: 0 }, { x: 0, y: 1 }, 15, false);
    if (!arc) throw new Error("expected an arc");
    const label = computeAngleLabel(arc, 15, 2, 12);
    expect(label.text).toBe("90.0°");
    expect(label.fontSize).toBe(12);
    expect(label.position[0]).toBeCloseTo(400 + 30 * Math.SQRT1_2, 9);
    expect(label.position[1]).toBeCloseTo(300 - 30 * Math.SQRT1_2, 9);
  });
});

describe("computeCircleArc", () => {
  it("applies the radius scale", () => {
    const arc = computeCircleArc(state, origin, 1, { x: 1, y: 0 }, { x: 0, y: -1 }, false, 0.5);
    expect(arc?.radius).toBe(20);
  });

  it("runs clockwise on screen when the minor arc runs clockwise in math space", () => {
    const arc = computeCircleArc(state, origin, 1, { x: 1, y: 0 }, { x: 0, y: -1 }, false, 1);
    expect(arc?.sweepClockwise).toBe(true);
    expect(arc?.startAngle).toBe(0);
    expect(arc?.endAngle).toBeCloseTo(Math.PI / 2, 12);
  });

  it("returns null for a non-positive radius", () => {
    expect(computeCircleArc(state, origin, 0, { x: 1, y: 0 }, { x: 0, y: 1 }, false, 1)).toBeNull();
  });
});

describe("computeLabelFontSize", () => {
  it("never grows past the base size", () => {
    expect(computeLabelFontSize(14, 100, 1, 2)).toBe(14);
  });

  it("scales down and snaps to quarter pixels", () => {
    expect(computeLabelFontSize(14, 1, 3, 2)).toBe(4.75);
  });

  it("vanishes at or below the vanish size", () => {
    expect(computeLabelFontSize(14, 1, 7, 2)).toBe(0);
  });

  it("ignores a non-positive reference scale", () => {
    expect(computeLabelFontSize(14, 0.1, 0, 2)).toBe(14);
  });
});

describe("text positions", () => {
  it("stacks unrotated lines straight down", () => {
    expect(computeLabelLinePosition(state, origin, 2, 10, 1.5, 0)).toEqual([400, 330]);
  });

  it("offsets anchored text and keeps it below minY", () => {
    expect(computeAnchoredTextPosition(state, { x: 1, y: 1 }, 2, -2)).toEqual([442, 258]);
    expect(computeAnchoredTextPosition(state, { x: 0, y: 10 }, 0, 0, 12)).toEqual([400, 12]);
  });

  it("places curve names one glyph plus the name width to the left", () => {
    expect(curveLabelOffsetX("fx", 10)).toBe(-15);
  });
});
