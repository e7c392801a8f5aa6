import { renderDrawable, DRAWABLE_RENDERERS } from "./DrawableRenderers";
import { RecordingPrimitives } from "../rendering/RecordingPrimitives";
import { DEFAULT_STYLE } from "../settings/RendererStyle";
import type { Drawable } from "../types";
import type { PlanCommand } from "../plan/PlanCommand";
import { makeMapper, sampleDrawables } from "../plan/__tests__/planFixtures";

function record(drawable: Drawable, scale = 40): PlanCommand[] {
  const recorder = new RecordingPrimitives();
  renderDrawable(recorder, drawable, makeMapper(scale), DEFAULT_STYLE);
  return recorder.commands;
}

function only<T extends PlanCommand["op"]>(
  commands: PlanCommand[],
  op: T,
): Extract<PlanCommand, { op: T }>[] {
  return commands.filter((c): c is Extract<PlanCommand, { op: T }> => c.op === op);
}

function numbersIn(value: unknown): number[] {
  if (typeof value === "number") return [value];
  if (Array.isArray(value)) return value.flatMap(numbersIn);
  if (typeof value === "object" && value !== null) return Object.values(value).flatMap(numbersIn);
  return [];
}

describe("DRAWABLE_RENDERERS", () => {
  it("has a renderer for every drawable kind", () => {
    expect(Object.keys(DRAWABLE_RENDERERS).sort()).toEqual(Object.keys(sampleDrawables()).sort());
  });
});

describe("point", () => {
  it("draws a screen-sized dot and a name label up and to the right", () => {
    expect(record({ kind: "point", name: "A", x: 1, y: 2 })).toEqual([
      {
        op: "fillCircle",
        center: [440, 220],
        radius: 2,
        fill: { color: "black" },
        stroke: undefined,
        screenSpace: true,
        metadata: undefined,
      },
      {
        op: "drawText",
        text: "A",
        position: [442, 218],
        font: { family: "Inter, sans-serif", size: 10 },
        color: "black",
        alignment: { horizontal: "left", vertical: "alphabetic" },
        styleOverrides: undefined,
        screenSpace: true,
        metadata: { kind: "anchoredText", anchor: { x: 1, y: 2 }, offsetX: 2, offsetY: -2 },
      },
    ]);
  });

  it("hides the label when it is empty", () => {
    const commands = record({ kind: "point", name: "A", x: 1, y: 2, label: "" });
    expect(commands.map((c) => c.op)).toEqual(["fillCircle"]);
  });

  it("prefers an explicit label and color", () => {
    const [, text] = record({ kind: "point", name: "A", x: 0, y: 0, label: "Q", color: "red" });
    expect(text.op === "drawText" && [text.text, text.color]).toEqual(["Q", "red"]);
  });
});

describe("circle and ellipse", () => {
  it("scales the radius with zoom", () => {
    expect(record({ kind: "circle", name: "c", center: { x: 1, y: 1 }, radius: 2 })).toEqual([
      { op: "strokeCircle", center: [440, 260], radius: 80, stroke: { color: "black", width: 1 } },
    ]);
  });

  it("skips zero and negative radii", () => {
    expect(record({ kind: "circle", name: "c", center: { x: 0, y: 0 }, radius: 0 })).toEqual([]);
    expect(record({ kind: "circle", name: "c", center: { x: 0, y: 0 }, radius: -1 })).toEqual([]);
  });

  it("turns math rotation into a clockwise screen rotation", () => {
    const [ellipse] = only(
      record({ kind: "ellipse", name: "e", center: { x: 0, y: 0 }, radiusX: 3, radiusY: 1, rotationDegrees: 30 }),
      "strokeEllipse",
    );
    expect(ellipse.center).toEqual([400, 300]);
    expect(ellipse.radiusX).toBe(120);
    expect(ellipse.radiusY).toBe(40);
    expect(ellipse.rotationRad).toBeCloseTo(-Math.PI / 6, 12);
  });
});

describe("vector", () => {
  it("draws the shaft and an arrowhead with edges of the tip size", () => {
    const commands = record({ kind: "vector", name: "v", origin: { x: 0, y: 0 }, tip: { x: 2, y: 1 } });
    const [shaft] = only(commands, "strokeLine");
    const [head] = only(commands, "fillPolygon");

    expect(shaft.start).toEqual([400, 300]);
    expect(shaft.end).toEqual([480, 260]);
    expect(head.points[0]).toEqual([480, 260]);
    const [tip, left, right] = head.points;
    expect(Math.hypot(left[0] - tip[0], left[1] - tip[1])).toBeCloseTo(8, 9);
    expect(Math.hypot(right[0] - tip[0], right[1] - tip[1])).toBeCloseTo(8, 9);
    expect(Math.hypot(right[0] - left[0], right[1] - left[1])).toBeCloseTo(8, 9);
    expect(head.screenSpace).toBe(true);
  });

  it("omits the head of a zero-length vector", () => {
    const commands = record({ kind: "vector", name: "v", origin: { x: 1, y: 1 }, tip: { x: 1, y: 1 } });
    expect(commands.map((c) => c.op)).toEqual(["strokeLine"]);
  });
});

describe("angle", () => {
  const right = {
    kind: "angle" as const,
    name: "a",
    vertex: { x: 0, y: 0 },
    arm1: { x: 3, y: 0 },
    arm2: { x: 0, y: 3 },
    sweepClockwise: false,
  };

  it("marks a right angle counter-clockwise on screen", () => {
    const commands = record(right);
    const [arc] = only(commands, "strokeArc");
    const [text] = only(commands, "drawText");

    expect(arc.center).toEqual([400, 300]);
    expect(arc.radius).toBe(15);
    expect(arc.startAngle).toBe(0);
    expect(arc.endAngle).toBeCloseTo(-Math.PI / 2, 12);
    expect(arc.sweepClockwise).toBe(false);
    expect(arc.cssClass).toBe("angle-arc");

    expect(text.text).toBe("90.0°");
    expect(text.font.size).toBe(10);
    expect(text.position[0]).toBeCloseTo(400 + 27 * Math.SQRT1_2, 9);
    expect(text.position[1]).toBeCloseTo(300 - 27 * Math.SQRT1_2, 9);
  });

  it("takes the reflex angle when the sweep direction disagrees", () => {
    const [text] = only(record({ ...right, sweepClockwise: true }), "drawText");
    expect(text.text).toBe("270.0°");
  });

  it("shrinks the arc and font to the shorter arm", () => {
    const commands = record({ ...right, arm1: { x: 0.2, y: 0 } });
    const [arc] = only(commands, "strokeArc");
    const [text] = only(commands, "drawText");
    expect(arc.radius).toBeCloseTo(8, 9);
    expect(text.font.size).toBeCloseTo(10 * (8 / 15), 9);
  });

  it("draws nothing when an arm coincides with the vertex", () => {
    expect(record({ ...right, arm2: { x: 0, y: 0 } })).toEqual([]);
  });
});

describe("circleArc", () => {
  const quarter = {
    kind: "circleArc" as const,
    name: "arc",
    center: { x: 0, y: 0 },
    radius: 2,
    point1: { x: 2, y: 0 },
    point2: { x: 0, y: 2 },
    useMajorArc: false,
  };

  it("draws the minor arc counter-clockwise", () => {
    const [arc] = only(record(quarter), "strokeArc");
    expect(arc.center).toEqual([400, 300]);
    expect(arc.radius).toBe(80);
    expect(arc.startAngle).toBe(0);
    expect(arc.endAngle).toBeCloseTo(-Math.PI / 2, 12);
    expect(arc.sweepClockwise).toBe(false);
  });

  it("draws the major arc the other way round", () => {
    const [arc] = only(record({ ...quarter, useMajorArc: true }), "strokeArc");
    expect(arc.endAngle).toBeCloseTo((3 * Math.PI) / 2, 12);
    expect(arc.sweepClockwise).toBe(true);
  });

  it("draws nothing for coincident end points", () => {
    expect(record({ ...quarter, point2: { x: 2, y: 0 } })).toEqual([]);
  });
});

describe("label", () => {
  it("stacks lines along the rotated axis", () => {
    const texts = only(
      record({ kind: "label", name: "L", position: { x: 1, y: -1 }, text: "hello\nworld", rotationDegrees: 15 }),
      "drawText",
    );
    expect(texts.map((t) => t.text)).toEqual(["hello", "world"]);
    expect(texts[0].position).toEqual([440, 340]);

    const step = 14 * 1.2;
    const rad = (15 * Math.PI) / 180;
    expect(texts[1].position[0]).toBeCloseTo(440 + Math.sin(rad) * step, 9);
    expect(texts[1].position[1]).toBeCloseTo(340 + Math.cos(rad) * step, 9);
    expect(texts[1].font.size).toBe(14);
  });

  it("shrinks below its reference scale", () => {
    const [text] = only(
      record({ kind: "label", name: "L", position: { x: 0, y: 0 }, text: "t", referenceScale: 80 }),
      "drawText",
    );
    expect(text.font.size).toBe(7);
  });

  it("draws nothing for empty text", () => {
    expect(record({ kind: "label", name: "L", position: { x: 0, y: 0 }, text: "" })).toEqual([]);
  });
});

describe("function and parametric", () => {
  it("labels the curve just left of its first point", () => {
    const commands = record({
      kind: "function", name: "f", evaluate: (x) => x * x, leftBound: -2, rightBound: 2, samples: 40,
    });
    const [path] = only(commands, "strokePolyline");
    const [text] = only(commands, "drawText");
    const [sx, sy] = path.points[0];

    expect(text.text).toBe("f");
    expect(text.position).toEqual([sx - 10, Math.max(sy, 10)]);
  });

  it("draws nothing for a function that is undefined everywhere", () => {
    expect(record({ kind: "function", name: "f", evaluate: () => NaN, leftBound: -1, rightBound: 1 })).toEqual([]);
  });

  it("samples only the visible window at a screen-sized step when zoomed in", () => {
    const commands = record(
      { kind: "function", name: "", evaluate: Math.sin, leftBound: -100, rightBound: 100 },
      4000,
    );
    const paths = only(commands, "strokePolyline");
    expect(paths).toHaveLength(1);
    const { points } = paths[0];
    expect(points[0][0]).toBeCloseTo(0);
    expect(points[points.length - 1][0]).toBeCloseTo(800);

    let longestChord = 0;
    for (let i = 1; i < points.length; i++) {
      const chord = Math.hypot(points[i][0] - points[i - 1][0], points[i][1] - points[i - 1][1]);
      longestChord = Math.max(longestChord, chord);
    }
    expect(longestChord).toBeLessThan(10);
  });

  it("draws nothing for a function entirely off screen", () => {
    expect(record({ kind: "function", name: "f", evaluate: (x) => x, leftBound: 50, rightBound: 60 })).toEqual([]);
  });

  it("draws a parametric circle as one polyline", () => {
    const commands = record({
      kind: "parametric", name: "", x: Math.cos, y: Math.sin, tMin: 0, tMax: 2 * Math.PI, maxPoints: 9,
    });
    const [path] = only(commands, "strokePolyline");
    expect(commands).toHaveLength(1);
    expect(path.points).toHaveLength(9);
    expect(path.points[0]).toEqual([440, 300]);
  });
});

describe("polygon and coloredArea", () => {
  it("closes the polygon outline", () => {
    expect(
      record({ kind: "polygon", name: "t", vertices: [{ x: 0, y: 0 }, { x: 2, y: 0 }, { x: 1, y: 2 }] }),
    ).toEqual([
      {
        op: "strokePolyline",
        points: [[400, 300], [480, 300], [440, 220], [400, 300]],
        stroke: { color: "black", width: 1, lineJoin: "round" },
      },
    ]);
  });

  it("hides a polygon with any non-finite vertex", () => {
    expect(
      record({ kind: "polygon", name: "t", vertices: [{ x: 0, y: 0 }, { x: NaN, y: 0 }, { x: 1, y: 2 }] }),
    ).toEqual([]);
  });

  it("fills the joined boundaries with the area opacity", () => {
    const area: Drawable = {
      kind: "coloredArea",
      name: "a",
      forward: [{ x: 0, y: 0 }, { x: 1, y: 1 }, { x: 2, y: 0 }],
      reverse: [{ x: 2, y: -1 }, { x: 0, y: -1 }],
    };
    expect(record(area)).toEqual([
      {
        op: "fillJoinedArea",
        forward: [[400, 300], [440, 260], [480, 300]],
        reverse: [[480, 340], [400, 340]],
        fill: { color: "lightblue", opacity: 0.3 },
      },
    ]);
  });

  it("clamps opacity and drops non-finite boundary points", () => {
    const [fill] = only(
      record({
        kind: "coloredArea",
        name: "a",
        forward: [{ x: 0, y: 0 }, { x: Infinity, y: 1 }, { x: 2, y: 0 }],
        reverse: [{ x: 1, y: -1 }],
        opacity: 5,
      }),
      "fillJoinedArea",
    );
    expect(fill.forward).toEqual([[400, 300], [480, 300]]);
    expect(fill.fill.opacity).toBe(1);
  });
});

describe("bar", () => {
  const bar: Drawable = {
    kind: "bar", name: "b", xLeft: 1, xRight: 2, yBottom: 0, yTop: 3,
    color: "#224", labelAbove: "3", labelBelow: "b",
  };

  it("fills the rectangle and strokes it in the bar color", () => {
    expect(record(bar)[0]).toEqual({
      op: "fillPolygon",
      points: [[440, 300], [480, 300], [480, 180], [440, 180]],
      fill: { color: "#88aaff", opacity: undefined },
      stroke: { color: "#224", width: 2 },
      screenSpace: false,
      metadata: undefined,
    });
  });

  it("centers labels just above the top and below the bottom", () => {
    const [, above, below] = record(bar);
    expect(above).toEqual({
      op: "drawText",
      text: "3",
      position: [460, 174],
      font: { family: "Inter, sans-serif", size: 12 },
      color: "#000",
      alignment: { horizontal: "center", vertical: "bottom" },
      styleOverrides: undefined,
      screenSpace: true,
      metadata: { kind: "anchoredText", anchor: { x: 1.5, y: 3 }, offsetX: 0, offsetY: -6 },
    });
    expect(below).toMatchObject({
      text: "b",
      position: [460, 306],
      alignment: { horizontal: "center", vertical: "top" },
      metadata: { kind: "anchoredText", anchor: { x: 1.5, y: 0 }, offsetX: 0, offsetY: 6 },
    });
  });

  it("leaves the outline off without a color and clamps the fill opacity", () => {
    const [fill] = only(
      record({ kind: "bar", name: "b", xLeft: 0, xRight: 1, yBottom: 0, yTop: -2, fillOpacity: 3 }),
      "fillPolygon",
    );
    expect(fill.stroke).toBeUndefined();
    expect(fill.fill).toEqual({ color: "#88aaff", opacity: 1 });
  });

  it("draws nothing for a zero-width or zero-height bar", () => {
    expect(record({ kind: "bar", name: "b", xLeft: 1, xRight: 1, yBottom: 0, yTop: 3 })).toEqual([]);
    expect(record({ kind: "bar", name: "b", xLeft: 0, xRight: 1, yBottom: 2, yTop: 2 })).toEqual([]);
  });
});

describe("degenerate input", () => {
  const degenerate: Drawable[] = [
    { kind: "point", name: "p", x: NaN, y: Infinity },
    { kind: "segment", name: "s", p1: { x: NaN, y: 0 }, p2: { x: 1, y: 1 } },
    { kind: "segment", name: "s0", p1: { x: 1, y: 1 }, p2: { x: 1, y: 1 } },
    { kind: "circle", name: "c", center: { x: 0, y: 0 }, radius: NaN },
    { kind: "ellipse", name: "e", center: { x: 0, y: 0 }, radiusX: 0, radiusY: 1, rotationDegrees: NaN },
    { kind: "vector", name: "v", origin: { x: 0, y: 0 }, tip: { x: NaN, y: 0 } },
    { kind: "angle", name: "a", vertex: { x: NaN, y: 0 }, arm1: { x: 1, y: 0 }, arm2: { x: 0, y: 1 }, sweepClockwise: true },
    { kind: "angle", name: "a0", vertex: { x: 0, y: 0 }, arm1: { x: 0, y: 0 }, arm2: { x: 0, y: 0 }, sweepClockwise: false },
    {
      kind: "circleArc", name: "ca", center: { x: 0, y: 0 }, radius: 0,
      point1: { x: 1, y: 0 }, point2: { x: 0, y: 1 }, useMajorArc: false,
    },
    { kind: "label", name: "l", position: { x: 0, y: 0 }, text: "x", fontSize: NaN, rotationDegrees: NaN },
    { kind: "function", name: "f", evaluate: () => { throw new Error("boom"); }, leftBound: NaN, rightBound: 1 },
    { kind: "function", name: "g", evaluate: (x) => 1 / x, leftBound: 1, rightBound: 1 },
    { kind: "parametric", name: "p", x: () => NaN, y: Math.sin, tMin: 0, tMax: 1 },
    { kind: "polygon", name: "poly", vertices: [] },
    { kind: "coloredArea", name: "area", forward: [], reverse: [{ x: NaN, y: NaN }], opacity: NaN },
    { kind: "cartesianGrid", name: "grid", width: 0, height: 600 },
    { kind: "cartesianGrid", name: "grid2", width: 800, height: 600, tickSpacing: NaN },
    { kind: "polarGrid", name: "polar", width: 800, height: NaN },
    { kind: "polarGrid", name: "polar2", width: 800, height: 600, radialSpacing: 0, angularDivisions: NaN },
    { kind: "bar", name: "bar", xLeft: NaN, xRight: 1, yBottom: 0, yTop: 1 },
    { kind: "functionsArea", name: "fa", upper: () => NaN, lower: null, leftBound: 0, rightBound: 1 },
    { kind: "segmentsArea", name: "sa", segment1: { p1: { x: 0, y: Infinity }, p2: { x: 1, y: 1 } } },
    {
      kind: "functionSegmentArea", name: "fsa", curve: () => { throw new Error("boom"); },
      segment: { p1: { x: 0, y: 0 }, p2: { x: 1, y: 0 } },
    },
    {
      kind: "closedShapeArea", name: "csa",
      shape: { type: "circleSegment", center: { x: 0, y: 0 }, radius: 1, chord: { p1: { x: 5, y: 5 }, p2: { x: 6, y: 6 } } },
    },
  ];

  it.each(degenerate.map((d): [string, Drawable] => [d.name, d]))(
    "%s renders without throwing or emitting non-finite geometry",
    (_name, drawable) => {
      let commands: PlanCommand[] = [];
      expect(() => {
        commands = record(drawable);
      }).not.toThrow();
      for (const n of numbersIn(commands)) {
        expect(Number.isFinite(n)).toBe(true);
      }
    },
  );
});
