import { SvgPrimitives, SVG_NS, formatNumber, formatPoints, describeArc } from "./SvgPrimitives";
import { RenderTelemetry } from "../plan/RenderTelemetry";

const red = { color: "red", width: 2 };
const alignment = { horizontal: "left", vertical: "alphabetic" } as const;

function setup() {
  const svg = document.createElementNS(SVG_NS, "svg");
  const telemetry = new RenderTelemetry();
  return { svg, telemetry, primitives: new SvgPrimitives(svg, telemetry) };
}

function groupKeys(svg: SVGSVGElement): (string | null)[] {
  return Array.from(svg.children).map((el) => el.getAttribute("data-plan-key"));
}

describe("formatting", () => {
  it("rounds numbers to two decimals without negative zero", () => {
    expect(formatNumber(3.14159)).toBe("3.14");
    expect(formatNumber(2.5)).toBe("2.5");
    expect(formatNumber(10)).toBe("10");
    expect(formatNumber(-0.001)).toBe("0");
  });

  it("keeps the requested number of decimals", () => {
    expect(formatNumber(400.123456)).toBe("400.12");
    expect(formatNumber(400.123456, 4)).toBe("400.1235");
    expect(formatPoints([[0.123456, 1]], 4)).toBe("0.1235,1");
  });

  it("joins points as x,y pairs", () => {
    expect(formatPoints([[1, 2], [3.456, 4]])).toBe("1,2 3.46,4");
  });

  it("describes arcs with the large-arc and sweep flags", () => {
    expect(describeArc([0, 0], 10, 0, Math.PI / 2, true)).toBe("M 10 0 A 10 10 0 0 1 0 10");
    expect(describeArc([0, 0], 10, 0, -Math.PI / 2, false)).toBe("M 10 0 A 10 10 0 0 0 0 -10");
    expect(describeArc([0, 0], 10, 0, (3 * Math.PI) / 2, true)).toBe("M 10 0 A 10 10 0 1 1 0 -10");
  });

  it("splits a full turn into two arcs", () => {
    expect(describeArc([0, 0], 10, 0, 2 * Math.PI, true)).toBe(
      "M 10 0 A 10 10 0 1 1 -10 0 A 10 10 0 1 1 10 0",
    );
  });
});

describe("SvgPrimitives", () => {
  describe("elements", () => {
    it("draws outside a batch into the immediate group", () => {
      const { svg, primitives } = setup();
      primitives.strokeLine([0, 0], [10, 5], red);

      expect(groupKeys(svg)).toEqual(["__immediate__"]);
      const line = svg.querySelector("line");
      expect(line?.getAttribute("x2")).toBe("10");
      expect(line?.getAttribute("y2")).toBe("5");
      expect(line?.getAttribute("stroke")).toBe("red");
      expect(line?.getAttribute("stroke-width")).toBe("2");
    });

    it("writes finer coordinates and non-scaling strokes while group transforms are on", () => {
      const { svg, primitives } = setup();
      primitives.setGroupTransformsEnabled(true);
      primitives.strokeLine([400.123456, 0], [10, 5], red);
      primitives.fillPolygon([[0, 0], [1, 0], [0, 1]], { color: "blue" });

      const line = svg.querySelector("line");
      expect(primitives.groupTransformsEnabled).toBe(true);
      expect(line?.getAttribute("x1")).toBe("400.1235");
      expect(line?.getAttribute("stroke-width")).toBe("2");
      expect(line?.getAttribute("vector-effect")).toBe("non-scaling-stroke");
      expect(svg.querySelector("polygon")?.hasAttribute("vector-effect")).toBe(false);
    });

    it("leaves strokes scalable with group transforms off", () => {
      const { svg, primitives } = setup();
      primitives.strokeLine([400.123456, 0], [10, 5], red);
      const line = svg.querySelector("line");
      expect(line?.getAttribute("x1")).toBe("400.12");
      expect(line?.hasAttribute("vector-effect")).toBe(false);
    });

    it("writes hairlines when the width is excluded", () => {
      const { svg, primitives } = setup();
      primitives.strokeLine([0, 0], [10, 5], red, { includeWidth: false });
      expect(svg.querySelector("line")?.getAttribute("stroke-width")).toBe("1");
    });

    it("rotates ellipses about their center", () => {
      const { svg, primitives } = setup();
      primitives.strokeEllipse([100, 50], 30, 10, -Math.PI / 6, red);

      const ellipse = svg.querySelector("ellipse");
      expect(ellipse?.getAttribute("transform")).toBe("rotate(-30 100 50)");
      expect(ellipse?.getAttribute("fill")).toBe("none");
    });

    it("tags arcs with their CSS class", () => {
      const { svg, primitives } = setup();
      primitives.strokeArc([0, 0], 10, 0, Math.PI / 2, true, red, { cssClass: "angle-arc" });
      const path = svg.querySelector("path");
      expect(path?.getAttribute("class")).toBe("angle-arc");
      expect(path?.getAttribute("d")).toBe("M 10 0 A 10 10 0 0 1 0 10");
    });

    it("sets fill opacity only when translucent", () => {
      const { svg, primitives } = setup();
      primitives.fillCircle([5, 5], 3, { color: "blue", opacity: 0.3 });
      primitives.fillCircle([5, 5], 3, { color: "blue", opacity: 1 });

      const [translucent, opaque] = Array.from(svg.querySelectorAll("circle"));
      expect(translucent.getAttribute("fill-opacity")).toBe("0.3");
      expect(translucent.getAttribute("stroke")).toBe("none");
      expect(opaque.hasAttribute("fill-opacity")).toBe(false);
    });

    it("joins the area boundaries into one polygon", () => {
      const { svg, primitives } = setup();
      primitives.fillJoinedArea([[0, 0], [10, 0]], [[10, 5], [0, 5]], { color: "green", opacity: 0.5 });
      expect(svg.querySelector("polygon")?.getAttribute("points")).toBe("0,0 10,0 10,5 0,5");
    });

    it("writes text attributes, alignment and style overrides", () => {
      const { svg, primitives } = setup();
      primitives.drawText(
        "hi",
        [10, 20],
        { family: "serif", size: 12, weight: "bold" },
        "blue",
        { horizontal: "center", vertical: "top" },
        { styleOverrides: { "font-style": "italic", "letter-spacing": "1px" } },
      );

      const text = svg.querySelector("text");
      expect(text?.textContent).toBe("hi");
      expect(text?.getAttribute("fill")).toBe("blue");
      expect(text?.getAttribute("font-size")).toBe("12");
      expect(text?.getAttribute("font-weight")).toBe("bold");
      expect(text?.getAttribute("text-anchor")).toBe("middle");
      expect(text?.getAttribute("dominant-baseline")).toBe("text-before-edge");
      expect(text?.getAttribute("style")).toBe("font-style: italic; letter-spacing: 1px");
      expect(text?.hasAttribute("transform")).toBe(false);
    });

    it("rotates label text about its position", () => {
      const { svg, primitives } = setup();
      primitives.drawText("hi", [10, 20], { family: "serif", size: 12 }, "black", alignment, {
        metadata: {
          kind: "label",
          anchor: { x: 0, y: 0 },
          lineIndex: 0,
          baseFontSize: 12,
          referenceScale: 1,
          rotationDegrees: 15,
          vanishSize: 2,
          lineHeightFactor: 1.2,
        },
      });
      expect(svg.querySelector("text")?.getAttribute("transform")).toBe("rotate(-15 10 20)");
    });

    it("creates nothing for hidden shapes", () => {
      const { svg, primitives } = setup();
      primitives.strokeArc([0, 0], 0, 0, 1, true, red);
      primitives.drawText("x", [0, 0], { family: "serif", size: 0 }, "black", alignment);
      primitives.fillPolygon([[0, 0], [1, 1]], { color: "red" });
      expect(svg.children).toHaveLength(0);
    });
  });

  describe("plan groups", () => {
    it("reuses pooled elements across replays and trims the excess", () => {
      const { svg, primitives } = setup();
      const target = { planKey: "p" };

      primitives.beginBatch(target);
      primitives.strokeLine([0, 0], [1, 1], red);
      primitives.strokeLine([0, 0], [2, 2], red);
      primitives.endBatch(target);
      const first = primitives.getGroupElement("p")?.querySelector("line");
      expect(primitives.groupElementCount("p")).toBe(2);

      primitives.beginBatch(target);
      primitives.strokeLine([0, 0], [3, 3], red);
      primitives.endBatch(target);

      const lines = svg.querySelectorAll("line");
      expect(lines).toHaveLength(1);
      expect(lines[0]).toBe(first);
      expect(lines[0].getAttribute("x2")).toBe("3");
    });

    it("reserves elements ahead of a replay", () => {
      const { telemetry, primitives } = setup();
      primitives.reserveUsageCounts("p", { strokeLine: 3, drawText: 1 });
      expect(primitives.groupElementCount("p")).toBe(4);
      expect(telemetry.snapshot().adapterEvents.svg_elements_created).toBe(4);

      const target = { planKey: "p" };
      primitives.beginBatch(target);
      primitives.strokeLine([0, 0], [1, 1], red);
      primitives.strokeLine([0, 0], [1, 1], red);
      primitives.strokeLine([0, 0], [1, 1], red);
      primitives.drawText("t", [0, 0], { family: "serif", size: 10 }, "black", alignment);
      primitives.endBatch(target);

      expect(telemetry.snapshot().adapterEvents.svg_elements_created).toBe(4);
      expect(primitives.totalElements).toBe(4);
    });

    it("toggles visibility and transforms", () => {
      const { primitives } = setup();
      primitives.reserveUsageCounts("p", { strokeLine: 1 });
      const group = primitives.getGroupElement("p");

      primitives.setGroupVisible("p", false);
      expect(group?.getAttribute("display")).toBe("none");
      primitives.setGroupVisible("p", true);
      expect(group?.hasAttribute("display")).toBe(false);

      primitives.setGroupTransform("p", "matrix(2 0 0 2 0 0)");
      expect(group?.getAttribute("transform")).toBe("matrix(2 0 0 2 0 0)");
      primitives.setGroupTransform("p", null);
      expect(group?.hasAttribute("transform")).toBe(false);
    });

    it("empties a group in place", () => {
      const { primitives } = setup();
      primitives.reserveUsageCounts("p", { strokeLine: 2 });
      primitives.clearGroup("p");
      expect(primitives.hasGroup("p")).toBe(true);
      expect(primitives.groupElementCount("p")).toBe(0);
    });

    it("drops a group and its elements", () => {
      const { svg, telemetry, primitives } = setup();
      primitives.reserveUsageCounts("p", { strokeLine: 2 });
      primitives.dropGroup("p");

      expect(primitives.hasGroup("p")).toBe(false);
      expect(svg.children).toHaveLength(0);
      expect(telemetry.snapshot().adapterEvents.svg_group_dropped).toBe(1);
    });

    it("reorders groups only when the order changed", () => {
      const { svg, telemetry, primitives } = setup();
      primitives.reserveUsageCounts("a", { strokeLine: 1 });
      primitives.reserveUsageCounts("b", { strokeLine: 1 });
      primitives.reserveUsageCounts("c", { strokeLine: 1 });

      primitives.reorderGroups(["a", "b", "c"]);
      expect(telemetry.snapshot().adapterEvents.svg_reorder).toBeUndefined();

      primitives.reorderGroups(["c", "missing", "a", "b"]);
      expect(groupKeys(svg)).toEqual(["c", "a", "b"]);
      expect(telemetry.snapshot().adapterEvents.svg_reorder).toBe(1);

      primitives.pushGroupToBack("b");
      expect(groupKeys(svg)).toEqual(["b", "c", "a"]);
    });
  });

  describe("surface", () => {
    it("sizes the svg and its view box", () => {
      const { svg, primitives } = setup();
      primitives.resizeSurface(640, 480);
      expect(svg.getAttribute("width")).toBe("640");
      expect(svg.getAttribute("height")).toBe("480");
      expect(svg.getAttribute("viewBox")).toBe("0 0 640 480");
    });

    it("removes every group on clear", () => {
      const { svg, primitives } = setup();
      primitives.reserveUsageCounts("a", { strokeLine: 1 });
      primitives.strokeLine([0, 0], [1, 1], red);
      primitives.clearSurface();
      expect(svg.children).toHaveLength(0);
      expect(primitives.groupCount).toBe(0);
    });
  });
});
