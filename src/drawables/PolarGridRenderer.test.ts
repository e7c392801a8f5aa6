import { angleLabelRadius, computeRadialSpacing, renderPolarGrid } from "./PolarGridRenderer";
import { RecordingPrimitives } from "../rendering/RecordingPrimitives";
import { DEFAULT_STYLE } from "../settings/RendererStyle";
import type { PolarGridDrawable } from "../types";
import type { PlanCommand } from "../plan/PlanCommand";
import { makeMapper } from "../plan/__tests__/planFixtures";

const grid: PolarGridDrawable = { kind: "polarGrid", name: "polar", width: 800, height: 600 };

function record(drawable: PolarGridDrawable, scale = 40): PlanCommand[] {
  const recorder = new RecordingPrimitives();
  renderPolarGrid(recorder, drawable, makeMapper(scale), DEFAULT_STYLE);
  return recorder.commands;
}

function texts(commands: PlanCommand[]): string[] {
  return commands.flatMap((c) => (c.op === "drawText" ? [c.text] : []));
}

function textAt(commands: PlanCommand[], text: string): readonly [number, number] | undefined {
  const found = commands.find((c) => c.op === "drawText" && c.text === text);
  return found && found.op === "drawText" ? found.position : undefined;
}

describe("computeRadialSpacing", () => {
  it("splits the visible radius into nice steps", () => {
    // Visible corners sit 12.5 units out, so the ideal step is 0.625.
    expect(computeRadialSpacing(grid, makeMapper(40), DEFAULT_STYLE)).toBe(1);
    expect(computeRadialSpacing(grid, makeMapper(400), DEFAULT_STYLE)).toBeCloseTo(0.1, 12);
  });

  it("prefers a valid explicit spacing", () => {
    expect(computeRadialSpacing({ ...grid, radialSpacing: 2 }, makeMapper(40), DEFAULT_STYLE)).toBe(2);
    expect(computeRadialSpacing({ ...grid, radialSpacing: NaN }, makeMapper(40), DEFAULT_STYLE)).toBe(1);
    expect(computeRadialSpacing({ ...grid, radialSpacing: -1 }, makeMapper(40), DEFAULT_STYLE)).toBe(1);
  });
});

describe("angleLabelRadius", () => {
  it("stops short of each edge along the axes", () => {
    expect(angleLabelRadius(400, 300, 800, 600, 0)).toBe(375);
    expect(angleLabelRadius(400, 300, 800, 600, Math.PI / 2)).toBe(285);
    expect(angleLabelRadius(400, 300, 800, 600, Math.PI)).toBe(390);
    expect(angleLabelRadius(400, 300, 800, 600, (3 * Math.PI) / 2)).toBe(285);
  });

  it("takes the nearer of the side and top edges on a diagonal", () => {
    const r = angleLabelRadius(400, 300, 800, 600, Math.PI / 6);
    expect(r).toBeCloseTo(375 / Math.cos(Math.PI / 6), 9);
  });

  it("never pulls a label closer than 30 px", () => {
    expect(angleLabelRadius(790, 300, 800, 600, 0)).toBe(30);
  });
});

describe("renderPolarGrid", () => {
  it("draws axes, circles, rays and labels in order", () => {
    const commands = record(grid);
    // 2 axes, 13 circles, 12 rays, 12 angle labels, 13 radius labels, origin
    expect(commands).toHaveLength(53);
    expect(commands[0]).toEqual({
      op: "strokeLine",
      start: [0, 300],
      end: [800, 300],
      stroke: { color: "#000", width: 1 },
      includeWidth: true,
    });
    expect(commands[1]).toEqual({
      op: "strokeLine",
      start: [400, 0],
      end: [400, 600],
      stroke: { color: "#000", width: 1 },
      includeWidth: true,
    });

    const radii = commands.flatMap((c) => (c.op === "strokeCircle" ? [c.radius] : []));
    expect(radii).toEqual([40, 80, 120, 160, 200, 240, 280, 320, 360, 400, 440, 480, 520]);
    expect(commands.filter((c) => c.op === "strokeLine")).toHaveLength(14);
  });

  it("labels angles near the edge and radii along +x", () => {
    const commands = record(grid);
    expect(texts(commands).slice(0, 12)).toEqual([
      "0°", "30°", "60°", "90°", "120°", "150°", "180°", "210°", "240°", "270°", "300°", "330°",
    ]);
    expect(textAt(commands, "0°")).toEqual([775, 300]);
    expect(textAt(commands, "30°")?.[0]).toBeCloseTo(775, 9);
    expect(textAt(commands, "1")).toEqual([442, 308]);
    expect(textAt(commands, "13")).toEqual([922, 308]);
    expect(textAt(commands, "O")).toEqual([402, 308]);
  });

  it("draws labels in screen space with the polar label style", () => {
    const label = record(grid).find((c) => c.op === "drawText");
    expect(label).toEqual({
      op: "drawText",
      text: "0°",
      position: [775, 300],
      font: { family: "Inter, sans-serif", size: 8 },
      color: "grey",
      alignment: { horizontal: "left", vertical: "alphabetic" },
      styleOverrides: undefined,
      screenSpace: true,
      metadata: undefined,
    });
  });

  it("uses the requested angular divisions and axis color", () => {
    const commands = record({ ...grid, angularDivisions: 4, color: "navy" });
    expect(texts(commands).slice(0, 4)).toEqual(["0°", "90°", "180°", "270°"]);
    expect(commands[0].op === "strokeLine" && commands[0].stroke.color).toBe("navy");
  });

  it("draws nothing for an empty surface", () => {
    expect(record({ ...grid, width: 0 })).toEqual([]);
    expect(record({ ...grid, height: NaN })).toEqual([]);
  });
});
