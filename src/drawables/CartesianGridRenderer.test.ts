import {
  snapTickSpacing,
  computeTickSpacing,
  tickPrecision,
  formatTickValue,
  renderCartesianGrid,
} from "./CartesianGridRenderer";
import { RecordingPrimitives } from "../rendering/RecordingPrimitives";
import { DEFAULT_STYLE } from "../settings/RendererStyle";
import type { CartesianGridDrawable } from "../types";
import type { PlanCommand } from "../plan/PlanCommand";
import { makeMapper } from "../plan/__tests__/planFixtures";

const grid: CartesianGridDrawable = { kind: "cartesianGrid", name: "grid", width: 800, height: 600 };

function record(drawable: CartesianGridDrawable, scale = 40): PlanCommand[] {
  const recorder = new RecordingPrimitives();
  renderCartesianGrid(recorder, drawable, makeMapper(scale), DEFAULT_STYLE);
  return recorder.commands;
}

function texts(commands: PlanCommand[]): string[] {
  return commands.flatMap((c) => (c.op === "drawText" ? [c.text] : []));
}

describe("tick math", () => {
  it("snaps to 1, 2.5, 5 or 10 times a power of ten", () => {
    expect(snapTickSpacing(0.3)).toBe(0.5);
    expect(snapTickSpacing(2.5)).toBe(2.5);
    expect(snapTickSpacing(3)).toBe(5);
    expect(snapTickSpacing(7)).toBe(10);
    expect(snapTickSpacing(100)).toBe(100);
    expect(snapTickSpacing(0)).toBe(1);
  });

  it("derives spacing from the target pixel gap and tick count", () => {
    expect(computeTickSpacing(grid, 40, DEFAULT_STYLE)).toBe(2.5);
    expect(computeTickSpacing(grid, 400, DEFAULT_STYLE)).toBe(0.25);
  });

  it("uses an explicit spacing when valid", () => {
    expect(computeTickSpacing({ ...grid, tickSpacing: 1 }, 40, DEFAULT_STYLE)).toBe(1);
    expect(computeTickSpacing({ ...grid, tickSpacing: -1 }, 40, DEFAULT_STYLE)).toBe(2.5);
  });

  it("picks enough decimals to separate ticks", () => {
    expect(tickPrecision(2.5)).toBe(0);
    expect(tickPrecision(0.25)).toBe(1);
    expect(tickPrecision(0.05)).toBe(2);
  });

  it("formats tick values compactly", () => {
    expect(formatTickValue(0, 2)).toBe("0");
    expect(formatTickValue(3, 0)).toBe("3");
    expect(formatTickValue(2.5, 1)).toBe("2.5");
    expect(formatTickValue(5, 1)).toBe("5");
    expect(formatTickValue(-0.75, 2)).toBe("-0.75");
    expect(formatTickValue(1e7, 0)).toBe("1.0e+7");
    expect(formatTickValue(0.0005, 2)).toBe("5.0e-4");
  });
});

describe("renderCartesianGrid", () => {
  it("draws both axes through the origin first", () => {
    const [xAxis, yAxis] = record({ ...grid, tickSpacing: 1 });
    expect(xAxis).toEqual({
      op: "strokeLine", start: [0, 300], end: [800, 300], stroke: { color: "black", width: 1 }, includeWidth: true,
    });
    expect(yAxis).toEqual({
      op: "strokeLine", start: [400, 0], end: [400, 600], stroke: { color: "black", width: 1 }, includeWidth: true,
    });
  });

  it("labels every major line once and the origin as O", () => {
    const labels = texts(record({ ...grid, tickSpacing: 1 }));
    // 21 vertical majors (-10..10) plus 15 horizontal majors (-7..7) minus the shared origin
    expect(labels).toHaveLength(35);
    expect(labels.filter((l) => l === "O")).toHaveLength(1);
    expect(labels).toEqual(expect.arrayContaining(["-10", "1", "10", "-7", "7"]));
  });

  it("places the origin label below and right of the axes crossing", () => {
    const origin = record({ ...grid, tickSpacing: 1 }).find((c) => c.op === "drawText" && c.text === "O");
    expect(origin?.op === "drawText" && origin.position).toEqual([402, 311]);
  });

  it("collapses to bare axes when lines would be too dense", () => {
    expect(record({ ...grid, tickSpacing: 1e-6 }, 0.01)).toHaveLength(2);
  });

  it("follows the view", () => {
    const mapper = makeMapper(40);
    mapper.applyPan(20, 0);
    const recorder = new RecordingPrimitives();
    renderCartesianGrid(recorder, { ...grid, tickSpacing: 1 }, mapper, DEFAULT_STYLE);
    expect(recorder.commands[1]).toMatchObject({ start: [420, 0], end: [420, 600] });
  });

  it("draws nothing for an empty viewport", () => {
    expect(record({ ...grid, width: 0 })).toEqual([]);
  });
});
