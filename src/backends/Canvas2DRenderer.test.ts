import { Canvas2DRenderer } from "./Canvas2DRenderer";
import { RecordingCanvas } from "./__tests__/RecordingContext2D";
import { DEFAULT_STYLE } from "../settings/RendererStyle";
import type { RendererSettings } from "../settings/RendererSettings";
import type { Drawable } from "../types";
import { makeMapper } from "../plan/__tests__/planFixtures";

const segment: Drawable = { kind: "segment", name: "s", p1: { x: 0, y: 0 }, p2: { x: 3, y: 4 } };
const circle: Drawable = { kind: "circle", name: "c", center: { x: 1, y: 1 }, radius: 2 };
const polygon: Drawable = {
  kind: "polygon", name: "t", vertices: [{ x: 0, y: 0 }, { x: 2, y: 0 }, { x: 1, y: 2 }],
};

function setup(settings: Partial<RendererSettings> | null = null) {
  const canvas = new RecordingCanvas(800, 600);
  const renderer = new Canvas2DRenderer(canvas.asCanvas(), DEFAULT_STYLE, settings);
  return { canvas, ctx: canvas.ctx, renderer };
}

describe("Canvas2DRenderer", () => {
  it("throws when the canvas has no 2D context", () => {
    const canvas = new RecordingCanvas(10, 10);
    jest.spyOn(canvas, "getContext").mockReturnValue(null);
    expect(() => new Canvas2DRenderer(canvas.asCanvas(), DEFAULT_STYLE)).toThrow(
      "Failed to get 2D rendering context",
    );
  });

  it("clears the canvas and replays every visible plan each pass", () => {
    const { ctx, renderer } = setup();
    const mapper = makeMapper();

    renderer.render([segment, circle], mapper);
    expect(ctx.calls[0]).toEqual({ method: "clearRect", args: [0, 0, 800, 600] });
    expect(ctx.callsTo("stroke")).toHaveLength(2);

    ctx.reset();
    const result = renderer.render([segment, circle], mapper);
    expect(result).toEqual({ skipped: false, applied: 2, culled: 0, pruned: 0 });
    expect(ctx.callsTo("stroke")).toHaveLength(2);
  });

  it("wraps each plan in a save/restore batch", () => {
    const { ctx, renderer } = setup();
    renderer.render([segment], makeMapper());
    expect(ctx.methods()).toEqual([
      "clearRect", "save", "beginPath", "moveTo", "lineTo", "stroke", "restore",
    ]);
  });

  it("replays reprojected geometry after a pan", () => {
    const { ctx, renderer } = setup();
    const mapper = makeMapper();
    renderer.render([segment], mapper);

    ctx.reset();
    mapper.applyPan(10, -20);
    renderer.render([segment], mapper);
    expect(ctx.callsTo("moveTo")[0].args).toEqual([410, 280]);
    expect(ctx.callsTo("lineTo")[0].args).toEqual([530, 120]);
    expect(renderer.telemetry.snapshot().planBuilds).toBe(1);
  });

  it("builds plans without group transforms", () => {
    const { renderer } = setup();
    renderer.render([segment], makeMapper());
    expect(renderer.getPlan("s")?.supportsTransform).toBe(false);
    expect(renderer.getPlan("s")?.transform).toBeNull();
  });

  describe("layer compositing", () => {
    it("composites once at the end of the pass by default", () => {
      const { ctx, renderer } = setup({ useLayerCompositing: true });
      renderer.render([segment, circle, polygon], makeMapper());

      expect(ctx.callsTo("stroke")).toHaveLength(0);
      expect(ctx.callsTo("drawImage")).toHaveLength(1);
      expect(renderer.telemetry.snapshot().adapterEvents.layer_flush).toBe(1);
    });

    it("flushes every N plans and once more at the end", () => {
      const { ctx, renderer } = setup({ useLayerCompositing: true, offscreenFlushInterval: 2 });
      renderer.render([segment, circle, polygon], makeMapper());

      expect(ctx.callsTo("drawImage")).toHaveLength(2);
    });
  });

  it("releases the layer and clears on destroy", () => {
    const { ctx, renderer } = setup();
    renderer.render([segment], makeMapper());
    ctx.reset();

    renderer.destroy();
    expect(ctx.methods()).toEqual(["clearRect"]);
    expect(renderer.planCount).toBe(0);
    expect(renderer.render([segment], makeMapper()).skipped).toBe(true);
  });
});
