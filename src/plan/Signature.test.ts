import { computeSignature } from "./Signature";
import type { Drawable, MapState } from "../types";

const state: MapState = { scale: 40, offsetX: 0, offsetY: 0, originX: 400, originY: 300 };

describe("computeSignature", () => {
  it("is stable for equal drawables", () => {
    const a: Drawable = { kind: "segment", name: "s", p1: { x: 0, y: 0 }, p2: { x: 1, y: 2 } };
    const b: Drawable = { kind: "segment", name: "s", p1: { x: 0, y: 0 }, p2: { x: 1, y: 2 } };
    expect(computeSignature(a, state)).toBe(computeSignature(b, state));
  });

  it("does not depend on key order", () => {
    const a: Drawable = { kind: "point", name: "P", x: 1, y: 2 };
    const b: Drawable = { y: 2, x: 1, name: "P", kind: "point" };
    expect(computeSignature(a, state)).toBe(computeSignature(b, state));
  });

  it("changes when geometry or style changes", () => {
    const a: Drawable = { kind: "point", name: "P", x: 1, y: 2 };
    expect(computeSignature({ ...a, x: 1.5 }, state)).not.toBe(computeSignature(a, state));
    expect(computeSignature({ ...a, color: "red" }, state)).not.toBe(computeSignature(a, state));
  });

  it("ignores the view for ordinary drawables", () => {
    const a: Drawable = { kind: "circle", name: "c", center: { x: 0, y: 0 }, radius: 1 };
    expect(computeSignature(a, { ...state, offsetX: 50, scale: 2 })).toBe(computeSignature(a, state));
  });

  it("includes the view for the Cartesian grid", () => {
    const grid: Drawable = { kind: "cartesianGrid", name: "grid", width: 800, height: 600 };
    expect(computeSignature(grid, state)).toBe(
      'cartesianGrid|{height:600,kind:"cartesianGrid",name:"grid",width:800}|view:40.000,0.000,0.000,400.000,300.000',
    );
    expect(computeSignature(grid, { ...state, offsetX: 5 })).not.toBe(computeSignature(grid, state));
  });

  it("uses the expression instead of function source when present", () => {
    const f1: Drawable = {
      kind: "function", name: "f", evaluate: (x) => x * x, expression: "x^2", leftBound: -1, rightBound: 1,
    };
    const f2: Drawable = { ...f1, evaluate: (x) => Math.pow(x, 2) };
    expect(computeSignature(f1, state)).toBe(computeSignature(f2, state));
    expect(computeSignature({ ...f1, expression: "x^3" }, state)).not.toBe(computeSignature(f1, state));
  });

  it("keys functions by identity without an expression", () => {
    const make = (k: number) => (x: number) => k * x;
    const f1: Drawable = { kind: "function", name: "f", evaluate: make(1), leftBound: -1, rightBound: 1 };
    const f2: Drawable = { ...f1, evaluate: make(2) };
    expect(computeSignature(f1, state)).not.toBe(computeSignature(f2, state));
    expect(computeSignature({ ...f1 }, state)).toBe(computeSignature(f1, state));
  });

  it("includes the view and visible window for sampled functions", () => {
    const f: Drawable = {
      kind: "function", name: "f", evaluate: Math.sin, expression: "sin(x)", leftBound: -5, rightBound: 5,
    };
    const visible = { left: -10, right: 10, top: 7.5, bottom: -7.5 };
    expect(computeSignature(f, state, visible)).toBe(
      'function|{evaluate:fn,expression:"sin(x)",kind:"function",leftBound:-5,name:"f",rightBound:5}' +
        "|view:40.000,0.000,0.000,400.000,300.000|window:-10.000,10.000,7.500,-7.500",
    );
    expect(computeSignature(f, state, { ...visible, left: -9 })).not.toBe(computeSignature(f, state, visible));
  });

  it("normalizes negative zero", () => {
    const a: Drawable = { kind: "point", name: "P", x: -0, y: 0 };
    const b: Drawable = { kind: "point", name: "P", x: 0, y: 0 };
    expect(computeSignature(a, state)).toBe(computeSignature(b, state));
  });
});
