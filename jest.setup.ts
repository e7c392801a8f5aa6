/**
 * Jest setup file: polyfills for APIs missing from jsdom.
 */

import { RecordingContext2D } from "./src/backends/__tests__/RecordingContext2D";

// OffscreenCanvas polyfill (jsdom doesn't provide it). The 2D context records
// calls so compositing-layer tests can inspect what was drawn offscreen.
if (typeof globalThis.OffscreenCanvas === "undefined") {
  class OffscreenCanvasPolyfill {
    width: number;
    height: number;
    private ctx: RecordingContext2D | null = null;

    constructor(width: number, height: number) {
      this.width = width;
      this.height = height;
    }

    getContext(type: string): RecordingContext2D | null {
      if (type !== "2d") return null;
      if (!this.ctx) this.ctx = new RecordingContext2D(this);
      return this.ctx;
    }
  }

  Object.assign(globalThis, { OffscreenCanvas: OffscreenCanvasPolyfill });
}
