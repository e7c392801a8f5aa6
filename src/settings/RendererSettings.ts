import type { BackendType } from "../types";

export interface RendererSettings {
  preferredBackend: BackendType | null; // null = default chain
  cullMargin: number;                   // Screen px added around the viewport when culling
  resolveLabelOverlaps: boolean;        // Nudge anchored labels vertically off earlier ones
  labelOverlapStep: number;             // Screen px per nudge

  // Canvas 2D
  useLayerCompositing: boolean;         // Draw into an offscreen layer, flush with drawImage
  offscreenFlushInterval: number;       // Plans drawn between flushes (0 = flush at end of pass only)

  // SVG
  maxRetainedElements: number;          // Element budget across all retained groups
  useGroupTransforms: boolean;          // Reposition math-space plans with a group transform

  // WebGL
  minCurveSegments: number;             // Lower bound when sampling circles/arcs into strips
}

export const DEFAULT_RENDERER_SETTINGS: RendererSettings = {
  preferredBackend: null,
  cullMargin: 1,
  resolveLabelOverlaps: false,
  labelOverlapStep: 12,

  useLayerCompositing: false,
  offscreenFlushInterval: 0,

  maxRetainedElements: 20000,
  useGroupTransforms: true,

  minCurveSegments: 16,
};

/**
 * Merge loaded settings with defaults, ensuring all fields exist.
 */
export function mergeRendererSettings(loaded: Partial<RendererSettings> | null): RendererSettings {
  if (!loaded) return { ...DEFAULT_RENDERER_SETTINGS };
  const merged: RendererSettings = { ...DEFAULT_RENDERER_SETTINGS, ...loaded };
  merged.cullMargin = Math.max(0, merged.cullMargin);
  merged.labelOverlapStep = merged.labelOverlapStep > 0 ? merged.labelOverlapStep : 1;
  merged.offscreenFlushInterval = Math.max(0, Math.floor(merged.offscreenFlushInterval));
  merged.minCurveSegments = Math.max(16, Math.floor(merged.minCurveSegments));
  return merged;
}
