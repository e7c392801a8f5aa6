import type { BackendType } from "../types";
import type { RendererStyle } from "../settings/RendererStyle";
import { DEFAULT_STYLE } from "../settings/RendererStyle";
import type { RendererSettings } from "../settings/RendererSettings";
import type { PlanRenderer } from "./PlanRenderer";
import { Canvas2DRenderer } from "./Canvas2DRenderer";
import { SvgRenderer } from "./SvgRenderer";
import { WebGLRenderer } from "./WebGLRenderer";

export const DEFAULT_BACKEND_CHAIN: readonly BackendType[] = ["canvas2d", "svg", "webgl"];

export interface CreateRendererOptions {
  /** Tried before the default chain. Falls back to `settings.preferredBackend`. */
  preferred?: BackendType | null;
  style?: Readonly<RendererStyle>;
  settings?: Partial<RendererSettings> | null;
}

/**
 * Backends in the order they will be attempted: the preferred one first,
 * then the default chain without repeats.
 */
export function backendChain(preferred: BackendType | null | undefined): BackendType[] {
  const chain: BackendType[] = preferred ? [preferred] : [];
  for (const type of DEFAULT_BACKEND_CHAIN) {
    if (!chain.includes(type)) chain.push(type);
  }
  return chain;
}

/**
 * Create a renderer inside `container`, walking the backend chain until a
 * constructor succeeds. Returns null when every backend fails.
 */
export function createRenderer(
  container: HTMLElement,
  options: CreateRendererOptions = {},
): PlanRenderer | null {
  const style = options.style ?? DEFAULT_STYLE;
  const settings = options.settings ?? null;
  const preferred = options.preferred ?? settings?.preferredBackend ?? null;

  for (const type of backendChain(preferred)) {
    try {
      return createBackend(type, container, style, settings);
    } catch (e) {
      console.warn(`${type} renderer creation failed, trying next backend:`, e);
    }
  }
  return null;
}

function createBackend(
  type: BackendType,
  container: HTMLElement,
  style: Readonly<RendererStyle>,
  settings: Partial<RendererSettings> | null,
): PlanRenderer {
  if (type === "svg") return SvgRenderer.inContainer(container, style, settings);

  const canvas = document.createElement("canvas");
  canvas.width = container.clientWidth || 300;
  canvas.height = container.clientHeight || 150;
  const renderer =
    type === "webgl"
      ? new WebGLRenderer(canvas, style, settings)
      : new Canvas2DRenderer(canvas, style, settings);
  container.appendChild(canvas);
  return renderer;
}
