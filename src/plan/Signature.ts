import type { Drawable, DrawableKind, MapState } from "../types";
import type { VisibleBounds } from "../mapping/CoordinateMapper";
import { quantizeMapState } from "./MapState";

/** Kinds whose geometry is derived from the view rather than only reprojected by it. */
const VIEW_DEPENDENT_KINDS: ReadonlySet<DrawableKind> = new Set<DrawableKind>([
  "cartesianGrid",
  "polarGrid",
  "function",
  "functionsArea",
]);

export function isViewDependent(kind: DrawableKind): boolean {
  return VIEW_DEPENDENT_KINDS.has(kind);
}

const functionIds = new WeakMap<object, number>();
let nextFunctionId = 1;

/**
 * Deterministic fingerprint of everything that shapes a drawable's plan.
 *
 * The view transform is left out so pan and zoom reuse the cached plan.
 * View-dependent kinds (grids, sampled functions) are the exception: the
 * quantized map state and visible window are part of their signature.
 *
 * Function-valued fields contribute the drawable's `expression` when it
 * has one. Otherwise each function is keyed by identity, since two
 * closures with the same source can capture different values.
 */
export function computeSignature(
  drawable: Drawable,
  mapState: MapState,
  visible?: VisibleBounds,
): string {
  const hasExpression = "expression" in drawable && typeof drawable.expression === "string";
  const body = serialize(drawable, hasExpression);
  if (!isViewDependent(drawable.kind)) {
    return `${drawable.kind}|${body}`;
  }
  const view = `${drawable.kind}|${body}|view:${quantizeMapState(mapState)}`;
  if (!visible) return view;
  const window = [visible.left, visible.right, visible.top, visible.bottom]
    .map((v) => v.toFixed(3))
    .join(",");
  return `${view}|window:${window}`;
}

function functionKey(fn: object): string {
  let id = functionIds.get(fn);
  if (id === undefined) {
    id = nextFunctionId++;
    functionIds.set(fn, id);
  }
  return `fn#${id}`;
}

function serialize(value: unknown, skipFunctions: boolean): string {
  switch (typeof value) {
    case "number":
      return Object.is(value, -0) ? "0" : String(value);
    case "string":
      return JSON.stringify(value);
    case "boolean":
      return value ? "T" : "F";
    case "undefined":
      return "_";
    case "function":
      return skipFunctions ? "fn" : functionKey(value);
    case "object":
      if (value === null) return "null";
      if (Array.isArray(value)) {
        return `[${value.map((item) => serialize(item, skipFunctions)).join(",")}]`;
      }
      return `{${Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, item]) => `${key}:${serialize(item, skipFunctions)}`)
        .join(",")}}`;
    default:
      return String(value);
  }
}
