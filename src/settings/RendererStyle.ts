export interface RendererStyle {
  // Typography
  fontFamily: string;

  // Points
  pointColor: string;
  pointRadius: number;          // Screen px
  pointLabelFontSize: number;   // Screen px

  // Free labels
  labelTextColor: string;
  labelFontSize: number;
  labelVanishFontSize: number;  // Labels shrunk to this size or below are hidden
  labelLineHeightFactor: number;

  // Segments / polygons
  segmentColor: string;
  segmentStrokeWidth: number;
  polygonColor: string;
  polygonStrokeWidth: number;

  // Circles / ellipses / arcs
  circleColor: string;
  circleStrokeWidth: number;
  ellipseColor: string;
  ellipseStrokeWidth: number;
  circleArcColor: string;
  circleArcStrokeWidth: number;
  circleArcRadiusScale: number;

  // Vectors
  vectorColor: string;
  vectorStrokeWidth: number;
  vectorTipSize: number;        // Screen px, arrowhead edge length

  // Angles
  angleColor: string;
  angleStrokeWidth: number;
  angleArcRadius: number;       // Screen px
  angleTextArcRadiusFactor: number;
  angleLabelFontSize: number;

  // Functions
  functionColor: string;
  functionStrokeWidth: number;
  functionLabelFontSize: number;
  functionPixelStep: number;    // Target screen px between function samples
  functionMinSamples: number;
  functionMaxSamples: number;
  functionMaxSamplesDetailed: number; // Cap for tall or oscillating curves
  parametricMaxPoints: number;

  // Areas
  areaFillColor: string;
  areaOpacity: number;          // 0-1
  areaSamples: number;          // Points along a curve boundary
  areaShapeSamples: number;     // Points around a full circle or ellipse
  areaArcSamples: number;       // Points along a circle or ellipse segment's arc

  // Cartesian grid
  cartesianAxisColor: string;
  cartesianGridColor: string;
  cartesianLabelColor: string;
  cartesianTickSize: number;    // Half-length of a tick mark, px
  cartesianTickFontSize: number;
  cartesianDefaultTickSpacing: number; // Target screen px between major lines
  cartesianMaxTicks: number;

  // Polar grid
  polarAxisColor: string;
  polarCircleColor: string;
  polarRadialColor: string;
  polarLabelColor: string;
  polarLabelFontSize: number;
  polarAngularDivisions: number;
  polarMaxCircles: number;      // Target circle count across the visible radius

  // Bars
  barFillColor: string;
  barStrokeWidth: number;
  barLabelColor: string;
  barLabelFontSize: number;
  barLabelPadding: number;      // Screen px between a bar edge and its label

  canvasBackgroundColor: string;
}

const BASE_FONT_SIZE = 16;

export const DEFAULT_STYLE: Readonly<RendererStyle> = Object.freeze({
  fontFamily: "Inter, sans-serif",

  pointColor: "black",
  pointRadius: 2,
  pointLabelFontSize: BASE_FONT_SIZE * 5 / 8,

  labelTextColor: "black",
  labelFontSize: BASE_FONT_SIZE * 0.875,
  labelVanishFontSize: 2,
  labelLineHeightFactor: 1.2,

  segmentColor: "black",
  segmentStrokeWidth: 1,
  polygonColor: "black",
  polygonStrokeWidth: 1,

  circleColor: "black",
  circleStrokeWidth: 1,
  ellipseColor: "black",
  ellipseStrokeWidth: 1,
  circleArcColor: "black",
  circleArcStrokeWidth: 1,
  circleArcRadiusScale: 1,

  vectorColor: "black",
  vectorStrokeWidth: 1,
  vectorTipSize: 8,

  angleColor: "blue",
  angleStrokeWidth: 1,
  angleArcRadius: 15,
  angleTextArcRadiusFactor: 1.8,
  angleLabelFontSize: BASE_FONT_SIZE * 5 / 8,

  functionColor: "black",
  functionStrokeWidth: 1,
  functionLabelFontSize: BASE_FONT_SIZE * 5 / 8,
  functionPixelStep: 5,
  functionMinSamples: 50,
  functionMaxSamples: 200,
  functionMaxSamplesDetailed: 1500,
  parametricMaxPoints: 800,

  areaFillColor: "lightblue",
  areaOpacity: 0.3,
  areaSamples: 100,
  areaShapeSamples: 96,
  areaArcSamples: 64,

  cartesianAxisColor: "black",
  cartesianGridColor: "lightgrey",
  cartesianLabelColor: "grey",
  cartesianTickSize: 3,
  cartesianTickFontSize: 8,
  cartesianDefaultTickSpacing: 100,
  cartesianMaxTicks: 10,

  polarAxisColor: "#000",
  polarCircleColor: "lightgrey",
  polarRadialColor: "lightgrey",
  polarLabelColor: "grey",
  polarLabelFontSize: 8,
  polarAngularDivisions: 12,
  polarMaxCircles: 10,

  barFillColor: "#88aaff",
  barStrokeWidth: 2,
  barLabelColor: "#000",
  barLabelFontSize: 12,
  barLabelPadding: 6,

  canvasBackgroundColor: "#ffffff",
});

/**
 * Merge a partial style with defaults. The result is frozen; callers
 * derive new styles with withStyle() instead of mutating.
 */
export function mergeStyle(overrides: Partial<RendererStyle> | null): Readonly<RendererStyle> {
  if (!overrides) return DEFAULT_STYLE;
  return Object.freeze({ ...DEFAULT_STYLE, ...overrides });
}

/**
 * Derive a new style from an existing one.
 */
export function withStyle(
  base: Readonly<RendererStyle>,
  overrides: Partial<RendererStyle>,
): Readonly<RendererStyle> {
  return Object.freeze({ ...base, ...overrides });
}
