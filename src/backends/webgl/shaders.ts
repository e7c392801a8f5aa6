/**
 * GLSL sources for the line/point pipeline. Positions arrive in screen
 * pixels and are mapped to clip space with u_resolution.
 */

export const LINE_VERT = `#version 300 es
precision highp float;
uniform vec2 u_resolution;
uniform float u_pointSize;
in vec2 a_position;
void main() {
  vec2 ndc = (a_position / u_resolution) * 2.0 - 1.0;
  gl_Position = vec4(ndc.x, -ndc.y, 0.0, 1.0);
  gl_PointSize = u_pointSize;
}
`;

export const LINE_FRAG = `#version 300 es
precision highp float;
uniform vec4 u_color;
out vec4 fragColor;
void main() {
  fragColor = vec4(u_color.rgb * u_color.a, u_color.a);
}
`;
