import type { RGBA } from "./GLColor";
import { growCapacity } from "./GLBuffers";
import { LINE_VERT, LINE_FRAG } from "./shaders";

export type GLDrawMode = "lines" | "lineStrip" | "points";

/**
 * The only GL surface the WebGL backend talks to. Vertices are interleaved
 * x,y pairs in screen pixels.
 */
export interface GLLineEngine {
  readonly width: number;
  readonly height: number;
  resize(width: number, height: number): void;
  clear(): void;
  draw(mode: GLDrawMode, vertices: Float32Array, color: RGBA, pointSize: number): void;
  destroy(): void;
}

/** Linked line/point program with the locations draw() sets every call. */
interface LineProgram {
  program: WebGLProgram;
  position: number;
  resolution: WebGLUniformLocation | null;
  pointSize: WebGLUniformLocation | null;
  color: WebGLUniformLocation | null;
}

const INITIAL_BUFFER_BYTES = 64 * 1024;

/**
 * GLLineEngine over a WebGL2 context: one program, one streamed vertex
 * buffer, one draw call per batch.
 */
export class WebGLLineEngine implements GLLineEngine {
  private canvas: HTMLCanvasElement;
  private gl: WebGL2RenderingContext;
  private line: LineProgram;
  private vertexBuffer: WebGLBuffer;
  private bufferBytes = INITIAL_BUFFER_BYTES;
  private vao: WebGLVertexArrayObject;

  constructor(canvas: HTMLCanvasElement) {
    const gl = canvas.getContext("webgl2", { alpha: true, premultipliedAlpha: true, antialias: true });
    if (!gl) throw new Error("WebGL not available");
    this.canvas = canvas;
    this.gl = gl;
    this.line = linkLineProgram(gl);

    const buffer = gl.createBuffer();
    const vao = gl.createVertexArray();
    if (!buffer || !vao) throw new Error("Failed to allocate WebGL vertex storage");
    this.vertexBuffer = buffer;
    this.vao = vao;

    gl.bindVertexArray(vao);
    gl.bindBuffer(gl.ARRAY_BUFFER, buffer);
    gl.bufferData(gl.ARRAY_BUFFER, this.bufferBytes, gl.STREAM_DRAW);
    gl.enableVertexAttribArray(this.line.position);
    gl.vertexAttribPointer(this.line.position, 2, gl.FLOAT, false, 0, 0);
    gl.bindVertexArray(null);

    gl.enable(gl.BLEND);
    gl.blendFunc(gl.ONE, gl.ONE_MINUS_SRC_ALPHA);
    gl.viewport(0, 0, canvas.width, canvas.height);
  }

  get width(): number { return this.canvas.width; }
  get height(): number { return this.canvas.height; }

  resize(width: number, height: number): void {
    this.canvas.width = width;
    this.canvas.height = height;
    this.gl.viewport(0, 0, width, height);
  }

  clear(): void {
    const gl = this.gl;
    gl.clearColor(0, 0, 0, 0);
    gl.clear(gl.COLOR_BUFFER_BIT);
  }

  draw(mode: GLDrawMode, vertices: Float32Array, color: RGBA, pointSize: number): void {
    const count = vertices.length / 2;
    if (count === 0) return;
    const gl = this.gl;
    const { program, resolution, pointSize: size, color: rgba } = this.line;

    gl.useProgram(program);
    if (resolution) gl.uniform2f(resolution, this.canvas.width || 1, this.canvas.height || 1);
    if (size) gl.uniform1f(size, pointSize);
    if (rgba) gl.uniform4f(rgba, color[0], color[1], color[2], color[3]);

    gl.bindVertexArray(this.vao);
    this.streamVertices(vertices);
    gl.drawArrays(toGLMode(gl, mode), 0, count);
    gl.bindVertexArray(null);
  }

  destroy(): void {
    const gl = this.gl;
    gl.deleteBuffer(this.vertexBuffer);
    gl.deleteVertexArray(this.vao);
    gl.deleteProgram(this.line.program);
  }

  /** Write the batch at offset 0, reallocating only when it outgrows the buffer. */
  private streamVertices(vertices: Float32Array): void {
    const gl = this.gl;
    gl.bindBuffer(gl.ARRAY_BUFFER, this.vertexBuffer);
    if (vertices.byteLength > this.bufferBytes) {
      this.bufferBytes = growCapacity(this.bufferBytes, vertices.byteLength);
      gl.bufferData(gl.ARRAY_BUFFER, this.bufferBytes, gl.STREAM_DRAW);
    }
    gl.bufferSubData(gl.ARRAY_BUFFER, 0, vertices);
  }
}

function linkLineProgram(gl: WebGL2RenderingContext): LineProgram {
  const vert = compileStage(gl, gl.VERTEX_SHADER, LINE_VERT);
  const frag = compileStage(gl, gl.FRAGMENT_SHADER, LINE_FRAG);
  const program = gl.createProgram();
  if (!program) throw new Error("Failed to create WebGL program");
  gl.attachShader(program, vert);
  gl.attachShader(program, frag);
  gl.linkProgram(program);
  // Linked programs keep their own copy of the stages.
  gl.deleteShader(vert);
  gl.deleteShader(frag);

  if (!gl.getProgramParameter(program, gl.LINK_STATUS)) {
    const log = gl.getProgramInfoLog(program);
    gl.deleteProgram(program);
    throw new Error(`Line program failed to link: ${log}`);
  }

  const position = gl.getAttribLocation(program, "a_position");
  return {
    program,
    position: position >= 0 ? position : 0,
    resolution: gl.getUniformLocation(program, "u_resolution"),
    pointSize: gl.getUniformLocation(program, "u_pointSize"),
    color: gl.getUniformLocation(program, "u_color"),
  };
}

function compileStage(gl: WebGL2RenderingContext, stage: number, source: string): WebGLShader {
  const shader = gl.createShader(stage);
  if (!shader) throw new Error("Failed to create WebGL shader");
  gl.shaderSource(shader, source);
  gl.compileShader(shader);
  if (!gl.getShaderParameter(shader, gl.COMPILE_STATUS)) {
    const log = gl.getShaderInfoLog(shader);
    gl.deleteShader(shader);
    const name = stage === gl.VERTEX_SHADER ? "Line vertex" : "Line fragment";
    throw new Error(`${name} shader failed to compile: ${log}`);
  }
  return shader;
}

function toGLMode(gl: WebGL2RenderingContext, mode: GLDrawMode): number {
  switch (mode) {
    case "lines": return gl.LINES;
    case "lineStrip": return gl.LINE_STRIP;
    case "points": return gl.POINTS;
  }
}
