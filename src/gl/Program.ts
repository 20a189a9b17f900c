/**
 * Shader programs
 */

import { createLogger } from "../log";
import {
  GL_COMPILE_STATUS,
  GL_FRAGMENT_SHADER,
  GL_LINK_STATUS,
  GL_VERTEX_SHADER,
} from "./constants";
import type { GlContext } from "./GlContext";
import { ResourceId, type ProgramId } from "./ResourceId";
import { addShaderHeader, addShaderMinimalHeader } from "./shaderHeader";
import type { GlUniforms, GlUniformsFactory } from "./uniforms";
import type { VertexLayout } from "./vertex";

const log = createLogger("Program");

export type ShaderType = "vertex" | "fragment";

const SHADER_TYPE_MAP: Record<ShaderType, GLenum> = {
  vertex: GL_VERTEX_SHADER,
  fragment: GL_FRAGMENT_SHADER,
};

/** Compile a shader from source */
export function compileShader(
  gl: WebGL2RenderingContext,
  type: ShaderType,
  source: string
): WebGLShader {
  const shader = gl.createShader(SHADER_TYPE_MAP[type]);
  if (!shader) {
    throw new Error("Failed to create shader");
  }

  gl.shaderSource(shader, source);
  gl.compileShader(shader);

  if (!gl.getShaderParameter(shader, GL_COMPILE_STATUS)) {
    const infoLog = gl.getShaderInfoLog(shader) ?? "";
    gl.deleteShader(shader);
    log.error(`Error compiling ${type} shader: ${infoLog}`);
    throw new Error(`Shader compilation failed: ${infoLog}`);
  }

  return shader;
}

/** Compile both stages and link them */
export function linkProgram(
  gl: WebGL2RenderingContext,
  vertexSource: string,
  fragmentSource: string
): WebGLProgram {
  const vs = compileShader(gl, "vertex", vertexSource);
  let fs: WebGLShader;
  try {
    fs = compileShader(gl, "fragment", fragmentSource);
  } catch (err) {
    gl.deleteShader(vs);
    throw err;
  }

  const program = gl.createProgram();
  if (!program) {
    gl.deleteShader(vs);
    gl.deleteShader(fs);
    throw new Error("Failed to create program");
  }

  gl.attachShader(program, vs);
  gl.attachShader(program, fs);
  gl.linkProgram(program);

  // Linked programs keep their own copy of the compiled stages
  gl.deleteShader(vs);
  gl.deleteShader(fs);

  if (!gl.getProgramParameter(program, GL_LINK_STATUS)) {
    const infoLog = gl.getProgramInfoLog(program) ?? "";
    gl.deleteProgram(program);
    log.error(`Error linking program: ${infoLog}`);
    throw new Error(`Program linking failed: ${infoLog}`);
  }

  return program;
}

/**
 * A linked program together with its vertex layout and uniform locations.
 *
 * Programs are shared: any number of meshes can draw with the same one.
 */
export class GlProgram<V, U> {
  readonly context: GlContext;
  readonly handle: WebGLProgram;
  readonly id: ProgramId = new ResourceId("program");
  readonly layout: VertexLayout<V>;
  readonly uniforms: GlUniforms<U>;

  private _destroyed = false;

  constructor(
    context: GlContext,
    layout: VertexLayout<V>,
    uniforms: GlUniformsFactory<U>,
    vertexSource: string,
    fragmentSource: string
  ) {
    this.context = context;
    this.layout = layout;
    this.handle = linkProgram(context.gl, vertexSource, fragmentSource);
    this.uniforms = uniforms(context, this.handle);
  }

  /** Build a program whose sources get the full shared header */
  static withHeader<V, U>(
    context: GlContext,
    layout: VertexLayout<V>,
    uniforms: GlUniformsFactory<U>,
    vertexSource: string,
    fragmentSource: string,
    convertToSrgb: boolean
  ): GlProgram<V, U> {
    return new GlProgram(
      context,
      layout,
      uniforms,
      addShaderHeader("vertex", vertexSource, convertToSrgb),
      addShaderHeader("fragment", fragmentSource, convertToSrgb)
    );
  }

  /** Build a program whose sources get only the version and precision lines */
  static withMinimalHeader<V, U>(
    context: GlContext,
    layout: VertexLayout<V>,
    uniforms: GlUniformsFactory<U>,
    vertexSource: string,
    fragmentSource: string
  ): GlProgram<V, U> {
    return new GlProgram(
      context,
      layout,
      uniforms,
      addShaderMinimalHeader(vertexSource),
      addShaderMinimalHeader(fragmentSource)
    );
  }

  /** Make this the current program unless it already is */
  bind(): void {
    if (this._destroyed) {
      throw new Error("Cannot bind destroyed program");
    }
    if (this.context.cache.useProgram(this.id)) {
      this.context.gl.useProgram(this.handle);
    }
  }

  /** Location of a vertex attribute; throws if the program doesn't use it */
  attribLocation(name: string): number {
    const location = this.context.gl.getAttribLocation(this.handle, name);
    if (location < 0) {
      throw new Error(`Attribute not found: ${name}`);
    }
    return location;
  }

  destroy(): void {
    if (this._destroyed) return;
    this.context.gl.deleteProgram(this.handle);
    this.context.cache.forget(this.id);
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }
}
