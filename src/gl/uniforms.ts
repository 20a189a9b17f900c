/**
 * Uniform locations
 *
 * A program's uniforms are described by two things: a plain values type `U`
 * and a `GlUniforms<U>` that owns the locations and knows how to upload `U`.
 *
 * @example
 * interface TexturedUniforms { matrix: Mat4; tex: Texture2d }
 *
 * const texturedUniforms: GlUniformsFactory<TexturedUniforms> = (context, program) => {
 *   const matrix = new Matrix4Uniform("matrix", context, program);
 *   const tex = new TextureUniform("tex", context, program);
 *   return {
 *     update(ctx, values) {
 *       matrix.set(ctx, values.matrix);
 *       tex.set(ctx, values.tex, 0);
 *     },
 *   };
 * };
 *
 * Uniforms are uploaded to the currently bound program; `Mesh.draw` binds
 * the program before it calls `update`.
 */

import type { Color4 } from "../gui/Color4";
import type { Mat4 } from "../math/mat4";
import type { Vec2 } from "../math/vec2";
import type { GlContext } from "./GlContext";
import type { Texture2d } from "./Texture2d";

export interface GlUniforms<U> {
  update(context: GlContext, values: U): void;
}

export type GlUniformsFactory<U> = (context: GlContext, program: WebGLProgram) => GlUniforms<U>;

/** Uniforms for programs that take none */
export const emptyUniforms: GlUniformsFactory<void> = () => ({
  update() {},
});

function lookup(name: string, context: GlContext, program: WebGLProgram): WebGLUniformLocation {
  const location = context.gl.getUniformLocation(program, name);
  if (!location) {
    throw new Error(`Uniform not found: ${name}`);
  }
  return location;
}

abstract class UniformBase {
  readonly name: string;
  protected readonly location: WebGLUniformLocation;

  constructor(name: string, context: GlContext, program: WebGLProgram) {
    this.name = name;
    this.location = lookup(name, context, program);
  }
}

export class Matrix4Uniform extends UniformBase {
  set(context: GlContext, matrix: Mat4): void {
    context.gl.uniformMatrix4fv(this.location, false, matrix);
  }
}

export class TextureUniform extends UniformBase {
  /** Point the sampler at `unit` and bind the texture there */
  set(context: GlContext, texture: Texture2d, unit: number): void {
    context.gl.uniform1i(this.location, unit);
    texture.bind(unit);
  }
}

export class Vector2Uniform extends UniformBase {
  set(context: GlContext, value: Vec2): void {
    context.gl.uniform2f(this.location, value[0], value[1]);
  }
}

export class Vector3Uniform extends UniformBase {
  set(context: GlContext, value: readonly [number, number, number]): void {
    context.gl.uniform3f(this.location, value[0], value[1], value[2]);
  }
}

export class Vector4Uniform extends UniformBase {
  set(context: GlContext, value: readonly [number, number, number, number]): void {
    context.gl.uniform4f(this.location, value[0], value[1], value[2], value[3]);
  }
}

export class FloatUniform extends UniformBase {
  set(context: GlContext, value: number): void {
    context.gl.uniform1f(this.location, value);
  }
}

export class Color4Uniform extends UniformBase {
  /**
   * Colors normally stay linear here and the fragment shader encodes its
   * output. Pass `convertToSrgb` to upload the sRGB-encoded color instead.
   */
  set(context: GlContext, color: Color4, convertToSrgb: boolean): void {
    const [r, g, b, a] = convertToSrgb ? color.toSrgb() : color.toArray();
    context.gl.uniform4f(this.location, r, g, b, a);
  }
}
