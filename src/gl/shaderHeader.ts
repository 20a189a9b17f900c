/**
 * Shared GLSL preamble
 *
 * Every program is GLSL ES 3.00 with high precision. The full header also
 * brings in helpers for 2D vertex positions and (optionally sRGB-encoded)
 * fragment output.
 */

import type { ShaderType } from "./Program";

const MINIMAL_HEADER = `#version 300 es
precision highp float;
precision highp sampler2D;
precision highp samplerCube;
precision highp sampler2DArray;
`;

const VERTEX_HELPERS = `
void writeGlPosition2D(vec4 pos) {
  gl_Position = pos;
}
`;

const FRAGMENT_OUTPUT = `
out vec4 FragColor;
`;

// Colors are premultiplied, so only rgb is encoded
const FRAGMENT_HELPERS_SRGB = `${FRAGMENT_OUTPUT}
void writeColor2D(vec4 color) {
  FragColor = vec4(pow(color.rgb, vec3(1.0 / 2.2)), color.a);
}
`;

const FRAGMENT_HELPERS_LINEAR = `${FRAGMENT_OUTPUT}
void writeColor2D(vec4 color) {
  FragColor = color;
}
`;

/** Prepend only the version and precision lines */
export function addShaderMinimalHeader(source: string): string {
  return `${MINIMAL_HEADER}${source}`;
}

/**
 * Prepend the version, precision and helper functions. Fragment shaders get
 * a `FragColor` output and `writeColor2D`, which gamma-encodes when
 * `convertToSrgb` is set.
 */
export function addShaderHeader(type: ShaderType, source: string, convertToSrgb: boolean): string {
  if (type === "vertex") {
    return `${MINIMAL_HEADER}${VERTEX_HELPERS}${source}`;
  }
  const helpers = convertToSrgb ? FRAGMENT_HELPERS_SRGB : FRAGMENT_HELPERS_LINEAR;
  return `${MINIMAL_HEADER}${helpers}${source}`;
}
