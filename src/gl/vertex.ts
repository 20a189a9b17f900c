/**
 * Vertex layouts
 *
 * A layout names each attribute with its size in floats, and writes a vertex
 * into a flat float array in the same order.
 *
 * @example
 * interface TexturedVert { pos: Vec2; uv: Vec2 }
 *
 * const texturedLayout: VertexLayout<TexturedVert> = {
 *   attributes: [["pos", 2], ["uv", 2]],
 *   write(v, out) {
 *     writeVec2(v.pos, out);
 *     writeVec2(v.uv, out);
 *   },
 * };
 */

import type { Vec2 } from "../math/vec2";

export type Attributes = readonly (readonly [name: string, size: number])[];

export interface VertexLayout<V> {
  readonly attributes: Attributes;
  write(vertex: V, out: number[]): void;
}

export function attributeStride(attributes: Attributes): number {
  let stride = 0;
  for (const [, size] of attributes) {
    stride += size;
  }
  return stride;
}

export function writeVec2(v: Vec2, out: number[]): void {
  out.push(v[0], v[1]);
}

export function writeVec3(v: readonly [number, number, number], out: number[]): void {
  out.push(v[0], v[1], v[2]);
}

export function writeVec4(v: readonly [number, number, number, number], out: number[]): void {
  out.push(v[0], v[1], v[2], v[3]);
}

/** Write a column-major 4x4 matrix; pairs with an attribute of size 16 */
export function writeMat4(m: Float32Array, out: number[]): void {
  for (let i = 0; i < 16; i++) {
    out.push(m[i] ?? 0);
  }
}
