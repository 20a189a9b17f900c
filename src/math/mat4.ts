/**
 * 4x4 Matrix utilities
 * Matrices are stored in column-major order (WebGL convention)
 *
 * Column-major layout:
 * [0]  [4]  [8]  [12]     m00 m10 m20 m30
 * [1]  [5]  [9]  [13]  =  m01 m11 m21 m31
 * [2]  [6]  [10] [14]     m02 m12 m22 m32
 * [3]  [7]  [11] [15]     m03 m13 m23 m33
 */

import type { Vec2 } from "./vec2";

export type Mat4 = Float32Array;

/** Create an identity matrix */
export function create(): Mat4 {
  const m = new Float32Array(16);
  m[0] = 1;
  m[5] = 1;
  m[10] = 1;
  m[15] = 1;
  return m;
}

/** Multiply two matrices: out = a * b */
export function multiply(a: Mat4, b: Mat4): Mat4 {
  const out = new Float32Array(16);
  for (let col = 0; col < 4; col++) {
    const b0 = b[col * 4]!,
      b1 = b[col * 4 + 1]!,
      b2 = b[col * 4 + 2]!,
      b3 = b[col * 4 + 3]!;
    for (let row = 0; row < 4; row++) {
      out[col * 4 + row] =
        b0 * a[row]! + b1 * a[4 + row]! + b2 * a[8 + row]! + b3 * a[12 + row]!;
    }
  }
  return out;
}

/** Create a translation matrix */
export function translate(x: number, y: number, z: number): Mat4 {
  const out = create();
  out[12] = x;
  out[13] = y;
  out[14] = z;
  return out;
}

/** Create a scale matrix */
export function scale(sx: number, sy: number, sz: number): Mat4 {
  const out = new Float32Array(16);
  out[0] = sx;
  out[5] = sy;
  out[10] = sz;
  out[15] = 1;
  return out;
}

/** Create an orthographic projection matrix */
export function ortho(
  left: number,
  right: number,
  bottom: number,
  top: number,
  near: number,
  far: number
): Mat4 {
  const out = new Float32Array(16);
  const lr = 1 / (left - right);
  const bt = 1 / (bottom - top);
  const nf = 1 / (near - far);

  out[0] = -2 * lr;
  out[5] = -2 * bt;
  out[10] = 2 * nf;
  out[12] = (left + right) * lr;
  out[13] = (top + bottom) * bt;
  out[14] = (far + near) * nf;
  out[15] = 1;

  return out;
}

/** Transform a point in the z=0 plane (w=1) and drop z */
export function transformPoint2(m: Mat4, p: Vec2): Vec2 {
  const x = p[0],
    y = p[1];
  const w = m[3]! * x + m[7]! * y + m[15]!;
  const invW = w ? 1 / w : 1;

  return [(m[0]! * x + m[4]! * y + m[12]!) * invW, (m[1]! * x + m[5]! * y + m[13]!) * invW];
}
