/**
 * 2D vector utilities
 */

/** 2D vector as [x, y] tuple; also used for points and sizes */
export type Vec2 = [number, number];

export function add(a: Vec2, b: Vec2): Vec2 {
  return [a[0] + b[0], a[1] + b[1]];
}

export function subtract(a: Vec2, b: Vec2): Vec2 {
  return [a[0] - b[0], a[1] - b[1]];
}

export function scale(v: Vec2, s: number): Vec2 {
  return [v[0] * s, v[1] * s];
}

export function equals(a: Vec2, b: Vec2): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

/**
 * Normalize a 2D vector.
 * Returns a new normalized vector (does not mutate input).
 */
export function normalize(v: Vec2): Vec2 {
  const len = Math.sqrt(v[0] * v[0] + v[1] * v[1]);
  if (len > 0) {
    return [v[0] / len, v[1] / len];
  }
  return [0, 0];
}

/**
 * The vector rotated a quarter turn counterclockwise in y-down screen space.
 */
export function ccwPerp(v: Vec2): Vec2 {
  return [v[1], -v[0]];
}
