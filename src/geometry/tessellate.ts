/**
 * Polygon tessellation using earcut
 */

import earcut from "earcut";
import type { Vec2 } from "../math/vec2";

export type Ring = readonly Vec2[];

export interface Tessellation {
  /** Outer ring points followed by each hole's points */
  points: Vec2[];
  /** Triangle indices into `points` */
  indices: number[];
}

/**
 * Tessellate a polygon (with optional holes) into triangles. Rings need not
 * be closed and may wind either way.
 */
export function tessellatePolygon(outer: Ring, holes: readonly Ring[] = []): Tessellation {
  const coords: number[] = [];
  const holeIndices: number[] = [];
  const points: Vec2[] = [];

  for (const [x, y] of outer) {
    coords.push(x, y);
    points.push([x, y]);
  }

  for (const hole of holes) {
    holeIndices.push(points.length);
    for (const [x, y] of hole) {
      coords.push(x, y);
      points.push([x, y]);
    }
  }

  const indices = earcut(coords, holeIndices.length > 0 ? holeIndices : undefined, 2);

  return { points, indices };
}
