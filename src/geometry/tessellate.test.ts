import { describe, it, expect } from "vitest";
import { tessellatePolygon } from "./tessellate";
import type { Vec2 } from "../math/vec2";

describe("tessellatePolygon", () => {
  it("tessellates a triangle into itself", () => {
    const triangle: Vec2[] = [
      [0, 0],
      [1, 0],
      [0.5, 1],
    ];
    const result = tessellatePolygon(triangle);

    expect(result.points).toEqual(triangle);
    expect([...result.indices].sort()).toEqual([0, 1, 2]);
  });

  it("tessellates a square into 2 triangles", () => {
    const square: Vec2[] = [
      [0, 0],
      [1, 0],
      [1, 1],
      [0, 1],
    ];
    const result = tessellatePolygon(square);

    expect(result.points).toHaveLength(4);
    expect(result.indices).toHaveLength(6);
  });

  it("appends hole points after the outer ring", () => {
    const outer: Vec2[] = [
      [0, 0],
      [10, 0],
      [10, 10],
      [0, 10],
    ];
    const hole: Vec2[] = [
      [2, 2],
      [8, 2],
      [8, 8],
      [2, 8],
    ];

    const result = tessellatePolygon(outer, [hole]);

    expect(result.points).toHaveLength(8);
    expect(result.points[4]).toEqual([2, 2]);
    // A square ring around a square hole needs 8 triangles
    expect(result.indices).toHaveLength(24);
  });

  it("tessellates a concave polygon", () => {
    // L shape: 6 points, 4 triangles
    const shape: Vec2[] = [
      [0, 0],
      [2, 0],
      [2, 1],
      [1, 1],
      [1, 2],
      [0, 2],
    ];

    const result = tessellatePolygon(shape);

    expect(result.indices).toHaveLength(12);
    expect(Math.max(...result.indices)).toBe(5);
  });

  it("returns no triangles for degenerate input", () => {
    const result = tessellatePolygon([
      [0, 0],
      [1, 1],
    ]);

    expect(result.indices).toEqual([]);
  });
});
