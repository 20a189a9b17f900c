import type { Vec2 } from "../math/vec2";

/** Axis-aligned rectangle from `start` (inclusive) to `end` (exclusive) */
export class Rect {
  readonly start: Vec2;
  readonly end: Vec2;

  constructor(start: Vec2, end: Vec2) {
    this.start = [start[0], start[1]];
    this.end = [end[0], end[1]];
  }

  static fromSize(start: Vec2, size: Vec2): Rect {
    return new Rect(start, [start[0] + size[0], start[1] + size[1]]);
  }

  get width(): number {
    return this.end[0] - this.start[0];
  }

  get height(): number {
    return this.end[1] - this.start[1];
  }

  size(): Vec2 {
    return [this.width, this.height];
  }

  containsPoint(p: Vec2): boolean {
    return p[0] >= this.start[0] && p[0] < this.end[0] && p[1] >= this.start[1] && p[1] < this.end[1];
  }

  translate(offset: Vec2): Rect {
    return new Rect(
      [this.start[0] + offset[0], this.start[1] + offset[1]],
      [this.end[0] + offset[0], this.end[1] + offset[1]]
    );
  }

  equals(other: Rect): boolean {
    return (
      this.start[0] === other.start[0] &&
      this.start[1] === other.start[1] &&
      this.end[0] === other.end[0] &&
      this.end[1] === other.end[1]
    );
  }
}
