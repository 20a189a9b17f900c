/**
 * Typed identifiers for driver resources.
 *
 * Driver handles from different resource kinds can't be compared with each
 * other, and two ids are only equal if they are the same object.
 */

export type ResourceKind = "program" | "texture" | "framebuffer";

let nextValue = 1;

export class ResourceId<K extends ResourceKind> {
  readonly kind: K;
  /** Unique, increasing number; only used for logging */
  readonly value: number;

  constructor(kind: K) {
    this.kind = kind;
    this.value = nextValue++;
  }

  toString(): string {
    return `${this.kind}#${this.value}`;
  }
}

export type ProgramId = ResourceId<"program">;
export type TextureId = ResourceId<"texture">;
export type FramebufferId = ResourceId<"framebuffer">;
