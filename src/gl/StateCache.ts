/**
 * Bind-state cache
 *
 * Records the last resource bound to each driver slot. Every `use*` call
 * returns true when the caller must issue the driver call (and records the new
 * binding), or false when the slot already holds the requested resource.
 */

import type { FramebufferId, ProgramId, ResourceId, ResourceKind, TextureId } from "./ResourceId";

export const MAX_TEXTURE_UNITS = 32;

export type DrawMode = { kind: "2d" } | { kind: "3d"; depth: boolean };

export const DRAW_2D: DrawMode = { kind: "2d" };

export function draw3d(depth: boolean): DrawMode {
  return { kind: "3d", depth };
}

export function drawModeEquals(a: DrawMode, b: DrawMode): boolean {
  if (a.kind === "2d" || b.kind === "2d") return a.kind === b.kind;
  return a.depth === b.depth;
}

export interface BoundTexture {
  target: GLenum;
  id: TextureId;
}

/**
 * Framebuffer slots also hold the screen surface's id. `null` means the
 * binding is unknown and the next request must reach the driver.
 */
export class StateCache {
  private _drawMode: DrawMode | null = null;
  private _program: ProgramId | null = null;
  private _framebuffer: FramebufferId | null = null;
  private _readFramebuffer: FramebufferId | null = null;
  private _activeUnit: number | null = null;
  private readonly textures: (BoundTexture | null)[] = new Array<BoundTexture | null>(
    MAX_TEXTURE_UNITS
  ).fill(null);

  useDrawMode(mode: DrawMode): boolean {
    if (this._drawMode !== null && drawModeEquals(this._drawMode, mode)) return false;
    this._drawMode = mode;
    return true;
  }

  useProgram(id: ProgramId): boolean {
    if (this._program === id) return false;
    this._program = id;
    return true;
  }

  useFramebuffer(id: FramebufferId): boolean {
    if (this._framebuffer === id) return false;
    this._framebuffer = id;
    return true;
  }

  useReadFramebuffer(id: FramebufferId): boolean {
    if (this._readFramebuffer === id) return false;
    this._readFramebuffer = id;
    return true;
  }

  useActiveTextureUnit(unit: number): boolean {
    checkUnit(unit);
    if (this._activeUnit === unit) return false;
    this._activeUnit = unit;
    return true;
  }

  useTexture(unit: number, target: GLenum, id: TextureId): boolean {
    checkUnit(unit);
    const bound = this.textures[unit];
    if (bound && bound.target === target && bound.id === id) return false;
    this.textures[unit] = { target, id };
    return true;
  }

  /** Texture creation binds to the active unit without going through the cache */
  clearBoundTextures(): void {
    this.textures.fill(null);
  }

  /** Framebuffer creation binds both targets and leaves the viewport untouched */
  invalidateFramebuffers(): void {
    this._framebuffer = null;
    this._readFramebuffer = null;
  }

  /** Drop every reference to a destroyed resource */
  forget(id: ResourceId<ResourceKind>): void {
    if (this._program === id) this._program = null;
    if (this._framebuffer === id) this._framebuffer = null;
    if (this._readFramebuffer === id) this._readFramebuffer = null;
    for (let unit = 0; unit < this.textures.length; unit++) {
      if (this.textures[unit]?.id === id) this.textures[unit] = null;
    }
  }

  get drawMode(): DrawMode | null {
    return this._drawMode;
  }

  get boundProgram(): ProgramId | null {
    return this._program;
  }

  get boundFramebuffer(): FramebufferId | null {
    return this._framebuffer;
  }

  get boundReadFramebuffer(): FramebufferId | null {
    return this._readFramebuffer;
  }

  get activeTextureUnit(): number | null {
    return this._activeUnit;
  }

  boundTexture(unit: number): BoundTexture | null {
    checkUnit(unit);
    return this.textures[unit] ?? null;
  }
}

function checkUnit(unit: number): void {
  if (!Number.isInteger(unit) || unit < 0 || unit >= MAX_TEXTURE_UNITS) {
    throw new Error(`Texture unit ${unit} out of range (0..${MAX_TEXTURE_UNITS - 1})`);
  }
}
