/**
 * Render targets: the abstract Surface and the canvas-backed ScreenSurface
 */

import type { Vec2 } from "../math/vec2";
import {
  GL_COLOR_BUFFER_BIT,
  GL_DEPTH_BUFFER_BIT,
  GL_DRAW_FRAMEBUFFER,
  GL_READ_FRAMEBUFFER,
} from "./constants";
import type { GlContext } from "./GlContext";
import { Rect } from "./Rect";
import { ResourceId, type FramebufferId } from "./ResourceId";
import { createLogger } from "../log";

const log = createLogger("ScreenSurface");

/** RGBA clear color, written to the framebuffer as-is */
export type ClearColor = [number, number, number, number];

export type ClearBuffer = { kind: "color"; color: ClearColor } | { kind: "depth" };

export function clearColor(color: ClearColor): ClearBuffer {
  return { kind: "color", color };
}

export const CLEAR_DEPTH: ClearBuffer = { kind: "depth" };

/**
 * Something that can be drawn to. Subclasses implement the cached binds.
 */
export abstract class Surface {
  /** Bind as the draw framebuffer (and set the viewport) unless already bound */
  abstract bind(context: GlContext): void;

  /** Bind as the read framebuffer unless already bound */
  abstract bindRead(context: GlContext): void;

  abstract size(): Vec2;

  get width(): number {
    return this.size()[0];
  }

  get height(): number {
    return this.size()[1];
  }

  clear(context: GlContext, buffers: readonly ClearBuffer[]): void {
    if (buffers.length === 0) {
      throw new Error("Surface.clear needs at least one buffer");
    }
    this.bind(context);
    let bits = 0;
    for (const buffer of buffers) {
      if (buffer.kind === "color") {
        bits |= GL_COLOR_BUFFER_BIT;
        const [r, g, b, a] = buffer.color;
        context.gl.clearColor(r, g, b, a);
      } else {
        bits |= GL_DEPTH_BUFFER_BIT;
      }
    }
    context.gl.clear(bits);
  }
}

export type WindowMode = "fullscreen" | "windowed";

/**
 * The canvas's default framebuffer.
 */
export class ScreenSurface extends Surface {
  readonly canvas: HTMLCanvasElement;
  readonly id: FramebufferId = new ResourceId("framebuffer");

  private readonly context: GlContext;
  private _size: Vec2;
  private viewportRect: Rect;
  private _grabCursor = false;
  private _windowMode: WindowMode = "windowed";

  constructor(context: GlContext, canvas: HTMLCanvasElement) {
    super();
    this.context = context;
    this.canvas = canvas;
    this._size = [canvas.width, canvas.height];
    this.viewportRect = new Rect([0, 0], this._size);
  }

  bind(context: GlContext): void {
    if (!context.cache.useFramebuffer(this.id)) return;
    context.gl.bindFramebuffer(GL_DRAW_FRAMEBUFFER, null);
    context.viewport(this.viewportRect);
  }

  bindRead(context: GlContext): void {
    if (!context.cache.useReadFramebuffer(this.id)) return;
    context.gl.bindFramebuffer(GL_READ_FRAMEBUFFER, null);
  }

  size(): Vec2 {
    return [this._size[0], this._size[1]];
  }

  /**
   * Resize the canvas. Typically called in response to a `windowResized`
   * event. The viewport follows at once when the screen is bound.
   */
  setSize(size: Vec2): void {
    this.canvas.width = size[0];
    this.canvas.height = size[1];
    this._size = [size[0], size[1]];
    this.viewportRect = new Rect([0, 0], this._size);
    if (this.context.cache.boundFramebuffer === this.id) {
      this.context.viewport(this.viewportRect);
    }
  }

  get grabCursor(): boolean {
    return this._grabCursor;
  }

  /** Hide and capture the cursor through the pointer lock API */
  setGrabCursor(grab: boolean): void {
    this._grabCursor = grab;
    if (grab) {
      // Returns a promise in newer browsers and nothing in older ones
      Promise.resolve(this.canvas.requestPointerLock()).catch((err: unknown) => {
        log.warn("Pointer lock request failed", err);
      });
    } else if (typeof document !== "undefined" && document.pointerLockElement === this.canvas) {
      document.exitPointerLock();
    }
  }

  get windowMode(): WindowMode {
    return this._windowMode;
  }

  async setWindowMode(mode: WindowMode): Promise<void> {
    if (mode === "fullscreen") {
      await this.canvas.requestFullscreen();
    } else if (typeof document !== "undefined" && document.fullscreenElement) {
      await document.exitFullscreen();
    }
    this._windowMode = mode;
  }
}
