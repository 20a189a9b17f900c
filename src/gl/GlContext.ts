/**
 * GlContext - owns the WebGL2 context and its bind-state cache
 */

import { createLogger, setLogLevel, type LogLevel } from "../log";
import { Buffer } from "./Buffer";
import {
  GL_BLEND,
  GL_CONTEXT_LOST_WEBGL,
  GL_CULL_FACE,
  GL_DEPTH_TEST,
  GL_INVALID_ENUM,
  GL_INVALID_FRAMEBUFFER_OPERATION,
  GL_INVALID_OPERATION,
  GL_INVALID_VALUE,
  GL_NO_ERROR,
  GL_ONE,
  GL_ONE_MINUS_SRC_ALPHA,
  GL_OUT_OF_MEMORY,
  GL_UNMASKED_RENDERER_WEBGL,
  GL_UNMASKED_VENDOR_WEBGL,
  GL_UNPACK_ALIGNMENT,
} from "./constants";
import type { Rect } from "./Rect";
import { StateCache, type DrawMode } from "./StateCache";
import { ScreenSurface } from "./Surface";

const log = createLogger("GlContext");

export interface ContextOptions {
  /** Request a multisampled default framebuffer (default: true) */
  antialias: boolean;
  /** Request a depth buffer on the default framebuffer (default: true) */
  depth: boolean;
  /** Check `getError()` after every draw call (default: false) */
  debug: boolean;
  /** Sets the process-wide log level when given */
  logLevel?: LogLevel;
}

export const DEFAULT_CONTEXT_OPTIONS: ContextOptions = {
  antialias: true,
  depth: true,
  debug: false,
};

export function resolveContextOptions(options: Partial<ContextOptions> = {}): ContextOptions {
  return { ...DEFAULT_CONTEXT_OPTIONS, ...options };
}

export type GlFlag = "depthTest" | "cullFace";

const FLAG_MAP: Record<GlFlag, GLenum> = {
  depthTest: GL_DEPTH_TEST,
  cullFace: GL_CULL_FACE,
};

const ERROR_NAMES: Record<number, string> = {
  [GL_INVALID_ENUM]: "INVALID_ENUM",
  [GL_INVALID_VALUE]: "INVALID_VALUE",
  [GL_INVALID_OPERATION]: "INVALID_OPERATION",
  [GL_OUT_OF_MEMORY]: "OUT_OF_MEMORY",
  [GL_INVALID_FRAMEBUFFER_OPERATION]: "INVALID_FRAMEBUFFER_OPERATION",
  [GL_CONTEXT_LOST_WEBGL]: "CONTEXT_LOST_WEBGL",
};

export class GlContext {
  readonly gl: WebGL2RenderingContext;
  readonly cache = new StateCache();
  readonly options: ContextOptions;
  /** Shared VBO that receives per-instance data for every instanced draw */
  readonly instancedVbo: Buffer;

  /**
   * Create a context for a canvas together with the surface that draws to it.
   */
  static fromCanvas(
    canvas: HTMLCanvasElement,
    options: Partial<ContextOptions> = {}
  ): { context: GlContext; screenSurface: ScreenSurface } {
    const resolved = resolveContextOptions(options);
    const gl = canvas.getContext("webgl2", {
      antialias: resolved.antialias,
      depth: resolved.depth,
    });
    if (!gl) {
      throw new Error("WebGL2 not supported");
    }
    const context = new GlContext(gl, resolved);
    return { context, screenSurface: new ScreenSurface(context, canvas) };
  }

  constructor(gl: WebGL2RenderingContext, options: Partial<ContextOptions> = {}) {
    this.gl = gl;
    this.options = resolveContextOptions(options);
    if (this.options.logLevel) {
      setLogLevel(this.options.logLevel);
    }

    // Premultiplied alpha everywhere
    gl.enable(GL_BLEND);
    gl.blendFunc(GL_ONE, GL_ONE_MINUS_SRC_ALPHA);
    // Glyph bitmaps and RGB data are tightly packed
    gl.pixelStorei(GL_UNPACK_ALIGNMENT, 1);

    this.instancedVbo = new Buffer(gl, "array");
    this.instancedVbo.bind();

    this.logRendererInfo();
  }

  private logRendererInfo(): void {
    const ext = this.gl.getExtension("WEBGL_debug_renderer_info");
    if (!ext) {
      log.debug("Context created");
      return;
    }
    log.debug(
      `Context created on ${String(this.gl.getParameter(GL_UNMASKED_VENDOR_WEBGL))} / ${String(
        this.gl.getParameter(GL_UNMASKED_RENDERER_WEBGL)
      )}`
    );
  }

  /** Set the viewport. Surfaces call this when they are bound. */
  viewport(rect: Rect): void {
    this.gl.viewport(rect.start[0], rect.start[1], rect.width, rect.height);
  }

  enable(flag: GlFlag): void {
    this.gl.enable(FLAG_MAP[flag]);
  }

  disable(flag: GlFlag): void {
    this.gl.disable(FLAG_MAP[flag]);
  }

  /** Apply the culling/depth state for a draw mode, skipping it when unchanged */
  bindDrawMode(mode: DrawMode): void {
    if (!this.cache.useDrawMode(mode)) return;
    if (mode.kind === "2d") {
      this.disable("cullFace");
      this.disable("depthTest");
    } else {
      this.enable("cullFace");
      if (mode.depth) {
        this.enable("depthTest");
      } else {
        this.disable("depthTest");
      }
    }
  }

  /** Throw if the driver has recorded an error since the last check */
  checkForErrors(): void {
    const err = this.gl.getError();
    if (err !== GL_NO_ERROR) {
      const name = ERROR_NAMES[err] ?? "UNKNOWN_ERROR";
      const message = `WebGL error: ${name} (0x${err.toString(16)})`;
      log.error(message);
      throw new Error(message);
    }
  }

  /** Called after each draw call; only checks for errors in debug mode */
  afterDraw(): void {
    if (this.options.debug) {
      this.checkForErrors();
    }
  }

  destroy(): void {
    this.instancedVbo.destroy();
  }
}
