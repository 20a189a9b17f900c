/**
 * Offscreen framebuffers with a single color attachment
 */

import { createLogger } from "../log";
import type { Vec2 } from "../math/vec2";
import {
  GL_COLOR_ATTACHMENT0,
  GL_COLOR_BUFFER_BIT,
  GL_DRAW_FRAMEBUFFER,
  GL_FRAMEBUFFER,
  GL_FRAMEBUFFER_COMPLETE,
  GL_FRAMEBUFFER_INCOMPLETE_ATTACHMENT,
  GL_FRAMEBUFFER_INCOMPLETE_MISSING_ATTACHMENT,
  GL_FRAMEBUFFER_UNSUPPORTED,
  GL_MAX_SAMPLES,
  GL_NEAREST,
  GL_READ_FRAMEBUFFER,
  GL_RENDERBUFFER,
} from "./constants";
import type { GlContext } from "./GlContext";
import { Rect } from "./Rect";
import { ResourceId, type FramebufferId } from "./ResourceId";
import { Surface } from "./Surface";
import { internalFormatOf, Texture2d, type TextureFormat, type TextureOptions } from "./Texture2d";

const log = createLogger("Framebuffer");

/** Either a texture or a renderbuffer */
export interface FramebufferAttachment {
  readonly size: Vec2;
  /** Attach to `COLOR_ATTACHMENT0` of the bound framebuffer */
  attachToFramebuffer(): void;
  destroy(): void;
}

/** Multisampled color storage that can only be blitted from */
export class Renderbuffer implements FramebufferAttachment {
  readonly context: GlContext;
  readonly handle: WebGLRenderbuffer;
  readonly size: Vec2;
  readonly samples: number;

  constructor(context: GlContext, size: Vec2, format: TextureFormat) {
    const gl = context.gl;
    const handle = gl.createRenderbuffer();
    if (!handle) {
      throw new Error("Failed to create renderbuffer");
    }
    this.context = context;
    this.handle = handle;
    this.size = [size[0], size[1]];

    const maxSamples: unknown = gl.getParameter(GL_MAX_SAMPLES);
    this.samples = typeof maxSamples === "number" ? maxSamples : 0;

    gl.bindRenderbuffer(GL_RENDERBUFFER, handle);
    gl.renderbufferStorageMultisample(
      GL_RENDERBUFFER,
      this.samples,
      internalFormatOf(format),
      size[0],
      size[1]
    );
  }

  attachToFramebuffer(): void {
    this.context.gl.framebufferRenderbuffer(
      GL_FRAMEBUFFER,
      GL_COLOR_ATTACHMENT0,
      GL_RENDERBUFFER,
      this.handle
    );
  }

  destroy(): void {
    this.context.gl.deleteRenderbuffer(this.handle);
  }
}

function incompleteReason(status: GLenum): string {
  switch (status) {
    case GL_FRAMEBUFFER_INCOMPLETE_ATTACHMENT:
      return "incomplete attachment";
    case GL_FRAMEBUFFER_INCOMPLETE_MISSING_ATTACHMENT:
      return "incomplete missing attachment";
    case GL_FRAMEBUFFER_UNSUPPORTED:
      return "unsupported";
    default:
      return "unknown reason";
  }
}

export class Framebuffer<A extends FramebufferAttachment> extends Surface {
  readonly context: GlContext;
  readonly handle: WebGLFramebuffer;
  readonly id: FramebufferId = new ResourceId("framebuffer");
  readonly attachment: A;

  private readonly viewportRect: Rect;
  private _destroyed = false;

  /** A framebuffer rendering into a new texture */
  static withTexture(
    context: GlContext,
    size: Vec2,
    options: Partial<TextureOptions> = {}
  ): Framebuffer<Texture2d> {
    return new Framebuffer(context, Texture2d.empty(context, size, options));
  }

  /** A multisampled framebuffer; blit it to a texture-backed one to sample it */
  static withRenderbuffer(
    context: GlContext,
    size: Vec2,
    format: TextureFormat
  ): Framebuffer<Renderbuffer> {
    return new Framebuffer(context, new Renderbuffer(context, size, format));
  }

  /** Takes ownership of `attachment`, which is destroyed if the framebuffer is incomplete */
  constructor(context: GlContext, attachment: A) {
    super();
    const gl = context.gl;
    const handle = gl.createFramebuffer();
    if (!handle) {
      throw new Error("Failed to create framebuffer");
    }

    // Binding FRAMEBUFFER replaces both the draw and the read binding
    gl.bindFramebuffer(GL_FRAMEBUFFER, handle);
    context.cache.invalidateFramebuffers();
    attachment.attachToFramebuffer();

    const status = gl.checkFramebufferStatus(GL_FRAMEBUFFER);
    if (status !== GL_FRAMEBUFFER_COMPLETE) {
      gl.deleteFramebuffer(handle);
      attachment.destroy();
      const message = `Framebuffer not complete: ${incompleteReason(status)}`;
      log.error(message);
      throw new Error(message);
    }

    this.context = context;
    this.handle = handle;
    this.attachment = attachment;
    this.viewportRect = new Rect([0, 0], attachment.size);
  }

  bind(context: GlContext): void {
    if (this._destroyed) {
      throw new Error("Cannot bind destroyed framebuffer");
    }
    if (!context.cache.useFramebuffer(this.id)) return;
    context.gl.bindFramebuffer(GL_DRAW_FRAMEBUFFER, this.handle);
    context.viewport(this.viewportRect);
  }

  bindRead(context: GlContext): void {
    if (this._destroyed) {
      throw new Error("Cannot bind destroyed framebuffer");
    }
    if (!context.cache.useReadFramebuffer(this.id)) return;
    context.gl.bindFramebuffer(GL_READ_FRAMEBUFFER, this.handle);
  }

  size(): Vec2 {
    return [this.attachment.size[0], this.attachment.size[1]];
  }

  /**
   * Copy the whole color attachment to another surface. The destination must
   * not be multisampled.
   */
  blitTo(surface: Surface): void {
    if (this._destroyed) {
      throw new Error("Cannot blit destroyed framebuffer");
    }
    const context = this.context;
    this.bindRead(context);
    surface.bind(context);
    const [w, h] = this.attachment.size;
    context.gl.blitFramebuffer(0, 0, w, h, 0, 0, w, h, GL_COLOR_BUFFER_BIT, GL_NEAREST);
  }

  /** Deletes the framebuffer and its attachment */
  destroy(): void {
    if (this._destroyed) return;
    this.context.gl.deleteFramebuffer(this.handle);
    this.context.cache.forget(this.id);
    this.attachment.destroy();
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }
}
