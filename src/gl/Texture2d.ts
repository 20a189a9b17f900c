/**
 * 2D textures
 */

import type { Vec2 } from "../math/vec2";
import {
  GL_CLAMP_TO_EDGE,
  GL_COLOR_ATTACHMENT0,
  GL_FRAMEBUFFER,
  GL_LINEAR,
  GL_LINEAR_MIPMAP_LINEAR,
  GL_LINEAR_MIPMAP_NEAREST,
  GL_NEAREST,
  GL_NEAREST_MIPMAP_LINEAR,
  GL_NEAREST_MIPMAP_NEAREST,
  GL_R8,
  GL_RED,
  GL_REPEAT,
  GL_RGB,
  GL_RGB8,
  GL_RGBA,
  GL_RGBA8,
  GL_SRGB8,
  GL_SRGB8_ALPHA8,
  GL_TEXTURE0,
  GL_TEXTURE_2D,
  GL_TEXTURE_MAG_FILTER,
  GL_TEXTURE_MIN_FILTER,
  GL_TEXTURE_WRAP_S,
  GL_TEXTURE_WRAP_T,
  GL_UNSIGNED_BYTE,
} from "./constants";
import type { GlContext } from "./GlContext";
import { ResourceId, type TextureId } from "./ResourceId";

export type TextureFormat = "red" | "rgb" | "rgba" | "srgb" | "srgba";

const FORMAT_MAP: Record<TextureFormat, { internalFormat: GLenum; format: GLenum }> = {
  red: { internalFormat: GL_R8, format: GL_RED },
  rgb: { internalFormat: GL_RGB8, format: GL_RGB },
  rgba: { internalFormat: GL_RGBA8, format: GL_RGBA },
  srgb: { internalFormat: GL_SRGB8, format: GL_RGB },
  srgba: { internalFormat: GL_SRGB8_ALPHA8, format: GL_RGBA },
};

export function internalFormatOf(format: TextureFormat): GLenum {
  return FORMAT_MAP[format].internalFormat;
}

export function pixelFormatOf(format: TextureFormat): GLenum {
  return FORMAT_MAP[format].format;
}

export function isSrgbFormat(format: TextureFormat): boolean {
  return format === "srgb" || format === "srgba";
}

export type MinFilter =
  | "nearest"
  | "linear"
  | "nearestMipmapNearest"
  | "nearestMipmapLinear"
  | "linearMipmapNearest"
  | "linearMipmapLinear";

export type MagFilter = "nearest" | "linear";

export type WrapMode = "clampToEdge" | "repeat";

const MIN_FILTER_MAP: Record<MinFilter, GLenum> = {
  nearest: GL_NEAREST,
  linear: GL_LINEAR,
  nearestMipmapNearest: GL_NEAREST_MIPMAP_NEAREST,
  nearestMipmapLinear: GL_NEAREST_MIPMAP_LINEAR,
  linearMipmapNearest: GL_LINEAR_MIPMAP_NEAREST,
  linearMipmapLinear: GL_LINEAR_MIPMAP_LINEAR,
};

const MAG_FILTER_MAP: Record<MagFilter, GLenum> = {
  nearest: GL_NEAREST,
  linear: GL_LINEAR,
};

const WRAP_MAP: Record<WrapMode, GLenum> = {
  clampToEdge: GL_CLAMP_TO_EDGE,
  repeat: GL_REPEAT,
};

export function hasMipmap(filter: MinFilter): boolean {
  return filter !== "nearest" && filter !== "linear";
}

export interface TextureOptions {
  format: TextureFormat;
  minFilter: MinFilter;
  magFilter: MagFilter;
  wrapMode: WrapMode;
}

export const DEFAULT_TEXTURE_OPTIONS: TextureOptions = {
  format: "srgba",
  minFilter: "linear",
  magFilter: "linear",
  wrapMode: "clampToEdge",
};

/** Images that can be uploaded straight from the browser */
export type TextureImage = HTMLImageElement | HTMLCanvasElement | ImageBitmap;

export class Texture2d {
  readonly context: GlContext;
  readonly handle: WebGLTexture;
  readonly id: TextureId = new ResourceId("texture");
  readonly size: Vec2;
  readonly format: TextureFormat;

  private _destroyed = false;

  /** An uninitialized texture, typically rendered to through a framebuffer */
  static empty(
    context: GlContext,
    size: Vec2,
    options: Partial<TextureOptions> = {}
  ): Texture2d {
    const resolved = { ...DEFAULT_TEXTURE_OPTIONS, ...options };
    if (hasMipmap(resolved.minFilter)) {
      throw new Error("Empty textures cannot use a mipmapped min filter");
    }
    return new Texture2d(context, size, resolved, (gl) => {
      gl.texImage2D(
        GL_TEXTURE_2D,
        0,
        internalFormatOf(resolved.format),
        size[0],
        size[1],
        0,
        pixelFormatOf(resolved.format),
        GL_UNSIGNED_BYTE,
        null
      );
    });
  }

  /** Upload a decoded browser image; the size comes from the image */
  static fromImage(
    context: GlContext,
    image: TextureImage,
    options: Partial<TextureOptions> = {}
  ): Texture2d {
    const resolved = { ...DEFAULT_TEXTURE_OPTIONS, ...options };
    return new Texture2d(context, [image.width, image.height], resolved, (gl) => {
      gl.texImage2D(
        GL_TEXTURE_2D,
        0,
        internalFormatOf(resolved.format),
        pixelFormatOf(resolved.format),
        GL_UNSIGNED_BYTE,
        image
      );
    });
  }

  /** Upload raw, tightly packed pixel data */
  static fromData(
    context: GlContext,
    size: Vec2,
    data: Uint8Array,
    options: Partial<TextureOptions> = {}
  ): Texture2d {
    const resolved = { ...DEFAULT_TEXTURE_OPTIONS, ...options };
    return new Texture2d(context, size, resolved, (gl) => {
      gl.texImage2D(
        GL_TEXTURE_2D,
        0,
        internalFormatOf(resolved.format),
        size[0],
        size[1],
        0,
        pixelFormatOf(resolved.format),
        GL_UNSIGNED_BYTE,
        data
      );
    });
  }

  private constructor(
    context: GlContext,
    size: Vec2,
    options: TextureOptions,
    upload: (gl: WebGL2RenderingContext) => void
  ) {
    const gl = context.gl;
    const handle = gl.createTexture();
    if (!handle) {
      throw new Error("Failed to create texture");
    }

    this.context = context;
    this.handle = handle;
    this.size = [size[0], size[1]];
    this.format = options.format;

    // Binds to whatever unit is active, so every cached binding is suspect
    gl.bindTexture(GL_TEXTURE_2D, handle);
    context.cache.clearBoundTextures();
    upload(gl);

    gl.texParameteri(GL_TEXTURE_2D, GL_TEXTURE_MIN_FILTER, MIN_FILTER_MAP[options.minFilter]);
    gl.texParameteri(GL_TEXTURE_2D, GL_TEXTURE_MAG_FILTER, MAG_FILTER_MAP[options.magFilter]);
    gl.texParameteri(GL_TEXTURE_2D, GL_TEXTURE_WRAP_S, WRAP_MAP[options.wrapMode]);
    gl.texParameteri(GL_TEXTURE_2D, GL_TEXTURE_WRAP_T, WRAP_MAP[options.wrapMode]);
    if (hasMipmap(options.minFilter)) {
      gl.generateMipmap(GL_TEXTURE_2D);
    }
  }

  get width(): number {
    return this.size[0];
  }

  get height(): number {
    return this.size[1];
  }

  /** True if the texture stores sRGB-encoded texels */
  get isSrgb(): boolean {
    return isSrgbFormat(this.format);
  }

  /** Replace every texel */
  setContents(format: TextureFormat, data: Uint8Array): void {
    this.setPartialContents(format, 0, 0, this.size[0], this.size[1], data);
  }

  /** Replace a sub-rectangle of texels */
  setPartialContents(
    format: TextureFormat,
    x: number,
    y: number,
    width: number,
    height: number,
    data: Uint8Array
  ): void {
    this.bind(0);
    this.context.gl.texSubImage2D(
      GL_TEXTURE_2D,
      0,
      x,
      y,
      width,
      height,
      pixelFormatOf(format),
      GL_UNSIGNED_BYTE,
      data
    );
  }

  /** Bind to a texture unit unless it already holds this texture */
  bind(unit: number): void {
    if (this._destroyed) {
      throw new Error("Cannot bind destroyed texture");
    }
    const { gl, cache } = this.context;
    if (!cache.useTexture(unit, GL_TEXTURE_2D, this.id)) return;
    if (cache.useActiveTextureUnit(unit)) {
      gl.activeTexture(GL_TEXTURE0 + unit);
    }
    gl.bindTexture(GL_TEXTURE_2D, this.handle);
  }

  /** Attach as the color attachment of the bound framebuffer */
  attachToFramebuffer(): void {
    this.context.gl.framebufferTexture2D(
      GL_FRAMEBUFFER,
      GL_COLOR_ATTACHMENT0,
      GL_TEXTURE_2D,
      this.handle,
      0
    );
  }

  destroy(): void {
    if (this._destroyed) return;
    this.context.gl.deleteTexture(this.handle);
    this.context.cache.forget(this.id);
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }
}
