/**
 * Font - text rendering through a glyph atlas
 *
 * Glyphs are rasterized on first use and packed into a single-channel atlas
 * texture. Drawn characters are queued as quads and rendered together with
 * `renderQueued`. Distances are pixels from the top-left corner of the
 * surface unless a custom matrix is used.
 *
 * Creating a font is expensive: make one per family and size and share it.
 */

import type { GlContext } from "../gl/GlContext";
import { Mesh, MeshBuilder } from "../gl/Mesh";
import { GlProgram } from "../gl/Program";
import { DRAW_2D } from "../gl/StateCache";
import type { Surface } from "../gl/Surface";
import { Texture2d } from "../gl/Texture2d";
import { Matrix4Uniform, TextureUniform, type GlUniformsFactory } from "../gl/uniforms";
import { writeVec2, type VertexLayout } from "../gl/vertex";
import { createLogger } from "../log";
import * as mat4 from "../math/mat4";
import type { Mat4 } from "../math/mat4";
import type { Vec2 } from "../math/vec2";
import { writeColor, type Color4 } from "./Color4";
import { computeOrthoMatrix } from "./Draw2d";
import { textFragmentShader, textVertexShader } from "./shaders";

const log = createLogger("Font");

export interface FontMetrics {
  /** Pixels above the baseline */
  ascent: number;
  /** Pixels below the baseline, positive */
  descent: number;
}

/** Coverage bitmap of one glyph, one byte per pixel */
export interface GlyphBitmap {
  width: number;
  height: number;
  /** Offset of the bitmap's left edge from the pen position */
  left: number;
  /** Offset of the bitmap's top edge from the baseline, negative above it */
  top: number;
  data: Uint8Array;
}

/**
 * Source of glyph shapes and metrics. Sizes are in pixels for the font size
 * the rasterizer was made for.
 */
export interface GlyphRasterizer {
  metrics(): FontMetrics;
  advance(char: string): number;
  kerning(a: string, b: string): number;
  /** `null` when the glyph covers no pixels */
  rasterize(char: string): GlyphBitmap | null;
}

/**
 * Rasterizes glyphs by drawing them white on a transparent 2D canvas and
 * keeping the alpha channel.
 */
export class CanvasGlyphRasterizer implements GlyphRasterizer {
  private readonly canvas: HTMLCanvasElement;
  private readonly ctx: CanvasRenderingContext2D;
  private readonly font: string;

  constructor(family: string, size: number, canvas: HTMLCanvasElement = document.createElement("canvas")) {
    const ctx = canvas.getContext("2d", { willReadFrequently: true });
    if (!ctx) {
      throw new Error("2D canvas not supported");
    }
    this.canvas = canvas;
    this.ctx = ctx;
    this.font = `${size}px ${family}`;
  }

  metrics(): FontMetrics {
    const m = this.measure("M");
    return { ascent: m.fontBoundingBoxAscent, descent: m.fontBoundingBoxDescent };
  }

  advance(char: string): number {
    return this.measure(char).width;
  }

  kerning(a: string, b: string): number {
    return this.measure(a + b).width - this.advance(a) - this.advance(b);
  }

  rasterize(char: string): GlyphBitmap | null {
    const m = this.measure(char);
    const left = Math.floor(0 - m.actualBoundingBoxLeft);
    const top = Math.floor(0 - m.actualBoundingBoxAscent);
    const width = Math.ceil(m.actualBoundingBoxRight) - left;
    const height = Math.ceil(m.actualBoundingBoxDescent) - top;
    if (width <= 0 || height <= 0) return null;

    const ctx = this.prepare(width, height);
    ctx.fillText(char, 0 - left, 0 - top);
    const pixels = ctx.getImageData(0, 0, width, height).data;
    const data = new Uint8Array(width * height);
    for (let i = 0; i < data.length; i++) {
      data[i] = pixels[i * 4 + 3] ?? 0;
    }
    return { width, height, left, top, data };
  }

  private measure(text: string): TextMetrics {
    this.ctx.font = this.font;
    return this.ctx.measureText(text);
  }

  private prepare(width: number, height: number): CanvasRenderingContext2D {
    // Resizing a canvas resets its context state
    if (this.canvas.width < width) this.canvas.width = width;
    if (this.canvas.height < height) this.canvas.height = height;
    const ctx = this.ctx;
    ctx.clearRect(0, 0, width, height);
    ctx.font = this.font;
    ctx.textBaseline = "alphabetic";
    ctx.fillStyle = "#fff";
    return ctx;
  }
}

export interface FontOptions {
  /** CSS font family */
  family: string;
  /** Pixel size */
  size: number;
  /** Width and height of the glyph atlas (default: 1024) */
  atlasSize: number;
  /** Defaults to a `CanvasGlyphRasterizer` for `family` and `size` */
  rasterizer?: GlyphRasterizer;
}

export const DEFAULT_ATLAS_SIZE = 1024;

export interface TextVert {
  pos: Vec2;
  uv: Vec2;
  color: Color4;
}

export const textLayout: VertexLayout<TextVert> = {
  attributes: [
    ["pos", 2],
    ["uv", 2],
    ["color", 4],
  ],
  write(v, out) {
    writeVec2(v.pos, out);
    writeVec2(v.uv, out);
    writeColor(v.color, out);
  },
};

export interface TextUniforms {
  matrix: Mat4;
  tex: Texture2d;
}

export const textUniforms: GlUniformsFactory<TextUniforms> = (context, program) => {
  const matrix = new Matrix4Uniform("matrix", context, program);
  const tex = new TextureUniform("tex", context, program);
  return {
    update(ctx, values) {
      matrix.set(ctx, values.matrix);
      tex.set(ctx, values.tex, 0);
    },
  };
};

/** Where a glyph sits in the atlas and how it is placed relative to the pen */
interface GlyphDisplay {
  loc: Vec2;
  size: Vec2;
  left: number;
  top: number;
}

interface CachedGlyph {
  /** `null` for whitespace and empty glyphs */
  display: GlyphDisplay | null;
  advanceX: number;
}

const WHITESPACE = /^\s$/u;

let loadedFaces = 0;

export class Font {
  readonly context: GlContext;
  readonly size: number;

  private readonly rasterizer: GlyphRasterizer;
  private readonly atlas: Texture2d;
  private readonly program: GlProgram<TextVert, TextUniforms>;
  private readonly mesh: Mesh<TextVert, TextUniforms, "triangles">;
  private readonly builder = new MeshBuilder(textLayout, "triangles");
  private readonly glyphs = new Map<string, CachedGlyph>();
  private readonly kerningCache = new Map<string, number>();
  private readonly _ascent: number;
  private readonly _advanceY: number;
  private curX = 0;
  private curY = 0;

  /**
   * Register TTF/OTF data with the document and make a font from it.
   */
  static async load(
    context: GlContext,
    data: ArrayBuffer,
    size: number,
    family = `glkit-font-${++loadedFaces}`
  ): Promise<Font> {
    const face = new FontFace(family, data);
    await face.load();
    document.fonts.add(face);
    log.debug(`Loaded font face ${family}`);
    return new Font(context, { family, size });
  }

  constructor(context: GlContext, options: Pick<FontOptions, "family" | "size"> & Partial<FontOptions>) {
    const atlasSize = options.atlasSize ?? DEFAULT_ATLAS_SIZE;
    this.context = context;
    this.size = options.size;
    this.rasterizer = options.rasterizer ?? new CanvasGlyphRasterizer(options.family, options.size);

    const { ascent, descent } = this.rasterizer.metrics();
    this._ascent = ascent;
    this._advanceY = Math.trunc(ascent + descent);

    this.atlas = Texture2d.fromData(
      context,
      [atlasSize, atlasSize],
      new Uint8Array(atlasSize * atlasSize),
      { format: "red", minFilter: "nearest", magFilter: "nearest", wrapMode: "clampToEdge" }
    );
    // TODO: share the program between fonts on the same context
    this.program = GlProgram.withMinimalHeader(
      context,
      textLayout,
      textUniforms,
      textVertexShader,
      textFragmentShader
    );
    this.mesh = new Mesh(context, this.program, "triangles", DRAW_2D);
  }

  /** Line height in pixels */
  get advanceY(): number {
    return this._advanceY;
  }

  get ascent(): number {
    return this._ascent;
  }

  /** Glyph atlas, single channel */
  get texture(): Texture2d {
    return this.atlas;
  }

  /** Queued character quads, for inspection */
  get queued(): MeshBuilder<TextVert, "triangles"> {
    return this.builder;
  }

  /** Render every queued character. Call once per frame. */
  renderQueued(surface: Surface): void {
    this.renderQueuedCustomMatrix(surface, computeOrthoMatrix(surface));
  }

  /**
   * Render every queued character with `matrix` in place of the pixel
   * projection, e.g. to place text in a 3D scene.
   */
  renderQueuedCustomMatrix(surface: Surface, matrix: Mat4): void {
    this.mesh.buildFrom(this.builder, "stream");
    this.mesh.draw(surface, { matrix, tex: this.atlas });
    this.builder.clear();
  }

  /** Queue a string with its top-left corner at `loc` */
  drawString(str: string, loc: Vec2, color: Color4): void {
    this.drawStringWithMatrix(str, loc, color, mat4.create());
  }

  /** Queue a string whose quad corners are transformed by `matrix` */
  drawStringWithMatrix(str: string, loc: Vec2, color: Color4, matrix: Mat4): void {
    const chars = Array.from(str);
    for (const c of chars) {
      this.cacheGlyph(c);
    }

    let x = 0;
    chars.forEach((a, i) => {
      this.drawCharWithMatrix(a, [loc[0] + x, loc[1]], color, matrix);
      const b = chars[i + 1];
      if (b !== undefined) {
        x += Math.trunc(this.advanceBetween(a, b));
      }
    });
  }

  drawChar(char: string, loc: Vec2, color: Color4): void {
    this.drawCharWithMatrix(char, loc, color, mat4.create());
  }

  drawCharWithMatrix(char: string, loc: Vec2, color: Color4, matrix: Mat4): void {
    const display = this.cacheGlyph(char).display;
    if (!display) return;

    const [atlasW, atlasH] = this.atlas.size;
    const x = loc[0] + display.left;
    const y = loc[1] + this._ascent + display.top;
    const [w, h] = display.size;
    const u0 = display.loc[0] / atlasW;
    const v0 = display.loc[1] / atlasH;
    const u1 = (display.loc[0] + w) / atlasW;
    const v1 = (display.loc[1] + h) / atlasH;

    const builder = this.builder;
    const a = builder.vert({ pos: mat4.transformPoint2(matrix, [x, y]), uv: [u0, v0], color });
    const b = builder.vert({ pos: mat4.transformPoint2(matrix, [x + w, y]), uv: [u1, v0], color });
    const c = builder.vert({ pos: mat4.transformPoint2(matrix, [x, y + h]), uv: [u0, v1], color });
    const d = builder.vert({
      pos: mat4.transformPoint2(matrix, [x + w, y + h]),
      uv: [u1, v1],
      color,
    });
    builder.triangle(a, b, c);
    builder.triangle(b, c, d);
  }

  /** Width of `str` in pixels: advance plus kerning between pairs, then the last advance */
  stringWidth(str: string): number {
    const chars = Array.from(str);
    for (const c of chars) {
      this.cacheGlyph(c);
    }

    let width = 0;
    chars.forEach((a, i) => {
      const b = chars[i + 1];
      width += b === undefined ? this.cacheGlyph(a).advanceX : this.advanceBetween(a, b);
    });
    return width;
  }

  stringSize(str: string): Vec2 {
    return [Math.trunc(this.stringWidth(str)), this._advanceY];
  }

  destroy(): void {
    this.mesh.destroy();
    this.program.destroy();
    this.atlas.destroy();
  }

  private advanceBetween(a: string, b: string): number {
    return this.cacheGlyph(a).advanceX + this.kerning(a, b);
  }

  private kerning(a: string, b: string): number {
    // Each key is exactly two code points
    const key = a + b;
    let kerning = this.kerningCache.get(key);
    if (kerning === undefined) {
      kerning = this.rasterizer.kerning(a, b);
      this.kerningCache.set(key, kerning);
    }
    return kerning;
  }

  private cacheGlyph(char: string): CachedGlyph {
    const cached = this.glyphs.get(char);
    if (cached) return cached;

    const bitmap = WHITESPACE.test(char) ? null : this.rasterizer.rasterize(char);
    const glyph: CachedGlyph = {
      display: bitmap ? this.pack(bitmap) : null,
      advanceX: this.rasterizer.advance(char),
    };
    this.glyphs.set(char, glyph);
    return glyph;
  }

  /** Copy a bitmap into the next free atlas slot, one pixel apart from its neighbours */
  private pack(bitmap: GlyphBitmap): GlyphDisplay {
    const [atlasW, atlasH] = this.atlas.size;
    const { width, height } = bitmap;
    const newRow = this.curX + width >= atlasW;
    const x = newRow ? 0 : this.curX;
    const y = newRow ? this.curY + this._advanceY + 1 : this.curY;
    if (y + height > atlasH || width > atlasW) {
      throw new Error("Font cache full");
    }
    this.curX = x + width + 1;
    this.curY = y;

    this.atlas.setPartialContents("red", x, y, width, height, bitmap.data);
    return { loc: [x, y], size: [width, height], left: bitmap.left, top: bitmap.top };
  }
}
