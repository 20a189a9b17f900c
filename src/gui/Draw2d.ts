/**
 * Draw2d - batched 2D shapes and immediate image blits
 *
 * Coordinates are pixels from the top-left corner of the surface unless a
 * custom matrix is passed.
 */

import { tessellatePolygon, type Ring } from "../geometry/tessellate";
import type { GlContext } from "../gl/GlContext";
import { Mesh, MeshBuilder } from "../gl/Mesh";
import { GlProgram } from "../gl/Program";
import type { Rect } from "../gl/Rect";
import { DRAW_2D } from "../gl/StateCache";
import type { Surface } from "../gl/Surface";
import type { Texture2d } from "../gl/Texture2d";
import {
  Color4Uniform,
  Matrix4Uniform,
  TextureUniform,
  type GlUniformsFactory,
} from "../gl/uniforms";
import { writeVec2, type VertexLayout } from "../gl/vertex";
import * as mat4 from "../math/mat4";
import type { Mat4 } from "../math/mat4";
import * as vec2 from "../math/vec2";
import type { Vec2 } from "../math/vec2";
import { Color4, writeColor } from "./Color4";
import {
  imageFragmentShader,
  imageVertexShader,
  plainFragmentShader,
  plainVertexShader,
} from "./shaders";

export interface PlainVert {
  pos: Vec2;
  color: Color4;
}

export const plainLayout: VertexLayout<PlainVert> = {
  attributes: [
    ["pos", 2],
    ["color", 4],
  ],
  write(v, out) {
    writeVec2(v.pos, out);
    writeColor(v.color, out);
  },
};

export interface PlainUniforms {
  matrix: Mat4;
  color: Color4;
}

export const plainUniforms: GlUniformsFactory<PlainUniforms> = (context, program) => {
  const matrix = new Matrix4Uniform("matrix", context, program);
  const color = new Color4Uniform("uniColor", context, program);
  return {
    update(ctx, values) {
      matrix.set(ctx, values.matrix);
      color.set(ctx, values.color, false);
    },
  };
};

export interface ImageVert {
  pos: Vec2;
  uv: Vec2;
  color: Color4;
}

export const imageLayout: VertexLayout<ImageVert> = {
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

export interface ImageUniforms {
  matrix: Mat4;
  color: Color4;
  tex: Texture2d;
}

export const imageUniforms: GlUniformsFactory<ImageUniforms> = (context, program) => {
  const matrix = new Matrix4Uniform("matrix", context, program);
  const color = new Color4Uniform("uniColor", context, program);
  const tex = new TextureUniform("tex", context, program);
  return {
    update(ctx, values) {
      matrix.set(ctx, values.matrix);
      color.set(ctx, values.color, false);
      tex.set(ctx, values.tex, 0);
    },
  };
};

/**
 * The programs `Draw2d` draws with. Compiling them is slow, so create one
 * set and share it.
 */
export class Draw2dPrograms {
  readonly plainProgram: GlProgram<PlainVert, PlainUniforms>;
  /** For sRGB textures, whose texels are decoded to linear when sampled */
  readonly imageProgramSrgb: GlProgram<ImageVert, ImageUniforms>;
  /** For textures holding values that are already display-ready */
  readonly imageProgramLinear: GlProgram<ImageVert, ImageUniforms>;

  constructor(context: GlContext) {
    this.plainProgram = GlProgram.withHeader(
      context,
      plainLayout,
      plainUniforms,
      plainVertexShader,
      plainFragmentShader,
      true
    );
    this.imageProgramSrgb = GlProgram.withHeader(
      context,
      imageLayout,
      imageUniforms,
      imageVertexShader,
      imageFragmentShader,
      true
    );
    this.imageProgramLinear = GlProgram.withHeader(
      context,
      imageLayout,
      imageUniforms,
      imageVertexShader,
      imageFragmentShader,
      false
    );
  }

  destroy(): void {
    this.plainProgram.destroy();
    this.imageProgramSrgb.destroy();
    this.imageProgramLinear.destroy();
  }
}

/** Pixel coordinates with y down to clip space */
export function computeOrthoMatrix(surface: Surface): Mat4 {
  const [w, h] = surface.size();
  return mat4.multiply(mat4.scale(1, -1, 1), mat4.ortho(0, w, 0, h, 0, 1));
}

const HALF_PIXEL: Vec2 = [0.5, 0.5];

export class Draw2d {
  private readonly triangleBuilder = new MeshBuilder(plainLayout, "triangles");
  private readonly triangleMesh: Mesh<PlainVert, PlainUniforms, "triangles">;
  private readonly imageBuilder = new MeshBuilder(imageLayout, "triangles");
  private readonly imageMeshSrgb: Mesh<ImageVert, ImageUniforms, "triangles">;
  private readonly imageMeshLinear: Mesh<ImageVert, ImageUniforms, "triangles">;

  constructor(context: GlContext, programs: Draw2dPrograms) {
    this.triangleMesh = new Mesh(context, programs.plainProgram, "triangles", DRAW_2D);
    this.imageMeshSrgb = new Mesh(context, programs.imageProgramSrgb, "triangles", DRAW_2D);
    this.imageMeshLinear = new Mesh(context, programs.imageProgramLinear, "triangles", DRAW_2D);
  }

  /** Draw everything queued since the last render. Call once per frame. */
  renderQueued(surface: Surface): void {
    this.renderQueuedCustomMatrix(surface, computeOrthoMatrix(surface));
  }

  renderQueuedCustomMatrix(surface: Surface, matrix: Mat4): void {
    this.triangleMesh.buildFrom(this.triangleBuilder, "stream");
    this.triangleMesh.draw(surface, { matrix, color: Color4.WHITE });
    this.triangleBuilder.clear();
  }

  /** Queue a filled convex polygon */
  fillPoly(verts: readonly Vec2[], color: Color4): void {
    const [first, second, ...rest] = verts;
    if (!first || !second || rest.length === 0) {
      throw new Error(`fillPoly needs at least 3 vertices, got ${verts.length}`);
    }
    const builder = this.triangleBuilder;
    const a = builder.vert({ pos: first, color });
    let b = builder.vert({ pos: second, color });
    for (const pos of rest) {
      const c = builder.vert({ pos, color });
      builder.triangle(a, b, c);
      b = c;
    }
  }

  /** Queue a filled polygon that may be concave and have holes */
  fillPolygon(outer: Ring, holes: readonly Ring[], color: Color4): void {
    const { points, indices } = tessellatePolygon(outer, holes);
    const builder = this.triangleBuilder;
    const base = builder.nextIndex;
    for (const pos of points) {
      builder.vert({ pos, color });
    }
    for (let i = 0; i + 2 < indices.length; i += 3) {
      builder.triangle(
        base + (indices[i] ?? 0),
        base + (indices[i + 1] ?? 0),
        base + (indices[i + 2] ?? 0)
      );
    }
  }

  /** Queue a strip of line segments, each a quad `width` pixels wide */
  drawLineStrip(verts: readonly Vec2[], color: Color4, width: number): void {
    if (verts.length < 2) {
      throw new Error(`drawLineStrip needs at least 2 vertices, got ${verts.length}`);
    }
    const builder = this.triangleBuilder;
    const halfWidth = width * 0.5;
    for (let i = 0; i + 1 < verts.length; i++) {
      const start = verts[i];
      const end = verts[i + 1];
      if (!start || !end) continue;
      const offset = vec2.scale(vec2.normalize(vec2.ccwPerp(vec2.subtract(end, start))), halfWidth);
      const a = builder.vert({ pos: vec2.add(start, offset), color });
      const b = builder.vert({ pos: vec2.subtract(start, offset), color });
      const c = builder.vert({ pos: vec2.add(end, offset), color });
      const d = builder.vert({ pos: vec2.subtract(end, offset), color });
      builder.triangle(a, b, c);
      builder.triangle(b, c, d);
    }
  }

  drawLine(a: Vec2, b: Vec2, color: Color4, width: number): void {
    this.drawLineStrip([a, b], color, width);
  }

  fillRect(rect: Rect, color: Color4): void {
    const { start, end } = rect;
    this.fillPoly([start, [end[0], start[1]], end, [start[0], end[1]]], color);
  }

  /** Outline centered on pixel centers so 1px lines stay crisp */
  outlineRect(rect: Rect, color: Color4, width: number): void {
    const { start, end } = rect;
    const corners: Vec2[] = [start, [end[0], start[1]], end, [start[0], end[1]], start];
    this.drawLineStrip(
      corners.map((p) => vec2.add(p, HALF_PIXEL)),
      color,
      width
    );
  }

  /**
   * Draw a whole texture at `pos`, scaled around the origin. Unlike the
   * queued shapes this draws at once.
   */
  drawImage(surface: Surface, texture: Texture2d, pos: Vec2, scale: number): void {
    const matrix = mat4.multiply(computeOrthoMatrix(surface), mat4.scale(scale, scale, 1));
    const [w, h] = texture.size;
    this.drawTexturedQuad(
      surface,
      texture,
      matrix,
      [pos, [pos[0] + w, pos[1]], [pos[0], pos[1] + h], [pos[0] + w, pos[1] + h]],
      [
        [0, 0],
        [1, 0],
        [0, 1],
        [1, 1],
      ]
    );
  }

  /**
   * Draw the texels from `start` to `end` into the quad from `startPos` to
   * `endPos`. Draws at once.
   */
  drawPartOfImage(
    surface: Surface,
    texture: Texture2d,
    start: Vec2,
    end: Vec2,
    startPos: Vec2,
    endPos: Vec2,
    matrix: Mat4
  ): void {
    const [w, h] = texture.size;
    const uvStart: Vec2 = [start[0] / w, start[1] / h];
    const uvEnd: Vec2 = [end[0] / w, end[1] / h];
    this.drawTexturedQuad(
      surface,
      texture,
      matrix,
      [startPos, [endPos[0], startPos[1]], [startPos[0], endPos[1]], endPos],
      [uvStart, [uvEnd[0], uvStart[1]], [uvStart[0], uvEnd[1]], uvEnd]
    );
  }

  private drawTexturedQuad(
    surface: Surface,
    texture: Texture2d,
    matrix: Mat4,
    corners: [Vec2, Vec2, Vec2, Vec2],
    uvs: [Vec2, Vec2, Vec2, Vec2]
  ): void {
    const builder = this.imageBuilder;
    const color = Color4.WHITE;
    const a = builder.vert({ pos: corners[0], uv: uvs[0], color });
    const b = builder.vert({ pos: corners[1], uv: uvs[1], color });
    const c = builder.vert({ pos: corners[2], uv: uvs[2], color });
    const d = builder.vert({ pos: corners[3], uv: uvs[3], color });
    builder.triangle(a, b, c);
    builder.triangle(b, c, d);

    const mesh = texture.isSrgb ? this.imageMeshSrgb : this.imageMeshLinear;
    mesh.buildFrom(builder, "stream");
    mesh.draw(surface, { matrix, color, tex: texture });
    builder.clear();
  }

  /** Queued triangle data, for inspection */
  get queued(): MeshBuilder<PlainVert, "triangles"> {
    return this.triangleBuilder;
  }

  destroy(): void {
    this.triangleMesh.destroy();
    this.imageMeshSrgb.destroy();
    this.imageMeshLinear.destroy();
  }
}
