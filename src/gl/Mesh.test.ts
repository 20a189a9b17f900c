import { describe, it, expect } from "vitest";
import { GlContext } from "./GlContext";
import { MAX_MESH_INDEX, Mesh, MeshBuilder } from "./Mesh";
import { GlProgram } from "./Program";
import { DRAW_2D } from "./StateCache";
import { emptyUniforms } from "./uniforms";
import { writeMat4, writeVec2, writeVec4, type VertexLayout } from "./vertex";
import type { Vec2 } from "../math/vec2";
import { create as identity } from "../math/mat4";
import { createMockCanvas } from "../testing/mockGL";

const ARRAY_BUFFER = 0x8892;
const ELEMENT_ARRAY_BUFFER = 0x8893;
const STATIC_DRAW = 0x88e4;
const STREAM_DRAW = 0x88e0;
const FLOAT = 0x1406;
const UNSIGNED_SHORT = 0x1403;
const TRIANGLES = 0x0004;
const LINES = 0x0001;

interface ColorVert {
  pos: Vec2;
  color: [number, number, number, number];
}

const colorLayout: VertexLayout<ColorVert> = {
  attributes: [
    ["pos", 2],
    ["color", 4],
  ],
  write(v, out) {
    writeVec2(v.pos, out);
    writeVec4(v.color, out);
  },
};

interface Instance {
  transform: Float32Array;
}

const instanceLayout: VertexLayout<Instance> = {
  attributes: [["transform", 16]],
  write(v, out) {
    writeMat4(v.transform, out);
  },
};

function vert(x: number, y: number): ColorVert {
  return { pos: [x, y], color: [1, 0, 0, 1] };
}

function setup() {
  const { context, screenSurface } = GlContext.fromCanvas(createMockCanvas());
  const program = new GlProgram(context, colorLayout, emptyUniforms, "vs", "fs");
  return { context, gl: context.gl, screen: screenSurface, program };
}

describe("MeshBuilder", () => {
  it("writes vertices through the layout and returns increasing indices", () => {
    const builder = new MeshBuilder(colorLayout, "triangles");

    const indices = builder.verts([vert(0, 0), vert(1, 0), vert(0, 1)]);
    builder.triangle(indices[0] ?? 0, indices[1] ?? 0, indices[2] ?? 0);

    expect(indices).toEqual([0, 1, 2]);
    expect(builder.nextIndex).toBe(3);
    expect(builder.vertexData.slice(0, 6)).toEqual([0, 0, 1, 0, 0, 1]);
    expect(builder.vertexData).toHaveLength(18);
    expect(builder.indices).toEqual([0, 1, 2]);
  });

  it("adds the matching primitive for each builder kind", () => {
    const lines = new MeshBuilder(colorLayout, "lines");
    const a = lines.vert(vert(0, 0));
    const b = lines.vert(vert(1, 1));
    lines.line(a, b);

    const strip = new MeshBuilder(colorLayout, "lineStrip");
    strip.index(strip.vert(vert(0, 0)));
    strip.index(strip.vert(vert(1, 0)));
    strip.index(strip.vert(vert(2, 0)));

    const points = new MeshBuilder(colorLayout, "points");
    points.point(points.vert(vert(5, 5)));

    expect(lines.indices).toEqual([0, 1]);
    expect(strip.indices).toEqual([0, 1, 2]);
    expect(points.indices).toEqual([0]);
  });

  it("offsets the other builder's indices when extending", () => {
    const first = new MeshBuilder(colorLayout, "triangles");
    first.verts([vert(0, 0), vert(1, 0), vert(0, 1)]);
    first.triangle(0, 1, 2);
    const second = new MeshBuilder(colorLayout, "triangles");
    second.verts([vert(5, 5), vert(6, 5), vert(5, 6)]);
    second.triangle(0, 2, 1);

    first.extend(second);

    expect(first.nextIndex).toBe(6);
    expect(first.indices).toEqual([0, 1, 2, 3, 5, 4]);
    expect(first.vertexData).toHaveLength(36);
  });

  it("clears everything", () => {
    const builder = new MeshBuilder(colorLayout, "triangles");
    builder.verts([vert(0, 0), vert(1, 0), vert(0, 1)]);
    builder.triangle(0, 1, 2);

    builder.clear();

    expect(builder.nextIndex).toBe(0);
    expect(builder.vertexData).toEqual([]);
    expect(builder.indices).toEqual([]);
  });

  it("refuses a vertex whose index would not fit in 16 bits", () => {
    const builder = new MeshBuilder(colorLayout, "points");
    for (let i = 0; i <= MAX_MESH_INDEX; i++) {
      builder.vert(vert(0, 0));
    }

    expect(builder.nextIndex).toBe(65535);
    expect(() => builder.vert(vert(0, 0))).toThrow("Mesh cannot hold more than 65535 vertices");
  });

  it("builds a triangle builder from tessellated data", () => {
    const builder = MeshBuilder.fromTessellation(
      colorLayout,
      [vert(0, 0), vert(1, 0), vert(1, 1), vert(0, 1)],
      [0, 1, 2, 0, 2, 3]
    );

    expect(builder.primitive).toBe("triangles");
    expect(builder.nextIndex).toBe(4);
    expect(builder.indices).toEqual([0, 1, 2, 0, 2, 3]);
  });

  it("rejects tessellated indices outside the vertex list", () => {
    expect(() => MeshBuilder.fromTessellation(colorLayout, [vert(0, 0)], [0, 1, 0])).toThrow(
      "Index 1 out of range for 1 vertices"
    );
  });
});

describe("Mesh", () => {
  it("sets up attributes and uploads vertex and index data", () => {
    const { context, gl, program } = setup();
    const builder = new MeshBuilder(colorLayout, "triangles");
    builder.verts([vert(0, 0), vert(1, 0), vert(0, 1)]);
    builder.triangle(0, 1, 2);

    builder.build(context, program, "static", DRAW_2D);

    expect(gl.vertexAttribPointer).toHaveBeenCalledWith(0, 2, FLOAT, false, 24, 0);
    expect(gl.vertexAttribPointer).toHaveBeenCalledWith(1, 4, FLOAT, false, 24, 8);
    expect(gl.bufferData).toHaveBeenCalledWith(
      ARRAY_BUFFER,
      new Float32Array(builder.vertexData),
      STATIC_DRAW
    );
    expect(gl.bufferData).toHaveBeenCalledWith(
      ELEMENT_ARRAY_BUFFER,
      new Uint16Array([0, 1, 2]),
      STATIC_DRAW
    );
  });

  it("skips uploads and draws while empty", () => {
    const { context, gl, screen, program } = setup();
    const mesh = new Mesh(context, program, "triangles", DRAW_2D);

    mesh.buildFrom(new MeshBuilder(colorLayout, "triangles"), "static");
    mesh.draw(screen, undefined);

    expect(mesh.isEmpty).toBe(true);
    expect(gl.bufferData).not.toHaveBeenCalled();
    expect(gl.drawElements).not.toHaveBeenCalled();
  });

  it("binds program, surface and draw mode before drawing", () => {
    const { context, gl, screen, program } = setup();
    const builder = new MeshBuilder(colorLayout, "lines");
    builder.verts([vert(0, 0), vert(1, 1)]);
    builder.line(0, 1);
    const mesh = builder.build(context, program, "dynamic", DRAW_2D);

    mesh.draw(screen, undefined);
    mesh.draw(screen, undefined);

    expect(gl.useProgram).toHaveBeenCalledTimes(1);
    expect(gl.bindFramebuffer).toHaveBeenCalledTimes(1);
    expect(gl.drawElements).toHaveBeenCalledTimes(2);
    expect(gl.drawElements).toHaveBeenCalledWith(LINES, 2, UNSIGNED_SHORT, 0);
  });

  it("draws instances from the shared instancing buffer", () => {
    const { context, gl, screen, program } = setup();
    const builder = new MeshBuilder(colorLayout, "triangles");
    builder.verts([vert(0, 0), vert(1, 0), vert(0, 1)]);
    builder.triangle(0, 1, 2);
    const mesh = builder.build(context, program, "static", DRAW_2D);
    const instances = [{ transform: identity() }, { transform: identity() }];

    mesh.drawInstanced(screen, undefined, instances, instanceLayout);

    // pos = 0, color = 1, transform takes 2..5
    for (let row = 0; row < 4; row++) {
      expect(gl.vertexAttribPointer).toHaveBeenCalledWith(2 + row, 4, FLOAT, false, 64, row * 16);
      expect(gl.vertexAttribDivisor).toHaveBeenCalledWith(2 + row, 1);
    }
    expect(gl.bindBuffer).toHaveBeenLastCalledWith(ARRAY_BUFFER, context.instancedVbo.handle);
    expect(gl.bufferData).toHaveBeenLastCalledWith(ARRAY_BUFFER, expect.any(Float32Array), STREAM_DRAW);
    expect(gl.drawElementsInstanced).toHaveBeenCalledWith(TRIANGLES, 3, UNSIGNED_SHORT, 0, 2);
  });

  it("skips instanced draws without instances", () => {
    const { context, gl, screen, program } = setup();
    const builder = new MeshBuilder(colorLayout, "triangles");
    builder.verts([vert(0, 0), vert(1, 0), vert(0, 1)]);
    builder.triangle(0, 1, 2);
    const mesh = builder.build(context, program, "static", DRAW_2D);

    mesh.drawInstanced(screen, undefined, [], instanceLayout);

    expect(gl.drawElementsInstanced).not.toHaveBeenCalled();
  });

  it("rejects attribute sizes other than 1 to 4 or 16", () => {
    const { context } = setup();
    const badLayout: VertexLayout<number[]> = {
      attributes: [["weights", 6]],
      write(v, out) {
        out.push(...v);
      },
    };
    const program = new GlProgram(context, badLayout, emptyUniforms, "vs", "fs");
    const builder = new MeshBuilder(badLayout, "points");
    builder.point(builder.vert([1, 2, 3, 4, 5, 6]));

    expect(() => builder.build(context, program, "static", DRAW_2D)).toThrow(
      "Unsupported vertex attribute size 6 for weights"
    );
  });

  it("deletes its vertex array and buffers", () => {
    const { context, gl, program } = setup();
    const mesh = new Mesh(context, program, "triangles", DRAW_2D);

    mesh.destroy();

    expect(gl.deleteVertexArray).toHaveBeenCalledTimes(1);
    expect(gl.deleteBuffer).toHaveBeenCalledTimes(2);
  });
});
