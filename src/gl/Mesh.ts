/**
 * Indexed meshes and the builder that assembles them
 */

import { Buffer, type MeshUsage } from "./Buffer";
import {
  GL_FLOAT,
  GL_LINE_LOOP,
  GL_LINE_STRIP,
  GL_LINES,
  GL_POINTS,
  GL_TRIANGLE_FAN,
  GL_TRIANGLE_STRIP,
  GL_TRIANGLES,
  GL_UNSIGNED_SHORT,
} from "./constants";
import type { GlContext } from "./GlContext";
import type { GlProgram } from "./Program";
import type { DrawMode } from "./StateCache";
import type { Surface } from "./Surface";
import { attributeStride, type Attributes, type VertexLayout } from "./vertex";

export type { MeshUsage } from "./Buffer";

export type Primitive =
  | "triangles"
  | "triangleStrip"
  | "triangleFan"
  | "lines"
  | "lineStrip"
  | "lineLoop"
  | "points";

const PRIMITIVE_MAP: Record<Primitive, GLenum> = {
  triangles: GL_TRIANGLES,
  triangleStrip: GL_TRIANGLE_STRIP,
  triangleFan: GL_TRIANGLE_FAN,
  lines: GL_LINES,
  lineStrip: GL_LINE_STRIP,
  lineLoop: GL_LINE_LOOP,
  points: GL_POINTS,
};

/** Primitives built from a plain sequence of indices */
export type IndexedPrimitive = "triangleStrip" | "triangleFan" | "lineStrip" | "lineLoop";

/** Indices are unsigned shorts; 65535 is reserved as the restart index */
export const MAX_MESH_INDEX = 0xfffe;

/**
 * Collects vertices and primitives on the CPU. Nothing touches the driver
 * until the builder is uploaded into a `Mesh`.
 *
 * Only the methods for the builder's primitive type-check: a
 * `MeshBuilder<V, "lines">` has `line` but no `triangle`.
 *
 * @example
 * const builder = new MeshBuilder(plainLayout, "triangles");
 * const [a, b, c] = builder.verts([v0, v1, v2]);
 * builder.triangle(a, b, c);
 */
export class MeshBuilder<V, P extends Primitive> {
  readonly layout: VertexLayout<V>;
  readonly primitive: P;

  private _vertexData: number[] = [];
  private _indices: number[] = [];
  private _nextIndex = 0;

  constructor(layout: VertexLayout<V>, primitive: P) {
    this.layout = layout;
    this.primitive = primitive;
  }

  /** A triangle builder from already tessellated vertices and indices */
  static fromTessellation<V>(
    layout: VertexLayout<V>,
    vertices: readonly V[],
    indices: readonly number[]
  ): MeshBuilder<V, "triangles"> {
    const builder = new MeshBuilder(layout, "triangles");
    for (const index of indices) {
      if (!Number.isInteger(index) || index < 0 || index >= vertices.length) {
        throw new Error(`Index ${index} out of range for ${vertices.length} vertices`);
      }
    }
    builder.verts(vertices);
    builder._indices.push(...indices);
    return builder;
  }

  /**
   * Add a vertex and return its index. The vertex is only rendered once a
   * primitive refers to it.
   */
  vert(vertex: V): number {
    if (this._nextIndex > MAX_MESH_INDEX) {
      throw new Error(`Mesh cannot hold more than ${MAX_MESH_INDEX + 1} vertices`);
    }
    const index = this._nextIndex;
    this._nextIndex++;
    this.layout.write(vertex, this._vertexData);
    return index;
  }

  verts(vertices: readonly V[]): number[] {
    return vertices.map((v) => this.vert(v));
  }

  triangle(this: MeshBuilder<V, "triangles">, a: number, b: number, c: number): void {
    this._indices.push(a, b, c);
  }

  line(this: MeshBuilder<V, "lines">, a: number, b: number): void {
    this._indices.push(a, b);
  }

  point(this: MeshBuilder<V, "points">, a: number): void {
    this._indices.push(a);
  }

  /** Append one index to a strip, fan or loop */
  index(this: MeshBuilder<V, IndexedPrimitive>, a: number): void {
    this._indices.push(a);
  }

  /** Remove all vertices and primitives; the arrays are reused */
  clear(): void {
    this._vertexData.length = 0;
    this._indices.length = 0;
    this._nextIndex = 0;
  }

  /** Append another builder's vertices and primitives */
  extend(other: MeshBuilder<V, P>): void {
    const start = this._nextIndex;
    if (start + other._nextIndex > MAX_MESH_INDEX + 1) {
      throw new Error(`Mesh cannot hold more than ${MAX_MESH_INDEX + 1} vertices`);
    }
    this._nextIndex += other._nextIndex;
    this._vertexData.push(...other._vertexData);
    for (const index of other._indices) {
      this._indices.push(index + start);
    }
  }

  get nextIndex(): number {
    return this._nextIndex;
  }

  get vertexData(): readonly number[] {
    return this._vertexData;
  }

  get indices(): readonly number[] {
    return this._indices;
  }

  /** Upload into a new mesh */
  build<U>(
    context: GlContext,
    program: GlProgram<V, U>,
    usage: MeshUsage,
    drawMode: DrawMode
  ): Mesh<V, U, P> {
    const mesh = new Mesh(context, program, this.primitive, drawMode);
    mesh.buildFrom(this, usage);
    return mesh;
  }
}

function setupVertexAttrib(
  gl: WebGL2RenderingContext,
  location: number,
  size: number,
  stride: number,
  offset: number,
  instanced: boolean
): void {
  gl.enableVertexAttribArray(location);
  gl.vertexAttribPointer(location, size, GL_FLOAT, false, stride * 4, offset * 4);
  if (instanced) {
    gl.vertexAttribDivisor(location, 1);
  }
}

/**
 * Point each attribute at the bound ARRAY_BUFFER. Sizes are in floats; a
 * size of 16 is a matrix and takes four consecutive vec4 locations.
 */
function setupVertexAttribs<V, U>(
  program: GlProgram<V, U>,
  attributes: Attributes,
  instanced: boolean
): void {
  const gl = program.context.gl;
  const stride = attributeStride(attributes);
  let offset = 0;
  for (const [name, size] of attributes) {
    const location = program.attribLocation(name);
    if (size === 16) {
      for (let row = 0; row < 4; row++) {
        setupVertexAttrib(gl, location + row, 4, stride, offset + row * 4, instanced);
      }
    } else if (size >= 1 && size <= 4) {
      setupVertexAttrib(gl, location, size, stride, offset, instanced);
    } else {
      throw new Error(`Unsupported vertex attribute size ${size} for ${name}`);
    }
    offset += size;
  }
}

/**
 * A mesh on the GPU: a vertex array object with its vertex and index
 * buffers, drawn with one program.
 */
export class Mesh<V, U, P extends Primitive> {
  readonly context: GlContext;
  readonly program: GlProgram<V, U>;
  readonly primitive: P;
  readonly drawMode: DrawMode;

  private readonly vao: WebGLVertexArrayObject;
  private readonly vbo: Buffer;
  private readonly ibo: Buffer;
  private indexCount = 0;
  private _destroyed = false;

  /** An empty mesh; fill it with `buildFrom` */
  constructor(context: GlContext, program: GlProgram<V, U>, primitive: P, drawMode: DrawMode) {
    const gl = context.gl;
    const vao = gl.createVertexArray();
    if (!vao) {
      throw new Error("Failed to create vertex array");
    }
    this.context = context;
    this.program = program;
    this.primitive = primitive;
    this.drawMode = drawMode;
    this.vao = vao;

    gl.bindVertexArray(vao);
    this.vbo = new Buffer(gl, "array");
    this.ibo = new Buffer(gl, "element");
    this.vbo.bind();
    this.ibo.bind();
  }

  /** Replace the contents with the builder's */
  buildFrom(builder: MeshBuilder<V, P>, usage: MeshUsage): void {
    this.indexCount = builder.indices.length;
    if (this.indexCount === 0) return;

    this.bind();
    setupVertexAttribs(this.program, this.program.layout.attributes, false);
    this.vbo.upload(new Float32Array(builder.vertexData), usage);
    this.ibo.upload(new Uint16Array(builder.indices), usage);
  }

  get isEmpty(): boolean {
    return this.indexCount === 0;
  }

  private bind(): void {
    if (this._destroyed) {
      throw new Error("Cannot draw destroyed mesh");
    }
    // The VAO remembers the element buffer but not the array buffer
    this.context.gl.bindVertexArray(this.vao);
    this.vbo.bind();
  }

  private prepare(surface: Surface, uniforms: U): void {
    this.bind();
    this.program.bind();
    this.program.uniforms.update(this.context, uniforms);
    surface.bind(this.context);
    this.context.bindDrawMode(this.drawMode);
  }

  draw(surface: Surface, uniforms: U): void {
    if (this.indexCount === 0) return;

    this.prepare(surface, uniforms);
    this.context.gl.drawElements(
      PRIMITIVE_MAP[this.primitive],
      this.indexCount,
      GL_UNSIGNED_SHORT,
      0
    );
    this.context.afterDraw();
  }

  /**
   * Draw once per instance. Instance attributes come from `instanceLayout`
   * and advance once per instance.
   */
  drawInstanced<I>(
    surface: Surface,
    uniforms: U,
    instances: readonly I[],
    instanceLayout: VertexLayout<I>
  ): void {
    if (this.indexCount === 0 || instances.length === 0) return;

    this.prepare(surface, uniforms);

    const data: number[] = [];
    for (const instance of instances) {
      instanceLayout.write(instance, data);
    }
    const instancedVbo = this.context.instancedVbo;
    instancedVbo.bind();
    setupVertexAttribs(this.program, instanceLayout.attributes, true);
    instancedVbo.upload(new Float32Array(data), "stream");

    this.context.gl.drawElementsInstanced(
      PRIMITIVE_MAP[this.primitive],
      this.indexCount,
      GL_UNSIGNED_SHORT,
      0,
      instances.length
    );
    this.context.afterDraw();
  }

  destroy(): void {
    if (this._destroyed) return;
    this.context.gl.deleteVertexArray(this.vao);
    this.vbo.destroy();
    this.ibo.destroy();
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }
}
