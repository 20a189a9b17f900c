/**
 * WebGL buffer wrapper with lifecycle management
 */

import {
  GL_ARRAY_BUFFER,
  GL_DYNAMIC_DRAW,
  GL_ELEMENT_ARRAY_BUFFER,
  GL_STATIC_DRAW,
  GL_STREAM_DRAW,
} from "./constants";

export type BufferTarget = "array" | "element";

/** How often the contents are expected to change */
export type MeshUsage = "static" | "dynamic" | "stream";

const TARGET_MAP: Record<BufferTarget, GLenum> = {
  array: GL_ARRAY_BUFFER,
  element: GL_ELEMENT_ARRAY_BUFFER,
};

const USAGE_MAP: Record<MeshUsage, GLenum> = {
  static: GL_STATIC_DRAW,
  dynamic: GL_DYNAMIC_DRAW,
  stream: GL_STREAM_DRAW,
};

export class Buffer {
  readonly gl: WebGL2RenderingContext;
  readonly handle: WebGLBuffer;
  readonly target: GLenum;

  private _destroyed = false;

  constructor(gl: WebGL2RenderingContext, target: BufferTarget = "array") {
    this.gl = gl;
    this.target = TARGET_MAP[target];

    const handle = gl.createBuffer();
    if (!handle) {
      throw new Error("Failed to create WebGL buffer");
    }
    this.handle = handle;
  }

  /**
   * Bind this buffer to its target. Not cached: vertex array objects capture
   * element buffer bindings behind our back.
   */
  bind(): void {
    if (this._destroyed) {
      throw new Error("Cannot bind destroyed buffer");
    }
    this.gl.bindBuffer(this.target, this.handle);
  }

  /** Replace the contents; the buffer must already be bound */
  upload(data: AllowSharedBufferSource, usage: MeshUsage): void {
    if (this._destroyed) {
      throw new Error("Cannot upload to destroyed buffer");
    }
    this.gl.bufferData(this.target, data, USAGE_MAP[usage]);
  }

  destroy(): void {
    if (this._destroyed) return;
    this.gl.deleteBuffer(this.handle);
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }
}
