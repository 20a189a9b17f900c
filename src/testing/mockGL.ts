/**
 * In-process stand-in for a WebGL2 context, for unit tests.
 *
 * Every method is a `vi.fn()`. `create*` calls return fresh objects so handles
 * compare by identity, and the status queries report success.
 */

import { vi } from "vitest";

const GL_FRAMEBUFFER_COMPLETE = 0x8cd5;
const GL_MAX_SAMPLES = 0x8d57;

export function createMockGL(): WebGL2RenderingContext {
  const attribLocations = new Map<string, number>();

  return {
    // State
    enable: vi.fn(),
    disable: vi.fn(),
    blendFunc: vi.fn(),
    pixelStorei: vi.fn(),
    viewport: vi.fn(),
    clearColor: vi.fn(),
    clear: vi.fn(),
    getError: vi.fn(() => 0),
    getExtension: vi.fn(() => null),
    getParameter: vi.fn((pname: number) => (pname === GL_MAX_SAMPLES ? 4 : null)),
    readPixels: vi.fn(),

    // Buffers and vertex arrays
    createBuffer: vi.fn(() => ({})),
    deleteBuffer: vi.fn(),
    bindBuffer: vi.fn(),
    bufferData: vi.fn(),
    bufferSubData: vi.fn(),
    createVertexArray: vi.fn(() => ({})),
    deleteVertexArray: vi.fn(),
    bindVertexArray: vi.fn(),
    enableVertexAttribArray: vi.fn(),
    vertexAttribPointer: vi.fn(),
    vertexAttribDivisor: vi.fn(),
    drawElements: vi.fn(),
    drawElementsInstanced: vi.fn(),

    // Shaders and programs
    createShader: vi.fn(() => ({})),
    shaderSource: vi.fn(),
    compileShader: vi.fn(),
    getShaderParameter: vi.fn(() => true),
    getShaderInfoLog: vi.fn(() => ""),
    deleteShader: vi.fn(),
    createProgram: vi.fn(() => ({})),
    attachShader: vi.fn(),
    linkProgram: vi.fn(),
    getProgramParameter: vi.fn(() => true),
    getProgramInfoLog: vi.fn(() => ""),
    deleteProgram: vi.fn(),
    useProgram: vi.fn(),
    getAttribLocation: vi.fn((_program: WebGLProgram, name: string) => {
      let location = attribLocations.get(name);
      if (location === undefined) {
        location = attribLocations.size;
        attribLocations.set(name, location);
      }
      return location;
    }),
    getUniformLocation: vi.fn(() => ({})),
    uniformMatrix4fv: vi.fn(),
    uniform1i: vi.fn(),
    uniform1f: vi.fn(),
    uniform2f: vi.fn(),
    uniform3f: vi.fn(),
    uniform4f: vi.fn(),

    // Textures
    createTexture: vi.fn(() => ({})),
    deleteTexture: vi.fn(),
    bindTexture: vi.fn(),
    activeTexture: vi.fn(),
    texImage2D: vi.fn(),
    texSubImage2D: vi.fn(),
    texParameteri: vi.fn(),
    generateMipmap: vi.fn(),

    // Framebuffers and renderbuffers
    createFramebuffer: vi.fn(() => ({})),
    deleteFramebuffer: vi.fn(),
    bindFramebuffer: vi.fn(),
    framebufferTexture2D: vi.fn(),
    framebufferRenderbuffer: vi.fn(),
    checkFramebufferStatus: vi.fn(() => GL_FRAMEBUFFER_COMPLETE),
    blitFramebuffer: vi.fn(),
    createRenderbuffer: vi.fn(() => ({})),
    deleteRenderbuffer: vi.fn(),
    bindRenderbuffer: vi.fn(),
    renderbufferStorageMultisample: vi.fn(),
  } as unknown as WebGL2RenderingContext;
}

/** Minimal canvas for surfaces and context creation */
export function createMockCanvas(
  width = 640,
  height = 480,
  gl: WebGL2RenderingContext | null = createMockGL()
): HTMLCanvasElement {
  return {
    width,
    height,
    getContext: vi.fn(() => gl),
    requestPointerLock: vi.fn(),
    requestFullscreen: vi.fn(() => Promise.resolve()),
  } as unknown as HTMLCanvasElement;
}
