import { describe, it, expect, vi } from "vitest";
import { GlContext, resolveContextOptions } from "./GlContext";
import { Rect } from "./Rect";
import { DRAW_2D, draw3d } from "./StateCache";
import { ScreenSurface } from "./Surface";
import { createMockCanvas, createMockGL } from "../testing/mockGL";

const BLEND = 0x0be2;
const CULL_FACE = 0x0b44;
const DEPTH_TEST = 0x0b71;
const ONE = 1;
const ONE_MINUS_SRC_ALPHA = 0x0303;
const UNPACK_ALIGNMENT = 0x0cf5;
const INVALID_OPERATION = 0x0502;

describe("GlContext", () => {
  it("sets up premultiplied blending and tight unpacking", () => {
    const gl = createMockGL();
    new GlContext(gl);

    expect(gl.enable).toHaveBeenCalledWith(BLEND);
    expect(gl.blendFunc).toHaveBeenCalledWith(ONE, ONE_MINUS_SRC_ALPHA);
    expect(gl.pixelStorei).toHaveBeenCalledWith(UNPACK_ALIGNMENT, 1);
  });

  it("fills in default options", () => {
    expect(resolveContextOptions({ debug: true })).toEqual({
      antialias: true,
      depth: true,
      debug: true,
    });
  });

  describe("fromCanvas", () => {
    it("creates a context and a screen surface sized to the canvas", () => {
      const canvas = createMockCanvas(320, 200);
      const { context, screenSurface } = GlContext.fromCanvas(canvas, { antialias: false });

      expect(canvas.getContext).toHaveBeenCalledWith("webgl2", { antialias: false, depth: true });
      expect(context.options.antialias).toBe(false);
      expect(screenSurface).toBeInstanceOf(ScreenSurface);
      expect(screenSurface.size()).toEqual([320, 200]);
    });

    it("throws without WebGL2", () => {
      const canvas = createMockCanvas(320, 200, null);

      expect(() => GlContext.fromCanvas(canvas)).toThrow("WebGL2 not supported");
    });
  });

  it("sets the viewport from a rect", () => {
    const gl = createMockGL();
    const context = new GlContext(gl);

    context.viewport(new Rect([10, 20], [110, 70]));

    expect(gl.viewport).toHaveBeenCalledWith(10, 20, 100, 50);
  });

  describe("bindDrawMode", () => {
    it("disables culling and depth for 2D", () => {
      const gl = createMockGL();
      const context = new GlContext(gl);

      context.bindDrawMode(DRAW_2D);

      expect(gl.disable).toHaveBeenCalledWith(CULL_FACE);
      expect(gl.disable).toHaveBeenCalledWith(DEPTH_TEST);
    });

    it("enables culling and optionally depth for 3D", () => {
      const gl = createMockGL();
      const context = new GlContext(gl);

      context.bindDrawMode(draw3d(true));
      expect(gl.enable).toHaveBeenCalledWith(CULL_FACE);
      expect(gl.enable).toHaveBeenCalledWith(DEPTH_TEST);

      context.bindDrawMode(draw3d(false));
      expect(gl.disable).toHaveBeenCalledWith(DEPTH_TEST);
    });

    it("skips the driver when the mode is unchanged", () => {
      const gl = createMockGL();
      const context = new GlContext(gl);

      context.bindDrawMode(DRAW_2D);
      context.bindDrawMode(DRAW_2D);

      expect(gl.disable).toHaveBeenCalledTimes(2);
    });
  });

  describe("errors", () => {
    it("names the error reported by the driver", () => {
      const gl = createMockGL();
      const context = new GlContext(gl);
      vi.spyOn(console, "error").mockImplementation(() => {});
      (gl.getError as ReturnType<typeof vi.fn>).mockReturnValue(INVALID_OPERATION);

      expect(() => context.checkForErrors()).toThrow("WebGL error: INVALID_OPERATION (0x502)");
    });

    it("only checks after draws in debug mode", () => {
      const gl = createMockGL();
      (gl.getError as ReturnType<typeof vi.fn>).mockReturnValue(INVALID_OPERATION);
      vi.spyOn(console, "error").mockImplementation(() => {});

      expect(() => new GlContext(gl).afterDraw()).not.toThrow();
      expect(() => new GlContext(gl, { debug: true }).afterDraw()).toThrow("WebGL error");
    });
  });

  it("deletes the instancing buffer on destroy", () => {
    const gl = createMockGL();
    const context = new GlContext(gl);

    context.destroy();

    expect(gl.deleteBuffer).toHaveBeenCalledWith(context.instancedVbo.handle);
  });
});
