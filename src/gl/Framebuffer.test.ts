import { describe, it, expect, vi } from "vitest";
import { Framebuffer } from "./Framebuffer";
import { GlContext } from "./GlContext";
import { createMockCanvas } from "../testing/mockGL";

const FRAMEBUFFER = 0x8d40;
const DRAW_FRAMEBUFFER = 0x8ca9;
const READ_FRAMEBUFFER = 0x8ca8;
const RENDERBUFFER = 0x8d41;
const COLOR_ATTACHMENT0 = 0x8ce0;
const TEXTURE_2D = 0x0de1;
const RGBA8 = 0x8058;
const COLOR_BUFFER_BIT = 0x4000;
const NEAREST = 0x2600;
const INCOMPLETE_ATTACHMENT = 0x8cd6;
const UNSUPPORTED = 0x8cdd;

function setup() {
  const { context, screenSurface } = GlContext.fromCanvas(createMockCanvas(640, 480));
  return { context, gl: context.gl, screen: screenSurface };
}

describe("Framebuffer", () => {
  it("attaches a new texture as color attachment 0", () => {
    const { context, gl } = setup();

    const fb = Framebuffer.withTexture(context, [256, 128]);

    expect(gl.bindFramebuffer).toHaveBeenCalledWith(FRAMEBUFFER, fb.handle);
    expect(gl.framebufferTexture2D).toHaveBeenCalledWith(
      FRAMEBUFFER,
      COLOR_ATTACHMENT0,
      TEXTURE_2D,
      fb.attachment.handle,
      0
    );
    expect(fb.size()).toEqual([256, 128]);
  });

  it("allocates multisampled renderbuffers with the maximum sample count", () => {
    const { context, gl } = setup();

    const fb = Framebuffer.withRenderbuffer(context, [100, 50], "rgba");

    expect(gl.renderbufferStorageMultisample).toHaveBeenCalledWith(RENDERBUFFER, 4, RGBA8, 100, 50);
    expect(gl.framebufferRenderbuffer).toHaveBeenCalledWith(
      FRAMEBUFFER,
      COLOR_ATTACHMENT0,
      RENDERBUFFER,
      fb.attachment.handle
    );
    expect(fb.attachment.samples).toBe(4);
  });

  it("deletes the framebuffer and explains an incomplete one", () => {
    const { context, gl } = setup();
    vi.spyOn(console, "error").mockImplementation(() => {});
    (gl.checkFramebufferStatus as ReturnType<typeof vi.fn>).mockReturnValueOnce(
      INCOMPLETE_ATTACHMENT
    );

    expect(() => Framebuffer.withTexture(context, [4, 4])).toThrow(
      "Framebuffer not complete: incomplete attachment"
    );
    expect(gl.deleteFramebuffer).toHaveBeenCalledTimes(1);
    expect(gl.deleteTexture).toHaveBeenCalledTimes(1);
  });

  it("deletes a renderbuffer attachment when incomplete", () => {
    const { context, gl } = setup();
    vi.spyOn(console, "error").mockImplementation(() => {});
    (gl.checkFramebufferStatus as ReturnType<typeof vi.fn>).mockReturnValueOnce(UNSUPPORTED);

    expect(() => Framebuffer.withRenderbuffer(context, [4, 4], "rgba")).toThrow(
      "Framebuffer not complete: unsupported"
    );
    expect(gl.deleteRenderbuffer).toHaveBeenCalledTimes(1);
  });

  it("reports unsupported combinations", () => {
    const { context, gl } = setup();
    vi.spyOn(console, "error").mockImplementation(() => {});
    (gl.checkFramebufferStatus as ReturnType<typeof vi.fn>).mockReturnValueOnce(UNSUPPORTED);

    expect(() => Framebuffer.withTexture(context, [4, 4])).toThrow(
      "Framebuffer not complete: unsupported"
    );
  });

  it("forces the screen to rebind after creating a framebuffer", () => {
    const { context, gl, screen } = setup();
    screen.bind(context);

    Framebuffer.withTexture(context, [4, 4]);
    screen.bind(context);

    expect(gl.bindFramebuffer).toHaveBeenLastCalledWith(DRAW_FRAMEBUFFER, null);
    expect(gl.bindFramebuffer).toHaveBeenCalledTimes(3);
  });

  it("binds with a viewport of the attachment size", () => {
    const { context, gl } = setup();
    const fb = Framebuffer.withTexture(context, [256, 128]);

    fb.bind(context);
    fb.bind(context);

    expect(gl.bindFramebuffer).toHaveBeenLastCalledWith(DRAW_FRAMEBUFFER, fb.handle);
    expect(gl.bindFramebuffer).toHaveBeenCalledTimes(2);
    expect(gl.viewport).toHaveBeenCalledWith(0, 0, 256, 128);
  });

  it("blits the whole attachment to another surface", () => {
    const { context, gl, screen } = setup();
    const fb = Framebuffer.withRenderbuffer(context, [320, 240], "srgba");

    fb.blitTo(screen);

    expect(gl.bindFramebuffer).toHaveBeenCalledWith(READ_FRAMEBUFFER, fb.handle);
    expect(gl.bindFramebuffer).toHaveBeenCalledWith(DRAW_FRAMEBUFFER, null);
    expect(gl.blitFramebuffer).toHaveBeenCalledWith(
      0,
      0,
      320,
      240,
      0,
      0,
      320,
      240,
      COLOR_BUFFER_BIT,
      NEAREST
    );
  });

  it("deletes its attachment along with itself", () => {
    const { context, gl } = setup();
    const fb = Framebuffer.withTexture(context, [4, 4]);
    fb.bind(context);

    fb.destroy();

    expect(gl.deleteFramebuffer).toHaveBeenCalledWith(fb.handle);
    expect(gl.deleteTexture).toHaveBeenCalledWith(fb.attachment.handle);
    expect(context.cache.boundFramebuffer).toBeNull();
  });

  it("refuses to bind once destroyed", () => {
    const { context } = setup();
    const fb = Framebuffer.withTexture(context, [8, 8]);
    fb.destroy();

    expect(() => fb.bind(context)).toThrow("Cannot bind destroyed framebuffer");
    expect(() => fb.bindRead(context)).toThrow("Cannot bind destroyed framebuffer");
  });

  it("refuses to blit once destroyed", () => {
    const { context, screen } = setup();
    const fb = Framebuffer.withRenderbuffer(context, [8, 8], "rgba");
    fb.destroy();

    expect(() => fb.blitTo(screen)).toThrow("Cannot blit destroyed framebuffer");
  });

  it("ignores a second destroy", () => {
    const { context, gl } = setup();
    const fb = Framebuffer.withRenderbuffer(context, [8, 8], "rgba");

    fb.destroy();
    fb.destroy();

    expect(fb.destroyed).toBe(true);
    expect(gl.deleteFramebuffer).toHaveBeenCalledTimes(1);
    expect(gl.deleteRenderbuffer).toHaveBeenCalledTimes(1);
  });
});
