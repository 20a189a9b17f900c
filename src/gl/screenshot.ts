/**
 * Reading a surface back into memory
 */

import { GL_PACK_ALIGNMENT, GL_RGBA, GL_UNSIGNED_BYTE } from "./constants";
import type { GlContext } from "./GlContext";
import type { Surface } from "./Surface";

export interface Screenshot {
  width: number;
  height: number;
  channels: 3 | 4;
  /** Rows top to bottom, tightly packed */
  data: Uint8Array;
}

/**
 * Read every pixel of a surface. WebGL returns rows bottom to top; the result
 * is flipped so the first row is the top of the image.
 */
export function takeScreenshot(
  context: GlContext,
  surface: Surface,
  includeAlpha: boolean
): Screenshot {
  const [width, height] = surface.size();
  const rgba = new Uint8Array(width * height * 4);

  surface.bindRead(context);
  context.gl.pixelStorei(GL_PACK_ALIGNMENT, 1);
  // RGBA is the only format every implementation must support for readPixels
  context.gl.readPixels(0, 0, width, height, GL_RGBA, GL_UNSIGNED_BYTE, rgba);

  const channels = includeAlpha ? 4 : 3;
  const data = new Uint8Array(width * height * channels);
  for (let y = 0; y < height; y++) {
    const srcRow = (height - 1 - y) * width * 4;
    const dstRow = y * width * channels;
    for (let x = 0; x < width; x++) {
      const src = srcRow + x * 4;
      const dst = dstRow + x * channels;
      for (let c = 0; c < channels; c++) {
        data[dst + c] = rgba[src + c] ?? 0;
      }
    }
  }

  return { width, height, channels, data };
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `screenshot-YYYY-MM-DD_HH-MM-SS.png` in local time */
export function screenshotFileName(date: Date = new Date()): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `screenshot-${day}_${time}.png`;
}

/** Encode as a PNG data URL through a 2D canvas */
export function screenshotToDataUrl(
  shot: Screenshot,
  canvas: HTMLCanvasElement = document.createElement("canvas")
): string {
  canvas.width = shot.width;
  canvas.height = shot.height;
  const ctx = canvas.getContext("2d");
  if (!ctx) {
    throw new Error("2D canvas not supported");
  }

  const image = ctx.createImageData(shot.width, shot.height);
  const pixelCount = shot.width * shot.height;
  for (let i = 0; i < pixelCount; i++) {
    const src = i * shot.channels;
    const dst = i * 4;
    image.data[dst] = shot.data[src] ?? 0;
    image.data[dst + 1] = shot.data[src + 1] ?? 0;
    image.data[dst + 2] = shot.data[src + 2] ?? 0;
    image.data[dst + 3] = shot.channels === 4 ? (shot.data[src + 3] ?? 0) : 255;
  }
  ctx.putImageData(image, 0, 0);
  return canvas.toDataURL("image/png");
}
