/**
 * Assets - binary files and images fetched up front
 *
 * Meant for large assets; small ones are better bundled with the code.
 */

import { createLogger } from "../log";

const log = createLogger("Assets");

export interface AssetsOptions {
  fetch: typeof fetch;
  /** Sent with every image request */
  crossOrigin: string | null;
}

function loadImage(url: string, crossOrigin: string | null): Promise<HTMLImageElement> {
  const image = new Image();
  if (crossOrigin !== null) {
    image.crossOrigin = crossOrigin;
  }
  return new Promise((resolve, reject) => {
    image.onload = () => resolve(image);
    image.onerror = () => reject(new Error(`Failed to load image ${url}`));
    image.src = url;
  });
}

export class Assets {
  private readonly assets: Map<string, Uint8Array>;
  private readonly images: Map<string, HTMLImageElement>;

  /**
   * Fetch every asset and image concurrently. Rejects with the first failure.
   */
  static async load(
    assetUrls: readonly string[],
    imageUrls: readonly string[] = [],
    options: Partial<AssetsOptions> = {}
  ): Promise<Assets> {
    const fetchFn = options.fetch ?? fetch;
    const crossOrigin = options.crossOrigin ?? "anonymous";

    const assetsPromise = Promise.all(
      assetUrls.map(async (url): Promise<[string, Uint8Array]> => {
        const response = await fetchFn(url, { method: "GET", mode: "cors" });
        if (!response.ok) {
          throw new Error(`Failed to load asset ${url}: ${response.status}`);
        }
        return [url, new Uint8Array(await response.arrayBuffer())];
      })
    );
    const imagesPromise = Promise.all(
      imageUrls.map(async (url): Promise<[string, HTMLImageElement]> => [
        url,
        await loadImage(url, crossOrigin),
      ])
    );

    const [assets, images] = await Promise.all([assetsPromise, imagesPromise]);
    log.debug(`Loaded ${assets.length} assets and ${images.length} images`);
    return new Assets(new Map(assets), new Map(images));
  }

  constructor(
    assets: Map<string, Uint8Array> = new Map(),
    images: Map<string, HTMLImageElement> = new Map()
  ) {
    this.assets = assets;
    this.images = images;
  }

  get(url: string): Uint8Array | undefined {
    return this.assets.get(url);
  }

  /** Take an asset out, for when only one place needs it */
  remove(url: string): Uint8Array | undefined {
    const asset = this.assets.get(url);
    this.assets.delete(url);
    return asset;
  }

  has(url: string): boolean {
    return this.assets.has(url) || this.images.has(url);
  }

  getImage(url: string): HTMLImageElement | undefined {
    return this.images.get(url);
  }

  removeImage(url: string): HTMLImageElement | undefined {
    const image = this.images.get(url);
    this.images.delete(url);
    return image;
  }
}
