// Node has no Image; this one decodes nothing and loads synchronously.
// URLs containing "missing" fail.
if (typeof globalThis.Image === "undefined") {
  class MockImage {
    onload: (() => void) | null = null;
    onerror: (() => void) | null = null;
    crossOrigin: string | null = null;
    width = 0;
    height = 0;
    private _src = "";

    get src(): string {
      return this._src;
    }

    set src(value: string) {
      this._src = value;
      if (value.includes("missing")) {
        this.onerror?.();
        return;
      }
      this.width = 16;
      this.height = 8;
      this.onload?.();
    }
  }

  Object.defineProperty(globalThis, "Image", { value: MockImage, configurable: true, writable: true });
}
