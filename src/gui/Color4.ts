/**
 * Linear RGBA colors
 *
 * Conversions to and from sRGB approximate the transfer curve with a gamma
 * of 2.2. Alpha is never gamma-encoded.
 */

const GAMMA = 2.2;

export class Color4 {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;

  constructor(r: number, g: number, b: number, a: number) {
    this.r = r;
    this.g = g;
    this.b = b;
    this.a = a;
  }

  static readonly BLACK = new Color4(0, 0, 0, 1);
  static readonly WHITE = new Color4(1, 1, 1, 1);
  static readonly RED = new Color4(1, 0, 0, 1);
  static readonly GREEN = new Color4(0, 1, 0, 1);
  static readonly BLUE = new Color4(0, 0, 1, 1);
  static readonly CYAN = new Color4(0, 1, 1, 1);
  static readonly MAGENTA = new Color4(1, 0, 1, 1);
  static readonly YELLOW = new Color4(1, 1, 0, 1);
  static readonly TRANSPARENT = new Color4(0, 0, 0, 0);

  /** From sRGB components; alpha is taken as-is */
  static fromSrgba(r: number, g: number, b: number, a: number): Color4 {
    return new Color4(r ** GAMMA, g ** GAMMA, b ** GAMMA, a);
  }

  static fromSrgb(r: number, g: number, b: number): Color4 {
    return Color4.fromSrgba(r, g, b, 1);
  }

  static fromGrayscaleSrgb(x: number): Color4 {
    return Color4.fromSrgba(x, x, x, 1);
  }

  /**
   * From hue, saturation and value, each in 0..1. The result is treated as
   * sRGB. A negative saturation rotates the hue by half a turn.
   */
  static fromHsv(h: number, s: number, v: number): Color4 {
    const c = v * Math.abs(s);
    const h2 = ((h + (s < 0 ? 0.5 : 0)) % 1) * 6;
    const x = c * (1 - Math.abs((h2 % 2) - 1));
    const m = v - c;

    let rgb: [number, number, number];
    switch (h2 < 0 ? 0 : Math.floor(h2)) {
      case 0:
        rgb = [c, x, 0];
        break;
      case 1:
        rgb = [x, c, 0];
        break;
      case 2:
        rgb = [0, c, x];
        break;
      case 3:
        rgb = [0, x, c];
        break;
      case 4:
        rgb = [x, 0, c];
        break;
      case 5:
        rgb = [c, 0, x];
        break;
      default:
        throw new Error(`Invalid hue ${h}`);
    }
    return Color4.fromSrgb(rgb[0] + m, rgb[1] + m, rgb[2] + m);
  }

  /** sRGB-encoded components, alpha unchanged */
  toSrgb(): [number, number, number, number] {
    return [this.r ** (1 / GAMMA), this.g ** (1 / GAMMA), this.b ** (1 / GAMMA), this.a];
  }

  toArray(): [number, number, number, number] {
    return [this.r, this.g, this.b, this.a];
  }

  /** Composite `other` over this color according to `other`'s alpha */
  blend(other: Color4): Color4 {
    const keep = 1 - other.a;
    const below = new Color4(this.r * keep, this.g * keep, this.b * keep, this.a * keep);
    return below.add(other.mul(other.a));
  }

  /** Interpolate every component, alpha included */
  lerp(other: Color4, otherAmount: number): Color4 {
    const t = otherAmount;
    return new Color4(
      this.r + (other.r - this.r) * t,
      this.g + (other.g - this.g) * t,
      this.b + (other.b - this.b) * t,
      this.a + (other.a - this.a) * t
    );
  }

  /**
   * Scale the color in sRGB space. Darkening or lightening this way looks
   * closer to what the eye expects than scaling linear values.
   */
  mulSrgb(factor: number): Color4 {
    const [r, g, b, a] = this.toSrgb();
    return Color4.fromSrgba(r * factor, g * factor, b * factor, a);
  }

  add(other: Color4): Color4 {
    return new Color4(this.r + other.r, this.g + other.g, this.b + other.b, this.a + other.a);
  }

  /** Scales rgb; alpha is left alone */
  mul(factor: number): Color4 {
    return new Color4(this.r * factor, this.g * factor, this.b * factor, this.a);
  }

  equals(other: Color4): boolean {
    return this.r === other.r && this.g === other.g && this.b === other.b && this.a === other.a;
  }
}

/** Vertex writer for color attributes (size 4) */
export function writeColor(color: Color4, out: number[]): void {
  out.push(color.r, color.g, color.b, color.a);
}
