/**
 * GUI Theme
 *
 * Colors and spacing shared by every widget. Colors are linear `Color4`s.
 */

import { Color4 } from "./Color4";
import type { Font } from "./Font";

export interface Theme {
  font: Font;
  labelColor: Color4;
  buttonTextColor: Color4;
  buttonFillColor: Color4;
  buttonBorderColor: Color4;
  /** Fill of a button under the cursor */
  buttonSelectedFillColor: Color4;
  /** Fill of the button that has keyboard focus */
  buttonActiveFillColor: Color4;
  /** Pixels, used by `Padding` and `Inset` */
  padding: number;
}

export type ThemeColors = Omit<Theme, "font">;

/** Light gray buttons with black text */
export const DEFAULT_THEME_COLORS: ThemeColors = {
  labelColor: Color4.WHITE,
  buttonTextColor: Color4.BLACK,
  buttonFillColor: Color4.fromGrayscaleSrgb(0.8),
  buttonBorderColor: Color4.BLACK,
  buttonSelectedFillColor: Color4.fromGrayscaleSrgb(0.9),
  buttonActiveFillColor: Color4.fromGrayscaleSrgb(0.7),
  padding: 4,
};

/** Merge `overrides` over the default colors */
export function createTheme(font: Font, overrides: Partial<ThemeColors> = {}): Theme {
  return { font, ...DEFAULT_THEME_COLORS, ...overrides };
}
