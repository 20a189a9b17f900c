/**
 * Label Widget
 *
 * A single line of text in the theme's label color.
 */

import type { Vec2 } from "../../math/vec2";
import { BaseWidget, type DrawParams, type MinSizeParams } from "../Gui";

export class Label extends BaseWidget {
  text: string;

  constructor(text: string) {
    super();
    this.text = text;
  }

  draw({ rect, theme }: DrawParams): void {
    theme.font.drawString(this.text, rect.start, theme.labelColor);
  }

  minSize({ theme }: MinSizeParams): Vec2 {
    return theme.font.stringSize(this.text);
  }
}
