/**
 * Text Widgets
 *
 * Multi-line text: a fixed `TextBox`, and a `MessageBox` that keeps the most
 * recent lines with a color each.
 */

import type { Vec2 } from "../../math/vec2";
import { Color4 } from "../Color4";
import type { Font } from "../Font";
import { BaseWidget, type DrawParams, type MinSizeParams } from "../Gui";

/** Widest line by whole pixels, one line height per line */
function linesSize(font: Font, lines: readonly string[]): Vec2 {
  if (lines.length === 0) return [0, 0];
  const width = Math.max(...lines.map((line) => Math.trunc(font.stringWidth(line))));
  return [width, font.advanceY * lines.length];
}

export class TextBox extends BaseWidget {
  private lines: string[] = [];
  private textColor = Color4.BLACK;

  constructor(text: string) {
    super();
    this.setText(text);
  }

  setText(text: string): void {
    this.lines = text.split("\n");
  }

  withTextColor(color: Color4): this {
    this.textColor = color;
    return this;
  }

  draw({ rect, theme }: DrawParams): void {
    const advanceY = theme.font.advanceY;
    this.lines.forEach((line, i) => {
      theme.font.drawString(line, [rect.start[0], rect.start[1] + advanceY * i], this.textColor);
    });
  }

  minSize({ theme }: MinSizeParams): Vec2 {
    return linesSize(theme.font, this.lines);
  }
}

interface MessageLine {
  text: string;
  color: Color4;
}

/** Keep one alive across frames; adding past `maxLines` drops the oldest line */
export class MessageBox extends BaseWidget {
  private readonly messages: MessageLine[] = [];
  private readonly maxLines: number;

  constructor(maxLines: number) {
    super();
    this.maxLines = maxLines;
  }

  get lines(): readonly string[] {
    return this.messages.map((m) => m.text);
  }

  addLine(color: Color4, text: string): void {
    this.messages.push({ text, color });
    if (this.messages.length > this.maxLines) {
      this.messages.shift();
    }
  }

  draw({ rect, theme }: DrawParams): void {
    const advanceY = theme.font.advanceY;
    this.messages.forEach(({ text, color }, i) => {
      theme.font.drawString(text, [rect.start[0], rect.start[1] + advanceY * i], color);
    });
  }

  minSize({ theme }: MinSizeParams): Vec2 {
    return linesSize(theme.font, this.lines);
  }
}
