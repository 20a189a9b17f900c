/**
 * Text Entry Component
 *
 * Single-line text field with a caret. Typing goes in at the caret,
 * Backspace deletes before it, and the arrow keys move it. By default Enter
 * submits the text and clears the field. With `continuousUpdates` every
 * update reports the current text and Enter leaves it in place.
 */

import type { Vec2 } from "../../math/vec2";
import type { Color4 } from "../Color4";
import type { GuiEvent } from "../events";
import { BaseWidget, type Component, type DrawParams, type MinSizeParams } from "../Gui";
import { Stopwatch } from "../Stopwatch";
import type { Theme } from "../Theme";
import { BUTTON_TEXT_OFFSET } from "./Button";

/** Seconds per caret on/off cycle */
export const CARET_BLINK_RATE = 1;

/** Placeholder text is drawn at this fraction of the text color */
const PLACEHOLDER_DIM = 0.8;

export interface TextEntryOptions {
  text: string;
  placeholder: string;
  /** Submit the placeholder when the field is empty */
  usePlaceholderIfEmpty: boolean;
  /** In characters; the placeholder must fit too */
  maxLength: number;
  continuousUpdates: boolean;
  /** Overrides the theme's button text color */
  textColor: Color4 | null;
  /** Milliseconds, drives the caret blink */
  now: () => number;
}

export interface TextEntryResult {
  /** Submitted text, or the current text with `continuousUpdates` */
  text: string | null;
}

export class TextEntry extends BaseWidget implements Component<TextEntryResult> {
  private chars: string[];
  private caretPos = 0;
  private readonly placeholder: string;
  private readonly usePlaceholderIfEmpty: boolean;
  private readonly maxLength: number;
  private readonly continuousUpdates: boolean;
  private textColor: Color4 | null;
  private readonly stopwatch: Stopwatch;

  constructor(options: Pick<TextEntryOptions, "maxLength"> & Partial<TextEntryOptions>) {
    super();
    const placeholder = options.placeholder ?? "";
    if (Array.from(placeholder).length > options.maxLength) {
      throw new Error(`Placeholder text longer than max length ${options.maxLength}`);
    }
    this.chars = Array.from(options.text ?? "");
    this.placeholder = placeholder;
    this.usePlaceholderIfEmpty = options.usePlaceholderIfEmpty ?? false;
    this.maxLength = options.maxLength;
    this.continuousUpdates = options.continuousUpdates ?? false;
    this.textColor = options.textColor ?? null;
    this.stopwatch = new Stopwatch(options.now);
  }

  override get isComponent(): boolean {
    return true;
  }

  get text(): string {
    return this.chars.join("");
  }

  set text(text: string) {
    this.chars = Array.from(text);
    this.caretPos = Math.min(this.caretPos, this.chars.length);
  }

  get caret(): number {
    return this.caretPos;
  }

  withTextColor(color: Color4): this {
    this.textColor = color;
    return this;
  }

  /** What Enter would submit */
  currentText(): string {
    if (this.chars.length === 0 && this.usePlaceholderIfEmpty) {
      return this.placeholder;
    }
    return this.text;
  }

  update(_theme: Theme, events: GuiEvent[]): TextEntryResult {
    let submitted: string | null = null;
    for (const event of events) {
      if (event.kind === "keyDown") {
        switch (event.key.code) {
          case "Backspace":
            if (this.caretPos > 0) {
              this.chars.splice(this.caretPos - 1, 1);
              this.caretPos -= 1;
            }
            break;
          case "ArrowLeft":
            this.caretPos = Math.max(this.caretPos - 1, 0);
            break;
          case "ArrowRight":
            this.caretPos = Math.min(this.caretPos + 1, this.chars.length);
            break;
          case "Enter":
            submitted = this.takeCurrentText();
            this.caretPos = 0;
            break;
        }
      } else if (event.kind === "charEntered" && this.chars.length < this.maxLength) {
        this.chars.splice(this.caretPos, 0, event.char);
        this.caretPos += 1;
      }
    }
    if (this.continuousUpdates) {
      submitted = this.currentText();
    }
    return { text: submitted };
  }

  draw({ rect, theme, draw2d, isActive }: DrawParams): void {
    const empty = this.chars.length === 0;
    const drawn = empty ? this.placeholder : this.text;
    const baseColor = this.textColor ?? theme.buttonTextColor;
    const color = empty ? baseColor.mul(PLACEHOLDER_DIM) : baseColor;

    draw2d.fillRect(rect, theme.buttonFillColor);
    draw2d.outlineRect(rect, theme.buttonBorderColor, 1);
    theme.font.drawString(
      drawn,
      [rect.start[0] + BUTTON_TEXT_OFFSET[0], rect.start[1] + BUTTON_TEXT_OFFSET[1]],
      color
    );

    const caretVisible = this.stopwatch.time() % CARET_BLINK_RATE < CARET_BLINK_RATE * 0.5;
    if (isActive && caretVisible) {
      const beforeCaret = Array.from(drawn).slice(0, this.caretPos).join("");
      const x = rect.start[0] + theme.font.stringWidth(beforeCaret) + BUTTON_TEXT_OFFSET[0];
      draw2d.drawLine([x, rect.start[1] + 2], [x, rect.end[1] - 2], baseColor, 1);
    }
  }

  minSize({ theme }: MinSizeParams): Vec2 {
    const drawn = this.chars.length === 0 ? this.placeholder : this.text;
    const [w, h] = theme.font.stringSize(drawn);
    return [w + BUTTON_TEXT_OFFSET[0] * 2, h + BUTTON_TEXT_OFFSET[1] * 2];
  }

  /** The current text; clears the field unless `continuousUpdates` is on */
  private takeCurrentText(): string {
    const text = this.currentText();
    if (!this.continuousUpdates && this.chars.length > 0) {
      this.chars = [];
    }
    return text;
  }
}
