/**
 * Button Component
 *
 * Pressed by a left click, or by Enter or Space while it has focus.
 */

import type { Vec2 } from "../../math/vec2";
import type { GuiEvent } from "../events";
import { BaseWidget, type Component, type DrawParams, type MinSizeParams } from "../Gui";
import type { Theme } from "../Theme";

export interface ButtonResult {
  pressed: boolean;
}

const PRESS_KEYS = new Set(["Enter", "Space"]);

/** Space between the border and the text */
export const BUTTON_TEXT_OFFSET: Vec2 = [2, 1];

export class Button extends BaseWidget implements Component<ButtonResult> {
  text: string;

  constructor(text: string) {
    super();
    this.text = text;
  }

  override get isComponent(): boolean {
    return true;
  }

  update(_theme: Theme, events: GuiEvent[]): ButtonResult {
    const pressed = events.some(
      (event) =>
        (event.kind === "mouseDown" && event.button === "left") ||
        (event.kind === "keyDown" && PRESS_KEYS.has(event.key.code))
    );
    return { pressed };
  }

  draw({ rect, theme, draw2d, cursorPos, isActive }: DrawParams): void {
    let fill = theme.buttonFillColor;
    if (cursorPos && rect.containsPoint(cursorPos)) {
      fill = theme.buttonSelectedFillColor;
    } else if (isActive) {
      fill = theme.buttonActiveFillColor;
    }
    draw2d.fillRect(rect, fill);
    draw2d.outlineRect(rect, theme.buttonBorderColor, 1);
    theme.font.drawString(
      this.text,
      [rect.start[0] + BUTTON_TEXT_OFFSET[0], rect.start[1] + BUTTON_TEXT_OFFSET[1]],
      theme.buttonTextColor
    );
  }

  minSize({ theme }: MinSizeParams): Vec2 {
    const [w, h] = theme.font.stringSize(this.text);
    return [w + BUTTON_TEXT_OFFSET[0] * 2, h + BUTTON_TEXT_OFFSET[1] * 2];
  }
}
