/**
 * EventState - input state accumulated from the event stream
 */

import type { Vec2 } from "../math/vec2";
import type { GuiEvent, MouseButton } from "./events";

export class EventState {
  /** `KeyboardEvent.code` values of the keys held down */
  readonly pressedKeys = new Set<string>();
  readonly pressedMouseButtons = new Set<MouseButton>();
  /** Cursor position within the canvas, or null when it is outside */
  cursorPos: Vec2 | null = null;
  /** Cursor position before the last mouse move */
  prevCursorPos: Vec2 | null = null;
  pointerLocked = false;
  shift = false;
  ctrl = false;
  alt = false;

  applyEvent(event: GuiEvent): void {
    switch (event.kind) {
      case "keyDown":
        this.pressedKeys.add(event.key.code);
        this.setModifiers(event.key.shift, event.key.ctrl, event.key.alt);
        break;
      case "keyUp":
        this.pressedKeys.delete(event.key.code);
        this.setModifiers(event.key.shift, event.key.ctrl, event.key.alt);
        break;
      case "focusLost":
        this.pressedKeys.clear();
        this.pressedMouseButtons.clear();
        this.setModifiers(false, false, false);
        break;
      case "mouseDown":
        this.pressedMouseButtons.add(event.button);
        break;
      case "mouseUp":
        this.pressedMouseButtons.delete(event.button);
        break;
      case "mouseLeave":
        this.pressedMouseButtons.clear();
        this.cursorPos = null;
        break;
      case "pointerLocked":
        this.pointerLocked = true;
        break;
      case "pointerUnlocked":
        this.pointerLocked = false;
        break;
      case "mouseMove":
        this.prevCursorPos = this.cursorPos;
        this.cursorPos = [event.pos[0], event.pos[1]];
        break;
      default:
        break;
    }
  }

  isKeyPressed(code: string): boolean {
    return this.pressedKeys.has(code);
  }

  isMouseButtonPressed(button: MouseButton): boolean {
    return this.pressedMouseButtons.has(button);
  }

  private setModifiers(shift: boolean, ctrl: boolean, alt: boolean): void {
    this.shift = shift;
    this.ctrl = ctrl;
    this.alt = alt;
  }
}
