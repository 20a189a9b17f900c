/**
 * GUI events and their conversion from DOM events
 */

import type { Vec2 } from "../math/vec2";

export interface Key {
  /** A `KeyboardEvent.code` value such as `"KeyA"` or `"Enter"` */
  code: string;
  shift: boolean;
  ctrl: boolean;
  alt: boolean;
  /** True for Shift, Control and Alt themselves */
  isModifier: boolean;
}

export type MouseButton = "left" | "middle" | "right" | "back" | "forward";

export type GuiEvent =
  | { kind: "keyDown"; key: Key }
  | { kind: "keyUp"; key: Key }
  | { kind: "charEntered"; char: string }
  | { kind: "mouseDown"; button: MouseButton; pos: Vec2 }
  | { kind: "mouseUp"; button: MouseButton; pos: Vec2 }
  | { kind: "mouseMove"; pos: Vec2; movement: Vec2 }
  | { kind: "mouseEnter" }
  | { kind: "mouseLeave" }
  | { kind: "focusGained" }
  | { kind: "focusLost" }
  /** Apps should resize their screen surface in response */
  | { kind: "windowResized"; size: Vec2 }
  | { kind: "pointerLocked" }
  | { kind: "pointerUnlocked" }
  /** -1 up, 1 down, 0 for horizontal-only scrolling */
  | { kind: "scroll"; delta: number };

export type GuiEventKind = GuiEvent["kind"];

const MODIFIER_KEYS = new Set(["Shift", "Control", "Alt"]);

export function keyFromDom(e: KeyboardEvent): Key {
  return {
    code: e.code,
    shift: e.shiftKey,
    ctrl: e.ctrlKey,
    alt: e.altKey,
    isModifier: MODIFIER_KEYS.has(e.key),
  };
}

/** The printable character a key event produces, if any */
export function charFromDom(e: KeyboardEvent): string | null {
  return Array.from(e.key).length === 1 ? e.key : null;
}

const DOM_BUTTONS: readonly MouseButton[] = ["left", "middle", "right", "back", "forward"];

export function mouseButtonFromDom(button: number): MouseButton | null {
  return DOM_BUTTONS[button] ?? null;
}

function mousePos(e: MouseEvent): Vec2 {
  return [e.offsetX, e.offsetY];
}

/**
 * Convert a canvas mouse event. Returns null for event types that don't map
 * and for buttons beyond the fifth.
 */
export function mouseEventFromDom(e: MouseEvent): GuiEvent | null {
  switch (e.type) {
    case "mousedown": {
      const button = mouseButtonFromDom(e.button);
      return button ? { kind: "mouseDown", button, pos: mousePos(e) } : null;
    }
    case "mouseup": {
      const button = mouseButtonFromDom(e.button);
      return button ? { kind: "mouseUp", button, pos: mousePos(e) } : null;
    }
    case "mousemove":
      return { kind: "mouseMove", pos: mousePos(e), movement: [e.movementX, e.movementY] };
    case "mouseenter":
      return { kind: "mouseEnter" };
    case "mouseleave":
      return { kind: "mouseLeave" };
    default:
      return null;
  }
}

export function scrollDelta(e: WheelEvent): number {
  return Math.sign(e.deltaY);
}

export function isKeyEvent(event: GuiEvent): event is Extract<GuiEvent, { key: Key }> {
  return event.kind === "keyDown" || event.kind === "keyUp";
}

export function isMouseButtonEvent(
  event: GuiEvent
): event is Extract<GuiEvent, { button: MouseButton }> {
  return event.kind === "mouseDown" || event.kind === "mouseUp";
}
