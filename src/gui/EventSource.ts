/**
 * EventSource - turns DOM listeners into a single GuiEvent callback
 */

import { createLogger } from "../log";
import type { Vec2 } from "../math/vec2";
import { EventState } from "./EventState";
import {
  charFromDom,
  keyFromDom,
  mouseEventFromDom,
  scrollDelta,
  type GuiEvent,
} from "./events";

const log = createLogger("EventSource");

/** Where listeners go, and the two window queries the events need */
export interface EventTargets {
  document: EventTarget;
  window: EventTarget;
  isPointerLocked(): boolean;
  windowSize(): Vec2;
}

export function domEventTargets(): EventTargets {
  return {
    document,
    window,
    isPointerLocked: () => document.pointerLockElement !== null,
    windowSize: () => [window.innerWidth, window.innerHeight],
  };
}

export type EventCallback = (event: GuiEvent, state: EventState) => void;

export interface EventSource {
  /** Read only; updated before each callback */
  readonly eventState: EventState;
  /** Remove every listener */
  destroy(): void;
}

function isKeyboardEvent(e: Event): e is KeyboardEvent {
  return "code" in e && "key" in e;
}

function isMouseEvent(e: Event): e is MouseEvent {
  return "button" in e && "offsetX" in e;
}

function isWheelEvent(e: Event): e is WheelEvent {
  return "deltaY" in e;
}

/**
 * Listen for input on `canvas`, the document and the window. `startMainLoop`
 * calls this; use it directly only when something other than animation
 * frames drives rendering.
 */
export function setupEventCallbacks(
  canvas: EventTarget,
  callback: EventCallback,
  targets: EventTargets = domEventTargets()
): EventSource {
  const eventState = new EventState();
  const listeners: [EventTarget, string, (e: Event) => void][] = [];

  const emit = (event: GuiEvent): void => {
    eventState.applyEvent(event);
    callback(event, eventState);
  };

  const listen = (target: EventTarget, type: string, listener: (e: Event) => void): void => {
    target.addEventListener(type, listener);
    listeners.push([target, type, listener]);
  };

  listen(targets.document, "keydown", (e) => {
    if (!isKeyboardEvent(e)) return;
    emit({ kind: "keyDown", key: keyFromDom(e) });
    const char = charFromDom(e);
    if (char !== null) {
      emit({ kind: "charEntered", char });
    }
  });
  listen(targets.document, "keyup", (e) => {
    if (!isKeyboardEvent(e)) return;
    emit({ kind: "keyUp", key: keyFromDom(e) });
  });
  listen(targets.document, "pointerlockchange", () => {
    emit(targets.isPointerLocked() ? { kind: "pointerLocked" } : { kind: "pointerUnlocked" });
  });

  listen(targets.window, "focus", () => emit({ kind: "focusGained" }));
  listen(targets.window, "blur", () => emit({ kind: "focusLost" }));
  listen(targets.window, "resize", () => emit({ kind: "windowResized", size: targets.windowSize() }));

  for (const type of ["mousedown", "mouseup", "mousemove", "mouseenter", "mouseleave"]) {
    listen(canvas, type, (e) => {
      const event = isMouseEvent(e) ? mouseEventFromDom(e) : null;
      if (event) {
        emit(event);
      } else {
        log.warn(`Invalid mouse event: ${e.type}`);
      }
    });
  }
  listen(canvas, "wheel", (e) => {
    if (!isWheelEvent(e)) return;
    // Browsers disagree on wheel units, so only the direction is kept
    emit({ kind: "scroll", delta: scrollDelta(e) });
  });

  return {
    eventState,
    destroy() {
      for (const [target, type, listener] of listeners) {
        target.removeEventListener(type, listener);
      }
      listeners.length = 0;
    },
  };
}
