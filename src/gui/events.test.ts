import { describe, it, expect } from "vitest";
import { fakeKeyboardEvent, fakeMouseEvent, fakeWheelEvent } from "../testing/domEvents";
import {
  charFromDom,
  isKeyEvent,
  isMouseButtonEvent,
  keyFromDom,
  mouseButtonFromDom,
  mouseEventFromDom,
  scrollDelta,
} from "./events";

describe("keyFromDom", () => {
  it("copies the code and modifier flags", () => {
    const key = keyFromDom(
      fakeKeyboardEvent("keydown", { code: "KeyA", key: "A", shiftKey: true, ctrlKey: true })
    );

    expect(key).toEqual({ code: "KeyA", shift: true, ctrl: true, alt: false, isModifier: false });
  });

  it("flags the modifier keys themselves", () => {
    for (const key of ["Shift", "Control", "Alt"]) {
      expect(keyFromDom(fakeKeyboardEvent("keydown", { key })).isModifier).toBe(true);
    }
    expect(keyFromDom(fakeKeyboardEvent("keydown", { key: "Meta" })).isModifier).toBe(false);
  });
});

describe("charFromDom", () => {
  it("returns single character keys", () => {
    expect(charFromDom(fakeKeyboardEvent("keydown", { key: "a" }))).toBe("a");
    expect(charFromDom(fakeKeyboardEvent("keydown", { key: " " }))).toBe(" ");
    expect(charFromDom(fakeKeyboardEvent("keydown", { key: "é" }))).toBe("é");
  });

  it("ignores named keys", () => {
    expect(charFromDom(fakeKeyboardEvent("keydown", { key: "Enter" }))).toBeNull();
    expect(charFromDom(fakeKeyboardEvent("keydown", { key: "ArrowLeft" }))).toBeNull();
  });
});

describe("mouse events", () => {
  it("maps DOM button numbers", () => {
    expect([0, 1, 2, 3, 4].map(mouseButtonFromDom)).toEqual([
      "left",
      "middle",
      "right",
      "back",
      "forward",
    ]);
    expect(mouseButtonFromDom(5)).toBeNull();
  });

  it("converts presses with the position inside the canvas", () => {
    expect(mouseEventFromDom(fakeMouseEvent("mousedown", { button: 2, offsetX: 5, offsetY: 7 }))).toEqual({
      kind: "mouseDown",
      button: "right",
      pos: [5, 7],
    });
    expect(mouseEventFromDom(fakeMouseEvent("mouseup", { offsetX: 1, offsetY: 2 }))).toEqual({
      kind: "mouseUp",
      button: "left",
      pos: [1, 2],
    });
  });

  it("converts moves with their movement", () => {
    const event = mouseEventFromDom(
      fakeMouseEvent("mousemove", { offsetX: 10, offsetY: 20, movementX: 3, movementY: -4 })
    );

    expect(event).toEqual({ kind: "mouseMove", pos: [10, 20], movement: [3, -4] });
  });

  it("converts enter and leave", () => {
    expect(mouseEventFromDom(fakeMouseEvent("mouseenter"))).toEqual({ kind: "mouseEnter" });
    expect(mouseEventFromDom(fakeMouseEvent("mouseleave"))).toEqual({ kind: "mouseLeave" });
  });

  it("rejects unknown buttons and event types", () => {
    expect(mouseEventFromDom(fakeMouseEvent("mousedown", { button: 7 }))).toBeNull();
    expect(mouseEventFromDom(fakeMouseEvent("click"))).toBeNull();
  });
});

describe("scrollDelta", () => {
  it("keeps only the direction", () => {
    expect(scrollDelta(fakeWheelEvent(120))).toBe(1);
    expect(scrollDelta(fakeWheelEvent(-3.5))).toBe(-1);
  });
});

describe("event guards", () => {
  it("narrows key and mouse button events", () => {
    const key = { code: "KeyA", shift: false, ctrl: false, alt: false, isModifier: false };

    expect(isKeyEvent({ kind: "keyUp", key })).toBe(true);
    expect(isKeyEvent({ kind: "charEntered", char: "a" })).toBe(false);
    expect(isMouseButtonEvent({ kind: "mouseDown", button: "left", pos: [0, 0] })).toBe(true);
    expect(isMouseButtonEvent({ kind: "mouseMove", pos: [0, 0], movement: [0, 0] })).toBe(false);
  });
});
