import { describe, it, expect, vi } from "vitest";
import { Rect } from "../../gl/Rect";
import { createGuiFixture, mouseDown } from "../../testing/guiFixture";
import { Color4 } from "../Color4";
import { Selector, type SelectorOption } from "./Selector";

const OPTIONS: SelectorOption<number>[] = [
  ["a", 1],
  ["bbb", 2],
  ["cc", 3],
];

describe("Selector", () => {
  it("rejects an initial selection out of range", () => {
    expect(() => new Selector(OPTIONS, 3)).toThrow("Selected option 3 out of range (3 options)");
    expect(new Selector(OPTIONS, 2).selectedOption()).toBe(3);
    expect(new Selector(OPTIONS).selectedOption()).toBeNull();
  });

  it("selects the line that was clicked", () => {
    const { theme } = createGuiFixture();
    const selector = new Selector(OPTIONS);

    const result = selector.update(theme, [mouseDown([2, 15])]);

    expect(result).toEqual({ selected: ["bbb", 2], justSelected: true });
    expect(selector.update(theme, [])).toEqual({ selected: ["bbb", 2], justSelected: false });
  });

  it("ignores clicks below the last option and other buttons", () => {
    const { theme } = createGuiFixture();
    const selector = new Selector(OPTIONS, 0);

    const result = selector.update(theme, [mouseDown([2, 35]), mouseDown([2, 15], "right")]);

    expect(result).toEqual({ selected: ["a", 1], justSelected: false });
  });

  it("keeps the selection on the same option when one before it is removed", () => {
    const selector = new Selector(OPTIONS, 2);

    selector.removeOption(0);
    expect(selector.selectedOption()).toBe(3);

    selector.removeOption(1);
    expect(selector.selectedOption()).toBeNull();

    expect(() => selector.removeOption(5)).toThrow("Option 5 out of range (1 options)");
  });

  it("sizes to the widest option and one line each", () => {
    const { minSizeParams } = createGuiFixture();
    const selector = new Selector(OPTIONS);

    expect(selector.minSize(minSizeParams())).toEqual([18, 30]);

    selector.addOption(["dddd", 4]);
    expect(selector.minSize(minSizeParams())).toEqual([24, 40]);
    expect(new Selector([]).minSize(minSizeParams())).toEqual([0, 0]);
  });

  it("shades the selected and hovered lines", () => {
    const { draw2d, font, drawParams } = createGuiFixture();
    const fillRect = vi.spyOn(draw2d, "fillRect");
    const drawString = vi.spyOn(font, "drawString");
    const selector = new Selector(OPTIONS, 1);

    selector.draw(drawParams(new Rect([10, 0], [100, 100]), { cursorPos: [11, 25] }));

    expect(fillRect.mock.calls).toEqual([
      [new Rect([10, 0], [16, 10]), Color4.WHITE],
      [new Rect([10, 10], [28, 20]), Color4.WHITE.mulSrgb(0.5)],
      [new Rect([10, 20], [22, 30]), Color4.WHITE.mulSrgb(0.75)],
    ]);
    expect(drawString).toHaveBeenNthCalledWith(3, "cc", [10, 20], Color4.BLACK);
  });
});
