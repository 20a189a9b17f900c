/**
 * Selector Component
 *
 * Shows every option at once, one per line; clicking a line selects it.
 */

import { Rect } from "../../gl/Rect";
import type { Vec2 } from "../../math/vec2";
import { Color4 } from "../Color4";
import type { GuiEvent } from "../events";
import { BaseWidget, type Component, type DrawParams, type MinSizeParams } from "../Gui";
import type { Theme } from "../Theme";

export type SelectorOption<T> = [label: string, value: T];

export interface SelectorResult<T> {
  selected: SelectorOption<T> | null;
  /** A click selected an option during this update */
  justSelected: boolean;
}

const SELECTED_FILL = Color4.WHITE.mulSrgb(0.5);
const HOVERED_FILL = Color4.WHITE.mulSrgb(0.75);

export class Selector<T> extends BaseWidget implements Component<SelectorResult<T>> {
  private readonly options: SelectorOption<T>[];
  private selectedIndex: number | null;

  constructor(options: readonly SelectorOption<T>[], selectedIndex: number | null = null) {
    super();
    if (selectedIndex !== null && (selectedIndex < 0 || selectedIndex >= options.length)) {
      throw new Error(`Selected option ${selectedIndex} out of range (${options.length} options)`);
    }
    this.options = [...options];
    this.selectedIndex = selectedIndex;
  }

  override get isComponent(): boolean {
    return true;
  }

  selectedOption(): T | null {
    return this.selected()?.[1] ?? null;
  }

  addOption(option: SelectorOption<T>): void {
    this.options.push(option);
  }

  /** Removing the selected option clears the selection */
  removeOption(index: number): void {
    if (index < 0 || index >= this.options.length) {
      throw new Error(`Option ${index} out of range (${this.options.length} options)`);
    }
    this.options.splice(index, 1);
    if (this.selectedIndex === index) {
      this.selectedIndex = null;
    } else if (this.selectedIndex !== null && this.selectedIndex > index) {
      this.selectedIndex -= 1;
    }
  }

  update(theme: Theme, events: GuiEvent[]): SelectorResult<T> {
    let justSelected = false;
    for (const event of events) {
      if (event.kind !== "mouseDown" || event.button !== "left") continue;
      const entry = Math.floor(event.pos[1] / theme.font.advanceY);
      // The rect can be taller than the option list
      if (entry >= 0 && entry < this.options.length) {
        this.selectedIndex = entry;
        justSelected = true;
      }
    }
    return { selected: this.selected(), justSelected };
  }

  draw({ rect, theme, draw2d, cursorPos }: DrawParams): void {
    const font = theme.font;
    this.options.forEach(([label], i) => {
      const pos: Vec2 = [rect.start[0], rect.start[1] + font.advanceY * i];
      const lineRect = Rect.fromSize(pos, font.stringSize(label));
      let fill = Color4.WHITE;
      if (i === this.selectedIndex) {
        fill = SELECTED_FILL;
      } else if (cursorPos && lineRect.containsPoint(cursorPos)) {
        fill = HOVERED_FILL;
      }
      draw2d.fillRect(lineRect, fill);
      font.drawString(label, pos, Color4.BLACK);
    });
  }

  minSize({ theme }: MinSizeParams): Vec2 {
    if (this.options.length === 0) return [0, 0];
    const font = theme.font;
    const width = Math.max(...this.options.map(([label]) => Math.trunc(font.stringWidth(label))));
    return [width, font.advanceY * this.options.length];
  }

  private selected(): SelectorOption<T> | null {
    if (this.selectedIndex === null) return null;
    return this.options[this.selectedIndex] ?? null;
  }
}
