import type { Rect } from "../../gl/Rect";
import type { Vec2 } from "../../math/vec2";
import type { Color4 } from "../Color4";
import {
  BaseWidget,
  minSizeOf,
  type DrawParams,
  type MinSizes,
  type MinSizeParams,
  type Widget,
  type WidgetId,
} from "../Gui";
import type { Theme } from "../Theme";

/** Fills its rect with a color behind its child */
export class Fill extends BaseWidget {
  private readonly fillColor: Color4;
  private readonly child: Widget;

  constructor(fillColor: Color4, child: Widget) {
    super();
    this.fillColor = fillColor;
    this.child = child;
  }

  override children(): readonly Widget[] {
    return [this.child];
  }

  draw({ rect, draw2d }: DrawParams): void {
    draw2d.fillRect(rect, this.fillColor);
  }

  minSize({ minSizes }: MinSizeParams): Vec2 {
    return minSizeOf(minSizes, this.child);
  }

  override computeRects(
    rect: Rect,
    theme: Theme,
    minSizes: MinSizes,
    widgetRects: Map<WidgetId, Rect>
  ): void {
    widgetRects.set(this.id, rect);
    this.child.computeRects(rect, theme, minSizes, widgetRects);
  }
}
