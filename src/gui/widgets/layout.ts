/**
 * Layout Widgets
 *
 * Containers that size and place their children. None of them draws
 * anything itself.
 */

import { Rect } from "../../gl/Rect";
import type { Vec2 } from "../../math/vec2";
import {
  BaseWidget,
  minSizeOf,
  type MinSizes,
  type MinSizeParams,
  type Widget,
  type WidgetId,
} from "../Gui";
import type { Theme } from "../Theme";

type FlexChild = [flex: number, widget: Widget];

/** Shared by `Col` and `Row`; `axis` 1 stacks vertically, 0 horizontally */
abstract class FlexContainer extends BaseWidget {
  private readonly entries: FlexChild[] = [];
  protected abstract readonly axis: 0 | 1;

  /** `flex` is this child's share of the space left over after min sizes */
  child(flex: number, widget: Widget): this {
    this.entries.push([flex, widget]);
    return this;
  }

  withChildren(children: readonly FlexChild[]): this {
    this.entries.push(...children);
    return this;
  }

  override children(): readonly Widget[] {
    return this.entries.map(([, widget]) => widget);
  }

  draw(): void {}

  minSize({ minSizes }: MinSizeParams): Vec2 {
    const main = this.axis;
    const cross = main === 1 ? 0 : 1;
    const size: Vec2 = [0, 0];
    for (const [, widget] of this.entries) {
      const childSize = minSizeOf(minSizes, widget);
      size[main] += childSize[main];
      size[cross] = Math.max(size[cross], childSize[cross]);
    }
    return size;
  }

  override computeRects(
    rect: Rect,
    theme: Theme,
    minSizes: MinSizes,
    widgetRects: Map<WidgetId, Rect>
  ): void {
    const main = this.axis;
    const rectSize = rect.size();
    const minSize = minSizeOf(minSizes, this);
    const totalFlex = this.entries.reduce((sum, [flex]) => sum + flex, 0);

    // Without flex the container hugs its children along the main axis
    const ownSize: Vec2 = [rectSize[0], rectSize[1]];
    if (totalFlex === 0) {
      ownSize[main] = minSize[main];
    }
    widgetRects.set(this.id, Rect.fromSize(rect.start, ownSize));

    const extraSpace = rectSize[main] - minSize[main];
    const divisor = totalFlex === 0 ? 1 : totalFlex;
    const nextPos: Vec2 = [rect.start[0], rect.start[1]];
    for (const [flex, widget] of this.entries) {
      const childSize: Vec2 = [rectSize[0], rectSize[1]];
      childSize[main] = minSizeOf(minSizes, widget)[main] + Math.trunc((extraSpace * flex) / divisor);
      widget.computeRects(Rect.fromSize(nextPos, childSize), theme, minSizes, widgetRects);
      nextPos[main] += childSize[main];
    }
  }
}

/** Stacks children top to bottom */
export class Col extends FlexContainer {
  protected readonly axis = 1;
}

/** Places children left to right */
export class Row extends FlexContainer {
  protected readonly axis = 0;
}

/** Shrinks its child to its min size instead of filling the parent's rect */
export class NoFill extends BaseWidget {
  private readonly child: Widget;

  constructor(child: Widget) {
    super();
    this.child = child;
  }

  override children(): readonly Widget[] {
    return [this.child];
  }

  draw(): void {}

  minSize({ minSizes }: MinSizeParams): Vec2 {
    return minSizeOf(minSizes, this.child);
  }

  override computeRects(
    rect: Rect,
    theme: Theme,
    minSizes: MinSizes,
    widgetRects: Map<WidgetId, Rect>
  ): void {
    const own = Rect.fromSize(rect.start, minSizeOf(minSizes, this));
    widgetRects.set(this.id, own);
    this.child.computeRects(own, theme, minSizes, widgetRects);
  }
}

/** Draws its children on top of one another, in order */
export class Overlap extends BaseWidget {
  private readonly layers: Widget[] = [];

  child(widget: Widget): this {
    this.layers.push(widget);
    return this;
  }

  withChildren(widgets: readonly Widget[]): this {
    this.layers.push(...widgets);
    return this;
  }

  override children(): readonly Widget[] {
    return this.layers;
  }

  draw(): void {}

  minSize({ minSizes }: MinSizeParams): Vec2 {
    const size: Vec2 = [0, 0];
    for (const widget of this.layers) {
      const [w, h] = minSizeOf(minSizes, widget);
      size[0] = Math.max(size[0], w);
      size[1] = Math.max(size[1], h);
    }
    return size;
  }

  override computeRects(
    rect: Rect,
    theme: Theme,
    minSizes: MinSizes,
    widgetRects: Map<WidgetId, Rect>
  ): void {
    widgetRects.set(this.id, rect);
    for (const widget of this.layers) {
      widget.computeRects(rect, theme, minSizes, widgetRects);
    }
  }
}

/** Takes up space and draws nothing */
export class EmptyWidget extends BaseWidget {
  private readonly size: Vec2;

  constructor(size: Vec2 = [0, 0]) {
    super();
    this.size = [size[0], size[1]];
  }

  draw(): void {}

  minSize(): Vec2 {
    return [this.size[0], this.size[1]];
  }
}

/** A square gap of `theme.padding` pixels */
export class Padding extends BaseWidget {
  draw(): void {}

  minSize({ theme }: MinSizeParams): Vec2 {
    return [theme.padding, theme.padding];
  }
}

/** Surrounds its child with `theme.padding` pixels on every side */
export class Inset extends BaseWidget {
  private readonly child: Widget;

  constructor(child: Widget) {
    super();
    this.child = child;
  }

  override children(): readonly Widget[] {
    return [this.child];
  }

  draw(): void {}

  minSize({ theme, minSizes }: MinSizeParams): Vec2 {
    const [w, h] = minSizeOf(minSizes, this.child);
    return [w + theme.padding * 2, h + theme.padding * 2];
  }

  override computeRects(
    rect: Rect,
    theme: Theme,
    minSizes: MinSizes,
    widgetRects: Map<WidgetId, Rect>
  ): void {
    const p = theme.padding;
    widgetRects.set(this.id, rect);
    this.child.computeRects(
      new Rect([rect.start[0] + p, rect.start[1] + p], [rect.end[0] - p, rect.end[1] - p]),
      theme,
      minSizes,
      widgetRects
    );
  }
}
