/**
 * Retained-tree GUI
 *
 * The app builds a widget tree each frame and passes it to `Gui.draw`, which
 * lays it out against the surface and queues its drawing. Events are then
 * routed against the most recent layout with `Gui.handleEvents`, and each
 * persistent component pulls its own events with `updateComponent`.
 */

import type { GlContext } from "../gl/GlContext";
import { Rect } from "../gl/Rect";
import type { Surface } from "../gl/Surface";
import type { Vec2 } from "../math/vec2";
import type { Draw2d } from "./Draw2d";
import type { GuiEvent } from "./events";
import type { Theme } from "./Theme";

export type WidgetId = number;

let nextWidgetId = 1;

/** Unique for the lifetime of the page */
export function newWidgetId(): WidgetId {
  return nextWidgetId++;
}

export type MinSizes = ReadonlyMap<WidgetId, Vec2>;

export interface DrawParams {
  context: GlContext;
  surface: Surface;
  rect: Rect;
  theme: Theme;
  draw2d: Draw2d;
  /** Surface pixels, null when the cursor is outside */
  cursorPos: Vec2 | null;
  isActive: boolean;
}

export interface MinSizeParams {
  context: GlContext;
  theme: Theme;
  /** Already holds the min size of every child */
  minSizes: MinSizes;
  windowSize: Vec2;
}

/** Something that can be drawn as part of the GUI */
export interface Widget {
  readonly id: WidgetId;
  /**
   * True iff the widget is the root of a component. Components nested in
   * components are not supported; the outer one receives the events.
   */
  readonly isComponent: boolean;
  /** Children are drawn after their parent, by the GUI */
  draw(params: DrawParams): void;
  /** Smallest size the widget renders correctly at */
  minSize(params: MinSizeParams): Vec2;
  children(): readonly Widget[];
  /** Record this widget's rect and recurse into every child */
  computeRects(
    rect: Rect,
    theme: Theme,
    minSizes: MinSizes,
    widgetRects: Map<WidgetId, Rect>
  ): void;
}

/**
 * A widget that outlives a frame and takes input. `R` describes what the
 * input did, such as whether a button was pressed.
 */
export interface Component<R> extends Widget {
  update(theme: Theme, events: GuiEvent[]): R;
}

/** Leaf widget defaults: no children, takes the rect it is given */
export abstract class BaseWidget implements Widget {
  readonly id = newWidgetId();

  get isComponent(): boolean {
    return false;
  }

  abstract draw(params: DrawParams): void;
  abstract minSize(params: MinSizeParams): Vec2;

  children(): readonly Widget[] {
    return [];
  }

  computeRects(
    rect: Rect,
    _theme: Theme,
    _minSizes: MinSizes,
    widgetRects: Map<WidgetId, Rect>
  ): void {
    widgetRects.set(this.id, rect);
  }
}

export function minSizeOf(minSizes: MinSizes, widget: Widget): Vec2 {
  const size = minSizes.get(widget.id);
  if (!size) {
    throw new Error(`No min size computed for widget ${widget.id}`);
  }
  return size;
}

function rectOf(widgetRects: ReadonlyMap<WidgetId, Rect>, widget: Widget): Rect {
  const rect = widgetRects.get(widget.id);
  if (!rect) {
    throw new Error(`No rect computed for widget ${widget.id}`);
  }
  return rect;
}

function computeMinSizes(widget: Widget, params: MinSizeParams, out: Map<WidgetId, Vec2>): void {
  for (const child of widget.children()) {
    computeMinSizes(child, params, out);
  }
  out.set(widget.id, widget.minSize(params));
}

function drawWidget(
  widget: Widget,
  params: Omit<DrawParams, "rect" | "isActive">,
  widgetRects: ReadonlyMap<WidgetId, Rect>,
  activeId: WidgetId | null
): void {
  widget.draw({
    ...params,
    rect: rectOf(widgetRects, widget),
    isActive: widget.id === activeId,
  });
  for (const child of widget.children()) {
    drawWidget(child, params, widgetRects, activeId);
  }
}

function toLocal(pos: Vec2, rect: Rect): Vec2 {
  return [pos[0] - rect.start[0], pos[1] - rect.start[1]];
}

/** What a component sees of `event`, in its own coordinates, or null if it doesn't take it */
function eventForComponent(event: GuiEvent, rect: Rect, isActive: boolean): GuiEvent | null {
  switch (event.kind) {
    case "keyDown":
    case "keyUp":
    case "charEntered":
      return isActive ? event : null;
    case "mouseDown":
      return rect.containsPoint(event.pos) ? { ...event, pos: toLocal(event.pos, rect) } : null;
    case "mouseUp":
      return rect.containsPoint(event.pos) ? { ...event, pos: toLocal(event.pos, rect) } : null;
    case "mouseMove":
      return rect.containsPoint(event.pos) ? { ...event, pos: toLocal(event.pos, rect) } : null;
    case "focusGained":
    case "focusLost":
    case "windowResized":
    case "scroll":
      return event;
    case "mouseEnter":
    case "mouseLeave":
    case "pointerLocked":
    case "pointerUnlocked":
      return null;
  }
}

interface RoutedEvent {
  id: WidgetId;
  event: GuiEvent;
}

/** Depth-first, the first component that takes the event wins */
function routeEvent(
  widget: Widget,
  event: GuiEvent,
  widgetRects: ReadonlyMap<WidgetId, Rect>,
  activeId: WidgetId | null
): RoutedEvent | null {
  if (widget.isComponent) {
    const routed = eventForComponent(event, rectOf(widgetRects, widget), widget.id === activeId);
    if (routed) {
      return { id: widget.id, event: routed };
    }
  }
  for (const child of widget.children()) {
    const routed = routeEvent(child, event, widgetRects, activeId);
    if (routed) return routed;
  }
  return null;
}

export interface GuiResult {
  /** Size of the root widget's rect */
  renderedSize: Vec2;
}

export class GuiEventResult {
  private readonly componentEvents: Map<WidgetId, GuiEvent[]>;
  private unhandled: GuiEvent[];

  constructor(componentEvents: Map<WidgetId, GuiEvent[]>, unhandled: GuiEvent[]) {
    this.componentEvents = componentEvents;
    this.unhandled = unhandled;
  }

  /** Update `component` with the events routed to it. Each component's events are handed out once. */
  updateComponent<R>(theme: Theme, component: Component<R>): R {
    const events = this.componentEvents.get(component.id) ?? [];
    this.componentEvents.delete(component.id);
    return component.update(theme, events);
  }

  /** Events no component took. Returns them once. */
  unhandledEvents(): GuiEvent[] {
    const events = this.unhandled;
    this.unhandled = [];
    return events;
  }
}

interface ActiveComponent {
  /** Position in the last `orderedComponents`, -1 if absent from it */
  index: number;
  id: WidgetId;
}

interface RenderedGui {
  widget: Widget;
  widgetRects: Map<WidgetId, Rect>;
}

export class Gui {
  private active: ActiveComponent | null = null;
  private lastRender: RenderedGui | null = null;

  /** Component with keyboard focus, if any */
  get activeComponent(): WidgetId | null {
    return this.active?.id ?? null;
  }

  /** Lay out `widget` to fill `surface` and queue its drawing on `draw2d` and the theme font */
  draw(
    context: GlContext,
    surface: Surface,
    theme: Theme,
    draw2d: Draw2d,
    cursorPos: Vec2 | null,
    widget: Widget
  ): GuiResult {
    const windowSize = surface.size();
    const minSizes = new Map<WidgetId, Vec2>();
    computeMinSizes(widget, { context, theme, minSizes, windowSize }, minSizes);

    const widgetRects = new Map<WidgetId, Rect>();
    widget.computeRects(new Rect([0, 0], windowSize), theme, minSizes, widgetRects);

    drawWidget(
      widget,
      { context, surface, theme, draw2d, cursorPos },
      widgetRects,
      this.activeComponent
    );

    this.lastRender = { widget, widgetRects };
    return { renderedSize: rectOf(widgetRects, widget).size() };
  }

  /**
   * Route `events` against the last drawn tree. `orderedComponents` is the
   * Tab order and must use the ids of the components passed to the last
   * `draw`.
   *
   * Only events that no component took come back from `unhandledEvents`. A
   * Tab or Shift+Tab that moved focus is not returned either.
   */
  handleEvents(events: readonly GuiEvent[], orderedComponents: readonly WidgetId[]): GuiEventResult {
    const componentEvents = new Map<WidgetId, GuiEvent[]>();
    if (!this.lastRender) {
      return new GuiEventResult(componentEvents, [...events]);
    }

    const { widget, widgetRects } = this.lastRender;
    const unhandled: GuiEvent[] = [];
    for (const event of events) {
      const routed = routeEvent(widget, event, widgetRects, this.activeComponent);
      if (routed) {
        const queue = componentEvents.get(routed.id);
        if (queue) {
          queue.push(routed.event);
        } else {
          componentEvents.set(routed.id, [routed.event]);
        }
        if (routed.event.kind === "mouseDown" && routed.event.button === "left") {
          this.active = { index: orderedComponents.indexOf(routed.id), id: routed.id };
        }
      }

      if (
        event.kind === "keyDown" &&
        event.key.code === "Tab" &&
        this.cycleFocus(event.key.shift, orderedComponents)
      ) {
        continue;
      }
      if (!routed) {
        unhandled.push(event);
      }
    }
    return new GuiEventResult(componentEvents, unhandled);
  }

  /** Move focus along the Tab order. False when nothing has focus. */
  private cycleFocus(backwards: boolean, orderedComponents: readonly WidgetId[]): boolean {
    const active = this.active;
    const count = orderedComponents.length;
    if (!active || count === 0) return false;

    let index: number;
    if (active.index < 0) {
      index = backwards ? count - 1 : 0;
    } else {
      index = (active.index + (backwards ? count - 1 : 1)) % count;
    }
    const id = orderedComponents[index];
    if (id === undefined) return false;
    this.active = { index, id };
    return true;
  }
}
