/**
 * Browser main loop: DOM events in, one `renderFrame` per animation frame
 */

import type { ScreenSurface } from "../gl/Surface";
import { createLogger } from "../log";
import type { EventState } from "./EventState";
import { domEventTargets, setupEventCallbacks, type EventTargets } from "./EventSource";
import type { GuiEvent } from "./events";
import { Stopwatch } from "./Stopwatch";

const log = createLogger("mainLoop");

export interface App {
  /** Called as each event arrives, before it is queued for the next frame */
  handleEvent?(event: GuiEvent): void;
  /**
   * Called once per animation frame with every event since the previous
   * frame and the seconds that have passed.
   */
  renderFrame(events: GuiEvent[], eventState: EventState, dt: number): void;
  /** Called when the page is being unloaded */
  onClose?(): void;
  readonly screenSurface: ScreenSurface;
}

export interface MainLoopOptions {
  requestFrame: (callback: () => void) => number;
  cancelFrame: (handle: number) => void;
  /** Milliseconds */
  now: () => number;
  targets: EventTargets;
  /** Resize the app's screen surface on `windowResized` before the app sees it */
  autoResize: boolean;
}

/** Defaults come from `window` and `document`, which are only touched when needed */
export function resolveMainLoopOptions(options: Partial<MainLoopOptions> = {}): MainLoopOptions {
  return {
    requestFrame: options.requestFrame ?? ((callback) => window.requestAnimationFrame(callback)),
    cancelFrame: options.cancelFrame ?? ((handle) => window.cancelAnimationFrame(handle)),
    now: options.now ?? (() => performance.now()),
    targets: options.targets ?? domEventTargets(),
    autoResize: options.autoResize ?? false,
  };
}

export interface MainLoop {
  stop(): void;
}

/**
 * Run `app` until `stop` is called. Mouse positions are relative to the
 * top-left corner of `canvas`.
 */
export function startMainLoop(
  canvas: EventTarget,
  app: App,
  options: Partial<MainLoopOptions> = {}
): MainLoop {
  const resolved = resolveMainLoopOptions(options);
  let queued: GuiEvent[] = [];
  let stopped = false;

  const source = setupEventCallbacks(
    canvas,
    (event) => {
      if (resolved.autoResize && event.kind === "windowResized") {
        app.screenSurface.setSize(event.size);
      }
      app.handleEvent?.(event);
      queued.push(event);
    },
    resolved.targets
  );

  const onUnload = (): void => app.onClose?.();
  resolved.targets.window.addEventListener("beforeunload", onUnload);

  const stopwatch = new Stopwatch(resolved.now);
  let handle = 0;
  const frame = (): void => {
    if (stopped) return;
    const events = queued;
    queued = [];
    const dt = stopwatch.time();
    stopwatch.reset();
    app.renderFrame(events, source.eventState, dt);
    handle = resolved.requestFrame(frame);
  };
  handle = resolved.requestFrame(frame);
  log.debug("Main loop started");

  return {
    stop() {
      if (stopped) return;
      stopped = true;
      resolved.cancelFrame(handle);
      source.destroy();
      resolved.targets.window.removeEventListener("beforeunload", onUnload);
      log.debug("Main loop stopped");
    },
  };
}
