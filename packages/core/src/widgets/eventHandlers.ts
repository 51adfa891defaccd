/**
 * packages/core/src/widgets/eventHandlers.ts: Key and mouse event handlers.
 *
 * Why: Widgets attach handlers per event category. Builders are immutable:
 * `onKeyDown` etc. return a new handler with the callback appended, so a
 * handler attached to a Template never changes afterwards.
 */

import type { KeyEvent, MouseEvent, UiInputEvent } from "../events.js";
import type { WidgetContainer } from "../runtime/container.js";
import type { EventCallback, EventHandler } from "./types.js";

export type KeyCallback = (event: KeyEvent, container: WidgetContainer) => boolean;
export type MouseCallback = (event: MouseEvent, container: WidgetContainer) => boolean;

const NO_CALLBACKS: readonly EventCallback[] = Object.freeze([]);

function append(list: readonly EventCallback[], cb: EventCallback): readonly EventCallback[] {
  return Object.freeze([...list, cb]);
}

function keyCallback(cb: KeyCallback): EventCallback {
  return (event, container) => event.kind === "key" && cb(event, container);
}

function mouseCallback(cb: MouseCallback): EventCallback {
  return (event, container) => event.kind === "mouse" && cb(event, container);
}

/**
 * Key event handler. Key-repeat events are delivered to key-down callbacks.
 *
 * @example
 * new KeyEventHandler().onKeyDown((ev, container) => ev.key === KEY_ENTER);
 */
export class KeyEventHandler implements EventHandler {
  private readonly down: readonly EventCallback[];
  private readonly up: readonly EventCallback[];

  constructor(
    down: readonly EventCallback[] = NO_CALLBACKS,
    up: readonly EventCallback[] = NO_CALLBACKS,
  ) {
    this.down = down;
    this.up = up;
  }

  onKeyDown(cb: KeyCallback): KeyEventHandler {
    return new KeyEventHandler(append(this.down, keyCallback(cb)), this.up);
  }

  onKeyUp(cb: KeyCallback): KeyEventHandler {
    return new KeyEventHandler(this.down, append(this.up, keyCallback(cb)));
  }

  callbacksFor(event: UiInputEvent): readonly EventCallback[] {
    if (event.kind !== "key") return NO_CALLBACKS;
    return event.action === "up" ? this.up : this.down;
  }
}

export class MouseEventHandler implements EventHandler {
  private readonly down: readonly EventCallback[];
  private readonly up: readonly EventCallback[];

  constructor(
    down: readonly EventCallback[] = NO_CALLBACKS,
    up: readonly EventCallback[] = NO_CALLBACKS,
  ) {
    this.down = down;
    this.up = up;
  }

  onMouseDown(cb: MouseCallback): MouseEventHandler {
    return new MouseEventHandler(append(this.down, mouseCallback(cb)), this.up);
  }

  onMouseUp(cb: MouseCallback): MouseEventHandler {
    return new MouseEventHandler(this.down, append(this.up, mouseCallback(cb)));
  }

  callbacksFor(event: UiInputEvent): readonly EventCallback[] {
    if (event.kind !== "mouse") return NO_CALLBACKS;
    return event.action === "up" ? this.up : this.down;
  }
}
