/**
 * packages/core/src/widgets/types.ts: Widget capability interfaces.
 *
 * Why: Widgets, states and event handlers are small capabilities rather than a
 * class hierarchy. Anything implementing the single required operation plugs
 * into the core.
 */

import type { UiInputEvent } from "../events.js";
import type { WidgetContainer } from "../runtime/container.js";
import type { Template } from "./template.js";

/**
 * Declared limit on a widget's child count.
 *   - none: leaf, no children
 *   - single: at most one child
 *   - multi: ordered, unbounded children
 */
export type ParentType = "none" | "single" | "multi";

/**
 * Anything that can describe itself as a Template.
 *
 * `create()` must not have side effects beyond allocating the shared
 * properties and states the widget introduces.
 */
export interface Widget {
  create(): Template;
}

/**
 * Per-widget behavior invoked once per tick against its container.
 *
 * Implementations reconcile private data with externally visible properties
 * and must tolerate being called more than once in a tick.
 */
export interface State {
  update(container: WidgetContainer): void;
}

/** One event callback; returns true when it consumed the event. */
export type EventCallback = (event: UiInputEvent, container: WidgetContainer) => boolean;

/**
 * Ordered callback chain for one event category.
 *
 * `callbacksFor` returns the callbacks registered for the event's category and
 * action, in registration order, and an empty list for events the handler does
 * not handle.
 */
export interface EventHandler {
  callbacksFor(event: UiInputEvent): readonly EventCallback[];
}
