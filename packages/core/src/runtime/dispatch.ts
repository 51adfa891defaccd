/**
 * packages/core/src/runtime/dispatch.ts: Event dispatch through the tree.
 *
 * Why: Delivers one input event to its target container (chosen by the focus
 * or hit-testing collaborator) and, when unconsumed, along the propagation
 * path. The first callback that returns true consumes the event; nothing after
 * it (later callbacks, later handlers, ancestors) observes that event.
 *
 * Dispatch rules:
 *   - handlers run in registration order, callbacks in registration order
 *   - "bubble" forwards an unconsumed event to each ancestor in turn
 *   - "target" stops after the target
 *   - a throwing callback does not consume; the failure is recorded and
 *     dispatch continues with the next callback
 *   - dispatch is not reentrant: starting one from inside a callback throws
 *     UI_REENTRANT_CALL into that callback (queue through the runtime's
 *     postEvent instead), which is then recorded like any other throw
 */

import { UiError } from "../errors.js";
import type { UiInputEvent } from "../events.js";
import type { EventHandler } from "../widgets/types.js";
import type { WidgetContainer } from "./container.js";
import { type UserCodeFailure, userCodeFailure } from "./failures.js";
import type { InstanceId } from "./instance.js";

export type PropagationPolicy = "bubble" | "target";

export type DispatchOptions = Readonly<{
  propagation?: PropagationPolicy;
}>;

export type DispatchResult = Readonly<{
  event: UiInputEvent;
  consumed: boolean;
  /** Container whose callback consumed the event. */
  handledBy: WidgetContainer | null;
  /** Ids of the containers the event visited, target first. */
  path: readonly InstanceId[];
  failures: readonly UserCodeFailure[];
}>;

let dispatchDepth = 0;

/** True while an event callback is running. */
export function isDispatching(): boolean {
  return dispatchDepth > 0;
}

/**
 * Run one handler's callbacks for `event` against `container`.
 * Returns true as soon as a callback consumes the event.
 */
export function runEventHandler(
  handler: EventHandler,
  event: UiInputEvent,
  container: WidgetContainer,
  failures?: UserCodeFailure[],
): boolean {
  for (const cb of handler.callbacksFor(event)) {
    let consumed: boolean;
    try {
      consumed = cb(event, container);
    } catch (e: unknown) {
      failures?.push(userCodeFailure("dispatch", "event callback", container, e));
      continue;
    }
    if (consumed) return true;
  }
  return false;
}

/** Deliver `event` to `target`, then along the propagation path until consumed. */
export function dispatchEvent(
  event: UiInputEvent,
  target: WidgetContainer,
  opts: DispatchOptions = {},
): DispatchResult {
  if (dispatchDepth > 0) {
    throw new UiError(
      "UI_REENTRANT_CALL",
      "dispatchEvent called from inside an event callback; post the event to the runtime queue instead",
    );
  }
  const propagation = opts.propagation ?? "bubble";
  const failures: UserCodeFailure[] = [];
  const path: InstanceId[] = [];

  dispatchDepth++;
  try {
    let cur: WidgetContainer | null = target;
    while (cur !== null) {
      path.push(cur.id);
      for (const handler of cur.eventHandlers) {
        if (runEventHandler(handler, event, cur, failures)) {
          return Object.freeze({
            event,
            consumed: true,
            handledBy: cur,
            path: Object.freeze(path),
            failures: Object.freeze(failures),
          });
        }
      }
      cur = propagation === "bubble" ? cur.parent : null;
    }
  } finally {
    dispatchDepth--;
  }

  return Object.freeze({
    event,
    consumed: false,
    handledBy: null,
    path: Object.freeze(path),
    failures: Object.freeze(failures),
  });
}
