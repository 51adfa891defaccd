/**
 * packages/core/src/app/createRuntime.ts: Tick-driven widget runtime.
 *
 * Why: Owns one instantiated widget tree and drives it tick by tick. A tick
 * has two phases, always in this order:
 *
 *   1. dispatch: queued input events are delivered one at a time (events
 *      posted by callbacks join the queue and run after the current event)
 *   2. update: every State runs once, in tree order
 *
 * After the update phase the layout and render collaborators (when
 * configured) see the settled tree. Everything is synchronous; a caller stops
 * the runtime simply by not ticking it.
 */

import { warnDev } from "../debug/warn.js";
import { UiError } from "../errors.js";
import type { UiInputEvent } from "../events.js";
import type { WidgetContainer } from "../runtime/container.js";
import { type DispatchResult, dispatchEvent } from "../runtime/dispatch.js";
import type { UserCodeFailure } from "../runtime/failures.js";
import {
  type FocusMove,
  applyFocusChange,
  computeFocusList,
  computeMovedFocus,
} from "../runtime/focus.js";
import { createInstanceIdAllocator } from "../runtime/instance.js";
import { collectTree, detachContainer, instantiateTemplate } from "../runtime/instantiate.js";
import { runStateUpdates } from "../runtime/update.js";
import { Template } from "../widgets/template.js";
import type { Widget } from "../widgets/types.js";
import { resolveRuntimeConfig } from "./config.js";
import type { RuntimeConfig, TickReport, WidgetRuntime } from "./types.js";

type QueuedEvent = Readonly<{
  event: UiInputEvent;
  target: WidgetContainer | undefined;
}>;

/**
 * Instantiate `root` and return a runtime driving it.
 *
 * @example
 * const runtime = createWidgetRuntime(TextBox);
 * runtime.focus(runtime.findByDebugName("TextBox"));
 * runtime.postEvent(keyEvent("a"));
 * runtime.tick();
 */
export function createWidgetRuntime(
  root: Widget | Template,
  config?: RuntimeConfig,
): WidgetRuntime {
  const cfg = resolveRuntimeConfig(config);
  const template = root instanceof Template ? root : root.create();
  const tree = instantiateTemplate(template, createInstanceIdAllocator(1));

  const queue: QueuedEvent[] = [];
  let focused: WidgetContainer | null = null;
  let tickCount = 0;
  let inTick = false;
  let disposed = false;

  function assertLive(op: string): void {
    if (disposed) {
      throw new UiError("UI_INVALID_STATE", `${op} called on a disposed runtime`);
    }
  }

  function focusedContainer(): WidgetContainer | null {
    return focused?.isAttached ? focused : null;
  }

  function resolveTarget(queued: QueuedEvent): WidgetContainer | null {
    if (queued.target !== undefined) {
      return queued.target.isAttached ? queued.target : null;
    }
    if (cfg.targetResolver !== undefined) {
      const resolved = cfg.targetResolver(queued.event, runtime);
      return resolved?.isAttached ? resolved : null;
    }
    if (queued.event.kind === "key") return focusedContainer() ?? tree;
    return tree;
  }

  function moveFocus(move: FocusMove): WidgetContainer | null {
    assertLive(move === "next" ? "focusNext" : "focusPrev");
    const next = computeMovedFocus(computeFocusList(tree), focusedContainer(), move);
    applyFocusChange(focusedContainer(), next);
    focused = next;
    return next;
  }

  const runtime: WidgetRuntime = Object.freeze({
    root: tree,

    postEvent(event: UiInputEvent, target?: WidgetContainer): void {
      assertLive("postEvent");
      queue.push(Object.freeze({ event, target }));
    },

    tick(): TickReport {
      assertLive("tick");
      if (inTick) {
        throw new UiError("UI_REENTRANT_CALL", "tick called from inside a tick");
      }
      inTick = true;
      try {
        tickCount++;
        const dispatched: DispatchResult[] = [];
        const failures: UserCodeFailure[] = [];

        let delivered = 0;
        while (delivered < cfg.maxEventsPerTick) {
          const next = queue.shift();
          if (next === undefined) break;
          delivered++;
          const target = resolveTarget(next);
          if (target === null) {
            warnDev(`[lattice][runtime] dropped ${next.event.kind} event: no attached target`);
            continue;
          }
          const res = dispatchEvent(next.event, target, { propagation: cfg.propagation });
          dispatched.push(res);
          failures.push(...res.failures);
        }

        const update = runStateUpdates(tree);
        failures.push(...update.failures);

        cfg.layout?.layout(tree);
        cfg.renderer?.render(tree);

        return Object.freeze({
          tick: tickCount,
          dispatched: Object.freeze(dispatched),
          updatedStates: update.updated,
          failures: Object.freeze(failures),
        });
      } finally {
        inTick = false;
      }
    },

    focus(container: WidgetContainer | null): void {
      assertLive("focus");
      if (container !== null && !container.isAttached) {
        throw new UiError("UI_INVALID_STATE", "cannot focus a detached container");
      }
      applyFocusChange(focusedContainer(), container);
      focused = container;
    },

    focusNext: () => moveFocus("next"),
    focusPrev: () => moveFocus("prev"),
    focusedContainer,

    findByDebugName(name: string): WidgetContainer | null {
      if (!tree.isAttached) return null;
      return collectTree(tree).find((c) => c.debugName === name) ?? null;
    },

    containers(): readonly WidgetContainer[] {
      return tree.isAttached ? collectTree(tree) : [];
    },

    pendingEventCount: () => queue.length,

    dispose(): void {
      if (disposed) return;
      disposed = true;
      queue.length = 0;
      focused = null;
      detachContainer(tree);
    },
  });

  return runtime;
}
