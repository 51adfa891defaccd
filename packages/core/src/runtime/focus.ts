/**
 * packages/core/src/runtime/focus.ts: Focus as a property collaborator.
 *
 * Why: Widgets that take keyboard input declare a `Focused` property. Moving
 * focus writes that property on the old and new target; the widgets' States
 * observe the change on their next update. Key events are routed to the
 * focused container by the runtime's default target resolver.
 *
 * Focus rules:
 *   - Focusable set: attached containers declaring `Focused`
 *   - Traversal order: tree order (depth-first preorder, children left-to-right)
 *   - next/prev wrap around at the ends of the list
 */

import { UiError } from "../errors.js";
import { Focused } from "../properties/builtins.js";
import type { WidgetContainer } from "./container.js";
import { describeContainer } from "./failures.js";
import { walkTree } from "./instantiate.js";

/** Focus traversal direction. */
export type FocusMove = "next" | "prev";

/** Focusable containers of a tree, in traversal order. */
export function computeFocusList(root: WidgetContainer): readonly WidgetContainer[] {
  const out: WidgetContainer[] = [];
  walkTree(root, (c) => {
    if (c.hasProperty(Focused)) out.push(c);
  });
  return out;
}

/**
 * Compute the next/prev focus target based on the current one.
 * Wraps around at list boundaries (circular traversal).
 */
export function computeMovedFocus(
  focusList: readonly WidgetContainer[],
  focused: WidgetContainer | null,
  move: FocusMove,
): WidgetContainer | null {
  const n = focusList.length;
  if (n === 0) return null;

  const first = focusList[0];
  const last = focusList[n - 1];
  if (first === undefined || last === undefined) return null;

  if (focused === null) return move === "next" ? first : last;

  const idx = focusList.indexOf(focused);
  if (idx < 0) return move === "next" ? first : last;

  const nextIdx = move === "next" ? (idx + 1) % n : (idx - 1 + n) % n;
  return focusList[nextIdx] ?? null;
}

/**
 * Move focus from `prev` to `next`, writing `Focused` on both.
 * `next` must declare `Focused`; passing null clears focus.
 */
export function applyFocusChange(prev: WidgetContainer | null, next: WidgetContainer | null): void {
  if (next !== null && !next.hasProperty(Focused)) {
    throw new UiError(
      "UI_INVALID_PROPS",
      `${describeContainer(next)} does not declare the focused property`,
    );
  }
  if (prev === next) return;
  if (prev?.isAttached) prev.setProperty(Focused, false);
  next?.setProperty(Focused, true);
}
