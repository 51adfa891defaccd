/**
 * packages/core/src/layout/types.ts: Layout object descriptors.
 *
 * Why: Each widget names the layout strategy that positions it. The core only
 * attaches these descriptors to containers; computing geometry belongs to the
 * layout collaborator.
 */

import type { WidgetContainer } from "../runtime/container.js";

export type Thickness = Readonly<{ top: number; right: number; bottom: number; left: number }>;

/**
 * Layout strategy attached to a container.
 *
 *   - default: size to the single child
 *   - stretch: every child fills the available space (z-stacking)
 *   - padding: inset the child by `padding`
 *   - scroll: child may exceed the viewport; offset applied by the collaborator
 *   - textSize: size to the measured text
 *   - fixedSize: explicit size
 */
export type LayoutObject =
  | Readonly<{ kind: "default" }>
  | Readonly<{ kind: "stretch" }>
  | Readonly<{ kind: "padding"; padding: Thickness }>
  | Readonly<{ kind: "scroll" }>
  | Readonly<{ kind: "textSize" }>
  | Readonly<{ kind: "fixedSize"; w: number; h: number }>;

export const DefaultLayoutObject: LayoutObject = Object.freeze({ kind: "default" });
export const StretchLayoutObject: LayoutObject = Object.freeze({ kind: "stretch" });
export const ScrollLayoutObject: LayoutObject = Object.freeze({ kind: "scroll" });
export const TextSizeLayoutObject: LayoutObject = Object.freeze({ kind: "textSize" });

export function paddingLayoutObject(padding: number | Thickness): LayoutObject {
  const t: Thickness =
    typeof padding === "number"
      ? { top: padding, right: padding, bottom: padding, left: padding }
      : padding;
  return Object.freeze({ kind: "padding", padding: Object.freeze({ ...t }) });
}

export function fixedSizeLayoutObject(w: number, h: number): LayoutObject {
  return Object.freeze({ kind: "fixedSize", w, h });
}

/**
 * External layout engine. Invoked by the runtime after the state-update phase
 * of a tick, with the settled tree.
 */
export interface LayoutCollaborator {
  layout(root: WidgetContainer): void;
}
