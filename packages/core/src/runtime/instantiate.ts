/**
 * packages/core/src/runtime/instantiate.ts: Template → WidgetContainer trees.
 *
 * Why: The runtime consumes a Template tree into WidgetContainers, one per
 * Template, children in declaration order. Own property values get a private
 * slot per container; shared cells are linked as-is and retained once per
 * holding container, so the cell lives exactly as long as its last holder.
 */

import { UiError } from "../errors.js";
import { PropertySlot, type PropertyType } from "../properties/property.js";
import { arityLimit, type Template } from "../widgets/template.js";
import { WidgetContainer } from "./container.js";
import type { InstanceIdAllocator } from "./instance.js";

function resolveSlots(t: Template): Map<PropertyType<unknown>, PropertySlot<unknown>> {
  const slots = new Map<PropertyType<unknown>, PropertySlot<unknown>>();
  for (const [key, prop] of t.properties) {
    if (prop.kind === "own") {
      slots.set(key, new PropertySlot(prop.entry.key, prop.entry.value));
    } else {
      slots.set(key, prop.cell);
    }
  }
  return slots;
}

function instantiateNode(
  t: Template,
  parent: WidgetContainer | null,
  allocator: InstanceIdAllocator,
): WidgetContainer {
  // The Template constructor accepts raw fields, so arity is checked again.
  if (t.children.length > arityLimit(t.parentType)) {
    throw new UiError(
      "UI_ARITY_VIOLATION",
      `template "${t.debugName || "(unnamed)"}" with parent type "${t.parentType}" has ${String(t.children.length)} children`,
    );
  }

  const container = new WidgetContainer({
    id: allocator.allocate(),
    debugName: t.debugName,
    parentType: t.parentType,
    parent,
    slots: resolveSlots(t),
    layoutObject: t.layoutObject,
    state: t.state,
    eventHandlers: t.eventHandlers,
  });
  for (const cell of container.sharedCells()) cell.retain();

  for (const child of t.children) {
    container.appendChild(instantiateNode(child, container, allocator));
  }
  return container;
}

/** Instantiate a Template tree. Ids are allocated in tree order. */
export function instantiateTemplate(
  template: Template,
  allocator: InstanceIdAllocator,
): WidgetContainer {
  return instantiateNode(template, null, allocator);
}

/**
 * Visit every container of a subtree in tree order: parent before children,
 * children in declaration order.
 */
export function walkTree(root: WidgetContainer, visit: (c: WidgetContainer) => void): void {
  const stack: WidgetContainer[] = [root];
  while (stack.length > 0) {
    const c = stack.pop();
    if (c === undefined) break;
    visit(c);
    for (let i = c.children.length - 1; i >= 0; i--) {
      const child = c.children[i];
      if (child !== undefined) stack.push(child);
    }
  }
}

/** Containers of a subtree in tree order. */
export function collectTree(root: WidgetContainer): readonly WidgetContainer[] {
  const out: WidgetContainer[] = [];
  walkTree(root, (c) => out.push(c));
  return out;
}

/**
 * Detach a subtree: unlink it from its parent, release every shared cell its
 * containers hold, and mark each container detached.
 */
export function detachContainer(container: WidgetContainer): void {
  if (!container.isAttached) return;
  container.parent?.removeChild(container);
  const nodes = collectTree(container);
  for (const node of nodes) {
    for (const cell of node.sharedCells()) cell.release();
  }
  for (const node of nodes) node.markDetached();
}

/** Path from `container` up to its root, starting with `container`. */
export function ancestorPath(container: WidgetContainer): readonly WidgetContainer[] {
  const out: WidgetContainer[] = [];
  let cur: WidgetContainer | null = container;
  while (cur !== null) {
    out.push(cur);
    cur = cur.parent;
  }
  return out;
}
