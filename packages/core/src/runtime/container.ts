/**
 * packages/core/src/runtime/container.ts: Runtime widget nodes.
 *
 * Why: A WidgetContainer is the instantiated view of one Template. It owns the
 * resolved property slots (private slots for own values, the shared cells
 * themselves for shared properties) and exposes typed accessors that States
 * and event callbacks use during a tick.
 *
 * Access rules:
 *   - borrowProperty / borrowMutProperty return a PropertyResult; a key the
 *     container never declared is `UI_PROPERTY_NOT_FOUND`, never a default
 *   - exclusive access is scoped to the borrowMutProperty callback
 *   - an overlapping borrow of the same cell throws UI_BORROW_CONFLICT
 */

import type { UiFailure } from "../errors.js";
import type { LayoutObject } from "../layout/types.js";
import type { PropertyDraft, PropertySlot, PropertyType } from "../properties/property.js";
import { SharedProperty } from "../properties/sharedProperty.js";
import type { EventHandler, ParentType, State } from "../widgets/types.js";
import type { InstanceId } from "./instance.js";

/** Discriminated result for property access. */
export type PropertyResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; error: UiFailure<"UI_PROPERTY_NOT_FOUND"> }>;

export type WidgetContainerInit = Readonly<{
  id: InstanceId;
  debugName: string;
  parentType: ParentType;
  parent: WidgetContainer | null;
  slots: ReadonlyMap<PropertyType<unknown>, PropertySlot<unknown>>;
  layoutObject: LayoutObject;
  state: State | null;
  eventHandlers: readonly EventHandler[];
}>;

export class WidgetContainer {
  readonly id: InstanceId;
  readonly debugName: string;
  readonly parentType: ParentType;
  readonly layoutObject: LayoutObject;
  readonly state: State | null;
  readonly eventHandlers: readonly EventHandler[];
  private readonly slots: ReadonlyMap<PropertyType<unknown>, PropertySlot<unknown>>;
  private parentRef: WidgetContainer | null;
  private readonly childList: WidgetContainer[] = [];
  private attached = true;

  constructor(init: WidgetContainerInit) {
    this.id = init.id;
    this.debugName = init.debugName;
    this.parentType = init.parentType;
    this.parentRef = init.parent;
    this.slots = init.slots;
    this.layoutObject = init.layoutObject;
    this.state = init.state;
    this.eventHandlers = init.eventHandlers;
  }

  get parent(): WidgetContainer | null {
    return this.parentRef;
  }

  get children(): readonly WidgetContainer[] {
    return this.childList;
  }

  /** False once the container's subtree was detached from its runtime. */
  get isAttached(): boolean {
    return this.attached;
  }

  /** @internal Used by instantiation to link children in declaration order. */
  appendChild(child: WidgetContainer): void {
    this.childList.push(child);
  }

  /** @internal Used by detachContainer. */
  markDetached(): void {
    this.attached = false;
    this.parentRef = null;
    this.childList.length = 0;
  }

  /** @internal Used by detachContainer to unlink a child. */
  removeChild(child: WidgetContainer): void {
    const idx = this.childList.indexOf(child);
    if (idx >= 0) this.childList.splice(idx, 1);
  }

  private notFound<R>(key: PropertyType<unknown>): PropertyResult<R> {
    return {
      ok: false,
      error: {
        code: "UI_PROPERTY_NOT_FOUND",
        detail: `property "${key.name}" not declared on <${this.debugName || "(unnamed)"}#${String(this.id)}>`,
      },
    };
  }

  hasProperty(key: PropertyType<unknown>): boolean {
    return this.slots.has(key);
  }

  /** True when the key resolves to a cell shared with other containers. */
  isSharedProperty(key: PropertyType<unknown>): boolean {
    return this.slots.get(key) instanceof SharedProperty;
  }

  /** Declared property types, in template declaration order. */
  propertyTypes(): readonly PropertyType<unknown>[] {
    return [...this.slots.keys()];
  }

  /** Shared cells held by this container. */
  sharedCells(): readonly SharedProperty<unknown>[] {
    const out: SharedProperty<unknown>[] = [];
    for (const slot of this.slots.values()) {
      if (slot instanceof SharedProperty) out.push(slot);
    }
    return out;
  }

  /** Read the current value of `key`. */
  borrowProperty<T>(key: PropertyType<T>): PropertyResult<T> {
    const slot = this.slots.get(key);
    if (slot === undefined) return this.notFound(key);
    const value = slot.borrow((v) => v);
    if (!key.is(value)) return this.notFound(key);
    return { ok: true, value };
  }

  /**
   * Exclusive access to `key` for the duration of `fn`.
   * Whatever `fn` leaves in `draft.value` is stored; `fn`'s return value is
   * passed through.
   *
   * @example
   * container.borrowMutProperty(Label, (label) => {
   *   label.value += "!";
   * });
   */
  borrowMutProperty<T, R>(
    key: PropertyType<T>,
    fn: (draft: PropertyDraft<T>) => R,
  ): PropertyResult<R> {
    const slot = this.slots.get(key);
    if (slot === undefined) return this.notFound(key);
    return slot.borrowMut((raw): PropertyResult<R> => {
      const current = raw.value;
      if (!key.is(current)) return this.notFound(key);
      const draft: PropertyDraft<T> = { value: current };
      const value = fn(draft);
      raw.value = draft.value;
      return { ok: true, value };
    });
  }

  /** Replace the value of `key`. */
  setProperty<T>(key: PropertyType<T>, value: T): PropertyResult<void> {
    return this.borrowMutProperty(key, (draft) => {
      draft.value = value;
    });
  }
}
