/**
 * packages/core/src/runtime/propertySync.ts: Reconcile-by-direction helper.
 *
 * Why: A State mirrors an externally visible property in a private buffer.
 * Both sides can change between ticks, so each update picks one direction:
 *
 *   - values equal      -> nothing is written; the updated flag is cleared
 *   - updated flag set  -> push internal to the property (internal wins)
 *   - otherwise         -> pull the property into the buffer (external wins)
 *
 * If both sides changed before an update runs, internal wins. Calling
 * `reconcile` again in the same tick is a no-op because the values are equal
 * after the first call.
 */

import type { PropertyType } from "../properties/property.js";
import type { PropertyResult, WidgetContainer } from "./container.js";

/** Direction applied by one reconcile call. */
export type SyncDirection = "none" | "push" | "pull";

export class PropertySync<T> {
  readonly key: PropertyType<T>;
  private internal: T;
  private dirty = false;
  private readonly equals: (a: T, b: T) => boolean;

  constructor(key: PropertyType<T>, initial: T, equals: (a: T, b: T) => boolean = Object.is) {
    this.key = key;
    this.internal = initial;
    this.equals = equals;
  }

  /** Internal (private) value. */
  get value(): T {
    return this.internal;
  }

  /** True when an internal mutation has not been pushed yet. */
  get updated(): boolean {
    return this.dirty;
  }

  /** Apply an internal mutation and mark the buffer updated. */
  mutate(fn: (current: T) => T): void {
    this.internal = fn(this.internal);
    this.dirty = true;
  }

  reconcile(container: WidgetContainer): PropertyResult<SyncDirection> {
    const external = container.borrowProperty(this.key);
    if (!external.ok) return external;

    if (this.equals(external.value, this.internal)) {
      this.dirty = false;
      return { ok: true, value: "none" };
    }

    if (this.dirty) {
      const pushed = container.setProperty(this.key, this.internal);
      if (!pushed.ok) return pushed;
      this.dirty = false;
      return { ok: true, value: "push" };
    }

    this.internal = external.value;
    return { ok: true, value: "pull" };
  }
}
