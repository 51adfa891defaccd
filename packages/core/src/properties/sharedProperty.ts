/**
 * packages/core/src/properties/sharedProperty.ts: Aliased property cells.
 *
 * Why: Lets one widget own a value that several descendants (or siblings) read
 * and write without a global store. Every holder references the same slot, so
 * a write through any handle is visible to all holders immediately.
 *
 * Holder accounting:
 *   - instantiating a container that lists the cell retains it once
 *   - detaching that container releases it
 *   - when the last holder releases, the cell is released and rejects new holders
 *
 * Cells are created by a widget's `create()` before the Template that uses
 * them, so a forward reference cannot be expressed.
 */

import { UiError } from "../errors.js";
import { PropertySlot, type PropertyType } from "./property.js";

let nextCellId = 1;

export class SharedProperty<T> extends PropertySlot<T> {
  /** Process-unique id, used in diagnostics. */
  readonly cellId: number;
  private holders = 0;
  private released = false;

  constructor(key: PropertyType<T>, value: T) {
    super(key, value);
    this.cellId = nextCellId++;
  }

  /** Number of containers currently holding this cell. */
  get holderCount(): number {
    return this.holders;
  }

  /** True once the last holder released the cell. */
  get isReleased(): boolean {
    return this.released;
  }

  retain(): void {
    if (this.released) {
      throw new UiError(
        "UI_INVALID_STATE",
        `shared property "${this.key.name}" (#${String(this.cellId)}) was already released`,
      );
    }
    this.holders++;
  }

  release(): void {
    if (this.holders === 0) {
      throw new UiError(
        "UI_INVALID_STATE",
        `shared property "${this.key.name}" (#${String(this.cellId)}) has no holders to release`,
      );
    }
    this.holders--;
    if (this.holders === 0) this.released = true;
  }
}

/**
 * Create a shared cell for `key`. Without a value the key's default is used.
 *
 * @example
 * const label = sharedProperty(Label, "hello");
 */
export function sharedProperty<T>(key: PropertyType<T>, value?: T): SharedProperty<T> {
  return new SharedProperty(key, value === undefined ? key.defaultValue : value);
}
