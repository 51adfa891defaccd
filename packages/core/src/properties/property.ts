/**
 * packages/core/src/properties/property.ts: Typed property types and slots.
 *
 * Why: A container holds at most one value per property type. TypeScript types
 * do not exist at runtime, so each property type is represented by a frozen
 * key object that carries its name, a runtime guard and a default value. The
 * guard lets containers hand values back as `T` without trusting storage.
 *
 * Slots are the storage cells behind a key. A slot tracks borrows so that an
 * exclusive (mutable) borrow can never overlap another borrow of the same cell.
 */

import { UiError } from "../errors.js";

/** Runtime type guard for property values. */
export type PropertyGuard<T> = (value: unknown) => value is T;

/**
 * Identity of a property type (the runtime stand-in for a value type).
 *
 * Two keys with the same name are still distinct properties; identity is by
 * object reference.
 */
export type PropertyType<T> = Readonly<{
  name: string;
  is: PropertyGuard<T>;
  defaultValue: T;
}>;

/** A key paired with a value, as stored on a Template. */
export type PropertyEntry<T = unknown> = Readonly<{
  key: PropertyType<T>;
  value: T;
}>;

/** Mutable view handed to `borrowMut` callbacks. */
export type PropertyDraft<T> = { value: T };

/** Define a new property type. */
export function defineProperty<T>(
  name: string,
  is: PropertyGuard<T>,
  defaultValue: T,
): PropertyType<T> {
  if (name.trim().length === 0) {
    throw new UiError("UI_INVALID_PROPS", "property name must be a non-empty string");
  }
  if (!is(defaultValue)) {
    throw new UiError("UI_INVALID_PROPS", `default value of property "${name}" fails its guard`);
  }
  return Object.freeze({ name, is, defaultValue });
}

/** Pair a key with a value (validated against the key's guard). */
export function propertyEntry<T>(key: PropertyType<T>, value: T): PropertyEntry<T> {
  assertPropertyValue(key, value);
  return Object.freeze({ key, value });
}

export function assertPropertyValue<T>(key: PropertyType<T>, value: unknown): asserts value is T {
  if (!key.is(value)) {
    throw new UiError(
      "UI_INVALID_PROPS",
      `value of type ${typeof value} rejected by property "${key.name}"`,
    );
  }
}

export const isString: PropertyGuard<string> = (v): v is string => typeof v === "string";
export const isBoolean: PropertyGuard<boolean> = (v): v is boolean => typeof v === "boolean";
export const isNumber: PropertyGuard<number> = (v): v is number =>
  typeof v === "number" && Number.isFinite(v);

export type BorrowState = "free" | "shared" | "exclusive";

/**
 * Single-threaded borrow-checked cell holding one property value.
 *
 * Borrows are callback-scoped: the borrow ends when the callback returns, so a
 * borrow cannot outlive its scope. Nested borrows are allowed only when both
 * are shared.
 */
export class PropertySlot<T> {
  readonly key: PropertyType<T>;
  private value: T;
  private borrowStateValue: BorrowState = "free";
  private readers = 0;

  constructor(key: PropertyType<T>, value: T) {
    assertPropertyValue(key, value);
    this.key = key;
    this.value = value;
  }

  /** Current borrow state (for diagnostics and tests). */
  get borrowState(): BorrowState {
    return this.borrowStateValue;
  }

  /** Shared borrow: any number may be in flight, none alongside an exclusive one. */
  borrow<R>(fn: (value: T) => R): R {
    if (this.borrowStateValue === "exclusive") {
      throw new UiError(
        "UI_BORROW_CONFLICT",
        `property "${this.key.name}" is already mutably borrowed`,
      );
    }
    this.borrowStateValue = "shared";
    this.readers++;
    try {
      return fn(this.value);
    } finally {
      this.readers--;
      if (this.readers === 0) this.borrowStateValue = "free";
    }
  }

  /** Exclusive borrow: the draft's value is stored when `fn` returns normally. */
  borrowMut<R>(fn: (draft: PropertyDraft<T>) => R): R {
    if (this.borrowStateValue !== "free") {
      throw new UiError(
        "UI_BORROW_CONFLICT",
        `property "${this.key.name}" is already ${this.borrowStateValue === "shared" ? "" : "mutably "}borrowed`,
      );
    }
    this.borrowStateValue = "exclusive";
    try {
      const draft: PropertyDraft<T> = { value: this.value };
      const out = fn(draft);
      assertPropertyValue(this.key, draft.value);
      this.value = draft.value;
      return out;
    } finally {
      this.borrowStateValue = "free";
    }
  }

  get(): T {
    return this.borrow((v) => v);
  }

  set(value: T): void {
    this.borrowMut((draft) => {
      draft.value = value;
    });
  }
}
