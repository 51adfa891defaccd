/**
 * packages/core/src/widgets/template.ts: Immutable widget descriptors.
 *
 * Why: A widget's `create()` describes its structure as a Template: parent
 * arity, own and shared properties, children, layout object, state, event
 * handlers and a debug name. Builder calls never mutate; each returns a new
 * frozen Template, so a Template handed to the runtime cannot change under it.
 *
 * Rules:
 *   - later property calls for the same key replace the earlier entry, whether
 *     it was an own value or a shared cell
 *   - withChild throws UI_ARITY_VIOLATION past the declared arity; a child is
 *     never dropped or accepted silently
 */

import { UiError } from "../errors.js";
import { DefaultLayoutObject, type LayoutObject } from "../layout/types.js";
import { type PropertyEntry, type PropertyType, propertyEntry } from "../properties/property.js";
import type { SharedProperty } from "../properties/sharedProperty.js";
import type { EventHandler, ParentType, State } from "./types.js";

/** Property declared on a template: an own value or a shared cell. */
export type TemplateProperty =
  | Readonly<{ kind: "own"; entry: PropertyEntry }>
  | Readonly<{ kind: "shared"; cell: SharedProperty<unknown> }>;

type TemplateFields = Readonly<{
  parentType: ParentType;
  children: readonly Template[];
  properties: ReadonlyMap<PropertyType<unknown>, TemplateProperty>;
  layoutObject: LayoutObject;
  state: State | null;
  eventHandlers: readonly EventHandler[];
  debugName: string;
}>;

const EMPTY_FIELDS: TemplateFields = Object.freeze({
  parentType: "none",
  children: Object.freeze([]),
  properties: new Map(),
  layoutObject: DefaultLayoutObject,
  state: null,
  eventHandlers: Object.freeze([]),
  debugName: "",
});

/** Maximum children allowed by a parent arity. */
export function arityLimit(parentType: ParentType): number {
  switch (parentType) {
    case "none":
      return 0;
    case "single":
      return 1;
    case "multi":
      return Number.POSITIVE_INFINITY;
  }
}

function arityViolation(name: string, parentType: ParentType, count: number): never {
  throw new UiError(
    "UI_ARITY_VIOLATION",
    `template "${name || "(unnamed)"}" with parent type "${parentType}" cannot hold ${String(count)} children`,
  );
}

export class Template {
  private readonly fields: TemplateFields;

  constructor(fields: TemplateFields = EMPTY_FIELDS) {
    this.fields = fields;
    Object.freeze(this);
  }

  get parentType(): ParentType {
    return this.fields.parentType;
  }

  get children(): readonly Template[] {
    return this.fields.children;
  }

  /** Declared properties in declaration order (a replaced key keeps its first position). */
  get properties(): ReadonlyMap<PropertyType<unknown>, TemplateProperty> {
    return this.fields.properties;
  }

  get layoutObject(): LayoutObject {
    return this.fields.layoutObject;
  }

  get state(): State | null {
    return this.fields.state;
  }

  get eventHandlers(): readonly EventHandler[] {
    return this.fields.eventHandlers;
  }

  get debugName(): string {
    return this.fields.debugName;
  }

  private with(patch: Partial<TemplateFields>): Template {
    return new Template(Object.freeze({ ...this.fields, ...patch }));
  }

  private withPropertyEntry(key: PropertyType<unknown>, prop: TemplateProperty): Template {
    const properties = new Map(this.fields.properties);
    properties.set(key, Object.freeze(prop));
    return this.with({ properties });
  }

  asParentType(parentType: ParentType): Template {
    const count = this.fields.children.length;
    if (count > arityLimit(parentType)) {
      arityViolation(this.fields.debugName, parentType, count);
    }
    return this.with({ parentType });
  }

  withChild(child: Template): Template {
    const count = this.fields.children.length + 1;
    if (count > arityLimit(this.fields.parentType)) {
      arityViolation(this.fields.debugName, this.fields.parentType, count);
    }
    return this.with({ children: Object.freeze([...this.fields.children, child]) });
  }

  withProperty<T>(key: PropertyType<T>, value: T): Template {
    return this.withPropertyEntry(key, { kind: "own", entry: propertyEntry(key, value) });
  }

  withSharedProperty<T>(cell: SharedProperty<T>): Template {
    return this.withPropertyEntry(cell.key, { kind: "shared", cell });
  }

  withLayoutObject(layoutObject: LayoutObject): Template {
    return this.with({ layoutObject });
  }

  withState(state: State): Template {
    return this.with({ state });
  }

  withEventHandler(handler: EventHandler): Template {
    return this.with({ eventHandlers: Object.freeze([...this.fields.eventHandlers, handler]) });
  }

  withDebugName(debugName: string): Template {
    return this.with({ debugName });
  }
}

/** Count every template in the subtree rooted at `t` (including `t`). */
export function templateNodeCount(t: Template): number {
  let n = 1;
  for (const child of t.children) n += templateNodeCount(child);
  return n;
}
