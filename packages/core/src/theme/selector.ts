/**
 * packages/core/src/theme/selector.ts: CSS-style selector values.
 *
 * Why: Widgets publish a selector so the theme collaborator can resolve their
 * style. The core only builds, compares and shares selector values; matching
 * against a stylesheet happens outside of it.
 */

export type Selector = Readonly<{
  element: string | null;
  id: string | null;
  classes: readonly string[];
  pseudoClasses: readonly string[];
}>;

const EMPTY: readonly string[] = Object.freeze([]);

function freezeSelector(s: Selector): Selector {
  return Object.freeze({
    element: s.element,
    id: s.id,
    classes: Object.freeze([...s.classes]),
    pseudoClasses: Object.freeze([...s.pseudoClasses]),
  });
}

function addUnique(list: readonly string[], value: string): readonly string[] {
  return list.includes(value) ? list : [...list, value];
}

/** Create a selector, optionally targeting an element name. */
export function selector(element?: string): Selector {
  return freezeSelector({
    element: element ?? null,
    id: null,
    classes: EMPTY,
    pseudoClasses: EMPTY,
  });
}

export function withId(s: Selector, id: string): Selector {
  return freezeSelector({ ...s, id });
}

export function withClass(s: Selector, className: string): Selector {
  return freezeSelector({ ...s, classes: addUnique(s.classes, className) });
}

export function withPseudoClass(s: Selector, pseudoClass: string): Selector {
  if (s.pseudoClasses.includes(pseudoClass)) return s;
  return freezeSelector({ ...s, pseudoClasses: [...s.pseudoClasses, pseudoClass] });
}

export function withoutPseudoClass(s: Selector, pseudoClass: string): Selector {
  if (!s.pseudoClasses.includes(pseudoClass)) return s;
  return freezeSelector({ ...s, pseudoClasses: s.pseudoClasses.filter((p) => p !== pseudoClass) });
}

export function hasPseudoClass(s: Selector, pseudoClass: string): boolean {
  return s.pseudoClasses.includes(pseudoClass);
}

/**
 * Render a selector in CSS notation.
 *
 * @example
 * selectorToString(withPseudoClass(selector("textbox"), "focus")) // "textbox:focus"
 */
export function selectorToString(s: Selector): string {
  let out = s.element ?? "";
  if (s.id !== null) out += `#${s.id}`;
  for (const c of s.classes) out += `.${c}`;
  for (const p of s.pseudoClasses) out += `:${p}`;
  return out.length > 0 ? out : "*";
}

function listsEqual(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function selectorsEqual(a: Selector, b: Selector): boolean {
  return (
    a.element === b.element &&
    a.id === b.id &&
    listsEqual(a.classes, b.classes) &&
    listsEqual(a.pseudoClasses, b.pseudoClasses)
  );
}

function isStringList(v: unknown): v is readonly string[] {
  return Array.isArray(v) && v.every((item) => typeof item === "string");
}

export function isSelector(v: unknown): v is Selector {
  if (typeof v !== "object" || v === null) return false;
  if (!("element" in v) || !("id" in v) || !("classes" in v) || !("pseudoClasses" in v)) {
    return false;
  }
  const { element, id, classes, pseudoClasses } = v;
  return (
    (element === null || typeof element === "string") &&
    (id === null || typeof id === "string") &&
    isStringList(classes) &&
    isStringList(pseudoClasses)
  );
}
