import { assert, describe, test } from "@lattice-ui/testkit";
import { isUiError } from "../../errors.js";
import { Focused } from "../../properties/builtins.js";
import { Stack } from "../../widgets/stack.js";
import { Template } from "../../widgets/template.js";
import type { WidgetContainer } from "../container.js";
import { applyFocusChange, computeFocusList, computeMovedFocus } from "../focus.js";
import { createInstanceIdAllocator } from "../instance.js";
import { instantiateTemplate } from "../instantiate.js";

function focusable(name: string): Template {
  return new Template().withDebugName(name).withProperty(Focused, false);
}

function isFocused(c: WidgetContainer): boolean {
  const r = c.borrowProperty(Focused);
  return r.ok && r.value;
}

function tree() {
  const t = Stack.create()
    .withDebugName("root")
    .withChild(
      Stack.create().withDebugName("group").withChild(focusable("a")).withChild(focusable("b")),
    )
    .withChild(new Template().withDebugName("plain"))
    .withChild(focusable("c"));
  return instantiateTemplate(t, createInstanceIdAllocator(1));
}

describe("computeFocusList", () => {
  test("lists focusable containers in tree order", () => {
    assert.deepEqual(
      computeFocusList(tree()).map((c) => c.debugName),
      ["a", "b", "c"],
    );
  });
});

describe("computeMovedFocus", () => {
  test("wraps around in both directions", () => {
    const list = computeFocusList(tree());
    const [a, b, c] = list;
    assert.ok(a && b && c);
    assert.equal(computeMovedFocus(list, null, "next"), a);
    assert.equal(computeMovedFocus(list, null, "prev"), c);
    assert.equal(computeMovedFocus(list, a, "next"), b);
    assert.equal(computeMovedFocus(list, c, "next"), a);
    assert.equal(computeMovedFocus(list, a, "prev"), c);
  });

  test("an empty list has no target", () => {
    assert.equal(computeMovedFocus([], null, "next"), null);
  });
});

describe("applyFocusChange", () => {
  test("writes the focused property on the old and new target", () => {
    const [a, b] = computeFocusList(tree());
    assert.ok(a && b);
    applyFocusChange(null, a);
    assert.equal(isFocused(a), true);
    applyFocusChange(a, b);
    assert.equal(isFocused(a), false);
    assert.equal(isFocused(b), true);
    applyFocusChange(b, null);
    assert.equal(isFocused(b), false);
  });

  test("rejects a target that does not declare the focused property", () => {
    const root = tree();
    assert.throws(
      () => applyFocusChange(null, root),
      (e: unknown) =>
        isUiError(e, "UI_INVALID_PROPS") &&
        e.message === "<root#1> does not declare the focused property",
    );
  });
});
