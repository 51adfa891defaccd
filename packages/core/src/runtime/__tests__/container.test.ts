import { assert, describe, test } from "@lattice-ui/testkit";
import { isUiError } from "../../errors.js";
import { Focused, Label, WaterMark } from "../../properties/builtins.js";
import { sharedProperty } from "../../properties/sharedProperty.js";
import { Template } from "../../widgets/template.js";
import { createInstanceIdAllocator } from "../instance.js";
import { instantiateTemplate } from "../instantiate.js";

function build(t: Template) {
  return instantiateTemplate(t, createInstanceIdAllocator(1));
}

describe("WidgetContainer property access", () => {
  test("reads declared values", () => {
    const c = build(new Template().withProperty(Label, "hi"));
    assert.deepEqual(c.borrowProperty(Label), { ok: true, value: "hi" });
  });

  test("an undeclared key is not found, never a default", () => {
    const c = build(new Template().withDebugName("Box").withProperty(Label, "hi"));
    const res = c.borrowProperty(WaterMark);
    assert.deepEqual(res, {
      ok: false,
      error: {
        code: "UI_PROPERTY_NOT_FOUND",
        detail: 'property "waterMark" not declared on <Box#1>',
      },
    });
    assert.equal(c.setProperty(WaterMark, "x").ok, false);
  });

  test("borrowMutProperty stores the draft and returns the callback result", () => {
    const c = build(new Template().withProperty(Label, "ab"));
    const res = c.borrowMutProperty(Label, (draft) => {
      draft.value = `${draft.value}c`;
      return draft.value.length;
    });
    assert.deepEqual(res, { ok: true, value: 3 });
    assert.deepEqual(c.borrowProperty(Label), { ok: true, value: "abc" });
  });

  test("borrowMutProperty on an undeclared key does not run the callback", () => {
    const c = build(new Template());
    let ran = false;
    const res = c.borrowMutProperty(Focused, () => {
      ran = true;
    });
    assert.equal(res.ok, false);
    assert.equal(ran, false);
  });

  test("reading a property inside its own mutable borrow is a conflict", () => {
    const c = build(new Template().withProperty(Label, ""));
    assert.throws(
      () => c.borrowMutProperty(Label, () => c.borrowProperty(Label)),
      (e: unknown) => isUiError(e, "UI_BORROW_CONFLICT"),
    );
  });

  test("different keys can be borrowed at the same time", () => {
    const c = build(new Template().withProperty(Label, "a").withProperty(WaterMark, "b"));
    const res = c.borrowMutProperty(Label, (draft) => {
      const other = c.borrowProperty(WaterMark);
      draft.value = other.ok ? other.value : "";
    });
    assert.equal(res.ok, true);
    assert.deepEqual(c.borrowProperty(Label), { ok: true, value: "b" });
  });

  test("describes its declarations", () => {
    const cell = sharedProperty(WaterMark, "");
    const c = build(new Template().withProperty(Label, "").withSharedProperty(cell));
    assert.deepEqual(
      c.propertyTypes().map((k) => k.name),
      ["label", "waterMark"],
    );
    assert.equal(c.hasProperty(Focused), false);
    assert.equal(c.isSharedProperty(Label), false);
    assert.equal(c.isSharedProperty(WaterMark), true);
    assert.deepEqual(c.sharedCells(), [cell]);
  });
});
