import { assert, captureWarnings, describe, test } from "@lattice-ui/testkit";
import { createWidgetRuntime } from "../../app/createRuntime.js";
import { keyEvent } from "../../events.js";
import { MOD_SHIFT } from "../../keybindings/keyCodes.js";
import { Focused, Label, SelectorProperty, WaterMark } from "../../properties/builtins.js";
import type { WidgetContainer } from "../../runtime/container.js";
import { selectorToString } from "../../theme/selector.js";
import { Stack } from "../stack.js";
import { Template } from "../template.js";
import { TextBox, TextBoxState } from "../textBox.js";
import { waterMarkDisplayText } from "../waterMarkTextBlock.js";

function label(c: WidgetContainer): string {
  const r = c.borrowProperty(Label);
  assert.ok(r.ok);
  return r.value;
}

function selectorText(c: WidgetContainer): string {
  const r = c.borrowProperty(SelectorProperty);
  assert.ok(r.ok);
  return selectorToString(r.value);
}

function typeKeys(runtime: ReturnType<typeof createWidgetRuntime>, keys: readonly string[]): void {
  for (const k of keys) runtime.postEvent(keyEvent(k));
}

describe("TextBox structure", () => {
  test("instantiates the nested composition in tree order", () => {
    const runtime = createWidgetRuntime(TextBox);
    assert.deepEqual(
      runtime.containers().map((c) => `${String(c.id)}:${c.debugName}`),
      ["1:TextBox", "2:Container", "3:Stack", "4:ScrollViewer", "5:WaterMarkTextBlock", "6:Cursor"],
    );
  });

  test("label, selector and watermark are shared with the inner widgets", () => {
    const runtime = createWidgetRuntime(TextBox);
    const root = runtime.root;
    const block = runtime.findByDebugName("WaterMarkTextBlock");
    const container = runtime.findByDebugName("Container");
    assert.ok(block && container);

    assert.equal(root.isSharedProperty(Label), true);
    assert.equal(block.isSharedProperty(Label), true);
    assert.equal(block.isSharedProperty(WaterMark), true);
    assert.equal(container.isSharedProperty(SelectorProperty), true);
    assert.equal(root.isSharedProperty(Focused), false);

    root.setProperty(WaterMark, "Search...");
    assert.deepEqual(waterMarkDisplayText(block), { ok: true, value: "Search..." });
    assert.equal(selectorText(container), "textbox");
  });

  test("each TextBox gets its own shared cells", () => {
    const runtime = createWidgetRuntime(
      Stack.create().withChild(TextBox.create()).withChild(TextBox.create()),
    );
    const boxes = runtime.containers().filter((c) => c.debugName === "TextBox");
    const [first, second] = boxes;
    assert.ok(first && second);
    first.setProperty(Label, "one");
    assert.equal(label(second), "");
  });
});

describe("TextBox input", () => {
  test("ignores keys while unfocused", () => {
    const runtime = createWidgetRuntime(TextBox);
    runtime.postEvent(keyEvent("a"));
    const report = runtime.tick();

    assert.equal(report.dispatched.length, 1);
    assert.equal(report.dispatched[0]?.consumed, false);
    assert.deepEqual(report.dispatched[0]?.path, [1]);
    assert.deepEqual(report.updatedStates, [1]);
    assert.equal(label(runtime.root), "");
  });

  test("typing while focused updates the shared label after the tick", () => {
    const runtime = createWidgetRuntime(TextBox);
    const root = runtime.root;
    const block = runtime.findByDebugName("WaterMarkTextBlock");
    assert.ok(block);

    runtime.focus(root);
    typeKeys(runtime, ["a", "b", "c"]);
    const report = runtime.tick();

    assert.equal(report.dispatched.length, 3);
    for (const res of report.dispatched) {
      assert.equal(res.consumed, true);
      assert.equal(res.handledBy, root);
    }
    assert.equal(label(root), "abc");
    assert.equal(label(block), "abc");
    assert.deepEqual(waterMarkDisplayText(block), { ok: true, value: "abc" });
  });

  test("backspace removes the last character", () => {
    const runtime = createWidgetRuntime(TextBox);
    runtime.focus(runtime.root);
    typeKeys(runtime, ["a", "b", "c", "backspace"]);
    runtime.tick();
    assert.equal(label(runtime.root), "ab");

    typeKeys(runtime, ["backspace", "backspace", "backspace"]);
    runtime.tick();
    assert.equal(label(runtime.root), "");
  });

  test("shift produces uppercase letters", () => {
    const runtime = createWidgetRuntime(TextBox);
    runtime.focus(runtime.root);
    runtime.postEvent(keyEvent("h", { mods: MOD_SHIFT }));
    runtime.postEvent(keyEvent("i"));
    runtime.postEvent(keyEvent("Y"));
    runtime.tick();
    assert.equal(label(runtime.root), "HiY");
  });

  test("non-printable keys are consumed without editing", () => {
    const runtime = createWidgetRuntime(TextBox);
    runtime.focus(runtime.root);
    runtime.postEvent(keyEvent("x"));
    runtime.postEvent(keyEvent("left"));
    const report = runtime.tick();
    assert.equal(report.dispatched[1]?.consumed, true);
    assert.equal(label(runtime.root), "x");
  });

  test("key-up events are not handled", () => {
    const runtime = createWidgetRuntime(TextBox);
    runtime.focus(runtime.root);
    runtime.postEvent(keyEvent("a", { action: "up" }));
    const report = runtime.tick();
    assert.equal(report.dispatched[0]?.consumed, false);
    assert.equal(label(runtime.root), "");
  });
});

describe("TextBox synchronization", () => {
  test("an external label write is pulled into the text buffer", () => {
    const runtime = createWidgetRuntime(TextBox);
    const root = runtime.root;
    root.setProperty(Label, "hello");
    runtime.tick();

    runtime.focus(root);
    runtime.postEvent(keyEvent("!"));
    runtime.tick();
    assert.equal(label(root), "hello!");
  });

  test("typed text wins over an external write made in the same tick", () => {
    const runtime = createWidgetRuntime(TextBox);
    const root = runtime.root;
    runtime.focus(root);
    root.setProperty(Label, "external");
    runtime.postEvent(keyEvent("x"));
    runtime.tick();
    assert.equal(label(root), "x");
  });

  test("the focus pseudo-class follows the focused property", () => {
    const runtime = createWidgetRuntime(TextBox);
    const container = runtime.findByDebugName("Container");
    assert.ok(container);

    runtime.focus(runtime.root);
    runtime.tick();
    assert.equal(selectorText(runtime.root), "textbox:focus");
    assert.equal(selectorText(container), "textbox:focus");

    runtime.focus(null);
    runtime.tick();
    assert.equal(selectorText(container), "textbox");
  });
});

describe("TextBoxState on a container missing its properties", () => {
  test("reports each failed property access", () => {
    const runtime = createWidgetRuntime(
      new Template().withDebugName("Bare").withState(new TextBoxState()),
    );
    const { result, warnings } = captureWarnings(() => runtime.tick());
    assert.deepEqual(result.updatedStates, [1]);
    assert.deepEqual(warnings, [
      '[lattice][textbox] UI_PROPERTY_NOT_FOUND: property "selector" not declared on <Bare#1>',
      '[lattice][textbox] UI_PROPERTY_NOT_FOUND: property "label" not declared on <Bare#1>',
    ]);
  });
});

describe("TextBox disposal", () => {
  test("releases every shared cell", () => {
    const runtime = createWidgetRuntime(TextBox);
    const cells = runtime.root.sharedCells();
    assert.equal(cells.length, 3);
    runtime.dispose();
    for (const cell of cells) assert.equal(cell.isReleased, true);
  });
});
