import { assert, describe, test } from "@lattice-ui/testkit";
import { keyEvent, mouseEvent } from "../../events.js";
import { createInstanceIdAllocator } from "../../runtime/instance.js";
import { instantiateTemplate } from "../../runtime/instantiate.js";
import { KeyEventHandler, MouseEventHandler } from "../eventHandlers.js";
import { Template } from "../template.js";

const container = instantiateTemplate(new Template(), createInstanceIdAllocator(1));

describe("KeyEventHandler", () => {
  test("routes down and repeat to key-down callbacks, up to key-up callbacks", () => {
    const seen: string[] = [];
    const handler = new KeyEventHandler()
      .onKeyDown((ev) => {
        seen.push(`down:${ev.action}`);
        return false;
      })
      .onKeyUp((ev) => {
        seen.push(`up:${ev.action}`);
        return false;
      });

    for (const action of ["down", "repeat", "up"] as const) {
      const ev = keyEvent("a", { action });
      for (const cb of handler.callbacksFor(ev)) cb(ev, container);
    }
    assert.deepEqual(seen, ["down:down", "down:repeat", "up:up"]);
  });

  test("ignores mouse events", () => {
    const handler = new KeyEventHandler().onKeyDown(() => true);
    assert.equal(handler.callbacksFor(mouseEvent(0, 0, "down")).length, 0);
  });

  test("builders do not mutate the original handler", () => {
    const base = new KeyEventHandler();
    const extended = base.onKeyDown(() => true);
    assert.equal(base.callbacksFor(keyEvent("a")).length, 0);
    assert.equal(extended.callbacksFor(keyEvent("a")).length, 1);
  });
});

describe("MouseEventHandler", () => {
  test("routes by button transition", () => {
    const handler = new MouseEventHandler()
      .onMouseDown((ev) => ev.button === 0)
      .onMouseUp(() => false);
    const down = mouseEvent(3, 4, "down");
    const [cb] = handler.callbacksFor(down);
    assert.ok(cb);
    assert.equal(cb(down, container), true);
    assert.equal(handler.callbacksFor(mouseEvent(3, 4, "up")).length, 1);
    assert.equal(handler.callbacksFor(keyEvent("a")).length, 0);
  });
});
