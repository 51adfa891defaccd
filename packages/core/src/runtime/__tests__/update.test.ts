import { assert, captureWarnings, describe, test } from "@lattice-ui/testkit";
import { Stack } from "../../widgets/stack.js";
import { Template } from "../../widgets/template.js";
import type { State } from "../../widgets/types.js";
import type { WidgetContainer } from "../container.js";
import { createInstanceIdAllocator } from "../instance.js";
import { instantiateTemplate } from "../instantiate.js";
import { runStateUpdates } from "../update.js";

function logging(log: string[]): State {
  return {
    update(container: WidgetContainer) {
      log.push(container.debugName);
    },
  };
}

describe("runStateUpdates", () => {
  test("runs every State once, parent before children", () => {
    const log: string[] = [];
    const state = logging(log);
    const t = Stack.create()
      .withDebugName("root")
      .withState(state)
      .withChild(
        Stack.create()
          .withDebugName("a")
          .withState(state)
          .withChild(new Template().withDebugName("a1").withState(state)),
      )
      .withChild(new Template().withDebugName("stateless"))
      .withChild(new Template().withDebugName("b").withState(state));
    const root = instantiateTemplate(t, createInstanceIdAllocator(1));

    const res = runStateUpdates(root);
    assert.deepEqual(log, ["root", "a", "a1", "b"]);
    assert.deepEqual(res.updated, [1, 2, 3, 5]);
    assert.deepEqual(res.failures, []);
  });

  test("a throwing State is reported and the rest still update", () => {
    const log: string[] = [];
    const broken: State = {
      update() {
        throw new TypeError("bad state");
      },
    };
    const t = Stack.create()
      .withDebugName("root")
      .withChild(new Template().withDebugName("broken").withState(broken))
      .withChild(new Template().withDebugName("ok").withState(logging(log)));
    const root = instantiateTemplate(t, createInstanceIdAllocator(1));

    const { result, warnings } = captureWarnings(() => runStateUpdates(root));
    assert.deepEqual(log, ["ok"]);
    assert.deepEqual(result.updated, [3]);
    assert.deepEqual(result.failures, [
      {
        code: "UI_USER_CODE_THROW",
        detail: "TypeError: bad state",
        containerId: 2,
        debugName: "broken",
      },
    ]);
    assert.deepEqual(warnings, [
      "[lattice][update] State.update threw on <broken#2>: TypeError: bad state",
    ]);
  });
});
