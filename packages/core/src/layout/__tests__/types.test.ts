import { assert, describe, test } from "@lattice-ui/testkit";
import { fixedSizeLayoutObject, paddingLayoutObject } from "../types.js";

describe("layout objects", () => {
  test("uniform padding expands to every side", () => {
    assert.deepEqual(paddingLayoutObject(2), {
      kind: "padding",
      padding: { top: 2, right: 2, bottom: 2, left: 2 },
    });
  });

  test("explicit thickness is copied", () => {
    const t = { top: 1, right: 0, bottom: 1, left: 3 };
    const obj = paddingLayoutObject(t);
    assert.equal(obj.kind === "padding" && obj.padding !== t, true);
    assert.equal(Object.isFrozen(obj), true);
  });

  test("fixed size carries its dimensions", () => {
    assert.deepEqual(fixedSizeLayoutObject(1, 1), { kind: "fixedSize", w: 1, h: 1 });
  });
});
