import { paddingLayoutObject } from "../layout/types.js";
import { SelectorProperty } from "../properties/builtins.js";
import { selector } from "../theme/selector.js";
import { Template } from "./template.js";
import type { Widget } from "./types.js";

/**
 * Single-child frame. Its `Selector` names the frame's style; composites
 * usually replace it with a shared selector.
 */
export const Container: Widget = Object.freeze({
  create(): Template {
    return new Template()
      .asParentType("single")
      .withProperty(SelectorProperty, selector("container"))
      .withLayoutObject(paddingLayoutObject(0))
      .withDebugName("Container");
  },
});
