import { fixedSizeLayoutObject } from "../layout/types.js";
import { SelectorProperty } from "../properties/builtins.js";
import { selector } from "../theme/selector.js";
import { Template } from "./template.js";
import type { Widget } from "./types.js";

/** One-cell caret drawn by text input widgets. */
export const Cursor: Widget = Object.freeze({
  create(): Template {
    return new Template()
      .withProperty(SelectorProperty, selector("cursor"))
      .withLayoutObject(fixedSizeLayoutObject(1, 1))
      .withDebugName("Cursor");
  },
});
