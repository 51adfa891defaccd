import { ScrollLayoutObject } from "../layout/types.js";
import { Template } from "./template.js";
import type { Widget } from "./types.js";

/** Single-child viewport whose child may exceed the visible area. */
export const ScrollViewer: Widget = Object.freeze({
  create(): Template {
    return new Template()
      .asParentType("single")
      .withLayoutObject(ScrollLayoutObject)
      .withDebugName("ScrollViewer");
  },
});
