import { StretchLayoutObject } from "../layout/types.js";
import { Template } from "./template.js";
import type { Widget } from "./types.js";

/**
 * Stacks its children on the z-axis: every child receives the full space.
 *
 * Parent type multi; stretch layout; no properties and no state.
 */
export const Stack: Widget = Object.freeze({
  create(): Template {
    return new Template()
      .asParentType("multi")
      .withLayoutObject(StretchLayoutObject)
      .withDebugName("Stack");
  },
});
