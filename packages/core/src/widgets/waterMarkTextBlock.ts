/**
 * packages/core/src/widgets/waterMarkTextBlock.ts: Text with a placeholder.
 *
 * Shows `Label`, or `WaterMark` while the label is empty. Text inputs thread
 * their shared label, watermark and selector cells into it, so the block
 * always displays the input's current text.
 */

import { TextSizeLayoutObject } from "../layout/types.js";
import { Label, SelectorProperty, WaterMark } from "../properties/builtins.js";
import type { PropertyResult, WidgetContainer } from "../runtime/container.js";
import { selector } from "../theme/selector.js";
import { Template } from "./template.js";
import type { Widget } from "./types.js";

export const WaterMarkTextBlock: Widget = Object.freeze({
  create(): Template {
    return new Template()
      .withProperty(Label, "")
      .withProperty(WaterMark, "")
      .withProperty(SelectorProperty, selector("watermark"))
      .withLayoutObject(TextSizeLayoutObject)
      .withDebugName("WaterMarkTextBlock");
  },
});

/**
 * Text the rendering collaborator should draw for a watermark block.
 *
 * @example
 * waterMarkDisplayText(block) // { ok: true, value: "Search..." } while empty
 */
export function waterMarkDisplayText(container: WidgetContainer): PropertyResult<string> {
  const label = container.borrowProperty(Label);
  if (!label.ok) return label;
  if (label.value.length > 0) return label;
  return container.borrowProperty(WaterMark);
}
