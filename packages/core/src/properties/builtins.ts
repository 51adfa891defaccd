/**
 * Property types used by the built-in widgets.
 */

import { isSelector, selector, type Selector } from "../theme/selector.js";
import { defineProperty, isBoolean, isString } from "./property.js";

/** Text shown by a widget (a text box's content, a block's text). */
export const Label = defineProperty<string>("label", isString, "");

/** Placeholder text shown while the label is empty. */
export const WaterMark = defineProperty<string>("waterMark", isString, "");

/** Whether the widget currently receives keyboard input. */
export const Focused = defineProperty<boolean>("focused", isBoolean, false);

/** Theme selector requested by the widget. */
export const SelectorProperty = defineProperty<Selector>("selector", isSelector, selector());
