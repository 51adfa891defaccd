/**
 * packages/core/src/widgets/textBox.ts: Single-line text input.
 *
 * Why: Reference composite widget. It creates shared cells for its label,
 * watermark and selector, threads them into a nested composition, and keeps
 * a private text buffer that it reconciles with the shared label each tick.
 *
 * Shared properties:
 *   - Label: the text (read by the watermark block, written by the state)
 *   - WaterMark: placeholder shown while the label is empty
 *   - Selector: theme selector; carries the `focus` pseudo-class while focused
 *
 * Properties:
 *   - Focused: written by the focus collaborator
 *
 * Structure: Container > Stack > [ScrollViewer > WaterMarkTextBlock, Cursor]
 */

import { warnDev } from "../debug/warn.js";
import type { UiFailure } from "../errors.js";
import type { KeyEvent } from "../events.js";
import { KEY_BACKSPACE, keyToChar } from "../keybindings/keyCodes.js";
import { Focused, Label, SelectorProperty, WaterMark } from "../properties/builtins.js";
import { sharedProperty } from "../properties/sharedProperty.js";
import type { WidgetContainer } from "../runtime/container.js";
import { PropertySync } from "../runtime/propertySync.js";
import {
  hasPseudoClass,
  selector,
  withPseudoClass,
  withoutPseudoClass,
} from "../theme/selector.js";
import { Container } from "./container.js";
import { Cursor } from "./cursor.js";
import { KeyEventHandler } from "./eventHandlers.js";
import { ScrollViewer } from "./scrollViewer.js";
import { Stack } from "./stack.js";
import { Template } from "./template.js";
import type { State, Widget } from "./types.js";
import { WaterMarkTextBlock } from "./waterMarkTextBlock.js";

const FOCUS_PSEUDO_CLASS = "focus";

function reportAccessFailure(error: UiFailure): void {
  warnDev(`[lattice][textbox] ${error.code}: ${error.detail}`);
}

function dropLastChar(text: string): string {
  const chars = Array.from(text);
  chars.pop();
  return chars.join("");
}

/** Text processing for TextBox. */
export class TextBoxState implements State {
  private readonly text = new PropertySync(Label, "");
  private focused = false;

  /** Internal text buffer. */
  get value(): string {
    return this.text.value;
  }

  /** True while an edit has not been pushed to the label. */
  get updated(): boolean {
    return this.text.updated;
  }

  get isFocused(): boolean {
    return this.focused;
  }

  private syncFocused(container: WidgetContainer): void {
    const focused = container.borrowProperty(Focused);
    if (focused.ok) this.focused = focused.value;
  }

  /**
   * Key-down input. Ignored (not consumed, nothing mutated) while unfocused;
   * otherwise printable keys append, Backspace removes the last character,
   * and every key is consumed.
   */
  handleKeyDown(event: KeyEvent, container: WidgetContainer): boolean {
    this.syncFocused(container);
    if (!this.focused) return false;

    const ch = keyToChar(event.key, event.mods);
    if (ch !== null) {
      this.text.mutate((t) => t + ch);
    } else if (event.key === KEY_BACKSPACE) {
      this.text.mutate(dropLastChar);
    }
    return true;
  }

  update(container: WidgetContainer): void {
    this.syncFocused(container);

    const sel = container.borrowProperty(SelectorProperty);
    if (!sel.ok) {
      reportAccessFailure(sel.error);
    } else if (hasPseudoClass(sel.value, FOCUS_PSEUDO_CLASS) !== this.focused) {
      const written = container.setProperty(
        SelectorProperty,
        this.focused
          ? withPseudoClass(sel.value, FOCUS_PSEUDO_CLASS)
          : withoutPseudoClass(sel.value, FOCUS_PSEUDO_CLASS),
      );
      if (!written.ok) reportAccessFailure(written.error);
    }

    const synced = this.text.reconcile(container);
    if (!synced.ok) reportAccessFailure(synced.error);
  }
}

export const TextBox: Widget = Object.freeze({
  create(): Template {
    const label = sharedProperty(Label, "");
    const waterMark = sharedProperty(WaterMark, "");
    const textBoxSelector = sharedProperty(SelectorProperty, selector("textbox"));
    const state = new TextBoxState();

    return new Template()
      .asParentType("single")
      .withProperty(Focused, false)
      .withChild(
        Container.create()
          .withChild(
            Stack.create()
              .withChild(
                ScrollViewer.create().withChild(
                  WaterMarkTextBlock.create()
                    .withSharedProperty(label)
                    .withSharedProperty(textBoxSelector)
                    .withSharedProperty(waterMark),
                ),
              )
              .withChild(Cursor.create()),
          )
          .withSharedProperty(textBoxSelector),
      )
      .withState(state)
      .withDebugName("TextBox")
      .withSharedProperty(label)
      .withSharedProperty(textBoxSelector)
      .withSharedProperty(waterMark)
      .withEventHandler(
        new KeyEventHandler().onKeyDown((event, container) =>
          state.handleKeyDown(event, container),
        ),
      );
  },
});
