/**
 * Input event types consumed by the widget core.
 *
 * The input-loop collaborator produces these and decides their target
 * (focus or hit-testing); the core only routes `(event, target)` pairs.
 */

import { MOD_SHIFT, keyNameToCode } from "./keybindings/keyCodes.js";

/** Key event action type: down (press), up (release), or repeat (held). */
export type KeyAction = "down" | "up" | "repeat";

/** Mouse button transition. */
export type MouseAction = "down" | "up";

export type KeyEvent = Readonly<{
  kind: "key";
  /** Numeric key code (see keybindings/keyCodes.ts). */
  key: number;
  /** Modifier bitmask (MOD_SHIFT | MOD_CTRL | ...). */
  mods: number;
  action: KeyAction;
  timeMs: number;
}>;

export type MouseEvent = Readonly<{
  kind: "mouse";
  x: number;
  y: number;
  action: MouseAction;
  /** 0 = primary. */
  button: number;
  timeMs: number;
}>;

/** Events routed through widget event handlers. */
export type UiInputEvent = KeyEvent | MouseEvent;

/** Event category, as matched by EventHandler implementations. */
export type UiEventCategory = UiInputEvent["kind"];

/**
 * Build a key event from a code or a key name ("a", "backspace").
 * An uppercase letter name ("A") adds MOD_SHIFT to the modifiers.
 * Throws RangeError for unknown names.
 */
export function keyEvent(
  key: number | string,
  opts: Readonly<{ action?: KeyAction; mods?: number; timeMs?: number }> = {},
): KeyEvent {
  const code = typeof key === "number" ? key : keyNameToCode(key);
  if (code === null) {
    throw new RangeError(`unknown key name "${String(key)}"`);
  }
  const shifted = typeof key === "string" && key.length === 1 && key >= "A" && key <= "Z";
  return Object.freeze({
    kind: "key",
    key: code,
    mods: (opts.mods ?? 0) | (shifted ? MOD_SHIFT : 0),
    action: opts.action ?? "down",
    timeMs: opts.timeMs ?? 0,
  });
}

export function mouseEvent(
  x: number,
  y: number,
  action: MouseAction,
  opts: Readonly<{ button?: number; timeMs?: number }> = {},
): MouseEvent {
  return Object.freeze({
    kind: "mouse",
    x,
    y,
    action,
    button: opts.button ?? 0,
    timeMs: opts.timeMs ?? 0,
  });
}
