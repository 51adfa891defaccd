/**
 * packages/core/src/keybindings/keyCodes.ts: Numeric key codes.
 *
 * Why: Input drivers report keys as numbers. Printable ASCII keys use their
 * code point (32..126) so that mapping them to text is trivial; named keys
 * live above 1000 so they can never collide with a printable character.
 */

import type { Modifiers } from "./types.js";

export const KEY_ESCAPE = 1000;
export const KEY_ENTER = 1001;
export const KEY_TAB = 1002;
export const KEY_BACKSPACE = 1003;
export const KEY_DELETE = 1004;
export const KEY_UP = 1010;
export const KEY_DOWN = 1011;
export const KEY_LEFT = 1012;
export const KEY_RIGHT = 1013;
export const KEY_HOME = 1014;
export const KEY_END = 1015;

export const KEY_SPACE = 32;

/** Modifier bits as reported by input drivers. */
export const MOD_SHIFT = 1 << 0;
export const MOD_CTRL = 1 << 1;
export const MOD_ALT = 1 << 2;
export const MOD_META = 1 << 3;

export const KEY_NAME_TO_CODE: Readonly<Record<string, number>> = Object.freeze({
  escape: KEY_ESCAPE,
  esc: KEY_ESCAPE,
  enter: KEY_ENTER,
  return: KEY_ENTER,
  tab: KEY_TAB,
  backspace: KEY_BACKSPACE,
  delete: KEY_DELETE,
  up: KEY_UP,
  down: KEY_DOWN,
  left: KEY_LEFT,
  right: KEY_RIGHT,
  home: KEY_HOME,
  end: KEY_END,
  space: KEY_SPACE,
});

export function modsFromBitmask(mask: number): Modifiers {
  return Object.freeze({
    shift: (mask & MOD_SHIFT) !== 0,
    ctrl: (mask & MOD_CTRL) !== 0,
    alt: (mask & MOD_ALT) !== 0,
    meta: (mask & MOD_META) !== 0,
  });
}

export function isPrintableKey(key: number): boolean {
  return Number.isInteger(key) && key >= 32 && key <= 126;
}

/** Key code for a single printable ASCII character, or null. */
export function charToKeyCode(ch: string): number | null {
  if (ch.length !== 1) return null;
  const code = ch.charCodeAt(0);
  if (!isPrintableKey(code)) return null;
  // Letters are reported unshifted; shift is a modifier.
  if (code >= 65 && code <= 90) return code + 32;
  return code;
}

/**
 * Resolve a key name ("backspace", "a", "space") to its code.
 * Matching is case-insensitive for named keys.
 */
export function keyNameToCode(name: string): number | null {
  const named = KEY_NAME_TO_CODE[name.toLowerCase()];
  if (named !== undefined) return named;
  return charToKeyCode(name);
}

/**
 * Character produced by a key press, or null for non-printable keys and for
 * ctrl/alt/meta chords. Shift upper-cases letters.
 */
export function keyToChar(key: number, mods: number = 0): string | null {
  if (!isPrintableKey(key)) return null;
  if ((mods & (MOD_CTRL | MOD_ALT | MOD_META)) !== 0) return null;
  const ch = String.fromCharCode(key);
  if ((mods & MOD_SHIFT) !== 0 && key >= 97 && key <= 122) return ch.toUpperCase();
  return ch;
}
