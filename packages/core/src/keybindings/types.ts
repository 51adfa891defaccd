/**
 * packages/core/src/keybindings/types.ts: Key input type definitions.
 */

/**
 * Keyboard modifier state, decoded from the driver's bitmask.
 */
export type Modifiers = Readonly<{
  shift: boolean;
  ctrl: boolean;
  alt: boolean;
  meta: boolean;
}>;
