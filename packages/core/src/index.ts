/**
 * @lattice-ui/core: widget template, property, state and event core.
 */

// =============================================================================
// Errors
// =============================================================================

export {
  UiError,
  type UiErrorCode,
  type UiFailure,
  describeThrown,
  isUiError,
} from "./errors.js";

// =============================================================================
// Input events
// =============================================================================

export {
  type KeyAction,
  type KeyEvent,
  type MouseAction,
  type MouseEvent,
  type UiEventCategory,
  type UiInputEvent,
  keyEvent,
  mouseEvent,
} from "./events.js";
export {
  KEY_BACKSPACE,
  KEY_DELETE,
  KEY_DOWN,
  KEY_END,
  KEY_ENTER,
  KEY_ESCAPE,
  KEY_HOME,
  KEY_LEFT,
  KEY_NAME_TO_CODE,
  KEY_RIGHT,
  KEY_SPACE,
  KEY_TAB,
  KEY_UP,
  MOD_ALT,
  MOD_CTRL,
  MOD_META,
  MOD_SHIFT,
  charToKeyCode,
  isPrintableKey,
  keyNameToCode,
  keyToChar,
  modsFromBitmask,
} from "./keybindings/keyCodes.js";
export type { Modifiers } from "./keybindings/types.js";

// =============================================================================
// Properties
// =============================================================================

export {
  type BorrowState,
  type PropertyDraft,
  type PropertyEntry,
  type PropertyGuard,
  type PropertyType,
  PropertySlot,
  assertPropertyValue,
  defineProperty,
  isBoolean,
  isNumber,
  isString,
  propertyEntry,
} from "./properties/property.js";
export { SharedProperty, sharedProperty } from "./properties/sharedProperty.js";
export { Focused, Label, SelectorProperty, WaterMark } from "./properties/builtins.js";

// =============================================================================
// Theme selectors
// =============================================================================

export {
  type Selector,
  hasPseudoClass,
  isSelector,
  selector,
  selectorToString,
  selectorsEqual,
  withClass,
  withId,
  withPseudoClass,
  withoutPseudoClass,
} from "./theme/selector.js";

// =============================================================================
// Layout descriptors
// =============================================================================

export {
  DefaultLayoutObject,
  type LayoutCollaborator,
  type LayoutObject,
  ScrollLayoutObject,
  StretchLayoutObject,
  TextSizeLayoutObject,
  type Thickness,
  fixedSizeLayoutObject,
  paddingLayoutObject,
} from "./layout/types.js";

// =============================================================================
// Widgets
// =============================================================================

export type {
  EventCallback,
  EventHandler,
  ParentType,
  State,
  Widget,
} from "./widgets/types.js";
export {
  Template,
  type TemplateProperty,
  arityLimit,
  templateNodeCount,
} from "./widgets/template.js";
export {
  type KeyCallback,
  KeyEventHandler,
  type MouseCallback,
  MouseEventHandler,
} from "./widgets/eventHandlers.js";
export { Stack } from "./widgets/stack.js";
export { Container } from "./widgets/container.js";
export { ScrollViewer } from "./widgets/scrollViewer.js";
export { Cursor } from "./widgets/cursor.js";
export { WaterMarkTextBlock, waterMarkDisplayText } from "./widgets/waterMarkTextBlock.js";
export { TextBox, TextBoxState } from "./widgets/textBox.js";

// =============================================================================
// Runtime
// =============================================================================

export {
  type PropertyResult,
  WidgetContainer,
  type WidgetContainerInit,
} from "./runtime/container.js";
export {
  type InstanceId,
  type InstanceIdAllocator,
  createInstanceIdAllocator,
} from "./runtime/instance.js";
export {
  ancestorPath,
  collectTree,
  detachContainer,
  instantiateTemplate,
  walkTree,
} from "./runtime/instantiate.js";
export {
  type DispatchOptions,
  type DispatchResult,
  type PropagationPolicy,
  dispatchEvent,
  isDispatching,
  runEventHandler,
} from "./runtime/dispatch.js";
export { type UpdatePhaseResult, runStateUpdates } from "./runtime/update.js";
export { PropertySync, type SyncDirection } from "./runtime/propertySync.js";
export {
  type FocusMove,
  applyFocusChange,
  computeFocusList,
  computeMovedFocus,
} from "./runtime/focus.js";
export type { UserCodeFailure } from "./runtime/failures.js";

// =============================================================================
// App runtime
// =============================================================================

export { createWidgetRuntime } from "./app/createRuntime.js";
export {
  DEFAULT_RUNTIME_CONFIG,
  type ResolvedRuntimeConfig,
  resolveRuntimeConfig,
} from "./app/config.js";
export type {
  RenderCollaborator,
  RuntimeConfig,
  TargetResolver,
  TickReport,
  WidgetRuntime,
} from "./app/types.js";
