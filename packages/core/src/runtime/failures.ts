/**
 * Failure records for user code (States and event callbacks) that threw.
 */

import { warnDev } from "../debug/warn.js";
import { describeThrown, type UiFailure } from "../errors.js";
import type { WidgetContainer } from "./container.js";
import type { InstanceId } from "./instance.js";

export type UserCodeFailure = UiFailure<"UI_USER_CODE_THROW"> &
  Readonly<{
    containerId: InstanceId;
    debugName: string;
  }>;

export function describeContainer(c: WidgetContainer): string {
  return `<${c.debugName || "(unnamed)"}#${String(c.id)}>`;
}

/** Build the failure record for `e` and emit the dev warning. */
export function userCodeFailure(
  area: string,
  what: string,
  container: WidgetContainer,
  e: unknown,
): UserCodeFailure {
  const detail = describeThrown(e);
  warnDev(`[lattice][${area}] ${what} threw on ${describeContainer(container)}: ${detail}`);
  return Object.freeze({
    code: "UI_USER_CODE_THROW",
    detail,
    containerId: container.id,
    debugName: container.debugName,
  });
}
