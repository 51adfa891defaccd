/**
 * packages/core/src/runtime/update.ts: State update phase.
 *
 * Why: Once per tick every container with a State gets `update(container)`,
 * unconditionally, in tree order (parent before children, children in
 * declaration order). A State that throws is reported and skipped; the rest of
 * the tree still updates.
 */

import type { WidgetContainer } from "./container.js";
import { type UserCodeFailure, userCodeFailure } from "./failures.js";
import type { InstanceId } from "./instance.js";
import { walkTree } from "./instantiate.js";

export type UpdatePhaseResult = Readonly<{
  /** Ids of containers whose State ran to completion, in call order. */
  updated: readonly InstanceId[];
  failures: readonly UserCodeFailure[];
}>;

export function runStateUpdates(root: WidgetContainer): UpdatePhaseResult {
  const updated: InstanceId[] = [];
  const failures: UserCodeFailure[] = [];

  walkTree(root, (container) => {
    const state = container.state;
    if (state === null) return;
    try {
      state.update(container);
      updated.push(container.id);
    } catch (e: unknown) {
      failures.push(userCodeFailure("update", "State.update", container, e));
    }
  });

  return Object.freeze({
    updated: Object.freeze(updated),
    failures: Object.freeze(failures),
  });
}
