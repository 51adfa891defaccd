import type { UiInputEvent } from "../events.js";
import type { LayoutCollaborator } from "../layout/types.js";
import type { WidgetContainer } from "../runtime/container.js";
import type { DispatchResult, PropagationPolicy } from "../runtime/dispatch.js";
import type { UserCodeFailure } from "../runtime/failures.js";
import type { InstanceId } from "../runtime/instance.js";

/**
 * Chooses the container an event is delivered to (focus or hit-testing).
 * Returning null drops the event.
 */
export type TargetResolver = (
  event: UiInputEvent,
  runtime: WidgetRuntime,
) => WidgetContainer | null;

/** Reads settled properties after the update (and layout) phase. */
export interface RenderCollaborator {
  render(root: WidgetContainer): void;
}

export type RuntimeConfig = Readonly<{
  /** Propagation of unconsumed events. Default "bubble". */
  propagation?: PropagationPolicy;
  /** Events delivered per tick; the rest stay queued. Default 256. */
  maxEventsPerTick?: number;
  /** Default: focused container for key events, else the root. */
  targetResolver?: TargetResolver;
  layout?: LayoutCollaborator;
  renderer?: RenderCollaborator;
}>;

export type TickReport = Readonly<{
  /** 1-based tick counter. */
  tick: number;
  dispatched: readonly DispatchResult[];
  /** Ids of containers whose State ran, in tree order. */
  updatedStates: readonly InstanceId[];
  /** Every user-code failure of the tick (dispatch phase, then update phase). */
  failures: readonly UserCodeFailure[];
}>;

export interface WidgetRuntime {
  readonly root: WidgetContainer;
  /** Queue an event; it is delivered during the next tick's dispatch phase. */
  postEvent(event: UiInputEvent, target?: WidgetContainer): void;
  /** Run one tick: dispatch queued events, then update every State. */
  tick(): TickReport;
  /** Move focus (null clears it). */
  focus(container: WidgetContainer | null): void;
  focusNext(): WidgetContainer | null;
  focusPrev(): WidgetContainer | null;
  focusedContainer(): WidgetContainer | null;
  findByDebugName(name: string): WidgetContainer | null;
  /** Attached containers in tree order. */
  containers(): readonly WidgetContainer[];
  pendingEventCount(): number;
  /** Detach the tree and release every shared cell. */
  dispose(): void;
}
