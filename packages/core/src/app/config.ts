/**
 * Runtime configuration: defaults and validation.
 */

import { UiError } from "../errors.js";
import type { LayoutCollaborator } from "../layout/types.js";
import type { PropagationPolicy } from "../runtime/dispatch.js";
import type { RenderCollaborator, RuntimeConfig, TargetResolver } from "./types.js";

/** Resolved configuration with defaults applied. */
export type ResolvedRuntimeConfig = Readonly<{
  propagation: PropagationPolicy;
  maxEventsPerTick: number;
  targetResolver: TargetResolver | undefined;
  layout: LayoutCollaborator | undefined;
  renderer: RenderCollaborator | undefined;
}>;

/** Default configuration values. */
export const DEFAULT_RUNTIME_CONFIG: ResolvedRuntimeConfig = Object.freeze({
  propagation: "bubble",
  maxEventsPerTick: 256,
  targetResolver: undefined,
  layout: undefined,
  renderer: undefined,
});

function invalidProps(detail: string): never {
  throw new UiError("UI_INVALID_PROPS", detail);
}

function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidProps(`${name} must be a positive integer`);
  return v;
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveRuntimeConfig(config: RuntimeConfig | undefined): ResolvedRuntimeConfig {
  if (!config) return DEFAULT_RUNTIME_CONFIG;

  const propagation = config.propagation ?? DEFAULT_RUNTIME_CONFIG.propagation;
  if (propagation !== "bubble" && propagation !== "target") {
    invalidProps(`propagation must be "bubble" or "target" (got ${String(propagation)})`);
  }
  const maxEventsPerTick =
    config.maxEventsPerTick === undefined
      ? DEFAULT_RUNTIME_CONFIG.maxEventsPerTick
      : requirePositiveInt("maxEventsPerTick", config.maxEventsPerTick);
  const targetResolver =
    typeof config.targetResolver === "function" ? config.targetResolver : undefined;
  if (config.layout !== undefined && typeof config.layout.layout !== "function") {
    invalidProps("layout collaborator must implement layout(root)");
  }
  if (config.renderer !== undefined && typeof config.renderer.render !== "function") {
    invalidProps("renderer collaborator must implement render(root)");
  }

  return Object.freeze({
    propagation,
    maxEventsPerTick,
    targetResolver,
    layout: config.layout,
    renderer: config.renderer,
  });
}
