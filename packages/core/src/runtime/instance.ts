/**
 * Runtime instance identifiers.
 *
 * Ids are allocated monotonically per runtime and never reused, so a detached
 * container's id cannot be confused with a newer one.
 */

export type InstanceId = number;

export type InstanceIdAllocator = Readonly<{
  allocate: () => InstanceId;
}>;

export function createInstanceIdAllocator(start: InstanceId = 1): InstanceIdAllocator {
  let next = start;
  return Object.freeze({
    allocate: () => next++,
  });
}
