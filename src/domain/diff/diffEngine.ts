// Diff Engine
// Pure functions only - no I/O, deterministic for any two element lists
// Generic over the element type; carries no entity-specific logic

import { ChangeEvent, Delta, EntityKind, SnapshotElement } from '../types/types';

/**
 * added = current − previous, removed = previous − current.
 * Each side keeps the order of the list it was taken from.
 */
export function diff<T extends SnapshotElement>(
  previous: readonly T[],
  current: readonly T[]
): Delta<T> {
  const previousSet = new Set(previous);
  const currentSet = new Set(current);

  return {
    added: Array.from(currentSet).filter(element => !previousSet.has(element)),
    removed: Array.from(previousSet).filter(element => !currentSet.has(element)),
  };
}

/**
 * Event policy for one cycle:
 * - empty previous (first run): a single FirstObservation carrying current, nothing else
 * - Added when anything appeared, Removed when anything disappeared; both may fire, Added first
 * - no change: no events
 */
export function decideEvents<T extends SnapshotElement>(
  kind: EntityKind,
  previous: readonly T[],
  current: readonly T[]
): ChangeEvent<T>[] {
  if (previous.length === 0) {
    return [{ type: 'FirstObservation', kind, current }];
  }

  const delta = diff(previous, current);
  const events: ChangeEvent<T>[] = [];

  if (delta.added.length > 0) {
    events.push({ type: 'Added', kind, added: delta.added, current });
  }
  if (delta.removed.length > 0) {
    events.push({ type: 'Removed', kind, removed: delta.removed, current });
  }

  return events;
}
