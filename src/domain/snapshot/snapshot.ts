// Snapshot construction helpers
// Pure functions only

import { EntityKind, Snapshot, SnapshotElement } from '../types/types';

export type ElementComparator<T> = (a: T, b: T) => number;

const IPV4_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

export function compareNumbers(a: number, b: number): number {
  return a - b;
}

function ipv4Octets(address: string): number[] | null {
  const match = IPV4_PATTERN.exec(address);
  if (!match) {
    return null;
  }
  return match.slice(1).map(octet => parseInt(octet, 10));
}

/**
 * Orders dotted IPv4 addresses numerically (10.0.0.9 before 10.0.0.10).
 * Anything else (IPv6, hostnames) falls back to plain string order, after IPv4.
 */
export function compareHostAddresses(a: string, b: string): number {
  const octetsA = ipv4Octets(a);
  const octetsB = ipv4Octets(b);

  if (octetsA && octetsB) {
    for (let i = 0; i < 4; i++) {
      if (octetsA[i] !== octetsB[i]) {
        return octetsA[i] - octetsB[i];
      }
    }
    return 0;
  }
  if (octetsA) return -1;
  if (octetsB) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Deduplicate and sort. Ordering is for display and logging only.
 */
export function normalizeElements<T extends SnapshotElement>(
  values: Iterable<T>,
  compare: ElementComparator<T>
): T[] {
  return Array.from(new Set(values)).sort(compare);
}

export function createSnapshot<T extends SnapshotElement>(
  kind: EntityKind,
  values: Iterable<T>,
  compare: ElementComparator<T>,
  capturedAt: number = Math.floor(Date.now() / 1000)
): Snapshot<T> {
  return {
    kind,
    elements: normalizeElements(values, compare),
    capturedAt,
  };
}

/**
 * The well-defined empty snapshot returned for absent or unusable state.
 * A previous snapshot in this shape is what marks a first run.
 */
export function emptySnapshot<T extends SnapshotElement>(kind: EntityKind): Snapshot<T> {
  return { kind, elements: [], capturedAt: 0 };
}
