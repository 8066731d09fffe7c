// Type definitions for snapshots, deltas and change events

export type EntityKind = 'ports' | 'hosts';

export const ENTITY_KINDS: readonly EntityKind[] = ['ports', 'hosts'] as const;

// Element type observed for each entity kind
export interface EntityElementMap {
  ports: number;
  hosts: string;
}

export type ElementOf<K extends EntityKind> = EntityElementMap[K];

export type SnapshotElement = string | number;

/**
 * Observed state of one entity kind at one point in time.
 * `elements` is deduplicated and sorted for display; snapshots are compared
 * by element contents only, never by `capturedAt`.
 */
export interface Snapshot<T extends SnapshotElement> {
  kind: EntityKind;
  elements: readonly T[];
  capturedAt: number; // epoch seconds, 0 for the empty default
}

export interface Delta<T extends SnapshotElement> {
  added: T[];
  removed: T[];
}

export type ChangeEventType = 'FirstObservation' | 'Added' | 'Removed';

export interface FirstObservationEvent<T extends SnapshotElement> {
  type: 'FirstObservation';
  kind: EntityKind;
  current: readonly T[];
}

export interface AddedEvent<T extends SnapshotElement> {
  type: 'Added';
  kind: EntityKind;
  added: T[];
  current: readonly T[];
}

export interface RemovedEvent<T extends SnapshotElement> {
  type: 'Removed';
  kind: EntityKind;
  removed: T[];
  current: readonly T[];
}

export type ChangeEvent<T extends SnapshotElement = SnapshotElement> =
  | FirstObservationEvent<T>
  | AddedEvent<T>
  | RemovedEvent<T>;

// Persisted layout, schema version 1
export const SNAPSHOT_RECORD_VERSION = 1;

export interface SnapshotRecord {
  version: typeof SNAPSHOT_RECORD_VERSION;
  kind: EntityKind;
  elements: SnapshotElement[];
  capturedAt: number;
}

export interface ScanRequest {
  kind: EntityKind;
  command: string;
  args: string[];
  timeoutMs: number;
}

export interface ScanResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  durationMs: number;
}

export type CycleResult =
  | {
      kind: EntityKind;
      status: 'completed';
      elementCount: number;
      added: number;
      removed: number;
      events: ChangeEventType[];
    }
  | {
      kind: EntityKind;
      status: 'scan_failed';
      reason: string;
    };

export interface RunSummary {
  startedAt: string; // ISO timestamp
  durationMs: number;
  cycles: CycleResult[];
}
