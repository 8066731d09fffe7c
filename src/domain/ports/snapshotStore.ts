// Port: Snapshot Store
// One record per entity kind, full overwrite only

import { ElementOf, EntityKind, Snapshot } from '../types/types';

export interface SnapshotStorePort {
  /**
   * Read the persisted snapshot for `kind`.
   * Absent, unreadable or malformed state resolves to the empty snapshot; never rejects.
   */
  load<K extends EntityKind>(kind: K): Promise<Snapshot<ElementOf<K>>>;

  /**
   * Replace the persisted snapshot for `kind`.
   * Any failure must surface to caller.
   */
  save<K extends EntityKind>(kind: K, snapshot: Snapshot<ElementOf<K>>): Promise<void>;
}
