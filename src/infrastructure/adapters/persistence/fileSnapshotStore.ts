// File Snapshot Store - one JSON file per entity kind
// Full overwrite only: write to a temporary sibling, then rename over the record
// Load never fails; save failures surface to caller

import * as fs from 'fs/promises';
import * as path from 'path';
import { SnapshotStorePort } from '../../../domain/ports/snapshotStore';
import { ElementOf, EntityKind, Snapshot } from '../../../domain/types/types';
import { deserializeSnapshot, serializeSnapshot } from '../../../domain/snapshot/snapshotRecord';
import { emptySnapshot } from '../../../domain/snapshot/snapshot';
import {
  logVerbose as logVerboseShared,
  logPerformance as logPerformanceShared,
  logWarning,
} from '../logging/logger';

function logVerbose(component: string, message: string, data?: Record<string, unknown>): void {
  logVerboseShared(`FileSnapshotStore:${component}`, message, data);
}

function logPerformance(operation: string, duration: number, metadata?: Record<string, unknown>): void {
  logPerformanceShared(`[FileSnapshotStore] ${operation}`, duration, metadata);
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = (error as { code: unknown }).code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class FileSnapshotStore implements SnapshotStorePort {
  constructor(private readonly paths: Record<EntityKind, string>) {
    logVerbose('Init', 'FileSnapshotStore initialized', { paths });
  }

  async load<K extends EntityKind>(kind: K): Promise<Snapshot<ElementOf<K>>> {
    const filePath = this.paths[kind];
    const startTime = Date.now();

    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        logVerbose('Load', 'No snapshot on disk, starting from empty', { kind, path: filePath });
      } else {
        logWarning('FileSnapshotStore', 'Snapshot unreadable, treating as empty', {
          kind,
          path: filePath,
          error: errorMessage(error),
        });
      }
      return emptySnapshot(kind);
    }

    const decoded = deserializeSnapshot(kind, raw);
    logPerformance('Load', Date.now() - startTime, { kind, size: raw.length });

    if (!decoded.ok) {
      logWarning('FileSnapshotStore', 'Snapshot malformed, treating as empty', {
        kind,
        path: filePath,
        reason: decoded.reason,
        raw_preview: raw.substring(0, 200),
      });
      return emptySnapshot(kind);
    }

    logVerbose('Load', 'Snapshot loaded', {
      kind,
      path: filePath,
      elements: decoded.snapshot.elements.length,
      captured_at: decoded.snapshot.capturedAt,
    });
    return decoded.snapshot;
  }

  async save<K extends EntityKind>(kind: K, snapshot: Snapshot<ElementOf<K>>): Promise<void> {
    const filePath = this.paths[kind];
    const tempPath = `${filePath}.${process.pid}.tmp`;
    const startTime = Date.now();
    const serialized = serializeSnapshot(kind, snapshot);

    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(tempPath, serialized + '\n', 'utf8');
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        logWarning('FileSnapshotStore', 'Failed to remove temporary snapshot file', {
          path: tempPath,
          error: errorMessage(cleanupError),
        });
      });
      throw new Error(`Failed to persist ${kind} snapshot to ${filePath}: ${errorMessage(error)}`);
    }

    logPerformance('Save', Date.now() - startTime, { kind, size: serialized.length });
    logVerbose('Save', 'Snapshot persisted', {
      kind,
      path: filePath,
      elements: snapshot.elements.length,
    });
  }
}
