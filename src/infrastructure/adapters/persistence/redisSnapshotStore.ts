// Redis Snapshot Store - one key per entity kind
// Single GET / single SET, full overwrite, no Lua, no pubsub, no retries

import Redis from 'ioredis';
import { SnapshotStorePort } from '../../../domain/ports/snapshotStore';
import { ElementOf, EntityKind, Snapshot } from '../../../domain/types/types';
import { deserializeSnapshot, serializeSnapshot } from '../../../domain/snapshot/snapshotRecord';
import { emptySnapshot } from '../../../domain/snapshot/snapshot';
import {
  logVerbose as logVerboseShared,
  logPerformance as logPerformanceShared,
  logWarning,
  logError,
} from '../logging/logger';

function logVerbose(component: string, message: string, data?: Record<string, unknown>): void {
  logVerboseShared(`RedisSnapshotStore:${component}`, message, data);
}

function logPerformance(operation: string, duration: number, metadata?: Record<string, unknown>): void {
  logPerformanceShared(`[RedisSnapshotStore] ${operation}`, duration, metadata);
}

// Only the commands this store issues; satisfied by an ioredis client
export interface SnapshotRedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
}

export function createRedisClient(options: { host: string; port: number; db: number }): Redis {
  const client = new Redis({
    host: options.host,
    port: options.port,
    db: options.db,
    lazyConnect: true,
    maxRetriesPerRequest: 1,
  });
  // Pending commands still reject on their own; this listener only logs
  client.on('error', (error: Error) => {
    logWarning('RedisSnapshotStore', 'Redis connection error', {
      host: options.host,
      port: options.port,
      error: error.message,
    });
  });
  return client;
}

export function getSnapshotKey(prefix: string, kind: EntityKind): string {
  return `${prefix}:${kind}`;
}

export class RedisSnapshotStore implements SnapshotStorePort {
  constructor(
    private readonly client: SnapshotRedisClient,
    private readonly keyPrefix: string
  ) {
    logVerbose('Init', 'RedisSnapshotStore initialized', { key_prefix: keyPrefix });
  }

  async load<K extends EntityKind>(kind: K): Promise<Snapshot<ElementOf<K>>> {
    const key = getSnapshotKey(this.keyPrefix, kind);
    const startTime = Date.now();

    let rawValue: string | null;
    try {
      rawValue = await this.client.get(key);
    } catch (error) {
      // Unreachable store: the cycle reports a first observation, then fails on SET
      logError('RedisSnapshotStore', `GET ${key} failed, treating ${kind} snapshot as empty`, error);
      return emptySnapshot(kind);
    }
    logPerformance('RedisGET', Date.now() - startTime, { key, found: rawValue !== null });

    if (rawValue === null) {
      logVerbose('Load', 'Snapshot key not found, starting from empty', { kind, key });
      return emptySnapshot(kind);
    }

    const decoded = deserializeSnapshot(kind, rawValue);
    if (!decoded.ok) {
      logWarning('RedisSnapshotStore', 'Snapshot malformed, treating as empty', {
        kind,
        key,
        reason: decoded.reason,
        raw_value_preview: rawValue.substring(0, 200),
      });
      return emptySnapshot(kind);
    }

    logVerbose('Load', 'Snapshot loaded', {
      kind,
      key,
      elements: decoded.snapshot.elements.length,
    });
    return decoded.snapshot;
  }

  async save<K extends EntityKind>(kind: K, snapshot: Snapshot<ElementOf<K>>): Promise<void> {
    const key = getSnapshotKey(this.keyPrefix, kind);
    const serialized = serializeSnapshot(kind, snapshot);
    const startTime = Date.now();

    try {
      await this.client.set(key, serialized);
    } catch (error) {
      logPerformance('RedisSET', Date.now() - startTime, { key, failed: true });
      throw new Error(`Failed to persist ${kind} snapshot to key ${key}: ${error instanceof Error ? error.message : String(error)}`);
    }

    logPerformance('RedisSET', Date.now() - startTime, { key, value_size: serialized.length });
    logVerbose('Save', 'Snapshot persisted', { kind, key, elements: snapshot.elements.length });
  }
}
