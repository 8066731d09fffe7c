// Persisted snapshot record codec
// Version 1 layout: { version, kind, elements, capturedAt }
// Records written before versioning ({ ports: [...], ts } / { hosts: [...], ts }) still decode

import {
  ElementOf,
  EntityKind,
  SNAPSHOT_RECORD_VERSION,
  Snapshot,
  SnapshotRecord,
} from '../types/types';
import { getEntityDescriptor } from '../kinds/entityKinds';
import { normalizeElements } from './snapshot';

export type DecodeResult<T> =
  | { ok: true; snapshot: T }
  | { ok: false; reason: string };

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function encodeSnapshot<K extends EntityKind>(
  kind: K,
  snapshot: Snapshot<ElementOf<K>>
): SnapshotRecord {
  return {
    version: SNAPSHOT_RECORD_VERSION,
    kind,
    elements: [...snapshot.elements],
    capturedAt: snapshot.capturedAt,
  };
}

export function serializeSnapshot<K extends EntityKind>(
  kind: K,
  snapshot: Snapshot<ElementOf<K>>
): string {
  return JSON.stringify(encodeSnapshot(kind, snapshot), null, 2);
}

/**
 * Validate an untrusted parsed value as a snapshot record for `kind`.
 * Every element must be valid for the kind; one bad element rejects the record.
 */
export function decodeSnapshotRecord<K extends EntityKind>(
  kind: K,
  value: unknown
): DecodeResult<Snapshot<ElementOf<K>>> {
  if (!isRecordObject(value)) {
    return { ok: false, reason: 'record is not an object' };
  }

  let elements: unknown;
  let capturedAt: unknown;

  if ('version' in value) {
    if (value.version !== SNAPSHOT_RECORD_VERSION) {
      return { ok: false, reason: `unsupported record version ${String(value.version)}` };
    }
    if (value.kind !== kind) {
      return { ok: false, reason: `record kind ${String(value.kind)} does not match ${kind}` };
    }
    elements = value.elements;
    capturedAt = value.capturedAt;
  } else if (kind in value) {
    // Legacy layout keyed by the kind name
    elements = value[kind];
    capturedAt = value.ts;
  } else {
    return { ok: false, reason: 'record has neither version nor legacy element list' };
  }

  if (!Array.isArray(elements)) {
    return { ok: false, reason: 'elements is not an array' };
  }

  const descriptor = getEntityDescriptor(kind);
  const valid: ElementOf<K>[] = [];
  for (const element of elements) {
    if (!descriptor.isElement(element)) {
      return { ok: false, reason: `invalid ${kind} element ${JSON.stringify(element)}` };
    }
    valid.push(element);
  }

  return {
    ok: true,
    snapshot: {
      kind,
      elements: normalizeElements(valid, descriptor.compare),
      capturedAt: typeof capturedAt === 'number' && Number.isFinite(capturedAt) ? capturedAt : 0,
    },
  };
}

/**
 * Parse raw persisted text. JSON syntax errors are reported, not thrown.
 */
export function deserializeSnapshot<K extends EntityKind>(
  kind: K,
  raw: string
): DecodeResult<Snapshot<ElementOf<K>>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return {
      ok: false,
      reason: `JSON parse failure: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
  return decodeSnapshotRecord(kind, parsed);
}
