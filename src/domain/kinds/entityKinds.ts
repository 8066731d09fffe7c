// Entity kind registry
// Everything that differs between ports and hosts lives here, so the diff,
// notify and persist pipeline stays a single code path

import { ChangeEventType, ElementOf, EntityKind } from '../types/types';
import { ElementComparator, compareHostAddresses, compareNumbers } from '../snapshot/snapshot';
import { parseHosts, parsePorts } from '../parsers/scanOutputParser';

// Embed colors (decimal RGB)
export const ALERT_COLORS = {
  INFO: 5814783,
  RED: 15158332,
  YELLOW: 16776960,
  BLUE: 3447003,
  PURPLE: 10181046,
} as const;

export interface AlertTemplate {
  title: string;
  color: number;
  currentFieldName: string;
  // Absent for FirstObservation, which has no changed subset
  changedFieldName?: string;
  describe(subject: string, listed: string): string;
}

export interface EntityKindDescriptor<K extends EntityKind> {
  kind: K;
  // Field name for the scanned target or subnet
  subjectLabel: string;
  compare: ElementComparator<ElementOf<K>>;
  isElement(value: unknown): value is ElementOf<K>;
  parse(raw: string): ElementOf<K>[];
  scanArgs(subject: string): string[];
  alerts: Record<ChangeEventType, AlertTemplate>;
}

function isPortNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 65535;
}

function isHostAddress(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0 && !/\s/.test(value);
}

const portsDescriptor: EntityKindDescriptor<'ports'> = {
  kind: 'ports',
  subjectLabel: 'Target',
  compare: compareNumbers,
  isElement: isPortNumber,
  parse: parsePorts,
  // Full port range, service detection, skip host discovery
  scanArgs: target => ['-p-', '-sV', '-Pn', '-oG', '-', target],
  alerts: {
    FirstObservation: {
      title: '🔰 First scan (ports)',
      color: ALERT_COLORS.INFO,
      currentFieldName: 'Open ports',
      describe: (target, listed) => `Target ${target} open ports: ${listed}`,
    },
    Added: {
      title: '⚠️ New ports detected',
      color: ALERT_COLORS.RED,
      currentFieldName: 'All open ports',
      changedFieldName: 'New ports',
      describe: (target, listed) => `Target ${target} has new ports: ${listed}`,
    },
    Removed: {
      title: '🔒 Ports closed',
      color: ALERT_COLORS.YELLOW,
      currentFieldName: 'Current open ports',
      changedFieldName: 'Closed ports',
      describe: (target, listed) => `Target ${target} has closed ports: ${listed}`,
    },
  },
};

const hostsDescriptor: EntityKindDescriptor<'hosts'> = {
  kind: 'hosts',
  subjectLabel: 'Subnet',
  compare: compareHostAddresses,
  isElement: isHostAddress,
  parse: parseHosts,
  // Ping sweep only
  scanArgs: subnet => ['-sn', '-oG', '-', subnet],
  alerts: {
    FirstObservation: {
      title: '🔰 First scan (hosts)',
      color: ALERT_COLORS.INFO,
      currentFieldName: 'Active hosts',
      describe: (subnet, listed) => `Active hosts in ${subnet}: ${listed}`,
    },
    Added: {
      title: '🆕 New hosts detected',
      color: ALERT_COLORS.BLUE,
      currentFieldName: 'All active hosts',
      changedFieldName: 'New hosts',
      describe: (subnet, listed) => `New hosts appeared in ${subnet}: ${listed}`,
    },
    Removed: {
      title: '👻 Hosts disappeared',
      color: ALERT_COLORS.PURPLE,
      currentFieldName: 'Current active hosts',
      changedFieldName: 'Disappeared hosts',
      describe: (subnet, listed) => `Hosts disappeared from ${subnet}: ${listed}`,
    },
  },
};

const ENTITY_DESCRIPTORS: { [K in EntityKind]: EntityKindDescriptor<K> } = {
  ports: portsDescriptor,
  hosts: hostsDescriptor,
};

export function getEntityDescriptor<K extends EntityKind>(kind: K): EntityKindDescriptor<K> {
  return ENTITY_DESCRIPTORS[kind];
}

export function isEntityKind(value: unknown): value is EntityKind {
  return value === 'ports' || value === 'hosts';
}
