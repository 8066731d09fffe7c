// Scan Output Parser
// Greppable (-oG) nmap output to normalized element lists
// Output is untrusted: unrecognized or malformed lines are skipped, never thrown

import { compareHostAddresses, compareNumbers, normalizeElements } from '../snapshot/snapshot';
import { logVerbose as logVerboseShared } from '../../infrastructure/adapters/logging/logger';

function logVerbose(component: string, message: string, data?: Record<string, unknown>): void {
  logVerboseShared(`ScanOutputParser:${component}`, message, data);
}

const PORTS_MARKER = 'Ports:';
const HOST_PREFIX = 'Host:';
const HOST_UP_MARKER = 'Status: Up';
const SCAN_DONE_MARKER = '# Nmap done';

const MAX_PORT = 65535;

function splitLines(raw: string): string[] {
  return raw.split(/\r?\n/);
}

/**
 * Port number from one `port/state/protocol/...` tuple, or null when the
 * tuple is malformed or not in the `open` state
 */
function openPortFromTuple(tuple: string): number | null {
  const segments = tuple.trim().split('/');
  if (segments.length < 2 || segments[1] !== 'open') {
    return null;
  }

  if (!/^\d+$/.test(segments[0])) {
    return null;
  }

  const port = parseInt(segments[0], 10);
  if (port < 1 || port > MAX_PORT) {
    return null;
  }
  return port;
}

/**
 * Extract open ports from `Ports:` records.
 * Closed/filtered entries and malformed tuples are dropped.
 */
export function parsePorts(raw: string): number[] {
  const ports: number[] = [];
  let recordLines = 0;

  for (const line of splitLines(raw)) {
    const markerIndex = line.indexOf(PORTS_MARKER);
    if (markerIndex === -1) {
      continue;
    }
    recordLines++;

    // Fields in greppable output are tab-separated; the port list ends at the next field
    const field = line.substring(markerIndex + PORTS_MARKER.length).split('\t')[0];
    for (const tuple of field.split(',')) {
      const port = openPortFromTuple(tuple);
      if (port !== null) {
        ports.push(port);
      }
    }
  }

  const result = normalizeElements(ports, compareNumbers);
  logVerbose('ParsePorts', 'Parsed port records', {
    raw_length: raw.length,
    record_lines: recordLines,
    open_ports: result.length,
  });
  return result;
}

/**
 * Extract addresses of hosts reported as up.
 * The address is the token right after the `Host:` marker.
 */
export function parseHosts(raw: string): string[] {
  const hosts: string[] = [];

  for (const line of splitLines(raw)) {
    if (!line.startsWith(HOST_PREFIX) || !line.includes(HOST_UP_MARKER)) {
      continue;
    }
    const address = line.trim().split(/\s+/)[1];
    if (address) {
      hosts.push(address);
    }
  }

  const result = normalizeElements(hosts, compareHostAddresses);
  logVerbose('ParseHosts', 'Parsed host records', {
    raw_length: raw.length,
    hosts_up: result.length,
  });
  return result;
}

/**
 * True when the output carries the trailer nmap writes after a finished scan.
 * Used to tell a truncated scan apart from a genuinely empty one in logs.
 */
export function isScanComplete(raw: string): boolean {
  return splitLines(raw).some(line => line.startsWith(SCAN_DONE_MARKER));
}
